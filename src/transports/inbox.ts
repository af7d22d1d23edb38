import { ReceiveError } from '../common/errors.js';

import type { ReceivedMessage } from './types.js';

type InboxEntry = { ok: true; message: ReceivedMessage } | { ok: false; error: ReceiveError };

interface Waiter {
  resolve: (message: ReceivedMessage) => void;
  reject: (error: ReceiveError) => void;
}

/**
 * Hands messages (or receive failures) from socket callbacks to `receive()` callers, in arrival order.
 */
export class Inbox {
  private readonly entries: InboxEntry[] = [];

  private readonly waiters: Waiter[] = [];

  private closedError: ReceiveError | undefined;

  push(message: ReceivedMessage): void {
    this.deliver({ ok: true, message });
  }

  fail(error: ReceiveError): void {
    this.deliver({ ok: false, error });
  }

  next(): Promise<ReceivedMessage> {
    const entry = this.entries.shift();
    if (entry !== undefined) {
      return entry.ok ? Promise.resolve(entry.message) : Promise.reject(entry.error);
    }

    if (this.closedError !== undefined) {
      return Promise.reject(this.closedError);
    }

    return new Promise<ReceivedMessage>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Drops undelivered entries and rejects current and future `next()` calls with `error`.
   */
  close(error: ReceiveError): void {
    if (this.closedError !== undefined) {
      return;
    }

    this.closedError = error;
    this.entries.length = 0;

    const waiters = this.waiters.splice(0);
    for (let i = 0; i < waiters.length; i++) {
      waiters[i].reject(error);
    }
  }

  private deliver(entry: InboxEntry): void {
    if (this.closedError !== undefined) {
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter === undefined) {
      this.entries.push(entry);
      return;
    }

    if (entry.ok) {
      waiter.resolve(entry.message);
    } else {
      waiter.reject(entry.error);
    }
  }
}
