import { describe, expect, it } from 'vitest';

import { ReceiveError } from '@/common/errors.js';
import { Inbox } from '@/transports/inbox.js';
import { readMessage } from '@/transports/read-buffer.js';

describe('inbox', () => {
  it('hands out buffered entries in arrival order', async () => {
    const inbox = new Inbox();
    inbox.push({ payload: 'a', handle: '1' });
    inbox.fail(new ReceiveError('lost'));
    inbox.push({ payload: 'b', handle: '2' });

    await expect(inbox.next()).resolves.toEqual({ payload: 'a', handle: '1' });
    await expect(inbox.next()).rejects.toThrow('lost');
    await expect(inbox.next()).resolves.toEqual({ payload: 'b', handle: '2' });
  });

  it('resolves a waiting next() as soon as a message arrives', async () => {
    const inbox = new Inbox();
    const waiting = inbox.next();

    inbox.push({ payload: 'late', handle: '9' });

    await expect(waiting).resolves.toEqual({ payload: 'late', handle: '9' });
  });

  it('drops entries and rejects every caller once closed', async () => {
    const inbox = new Inbox();
    const waiting = inbox.next();

    inbox.close(new ReceiveError('Transport closed'));
    inbox.push({ payload: 'ignored', handle: '1' });

    await expect(waiting).rejects.toThrow('Transport closed');
    await expect(inbox.next()).rejects.toThrow('Transport closed');
  });
});

describe('read-buffer', () => {
  it('keeps short messages whole and cuts long ones', () => {
    expect(readMessage(Buffer.from('{"a":1}'))).toBe('{"a":1}');
    expect(readMessage(Buffer.alloc(4096, 'z'))).toBe('z'.repeat(2047));
  });
});
