import { RemoteError } from '../common/errors.js';
import { getErrorMessage, logJsonl } from '../common/logger.js';
import { createMutex } from '../common/mutex.js';
import type { Transport } from '../transports/types.js';
import type { Envelope } from '../types/rpc.js';

import { decodeEnvelope, encodeEnvelope, failure, getFailureMessage, isSuccess, withCommand } from './envelope.js';

export type CallCallback = (response: Envelope) => void;

export interface RpcClient {
  /**
   * Sends `request` tagged with `command` and resolves with the reply.
   * Rejects with RemoteError when the reply's `success` is not true.
   */
  call(command: string, request?: Envelope): Promise<Envelope>;
  /**
   * Same as `call`, started on a later turn of the event loop.
   */
  callAsync(command: string, request?: Envelope): Promise<Envelope>;
  /**
   * Fire-and-forget. `onComplete` runs exactly once, with the reply or with a
   * `{ success: false, message }` envelope built from the error.
   */
  callBackground(command: string, request: Envelope, onComplete: CallCallback): void;
  /**
   * Closes the underlying transport.
   */
  close(): Promise<void>;
}

export function createRpcClient(transport: Transport): RpcClient {
  return new RpcClientImpl(transport);
}

class RpcClientImpl implements RpcClient {
  /**
   * One round trip at a time per client, whichever entry point started it.
   */
  private readonly lock = createMutex();

  constructor(private readonly transport: Transport) {}

  call(command: string, request: Envelope = {}): Promise<Envelope> {
    return this.lock.runExclusive(async () => {
      const payload = encodeEnvelope(withCommand(request, command));
      const reply = await this.transport.roundTrip(payload);
      const response = decodeEnvelope(reply);

      if (!isSuccess(response)) {
        throw new RemoteError(getFailureMessage(response, 'Unknown server error.'), response);
      }

      return response;
    });
  }

  async callAsync(command: string, request: Envelope = {}): Promise<Envelope> {
    await new Promise<void>((resolve) => {
      setImmediate(resolve);
    });

    return this.call(command, request);
  }

  callBackground(command: string, request: Envelope, onComplete: CallCallback): void {
    const deliver = (response: Envelope): void => {
      try {
        onComplete(response);
      } catch (error) {
        logJsonl('ERROR', 'background_callback_failed', {
          command,
          error: getErrorMessage(error),
        });
      }
    };

    void this.call(command, request).then(deliver, (error: unknown) => {
      deliver(failure(getErrorMessage(error)));
    });
  }

  close(): Promise<void> {
    return this.transport.close();
  }
}
