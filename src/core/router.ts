import { getErrorMessage, log, logJsonl } from '../common/logger.js';
import type { Envelope, Handler } from '../types/rpc.js';

import { failure, getCommand, isJsonObject } from './envelope.js';
import type { Schema } from './schema.js';
import { validate } from './schema.js';

export interface HandlerOptions {
  /**
   * Request shape checked before the handler runs; a mismatch becomes a failure response.
   */
  schema?: Schema;
}

interface HandlerEntry {
  handler: Handler;
  schema?: Schema;
}

export interface CommandRouter {
  register: (command: string, handler: Handler, options?: HandlerOptions) => void;
  /**
   * Routes a decoded request to its handler and always resolves with a response envelope.
   */
  dispatch: (request: Envelope) => Promise<Envelope>;
  commands: () => string[];
}

export function createCommandRouter(): CommandRouter {
  const handlers = new Map<string, HandlerEntry>();

  const register = (command: string, handler: Handler, options: HandlerOptions = {}): void => {
    const replaced = handlers.has(command);
    handlers.set(command, { handler, schema: options.schema });

    log('INFO', `${replaced ? 'Replaced' : 'Registered'} command: ${command}`);
    logJsonl('INFO', 'command_registered', {
      command,
      replaced,
      validated: options.schema !== undefined,
    });
  };

  const dispatch = async (request: Envelope): Promise<Envelope> => {
    const command = getCommand(request);
    const entry = handlers.get(command);

    if (entry === undefined) {
      return failure(`Unknown command: ${command}`);
    }

    try {
      if (entry.schema !== undefined) {
        validate(request, entry.schema);
      }

      const response: unknown = await entry.handler(request);

      if (!isJsonObject(response)) {
        return failure('Handler returned a non-object response');
      }

      return response;
    } catch (error) {
      return failure(getErrorMessage(error));
    }
  };

  return {
    register,
    dispatch,
    commands() {
      return Array.from(handlers.keys()).sort((left, right) => left.localeCompare(right));
    },
  };
}
