import { PoolClosedError } from '../common/errors.js';
import { getErrorMessage, log, logJsonl } from '../common/logger.js';
import type { ReceivedMessage, Transport, TransportEndpoint } from '../transports/types.js';
import type { ClientHandle, Envelope, Handler } from '../types/rpc.js';
import type { WorkerPool } from '../workers/worker-pool.js';

import { decodeEnvelope, encodeEnvelope, failure, getCommand, getFailureMessage, isSuccess } from './envelope.js';
import type { HandlerOptions } from './router.js';
import { createCommandRouter } from './router.js';

export type ServerState = 'idle' | 'running' | 'stopped';

export interface RpcServerOptions {
  transport: Transport;
  /**
   * Runs handlers concurrently when present; without it requests are handled one at a time, in order.
   * The caller owns the pool and stops it.
   */
  pool?: WorkerPool;
}

export interface RpcServer {
  /**
   * Registers or replaces the handler for `command`. Register everything before `start()`.
   */
  addHandler(command: string, handler: Handler, options?: HandlerOptions): void;
  /**
   * Binds the transport and starts the serve loop. Resolves once bound.
   */
  start(): Promise<void>;
  /**
   * Resolves when the serve loop has exited.
   */
  untilStopped(): Promise<void>;
  /**
   * Closes the transport and ends the serve loop. Terminal, and safe to call twice.
   */
  stop(): Promise<void>;
  getState(): ServerState;
  getCommands(): string[];
  endpoint(): TransportEndpoint;
}

function describeEndpoint(endpoint: TransportEndpoint): string {
  return endpoint.kind === 'unix' ? `unix:${endpoint.path}` : `${endpoint.kind}://${endpoint.host}:${endpoint.port}`;
}

export function createRpcServer(options: RpcServerOptions): RpcServer {
  return new RpcServerImpl(options);
}

class RpcServerImpl implements RpcServer {
  private readonly transport: Transport;

  private readonly pool: WorkerPool | undefined;

  private readonly router = createCommandRouter();

  private state: ServerState = 'idle';

  private loop: Promise<void> | undefined;

  private stopping: Promise<void> | undefined;

  constructor(options: RpcServerOptions) {
    this.transport = options.transport;
    this.pool = options.pool;
  }

  addHandler(command: string, handler: Handler, options?: HandlerOptions): void {
    this.router.register(command, handler, options);
  }

  async start(): Promise<void> {
    if (this.state !== 'idle') {
      throw new Error(`Server cannot start from state: ${this.state}`);
    }

    this.state = 'running';

    try {
      await this.transport.bind();
    } catch (error) {
      this.state = 'stopped';
      await this.transport.close();
      throw error;
    }

    const endpoint = describeEndpoint(this.transport.endpoint());
    log('INFO', `Server started at ${endpoint}. Waiting for requests...`);
    logJsonl('INFO', 'server_started', {
      endpoint,
      commands: this.router.commands(),
      workers: this.pool?.size ?? 0,
    });

    this.loop = this.serve();
  }

  untilStopped(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  stop(): Promise<void> {
    if (this.stopping === undefined) {
      this.stopping = this.performStop();
    }

    return this.stopping;
  }

  getState(): ServerState {
    return this.state;
  }

  getCommands(): string[] {
    return this.router.commands();
  }

  endpoint(): TransportEndpoint {
    return this.transport.endpoint();
  }

  private async performStop(): Promise<void> {
    const wasRunning = this.state === 'running';
    this.state = 'stopped';

    await this.transport.close();
    await this.untilStopped();

    if (wasRunning) {
      log('INFO', 'Server stopped');
      logJsonl('INFO', 'server_stopped', { endpoint: describeEndpoint(this.transport.endpoint()) });
    }
  }

  /**
   * Receive loop. Only this loop ever calls `receive`, so transport reads stay sequential.
   */
  private async serve(): Promise<void> {
    while (this.state === 'running') {
      let message: ReceivedMessage;

      try {
        message = await this.transport.receive();
      } catch (error) {
        if (this.state !== 'running') {
          break;
        }

        log('ERROR', `Receive error: ${getErrorMessage(error)}`);
        logJsonl('ERROR', 'receive_failed', { error: getErrorMessage(error) });
        continue;
      }

      if (this.pool === undefined) {
        await this.handleMessage(message);
        continue;
      }

      try {
        this.pool.enqueue(() => this.handleMessage(message));
      } catch (error) {
        // a stopped pool refuses the task; answer instead of leaving the client waiting
        const reason = error instanceof PoolClosedError ? error.message : `Internal error: ${getErrorMessage(error)}`;
        logJsonl('ERROR', 'request_rejected', { handle: message.handle, error: reason });
        await this.reply(message.handle, failure(reason), '<rejected>');
      }
    }
  }

  /**
   * Decode, route, reply. Never throws: every outcome becomes a response envelope.
   */
  private async handleMessage(message: ReceivedMessage): Promise<void> {
    const startedAt = Date.now();
    let command = '<unparsed>';
    let response: Envelope;

    try {
      const request = decodeEnvelope(message.payload);
      command = getCommand(request);
      log('INFO', `Received request for command: ${command}`);
      response = await this.router.dispatch(request);
    } catch (error) {
      log('ERROR', `Invalid request: ${getErrorMessage(error)}`);
      response = failure(`Invalid request: ${getErrorMessage(error)}`);
    }

    const success = isSuccess(response);
    if (success) {
      log('SUCCESS', `Command '${command}' handled successfully`);
    } else {
      log('ERROR', `Command '${command}' failed: ${getFailureMessage(response, 'No error message')}`);
    }

    logJsonl(success ? 'INFO' : 'WARN', 'request_completed', {
      command,
      handle: message.handle,
      success,
      elapsedMs: Date.now() - startedAt,
    });

    await this.reply(message.handle, response, command);
  }

  private async reply(handle: ClientHandle, response: Envelope, command: string): Promise<void> {
    try {
      await this.transport.send(encodeEnvelope(response), handle);
    } catch (error) {
      log('ERROR', `Send error: ${getErrorMessage(error)}`);
      logJsonl('ERROR', 'send_failed', {
        command,
        handle,
        error: getErrorMessage(error),
      });
    }
  }
}
