import type { TransportEndpoint, TransportKind } from '../transports/types.js';

import { DEFAULT_HOST, DEFAULT_PORT, DEFAULT_WORKER_COUNT, TRANSPORT_KINDS } from './consts.js';

/**
 * Raw settings as given on the command line; unset fields fall back to the environment.
 */
export interface RawTransportSettings {
  transport?: string;
  path?: string;
  host?: string;
  port?: string | number;
}

export interface RawServeSettings extends RawTransportSettings {
  workers?: string | number;
}

export interface ServeConfig {
  endpoint: TransportEndpoint;
  /**
   * Worker pool size; 0 handles requests inline on the receive loop.
   */
  workers: number;
}

function isTransportKind(value: string): value is TransportKind {
  return TRANSPORT_KINDS.some((kind) => kind === value);
}

function parseIntegerSetting(value: string | number): number | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : undefined;
  }

  return /^\d+$/.test(value.trim()) ? Number.parseInt(value, 10) : undefined;
}

function parsePort(value: string | number): number {
  const port = parseIntegerSetting(value);

  if (port === undefined || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }

  return port;
}

export function resolveEndpoint(settings: RawTransportSettings = {}, env: NodeJS.ProcessEnv = process.env): TransportEndpoint {
  const kind = settings.transport ?? env.TRANSPORT ?? 'tcp';

  if (!isTransportKind(kind)) {
    throw new Error(`Invalid transport: ${kind}`);
  }

  if (kind === 'unix') {
    const socketPath = settings.path ?? env.SOCKET_PATH;

    if (socketPath === undefined || socketPath.trim().length === 0) {
      throw new Error('Missing socket path for unix transport');
    }

    return { kind, path: socketPath };
  }

  return {
    kind,
    host: settings.host ?? env.HOST ?? DEFAULT_HOST,
    port: parsePort(settings.port ?? env.PORT ?? DEFAULT_PORT),
  };
}

export function resolveServeConfig(settings: RawServeSettings = {}, env: NodeJS.ProcessEnv = process.env): ServeConfig {
  const rawWorkers = settings.workers ?? env.WORKERS ?? DEFAULT_WORKER_COUNT;
  const workers = parseIntegerSetting(rawWorkers);

  if (workers === undefined || workers < 0) {
    throw new Error(`Invalid worker count: ${rawWorkers}`);
  }

  return {
    endpoint: resolveEndpoint(settings, env),
    workers,
  };
}
