import { Command } from 'commander';

import type { RawServeSettings, RawTransportSettings } from '../common/config.js';
import { resolveEndpoint, resolveServeConfig } from '../common/config.js';
import { getErrorMessage, log } from '../common/logger.js';
import { createRpcClient } from '../core/client.js';
import { decodeEnvelope } from '../core/envelope.js';
import { createRpcServer } from '../core/server.js';
import { registerDemoHandlers } from '../demo/handlers.js';
import { createTransport } from '../transports/index.js';
import { createWorkerPool } from '../workers/worker-pool.js';

export const VERSION = '0.1.0';

function addTransportOptions(command: Command): Command {
  return command
    .option('-t, --transport <kind>', 'transport: tcp, udp or unix (env TRANSPORT, default tcp)')
    .option('--path <path>', 'socket path for the unix transport (env SOCKET_PATH)')
    .option('--host <host>', 'IPv4 address (env HOST, default 127.0.0.1)')
    .option('-p, --port <port>', 'port (env PORT, default 8080)');
}

async function runServe(settings: RawServeSettings): Promise<void> {
  const config = resolveServeConfig(settings);
  const pool = config.workers > 0 ? createWorkerPool({ size: config.workers, name: 'handlers' }) : undefined;
  const server = createRpcServer({ transport: createTransport(config.endpoint), pool });

  registerDemoHandlers(server);

  const shutdown = (signal: NodeJS.Signals): void => {
    log('WARN', `Received ${signal}, shutting down`);
    void server.stop();
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await server.start();
  await server.untilStopped();
  await pool?.gracefulStop();
}

async function runCall(command: string, rawRequest: string, settings: RawTransportSettings): Promise<void> {
  const client = createRpcClient(createTransport(resolveEndpoint(settings)));

  try {
    const response = await client.call(command, decodeEnvelope(rawRequest));
    console.log(JSON.stringify(response));
  } catch (error) {
    console.error(`Error: ${getErrorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    await client.close();
  }
}

export function createProgram(): Command {
  const program = new Command();

  program.name('cmdsock').description('JSON command server and client over UNIX, TCP and UDP sockets').version(VERSION);

  addTransportOptions(program.command('serve').description('serve the demo commands (ping, echo, fibo)'))
    .option('-w, --workers <count>', 'worker pool size, 0 handles requests inline (env WORKERS, default 4)')
    .action(async (options: RawServeSettings) => {
      await runServe(options);
    });

  addTransportOptions(
    program
      .command('call')
      .description('send one request and print the response')
      .argument('<command>', 'command name')
      .argument('[request]', 'request fields as a JSON object', '{}'),
  ).action(async (command: string, rawRequest: string, options: RawTransportSettings) => {
    await runCall(command, rawRequest, options);
  });

  return program;
}
