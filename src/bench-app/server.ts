/**
 * Sample Service Entry Point
 * @module bench-app/server
 *
 * `server --host <host> --port <port> --workers <n>`. With more than one
 * worker the primary forks cluster workers that share the listening port.
 */

import cluster from 'cluster';
import { buildApp } from './app.js';

interface ServerArgs {
  host: string;
  port: number;
  workers: number;
}

function parseServerArgs(argv: readonly string[]): ServerArgs {
  const args: ServerArgs = { host: '127.0.0.1', port: 8000, workers: 1 };

  for (let i = 0; i < argv.length; i++) {
    const [flag, inline] = (argv[i] ?? '').split('=', 2);
    const value = inline ?? argv[i + 1];
    if (inline === undefined && (flag === '--host' || flag === '--port' || flag === '--workers')) {
      i++;
    }

    switch (flag) {
      case '--host':
        args.host = value ?? args.host;
        break;
      case '--port':
        args.port = Number(value);
        break;
      case '--workers':
        args.workers = Number(value);
        break;
    }
  }

  if (!Number.isInteger(args.port) || args.port < 1 || args.port > 65535) {
    throw new Error(`Invalid --port: ${args.port}`);
  }
  if (!Number.isInteger(args.workers) || args.workers < 1) {
    throw new Error(`Invalid --workers: ${args.workers}`);
  }
  return args;
}

async function serve(args: ServerArgs): Promise<void> {
  const app = await buildApp();

  const shutdown = async (signal: string): Promise<void> => {
    app.log.info({ signal }, 'Shutting down');
    await app.close();
    process.exit(0);
  };
  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown(signal).catch((error: unknown) => {
      console.error('Sample service failed to shut down:', error);
      process.exit(1);
    });
  };
  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);

  await app.listen({ host: args.host, port: args.port });
}

function forkWorkers(args: ServerArgs): void {
  for (let i = 0; i < args.workers; i++) {
    cluster.fork();
  }

  const stop = (signal: NodeJS.Signals): void => {
    for (const worker of Object.values(cluster.workers ?? {})) {
      worker?.process.kill(signal);
    }
    process.exit(0);
  };
  process.once('SIGTERM', () => stop('SIGTERM'));
  process.once('SIGINT', () => stop('SIGINT'));
}

async function main(): Promise<void> {
  const args = parseServerArgs(process.argv.slice(2));

  if (args.workers > 1 && cluster.isPrimary) {
    forkWorkers(args);
    return;
  }
  await serve(args);
}

main().catch((error: unknown) => {
  console.error('Sample service failed to start:', error);
  process.exit(1);
});
