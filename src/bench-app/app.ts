/**
 * Sample Service Application Factory
 * @module bench-app/app
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import { ItemStore } from './item-store.js';
import benchRoutes from './routes.js';

export interface BenchAppOptions {
  /** Fastify logger setting; request logging is off either way */
  logger?: FastifyServerOptions['logger'];
  /** Store to serve from (a fresh one by default) */
  store?: ItemStore;
}

/**
 * Create the sample service
 */
export async function buildApp(opts: BenchAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: opts.logger ?? {
      level: process.env.LOG_LEVEL || 'warn',
    },
    disableRequestLogging: true,
  });

  await app.register(benchRoutes, { store: opts.store ?? new ItemStore() });

  return app;
}
