/**
 * Sample Service Routes
 * @module bench-app/routes
 *
 * Registers every route of the manifest with its handler. The `simple`
 * routes contrast a timer-based wait with a busy wait of the same length;
 * the `db` routes read and write the in-memory item store.
 */

import { setTimeout as sleep } from 'timers/promises';
import { performance } from 'perf_hooks';
import type { FastifyInstance, FastifyPluginAsync, FastifyRequest } from 'fastify';
import { Type, type Static } from '@sinclair/typebox';
import { BENCH_APP_ROUTES, toFastifyPath } from './manifest.js';
import type { ItemStore } from './item-store.js';

/** Wait applied by the `simple` routes */
export const SIMPLE_WAIT_MS = 50;

/** Synchronous work done by the blocking store read */
export const BLOCKING_READ_MS = 5;

export const ItemParamsSchema = Type.Object({
  item_id: Type.Integer({ minimum: 1, description: 'Item identifier' }),
});

export type ItemParams = Static<typeof ItemParamsSchema>;

type BenchHandler = (request: FastifyRequest<{ Params: ItemParams }>) => Promise<unknown>;

export interface BenchRoutesOptions {
  store: ItemStore;
}

/**
 * Spin the CPU, holding the event loop
 */
function blockFor(ms: number): number {
  const until = performance.now() + ms;
  let spins = 0;
  while (performance.now() < until) {
    spins++;
  }
  return spins;
}

function createHandlers(store: ItemStore): Readonly<Record<string, BenchHandler>> {
  return {
    root: async () => ({ message: 'Benchmark API is running' }),

    health: async () => ({ status: 'healthy' }),

    seed_data: async () => ({ inserted: store.seed() }),

    simple_async: async (request) => {
      await sleep(SIMPLE_WAIT_MS);
      return { id: request.params.item_id, timestamp: Date.now(), type: 'async' };
    },

    simple_blocking: async (request) => {
      blockFor(SIMPLE_WAIT_MS);
      return { id: request.params.item_id, timestamp: Date.now(), type: 'blocking' };
    },

    get_item_async: async (request) => {
      await Promise.resolve();
      const item = store.get(request.params.item_id);
      return item ? { found: true, ...item, type: 'async_read' } : { found: false };
    },

    update_item_async: async (request) => {
      await Promise.resolve();
      const item = store.increment(request.params.item_id);
      return item
        ? { found: true, id: item.id, updated: true, newValue: item.value, type: 'async_write' }
        : { found: false, error: 'Item not found' };
    },

    get_item_blocking: async (request) => {
      blockFor(BLOCKING_READ_MS);
      const item = store.get(request.params.item_id);
      return item ? { found: true, ...item, type: 'blocking_read' } : { found: false };
    },
  };
}

/**
 * Route plugin for the sample service
 */
const benchRoutes: FastifyPluginAsync<BenchRoutesOptions> = async (
  fastify: FastifyInstance,
  options: BenchRoutesOptions
): Promise<void> => {
  const handlers = createHandlers(options.store);

  for (const route of BENCH_APP_ROUTES) {
    const handler = handlers[route.name];
    if (!handler) {
      throw new Error(`No handler for route ${route.name}`);
    }

    fastify.route<{ Params: ItemParams }>({
      method: [...route.methods],
      url: toFastifyPath(route.path),
      schema: route.path.includes('{') ? { params: ItemParamsSchema } : undefined,
      handler: (request) => handler(request),
    });
  }
};

export default benchRoutes;
