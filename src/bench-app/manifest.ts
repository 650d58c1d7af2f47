/**
 * Sample Service Route Manifest
 * @module bench-app/manifest
 *
 * Static route table of the bundled sample service. The app registers its
 * routes from this list and discovery reads it in-process, so the two never
 * drift apart. Paths use `{param}` templates.
 */

export type BenchAppMethod = 'GET' | 'POST';

export interface BenchAppRoute {
  /** Logical test name, also the handler key */
  readonly name: string;
  readonly path: string;
  readonly methods: readonly BenchAppMethod[];
}

export const BENCH_APP_ROUTES: readonly BenchAppRoute[] = [
  { name: 'root', path: '/', methods: ['GET'] },
  { name: 'health', path: '/health', methods: ['GET'] },
  { name: 'seed_data', path: '/api/db/seed', methods: ['POST'] },

  // Event-loop friendly versus event-loop blocking waits of the same length
  { name: 'simple_async', path: '/api/simple/async/{item_id}', methods: ['GET'] },
  { name: 'simple_blocking', path: '/api/simple/blocking/{item_id}', methods: ['GET'] },

  // In-memory item store
  { name: 'get_item_async', path: '/api/db/async/read/{item_id}', methods: ['GET'] },
  { name: 'update_item_async', path: '/api/db/async/write/{item_id}', methods: ['POST'] },
  { name: 'get_item_blocking', path: '/api/db/blocking/read/{item_id}', methods: ['GET'] },
];

/**
 * Convert a `{param}` template to Fastify's `:param` syntax
 */
export function toFastifyPath(template: string): string {
  return template.replace(/\{([^}]+)\}/g, ':$1');
}

/**
 * Export name read by module route sources (`--routes <module>`)
 */
export const routes = BENCH_APP_ROUTES;
