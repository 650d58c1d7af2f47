/**
 * Sample Service Tests
 * @module tests/unit/bench-app/app
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../../src/bench-app/app.js';
import { ItemStore } from '../../../src/bench-app/item-store.js';
import { BENCH_APP_ROUTES, toFastifyPath } from '../../../src/bench-app/manifest.js';

describe('sample service', () => {
  let app: FastifyInstance;
  let store: ItemStore;

  beforeEach(async () => {
    store = new ItemStore();
    app = await buildApp({ logger: false, store });
  });

  afterEach(async () => {
    await app.close();
  });

  it('should answer the root and health routes', async () => {
    const root = await app.inject({ method: 'GET', url: '/' });
    const health = await app.inject({ method: 'GET', url: '/health' });

    expect(root.json()).toEqual({ message: 'Benchmark API is running' });
    expect(health.statusCode).toBe(200);
    expect(health.json()).toEqual({ status: 'healthy' });
  });

  it('should seed the store once', async () => {
    const first = await app.inject({ method: 'POST', url: '/api/db/seed' });
    const second = await app.inject({ method: 'POST', url: '/api/db/seed' });

    expect(first.json()).toEqual({ inserted: 2000 });
    expect(second.json()).toEqual({ inserted: 0 });
  });

  it('should read a seeded item', async () => {
    const before = await app.inject({ method: 'GET', url: '/api/db/async/read/1000' });
    store.seed();
    const after = await app.inject({ method: 'GET', url: '/api/db/async/read/1000' });
    const blocking = await app.inject({ method: 'GET', url: '/api/db/blocking/read/1000' });

    expect(before.json()).toEqual({ found: false });
    expect(after.json()).toEqual({ found: true, id: 1000, name: 'item-1000', value: 1000, type: 'async_read' });
    expect(blocking.json()).toMatchObject({ found: true, id: 1000, type: 'blocking_read' });
  });

  it('should update an item on write', async () => {
    store.seed();

    const response = await app.inject({ method: 'POST', url: '/api/db/async/write/5' });

    expect(response.json()).toEqual({ found: true, id: 5, updated: true, newValue: 6, type: 'async_write' });
    expect(store.get(5)?.name).toBe('item-5-updated');
  });

  it('should echo the id from the simple routes', async () => {
    const asyncResponse = await app.inject({ method: 'GET', url: '/api/simple/async/7' });
    const blockingResponse = await app.inject({ method: 'GET', url: '/api/simple/blocking/7' });

    expect(asyncResponse.json()).toMatchObject({ id: 7, type: 'async' });
    expect(blockingResponse.json()).toMatchObject({ id: 7, type: 'blocking' });
  });

  it.each(['abc', '0'])('should reject item id %j', async (id) => {
    const response = await app.inject({ method: 'GET', url: `/api/db/async/read/${id}` });

    expect(response.statusCode).toBe(400);
  });

  it('should only accept the declared method', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/db/async/write/5' });

    expect(response.statusCode).toBe(404);
  });

  it('should register every manifest route', () => {
    for (const route of BENCH_APP_ROUTES) {
      for (const method of route.methods) {
        expect(app.hasRoute({ method, url: toFastifyPath(route.path) })).toBe(true);
      }
    }
  });
});

describe('toFastifyPath', () => {
  it('should convert placeholders to route parameters', () => {
    expect(toFastifyPath('/api/db/async/read/{item_id}')).toBe('/api/db/async/read/:item_id');
    expect(toFastifyPath('/health')).toBe('/health');
  });
});
