/**
 * Service Client Tests
 * @module tests/unit/http/service-client
 */

import { describe, it, expect, vi } from 'vitest';
import { ErrorCodes } from '../../../src/errors/index.js';
import { FetchServiceClient } from '../../../src/http/index.js';
import { isErr, isOk } from '../../../src/utils/result.js';
import { createEndpoint, createInstance } from '../../factories/bench.factory.js';

describe('FetchServiceClient', () => {
  const instance = createInstance({ baseUrl: 'http://127.0.0.1:8000' });

  describe('seed', () => {
    it('should POST to the seed path', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('{"inserted":2000}', { status: 200 }));
      const client = new FetchServiceClient({ fetch: fetchMock });

      const result = await client.seed(instance, '/api/db/seed');

      expect(isOk(result) && result.value).toEqual({ status: 200, body: '{"inserted":2000}' });
      expect(fetchMock.mock.calls[0]?.[0]).toBe('http://127.0.0.1:8000/api/db/seed');
      expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({ method: 'POST' });
    });

    it('should fail on a non-2xx status', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('boom', { status: 500 }));
      const client = new FetchServiceClient({ fetch: fetchMock });

      const result = await client.seed(instance, '/api/db/seed');

      expect(isErr(result) && result.error).toMatchObject({
        code: ErrorCodes.SEED_FAILED,
        stage: 'seed',
        message: 'POST http://127.0.0.1:8000/api/db/seed returned 500',
      });
    });

    it('should fail when the request cannot be made', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));
      const client = new FetchServiceClient({ fetch: fetchMock });

      const result = await client.seed(instance, '/api/db/seed');

      expect(isErr(result) && result.error).toMatchObject({
        code: ErrorCodes.SEED_FAILED,
        message: 'POST http://127.0.0.1:8000/api/db/seed failed: fetch failed',
      });
    });

    it('should report an aborted request as cancelled', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new DOMException('aborted', 'AbortError'));
      const client = new FetchServiceClient({ fetch: fetchMock });

      const result = await client.seed(instance, '/api/db/seed', AbortSignal.abort());

      expect(isErr(result) && result.error).toMatchObject({
        code: ErrorCodes.CYCLE_CANCELLED,
        stage: 'cancelled',
        message: 'Cycle cancelled during seed',
      });
    });
  });

  describe('smoke', () => {
    it('should GET a read endpoint with its placeholder filled in', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('{"found":true}', { status: 200 }));
      const client = new FetchServiceClient({ fetch: fetchMock });

      const result = await client.smoke(instance, createEndpoint({ path: '/api/items/{item_id}' }), '1000');

      expect(isOk(result)).toBe(true);
      expect(fetchMock.mock.calls[0]?.[0]).toBe('http://127.0.0.1:8000/api/items/1000');
      expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({ method: 'GET' });
    });

    it('should POST to a write endpoint', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('{}', { status: 201 }));
      const client = new FetchServiceClient({ fetch: fetchMock });

      await client.smoke(instance, createEndpoint({ path: '/api/db/write/{item_id}' }), '7');

      expect(fetchMock.mock.calls[0]?.[0]).toBe('http://127.0.0.1:8000/api/db/write/7');
      expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({ method: 'POST' });
    });

    it('should truncate the body of a failed response', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('x'.repeat(500), { status: 404 }));
      const client = new FetchServiceClient({ fetch: fetchMock });

      const result = await client.smoke(instance, createEndpoint(), '1000');

      expect(isErr(result)).toBe(true);
      if (isErr(result)) {
        expect(result.error.code).toBe(ErrorCodes.SMOKE_FAILED);
        expect(result.error.context.details?.body).toBe('x'.repeat(200));
      }
    });
  });
});
