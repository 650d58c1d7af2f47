/**
 * Service Client
 * @module http/service-client
 *
 * HTTP calls the orchestrator makes against a running instance outside the
 * load phase: seeding the fixture data and the single smoke request. Both
 * return a Result; a failure skips the cycle.
 */

import { CYCLE } from '../constants/index.js';
import { CycleError, ErrorCodes, getErrorMessage, type CycleStage } from '../errors/index.js';
import { materializeUrl, requestMethodFor } from '../discovery/index.js';
import type { ServiceInstance } from '../process/index.js';
import type { EndpointSpec, HttpMethod } from '../types/index.js';
import { err, ok, type AsyncResult } from '../utils/result.js';
import { timeoutSignal } from '../utils/async.js';

// ============================================================================
// Types
// ============================================================================

export interface ServiceResponse {
  readonly status: number;
  /** Response body, truncated for logging */
  readonly body: string;
}

export interface ServiceClient {
  /**
   * `POST <seedPath>`; any 2xx counts as seeded
   */
  seed(instance: ServiceInstance, seedPath: string, signal?: AbortSignal): AsyncResult<ServiceResponse, CycleError>;

  /**
   * One real request against the endpoint with its placeholders filled in
   */
  smoke(
    instance: ServiceInstance,
    endpoint: EndpointSpec,
    resourceId: string,
    signal?: AbortSignal
  ): AsyncResult<ServiceResponse, CycleError>;
}

export interface FetchServiceClientOptions {
  /** Custom fetch implementation (for testing) */
  readonly fetch?: typeof fetch;
  readonly seedTimeoutMs?: number;
  readonly smokeTimeoutMs?: number;
}

/** Body bytes kept on a ServiceResponse */
const BODY_PREVIEW_LENGTH = 200;

// ============================================================================
// Implementation
// ============================================================================

export class FetchServiceClient implements ServiceClient {
  private readonly fetchFn: typeof fetch;
  private readonly seedTimeoutMs: number;
  private readonly smokeTimeoutMs: number;

  constructor(options: FetchServiceClientOptions = {}) {
    this.fetchFn = options.fetch ?? fetch;
    this.seedTimeoutMs = options.seedTimeoutMs ?? CYCLE.SEED_TIMEOUT_MS;
    this.smokeTimeoutMs = options.smokeTimeoutMs ?? CYCLE.SMOKE_TIMEOUT_MS;
  }

  seed(instance: ServiceInstance, seedPath: string, signal?: AbortSignal): AsyncResult<ServiceResponse, CycleError> {
    return this.request('POST', `${instance.baseUrl}${seedPath}`, {
      stage: 'seed',
      code: ErrorCodes.SEED_FAILED,
      timeoutMs: this.seedTimeoutMs,
      signal,
    });
  }

  smoke(
    instance: ServiceInstance,
    endpoint: EndpointSpec,
    resourceId: string,
    signal?: AbortSignal
  ): AsyncResult<ServiceResponse, CycleError> {
    return this.request(requestMethodFor(endpoint), materializeUrl(instance.baseUrl, endpoint.path, resourceId), {
      stage: 'smoke',
      code: ErrorCodes.SMOKE_FAILED,
      timeoutMs: this.smokeTimeoutMs,
      signal,
    });
  }

  private async request(
    method: HttpMethod,
    url: string,
    options: {
      stage: CycleStage;
      code: typeof ErrorCodes.SEED_FAILED | typeof ErrorCodes.SMOKE_FAILED;
      timeoutMs: number;
      signal?: AbortSignal;
    }
  ): AsyncResult<ServiceResponse, CycleError> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        signal: timeoutSignal(options.timeoutMs, options.signal),
      });
    } catch (error) {
      if (options.signal?.aborted) {
        return err(CycleError.cancelled(options.stage));
      }
      return err(
        new CycleError(`${method} ${url} failed: ${getErrorMessage(error)}`, options.code, options.stage, {
          cause: error instanceof Error ? error : undefined,
          details: { method, url },
        })
      );
    }

    const body = (await response.text().catch(() => '')).slice(0, BODY_PREVIEW_LENGTH);
    if (!response.ok) {
      return err(
        new CycleError(`${method} ${url} returned ${response.status}`, options.code, options.stage, {
          details: { method, url, status: response.status, body },
        })
      );
    }

    return ok({ status: response.status, body });
  }
}
