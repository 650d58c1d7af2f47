/**
 * Endpoint Discovery
 * @module discovery/endpoint-discovery
 *
 * Turns the service's declared route table into the ordered list of
 * endpoints to benchmark. Infrastructure routes and the seed route are
 * excluded; an optional path prefix narrows the result.
 */

import { DISCOVERY } from '../constants/index.js';
import { DiscoveryError, ErrorCodes, isFatalError, getErrorMessage } from '../errors/index.js';
import { createModuleLogger } from '../logging/index.js';
import { WRITE_METHODS, type EndpointSpec, type HttpMethod } from '../types/index.js';
import type { RouteDeclaration, RouteSource } from './route-sources.js';

const logger = createModuleLogger('discovery');

const PLACEHOLDER = /\{[^}]*\}/g;

export interface DiscoverOptions {
  /** Keep only routes whose path starts with this prefix */
  readonly filter?: string;
  /** Seed route, excluded alongside the infrastructure routes */
  readonly seedPath: string;
}

// ============================================================================
// Naming and Methods
// ============================================================================

function isPlaceholder(segment: string): boolean {
  return segment.startsWith('{') && segment.endsWith('}');
}

/**
 * Logical test name: the declared name, else the last static path segment
 */
export function logicalNameOf(route: RouteDeclaration): string | undefined {
  if (route.name) {
    return route.name;
  }
  const segments = route.path.split('/').filter((segment) => segment.length > 0 && !isPlaceholder(segment));
  return segments[segments.length - 1];
}

function benchmarkedMethods(route: RouteDeclaration): HttpMethod[] {
  const declared = route.methods.map((method) => method.toUpperCase());
  return DISCOVERY.BENCHMARKED_METHODS.filter((method) => declared.includes(method));
}

/**
 * Method used for the smoke request and the load targets.
 *
 * A `write` path segment forces POST; a route declaring only a write verb
 * keeps it; everything else is read with GET.
 */
export function requestMethodFor(endpoint: EndpointSpec): HttpMethod {
  const segments = endpoint.path.split('/');
  if (segments.includes(DISCOVERY.WRITE_SEGMENT)) {
    return 'POST';
  }
  return WRITE_METHODS.includes(endpoint.method) ? endpoint.method : 'GET';
}

/**
 * Substitute every `{placeholder}` in a path template and prefix the base URL
 */
export function materializeUrl(baseUrl: string, pathTemplate: string, resourceId: string): string {
  return `${baseUrl}${pathTemplate.replace(PLACEHOLDER, encodeURIComponent(resourceId))}`;
}

// ============================================================================
// Discovery
// ============================================================================

/**
 * Discover the endpoints to benchmark, in declaration order.
 *
 * @throws DiscoveryError when the route table is unavailable or invalid,
 * a logical name repeats, or nothing is left after filtering
 */
export async function discover(source: RouteSource, options: DiscoverOptions): Promise<EndpointSpec[]> {
  let routes: RouteDeclaration[];
  try {
    routes = await source.load();
  } catch (error) {
    if (isFatalError(error)) {
      throw error;
    }
    throw new DiscoveryError(
      `Route table unavailable from ${source.description}: ${getErrorMessage(error)}`,
      ErrorCodes.DISCOVERY_UNAVAILABLE,
      { cause: error instanceof Error ? error : undefined }
    );
  }

  const excluded = new Set<string>([...DISCOVERY.EXCLUDED_PATHS, options.seedPath]);
  const endpoints: EndpointSpec[] = [];
  const seen = new Map<string, string>();

  for (const route of routes) {
    const methods = benchmarkedMethods(route);
    if (methods.length === 0 || excluded.has(route.path)) {
      continue;
    }
    if (options.filter && !route.path.startsWith(options.filter)) {
      continue;
    }

    const name = logicalNameOf(route);
    if (!name) {
      throw new DiscoveryError(`Route ${route.path} has no usable name`, ErrorCodes.DISCOVERY_INVALID, {
        details: { path: route.path },
      });
    }

    const previous = seen.get(name);
    if (previous !== undefined) {
      throw new DiscoveryError(
        `Duplicate endpoint name "${name}" for ${previous} and ${route.path}`,
        ErrorCodes.DUPLICATE_ENDPOINT,
        { details: { name, paths: [previous, route.path] } }
      );
    }
    seen.set(name, route.path);

    const method: HttpMethod = methods.includes('GET') ? 'GET' : methods[0] ?? 'GET';
    endpoints.push({ name, method, path: route.path });
  }

  if (endpoints.length === 0) {
    throw new DiscoveryError('No benchmark endpoints found', ErrorCodes.NO_ENDPOINTS, {
      details: { source: source.description, filter: options.filter },
    });
  }

  logger.info(
    { count: endpoints.length, filter: options.filter, source: source.description },
    `Discovered ${endpoints.length} benchmark endpoints`
  );
  return endpoints;
}
