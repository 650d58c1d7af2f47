/**
 * Route Sources
 * @module discovery/route-sources
 *
 * Statically declared route tables of the service under test. A source is
 * either an in-process manifest, a JSON manifest file, or a module exporting
 * `routes`.
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import { DiscoveryError, ErrorCodes, getErrorMessage } from '../errors/index.js';

// ============================================================================
// Schema
// ============================================================================

export const RouteDeclarationSchema = z.object({
  /** Stable logical test name */
  name: z.string().min(1).optional(),
  /** URL path template, e.g. `/api/db/read/{item_id}` */
  path: z.string().startsWith('/', 'Route paths must start with /'),
  methods: z.array(z.string().min(1).transform((method) => method.toUpperCase())).min(1),
});

export const RouteManifestSchema = z.object({
  routes: z.array(RouteDeclarationSchema),
});

export type RouteDeclaration = z.input<typeof RouteDeclarationSchema>;

/**
 * Route as a service declares it in code
 */
export interface StaticRoute {
  readonly name?: string;
  readonly path: string;
  readonly methods: readonly string[];
}

/**
 * Provides the route table of the service under test
 */
export interface RouteSource {
  /** Human-readable origin, used in errors */
  readonly description: string;
  load(): Promise<RouteDeclaration[]>;
}

function parseManifest(value: unknown, origin: string): RouteDeclaration[] {
  const parsed = RouteManifestSchema.safeParse(value);
  if (!parsed.success) {
    throw new DiscoveryError(`Invalid route manifest in ${origin}`, ErrorCodes.DISCOVERY_INVALID, {
      details: {
        origin,
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      },
    });
  }
  return parsed.data.routes;
}

// ============================================================================
// Sources
// ============================================================================

/**
 * Routes declared in-process, e.g. imported from the service's own manifest
 */
export class StaticRouteSource implements RouteSource {
  readonly description: string;

  constructor(
    private readonly routes: readonly StaticRoute[],
    description = 'static route table'
  ) {
    this.description = description;
  }

  async load(): Promise<RouteDeclaration[]> {
    return parseManifest({ routes: this.routes }, this.description);
  }
}

/**
 * JSON file of the form `{ "routes": [{ "name"?, "path", "methods" }] }`
 */
export class ManifestFileRouteSource implements RouteSource {
  readonly description: string;

  constructor(private readonly filePath: string) {
    this.description = filePath;
  }

  async load(): Promise<RouteDeclaration[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      throw new DiscoveryError(`Cannot read route manifest ${this.filePath}: ${getErrorMessage(error)}`, ErrorCodes.DISCOVERY_UNAVAILABLE, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new DiscoveryError(`Route manifest ${this.filePath} is not valid JSON`, ErrorCodes.DISCOVERY_INVALID, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    return parseManifest(document, this.filePath);
  }
}

/**
 * Module exporting `routes`, loaded with a dynamic import
 */
export class ModuleRouteSource implements RouteSource {
  readonly description: string;

  constructor(private readonly modulePath: string) {
    this.description = modulePath;
  }

  async load(): Promise<RouteDeclaration[]> {
    let loaded: unknown;
    try {
      loaded = await import(pathToFileURL(resolve(this.modulePath)).href);
    } catch (error) {
      throw new DiscoveryError(`Cannot import route module ${this.modulePath}: ${getErrorMessage(error)}`, ErrorCodes.DISCOVERY_UNAVAILABLE, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    const routes: unknown =
      typeof loaded === 'object' && loaded !== null ? Reflect.get(loaded, 'routes') : undefined;
    return parseManifest({ routes }, this.modulePath);
  }
}

/**
 * Pick a source for a `--routes` argument: `.json` files are manifests,
 * anything else is imported as a module
 */
export function routeSourceFor(location: string): RouteSource {
  return location.toLowerCase().endsWith('.json')
    ? new ManifestFileRouteSource(location)
    : new ModuleRouteSource(location);
}
