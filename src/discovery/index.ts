/**
 * Endpoint Discovery Module
 * @module discovery
 */

export {
  RouteDeclarationSchema,
  RouteManifestSchema,
  StaticRouteSource,
  ManifestFileRouteSource,
  ModuleRouteSource,
  routeSourceFor,
  type RouteDeclaration,
  type RouteSource,
  type StaticRoute,
} from './route-sources.js';
export {
  discover,
  logicalNameOf,
  requestMethodFor,
  materializeUrl,
  type DiscoverOptions,
} from './endpoint-discovery.js';
