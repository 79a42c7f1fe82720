/**
 * Route generation module
 *
 * Service descriptors -> Traefik routers, middlewares and services, as a
 * file-provider document or as Docker labels.
 */

export type {
  Visibility,
  RoutingStyle,
  EntrypointName,
  ServiceDescriptor,
  TraefikRouter,
  TraefikService,
  TraefikMiddleware,
  TraefikHttpConfig,
  TraefikDynamicConfig,
  RouteMatch,
  RouteSpec,
  GeneratedRoutes,
  RouteMatrix,
} from "./types";

export type { Entrypoint } from "./entrypoints";
export { ENTRYPOINTS, matchesLanAliases } from "./entrypoints";

export { hostRule, buildRule, lanAliases } from "./rules";

export { reservedSubdomains, validateServiceDescriptor } from "./validation";

export type { RouteNameKind, RouteMatrixOptions } from "./matrix";
export {
  ROUTE_INFO_HEADER,
  DASHBOARD_OWNER,
  DASHBOARD_AUTH_MIDDLEWARE,
  PORTAINER_OWNER,
  PORTAINER_HTTPS_REDIRECT_MIDDLEWARE,
  routerName,
  stripPrefixMiddlewareName,
  headersMiddlewareName,
  serviceName,
  routeInfo,
  describeDescriptor,
  generateServiceRoutes,
  generateDashboardRoutes,
  generatePortainerRoutes,
  RouteNameRegistry,
  sortDescriptors,
  generateRouteMatrix,
} from "./matrix";

export type { DynamicConfigTemplate, DynamicConfigDocument } from "./dynamic-config";
export {
  toTraefikRouter,
  generateTraefikConfig,
  parseDynamicConfigTemplate,
  claimTemplateNames,
  mergeDynamicConfig,
  serializeTraefikConfig,
} from "./dynamic-config";

export type { LabelOptions, MergedLabels } from "./labels";
export { generateRouteLabels, normalizeComposeLabels, mergeLabels } from "./labels";

export type { SimulatedRequest, ForwardedRequest } from "./simulate";
export { FORWARDED_PREFIX_HEADER, matchesRoute, applyMiddleware, simulateRequest } from "./simulate";
