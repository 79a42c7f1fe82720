/**
 * Route generation types
 */

import { RouteOwner } from "../errors";

export type Visibility = "public" | "private" | "dashboard";

export type RoutingStyle = "host" | "path";

export type EntrypointName = "web" | "websecure" | "lanweb" | "lanwebsecure" | "landashboard";

/**
 * A routed service, as authored in a stack manifest
 *
 * One descriptor yields one router per applicable entrypoint and
 * requested routing style.
 */
export interface ServiceDescriptor {
  /** Stack the service belongs to */
  readonly stack: string;
  /** Compose service name */
  readonly service: string;
  /** Hostname prefix and path-prefix token */
  readonly subdomain: string;
  readonly visibility: Readonly<Partial<Record<Visibility, boolean>>>;
  readonly routing: Readonly<Partial<Record<RoutingStyle, boolean>>>;
  /** Backend port */
  readonly port: number;
  /** Resolver for host-style TLS routers (default: defaultCertResolver) */
  readonly certResolver?: string;
  /** Backend host (default: the compose service name) */
  readonly upstreamHost?: string;
  /** Existing Traefik service to route to instead (e.g., "api@internal") */
  readonly traefikService?: string;
  /** Extra middlewares appended to every router's chain */
  readonly middlewares?: readonly string[];
}

// =============================================================================
// Traefik configuration structures
// =============================================================================

/** Traefik HTTP router configuration */
export interface TraefikRouter {
  rule: string;
  service: string;
  entryPoints: string[];
  middlewares?: string[];
  tls?: {
    certResolver?: string;
  };
}

/** Traefik HTTP service configuration */
export interface TraefikService {
  loadBalancer: {
    servers: Array<{ url: string }>;
  };
}

/** Traefik middleware configuration */
export interface TraefikMiddleware {
  stripPrefix?: {
    prefixes: string[];
  };
  headers?: {
    customRequestHeaders?: Record<string, string>;
  };
  basicAuth?: {
    users: string[];
  };
  redirectScheme?: {
    scheme: string;
  };
}

/** The `http` section of a Traefik dynamic config */
export interface TraefikHttpConfig {
  routers: Record<string, TraefikRouter>;
  services: Record<string, TraefikService>;
  middlewares: Record<string, TraefikMiddleware>;
}

/** Generated Traefik dynamic config */
export interface TraefikDynamicConfig {
  http: TraefikHttpConfig;
}

// =============================================================================
// Generated routes
// =============================================================================

/** What a router matches */
export interface RouteMatch {
  /** Any of these hosts */
  readonly hosts: readonly string[];
  /** Path prefix, for path-style routers */
  readonly pathPrefix?: string;
}

/** One generated router */
export interface RouteSpec {
  readonly routerName: string;
  readonly entrypoint: EntrypointName;
  readonly visibility: Visibility;
  readonly style: RoutingStyle;
  readonly match: RouteMatch;
  /** Traefik rule built from match */
  readonly rule: string;
  /** Middleware chain, in order */
  readonly middlewares: readonly string[];
  /** Set on TLS entrypoints only */
  readonly certResolver?: string;
  /** Traefik service the router forwards to */
  readonly serviceName: string;
}

/** Everything generated for one owner (a descriptor or a core route) */
export interface GeneratedRoutes {
  readonly owner: RouteOwner;
  readonly routes: readonly RouteSpec[];
  readonly middlewares: Readonly<Record<string, TraefikMiddleware>>;
  readonly services: Readonly<Record<string, TraefikService>>;
  /** Backend port, for label output */
  readonly port?: number;
}

/** Routes generated for a set of descriptors */
export interface RouteMatrix {
  readonly entries: readonly GeneratedRoutes[];
  readonly warnings: readonly string[];
}
