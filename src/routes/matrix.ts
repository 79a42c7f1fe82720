/**
 * Route matrix generation
 *
 * For each descriptor, one router per applicable entrypoint and requested
 * routing style:
 *
 *   host style: <sub>-<http|https>-<visibility>       Host(`<sub>.<domain>`)
 *   path style: <sub>-<http|https>-<visibility>-path  Host(`<shared>`) && PathPrefix(`/<sub>`)
 *
 * Path routers strip their prefix before forwarding. Every router carries
 * a `<router>-headers` middleware stamping X-Route-Info, after the strip
 * and before any extra middlewares the descriptor asks for.
 *
 * Pure functions - deterministic output for same input.
 */

import { RouteCollisionError, RouteCollisionKind, RouteOwner } from "../errors";
import { HubConfig, portainerDnsName, traefikDashboardDnsName } from "../hub-config";
import { ENTRYPOINTS, Entrypoint, matchesLanAliases } from "./entrypoints";
import { buildRule, lanAliases } from "./rules";
import {
  GeneratedRoutes,
  RouteMatch,
  RouteMatrix,
  RouteSpec,
  RoutingStyle,
  ServiceDescriptor,
  TraefikMiddleware,
  TraefikService,
} from "./types";

/** Header stamped on every request by the diagnostic middleware */
export const ROUTE_INFO_HEADER = "X-Route-Info";

const ROUTING_STYLES: readonly RoutingStyle[] = ["host", "path"];

export function routerName(
  subdomain: string,
  entrypoint: Entrypoint,
  style: RoutingStyle
): string {
  const scheme = entrypoint.tls ? "https" : "http";
  const suffix = style === "path" ? "-path" : "";
  return `${subdomain}-${scheme}-${entrypoint.visibility}${suffix}`;
}

export function stripPrefixMiddlewareName(subdomain: string): string {
  return `${subdomain}-strip-prefix`;
}

export function headersMiddlewareName(router: string): string {
  return `${router}-headers`;
}

export function serviceName(subdomain: string): string {
  return `svc-${subdomain}`;
}

export function describeDescriptor(descriptor: ServiceDescriptor): string {
  return `${descriptor.stack}/${descriptor.service} (subdomain "${descriptor.subdomain}")`;
}

export function ownerOf(descriptor: ServiceDescriptor): RouteOwner {
  return { stack: descriptor.stack, service: descriptor.service, subdomain: descriptor.subdomain };
}

/**
 * Diagnostic header value
 *
 * - "entrypoint=websecure; cert_resolver=prod; router=whoami-https-public"
 * - "entrypoint=web; router=whoami-http-public"
 */
export function routeInfo(entrypoint: Entrypoint, router: string, certResolver?: string): string {
  const parts = [`entrypoint=${entrypoint.name}`];
  if (certResolver !== undefined) parts.push(`cert_resolver=${certResolver}`);
  parts.push(`router=${router}`);
  return parts.join("; ");
}

function buildMatch(
  descriptor: ServiceDescriptor,
  config: HubConfig,
  entrypoint: Entrypoint,
  style: RoutingStyle
): RouteMatch {
  if (style === "host") {
    return { hosts: [`${descriptor.subdomain}.${config.parentDnsDomain}`] };
  }
  const hosts = matchesLanAliases(entrypoint) ? lanAliases(config) : [config.sharedAppDnsName];
  return { hosts, pathPrefix: `/${descriptor.subdomain}` };
}

function certResolverFor(
  descriptor: ServiceDescriptor,
  config: HubConfig,
  entrypoint: Entrypoint,
  style: RoutingStyle
): string | undefined {
  if (!entrypoint.tls) return undefined;
  // Path routers share one host, so they share its certificate
  if (style === "path") return config.sharedAppCertResolver;
  return descriptor.certResolver ?? config.defaultCertResolver;
}

/** Warning for a descriptor that yields no routes, if it does */
function emptyRouteWarning(descriptor: ServiceDescriptor): string | undefined {
  const hasVisibility = ENTRYPOINTS.some((entrypoint) => descriptor.visibility[entrypoint.visibility]);
  if (!hasVisibility) {
    return `${describeDescriptor(descriptor)} has no visibility flags set; no routes generated`;
  }
  if (!ROUTING_STYLES.some((style) => descriptor.routing[style])) {
    return `${describeDescriptor(descriptor)} requests no routing style; no routes generated`;
  }
  return undefined;
}

/**
 * Generate every router, middleware and service for one descriptor
 */
export function generateServiceRoutes(
  descriptor: ServiceDescriptor,
  config: HubConfig
): GeneratedRoutes & { readonly warning?: string } {
  const warning = emptyRouteWarning(descriptor);
  const owner = ownerOf(descriptor);
  if (warning !== undefined) {
    return { owner, routes: [], middlewares: {}, services: {}, port: descriptor.port, warning };
  }

  const service = descriptor.traefikService ?? serviceName(descriptor.subdomain);
  const routes: RouteSpec[] = [];
  const middlewares: Record<string, TraefikMiddleware> = {};

  for (const entrypoint of ENTRYPOINTS) {
    if (!descriptor.visibility[entrypoint.visibility]) continue;

    for (const style of ROUTING_STYLES) {
      if (!descriptor.routing[style]) continue;

      const name = routerName(descriptor.subdomain, entrypoint, style);
      const match = buildMatch(descriptor, config, entrypoint, style);
      const certResolver = certResolverFor(descriptor, config, entrypoint, style);
      const chain: string[] = [];

      if (style === "path") {
        const strip = stripPrefixMiddlewareName(descriptor.subdomain);
        middlewares[strip] = { stripPrefix: { prefixes: [`/${descriptor.subdomain}`] } };
        chain.push(strip);
      }

      const headers = headersMiddlewareName(name);
      middlewares[headers] = {
        headers: {
          customRequestHeaders: {
            [ROUTE_INFO_HEADER]: routeInfo(entrypoint, name, certResolver),
          },
        },
      };
      chain.push(headers, ...(descriptor.middlewares ?? []));

      routes.push({
        routerName: name,
        entrypoint: entrypoint.name,
        visibility: entrypoint.visibility,
        style,
        match,
        rule: buildRule(match),
        middlewares: chain,
        ...(certResolver !== undefined && { certResolver }),
        serviceName: service,
      });
    }
  }

  const services: Record<string, TraefikService> = {};
  if (descriptor.traefikService === undefined) {
    const upstream = descriptor.upstreamHost ?? descriptor.service;
    services[service] = {
      loadBalancer: { servers: [{ url: `http://${upstream}:${String(descriptor.port)}` }] },
    };
  }

  return { owner, routes, middlewares, services, port: descriptor.port };
}

// =============================================================================
// Core routes
// =============================================================================

export const DASHBOARD_OWNER: RouteOwner = { stack: "hub", service: "traefik-dashboard" };
export const DASHBOARD_AUTH_MIDDLEWARE = "traefik-dashboard-auth";

/**
 * Routes for the Traefik dashboard
 *
 * Served on both TLS entrypoints under the admin domain, behind basic
 * auth. Without a credential there is no dashboard route at all.
 */
export function generateDashboardRoutes(config: HubConfig): GeneratedRoutes | undefined {
  if (config.traefikDashboardHtpasswd === undefined) return undefined;

  const match: RouteMatch = { hosts: [traefikDashboardDnsName(config)] };
  const routes = ENTRYPOINTS.filter((entrypoint) => entrypoint.tls).map(
    (entrypoint): RouteSpec => ({
      routerName: `traefik-dashboard-https-${entrypoint.visibility}`,
      entrypoint: entrypoint.name,
      visibility: entrypoint.visibility,
      style: "host",
      match,
      rule: buildRule(match),
      middlewares: [DASHBOARD_AUTH_MIDDLEWARE],
      certResolver: config.adminCertResolver,
      serviceName: "api@internal",
    })
  );

  return {
    owner: DASHBOARD_OWNER,
    routes,
    middlewares: {
      [DASHBOARD_AUTH_MIDDLEWARE]: { basicAuth: { users: [config.traefikDashboardHtpasswd] } },
    },
    services: {},
  };
}

export const PORTAINER_OWNER: RouteOwner = { stack: "hub", service: "portainer" };
export const PORTAINER_HTTPS_REDIRECT_MIDDLEWARE = "portainer-https-redirect";
/** Compose service and port of the Portainer UI */
export const PORTAINER_UPSTREAM = { host: "portainer", port: 9000 } as const;

/**
 * Routes for the Portainer UI
 *
 * LAN only: HTTPS on lanwebsecure, and plain HTTP on lanweb redirected
 * to HTTPS.
 */
export function generatePortainerRoutes(config: HubConfig): GeneratedRoutes {
  const match: RouteMatch = { hosts: [portainerDnsName(config)] };
  const service = serviceName(PORTAINER_OWNER.service);
  const routes = ENTRYPOINTS.filter((entrypoint) => entrypoint.visibility === "private").map(
    (entrypoint): RouteSpec => ({
      routerName: `portainer-${entrypoint.tls ? "https" : "http"}-${entrypoint.visibility}`,
      entrypoint: entrypoint.name,
      visibility: entrypoint.visibility,
      style: "host",
      match,
      rule: buildRule(match),
      middlewares: entrypoint.tls ? [] : [PORTAINER_HTTPS_REDIRECT_MIDDLEWARE],
      ...(entrypoint.tls && { certResolver: config.portainerCertResolver }),
      serviceName: service,
    })
  );

  return {
    owner: PORTAINER_OWNER,
    routes,
    middlewares: {
      [PORTAINER_HTTPS_REDIRECT_MIDDLEWARE]: { redirectScheme: { scheme: "https" } },
    },
    services: {
      [service]: {
        loadBalancer: {
          servers: [{ url: `http://${PORTAINER_UPSTREAM.host}:${String(PORTAINER_UPSTREAM.port)}` }],
        },
      },
    },
    port: PORTAINER_UPSTREAM.port,
  };
}

// =============================================================================
// Collision detection
// =============================================================================

export type RouteNameKind = RouteCollisionKind;

/**
 * Tracks which owner claimed each subdomain and each router, middleware
 * and service name
 */
export class RouteNameRegistry {
  private readonly claims = new Map<string, RouteOwner>();

  /**
   * @throws RouteCollisionError if another owner already claimed the name
   */
  claim(kind: RouteNameKind, name: string, owner: RouteOwner): void {
    const key = `${kind}:${name}`;
    const existing = this.claims.get(key);
    if (existing !== undefined && !sameOwner(existing, owner)) {
      throw new RouteCollisionError(kind, name, existing, owner);
    }
    this.claims.set(key, owner);
  }

  claimAll(entry: GeneratedRoutes): void {
    for (const route of entry.routes) {
      this.claim("router", route.routerName, entry.owner);
    }
    for (const name of Object.keys(entry.middlewares)) {
      this.claim("middleware", name, entry.owner);
    }
    for (const name of Object.keys(entry.services)) {
      this.claim("service", name, entry.owner);
    }
  }
}

function sameOwner(a: RouteOwner, b: RouteOwner): boolean {
  return a.stack === b.stack && a.service === b.service && a.subdomain === b.subdomain;
}

/**
 * Sort descriptors for deterministic output
 */
export function sortDescriptors(descriptors: readonly ServiceDescriptor[]): ServiceDescriptor[] {
  return [...descriptors].sort(
    (a, b) =>
      a.subdomain.localeCompare(b.subdomain, "en-US") ||
      a.stack.localeCompare(b.stack, "en-US") ||
      a.service.localeCompare(b.service, "en-US")
  );
}

export interface RouteMatrixOptions {
  /** Names already taken, e.g. by the dynamic config template */
  readonly registry?: RouteNameRegistry;
  /** Add the Portainer UI routes */
  readonly portainer?: boolean;
}

/**
 * Generate routes for every descriptor, plus the core dashboard and
 * Portainer routes
 *
 * @throws RouteCollisionError when two owners share a subdomain or would
 * define the same name
 */
export function generateRouteMatrix(
  descriptors: readonly ServiceDescriptor[],
  config: HubConfig,
  options: RouteMatrixOptions = {}
): RouteMatrix {
  const registry = options.registry ?? new RouteNameRegistry();
  const entries: GeneratedRoutes[] = [];
  const warnings: string[] = [];

  const dashboard = generateDashboardRoutes(config);
  if (dashboard) {
    registry.claimAll(dashboard);
    entries.push(dashboard);
  }
  if (options.portainer) {
    const portainer = generatePortainerRoutes(config);
    registry.claimAll(portainer);
    entries.push(portainer);
  }

  for (const descriptor of sortDescriptors(descriptors)) {
    // Generated names need not collide: a second owner may differ in
    // visibility, routing style or traefikService
    registry.claim("subdomain", descriptor.subdomain, ownerOf(descriptor));
    const { warning, ...entry } = generateServiceRoutes(descriptor, config);
    if (warning !== undefined) warnings.push(warning);
    registry.claimAll(entry);
    entries.push(entry);
  }

  return { entries, warnings };
}
