/**
 * Request simulation over a route matrix
 *
 * Mirrors how Traefik picks a router (longest rule first among matching
 * routers on the entrypoint) and applies the stripPrefix and headers
 * middlewares the generator emits. Used by tests and `hub validate` to
 * check what a backend will actually receive.
 */

import { EntrypointName, RouteMatrix, RouteSpec, TraefikMiddleware } from "./types";

export const FORWARDED_PREFIX_HEADER = "X-Forwarded-Prefix";

export interface SimulatedRequest {
  readonly entrypoint: EntrypointName;
  readonly host: string;
  readonly path: string;
  readonly headers?: Readonly<Record<string, string>>;
}

export interface ForwardedRequest {
  readonly routerName: string;
  readonly serviceName: string;
  /** Path as the backend sees it */
  readonly path: string;
  readonly headers: Readonly<Record<string, string>>;
  /** Middlewares in the chain that were not simulated (defined elsewhere, or basicAuth) */
  readonly skipped: readonly string[];
}

interface RequestState {
  path: string;
  headers: Record<string, string>;
}

export function matchesRoute(route: RouteSpec, request: SimulatedRequest): boolean {
  if (route.entrypoint !== request.entrypoint) return false;
  const host = request.host.toLowerCase();
  if (!route.match.hosts.some((candidate) => candidate.toLowerCase() === host)) return false;
  return route.match.pathPrefix === undefined || request.path.startsWith(route.match.pathPrefix);
}

/**
 * Apply one middleware
 *
 * @returns false when the middleware kind is not simulated
 */
export function applyMiddleware(middleware: TraefikMiddleware, state: RequestState): boolean {
  let applied = false;

  if (middleware.stripPrefix) {
    applied = true;
    for (const prefix of middleware.stripPrefix.prefixes) {
      if (state.path.startsWith(prefix)) {
        const stripped = state.path.slice(prefix.length);
        state.path = stripped.startsWith("/") ? stripped : `/${stripped}`;
        state.headers[FORWARDED_PREFIX_HEADER] = prefix;
        break;
      }
    }
  }

  if (middleware.headers?.customRequestHeaders) {
    applied = true;
    for (const [name, value] of Object.entries(middleware.headers.customRequestHeaders)) {
      // An empty value removes the header
      if (value === "") {
        delete state.headers[name];
      } else {
        state.headers[name] = value;
      }
    }
  }

  return applied;
}

/**
 * Route a request through the matrix
 *
 * @returns the request as forwarded to the backend, or undefined when no router matches
 */
export function simulateRequest(
  matrix: RouteMatrix,
  request: SimulatedRequest
): ForwardedRequest | undefined {
  const candidates = matrix.entries
    .flatMap((entry) => entry.routes.map((route) => ({ entry, route })))
    .filter(({ route }) => matchesRoute(route, request))
    .sort((a, b) => b.route.rule.length - a.route.rule.length);

  const selected = candidates[0];
  if (selected === undefined) return undefined;

  const { entry, route } = selected;
  const state: RequestState = { path: request.path, headers: { ...request.headers } };
  const skipped: string[] = [];

  for (const name of route.middlewares) {
    const middleware: TraefikMiddleware | undefined = entry.middlewares[name];
    if (middleware === undefined || !applyMiddleware(middleware, state)) {
      skipped.push(name);
    }
  }

  return {
    routerName: route.routerName,
    serviceName: route.serviceName,
    path: state.path,
    headers: state.headers,
    skipped,
  };
}
