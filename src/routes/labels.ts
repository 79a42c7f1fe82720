/**
 * Docker label output
 *
 * With routeProvider "labels", each routed compose service carries its
 * routers, middlewares and service as Traefik labels. Label values land
 * in a compose document, so they are Compose-escaped.
 */

import { ConfigValidationError } from "../errors";
import { EscapeMode, escapeForMode } from "../template";
import { isRecord } from "../types";
import { GeneratedRoutes, TraefikMiddleware } from "./types";

export interface LabelOptions {
  /** Default: "compose" */
  readonly escape?: EscapeMode;
}

function middlewareLabels(name: string, middleware: TraefikMiddleware): Array<[string, string]> {
  const prefix = `traefik.http.middlewares.${name}`;
  const labels: Array<[string, string]> = [];
  if (middleware.stripPrefix) {
    labels.push([`${prefix}.stripprefix.prefixes`, middleware.stripPrefix.prefixes.join(",")]);
  }
  for (const [header, value] of Object.entries(middleware.headers?.customRequestHeaders ?? {})) {
    labels.push([`${prefix}.headers.customrequestheaders.${header}`, value]);
  }
  if (middleware.basicAuth) {
    labels.push([`${prefix}.basicauth.users`, middleware.basicAuth.users.join(",")]);
  }
  if (middleware.redirectScheme) {
    labels.push([`${prefix}.redirectscheme.scheme`, middleware.redirectScheme.scheme]);
  }
  return labels;
}

/**
 * Traefik labels for one descriptor's routes
 *
 * Returns {} when the entry has no routes, so disabled services do not
 * get `traefik.enable=true`.
 */
export function generateRouteLabels(
  entry: GeneratedRoutes,
  options: LabelOptions = {}
): Record<string, string> {
  if (entry.routes.length === 0) return {};

  const mode = options.escape ?? "compose";
  const labels: Array<[string, string]> = [["traefik.enable", "true"]];

  for (const route of entry.routes) {
    const prefix = `traefik.http.routers.${route.routerName}`;
    labels.push([`${prefix}.rule`, route.rule]);
    labels.push([`${prefix}.entrypoints`, route.entrypoint]);
    if (route.middlewares.length > 0) {
      labels.push([`${prefix}.middlewares`, route.middlewares.join(",")]);
    }
    labels.push([`${prefix}.service`, route.serviceName]);
    if (route.certResolver !== undefined) {
      labels.push([`${prefix}.tls`, "true"]);
      labels.push([`${prefix}.tls.certresolver`, route.certResolver]);
    }
  }

  for (const [name, middleware] of Object.entries(entry.middlewares)) {
    labels.push(...middlewareLabels(name, middleware));
  }

  if (entry.port !== undefined) {
    for (const name of Object.keys(entry.services)) {
      labels.push([`traefik.http.services.${name}.loadbalancer.server.port`, String(entry.port)]);
    }
  }

  return Object.fromEntries(labels.map(([key, value]) => [key, escapeForMode(value, mode)]));
}

/**
 * Normalize compose `labels` (list or mapping form) to a mapping
 *
 * @throws ConfigValidationError on other shapes
 */
export function normalizeComposeLabels(
  labels: unknown,
  source: string,
  path = "labels"
): Record<string, string> {
  if (labels === undefined || labels === null) return {};

  const invalid = (message: string): ConfigValidationError =>
    new ConfigValidationError(source, [{ code: "INVALID_LABELS", message, path }]);

  if (Array.isArray(labels)) {
    const result: Record<string, string> = {};
    for (const entry of labels) {
      if (typeof entry !== "string") throw invalid("Label list entries must be strings");
      const separator = entry.indexOf("=");
      if (separator < 0) {
        result[entry] = "";
      } else {
        result[entry.slice(0, separator)] = entry.slice(separator + 1);
      }
    }
    return result;
  }

  if (isRecord(labels)) {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(labels)) {
      if (typeof value === "object" && value !== null) {
        throw invalid(`Label "${key}" must be a scalar`);
      }
      result[key] = value === null || value === undefined ? "" : String(value);
    }
    return result;
  }

  throw invalid("Labels must be a list or a mapping");
}

export interface MergedLabels {
  readonly labels: Record<string, string>;
  /** Keys the template set to a different value than the generator */
  readonly overridden: readonly string[];
}

/**
 * Add generated labels to a service's own labels; generated values win
 */
export function mergeLabels(
  existing: Readonly<Record<string, string>>,
  generated: Readonly<Record<string, string>>
): MergedLabels {
  const overridden = Object.keys(generated).filter(
    (key) => existing[key] !== undefined && existing[key] !== generated[key]
  );
  return { labels: { ...existing, ...generated }, overridden };
}
