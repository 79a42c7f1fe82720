/**
 * Traefik dynamic configuration generation
 *
 * Generates the file provider configuration: the routers, middlewares and
 * services of a route matrix, merged over whatever the dynamic config
 * template defines by hand.
 *
 * Pure functions - deterministic output for same input.
 */

import * as yaml from "yaml";
import { TemplateExpansionError } from "../errors";
import { YamlRecord, isRecord, omitKeys, optionalRecord } from "../types";
import { RouteNameKind, RouteNameRegistry } from "./matrix";
import { GeneratedRoutes, RouteSpec, TraefikDynamicConfig, TraefikRouter } from "./types";

const HTTP_SECTIONS: ReadonlyArray<readonly [RouteNameKind, "routers" | "middlewares" | "services"]> = [
  ["router", "routers"],
  ["middleware", "middlewares"],
  ["service", "services"],
];

/** Template-defined dynamic config, split into the sections the generator extends */
export interface DynamicConfigTemplate {
  readonly name: string;
  /** Top-level sections other than http (tcp, tls, ...) */
  readonly sections: YamlRecord;
  /** http keys other than routers, middlewares and services */
  readonly httpExtras: YamlRecord;
  readonly routers: YamlRecord;
  readonly middlewares: YamlRecord;
  readonly services: YamlRecord;
}

/** Final dynamic config document */
export interface DynamicConfigDocument {
  http: {
    routers: YamlRecord;
    middlewares: YamlRecord;
    services: YamlRecord;
    [key: string]: unknown;
  };
  [section: string]: unknown;
}

export function toTraefikRouter(route: RouteSpec): TraefikRouter {
  return {
    rule: route.rule,
    service: route.serviceName,
    entryPoints: [route.entrypoint],
    ...(route.middlewares.length > 0 && { middlewares: [...route.middlewares] }),
    ...(route.certResolver !== undefined && { tls: { certResolver: route.certResolver } }),
  };
}

/**
 * Generate the http section for a set of route entries
 */
export function generateTraefikConfig(entries: readonly GeneratedRoutes[]): TraefikDynamicConfig {
  const config: TraefikDynamicConfig = { http: { routers: {}, services: {}, middlewares: {} } };
  for (const entry of entries) {
    for (const route of entry.routes) {
      config.http.routers[route.routerName] = toTraefikRouter(route);
    }
    Object.assign(config.http.middlewares, entry.middlewares);
    Object.assign(config.http.services, entry.services);
  }
  return config;
}

/**
 * Split a parsed dynamic config template into its sections
 *
 * @param document - Parsed template (null for an empty file)
 * @throws TemplateExpansionError when a section is not a mapping
 */
export function parseDynamicConfigTemplate(document: unknown, name: string): DynamicConfigTemplate {
  const invalid = (section: string): TemplateExpansionError =>
    new TemplateExpansionError(undefined, name, `${section} must be a mapping`);

  if (document === null || document === undefined) {
    return { name, sections: {}, httpExtras: {}, routers: {}, middlewares: {}, services: {} };
  }
  if (!isRecord(document)) throw invalid("the document");

  const sections = omitKeys(document, ["http"]);
  const http = optionalRecord(document, "http");
  if (http === undefined) throw invalid("http");

  const httpExtras = omitKeys(http, ["routers", "middlewares", "services"]);
  const routers = optionalRecord(http, "routers");
  const middlewares = optionalRecord(http, "middlewares");
  const services = optionalRecord(http, "services");
  if (routers === undefined) throw invalid("http.routers");
  if (middlewares === undefined) throw invalid("http.middlewares");
  if (services === undefined) throw invalid("http.services");

  return { name, sections, httpExtras, routers, middlewares, services };
}

/**
 * Claim every name the template defines, so generated routes that reuse
 * one fail with RouteCollisionError
 */
export function claimTemplateNames(
  template: DynamicConfigTemplate,
  registry: RouteNameRegistry,
  stack: string
): void {
  const owner = { stack, service: template.name };
  for (const [kind, section] of HTTP_SECTIONS) {
    for (const name of Object.keys(template[section])) {
      registry.claim(kind, name, owner);
    }
  }
}

/**
 * Merge generated routes over the template
 *
 * Template entries come first, generated entries follow in matrix order.
 * Names are expected to be unique (see claimTemplateNames).
 */
export function mergeDynamicConfig(
  template: DynamicConfigTemplate,
  generated: TraefikDynamicConfig
): DynamicConfigDocument {
  return {
    ...template.sections,
    http: {
      ...template.httpExtras,
      routers: { ...template.routers, ...generated.http.routers },
      middlewares: { ...template.middlewares, ...generated.http.middlewares },
      services: { ...template.services, ...generated.http.services },
    },
  };
}

/**
 * Serialize Traefik config to YAML
 */
export function serializeTraefikConfig(config: TraefikDynamicConfig | DynamicConfigDocument): string {
  return yaml.stringify(config);
}
