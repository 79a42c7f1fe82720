/**
 * Compose document generation for one stack
 *
 * Starts from the expanded compose template and, for each service the
 * manifest names, merges the requested environment fragments into its
 * `environment` and (with routeProvider "labels") adds its Traefik labels.
 * Services the manifest does not name are copied as they are.
 */

import * as yaml from "yaml";
import { ConfigValidationError, ValidationError } from "../errors";
import { EnvFragment, mergeEnvFragments, normalizeComposeEnvironment } from "../env-fragments";
import { RouteProvider } from "../hub-config";
import { Logger, silentLogger } from "../logger";
import { GeneratedRoutes, generateRouteLabels, mergeLabels, normalizeComposeLabels } from "../routes";
import { BuiltinFragmentName, ComposeDocument, StackManifest, StackService } from "../stacks";
import { YamlRecord } from "../types";
import { resolveServiceFragments } from "./fragments";

export interface ComposeBuildInput {
  readonly manifest: StackManifest;
  readonly compose: ComposeDocument;
  /** Generated routes of the stack, by compose service name */
  readonly routes: ReadonlyMap<string, GeneratedRoutes>;
  readonly routeProvider: RouteProvider;
  readonly builtins: Readonly<Record<BuiltinFragmentName, EnvFragment>>;
  readonly logger?: Logger;
}

function buildService(
  input: ComposeBuildInput,
  service: StackService,
  definition: YamlRecord,
  logger: Logger
): YamlRecord {
  const { manifest, compose } = input;
  const result: YamlRecord = { ...definition };

  const fragments = resolveServiceFragments(service, manifest, input.builtins);
  if (fragments.length > 0) {
    const merged = mergeEnvFragments(
      {
        name: `${manifest.stack}/${service.name}`,
        environment: normalizeComposeEnvironment(
          definition.environment,
          compose.source,
          `services.${service.name}.environment`
        ),
        pinned: service.pinnedEnv,
      },
      fragments
    );
    for (const [key, origin] of Object.entries(merged.provenance)) {
      logger.debug(`${manifest.stack}/${service.name}: ${key} from ${origin}`);
    }
    if (Object.keys(merged.environment).length > 0) {
      result.environment = merged.environment;
    }
  }

  const routes = input.routes.get(service.name);
  if (input.routeProvider === "labels" && routes !== undefined && routes.routes.length > 0) {
    const existing = normalizeComposeLabels(
      definition.labels,
      compose.source,
      `services.${service.name}.labels`
    );
    const { labels, overridden } = mergeLabels(existing, generateRouteLabels(routes));
    for (const key of overridden) {
      logger.warn(`${compose.source}: generated label ${key} replaces the template's value`);
    }
    result.labels = labels;
  }

  return result;
}

/**
 * Build a stack's compose document
 *
 * @throws ConfigValidationError when the manifest names a service the compose template lacks
 * @throws EnvMergeConflictError when two fragments disagree
 */
export function buildComposeDocument(input: ComposeBuildInput): YamlRecord {
  const logger = input.logger ?? silentLogger;
  const { manifest, compose } = input;

  const missing: ValidationError[] = manifest.services
    .filter((service) => compose.services[service.name] === undefined)
    .map((service) => ({
      code: "UNKNOWN_SERVICE",
      message: `Service "${service.name}" is not defined in ${compose.source}`,
      path: `stacks.${manifest.stack}.services.${service.name}`,
    }));
  if (missing.length > 0) {
    throw new ConfigValidationError(manifest.source, missing);
  }

  const byName = new Map(manifest.services.map((service) => [service.name, service]));
  const services: Record<string, YamlRecord> = {};
  for (const [name, definition] of Object.entries(compose.services)) {
    const service = byName.get(name);
    services[name] = service ? buildService(input, service, definition, logger) : definition;
  }

  return { ...compose.document, services };
}

export function serializeComposeDocument(document: YamlRecord): string {
  return yaml.stringify(document);
}
