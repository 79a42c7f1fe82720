/**
 * Recognized config keys
 *
 * `hub config get|set|unset` address settings by key. Env map settings
 * take dotted keys: `baseStackEnv.TZ`, `stackEnv.whoami.SUBDOMAIN`.
 */

import { ConfigValidationError, ValidationError } from "../errors";
import { FieldValidator, FIELD_VALIDATORS, validateEnvVarName, validateStackName } from "./validation";
import { HubConfigFile } from "./types";

export type ConfigKeyKind = "scalar" | "env-map" | "stack-env";

export interface ConfigKeySpec {
  readonly key: keyof HubConfigFile;
  readonly kind: ConfigKeyKind;
  readonly required: boolean;
  readonly description: string;
  /** Only scalar keys have one */
  readonly validate?: FieldValidator;
}

function scalar(key: keyof HubConfigFile, description: string, required = false): ConfigKeySpec {
  return { key, kind: "scalar", required, description, validate: FIELD_VALIDATORS[key] };
}

export const CONFIG_KEYS: readonly ConfigKeySpec[] = [
  scalar("parentDnsDomain", "Parent DNS domain of every stack subdomain", true),
  scalar("defaultCertResolver", "Certificate resolver for stack routers", true),
  scalar("adminParentDnsDomain", "Parent DNS domain of admin UIs (default: parentDnsDomain)"),
  scalar("adminCertResolver", 'Certificate resolver for admin UIs (default: "prod")'),
  scalar("sharedAppSubdomain", 'Subdomain of the shared path-routed host (default: "hub")'),
  scalar("sharedAppDnsName", "Shared path-routed host (default: <sharedAppSubdomain>.<parentDnsDomain>)"),
  scalar("sharedAppCertResolver", "Certificate resolver for path routers (default: defaultCertResolver)"),
  scalar("hubHostname", "LAN hostname of the hub"),
  scalar("hubHostname2", "Second LAN hostname (default: <hubHostname>.local)"),
  scalar("hubLanIp", "LAN IPv4 address of the hub"),
  scalar("traefikDashboardSubdomain", 'Subdomain of the Traefik dashboard (default: "traefik")'),
  scalar("traefikDashboardHtpasswd", 'Dashboard credential "user:hash"; no dashboard route when unset'),
  scalar("portainerSubdomain", 'Subdomain of the Portainer UI (default: "portainer")'),
  scalar("portainerCertResolver", "Certificate resolver for the Portainer UI (default: adminCertResolver)"),
  scalar("portainerAgentSecret", "Secret shared by Portainer and its agent"),
  scalar("portainerInitialPasswordHash", "bcrypt hash of the initial Portainer admin password"),
  scalar("letsencryptOwnerEmail", "Contact email for ACME registration"),
  scalar("traefikLogLevel", 'Traefik log level (default: "INFO")'),
  scalar("routeProvider", 'Where routes are written: "labels" or "file" (default: "labels")'),
  { key: "baseStackEnv", kind: "env-map", required: false, description: "Variables for every stack" },
  {
    key: "baseAppStackEnv",
    kind: "env-map",
    required: false,
    description: "Variables for every application stack",
  },
  {
    key: "portainerRuntimeEnv",
    kind: "env-map",
    required: false,
    description: "Variables injected by the stack manager at deploy time",
  },
  { key: "stackEnv", kind: "stack-env", required: false, description: "Variables per stack" },
];

export function findConfigKey(name: string): ConfigKeySpec | undefined {
  return CONFIG_KEYS.find((spec) => spec.key === name);
}

/** A key split into its setting and its path below the `hub` section */
export interface ParsedConfigKey {
  readonly spec: ConfigKeySpec;
  /** e.g. ["stackEnv", "whoami", "SUBDOMAIN"] */
  readonly path: readonly string[];
}

function invalidKey(key: string, message: string): ConfigValidationError {
  return new ConfigValidationError("command line", [{ code: "INVALID_KEY", message, path: key }]);
}

/**
 * Parse a dotted config key
 *
 * @throws ConfigValidationError for unknown keys and malformed paths
 */
export function parseConfigKey(key: string): ParsedConfigKey {
  const path = key.split(".");
  const spec = findConfigKey(path[0]);
  if (spec === undefined) {
    const known = CONFIG_KEYS.map((s) => s.key).join(", ");
    throw invalidKey(key, `Unknown config key "${key}". Known keys: ${known}`);
  }

  const maxDepth = spec.kind === "scalar" ? 1 : spec.kind === "env-map" ? 2 : 3;
  if (path.length > maxDepth) {
    throw invalidKey(key, `Config key "${key}" is too deep for "${spec.key}"`);
  }

  const errors: ValidationError[] = [];
  if (spec.kind === "stack-env" && path.length >= 2) {
    const error = validateStackName(path[1], key);
    if (error) errors.push(error);
  }
  const envNameIndex = spec.kind === "env-map" ? 1 : 2;
  const envName = spec.kind !== "scalar" && path.length > envNameIndex ? path[envNameIndex] : undefined;
  if (envName !== undefined) {
    const error = validateEnvVarName(envName, key);
    if (error) errors.push(error);
  }
  if (errors.length > 0) {
    throw new ConfigValidationError("command line", errors);
  }

  return { spec, path };
}
