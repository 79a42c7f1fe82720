/**
 * Hub configuration inference rules
 *
 * Pure functions that apply default values to the raw `hub` section.
 * Empty strings count as unset.
 */

import { ConfigValidationError } from "../errors";
import {
  EnvMap,
  HubConfig,
  HubConfigFile,
  RawEnvMap,
  RouteProvider,
  TraefikLogLevel,
} from "./types";

export const DEFAULT_ADMIN_CERT_RESOLVER = "prod";
export const DEFAULT_SHARED_APP_SUBDOMAIN = "hub";
export const DEFAULT_TRAEFIK_DASHBOARD_SUBDOMAIN = "traefik";
export const DEFAULT_PORTAINER_SUBDOMAIN = "portainer";
export const DEFAULT_TRAEFIK_LOG_LEVEL: TraefikLogLevel = "INFO";
export const DEFAULT_ROUTE_PROVIDER: RouteProvider = "labels";

function present(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

export function inferSharedAppSubdomain(sharedAppSubdomain?: string): string {
  return present(sharedAppSubdomain) ?? DEFAULT_SHARED_APP_SUBDOMAIN;
}

export function inferTraefikDashboardSubdomain(traefikDashboardSubdomain?: string): string {
  return present(traefikDashboardSubdomain) ?? DEFAULT_TRAEFIK_DASHBOARD_SUBDOMAIN;
}

export function inferPortainerSubdomain(portainerSubdomain?: string): string {
  return present(portainerSubdomain) ?? DEFAULT_PORTAINER_SUBDOMAIN;
}

/**
 * Infer the shared app DNS name
 *
 * - "hub" + "example.com" -> "hub.example.com"
 */
export function inferSharedAppDnsName(
  explicit: string | undefined,
  sharedAppSubdomain: string,
  parentDnsDomain: string
): string {
  return present(explicit) ?? `${sharedAppSubdomain}.${parentDnsDomain}`;
}

/**
 * Infer the second hub hostname from the first (mDNS name)
 *
 * - "rpi" -> "rpi.local"
 */
export function inferHubHostname2(
  explicit: string | undefined,
  hubHostname: string | undefined
): string | undefined {
  const hostname2 = present(explicit);
  if (hostname2 !== undefined) return hostname2;
  return hubHostname === undefined ? undefined : `${hubHostname}.local`;
}

/**
 * Convert YAML scalars in an env map to strings
 *
 * - { PORT: 80, DEBUG: true } -> { PORT: "80", DEBUG: "true" }
 */
export function stringifyEnvMap(env: RawEnvMap | undefined): EnvMap {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(env ?? {})) {
    result[name] = String(value);
  }
  return result;
}

function requireField(
  file: HubConfigFile,
  field: "parentDnsDomain" | "defaultCertResolver",
  source: string
): string {
  const value = present(file[field]);
  if (value === undefined) {
    throw new ConfigValidationError(source, [
      {
        code: "MISSING_REQUIRED",
        message: `Missing required setting "${field}". Run: hub config set ${field} <value>`,
        path: `hub.${field}`,
      },
    ]);
  }
  return value;
}

/**
 * Apply every inference rule to a validated `hub` section
 *
 * @param source - Document name used if a required field is missing
 */
export function resolveHubConfig(file: HubConfigFile, source: string): HubConfig {
  const parentDnsDomain = requireField(file, "parentDnsDomain", source);
  const defaultCertResolver = requireField(file, "defaultCertResolver", source);
  const sharedAppSubdomain = inferSharedAppSubdomain(file.sharedAppSubdomain);
  const hubHostname = present(file.hubHostname);
  const adminCertResolver = present(file.adminCertResolver) ?? DEFAULT_ADMIN_CERT_RESOLVER;

  const stackEnv: Record<string, EnvMap> = {};
  for (const [stack, env] of Object.entries(file.stackEnv ?? {})) {
    stackEnv[stack] = stringifyEnvMap(env);
  }

  return {
    parentDnsDomain,
    defaultCertResolver,
    adminParentDnsDomain: present(file.adminParentDnsDomain) ?? parentDnsDomain,
    adminCertResolver,
    sharedAppSubdomain,
    sharedAppDnsName: inferSharedAppDnsName(
      file.sharedAppDnsName,
      sharedAppSubdomain,
      parentDnsDomain
    ),
    sharedAppCertResolver: present(file.sharedAppCertResolver) ?? defaultCertResolver,
    hubHostname,
    hubHostname2: inferHubHostname2(file.hubHostname2, hubHostname),
    hubLanIp: present(file.hubLanIp),
    traefikDashboardSubdomain: inferTraefikDashboardSubdomain(file.traefikDashboardSubdomain),
    traefikDashboardHtpasswd: present(file.traefikDashboardHtpasswd),
    portainerSubdomain: inferPortainerSubdomain(file.portainerSubdomain),
    portainerCertResolver: present(file.portainerCertResolver) ?? adminCertResolver,
    portainerAgentSecret: present(file.portainerAgentSecret),
    portainerInitialPasswordHash: present(file.portainerInitialPasswordHash),
    letsencryptOwnerEmail: present(file.letsencryptOwnerEmail),
    traefikLogLevel: file.traefikLogLevel ?? DEFAULT_TRAEFIK_LOG_LEVEL,
    routeProvider: file.routeProvider ?? DEFAULT_ROUTE_PROVIDER,
    baseStackEnv: stringifyEnvMap(file.baseStackEnv),
    baseAppStackEnv: stringifyEnvMap(file.baseAppStackEnv),
    portainerRuntimeEnv: stringifyEnvMap(file.portainerRuntimeEnv),
    stackEnv,
  };
}
