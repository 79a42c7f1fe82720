/**
 * Hub configuration types (v1)
 *
 * The hub configuration is the single source of truth for:
 * - The DNS names every stack is served under
 * - Which certificate resolver TLS routers use
 * - How the hub is reached on the LAN (hostnames, IP)
 * - Environment injected into every stack
 *
 * It lives in <projectDir>/config.yml as `{ version: 1, hub: {...} }`.
 */

// =============================================================================
// Raw Configuration Types (as read from config.yml)
// =============================================================================

export type TraefikLogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export const TRAEFIK_LOG_LEVELS: readonly TraefikLogLevel[] = ["DEBUG", "INFO", "WARN", "ERROR"];

/**
 * How routes reach Traefik
 *
 * - labels: Docker labels on each stack's compose services
 * - file: routers written to the Traefik dynamic config file
 */
export type RouteProvider = "labels" | "file";

export const ROUTE_PROVIDERS: readonly RouteProvider[] = ["labels", "file"];

/** Environment map as written in config.yml */
export type RawEnvMap = Readonly<Record<string, string | number | boolean>>;

/** Environment map after loading: every value a string */
export type EnvMap = Readonly<Record<string, string>>;

/**
 * The `hub` section of config.yml
 *
 * All fields except parentDnsDomain and defaultCertResolver are optional;
 * inference rules apply defaults.
 */
export interface HubConfigFile {
  readonly parentDnsDomain?: string;
  readonly defaultCertResolver?: string;
  readonly adminParentDnsDomain?: string;
  readonly adminCertResolver?: string;
  readonly sharedAppSubdomain?: string;
  readonly sharedAppDnsName?: string;
  readonly sharedAppCertResolver?: string;
  readonly hubHostname?: string;
  readonly hubHostname2?: string;
  readonly hubLanIp?: string;
  readonly traefikDashboardSubdomain?: string;
  readonly traefikDashboardHtpasswd?: string;
  readonly portainerSubdomain?: string;
  readonly portainerCertResolver?: string;
  readonly portainerAgentSecret?: string;
  readonly portainerInitialPasswordHash?: string;
  readonly letsencryptOwnerEmail?: string;
  readonly traefikLogLevel?: TraefikLogLevel;
  readonly routeProvider?: RouteProvider;
  readonly baseStackEnv?: RawEnvMap;
  readonly baseAppStackEnv?: RawEnvMap;
  readonly portainerRuntimeEnv?: RawEnvMap;
  readonly stackEnv?: Readonly<Record<string, RawEnvMap>>;
}

/** The whole config.yml document */
export interface HubConfigDocument {
  readonly version: number;
  readonly hub: HubConfigFile;
}

// =============================================================================
// Resolved Configuration Types (after inference and validation)
// =============================================================================

export interface HubConfig {
  /** Parent domain every stack subdomain hangs off (e.g., "example.com") */
  readonly parentDnsDomain: string;
  /** Certificate resolver for stack routers */
  readonly defaultCertResolver: string;
  /** Parent domain of administrative UIs */
  readonly adminParentDnsDomain: string;
  /** Certificate resolver for administrative UIs */
  readonly adminCertResolver: string;
  /** Subdomain of the shared, path-routed host */
  readonly sharedAppSubdomain: string;
  /** Shared hostname path-style routers match on */
  readonly sharedAppDnsName: string;
  /** Certificate resolver for path-style routers */
  readonly sharedAppCertResolver: string;
  /** LAN hostname of the hub machine */
  readonly hubHostname?: string;
  /** Second LAN hostname, usually the mDNS name */
  readonly hubHostname2?: string;
  /** LAN IP address of the hub machine */
  readonly hubLanIp?: string;
  readonly traefikDashboardSubdomain: string;
  /** Dashboard credential; the dashboard has no route without it */
  readonly traefikDashboardHtpasswd?: string;
  /** Subdomain of the Portainer UI, under the admin domain */
  readonly portainerSubdomain: string;
  readonly portainerCertResolver: string;
  readonly portainerAgentSecret?: string;
  /** Bare bcrypt hash of the initial Portainer admin password */
  readonly portainerInitialPasswordHash?: string;
  readonly letsencryptOwnerEmail?: string;
  readonly traefikLogLevel: TraefikLogLevel;
  readonly routeProvider: RouteProvider;
  /** Injected into every stack's .env */
  readonly baseStackEnv: EnvMap;
  /** Injected into every application stack (not traefik or portainer) */
  readonly baseAppStackEnv: EnvMap;
  /** Written to the stack manager's injected-env-vars.yml */
  readonly portainerRuntimeEnv: EnvMap;
  /** Per-stack variables, keyed by stack name */
  readonly stackEnv: Readonly<Record<string, EnvMap>>;
}
