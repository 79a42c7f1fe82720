/**
 * Hub configuration validation
 *
 * Field validators return a ValidationError or null; validateHubConfigFile
 * collects every problem in the `hub` section so one run reports them all.
 * Shape checks (types, unknown keys) are done by the JSON Schema first,
 * see ./loader.ts.
 */

import {
  isValidAgentSecret,
  isValidBcryptHash,
  isValidDnsLabel,
  isValidDnsName,
  isValidEmail,
  isValidHtpasswdEntry,
  isValidIpv4,
  isValidSlug,
  ACCEPTED_HASH_PREFIXES,
  MIN_AGENT_SECRET_LENGTH,
} from "../constants";
import { ConfigValidationError, ValidationError } from "../errors";
import {
  inferPortainerSubdomain,
  inferSharedAppSubdomain,
  inferTraefikDashboardSubdomain,
} from "./inference";
import {
  HubConfigFile,
  ROUTE_PROVIDERS,
  RouteProvider,
  TRAEFIK_LOG_LEVELS,
  TraefikLogLevel,
} from "./types";

/** Certificate resolver ids as declared in the Traefik static config */
export const CERT_RESOLVER_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

/** Environment variable names */
export const ENV_VAR_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Validator signature shared by every scalar config key */
export type FieldValidator = (value: string, path: string) => ValidationError | null;

// =============================================================================
// Individual Validation Functions
// =============================================================================

export function validateDnsNameField(value: string, path: string): ValidationError | null {
  if (isValidDnsName(value)) return null;
  return {
    code: "INVALID_DNS_NAME",
    message: `Invalid DNS name "${value}": labels must be lowercase letters, digits and inner hyphens, separated by dots`,
    path,
  };
}

export function validateDnsLabelField(value: string, path: string): ValidationError | null {
  if (isValidDnsLabel(value)) return null;
  return {
    code: "INVALID_DNS_LABEL",
    message: `Invalid DNS label "${value}": must be 1-63 lowercase letters, digits and inner hyphens`,
    path,
  };
}

export function validateCertResolverField(value: string, path: string): ValidationError | null {
  if (CERT_RESOLVER_PATTERN.test(value)) return null;
  return {
    code: "INVALID_CERT_RESOLVER",
    message: `Invalid certificate resolver "${value}": must be letters, digits, hyphens and underscores`,
    path,
  };
}

export function validateIpv4Field(value: string, path: string): ValidationError | null {
  if (isValidIpv4(value)) return null;
  return {
    code: "INVALID_IP_ADDRESS",
    message: `Invalid IPv4 address "${value}"`,
    path,
  };
}

export function validateEmailField(value: string, path: string): ValidationError | null {
  if (isValidEmail(value)) return null;
  return {
    code: "INVALID_EMAIL",
    message: `Invalid email address "${value}"`,
    path,
  };
}

/**
 * Validate a "user:hash" credential
 *
 * The value itself is never echoed back.
 */
export function validateHtpasswdField(value: string, path: string): ValidationError | null {
  if (isValidHtpasswdEntry(value)) return null;
  return {
    code: "INVALID_CREDENTIAL",
    message: `Invalid credential: expected "user:hash" with a hash starting with one of ${ACCEPTED_HASH_PREFIXES.join(", ")}`,
    path,
  };
}

/** A bare bcrypt hash; never echoed back */
export function validateBcryptHashField(value: string, path: string): ValidationError | null {
  if (isValidBcryptHash(value)) return null;
  return {
    code: "INVALID_PASSWORD_HASH",
    message: "Invalid password hash: expected a bcrypt hash without a username. Run: hub config set-portainer-password <password>",
    path,
  };
}

export function validateAgentSecretField(value: string, path: string): ValidationError | null {
  if (isValidAgentSecret(value)) return null;
  return {
    code: "INVALID_AGENT_SECRET",
    message: `Invalid agent secret: expected at least ${String(MIN_AGENT_SECRET_LENGTH)} letters, digits, hyphens or underscores`,
    path,
  };
}

export function isTraefikLogLevel(value: string): value is TraefikLogLevel {
  return TRAEFIK_LOG_LEVELS.some((level) => level === value);
}

export function validateTraefikLogLevelField(value: string, path: string): ValidationError | null {
  if (isTraefikLogLevel(value)) return null;
  return {
    code: "INVALID_LOG_LEVEL",
    message: `Invalid log level "${value}": expected one of ${TRAEFIK_LOG_LEVELS.join(", ")}`,
    path,
  };
}

export function isRouteProvider(value: string): value is RouteProvider {
  return ROUTE_PROVIDERS.some((provider) => provider === value);
}

export function validateRouteProviderField(value: string, path: string): ValidationError | null {
  if (isRouteProvider(value)) return null;
  return {
    code: "INVALID_ROUTE_PROVIDER",
    message: `Invalid route provider "${value}": expected one of ${ROUTE_PROVIDERS.join(", ")}`,
    path,
  };
}

export function validateEnvVarName(name: string, path: string): ValidationError | null {
  if (ENV_VAR_NAME_PATTERN.test(name)) return null;
  return {
    code: "INVALID_ENV_NAME",
    message: `Invalid environment variable name "${name}"`,
    path,
  };
}

export function validateStackName(name: string, path: string): ValidationError | null {
  if (isValidSlug(name)) return null;
  return {
    code: "INVALID_STACK_NAME",
    message: `Invalid stack name "${name}": must start with a lowercase letter and contain only lowercase letters, numbers, and hyphens`,
    path,
  };
}

// =============================================================================
// Composite Validation
// =============================================================================

/** Validators for the scalar fields of the hub section */
export const FIELD_VALIDATORS: Readonly<Record<string, FieldValidator>> = {
  parentDnsDomain: validateDnsNameField,
  defaultCertResolver: validateCertResolverField,
  adminParentDnsDomain: validateDnsNameField,
  adminCertResolver: validateCertResolverField,
  sharedAppSubdomain: validateDnsLabelField,
  sharedAppDnsName: validateDnsNameField,
  sharedAppCertResolver: validateCertResolverField,
  hubHostname: validateDnsLabelField,
  hubHostname2: validateDnsNameField,
  hubLanIp: validateIpv4Field,
  traefikDashboardSubdomain: validateDnsLabelField,
  traefikDashboardHtpasswd: validateHtpasswdField,
  portainerSubdomain: validateDnsLabelField,
  portainerCertResolver: validateCertResolverField,
  portainerAgentSecret: validateAgentSecretField,
  portainerInitialPasswordHash: validateBcryptHashField,
  letsencryptOwnerEmail: validateEmailField,
  traefikLogLevel: validateTraefikLogLevelField,
  routeProvider: validateRouteProviderField,
};

const REQUIRED_FIELDS = ["parentDnsDomain", "defaultCertResolver"] as const;

export type ValidationResult =
  | { readonly valid: true }
  | { readonly valid: false; readonly errors: readonly ValidationError[] };

/**
 * Validate the `hub` section of a config document
 *
 * Runs on the raw section, before inference, so that each error points
 * at what the operator actually wrote.
 */
export function validateHubConfigFile(file: HubConfigFile): ValidationResult {
  const errors: ValidationError[] = [];

  for (const field of REQUIRED_FIELDS) {
    if (file[field] === undefined || file[field] === "") {
      errors.push({
        code: "MISSING_REQUIRED",
        message: `Missing required setting "${field}". Run: hub config set ${field} <value>`,
        path: `hub.${field}`,
      });
    }
  }

  for (const [field, value] of Object.entries(file)) {
    const validator = FIELD_VALIDATORS[field];
    if (validator === undefined || typeof value !== "string" || value === "") continue;
    const error = validator(value, `hub.${field}`);
    if (error) errors.push(error);
  }

  const reserved: ReadonlyArray<readonly [string, string, string]> = [
    ["sharedAppSubdomain", "shared app", inferSharedAppSubdomain(file.sharedAppSubdomain)],
    [
      "traefikDashboardSubdomain",
      "Traefik dashboard",
      inferTraefikDashboardSubdomain(file.traefikDashboardSubdomain),
    ],
    ["portainerSubdomain", "Portainer", inferPortainerSubdomain(file.portainerSubdomain)],
  ];
  reserved.forEach(([field, label, subdomain], index) => {
    const earlier = reserved.slice(0, index).find(([, , other]) => other === subdomain);
    if (earlier !== undefined) {
      errors.push({
        code: "RESERVED_SUBDOMAIN_CLASH",
        message: `The ${earlier[1]} subdomain and the ${label} subdomain are both "${subdomain}"`,
        path: `hub.${field}`,
      });
    }
  });

  if (errors.length === 0) {
    return { valid: true };
  }
  return { valid: false, errors };
}

/**
 * Validate and throw if invalid
 *
 * @param source - Document name for the error message
 * @throws ConfigValidationError listing every problem
 */
export function assertValidHubConfigFile(file: HubConfigFile, source: string): void {
  const result = validateHubConfigFile(file);
  if (!result.valid) {
    throw new ConfigValidationError(source, result.errors);
  }
}
