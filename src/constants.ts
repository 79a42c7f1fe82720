/**
 * Centralized constants and validation patterns
 *
 * This module provides a single source of truth for:
 * - Reserved subdomains (shared app name, Traefik dashboard)
 * - Slug and DNS validation patterns
 * - Well-known project file names
 */

// ============================================================================
// Project Constants
// ============================================================================

/** Project namespace used in generated file headers */
export const PROJECT_NAME = "hub";

/** Current config.yml document version */
export const CONFIG_DOCUMENT_VERSION = 1;

/** Config file name, relative to the project directory */
export const CONFIG_FILE_NAME = "config.yml";

/** Directory holding one subdirectory per stack */
export const STACKS_DIR_NAME = "stacks";

/** Directory that receives every generated artifact */
export const BUILD_DIR_NAME = "build";

/** Stack manifest file name inside stacks/<stack>/ */
export const STACK_MANIFEST_FILE_NAME = "hub-stack.yml";

/** Optional compose template inside stacks/<stack>/ */
export const COMPOSE_TEMPLATE_FILE_NAME = "docker-compose-template.yml";

/** Stacks whose artifacts the hub builds itself */
export const TRAEFIK_STACK = "traefik";
export const PORTAINER_STACK = "portainer";

// ============================================================================
// Slug Validation
// ============================================================================

/**
 * Slug pattern: lowercase alphanumeric with hyphens
 * Cannot start or end with hyphen
 */
export const SLUG_PATTERN = /^[a-z][a-z0-9-]*[a-z0-9]$|^[a-z]$/;

/**
 * Check if a value is a valid slug
 *
 * Valid slugs:
 * - Start with lowercase letter
 * - Contain only lowercase letters, digits, and hyphens
 * - Cannot start or end with hyphen
 *
 * Examples:
 * - "whoami" -> valid
 * - "my-service-2" -> valid
 * - "2fast" -> invalid (starts with number)
 * - "My-Service" -> invalid (uppercase)
 */
export function isValidSlug(value: string): boolean {
  if (!value || value.length === 0) return false;
  return SLUG_PATTERN.test(value);
}

// ============================================================================
// DNS Validation
// ============================================================================

/** A single DNS label (RFC 1123): 1-63 chars, alphanumeric and inner hyphens */
export const DNS_LABEL_PATTERN = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/;

/** Maximum length of a fully qualified DNS name (without trailing dot) */
export const DNS_NAME_MAX_LENGTH = 253;

export function isValidDnsLabel(value: string): boolean {
  return DNS_LABEL_PATTERN.test(value);
}

/**
 * Check if a value is a valid DNS name
 *
 * Lowercase only. Single-label names are accepted ("localhost"), but
 * a name must not be made up of digits and dots alone.
 */
export function isValidDnsName(value: string): boolean {
  if (!value || value.length > DNS_NAME_MAX_LENGTH) return false;
  const labels = value.split(".");
  if (!labels.every(isValidDnsLabel)) return false;
  return !/^[0-9.]+$/.test(value);
}

/** Dotted-quad IPv4 address */
export function isValidIpv4(value: string): boolean {
  const parts = value.split(".");
  if (parts.length !== 4) return false;
  return parts.every((part) => /^(0|[1-9][0-9]{0,2})$/.test(part) && Number(part) <= 255);
}

/** Basic email check - catches obvious errors only */
export function isValidEmail(email: string): boolean {
  if (!email || email.length === 0) return false;
  return /^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(email);
}

// ============================================================================
// Credentials
// ============================================================================

/**
 * Hash scheme prefixes accepted in htpasswd-style credentials
 *
 * bcrypt variants, Apache MD5 and SHA1 - the schemes Traefik's
 * basicAuth middleware understands.
 */
export const ACCEPTED_HASH_PREFIXES: readonly string[] = [
  "$2y$",
  "$2b$",
  "$2a$",
  "$apr1$",
  "{SHA}",
] as const;

/** A bare bcrypt hash, without the "username:" prefix */
const BCRYPT_HASH_PATTERN = /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/;

export function isValidBcryptHash(value: string): boolean {
  return BCRYPT_HASH_PATTERN.test(value);
}

/** Shared secret between the stack manager and its agent */
export const MIN_AGENT_SECRET_LENGTH = 16;

export function isValidAgentSecret(value: string): boolean {
  return value.length >= MIN_AGENT_SECRET_LENGTH && /^[A-Za-z0-9_-]+$/.test(value);
}

/**
 * Check an htpasswd entry of the form "username:hash"
 */
export function isValidHtpasswdEntry(value: string): boolean {
  const separator = value.indexOf(":");
  if (separator <= 0) return false;
  const username = value.slice(0, separator);
  const hash = value.slice(separator + 1);
  if (/\s/.test(username)) return false;
  return ACCEPTED_HASH_PREFIXES.some(
    (prefix) => hash.startsWith(prefix) && hash.length > prefix.length
  );
}
