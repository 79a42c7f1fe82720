/**
 * Service descriptor validation
 *
 * Checks for:
 * - Invalid subdomains
 * - Reserved subdomains (shared app host, Traefik dashboard, Portainer)
 * - Out-of-range ports
 * - Malformed certificate resolvers, upstream hosts, service and
 *   middleware references
 *
 * The manifest is expanded in compose mode, so a `$` in a value that ends
 * up in the Traefik dynamic config would arrive doubled. None of these
 * patterns admit `$`.
 *
 * Duplicate subdomains are not checked here: generateRouteMatrix claims
 * each subdomain and reports both owners.
 */

import { isValidDnsLabel } from "../constants";
import { ValidationError } from "../errors";
import { CERT_RESOLVER_PATTERN, HubConfig } from "../hub-config";
import { ServiceDescriptor } from "./types";

/** Traefik middleware reference, optionally provider-qualified ("auth@file") */
const MIDDLEWARE_REF_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*(@[a-z]+)?$/;

/** Traefik service reference; same form as a middleware reference */
const SERVICE_REF_PATTERN = MIDDLEWARE_REF_PATTERN;

/** Container or host name the generated load balancer points at */
const UPSTREAM_HOST_PATTERN = /^[A-Za-z0-9]([A-Za-z0-9_.-]*[A-Za-z0-9])?$/;

/** Subdomains the hub itself serves */
export function reservedSubdomains(config: HubConfig): string[] {
  return [config.sharedAppSubdomain, config.traefikDashboardSubdomain, config.portainerSubdomain];
}

export function validateServiceDescriptor(
  descriptor: ServiceDescriptor,
  config: HubConfig
): ValidationError[] {
  const errors: ValidationError[] = [];
  const base = `stacks.${descriptor.stack}.services.${descriptor.service}`;

  if (!isValidDnsLabel(descriptor.subdomain)) {
    errors.push({
      code: "INVALID_SUBDOMAIN",
      message: `Invalid subdomain "${descriptor.subdomain}": must be a lowercase DNS label`,
      path: `${base}.subdomain`,
    });
  } else if (reservedSubdomains(config).includes(descriptor.subdomain)) {
    errors.push({
      code: "RESERVED_SUBDOMAIN",
      message: `Reserved subdomain: "${descriptor.subdomain}" is served by the hub itself`,
      path: `${base}.subdomain`,
    });
  }

  if (!Number.isInteger(descriptor.port) || descriptor.port < 1 || descriptor.port > 65535) {
    errors.push({
      code: "INVALID_PORT",
      message: `Invalid port ${String(descriptor.port)}: must be an integer from 1 to 65535`,
      path: `${base}.port`,
    });
  }

  if (descriptor.certResolver !== undefined && !CERT_RESOLVER_PATTERN.test(descriptor.certResolver)) {
    errors.push({
      code: "INVALID_CERT_RESOLVER",
      message: `Invalid certificate resolver "${descriptor.certResolver}"`,
      path: `${base}.certResolver`,
    });
  }

  if (descriptor.upstreamHost !== undefined && !UPSTREAM_HOST_PATTERN.test(descriptor.upstreamHost)) {
    errors.push({
      code: "INVALID_UPSTREAM_HOST",
      message: `Invalid upstream host "${descriptor.upstreamHost}"`,
      path: `${base}.upstreamHost`,
    });
  }

  if (descriptor.traefikService !== undefined && !SERVICE_REF_PATTERN.test(descriptor.traefikService)) {
    errors.push({
      code: "INVALID_SERVICE",
      message: `Invalid Traefik service reference "${descriptor.traefikService}"`,
      path: `${base}.service`,
    });
  }

  for (const [index, middleware] of (descriptor.middlewares ?? []).entries()) {
    if (!MIDDLEWARE_REF_PATTERN.test(middleware)) {
      errors.push({
        code: "INVALID_MIDDLEWARE",
        message: `Invalid middleware reference "${middleware}"`,
        path: `${base}.middlewares[${String(index)}]`,
      });
    }
  }

  return errors;
}
