/**
 * Stack manifest types
 *
 * A stack is a directory under stacks/ holding a hub-stack.yml manifest
 * and, optionally, a docker-compose-template.yml.
 */

import { EnvFragment } from "../env-fragments";
import { RoutingStyle, ServiceDescriptor, Visibility } from "../routes";

/** Fragments every project has, built from the hub configuration */
export const BUILTIN_FRAGMENT_NAMES = ["base", "app"] as const;

export type BuiltinFragmentName = (typeof BUILTIN_FRAGMENT_NAMES)[number];

/** Fragments injected into a service that does not list its own */
export const DEFAULT_SERVICE_FRAGMENTS: readonly string[] = BUILTIN_FRAGMENT_NAMES;

/** Raw environment tree, as YAML produces it */
export interface RawEnvTree {
  [key: string]: string | number | boolean | null | RawEnvTree;
}

/** One entry of `services` in hub-stack.yml, after schema validation */
export interface StackServiceFile {
  subdomain?: string;
  port?: number;
  visibility?: Partial<Record<Visibility, boolean>>;
  routing?: Partial<Record<RoutingStyle, boolean>>;
  certResolver?: string;
  upstreamHost?: string;
  /** Existing Traefik service to route to */
  service?: string;
  middlewares?: string[];
  fragments?: string[];
  pinnedEnv?: string[];
}

export interface StackFragmentFile {
  values: RawEnvTree | null;
  defaults?: RawEnvTree | null;
}

/** hub-stack.yml, after schema validation */
export interface StackManifestFile {
  services?: Record<string, StackServiceFile>;
  fragments?: Record<string, StackFragmentFile>;
}

/** A discovered stack directory */
export interface StackSource {
  readonly name: string;
  readonly dir: string;
  readonly manifestPath: string;
  /** Set when the stack has a compose template */
  readonly composeTemplatePath?: string;
}

/** One compose service the manifest talks about */
export interface StackService {
  /** Compose service name */
  readonly name: string;
  /** Set when the service is routed (has a subdomain) */
  readonly descriptor?: ServiceDescriptor;
  /** Fragment names, in merge order */
  readonly fragments: readonly string[];
  readonly pinnedEnv: readonly string[];
}

/** A loaded and validated stack manifest */
export interface StackManifest {
  readonly stack: string;
  readonly source: string;
  /** Sorted by compose service name */
  readonly services: readonly StackService[];
  readonly fragments: Readonly<Record<string, EnvFragment>>;
}
