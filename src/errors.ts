/**
 * Error taxonomy
 *
 * Every failure the compiler reports is one of these classes. Each carries
 * the context needed to fix the input, and the process exit code the CLI
 * uses when it terminates on that error.
 */

/** Exit codes returned by the CLI */
export const EXIT_CODES = {
  success: 0,
  unexpected: 1,
  usage: 2,
  configValidation: 10,
  templateExpansion: 11,
  routeCollision: 12,
  envMergeConflict: 13,
  fileWrite: 14,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Base class for all compiler errors
 */
export abstract class HubError extends Error {
  abstract readonly exitCode: ExitCode;
}

/** A single field-level problem found while validating configuration */
export interface ValidationError {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Human-readable error message */
  readonly message: string;
  /** Path to the invalid field (e.g., "hub.parentDnsDomain") */
  readonly path?: string;
}

function formatValidationErrors(errors: readonly ValidationError[]): string {
  return errors
    .map((e) => `  - ${e.message}${e.path ? ` (at ${e.path})` : ""}`)
    .join("\n");
}

/**
 * Error thrown when configuration is missing, malformed or fails validation
 */
export class ConfigValidationError extends HubError {
  readonly exitCode = EXIT_CODES.configValidation;

  constructor(
    public readonly source: string,
    public readonly errors: readonly ValidationError[]
  ) {
    super(`Invalid configuration in ${source}:\n${formatValidationErrors(errors)}`);
    this.name = "ConfigValidationError";
  }

  /** Path of the first offending field, if any */
  get field(): string | undefined {
    return this.errors.find((e) => e.path !== undefined)?.path;
  }
}

/**
 * Error thrown when a required template variable has no value, or when
 * a template cannot be parsed (variable is then undefined)
 */
export class TemplateExpansionError extends HubError {
  readonly exitCode = EXIT_CODES.templateExpansion;

  constructor(
    public readonly variable: string | undefined,
    public readonly template: string,
    detail?: string
  ) {
    super(
      (variable !== undefined
        ? `Unresolved variable "${variable}" in template ${template}`
        : `Invalid template ${template}`) + (detail ? `: ${detail}` : "")
    );
    this.name = "TemplateExpansionError";
  }
}

/** Who asked for a router, for collision reports */
export interface RouteOwner {
  /** Stack name, or "hub" for core routes and template-defined entries */
  readonly stack: string;
  /** Compose service name or template name */
  readonly service: string;
  /** Subdomain of the descriptor, when the owner is a descriptor */
  readonly subdomain?: string;
}

function describeOwner(owner: RouteOwner): string {
  const subdomain = owner.subdomain ? ` (subdomain "${owner.subdomain}")` : "";
  return `${owner.stack}/${owner.service}${subdomain}`;
}

export type RouteCollisionKind = "subdomain" | "router" | "middleware" | "service";

/**
 * Error thrown when two sources would claim the same subdomain, or define
 * the same router, middleware or service
 */
export class RouteCollisionError extends HubError {
  readonly exitCode = EXIT_CODES.routeCollision;

  constructor(
    public readonly kind: RouteCollisionKind,
    public readonly routeName: string,
    public readonly first: RouteOwner,
    public readonly second: RouteOwner
  ) {
    const verb = kind === "subdomain" ? "requested by" : "generated for";
    super(`Duplicate ${kind} "${routeName}" ${verb} ${describeOwner(first)} and ${describeOwner(second)}`);
    this.name = "RouteCollisionError";
  }
}

/**
 * Error thrown when two fragments disagree on a key nothing else settles
 */
export class EnvMergeConflictError extends HubError {
  readonly exitCode = EXIT_CODES.envMergeConflict;

  constructor(
    public readonly key: string,
    public readonly firstFragment: string,
    public readonly secondFragment: string,
    public readonly target?: string
  ) {
    super(
      `Environment fragments "${firstFragment}" and "${secondFragment}" assign different values to "${key}"` +
        (target ? ` in ${target}` : "") +
        `. Set "${key}" explicitly on the service or remove it from one fragment.`
    );
    this.name = "EnvMergeConflictError";
  }
}

/**
 * Error thrown when an artifact cannot be written
 */
export class FileWriteError extends HubError {
  readonly exitCode = EXIT_CODES.fileWrite;

  constructor(
    public readonly filePath: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write ${filePath}: ${reason}`, { cause });
    this.name = "FileWriteError";
  }
}

/**
 * Error thrown for malformed command lines
 */
export class UsageError extends HubError {
  readonly exitCode = EXIT_CODES.usage;

  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Map any thrown value to a process exit code
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof HubError) {
    return error.exitCode;
  }
  return EXIT_CODES.unexpected;
}
