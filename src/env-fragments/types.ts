/**
 * Environment fragment types
 */

/**
 * An environment value
 *
 * null is Compose's pass-through form (`- NAME` or `NAME:`): the value is
 * taken from the stack manager's environment at deploy time.
 */
export type EnvValue = string | null | EnvMapping;

export interface EnvMapping {
  [key: string]: EnvValue;
}

/** A named, reusable block of environment assignments */
export interface EnvFragment {
  readonly name: string;
  /** Assignments applied in fragment order */
  readonly values: EnvMapping;
  /** Assignments that only fill keys still unset after every fragment's values */
  readonly defaults?: EnvMapping;
}

/** The service environment fragments are merged into */
export interface MergeTarget {
  /** Used in conflict messages, e.g. "whoami/whoami" */
  readonly name?: string;
  readonly environment: EnvMapping;
  /** Dotted key paths fragments may never change */
  readonly pinned?: readonly string[];
}

/** Origin reported for keys that came from the target itself */
export const TARGET_ORIGIN = "target";

export interface MergeResult {
  readonly environment: EnvMapping;
  /** Dotted leaf key -> "target" or the name of the fragment that set it */
  readonly provenance: Readonly<Record<string, string>>;
}
