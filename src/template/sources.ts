/**
 * Variable sources and default resolution
 *
 * A resolution context is an ordered list of named sources. The first
 * source that defines a variable wins, even when it defines it as the
 * empty string; whether empty counts as "unset" is up to the reference form.
 */

/** A named mapping consulted during variable resolution */
export interface VariableSource {
  /** Name shown in validate reports (e.g., "stackEnv.whoami", "hub") */
  readonly name: string;
  readonly values: Readonly<Record<string, string | undefined>>;
}

/** A resolved variable and where its value came from */
export interface ResolvedVariable {
  readonly name: string;
  readonly value: string;
  /** Source name, or "default" when a fallback was used */
  readonly source: string;
}

/** Source name reported when a default value was used */
export const DEFAULT_SOURCE = "default";

/**
 * Look a variable up in ordered sources (first match wins)
 */
export function resolveVariable(
  name: string,
  sources: readonly VariableSource[]
): ResolvedVariable | undefined {
  for (const source of sources) {
    if (!Object.prototype.hasOwnProperty.call(source.values, name)) continue;
    const value = source.values[name];
    if (value !== undefined) {
      return { name, value, source: source.name };
    }
  }
  return undefined;
}

export interface DefaultResolutionOptions {
  /** Treat a variable set to "" as unset (the `:-` form). Default: true */
  readonly emptyIsUnset?: boolean;
}

/**
 * Resolve a variable, falling back to a default
 *
 * The fallback is a thunk so that a default built from other variables
 * is only evaluated when it is actually needed.
 */
export function resolveWithDefault(
  name: string,
  sources: readonly VariableSource[],
  fallback: () => string,
  options: DefaultResolutionOptions = {}
): ResolvedVariable & { readonly defaulted: boolean } {
  const emptyIsUnset = options.emptyIsUnset ?? true;
  const resolved = resolveVariable(name, sources);
  if (resolved && !(emptyIsUnset && resolved.value === "")) {
    return { ...resolved, defaulted: false };
  }
  return { name, value: fallback(), source: DEFAULT_SOURCE, defaulted: true };
}

/**
 * Build a source from a plain mapping, dropping non-string values
 */
export function createSource(
  name: string,
  values: Readonly<Record<string, unknown>>
): VariableSource {
  const strings: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (typeof value === "string") {
      strings[key] = value;
    }
  }
  return { name, values: strings };
}
