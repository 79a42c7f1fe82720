/**
 * Ordered deep merge of environment fragments
 *
 * Precedence, highest first:
 *   1. pinned target keys (never changed)
 *   2. fragment values, in fragment order (later fragments override
 *      earlier ones on keys the target already had)
 *   3. other target keys
 *   4. fragment defaults, first fragment wins
 *
 * A key the target does not define that two fragments assign different
 * values to has no defined winner: EnvMergeConflictError.
 */

import { EnvMergeConflictError } from "../errors";
import { EnvFragment, EnvMapping, EnvValue, MergeResult, MergeTarget, TARGET_ORIGIN } from "./types";

export function isEnvMapping(value: EnvValue | undefined): value is EnvMapping {
  return typeof value === "object" && value !== null;
}

function cloneValue(value: EnvValue): EnvValue {
  if (!isEnvMapping(value)) return value;
  const copy: EnvMapping = {};
  for (const [key, child] of Object.entries(value)) {
    copy[key] = cloneValue(child);
  }
  return copy;
}

function joinKey(prefix: string, key: string): string {
  return prefix === "" ? key : `${prefix}.${key}`;
}

/** Leaf keys of a value, as dotted paths under prefix */
function leafKeys(value: EnvValue, prefix: string): string[] {
  if (!isEnvMapping(value)) return [prefix];
  const keys = Object.entries(value).flatMap(([key, child]) =>
    leafKeys(child, joinKey(prefix, key))
  );
  return keys.length > 0 ? keys : [prefix];
}

class FragmentMerger {
  private readonly environment: EnvMapping;
  private readonly provenance = new Map<string, string>();
  /** Keys introduced by a fragment rather than the target */
  private readonly introduced = new Map<string, string>();
  private readonly pinned: ReadonlySet<string>;

  constructor(private readonly target: MergeTarget) {
    const cloned = cloneValue(target.environment);
    this.environment = isEnvMapping(cloned) ? cloned : {};
    this.pinned = new Set(target.pinned ?? []);
    for (const key of leafKeys(this.environment, "")) {
      if (key !== "") this.provenance.set(key, TARGET_ORIGIN);
    }
  }

  result(): MergeResult {
    return {
      environment: this.environment,
      provenance: Object.fromEntries(this.provenance),
    };
  }

  applyValues(fragment: EnvFragment): void {
    this.mergeInto(this.environment, fragment.values, "", fragment.name);
  }

  applyDefaults(fragment: EnvFragment): void {
    if (fragment.defaults) {
      this.fillInto(this.environment, fragment.defaults, "", fragment.name);
    }
  }

  private isPinned(key: string): boolean {
    for (const pin of this.pinned) {
      if (key === pin || key.startsWith(`${pin}.`)) return true;
    }
    return false;
  }

  private record(value: EnvValue, key: string, origin: string, introduced: boolean): void {
    for (const existing of [...this.provenance.keys()]) {
      if (existing === key || existing.startsWith(`${key}.`)) {
        this.provenance.delete(existing);
      }
    }
    for (const leaf of leafKeys(value, key)) {
      this.provenance.set(leaf, origin);
      if (introduced) this.introduced.set(leaf, origin);
    }
  }

  /** Fragment that introduced key (or any key under it), if one did */
  private introducedBy(key: string): string | undefined {
    for (const [introducedKey, fragment] of this.introduced) {
      if (introducedKey === key || introducedKey.startsWith(`${key}.`)) return fragment;
    }
    return undefined;
  }

  private mergeInto(node: EnvMapping, values: EnvMapping, prefix: string, fragment: string): void {
    for (const [name, value] of Object.entries(values)) {
      const key = joinKey(prefix, name);
      if (this.isPinned(key)) continue;

      const existing: EnvValue | undefined = node[name];
      if (existing === undefined) {
        node[name] = cloneValue(value);
        this.record(value, key, fragment, true);
        continue;
      }

      if (isEnvMapping(existing) && isEnvMapping(value)) {
        this.mergeInto(existing, value, key, fragment);
        continue;
      }

      const owner = this.introducedBy(key);
      if (owner !== undefined) {
        if (!sameValue(existing, value)) {
          throw new EnvMergeConflictError(key, owner, fragment, this.target.name);
        }
        continue;
      }

      node[name] = cloneValue(value);
      this.record(value, key, fragment, false);
    }
  }

  private fillInto(node: EnvMapping, defaults: EnvMapping, prefix: string, fragment: string): void {
    for (const [name, value] of Object.entries(defaults)) {
      const key = joinKey(prefix, name);
      if (this.isPinned(key)) continue;

      const existing: EnvValue | undefined = node[name];
      if (existing === undefined) {
        node[name] = cloneValue(value);
        this.record(value, key, fragment, true);
      } else if (isEnvMapping(existing) && isEnvMapping(value)) {
        this.fillInto(existing, value, key, fragment);
      }
    }
  }
}

function sameValue(a: EnvValue, b: EnvValue): boolean {
  if (isEnvMapping(a) && isEnvMapping(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => {
      const other: EnvValue | undefined = b[key];
      return other !== undefined && sameValue(a[key], other);
    });
  }
  return a === b;
}

/**
 * Merge fragments into a target environment
 *
 * Inputs are not modified.
 *
 * @throws EnvMergeConflictError when two fragments assign different values to
 *   a key the target does not define
 */
export function mergeEnvFragments(
  target: MergeTarget,
  fragments: readonly EnvFragment[]
): MergeResult {
  const merger = new FragmentMerger(target);
  for (const fragment of fragments) {
    merger.applyValues(fragment);
  }
  for (const fragment of fragments) {
    merger.applyDefaults(fragment);
  }
  return merger.result();
}
