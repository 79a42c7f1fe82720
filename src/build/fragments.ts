/**
 * Environment fragments for a compose service
 */

import { EnvFragment, EnvMapping } from "../env-fragments";
import { EnvMap, HubConfig } from "../hub-config";
import { BuiltinFragmentName, StackManifest, StackService } from "../stacks";
import { escapeComposeValue } from "../template";

/** Config env values land in a compose document, so every `$` is doubled */
function composeEscaped(env: EnvMap): EnvMapping {
  const mapping: EnvMapping = {};
  for (const [name, value] of Object.entries(env)) {
    mapping[name] = escapeComposeValue(value);
  }
  return mapping;
}

/**
 * Fragments built from the hub configuration
 *
 * - base: baseStackEnv
 * - app: baseAppStackEnv
 */
export function builtinFragments(config: HubConfig): Record<BuiltinFragmentName, EnvFragment> {
  return {
    base: { name: "base", values: composeEscaped(config.baseStackEnv) },
    app: { name: "app", values: composeEscaped(config.baseAppStackEnv) },
  };
}

function withoutKeys(fragment: EnvFragment, keys: readonly string[]): EnvFragment {
  const values: EnvMapping = {};
  for (const [name, value] of Object.entries(fragment.values)) {
    if (!keys.includes(name)) values[name] = value;
  }
  return { ...fragment, values };
}

/**
 * The fragments a service asked for, in merge order
 *
 * baseAppStackEnv overrides baseStackEnv: when a service asks for both
 * builtins, base drops the keys app sets so the two never conflict.
 * Names were checked when the manifest was parsed.
 */
export function resolveServiceFragments(
  service: StackService,
  manifest: StackManifest,
  builtins: Readonly<Record<BuiltinFragmentName, EnvFragment>>
): EnvFragment[] {
  const base =
    service.fragments.includes("app") && service.fragments.includes("base")
      ? withoutKeys(builtins.base, Object.keys(builtins.app.values))
      : builtins.base;
  const available: Readonly<Record<string, EnvFragment>> = { ...builtins, base, ...manifest.fragments };
  return service.fragments.flatMap((name) => {
    const fragment = available[name];
    return fragment === undefined ? [] : [fragment];
  });
}
