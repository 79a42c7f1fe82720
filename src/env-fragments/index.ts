/**
 * Environment fragment merging module
 */

export type { EnvValue, EnvMapping, EnvFragment, MergeTarget, MergeResult } from "./types";
export { TARGET_ORIGIN } from "./types";
export { mergeEnvFragments, isEnvMapping } from "./merge";
export { normalizeComposeEnvironment } from "./normalize";
