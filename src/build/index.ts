/**
 * Build module
 *
 * Compiles the project into artifacts and writes them.
 */

export type { VariableContext } from "./variables";
export {
  CLI_SOURCE,
  HUB_SOURCE,
  PROCESS_ENV_SOURCE,
  parseVarAssignment,
  parseVarAssignments,
  isAppStack,
  hubVariables,
  buildVariableSources,
  buildStackEnv,
  buildInjectedEnv,
} from "./variables";

export { builtinFragments, resolveServiceFragments } from "./fragments";
export { generatedHeader } from "./headers";

export type { ComposeBuildInput } from "./compose";
export { buildComposeDocument, serializeComposeDocument } from "./compose";

export { renderStaticConfig, loadDynamicConfigTemplate, renderDynamicConfig } from "./traefik";

export type { TemplateUse, VariableUsage } from "./report";
export { UNSET_SOURCE, reportVariables } from "./report";

export type { BuildOptions, CompileResult, BuildResult, ValidationReport } from "./pipeline";
export {
  TRAEFIK_STATIC_TEMPLATE,
  TRAEFIK_DYNAMIC_TEMPLATE,
  TRAEFIK_STATIC_CONFIG,
  TRAEFIK_DYNAMIC_CONFIG,
  COMPOSE_FILE_NAME,
  DOTENV_FILE_NAME,
  INJECTED_ENV_FILE_NAME,
  getBuildDir,
  getStackBuildDir,
  compileHub,
  buildHub,
  validateHub,
} from "./pipeline";
