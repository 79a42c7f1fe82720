/**
 * Variable sources for template expansion
 *
 * Lookup order, first match wins:
 *
 *   1. --var assignments from the command line
 *   2. the stack's environment (stackEnv.<stack>, baseAppStackEnv, baseStackEnv)
 *   3. hub variables derived from config.yml
 *   4. the process environment
 */

import { PORTAINER_STACK, TRAEFIK_STACK } from "../constants";
import { UsageError } from "../errors";
import { ENV_VAR_NAME_PATTERN, EnvMap, HubConfig, buildHubVariables } from "../hub-config";
import { VariableSource, createSource } from "../template";

export const CLI_SOURCE = "command line";
export const HUB_SOURCE = "hub";
export const PROCESS_ENV_SOURCE = "process env";

/** Inputs that do not come from the project directory */
export interface VariableContext {
  /** --var assignments */
  readonly vars?: Readonly<Record<string, string>>;
  /** Default: process.env */
  readonly processEnv?: Readonly<Record<string, string | undefined>>;
}

/**
 * Parse a `NAME=value` command-line assignment
 *
 * @throws UsageError when there is no "=" or the name is not a variable name
 */
export function parseVarAssignment(text: string): [string, string] {
  const separator = text.indexOf("=");
  const name = separator < 0 ? text : text.slice(0, separator);
  if (separator < 0 || !ENV_VAR_NAME_PATTERN.test(name)) {
    throw new UsageError(`Invalid --var "${text}": expected NAME=value`);
  }
  return [name, text.slice(separator + 1)];
}

export function parseVarAssignments(texts: readonly string[]): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const text of texts) {
    const [name, value] = parseVarAssignment(text);
    vars[name] = value;
  }
  return vars;
}

/** Whether a stack gets baseAppStackEnv (every stack but Traefik and Portainer) */
export function isAppStack(stack: string): boolean {
  return stack !== TRAEFIK_STACK && stack !== PORTAINER_STACK;
}

/** Hub variables as a plain mapping */
export function hubVariables(config: HubConfig): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const [name, value] of Object.entries(buildHubVariables(config))) {
    if (value !== undefined) variables[name] = value;
  }
  return variables;
}

interface EnvLayer {
  readonly name: string;
  readonly values: EnvMap;
}

/** Config env maps for a stack, least specific first */
function stackEnvLayers(config: HubConfig, stack: string): EnvLayer[] {
  const layers: EnvLayer[] = [{ name: "baseStackEnv", values: config.baseStackEnv }];
  if (isAppStack(stack)) layers.push({ name: "baseAppStackEnv", values: config.baseAppStackEnv });
  layers.push({ name: `stackEnv.${stack}`, values: config.stackEnv[stack] ?? {} });
  return layers;
}

/**
 * Ordered variable sources for one stack's templates
 */
export function buildVariableSources(
  config: HubConfig,
  stack: string,
  context: VariableContext = {}
): VariableSource[] {
  const layers = stackEnvLayers(config, stack)
    .reverse()
    .map((layer) => createSource(layer.name, layer.values));
  return [
    createSource(CLI_SOURCE, context.vars ?? {}),
    ...layers,
    createSource(HUB_SOURCE, hubVariables(config)),
    createSource(PROCESS_ENV_SOURCE, context.processEnv ?? process.env),
  ];
}

/**
 * A stack's .env content: hub variables overridden by the config env maps
 */
export function buildStackEnv(config: HubConfig, stack: string): Record<string, string> {
  const env = hubVariables(config);
  for (const layer of stackEnvLayers(config, stack)) {
    Object.assign(env, layer.values);
  }
  return env;
}

/**
 * Environment injected into every container the stack manager starts
 */
export function buildInjectedEnv(config: HubConfig): Record<string, string> {
  return {
    ...hubVariables(config),
    ...config.baseStackEnv,
    ...config.baseAppStackEnv,
    ...config.portainerRuntimeEnv,
  };
}
