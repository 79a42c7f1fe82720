/**
 * Template expansion module
 *
 * Variable interpolation with Compose-style defaults over ordered,
 * named variable sources.
 */

export type { VariableSource, ResolvedVariable, DefaultResolutionOptions } from "./sources";
export { resolveVariable, resolveWithDefault, createSource, DEFAULT_SOURCE } from "./sources";

export type { EscapeMode } from "./escape";
export { escapeComposeValue, unescapeComposeValue, escapeForMode } from "./escape";

export type { TemplateNode, ReferenceOperator, ExpandOptions, VariableReference } from "./expand";
export { parseTemplate, expandTemplate, collectVariableReferences } from "./expand";

export type { YamlTemplateOptions } from "./yaml-template";
export { loadYamlTemplate, loadYamlTemplateFile } from "./yaml-template";
