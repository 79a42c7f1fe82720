/**
 * YAML templates
 *
 * A YAML template is expanded as text first, then parsed. Variable values
 * are substituted verbatim, so a value that YAML would misread (one starting
 * with "*", containing ": ", ...) must be quoted in the template itself:
 * `password: "${ADMIN_PASSWORD}"`.
 */

import * as fs from "fs";
import * as yaml from "js-yaml";
import { TemplateExpansionError } from "../errors";
import { EscapeMode } from "./escape";
import { expandTemplate } from "./expand";
import { VariableSource } from "./sources";

export interface YamlTemplateOptions {
  readonly templateName?: string;
  readonly escape?: EscapeMode;
}

/**
 * Expand and parse a YAML template string
 *
 * @throws TemplateExpansionError on unresolved variables or unparseable output
 */
export function loadYamlTemplate(
  template: string,
  sources: readonly VariableSource[],
  options: YamlTemplateOptions = {}
): unknown {
  const templateName = options.templateName ?? "<inline>";
  const expanded = expandTemplate(template, sources, {
    templateName,
    escape: options.escape,
  });
  try {
    return yaml.load(expanded, { filename: templateName });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TemplateExpansionError(undefined, templateName, `expanded YAML is invalid: ${reason}`);
  }
}

/**
 * Read, expand and parse a YAML template file
 */
export function loadYamlTemplateFile(
  filePath: string,
  sources: readonly VariableSource[],
  options: Omit<YamlTemplateOptions, "templateName"> = {}
): unknown {
  const template = fs.readFileSync(filePath, "utf-8");
  return loadYamlTemplate(template, sources, { ...options, templateName: filePath });
}
