/**
 * Traefik stack artifacts
 *
 * The static config is the expanded static template. The dynamic config
 * is the expanded dynamic template with every file-provider route merged
 * in. Both are expanded in "none" mode: Traefik does not interpolate
 * `$` itself, so values go in verbatim.
 */

import * as fs from "fs";
import * as yaml from "yaml";
import { TemplateExpansionError } from "../errors";
import {
  DynamicConfigTemplate,
  GeneratedRoutes,
  generateTraefikConfig,
  mergeDynamicConfig,
  parseDynamicConfigTemplate,
  serializeTraefikConfig,
} from "../routes";
import { VariableSource, loadYamlTemplateFile } from "../template";
import { isRecord } from "../types";

/**
 * Expand the static config template
 *
 * @throws TemplateExpansionError when the result is not a mapping
 */
export function renderStaticConfig(
  templatePath: string,
  sources: readonly VariableSource[]
): string {
  const document = loadYamlTemplateFile(templatePath, sources, { escape: "none" });
  if (!isRecord(document)) {
    throw new TemplateExpansionError(undefined, templatePath, "the document must be a mapping");
  }
  return yaml.stringify(document);
}

/**
 * Expand the dynamic config template, if the project has one
 */
export function loadDynamicConfigTemplate(
  templatePath: string,
  sources: readonly VariableSource[]
): DynamicConfigTemplate {
  if (!fs.existsSync(templatePath)) {
    return parseDynamicConfigTemplate(null, templatePath);
  }
  const document = loadYamlTemplateFile(templatePath, sources, { escape: "none" });
  return parseDynamicConfigTemplate(document, templatePath);
}

/**
 * Render the dynamic config: template entries, then generated ones
 */
export function renderDynamicConfig(
  template: DynamicConfigTemplate,
  entries: readonly GeneratedRoutes[]
): string {
  return serializeTraefikConfig(mergeDynamicConfig(template, generateTraefikConfig(entries)));
}
