/**
 * Variable usage report for `hub validate`
 */

import * as fs from "fs";
import * as path from "path";
import {
  DEFAULT_SOURCE,
  VariableSource,
  collectVariableReferences,
  expandTemplate,
  resolveVariable,
} from "../template";

/** Source reported for a variable nothing defines */
export const UNSET_SOURCE = "unset";

/** A template that was expanded, and the sources it was expanded with */
export interface TemplateUse {
  readonly path: string;
  readonly sources: readonly VariableSource[];
}

/** One variable referenced by one template */
export interface VariableUsage {
  /** Project-relative template path */
  readonly template: string;
  readonly name: string;
  /** Value the reference takes; undefined when unset */
  readonly value: string | undefined;
  /** Source name, "default" or "unset" */
  readonly source: string;
}

function usageFor(
  template: TemplateUse,
  name: string,
  operator: string,
  defaultText: string | undefined
): Pick<VariableUsage, "value" | "source"> {
  const resolved = resolveVariable(name, template.sources);
  const emptyIsUnset = operator === ":-";
  if (resolved !== undefined && !(emptyIsUnset && resolved.value === "")) {
    return { value: resolved.value, source: resolved.source };
  }
  if (defaultText !== undefined) {
    const value = expandTemplate(defaultText, template.sources, { templateName: template.path });
    return { value, source: DEFAULT_SOURCE };
  }
  return { value: undefined, source: UNSET_SOURCE };
}

/**
 * List every variable each template references, with its value and source
 *
 * Each variable is listed once per template, for its first reference.
 */
export function reportVariables(
  templates: readonly TemplateUse[],
  projectDir: string
): VariableUsage[] {
  const usages: VariableUsage[] = [];
  for (const template of templates) {
    const name = path.relative(projectDir, template.path).split(path.sep).join("/");
    const text = fs.readFileSync(template.path, "utf-8");
    const seen = new Set<string>();
    for (const reference of collectVariableReferences(text, template.path)) {
      if (seen.has(reference.name)) continue;
      seen.add(reference.name);
      usages.push({
        template: name,
        name: reference.name,
        ...usageFor(template, reference.name, reference.operator, reference.defaultText),
      });
    }
  }
  return usages;
}
