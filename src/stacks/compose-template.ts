/**
 * Compose template loading
 */

import { TemplateExpansionError } from "../errors";
import { VariableSource, loadYamlTemplateFile } from "../template";
import { YamlRecord, isRecord, optionalRecord } from "../types";
import { StackSource } from "./types";

/** A parsed compose document */
export interface ComposeDocument {
  readonly source: string;
  readonly document: YamlRecord;
  /** The `services` mapping; every value is a mapping */
  readonly services: Readonly<Record<string, YamlRecord>>;
}

/**
 * Check the parts of a compose document the build edits
 *
 * @throws TemplateExpansionError when the document or a service is not a mapping
 */
export function parseComposeDocument(document: unknown, source: string): ComposeDocument {
  const invalid = (what: string): TemplateExpansionError =>
    new TemplateExpansionError(undefined, source, `${what} must be a mapping`);

  if (!isRecord(document)) throw invalid("the document");
  const services = optionalRecord(document, "services");
  if (services === undefined) throw invalid("services");

  const checked: Record<string, YamlRecord> = {};
  for (const [name, service] of Object.entries(services)) {
    if (!isRecord(service)) throw invalid(`services.${name}`);
    checked[name] = service;
  }
  return { source, document, services: checked };
}

/**
 * Read, expand (compose mode) and parse a compose template
 */
export function loadComposeTemplateFile(
  filePath: string,
  sources: readonly VariableSource[]
): ComposeDocument {
  const document = loadYamlTemplateFile(filePath, sources, { escape: "compose" });
  return parseComposeDocument(document, filePath);
}

/**
 * A stack's compose template
 *
 * @returns undefined when the stack has no compose template
 */
export function loadComposeTemplate(
  stack: StackSource,
  sources: readonly VariableSource[]
): ComposeDocument | undefined {
  if (stack.composeTemplatePath === undefined) return undefined;
  return loadComposeTemplateFile(stack.composeTemplatePath, sources);
}
