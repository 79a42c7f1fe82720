/**
 * Shared helpers for parsed documents
 */

/** A plain mapping as produced by a YAML parser */
export type YamlRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is YamlRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read an optional mapping field of a parsed document
 *
 * @returns the mapping, {} when absent, or undefined when the field is not a mapping
 */
export function optionalRecord(parent: YamlRecord, key: string): YamlRecord | undefined {
  const value = parent[key];
  if (value === undefined || value === null) return {};
  return isRecord(value) ? value : undefined;
}

export function omitKeys(record: YamlRecord, keys: readonly string[]): YamlRecord {
  return Object.fromEntries(Object.entries(record).filter(([key]) => !keys.includes(key)));
}
