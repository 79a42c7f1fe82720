/**
 * .env serialization
 *
 * Values made only of characters that need no quoting are written bare;
 * everything else is single-quoted, with backslashes doubled and embedded
 * single quotes written as '\''.
 */

const UNQUOTED_SAFE = /^[a-zA-Z0-9_.:\-]+$/;

export function encodeDotenvEntry(name: string, value: string): string {
  if (UNQUOTED_SAFE.test(value)) {
    return `${name}=${value}`;
  }
  const quoted = value.replace(/\\/g, "\\\\").replace(/'/g, "'\\''");
  return `${name}='${quoted}'`;
}

/**
 * Serialize a mapping into .env content, one entry per line, in key order
 */
export function serializeDotenv(values: Readonly<Record<string, string>>): string {
  const lines = Object.entries(values).map(([name, value]) => encodeDotenvEntry(name, value));
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}
