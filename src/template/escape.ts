/**
 * Dollar-sign escaping for documents that are interpolated again downstream
 *
 * Compose files (and therefore the stack manager) interpolate `$VAR` and
 * `${VAR}` themselves and read `$$` as a literal `$`. Any value the compiler
 * inserts into such a document must have every `$` doubled, or a bcrypt
 * hash like `$2y$05$...` would be read back as references to `$2y` and `$05`.
 *
 * The rule is exactly: escape(v) replaces each `$` with `$$`; unescape
 * replaces each `$$` with `$`. unescape(escape(v)) === v for every string.
 */

/** Escape modes understood by the expander */
export type EscapeMode = "none" | "compose";

export function escapeComposeValue(value: string): string {
  return value.replace(/\$/g, () => "$$");
}

export function unescapeComposeValue(value: string): string {
  return value.replace(/\$\$/g, () => "$");
}

/**
 * Escape a value for insertion in a document of the given mode
 */
export function escapeForMode(value: string, mode: EscapeMode): string {
  return mode === "compose" ? escapeComposeValue(value) : value;
}
