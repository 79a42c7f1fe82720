/**
 * Template variable expansion
 *
 * Supported reference forms (the Compose subset):
 *
 *   $VAR, ${VAR}     required; fails when VAR is unset
 *   ${VAR:-D}        VAR, or D when VAR is unset or empty
 *   ${VAR-D}         VAR, or D when VAR is unset
 *   ${VAR:?MSG}      VAR; fails with MSG when VAR is unset or empty
 *   ${VAR?MSG}       VAR; fails with MSG when VAR is unset
 *   $$               a literal "$"
 *
 * D may itself contain references (`${A:-${B:-c}}`); it is expanded only
 * when it is used. Expansion is a single left-to-right pass over the
 * template: substituted values are never scanned for references again.
 *
 * See ./escape.ts for how values are escaped in "compose" mode.
 */

import { TemplateExpansionError } from "../errors";
import { EscapeMode, escapeForMode } from "./escape";
import { VariableSource, resolveVariable, resolveWithDefault } from "./sources";

/** Reference operator, as written after the variable name */
export type ReferenceOperator = "" | ":-" | "-" | ":?" | "?";

export type TemplateNode =
  | { readonly kind: "text"; readonly value: string }
  | { readonly kind: "dollar" }
  | {
      readonly kind: "ref";
      readonly name: string;
      readonly operator: ReferenceOperator;
      /** Default value or error message, for operators that take one */
      readonly argument: readonly TemplateNode[];
      /** Source text of the argument, as written */
      readonly argumentText: string;
      /** Offset of the `$` in the template */
      readonly offset: number;
    };

export interface ExpandOptions {
  /** Template name used in error messages */
  readonly templateName?: string;
  /** How substituted values are escaped. Default: "none" */
  readonly escape?: EscapeMode;
}

const NAME_START = /[A-Za-z_]/;
const NAME_CHAR = /[A-Za-z0-9_]/;
const OPERATORS: readonly ReferenceOperator[] = [":-", ":?", "-", "?"];

class TemplateParser {
  private pos = 0;

  constructor(
    private readonly text: string,
    private readonly templateName: string
  ) {}

  parse(): TemplateNode[] {
    return this.parseSequence(undefined);
  }

  /**
   * Parse until end of input, or until the "}" closing the reference to
   * `enclosing` when parsing a default or message
   */
  private parseSequence(enclosing: string | undefined): TemplateNode[] {
    const inBraces = enclosing !== undefined;
    const nodes: TemplateNode[] = [];
    let buffer = "";
    const flush = (): void => {
      if (buffer.length > 0) {
        nodes.push({ kind: "text", value: buffer });
        buffer = "";
      }
    };

    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (inBraces && ch === "}") {
        flush();
        return nodes;
      }
      if (ch !== "$") {
        buffer += ch;
        this.pos++;
        continue;
      }

      const next = this.text[this.pos + 1] ?? "";
      if (next === "$") {
        flush();
        nodes.push({ kind: "dollar" });
        this.pos += 2;
      } else if (next === "{") {
        flush();
        nodes.push(this.parseBraced());
      } else if (NAME_START.test(next)) {
        flush();
        const offset = this.pos;
        this.pos++;
        const name = this.readName();
        nodes.push({ kind: "ref", name, operator: "", argument: [], argumentText: "", offset });
      } else {
        // A lone "$" is kept as-is
        buffer += ch;
        this.pos++;
      }
    }

    if (enclosing !== undefined) {
      throw new TemplateExpansionError(
        enclosing,
        this.templateName,
        "unterminated variable reference"
      );
    }
    flush();
    return nodes;
  }

  private parseBraced(): TemplateNode {
    const offset = this.pos;
    this.pos += 2; // "${"

    const name = this.readName();
    if (name.length === 0) {
      throw new TemplateExpansionError(
        undefined,
        this.templateName,
        `invalid variable name at offset ${String(offset)}`
      );
    }

    if (this.text[this.pos] === "}") {
      this.pos++;
      return { kind: "ref", name, operator: "", argument: [], argumentText: "", offset };
    }

    const operator = OPERATORS.find((op) => this.text.startsWith(op, this.pos));
    if (operator === undefined) {
      throw new TemplateExpansionError(
        name,
        this.templateName,
        `invalid interpolation format near "${this.text.slice(offset, this.pos + 1)}"`
      );
    }
    this.pos += operator.length;

    const argumentStart = this.pos;
    const argument = this.parseSequence(name);
    const argumentText = this.text.slice(argumentStart, this.pos);
    this.pos++; // closing "}"
    return { kind: "ref", name, operator, argument, argumentText, offset };
  }

  private readName(): string {
    const start = this.pos;
    if (this.pos < this.text.length && NAME_START.test(this.text[this.pos])) {
      this.pos++;
      while (this.pos < this.text.length && NAME_CHAR.test(this.text[this.pos])) {
        this.pos++;
      }
    }
    return this.text.slice(start, this.pos);
  }
}

/**
 * Parse a template into nodes
 *
 * @throws TemplateExpansionError on malformed references
 */
export function parseTemplate(template: string, templateName = "<inline>"): TemplateNode[] {
  return new TemplateParser(template, templateName).parse();
}

function evaluate(
  nodes: readonly TemplateNode[],
  sources: readonly VariableSource[],
  mode: EscapeMode,
  templateName: string
): string {
  let out = "";
  for (const node of nodes) {
    switch (node.kind) {
      case "text":
        out += node.value;
        break;
      case "dollar":
        out += mode === "compose" ? "$$" : "$";
        break;
      case "ref":
        out += evaluateReference(node, sources, mode, templateName);
        break;
    }
  }
  return out;
}

function evaluateReference(
  node: Extract<TemplateNode, { kind: "ref" }>,
  sources: readonly VariableSource[],
  mode: EscapeMode,
  templateName: string
): string {
  const expandArgument = (): string => evaluate(node.argument, sources, mode, templateName);

  switch (node.operator) {
    case ":-":
    case "-": {
      const resolved = resolveWithDefault(node.name, sources, expandArgument, {
        emptyIsUnset: node.operator === ":-",
      });
      // The default is already in output form; only looked-up values need escaping
      return resolved.defaulted ? resolved.value : escapeForMode(resolved.value, mode);
    }
    case "":
    case ":?":
    case "?": {
      const resolved = resolveVariable(node.name, sources);
      if (resolved === undefined || (node.operator === ":?" && resolved.value === "")) {
        const detail =
          node.operator === ""
            ? undefined
            : evaluate(node.argument, sources, "none", templateName) || undefined;
        throw new TemplateExpansionError(node.name, templateName, detail);
      }
      return escapeForMode(resolved.value, mode);
    }
  }
}

/**
 * Expand every variable reference in a template
 *
 * @param template - Template text
 * @param sources - Ordered variable sources, first match wins
 * @throws TemplateExpansionError when a required variable is unresolved
 */
export function expandTemplate(
  template: string,
  sources: readonly VariableSource[],
  options: ExpandOptions = {}
): string {
  const templateName = options.templateName ?? "<inline>";
  const nodes = parseTemplate(template, templateName);
  return evaluate(nodes, sources, options.escape ?? "none", templateName);
}

/** One variable reference found in a template */
export interface VariableReference {
  readonly name: string;
  readonly operator: ReferenceOperator;
  /** Default text as written, for ":-" and "-" references */
  readonly defaultText?: string;
  /** True when the reference sits inside another reference's default */
  readonly nested: boolean;
}

/**
 * List every variable reference in a template, defaults included
 */
export function collectVariableReferences(
  template: string,
  templateName = "<inline>"
): VariableReference[] {
  const references: VariableReference[] = [];
  const walk = (nodes: readonly TemplateNode[], nested: boolean): void => {
    for (const node of nodes) {
      if (node.kind !== "ref") continue;
      const takesDefault = node.operator === ":-" || node.operator === "-";
      references.push({
        name: node.name,
        operator: node.operator,
        ...(takesDefault && { defaultText: node.argumentText }),
        nested,
      });
      walk(node.argument, true);
    }
  };
  walk(parseTemplate(template, templateName), false);
  return references;
}
