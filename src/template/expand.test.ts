/**
 * Tests for template variable expansion
 */

import { describe, it, expect } from "vitest";
import * as yaml from "js-yaml";
import { TemplateExpansionError } from "../errors";
import { collectVariableReferences, expandTemplate, parseTemplate } from "./expand";
import { unescapeComposeValue } from "./escape";
import { VariableSource } from "./sources";
import { loadYamlTemplate } from "./yaml-template";

function source(values: Record<string, string>, name = "test"): VariableSource {
  return { name, values };
}

describe("expandTemplate", () => {
  describe("required references", () => {
    it("substitutes braced references", () => {
      expect(expandTemplate("host: ${HOST}", [source({ HOST: "example.com" })])).toBe(
        "host: example.com"
      );
    });

    it("substitutes bare references", () => {
      expect(expandTemplate("$A-$B", [source({ A: "x", B: "y" })])).toBe("x-y");
    });

    it("stops a bare reference at the first non-name character", () => {
      expect(expandTemplate("$SUB.example.com", [source({ SUB: "whoami" })])).toBe(
        "whoami.example.com"
      );
    });

    it("substitutes an empty value for a set-but-empty variable", () => {
      expect(expandTemplate("[${A}]", [source({ A: "" })])).toBe("[]");
    });

    it("fails with the variable and template name when unset", () => {
      try {
        expandTemplate("level: ${LOG_LEVEL}", [], { templateName: "traefik.yml" });
        expect.fail("expected TemplateExpansionError");
      } catch (error) {
        expect(error).toBeInstanceOf(TemplateExpansionError);
        const e = error as TemplateExpansionError;
        expect(e.variable).toBe("LOG_LEVEL");
        expect(e.template).toBe("traefik.yml");
        expect(e.message).toBe('Unresolved variable "LOG_LEVEL" in template traefik.yml');
      }
    });
  });

  describe("defaulted references", () => {
    const template = "${VAR:-D}";

    it("yields the default when the variable is unset", () => {
      expect(expandTemplate(template, [])).toBe("D");
    });

    it("yields the default when the variable is empty", () => {
      expect(expandTemplate(template, [source({ VAR: "" })])).toBe("D");
    });

    it("yields the value when the variable is set", () => {
      expect(expandTemplate(template, [source({ VAR: "X" })])).toBe("X");
    });

    it("keeps an empty value for the dash-only form", () => {
      expect(expandTemplate("[${VAR-D}]", [source({ VAR: "" })])).toBe("[]");
      expect(expandTemplate("[${VAR-D}]", [])).toBe("[D]");
    });

    it("allows an empty default", () => {
      expect(expandTemplate("[${VAR:-}]", [])).toBe("[]");
    });

    it("expands chained defaults", () => {
      const chained = "${A:-${B:-c}}";
      expect(expandTemplate(chained, [])).toBe("c");
      expect(expandTemplate(chained, [source({ B: "b" })])).toBe("b");
      expect(expandTemplate(chained, [source({ A: "a", B: "b" })])).toBe("a");
    });

    it("does not evaluate an unused default", () => {
      expect(expandTemplate("${A:-${MISSING}}", [source({ A: "a" })])).toBe("a");
    });

    it("fails when a used default holds an unresolved required reference", () => {
      expect(() => expandTemplate("${A:-${MISSING}}", [])).toThrow(TemplateExpansionError);
    });

    it("keeps literal text around nested references in a default", () => {
      expect(
        expandTemplate("${HOSTNAME:-${SUB:-whoami}-host}", [source({ SUB: "echo" })])
      ).toBe("echo-host");
    });
  });

  describe("error references", () => {
    it("fails with the custom message when unset", () => {
      expect(() => expandTemplate("${DOMAIN:?set DOMAIN first}", [])).toThrow(
        'Unresolved variable "DOMAIN" in template <inline>: set DOMAIN first'
      );
    });

    it("fails on empty for the colon form only", () => {
      expect(() => expandTemplate("${A:?required}", [source({ A: "" })])).toThrow(
        TemplateExpansionError
      );
      expect(expandTemplate("[${A?required}]", [source({ A: "" })])).toBe("[]");
    });
  });

  describe("source ordering", () => {
    it("uses the first source that defines the variable", () => {
      const sources = [source({ A: "first" }, "one"), source({ A: "second" }, "two")];
      expect(expandTemplate("${A}", sources)).toBe("first");
    });

    it("falls through sources that do not define the variable", () => {
      const sources = [source({}, "one"), source({ A: "second" }, "two")];
      expect(expandTemplate("${A}", sources)).toBe("second");
    });

    it("does not fall through on an empty value", () => {
      const sources = [source({ A: "" }, "one"), source({ A: "second" }, "two")];
      expect(expandTemplate("${A:-default}", sources)).toBe("default");
    });
  });

  describe("escaping", () => {
    const hash = "admin:$2y$05$abcdefghijklmnopqrstuv";

    it("reads $$ as a literal dollar in none mode", () => {
      expect(expandTemplate("cost: $$5", [])).toBe("cost: $5");
    });

    it("keeps $$ escaped in compose mode", () => {
      expect(expandTemplate("cost: $$5", [], { escape: "compose" })).toBe("cost: $$5");
    });

    it("inserts values verbatim in none mode", () => {
      expect(expandTemplate("${HASH}", [source({ HASH: hash })])).toBe(hash);
    });

    it("doubles every dollar of a substituted value in compose mode", () => {
      expect(expandTemplate("${HASH}", [source({ HASH: hash })], { escape: "compose" })).toBe(
        "admin:$$2y$$05$$abcdefghijklmnopqrstuv"
      );
    });

    it("does not scan substituted values for references", () => {
      expect(expandTemplate("${A}", [source({ A: "${B}" })])).toBe("${B}");
    });

    it("round-trips a value with dollars through a generated compose document", () => {
      const template = 'environment:\n  AUTH: "${HASH}"\n';
      const expanded = expandTemplate(template, [source({ HASH: hash })], {
        escape: "compose",
      });
      const parsed = yaml.load(expanded) as { environment: { AUTH: string } };
      expect(unescapeComposeValue(parsed.environment.AUTH)).toBe(hash);
    });

    it("keeps a lone dollar", () => {
      expect(expandTemplate("a $ b", [])).toBe("a $ b");
    });
  });

  describe("malformed templates", () => {
    it("rejects an unterminated reference", () => {
      expect(() => expandTemplate("${A:-oops", [])).toThrow(
        'Unresolved variable "A" in template <inline>: unterminated variable reference'
      );
    });

    it("rejects an invalid variable name", () => {
      expect(() => expandTemplate("${1A}", [])).toThrow(TemplateExpansionError);
    });

    it("rejects an unknown operator", () => {
      expect(() => expandTemplate("${A+b}", [])).toThrow(/invalid interpolation format/);
    });
  });
});

describe("parseTemplate", () => {
  it("splits text, dollars and references", () => {
    expect(parseTemplate("a$$b${C}")).toEqual([
      { kind: "text", value: "a" },
      { kind: "dollar" },
      { kind: "text", value: "b" },
      { kind: "ref", name: "C", operator: "", argument: [], argumentText: "", offset: 4 },
    ]);
  });
});

describe("collectVariableReferences", () => {
  it("lists references with their defaults, nested ones included", () => {
    const refs = collectVariableReferences("${HOSTNAME:-${SUBDOMAIN:-whoami}} ${PARENT_DNS_DOMAIN}");
    expect(refs).toEqual([
      { name: "HOSTNAME", operator: ":-", defaultText: "${SUBDOMAIN:-whoami}", nested: false },
      { name: "SUBDOMAIN", operator: ":-", defaultText: "whoami", nested: true },
      { name: "PARENT_DNS_DOMAIN", operator: "", nested: false },
    ]);
  });
});

describe("loadYamlTemplate", () => {
  it("expands then parses", () => {
    const doc = loadYamlTemplate("log:\n  level: ${LEVEL:-INFO}\n", []);
    expect(doc).toEqual({ log: { level: "INFO" } });
  });

  it("reports unparseable expanded output as a template error", () => {
    expect(() =>
      loadYamlTemplate("a: [${A}\n", [source({ A: "1" })], { templateName: "bad.yml" })
    ).toThrow(/Invalid template bad.yml: expanded YAML is invalid/);
  });
});
