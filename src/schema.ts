/**
 * JSON Schema validation
 *
 * Schemas live in schema/ at the package root and are compiled once per
 * process with Ajv (draft 2020-12).
 */

import * as fs from "fs";
import * as path from "path";
import Ajv2020, { AnySchema, ErrorObject } from "ajv/dist/2020";
import { ValidationError } from "./errors";

/** Directory holding the JSON Schemas */
const SCHEMA_DIR = path.resolve(__dirname, "../schema");

type DocumentValidator = ReturnType<InstanceType<typeof Ajv2020>["compile"]>;

/** Cached Ajv validator instances, by schema file name */
const cachedValidators = new Map<string, DocumentValidator>();

/**
 * Get or create the validator for a schema file
 */
export function getSchemaValidator(fileName: string): DocumentValidator {
  const cached = cachedValidators.get(fileName);
  if (cached) {
    return cached;
  }

  const schemaContent = fs.readFileSync(path.join(SCHEMA_DIR, fileName), "utf-8");
  const schema = JSON.parse(schemaContent) as AnySchema;

  const ajv = new Ajv2020({
    strict: false,
    allErrors: true,
  });

  const validator = ajv.compile(schema);
  cachedValidators.set(fileName, validator);
  return validator;
}

/**
 * Convert an Ajv error to a ValidationError
 *
 * @param prefix - Dotted path prepended to every field path (e.g., "stacks.whoami")
 * @param unknownCode - Code reported for properties the schema does not allow
 */
export function toValidationError(
  error: ErrorObject,
  prefix?: string,
  unknownCode = "UNKNOWN_SETTING"
): ValidationError {
  const segments = error.instancePath.split("/").filter((segment) => segment !== "");
  if (prefix !== undefined) segments.unshift(prefix);

  const extra: unknown = error.params.additionalProperty;
  if (error.keyword === "additionalProperties" && typeof extra === "string") {
    return {
      code: unknownCode,
      message: `Unknown setting "${extra}"`,
      path: [...segments, extra].join("."),
    };
  }
  const fieldPath = segments.length > 0 ? segments.join(".") : undefined;
  return {
    code: "SCHEMA_VIOLATION",
    message: `${fieldPath ?? "document"} ${error.message ?? "is invalid"}`,
    path: fieldPath,
  };
}

/**
 * Validate a parsed document against a schema file
 *
 * @returns every violation; empty when the document is valid
 */
export function validateAgainstSchema(
  fileName: string,
  data: unknown,
  prefix?: string
): ValidationError[] {
  const validate = getSchemaValidator(fileName);
  if (validate(data)) return [];
  return (validate.errors ?? []).map((error) => toValidationError(error, prefix));
}
