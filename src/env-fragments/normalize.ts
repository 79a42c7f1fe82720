/**
 * Compose environment normalization
 *
 * Compose accepts `environment` as a list (`- NAME=value`, `- NAME`) or a
 * mapping whose values may be strings, numbers, booleans or null. Both
 * forms are normalized to an EnvMapping before merging.
 */

import { ConfigValidationError } from "../errors";
import { EnvMapping, EnvValue } from "./types";

function invalid(source: string, path: string, message: string): ConfigValidationError {
  return new ConfigValidationError(source, [{ code: "INVALID_ENVIRONMENT", message, path }]);
}

function normalizeValue(value: unknown, source: string, path: string): EnvValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (typeof value === "object" && !Array.isArray(value)) {
    return normalizeMapping(value, source, path);
  }
  throw invalid(source, path, "Environment values must be strings, numbers, booleans or mappings");
}

function normalizeMapping(value: object, source: string, path: string): EnvMapping {
  const mapping: EnvMapping = {};
  for (const [key, child] of Object.entries(value)) {
    mapping[key] = normalizeValue(child, source, `${path}.${key}`);
  }
  return mapping;
}

/**
 * Normalize a Compose `environment` value to a mapping
 *
 * @param environment - Raw value from a parsed document
 * @param source - Document name for error messages
 * @param path - Path of the value inside the document
 * @throws ConfigValidationError on shapes Compose does not accept
 */
export function normalizeComposeEnvironment(
  environment: unknown,
  source: string,
  path = "environment"
): EnvMapping {
  if (environment === null || environment === undefined) return {};

  if (Array.isArray(environment)) {
    const mapping: EnvMapping = {};
    environment.forEach((entry: unknown, index) => {
      if (typeof entry !== "string") {
        throw invalid(source, `${path}[${index}]`, "Environment list entries must be strings");
      }
      const separator = entry.indexOf("=");
      if (separator === 0) {
        throw invalid(source, `${path}[${index}]`, `Environment entry "${entry}" has no name`);
      }
      if (separator < 0) {
        mapping[entry] = null;
      } else {
        mapping[entry.slice(0, separator)] = entry.slice(separator + 1);
      }
    });
    return mapping;
  }

  if (typeof environment === "object") {
    return normalizeMapping(environment, source, path);
  }

  throw invalid(source, path, "Environment must be a list or a mapping");
}
