/**
 * Reading and parsing config.yml
 *
 * There is no cache: ConfigStore reads the file fresh on every call.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { CONFIG_DOCUMENT_VERSION, CONFIG_FILE_NAME } from "../constants";
import { ConfigValidationError, ValidationError } from "../errors";
import { validateAgainstSchema } from "../schema";
import { HubConfigDocument } from "./types";
import { assertValidHubConfigFile } from "./validation";

/**
 * Error thrown when config.yml does not exist
 */
export class ConfigNotFoundError extends ConfigValidationError {
  constructor(public readonly configPath: string) {
    super(configPath, [
      {
        code: "CONFIG_NOT_FOUND",
        message: `Configuration file not found. Run: hub config init`,
      },
    ]);
    this.name = "ConfigNotFoundError";
  }
}

/**
 * Error thrown when config.yml is not valid YAML
 */
export class ConfigParseError extends ConfigValidationError {
  constructor(
    configPath: string,
    public readonly parseError: string
  ) {
    super(configPath, [{ code: "CONFIG_PARSE_ERROR", message: `YAML parse error: ${parseError}` }]);
    this.name = "ConfigParseError";
  }
}

export function getConfigPath(projectDir: string): string {
  return path.join(projectDir, CONFIG_FILE_NAME);
}

// ============================================================================
// Schema validation
// ============================================================================

/** JSON Schema file for config.yml, under schema/ */
export const CONFIG_SCHEMA_FILE = "hub-config.schema.json";

/**
 * Check the shape of a parsed config document against the JSON Schema
 */
export function validateConfigDocumentShape(data: unknown): ValidationError[] {
  return validateAgainstSchema(CONFIG_SCHEMA_FILE, data);
}

export function isConfigDocument(data: unknown): data is HubConfigDocument {
  return validateConfigDocumentShape(data).length === 0;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Read config.yml as text
 *
 * @throws ConfigNotFoundError if the file does not exist
 */
export function readConfigText(configPath: string): string {
  if (!fs.existsSync(configPath)) {
    throw new ConfigNotFoundError(configPath);
  }
  return fs.readFileSync(configPath, "utf-8");
}

/**
 * Parse and validate config.yml content
 *
 * @param source - Document name for error messages
 * @throws ConfigParseError if the YAML is malformed
 * @throws ConfigValidationError if the document fails the schema or field rules
 */
export function parseConfigDocument(text: string, source: string): HubConfigDocument {
  let data: unknown;
  try {
    data = yaml.load(text, { filename: source });
  } catch (error) {
    const parseError = error instanceof Error ? error.message : String(error);
    throw new ConfigParseError(source, parseError);
  }

  if (!isConfigDocument(data)) {
    throw new ConfigValidationError(source, validateConfigDocumentShape(data));
  }
  if (data.version !== CONFIG_DOCUMENT_VERSION) {
    throw new ConfigValidationError(source, [
      {
        code: "UNSUPPORTED_VERSION",
        message: `Unsupported config version ${String(data.version)}; expected ${String(CONFIG_DOCUMENT_VERSION)}`,
        path: "version",
      },
    ]);
  }
  assertValidHubConfigFile(data.hub, source);
  return data;
}
