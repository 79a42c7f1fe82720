/**
 * ConfigStore: typed access to config.yml
 *
 * Reads always go to disk. Writes edit the YAML document in place, so
 * comments and key order survive `hub config set`, and replace the file
 * atomically with mode 0600 (the file may hold a dashboard credential).
 */

import * as fs from "fs";
import { Document, isMap, parseDocument } from "yaml";
import { PRIVATE_ARTIFACT_MODE, writeFileAtomic } from "../artifacts";
import { CONFIG_DOCUMENT_VERSION } from "../constants";
import { ConfigValidationError, ValidationError } from "../errors";
import { Logger, silentLogger } from "../logger";
import { resolveHubConfig } from "./inference";
import { CONFIG_KEYS, parseConfigKey } from "./keys";
import {
  ConfigParseError,
  getConfigPath,
  isConfigDocument,
  parseConfigDocument,
  readConfigText,
  validateConfigDocumentShape,
} from "./loader";
import { EnvMap, HubConfig, HubConfigFile } from "./types";
import { validateDnsNameField, validateCertResolverField, validateHubConfigFile } from "./validation";

/** A config value as returned by get(): a scalar or an env map */
export type ConfigValue = string | EnvMap | Readonly<Record<string, EnvMap>>;

/** One row of `hub config list` */
export interface ConfigEntry {
  readonly key: string;
  /** Effective value; undefined when unset with no default */
  readonly value: string | undefined;
  /** True when the value comes from a default rather than config.yml */
  readonly defaulted: boolean;
}

export interface InitOptions {
  readonly parentDnsDomain?: string;
  /** Default: "staging" */
  readonly defaultCertResolver?: string;
}

const INIT_HEADER =
  " Hub configuration.\n" +
  " Change settings with `hub config set <key> <value>`;\n" +
  " `hub config list` shows every setting and its effective value.";

function scalarValue(config: HubConfig, key: keyof HubConfigFile): string | undefined {
  const value = config[key];
  return typeof value === "string" ? value : undefined;
}

export class ConfigStore {
  readonly configPath: string;

  constructor(
    readonly projectDir: string,
    private readonly logger: Logger = silentLogger
  ) {
    this.configPath = getConfigPath(projectDir);
  }

  /**
   * Load and resolve the configuration
   *
   * @throws ConfigValidationError
   */
  load(): HubConfig {
    const document = parseConfigDocument(readConfigText(this.configPath), this.configPath);
    return resolveHubConfig(document.hub, this.configPath);
  }

  /**
   * Effective value of a key, defaults applied
   *
   * Returns undefined for optional settings with no value.
   */
  get(key: string): ConfigValue | undefined {
    const { spec, path } = parseConfigKey(key);
    const config = this.load();
    let current: ConfigValue | undefined = config[spec.key];
    for (const segment of path.slice(1)) {
      if (current === undefined || typeof current === "string") return undefined;
      if (!Object.prototype.hasOwnProperty.call(current, segment)) return undefined;
      current = current[segment];
    }
    return current;
  }

  /**
   * Validate and persist a value
   *
   * @throws ConfigValidationError if the key is unknown or the value invalid
   * @throws FileWriteError if the file cannot be replaced
   */
  set(key: string, value: string): void {
    const { spec, path } = parseConfigKey(key);
    const fieldPath = `hub.${path.join(".")}`;

    if (spec.kind === "scalar") {
      if (value === "") {
        throw this.invalid(
          "EMPTY_VALUE",
          `Empty value for "${key}". Run: hub config unset ${key}`,
          fieldPath
        );
      }
      const error = spec.validate?.(value, fieldPath);
      if (error) throw new ConfigValidationError(this.configPath, [error]);
    } else {
      const depth = spec.kind === "env-map" ? 2 : 3;
      if (path.length !== depth) {
        const example = spec.kind === "env-map" ? `${spec.key}.NAME` : `${spec.key}.<stack>.NAME`;
        throw this.invalid(
          "NOT_A_SCALAR",
          `"${key}" is a mapping; set one entry with ${example}`,
          fieldPath
        );
      }
    }

    const document = this.readDocument();
    if (!isMap(document.get("hub"))) {
      document.set("hub", document.createNode({}));
    }
    document.setIn(["hub", ...path], value);
    this.checkDocument(document);
    this.persist(document);
    // The value is not logged: it may be a credential
    this.logger.info(`Set ${key} in ${this.configPath}`);
  }

  /**
   * Remove an optional setting
   *
   * @returns false if the key was not set
   */
  unset(key: string): boolean {
    const { spec, path } = parseConfigKey(key);
    if (spec.required && path.length === 1) {
      throw this.invalid("REQUIRED_KEY", `"${key}" is required and cannot be unset`, `hub.${key}`);
    }
    const document = this.readDocument();
    if (!document.hasIn(["hub", ...path])) {
      return false;
    }
    document.deleteIn(["hub", ...path]);
    this.checkDocument(document);
    this.persist(document);
    this.logger.info(`Unset ${key} in ${this.configPath}`);
    return true;
  }

  /**
   * Every recognized setting with its effective value
   *
   * Env map settings are listed one entry per variable.
   */
  list(): ConfigEntry[] {
    const document = parseConfigDocument(readConfigText(this.configPath), this.configPath);
    const config = resolveHubConfig(document.hub, this.configPath);
    const file = document.hub;
    const entries: ConfigEntry[] = [];

    for (const spec of CONFIG_KEYS) {
      switch (spec.kind) {
        case "scalar": {
          const raw = file[spec.key];
          entries.push({
            key: spec.key,
            value: scalarValue(config, spec.key),
            defaulted: raw === undefined || raw === "",
          });
          break;
        }
        case "env-map": {
          const map =
            spec.key === "baseStackEnv"
              ? config.baseStackEnv
              : spec.key === "baseAppStackEnv"
                ? config.baseAppStackEnv
                : config.portainerRuntimeEnv;
          for (const [name, value] of Object.entries(map)) {
            entries.push({ key: `${spec.key}.${name}`, value, defaulted: false });
          }
          break;
        }
        case "stack-env":
          for (const [stack, env] of Object.entries(config.stackEnv)) {
            for (const [name, value] of Object.entries(env)) {
              entries.push({ key: `stackEnv.${stack}.${name}`, value, defaulted: false });
            }
          }
          break;
      }
    }
    return entries;
  }

  /**
   * Write a starter config.yml
   *
   * @returns false if config.yml already exists (it is left untouched)
   */
  init(options: InitOptions = {}): boolean {
    if (fs.existsSync(this.configPath)) {
      return false;
    }

    const errors: ValidationError[] = [];
    const defaultCertResolver = options.defaultCertResolver ?? "staging";
    const resolverError = validateCertResolverField(defaultCertResolver, "hub.defaultCertResolver");
    if (resolverError) errors.push(resolverError);
    if (options.parentDnsDomain !== undefined) {
      const domainError = validateDnsNameField(options.parentDnsDomain, "hub.parentDnsDomain");
      if (domainError) errors.push(domainError);
    }
    if (errors.length > 0) {
      throw new ConfigValidationError(this.configPath, errors);
    }

    const hub: HubConfigFile = {
      ...(options.parentDnsDomain !== undefined && { parentDnsDomain: options.parentDnsDomain }),
      defaultCertResolver,
    };
    const document = new Document({ version: CONFIG_DOCUMENT_VERSION, hub });
    document.commentBefore = INIT_HEADER;
    this.persist(document);
    this.logger.info(`Created ${this.configPath}`);
    return true;
  }

  private invalid(code: string, message: string, path: string): ConfigValidationError {
    return new ConfigValidationError(this.configPath, [{ code, message, path }]);
  }

  private readDocument(): Document {
    const document = parseDocument(readConfigText(this.configPath));
    if (document.errors.length > 0) {
      throw new ConfigParseError(this.configPath, document.errors[0].message);
    }
    return document;
  }

  /**
   * Shape and field checks on an edited document
   *
   * Missing required settings are not reported here so that a fresh
   * config.yml can be filled in one `set` at a time.
   */
  private checkDocument(document: Document): void {
    const data: unknown = document.toJS();
    const shapeErrors = validateConfigDocumentShape(data);
    if (shapeErrors.length > 0 || !isConfigDocument(data)) {
      throw new ConfigValidationError(this.configPath, shapeErrors);
    }
    const result = validateHubConfigFile(data.hub);
    if (!result.valid) {
      const errors = result.errors.filter((e) => e.code !== "MISSING_REQUIRED");
      if (errors.length > 0) {
        throw new ConfigValidationError(this.configPath, errors);
      }
    }
  }

  private persist(document: Document): void {
    writeFileAtomic(this.configPath, document.toString(), PRIVATE_ARTIFACT_MODE);
  }
}
