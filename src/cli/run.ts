/**
 * `hub` command implementations
 */

import * as fs from "fs";
import * as path from "path";
import { buildHub, parseVarAssignments, UNSET_SOURCE, validateHub } from "../build";
import { EXIT_CODES, exitCodeFor, HubError, UsageError } from "../errors";
import { ConfigStore, ConfigValue, hashPassword, hashUsernamePassword } from "../hub-config";
import { createLogger, Logger, resolveLogLevel } from "../logger";
import { Command, ParsedArgs, parseArgs, USAGE } from "./args";

/** Process surroundings; tests pass their own */
export interface CliIo {
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly cwd: string;
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
}

const SECRET_NAME_PATTERN = /PASSWORD|PASSWD|SECRET|TOKEN/i;
const REDACTED = "<redacted>";

export function isSecretName(name: string): boolean {
  return SECRET_NAME_PATTERN.test(name);
}

export function readPackageVersion(): string {
  const packagePath = path.resolve(__dirname, "../../package.json");
  const parsed: unknown = JSON.parse(fs.readFileSync(packagePath, "utf-8"));
  if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
    return parsed.version;
  }
  return "unknown";
}

function toProjectPath(projectDir: string, filePath: string): string {
  return path.relative(projectDir, filePath).split(path.sep).join("/");
}

function configValueLines(value: ConfigValue, prefix: string): string[] {
  if (typeof value === "string") {
    return [prefix === "" ? value : `${prefix}=${value}`];
  }
  const record: Readonly<Record<string, ConfigValue>> = value;
  return Object.entries(record).flatMap(([name, child]) =>
    configValueLines(child, prefix === "" ? name : `${prefix}.${name}`)
  );
}

function runCommand(command: Command, projectDir: string, io: CliIo, logger: Logger): number {
  switch (command.kind) {
    case "help":
      for (const line of USAGE.split("\n")) {
        io.stdout(line);
      }
      return EXIT_CODES.success;

    case "version":
      io.stdout(readPackageVersion());
      return EXIT_CODES.success;

    case "build": {
      const result = buildHub({
        projectDir,
        logger,
        vars: parseVarAssignments(command.vars),
        processEnv: io.env,
        dryRun: command.dryRun,
      });
      const verb = command.dryRun ? "Would write" : "Wrote";
      for (const file of result.changed) {
        io.stdout(`${verb} ${toProjectPath(projectDir, file)}`);
      }
      io.stdout(`${String(result.changed.length)} changed, ${String(result.unchanged.length)} unchanged`);
      return EXIT_CODES.success;
    }

    case "validate": {
      const report = validateHub({
        projectDir,
        logger,
        vars: parseVarAssignments(command.vars),
        processEnv: io.env,
      });
      io.stdout(
        `Configuration OK: ${String(report.stacks.length)} stack(s), ${String(report.routers)} router(s), ${String(report.artifacts.length)} artifact(s)`
      );
      for (const usage of report.variables) {
        const value =
          usage.source === UNSET_SOURCE || usage.value === undefined
            ? "<unset>"
            : isSecretName(usage.name)
              ? REDACTED
              : usage.value;
        io.stdout(`${usage.template}: ${usage.name}=${value} (${usage.source})`);
      }
      return EXIT_CODES.success;
    }

    case "config-get": {
      const value = new ConfigStore(projectDir, logger).get(command.key);
      if (value !== undefined) {
        for (const line of configValueLines(value, "")) {
          io.stdout(line);
        }
      }
      return EXIT_CODES.success;
    }

    case "config-set":
      new ConfigStore(projectDir, logger).set(command.key, command.value);
      return EXIT_CODES.success;

    case "config-unset":
      if (!new ConfigStore(projectDir, logger).unset(command.key)) {
        logger.info(`${command.key} was not set`);
      }
      return EXIT_CODES.success;

    case "config-set-password":
      new ConfigStore(projectDir, logger).set(
        "traefikDashboardHtpasswd",
        hashUsernamePassword(command.username, command.password)
      );
      return EXIT_CODES.success;

    case "config-set-portainer-password":
      new ConfigStore(projectDir, logger).set("portainerInitialPasswordHash", hashPassword(command.password));
      return EXIT_CODES.success;

    case "config-list":
      for (const entry of new ConfigStore(projectDir, logger).list()) {
        const value =
          entry.value === undefined ? "" : isSecretName(entry.key) ? REDACTED : entry.value;
        io.stdout(`${entry.key}=${value}${entry.defaulted ? " (default)" : ""}`);
      }
      return EXIT_CODES.success;

    case "config-init": {
      const store = new ConfigStore(projectDir, logger);
      if (store.init(command)) {
        io.stdout(`Created ${store.configPath}`);
      } else {
        logger.warn(`${store.configPath} already exists; left unchanged`);
      }
      return EXIT_CODES.success;
    }
  }
}

function reportError(error: unknown, traceback: boolean, io: CliIo): void {
  if (error instanceof HubError) {
    io.stderr(`Error: ${error.message}`);
  } else if (error instanceof Error) {
    io.stderr(`Unexpected error: ${error.message}`);
  } else {
    io.stderr(`Unexpected error: ${String(error)}`);
  }
  if (error instanceof UsageError) {
    io.stderr('Run "hub --help" for usage.');
  }
  if (traceback && error instanceof Error && error.stack) {
    io.stderr(error.stack);
  }
}

/**
 * Run one `hub` invocation
 *
 * @returns the process exit code
 */
export function runCli(argv: readonly string[], io: CliIo): number {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (error) {
    reportError(error, argv.includes("--traceback"), io);
    return exitCodeFor(error);
  }

  const logger = createLogger(resolveLogLevel(parsed.global.logLevel, io.env), (_level, line) => {
    io.stderr(line);
  });
  const projectDir = path.resolve(io.cwd, parsed.global.projectDir ?? io.env.HUB_PROJECT_DIR ?? ".");
  logger.debug(`Project directory: ${projectDir}`);

  try {
    return runCommand(parsed.command, projectDir, io, logger);
  } catch (error) {
    reportError(error, parsed.global.traceback, io);
    return exitCodeFor(error);
  }
}
