/**
 * Command line parsing
 *
 * Global flags may appear anywhere on the line. Both `--flag value` and
 * `--flag=value` are accepted.
 */

import { UsageError } from "../errors";
import { isLogLevel } from "../logger";

export interface GlobalOptions {
  readonly projectDir?: string;
  readonly logLevel?: string;
  readonly traceback: boolean;
}

export type Command =
  | { readonly kind: "build"; readonly vars: readonly string[]; readonly dryRun: boolean }
  | { readonly kind: "validate"; readonly vars: readonly string[] }
  | { readonly kind: "config-get"; readonly key: string }
  | { readonly kind: "config-set"; readonly key: string; readonly value: string }
  | { readonly kind: "config-unset"; readonly key: string }
  | { readonly kind: "config-list" }
  | { readonly kind: "config-set-password"; readonly username: string; readonly password: string }
  | { readonly kind: "config-set-portainer-password"; readonly password: string }
  | {
      readonly kind: "config-init";
      readonly parentDnsDomain?: string;
      readonly defaultCertResolver?: string;
    }
  | { readonly kind: "version" }
  | { readonly kind: "help" };

export interface ParsedArgs {
  readonly global: GlobalOptions;
  readonly command: Command;
}

export const USAGE = [
  "Usage: hub [global options] <command>",
  "",
  "Commands:",
  "  build [--var NAME=value]... [--dry-run]   Generate build/ artifacts",
  "  validate [--var NAME=value]...            Check everything a build checks, write nothing",
  "  config get <key>                          Print the effective value of a setting",
  "  config set <key> <value>                  Change a setting in config.yml",
  "  config unset <key>                        Remove an optional setting",
  "  config list                               List every setting",
  "  config set-password <user> <password>     Set the Traefik dashboard credential (bcrypt)",
  "  config set-portainer-password <password>  Set the initial Portainer admin password (bcrypt)",
  "  config init [--parent-dns-domain <domain>] [--default-cert-resolver <name>]",
  "  version                                   Print the version",
  "",
  "Global options:",
  "  --project-dir <dir>   Hub project directory (default: $HUB_PROJECT_DIR or cwd)",
  "  --log-level <level>   debug, info, warn, error or silent (default: $HUB_LOG_LEVEL or warn)",
  "  --traceback           Print stack traces for errors",
  "  -h, --help            Show this help",
].join("\n");

/** Flags that take a value, by the commands that accept them */
const VALUE_FLAGS: Readonly<Record<string, readonly string[] | "global">> = {
  "--project-dir": "global",
  "--log-level": "global",
  "--var": ["build", "validate"],
  "--parent-dns-domain": ["config"],
  "--default-cert-resolver": ["config"],
};

const BOOLEAN_FLAGS: Readonly<Record<string, readonly string[] | "global">> = {
  "--traceback": "global",
  "--help": "global",
  "-h": "global",
  "--dry-run": ["build"],
};

interface Scanned {
  readonly positionals: string[];
  readonly values: Map<string, string[]>;
  readonly booleans: Set<string>;
}

function scan(argv: readonly string[]): Scanned {
  const positionals: string[] = [];
  const values = new Map<string, string[]>();
  const booleans = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--") {
      positionals.push(...argv.slice(i + 1));
      break;
    }
    if (!arg.startsWith("-") || arg === "-") {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    if (flag in VALUE_FLAGS) {
      let value: string | undefined;
      if (eq !== -1) {
        value = arg.slice(eq + 1);
      } else {
        value = argv[i + 1];
        i++;
      }
      if (value === undefined) {
        throw new UsageError(`Missing value for ${flag}`);
      }
      values.set(flag, [...(values.get(flag) ?? []), value]);
    } else if (flag in BOOLEAN_FLAGS) {
      if (eq !== -1) {
        throw new UsageError(`${flag} does not take a value`);
      }
      booleans.add(flag);
    } else {
      throw new UsageError(`Unknown option ${arg}`);
    }
  }
  return { positionals, values, booleans };
}

function checkFlagsAllowed(scanned: Scanned, command: string): void {
  const flags = [...scanned.values.keys(), ...scanned.booleans];
  for (const flag of flags) {
    const scope = VALUE_FLAGS[flag] ?? BOOLEAN_FLAGS[flag];
    if (scope !== "global" && !scope.includes(command)) {
      throw new UsageError(`Option ${flag} is not valid for "${command}"`);
    }
  }
}

function single(scanned: Scanned, flag: string): string | undefined {
  const values = scanned.values.get(flag);
  if (values === undefined) return undefined;
  if (values.length > 1) {
    throw new UsageError(`${flag} given more than once`);
  }
  return values[0];
}

function expectArity(command: string, args: readonly string[], names: readonly string[]): void {
  if (args.length !== names.length) {
    const expected = names.map((name) => `<${name}>`).join(" ");
    throw new UsageError(`Usage: hub ${command}${expected ? ` ${expected}` : ""}`);
  }
}

function parseConfigCommand(args: readonly string[], scanned: Scanned): Command {
  const sub: string | undefined = args[0];
  const rest = args.slice(1);
  if (sub !== "init" && (scanned.values.has("--parent-dns-domain") || scanned.values.has("--default-cert-resolver"))) {
    throw new UsageError(`Options --parent-dns-domain and --default-cert-resolver are only valid for "config init"`);
  }
  switch (sub) {
    case "get":
      expectArity("config get", rest, ["key"]);
      return { kind: "config-get", key: rest[0] };
    case "set":
      expectArity("config set", rest, ["key", "value"]);
      return { kind: "config-set", key: rest[0], value: rest[1] };
    case "unset":
      expectArity("config unset", rest, ["key"]);
      return { kind: "config-unset", key: rest[0] };
    case "list":
      expectArity("config list", rest, []);
      return { kind: "config-list" };
    case "set-password":
      expectArity("config set-password", rest, ["user", "password"]);
      return { kind: "config-set-password", username: rest[0], password: rest[1] };
    case "set-portainer-password":
      expectArity("config set-portainer-password", rest, ["password"]);
      return { kind: "config-set-portainer-password", password: rest[0] };
    case "init": {
      expectArity("config init", rest, []);
      const parentDnsDomain = single(scanned, "--parent-dns-domain");
      const defaultCertResolver = single(scanned, "--default-cert-resolver");
      return {
        kind: "config-init",
        ...(parentDnsDomain !== undefined && { parentDnsDomain }),
        ...(defaultCertResolver !== undefined && { defaultCertResolver }),
      };
    }
    case undefined:
      throw new UsageError(
        "Missing config subcommand (get, set, unset, list, init, set-password or set-portainer-password)"
      );
    default:
      throw new UsageError(`Unknown config subcommand "${sub}"`);
  }
}

/**
 * Parse a command line (without the node and script arguments)
 *
 * @throws UsageError
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const scanned = scan(argv);
  const logLevel = single(scanned, "--log-level");
  if (logLevel !== undefined && !isLogLevel(logLevel.toLowerCase()) && logLevel.toLowerCase() !== "warning") {
    throw new UsageError(`Invalid --log-level "${logLevel}"`);
  }
  const projectDir = single(scanned, "--project-dir");
  const global: GlobalOptions = {
    ...(projectDir !== undefined && { projectDir }),
    ...(logLevel !== undefined && { logLevel }),
    traceback: scanned.booleans.has("--traceback"),
  };

  const name: string | undefined = scanned.positionals[0];
  const args = scanned.positionals.slice(1);
  if (scanned.booleans.has("--help") || scanned.booleans.has("-h") || name === "help") {
    return { global, command: { kind: "help" } };
  }
  if (name === undefined) {
    throw new UsageError("Missing command");
  }
  checkFlagsAllowed(scanned, name);

  const vars = scanned.values.get("--var") ?? [];
  switch (name) {
    case "build":
      expectArity("build", args, []);
      return { global, command: { kind: "build", vars, dryRun: scanned.booleans.has("--dry-run") } };
    case "validate":
      expectArity("validate", args, []);
      return { global, command: { kind: "validate", vars } };
    case "config":
      return { global, command: parseConfigCommand(args, scanned) };
    case "version":
      expectArity("version", args, []);
      return { global, command: { kind: "version" } };
    default:
      throw new UsageError(`Unknown command "${name}"`);
  }
}
