/**
 * Tests for command line parsing
 */

import { describe, it, expect } from "vitest";
import { UsageError } from "../errors";
import { parseArgs } from "./args";

function usageMessage(argv: string[]): string | undefined {
  try {
    parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) return error.message;
    throw error;
  }
  return undefined;
}

describe("parseArgs", () => {
  it("parses build with repeated --var and --dry-run", () => {
    expect(parseArgs(["build", "--var", "A=1", "--var=B=2", "--dry-run"])).toEqual({
      global: { traceback: false },
      command: { kind: "build", vars: ["A=1", "B=2"], dryRun: true },
    });
  });

  it("accepts global options before or after the command", () => {
    expect(parseArgs(["--project-dir", "/srv/hub", "validate", "--log-level=debug", "--traceback"])).toEqual({
      global: { projectDir: "/srv/hub", logLevel: "debug", traceback: true },
      command: { kind: "validate", vars: [] },
    });
  });

  it("parses config subcommands", () => {
    expect(parseArgs(["config", "get", "hubLanIp"]).command).toEqual({ kind: "config-get", key: "hubLanIp" });
    expect(parseArgs(["config", "set", "stackEnv.whoami.SUBDOMAIN", "who"]).command).toEqual({
      kind: "config-set",
      key: "stackEnv.whoami.SUBDOMAIN",
      value: "who",
    });
    expect(parseArgs(["config", "unset", "hubLanIp"]).command).toEqual({ kind: "config-unset", key: "hubLanIp" });
    expect(parseArgs(["config", "list"]).command).toEqual({ kind: "config-list" });
    expect(parseArgs(["config", "set-password", "admin", "test-password"]).command).toEqual({
      kind: "config-set-password",
      username: "admin",
      password: "test-password",
    });
    expect(parseArgs(["config", "set-portainer-password", "test-password"]).command).toEqual({
      kind: "config-set-portainer-password",
      password: "test-password",
    });
    expect(parseArgs(["config", "init", "--parent-dns-domain", "example.com"]).command).toEqual({
      kind: "config-init",
      parentDnsDomain: "example.com",
    });
  });

  it("treats arguments after -- as positionals", () => {
    expect(parseArgs(["config", "set", "hubHostname", "--", "--odd"]).command).toEqual({
      kind: "config-set",
      key: "hubHostname",
      value: "--odd",
    });
  });

  it("returns help for --help and the help command", () => {
    expect(parseArgs(["--help"]).command).toEqual({ kind: "help" });
    expect(parseArgs(["build", "-h"]).command).toEqual({ kind: "help" });
    expect(parseArgs(["help"]).command).toEqual({ kind: "help" });
  });

  it("rejects malformed command lines", () => {
    expect(usageMessage([])).toBe("Missing command");
    expect(usageMessage(["deploy"])).toBe('Unknown command "deploy"');
    expect(usageMessage(["build", "--force"])).toBe("Unknown option --force");
    expect(usageMessage(["build", "--var"])).toBe("Missing value for --var");
    expect(usageMessage(["validate", "--dry-run"])).toBe('Option --dry-run is not valid for "validate"');
    expect(usageMessage(["build", "extra"])).toBe("Usage: hub build");
    expect(usageMessage(["config", "get"])).toBe("Usage: hub config get <key>");
    expect(usageMessage(["config"])).toBe(
      "Missing config subcommand (get, set, unset, list, init, set-password or set-portainer-password)"
    );
    expect(usageMessage(["config", "set-password", "admin"])).toBe("Usage: hub config set-password <user> <password>");
    expect(usageMessage(["config", "drop"])).toBe('Unknown config subcommand "drop"');
    expect(usageMessage(["--log-level", "loud", "build"])).toBe('Invalid --log-level "loud"');
    expect(usageMessage(["--traceback=yes", "build"])).toBe("--traceback does not take a value");
  });
});
