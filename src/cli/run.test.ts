/**
 * Tests for the hub CLI, against a copy of examples/hub
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { EXIT_CODES } from "../errors";
import { ConfigStore, checkUsernamePassword } from "../hub-config";
import { isSecretName, readPackageVersion, runCli } from "./run";

const EXAMPLE_DIR = path.resolve(__dirname, "../../examples/hub");

let dir: string;
let stdout: string[];
let stderr: string[];

function run(argv: string[], env: Record<string, string> = {}): number {
  return runCli(argv, {
    env,
    cwd: dir,
    stdout: (line) => stdout.push(line),
    stderr: (line) => stderr.push(line),
  });
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "hub-cli-"));
  fs.cpSync(EXAMPLE_DIR, dir, { recursive: true });
  stdout = [];
  stderr = [];
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("hub build", () => {
  it("lists written artifacts relative to the project directory", () => {
    expect(run(["build"])).toBe(EXIT_CODES.success);
    expect(stdout).toEqual([
      "Wrote build/stacks/traefik/traefik-config.yml",
      "Wrote build/stacks/traefik/traefik-dynamic-config.yml",
      "Wrote build/stacks/traefik/.env",
      "Wrote build/stacks/whoami/docker-compose.yml",
      "Wrote build/stacks/whoami/.env",
      "Wrote build/stacks/portainer/.env",
      "Wrote build/stacks/portainer/injected-env-vars.yml",
      "7 changed, 0 unchanged",
    ]);
    expect(stderr).toEqual([]);
  });

  it("reports nothing changed on a rebuild", () => {
    run(["build"]);
    stdout = [];
    expect(run(["build"])).toBe(EXIT_CODES.success);
    expect(stdout).toEqual(["0 changed, 7 unchanged"]);
  });

  it("writes nothing with --dry-run", () => {
    expect(run(["build", "--dry-run"])).toBe(EXIT_CODES.success);
    expect(stdout[0]).toBe("Would write build/stacks/traefik/traefik-config.yml");
    expect(fs.existsSync(path.join(dir, "build"))).toBe(false);
  });

  it("finds the project through --project-dir or HUB_PROJECT_DIR", () => {
    const elsewhere = fs.mkdtempSync(path.join(os.tmpdir(), "hub-cwd-"));
    try {
      const io = {
        cwd: elsewhere,
        stdout: (line: string) => stdout.push(line),
        stderr: (line: string) => stderr.push(line),
      };
      expect(runCli(["--project-dir", dir, "build", "--dry-run"], { ...io, env: {} })).toBe(EXIT_CODES.success);
      expect(runCli(["build", "--dry-run"], { ...io, env: { HUB_PROJECT_DIR: dir } })).toBe(EXIT_CODES.success);
      expect(stdout.filter((line) => line === "7 changed, 0 unchanged")).toHaveLength(2);
    } finally {
      fs.rmSync(elsewhere, { recursive: true, force: true });
    }
  });

  it("rejects a malformed --var with the usage exit code", () => {
    expect(run(["build", "--var", "NOVALUE"])).toBe(EXIT_CODES.usage);
    expect(stderr).toEqual(['Error: Invalid --var "NOVALUE": expected NAME=value', 'Run "hub --help" for usage.']);
  });

  it("exits with the configuration code when config.yml is missing", () => {
    fs.rmSync(path.join(dir, "config.yml"));
    expect(run(["build"])).toBe(EXIT_CODES.configValidation);
    expect(stderr).toEqual([
      `Error: Invalid configuration in ${path.join(dir, "config.yml")}:\n  - Configuration file not found. Run: hub config init`,
    ]);
  });

  it("logs at the requested level on stderr", () => {
    run(["build", "--log-level", "info"]);
    expect(stderr).toContain("[info] Build complete: 7 changed, 0 unchanged");
  });
});

describe("hub validate", () => {
  it("prints a summary and every variable with its source", () => {
    expect(run(["validate"])).toBe(EXIT_CODES.success);
    expect(stdout[0]).toBe("Configuration OK: 1 stack(s), 10 router(s), 7 artifact(s)");
    expect(stdout).toContain("stacks/whoami/hub-stack.yml: SUBDOMAIN=whoami (stackEnv.whoami)");
    expect(stdout).toContain("stacks/traefik/traefik-config-template.yml: TRAEFIK_LOG_LEVEL=INFO (hub)");
    expect(fs.existsSync(path.join(dir, "build"))).toBe(false);
  });

  it("takes --var overrides", () => {
    run(["validate", "--var", "SUBDOMAIN=hello"]);
    expect(stdout).toContain("stacks/whoami/hub-stack.yml: SUBDOMAIN=hello (command line)");
  });
});

describe("hub config", () => {
  it("gets scalar and map settings", () => {
    expect(run(["config", "get", "parentDnsDomain"])).toBe(EXIT_CODES.success);
    expect(run(["config", "get", "stackEnv"])).toBe(EXIT_CODES.success);
    expect(stdout).toEqual(["example.com", "whoami.SUBDOMAIN=whoami", "whoami.GREETING=hello $USER"]);
  });

  it("sets and unsets a setting", () => {
    expect(run(["config", "set", "hubLanIp", "10.0.0.2"])).toBe(EXIT_CODES.success);
    run(["config", "get", "hubLanIp"]);
    expect(stdout).toEqual(["10.0.0.2"]);

    expect(run(["config", "unset", "hubLanIp"])).toBe(EXIT_CODES.success);
    run(["config", "get", "hubLanIp"]);
    expect(stdout).toEqual(["10.0.0.2"]);
  });

  it("rejects an invalid value with the configuration code", () => {
    expect(run(["config", "set", "hubLanIp", "not-an-ip"])).toBe(EXIT_CODES.configValidation);
    expect(stderr[0]).toMatch(/^Error: Invalid configuration in /);
  });

  it("stores a hashed dashboard credential with set-password", () => {
    expect(run(["config", "set-password", "operator", "test-password"])).toBe(EXIT_CODES.success);
    expect(stdout).toEqual([]);

    const entry = new ConfigStore(dir).load().traefikDashboardHtpasswd;
    expect(entry).toMatch(/^operator:\$2a\$10\$/);
    expect(checkUsernamePassword(entry ?? "", "operator", "test-password")).toBe(true);
  });

  it("stores a bare hash with set-portainer-password", () => {
    expect(run(["config", "set-portainer-password", "test-password"])).toBe(EXIT_CODES.success);

    const hash = new ConfigStore(dir).load().portainerInitialPasswordHash;
    expect(hash).toMatch(/^\$2a\$10\$[./A-Za-z0-9]{53}$/);
    expect(checkUsernamePassword(`admin:${hash ?? ""}`, "admin", "test-password")).toBe(true);
  });

  it("rejects a username the credential cannot hold", () => {
    expect(run(["config", "set-password", "ad:min", "test-password"])).toBe(EXIT_CODES.usage);
    expect(stderr[0]).toBe('Error: Invalid username "ad:min": must be non-empty, without ":" or whitespace');
  });

  it("lists settings with credentials redacted", () => {
    expect(run(["config", "list"])).toBe(EXIT_CODES.success);
    expect(stdout).toContain("parentDnsDomain=example.com");
    expect(stdout).toContain("traefikDashboardHtpasswd=<redacted>");
    expect(stdout).toContain("adminCertResolver=prod (default)");
    expect(stdout).toContain("baseStackEnv.TZ=UTC");
  });

  it("creates a starter config with init", () => {
    fs.rmSync(path.join(dir, "config.yml"));
    expect(run(["config", "init", "--parent-dns-domain", "example.org"])).toBe(EXIT_CODES.success);
    expect(stdout).toEqual([`Created ${path.join(dir, "config.yml")}`]);
    run(["config", "get", "defaultCertResolver"]);
    expect(stdout[1]).toBe("staging");
  });

  it("leaves an existing config alone on init", () => {
    const before = fs.readFileSync(path.join(dir, "config.yml"), "utf-8");
    expect(run(["config", "init"])).toBe(EXIT_CODES.success);
    expect(stderr).toEqual([`[warn] ${path.join(dir, "config.yml")} already exists; left unchanged`]);
    expect(fs.readFileSync(path.join(dir, "config.yml"), "utf-8")).toBe(before);
  });
});

describe("hub version and help", () => {
  it("prints the package version", () => {
    expect(run(["version"])).toBe(EXIT_CODES.success);
    expect(stdout).toEqual([readPackageVersion()]);
    expect(readPackageVersion()).toMatch(/^\d+\.\d+\.\d+/);
  });

  it("prints usage one line at a time", () => {
    expect(run(["--help"])).toBe(EXIT_CODES.success);
    expect(stdout[0]).toBe("Usage: hub [global options] <command>");
    expect(stdout).toContain("Commands:");
    expect(stdout.every((line) => !line.includes("\n"))).toBe(true);
  });

  it("reports unknown commands as usage errors", () => {
    expect(run(["deploy"])).toBe(EXIT_CODES.usage);
    expect(stderr[0]).toBe('Error: Unknown command "deploy"');
  });
});

describe("isSecretName", () => {
  it("matches credential-looking names", () => {
    expect(isSecretName("TRAEFIK_DASHBOARD_HTPASSWD")).toBe(true);
    expect(isSecretName("traefikDashboardHtpasswd")).toBe(true);
    expect(isSecretName("DB_PASSWORD")).toBe(true);
    expect(isSecretName("API_TOKEN")).toBe(true);
    expect(isSecretName("SUBDOMAIN")).toBe(false);
  });
});
