/**
 * Build verification tests
 *
 * Imports every module through the package entry point so a module that
 * fails to compile, or drops an export, fails here.
 */

import { describe, it, expect } from "vitest";
import * as hub from "./index";

describe("build verification", () => {
  it("all modules export expected functions", () => {
    // Config
    expect(typeof hub.ConfigStore).toBe("function");
    expect(typeof hub.hubConfig.parseConfigDocument).toBe("function");
    expect(typeof hub.hubConfig.resolveHubConfig).toBe("function");

    // Templates
    expect(typeof hub.template.expandTemplate).toBe("function");
    expect(typeof hub.template.escapeComposeValue).toBe("function");

    // Routes
    expect(typeof hub.routes.generateRouteMatrix).toBe("function");
    expect(typeof hub.routes.generateTraefikConfig).toBe("function");

    // Environment fragments
    expect(typeof hub.envFragments.mergeEnvFragments).toBe("function");

    // Artifacts
    expect(typeof hub.artifacts.writeArtifacts).toBe("function");

    // Stacks
    expect(typeof hub.stacks.discoverStacks).toBe("function");
    expect(typeof hub.stacks.loadStackManifest).toBe("function");

    // Pipeline and CLI
    expect(typeof hub.buildHub).toBe("function");
    expect(typeof hub.validateHub).toBe("function");
    expect(typeof hub.runCli).toBe("function");
  });

  it("error classes carry their exit codes", () => {
    expect(new hub.UsageError("bad").exitCode).toBe(hub.EXIT_CODES.usage);
    expect(hub.exitCodeFor(new Error("boom"))).toBe(hub.EXIT_CODES.unexpected);
  });
});
