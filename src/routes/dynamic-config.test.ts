/**
 * Tests for Traefik dynamic config generation
 *
 * These tests verify:
 * - Routers, middlewares and services from a route matrix
 * - TLS configuration on TLS entrypoints only
 * - Merging over a hand-written template
 * - Collisions with template-defined names
 */

import { describe, it, expect } from "vitest";
import { RouteCollisionError, TemplateExpansionError } from "../errors";
import { resolveHubConfig } from "../hub-config";
import {
  claimTemplateNames,
  generateTraefikConfig,
  mergeDynamicConfig,
  parseDynamicConfigTemplate,
  serializeTraefikConfig,
} from "./dynamic-config";
import { RouteNameRegistry, generateRouteMatrix } from "./matrix";
import { ServiceDescriptor } from "./types";

const config = resolveHubConfig(
  { parentDnsDomain: "example.com", defaultCertResolver: "prod" },
  "config.yml"
);

const whoami: ServiceDescriptor = {
  stack: "whoami",
  service: "whoami",
  subdomain: "whoami",
  visibility: { public: true },
  routing: { host: true },
  port: 80,
};

describe("generateTraefikConfig", () => {
  it("generates empty sections with no routes", () => {
    expect(generateTraefikConfig([])).toEqual({
      http: { routers: {}, services: {}, middlewares: {} },
    });
  });

  it("generates routers with TLS on TLS entrypoints only", () => {
    const traefik = generateTraefikConfig(generateRouteMatrix([whoami], config).entries);

    expect(traefik.http.routers["whoami-http-public"]).toEqual({
      rule: "Host(`whoami.example.com`)",
      service: "svc-whoami",
      entryPoints: ["web"],
      middlewares: ["whoami-http-public-headers"],
    });
    expect(traefik.http.routers["whoami-https-public"]).toEqual({
      rule: "Host(`whoami.example.com`)",
      service: "svc-whoami",
      entryPoints: ["websecure"],
      middlewares: ["whoami-https-public-headers"],
      tls: { certResolver: "prod" },
    });
    expect(traefik.http.services["svc-whoami"]).toEqual({
      loadBalancer: { servers: [{ url: "http://whoami:80" }] },
    });
    expect(Object.keys(traefik.http.middlewares)).toEqual([
      "whoami-http-public-headers",
      "whoami-https-public-headers",
    ]);
  });
});

describe("parseDynamicConfigTemplate", () => {
  it("treats an empty template as empty sections", () => {
    expect(parseDynamicConfigTemplate(null, "dyn.yml")).toEqual({
      name: "dyn.yml",
      sections: {},
      httpExtras: {},
      routers: {},
      middlewares: {},
      services: {},
    });
  });

  it("rejects sections that are not mappings", () => {
    expect(() => parseDynamicConfigTemplate({ http: { routers: ["x"] } }, "dyn.yml")).toThrow(
      TemplateExpansionError
    );
    expect(() => parseDynamicConfigTemplate("text", "dyn.yml")).toThrow(
      "Invalid template dyn.yml: the document must be a mapping"
    );
  });
});

describe("mergeDynamicConfig", () => {
  const template = parseDynamicConfigTemplate(
    {
      tls: { options: { default: { minVersion: "VersionTLS12" } } },
      http: {
        routers: { "portal-https": { rule: "Host(`portal.example.com`)", service: "portal" } },
        serversTransports: { insecure: { insecureSkipVerify: true } },
      },
    },
    "dyn.yml"
  );

  it("keeps template sections and puts generated entries after template ones", () => {
    const merged = mergeDynamicConfig(
      template,
      generateTraefikConfig(generateRouteMatrix([whoami], config).entries)
    );
    expect(merged.tls).toEqual({ options: { default: { minVersion: "VersionTLS12" } } });
    expect(merged.http.serversTransports).toEqual({ insecure: { insecureSkipVerify: true } });
    expect(Object.keys(merged.http.routers)).toEqual([
      "portal-https",
      "whoami-http-public",
      "whoami-https-public",
    ]);
  });

  it("rejects generated names the template already uses", () => {
    const registry = new RouteNameRegistry();
    claimTemplateNames(
      parseDynamicConfigTemplate({ http: { services: { "svc-whoami": {} } } }, "dyn.yml"),
      registry,
      "traefik"
    );
    try {
      generateRouteMatrix([whoami], config, { registry });
      expect.fail("expected RouteCollisionError");
    } catch (error) {
      expect(error).toBeInstanceOf(RouteCollisionError);
      expect((error as RouteCollisionError).kind).toBe("service");
      expect((error as RouteCollisionError).first).toEqual({ stack: "traefik", service: "dyn.yml" });
    }
  });

  it("accepts template names the generator never produces", () => {
    const registry = new RouteNameRegistry();
    claimTemplateNames(template, registry, "traefik");
    expect(() => generateRouteMatrix([whoami], config, { registry })).not.toThrow();
  });
});

describe("serializeTraefikConfig", () => {
  it("writes YAML", () => {
    expect(serializeTraefikConfig(generateTraefikConfig([]))).toBe(
      "http:\n  routers: {}\n  services: {}\n  middlewares: {}\n"
    );
  });
});
