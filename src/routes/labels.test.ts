/**
 * Tests for Docker label output
 */

import { describe, it, expect } from "vitest";
import { ConfigValidationError } from "../errors";
import { resolveHubConfig } from "../hub-config";
import { generateRouteLabels, mergeLabels, normalizeComposeLabels } from "./labels";
import { generateDashboardRoutes, generateServiceRoutes } from "./matrix";
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

describe("generateRouteLabels", () => {
  it("labels every router, middleware and the service port", () => {
    expect(generateRouteLabels(generateServiceRoutes(whoami, config))).toEqual({
      "traefik.enable": "true",
      "traefik.http.routers.whoami-http-public.rule": "Host(`whoami.example.com`)",
      "traefik.http.routers.whoami-http-public.entrypoints": "web",
      "traefik.http.routers.whoami-http-public.middlewares": "whoami-http-public-headers",
      "traefik.http.routers.whoami-http-public.service": "svc-whoami",
      "traefik.http.routers.whoami-https-public.rule": "Host(`whoami.example.com`)",
      "traefik.http.routers.whoami-https-public.entrypoints": "websecure",
      "traefik.http.routers.whoami-https-public.middlewares": "whoami-https-public-headers",
      "traefik.http.routers.whoami-https-public.service": "svc-whoami",
      "traefik.http.routers.whoami-https-public.tls": "true",
      "traefik.http.routers.whoami-https-public.tls.certresolver": "prod",
      "traefik.http.middlewares.whoami-http-public-headers.headers.customrequestheaders.X-Route-Info":
        "entrypoint=web; router=whoami-http-public",
      "traefik.http.middlewares.whoami-https-public-headers.headers.customrequestheaders.X-Route-Info":
        "entrypoint=websecure; cert_resolver=prod; router=whoami-https-public",
      "traefik.http.services.svc-whoami.loadbalancer.server.port": "80",
    });
  });

  it("labels the strip-prefix middleware of path routers", () => {
    const labels = generateRouteLabels(
      generateServiceRoutes({ ...whoami, routing: { path: true } }, config)
    );
    expect(labels["traefik.http.routers.whoami-http-public-path.middlewares"]).toBe(
      "whoami-strip-prefix,whoami-http-public-path-headers"
    );
    expect(labels["traefik.http.middlewares.whoami-strip-prefix.stripprefix.prefixes"]).toBe(
      "/whoami"
    );
  });

  it("returns no labels for a service without routes", () => {
    expect(generateRouteLabels(generateServiceRoutes({ ...whoami, visibility: {} }, config))).toEqual(
      {}
    );
  });

  it("escapes dollar signs in compose mode only", () => {
    const dashboard = generateDashboardRoutes({
      ...config,
      traefikDashboardHtpasswd: "admin:$2y$05$abc",
    });
    if (!dashboard) throw new Error("Expected dashboard routes");

    const key = "traefik.http.middlewares.traefik-dashboard-auth.basicauth.users";
    expect(generateRouteLabels(dashboard)[key]).toBe("admin:$$2y$$05$$abc");
    expect(generateRouteLabels(dashboard, { escape: "none" })[key]).toBe("admin:$2y$05$abc");
  });
});

describe("normalizeComposeLabels", () => {
  it("accepts the list form", () => {
    expect(normalizeComposeLabels(["a=1", "b=x=y", "c"], "compose.yml")).toEqual({
      a: "1",
      b: "x=y",
      c: "",
    });
  });

  it("stringifies mapping values", () => {
    expect(normalizeComposeLabels({ a: 1, b: true, c: null }, "compose.yml")).toEqual({
      a: "1",
      b: "true",
      c: "",
    });
  });

  it("treats absent labels as empty", () => {
    expect(normalizeComposeLabels(undefined, "compose.yml")).toEqual({});
  });

  it("rejects other shapes", () => {
    expect(() => normalizeComposeLabels("a=1", "compose.yml")).toThrow(ConfigValidationError);
    expect(() => normalizeComposeLabels({ a: { b: 1 } }, "compose.yml")).toThrow(
      'Label "a" must be a scalar'
    );
  });
});

describe("mergeLabels", () => {
  it("lets generated labels win and reports the overridden keys", () => {
    const merged = mergeLabels(
      { "traefik.enable": "false", "com.example.team": "ops", "traefik.http.x": "same" },
      { "traefik.enable": "true", "traefik.http.x": "same" }
    );
    expect(merged.labels).toEqual({
      "traefik.enable": "true",
      "com.example.team": "ops",
      "traefik.http.x": "same",
    });
    expect(merged.overridden).toEqual(["traefik.enable"]);
  });
});
