/**
 * Tests for hub configuration validation and inference
 */

import { describe, it, expect } from "vitest";
import {
  validateCertResolverField,
  validateDnsLabelField,
  validateDnsNameField,
  validateHtpasswdField,
  validateHubConfigFile,
  validateIpv4Field,
} from "./validation";
import { resolveHubConfig } from "./inference";
import { buildHubVariables } from "./hub-variables";

/** Well-formed bcrypt hash of no real password */
const TEST_BCRYPT_HASH = "$2a$04$" + "a".repeat(53);

describe("validateDnsNameField", () => {
  it("passes for valid names", () => {
    expect(validateDnsNameField("example.com", "p")).toBeNull();
    expect(validateDnsNameField("hub.home-lab.example.com", "p")).toBeNull();
    expect(validateDnsNameField("localhost", "p")).toBeNull();
  });

  it("fails for malformed names", () => {
    for (const name of ["Example.com", "example..com", "-example.com", "example.com.", "10.0.0.1"]) {
      const error = validateDnsNameField(name, "hub.parentDnsDomain");
      expect(error).not.toBeNull();
      expect(error!.code).toBe("INVALID_DNS_NAME");
      expect(error!.path).toBe("hub.parentDnsDomain");
    }
  });
});

describe("validateDnsLabelField", () => {
  it("rejects dotted names", () => {
    expect(validateDnsLabelField("hub", "p")).toBeNull();
    expect(validateDnsLabelField("hub.example", "p")!.code).toBe("INVALID_DNS_LABEL");
  });
});

describe("validateCertResolverField", () => {
  it("accepts resolver ids", () => {
    expect(validateCertResolverField("prod", "p")).toBeNull();
    expect(validateCertResolverField("letsencrypt_staging-2", "p")).toBeNull();
  });

  it("rejects spaces", () => {
    expect(validateCertResolverField("my resolver", "p")!.code).toBe("INVALID_CERT_RESOLVER");
  });
});

describe("validateIpv4Field", () => {
  it("checks dotted quads", () => {
    expect(validateIpv4Field("192.168.1.10", "p")).toBeNull();
    expect(validateIpv4Field("192.168.1.256", "p")).not.toBeNull();
    expect(validateIpv4Field("192.168.1", "p")).not.toBeNull();
    expect(validateIpv4Field("192.168.01.1", "p")).not.toBeNull();
  });
});

describe("validateHtpasswdField", () => {
  it("accepts the supported hash schemes", () => {
    expect(validateHtpasswdField("admin:$2y$05$abcdefghijklmnopqrstuv", "p")).toBeNull();
    expect(validateHtpasswdField("admin:$apr1$salt$hash", "p")).toBeNull();
    expect(validateHtpasswdField("admin:{SHA}c2VjcmV0", "p")).toBeNull();
  });

  it("rejects plain passwords and missing users", () => {
    expect(validateHtpasswdField("admin:test-secret", "p")!.code).toBe("INVALID_CREDENTIAL");
    expect(validateHtpasswdField(":$2y$05$abc", "p")).not.toBeNull();
    expect(validateHtpasswdField("admin:$2y$", "p")).not.toBeNull();
  });

  it("does not echo the value", () => {
    const error = validateHtpasswdField("admin:test-secret", "p");
    expect(error!.message).not.toContain("test-secret");
  });
});

describe("validateHubConfigFile", () => {
  it("passes a minimal section", () => {
    expect(
      validateHubConfigFile({ parentDnsDomain: "example.com", defaultCertResolver: "staging" })
    ).toEqual({ valid: true });
  });

  it("reports every missing required field", () => {
    const result = validateHubConfigFile({});
    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors.map((e) => e.path)).toEqual([
        "hub.parentDnsDomain",
        "hub.defaultCertResolver",
      ]);
    }
  });

  it("reports a clash between the Portainer and dashboard subdomains", () => {
    const result = validateHubConfigFile({
      parentDnsDomain: "example.com",
      defaultCertResolver: "staging",
      portainerSubdomain: "traefik",
    });
    expect(result).toEqual({
      valid: false,
      errors: [
        {
          code: "RESERVED_SUBDOMAIN_CLASH",
          message: 'The Traefik dashboard subdomain and the Portainer subdomain are both "traefik"',
          path: "hub.portainerSubdomain",
        },
      ],
    });
  });

  it("checks the Portainer secret and password hash", () => {
    const result = validateHubConfigFile({
      parentDnsDomain: "example.com",
      defaultCertResolver: "staging",
      portainerAgentSecret: "short",
      portainerInitialPasswordHash: "admin:" + TEST_BCRYPT_HASH,
    });
    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors.map((e) => [e.code, e.path])).toEqual([
        ["INVALID_AGENT_SECRET", "hub.portainerAgentSecret"],
        ["INVALID_PASSWORD_HASH", "hub.portainerInitialPasswordHash"],
      ]);
    }
  });

  it("reports a clash between the shared and dashboard subdomains", () => {
    const result = validateHubConfigFile({
      parentDnsDomain: "example.com",
      defaultCertResolver: "staging",
      traefikDashboardSubdomain: "hub",
    });
    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors[0].code).toBe("RESERVED_SUBDOMAIN_CLASH");
    }
  });
});

describe("resolveHubConfig", () => {
  it("applies defaults", () => {
    const config = resolveHubConfig(
      { parentDnsDomain: "example.com", defaultCertResolver: "staging" },
      "config.yml"
    );
    expect(config).toEqual({
      parentDnsDomain: "example.com",
      defaultCertResolver: "staging",
      adminParentDnsDomain: "example.com",
      adminCertResolver: "prod",
      sharedAppSubdomain: "hub",
      sharedAppDnsName: "hub.example.com",
      sharedAppCertResolver: "staging",
      hubHostname: undefined,
      hubHostname2: undefined,
      hubLanIp: undefined,
      traefikDashboardSubdomain: "traefik",
      traefikDashboardHtpasswd: undefined,
      portainerSubdomain: "portainer",
      portainerCertResolver: "prod",
      portainerAgentSecret: undefined,
      portainerInitialPasswordHash: undefined,
      letsencryptOwnerEmail: undefined,
      traefikLogLevel: "INFO",
      routeProvider: "labels",
      baseStackEnv: {},
      baseAppStackEnv: {},
      portainerRuntimeEnv: {},
      stackEnv: {},
    });
  });

  it("derives the mDNS hostname and stringifies env values", () => {
    const config = resolveHubConfig(
      {
        parentDnsDomain: "example.com",
        defaultCertResolver: "staging",
        hubHostname: "rpi",
        sharedAppSubdomain: "apps",
        stackEnv: { whoami: { PORT: 80, DEBUG: true } },
      },
      "config.yml"
    );
    expect(config.hubHostname2).toBe("rpi.local");
    expect(config.sharedAppDnsName).toBe("apps.example.com");
    expect(config.stackEnv).toEqual({ whoami: { PORT: "80", DEBUG: "true" } });
  });
});

describe("buildHubVariables", () => {
  it("omits unset optional settings", () => {
    const config = resolveHubConfig(
      { parentDnsDomain: "example.com", defaultCertResolver: "staging", adminParentDnsDomain: "admin.example.com" },
      "config.yml"
    );
    expect(buildHubVariables(config)).toEqual({
      PARENT_DNS_DOMAIN: "example.com",
      ADMIN_PARENT_DNS_DOMAIN: "admin.example.com",
      DEFAULT_CERT_RESOLVER: "staging",
      ADMIN_CERT_RESOLVER: "prod",
      SHARED_APP_DNS_NAME: "hub.example.com",
      SHARED_APP_CERT_RESOLVER: "staging",
      TRAEFIK_LOG_LEVEL: "INFO",
      TRAEFIK_DASHBOARD_DNS_NAME: "traefik.admin.example.com",
      PORTAINER_DNS_NAME: "portainer.admin.example.com",
      PORTAINER_CERT_RESOLVER: "prod",
    });
  });

  it("passes Portainer credentials through when set", () => {
    const config = resolveHubConfig(
      {
        parentDnsDomain: "example.com",
        defaultCertResolver: "staging",
        adminCertResolver: "admin",
        portainerSubdomain: "docker",
        portainerAgentSecret: "test-agent-secret-0001",
        portainerInitialPasswordHash: TEST_BCRYPT_HASH,
      },
      "config.yml"
    );
    expect(buildHubVariables(config)).toMatchObject({
      PORTAINER_DNS_NAME: "docker.example.com",
      PORTAINER_CERT_RESOLVER: "admin",
      PORTAINER_AGENT_SECRET: "test-agent-secret-0001",
      PORTAINER_INITIAL_PASSWORD_HASH: TEST_BCRYPT_HASH,
    });
  });
});
