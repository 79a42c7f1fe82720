/**
 * Traefik rule construction (v3 syntax)
 */

import { HubConfig } from "../hub-config";
import { RouteMatch } from "./types";

export function hostRule(host: string): string {
  return `Host(\`${host}\`)`;
}

/**
 * Build a rule from a match
 *
 * - { hosts: ["a"] } -> Host(`a`)
 * - { hosts: ["a", "b"], pathPrefix: "/x" } -> (Host(`a`) || Host(`b`)) && PathPrefix(`/x`)
 */
export function buildRule(match: RouteMatch): string {
  const hosts = match.hosts.map(hostRule);
  const hostMatch = hosts.length === 1 ? hosts[0] : `(${hosts.join(" || ")})`;
  if (match.pathPrefix === undefined) {
    return hostMatch;
  }
  return `${hostMatch} && PathPrefix(\`${match.pathPrefix}\`)`;
}

/**
 * Names LAN clients may use for the hub, shared app DNS name first
 */
export function lanAliases(config: HubConfig): string[] {
  const candidates = [
    config.sharedAppDnsName,
    config.hubHostname,
    config.hubHostname2,
    config.hubLanIp,
    "localhost",
    "127.0.0.1",
  ];
  const aliases: string[] = [];
  for (const candidate of candidates) {
    if (candidate !== undefined && !aliases.includes(candidate)) {
      aliases.push(candidate);
    }
  }
  return aliases;
}
