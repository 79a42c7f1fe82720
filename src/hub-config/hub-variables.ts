/**
 * Hub variables
 *
 * Variables derived from the hub configuration and made available to
 * every stack template and .env file. Optional settings without a value
 * produce no variable, so `${HUB_LAN_IP:-...}` defaults still apply.
 */

import { HubConfig } from "./types";

/** Every variable name buildHubVariables can produce */
export const HUB_VARIABLE_NAMES = [
  "PARENT_DNS_DOMAIN",
  "ADMIN_PARENT_DNS_DOMAIN",
  "DEFAULT_CERT_RESOLVER",
  "ADMIN_CERT_RESOLVER",
  "SHARED_APP_DNS_NAME",
  "SHARED_APP_CERT_RESOLVER",
  "HUB_HOSTNAME",
  "HUB_HOSTNAME2",
  "HUB_LAN_IP",
  "TRAEFIK_LOG_LEVEL",
  "TRAEFIK_DASHBOARD_DNS_NAME",
  "TRAEFIK_DASHBOARD_HTPASSWD",
  "PORTAINER_DNS_NAME",
  "PORTAINER_CERT_RESOLVER",
  "PORTAINER_AGENT_SECRET",
  "PORTAINER_INITIAL_PASSWORD_HASH",
  "LETSENCRYPT_OWNER_EMAIL",
] as const;

export type HubVariableName = (typeof HUB_VARIABLE_NAMES)[number];

export function traefikDashboardDnsName(config: HubConfig): string {
  return `${config.traefikDashboardSubdomain}.${config.adminParentDnsDomain}`;
}

export function portainerDnsName(config: HubConfig): string {
  return `${config.portainerSubdomain}.${config.adminParentDnsDomain}`;
}

export function buildHubVariables(config: HubConfig): Partial<Record<HubVariableName, string>> {
  const variables: Partial<Record<HubVariableName, string>> = {
    PARENT_DNS_DOMAIN: config.parentDnsDomain,
    ADMIN_PARENT_DNS_DOMAIN: config.adminParentDnsDomain,
    DEFAULT_CERT_RESOLVER: config.defaultCertResolver,
    ADMIN_CERT_RESOLVER: config.adminCertResolver,
    SHARED_APP_DNS_NAME: config.sharedAppDnsName,
    SHARED_APP_CERT_RESOLVER: config.sharedAppCertResolver,
    TRAEFIK_LOG_LEVEL: config.traefikLogLevel,
    TRAEFIK_DASHBOARD_DNS_NAME: traefikDashboardDnsName(config),
    PORTAINER_DNS_NAME: portainerDnsName(config),
    PORTAINER_CERT_RESOLVER: config.portainerCertResolver,
  };
  if (config.hubHostname !== undefined) variables.HUB_HOSTNAME = config.hubHostname;
  if (config.hubHostname2 !== undefined) variables.HUB_HOSTNAME2 = config.hubHostname2;
  if (config.hubLanIp !== undefined) variables.HUB_LAN_IP = config.hubLanIp;
  if (config.traefikDashboardHtpasswd !== undefined) {
    variables.TRAEFIK_DASHBOARD_HTPASSWD = config.traefikDashboardHtpasswd;
  }
  if (config.portainerAgentSecret !== undefined) {
    variables.PORTAINER_AGENT_SECRET = config.portainerAgentSecret;
  }
  if (config.portainerInitialPasswordHash !== undefined) {
    variables.PORTAINER_INITIAL_PASSWORD_HASH = config.portainerInitialPasswordHash;
  }
  if (config.letsencryptOwnerEmail !== undefined) {
    variables.LETSENCRYPT_OWNER_EMAIL = config.letsencryptOwnerEmail;
  }
  return variables;
}
