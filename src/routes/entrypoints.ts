/**
 * Traefik entrypoints
 *
 * Names must match the entryPoints declared in the Traefik static config
 * template. Only TLS entrypoints get a certificate resolver.
 */

import { EntrypointName, Visibility } from "./types";

export interface Entrypoint {
  readonly name: EntrypointName;
  readonly visibility: Visibility;
  readonly tls: boolean;
}

/** Every entrypoint, in router generation order */
export const ENTRYPOINTS: readonly Entrypoint[] = [
  { name: "web", visibility: "public", tls: false },
  { name: "websecure", visibility: "public", tls: true },
  { name: "lanweb", visibility: "private", tls: false },
  { name: "lanwebsecure", visibility: "private", tls: true },
  { name: "landashboard", visibility: "dashboard", tls: false },
];

/**
 * Plain entrypoints reached by LAN clients
 *
 * Path routers on these match any of the hub's LAN names, since LAN
 * clients often address the hub by hostname or IP rather than by DNS name.
 */
export function matchesLanAliases(entrypoint: Entrypoint): boolean {
  return !entrypoint.tls && entrypoint.visibility !== "public";
}
