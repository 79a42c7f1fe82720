/**
 * Hub configuration module
 *
 * Loading, validation, inference and persistence of config.yml.
 */

export type {
  TraefikLogLevel,
  RouteProvider,
  RawEnvMap,
  EnvMap,
  HubConfigFile,
  HubConfigDocument,
  HubConfig,
} from "./types";
export { TRAEFIK_LOG_LEVELS, ROUTE_PROVIDERS } from "./types";

export type { FieldValidator, ValidationResult } from "./validation";
export {
  CERT_RESOLVER_PATTERN,
  ENV_VAR_NAME_PATTERN,
  validateDnsNameField,
  validateDnsLabelField,
  validateCertResolverField,
  validateIpv4Field,
  validateEmailField,
  validateHtpasswdField,
  validateBcryptHashField,
  validateAgentSecretField,
  validateTraefikLogLevelField,
  validateRouteProviderField,
  validateEnvVarName,
  validateStackName,
  validateHubConfigFile,
  assertValidHubConfigFile,
} from "./validation";

export {
  DEFAULT_ADMIN_CERT_RESOLVER,
  DEFAULT_SHARED_APP_SUBDOMAIN,
  DEFAULT_TRAEFIK_DASHBOARD_SUBDOMAIN,
  DEFAULT_PORTAINER_SUBDOMAIN,
  DEFAULT_TRAEFIK_LOG_LEVEL,
  DEFAULT_ROUTE_PROVIDER,
  resolveHubConfig,
  stringifyEnvMap,
} from "./inference";

export type { ConfigKeyKind, ConfigKeySpec, ParsedConfigKey } from "./keys";
export { CONFIG_KEYS, findConfigKey, parseConfigKey } from "./keys";

export {
  ConfigNotFoundError,
  ConfigParseError,
  getConfigPath,
  readConfigText,
  parseConfigDocument,
  validateConfigDocumentShape,
} from "./loader";

export type { ConfigValue, ConfigEntry, InitOptions } from "./store";
export { ConfigStore } from "./store";

export type { HubVariableName } from "./hub-variables";
export {
  HUB_VARIABLE_NAMES,
  buildHubVariables,
  portainerDnsName,
  traefikDashboardDnsName,
} from "./hub-variables";

export {
  DEFAULT_BCRYPT_ROUNDS,
  checkUsernamePassword,
  hashPassword,
  hashUsernamePassword,
} from "./password";
