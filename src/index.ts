/**
 * Hub compiler
 *
 * Compiles config.yml and the stack templates under stacks/ into Traefik
 * and Compose artifacts under build/stacks/.
 */

export * from "./errors";
export type { Logger, LogLevel, LogSink } from "./logger";
export { createLogger, silentLogger, resolveLogLevel } from "./logger";

export * as hubConfig from "./hub-config";
export * as template from "./template";
export * as routes from "./routes";
export * as envFragments from "./env-fragments";
export * as artifacts from "./artifacts";
export * as stacks from "./stacks";

export { ConfigStore } from "./hub-config";
export type { BuildOptions, BuildResult, ValidationReport } from "./build";
export { buildHub, compileHub, validateHub } from "./build";

export type { CliIo } from "./cli/run";
export { runCli } from "./cli/run";
