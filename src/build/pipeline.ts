/**
 * Build pipeline
 *
 * load config -> expand templates -> generate routes -> merge env
 * fragments -> write artifacts
 *
 * Everything up to the write is computed in memory, so any error (bad
 * config, unresolved variable, route collision, env conflict) surfaces
 * before a single file changes.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "yaml";
import {
  CompiledArtifact,
  DEFAULT_ARTIFACT_MODE,
  PRIVATE_ARTIFACT_MODE,
  createArtifact,
  serializeDotenv,
  writeArtifacts,
} from "../artifacts";
import {
  BUILD_DIR_NAME,
  COMPOSE_TEMPLATE_FILE_NAME,
  CONFIG_FILE_NAME,
  PORTAINER_STACK,
  STACKS_DIR_NAME,
  TRAEFIK_STACK,
} from "../constants";
import { ConfigValidationError } from "../errors";
import { ConfigStore, HubConfig } from "../hub-config";
import { Logger, silentLogger } from "../logger";
import {
  GeneratedRoutes,
  RouteMatrix,
  RouteNameRegistry,
  claimTemplateNames,
  generateRouteMatrix,
  validateServiceDescriptor,
} from "../routes";
import {
  ComposeDocument,
  StackManifest,
  StackSource,
  collectServiceDescriptors,
  discoverStacks,
  getStacksDir,
  loadComposeTemplate,
  loadComposeTemplateFile,
  loadStackManifest,
} from "../stacks";
import { escapeComposeValue } from "../template";
import { buildComposeDocument, serializeComposeDocument } from "./compose";
import { builtinFragments } from "./fragments";
import { generatedHeader } from "./headers";
import { TemplateUse, VariableUsage, reportVariables } from "./report";
import { loadDynamicConfigTemplate, renderDynamicConfig, renderStaticConfig } from "./traefik";
import { VariableContext, buildInjectedEnv, buildStackEnv, buildVariableSources } from "./variables";

export const TRAEFIK_STATIC_TEMPLATE = "traefik-config-template.yml";
export const TRAEFIK_DYNAMIC_TEMPLATE = "traefik-dynamic-config-template.yml";
export const TRAEFIK_STATIC_CONFIG = "traefik-config.yml";
export const TRAEFIK_DYNAMIC_CONFIG = "traefik-dynamic-config.yml";
export const COMPOSE_FILE_NAME = "docker-compose.yml";
export const DOTENV_FILE_NAME = ".env";
export const INJECTED_ENV_FILE_NAME = "injected-env-vars.yml";

export interface BuildOptions extends VariableContext {
  /** Directory holding config.yml and stacks/ */
  readonly projectDir: string;
  readonly logger?: Logger;
}

interface LoadedStack {
  readonly source: StackSource;
  readonly manifest: StackManifest;
  readonly compose?: ComposeDocument;
}

export interface CompileResult {
  readonly config: HubConfig;
  readonly stacks: readonly StackManifest[];
  readonly matrix: RouteMatrix;
  /** In write order */
  readonly artifacts: readonly CompiledArtifact[];
  readonly templates: readonly TemplateUse[];
}

export function getBuildDir(projectDir: string): string {
  return path.join(projectDir, BUILD_DIR_NAME);
}

export function getStackBuildDir(projectDir: string, stack: string): string {
  return path.join(getBuildDir(projectDir), STACKS_DIR_NAME, stack);
}

function projectPath(projectDir: string, filePath: string): string {
  return path.relative(projectDir, filePath).split(path.sep).join("/");
}

/**
 * Compile every artifact without writing anything
 *
 * @throws ConfigValidationError, TemplateExpansionError, RouteCollisionError, EnvMergeConflictError
 */
export function compileHub(options: BuildOptions): CompileResult {
  const logger = options.logger ?? silentLogger;
  const { projectDir } = options;
  const config = new ConfigStore(projectDir, logger).load();
  const templates: TemplateUse[] = [];

  // Traefik templates
  const traefikDir = path.join(getStacksDir(projectDir), TRAEFIK_STACK);
  const traefikSources = buildVariableSources(config, TRAEFIK_STACK, options);
  const staticTemplatePath = path.join(traefikDir, TRAEFIK_STATIC_TEMPLATE);
  if (!fs.existsSync(staticTemplatePath)) {
    throw new ConfigValidationError(projectPath(projectDir, traefikDir), [
      {
        code: "MISSING_TEMPLATE",
        message: `Traefik static config template not found: ${projectPath(projectDir, staticTemplatePath)}`,
        path: `stacks.${TRAEFIK_STACK}`,
      },
    ]);
  }
  const staticConfig = renderStaticConfig(staticTemplatePath, traefikSources);
  templates.push({ path: staticTemplatePath, sources: traefikSources });

  const dynamicTemplatePath = path.join(traefikDir, TRAEFIK_DYNAMIC_TEMPLATE);
  const dynamicTemplate = loadDynamicConfigTemplate(dynamicTemplatePath, traefikSources);
  const hasDynamicTemplate = fs.existsSync(dynamicTemplatePath);
  if (hasDynamicTemplate) {
    templates.push({ path: dynamicTemplatePath, sources: traefikSources });
  }

  // Stack manifests and compose templates
  const stacks: LoadedStack[] = discoverStacks(projectDir).map((source) => {
    const sources = buildVariableSources(config, source.name, options);
    const manifest = loadStackManifest(source, sources);
    templates.push({ path: source.manifestPath, sources });
    const compose = loadComposeTemplate(source, sources);
    if (source.composeTemplatePath !== undefined) {
      templates.push({ path: source.composeTemplatePath, sources });
    }
    logger.debug(`Loaded stack ${source.name}: ${String(manifest.services.length)} service(s)`);
    return { source, manifest, ...(compose !== undefined && { compose }) };
  });

  // Portainer: no manifest; its UI route is a core route
  const portainerTemplatePath = path.join(
    getStacksDir(projectDir),
    PORTAINER_STACK,
    COMPOSE_TEMPLATE_FILE_NAME
  );
  let portainerCompose: ComposeDocument | undefined;
  if (fs.existsSync(portainerTemplatePath)) {
    const sources = buildVariableSources(config, PORTAINER_STACK, options);
    portainerCompose = loadComposeTemplateFile(portainerTemplatePath, sources);
    templates.push({ path: portainerTemplatePath, sources });
  }

  // Routes
  const descriptors = collectServiceDescriptors(stacks.map((stack) => stack.manifest));
  const descriptorErrors = descriptors.flatMap((descriptor) =>
    validateServiceDescriptor(descriptor, config)
  );
  if (descriptorErrors.length > 0) {
    throw new ConfigValidationError(projectPath(projectDir, getStacksDir(projectDir)), descriptorErrors);
  }

  const registry = new RouteNameRegistry();
  claimTemplateNames(dynamicTemplate, registry, TRAEFIK_STACK);
  const matrix = generateRouteMatrix(descriptors, config, {
    registry,
    portainer: portainerCompose !== undefined,
  });
  for (const warning of matrix.warnings) {
    logger.warn(warning);
  }

  // Stacks without a compose template have nothing to carry labels
  const labelledStacks = new Set(
    config.routeProvider === "labels"
      ? stacks.filter((stack) => stack.compose !== undefined).map((stack) => stack.source.name)
      : []
  );
  const usesLabels = (entry: GeneratedRoutes): boolean =>
    entry.owner.subdomain !== undefined && labelledStacks.has(entry.owner.stack);
  const fileEntries = matrix.entries.filter((entry) => !usesLabels(entry));

  // Artifacts
  const artifacts: CompiledArtifact[] = [];
  const traefikBuildDir = getStackBuildDir(projectDir, TRAEFIK_STACK);

  artifacts.push(
    createArtifact(
      path.join(traefikBuildDir, TRAEFIK_STATIC_CONFIG),
      generatedHeader("Traefik configuration file", projectPath(projectDir, staticTemplatePath)) +
        staticConfig,
      DEFAULT_ARTIFACT_MODE
    )
  );
  artifacts.push(
    createArtifact(
      path.join(traefikBuildDir, TRAEFIK_DYNAMIC_CONFIG),
      generatedHeader(
        "Traefik dynamic configuration file",
        hasDynamicTemplate ? projectPath(projectDir, dynamicTemplatePath) : CONFIG_FILE_NAME
      ) + renderDynamicConfig(dynamicTemplate, fileEntries),
      PRIVATE_ARTIFACT_MODE
    )
  );
  artifacts.push(
    createArtifact(
      path.join(traefikBuildDir, DOTENV_FILE_NAME),
      generatedHeader("Traefik stack environment", CONFIG_FILE_NAME) +
        serializeDotenv(buildStackEnv(config, TRAEFIK_STACK)),
      PRIVATE_ARTIFACT_MODE
    )
  );

  const builtins = builtinFragments(config);
  for (const { source, manifest, compose } of stacks) {
    const stackBuildDir = getStackBuildDir(projectDir, source.name);

    if (compose !== undefined && source.composeTemplatePath !== undefined) {
      const routes = new Map(
        matrix.entries
          .filter((entry) => entry.owner.stack === source.name && entry.owner.subdomain !== undefined)
          .map((entry) => [entry.owner.service, entry])
      );
      const document = buildComposeDocument({
        manifest,
        compose,
        routes,
        routeProvider: config.routeProvider,
        builtins,
        logger,
      });
      artifacts.push(
        createArtifact(
          path.join(stackBuildDir, COMPOSE_FILE_NAME),
          generatedHeader(
            `Docker Compose file for stack ${source.name}`,
            projectPath(projectDir, source.composeTemplatePath)
          ) + serializeComposeDocument(document),
          PRIVATE_ARTIFACT_MODE
        )
      );
    } else if (manifest.services.length > 0) {
      logger.debug(`Stack ${source.name} has no compose template; environment fragments not applied`);
    }

    artifacts.push(
      createArtifact(
        path.join(stackBuildDir, DOTENV_FILE_NAME),
        generatedHeader(`Environment for stack ${source.name}`, CONFIG_FILE_NAME) +
          serializeDotenv(buildStackEnv(config, source.name)),
        PRIVATE_ARTIFACT_MODE
      )
    );
  }

  const portainerBuildDir = getStackBuildDir(projectDir, PORTAINER_STACK);
  if (portainerCompose !== undefined) {
    artifacts.push(
      createArtifact(
        path.join(portainerBuildDir, COMPOSE_FILE_NAME),
        generatedHeader(
          `Docker Compose file for stack ${PORTAINER_STACK}`,
          projectPath(projectDir, portainerTemplatePath)
        ) + serializeComposeDocument(portainerCompose.document),
        PRIVATE_ARTIFACT_MODE
      )
    );
  }
  artifacts.push(
    createArtifact(
      path.join(portainerBuildDir, DOTENV_FILE_NAME),
      generatedHeader(`Environment for stack ${PORTAINER_STACK}`, CONFIG_FILE_NAME) +
        serializeDotenv(buildStackEnv(config, PORTAINER_STACK)),
      PRIVATE_ARTIFACT_MODE
    )
  );

  const injected: Record<string, string> = {};
  for (const [name, value] of Object.entries(buildInjectedEnv(config))) {
    injected[name] = escapeComposeValue(value);
  }
  artifacts.push(
    createArtifact(
      path.join(portainerBuildDir, INJECTED_ENV_FILE_NAME),
      generatedHeader("Environment injected into stack manager containers", CONFIG_FILE_NAME) +
        yaml.stringify({ services: { injected_env_vars: { environment: injected } } }),
      PRIVATE_ARTIFACT_MODE
    )
  );

  return {
    config,
    stacks: stacks.map((stack) => stack.manifest),
    matrix,
    artifacts,
    templates,
  };
}

export interface BuildResult {
  readonly changed: readonly string[];
  readonly unchanged: readonly string[];
  readonly warnings: readonly string[];
}

/**
 * Compile and write every artifact whose content changed
 */
export function buildHub(options: BuildOptions & { readonly dryRun?: boolean }): BuildResult {
  const logger = options.logger ?? silentLogger;
  const compiled = compileHub(options);
  const { changed, unchanged } = writeArtifacts(compiled.artifacts, {
    dryRun: options.dryRun,
    logger,
  });
  logger.info(
    `${options.dryRun ? "Dry run" : "Build"} complete: ${String(changed.length)} changed, ${String(unchanged.length)} unchanged`
  );
  return { changed, unchanged, warnings: compiled.matrix.warnings };
}

export interface ValidationReport {
  readonly stacks: readonly string[];
  /** Number of generated routers */
  readonly routers: number;
  readonly warnings: readonly string[];
  readonly variables: readonly VariableUsage[];
  /** Paths a build would write */
  readonly artifacts: readonly string[];
}

/**
 * Run every check a build runs, without writing, and report variable usage
 */
export function validateHub(options: BuildOptions): ValidationReport {
  const compiled = compileHub(options);
  return {
    stacks: compiled.stacks.map((stack) => stack.stack),
    routers: compiled.matrix.entries.reduce((count, entry) => count + entry.routes.length, 0),
    warnings: compiled.matrix.warnings,
    variables: reportVariables(compiled.templates, options.projectDir),
    artifacts: compiled.artifacts.map((artifact) => artifact.path),
  };
}
