/**
 * Stack manifest loading
 *
 * hub-stack.yml is itself a template: it is expanded in compose mode with
 * the stack's variable sources, parsed, checked against
 * schema/stack-manifest.schema.json, then turned into service descriptors
 * and environment fragments.
 */

import { ConfigValidationError, ValidationError } from "../errors";
import { EnvFragment, EnvMapping, normalizeComposeEnvironment } from "../env-fragments";
import { ServiceDescriptor } from "../routes";
import { validateAgainstSchema } from "../schema";
import { VariableSource, loadYamlTemplateFile } from "../template";
import {
  BUILTIN_FRAGMENT_NAMES,
  DEFAULT_SERVICE_FRAGMENTS,
  StackFragmentFile,
  StackManifest,
  StackManifestFile,
  StackService,
  StackServiceFile,
  StackSource,
} from "./types";

/** JSON Schema file for hub-stack.yml, under schema/ */
export const STACK_MANIFEST_SCHEMA_FILE = "stack-manifest.schema.json";

function isBuiltinFragment(name: string): boolean {
  return BUILTIN_FRAGMENT_NAMES.some((builtin) => builtin === name);
}

/**
 * Check the shape of a parsed manifest against the JSON Schema
 */
export function validateStackManifestShape(data: unknown, stack: string): ValidationError[] {
  return validateAgainstSchema(STACK_MANIFEST_SCHEMA_FILE, data, `stacks.${stack}`);
}

function isStackManifestFile(data: unknown, stack: string): data is StackManifestFile {
  return validateStackManifestShape(data, stack).length === 0;
}

function toFragment(
  name: string,
  file: StackFragmentFile,
  source: string,
  base: string
): EnvFragment {
  const values: EnvMapping = normalizeComposeEnvironment(file.values, source, `${base}.values`);
  if (file.defaults === undefined || file.defaults === null) {
    return { name, values };
  }
  return {
    name,
    values,
    defaults: normalizeComposeEnvironment(file.defaults, source, `${base}.defaults`),
  };
}

function toDescriptor(
  stack: string,
  service: string,
  file: StackServiceFile
): ServiceDescriptor | undefined {
  if (file.subdomain === undefined || file.port === undefined) return undefined;
  return {
    stack,
    service,
    subdomain: file.subdomain,
    visibility: file.visibility ?? {},
    routing: file.routing ?? {},
    port: file.port,
    ...(file.certResolver !== undefined && file.certResolver !== "" && { certResolver: file.certResolver }),
    ...(file.upstreamHost !== undefined && { upstreamHost: file.upstreamHost }),
    ...(file.service !== undefined && { traefikService: file.service }),
    ...(file.middlewares !== undefined && { middlewares: file.middlewares }),
  };
}

/**
 * Turn a parsed manifest document into a StackManifest
 *
 * @param document - Parsed hub-stack.yml (null for an empty file)
 * @param source - Document name for error messages
 * @throws ConfigValidationError on schema violations, reserved or unknown fragment names
 */
export function parseStackManifest(document: unknown, stack: string, source: string): StackManifest {
  const data: unknown = document ?? {};
  if (!isStackManifestFile(data, stack)) {
    throw new ConfigValidationError(source, validateStackManifestShape(data, stack));
  }

  const errors: ValidationError[] = [];
  const fragments: Record<string, EnvFragment> = {};

  for (const [name, file] of Object.entries(data.fragments ?? {})) {
    const base = `stacks.${stack}.fragments.${name}`;
    if (isBuiltinFragment(name)) {
      errors.push({
        code: "RESERVED_FRAGMENT",
        message: `Fragment name "${name}" is reserved for the hub configuration`,
        path: base,
      });
      continue;
    }
    fragments[name] = toFragment(name, file, source, base);
  }

  const services: StackService[] = [];
  const serviceNames = Object.keys(data.services ?? {}).sort((a, b) => a.localeCompare(b, "en-US"));

  for (const name of serviceNames) {
    const file = data.services?.[name];
    if (file === undefined) continue;

    const fragmentNames = file.fragments ?? DEFAULT_SERVICE_FRAGMENTS;
    fragmentNames.forEach((fragment, index) => {
      if (!isBuiltinFragment(fragment) && fragments[fragment] === undefined) {
        errors.push({
          code: "UNKNOWN_FRAGMENT",
          message: `Unknown fragment "${fragment}"`,
          path: `stacks.${stack}.services.${name}.fragments[${String(index)}]`,
        });
      }
    });

    const descriptor = toDescriptor(stack, name, file);
    services.push({
      name,
      ...(descriptor !== undefined && { descriptor }),
      fragments: fragmentNames,
      pinnedEnv: file.pinnedEnv ?? [],
    });
  }

  if (errors.length > 0) {
    throw new ConfigValidationError(source, errors);
  }
  return { stack, source, services, fragments };
}

/**
 * Read, expand and parse a stack's hub-stack.yml
 *
 * @throws TemplateExpansionError on unresolved variables
 * @throws ConfigValidationError on an invalid manifest
 */
export function loadStackManifest(
  stack: StackSource,
  sources: readonly VariableSource[]
): StackManifest {
  const document = loadYamlTemplateFile(stack.manifestPath, sources, { escape: "compose" });
  return parseStackManifest(document, stack.name, stack.manifestPath);
}

/**
 * Every routed service of a set of manifests
 */
export function collectServiceDescriptors(
  manifests: readonly StackManifest[]
): ServiceDescriptor[] {
  return manifests.flatMap((manifest) =>
    manifest.services.flatMap((service) => (service.descriptor ? [service.descriptor] : []))
  );
}
