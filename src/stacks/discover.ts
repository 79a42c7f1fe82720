/**
 * Stack discovery
 */

import * as fs from "fs";
import * as path from "path";
import {
  COMPOSE_TEMPLATE_FILE_NAME,
  PORTAINER_STACK,
  STACK_MANIFEST_FILE_NAME,
  STACKS_DIR_NAME,
  TRAEFIK_STACK,
} from "../constants";
import { ConfigValidationError, ValidationError } from "../errors";
import { validateStackName } from "../hub-config";
import { StackSource } from "./types";

/** Stacks the hub builds itself; their directories hold no manifest */
const HUB_STACKS: readonly string[] = [TRAEFIK_STACK, PORTAINER_STACK];

export function getStacksDir(projectDir: string): string {
  return path.join(projectDir, STACKS_DIR_NAME);
}

/**
 * Find every stack directory that has a hub-stack.yml
 *
 * Sorted by name. A missing stacks/ directory means no stacks.
 *
 * @throws ConfigValidationError if a stack directory name is not a slug
 */
export function discoverStacks(projectDir: string): StackSource[] {
  const stacksDir = getStacksDir(projectDir);
  if (!fs.existsSync(stacksDir)) {
    return [];
  }

  const stacks: StackSource[] = [];
  const errors: ValidationError[] = [];

  const names = fs
    .readdirSync(stacksDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && !HUB_STACKS.includes(entry.name))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b, "en-US"));

  for (const name of names) {
    const dir = path.join(stacksDir, name);
    const manifestPath = path.join(dir, STACK_MANIFEST_FILE_NAME);
    if (!fs.existsSync(manifestPath)) continue;

    const error = validateStackName(name, `stacks.${name}`);
    if (error) {
      errors.push(error);
      continue;
    }

    const composeTemplatePath = path.join(dir, COMPOSE_TEMPLATE_FILE_NAME);
    stacks.push({
      name,
      dir,
      manifestPath,
      ...(fs.existsSync(composeTemplatePath) && { composeTemplatePath }),
    });
  }

  if (errors.length > 0) {
    throw new ConfigValidationError(stacksDir, errors);
  }
  return stacks;
}
