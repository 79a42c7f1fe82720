/**
 * Artifact writer
 *
 * Writes generated documents atomically and only when their content
 * changed. The stack manager and Traefik watch the build directory, so
 * a reader must never see a partially written file, and an unchanged
 * build must not touch modification times.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import { FileWriteError } from "../errors";
import { Logger, silentLogger } from "../logger";

/** A generated document and where it goes */
export interface CompiledArtifact {
  /** Absolute target path */
  readonly path: string;
  readonly content: string;
  /** sha256 of content, hex */
  readonly hash: string;
  /** File mode used when the file is (re)written */
  readonly mode: number;
}

/** Default mode for generated files */
export const DEFAULT_ARTIFACT_MODE = 0o644;

/** Mode for files that may contain secrets */
export const PRIVATE_ARTIFACT_MODE = 0o600;

export function hashContent(content: string | Buffer): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

export function createArtifact(
  filePath: string,
  content: string,
  mode: number = DEFAULT_ARTIFACT_MODE
): CompiledArtifact {
  return { path: filePath, content, hash: hashContent(content), mode };
}

/**
 * Hash of the file currently at filePath, or undefined if there is none
 */
export function readExistingHash(filePath: string): string | undefined {
  let existing: Buffer;
  try {
    existing = fs.readFileSync(filePath);
  } catch (error: unknown) {
    const code = systemErrorCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") return undefined;
    throw new FileWriteError(filePath, error);
  }
  return hashContent(existing);
}

/** `code` of a Node system error, if the value is one */
export function systemErrorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

function tempPathFor(filePath: string): string {
  const suffix = crypto.randomBytes(6).toString("hex");
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${suffix}.tmp`);
}

/**
 * Write a file atomically: temp file in the same directory, fsync, rename
 *
 * The temp file is removed before the error is reported when any step fails.
 *
 * @throws FileWriteError
 */
export function writeFileAtomic(filePath: string, content: string, mode: number): void {
  const tmpPath = tempPathFor(filePath);
  let fd: number | undefined;
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fd = fs.openSync(tmpPath, "wx", mode);
    fs.writeFileSync(fd, content, "utf-8");
    fs.fsyncSync(fd);
    fs.closeSync(fd);
    fd = undefined;
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    if (fd !== undefined) {
      fs.closeSync(fd);
    }
    fs.rmSync(tmpPath, { force: true });
    throw new FileWriteError(filePath, error);
  }
}

export interface WriteArtifactsOptions {
  /** Compute what would change without writing anything */
  readonly dryRun?: boolean;
  readonly logger?: Logger;
}

export interface WriteArtifactsResult {
  /** Paths whose content changed (written, or would be in a dry run) */
  readonly changed: readonly string[];
  /** Paths left untouched because their content was already current */
  readonly unchanged: readonly string[];
}

/**
 * Write every artifact whose content differs from what is on disk
 *
 * Artifacts are written in the order given. Returns the changed paths so the
 * caller can decide which stacks need a restart.
 */
export function writeArtifacts(
  artifacts: readonly CompiledArtifact[],
  options: WriteArtifactsOptions = {}
): WriteArtifactsResult {
  const logger = options.logger ?? silentLogger;
  const seen = new Set<string>();
  for (const artifact of artifacts) {
    if (seen.has(artifact.path)) {
      throw new FileWriteError(artifact.path, "artifact path generated twice");
    }
    seen.add(artifact.path);
  }

  const changed: string[] = [];
  const unchanged: string[] = [];

  for (const artifact of artifacts) {
    if (readExistingHash(artifact.path) === artifact.hash) {
      logger.debug(`Unchanged: ${artifact.path}`);
      unchanged.push(artifact.path);
      continue;
    }
    if (!options.dryRun) {
      writeFileAtomic(artifact.path, artifact.content, artifact.mode);
    }
    logger.info(`${options.dryRun ? "Would write" : "Wrote"}: ${artifact.path}`);
    changed.push(artifact.path);
  }

  return { changed, unchanged };
}
