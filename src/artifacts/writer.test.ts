/**
 * Tests for the artifact writer
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { FileWriteError } from "../errors";
import {
  createArtifact,
  hashContent,
  readExistingHash,
  writeArtifacts,
  writeFileAtomic,
} from "./writer";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "hub-artifacts-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("createArtifact", () => {
  it("computes the sha256 of the content", () => {
    const artifact = createArtifact("/tmp/x.yml", "abc");
    expect(artifact.hash).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
    );
    expect(artifact.mode).toBe(0o644);
  });
});

describe("readExistingHash", () => {
  it("returns undefined for a missing file", () => {
    expect(readExistingHash(path.join(dir, "missing.yml"))).toBeUndefined();
  });

  it("hashes an existing file", () => {
    const file = path.join(dir, "a.yml");
    fs.writeFileSync(file, "abc");
    expect(readExistingHash(file)).toBe(hashContent("abc"));
  });
});

describe("writeArtifacts", () => {
  it("writes new files, creating directories", () => {
    const file = path.join(dir, "stacks", "traefik", "traefik-config.yml");
    const result = writeArtifacts([createArtifact(file, "entryPoints: {}\n")]);

    expect(result.changed).toEqual([file]);
    expect(result.unchanged).toEqual([]);
    expect(fs.readFileSync(file, "utf-8")).toBe("entryPoints: {}\n");
  });

  it("applies the artifact mode", () => {
    const file = path.join(dir, ".env");
    writeArtifacts([createArtifact(file, "A=1\n", 0o600)]);
    expect(fs.statSync(file).mode & 0o777).toBe(0o600);
  });

  it("skips files whose content is unchanged and leaves mtime alone", () => {
    const file = path.join(dir, "a.yml");
    fs.writeFileSync(file, "same\n");
    const past = new Date("2020-01-01T00:00:00Z");
    fs.utimesSync(file, past, past);

    const result = writeArtifacts([createArtifact(file, "same\n")]);

    expect(result.changed).toEqual([]);
    expect(result.unchanged).toEqual([file]);
    expect(fs.statSync(file).mtime.getTime()).toBe(past.getTime());
  });

  it("reports zero changes when run twice", () => {
    const artifacts = [
      createArtifact(path.join(dir, "a.yml"), "a\n"),
      createArtifact(path.join(dir, "b.yml"), "b\n"),
    ];
    expect(writeArtifacts(artifacts).changed).toHaveLength(2);
    expect(writeArtifacts(artifacts).changed).toEqual([]);
  });

  it("rewrites a file whose content changed", () => {
    const file = path.join(dir, "a.yml");
    fs.writeFileSync(file, "old\n");
    const result = writeArtifacts([createArtifact(file, "new\n")]);
    expect(result.changed).toEqual([file]);
    expect(fs.readFileSync(file, "utf-8")).toBe("new\n");
  });

  it("writes nothing in a dry run", () => {
    const file = path.join(dir, "a.yml");
    const result = writeArtifacts([createArtifact(file, "a\n")], { dryRun: true });
    expect(result.changed).toEqual([file]);
    expect(fs.existsSync(file)).toBe(false);
  });

  it("rejects two artifacts for the same path before writing either", () => {
    const file = path.join(dir, "a.yml");
    try {
      writeArtifacts([createArtifact(file, "a\n"), createArtifact(file, "b\n")]);
      expect.fail("expected FileWriteError");
    } catch (error) {
      expect(error).toBeInstanceOf(FileWriteError);
      expect((error as FileWriteError).message).toBe(`Failed to write ${file}: artifact path generated twice`);
    }
    expect(fs.existsSync(file)).toBe(false);
  });

  it("leaves no temporary files behind", () => {
    writeArtifacts([createArtifact(path.join(dir, "a.yml"), "a\n")]);
    expect(fs.readdirSync(dir)).toEqual(["a.yml"]);
  });
});

describe("writeFileAtomic", () => {
  it("wraps failures in FileWriteError and removes the temp file", () => {
    // The target is an existing directory, so the final rename fails
    const target = path.join(dir, "occupied");
    fs.mkdirSync(path.join(target, "child"), { recursive: true });

    try {
      writeFileAtomic(target, "content", 0o644);
      expect.fail("expected FileWriteError");
    } catch (error) {
      expect(error).toBeInstanceOf(FileWriteError);
      expect((error as FileWriteError).filePath).toBe(target);
    }
    expect(fs.readdirSync(dir)).toEqual(["occupied"]);
  });
});
