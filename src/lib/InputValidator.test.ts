/**
 * Unit tests for InputValidator
 */

import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { InputValidator } from "./InputValidator";
import { DIGEST_LENGTHS, ValidationError, ValidationIssue } from "../types";

const MD5_EMPTY = "d41d8cd98f00b204e9800998ecf8427e";

async function issuesOf(promise: Promise<unknown>): Promise<ValidationIssue[]> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error("Expected validation to fail");
}

describe("InputValidator", () => {
  let validator: InputValidator;
  let testDir: string;
  let fileA: string;
  let fileB: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), "hash-compare-validate-"));
    fileA = path.join(testDir, "a.txt");
    fileB = path.join(testDir, "b.txt");
    fs.writeFileSync(fileA, "alpha");
    fs.writeFileSync(fileB, "beta");
    validator = new InputValidator();
  });

  afterEach(() => {
    if (fs.existsSync(testDir)) {
      fs.rmSync(testDir, { recursive: true, force: true });
    }
  });

  it("should produce a default configuration", async () => {
    const config = await validator.validate({ files: [fileA, fileB] });

    expect(config).toEqual({
      files: [fileA, fileB],
      algorithms: ["SHA512"],
      expectedDigest: undefined,
      quiet: false,
      fast: false,
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.files)).toBe(true);
  });

  it("should resolve explicit algorithms and flags", async () => {
    const config = await validator.validate({
      files: [fileA, fileB],
      algorithms: ["md5,sha1", "MD5"],
      quiet: true,
      fast: true,
    });

    expect(config.algorithms).toEqual(["MD5", "SHA1"]);
    expect(config.quiet).toBe(true);
    expect(config.fast).toBe(true);
  });

  it("should require two files without an expected digest", async () => {
    expect(await issuesOf(validator.validate({ files: [fileA] }))).toEqual([
      { kind: "InsufficientFiles", required: 2, received: 1 },
    ]);
  });

  it("should accept a single file with an expected digest", async () => {
    const config = await validator.validate({
      files: [fileA],
      expected: `  ${MD5_EMPTY.toUpperCase()}\n`,
    });

    expect(config.algorithms).toEqual(["MD5"]);
    expect(config.expectedDigest).toBe(MD5_EMPTY.toUpperCase());
  });

  it("should require one file with an expected digest", async () => {
    expect(
      await issuesOf(validator.validate({ files: [], expected: MD5_EMPTY }))
    ).toEqual([{ kind: "InsufficientFiles", required: 1, received: 0 }]);
  });

  it("should report every missing path and directory together", async () => {
    const missing = path.join(testDir, "missing.txt");
    const subdir = path.join(testDir, "subdir");
    fs.mkdirSync(subdir);

    expect(
      await issuesOf(validator.validate({ files: [missing, fileA, subdir] }))
    ).toEqual([
      { kind: "PathNotFound", path: missing, code: "ENOENT" },
      { kind: "PathIsDirectory", path: subdir },
    ]);
  });

  it("should report unreadable paths alongside missing ones and directories", async () => {
    const loopA = path.join(testDir, "loop-a");
    const loopB = path.join(testDir, "loop-b");
    fs.symlinkSync(loopB, loopA);
    fs.symlinkSync(loopA, loopB);
    const missing = path.join(testDir, "missing.txt");
    const subdir = path.join(testDir, "subdir");
    fs.mkdirSync(subdir);
    const overlong = path.join(testDir, "x".repeat(300));

    expect(
      await issuesOf(
        validator.validate({ files: [loopA, missing, subdir, overlong, fileA] })
      )
    ).toEqual([
      { kind: "PathNotFound", path: loopA, code: "ELOOP" },
      { kind: "PathNotFound", path: missing, code: "ENOENT" },
      { kind: "PathIsDirectory", path: subdir },
      { kind: "PathNotFound", path: overlong, code: "ENAMETOOLONG" },
    ]);
  });

  it("should report unknown algorithm names", async () => {
    expect(
      await issuesOf(
        validator.validate({ files: [fileA, fileB], algorithms: ["SHA256,crc32"] })
      )
    ).toEqual([{ kind: "UnknownAlgorithm", name: "crc32" }]);
  });

  it("should reject an expected digest combined with explicit algorithms", async () => {
    expect(
      await issuesOf(
        validator.validate({
          files: [fileA],
          algorithms: ["MD5"],
          expected: MD5_EMPTY,
        })
      )
    ).toEqual([{ kind: "ConflictingModes", algorithms: ["MD5"] }]);
  });

  it("should allow the default algorithm alongside an expected digest", async () => {
    const config = await validator.validate({
      files: [fileA],
      algorithms: ["SHA512"],
      expected: MD5_EMPTY,
    });

    expect(config.algorithms).toEqual(["MD5"]);
  });

  it("should reject an expected digest of unsupported length", async () => {
    expect(
      await issuesOf(validator.validate({ files: [fileA], expected: "abc123" }))
    ).toEqual([
      { kind: "UnsupportedDigestLength", length: 6, supported: DIGEST_LENGTHS },
    ]);
  });

  it("should collect violations of every rule in order", async () => {
    const missing = path.join(testDir, "missing.txt");

    expect(
      await issuesOf(
        validator.validate({
          files: [],
          algorithms: ["SHA1"],
          expected: "xyz",
        })
      )
    ).toEqual([
      { kind: "InsufficientFiles", required: 1, received: 0 },
      { kind: "ConflictingModes", algorithms: ["SHA1"] },
      { kind: "UnsupportedDigestLength", length: 3, supported: DIGEST_LENGTHS },
    ]);

    expect(
      await issuesOf(
        validator.validate({ files: [missing], algorithms: ["nope"] })
      )
    ).toEqual([
      { kind: "InsufficientFiles", required: 2, received: 1 },
      { kind: "PathNotFound", path: missing, code: "ENOENT" },
      { kind: "UnknownAlgorithm", name: "nope" },
    ]);
  });
});
