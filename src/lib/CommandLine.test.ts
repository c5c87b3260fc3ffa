/**
 * Integration tests for the command-line front end
 */

import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import * as crypto from "crypto";
import { CliIO, ExitCode, runCli } from "./CommandLine";
import { DigestResult, IDigestProvider } from "../interfaces/IDigestProvider";
import { AlgorithmName, HashComputationError } from "../types";

/**
 * Hashes the first file it sees and fails on every other one
 */
class FailAfterFirstProvider implements IDigestProvider {
  private seen: string[] = [];

  async computeDigest(
    filePath: string,
    algorithm: AlgorithmName
  ): Promise<DigestResult> {
    if (this.seen.length > 0 && !this.seen.includes(filePath)) {
      throw new HashComputationError(
        `Error reading file ${filePath}: EACCES: permission denied`,
        filePath,
        algorithm,
        "EACCES"
      );
    }
    this.seen.push(filePath);
    return { path: filePath, algorithm, digest: "ab".repeat(64) };
  }
}

describe("runCli", () => {
  let testDir: string;
  let stdout: string[];
  let stderr: string[];
  let io: CliIO;

  const write = (name: string, content: string): string => {
    const file = path.join(testDir, name);
    fs.writeFileSync(file, content);
    return file;
  };

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), "hash-compare-cli-"));
    stdout = [];
    stderr = [];
    io = {
      stdout: (line) => stdout.push(line),
      stderr: (line) => stderr.push(line),
      env: { NO_COLOR: "1" },
      cwd: testDir,
    };
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it("should print the table and MATCH for identical files", async () => {
    const fileA = write("a.txt", "same");
    const fileB = write("b.txt", "same");
    const digest = crypto.createHash("sha512").update("same").digest("hex");

    const code = await runCli([fileA, fileB], io);

    expect(code).toBe(ExitCode.MATCH);
    expect(stdout).toEqual([
      "",
      `Algorithm ${"Hash".padEnd(128)} Path`,
      `--------- ${"----".padEnd(128)} ----`,
      `SHA512    ${digest} ${fileA}`,
      `SHA512    ${digest} ${fileB}`,
      "MATCH",
    ]);
    expect(stderr).toEqual([]);
  });

  it("should print only the verdict when quiet", async () => {
    const fileA = write("a.txt", "one");
    const fileB = write("b.txt", "two");

    const code = await runCli(["-q", "-a", "MD5,SHA1", fileA, fileB], io);

    expect(code).toBe(ExitCode.MISMATCH);
    expect(stdout).toEqual(["MISMATCH"]);
  });

  it("should hash every file against an expected digest", async () => {
    const fileA = write("a.txt", "a");
    const fileB = write("b.txt", "");
    const expected = "D41D8CD98F00B204E9800998ECF8427E";

    const code = await runCli([fileA, fileB, "--expected", expected], io);

    expect(code).toBe(ExitCode.MISMATCH);
    expect(stdout.slice(3)).toEqual([
      `MD5       0cc175b9c0f1b6a831c399e269772661 ${fileA}`,
      `MD5       d41d8cd98f00b204e9800998ecf8427e ${fileB}`,
      `MISMATCH, expected ${expected}`,
    ]);
  });

  it("should print MATCH EXPECTED when the digest matches", async () => {
    const file = write("empty.txt", "");

    const code = await runCli(
      ["--quiet", "-e", "d41d8cd98f00b204e9800998ecf8427e", file],
      io
    );

    expect(code).toBe(ExitCode.MATCH);
    expect(stdout).toEqual(["MATCH EXPECTED"]);
  });

  it("should stop after the first match in fast mode", async () => {
    const fileA = write("a.txt", "same");
    const fileB = write("b.txt", "same");

    const code = await runCli(["--quick", "-a", "All", fileA, fileB], io);

    expect(code).toBe(ExitCode.MATCH);
    expect(stdout.filter((line) => line.startsWith("SHA"))).toHaveLength(2);
    expect(stdout[3].startsWith("SHA512 ")).toBe(true);
  });

  it("should accept the singular algorithm alias", async () => {
    const fileA = write("a.txt", "same");
    const fileB = write("b.txt", "same");

    const code = await runCli(
      ["--algorithm", "sha-256", "--algorithm", "md5", "-q", "-f", fileA, fileB],
      { ...io, env: { NO_COLOR: "1", HASH_COMPARE_DEBUG: "1" } }
    );

    expect(code).toBe(ExitCode.MATCH);
    expect(stderr).toEqual([
      "[hash-compare] Running SHA256, MD5 over 2 file(s)",
      "[hash-compare] Stopped at SHA256",
    ]);
  });

  it("should report every invalid path and skip the verdict", async () => {
    const missing = path.join(testDir, "missing.txt");
    const subdir = path.join(testDir, "dir");
    fs.mkdirSync(subdir);

    const code = await runCli([missing, subdir], io);

    expect(code).toBe(ExitCode.ERROR);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([
      `File not found: ${missing}`,
      `Path is not a file: ${subdir}`,
    ]);
  });

  it("should reject a single file without an expected digest", async () => {
    const file = write("a.txt", "x");

    const code = await runCli([file], io);

    expect(code).toBe(ExitCode.ERROR);
    expect(stderr).toEqual(["At least 2 file(s) required, 1 given"]);
  });

  it("should reject an expected digest combined with algorithms", async () => {
    const file = write("a.txt", "x");

    const code = await runCli(
      ["-a", "MD5", "-e", "d41d8cd98f00b204e9800998ecf8427e", file],
      io
    );

    expect(code).toBe(ExitCode.ERROR);
    expect(stderr).toEqual([
      "An expected digest selects its own algorithm and cannot be combined with --algorithms (MD5)",
    ]);
  });

  it("should fail on usage errors", async () => {
    const code = await runCli([], io);

    expect(code).toBe(ExitCode.ERROR);
    expect(stderr).toEqual(["error: missing required argument 'files'"]);
  });

  it("should list unreadable paths with the other path errors", async () => {
    const overlong = path.join(testDir, "y".repeat(300));
    const missing = path.join(testDir, "missing.txt");

    const code = await runCli([overlong, missing], io);

    expect(code).toBe(ExitCode.ERROR);
    expect(stderr).toEqual([
      `Cannot access file (ENAMETOOLONG): ${overlong}`,
      `File not found: ${missing}`,
    ]);
  });

  it("should abort without a verdict when hashing fails mid-run", async () => {
    const fileA = write("a.txt", "x");
    const fileB = write("b.txt", "x");

    const code = await runCli([fileA, fileB], io, {
      digestProvider: new FailAfterFirstProvider(),
    });

    expect(code).toBe(ExitCode.ERROR);
    expect(stdout).toEqual([
      "",
      `Algorithm ${"Hash".padEnd(128)} Path`,
      `--------- ${"----".padEnd(128)} ----`,
      `SHA512    ${"ab".repeat(64)} ${fileA}`,
    ]);
    expect(stderr).toEqual([
      `Error reading file ${fileB}: EACCES: permission denied`,
    ]);
  });

  it("should send the debug error line to the same stderr sink", async () => {
    const fileA = write("a.txt", "x");
    const fileB = write("b.txt", "x");

    const code = await runCli(
      ["-q", fileA, fileB],
      { ...io, env: { NO_COLOR: "1", HASH_COMPARE_DEBUG: "1" } },
      { digestProvider: new FailAfterFirstProvider() }
    );

    expect(code).toBe(ExitCode.ERROR);
    expect(stdout).toEqual([]);
    expect(stderr).toHaveLength(3);
    expect(stderr[0]).toBe("[hash-compare] Running SHA512 over 2 file(s)");
    expect(stderr[1]).toBe(`Error reading file ${fileB}: EACCES: permission denied`);
    expect(JSON.parse(stderr[2])).toMatchObject({
      level: "ERROR",
      name: "HashComputationError",
    });
  });
});
