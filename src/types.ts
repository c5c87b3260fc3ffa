/**
 * Common types for hash-compare
 *
 * This module defines the algorithm vocabulary, the run data model and the
 * error types used throughout the engine, the CLI and the MCP server.
 */

/**
 * Hash algorithms the engine can run.
 */
export type AlgorithmName = "MD5" | "SHA1" | "SHA256" | "SHA384" | "SHA512";

/**
 * Anything a caller may select: a concrete algorithm or the "All" shorthand.
 */
export type AlgorithmSelector = AlgorithmName | "All";

/**
 * Hex digest length per algorithm. Lengths are pairwise distinct, which is
 * what lets an expected digest name its own algorithm.
 */
export const DIGEST_LENGTHS: Readonly<Record<AlgorithmName, number>> = {
  MD5: 32,
  SHA1: 40,
  SHA256: 64,
  SHA384: 96,
  SHA512: 128,
};

/**
 * Order used when "All" is selected (strongest first).
 */
export const ALL_ALGORITHMS: readonly AlgorithmName[] = [
  "SHA512",
  "SHA384",
  "SHA256",
  "SHA1",
  "MD5",
];

export const DEFAULT_ALGORITHM: AlgorithmName = "SHA512";

/**
 * Immutable description of one comparison run
 */
export interface RunConfiguration {
  readonly files: readonly string[];
  /** Non-empty, no duplicates; exactly one entry in expected mode */
  readonly algorithms: readonly AlgorithmName[];
  readonly expectedDigest?: string;
  readonly quiet: boolean;
  readonly fast: boolean;
}

/**
 * Per-file digest table, filled in as each algorithm runs
 */
export interface FileEntry {
  path: string;
  digests: Map<AlgorithmName, string>;
}

export interface ComparisonOutcome {
  matched: boolean;
  algorithmStoppedAt: AlgorithmName;
  expectedValue?: string;
  /** Algorithms actually hashed, in order */
  algorithmsComputed: AlgorithmName[];
  files: FileEntry[];
}

/**
 * One violation found while validating a run request.
 */
export type ValidationIssue =
  | { kind: "InsufficientFiles"; required: number; received: number }
  | { kind: "PathNotFound"; path: string; code?: string }
  | { kind: "PathIsDirectory"; path: string }
  | { kind: "UnknownAlgorithm"; name: string }
  | { kind: "ConflictingModes"; algorithms: string[] }
  | {
      kind: "UnsupportedDigestLength";
      length: number;
      supported: Readonly<Record<AlgorithmName, number>>;
    };

/**
 * errno code of a Node system error ("ENOENT", "EACCES", ...)
 *
 * Checked structurally: errors raised by fs in another realm (a test
 * runner's sandbox) fail `instanceof Error`.
 */
export function errnoCode(error: unknown): string | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return undefined;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return String(error);
}

/**
 * Validation error - thrown when a run request is rejected before hashing
 *
 * Carries every issue found, not just the first one.
 *
 * @example
 * ```typescript
 * throw new ValidationError([{ kind: "PathNotFound", path: "a.bin" }]);
 * ```
 */
export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[], message?: string) {
    super(
      message ??
        `Invalid input: ${issues.map((issue) => issue.kind).join(", ")}`
    );
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/**
 * Filesystem error - thrown when filesystem operations fail
 *
 * Common causes:
 * - File not found
 * - Permission denied
 * - Read error
 * - File modified during operation
 */
export class FileSystemError extends Error {
  readonly code?: string;

  constructor(message: string, code?: string) {
    super(message);
    this.name = "FileSystemError";
    this.code = code;
  }
}

/**
 * Hashing a file failed after validation passed. Aborts the run.
 */
export class HashComputationError extends FileSystemError {
  readonly path: string;
  readonly algorithm: AlgorithmName;

  constructor(
    message: string,
    path: string,
    algorithm: AlgorithmName,
    code?: string
  ) {
    super(message, code);
    this.name = "HashComputationError";
    this.path = path;
    this.algorithm = algorithm;
  }
}

/**
 * Structured error response
 *
 * @example
 * ```json
 * {
 *   "error": {
 *     "code": "UNSUPPORTED_DIGEST_LENGTH",
 *     "message": "Expected digest has 12 characters",
 *     "details": { "supported": { "MD5": 32 } }
 *   }
 * }
 * ```
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export interface SuccessResponse<T = unknown> {
  status: "success";
  data: T;
}
