/**
 * Error handler for hash-compare
 * Provides structured error responses with specific error codes
 */

import { ZodError } from "zod";
import {
  AlgorithmName,
  FileSystemError,
  HashComputationError,
  ErrorResponse,
  ValidationError,
  ValidationIssue,
} from "../types";

/**
 * Error codes for different error types
 */
export enum ErrorCode {
  // Validation errors
  VALIDATION_ERROR = "VALIDATION_ERROR",
  INSUFFICIENT_FILES = "INSUFFICIENT_FILES",
  PATH_NOT_FOUND = "PATH_NOT_FOUND",
  PATH_IS_DIRECTORY = "PATH_IS_DIRECTORY",
  UNKNOWN_ALGORITHM = "UNKNOWN_ALGORITHM",
  CONFLICTING_MODES = "CONFLICTING_MODES",
  UNSUPPORTED_DIGEST_LENGTH = "UNSUPPORTED_DIGEST_LENGTH",
  INVALID_ARGUMENT = "INVALID_ARGUMENT",

  // Hashing errors
  HASH_COMPUTATION_ERROR = "HASH_COMPUTATION_ERROR",
  FILE_NOT_FOUND = "FILE_NOT_FOUND",
  PERMISSION_DENIED = "PERMISSION_DENIED",
  FILE_MODIFIED = "FILE_MODIFIED",
  IO_ERROR = "IO_ERROR",

  // Generic errors
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

const ISSUE_CODES: Record<ValidationIssue["kind"], ErrorCode> = {
  InsufficientFiles: ErrorCode.INSUFFICIENT_FILES,
  PathNotFound: ErrorCode.PATH_NOT_FOUND,
  PathIsDirectory: ErrorCode.PATH_IS_DIRECTORY,
  UnknownAlgorithm: ErrorCode.UNKNOWN_ALGORITHM,
  ConflictingModes: ErrorCode.CONFLICTING_MODES,
  UnsupportedDigestLength: ErrorCode.UNSUPPORTED_DIGEST_LENGTH,
};

/**
 * Error handler class
 * Converts errors to structured responses and human-readable lines
 */
export class ErrorHandler {
  /**
   * Convert an error to a structured error response
   */
  static toErrorResponse(error: unknown): ErrorResponse {
    if (error instanceof ValidationError) {
      return this.handleValidationError(error);
    }

    if (error instanceof FileSystemError) {
      return this.handleFileSystemError(error);
    }

    if (error instanceof ZodError) {
      return {
        error: {
          code: ErrorCode.INVALID_ARGUMENT,
          message: error.issues
            .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; "),
          details: {
            type: "validation_error",
            remediation: "Check the tool arguments and try again",
          },
        },
      };
    }

    if (error instanceof Error) {
      return {
        error: {
          code: ErrorCode.INTERNAL_ERROR,
          message: error.message || "An unexpected error occurred",
          details: {
            name: error.name,
            stack:
              process.env["NODE_ENV"] === "development"
                ? error.stack
                : undefined,
          },
        },
      };
    }

    return {
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: String(error),
      },
    };
  }

  /**
   * Error code for a single validation issue
   */
  static codeForIssue(issue: ValidationIssue): ErrorCode {
    return ISSUE_CODES[issue.kind];
  }

  /**
   * One human-readable line per validation issue
   */
  static describeIssue(issue: ValidationIssue): string {
    switch (issue.kind) {
      case "InsufficientFiles":
        return `At least ${issue.required} file(s) required, ${issue.received} given`;
      case "PathNotFound":
        return issue.code === undefined || issue.code === "ENOENT"
          ? `File not found: ${issue.path}`
          : `Cannot access file (${issue.code}): ${issue.path}`;
      case "PathIsDirectory":
        return `Path is not a file: ${issue.path}`;
      case "UnknownAlgorithm":
        return `Unknown algorithm: ${issue.name}`;
      case "ConflictingModes":
        return `An expected digest selects its own algorithm and cannot be combined with --algorithms (${issue.algorithms.join(", ")})`;
      case "UnsupportedDigestLength":
        return `Expected digest length ${issue.length} matches no supported algorithm (${formatLengthTable(issue.supported)})`;
    }
  }

  private static handleValidationError(error: ValidationError): ErrorResponse {
    const code =
      error.issues.length === 1
        ? this.codeForIssue(error.issues[0])
        : ErrorCode.VALIDATION_ERROR;

    return {
      error: {
        code,
        message: error.message,
        details: {
          type: "validation_error",
          issues: error.issues.map((issue) => ({
            ...issue,
            code: this.codeForIssue(issue),
            message: this.describeIssue(issue),
          })),
        },
      },
    };
  }

  private static handleFileSystemError(error: FileSystemError): ErrorResponse {
    let code = ErrorCode.IO_ERROR;

    switch (error.code) {
      case "ENOENT":
        code = ErrorCode.FILE_NOT_FOUND;
        break;
      case "EACCES":
      case "EPERM":
        code = ErrorCode.PERMISSION_DENIED;
        break;
      case "FILE_MODIFIED":
        code = ErrorCode.FILE_MODIFIED;
        break;
    }

    const details: Record<string, unknown> = {
      type: "filesystem_error",
      errno: error.code,
    };
    if (error instanceof HashComputationError) {
      details["path"] = error.path;
      details["algorithm"] = error.algorithm;
      details["kind"] = ErrorCode.HASH_COMPUTATION_ERROR;
    }

    return {
      error: {
        code,
        message: error.message,
        details,
      },
    };
  }

  /**
   * Log error for debugging as one JSON line (stderr unless a sink is given)
   */
  static logError(
    error: Error,
    context?: Record<string, unknown>,
    write: (line: string) => void = (line) => console.error(line)
  ): void {
    write(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level: "ERROR",
        message: error.message,
        name: error.name,
        stack: error.stack,
        context,
      })
    );
  }
}

function formatLengthTable(
  table: Readonly<Record<AlgorithmName, number>>
): string {
  return Object.entries(table)
    .map(([algorithm, length]) => `${algorithm}: ${length}`)
    .join(", ");
}
