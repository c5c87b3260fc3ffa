/**
 * Input validation for comparison runs
 */

import * as fs from "fs";
import { AlgorithmResolver } from "./AlgorithmResolver";
import {
  DIGEST_LENGTHS,
  errnoCode,
  RunConfiguration,
  ValidationError,
  ValidationIssue,
} from "../types";

export interface RunRequest {
  files: readonly string[];
  /** Raw algorithm names as typed by the caller; absent means default */
  algorithms?: readonly string[];
  expected?: string;
  quiet?: boolean;
  fast?: boolean;
}

export class InputValidator {
  /**
   * Validate a run request and produce its configuration.
   *
   * Every violation is collected before rejecting, so a missing path and a
   * directory path given together are both reported.
   */
  async validate(request: RunRequest): Promise<RunConfiguration> {
    const issues: ValidationIssue[] = [];
    const expected = request.expected?.trim();
    const expectedMode = expected !== undefined;

    const required = expectedMode ? 1 : 2;
    if (request.files.length < required) {
      issues.push({
        kind: "InsufficientFiles",
        required,
        received: request.files.length,
      });
    }

    for (const filePath of request.files) {
      const issue = await this.checkPath(filePath);
      if (issue) {
        issues.push(issue);
      }
    }

    const { selectors, unknown } = AlgorithmResolver.parseSelection(
      request.algorithms ?? []
    );
    for (const name of unknown) {
      issues.push({ kind: "UnknownAlgorithm", name });
    }

    if (expectedMode) {
      if (AlgorithmResolver.isExplicitSelection(selectors)) {
        issues.push({ kind: "ConflictingModes", algorithms: selectors });
      }
      if (AlgorithmResolver.inferAlgorithm(expected) === undefined) {
        issues.push({
          kind: "UnsupportedDigestLength",
          length: expected.length,
          supported: DIGEST_LENGTHS,
        });
      }
    }

    if (issues.length > 0) {
      throw new ValidationError(issues);
    }

    return Object.freeze({
      files: Object.freeze([...request.files]),
      algorithms: Object.freeze(
        AlgorithmResolver.resolve(
          expectedMode ? undefined : selectors,
          expected
        )
      ),
      expectedDigest: expected,
      quiet: request.quiet ?? false,
      fast: request.fast ?? false,
    });
  }

  private async checkPath(
    filePath: string
  ): Promise<ValidationIssue | undefined> {
    try {
      const stats = await fs.promises.stat(filePath);
      if (!stats.isFile()) {
        return { kind: "PathIsDirectory", path: filePath };
      }
      return undefined;
    } catch (error) {
      // Missing, unreadable, looping or overlong paths all count as not found
      return { kind: "PathNotFound", path: filePath, code: errnoCode(error) };
    }
  }
}
