/**
 * Comparison engine
 *
 * Runs each algorithm in order over every file, compares the digests either
 * to the first file or to the expected digest, and stops on the first
 * mismatch (or, in fast mode, on the first match).
 */

import * as crypto from "crypto";
import { IDigestProvider } from "../interfaces/IDigestProvider";
import { IResultReporter } from "../interfaces/IResultReporter";
import {
  AlgorithmName,
  ComparisonOutcome,
  FileEntry,
  RunConfiguration,
} from "../types";

export interface ComparisonEngineOptions {
  /** Receives digest rows; omitted means nothing is reported */
  reporter?: IResultReporter;
  /** Compare with crypto.timingSafeEqual instead of string equality */
  timingSafeCompare?: boolean;
}

/**
 * Case-insensitive hex comparison
 */
export function digestsEqual(
  left: string,
  right: string,
  timingSafe = false
): boolean {
  const a = left.toLowerCase();
  const b = right.toLowerCase();
  if (!timingSafe) {
    return a === b;
  }
  const bufferA = Buffer.from(a, "utf-8");
  const bufferB = Buffer.from(b, "utf-8");
  if (bufferA.length !== bufferB.length) {
    return false;
  }
  return crypto.timingSafeEqual(bufferA, bufferB);
}

export class ComparisonEngine {
  private digestProvider: IDigestProvider;
  private reporter?: IResultReporter;
  private timingSafeCompare: boolean;

  constructor(
    digestProvider: IDigestProvider,
    options: ComparisonEngineOptions = {}
  ) {
    this.digestProvider = digestProvider;
    this.reporter = options.reporter;
    this.timingSafeCompare = options.timingSafeCompare ?? false;
  }

  /**
   * Run one comparison. A HashComputationError from the digest provider
   * aborts the run and is rethrown; no outcome is produced.
   */
  async run(config: RunConfiguration): Promise<ComparisonOutcome> {
    if (config.algorithms.length === 0) {
      throw new Error("Run configuration has no algorithms");
    }

    const files: FileEntry[] = config.files.map((filePath) => ({
      path: filePath,
      digests: new Map<AlgorithmName, string>(),
    }));
    const algorithmsComputed: AlgorithmName[] = [];
    // Header goes out with the first digest of this run only
    let headerPending = true;

    for (const algorithm of config.algorithms) {
      // Every file is hashed before comparing so the digest table is complete
      for (const entry of files) {
        const result = await this.digestProvider.computeDigest(
          entry.path,
          algorithm
        );
        entry.digests.set(algorithm, result.digest);

        if (!config.quiet && this.reporter) {
          this.reporter.reportDigest(
            { algorithm, digest: result.digest, path: entry.path },
            headerPending
          );
          headerPending = false;
        }
      }
      algorithmsComputed.push(algorithm);

      const matched = this.compareAlgorithm(files, algorithm, config);

      if (!matched || config.fast) {
        return {
          matched,
          algorithmStoppedAt: algorithm,
          expectedValue: config.expectedDigest,
          algorithmsComputed,
          files,
        };
      }
    }

    return {
      matched: true,
      algorithmStoppedAt: config.algorithms[config.algorithms.length - 1],
      expectedValue: config.expectedDigest,
      algorithmsComputed,
      files,
    };
  }

  private compareAlgorithm(
    files: FileEntry[],
    algorithm: AlgorithmName,
    config: RunConfiguration
  ): boolean {
    const digests = files.map((entry) => entry.digests.get(algorithm) ?? "");

    const source =
      config.expectedDigest !== undefined ? config.expectedDigest : digests[0];
    const compareSet =
      config.expectedDigest !== undefined ? digests : digests.slice(1);

    return compareSet.every((digest) =>
      digestsEqual(digest, source, this.timingSafeCompare)
    );
  }
}
