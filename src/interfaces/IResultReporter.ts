/**
 * Result reporter interface
 */

import { AlgorithmName, ComparisonOutcome } from "../types";

export interface DigestRow {
  algorithm: AlgorithmName;
  digest: string;
  path: string;
}

export interface IResultReporter {
  /**
   * Called once per computed digest, in computation order.
   * @param withHeader - True only for the first digest of a run
   */
  reportDigest(row: DigestRow, withHeader: boolean): void;

  /**
   * Called once with the final outcome of a run.
   * @returns The verdict line
   */
  reportVerdict(outcome: ComparisonOutcome): string;
}
