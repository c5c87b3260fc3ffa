/**
 * Digest provider interface
 */

import { AlgorithmName } from "../types";

export interface DigestResult {
  path: string;
  algorithm: AlgorithmName;
  /** Lowercase hex */
  digest: string;
}

export interface DigestProviderOptions {
  /** Reject when the file's mtime changes while it is being read */
  detectModification?: boolean;
  /** Read chunk size in bytes */
  highWaterMark?: number;
}

export interface IDigestProvider {
  /**
   * Compute the digest of a file's full content
   * @param filePath - Path to file
   * @param algorithm - Hash algorithm to use
   * @returns Digest result
   * @throws HashComputationError when the file cannot be read
   */
  computeDigest(
    filePath: string,
    algorithm: AlgorithmName
  ): Promise<DigestResult>;
}
