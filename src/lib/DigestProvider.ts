/**
 * Digest provider implementation
 */

import * as crypto from "crypto";
import * as fs from "fs";
import {
  IDigestProvider,
  DigestProviderOptions,
  DigestResult,
} from "../interfaces/IDigestProvider";
import {
  AlgorithmName,
  errnoCode,
  errorMessage,
  HashComputationError,
} from "../types";

/**
 * Node's crypto name for each algorithm
 */
const NODE_ALGORITHMS: Record<AlgorithmName, string> = {
  MD5: "md5",
  SHA1: "sha1",
  SHA256: "sha256",
  SHA384: "sha384",
  SHA512: "sha512",
};

export const DEFAULT_HIGH_WATER_MARK = 64 * 1024;

export class DigestProvider implements IDigestProvider {
  private detectModification: boolean;
  private highWaterMark: number;

  constructor(options: DigestProviderOptions = {}) {
    this.detectModification = options.detectModification ?? true;
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
  }

  /**
   * Compute the digest of a file by streaming it through the hash
   */
  async computeDigest(
    filePath: string,
    algorithm: AlgorithmName
  ): Promise<DigestResult> {
    let initialMtime: number;
    try {
      const stats = await fs.promises.stat(filePath);
      if (!stats.isFile()) {
        throw new HashComputationError(
          `Path is not a file: ${filePath}`,
          filePath,
          algorithm,
          "EISDIR"
        );
      }
      initialMtime = stats.mtimeMs;
    } catch (error) {
      throw this.toHashError(error, filePath, algorithm);
    }

    const digest = await new Promise<string>((resolve, reject) => {
      const hash = crypto.createHash(NODE_ALGORITHMS[algorithm]);
      const stream = fs.createReadStream(filePath, {
        highWaterMark: this.highWaterMark,
      });

      stream.on("data", (data) => {
        hash.update(data);
      });

      stream.on("end", () => {
        resolve(hash.digest("hex"));
      });

      stream.on("error", (error) => {
        reject(this.toHashError(error, filePath, algorithm));
      });
    });

    if (this.detectModification) {
      let currentMtime: number;
      try {
        currentMtime = (await fs.promises.stat(filePath)).mtimeMs;
      } catch (error) {
        throw this.toHashError(error, filePath, algorithm);
      }
      if (currentMtime !== initialMtime) {
        throw new HashComputationError(
          `File was modified during digest computation: ${filePath}`,
          filePath,
          algorithm,
          "FILE_MODIFIED"
        );
      }
    }

    return { path: filePath, algorithm, digest };
  }

  private toHashError(
    error: unknown,
    filePath: string,
    algorithm: AlgorithmName
  ): HashComputationError {
    if (error instanceof HashComputationError) {
      return error;
    }
    return new HashComputationError(
      `Error reading file ${filePath}: ${errorMessage(error)}`,
      filePath,
      algorithm,
      errnoCode(error)
    );
  }
}
