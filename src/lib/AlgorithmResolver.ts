/**
 * Turns an algorithm selection (or an expected digest) into the ordered list
 * of algorithms a run will compute.
 */

import {
  AlgorithmName,
  AlgorithmSelector,
  ALL_ALGORITHMS,
  DEFAULT_ALGORITHM,
  DIGEST_LENGTHS,
  ValidationError,
} from "../types";

export interface ParsedSelection {
  selectors: AlgorithmSelector[];
  /** Raw names that matched no algorithm */
  unknown: string[];
}

const SELECTOR_ALIASES: Record<string, AlgorithmSelector> = {
  md5: "MD5",
  sha1: "SHA1",
  "sha-1": "SHA1",
  sha256: "SHA256",
  "sha-256": "SHA256",
  sha384: "SHA384",
  "sha-384": "SHA384",
  sha512: "SHA512",
  "sha-512": "SHA512",
  all: "All",
};

export class AlgorithmResolver {
  /**
   * Parse raw user input. Values may repeat and may be comma-separated;
   * matching ignores case.
   */
  static parseSelection(raw: readonly string[]): ParsedSelection {
    const selectors: AlgorithmSelector[] = [];
    const unknown: string[] = [];

    for (const value of raw) {
      for (const part of value.split(",")) {
        const name = part.trim();
        if (name === "") {
          continue;
        }
        const selector = SELECTOR_ALIASES[name.toLowerCase()];
        if (selector === undefined) {
          unknown.push(name);
        } else {
          selectors.push(selector);
        }
      }
    }

    return { selectors, unknown };
  }

  /**
   * Algorithm whose digest has exactly this many hex characters
   */
  static inferAlgorithm(expected: string): AlgorithmName | undefined {
    return ALL_ALGORITHMS.find(
      (algorithm) => DIGEST_LENGTHS[algorithm] === expected.length
    );
  }

  /**
   * True when the selection is anything other than nothing or the default
   */
  static isExplicitSelection(
    selection: readonly AlgorithmSelector[] | undefined
  ): boolean {
    if (selection === undefined || selection.length === 0) {
      return false;
    }
    return selection.some((selector) => selector !== DEFAULT_ALGORITHM);
  }

  /**
   * Resolve the algorithms to run, in order and without duplicates.
   *
   * In expected mode the expected digest alone decides: exactly one
   * algorithm, inferred from its length.
   */
  static resolve(
    selection: readonly AlgorithmSelector[] | undefined,
    expected?: string
  ): AlgorithmName[] {
    if (expected !== undefined) {
      const inferred = AlgorithmResolver.inferAlgorithm(expected);
      if (inferred === undefined) {
        throw new ValidationError([
          {
            kind: "UnsupportedDigestLength",
            length: expected.length,
            supported: DIGEST_LENGTHS,
          },
        ]);
      }
      return [inferred];
    }

    if (selection === undefined || selection.length === 0) {
      return [DEFAULT_ALGORITHM];
    }

    if (selection.includes("All")) {
      return [...ALL_ALGORITHMS];
    }

    const resolved: AlgorithmName[] = [];
    for (const selector of selection) {
      if (selector !== "All" && !resolved.includes(selector)) {
        resolved.push(selector);
      }
    }
    return resolved;
  }
}
