/**
 * Core interfaces for hash-compare
 */

export * from "./IDigestProvider";
export * from "./IResultReporter";
