/**
 * Core library exports for hash-compare
 */

export * from "./AlgorithmResolver";
export * from "./InputValidator";
export * from "./DigestProvider";
export * from "./ComparisonEngine";
export * from "./ResultReporter";
export * from "./CommandLine";
export * from "./MCPServer";
export * from "./MCPTools";
export * from "./ConfigLoader";
export * from "./ErrorHandler";
