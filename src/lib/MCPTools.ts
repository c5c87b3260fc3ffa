/**
 * MCP tool definitions for digest comparison
 *
 * Provides 2 MCP tools:
 * 1. compare_files - Compare file digests with each other or an expected digest
 * 2. infer_algorithm - Name the algorithm an expected digest belongs to
 */

import { z } from "zod";
import { AlgorithmResolver } from "./AlgorithmResolver";
import { ComparisonEngine } from "./ComparisonEngine";
import { InputValidator } from "./InputValidator";
import { MemoryReporter } from "./ResultReporter";
import { IDigestProvider } from "../interfaces/IDigestProvider";
import { DigestRow } from "../interfaces/IResultReporter";
import {
  AlgorithmName,
  DIGEST_LENGTHS,
  SuccessResponse,
  ValidationError,
} from "../types";

export interface CompareFilesResult {
  verdict: string;
  matched: boolean;
  algorithmStoppedAt: AlgorithmName;
  expected?: string;
  digests: DigestRow[];
}

export interface InferAlgorithmResult {
  algorithm: AlgorithmName;
  length: number;
}

export interface ToolSchema {
  name: string;
  description: string;
  inputSchema: z.AnyZodObject;
}

export interface JsonSchemaProperty {
  type: string;
  items?: JsonSchemaProperty;
  description?: string;
}

/**
 * JSON Schema advertised through list_tools
 */
export interface ToolJsonSchema {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
}

const compareFilesSchema = z.object({
  files: z.array(z.string()).describe("Paths of the files to compare"),
  algorithms: z
    .array(z.string())
    .optional()
    .describe("Algorithms to run (MD5, SHA1, SHA256, SHA384, SHA512, All)"),
  expected: z.string().optional().describe("Expected digest"),
  fast: z
    .boolean()
    .optional()
    .describe("Stop after the first algorithm that matches"),
});

const inferAlgorithmSchema = z.object({
  digest: z.string().describe("Hex digest"),
});

/**
 * MCP Tools class
 * Provides all tool implementations for the hash-compare MCP server
 */
export class MCPTools {
  private digestProvider: IDigestProvider;
  private timingSafeCompare: boolean;

  constructor(digestProvider: IDigestProvider, timingSafeCompare = false) {
    this.digestProvider = digestProvider;
    this.timingSafeCompare = timingSafeCompare;
  }

  /**
   * Validate arguments against the tool's schema and dispatch
   */
  async callTool(name: string, args: unknown): Promise<SuccessResponse> {
    switch (name) {
      case "compare_files":
        return this.compareFiles(compareFilesSchema.parse(args ?? {}));
      case "infer_algorithm":
        return this.inferAlgorithm(inferAlgorithmSchema.parse(args ?? {}));
      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  }

  /**
   * Tool 1: compare_files
   */
  async compareFiles(
    args: z.infer<typeof compareFilesSchema>
  ): Promise<SuccessResponse<CompareFilesResult>> {
    const config = await new InputValidator().validate({
      files: args.files,
      algorithms: args.algorithms,
      expected: args.expected,
      fast: args.fast ?? false,
    });

    const reporter = new MemoryReporter();
    const engine = new ComparisonEngine(this.digestProvider, {
      reporter,
      timingSafeCompare: this.timingSafeCompare,
    });
    const outcome = await engine.run(config);

    return {
      status: "success",
      data: {
        verdict: reporter.reportVerdict(outcome),
        matched: outcome.matched,
        algorithmStoppedAt: outcome.algorithmStoppedAt,
        expected: outcome.expectedValue,
        digests: reporter.rows,
      },
    };
  }

  static getCompareFilesSchema(): ToolSchema {
    return {
      name: "compare_files",
      description:
        "Compare file digests with each other, or with an expected digest whose length selects the algorithm",
      inputSchema: compareFilesSchema,
    };
  }

  /**
   * Tool 2: infer_algorithm
   */
  async inferAlgorithm(
    args: z.infer<typeof inferAlgorithmSchema>
  ): Promise<SuccessResponse<InferAlgorithmResult>> {
    const digest = args.digest.trim();
    const algorithm = AlgorithmResolver.inferAlgorithm(digest);
    if (algorithm === undefined) {
      throw new ValidationError([
        {
          kind: "UnsupportedDigestLength",
          length: digest.length,
          supported: DIGEST_LENGTHS,
        },
      ]);
    }

    return {
      status: "success",
      data: { algorithm, length: DIGEST_LENGTHS[algorithm] },
    };
  }

  static getInferAlgorithmSchema(): ToolSchema {
    return {
      name: "infer_algorithm",
      description: "Name the hash algorithm a hex digest was produced by",
      inputSchema: inferAlgorithmSchema,
    };
  }

  /**
   * Convert a tool's zod argument schema to JSON Schema
   */
  static toJsonSchema(schema: z.AnyZodObject): ToolJsonSchema {
    const properties: Record<string, JsonSchemaProperty> = {};
    const required: string[] = [];

    for (const [key, value] of Object.entries<z.ZodTypeAny>(schema.shape)) {
      const inner: z.ZodTypeAny =
        value instanceof z.ZodOptional ? value.unwrap() : value;
      const property = jsonType(inner);
      const description = value.description ?? inner.description;
      properties[key] = description ? { ...property, description } : property;
      if (!value.isOptional()) {
        required.push(key);
      }
    }

    return { type: "object", properties, required };
  }

  /**
   * Get all tool schemas
   */
  static getAllSchemas(): ToolSchema[] {
    return [MCPTools.getCompareFilesSchema(), MCPTools.getInferAlgorithmSchema()];
  }
}

function jsonType(type: z.ZodTypeAny): JsonSchemaProperty {
  if (type instanceof z.ZodArray) {
    return { type: "array", items: jsonType(type.element) };
  }
  if (type instanceof z.ZodBoolean) {
    return { type: "boolean" };
  }
  if (type instanceof z.ZodNumber) {
    return { type: "number" };
  }
  return { type: "string" };
}
