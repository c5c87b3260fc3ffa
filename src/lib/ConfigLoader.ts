/**
 * Configuration loader for hash-compare
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { DEFAULT_HIGH_WATER_MARK } from "./DigestProvider";
import { ValidationError } from "../types";

export const CONFIG_FILE_NAME = "hash-compare.config.json";

const configSchema = z
  .object({
    timingSafeCompare: z.boolean().default(false),
    detectModification: z.boolean().default(true),
    highWaterMark: z
      .number()
      .int()
      .positive()
      .default(DEFAULT_HIGH_WATER_MARK),
    color: z.boolean().optional(),
  })
  .strict();

export interface HashCompareConfig {
  timingSafeCompare: boolean;
  detectModification: boolean;
  highWaterMark: number;
  color: boolean;
}

export class ConfigLoader {
  /**
   * Load configuration from file, then apply environment overrides
   */
  static async loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    cwd: string = process.cwd()
  ): Promise<HashCompareConfig> {
    const configPath =
      env["HASH_COMPARE_CONFIG"] || path.join(cwd, CONFIG_FILE_NAME);

    let raw: unknown = {};
    if (fs.existsSync(configPath)) {
      const configData = await fs.promises.readFile(configPath, "utf-8");
      try {
        raw = JSON.parse(configData);
      } catch (error) {
        throw new ValidationError(
          [],
          `Invalid JSON in ${configPath}: ${
            error instanceof Error ? error.message : String(error)
          }`
        );
      }
    }

    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ValidationError([], `Invalid configuration in ${configPath}: ${details}`);
    }

    const config: HashCompareConfig = {
      timingSafeCompare: parsed.data.timingSafeCompare,
      detectModification: parsed.data.detectModification,
      highWaterMark: parsed.data.highWaterMark,
      color: parsed.data.color ?? true,
    };

    if (env["HASH_COMPARE_TIMING_SAFE"] === "1") {
      config.timingSafeCompare = true;
    }
    if (env["NO_COLOR"] !== undefined && env["NO_COLOR"] !== "") {
      config.color = false;
    }

    return config;
  }
}
