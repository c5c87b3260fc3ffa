/**
 * Result reporters: console table output and an in-memory collector
 */

import chalk from "chalk";
import { DigestRow, IResultReporter } from "../interfaces/IResultReporter";
import { ComparisonOutcome } from "../types";

const ALGORITHM_COLUMN_WIDTH = 9;

/**
 * Verdict line for an outcome
 */
export function formatVerdict(outcome: ComparisonOutcome): string {
  if (outcome.expectedValue !== undefined) {
    return outcome.matched
      ? "MATCH EXPECTED"
      : `MISMATCH, expected ${outcome.expectedValue}`;
  }
  return outcome.matched ? "MATCH" : "MISMATCH";
}

export interface ConsoleReporterOptions {
  /** Line sink; defaults to console.log */
  write?: (line: string) => void;
  color?: boolean;
}

export class ConsoleReporter implements IResultReporter {
  private write: (line: string) => void;
  private color: boolean;

  constructor(options: ConsoleReporterOptions = {}) {
    this.write = options.write ?? ((line) => console.log(line));
    this.color = options.color ?? true;
  }

  reportDigest(row: DigestRow, withHeader: boolean): void {
    if (withHeader) {
      const width = row.digest.length;
      const header = formatRow("Algorithm", "Hash".padEnd(width), "Path");
      this.write("");
      this.write(this.color ? chalk.bold(header) : header);
      this.write(formatRow("---------", "----".padEnd(width), "----"));
    }
    this.write(formatRow(row.algorithm, row.digest, row.path));
  }

  reportVerdict(outcome: ComparisonOutcome): string {
    const verdict = formatVerdict(outcome);
    if (!this.color) {
      this.write(verdict);
    } else if (outcome.matched) {
      this.write(chalk.green(verdict));
    } else {
      this.write(chalk.red(verdict));
    }
    return verdict;
  }
}

/**
 * Keeps rows and the verdict for callers that render them elsewhere
 */
export class MemoryReporter implements IResultReporter {
  readonly rows: DigestRow[] = [];
  headerCount = 0;
  verdict?: string;

  reportDigest(row: DigestRow, withHeader: boolean): void {
    if (withHeader) {
      this.headerCount++;
    }
    this.rows.push({ ...row });
  }

  reportVerdict(outcome: ComparisonOutcome): string {
    this.verdict = formatVerdict(outcome);
    return this.verdict;
  }
}

function formatRow(algorithm: string, digest: string, filePath: string): string {
  return `${algorithm.padEnd(ALGORITHM_COLUMN_WIDTH)} ${digest} ${filePath}`;
}
