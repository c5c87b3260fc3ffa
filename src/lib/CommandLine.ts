/**
 * Command-line front end: parses arguments, runs one comparison and maps the
 * result to an exit code.
 */

import { Command, CommanderError, Option } from "commander";
import { ComparisonEngine } from "./ComparisonEngine";
import { ConfigLoader, HashCompareConfig } from "./ConfigLoader";
import { DigestProvider } from "./DigestProvider";
import { ErrorHandler } from "./ErrorHandler";
import { InputValidator } from "./InputValidator";
import { ConsoleReporter } from "./ResultReporter";
import { IDigestProvider } from "../interfaces/IDigestProvider";
import { DIGEST_LENGTHS, FileSystemError, ValidationError } from "../types";

export enum ExitCode {
  MATCH = 0,
  MISMATCH = 1,
  ERROR = 2,
}

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
}

export interface CliDependencies {
  /** Replaces the file-backed provider built from configuration */
  digestProvider?: IDigestProvider;
}

type CliOptions = {
  algorithms?: string[];
  algorithm?: string[];
  expected?: string;
  quiet?: boolean;
  fast?: boolean;
  quick?: boolean;
  color: boolean;
  timingSafe?: boolean;
};

const defaultIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  env: process.env,
  cwd: process.cwd(),
};

export function createProgram(): Command {
  const supported = Object.keys(DIGEST_LENGTHS).join(", ");

  return new Command("hash-compare")
    .description(
      "Compare file digests with each other or with an expected digest"
    )
    .argument("<files...>", "Files to compare (two or more, or one with --expected)")
    .option(
      "-a, --algorithms <names>",
      `Algorithms to run, repeatable or comma-separated: ${supported}, All (default: SHA512)`,
      collect,
      []
    )
    .addOption(
      new Option("--algorithm <names>").hideHelp().argParser(collect).default([])
    )
    .option(
      "-e, --expected <digest>",
      "Expected digest; its length selects the algorithm"
    )
    .option("-q, --quiet", "Print only the verdict")
    .option("-f, --fast", "Stop after the first algorithm that matches")
    .addOption(new Option("--quick").hideHelp())
    .option("--timing-safe", "Compare digests in constant time")
    .option("--no-color", "Disable colored output")
    .exitOverride();
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Run the CLI and resolve with the process exit code
 */
export async function runCli(
  argv: readonly string[],
  io: CliIO = defaultIO,
  dependencies: CliDependencies = {}
): Promise<number> {
  const program = createProgram();
  program.configureOutput({
    writeOut: (text) => io.stdout(text.trimEnd()),
    writeErr: (text) => io.stderr(text.trimEnd()),
  });

  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? ExitCode.MATCH : ExitCode.ERROR;
    }
    throw error;
  }

  const files = program.args;
  const options = program.opts<CliOptions>();
  const debug = (message: string): void => {
    if (io.env["HASH_COMPARE_DEBUG"] === "1") {
      io.stderr(`[hash-compare] ${message}`);
    }
  };

  try {
    const config: HashCompareConfig = await ConfigLoader.loadConfig(
      io.env,
      io.cwd
    );
    const rawAlgorithms = [
      ...(options.algorithms ?? []),
      ...(options.algorithm ?? []),
    ];

    const runConfig = await new InputValidator().validate({
      files,
      algorithms: rawAlgorithms.length > 0 ? rawAlgorithms : undefined,
      expected: options.expected,
      quiet: options.quiet ?? false,
      fast: (options.fast ?? false) || (options.quick ?? false),
    });
    debug(
      `Running ${runConfig.algorithms.join(", ")} over ${runConfig.files.length} file(s)`
    );

    const reporter = new ConsoleReporter({
      write: io.stdout,
      color: options.color && config.color,
    });
    const engine = new ComparisonEngine(
      dependencies.digestProvider ??
        new DigestProvider({
          detectModification: config.detectModification,
          highWaterMark: config.highWaterMark,
        }),
      {
        reporter,
        timingSafeCompare: (options.timingSafe ?? false) || config.timingSafeCompare,
      }
    );

    const outcome = await engine.run(runConfig);
    debug(`Stopped at ${outcome.algorithmStoppedAt}`);
    reporter.reportVerdict(outcome);

    return outcome.matched ? ExitCode.MATCH : ExitCode.MISMATCH;
  } catch (error) {
    if (error instanceof ValidationError) {
      if (error.issues.length === 0) {
        io.stderr(error.message);
      }
      for (const issue of error.issues) {
        io.stderr(ErrorHandler.describeIssue(issue));
      }
      return ExitCode.ERROR;
    }
    if (error instanceof FileSystemError) {
      io.stderr(error.message);
      if (io.env["HASH_COMPARE_DEBUG"] === "1") {
        ErrorHandler.logError(error, undefined, io.stderr);
      }
      return ExitCode.ERROR;
    }
    throw error;
  }
}
