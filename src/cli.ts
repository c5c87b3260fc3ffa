#!/usr/bin/env node

/**
 * CLI entry point for hash-compare
 */

import { runCli } from "./lib/CommandLine";

async function main() {
  try {
    process.exitCode = await runCli(process.argv.slice(2));
  } catch (error) {
    console.error("hash-compare failed:", error);
    process.exit(2);
  }
}

void main();
