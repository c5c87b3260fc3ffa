#!/usr/bin/env node

/**
 * Entry point for the hash-compare MCP server (stdio)
 */

import { startHashCompareServer } from "./index";

async function main() {
  try {
    await startHashCompareServer();
  } catch (error) {
    console.error("Failed to start hash-compare MCP server:", error);
    process.exit(1);
  }
}

void main();
