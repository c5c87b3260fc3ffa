/**
 * hash-compare
 *
 * Compares file digests across MD5, SHA1, SHA256, SHA384 and SHA512, either
 * with each other or with an expected digest. Usable as a library, a CLI and
 * an MCP server.
 */

export * from "./interfaces";
export * from "./lib";
export * from "./types";

import { MCPServer } from "./lib/MCPServer";
import { ConfigLoader } from "./lib/ConfigLoader";

/**
 * Create and start the MCP server
 */
export async function startHashCompareServer(): Promise<MCPServer> {
  const config = await ConfigLoader.loadConfig();
  const server = new MCPServer(config);
  await server.start();
  return server;
}
