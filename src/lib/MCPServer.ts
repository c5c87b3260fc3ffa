/**
 * MCP Server exposing the comparison engine over stdio
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { HashCompareConfig } from "./ConfigLoader";
import { DigestProvider } from "./DigestProvider";
import { MCPTools } from "./MCPTools";
import { ErrorHandler } from "./ErrorHandler";

const SERVER_NAME = "hash-compare";
const SERVER_VERSION = "0.1.0";
const LOG_PREFIX = "[hash-compare MCP]";

export class MCPServer {
  private server: Server;
  private transport: StdioServerTransport;
  private mcpTools: MCPTools;
  private isRunning: boolean = false;

  constructor(config: HashCompareConfig) {
    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.mcpTools = new MCPTools(
      new DigestProvider({
        detectModification: config.detectModification,
        highWaterMark: config.highWaterMark,
      }),
      config.timingSafeCompare
    );

    // stdout carries the protocol; all logging goes to stderr
    this.transport = new StdioServerTransport();

    this.server.onerror = (error) => {
      console.error(`${LOG_PREFIX} Error`, error);
    };

    process.on("SIGINT", () => {
      console.error(`${LOG_PREFIX} Received SIGINT, shutting down...`);
      void this.stop();
    });
    process.on("SIGTERM", () => {
      console.error(`${LOG_PREFIX} Received SIGTERM, shutting down...`);
      void this.stop();
    });
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error("Server is already running");
    }

    console.error(`${LOG_PREFIX} Starting ${SERVER_NAME} v${SERVER_VERSION}`);

    try {
      this.registerHandlers();
      console.error(
        `${LOG_PREFIX} Registered ${MCPTools.getAllSchemas().length} MCP tools`
      );

      await this.server.connect(this.transport);
      this.isRunning = true;
      console.error(`${LOG_PREFIX} Server ready on stdio`);
    } catch (error) {
      console.error(`${LOG_PREFIX} Failed to start server:`, error);
      throw error;
    }
  }

  /**
   * Register MCP protocol handlers
   */
  private registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: MCPTools.getAllSchemas().map((schema) => ({
          name: schema.name,
          description: schema.description,
          inputSchema: MCPTools.toJsonSchema(schema.inputSchema),
        })),
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;

      try {
        const result = await this.mcpTools.callTool(name, args);

        return {
          content: [
            {
              type: "text",
              text: JSON.stringify(result, null, 2),
            },
          ],
        };
      } catch (error) {
        const errorResponse = ErrorHandler.toErrorResponse(error);

        return {
          content: [
            {
              type: "text",
              text: JSON.stringify(errorResponse, null, 2),
            },
          ],
          isError: true,
        };
      }
    });
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      console.error(`${LOG_PREFIX} Server is not running, skipping shutdown`);
      return;
    }

    console.error(`${LOG_PREFIX} Shutting down gracefully...`);
    this.isRunning = false;

    try {
      await this.transport.close();
      await this.server.close();
      console.error(`${LOG_PREFIX} Shutdown complete`);
    } catch (error) {
      console.error(`${LOG_PREFIX} Error during shutdown:`, error);
    } finally {
      process.exit(0);
    }
  }

  isServerRunning(): boolean {
    return this.isRunning;
  }
}
