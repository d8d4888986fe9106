import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { MCPServer } from "../server.js";
import { logger } from "../../infra/logger.js";

/**
 * Create and connect a stdio transport for the MCP server
 */
export async function createStdioTransport(server: MCPServer): Promise<StdioServerTransport> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("Stdio transport connected");
  return transport;
}

/**
 * Start the MCP server on stdin/stdout. The process exits when the client
 * closes stdin or on SIGINT/SIGTERM.
 */
export async function startStdioServer(server: MCPServer): Promise<void> {
  await createStdioTransport(server);

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down MCP server");
    await server.close();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown();
  });

  process.on("SIGTERM", () => {
    void shutdown();
  });

  logger.info("MCP server running (stdio mode)");
}
