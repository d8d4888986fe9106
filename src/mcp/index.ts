// MCP Server module
// Exposes the GitLab and SonarQube tools over the Model Context Protocol

export {
  MCPServer,
  createMCPServer,
  type MCPServerOptions,
  type ToolCallResult,
} from "./server.js";
export { createStdioTransport, startStdioServer } from "./transports/stdio-transport.js";
export { createToolRegistry, type ToolRegistryOptions } from "./tools/index.js";
export { mapToMCPError, isToolErrorResult } from "./middleware/error-handler.js";
