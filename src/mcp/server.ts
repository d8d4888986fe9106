import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";

import type { ToolSet } from "../core/agent/tools/index.js";
import type { ToolDefinition } from "../core/ai/types.js";
import { TimeoutError } from "../infra/errors.js";
import { logger } from "../infra/logger.js";
import { isToolErrorResult, mapToMCPError } from "./middleware/error-handler.js";

const DEFAULT_TOOL_TIMEOUT_MS = 2 * 60 * 1000;

export interface MCPServerOptions {
  tools: ToolSet;
  version?: string;
  disabledTools?: string[];
  toolTimeoutMs?: number;
}

export type ToolCallResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

/**
 * MCP Server for the CI/CD assistant
 *
 * Exposes the stateless GitLab and SonarQube tools to MCP-compatible clients.
 */
export class MCPServer {
  private server: Server;
  private tools: ToolSet;
  private disabled: Set<string>;
  private toolTimeoutMs: number;

  constructor(options: MCPServerOptions) {
    this.tools = options.tools;
    this.disabled = new Set(options.disabledTools ?? []);
    this.toolTimeoutMs = options.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;

    this.server = new Server(
      {
        name: "cicd-assistant",
        version: options.version ?? "0.1.0",
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupToolHandlers();
    this.server.onerror = (error): void => {
      logger.error("MCP server error", error);
    };
  }

  async connect(transport: Transport): Promise<void> {
    logger.info("Connecting MCP server to transport");
    await this.server.connect(transport);
    logger.info("MCP server connected");
  }

  async close(): Promise<void> {
    logger.info("Closing MCP server");
    await this.server.close();
    logger.info("MCP server closed");
  }

  listTools(): ToolDefinition[] {
    return this.tools.definitions().filter((definition) => !this.disabled.has(definition.name));
  }

  /**
   * Run a tool and wrap its result as JSON text content
   */
  async callTool(name: string, args: Record<string, unknown>): Promise<ToolCallResult> {
    if (this.disabled.has(name) || !this.tools.has(name)) {
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }

    logger.info(`Tool call: ${name}`);

    let timer: NodeJS.Timeout | undefined;
    try {
      const result = await Promise.race([
        this.tools.execute(name, args),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => {
            reject(
              new TimeoutError(
                `Tool '${name}' timed out after ${this.toolTimeoutMs}ms`,
                `mcp:${name}`,
                this.toolTimeoutMs
              )
            );
          }, this.toolTimeoutMs);
        }),
      ]);

      const isError = isToolErrorResult(result);
      logger.debug(`Tool ${name} completed`, { isError });

      return {
        content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
        ...(isError ? { isError: true } : {}),
      };
    } catch (error) {
      logger.error(`Tool ${name} failed`, error);
      throw mapToMCPError(error);
    } finally {
      clearTimeout(timer);
    }
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      const tools = this.listTools();
      logger.debug(`Listing ${tools.length} tools`);
      return { tools };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args ?? {});
    });
  }

  getServer(): Server {
    return this.server;
  }
}

export function createMCPServer(options: MCPServerOptions): MCPServer {
  return new MCPServer(options);
}
