import { Command } from "commander";
import { loadConfig } from "../config/loader.js";
import { GitLabClient } from "../../core/providers/gitlab/gitlab-client.js";
import { SonarQubeClient } from "../../core/providers/sonarqube/sonarqube-client.js";
import { createMCPServer } from "../../mcp/server.js";
import { createToolRegistry } from "../../mcp/tools/index.js";
import { startStdioServer } from "../../mcp/transports/stdio-transport.js";
import { logger } from "../../infra/logger.js";
import { VERSION } from "../version.js";

interface McpOptions {
  disable?: string;
}

export function createMcpCommand(): Command {
  const command = new Command("mcp")
    .description("Expose the GitLab and SonarQube tools over MCP (stdio)")
    .option("--disable <tools>", "Comma-separated tool names to hide")
    .action(async (options: McpOptions) => {
      try {
        const config = loadConfig();

        const tools = createToolRegistry({
          gitlab: new GitLabClient({
            baseUrl: config.gitlab.url,
            token: config.gitlab.token,
            timeoutMs: config.http.timeoutMs,
          }),
          sonar: new SonarQubeClient({
            baseUrl: config.sonarqube.url,
            token: config.sonarqube.token,
            timeoutMs: config.http.timeoutMs,
          }),
          maxLogSize: config.assistant.maxLogSize,
        });

        const server = createMCPServer({
          tools,
          version: VERSION,
          disabledTools: options.disable ? options.disable.split(",").map((t) => t.trim()) : [],
        });

        await startStdioServer(server);
      } catch (error) {
        logger.error("Failed to start MCP server", error);
        process.exit(1);
      }
    });

  return command;
}
