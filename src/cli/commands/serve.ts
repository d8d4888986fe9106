import { Command } from "commander";
import { loadConfig } from "../config/loader.js";
import { createAssistant } from "../../core/engine/assistant.js";
import { logger } from "../../infra/logger.js";
import { VERSION } from "../version.js";

interface ServeOptions {
  port?: number;
  host?: string;
  secret?: string;
  verbose: boolean;
}

export function createServeCommand(): Command {
  const command = new Command("serve")
    .description("Start the webhook receiver and session API")
    .option("-p, --port <port>", "Port to listen on", (v) => parseInt(v, 10))
    .option("--host <host>", "Host to bind")
    .option("-s, --secret <secret>", "Shared secret expected in X-Gitlab-Token")
    .option("-v, --verbose", "Enable verbose output", false)
    .action(async (options: ServeOptions) => {
      if (options.verbose) {
        logger.configure({ level: "debug", verbose: true });
      }

      try {
        await runServe(options);
      } catch (error) {
        logger.error("Server failed", error);
        process.exit(1);
      }
    });

  return command;
}

async function runServe(options: ServeOptions): Promise<void> {
  logger.header("CI/CD Failure Assistant");

  const config = loadConfig();
  if (options.port !== undefined) config.server.port = options.port;
  if (options.host) config.server.host = options.host;
  if (options.secret) config.server.webhookSecret = options.secret;

  logger.info(`GitLab: ${config.gitlab.url}`);
  logger.info(`SonarQube: ${config.sonarqube.url}`);
  logger.info(`Agent provider: ${config.llm.provider} (${config.llm.model})`);
  logger.info(`Max fix attempts: ${config.assistant.maxFixAttempts}`);
  if (!config.server.webhookSecret) {
    logger.warn("No webhook secret configured - GitLab deliveries will not be verified");
  }

  const assistant = await createAssistant(config, { version: VERSION });

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down...");
    await assistant.close();
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  const swept = assistant.sweeper.sweep();
  if (swept > 0) {
    logger.info(`Expired ${swept} stale session(s) on startup`);
  }
  assistant.sweeper.start();

  const port = await assistant.server.start();

  logger.info("");
  logger.info("Endpoints:");
  logger.info(`  POST http://localhost:${port}/webhooks/gitlab`);
  logger.info(`  POST http://localhost:${port}/webhooks/sonarqube`);
  logger.info(`  GET  http://localhost:${port}/sessions/active`);
  logger.info(`  GET  http://localhost:${port}/health`);
  logger.info("");
  logger.info("Press Ctrl+C to stop");
}
