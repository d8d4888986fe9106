#!/usr/bin/env node

import { Command } from "commander";
import pc from "picocolors";
import {
  createServeCommand,
  createSessionsCommand,
  createCleanupCommand,
  createSendTestWebhookCommand,
  createMcpCommand,
  createConfigCommand,
} from "./commands/index.js";
import { logger } from "../infra/logger.js";
import { VERSION } from "./version.js";

const program = new Command();

program
  .name("cicd-assistant")
  .description(pc.cyan("AI assistant that analyzes failed GitLab pipelines and SonarQube quality gates"))
  .version(VERSION, "-V, --version", "Output the version number")
  .option("-v, --verbose", "Enable verbose output")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts["verbose"]) {
      logger.configure({ level: "debug", verbose: true });
    }
  });

// Register commands
program.addCommand(createServeCommand());
program.addCommand(createSessionsCommand());
program.addCommand(createCleanupCommand());
program.addCommand(createSendTestWebhookCommand());
program.addCommand(createMcpCommand());
program.addCommand(createConfigCommand());

// Error handling
program.exitOverride((err) => {
  if (err.code === "commander.help" || err.code === "commander.helpDisplayed") {
    process.exit(0);
  }
  if (err.code === "commander.version") {
    process.exit(0);
  }
  logger.error(`Command failed: ${err.message}`);
  process.exit(1);
});

// Parse and execute
async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      logger.error(error.message, error);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error("Unexpected error", error instanceof Error ? error : undefined);
  process.exit(1);
});
