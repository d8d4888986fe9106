import { Command } from "commander";
import { logger } from "../../infra/logger.js";
import { loadConfig, getDatabasePath } from "../config/loader.js";
import { StateManager } from "../../core/state/state-manager.js";
import { ExpirySweeper } from "../../core/engine/expiry-sweeper.js";

interface CleanupOptions {
  verbose: boolean;
}

export function createCleanupCommand(): Command {
  const command = new Command("cleanup")
    .description("Expire sessions that have been idle past their timeout")
    .option("-v, --verbose", "Enable verbose output", false)
    .action((options: CleanupOptions) => {
      if (options.verbose) {
        logger.configure({ level: "debug", verbose: true });
      }

      try {
        runCleanup();
      } catch (error) {
        logger.error("Cleanup failed", error);
        process.exit(1);
      }
    });

  return command;
}

function runCleanup(): void {
  logger.header("Session Cleanup");

  const config = loadConfig();
  const stateManager = new StateManager(getDatabasePath(config), {
    maxFixAttempts: config.assistant.maxFixAttempts,
    sessionTimeoutMinutes: config.assistant.sessionTimeoutMinutes,
  });

  try {
    const sweeper = new ExpirySweeper(stateManager, config.assistant.cleanupIntervalMs);
    const expired = sweeper.sweep();
    if (expired === 0) {
      logger.info("No expired sessions");
    } else {
      logger.success(`Expired ${expired} session(s)`);
    }
  } finally {
    stateManager.close();
  }
}
