import { Command } from "commander";
import pc from "picocolors";
import { logger } from "../../infra/logger.js";
import { loadConfig, saveConfig, getConfigPath, getDatabasePath } from "../config/loader.js";
import type { Config } from "../../types/config.js";

const SECRET_KEYS = new Set(["apiKey", "token", "webhookSecret"]);

/**
 * Copy of the config with credentials replaced by "***"
 */
export function maskSecrets(config: Config): Record<string, unknown> {
  const mask = (value: unknown): unknown => {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      return value;
    }
    return Object.fromEntries(
      Object.entries(value).map(([key, inner]) => [
        key,
        SECRET_KEYS.has(key) && typeof inner === "string" ? "***" : mask(inner),
      ])
    );
  };
  return Object.fromEntries(Object.entries(config).map(([key, value]) => [key, mask(value)]));
}

/**
 * Turn `assistant.maxFixAttempts` + "3" into `{ assistant: { maxFixAttempts: 3 } }`
 */
export function buildConfigUpdate(key: string, value: string): Record<string, unknown> {
  let parsedValue: string | number | boolean = value;
  if (value === "true") parsedValue = true;
  else if (value === "false") parsedValue = false;
  else if (value.trim() !== "" && !isNaN(Number(value))) parsedValue = Number(value);

  const parts = key.split(".").filter(Boolean);
  let update: unknown = parsedValue;
  for (let i = parts.length - 1; i >= 0; i--) {
    const part = parts[i];
    if (part === undefined) continue;
    update = { [part]: update };
  }
  return typeof update === "object" && update !== null ? Object.fromEntries(Object.entries(update)) : {};
}

export function createConfigCommand(): Command {
  const command = new Command("config").description("View and manage configuration");

  command
    .command("show")
    .description("Show the effective configuration (credentials masked)")
    .option("--json", "Output as JSON", false)
    .action((options: { json: boolean }) => {
      const config = loadConfig();
      const masked = maskSecrets(config);

      if (options.json) {
        console.log(JSON.stringify(masked, null, 2));
        return;
      }

      logger.header("Configuration");
      console.error(pc.dim(`Config file: ${getConfigPath()}`));
      console.error(pc.dim(`Database: ${getDatabasePath(config)}`));
      console.error("");
      console.error(JSON.stringify(masked, null, 2));
    });

  command
    .command("set")
    .description("Set a configuration value")
    .argument("<key>", "Configuration key (e.g., gitlab.url, assistant.maxFixAttempts)")
    .argument("<value>", "Value to set")
    .action((key: string, value: string) => {
      try {
        saveConfig(buildConfigUpdate(key, value));
        loadConfig();
        logger.success(`Set ${pc.cyan(key)} = ${pc.yellow(value)}`);
      } catch (error) {
        logger.error(`Failed to set config: ${key}`, error);
        process.exit(1);
      }
    });

  command
    .command("path")
    .description("Show configuration file path")
    .action(() => {
      console.log(getConfigPath());
    });

  return command;
}
