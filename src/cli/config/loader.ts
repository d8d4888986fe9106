import { existsSync, readFileSync, mkdirSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { config as loadEnv } from "dotenv";
import { Config, ConfigSchema } from "../../types/config.js";
import { ConfigurationError } from "../../infra/errors.js";
import { logger } from "../../infra/logger.js";

// Load .env file if it exists
loadEnv();

const DEFAULT_CONFIG_DIR = join(homedir(), ".cicd-assistant");
const CONFIG_FILE_NAME = "config.json";
const DATABASE_FILE_NAME = "assistant.db";

type RawSection = Record<string, unknown>;

export function expandPath(path: string): string {
  if (path.startsWith("~")) {
    return join(homedir(), path.slice(1));
  }
  return path;
}

export function getConfigDir(): string {
  return expandPath(process.env["CICD_ASSISTANT_DATA_DIR"] ?? DEFAULT_CONFIG_DIR);
}

export function getConfigPath(): string {
  return join(getConfigDir(), CONFIG_FILE_NAME);
}

export function ensureConfigDir(): void {
  const configDir = getConfigDir();
  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
    logger.debug(`Created config directory: ${configDir}`);
  }
}

/**
 * Resolve where the SQLite database lives: explicit path wins, otherwise it
 * sits beside config.json in the data directory.
 */
export function getDatabasePath(config: Config): string {
  if (config.database.path) {
    return expandPath(config.database.path);
  }
  return join(expandPath(config.dataDir), DATABASE_FILE_NAME);
}

function isRecord(value: unknown): value is RawSection {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(source: RawSection, key: string): RawSection {
  const value = source[key];
  return isRecord(value) ? value : {};
}

// Numbers that fail to parse are passed through so validation reports them
function envNumber(name: string): number | string | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return undefined;
  const parsed = Number(raw);
  return Number.isNaN(parsed) ? raw : parsed;
}

function envString(name: string): string | undefined {
  const raw = process.env[name];
  return raw === undefined || raw === "" ? undefined : raw;
}

function withoutUndefined(values: RawSection): RawSection {
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));
}

function readFileConfig(configPath: string): RawSection {
  if (!existsSync(configPath)) {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
    logger.debug(`Loaded config from ${configPath}`);
    if (!isRecord(parsed)) {
      throw new Error("config root must be a JSON object");
    }
    return parsed;
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse config file: ${configPath}`,
      error instanceof Error ? error : undefined
    );
  }
}

export function loadConfig(): Config {
  const fileConfig = readFileConfig(getConfigPath());

  // Environment variables override the file, section by section
  const envConfig: Record<string, RawSection> = {
    llm: withoutUndefined({
      provider: envString("LLM_PROVIDER"),
      model: envString("MODEL_ID"),
      apiKey: envString("ANTHROPIC_API_KEY"),
      region: envString("AWS_REGION"),
    }),
    gitlab: withoutUndefined({
      url: envString("GITLAB_URL"),
      token: envString("GITLAB_TOKEN"),
    }),
    sonarqube: withoutUndefined({
      url: envString("SONAR_HOST_URL"),
      token: envString("SONAR_TOKEN"),
    }),
    assistant: withoutUndefined({
      maxLogSize: envNumber("MAX_LOG_SIZE"),
      maxFixAttempts: envNumber("MAX_FIX_ATTEMPTS"),
      sessionTimeoutMinutes: envNumber("SESSION_TIMEOUT_MINUTES"),
    }),
    server: withoutUndefined({
      port: envNumber("PORT"),
      host: envString("HOST"),
      webhookSecret: envString("WEBHOOK_SECRET"),
    }),
    database: withoutUndefined({
      path: envString("DATABASE_PATH"),
    }),
  };

  const merged: RawSection = { ...fileConfig };
  for (const [key, values] of Object.entries(envConfig)) {
    merged[key] = { ...section(fileConfig, key), ...values };
  }

  const logLevel = envString("LOG_LEVEL");
  if (logLevel) {
    merged["logLevel"] = logLevel;
  }
  if (process.env["CICD_ASSISTANT_VERBOSE"] === "true") {
    merged["verbose"] = true;
  }
  merged["dataDir"] = getConfigDir();

  // Validate and parse with defaults
  const result = ConfigSchema.safeParse(merged);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new ConfigurationError(`Invalid configuration: ${errors}`);
  }

  return result.data;
}

/**
 * Merge `update` into config.json. Top-level sections are merged one level
 * deep so `{ gitlab: { url } }` keeps an existing gitlab.token.
 */
export function saveConfig(update: RawSection): void {
  ensureConfigDir();
  const configPath = getConfigPath();

  let existing: RawSection = {};
  try {
    existing = readFileConfig(configPath);
  } catch (error) {
    logger.warn(`Overwriting unreadable config at ${configPath}`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const merged: RawSection = { ...existing };
  for (const [key, value] of Object.entries(update)) {
    merged[key] = isRecord(value) ? { ...section(existing, key), ...value } : value;
  }

  writeFileSync(configPath, JSON.stringify(merged, null, 2));
  logger.success(`Config saved to ${configPath}`);
}
