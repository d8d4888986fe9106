import { z } from "zod";

export const LLMConfigSchema = z.object({
  // "mock" never leaves the process; "anthropic" calls the Messages API with tool use
  provider: z.enum(["mock", "anthropic"]).default("mock"),
  model: z.string().default("claude-3-5-sonnet-20241022"),
  apiKey: z.string().optional(),
  // Kept for deployments that front the model through a regional gateway
  region: z.string().default("us-west-2"),
  maxTokens: z.number().int().positive().default(4096),
  temperature: z.number().min(0).max(1).default(0.1),
  maxTurns: z.number().int().positive().default(20),
  timeoutMs: z
    .number()
    .int()
    .positive()
    .default(5 * 60 * 1000),
});

export const GitLabConfigSchema = z.object({
  url: z.string().default("http://gitlab:80"),
  token: z.string().optional(),
});

export const SonarQubeConfigSchema = z.object({
  url: z.string().default("http://sonarqube:9000"),
  token: z.string().optional(),
});

export const HttpClientConfigSchema = z.object({
  // Per-call timeout for GitLab and SonarQube requests
  timeoutMs: z.number().int().positive().default(30_000),
});

export const AssistantConfigSchema = z.object({
  // Job logs handed to the model are cut to this many characters
  maxLogSize: z.number().int().positive().default(30_000),
  maxFixAttempts: z.number().int().positive().default(5),
  sessionTimeoutMinutes: z.number().int().positive().default(180),
  cleanupIntervalMs: z
    .number()
    .int()
    .positive()
    .default(60 * 60 * 1000),
});

export const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8000),
  host: z.string().default("0.0.0.0"),
  // When set, GitLab deliveries must carry it in X-Gitlab-Token
  webhookSecret: z.string().optional(),
});

export const DatabaseConfigSchema = z.object({
  // Defaults to <dataDir>/assistant.db
  path: z.string().optional(),
});

export const ConfigSchema = z.object({
  llm: LLMConfigSchema.default({}),
  gitlab: GitLabConfigSchema.default({}),
  sonarqube: SonarQubeConfigSchema.default({}),
  http: HttpClientConfigSchema.default({}),
  assistant: AssistantConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  database: DatabaseConfigSchema.default({}),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  verbose: z.boolean().default(false),
  dataDir: z.string().default("~/.cicd-assistant"),
});

export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type GitLabConfig = z.infer<typeof GitLabConfigSchema>;
export type SonarQubeConfig = z.infer<typeof SonarQubeConfigSchema>;
export type HttpClientConfig = z.infer<typeof HttpClientConfigSchema>;
export type AssistantConfig = z.infer<typeof AssistantConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
