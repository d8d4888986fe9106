import { Command } from "commander";
import pc from "picocolors";
import { logger } from "../../infra/logger.js";
import { loadConfig } from "../config/loader.js";

interface SendTestWebhookOptions {
  url?: string;
  status: string;
  ref: string;
  job: string;
  project: string;
  token?: string;
  verbose: boolean;
}

export interface SamplePipelineOptions {
  status: string;
  ref: string;
  job: string;
  project: string;
  now?: Date;
}

/**
 * A GitLab pipeline hook payload with one passing build job and one job in
 * the requested status
 */
export function buildSamplePipelineEvent(options: SamplePipelineOptions): Record<string, unknown> {
  const timestamp = (options.now ?? new Date()).toISOString();
  const pathWithNamespace = `group/${options.project}`;

  return {
    object_kind: "pipeline",
    object_attributes: {
      id: 12345,
      ref: options.ref,
      sha: "a1b2c3d4e5f6",
      status: options.status,
      stages: ["build", "test"],
      created_at: timestamp,
      finished_at: timestamp,
      url: `http://gitlab.example.com/${pathWithNamespace}/-/pipelines/12345`,
    },
    project: {
      id: 123,
      name: options.project,
      path_with_namespace: pathWithNamespace,
      web_url: `http://gitlab.example.com/${pathWithNamespace}`,
      default_branch: "main",
    },
    builds: [
      {
        id: 380,
        stage: "build",
        name: "build",
        status: "success",
        finished_at: timestamp,
      },
      {
        id: 381,
        stage: "test",
        name: options.job,
        status: options.status,
        finished_at: timestamp,
        failure_reason: options.status === "failed" ? "script_failure" : null,
      },
    ],
  };
}

export function createSendTestWebhookCommand(): Command {
  const command = new Command("send-test-webhook")
    .description("Post a sample GitLab pipeline event to a running server")
    .option("--url <url>", "Webhook URL (defaults to the configured server)")
    .option("--status <status>", "Pipeline status", "failed")
    .option("--ref <ref>", "Branch the pipeline ran on", "main")
    .option("--job <name>", "Name of the job in that status", "test")
    .option("--project <name>", "Project name", "test-project")
    .option("--token <token>", "Value for X-Gitlab-Token")
    .option("-v, --verbose", "Enable verbose output", false)
    .action(async (options: SendTestWebhookOptions) => {
      if (options.verbose) {
        logger.configure({ level: "debug", verbose: true });
      }

      try {
        await runSendTestWebhook(options);
      } catch (error) {
        logger.error("Failed to send webhook", error);
        process.exit(1);
      }
    });

  return command;
}

async function runSendTestWebhook(options: SendTestWebhookOptions): Promise<void> {
  const config = loadConfig();
  const url = options.url ?? `http://localhost:${config.server.port}/webhooks/gitlab`;
  const token = options.token ?? config.server.webhookSecret;

  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    "X-Gitlab-Event": "Pipeline Hook",
  };
  if (token) {
    headers["X-Gitlab-Token"] = token;
  }

  logger.info(`Sending ${options.status} pipeline event for ${options.ref} to ${url}`);

  const response = await fetch(url, {
    method: "POST",
    headers,
    body: JSON.stringify(buildSamplePipelineEvent(options)),
  });
  const body = await response.text();

  console.error(pc.dim(`Response status: ${response.status}`));
  console.log(body);

  if (!response.ok) {
    process.exitCode = 1;
  }
}
