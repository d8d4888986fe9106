import { Command } from "commander";
import pc from "picocolors";
import { logger } from "../../infra/logger.js";
import { loadConfig, getDatabasePath } from "../config/loader.js";
import { StateManager } from "../../core/state/state-manager.js";
import type { Session } from "../../types/session.js";

interface SessionsOptions {
  json: boolean;
  verbose: boolean;
}

interface ListOptions extends SessionsOptions {
  all: boolean;
  limit: string;
}

export function createSessionsCommand(): Command {
  const command = new Command("sessions").description("Inspect assistant sessions");

  command
    .command("list")
    .description("List active sessions")
    .option("-a, --all", "Include resolved and expired sessions", false)
    .option("-l, --limit <n>", "Maximum sessions with --all", "20")
    .option("--json", "Output as JSON", false)
    .option("-v, --verbose", "Enable verbose output", false)
    .action((options: ListOptions) => {
      withStateManager(options, (stateManager) => listSessions(stateManager, options));
    });

  command
    .command("show <session-id>")
    .description("Show a session with its fix attempts and conversation")
    .option("--json", "Output as JSON", false)
    .option("-v, --verbose", "Enable verbose output", false)
    .action((sessionId: string, options: SessionsOptions) => {
      withStateManager(options, (stateManager) => showSession(stateManager, sessionId, options));
    });

  return command;
}

function withStateManager(
  options: SessionsOptions,
  fn: (stateManager: StateManager) => void
): void {
  if (options.verbose) {
    logger.configure({ level: "debug", verbose: true });
  }

  const config = loadConfig();
  const stateManager = new StateManager(getDatabasePath(config), {
    maxFixAttempts: config.assistant.maxFixAttempts,
    sessionTimeoutMinutes: config.assistant.sessionTimeoutMinutes,
  });

  try {
    fn(stateManager);
  } catch (error) {
    logger.error("Sessions command failed", error);
    process.exitCode = 1;
  } finally {
    stateManager.close();
  }
}

function listSessions(stateManager: StateManager, options: ListOptions): void {
  const sessions = options.all
    ? stateManager.getRecentSessions(parseInt(options.limit, 10) || 20)
    : stateManager.getActiveSessions();

  if (options.json) {
    console.log(JSON.stringify(sessions, null, 2));
    return;
  }

  logger.header(options.all ? "Recent Sessions" : "Active Sessions");
  if (sessions.length === 0) {
    console.error(pc.dim(options.all ? "  No sessions" : "  No active sessions"));
    return;
  }

  for (const session of sessions) {
    console.error(formatSessionLine(session));
  }
}

function showSession(stateManager: StateManager, sessionId: string, options: SessionsOptions): void {
  const session = stateManager.requireSession(sessionId);
  const attempts = stateManager.getFixAttempts(sessionId);

  if (options.json) {
    console.log(
      JSON.stringify(
        { ...session, fixAttempts: attempts, trackedFiles: stateManager.getTrackedFiles(sessionId) },
        null,
        2
      )
    );
    return;
  }

  logger.header(`Session ${session.id}`);
  console.error(formatSessionLine(session));
  console.error(`  Branch: ${session.branch ?? "-"}`);
  console.error(`  Fix branch: ${session.currentFixBranch ?? "-"}`);
  console.error(`  Merge request: ${session.mergeRequestUrl ?? "-"}`);
  console.error(`  Expires: ${session.expiresAt.toISOString()}`);
  console.error("");

  console.error(pc.dim(`Fix attempts (${attempts.length}/${stateManager.fixAttemptLimit}):`));
  for (const attempt of attempts) {
    console.error(
      `  #${attempt.attemptNumber} ${attempt.branchName} ${statusColor(attempt.status)}` +
        (attempt.mergeRequestUrl ? pc.dim(` ${attempt.mergeRequestUrl}`) : "")
    );
  }
  console.error("");

  console.error(pc.dim("Conversation:"));
  for (const message of session.conversationHistory) {
    const preview = message.content.length > 200 ? `${message.content.slice(0, 200)}...` : message.content;
    console.error(`  ${pc.bold(message.role)}: ${preview}`);
  }
}

function formatSessionLine(session: Session): string {
  const project = session.projectName ?? session.projectId;
  const type = session.sessionType === "quality" ? pc.magenta("quality") : pc.cyan("pipeline");
  return `  ${pc.dim(session.id)} ${type} ${project} ${statusColor(session.status)} ${pc.dim(
    session.lastActivityAt.toISOString()
  )}`;
}

function statusColor(status: string): string {
  switch (status) {
    case "active":
    case "pending":
      return pc.yellow(status);
    case "resolved":
    case "success":
      return pc.green(status);
    default:
      return pc.red(status);
  }
}
