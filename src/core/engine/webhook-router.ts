/**
 * WebhookRouter - maps GitLab pipeline and SonarQube quality-gate events onto
 * sessions and fix attempts
 *
 * A failure either belongs to an in-flight fix branch (retry or cap), repeats
 * an open investigation (ignored), or opens a new session. A success either
 * confirms a fix branch or, on the target branch, resolves the session.
 */

import type { z } from "zod";
import type { StateManager } from "../state/state-manager.js";
import type { GitLabClient } from "../providers/gitlab/gitlab-client.js";
import { resolveGitLabProjectId } from "../providers/gitlab/project-resolver.js";
import {
  GitLabPipelineEventSchema,
  type GitLabPipelineEvent,
} from "../../types/gitlab.js";
import { SonarQubeWebhookSchema } from "../../types/sonarqube.js";
import type { FixAttempt, Session, SessionType } from "../../types/session.js";
import { logger } from "../../infra/logger.js";
import { ProjectNotFoundError, WebhookValidationError } from "../../infra/errors.js";
import type { AnalysisRunner } from "./analysis-runner.js";
import type { SessionService } from "./session-service.js";
import { FIX_BRANCH_PREFIX, classifyFailure, mostRecentFailedJob } from "./failure-classifier.js";

export type WebhookOutcome =
  | { status: "ignored"; reason: string; session_id?: string }
  | { status: "processed"; action: "checked_for_resolution" }
  | { status: "updated"; action: "fix_succeeded"; session_id: string }
  | { status: "resolved"; action: "target_branch_success"; session_id: string }
  | { status: "max_attempts_reached"; session_id: string; message: string }
  | { status: "retrying"; session_id: string; message: string; response: string }
  | { status: "existing"; session_id: string; message: string }
  | { status: "analyzing"; session_id: string; session_type: SessionType; message: string };

export interface WebhookRouterOptions {
  stateManager: StateManager;
  gitlab: GitLabClient;
  runner: AnalysisRunner;
  sessions: SessionService;
  gitlabUrl: string;
  now?: () => Date;
}

function parsePayload<S extends z.ZodTypeAny>(schema: S, payload: unknown, source: string): z.infer<S> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
    throw new WebhookValidationError(`Invalid ${source} webhook: ${issues}`);
  }
  return parsed.data;
}

const LAST_FIX_PIPELINE_KEY = "last_fix_pipeline_id";

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export class WebhookRouter {
  private readonly stateManager: StateManager;
  private readonly gitlab: GitLabClient;
  private readonly runner: AnalysisRunner;
  private readonly sessions: SessionService;
  private readonly gitlabUrl: string;
  private readonly now: () => Date;

  constructor(options: WebhookRouterOptions) {
    this.stateManager = options.stateManager;
    this.gitlab = options.gitlab;
    this.runner = options.runner;
    this.sessions = options.sessions;
    this.gitlabUrl = options.gitlabUrl.replace(/\/+$/, "");
    this.now = options.now ?? (() => new Date());
  }

  // === GitLab ===

  async handleGitLabEvent(payload: unknown): Promise<WebhookOutcome> {
    const event = parsePayload(GitLabPipelineEventSchema, payload, "GitLab");
    logger.info(`Received GitLab webhook: ${event.object_kind || "unknown"}`);

    if (event.object_kind !== "pipeline") {
      return { status: "ignored", reason: "Not a pipeline event" };
    }

    const projectId = event.project.id;
    if (!projectId) {
      throw new WebhookValidationError("Pipeline event has no project id");
    }
    const ref = event.object_attributes.ref ?? "";
    const status = event.object_attributes.status ?? "";
    logger.info(`Pipeline webhook: status=${status}, ref=${ref}, project=${projectId}`);

    if (status === "success") {
      return this.handlePipelineSuccess(event, projectId, ref);
    }
    if (status !== "failed") {
      return { status: "ignored", reason: "Not a failure event" };
    }

    const sessionType = await classifyFailure(this.gitlab, projectId, event.builds);
    const prefix = FIX_BRANCH_PREFIX[sessionType];

    if (ref.startsWith(prefix)) {
      const owner = this.stateManager.findSessionByFixBranch(sessionType, projectId, ref);
      if (owner) {
        return this.handleFixBranchFailure(owner, ref, event.object_attributes.id ?? null);
      }
    } else {
      const existing = this.stateManager.findActiveSession(sessionType, projectId);
      if (existing) {
        logger.info(`Found existing ${sessionType} session ${existing.id} for project ${projectId}`);
        return {
          status: "ignored",
          reason: `Active ${sessionType} session already exists`,
          session_id: existing.id,
        };
      }
    }

    return sessionType === "quality"
      ? this.openQualitySessionFromPipeline(event, projectId)
      : this.openPipelineSession(event, projectId);
  }

  async handlePipelineSuccess(
    event: GitLabPipelineEvent,
    projectId: string,
    ref: string
  ): Promise<WebhookOutcome> {
    const sessions = this.stateManager.getActiveSessionsForProject(projectId);
    logger.debug(`Checking ${sessions.length} active session(s) for resolution on ${ref}`);

    if (ref.startsWith("fix/")) {
      const branch = ref.trim();
      for (const session of sessions) {
        const attempt = this.stateManager.findFixAttemptByBranch(session.id, branch);
        if (attempt && attempt.status === "pending") {
          this.markFixSucceeded(session, attempt, event);
          return { status: "updated", action: "fix_succeeded", session_id: session.id };
        }
      }
    } else {
      for (const session of sessions) {
        if (!session.mergeRequestUrl || (session.branch ?? "main") !== ref) {
          continue;
        }
        const fixed = this.stateManager
          .getFixAttempts(session.id)
          .some((attempt) => attempt.status === "success");
        if (fixed) {
          this.stateManager.markSessionResolved(session.id);
          this.stateManager.addMessage(
            session.id,
            "assistant",
            "✅ **Issue Fully Resolved!**\n\n" +
              `The fix has been merged and the pipeline on \`${ref}\` is passing.\n` +
              "The issue has been resolved."
          );
          logger.success(`Session ${session.id} resolved after ${ref} succeeded`);
          return { status: "resolved", action: "target_branch_success", session_id: session.id };
        }
      }
    }

    return { status: "processed", action: "checked_for_resolution" };
  }

  private markFixSucceeded(session: Session, attempt: FixAttempt, event: GitLabPipelineEvent): void {
    this.stateManager.updateFixAttempt(session.id, attempt.attemptNumber, "success", {
      mergeRequestId: attempt.mergeRequestId,
      mergeRequestUrl: attempt.mergeRequestUrl,
    });
    this.stateManager.recordFixAttemptSummary(
      session.id,
      {
        attempt_number: attempt.attemptNumber,
        branch: attempt.branchName,
        mr_url: attempt.mergeRequestUrl,
        mr_id: attempt.mergeRequestId,
        status: "success",
        timestamp: this.now().toISOString(),
        files: attempt.filesChanged,
      },
      "Fix branch pipeline passed"
    );

    const projectPath = event.project.path_with_namespace ?? session.projectName ?? session.projectId;
    const pipelinesUrl = `${this.gitlabUrl}/${projectPath}/-/pipelines`;
    this.stateManager.addMessage(
      session.id,
      "assistant",
      "✅ **Fix Successful!**\n\n" +
        `The pipeline on branch \`${attempt.branchName}\` has passed all checks.\n\n` +
        "**Next Steps:**\n" +
        "1. Review the changes in the merge request\n" +
        `2. Merge when ready: ${attempt.mergeRequestUrl ?? "(no merge request recorded)"}\n` +
        "3. The fix reaches the target branch after the merge\n\n" +
        `[View Pipelines](${pipelinesUrl})`
    );
    logger.success(`Fix attempt #${attempt.attemptNumber} succeeded for session ${session.id}`);
  }

  private async handleFixBranchFailure(
    session: Session,
    ref: string,
    pipelineId: string | null
  ): Promise<WebhookOutcome> {
    const type = session.sessionType;
    if (pipelineId !== null && session.webhookData[LAST_FIX_PIPELINE_KEY] === pipelineId) {
      return {
        status: "ignored",
        reason: "Fix branch pipeline already handled",
        session_id: session.id,
      };
    }
    if (pipelineId !== null) {
      this.stateManager.updateSessionMetadata(session.id, {
        webhookData: { [LAST_FIX_PIPELINE_KEY]: pipelineId },
      });
    }

    // A retry turn may commit to the branch without opening a new attempt
    const attempt = this.stateManager.findFixAttemptByBranch(session.id, ref);
    if (attempt && attempt.status === "pending") {
      this.recordFailedAttempt(session, attempt, ref);
    }

    const attemptCount = this.stateManager.getFixAttempts(session.id).length;
    const max = this.stateManager.fixAttemptLimit;

    if (attemptCount >= max) {
      logger.warn(`Maximum fix attempts (${max}) reached for session ${session.id}`);
      this.stateManager.addMessage(
        session.id,
        "assistant",
        `⚠️ Maximum fix attempts (${max}) reached. Manual intervention required to resolve the remaining issues.`
      );
      return {
        status: "max_attempts_reached",
        session_id: session.id,
        message: `Max attempts (${max}) reached`,
      };
    }

    const next = attemptCount + 1;
    logger.info(`Auto-retrying session ${session.id} (attempt ${next}/${max})`);
    const retryMessage =
      `The pipeline on branch ${ref} is still failing with the same ${type} issues. ` +
      `This is attempt ${next} of ${max}. ` +
      "Let me analyze the latest logs and apply additional fixes to the same branch.";

    const reply = await this.sessions.postMessage(session.id, retryMessage);
    return {
      status: "retrying",
      session_id: session.id,
      message: `Auto-retry initiated (attempt ${next}/${max})`,
      response: reply.response,
    };
  }

  private recordFailedAttempt(session: Session, attempt: FixAttempt, ref: string): void {
    const type = session.sessionType;
    this.stateManager.updateFixAttempt(session.id, attempt.attemptNumber, "failed", {
      errorDetails: `${capitalize(type)} still failing`,
    });
    this.stateManager.addMessage(
      session.id,
      "system",
      `Fix attempt on branch ${ref} failed - ${type} still not passing`
    );
    this.stateManager.recordFixAttemptSummary(
      session.id,
      {
        attempt_number: attempt.attemptNumber,
        branch: attempt.branchName,
        mr_url: attempt.mergeRequestUrl,
        mr_id: attempt.mergeRequestId,
        status: "failed",
        timestamp: this.now().toISOString(),
        files: attempt.filesChanged,
      },
      `${capitalize(type)} still failing`
    );
    logger.info(`Recorded failed fix attempt #${attempt.attemptNumber} for ${type} session ${session.id}`);
  }

  /**
   * Fix branch and id of an earlier active session of the same type that
   * already has a merge request open
   */
  private existingFixBranch(
    sessionType: SessionType,
    projectId: string
  ): { currentFixBranch: string | null; parentSessionId: string | null } {
    const parent = this.stateManager
      .getActiveSessionsForProject(projectId)
      .find((s) => s.sessionType === sessionType && s.currentFixBranch && s.mergeRequestUrl);
    return {
      currentFixBranch: parent?.currentFixBranch ?? null,
      parentSessionId: parent?.id ?? null,
    };
  }

  private openPipelineSession(event: GitLabPipelineEvent, projectId: string): WebhookOutcome {
    const pipeline = event.object_attributes;
    const job = mostRecentFailedJob(event.builds);
    if (job) {
      logger.info(`Most recent failed job: ${job.name} (ID: ${job.id})`);
    }

    const { session, created } = this.stateManager.createSession({
      sessionType: "pipeline",
      projectId,
      projectName: event.project.name ?? null,
      branch: pipeline.ref,
      pipelineId: pipeline.id ?? null,
      pipelineUrl: pipeline.url ?? null,
      commitSha: pipeline.sha ?? null,
      jobName: job?.name ?? null,
      failedStage: job?.stage ?? null,
      webhookData: { ...event },
      ...this.existingFixBranch("pipeline", projectId),
    });
    if (!created) {
      return this.alreadyOpen(session);
    }

    this.stateManager.addMessage(
      session.id,
      "system",
      `Pipeline failure detected for ${session.projectName ?? "unknown"} - Pipeline #${session.pipelineId ?? "unknown"}`
    );
    this.runner.startPipelineAnalysis(session.id, event.builds);

    logger.success(`Created pipeline session ${session.id}`);
    return {
      status: "analyzing",
      session_id: session.id,
      session_type: "pipeline",
      message: "Pipeline analysis started",
    };
  }

  private openQualitySessionFromPipeline(event: GitLabPipelineEvent, projectId: string): WebhookOutcome {
    const pipeline = event.object_attributes;
    const job = mostRecentFailedJob(event.builds);
    const projectKey = event.project.name ?? projectId;

    const { session, created } = this.stateManager.createSession({
      sessionType: "quality",
      projectId,
      projectName: event.project.name ?? null,
      sonarqubeKey: projectKey,
      qualityGateStatus: "ERROR",
      branch: pipeline.ref || "main",
      pipelineId: pipeline.id ?? null,
      pipelineUrl: pipeline.url ?? null,
      commitSha: pipeline.sha ?? null,
      jobName: job?.name || "sonarqube-check",
      failedStage: job?.stage || "scan",
      webhookData: { ...event },
      ...this.existingFixBranch("quality", projectId),
    });
    if (!created) {
      return this.alreadyOpen(session);
    }

    this.stateManager.addMessage(
      session.id,
      "system",
      `Quality gate failure detected for ${session.projectName ?? projectKey} in pipeline #${session.pipelineId ?? "unknown"}`
    );
    this.runner.startQualityAnalysis(session.id, { projectKey, fromPipeline: true });

    logger.success(`Created quality session ${session.id}`);
    return {
      status: "analyzing",
      session_id: session.id,
      session_type: "quality",
      message: "Quality gate failure analysis started",
    };
  }

  // Another delivery won the active slot between lookup and insert
  private alreadyOpen(session: Session): WebhookOutcome {
    return {
      status: "ignored",
      reason: `Active ${session.sessionType} session already exists`,
      session_id: session.id,
    };
  }

  // === SonarQube ===

  async handleSonarQubeEvent(payload: unknown): Promise<WebhookOutcome> {
    const event = parsePayload(SonarQubeWebhookSchema, payload, "SonarQube");
    const projectKey = event.project.key;
    logger.info(`Received SonarQube webhook for project ${projectKey || "unknown"}`);

    if (event.qualityGate.status !== "ERROR") {
      return { status: "ignored", reason: "Quality gate passed" };
    }

    const projectId = await resolveGitLabProjectId(this.gitlab, projectKey);
    if (!projectId) {
      logger.error(`Could not map SonarQube project ${projectKey} to GitLab`);
      throw new ProjectNotFoundError(projectKey);
    }

    const existing = this.stateManager.findActiveSession("quality", projectId);
    if (existing) {
      logger.info(`Found existing quality session ${existing.id} for project ${projectId}`);
      return { status: "existing", session_id: existing.id, message: "Using existing quality session" };
    }

    const { session, created } = this.stateManager.createSession({
      sessionType: "quality",
      projectId,
      projectName: event.project.name ?? projectKey,
      sonarqubeKey: projectKey,
      qualityGateStatus: event.qualityGate.status,
      branch: event.branch.name,
      webhookData: { ...event },
    });
    if (!created) {
      return { status: "existing", session_id: session.id, message: "Using existing quality session" };
    }

    this.stateManager.addMessage(
      session.id,
      "system",
      `Quality gate failure detected for ${session.projectName ?? projectKey}`
    );
    this.runner.startQualityAnalysis(session.id, {
      projectKey,
      fromPipeline: false,
      gateStatus: event.qualityGate.status,
      conditions: event.qualityGate.conditions ?? [],
    });

    logger.success(`Created quality session ${session.id}`);
    return {
      status: "analyzing",
      session_id: session.id,
      session_type: "quality",
      message: "Quality analysis started",
    };
  }
}
