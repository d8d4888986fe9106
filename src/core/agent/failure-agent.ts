/**
 * FailureAgent - runs analysis and chat turns for pipeline and quality sessions
 *
 * Stateless per call: every turn rebuilds its prompt from the stored session
 * and gets a fresh tool set bound to that session.
 */

import { z } from "zod";
import type { AgentProvider, ToolExecutor } from "../ai/types.js";
import { decodeRunResult, type AgentResponse } from "../ai/response.js";
import type { StateManager } from "../state/state-manager.js";
import type { GitLabClient } from "../providers/gitlab/gitlab-client.js";
import type { SonarQubeClient } from "../providers/sonarqube/sonarqube-client.js";
import type { AssistantConfig } from "../../types/config.js";
import type { Session } from "../../types/session.js";
import { logger } from "../../infra/logger.js";
import { MaxFixAttemptsError, errorMessage } from "../../infra/errors.js";
import { ToolSet, type AgentTool } from "./tools/index.js";
import { createGitLabTools } from "./tools/gitlab-tools.js";
import { createSonarQubeTools } from "./tools/sonarqube-tools.js";
import { createSessionDataTool, trackFileContent } from "./tools/session-tools.js";
import { isGuardedRequest, matchIntents, wantsMergeRequest } from "./intent.js";
import {
  chatPrompt,
  fixBranchName,
  iterationLimitReport,
  newMergeRequestPrompt,
  pipelineAnalysisPrompt,
  qualityAnalysisPrompt,
  sessionContext,
  systemPromptFor,
  updateMergeRequestPrompt,
  type FailedJobInfo,
} from "./prompts.js";

// Read-only tools used for the first analysis; committing waits for the user
const ANALYSIS_GITLAB_TOOLS = new Set([
  "get_pipeline_jobs",
  "get_job_logs",
  "get_file_content",
  "get_recent_commits",
  "get_project_info",
]);

const MR_URL_PATTERN = /https?:\/\/[^\s<>"]+\/merge_requests\/\d+/;
const WEB_URL_PATTERN = /"web_url":\s*"([^"]+)"/;
const MR_IID_PATTERN = /\/merge_requests\/(\d+)/;

const ToolWebUrlSchema = z.object({ web_url: z.string().min(1) }).passthrough();

export interface FailureAgentOptions {
  provider: AgentProvider;
  stateManager: StateManager;
  gitlab: GitLabClient;
  sonar: SonarQubeClient;
  assistant: Pick<AssistantConfig, "maxLogSize">;
  now?: () => Date;
}

export interface ChatTurnResult {
  response: AgentResponse;
  mergeRequestUrl: string | null;
}

/**
 * The merge request a turn produced: the create_merge_request result when the
 * turn surfaced one, otherwise the first MR link in the reply text.
 */
export function extractMergeRequestUrl(response: AgentResponse): string | null {
  if (response.kind === "tool_result") {
    const parsed = ToolWebUrlSchema.safeParse(response.result);
    if (parsed.success) {
      return parsed.data.web_url;
    }
  }

  const link = MR_URL_PATTERN.exec(response.text);
  if (link) {
    return link[0];
  }
  return WEB_URL_PATTERN.exec(response.text)?.[1] ?? null;
}

export class FailureAgent {
  private readonly provider: AgentProvider;
  private readonly stateManager: StateManager;
  private readonly gitlab: GitLabClient;
  private readonly sonar: SonarQubeClient;
  private readonly maxLogSize: number;
  private readonly now: () => Date;

  constructor(options: FailureAgentOptions) {
    this.provider = options.provider;
    this.stateManager = options.stateManager;
    this.gitlab = options.gitlab;
    this.sonar = options.sonar;
    this.maxLogSize = options.assistant.maxLogSize;
    this.now = options.now ?? (() => new Date());
  }

  // Cap enforced by the ledger
  private get maxFixAttempts(): number {
    return this.stateManager.fixAttemptLimit;
  }

  /**
   * First-pass investigation of a failed pipeline
   */
  async analyzePipeline(sessionId: string, job: FailedJobInfo, qualityJob: boolean): Promise<string> {
    const session = this.stateManager.requireSession(sessionId);
    logger.info(`Analyzing pipeline failure for session ${sessionId} (job ${job.name})`);

    const result = await this.provider.analyze({
      systemPrompt: systemPromptFor("pipeline", this.maxFixAttempts, this.maxLogSize),
      prompt: pipelineAnalysisPrompt(session, job, { maxLogSize: this.maxLogSize, qualityJob }),
      tools: this.analysisTools(session),
    });

    logger.debug(`Pipeline analysis used ${result.turns} turn(s), ${result.toolCalls.length} tool call(s)`);
    return decodeRunResult(result).text;
  }

  /**
   * First-pass investigation of a failed quality gate
   */
  async analyzeQuality(
    sessionId: string,
    projectKey: string,
    gateStatus: string,
    conditions: unknown
  ): Promise<string> {
    const session = this.stateManager.requireSession(sessionId);
    logger.info(`Analyzing quality issues for ${projectKey} in session ${sessionId}`);

    const result = await this.provider.analyze({
      systemPrompt: systemPromptFor("quality", this.maxFixAttempts, this.maxLogSize),
      prompt: qualityAnalysisPrompt(projectKey, session.projectId, gateStatus, conditions),
      tools: this.analysisTools(session),
    });

    return decodeRunResult(result).text;
  }

  /**
   * One chat turn. The caller records the user message before and the
   * reply after; this method only records fix attempts.
   */
  async handleMessage(sessionId: string, message: string): Promise<ChatTurnResult> {
    const session = this.stateManager.requireSession(sessionId);
    const attempts = this.stateManager.getFixAttempts(sessionId);
    const intents = matchIntents(message);

    if (
      isGuardedRequest(intents, attempts.length) &&
      this.stateManager.checkIterationLimit(sessionId, this.maxFixAttempts)
    ) {
      logger.warn(`Session ${sessionId} reached ${this.maxFixAttempts} fix attempts`);
      return {
        response: {
          kind: "text",
          text: iterationLimitReport(session.sessionType, this.maxFixAttempts, attempts),
        },
        mergeRequestUrl: null,
      };
    }

    const context = sessionContext(session, attempts.length, this.maxFixAttempts);
    const committing = wantsMergeRequest(intents, session.currentFixBranch);
    let prompt: string;
    if (committing && session.currentFixBranch) {
      prompt = updateMergeRequestPrompt(session, context, attempts.length);
    } else if (committing) {
      const branch = fixBranchName(session.sessionType, session.jobName, this.now());
      prompt = newMergeRequestPrompt(session, context, branch);
    } else {
      prompt = chatPrompt(session, context, message);
    }

    const result = await this.provider.chat({
      systemPrompt: systemPromptFor(session.sessionType, this.maxFixAttempts, this.maxLogSize),
      prompt,
      tools: this.chatTools(session),
    });
    let response = decodeRunResult(result);

    const mergeRequestUrl = extractMergeRequestUrl(response);
    if (committing && mergeRequestUrl) {
      const note = await this.trackMergeRequest(session, mergeRequestUrl);
      if (note) {
        response = { ...response, text: `${response.text}\n\n${note}` };
      }
    }

    return { response, mergeRequestUrl };
  }

  /**
   * Record a merge request as the session's next fix attempt.
   * Returns a note for the reply when the attempt could not be recorded.
   */
  private async trackMergeRequest(session: Session, mergeRequestUrl: string): Promise<string | null> {
    const iid = MR_IID_PATTERN.exec(mergeRequestUrl)?.[1];
    if (!iid) {
      logger.warn(`Cannot read a merge request IID from ${mergeRequestUrl}`);
      return null;
    }

    let branch: string;
    try {
      const mr = await this.gitlab.getMergeRequest(session.projectId, iid);
      branch = mr.source_branch;
    } catch (error) {
      logger.error(`Failed to get merge request ${iid}: ${errorMessage(error)}`);
      return null;
    }

    let files: string[] = [];
    try {
      const changes = await this.gitlab.getMergeRequestChanges(session.projectId, iid);
      files = changes.changes.map((change) => change.new_path || change.old_path);
    } catch (error) {
      logger.warn(`Could not list changes of merge request ${iid}: ${errorMessage(error)}`);
    }

    let attemptNumber: number;
    try {
      attemptNumber = this.stateManager.createFixAttempt(session.id, branch, files).attemptNumber;
    } catch (error) {
      if (error instanceof MaxFixAttemptsError) {
        logger.warn(`${error.message} for session ${session.id}`);
        return `⚠️ ${error.message}. This merge request was not recorded as a new fix attempt.`;
      }
      throw error;
    }

    this.stateManager.updateSessionMetadata(session.id, {
      mergeRequestUrl,
      mergeRequestId: iid,
      currentFixBranch: branch,
    });
    this.stateManager.updateFixAttempt(session.id, attemptNumber, "pending", {
      mergeRequestId: iid,
      mergeRequestUrl,
    });
    this.stateManager.recordFixAttemptSummary(session.id, {
      attempt_number: attemptNumber,
      branch,
      mr_url: mergeRequestUrl,
      mr_id: iid,
      status: "pending",
      timestamp: this.now().toISOString(),
      files,
    });

    logger.success(`Fix attempt #${attemptNumber} recorded for session ${session.id} on ${branch}`);
    return null;
  }

  private analysisTools(session: Session): ToolExecutor {
    const gitlabTools = createGitLabTools({ gitlab: this.gitlab, maxLogSize: this.maxLogSize })
      .filter((tool) => ANALYSIS_GITLAB_TOOLS.has(tool.definition.name))
      .map((tool) => this.tracked(tool, session, null));

    const tools = new ToolSet(gitlabTools);
    if (session.sessionType === "quality") {
      for (const tool of createSonarQubeTools(this.sonar)) {
        tools.register(tool);
      }
    }
    return tools;
  }

  private chatTools(session: Session): ToolExecutor {
    const gitlabTools = createGitLabTools({
      gitlab: this.gitlab,
      maxLogSize: this.maxLogSize,
    }).map((tool) => this.tracked(tool, session, session.currentFixBranch));

    const tools = new ToolSet(gitlabTools);
    tools.register(createSessionDataTool(this.stateManager, session.id));
    if (session.sessionType === "quality") {
      for (const tool of createSonarQubeTools(this.sonar)) {
        tools.register(tool);
      }
    }
    return tools;
  }

  private tracked(tool: AgentTool, session: Session, currentFixBranch: string | null): AgentTool {
    if (tool.definition.name !== "get_file_content") {
      return tool;
    }
    return trackFileContent(tool, {
      stateManager: this.stateManager,
      sessionId: session.id,
      currentFixBranch,
    });
  }
}
