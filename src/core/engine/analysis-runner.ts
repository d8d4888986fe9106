/**
 * AnalysisRunner - background first-pass analysis of new sessions
 *
 * Started fire-and-forget by the webhook router. Every outcome, including
 * failure, ends up as an assistant message in the session transcript.
 */

import type { FailureAgent } from "../agent/failure-agent.js";
import type { StateManager } from "../state/state-manager.js";
import type { SonarQubeClient } from "../providers/sonarqube/sonarqube-client.js";
import { collectQualityMetrics } from "../providers/sonarqube/quality-metrics.js";
import { extractCodeBlocks, parseAnalysis } from "../ai/analysis-parser.js";
import type { PipelineBuild } from "../../types/gitlab.js";
import { logger } from "../../infra/logger.js";
import { errorMessage } from "../../infra/errors.js";
import { isQualityJobName, mostRecentFailedJob } from "./failure-classifier.js";

export const LOGS_TOO_LARGE_MESSAGE =
  "Analysis failed: The pipeline logs are too large to analyze. This typically happens with " +
  "verbose test output or coverage reports. Please check the GitLab UI directly for the full " +
  "logs, or consider reducing log verbosity in your CI configuration.";

export function sonarAnalysisMissingMessage(projectKey: string): string {
  return [
    "## ⚠️ SonarQube Analysis Issue",
    "",
    "The pipeline failed at the SonarQube check stage, but not because of a failed quality gate.",
    "",
    `**Issue**: No SonarQube analysis results found for project '${projectKey}'`,
    "",
    "**Possible reasons:**",
    "1. SonarQube analysis was not performed",
    "2. Project key mismatch between CI configuration and SonarQube",
    "3. Authentication or permission issues",
    "4. SonarQube server connectivity problems",
    "",
    "**Recommended actions:**",
    "1. Check the sonarqube-check job logs for specific errors",
    "2. Verify the project key in `sonar-project.properties` or the CI configuration",
    "3. Ensure the SonarQube token is valid",
    "4. Verify the project exists in SonarQube",
    "",
    "This appears to be a **pipeline configuration issue**, not a code quality issue.",
  ].join("\n");
}

export interface QualityAnalysisRequest {
  projectKey: string;
  /** Detected from a failed pipeline rather than reported by SonarQube */
  fromPipeline: boolean;
  gateStatus?: string;
  conditions?: unknown;
}

export interface AnalysisRunnerOptions {
  agent: FailureAgent;
  stateManager: StateManager;
  sonar: SonarQubeClient;
}

export class AnalysisRunner {
  private readonly agent: FailureAgent;
  private readonly stateManager: StateManager;
  private readonly sonar: SonarQubeClient;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(options: AnalysisRunnerOptions) {
    this.agent = options.agent;
    this.stateManager = options.stateManager;
    this.sonar = options.sonar;
  }

  startPipelineAnalysis(sessionId: string, builds: readonly PipelineBuild[]): void {
    this.track(this.runPipelineAnalysis(sessionId, builds));
  }

  startQualityAnalysis(sessionId: string, request: QualityAnalysisRequest): void {
    this.track(this.runQualityAnalysis(sessionId, request));
  }

  /**
   * Resolves once every analysis started so far has finished
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(this.inFlight);
    }
  }

  get pending(): number {
    return this.inFlight.size;
  }

  async runPipelineAnalysis(sessionId: string, builds: readonly PipelineBuild[]): Promise<void> {
    logger.info(`Starting pipeline analysis for session ${sessionId}`);
    try {
      const job = mostRecentFailedJob(builds);
      if (!job) {
        this.stateManager.addMessage(sessionId, "assistant", "No failed jobs found in the pipeline.");
        return;
      }

      const analysis = await this.agent.analyzePipeline(
        sessionId,
        { name: job.name, stage: job.stage ?? "unknown", failureReason: job.failure_reason ?? null },
        isQualityJobName(job.name)
      );
      this.storeAnalysis(sessionId, analysis);
      logger.success(`Pipeline analysis complete for session ${sessionId}`);
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Pipeline analysis failed for session ${sessionId}`, error);
      this.report(
        sessionId,
        message.includes("prompt is too long") ? LOGS_TOO_LARGE_MESSAGE : `Analysis failed: ${message}`
      );
    }
  }

  async runQualityAnalysis(sessionId: string, request: QualityAnalysisRequest): Promise<void> {
    const { projectKey, fromPipeline } = request;
    logger.info(`Starting quality analysis for ${projectKey} in session ${sessionId}`);

    try {
      let gateStatus = request.gateStatus ?? "ERROR";
      let conditions = request.conditions ?? [];

      if (fromPipeline) {
        const status = await this.sonar.getQualityGateStatus(projectKey);
        const projectStatus = status.projectStatus;
        if (!projectStatus || projectStatus.status === "NONE") {
          logger.warn(`No quality gate result for ${projectKey}, treating as a pipeline failure`);
          this.stateManager.changeSessionType(sessionId, "pipeline", "No SonarQube analysis results");
          this.stateManager.addMessage(sessionId, "assistant", sonarAnalysisMissingMessage(projectKey));
          return;
        }
        gateStatus = projectStatus.status;
        conditions = projectStatus.conditions;
      }

      const metrics = await collectQualityMetrics(this.sonar, projectKey);
      this.stateManager.updateQualityMetrics(sessionId, metrics);

      const analysis = await this.agent.analyzeQuality(sessionId, projectKey, gateStatus, conditions);
      this.storeAnalysis(sessionId, analysis);
      logger.success(`Quality analysis complete for session ${sessionId}`);
    } catch (error) {
      logger.error(`Quality analysis failed for session ${sessionId}`, error);
      const prefix = fromPipeline ? "Quality analysis failed" : "Analysis failed";
      this.report(sessionId, `${prefix}: ${errorMessage(error)}`);
    }
  }

  private storeAnalysis(sessionId: string, analysis: string): void {
    const codeBlocks = extractCodeBlocks(analysis);
    const summary = parseAnalysis(analysis);

    this.stateManager.addMessage(sessionId, "assistant", analysis);
    this.stateManager.updateSessionMetadata(sessionId, {
      webhookData: {
        analysis_result: analysis,
        code_blocks: codeBlocks,
        analysis_summary: { root_cause: summary.root_cause, confidence: summary.confidence },
      },
    });
    this.stateManager.appendEvent(sessionId, "analysis_result", {
      analysisResult: analysis,
      codeBlocks,
    });
    logger.debug(`Stored analysis with ${codeBlocks.length} code block(s)`, {
      confidence: summary.confidence,
    });
  }

  // The transcript is the only place a background failure is visible
  private report(sessionId: string, message: string): void {
    try {
      this.stateManager.addMessage(sessionId, "assistant", message);
    } catch (error) {
      logger.error(`Could not record analysis failure for session ${sessionId}`, error);
    }
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    void task
      .catch((error: unknown) => logger.error("Background analysis crashed", error))
      .finally(() => this.inFlight.delete(task));
  }
}
