import type { GitLabClient } from "../providers/gitlab/gitlab-client.js";
import type { PipelineBuild } from "../../types/gitlab.js";
import type { SessionType } from "../../types/session.js";
import { logger } from "../../infra/logger.js";
import { errorMessage } from "../../infra/errors.js";

const QUALITY_JOB_KEYWORDS = ["sonar", "quality"];

// Phrases scanners print when a quality gate, not the build, failed the job
const QUALITY_GATE_PHRASES = [
  "Quality Gate failure",
  "QUALITY GATE STATUS: FAILED",
  "Quality gate failed",
  "SonarQube analysis reported",
  "Quality gate status: ERROR",
  "failed because the quality gate",
  "Your code fails the quality gate",
  "SonarQube Quality Gate has failed",
].map((phrase) => phrase.toLowerCase());

export const FIX_BRANCH_PREFIX: Record<SessionType, string> = {
  pipeline: "fix/pipeline_",
  quality: "fix/sonarqube_",
};

/**
 * Failed builds, most recently finished first. Builds without a finish time
 * sort last.
 */
export function failedBuilds(builds: readonly PipelineBuild[]): PipelineBuild[] {
  return builds
    .filter((build) => build.status === "failed")
    .sort((a, b) => (b.finished_at ?? "").localeCompare(a.finished_at ?? ""));
}

export function mostRecentFailedJob(builds: readonly PipelineBuild[]): PipelineBuild | null {
  return failedBuilds(builds)[0] ?? null;
}

export function isQualityJobName(name: string): boolean {
  const lower = name.toLowerCase();
  return QUALITY_JOB_KEYWORDS.some((keyword) => lower.includes(keyword));
}

export function logShowsQualityGateFailure(log: string): boolean {
  const lower = log.toLowerCase();
  return QUALITY_GATE_PHRASES.some((phrase) => lower.includes(phrase));
}

/**
 * Decide whether a failed pipeline is a quality-gate failure. Only the most
 * recent failed job is inspected: by name first, then by its log. A log that
 * cannot be fetched counts as "not quality".
 */
export async function classifyFailure(
  gitlab: GitLabClient,
  projectId: string,
  builds: readonly PipelineBuild[]
): Promise<SessionType> {
  const job = mostRecentFailedJob(builds);
  if (!job) {
    return "pipeline";
  }

  logger.info(`Checking most recent failed job: ${job.name} (ID: ${job.id})`);
  if (isQualityJobName(job.name)) {
    logger.info(`Job ${job.name} is a quality job, treating as quality gate failure`);
    return "quality";
  }

  try {
    const log = await gitlab.getJobTrace(projectId, job.id);
    if (logShowsQualityGateFailure(log)) {
      logger.info(`Found quality gate failure in ${job.name} logs`);
      return "quality";
    }
  } catch (error) {
    logger.warn(`Could not fetch logs for job ${job.id}: ${errorMessage(error)}`);
  }

  return "pipeline";
}
