import type { QualityMetrics } from "../../../types/session.js";
import type { SimplifiedIssue } from "../../../types/sonarqube.js";
import { logger } from "../../../infra/logger.js";
import { errorMessage } from "../../../infra/errors.js";
import type { SonarQubeClient } from "./sonarqube-client.js";

const ISSUE_FETCH_LIMIT = 500;
const CRITICAL_SEVERITIES = new Set(["CRITICAL", "BLOCKER"]);

export interface IssueBuckets {
  bugs: SimplifiedIssue[];
  vulnerabilities: SimplifiedIssue[];
  codeSmells: SimplifiedIssue[];
}

function toNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

// SonarQube reports ratings as "1.0".."5.0"; A..E is what people read
function toRating(value: string | undefined): string {
  if (!value) return "E";
  const numeric = Number(value);
  if (Number.isInteger(numeric) && numeric >= 1 && numeric <= 5) {
    return "ABCDE".charAt(numeric - 1);
  }
  return value.slice(0, 1) || "E";
}

/**
 * Critical counts CRITICAL and BLOCKER, major counts MAJOR; both only over
 * bugs and vulnerabilities.
 */
export function computeQualityMetrics(
  buckets: IssueBuckets,
  measures: Record<string, string>
): QualityMetrics {
  const severe = [...buckets.bugs, ...buckets.vulnerabilities];

  return {
    bugCount: buckets.bugs.length,
    vulnerabilityCount: buckets.vulnerabilities.length,
    codeSmellCount: buckets.codeSmells.length,
    criticalIssues: severe.filter((i) => i.severity !== null && CRITICAL_SEVERITIES.has(i.severity))
      .length,
    majorIssues: severe.filter((i) => i.severity === "MAJOR").length,
    coverage: toNumber(measures["coverage"]),
    duplicatedLinesDensity: toNumber(measures["duplicated_lines_density"]),
    reliabilityRating: toRating(measures["reliability_rating"]),
    securityRating: toRating(measures["security_rating"]),
    maintainabilityRating: toRating(measures["maintainability_rating"]),
  };
}

/**
 * Pull the three issue buckets and the project measures. A measures failure
 * degrades to defaults; an issue-search failure propagates.
 */
export async function collectQualityMetrics(
  sonar: SonarQubeClient,
  projectKey: string
): Promise<QualityMetrics> {
  const [bugs, vulnerabilities, codeSmells] = await Promise.all([
    sonar.getIssues(projectKey, { types: "BUG", limit: ISSUE_FETCH_LIMIT }),
    sonar.getIssues(projectKey, { types: "VULNERABILITY", limit: ISSUE_FETCH_LIMIT }),
    sonar.getIssues(projectKey, { types: "CODE_SMELL", limit: ISSUE_FETCH_LIMIT }),
  ]);

  let measures: Record<string, string> = {};
  try {
    measures = await sonar.getMetrics(projectKey);
  } catch (error) {
    logger.warn(`Could not fetch metrics for ${projectKey}: ${errorMessage(error)}`);
  }

  return computeQualityMetrics({ bugs, vulnerabilities, codeSmells }, measures);
}
