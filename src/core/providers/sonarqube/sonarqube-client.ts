/**
 * SonarQube Web API client
 *
 * Auth is HTTP basic with the token as user name and an empty password.
 */

import type { z } from "zod";
import { logger } from "../../../infra/logger.js";
import { SonarQubeApiError, TimeoutError, errorMessage } from "../../../infra/errors.js";
import {
  SonarHotspotSearchSchema,
  SonarIssueSearchSchema,
  SonarMeasuresSchema,
  SonarProjectStatusSchema,
  SonarRuleSchema,
  type IssueType,
  type RuleDescription,
  type SimplifiedIssue,
  type SonarHotspotSearch,
  type SonarIssue,
  type SonarProjectStatus,
} from "../../../types/sonarqube.js";

export interface SonarQubeClientOptions {
  baseUrl: string;
  token?: string | undefined;
  timeoutMs?: number;
}

export interface IssueQuery {
  types?: IssueType | string;
  severities?: string;
  limit?: number;
}

const METRIC_KEYS = [
  "bugs",
  "vulnerabilities",
  "code_smells",
  "coverage",
  "duplicated_lines_density",
  "reliability_rating",
  "security_rating",
  "sqale_rating",
  "ncloc",
];

export class SonarQubeClient {
  private readonly apiBase: string;
  private readonly authHeader: string | undefined;
  private readonly timeoutMs: number;

  constructor(options: SonarQubeClientOptions) {
    this.apiBase = `${options.baseUrl.replace(/\/+$/, "")}/api`;
    this.authHeader = options.token
      ? `Basic ${Buffer.from(`${options.token}:`).toString("base64")}`
      : undefined;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async getQualityGateStatus(projectKey: string): Promise<SonarProjectStatus> {
    return this.apiCall("qualitygates/project_status", SonarProjectStatusSchema, {
      projectKey,
    });
  }

  async getIssues(projectKey: string, query: IssueQuery = {}): Promise<SimplifiedIssue[]> {
    const result = await this.apiCall("issues/search", SonarIssueSearchSchema, {
      componentKeys: projectKey,
      ps: String(query.limit ?? 100),
      resolved: "false",
      types: query.types,
      severities: query.severities,
    });
    logger.debug(`Found ${result.issues.length} issues for ${projectKey}`);
    return result.issues.map(simplifyIssue);
  }

  async getIssue(issueKey: string): Promise<SonarIssue | null> {
    const result = await this.apiCall("issues/search", SonarIssueSearchSchema, {
      issues: issueKey,
    });
    return result.issues[0] ?? null;
  }

  /**
   * Project measures keyed by metric; `sqale_rating` is reported as
   * `maintainability_rating`.
   */
  async getMetrics(projectKey: string): Promise<Record<string, string>> {
    const result = await this.apiCall("measures/component", SonarMeasuresSchema, {
      component: projectKey,
      metricKeys: METRIC_KEYS.join(","),
    });

    const metrics: Record<string, string> = {};
    for (const measure of result.component.measures) {
      if (measure.metric === "sqale_rating") {
        metrics["maintainability_rating"] = measure.value ?? "E";
      } else {
        metrics[measure.metric] = measure.value ?? measure.periods?.[0]?.value ?? "N/A";
      }
    }
    return metrics;
  }

  async getRule(ruleKey: string): Promise<RuleDescription> {
    const { rule } = await this.apiCall("rules/show", SonarRuleSchema, { key: ruleKey });
    return {
      key: rule.key ?? null,
      name: rule.name ?? null,
      severity: rule.severity ?? null,
      type: rule.type ?? null,
      description: rule.htmlDesc ?? "",
      remediation: rule.remFnBaseEffort ?? "",
    };
  }

  async getSecurityHotspots(projectKey: string, limit = 100): Promise<SonarHotspotSearch> {
    return this.apiCall("hotspots/search", SonarHotspotSearchSchema, {
      projectKey,
      ps: String(limit),
    });
  }

  private async apiCall<S extends z.ZodTypeAny>(
    endpoint: string,
    schema: S,
    query: Record<string, string | undefined>
  ): Promise<z.infer<S>> {
    const url = new URL(`${this.apiBase}/${endpoint}`);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = {};
    if (this.authHeader) {
      headers["Authorization"] = this.authHeader;
    }

    logger.debug(`SonarQube GET ${endpoint}`);

    let response: Response;
    try {
      response = await globalThis.fetch(url, {
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && error.name === "TimeoutError") {
        throw new TimeoutError(
          `SonarQube request timed out after ${this.timeoutMs}ms: ${endpoint}`,
          "sonarqube",
          this.timeoutMs
        );
      }
      throw new SonarQubeApiError(
        `SonarQube request failed: ${errorMessage(error)}`,
        undefined,
        error instanceof Error ? error : undefined
      );
    }

    const body = await response.text();
    if (!response.ok) {
      throw new SonarQubeApiError(
        `SonarQube API error: ${response.status} - ${body.slice(0, 200)}`,
        response.status
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new SonarQubeApiError(
        `SonarQube returned invalid JSON for ${endpoint}`,
        response.status,
        error instanceof Error ? error : undefined
      );
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new SonarQubeApiError(`Unexpected SonarQube response for ${endpoint}: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}

export function simplifyIssue(issue: SonarIssue): SimplifiedIssue {
  const component = issue.component;
  const separator = component.lastIndexOf(":");
  return {
    key: issue.key,
    type: issue.type ?? null,
    severity: issue.severity ?? null,
    message: issue.message ?? null,
    component,
    line: issue.line ?? null,
    effort: issue.effort ?? null,
    rule: issue.rule ?? null,
    file: separator >= 0 ? component.slice(separator + 1) : component,
  };
}
