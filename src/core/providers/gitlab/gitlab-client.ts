/**
 * GitLab REST v4 client
 *
 * Thin wrapper over fetch with PRIVATE-TOKEN auth and a per-call timeout.
 * Responses are validated with zod before they reach callers. Nothing here
 * retries: a failed call surfaces as GitLabApiError / TimeoutError, and the
 * tool layer turns those into `{ error }` payloads for the model.
 */

import type { z } from "zod";
import { logger } from "../../../infra/logger.js";
import { GitLabApiError, TimeoutError, errorMessage } from "../../../infra/errors.js";
import {
  GitLabCommitSchema,
  GitLabCreatedCommitSchema,
  GitLabGroupSchema,
  GitLabJobSchema,
  GitLabMergeRequestChangesSchema,
  GitLabMergeRequestSchema,
  GitLabProjectSchema,
  GitLabRepositoryFileSchema,
  type CreateCommitPayload,
  type CreateMergeRequestPayload,
  type FileContentResult,
  type GitLabCommit,
  type GitLabGroup,
  type GitLabJob,
  type GitLabMergeRequest,
  type GitLabMergeRequestChanges,
  type GitLabProject,
} from "../../../types/gitlab.js";

export interface GitLabClientOptions {
  baseUrl: string;
  token?: string | undefined;
  timeoutMs?: number;
}

type Query = Record<string, string | number | boolean | undefined>;

export interface RawResponse {
  status: number;
  body: string;
}

const DEFAULT_TIMEOUT_MS = 30_000;

export class GitLabClient {
  private readonly apiBase: string;
  private readonly token: string | undefined;
  private readonly timeoutMs: number;

  constructor(options: GitLabClientOptions) {
    this.apiBase = `${options.baseUrl.replace(/\/+$/, "")}/api/v4`;
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  // === Pipelines & jobs ===

  async getPipelineJobs(projectId: string, pipelineId: string): Promise<GitLabJob[]> {
    return this.apiCall(
      `projects/${projectId}/pipelines/${pipelineId}/jobs`,
      GitLabJobSchema.array()
    );
  }

  async getJobTrace(projectId: string, jobId: string): Promise<string> {
    const response = await this.request(`projects/${projectId}/jobs/${jobId}/trace`);
    if (response.status !== 200) {
      throw new GitLabApiError(
        `GitLab API error: ${response.status} - ${response.body.slice(0, 200)}`,
        response.status
      );
    }
    return response.body;
  }

  // === Repository ===

  /**
   * Read a file at `ref`. Tries the raw endpoint first and falls back to the
   * JSON endpoint (base64 content) on any non-404 failure. Never throws.
   */
  async getFile(projectId: string, filePath: string, ref: string): Promise<FileContentResult> {
    const encodedPath = encodeURIComponent(filePath);
    const notFound: FileContentResult = {
      status: "not_found",
      error: `File '${filePath}' does not exist in the repository`,
      file_path: filePath,
    };

    try {
      const raw = await this.request(`projects/${projectId}/repository/files/${encodedPath}/raw`, {
        query: { ref },
      });
      if (raw.status === 404) return notFound;
      if (raw.status === 200) {
        return { status: "success", content: raw.body, file_path: filePath };
      }

      const json = await this.request(`projects/${projectId}/repository/files/${encodedPath}`, {
        query: { ref },
      });
      if (json.status === 404) return notFound;
      if (json.status === 200) {
        const file = GitLabRepositoryFileSchema.parse(JSON.parse(json.body));
        return {
          status: "success",
          content: Buffer.from(file.content, "base64").toString("utf-8"),
          file_path: filePath,
        };
      }

      throw new GitLabApiError(`GitLab API error: ${json.status} - ${json.body.slice(0, 200)}`, json.status);
    } catch (error) {
      logger.error(`Failed to get file content for ${filePath}: ${errorMessage(error)}`);
      return { status: "error", error: errorMessage(error), file_path: filePath };
    }
  }

  async fileExists(projectId: string, filePath: string, ref: string): Promise<boolean> {
    try {
      const response = await this.request(
        `projects/${projectId}/repository/files/${encodeURIComponent(filePath)}`,
        { query: { ref } }
      );
      return response.status === 200;
    } catch (error) {
      logger.debug(`File existence check failed for ${filePath}: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Look a branch up as given, then URL-encoded (names with slashes need it
   * on some GitLab versions).
   */
  async branchExists(projectId: string, branch: string): Promise<boolean> {
    for (const name of [branch, encodeURIComponent(branch)]) {
      try {
        const response = await this.request(`projects/${projectId}/repository/branches/${name}`);
        if (response.status === 200) return true;
      } catch (error) {
        logger.debug(`Branch check for ${branch} failed: ${errorMessage(error)}`);
      }
    }
    return false;
  }

  async getRecentCommits(projectId: string, limit = 10): Promise<GitLabCommit[]> {
    return this.apiCall(`projects/${projectId}/repository/commits`, GitLabCommitSchema.array(), {
      query: { per_page: limit },
    });
  }

  /**
   * Create a commit. Returns the raw response so callers can report GitLab's
   * own error text when the status is not 201.
   */
  async createCommit(projectId: string, payload: CreateCommitPayload): Promise<RawResponse> {
    return this.request(`projects/${projectId}/repository/commits`, {
      method: "POST",
      body: payload,
    });
  }

  parseCreatedCommit(response: RawResponse): string | null {
    const parsed = GitLabCreatedCommitSchema.safeParse(safeJson(response.body));
    return parsed.success ? parsed.data.id : null;
  }

  // === Merge requests ===

  async listMergeRequests(
    projectId: string,
    filter: { sourceBranch?: string; state?: string } = {}
  ): Promise<GitLabMergeRequest[]> {
    return this.apiCall(`projects/${projectId}/merge_requests`, GitLabMergeRequestSchema.array(), {
      query: { source_branch: filter.sourceBranch, state: filter.state },
    });
  }

  async createMergeRequest(
    projectId: string,
    payload: CreateMergeRequestPayload
  ): Promise<RawResponse> {
    return this.request(`projects/${projectId}/merge_requests`, {
      method: "POST",
      body: payload,
    });
  }

  parseMergeRequest(response: RawResponse): GitLabMergeRequest | null {
    const parsed = GitLabMergeRequestSchema.safeParse(safeJson(response.body));
    return parsed.success ? parsed.data : null;
  }

  async getMergeRequest(projectId: string, iid: string): Promise<GitLabMergeRequest> {
    return this.apiCall(`projects/${projectId}/merge_requests/${iid}`, GitLabMergeRequestSchema);
  }

  async getMergeRequestChanges(projectId: string, iid: string): Promise<GitLabMergeRequestChanges> {
    return this.apiCall(
      `projects/${projectId}/merge_requests/${iid}/changes`,
      GitLabMergeRequestChangesSchema
    );
  }

  // === Projects & groups ===

  /**
   * Fetch a project by numeric id or by `group/name` path
   */
  async getProject(idOrPath: string): Promise<GitLabProject> {
    const ref = /^\d+$/.test(idOrPath) ? idOrPath : encodeURIComponent(idOrPath);
    return this.apiCall(`projects/${ref}`, GitLabProjectSchema);
  }

  async searchProjects(search: string): Promise<GitLabProject[]> {
    return this.apiCall("projects", GitLabProjectSchema.array(), {
      query: { search, simple: true },
    });
  }

  async searchGroups(search: string): Promise<GitLabGroup[]> {
    return this.apiCall("groups", GitLabGroupSchema.array(), { query: { search } });
  }

  async getGroupProjects(groupId: number, search?: string): Promise<GitLabProject[]> {
    return this.apiCall(`groups/${groupId}/projects`, GitLabProjectSchema.array(), {
      query: { search },
    });
  }

  // === Transport ===

  private async apiCall<S extends z.ZodTypeAny>(
    endpoint: string,
    schema: S,
    options: { query?: Query } = {}
  ): Promise<z.infer<S>> {
    const response = await this.request(endpoint, options);

    if (response.status < 200 || response.status >= 300) {
      throw new GitLabApiError(
        `GitLab API error: ${response.status} - ${response.body.slice(0, 200)}`,
        response.status
      );
    }

    const parsed = schema.safeParse(safeJson(response.body));
    if (!parsed.success) {
      throw new GitLabApiError(`Unexpected GitLab response for ${endpoint}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async request(
    endpoint: string,
    options: { method?: string; query?: Query; body?: unknown } = {}
  ): Promise<RawResponse> {
    const url = new URL(`${this.apiBase}/${endpoint}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }

    const headers: Record<string, string> = {};
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }
    if (this.token) {
      headers["PRIVATE-TOKEN"] = this.token;
    }

    logger.debug(`GitLab ${options.method ?? "GET"} ${endpoint}`);

    try {
      const response = await globalThis.fetch(url, {
        method: options.method ?? "GET",
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return { status: response.status, body: await response.text() };
    } catch (error) {
      if (error instanceof Error && error.name === "TimeoutError") {
        throw new TimeoutError(
          `GitLab request timed out after ${this.timeoutMs}ms: ${endpoint}`,
          "gitlab",
          this.timeoutMs
        );
      }
      throw new GitLabApiError(
        `GitLab request failed: ${errorMessage(error)}`,
        undefined,
        error instanceof Error ? error : undefined
      );
    }
  }
}

function safeJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

/**
 * Keep the head and tail of an oversized log around a marker. Each side gets
 * 40% of `maxSize`.
 */
export function truncateLog(log: string, maxSize: number): string {
  if (log.length <= maxSize) {
    return log;
  }

  const startSize = Math.floor(maxSize * 0.4);
  const endSize = Math.floor(maxSize * 0.4);

  return (
    log.slice(0, startSize) +
    `\n\n... [TRUNCATED - Log too large, showing first ${startSize} and last ${endSize} characters] ...\n\n` +
    log.slice(-endSize)
  );
}
