/**
 * create_merge_request: commit a set of file changes to a fix branch and open
 * (or reuse) the merge request for it.
 *
 * The caller's "updates" / "creates" labels are hints only; each file's
 * action is decided by whether it exists on the branch the commit builds on.
 */

import { z } from "zod";
import { logger } from "../../../infra/logger.js";
import { errorMessage } from "../../../infra/errors.js";
import type { CommitAction } from "../../../types/gitlab.js";
import type { GitLabClient } from "./gitlab-client.js";

const FileMapSchema = z.record(z.string());

export const MergeRequestFilesSchema = z.union([
  z
    .object({
      updates: FileMapSchema.optional(),
      creates: FileMapSchema.optional(),
    })
    .strict()
    .refine((files) => files.updates !== undefined || files.creates !== undefined),
  // Legacy shape: a flat { path: content } map, treated as updates
  FileMapSchema,
]);

export type MergeRequestFiles = z.infer<typeof MergeRequestFilesSchema>;

export interface CreateMergeRequestInput {
  projectId: string;
  sourceBranch: string;
  targetBranch?: string;
  title: string;
  description: string;
  files: MergeRequestFiles;
  updateMode?: boolean;
}

export interface MergeRequestCreated {
  id: number;
  web_url: string;
  title: string;
  source_branch: string;
  target_branch: string;
  files_processed: string[];
  commit_sha: string | null;
}

export interface MergeRequestUpdated {
  id: number;
  web_url: string;
  message: "Updated existing merge request";
  branch: string;
  files_processed: string[];
  commit_sha: string | null;
}

export interface BranchCommitted {
  message: "Committed to existing branch";
  branch: string;
  files_processed: string[];
  commit_sha: string | null;
  info: string;
}

export interface MergeRequestFailure {
  error: string;
  [detail: string]: unknown;
}

export type CreateMergeRequestResult =
  | MergeRequestCreated
  | MergeRequestUpdated
  | BranchCommitted
  | MergeRequestFailure;

export function isMergeRequestFailure(
  result: CreateMergeRequestResult
): result is MergeRequestFailure {
  return "error" in result;
}

interface PlannedFile {
  intended: "update" | "create";
  path: string;
  content: string;
}

function planFiles(files: MergeRequestFiles): PlannedFile[] {
  const planned: PlannedFile[] = [];
  const structured = "updates" in files || "creates" in files;

  if (!structured) {
    logger.warn("Using legacy file format for merge request");
  }

  const updates = structured ? toMap(files["updates"]) : toMap(files);
  const creates = structured ? toMap(files["creates"]) : {};

  for (const [path, content] of Object.entries(updates)) {
    planned.push({ intended: "update", path, content });
  }
  for (const [path, content] of Object.entries(creates)) {
    planned.push({ intended: "create", path, content });
  }
  return planned;
}

function toMap(value: unknown): Record<string, string> {
  const parsed = FileMapSchema.safeParse(value);
  return parsed.success ? parsed.data : {};
}

export async function createMergeRequest(
  gitlab: GitLabClient,
  input: CreateMergeRequestInput
): Promise<CreateMergeRequestResult> {
  const { projectId, sourceBranch, title, description } = input;
  const targetBranch = input.targetBranch ?? "main";
  const updateMode = input.updateMode ?? false;

  try {
    const branchExists = await gitlab.branchExists(projectId, sourceBranch);

    if (updateMode && !branchExists) {
      logger.error(`Update mode requested but branch ${sourceBranch} doesn't exist`);
      return { error: `Branch ${sourceBranch} not found for update` };
    }

    const checkRef = branchExists ? sourceBranch : targetBranch;
    const actions: CommitAction[] = [];
    const filesProcessed: string[] = [];

    for (const file of planFiles(input.files)) {
      const exists = await gitlab.fileExists(projectId, file.path, checkRef);
      const action = exists ? "update" : "create";
      if (action !== file.intended) {
        logger.info(`File ${file.path} marked ${file.intended}, committing as ${action} on ${checkRef}`);
      }
      actions.push({ action, file_path: file.path, content: file.content });
      filesProcessed.push(`${action.toUpperCase()}: ${file.path}`);
    }

    if (actions.length === 0) {
      return { error: "No files to commit", files_checked: filesProcessed };
    }

    const commit = await gitlab.createCommit(projectId, {
      branch: sourceBranch,
      commit_message: `Fix: ${title}`,
      actions,
      ...(branchExists ? {} : { start_branch: targetBranch }),
    });

    if (commit.status !== 201) {
      logger.error(`Commit failed with status ${commit.status}: ${commit.body}`);
      return {
        error: `Commit failed: ${commit.body}`,
        files_processed: filesProcessed,
        branch_exists: branchExists,
        update_mode: updateMode,
      };
    }

    const commitSha = gitlab.parseCreatedCommit(commit);
    logger.info(`Committed ${actions.length} file(s) to ${sourceBranch}`);

    if (branchExists || updateMode) {
      const open = await gitlab.listMergeRequests(projectId, {
        sourceBranch,
        state: "opened",
      });
      const existing = open[0];
      if (existing) {
        logger.info(`Found existing MR !${existing.iid}`);
        return {
          id: existing.iid,
          web_url: existing.web_url,
          message: "Updated existing merge request",
          branch: sourceBranch,
          files_processed: filesProcessed,
          commit_sha: commitSha,
        };
      }

      return {
        message: "Committed to existing branch",
        branch: sourceBranch,
        files_processed: filesProcessed,
        commit_sha: commitSha,
        info: "No merge request found for this branch",
      };
    }

    const filesList = filesProcessed.map((f) => `- ${f}`).join("\n");
    const created = await gitlab.createMergeRequest(projectId, {
      source_branch: sourceBranch,
      target_branch: targetBranch,
      title,
      description: `${description}\n\n**Files changed:**\n${filesList}`,
      remove_source_branch: true,
    });

    const mr = created.status === 201 ? gitlab.parseMergeRequest(created) : null;
    if (!mr) {
      logger.error(`MR creation failed: ${created.body}`);
      return {
        error: `MR creation failed: ${created.body}`,
        branch: sourceBranch,
        commit_sha: commitSha,
      };
    }

    logger.success(`Created MR !${mr.iid} for ${sourceBranch}`);
    return {
      id: mr.iid,
      web_url: mr.web_url,
      title: mr.title,
      source_branch: sourceBranch,
      target_branch: targetBranch,
      files_processed: filesProcessed,
      commit_sha: commitSha,
    };
  } catch (error) {
    logger.error("Failed to create/update merge request", error);
    return { error: errorMessage(error) };
  }
}
