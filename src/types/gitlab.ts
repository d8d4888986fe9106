import { z } from "zod";

// REST v4 resources. Only the fields the assistant reads are declared;
// everything else is passed through untouched so tool output stays complete.

export const GitLabJobSchema = z
  .object({
    id: z.number(),
    name: z.string(),
    stage: z.string().optional(),
    status: z.string(),
    finished_at: z.string().nullable().optional(),
    failure_reason: z.string().nullable().optional(),
    web_url: z.string().optional(),
  })
  .passthrough();

export const GitLabCommitSchema = z
  .object({
    id: z.string(),
    short_id: z.string().optional(),
    title: z.string().optional(),
    message: z.string().optional(),
    author_name: z.string().optional(),
    created_at: z.string().optional(),
  })
  .passthrough();

export const GitLabMergeRequestSchema = z
  .object({
    id: z.number().optional(),
    iid: z.number(),
    web_url: z.string(),
    source_branch: z.string(),
    target_branch: z.string(),
    title: z.string(),
    state: z.string(),
  })
  .passthrough();

export const GitLabMergeRequestChangesSchema = z
  .object({
    changes: z
      .array(
        z
          .object({
            old_path: z.string(),
            new_path: z.string(),
            new_file: z.boolean().optional(),
            deleted_file: z.boolean().optional(),
          })
          .passthrough()
      )
      .default([]),
  })
  .passthrough();

export const GitLabProjectSchema = z
  .object({
    id: z.number(),
    name: z.string(),
    path_with_namespace: z.string().default(""),
    default_branch: z.string().nullable().optional(),
    web_url: z.string().optional(),
  })
  .passthrough();

export const GitLabGroupSchema = z
  .object({
    id: z.number(),
    name: z.string(),
    full_path: z.string().optional(),
  })
  .passthrough();

export const GitLabRepositoryFileSchema = z
  .object({
    file_path: z.string().optional(),
    content: z.string(),
    encoding: z.string().optional(),
  })
  .passthrough();

export const GitLabCreatedCommitSchema = z.object({ id: z.string() }).passthrough();

export type GitLabJob = z.infer<typeof GitLabJobSchema>;
export type GitLabCommit = z.infer<typeof GitLabCommitSchema>;
export type GitLabMergeRequest = z.infer<typeof GitLabMergeRequestSchema>;
export type GitLabMergeRequestChanges = z.infer<typeof GitLabMergeRequestChangesSchema>;
export type GitLabProject = z.infer<typeof GitLabProjectSchema>;
export type GitLabGroup = z.infer<typeof GitLabGroupSchema>;

export type CommitActionType = "create" | "update";

export interface CommitAction {
  action: CommitActionType;
  file_path: string;
  content: string;
}

export interface CreateCommitPayload {
  branch: string;
  commit_message: string;
  actions: CommitAction[];
  start_branch?: string;
}

export interface CreateMergeRequestPayload {
  source_branch: string;
  target_branch: string;
  title: string;
  description: string;
  remove_source_branch: boolean;
}

export type FileContentResult =
  | { status: "success"; content: string; file_path: string }
  | { status: "not_found" | "error"; error: string; file_path: string };

// === Webhook payloads ===

export const PipelineBuildSchema = z
  .object({
    id: z.union([z.number(), z.string()]).transform(String),
    name: z.string().default(""),
    stage: z.string().nullable().optional(),
    status: z.string().default(""),
    finished_at: z.string().nullable().optional(),
    failure_reason: z.string().nullable().optional(),
  })
  .passthrough();

export const GitLabPipelineEventSchema = z
  .object({
    object_kind: z.string().default(""),
    object_attributes: z
      .object({
        id: z.union([z.number(), z.string()]).transform(String).optional(),
        ref: z.string().nullable().default(""),
        status: z.string().nullable().default(""),
        sha: z.string().nullable().optional(),
        url: z.string().nullable().optional(),
      })
      .passthrough()
      .default({}),
    project: z
      .object({
        id: z.union([z.number(), z.string()]).transform(String).optional(),
        name: z.string().optional(),
        path_with_namespace: z.string().optional(),
        web_url: z.string().optional(),
      })
      .passthrough()
      .default({}),
    builds: z.array(PipelineBuildSchema).default([]),
  })
  .passthrough();

export type PipelineBuild = z.infer<typeof PipelineBuildSchema>;
export type GitLabPipelineEvent = z.infer<typeof GitLabPipelineEventSchema>;
