/**
 * GitLab tools exposed to the agent
 *
 * get_pipeline_jobs, get_job_logs, get_file_content, get_recent_commits,
 * get_project_info, get_merge_request_details, create_merge_request
 */

import { z } from "zod";
import { logger } from "../../../infra/logger.js";
import { errorMessage } from "../../../infra/errors.js";
import { GitLabClient, truncateLog } from "../../providers/gitlab/gitlab-client.js";
import {
  MergeRequestFilesSchema,
  createMergeRequest,
} from "../../providers/gitlab/merge-request.js";
import { defineTool, type AgentTool } from "./index.js";

export interface GitLabToolsOptions {
  gitlab: GitLabClient;
  maxLogSize: number;
}

const id = z.union([z.string(), z.number()]).transform(String);

export function createGitLabTools(options: GitLabToolsOptions): AgentTool[] {
  const { gitlab, maxLogSize } = options;

  return [
    defineTool({
      name: "get_pipeline_jobs",
      description: "Get all jobs in a pipeline with their status, stage and timing information",
      inputSchema: {
        type: "object",
        properties: {
          pipeline_id: { type: "string", description: "GitLab pipeline ID" },
          project_id: { type: "string", description: "GitLab project ID" },
        },
        required: ["pipeline_id", "project_id"],
      },
      input: z.object({ pipeline_id: id, project_id: id }),
      handler: async ({ pipeline_id, project_id }) => {
        logger.info(`Getting jobs for pipeline ${pipeline_id} in project ${project_id}`);
        try {
          return await gitlab.getPipelineJobs(project_id, pipeline_id);
        } catch (error) {
          logger.error(`Failed to get pipeline jobs: ${errorMessage(error)}`);
          return [{ error: errorMessage(error) }];
        }
      },
    }),

    defineTool({
      name: "get_job_logs",
      description:
        "Get the log of a pipeline job. Oversized logs keep their beginning and end around a truncation marker.",
      inputSchema: {
        type: "object",
        properties: {
          job_id: { type: "string", description: "GitLab job ID" },
          project_id: { type: "string", description: "GitLab project ID" },
          max_size: { type: "number", description: "Maximum log size in characters" },
        },
        required: ["job_id", "project_id"],
      },
      input: z.object({
        job_id: id,
        project_id: id,
        max_size: z.number().int().positive().optional(),
      }),
      handler: async ({ job_id, project_id, max_size }) => {
        logger.info(`Getting logs for job ${job_id} in project ${project_id}`);
        // The model may ask for less than the configured cap, never more
        const limit = Math.min(max_size ?? maxLogSize, maxLogSize);
        try {
          const trace = await gitlab.getJobTrace(project_id, job_id);
          if (trace.length > limit) {
            logger.warn(`Log size (${trace.length} chars) exceeds limit (${limit} chars), truncating`);
          }
          return truncateLog(trace, limit);
        } catch (error) {
          logger.error(`Failed to get job logs: ${errorMessage(error)}`);
          return `Error getting job logs: ${errorMessage(error)}`;
        }
      },
    }),

    defineTool({
      name: "get_file_content",
      description:
        "Get the content of a repository file. Returns status success, not_found or error.",
      inputSchema: {
        type: "object",
        properties: {
          file_path: { type: "string", description: "Path to the file in the repository" },
          project_id: { type: "string", description: "GitLab project ID" },
          ref: { type: "string", description: "Branch, tag or commit SHA (default HEAD)" },
        },
        required: ["file_path", "project_id"],
      },
      input: z.object({
        file_path: z.string().min(1),
        project_id: id,
        ref: z.string().default("HEAD"),
      }),
      handler: async ({ file_path, project_id, ref }) => {
        logger.info(`Getting file ${file_path} from project ${project_id} at ref ${ref}`);
        return gitlab.getFile(project_id, file_path, ref);
      },
    }),

    defineTool({
      name: "get_recent_commits",
      description: "Get the most recent commits of a project",
      inputSchema: {
        type: "object",
        properties: {
          project_id: { type: "string", description: "GitLab project ID" },
          limit: { type: "number", description: "Number of commits to retrieve (default 10)" },
        },
        required: ["project_id"],
      },
      input: z.object({ project_id: id, limit: z.number().int().positive().max(100).default(10) }),
      handler: async ({ project_id, limit }) => {
        try {
          return await gitlab.getRecentCommits(project_id, limit);
        } catch (error) {
          logger.error(`Failed to get commits: ${errorMessage(error)}`);
          return [{ error: errorMessage(error) }];
        }
      },
    }),

    defineTool({
      name: "get_project_info",
      description: "Get project details such as name, path and default branch",
      inputSchema: {
        type: "object",
        properties: { project_id: { type: "string", description: "GitLab project ID" } },
        required: ["project_id"],
      },
      input: z.object({ project_id: id }),
      handler: async ({ project_id }) => gitlab.getProject(project_id),
    }),

    defineTool({
      name: "get_merge_request_details",
      description: "Get a merge request by IID: web_url, source and target branch, title, state",
      inputSchema: {
        type: "object",
        properties: {
          project_id: { type: "string", description: "GitLab project ID" },
          mr_iid: { type: "string", description: "Merge request internal ID" },
        },
        required: ["project_id", "mr_iid"],
      },
      input: z.object({ project_id: id, mr_iid: id }),
      handler: async ({ project_id, mr_iid }) => {
        const mr = await gitlab.getMergeRequest(project_id, mr_iid);
        return {
          iid: mr.iid,
          web_url: mr.web_url,
          source_branch: mr.source_branch,
          target_branch: mr.target_branch,
          title: mr.title,
          state: mr.state,
        };
      },
    }),

    defineTool({
      name: "create_merge_request",
      description:
        "Commit file changes to a branch and open a merge request. files is " +
        '{"updates": {path: content}, "creates": {path: content}}; each file is committed as ' +
        "update or create depending on whether it already exists. With update_mode the branch " +
        "must exist and its open merge request is reused.",
      inputSchema: {
        type: "object",
        properties: {
          title: { type: "string" },
          description: { type: "string" },
          files: {
            type: "object",
            properties: {
              updates: { type: "object", additionalProperties: { type: "string" } },
              creates: { type: "object", additionalProperties: { type: "string" } },
            },
          },
          project_id: { type: "string" },
          source_branch: { type: "string" },
          target_branch: { type: "string", description: "Default main" },
          update_mode: { type: "boolean" },
        },
        required: ["title", "description", "files", "project_id", "source_branch"],
      },
      input: z.object({
        title: z.string().min(1),
        description: z.string().default(""),
        files: MergeRequestFilesSchema,
        project_id: id,
        source_branch: z.string().min(1),
        target_branch: z.string().default("main"),
        update_mode: z.boolean().default(false),
      }),
      handler: async (args) =>
        createMergeRequest(gitlab, {
          projectId: args.project_id,
          sourceBranch: args.source_branch,
          targetBranch: args.target_branch,
          title: args.title,
          description: args.description,
          files: args.files,
          updateMode: args.update_mode,
        }),
    }),
  ];
}
