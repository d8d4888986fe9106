/**
 * GitLab and SonarQube REST adapters
 */

export { GitLabClient, truncateLog } from "./gitlab/gitlab-client.js";
export type { GitLabClientOptions, RawResponse } from "./gitlab/gitlab-client.js";
export {
  createMergeRequest,
  isMergeRequestFailure,
  MergeRequestFilesSchema,
} from "./gitlab/merge-request.js";
export type {
  CreateMergeRequestInput,
  CreateMergeRequestResult,
  MergeRequestCreated,
  MergeRequestUpdated,
  BranchCommitted,
  MergeRequestFailure,
  MergeRequestFiles,
} from "./gitlab/merge-request.js";
export { resolveGitLabProjectId } from "./gitlab/project-resolver.js";
export { SonarQubeClient, simplifyIssue } from "./sonarqube/sonarqube-client.js";
export type { SonarQubeClientOptions, IssueQuery } from "./sonarqube/sonarqube-client.js";
export { collectQualityMetrics, computeQualityMetrics } from "./sonarqube/quality-metrics.js";
export type { IssueBuckets } from "./sonarqube/quality-metrics.js";
