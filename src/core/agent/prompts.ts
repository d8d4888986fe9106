/**
 * Prompt builders for pipeline and quality sessions
 */

import type { ConversationMessage, FixAttempt, Session, SessionType } from "../../types/session.js";

const HISTORY_WINDOW = 6;
const MESSAGE_LIMIT = 1000;
const MESSAGE_KEEP = 900;

export function pipelineSystemPrompt(maxAttempts: number, maxLogSize: number): string {
  return `You are an expert DevOps engineer who analyzes GitLab CI/CD pipeline failures.

## Your Role
Find why the pipeline failed and propose a concrete fix. Every analysis includes
the probable cause, the actions that fix it and how confident you are.

## Logs
Always pass max_size (${maxLogSize}) to get_job_logs. Truncated logs keep their
beginning and end; work with what is there.

## Quality Gate Failures
When the failure comes from the SonarQube quality gate, say so plainly: it is a
code quality problem, not a pipeline configuration problem.

## Analysis Format
### 🔍 Failure Analysis
**Confidence**: [0-100]%
**Root Cause**: [one sentence]
**Error Type**: [dependency/build/test/deployment/configuration]

### 📋 Detailed Findings
[what went wrong and why]

### 💡 Proposed Solution
[step by step]

### 🛠️ Required Changes
\`\`\`
[exact file changes]
\`\`\`

## Rules
- Never create a merge request unless the user asks for one
- Retrieve every file you reason about with get_file_content
- Show real file changes, not descriptions of them
- Fix branches are named fix/pipeline_[job_name]_[timestamp]
- After creating a merge request, include its full URL in your reply
- At most ${maxAttempts} fix attempts are allowed

## Merge Request Reply
Report the branch and URL as plain lines:
Branch: fix/pipeline_build_20250101_120000
MR URL: [full URL]`;
}

export function qualitySystemPrompt(maxAttempts: number): string {
  return `You are an expert code quality analyst who resolves SonarQube quality gate failures.

## Your Role
Fetch the actual metrics and issues first, then propose fixes. Check the latest
pipeline logs too: a failing scan job is not always a quality problem.

## Iterations
After a failed fix attempt, read the new pipeline logs and change the approach
instead of repeating the same fix. At most ${maxAttempts} attempts are allowed;
after that a human takes over.

## Analysis Format
### 🔍 Quality Analysis
**Confidence**: [0-100]%
**Root Cause**: [one sentence]
**Quality Gate Status**: [ERROR/WARN/OK]

### 📊 Current Metrics
- **Total Issues**, **Coverage**, **Duplicated Lines**

### 📋 Issue Breakdown
- 🐛 Bugs, 🔒 Vulnerabilities (critical/blocker and major), 💩 Code Smells

### 📈 Quality Ratings
- Reliability, Security, Maintainability (A-E)

### 💡 Proposed Fixes
For each file: **File**: \`path\` and the fixed code when the file could be retrieved.

## Merge Requests
- Only create one when at least one file was retrieved and changed
- Fix branches are named fix/sonarqube_[timestamp]
- After creating a merge request, include its full URL in your reply`;
}

export function systemPromptFor(
  sessionType: SessionType,
  maxAttempts: number,
  maxLogSize: number
): string {
  return sessionType === "quality"
    ? qualitySystemPrompt(maxAttempts)
    : pipelineSystemPrompt(maxAttempts, maxLogSize);
}

export interface FailedJobInfo {
  name: string;
  stage: string;
  failureReason?: string | null;
}

export function pipelineAnalysisPrompt(
  session: Session,
  job: FailedJobInfo,
  options: { maxLogSize: number; qualityJob: boolean }
): string {
  const header = `Analyze this pipeline failure:

Project ID: ${session.projectId}
Pipeline ID: ${session.pipelineId ?? "unknown"}
Failed Job: ${job.name}
Stage: ${job.stage}`;

  if (options.qualityJob) {
    return `${header}

This looks like a SonarQube quality gate failure.
1. Get the job logs (max_size=${options.maxLogSize})
2. If confirmed, summarise the quality problems visible in the log
3. Do not try to fix quality issues from here

Follow the analysis format, explaining that this is a quality issue.`;
  }

  return `${header}
Failure Reason: ${job.failureReason ?? "unknown"}

1. Get the pipeline jobs and identify every failure
2. Get the logs of the failed job(s) with max_size=${options.maxLogSize}
3. Determine the root cause
4. Retrieve the relevant files (CI config, dependencies, sources) with get_file_content
5. Answer in the analysis format, with the complete fixed content of each file

Do not create a merge request. Only analyze and propose.`;
}

export function qualityAnalysisPrompt(
  projectKey: string,
  gitlabProjectId: string,
  gateStatus: string,
  conditions: unknown
): string {
  return `Analyze this SonarQube quality gate failure:

SonarQube Project Key: ${projectKey}
GitLab Project ID: ${gitlabProjectId}
Quality Gate Status: ${gateStatus}

Failed Conditions:
${JSON.stringify(conditions ?? [], null, 2)}

1. Get the project metrics
2. Get the project issues; each carries its file path in the 'file' field
   ('component' is "project_key:path/to/file")
3. Retrieve those files with get_file_content
4. Only propose a merge request for files you actually retrieved`;
}

/**
 * Recent conversation for a chat prompt: the last messages of the window,
 * system entries dropped and long entries shortened.
 */
export function formatConversationHistory(
  history: readonly ConversationMessage[],
  maxMessages = HISTORY_WINDOW
): string {
  if (history.length === 0) {
    return "No previous conversation.";
  }

  return history
    .slice(-maxMessages)
    .filter((msg) => msg.role !== "system")
    .map((msg) => {
      const content =
        msg.content.length > MESSAGE_LIMIT
          ? `${msg.content.slice(0, MESSAGE_KEEP)}... [truncated]`
          : msg.content;
      return `${msg.role.toUpperCase()}: ${content}`;
    })
    .join("\n\n");
}

export function sessionContext(session: Session, attemptCount: number, maxAttempts: number): string {
  const lines =
    session.sessionType === "quality"
      ? [
          `- Project: ${session.projectName ?? "unknown"}`,
          `- SonarQube Key: ${session.sonarqubeKey ?? "unknown"}`,
          `- GitLab Project ID: ${session.projectId}`,
          `- Quality Gate Status: ${session.qualityGateStatus ?? "unknown"}`,
        ]
      : [
          `- Project: ${session.projectName ?? "unknown"} (ID: ${session.projectId})`,
          `- Pipeline: #${session.pipelineId ?? "unknown"}`,
          `- Branch: ${session.branch ?? "unknown"}`,
          `- Failed Job: ${session.jobName ?? "unknown"} in stage ${session.failedStage ?? "unknown"}`,
        ];

  lines.push(
    `- Session ID: ${session.id}`,
    `- Current Fix Branch: ${session.currentFixBranch ?? "None"}`,
    `- Fix Iteration: ${attemptCount} of ${maxAttempts}`
  );

  return `Session Context:\n${lines.join("\n")}`;
}

function formatTimestamp(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}_` +
    `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`
  );
}

/**
 * fix/pipeline_<job>_<YYYYMMDD_HHMMSS> (lowercase, spaces to underscores) or
 * fix/sonarqube_<YYYYMMDD_HHMMSS>, in UTC
 */
export function fixBranchName(sessionType: SessionType, jobName: string | null, now: Date): string {
  const timestamp = formatTimestamp(now);
  if (sessionType === "quality") {
    return `fix/sonarqube_${timestamp}`;
  }
  return `fix/pipeline_${jobName ?? "job"}_${timestamp}`.replace(/ /g, "_").toLowerCase();
}

const FILES_SHAPE = `The files argument must look like:
{
  "updates": { "path/to/existing/file.ext": "complete file content" },
  "creates": { "path/to/new/file.ext": "complete file content" }
}`;

export function newMergeRequestPrompt(
  session: Session,
  context: string,
  branchName: string
): string {
  const isQuality = session.sessionType === "quality";
  const title = isQuality
    ? "Fix SonarQube quality gate failures"
    : `Fix ${session.failedStage ?? "pipeline"} failure in ${session.jobName ?? "job"}`;
  const description = isQuality
    ? "Automated fixes for bugs, vulnerabilities, and code smells"
    : `Automated fix for pipeline failure #${session.pipelineId ?? "unknown"}`;

  return `${context}

The user wants a merge request with the fixes discussed.

1. Call get_session_data for the stored analysis and tracked files
2. For each file that needs changes use the tracked content, or create the file if it is new
3. Create one merge request with ALL the changed files
4. Call get_merge_request_details with the MR IID to confirm the branch
5. Include the complete MR URL in your reply

create_merge_request parameters:
- project_id: ${session.projectId}
- source_branch: ${branchName}
- target_branch: ${session.branch ?? "main"}
- title: ${title}
- description: ${description}

${FILES_SHAPE}`;
}

export function updateMergeRequestPrompt(
  session: Session,
  context: string,
  attemptCount: number
): string {
  const fixBranch = session.currentFixBranch ?? "";
  const title =
    session.sessionType === "quality"
      ? `Additional quality fixes (Iteration ${attemptCount + 1})`
      : `Additional fixes for ${session.failedStage ?? "pipeline"} failure (Iteration ${attemptCount + 1})`;
  const description =
    session.sessionType === "quality"
      ? "Iterative fix for quality gate failures"
      : `Iterative fix for pipeline failure #${session.pipelineId ?? "unknown"}`;

  return `${context}

The user wants additional fixes on the existing branch ${fixBranch}.

1. Call get_session_data for the stored analysis and tracked files
2. Review what is already on ${fixBranch} (get_file_content reads from it)
3. Commit the additional fixes to the same branch and update its merge request

create_merge_request parameters:
- project_id: ${session.projectId}
- source_branch: ${fixBranch}
- target_branch: ${session.branch ?? "main"}
- title: ${title}
- description: ${description}
- update_mode: true

${FILES_SHAPE}`;
}

export function chatPrompt(session: Session, context: string, message: string): string {
  let prompt = context;

  if (session.sessionType === "quality") {
    const lastAnalysis = [...session.conversationHistory]
      .reverse()
      .find((msg) => msg.role === "assistant" && msg.content !== "");
    if (lastAnalysis) {
      prompt += `\n\nPrevious Analysis:\n${lastAnalysis.content}`;
    }
  }

  return `${prompt}

Previous Conversation:
${formatConversationHistory(session.conversationHistory)}

User Question: ${message}`;
}

export function iterationLimitReport(
  sessionType: SessionType,
  maxAttempts: number,
  attempts: readonly FixAttempt[]
): string {
  const subject = sessionType === "quality" ? "fix quality issues" : "fix this issue";
  const outcome =
    sessionType === "quality"
      ? "the quality gate continues to fail"
      : "the pipeline continues to fail";
  const actions =
    sessionType === "quality"
      ? [
          "Review all quality issues in the SonarQube dashboard",
          "Check the merge requests created for partial fixes",
          "Triage critical security vulnerabilities manually",
          "Split the fixes into smaller, focused merge requests",
        ]
      : [
          "Review the full pipeline logs in GitLab (not truncated)",
          "Check the merge requests created for partial fixes",
          "Run the pipeline locally to debug",
          "Split the problem into smaller, testable changes",
        ];

  const attemptLines = attempts.map(
    (a) => `- Attempt #${a.attemptNumber}: ${a.branchName} - ${a.status}`
  );

  return [
    "### ❌ Iteration Limit Reached",
    "",
    `I've attempted to ${subject} ${maxAttempts} times but ${outcome}. Manual investigation is needed.`,
    "",
    "### 🔍 Recommended Actions:",
    ...actions.map((action, i) => `${i + 1}. ${action}`),
    "",
    "### 📋 Fix Attempts Made:",
    ...attemptLines,
  ].join("\n");
}
