export { WebhookRouter } from "./webhook-router.js";
export type { WebhookOutcome, WebhookRouterOptions } from "./webhook-router.js";
export { AnalysisRunner, LOGS_TOO_LARGE_MESSAGE, sonarAnalysisMissingMessage } from "./analysis-runner.js";
export type { AnalysisRunnerOptions, QualityAnalysisRequest } from "./analysis-runner.js";
export { SessionService, CREATE_MR_MESSAGE } from "./session-service.js";
export type { SessionDetails, MessageReply, CreateMergeRequestReply } from "./session-service.js";
export {
  FIX_BRANCH_PREFIX,
  classifyFailure,
  failedBuilds,
  mostRecentFailedJob,
  isQualityJobName,
  logShowsQualityGateFailure,
} from "./failure-classifier.js";
export { ExpirySweeper } from "./expiry-sweeper.js";
export { ApiServer } from "./api-server.js";
export type { ApiServerConfig, ApiServerOptions } from "./api-server.js";
export { createAssistant } from "./assistant.js";
export type { Assistant, AssistantOverrides } from "./assistant.js";
