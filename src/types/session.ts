export type SessionType = "pipeline" | "quality";

export type SessionStatus = "active" | "resolved" | "expired";

export type MessageRole = "user" | "assistant" | "system";

export type FixAttemptStatus = "pending" | "success" | "failed";

export type TrackedFileStatus = "success" | "not_found" | "error";

export const SESSION_TYPES: readonly SessionType[] = ["pipeline", "quality"];
export const SESSION_STATUSES: readonly SessionStatus[] = ["active", "resolved", "expired"];
export const FIX_ATTEMPT_STATUSES: readonly FixAttemptStatus[] = ["pending", "success", "failed"];

export interface ConversationMessage {
  role: MessageRole;
  content: string;
  timestamp: string;
}

export interface QualityMetrics {
  bugCount: number;
  vulnerabilityCount: number;
  codeSmellCount: number;
  criticalIssues: number;
  majorIssues: number;
  coverage: number | null;
  duplicatedLinesDensity: number | null;
  reliabilityRating: string;
  securityRating: string;
  maintainabilityRating: string;
}

/**
 * Summary of a fix attempt as shown in the dashboard, kept under
 * `webhookData.fix_attempts`.
 */
export interface FixAttemptSummary {
  attempt_number: number;
  branch: string;
  mr_url: string | null;
  mr_id: string | null;
  status: FixAttemptStatus;
  timestamp: string;
  files: string[];
}

export interface Session {
  id: string;
  sessionType: SessionType;
  projectId: string;
  projectName: string | null;
  branch: string | null;
  pipelineId: string | null;
  pipelineUrl: string | null;
  commitSha: string | null;
  jobName: string | null;
  failedStage: string | null;
  sonarqubeKey: string | null;
  qualityGateStatus: string | null;
  status: SessionStatus;
  conversationHistory: ConversationMessage[];
  currentFixBranch: string | null;
  fixIteration: number;
  mergeRequestUrl: string | null;
  mergeRequestId: string | null;
  parentSessionId: string | null;
  webhookData: Record<string, unknown>;
  qualityMetrics: QualityMetrics | null;
  createdAt: Date;
  lastActivityAt: Date;
  expiresAt: Date;
}

export interface CreateSessionInput {
  sessionType: SessionType;
  projectId: string;
  projectName?: string | null;
  branch?: string | null;
  pipelineId?: string | null;
  pipelineUrl?: string | null;
  commitSha?: string | null;
  jobName?: string | null;
  failedStage?: string | null;
  sonarqubeKey?: string | null;
  qualityGateStatus?: string | null;
  currentFixBranch?: string | null;
  parentSessionId?: string | null;
  webhookData?: Record<string, unknown>;
}

export interface CreateSessionResult {
  session: Session;
  // false when another delivery already owns the active slot for this project and type
  created: boolean;
}

export interface FixAttempt {
  id: number;
  sessionId: string;
  attemptNumber: number;
  branchName: string;
  filesChanged: string[];
  status: FixAttemptStatus;
  mergeRequestId: string | null;
  mergeRequestUrl: string | null;
  errorDetails: string | null;
  createdAt: Date;
  completedAt: Date | null;
}

export interface FixAttemptUpdate {
  mergeRequestId?: string | null;
  mergeRequestUrl?: string | null;
  errorDetails?: string | null;
}

export interface TrackedFile {
  sessionId: string;
  filePath: string;
  content: string | null;
  status: TrackedFileStatus;
  trackedAt: Date;
  lastModified: Date;
}

/**
 * Columns that may be overwritten through updateSessionMetadata; webhookData
 * is shallow-merged instead.
 */
export interface SessionMetadataPatch {
  webhookData?: Record<string, unknown>;
  sessionType?: SessionType;
  mergeRequestUrl?: string | null;
  mergeRequestId?: string | null;
  currentFixBranch?: string | null;
  fixIteration?: number;
}

export type SessionEventType =
  | "analysis_result"
  | "fix_attempt_update"
  | "quality_metrics"
  | "session_status";

export interface AnalysisResultEvent {
  analysisResult: string;
  codeBlocks: string[];
}

export interface FixAttemptUpdateEvent {
  attemptNumber: number;
  branch: string;
  status: FixAttemptStatus;
  mergeRequestUrl: string | null;
  detail?: string;
}

export interface SessionStatusEvent {
  from: SessionStatus | SessionType;
  to: SessionStatus | SessionType;
  reason: string;
}

export interface SessionEventDataMap {
  analysis_result: AnalysisResultEvent;
  fix_attempt_update: FixAttemptUpdateEvent;
  quality_metrics: QualityMetrics;
  session_status: SessionStatusEvent;
}

export interface SessionEvent<T extends SessionEventType = SessionEventType> {
  id: number;
  sessionId: string;
  type: T;
  data: SessionEventDataMap[T];
  createdAt: Date;
}

export function isSessionType(value: string): value is SessionType {
  return SESSION_TYPES.some((t) => t === value);
}

export function isSessionStatus(value: string): value is SessionStatus {
  return SESSION_STATUSES.some((s) => s === value);
}

export function isFixAttemptStatus(value: string): value is FixAttemptStatus {
  return FIX_ATTEMPT_STATUSES.some((s) => s === value);
}
