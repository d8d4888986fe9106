import Database from "better-sqlite3";
import { randomUUID } from "node:crypto";
import { dirname } from "node:path";
import { mkdirSync, existsSync } from "node:fs";
import { logger } from "../../infra/logger.js";
import { MaxFixAttemptsError, SessionNotFoundError, StateError } from "../../infra/errors.js";
import {
  ConversationMessage,
  CreateSessionInput,
  CreateSessionResult,
  FixAttempt,
  FixAttemptStatus,
  FixAttemptSummary,
  FixAttemptUpdate,
  MessageRole,
  QualityMetrics,
  Session,
  SessionEvent,
  SessionEventDataMap,
  SessionEventType,
  SessionMetadataPatch,
  SessionType,
  TrackedFile,
  TrackedFileStatus,
  isFixAttemptStatus,
  isSessionStatus,
  isSessionType,
} from "../../types/session.js";

export interface StateManagerOptions {
  maxFixAttempts?: number;
  sessionTimeoutMinutes?: number;
  // Injectable clock, used by expiry tests
  now?: () => Date;
}

const DEFAULT_MAX_FIX_ATTEMPTS = 5;
const DEFAULT_SESSION_TIMEOUT_MINUTES = 180;

/**
 * StateManager - SQLite-backed session store and fix-attempt ledger
 *
 * Provides:
 * - At most one active session per (project, session type), enforced by a partial unique index
 * - Append-only conversation history and tracked-file upserts
 * - Atomic, capped fix-attempt numbering under a write-locking transaction
 * - An append-only event log next to the merged webhook metadata
 * - Expiry sweep for idle sessions
 */
export class StateManager {
  private db: Database.Database;
  private readonly maxFixAttempts: number;
  private readonly sessionTimeoutMinutes: number;
  private readonly now: () => Date;

  constructor(dbPath: string, options: StateManagerOptions = {}) {
    const dir = dirname(dbPath);

    // Ensure directory exists
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    this.maxFixAttempts = options.maxFixAttempts ?? DEFAULT_MAX_FIX_ATTEMPTS;
    this.sessionTimeoutMinutes = options.sessionTimeoutMinutes ?? DEFAULT_SESSION_TIMEOUT_MINUTES;
    this.now = options.now ?? (() => new Date());

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL"); // Better concurrent access
    this.db.pragma("busy_timeout = 5000");
    this.db.pragma("foreign_keys = ON");
    this.initSchema();

    logger.debug(`StateManager initialized with database: ${dbPath}`);
  }

  get fixAttemptLimit(): number {
    return this.maxFixAttempts;
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        session_type TEXT NOT NULL,
        project_id TEXT NOT NULL,
        project_name TEXT,
        branch TEXT,
        pipeline_id TEXT,
        pipeline_url TEXT,
        commit_sha TEXT,
        job_name TEXT,
        failed_stage TEXT,
        sonarqube_key TEXT,
        quality_gate_status TEXT,
        status TEXT NOT NULL DEFAULT 'active',
        conversation_history TEXT NOT NULL DEFAULT '[]', -- JSON array
        current_fix_branch TEXT,
        fix_iteration INTEGER NOT NULL DEFAULT 0,
        merge_request_url TEXT,
        merge_request_id TEXT,
        parent_session_id TEXT,
        webhook_data TEXT NOT NULL DEFAULT '{}', -- JSON object
        bug_count INTEGER NOT NULL DEFAULT 0,
        vulnerability_count INTEGER NOT NULL DEFAULT 0,
        code_smell_count INTEGER NOT NULL DEFAULT 0,
        critical_issues INTEGER NOT NULL DEFAULT 0,
        major_issues INTEGER NOT NULL DEFAULT 0,
        coverage REAL,
        duplicated_lines_density REAL,
        reliability_rating TEXT,
        security_rating TEXT,
        maintainability_rating TEXT,
        metrics_updated_at TEXT,
        created_at TEXT NOT NULL,
        last_activity_at TEXT NOT NULL,
        expires_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS tracked_files (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        file_path TEXT NOT NULL,
        content TEXT,
        status TEXT NOT NULL,
        tracked_at TEXT NOT NULL,
        last_modified TEXT NOT NULL,
        FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE,
        UNIQUE(session_id, file_path)
      );

      CREATE TABLE IF NOT EXISTS fix_attempts (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        attempt_number INTEGER NOT NULL,
        branch_name TEXT NOT NULL,
        files_changed TEXT NOT NULL DEFAULT '[]', -- JSON array
        status TEXT NOT NULL DEFAULT 'pending',
        merge_request_id TEXT,
        merge_request_url TEXT,
        error_details TEXT,
        created_at TEXT NOT NULL,
        completed_at TEXT,
        FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE,
        UNIQUE(session_id, attempt_number)
      );

      CREATE TABLE IF NOT EXISTS session_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        type TEXT NOT NULL,
        data TEXT NOT NULL, -- JSON object
        created_at TEXT NOT NULL,
        FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
      );

      -- One active investigation per project and session type
      CREATE UNIQUE INDEX IF NOT EXISTS idx_sessions_one_active
        ON sessions(project_id, session_type) WHERE status = 'active';

      CREATE INDEX IF NOT EXISTS idx_sessions_status ON sessions(status, expires_at);
      CREATE INDEX IF NOT EXISTS idx_sessions_project ON sessions(project_id);
      CREATE INDEX IF NOT EXISTS idx_fix_attempts_branch ON fix_attempts(branch_name);
      CREATE INDEX IF NOT EXISTS idx_session_events_session ON session_events(session_id, type);
    `);
  }

  // === Sessions ===

  /**
   * Create an active session. When another writer already holds the active
   * slot for the same project and type, that session is returned instead.
   */
  createSession(input: CreateSessionInput): CreateSessionResult {
    const now = this.now();
    const expiresAt = new Date(now.getTime() + this.sessionTimeoutMinutes * 60 * 1000);
    const id = randomUUID();

    const insert = this.db.transaction((): boolean => {
      // A timed-out row still holds the index slot until the sweep runs
      this.db
        .prepare(
          `UPDATE sessions SET status = 'expired'
           WHERE project_id = ? AND session_type = ? AND status = 'active' AND expires_at <= ?`
        )
        .run(input.projectId, input.sessionType, now.toISOString());

      const result = this.db
        .prepare(
          `INSERT INTO sessions (
             id, session_type, project_id, project_name, branch, pipeline_id, pipeline_url,
             commit_sha, job_name, failed_stage, sonarqube_key, quality_gate_status, status,
             conversation_history, current_fix_branch, fix_iteration, parent_session_id,
             webhook_data, created_at, last_activity_at, expires_at
           ) VALUES (
             @id, @sessionType, @projectId, @projectName, @branch, @pipelineId, @pipelineUrl,
             @commitSha, @jobName, @failedStage, @sonarqubeKey, @qualityGateStatus, 'active',
             '[]', @currentFixBranch, 0, @parentSessionId,
             @webhookData, @createdAt, @createdAt, @expiresAt
           )
           ON CONFLICT DO NOTHING`
        )
        .run({
          id,
          sessionType: input.sessionType,
          projectId: input.projectId,
          projectName: input.projectName ?? null,
          branch: input.branch ?? null,
          pipelineId: input.pipelineId ?? null,
          pipelineUrl: input.pipelineUrl ?? null,
          commitSha: input.commitSha ?? null,
          jobName: input.jobName ?? null,
          failedStage: input.failedStage ?? null,
          sonarqubeKey: input.sonarqubeKey ?? null,
          qualityGateStatus: input.qualityGateStatus ?? null,
          currentFixBranch: input.currentFixBranch ?? null,
          parentSessionId: input.parentSessionId ?? null,
          webhookData: JSON.stringify(input.webhookData ?? {}),
          createdAt: now.toISOString(),
          expiresAt: expiresAt.toISOString(),
        });

      return result.changes === 1;
    });

    const created = insert.immediate();

    if (!created) {
      const existing = this.findActiveSession(input.sessionType, input.projectId);
      if (!existing) {
        throw new StateError(
          `Active ${input.sessionType} session for project ${input.projectId} vanished during create`
        );
      }
      logger.debug(`Reusing active session ${existing.id} for project ${input.projectId}`);
      return { session: existing, created: false };
    }

    logger.debug(`Created ${input.sessionType} session ${id} for project ${input.projectId}`);
    return { session: this.requireSession(id), created: true };
  }

  /**
   * Get a session by ID
   */
  getSession(id: string): Session | null {
    const row = this.db.prepare("SELECT * FROM sessions WHERE id = ?").get(id) as
      | SessionRow
      | undefined;

    return row ? this.rowToSession(row) : null;
  }

  requireSession(id: string): Session {
    const session = this.getSession(id);
    if (!session) {
      throw new SessionNotFoundError(id);
    }
    return session;
  }

  /**
   * Active, unexpired sessions, newest first
   */
  getActiveSessions(): Session[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM sessions WHERE status = 'active' AND expires_at > ?
         ORDER BY created_at DESC`
      )
      .all(this.now().toISOString()) as SessionRow[];

    return rows.map((row) => this.rowToSession(row));
  }

  getActiveSessionsForProject(projectId: string): Session[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM sessions WHERE project_id = ? AND status = 'active' AND expires_at > ?
         ORDER BY created_at DESC`
      )
      .all(projectId, this.now().toISOString()) as SessionRow[];

    return rows.map((row) => this.rowToSession(row));
  }

  findActiveSession(sessionType: SessionType, projectId: string): Session | null {
    const row = this.db
      .prepare(
        `SELECT * FROM sessions
         WHERE project_id = ? AND session_type = ? AND status = 'active' AND expires_at > ?
         ORDER BY created_at DESC LIMIT 1`
      )
      .get(projectId, sessionType, this.now().toISOString()) as SessionRow | undefined;

    return row ? this.rowToSession(row) : null;
  }

  /**
   * Active session of the given type that owns a fix attempt on `branch`
   */
  findSessionByFixBranch(sessionType: SessionType, projectId: string, branch: string): Session | null {
    const row = this.db
      .prepare(
        `SELECT s.* FROM sessions s
         JOIN fix_attempts fa ON fa.session_id = s.id
         WHERE s.project_id = ? AND s.session_type = ? AND s.status = 'active'
           AND s.expires_at > ? AND fa.branch_name = ?
         ORDER BY s.created_at DESC LIMIT 1`
      )
      .get(projectId, sessionType, this.now().toISOString(), branch.trim()) as
      | SessionRow
      | undefined;

    return row ? this.rowToSession(row) : null;
  }

  /**
   * Most recent sessions in any status
   */
  getRecentSessions(limit = 20): Session[] {
    const rows = this.db
      .prepare("SELECT * FROM sessions ORDER BY created_at DESC LIMIT ?")
      .all(limit) as SessionRow[];

    return rows.map((row) => this.rowToSession(row));
  }

  addMessage(sessionId: string, role: MessageRole, content: string): ConversationMessage {
    const message: ConversationMessage = {
      role,
      content,
      timestamp: this.now().toISOString(),
    };

    this.db
      .transaction(() => {
        const row = this.db
          .prepare("SELECT conversation_history FROM sessions WHERE id = ?")
          .get(sessionId) as { conversation_history: string } | undefined;
        if (!row) {
          throw new SessionNotFoundError(sessionId);
        }

        const history = parseJsonArray<ConversationMessage>(row.conversation_history);
        history.push(message);

        this.db
          .prepare(
            "UPDATE sessions SET conversation_history = ?, last_activity_at = ? WHERE id = ?"
          )
          .run(JSON.stringify(history), message.timestamp, sessionId);
      })
      .immediate();

    return message;
  }

  /**
   * Shallow-merge `webhookData` and overwrite the other listed columns
   */
  updateSessionMetadata(sessionId: string, patch: SessionMetadataPatch): Session {
    this.db
      .transaction(() => {
        const row = this.db
          .prepare("SELECT webhook_data FROM sessions WHERE id = ?")
          .get(sessionId) as { webhook_data: string } | undefined;
        if (!row) {
          throw new SessionNotFoundError(sessionId);
        }

        const updates: Record<string, string | number | null> = {
          lastActivityAt: this.now().toISOString(),
        };

        if (patch.webhookData) {
          updates["webhookData"] = JSON.stringify({
            ...parseJsonObject(row.webhook_data),
            ...patch.webhookData,
          });
        }
        if (patch.sessionType !== undefined) updates["sessionType"] = patch.sessionType;
        if (patch.mergeRequestUrl !== undefined) updates["mergeRequestUrl"] = patch.mergeRequestUrl;
        if (patch.mergeRequestId !== undefined) updates["mergeRequestId"] = patch.mergeRequestId;
        if (patch.currentFixBranch !== undefined) {
          updates["currentFixBranch"] = patch.currentFixBranch;
        }
        if (patch.fixIteration !== undefined) updates["fixIteration"] = patch.fixIteration;

        const setClauses = Object.keys(updates)
          .map((k) => `${this.camelToSnake(k)} = @${k}`)
          .join(", ");

        this.db
          .prepare(`UPDATE sessions SET ${setClauses} WHERE id = @sessionId`)
          .run({ ...updates, sessionId });
      })
      .immediate();

    return this.requireSession(sessionId);
  }

  updateQualityMetrics(sessionId: string, metrics: QualityMetrics): void {
    this.db
      .transaction(() => {
        const row = this.db
          .prepare("SELECT webhook_data FROM sessions WHERE id = ?")
          .get(sessionId) as { webhook_data: string } | undefined;
        if (!row) {
          throw new SessionNotFoundError(sessionId);
        }

        const now = this.now().toISOString();
        this.db
          .prepare(
            `UPDATE sessions SET
               bug_count = @bugCount,
               vulnerability_count = @vulnerabilityCount,
               code_smell_count = @codeSmellCount,
               critical_issues = @criticalIssues,
               major_issues = @majorIssues,
               coverage = @coverage,
               duplicated_lines_density = @duplicatedLinesDensity,
               reliability_rating = @reliabilityRating,
               security_rating = @securityRating,
               maintainability_rating = @maintainabilityRating,
               metrics_updated_at = @now,
               last_activity_at = @now,
               webhook_data = @webhookData
             WHERE id = @sessionId`
          )
          .run({
            ...metrics,
            now,
            sessionId,
            webhookData: JSON.stringify({
              ...parseJsonObject(row.webhook_data),
              quality_metrics: metrics,
            }),
          });

        this.insertEvent(sessionId, "quality_metrics", metrics);
      })
      .immediate();
  }

  markSessionResolved(sessionId: string, reason = "Target branch pipeline succeeded"): void {
    this.transitionStatus(sessionId, "resolved", reason);
  }

  private transitionStatus(sessionId: string, to: "resolved" | "expired", reason: string): void {
    this.db
      .transaction(() => {
        const session = this.requireSession(sessionId);
        this.db
          .prepare("UPDATE sessions SET status = ?, last_activity_at = ? WHERE id = ?")
          .run(to, this.now().toISOString(), sessionId);
        this.insertEvent(sessionId, "session_status", { from: session.status, to, reason });
      })
      .immediate();

    logger.debug(`Session ${sessionId} -> ${to}: ${reason}`);
  }

  /**
   * Switch an active session to another type, e.g. a quality failure that
   * turned out to be a pipeline misconfiguration. Returns false when the
   * target type already has an active session for the project.
   */
  changeSessionType(sessionId: string, to: SessionType, reason: string): boolean {
    try {
      this.db
        .transaction(() => {
          const session = this.requireSession(sessionId);
          this.db
            .prepare("UPDATE sessions SET session_type = ?, last_activity_at = ? WHERE id = ?")
            .run(to, this.now().toISOString(), sessionId);
          this.insertEvent(sessionId, "session_status", {
            from: session.sessionType,
            to,
            reason,
          });
        })
        .immediate();
      return true;
    } catch (error) {
      if (isConstraintViolation(error)) {
        logger.warn(`Cannot switch session ${sessionId} to ${to}: an active one exists`);
        return false;
      }
      throw error;
    }
  }

  /**
   * Mark active sessions past their expiry as expired
   */
  cleanupExpiredSessions(now: Date = this.now()): number {
    const result = this.db
      .prepare(
        "UPDATE sessions SET status = 'expired' WHERE status = 'active' AND expires_at <= ?"
      )
      .run(now.toISOString());

    if (result.changes > 0) {
      logger.info(`Expired ${result.changes} idle session(s)`);
    }
    return result.changes;
  }

  // === Tracked files ===

  storeTrackedFile(
    sessionId: string,
    filePath: string,
    content: string | null,
    status: TrackedFileStatus
  ): void {
    const now = this.now().toISOString();
    this.db
      .prepare(
        `INSERT INTO tracked_files (session_id, file_path, content, status, tracked_at, last_modified)
         VALUES (@sessionId, @filePath, @content, @status, @now, @now)
         ON CONFLICT(session_id, file_path) DO UPDATE SET
           content = excluded.content,
           status = excluded.status,
           last_modified = excluded.last_modified`
      )
      .run({ sessionId, filePath, content, status, now });
  }

  getTrackedFiles(sessionId: string): TrackedFile[] {
    const rows = this.db
      .prepare("SELECT * FROM tracked_files WHERE session_id = ? ORDER BY file_path")
      .all(sessionId) as TrackedFileRow[];

    return rows.map((row) => ({
      sessionId: row.session_id,
      filePath: row.file_path,
      content: row.content,
      status: row.status === "success" || row.status === "not_found" ? row.status : "error",
      trackedAt: new Date(row.tracked_at),
      lastModified: new Date(row.last_modified),
    }));
  }

  // === Fix attempts ===

  /**
   * Allocate the next attempt number for a session.
   *
   * Runs under BEGIN IMMEDIATE, which takes the database write lock before
   * the MAX() read, so concurrent callers (including other connections to the
   * same file) are serialised and never observe the same number.
   */
  createFixAttempt(sessionId: string, branchName: string, filesChanged: string[] = []): FixAttempt {
    const branch = branchName.trim();

    const allocate = this.db.transaction((): number => {
      this.requireSession(sessionId);

      const { next } = this.db
        .prepare(
          "SELECT COALESCE(MAX(attempt_number), 0) + 1 AS next FROM fix_attempts WHERE session_id = ?"
        )
        .get(sessionId) as { next: number };

      if (next > this.maxFixAttempts) {
        throw new MaxFixAttemptsError(sessionId, this.maxFixAttempts);
      }

      const now = this.now().toISOString();
      this.db
        .prepare(
          `INSERT INTO fix_attempts (session_id, attempt_number, branch_name, files_changed, status, created_at)
           VALUES (?, ?, ?, ?, 'pending', ?)`
        )
        .run(sessionId, next, branch, JSON.stringify(filesChanged), now);

      this.db
        .prepare(
          `UPDATE sessions SET current_fix_branch = ?, fix_iteration = ?, last_activity_at = ?
           WHERE id = ?`
        )
        .run(branch, next, now, sessionId);

      return next;
    });

    const attemptNumber = allocate.immediate();
    logger.debug(`Session ${sessionId}: fix attempt #${attemptNumber} on ${branch}`);

    const attempt = this.getFixAttempt(sessionId, attemptNumber);
    if (!attempt) {
      throw new StateError(`Fix attempt #${attemptNumber} missing after insert`);
    }
    return attempt;
  }

  getFixAttempt(sessionId: string, attemptNumber: number): FixAttempt | null {
    const row = this.db
      .prepare("SELECT * FROM fix_attempts WHERE session_id = ? AND attempt_number = ?")
      .get(sessionId, attemptNumber) as FixAttemptRow | undefined;

    return row ? this.rowToFixAttempt(row) : null;
  }

  getFixAttempts(sessionId: string): FixAttempt[] {
    const rows = this.db
      .prepare("SELECT * FROM fix_attempts WHERE session_id = ? ORDER BY attempt_number")
      .all(sessionId) as FixAttemptRow[];

    return rows.map((row) => this.rowToFixAttempt(row));
  }

  findFixAttemptByBranch(sessionId: string, branch: string): FixAttempt | null {
    const row = this.db
      .prepare(
        `SELECT * FROM fix_attempts WHERE session_id = ? AND branch_name = ?
         ORDER BY attempt_number DESC LIMIT 1`
      )
      .get(sessionId, branch.trim()) as FixAttemptRow | undefined;

    return row ? this.rowToFixAttempt(row) : null;
  }

  /**
   * Transition an attempt. Returns false when the attempt does not exist.
   */
  updateFixAttempt(
    sessionId: string,
    attemptNumber: number,
    status: FixAttemptStatus,
    update: FixAttemptUpdate = {}
  ): boolean {
    const now = this.now().toISOString();
    const completedAt = status === "success" || status === "failed" ? now : null;

    const apply = this.db.transaction((): boolean => {
      const result = this.db
        .prepare(
          `UPDATE fix_attempts SET
             status = @status,
             merge_request_id = COALESCE(@mergeRequestId, merge_request_id),
             merge_request_url = COALESCE(@mergeRequestUrl, merge_request_url),
             error_details = COALESCE(@errorDetails, error_details),
             completed_at = @completedAt
           WHERE session_id = @sessionId AND attempt_number = @attemptNumber`
        )
        .run({
          status,
          mergeRequestId: update.mergeRequestId ?? null,
          mergeRequestUrl: update.mergeRequestUrl ?? null,
          errorDetails: update.errorDetails ?? null,
          completedAt,
          sessionId,
          attemptNumber,
        });

      if (result.changes === 0) {
        return false;
      }

      if (status === "success" && update.mergeRequestUrl) {
        this.db
          .prepare(
            `UPDATE sessions SET merge_request_url = ?,
               merge_request_id = COALESCE(?, merge_request_id), last_activity_at = ?
             WHERE id = ?`
          )
          .run(update.mergeRequestUrl, update.mergeRequestId ?? null, now, sessionId);
      }
      return true;
    });

    const updated = apply.immediate();
    if (!updated) {
      logger.warn(`Fix attempt #${attemptNumber} not found for session ${sessionId}`);
    }
    return updated;
  }

  /**
   * True when the session has used up its fix attempts
   */
  checkIterationLimit(sessionId: string, limit: number = this.maxFixAttempts): boolean {
    const { count } = this.db
      .prepare("SELECT COUNT(*) AS count FROM fix_attempts WHERE session_id = ?")
      .get(sessionId) as { count: number };
    return count >= limit;
  }

  /**
   * Upsert the dashboard summary of an attempt under webhookData.fix_attempts
   * and log a fix_attempt_update event, in one write transaction.
   */
  recordFixAttemptSummary(sessionId: string, summary: FixAttemptSummary, detail?: string): void {
    this.db
      .transaction(() => {
        const row = this.db
          .prepare("SELECT webhook_data FROM sessions WHERE id = ?")
          .get(sessionId) as { webhook_data: string } | undefined;
        if (!row) {
          throw new SessionNotFoundError(sessionId);
        }

        const webhookData = parseJsonObject(row.webhook_data);
        const current = webhookData["fix_attempts"];
        const existing: unknown[] = Array.isArray(current) ? current : [];
        const sameAttempt = (entry: unknown): boolean =>
          typeof entry === "object" &&
          entry !== null &&
          "attempt_number" in entry &&
          entry.attempt_number === summary.attempt_number;

        const summaries: unknown[] = existing.some(sameAttempt)
          ? existing.map((entry) => (sameAttempt(entry) ? summary : entry))
          : [...existing, summary];

        const now = this.now().toISOString();
        this.db
          .prepare("UPDATE sessions SET webhook_data = ?, last_activity_at = ? WHERE id = ?")
          .run(JSON.stringify({ ...webhookData, fix_attempts: summaries }), now, sessionId);

        this.insertEvent(sessionId, "fix_attempt_update", {
          attemptNumber: summary.attempt_number,
          branch: summary.branch,
          status: summary.status,
          mergeRequestUrl: summary.mr_url,
          ...(detail !== undefined ? { detail } : {}),
        });
      })
      .immediate();
  }

  // === Event log ===

  appendEvent<T extends SessionEventType>(
    sessionId: string,
    type: T,
    data: SessionEventDataMap[T]
  ): void {
    this.insertEvent(sessionId, type, data);
  }

  getEvents(sessionId: string, type?: SessionEventType): SessionEvent[] {
    const rows = (
      type
        ? this.db
            .prepare("SELECT * FROM session_events WHERE session_id = ? AND type = ? ORDER BY id")
            .all(sessionId, type)
        : this.db
            .prepare("SELECT * FROM session_events WHERE session_id = ? ORDER BY id")
            .all(sessionId)
    ) as SessionEventRow[];

    const events: SessionEvent[] = [];
    for (const row of rows) {
      const event = this.rowToEvent(row);
      if (event) events.push(event);
    }
    return events;
  }

  private insertEvent<T extends SessionEventType>(
    sessionId: string,
    type: T,
    data: SessionEventDataMap[T]
  ): void {
    this.db
      .prepare(
        "INSERT INTO session_events (session_id, type, data, created_at) VALUES (?, ?, ?, ?)"
      )
      .run(sessionId, type, JSON.stringify(data), this.now().toISOString());
  }

  close(): void {
    this.db.close();
  }

  // === Row mapping ===

  private rowToSession(row: SessionRow): Session {
    if (!isSessionType(row.session_type) || !isSessionStatus(row.status)) {
      throw new StateError(
        `Corrupt session row ${row.id}: type=${row.session_type} status=${row.status}`
      );
    }

    return {
      id: row.id,
      sessionType: row.session_type,
      projectId: row.project_id,
      projectName: row.project_name,
      branch: row.branch,
      pipelineId: row.pipeline_id,
      pipelineUrl: row.pipeline_url,
      commitSha: row.commit_sha,
      jobName: row.job_name,
      failedStage: row.failed_stage,
      sonarqubeKey: row.sonarqube_key,
      qualityGateStatus: row.quality_gate_status,
      status: row.status,
      conversationHistory: parseJsonArray<ConversationMessage>(row.conversation_history),
      currentFixBranch: row.current_fix_branch,
      fixIteration: row.fix_iteration,
      mergeRequestUrl: row.merge_request_url,
      mergeRequestId: row.merge_request_id,
      parentSessionId: row.parent_session_id,
      webhookData: parseJsonObject(row.webhook_data),
      qualityMetrics: row.metrics_updated_at
        ? {
            bugCount: row.bug_count,
            vulnerabilityCount: row.vulnerability_count,
            codeSmellCount: row.code_smell_count,
            criticalIssues: row.critical_issues,
            majorIssues: row.major_issues,
            coverage: row.coverage,
            duplicatedLinesDensity: row.duplicated_lines_density,
            reliabilityRating: row.reliability_rating ?? "E",
            securityRating: row.security_rating ?? "E",
            maintainabilityRating: row.maintainability_rating ?? "E",
          }
        : null,
      createdAt: new Date(row.created_at),
      lastActivityAt: new Date(row.last_activity_at),
      expiresAt: new Date(row.expires_at),
    };
  }

  private rowToFixAttempt(row: FixAttemptRow): FixAttempt {
    if (!isFixAttemptStatus(row.status)) {
      throw new StateError(`Corrupt fix attempt row ${row.id}: status=${row.status}`);
    }

    return {
      id: row.id,
      sessionId: row.session_id,
      attemptNumber: row.attempt_number,
      branchName: row.branch_name,
      filesChanged: parseJsonArray<string>(row.files_changed),
      status: row.status,
      mergeRequestId: row.merge_request_id,
      mergeRequestUrl: row.merge_request_url,
      errorDetails: row.error_details,
      createdAt: new Date(row.created_at),
      completedAt: row.completed_at ? new Date(row.completed_at) : null,
    };
  }

  private rowToEvent(row: SessionEventRow): SessionEvent | null {
    const type = EVENT_TYPES.find((t) => t === row.type);
    if (!type) {
      logger.warn(`Skipping unknown session event type: ${row.type}`);
      return null;
    }

    return {
      id: row.id,
      sessionId: row.session_id,
      type,
      data: JSON.parse(row.data),
      createdAt: new Date(row.created_at),
    };
  }

  private camelToSnake(str: string): string {
    return str.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
  }
}

const EVENT_TYPES: readonly SessionEventType[] = [
  "analysis_result",
  "fix_attempt_update",
  "quality_metrics",
  "session_status",
];

function isConstraintViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.code.startsWith("SQLITE_CONSTRAINT");
}

function parseJsonArray<T>(raw: string | null): T[] {
  if (!raw) return [];
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed : [];
}

function parseJsonObject(raw: string | null): Record<string, unknown> {
  if (!raw) return {};
  const parsed: unknown = JSON.parse(raw);
  return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)
    ? Object.fromEntries(Object.entries(parsed))
    : {};
}

// Row types for SQLite results
interface SessionRow {
  id: string;
  session_type: string;
  project_id: string;
  project_name: string | null;
  branch: string | null;
  pipeline_id: string | null;
  pipeline_url: string | null;
  commit_sha: string | null;
  job_name: string | null;
  failed_stage: string | null;
  sonarqube_key: string | null;
  quality_gate_status: string | null;
  status: string;
  conversation_history: string;
  current_fix_branch: string | null;
  fix_iteration: number;
  merge_request_url: string | null;
  merge_request_id: string | null;
  parent_session_id: string | null;
  webhook_data: string;
  bug_count: number;
  vulnerability_count: number;
  code_smell_count: number;
  critical_issues: number;
  major_issues: number;
  coverage: number | null;
  duplicated_lines_density: number | null;
  reliability_rating: string | null;
  security_rating: string | null;
  maintainability_rating: string | null;
  metrics_updated_at: string | null;
  created_at: string;
  last_activity_at: string;
  expires_at: string;
}

interface FixAttemptRow {
  id: number;
  session_id: string;
  attempt_number: number;
  branch_name: string;
  files_changed: string;
  status: string;
  merge_request_id: string | null;
  merge_request_url: string | null;
  error_details: string | null;
  created_at: string;
  completed_at: string | null;
}

interface TrackedFileRow {
  id: number;
  session_id: string;
  file_path: string;
  content: string | null;
  status: string;
  tracked_at: string;
  last_modified: string;
}

interface SessionEventRow {
  id: number;
  session_id: string;
  type: string;
  data: string;
  created_at: string;
}
