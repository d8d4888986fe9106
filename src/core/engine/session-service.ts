import type { FailureAgent } from "../agent/failure-agent.js";
import type { StateManager } from "../state/state-manager.js";
import type { FixAttempt, Session, SessionEvent, TrackedFile } from "../../types/session.js";
import { logger } from "../../infra/logger.js";

export const CREATE_MR_MESSAGE =
  "Create a merge request with all the fixes we discussed. Make sure to include the MR URL in your response.";

export interface SessionDetails extends Session {
  fixAttempts: FixAttempt[];
  trackedFiles: TrackedFile[];
  events: SessionEvent[];
}

export interface MessageReply {
  response: string;
  merge_request_url: string | null;
}

export interface CreateMergeRequestReply {
  status: "success";
  message: string;
  merge_request_url: string | null;
}

/**
 * Session operations behind the REST API and the retry path of the webhook router
 */
export class SessionService {
  constructor(
    private readonly stateManager: StateManager,
    private readonly agent: FailureAgent
  ) {}

  listActive(): Session[] {
    return this.stateManager.getActiveSessions();
  }

  getDetails(sessionId: string): SessionDetails {
    const session = this.stateManager.requireSession(sessionId);
    return {
      ...session,
      fixAttempts: this.stateManager.getFixAttempts(sessionId),
      trackedFiles: this.stateManager.getTrackedFiles(sessionId),
      events: this.stateManager.getEvents(sessionId),
    };
  }

  /**
   * Record the user message, run a chat turn and record the reply
   */
  async postMessage(sessionId: string, message: string): Promise<MessageReply> {
    const session = this.stateManager.requireSession(sessionId);
    logger.info(`Message for session ${sessionId}: ${message.slice(0, 50)}`);

    this.stateManager.addMessage(sessionId, "user", message);
    const { response, mergeRequestUrl } = await this.agent.handleMessage(sessionId, message);

    if (mergeRequestUrl) {
      const current = this.stateManager.getSession(sessionId) ?? session;
      if (current.mergeRequestUrl !== mergeRequestUrl) {
        this.stateManager.updateSessionMetadata(sessionId, {
          mergeRequestUrl,
          mergeRequestId: mergeRequestUrl.split("/").pop() ?? null,
        });
      }
    }

    this.stateManager.addMessage(sessionId, "assistant", response.text);
    logger.debug(`Replied in session ${sessionId}`, { mergeRequestUrl, kind: response.kind });

    return { response: response.text, merge_request_url: mergeRequestUrl };
  }

  async createMergeRequest(sessionId: string): Promise<CreateMergeRequestReply> {
    logger.info(`Creating merge request for session ${sessionId}`);
    const reply = await this.postMessage(sessionId, CREATE_MR_MESSAGE);
    return {
      status: "success",
      message: "Merge request creation initiated",
      merge_request_url: reply.merge_request_url,
    };
  }
}
