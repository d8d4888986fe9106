/**
 * API Server - webhook receivers and the session REST API
 *
 *   POST /webhooks/gitlab            GitLab pipeline events (optional X-Gitlab-Token check)
 *   POST /webhooks/sonarqube         SonarQube quality-gate events
 *   GET  /sessions/active            active sessions, newest first
 *   GET  /sessions/:id               session with fix attempts, tracked files and events
 *   POST /sessions/:id/message       { message } -> { response, merge_request_url }
 *   POST /sessions/:id/create-mr     ask the agent for a merge request
 *   GET  /, GET /health
 */

import { createServer, IncomingMessage, ServerResponse, type Server } from "node:http";
import { z } from "zod";
import { logger } from "../../infra/logger.js";
import {
  ProjectNotFoundError,
  SessionNotFoundError,
  WebhookValidationError,
  errorMessage,
} from "../../infra/errors.js";
import type { StateManager } from "../state/state-manager.js";
import type { WebhookRouter } from "./webhook-router.js";
import type { SessionService } from "./session-service.js";
import type { ExpirySweeper } from "./expiry-sweeper.js";

const MAX_BODY_BYTES = 5 * 1024 * 1024;

const MessageRequestSchema = z.object({ message: z.string().min(1) });

export interface ApiServerConfig {
  port: number;
  host: string;
  webhookSecret?: string | undefined;
}

export interface ApiServerOptions {
  config: ApiServerConfig;
  router: WebhookRouter;
  sessions: SessionService;
  stateManager: StateManager;
  sweeper?: ExpirySweeper;
  version?: string;
}

class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

interface Reply {
  status: number;
  body: unknown;
}

const ok = (body: unknown): Reply => ({ status: 200, body });

export class ApiServer {
  private readonly options: ApiServerOptions;
  private server: Server | null = null;

  constructor(options: ApiServerOptions) {
    this.options = options;
  }

  /**
   * Start listening. Resolves with the bound port (useful with port 0).
   */
  start(): Promise<number> {
    const { port, host } = this.options.config;

    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        void this.handleRequest(req, res);
      });
      this.server = server;

      server.on("error", (error) => {
        logger.error(`API server error: ${error.message}`);
        reject(error);
      });

      server.listen(port, host, () => {
        const address = server.address();
        const boundPort = typeof address === "object" && address ? address.port : port;
        logger.success(`API server listening on http://${host}:${boundPort}`);
        resolve(boundPort);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.server) {
        this.server.close(() => {
          logger.info("API server stopped");
          this.server = null;
          resolve();
        });
      } else {
        resolve();
      }
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const startTime = Date.now();
    const method = req.method ?? "GET";
    const path = new URL(req.url ?? "/", "http://localhost").pathname;

    let reply: Reply;
    try {
      reply = await this.route(method, path, req);
    } catch (error) {
      reply = this.errorReply(error);
    }

    res.writeHead(reply.status, { "Content-Type": "application/json" });
    res.end(JSON.stringify(reply.body));
    logger.request(method, path, reply.status, Date.now() - startTime);
  }

  private async route(method: string, path: string, req: IncomingMessage): Promise<Reply> {
    const { router, sessions } = this.options;
    const segments = path.split("/").filter(Boolean);

    if (segments.length === 0) {
      this.expectMethod(method, "GET");
      return ok({
        service: "CI/CD Failure Assistant",
        version: this.options.version ?? "0.0.0",
        status: "running",
      });
    }

    if (segments.length === 1 && segments[0] === "health") {
      this.expectMethod(method, "GET");
      return ok({
        status: "healthy",
        active_sessions: this.options.stateManager.getActiveSessions().length,
        expiry_sweeper: this.options.sweeper?.running ?? false,
      });
    }

    if (segments[0] === "webhooks" && segments.length === 2) {
      this.expectMethod(method, "POST");
      if (segments[1] === "gitlab") {
        this.verifyGitLabToken(req);
        return ok(await router.handleGitLabEvent(await this.readJson(req)));
      }
      if (segments[1] === "sonarqube") {
        return ok(await router.handleSonarQubeEvent(await this.readJson(req)));
      }
    }

    if (segments[0] === "sessions" && segments.length >= 2) {
      const [, id, action] = segments;
      if (id === "active" && segments.length === 2) {
        this.expectMethod(method, "GET");
        return ok(sessions.listActive());
      }
      if (id && segments.length === 2) {
        this.expectMethod(method, "GET");
        return ok(sessions.getDetails(id));
      }
      if (id && action === "message" && segments.length === 3) {
        this.expectMethod(method, "POST");
        const body = MessageRequestSchema.safeParse(await this.readJson(req));
        if (!body.success) {
          throw new HttpError(400, "Request body must be { \"message\": string }");
        }
        return ok(await sessions.postMessage(id, body.data.message));
      }
      if (id && action === "create-mr" && segments.length === 3) {
        this.expectMethod(method, "POST");
        return ok(await sessions.createMergeRequest(id));
      }
    }

    throw new HttpError(404, "Not Found");
  }

  private expectMethod(method: string, expected: string): void {
    if (method !== expected) {
      throw new HttpError(405, "Method Not Allowed");
    }
  }

  private verifyGitLabToken(req: IncomingMessage): void {
    const secret = this.options.config.webhookSecret;
    if (!secret) return;

    const token = req.headers["x-gitlab-token"];
    if (token !== secret) {
      logger.warn("GitLab webhook token verification failed");
      throw new HttpError(401, "Invalid webhook token");
    }
  }

  private readJson(req: IncomingMessage): Promise<unknown> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;

      req.on("data", (chunk: Buffer) => {
        size += chunk.length;
        if (size > MAX_BODY_BYTES) {
          reject(new HttpError(413, "Payload Too Large"));
          req.destroy();
          return;
        }
        chunks.push(chunk);
      });

      req.on("end", () => {
        const raw = Buffer.concat(chunks).toString("utf-8");
        try {
          resolve(raw.trim() === "" ? {} : JSON.parse(raw));
        } catch {
          reject(new HttpError(400, "Invalid JSON"));
        }
      });

      req.on("error", reject);
    });
  }

  private errorReply(error: unknown): Reply {
    if (error instanceof HttpError) {
      return { status: error.status, body: { detail: error.message } };
    }
    if (error instanceof SessionNotFoundError) {
      return { status: 404, body: { detail: "Session not found" } };
    }
    if (error instanceof ProjectNotFoundError) {
      return { status: 404, body: { detail: error.message } };
    }
    if (error instanceof WebhookValidationError) {
      return { status: 400, body: { detail: error.message } };
    }

    logger.error(`Request failed: ${errorMessage(error)}`, error);
    return { status: 500, body: { detail: errorMessage(error) } };
  }
}
