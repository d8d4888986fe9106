import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { StateManager } from "../../src/core/state/state-manager.js";
import { GitLabClient } from "../../src/core/providers/gitlab/gitlab-client.js";
import { SonarQubeClient } from "../../src/core/providers/sonarqube/sonarqube-client.js";
import { FailureAgent } from "../../src/core/agent/failure-agent.js";
import { AnalysisRunner } from "../../src/core/engine/analysis-runner.js";
import { SessionService } from "../../src/core/engine/session-service.js";
import { WebhookRouter } from "../../src/core/engine/webhook-router.js";
import { ApiServer } from "../../src/core/engine/api-server.js";
import { FakeAgentProvider } from "./helpers.js";

describe("ApiServer", () => {
  let tempDir: string;
  let stateManager: StateManager;
  let server: ApiServer;
  let baseUrl: string;
  let sessionId: string;

  const request = async (
    method: string,
    path: string,
    body?: string,
    headers: Record<string, string> = {}
  ) => {
    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers: { "Content-Type": "application/json", ...headers },
      body,
    });
    const json: unknown = await response.json();
    return { status: response.status, body: json };
  };

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    tempDir = mkdtempSync(join(tmpdir(), "cicd-assistant-api-"));
    stateManager = new StateManager(join(tempDir, "assistant.db"));

    const provider = new FakeAgentProvider([async () => ({ output: "The lockfile is stale." })]);
    const gitlab = new GitLabClient({ baseUrl: "http://gitlab.test" });
    const sonar = new SonarQubeClient({ baseUrl: "http://sonar.test" });
    const agent = new FailureAgent({
      provider,
      stateManager,
      gitlab,
      sonar,
      assistant: { maxLogSize: 30000 },
    });
    const runner = new AnalysisRunner({ agent, stateManager, sonar });
    const sessions = new SessionService(stateManager, agent);
    const router = new WebhookRouter({
      stateManager,
      gitlab,
      runner,
      sessions,
      gitlabUrl: "http://gitlab.test",
    });

    sessionId = stateManager.createSession({
      sessionType: "pipeline",
      projectId: "42",
      projectName: "demo",
      branch: "main",
    }).session.id;

    server = new ApiServer({
      config: { port: 0, host: "127.0.0.1", webhookSecret: "test-secret" },
      router,
      sessions,
      stateManager,
      version: "1.2.3",
    });
    const port = await server.start();
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await server.stop();
    stateManager.close();
    rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("should describe the service and its health", async () => {
    expect(await request("GET", "/")).toEqual({
      status: 200,
      body: { service: "CI/CD Failure Assistant", version: "1.2.3", status: "running" },
    });
    expect(await request("GET", "/health")).toEqual({
      status: 200,
      body: { status: "healthy", active_sessions: 1, expiry_sweeper: false },
    });
  });

  it("should reject GitLab deliveries without the shared token", async () => {
    const body = JSON.stringify({ object_kind: "push" });

    expect(await request("POST", "/webhooks/gitlab", body)).toEqual({
      status: 401,
      body: { detail: "Invalid webhook token" },
    });
    expect(
      await request("POST", "/webhooks/gitlab", body, { "X-Gitlab-Token": "test-secret" })
    ).toEqual({
      status: 200,
      body: { status: "ignored", reason: "Not a pipeline event" },
    });
  });

  it("should answer malformed JSON with 400", async () => {
    expect(
      await request("POST", "/webhooks/gitlab", "{", { "X-Gitlab-Token": "test-secret" })
    ).toEqual({ status: 400, body: { detail: "Invalid JSON" } });
  });

  it("should list active sessions and return details", async () => {
    const active = await request("GET", "/sessions/active");
    expect(active.status).toBe(200);
    expect(active.body).toMatchObject([{ id: sessionId, sessionType: "pipeline", status: "active" }]);

    const details = await request("GET", `/sessions/${sessionId}`);
    expect(details.status).toBe(200);
    expect(details.body).toMatchObject({
      id: sessionId,
      projectId: "42",
      fixAttempts: [],
      trackedFiles: [],
      events: [],
    });
  });

  it("should return 404 for unknown sessions and routes", async () => {
    expect(await request("GET", "/sessions/does-not-exist")).toEqual({
      status: 404,
      body: { detail: "Session not found" },
    });
    expect(await request("GET", "/nowhere")).toEqual({ status: 404, body: { detail: "Not Found" } });
  });

  it("should run a chat turn for a posted message", async () => {
    const reply = await request(
      "POST",
      `/sessions/${sessionId}/message`,
      JSON.stringify({ message: "Why did the build fail?" })
    );

    expect(reply).toEqual({
      status: 200,
      body: { response: "The lockfile is stale.", merge_request_url: null },
    });
    const history = stateManager.requireSession(sessionId).conversationHistory;
    expect(history.map((m) => [m.role, m.content])).toEqual([
      ["user", "Why did the build fail?"],
      ["assistant", "The lockfile is stale."],
    ]);
  });

  it("should validate message bodies and methods", async () => {
    expect(await request("POST", `/sessions/${sessionId}/message`, JSON.stringify({}))).toEqual({
      status: 400,
      body: { detail: 'Request body must be { "message": string }' },
    });
    expect(await request("GET", `/sessions/${sessionId}/message`)).toEqual({
      status: 405,
      body: { detail: "Method Not Allowed" },
    });
  });
});
