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
import { ProjectNotFoundError, WebhookValidationError } from "../../src/infra/errors.js";
import type { Session } from "../../src/types/session.js";
import { FakeAgentProvider, stubFetch, type FakeStep } from "./helpers.js";

const MR_URL = "http://gitlab.test/group/demo/-/merge_requests/7";

const pipelineEvent = (status: string, ref: string, jobName = "test", pipelineId = 12345) => ({
  object_kind: "pipeline",
  object_attributes: { id: pipelineId, ref, status, sha: "a1b2c3d4" },
  project: { id: 42, name: "demo", path_with_namespace: "group/demo" },
  builds: [
    { id: 380, name: "build", stage: "build", status: "success", finished_at: "2024-01-01T10:00:00Z" },
    {
      id: 381,
      name: jobName,
      stage: "test",
      status: status === "failed" ? "failed" : "success",
      finished_at: "2024-01-01T10:05:00Z",
    },
  ],
});

describe("WebhookRouter", () => {
  let tempDir: string;
  let stateManager: StateManager;
  let runner: AnalysisRunner;

  const createRouter = (script: FakeStep[] = []) => {
    const provider = new FakeAgentProvider(script);
    const gitlab = new GitLabClient({ baseUrl: "http://gitlab.test" });
    const sonar = new SonarQubeClient({ baseUrl: "http://sonar.test" });
    const agent = new FailureAgent({
      provider,
      stateManager,
      gitlab,
      sonar,
      assistant: { maxLogSize: 30000 },
    });
    runner = new AnalysisRunner({ agent, stateManager, sonar });
    const router = new WebhookRouter({
      stateManager,
      gitlab,
      runner,
      sessions: new SessionService(stateManager, agent),
      gitlabUrl: "http://gitlab.test/",
    });
    return { router, provider };
  };

  const openSession = (): Session =>
    stateManager.createSession({
      sessionType: "pipeline",
      projectId: "42",
      projectName: "demo",
      branch: "main",
      pipelineId: "12345",
      jobName: "test",
      failedStage: "test",
    }).session;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    tempDir = mkdtempSync(join(tmpdir(), "cicd-assistant-router-"));
    stateManager = new StateManager(join(tempDir, "assistant.db"));
  });

  afterEach(async () => {
    await runner.idle();
    stateManager.close();
    rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe("GitLab events", () => {
    it("should ignore events that are not pipelines", async () => {
      const { router } = createRouter();

      expect(await router.handleGitLabEvent({ object_kind: "push" })).toEqual({
        status: "ignored",
        reason: "Not a pipeline event",
      });
    });

    it("should ignore pipelines that neither failed nor succeeded", async () => {
      const { router } = createRouter();

      expect(await router.handleGitLabEvent(pipelineEvent("running", "main"))).toEqual({
        status: "ignored",
        reason: "Not a failure event",
      });
    });

    it("should reject a pipeline event without a project id", async () => {
      const { router } = createRouter();

      await expect(
        router.handleGitLabEvent({ object_kind: "pipeline", object_attributes: { status: "failed" } })
      ).rejects.toBeInstanceOf(WebhookValidationError);
    });

    it("should open a pipeline session and store the background analysis", async () => {
      stubFetch([{ path: "/api/v4/projects/42/jobs/381/trace", body: "AssertionError: expected 1" }]);
      const analysis = "Root cause: a missing import\n```ts\nimport os\n```";
      const { router, provider } = createRouter([async () => ({ output: analysis })]);

      const outcome = await router.handleGitLabEvent(pipelineEvent("failed", "main"));

      expect(outcome).toMatchObject({
        status: "analyzing",
        session_type: "pipeline",
        message: "Pipeline analysis started",
      });
      const sessionId = outcome.status === "analyzing" ? outcome.session_id : "";

      await runner.idle();

      const session = stateManager.requireSession(sessionId);
      expect(session.jobName).toBe("test");
      expect(session.failedStage).toBe("test");
      expect(session.pipelineId).toBe("12345");
      expect(session.conversationHistory.map((m) => [m.role, m.content])).toEqual([
        ["system", "Pipeline failure detected for demo - Pipeline #12345"],
        ["assistant", analysis],
      ]);
      expect(session.webhookData["analysis_result"]).toBe(analysis);
      expect(session.webhookData["code_blocks"]).toEqual(["import os"]);
      expect(provider.invocations[0]?.mode).toBe("analyze");
    });

    it("should ignore a repeated failure while a session is open", async () => {
      stubFetch([]);
      const { router } = createRouter();
      const session = openSession();

      expect(await router.handleGitLabEvent(pipelineEvent("failed", "main"))).toEqual({
        status: "ignored",
        reason: "Active pipeline session already exists",
        session_id: session.id,
      });
    });

    it("should treat a failed sonarqube job as a quality failure", async () => {
      stubFetch([
        { path: "/api/qualitygates/project_status", body: { projectStatus: { status: "NONE" } } },
      ]);
      const { router } = createRouter();

      const outcome = await router.handleGitLabEvent(pipelineEvent("failed", "main", "sonarqube-check"));

      expect(outcome).toMatchObject({ status: "analyzing", session_type: "quality" });
      await runner.idle();

      // No gate result: the session falls back to a pipeline investigation
      const [session] = stateManager.getActiveSessionsForProject("42");
      expect(session?.sessionType).toBe("pipeline");
      expect(session?.conversationHistory.at(-1)?.content).toContain(
        "**Issue**: No SonarQube analysis results found for project 'demo'"
      );
    });
  });

  describe("fix branches", () => {
    const fixBranch = "fix/pipeline_test_20240101_120000";

    it("should mark the attempt failed and retry on the same branch", async () => {
      const session = openSession();
      stateManager.createFixAttempt(session.id, fixBranch, ["app.py"]);
      stubFetch([]);
      const { router, provider } = createRouter([async () => ({ output: "Pushed more fixes" })]);

      const outcome = await router.handleGitLabEvent(pipelineEvent("failed", fixBranch));

      expect(outcome).toEqual({
        status: "retrying",
        session_id: session.id,
        message: "Auto-retry initiated (attempt 2/5)",
        response: "Pushed more fixes",
      });
      const [attempt] = stateManager.getFixAttempts(session.id);
      expect(attempt?.status).toBe("failed");
      expect(attempt?.errorDetails).toBe("Pipeline still failing");
      expect(provider.invocations[0]?.invocation.prompt).toContain(fixBranch);

      const history = stateManager.requireSession(session.id).conversationHistory;
      expect(history.map((m) => m.role)).toEqual(["system", "user", "assistant"]);
      expect(history[1]?.content).toBe(
        `The pipeline on branch ${fixBranch} is still failing with the same pipeline issues. ` +
          "This is attempt 2 of 5. " +
          "Let me analyze the latest logs and apply additional fixes to the same branch."
      );
    });

    it("should stop retrying at the attempt cap", async () => {
      const session = openSession();
      for (let n = 1; n <= 5; n++) {
        stateManager.createFixAttempt(session.id, `fix/pipeline_test_${n}`);
      }
      stubFetch([]);
      const { router, provider } = createRouter();

      const outcome = await router.handleGitLabEvent(pipelineEvent("failed", "fix/pipeline_test_5"));

      expect(outcome).toEqual({
        status: "max_attempts_reached",
        session_id: session.id,
        message: "Max attempts (5) reached",
      });
      expect(provider.invocations).toHaveLength(0);
      expect(stateManager.getFixAttempts(session.id)).toHaveLength(5);
      expect(stateManager.requireSession(session.id).conversationHistory.at(-1)?.content).toBe(
        "⚠️ Maximum fix attempts (5) reached. Manual intervention required to resolve the remaining issues."
      );

      // Re-delivery of the same failure
      expect(await router.handleGitLabEvent(pipelineEvent("failed", "fix/pipeline_test_5"))).toEqual({
        status: "ignored",
        reason: "Fix branch pipeline already handled",
        session_id: session.id,
      });
    });

    it("should keep retrying when a retry commits without a new attempt", async () => {
      const branch = "fix/pipeline_test_1";
      const session = openSession();
      stateManager.createFixAttempt(session.id, branch);
      stubFetch([]);
      const { router, provider } = createRouter([
        async () => ({ output: "Committed more changes to the branch" }),
        async () => ({ output: "Committed another change" }),
      ]);

      expect(await router.handleGitLabEvent(pipelineEvent("failed", branch, "test", 1))).toMatchObject({
        status: "retrying",
        message: "Auto-retry initiated (attempt 2/5)",
      });
      // The attempt is already failed; the new pipeline still triggers a retry
      expect(await router.handleGitLabEvent(pipelineEvent("failed", branch, "test", 2))).toEqual({
        status: "retrying",
        session_id: session.id,
        message: "Auto-retry initiated (attempt 2/5)",
        response: "Committed another change",
      });
      expect(provider.invocations).toHaveLength(2);
      expect(stateManager.getFixAttempts(session.id).map((a) => a.status)).toEqual(["failed"]);

      expect(await router.handleGitLabEvent(pipelineEvent("failed", branch, "test", 2))).toEqual({
        status: "ignored",
        reason: "Fix branch pipeline already handled",
        session_id: session.id,
      });
      expect(provider.invocations).toHaveLength(2);
    });

    it("should stop after five failing fix pipelines", async () => {
      const session = openSession();
      stateManager.createFixAttempt(session.id, fixBranch, ["app.py"]);
      const mergeRequest = {
        iid: 7,
        web_url: MR_URL,
        source_branch: fixBranch,
        target_branch: "main",
        title: "Fix test failure in test",
        state: "opened",
      };
      stubFetch([
        { path: "/api/v4/projects/42/merge_requests/7", body: mergeRequest },
        {
          path: "/api/v4/projects/42/merge_requests/7/changes",
          body: { changes: [{ old_path: "app.py", new_path: "app.py" }] },
        },
      ]);
      const reply: FakeStep = async () => ({ output: `Pushed another fix to ${MR_URL}` });
      const { router, provider } = createRouter([reply, reply, reply, reply]);

      const statuses: string[] = [];
      for (let pipelineId = 1; pipelineId <= 5; pipelineId++) {
        const outcome = await router.handleGitLabEvent(
          pipelineEvent("failed", fixBranch, "test", pipelineId)
        );
        statuses.push(outcome.status);
      }

      expect(statuses).toEqual(["retrying", "retrying", "retrying", "retrying", "max_attempts_reached"]);
      expect(provider.invocations).toHaveLength(4);
      const attempts = stateManager.getFixAttempts(session.id);
      expect(attempts.map((a) => a.attemptNumber)).toEqual([1, 2, 3, 4, 5]);
      expect(attempts.map((a) => a.status)).toEqual(["failed", "failed", "failed", "failed", "failed"]);
    });

    it("should confirm the fix and resolve once the target branch passes", async () => {
      const session = openSession();
      stateManager.createFixAttempt(session.id, fixBranch, ["app.py"]);
      stateManager.updateFixAttempt(session.id, 1, "pending", {
        mergeRequestId: "7",
        mergeRequestUrl: MR_URL,
      });
      stateManager.updateSessionMetadata(session.id, { mergeRequestUrl: MR_URL, mergeRequestId: "7" });
      const { router } = createRouter();

      expect(await router.handleGitLabEvent(pipelineEvent("success", "main"))).toEqual({
        status: "processed",
        action: "checked_for_resolution",
      });

      expect(await router.handleGitLabEvent(pipelineEvent("success", fixBranch))).toEqual({
        status: "updated",
        action: "fix_succeeded",
        session_id: session.id,
      });
      expect(stateManager.getFixAttempt(session.id, 1)?.status).toBe("success");
      const confirmed = stateManager.requireSession(session.id).conversationHistory.at(-1)?.content;
      expect(confirmed).toContain(`2. Merge when ready: ${MR_URL}`);
      expect(confirmed).toContain("[View Pipelines](http://gitlab.test/group/demo/-/pipelines)");

      expect(await router.handleGitLabEvent(pipelineEvent("success", "main"))).toEqual({
        status: "resolved",
        action: "target_branch_success",
        session_id: session.id,
      });
      expect(stateManager.requireSession(session.id).status).toBe("resolved");
    });
  });

  describe("SonarQube events", () => {
    it("should ignore a passing quality gate", async () => {
      const { router } = createRouter();

      expect(
        await router.handleSonarQubeEvent({ qualityGate: { status: "OK" }, project: { key: "demo" } })
      ).toEqual({ status: "ignored", reason: "Quality gate passed" });
    });

    it("should open a quality session for a failed gate", async () => {
      stubFetch([
        { path: "/api/v4/projects/group%2Fdemo", body: { id: 42, name: "demo" } },
        { path: "/api/issues/search", body: { issues: [] } },
        { path: "/api/measures/component", body: { component: { measures: [] } } },
      ]);
      const { router } = createRouter([async () => ({ output: "No blocking issues left" })]);

      const outcome = await router.handleSonarQubeEvent({
        qualityGate: { status: "ERROR", conditions: [{ metric: "coverage", status: "ERROR" }] },
        project: { key: "group/demo", name: "Demo" },
        branch: { name: "develop" },
      });

      expect(outcome).toMatchObject({
        status: "analyzing",
        session_type: "quality",
        message: "Quality analysis started",
      });
      await runner.idle();

      const session = stateManager.findActiveSession("quality", "42");
      expect(session?.sonarqubeKey).toBe("group/demo");
      expect(session?.branch).toBe("develop");
      expect(session?.qualityMetrics?.bugCount).toBe(0);
      expect(session?.conversationHistory.at(-1)?.content).toBe("No blocking issues left");

      // A second delivery reuses the session
      expect(
        await router.handleSonarQubeEvent({ qualityGate: { status: "ERROR" }, project: { key: "group/demo" } })
      ).toEqual({
        status: "existing",
        session_id: session?.id,
        message: "Using existing quality session",
      });
    });

    it("should fail when the project cannot be mapped to GitLab", async () => {
      stubFetch([{ path: "/api/v4/projects", body: [] }]);
      const { router } = createRouter();

      await expect(
        router.handleSonarQubeEvent({ qualityGate: { status: "ERROR" }, project: { key: "unknown" } })
      ).rejects.toBeInstanceOf(ProjectNotFoundError);
    });
  });
});
