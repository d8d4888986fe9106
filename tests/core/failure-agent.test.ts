import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { StateManager } from "../../src/core/state/state-manager.js";
import { GitLabClient } from "../../src/core/providers/gitlab/gitlab-client.js";
import { SonarQubeClient } from "../../src/core/providers/sonarqube/sonarqube-client.js";
import { FailureAgent, extractMergeRequestUrl } from "../../src/core/agent/failure-agent.js";
import { FakeAgentProvider, callTool, stubFetch, type FakeStep } from "./helpers.js";

const API = "/api/v4/projects/42";
const MR_URL = "http://gitlab.test/group/demo/-/merge_requests/7";
const BRANCH = "fix/pipeline_test_20240305_070809";

const mergeRequest = {
  iid: 7,
  web_url: MR_URL,
  source_branch: BRANCH,
  target_branch: "main",
  title: "Fix test failure in test",
  state: "opened",
};

describe("extractMergeRequestUrl", () => {
  it("should prefer the create_merge_request result", () => {
    expect(
      extractMergeRequestUrl({
        kind: "tool_result",
        text: "see http://other.test/x/-/merge_requests/1",
        tool: "create_merge_request",
        result: { web_url: MR_URL },
      })
    ).toBe(MR_URL);
  });

  it("should fall back to links and web_url fields in the text", () => {
    expect(extractMergeRequestUrl({ kind: "text", text: `Opened ${MR_URL}.` })).toBe(MR_URL);
    expect(
      extractMergeRequestUrl({ kind: "text", text: '{"web_url": "http://gitlab.test/mr"}' })
    ).toBe("http://gitlab.test/mr");
    expect(extractMergeRequestUrl({ kind: "text", text: "No MR yet" })).toBeNull();
  });
});

describe("FailureAgent", () => {
  let tempDir: string;
  let stateManager: StateManager;

  const createAgent = (script: FakeStep[]) => {
    const provider = new FakeAgentProvider(script);
    const agent = new FailureAgent({
      provider,
      stateManager,
      gitlab: new GitLabClient({ baseUrl: "http://gitlab.test" }),
      sonar: new SonarQubeClient({ baseUrl: "http://sonar.test" }),
      assistant: { maxLogSize: 30000 },
      now: () => new Date("2024-03-05T07:08:09Z"),
    });
    return { agent, provider };
  };

  const newSession = () =>
    stateManager.createSession({
      sessionType: "pipeline",
      projectId: "42",
      projectName: "demo",
      branch: "main",
      pipelineId: "1001",
      jobName: "test",
      failedStage: "test",
    }).session;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    tempDir = mkdtempSync(join(tmpdir(), "cicd-assistant-agent-"));
  });

  afterEach(() => {
    stateManager.close();
    rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe("handleMessage", () => {
    beforeEach(() => {
      stateManager = new StateManager(join(tempDir, "assistant.db"));
    });

    it("should answer from the ledger once the attempt limit is reached", async () => {
      stateManager.close();
      stateManager = new StateManager(join(tempDir, "capped.db"), { maxFixAttempts: 2 });
      const session = newSession();
      stateManager.createFixAttempt(session.id, "fix/a");
      stateManager.createFixAttempt(session.id, "fix/a");
      const { agent, provider } = createAgent([]);

      const { response, mergeRequestUrl } = await agent.handleMessage(session.id, "try again");

      expect(provider.invocations).toHaveLength(0);
      expect(mergeRequestUrl).toBeNull();
      expect(response.text).toContain(
        "I've attempted to fix this issue 2 times but the pipeline continues to fail."
      );
      expect(response.text).toContain("- Attempt #2: fix/a - pending");
    });

    it("should record a created merge request as the next fix attempt", async () => {
      const session = newSession();
      const { calls } = stubFetch([
        { path: `${API}/repository/files/app.py`, body: { content: "" } },
        { method: "POST", path: `${API}/repository/commits`, status: 201, body: { id: "abc123" } },
        { method: "POST", path: `${API}/merge_requests`, status: 201, body: mergeRequest },
        { path: `${API}/merge_requests/7`, body: mergeRequest },
        {
          path: `${API}/merge_requests/7/changes`,
          body: { changes: [{ old_path: "app.py", new_path: "app.py" }] },
        },
      ]);
      const { agent, provider } = createAgent([
        callTool(
          "create_merge_request",
          {
            title: "Fix test failure in test",
            description: "Pin the dependency",
            files: { updates: { "app.py": "fixed" } },
            project_id: "42",
            source_branch: BRANCH,
          },
          "Created the merge request."
        ),
      ]);

      const { response, mergeRequestUrl } = await agent.handleMessage(
        session.id,
        "Please create a merge request"
      );

      expect(mergeRequestUrl).toBe(MR_URL);
      expect(response.text).toBe("Created the merge request.");
      expect(provider.invocations[0]?.mode).toBe("chat");
      expect(provider.invocations[0]?.invocation.prompt).toContain(`- source_branch: ${BRANCH}`);
      expect(calls.some((c) => c.method === "POST" && c.url.pathname === `${API}/merge_requests`)).toBe(
        true
      );

      const [attempt] = stateManager.getFixAttempts(session.id);
      expect(attempt?.attemptNumber).toBe(1);
      expect(attempt?.branchName).toBe(BRANCH);
      expect(attempt?.filesChanged).toEqual(["app.py"]);
      expect(attempt?.status).toBe("pending");
      expect(attempt?.mergeRequestId).toBe("7");
      expect(attempt?.mergeRequestUrl).toBe(MR_URL);

      const updated = stateManager.requireSession(session.id);
      expect(updated.currentFixBranch).toBe(BRANCH);
      expect(updated.fixIteration).toBe(1);
      expect(updated.mergeRequestUrl).toBe(MR_URL);
      expect(updated.mergeRequestId).toBe("7");
      expect(updated.webhookData["fix_attempts"]).toEqual([
        {
          attempt_number: 1,
          branch: BRANCH,
          mr_url: MR_URL,
          mr_id: "7",
          status: "pending",
          timestamp: "2024-03-05T07:08:09.000Z",
          files: ["app.py"],
        },
      ]);
    });

    it("should not track merge request links in answers to questions", async () => {
      const session = newSession();
      const { agent } = createAgent([async () => ({ output: `It is ${MR_URL}` })]);

      const { mergeRequestUrl } = await agent.handleMessage(session.id, "Which MR was that?");

      expect(mergeRequestUrl).toBe(MR_URL);
      expect(stateManager.getFixAttempts(session.id)).toEqual([]);
    });
  });

  it("should note a merge request it could not record past the cap", async () => {
    stateManager = new StateManager(join(tempDir, "assistant.db"), { maxFixAttempts: 1 });
    const session = newSession();
    stubFetch([
      { path: `${API}/merge_requests/7`, body: mergeRequest },
      { path: `${API}/merge_requests/7/changes`, body: { changes: [] } },
    ]);
    // Another delivery records the last allowed attempt while this turn runs
    const { agent } = createAgent([
      async () => {
        stateManager.createFixAttempt(session.id, "fix/pipeline_test_other");
        return { output: `Opened ${MR_URL}` };
      },
    ]);

    const { response, mergeRequestUrl } = await agent.handleMessage(
      session.id,
      "Please create a merge request"
    );

    expect(mergeRequestUrl).toBe(MR_URL);
    expect(response.text).toBe(
      `Opened ${MR_URL}\n\n⚠️ Maximum fix attempts (1) exceeded. ` +
        "This merge request was not recorded as a new fix attempt."
    );
    expect(stateManager.getFixAttempts(session.id).map((a) => a.branchName)).toEqual([
      "fix/pipeline_test_other",
    ]);
  });

  it("should take the attempt cap from the ledger", async () => {
    stateManager = new StateManager(join(tempDir, "assistant.db"), { maxFixAttempts: 3 });
    const session = newSession();
    const { agent, provider } = createAgent([async () => ({ output: "Root cause: missing dep" })]);

    await agent.analyzePipeline(
      session.id,
      { name: "test", stage: "test", failureReason: "script_failure" },
      false
    );

    expect(provider.invocations[0]?.invocation.systemPrompt).toContain(
      "- At most 3 fix attempts are allowed"
    );
  });

  it("should analyse a pipeline with read-only tools", async () => {
    stateManager = new StateManager(join(tempDir, "assistant.db"));
    const session = newSession();
    const { agent, provider } = createAgent([async () => ({ output: "Root cause: missing dep" })]);

    const text = await agent.analyzePipeline(
      session.id,
      { name: "test", stage: "test", failureReason: "script_failure" },
      false
    );

    expect(text).toBe("Root cause: missing dep");
    const names = provider.invocations[0]?.invocation.tools.definitions().map((d) => d.name);
    expect(names).toEqual([
      "get_pipeline_jobs",
      "get_job_logs",
      "get_file_content",
      "get_recent_commits",
      "get_project_info",
    ]);
  });
});
