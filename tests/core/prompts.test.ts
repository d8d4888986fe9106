import { describe, it, expect } from "vitest";
import {
  classifyIntent,
  isGuardedRequest,
  matchIntents,
  wantsMergeRequest,
} from "../../src/core/agent/intent.js";
import {
  chatPrompt,
  fixBranchName,
  formatConversationHistory,
  iterationLimitReport,
  sessionContext,
} from "../../src/core/agent/prompts.js";
import type { ConversationMessage, FixAttempt, Session } from "../../src/types/session.js";

const message = (role: ConversationMessage["role"], content: string): ConversationMessage => ({
  role,
  content,
  timestamp: "2024-01-01T00:00:00.000Z",
});

const session = (overrides: Partial<Session> = {}): Session => ({
  id: "s-1",
  sessionType: "pipeline",
  projectId: "42",
  projectName: "demo",
  branch: "main",
  pipelineId: "1001",
  pipelineUrl: null,
  commitSha: null,
  jobName: "test",
  failedStage: "test",
  sonarqubeKey: null,
  qualityGateStatus: null,
  status: "active",
  conversationHistory: [],
  currentFixBranch: null,
  fixIteration: 0,
  mergeRequestUrl: null,
  mergeRequestId: null,
  parentSessionId: null,
  webhookData: {},
  qualityMetrics: null,
  createdAt: new Date("2024-01-01T00:00:00Z"),
  lastActivityAt: new Date("2024-01-01T00:00:00Z"),
  expiresAt: new Date("2024-01-01T03:00:00Z"),
  ...overrides,
});

describe("intent", () => {
  it("should classify questions, MR requests and fix requests", () => {
    expect(classifyIntent("Why did the build fail?")).toBe("question");
    expect(classifyIntent("Please create a merge request")).toBe("create_mr");
    expect(classifyIntent("Create an MR for this")).toBe("create_mr");
    expect(classifyIntent("Apply the fix")).toBe("apply_fix");
  });

  it("should report every matching intent for a retry message", () => {
    const intents = matchIntents(
      "The pipeline is still failing. Let me apply additional fixes to the same branch."
    );

    expect([...intents]).toEqual(["retry", "apply_fix"]);
  });

  it("should only guard MR requests once an attempt exists", () => {
    expect(isGuardedRequest(matchIntents("create a merge request"), 0)).toBe(false);
    expect(isGuardedRequest(matchIntents("create a merge request"), 1)).toBe(true);
    expect(isGuardedRequest(matchIntents("try again"), 0)).toBe(true);
    expect(isGuardedRequest(matchIntents("what changed?"), 3)).toBe(false);
  });

  it("should commit on MR requests, and on fix requests with an open branch", () => {
    expect(wantsMergeRequest(matchIntents("create the MR"), null)).toBe(true);
    expect(wantsMergeRequest(matchIntents("apply the fix"), null)).toBe(false);
    expect(wantsMergeRequest(matchIntents("apply the fix"), "fix/a")).toBe(true);
  });
});

describe("formatConversationHistory", () => {
  it("should say so when there is no history", () => {
    expect(formatConversationHistory([])).toBe("No previous conversation.");
  });

  it("should keep the last six entries and drop system ones", () => {
    const history = [
      message("user", "m1"),
      message("assistant", "m2"),
      message("system", "m3"),
      message("user", "m4"),
      message("assistant", "m5"),
      message("user", "m6"),
      message("assistant", "m7"),
    ];

    expect(formatConversationHistory(history)).toBe(
      "ASSISTANT: m2\n\nUSER: m4\n\nASSISTANT: m5\n\nUSER: m6\n\nASSISTANT: m7"
    );
  });

  it("should shorten long entries", () => {
    const formatted = formatConversationHistory([message("assistant", "x".repeat(1001))]);

    expect(formatted).toBe(`ASSISTANT: ${"x".repeat(900)}... [truncated]`);
  });
});

describe("prompts", () => {
  it("should name fix branches in UTC", () => {
    const now = new Date("2024-03-05T07:08:09Z");

    expect(fixBranchName("pipeline", "Unit Tests", now)).toBe("fix/pipeline_unit_tests_20240305_070809");
    expect(fixBranchName("pipeline", null, now)).toBe("fix/pipeline_job_20240305_070809");
    expect(fixBranchName("quality", "sonarqube-check", now)).toBe("fix/sonarqube_20240305_070809");
  });

  it("should describe the session and the attempt budget", () => {
    const context = sessionContext(session({ currentFixBranch: "fix/a" }), 2, 5);

    expect(context).toBe(
      [
        "Session Context:",
        "- Project: demo (ID: 42)",
        "- Pipeline: #1001",
        "- Branch: main",
        "- Failed Job: test in stage test",
        "- Session ID: s-1",
        "- Current Fix Branch: fix/a",
        "- Fix Iteration: 2 of 5",
      ].join("\n")
    );
  });

  it("should include the previous analysis in quality chat prompts", () => {
    const quality = session({
      sessionType: "quality",
      conversationHistory: [message("assistant", "3 bugs in app.py"), message("user", "why?")],
    });

    const prompt = chatPrompt(quality, "CTX", "Which file?");

    expect(prompt).toBe(
      "CTX\n\nPrevious Analysis:\n3 bugs in app.py\n\nPrevious Conversation:\n" +
        "ASSISTANT: 3 bugs in app.py\n\nUSER: why?\n\nUser Question: Which file?"
    );
  });

  it("should list every attempt in the iteration limit report", () => {
    const attempt = (n: number): FixAttempt => ({
      id: n,
      sessionId: "s-1",
      attemptNumber: n,
      branchName: "fix/a",
      filesChanged: [],
      status: "failed",
      mergeRequestId: null,
      mergeRequestUrl: null,
      errorDetails: null,
      createdAt: new Date(),
      completedAt: null,
    });

    const report = iterationLimitReport("pipeline", 2, [attempt(1), attempt(2)]);

    expect(report.startsWith("### ❌ Iteration Limit Reached\n")).toBe(true);
    expect(report).toContain("I've attempted to fix this issue 2 times but the pipeline continues to fail.");
    expect(report.endsWith("- Attempt #1: fix/a - failed\n- Attempt #2: fix/a - failed")).toBe(true);
  });
});
