import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { GitLabClient } from "../../src/core/providers/gitlab/gitlab-client.js";
import {
  createMergeRequest,
  isMergeRequestFailure,
} from "../../src/core/providers/gitlab/merge-request.js";
import { stubFetch } from "./helpers.js";

const API = "/api/v4/projects/42";

const openMergeRequest = {
  iid: 7,
  web_url: "http://gitlab.test/group/demo/-/merge_requests/7",
  source_branch: "fix/pipeline_test_20240101_120000",
  target_branch: "main",
  title: "Fix failing tests",
  state: "opened",
};

describe("createMergeRequest", () => {
  let gitlab: GitLabClient;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    gitlab = new GitLabClient({ baseUrl: "http://gitlab.test" });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should branch from the target and open a new merge request", async () => {
    const { calls } = stubFetch([
      { path: `${API}/repository/files/src%2Fapp.py`, body: { content: "" } },
      { method: "POST", path: `${API}/repository/commits`, status: 201, body: { id: "abc123" } },
      { method: "POST", path: `${API}/merge_requests`, status: 201, body: openMergeRequest },
    ]);

    const result = await createMergeRequest(gitlab, {
      projectId: "42",
      sourceBranch: "fix/pipeline_test_20240101_120000",
      title: "Fix failing tests",
      description: "Pin the dependency",
      files: { updates: { "src/app.py": "fixed", "new.py": "created" } },
    });

    expect(result).toEqual({
      id: 7,
      web_url: "http://gitlab.test/group/demo/-/merge_requests/7",
      title: "Fix failing tests",
      source_branch: "fix/pipeline_test_20240101_120000",
      target_branch: "main",
      files_processed: ["UPDATE: src/app.py", "CREATE: new.py"],
      commit_sha: "abc123",
    });

    const commit = calls.find((c) => c.method === "POST" && c.url.pathname.endsWith("/commits"));
    expect(commit?.body).toEqual({
      branch: "fix/pipeline_test_20240101_120000",
      commit_message: "Fix: Fix failing tests",
      actions: [
        { action: "update", file_path: "src/app.py", content: "fixed" },
        { action: "create", file_path: "new.py", content: "created" },
      ],
      start_branch: "main",
    });

    const mr = calls.find((c) => c.method === "POST" && c.url.pathname.endsWith("/merge_requests"));
    expect(mr?.body).toEqual({
      source_branch: "fix/pipeline_test_20240101_120000",
      target_branch: "main",
      title: "Fix failing tests",
      description: "Pin the dependency\n\n**Files changed:**\n- UPDATE: src/app.py\n- CREATE: new.py",
      remove_source_branch: true,
    });
  });

  it("should commit to an existing branch and reuse its open merge request", async () => {
    const { calls } = stubFetch([
      { path: `${API}/repository/branches/fix/a`, body: { name: "fix/a" } },
      { path: `${API}/repository/files/app.py`, body: { content: "" } },
      { method: "POST", path: `${API}/repository/commits`, status: 201, body: { id: "def456" } },
      { path: `${API}/merge_requests`, body: [openMergeRequest] },
    ]);

    const result = await createMergeRequest(gitlab, {
      projectId: "42",
      sourceBranch: "fix/a",
      title: "Second attempt",
      description: "More fixes",
      files: { "app.py": "v2" },
      updateMode: true,
    });

    expect(result).toEqual({
      id: 7,
      web_url: "http://gitlab.test/group/demo/-/merge_requests/7",
      message: "Updated existing merge request",
      branch: "fix/a",
      files_processed: ["UPDATE: app.py"],
      commit_sha: "def456",
    });

    const commit = calls.find((c) => c.method === "POST");
    expect(commit?.body).not.toHaveProperty("start_branch");
    const list = calls.find((c) => c.url.pathname === `${API}/merge_requests`);
    expect(list?.url.searchParams.get("source_branch")).toBe("fix/a");
    expect(list?.url.searchParams.get("state")).toBe("opened");
  });

  it("should refuse update mode when the branch does not exist", async () => {
    stubFetch([]);

    const result = await createMergeRequest(gitlab, {
      projectId: "42",
      sourceBranch: "fix/gone",
      title: "t",
      description: "d",
      files: { "a.py": "x" },
      updateMode: true,
    });

    expect(result).toEqual({ error: "Branch fix/gone not found for update" });
    expect(isMergeRequestFailure(result)).toBe(true);
  });

  it("should surface GitLab's commit error", async () => {
    stubFetch([
      {
        method: "POST",
        path: `${API}/repository/commits`,
        status: 400,
        body: '{"message":"A file with this name already exists"}',
      },
    ]);

    const result = await createMergeRequest(gitlab, {
      projectId: "42",
      sourceBranch: "fix/b",
      title: "t",
      description: "d",
      files: { creates: { "a.py": "x" } },
    });

    expect(result).toEqual({
      error: 'Commit failed: {"message":"A file with this name already exists"}',
      files_processed: ["CREATE: a.py"],
      branch_exists: false,
      update_mode: false,
    });
  });
});
