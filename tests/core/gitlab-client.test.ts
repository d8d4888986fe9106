import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { GitLabClient, truncateLog } from "../../src/core/providers/gitlab/gitlab-client.js";
import { GitLabApiError } from "../../src/infra/errors.js";
import { stubFetch } from "./helpers.js";

const FILES = "/api/v4/projects/42/repository/files";

describe("GitLabClient", () => {
  let gitlab: GitLabClient;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    gitlab = new GitLabClient({ baseUrl: "http://gitlab.test/", token: "test-token" });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("truncateLog", () => {
    it("should leave short logs alone", () => {
      expect(truncateLog("short log", 100)).toBe("short log");
    });

    it("should keep 40% from each end around a marker", () => {
      const log = "a".repeat(60) + "b".repeat(40);
      const truncated = truncateLog(log, 50);

      expect(truncated).toBe(
        "a".repeat(20) +
          "\n\n... [TRUNCATED - Log too large, showing first 20 and last 20 characters] ...\n\n" +
          "b".repeat(20)
      );
    });
  });

  describe("getFile", () => {
    it("should return raw content on success", async () => {
      const { calls } = stubFetch([
        { path: `${FILES}/src%2Fapp.py/raw`, body: "print('hi')\n" },
      ]);

      const result = await gitlab.getFile("42", "src/app.py", "main");

      expect(result).toEqual({ status: "success", content: "print('hi')\n", file_path: "src/app.py" });
      expect(calls[0]?.url.searchParams.get("ref")).toBe("main");
      expect(calls[0]?.headers["PRIVATE-TOKEN"]).toBe("test-token");
    });

    it("should fall back to the JSON endpoint when raw fails", async () => {
      stubFetch([
        { path: `${FILES}/src%2Fapp.py/raw`, status: 500, body: "boom" },
        {
          path: `${FILES}/src%2Fapp.py`,
          body: { content: Buffer.from("x = 1\n").toString("base64"), encoding: "base64" },
        },
      ]);

      const result = await gitlab.getFile("42", "src/app.py", "fix/a");

      expect(result).toEqual({ status: "success", content: "x = 1\n", file_path: "src/app.py" });
    });

    it("should report a missing file as not_found", async () => {
      stubFetch([]);

      const result = await gitlab.getFile("42", "nope.py", "main");

      expect(result).toEqual({
        status: "not_found",
        error: "File 'nope.py' does not exist in the repository",
        file_path: "nope.py",
      });
    });

    it("should report other failures as error without throwing", async () => {
      stubFetch([
        { path: `${FILES}/a.py/raw`, status: 500, body: "raw down" },
        { path: `${FILES}/a.py`, status: 502, body: "json down" },
      ]);

      const result = await gitlab.getFile("42", "a.py", "main");

      expect(result).toEqual({
        status: "error",
        error: "GitLab API error: 502 - json down",
        file_path: "a.py",
      });
    });
  });

  it("should throw GitLabApiError with the status on API errors", async () => {
    stubFetch([{ path: "/api/v4/projects/42/pipelines/7/jobs", status: 403, body: "forbidden" }]);

    const error = await gitlab.getPipelineJobs("42", "7").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GitLabApiError);
    expect(error).toMatchObject({ status: 403, isRetryable: false });
  });

  it("should return the job trace as text", async () => {
    stubFetch([{ path: "/api/v4/projects/42/jobs/381/trace", body: "$ pytest\nFAILED" }]);

    expect(await gitlab.getJobTrace("42", "381")).toBe("$ pytest\nFAILED");
  });

  it("should encode project paths", async () => {
    const { calls } = stubFetch([
      { path: "/api/v4/projects/group%2Fdemo", body: { id: 42, name: "demo" } },
    ]);

    const project = await gitlab.getProject("group/demo");

    expect(project.id).toBe(42);
    expect(project.path_with_namespace).toBe("");
    expect(calls).toHaveLength(1);
  });

  it("should try the encoded branch name after the plain one", async () => {
    const { calls } = stubFetch([
      { path: "/api/v4/projects/42/repository/branches/fix%2Fa", body: { name: "fix/a" } },
    ]);

    expect(await gitlab.branchExists("42", "fix/a")).toBe(true);
    expect(calls.map((c) => c.url.pathname)).toEqual([
      "/api/v4/projects/42/repository/branches/fix/a",
      "/api/v4/projects/42/repository/branches/fix%2Fa",
    ]);
  });
});
