import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { GitLabClient } from "../../src/core/providers/gitlab/gitlab-client.js";
import { resolveGitLabProjectId } from "../../src/core/providers/gitlab/project-resolver.js";
import { stubFetch } from "./helpers.js";

describe("resolveGitLabProjectId", () => {
  let gitlab: GitLabClient;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    gitlab = new GitLabClient({ baseUrl: "http://gitlab.test" });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should look a path key up directly", async () => {
    stubFetch([{ path: "/api/v4/projects/group%2Fdemo", body: { id: 42, name: "demo" } }]);

    expect(await resolveGitLabProjectId(gitlab, "group/demo")).toBe("42");
  });

  it("should prefer an exact name match from the project search", async () => {
    const { calls } = stubFetch([
      {
        path: "/api/v4/projects",
        body: [
          { id: 1, name: "demo-legacy", path_with_namespace: "old/demo-legacy" },
          { id: 2, name: "demo", path_with_namespace: "team/demo" },
        ],
      },
    ]);

    expect(await resolveGitLabProjectId(gitlab, "demo")).toBe("2");
    expect(calls[0]?.url.searchParams.get("search")).toBe("demo");
  });

  it("should match on the path suffix", async () => {
    stubFetch([
      {
        path: "/api/v4/projects",
        body: [
          { id: 5, name: "Demo Service", path_with_namespace: "team/demo-service" },
          { id: 6, name: "Other", path_with_namespace: "team/other" },
        ],
      },
    ]);

    expect(await resolveGitLabProjectId(gitlab, "demo-service")).toBe("5");
  });

  it("should search a group for group_project keys", async () => {
    stubFetch([
      { path: "/api/v4/projects", body: [] },
      { path: "/api/v4/groups", body: [{ id: 9, name: "Team" }] },
      { path: "/api/v4/groups/9/projects", body: [{ id: 77, name: "billing" }] },
    ]);

    expect(await resolveGitLabProjectId(gitlab, "team_billing")).toBe("77");
  });

  it("should return null when nothing matches", async () => {
    stubFetch([{ path: "/api/v4/projects", body: [] }]);

    expect(await resolveGitLabProjectId(gitlab, "unknown")).toBeNull();
    expect(await resolveGitLabProjectId(gitlab, "")).toBeNull();
  });
});
