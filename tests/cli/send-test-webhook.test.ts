import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  buildSamplePipelineEvent,
  createSendTestWebhookCommand,
} from "../../src/cli/commands/send-test-webhook.js";
import { GitLabPipelineEventSchema } from "../../src/types/gitlab.js";
import { stubFetch } from "../core/helpers.js";

describe("send-test-webhook", () => {
  let tempDir: string;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    tempDir = mkdtempSync(join(tmpdir(), "cicd-assistant-webhook-"));
    vi.stubEnv("CICD_ASSISTANT_DATA_DIR", tempDir);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("should build a pipeline event the webhook schema accepts", () => {
    const payload = buildSamplePipelineEvent({
      status: "failed",
      ref: "main",
      job: "unit-tests",
      project: "shop",
      now: new Date("2024-02-01T08:00:00Z"),
    });

    const event = GitLabPipelineEventSchema.parse(payload);

    expect(event.object_kind).toBe("pipeline");
    expect(event.project.id).toBe("123");
    expect(event.project.path_with_namespace).toBe("group/shop");
    expect(event.object_attributes.url).toBe("http://gitlab.example.com/group/shop/-/pipelines/12345");
    expect(event.builds.map((b) => [b.name, b.status, b.failure_reason])).toEqual([
      ["build", "success", undefined],
      ["unit-tests", "failed", "script_failure"],
    ]);
  });

  it("should post the event with GitLab's headers", async () => {
    const { calls } = stubFetch([
      { method: "POST", path: "/webhooks/gitlab", body: { status: "ignored" } },
    ]);

    await createSendTestWebhookCommand().parseAsync(
      ["--url", "http://localhost:8000/webhooks/gitlab", "--status", "success", "--token", "test-secret"],
      { from: "user" }
    );

    expect(calls).toHaveLength(1);
    expect(calls[0]?.headers).toEqual({
      "Content-Type": "application/json",
      "X-Gitlab-Event": "Pipeline Hook",
      "X-Gitlab-Token": "test-secret",
    });
    expect(calls[0]?.body).toMatchObject({
      object_kind: "pipeline",
      object_attributes: { ref: "main", status: "success" },
    });
    expect(console.log).toHaveBeenCalledWith('{"status":"ignored"}');
  });
});
