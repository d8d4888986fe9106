import { z } from "zod";
import type { StateManager } from "../../state/state-manager.js";
import type { TrackedFileStatus } from "../../../types/session.js";
import { logger } from "../../../infra/logger.js";
import { errorMessage } from "../../../infra/errors.js";
import { defineTool, wrapTool, type AgentTool } from "./index.js";

const FileResultSchema = z.object({
  status: z.enum(["success", "not_found", "error"]),
  content: z.string().optional(),
  error: z.string().optional(),
});

const FileArgsSchema = z
  .object({
    file_path: z.string(),
    ref: z.string().optional(),
  })
  .passthrough();

export interface TrackedFileOptions {
  stateManager: StateManager;
  sessionId: string;
  /** When set, a HEAD (or missing) ref is read from this branch instead */
  currentFixBranch?: string | null;
}

/**
 * Persist every file fetch, successful or not, before the model sees the
 * result. Files read during analysis are what a later merge request builds on.
 */
export function trackFileContent(tool: AgentTool, options: TrackedFileOptions): AgentTool {
  const { stateManager, sessionId, currentFixBranch } = options;

  return wrapTool(tool, async (input, inner) => {
    const args = FileArgsSchema.safeParse(input);
    if (!args.success) {
      return inner.execute(input);
    }

    let effectiveInput: unknown = input;
    const ref = args.data.ref ?? "HEAD";
    if (currentFixBranch && ref === "HEAD") {
      logger.debug(`Reading ${args.data.file_path} from fix branch ${currentFixBranch}`);
      effectiveInput = { ...args.data, ref: currentFixBranch };
    }

    const result = await inner.execute(effectiveInput);
    const parsed = FileResultSchema.safeParse(result);
    const status: TrackedFileStatus = parsed.success ? parsed.data.status : "error";
    const content = parsed.success && status === "success" ? (parsed.data.content ?? null) : null;

    try {
      stateManager.storeTrackedFile(sessionId, args.data.file_path, content, status);
    } catch (error) {
      logger.error(`Failed to track ${args.data.file_path}: ${errorMessage(error)}`);
    }

    return result;
  });
}

export function createSessionDataTool(stateManager: StateManager, sessionId: string): AgentTool {
  return defineTool({
    name: "get_session_data",
    description:
      "Get the stored analysis, code blocks, tracked files, current fix branch and fix iteration of this session",
    inputSchema: { type: "object", properties: {} },
    input: z.object({}).passthrough(),
    handler: async () => {
      const session = stateManager.requireSession(sessionId);
      const trackedFiles = stateManager.getTrackedFiles(sessionId);
      return {
        analysis_result: session.webhookData["analysis_result"] ?? "",
        code_blocks: session.webhookData["code_blocks"] ?? [],
        tracked_files: trackedFiles.map((f) => ({
          file_path: f.filePath,
          status: f.status,
          content: f.content,
        })),
        current_fix_branch: session.currentFixBranch,
        fix_iteration: session.fixIteration,
      };
    },
  });
}
