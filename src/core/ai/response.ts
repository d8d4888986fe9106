import type { AgentRunResult, ToolCallRecord } from "./types.js";

/**
 * Normalised agent reply. Tool-driven replies keep the structured result of
 * the tool that mattered (currently create_merge_request) next to the text.
 */
export type AgentResponse =
  | { kind: "text"; text: string }
  | { kind: "tool_result"; text: string; tool: string; result: unknown };

// Tools whose result is part of the reply rather than intermediate evidence
const SURFACED_TOOLS = new Set(["create_merge_request"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function textFromBlocks(blocks: unknown[]): string | null {
  const parts: string[] = [];
  for (const block of blocks) {
    if (typeof block === "string") {
      parts.push(block);
    } else if (isRecord(block) && typeof block["text"] === "string") {
      parts.push(block["text"]);
    }
  }
  return parts.length > 0 ? parts.join("\n") : null;
}

/**
 * Pull the reply text out of whatever a provider returned:
 * - a plain string
 * - `{ message }`, where message is a string or itself one of these shapes
 * - `{ content }`, a string or a list of `{ text }` blocks
 * Anything else is JSON-stringified whole.
 */
export function extractText(raw: unknown): string {
  if (typeof raw === "string") return raw;
  if (raw === null || raw === undefined) return "";

  if (Array.isArray(raw)) {
    return textFromBlocks(raw) ?? stringify(raw);
  }

  if (isRecord(raw)) {
    const content = raw["content"];
    if (typeof content === "string") return content;
    if (Array.isArray(content)) {
      const text = textFromBlocks(content);
      if (text !== null) return text;
    }

    const message = raw["message"];
    if (typeof message === "string") return message;
    if (isRecord(message) || Array.isArray(message)) {
      const nested = extractText(message);
      if (nested !== stringify(message)) return nested;
    }

    if (typeof raw["text"] === "string") return raw["text"];
  }

  return stringify(raw);
}

export function decodeAgentResponse(raw: unknown, toolCalls: ToolCallRecord[] = []): AgentResponse {
  const text = extractText(raw);

  for (let i = toolCalls.length - 1; i >= 0; i--) {
    const call = toolCalls[i];
    if (call && SURFACED_TOOLS.has(call.name)) {
      return { kind: "tool_result", text, tool: call.name, result: call.result };
    }
  }

  return { kind: "text", text };
}

export function decodeRunResult(result: AgentRunResult): AgentResponse {
  return decodeAgentResponse(result.output, result.toolCalls);
}
