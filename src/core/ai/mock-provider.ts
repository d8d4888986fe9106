import type { AgentInvocation, AgentProvider, AgentRunResult } from "./types.js";

/**
 * Offline provider with canned replies, for local runs and demos without an
 * API key. It never calls tools.
 */
export class MockAgentProvider implements AgentProvider {
  readonly name = "mock";

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async analyze(invocation: AgentInvocation): Promise<AgentRunResult> {
    const toolNames = invocation.tools.definitions().map((t) => t.name);
    const output = [
      "## Failure Analysis",
      "",
      "**Root Cause:** Unable to determine automatically (offline analysis).",
      "",
      "**Confidence:** 50%",
      "",
      "### Suggested next steps",
      "1. Inspect the failed job log for the first error line.",
      "2. Compare the failing commit with the last green pipeline.",
      "",
      `_Tools available to the live agent: ${toolNames.join(", ") || "none"}_`,
    ].join("\n");

    return { output, toolCalls: [], turns: 1, durationMs: 0 };
  }

  async chat(invocation: AgentInvocation): Promise<AgentRunResult> {
    const firstLine = invocation.prompt.split("\n").find((line) => line.trim() !== "") ?? "";
    const output = {
      content: [
        {
          type: "text",
          text: `Offline assistant received: ${firstLine.slice(0, 200)}`,
        },
      ],
    };
    return { output, toolCalls: [], turns: 1, durationMs: 0 };
  }
}
