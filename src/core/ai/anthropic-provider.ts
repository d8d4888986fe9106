/**
 * Anthropic Messages API provider
 *
 * Runs the tool-use loop in process: every `tool_use` block is executed
 * through the invocation's ToolExecutor and fed back as a `tool_result`,
 * until the model stops asking for tools or the turn limit is hit.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { LLMConfig } from "../../types/config.js";
import { logger } from "../../infra/logger.js";
import { AIProviderError, errorMessage } from "../../infra/errors.js";
import type {
  AgentInvocation,
  AgentProvider,
  AgentRunResult,
  ToolCallRecord,
} from "./types.js";

type MessageParam = Anthropic.Messages.MessageParam;
type ContentBlockParam = Anthropic.Messages.ContentBlockParam;
type ToolResultBlockParam = Anthropic.Messages.ToolResultBlockParam;

export class AnthropicAgentProvider implements AgentProvider {
  readonly name = "anthropic";
  private readonly client: Anthropic | null;

  constructor(private readonly config: LLMConfig) {
    const apiKey = config.apiKey ?? process.env["ANTHROPIC_API_KEY"];
    this.client = apiKey ? new Anthropic({ apiKey, timeout: config.timeoutMs }) : null;
  }

  async isAvailable(): Promise<boolean> {
    return this.client !== null;
  }

  analyze(invocation: AgentInvocation): Promise<AgentRunResult> {
    return this.run(invocation);
  }

  chat(invocation: AgentInvocation): Promise<AgentRunResult> {
    return this.run(invocation);
  }

  private async run(invocation: AgentInvocation): Promise<AgentRunResult> {
    if (!this.client) {
      throw new AIProviderError("ANTHROPIC_API_KEY is not set");
    }

    const startTime = Date.now();
    const maxTurns = invocation.maxTurns ?? this.config.maxTurns;
    const tools = invocation.tools.definitions().map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: tool.inputSchema,
    }));
    const messages: MessageParam[] = [{ role: "user", content: invocation.prompt }];
    const toolCalls: ToolCallRecord[] = [];

    for (let turn = 1; turn <= maxTurns; turn++) {
      let response: Anthropic.Messages.Message;
      try {
        response = await this.client.messages.create({
          model: this.config.model,
          max_tokens: this.config.maxTokens,
          temperature: this.config.temperature,
          system: invocation.systemPrompt,
          messages,
          tools,
        });
      } catch (error) {
        throw new AIProviderError(
          `Anthropic request failed: ${errorMessage(error)}`,
          error instanceof Error ? error : undefined
        );
      }

      if (response.stop_reason !== "tool_use") {
        logger.debug(`Agent finished after ${turn} turn(s)`, {
          stopReason: response.stop_reason,
          toolCalls: toolCalls.length,
        });
        return { output: response, toolCalls, turns: turn, durationMs: Date.now() - startTime };
      }

      const assistantContent: ContentBlockParam[] = [];
      const results: ToolResultBlockParam[] = [];

      for (const block of response.content) {
        if (block.type === "text") {
          assistantContent.push({ type: "text", text: block.text });
        } else if (block.type === "tool_use") {
          assistantContent.push({
            type: "tool_use",
            id: block.id,
            name: block.name,
            input: block.input,
          });

          logger.debug(`Tool call: ${block.name}`);
          const result = await invocation.tools.execute(block.name, block.input);
          toolCalls.push({ name: block.name, input: block.input, result });
          results.push({
            type: "tool_result",
            tool_use_id: block.id,
            content: typeof result === "string" ? result : JSON.stringify(result, null, 2),
          });
        }
      }

      messages.push({ role: "assistant", content: assistantContent });
      messages.push({ role: "user", content: results });
    }

    throw new AIProviderError(`Agent did not finish within ${maxTurns} turns`);
  }
}
