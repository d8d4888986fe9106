export * from "./engine/index.js";
export * from "./providers/index.js";
export { StateManager } from "./state/state-manager.js";
export type { StateManagerOptions } from "./state/state-manager.js";
export { FailureAgent, extractMergeRequestUrl } from "./agent/failure-agent.js";
export type { FailureAgentOptions, ChatTurnResult } from "./agent/failure-agent.js";
export { matchIntents, classifyIntent } from "./agent/intent.js";
export type { MessageIntent } from "./agent/intent.js";
export { ToolSet, defineTool } from "./agent/tools/index.js";
export type { AgentTool } from "./agent/tools/index.js";
export { createAgentProvider } from "./ai/provider-factory.js";
export { AnthropicAgentProvider } from "./ai/anthropic-provider.js";
export { MockAgentProvider } from "./ai/mock-provider.js";
export type { AgentProvider, AgentInvocation, AgentRunResult, ToolDefinition } from "./ai/types.js";
export type { AgentResponse } from "./ai/response.js";
