/**
 * Types for the agent provider abstraction
 */

/** JSON schema of a tool's arguments, as both the Messages API and MCP expect it */
export interface ToolInputSchema {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface ToolCallRecord {
  name: string;
  input: unknown;
  result: unknown;
}

/**
 * Something that can list and run tools on the model's behalf
 */
export interface ToolExecutor {
  definitions(): ToolDefinition[];
  /** Runs a tool; failures come back as `{ error }` values, never as throws */
  execute(name: string, input: unknown): Promise<unknown>;
}

export interface AgentInvocation {
  systemPrompt: string;
  prompt: string;
  tools: ToolExecutor;
  /** Maximum model round-trips, defaults to the provider's configuration */
  maxTurns?: number;
}

export interface AgentRunResult {
  /** Provider-specific final output, decoded by decodeAgentResponse */
  output: unknown;
  toolCalls: ToolCallRecord[];
  turns: number;
  durationMs: number;
}

export interface AgentProvider {
  /** Provider name for logging */
  readonly name: string;

  /** First-pass investigation of a failure */
  analyze(invocation: AgentInvocation): Promise<AgentRunResult>;

  /** A conversational turn: questions, retries, fix and MR requests */
  chat(invocation: AgentInvocation): Promise<AgentRunResult>;

  /** Check if the provider is configured */
  isAvailable(): Promise<boolean>;
}
