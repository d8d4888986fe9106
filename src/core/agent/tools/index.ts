import type { z } from "zod";
import type { ToolDefinition, ToolExecutor, ToolInputSchema } from "../../ai/types.js";
import { logger } from "../../../infra/logger.js";
import { errorMessage } from "../../../infra/errors.js";

export interface AgentTool {
  definition: ToolDefinition;
  execute(input: unknown): Promise<unknown>;
}

export interface ToolSpec<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  input: S;
  handler: (args: z.infer<S>) => Promise<unknown>;
}

/**
 * Bind a JSON-schema definition (what the model sees) to a zod schema (what
 * the handler trusts). Bad arguments and handler failures both come back as
 * `{ error }` so the model can read them and correct itself.
 */
export function defineTool<S extends z.ZodTypeAny>(spec: ToolSpec<S>): AgentTool {
  return {
    definition: {
      name: spec.name,
      description: spec.description,
      inputSchema: spec.inputSchema,
    },
    async execute(input: unknown): Promise<unknown> {
      const parsed = spec.input.safeParse(input ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
          .join(", ");
        return { error: `Invalid arguments for ${spec.name}: ${issues}` };
      }

      try {
        return await spec.handler(parsed.data);
      } catch (error) {
        logger.error(`Tool ${spec.name} failed: ${errorMessage(error)}`);
        return { error: errorMessage(error) };
      }
    },
  };
}

/**
 * Replace a tool's behaviour while keeping its definition
 */
export function wrapTool(
  tool: AgentTool,
  wrapper: (input: unknown, inner: AgentTool) => Promise<unknown>
): AgentTool {
  return {
    definition: tool.definition,
    execute: (input) => wrapper(input, tool),
  };
}

export class ToolSet implements ToolExecutor {
  private readonly tools = new Map<string, AgentTool>();

  constructor(tools: AgentTool[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: AgentTool): void {
    if (this.tools.has(tool.definition.name)) {
      logger.warn(`Tool ${tool.definition.name} already registered, overwriting`);
    }
    this.tools.set(tool.definition.name, tool);
  }

  get(name: string): AgentTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  definitions(): ToolDefinition[] {
    return Array.from(this.tools.values(), (tool) => tool.definition);
  }

  async execute(name: string, input: unknown): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { error: `Unknown tool: ${name}` };
    }
    return tool.execute(input);
  }
}
