import { vi } from "vitest";
import type {
  AgentInvocation,
  AgentProvider,
  AgentRunResult,
  ToolCallRecord,
} from "../../src/core/ai/types.js";

export interface FakeRoute {
  method?: string;
  path: string | RegExp;
  status?: number;
  body?: unknown;
}

export interface RecordedCall {
  method: string;
  url: URL;
  headers: Record<string, string>;
  body: unknown;
}

/**
 * Answer fetch from a route table. Unmatched requests get a GitLab-style 404.
 * Routes are matched against the URL pathname; earlier routes win.
 */
export function stubFetch(routes: FakeRoute[]): { calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];

  vi.spyOn(globalThis, "fetch").mockImplementation(async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    const method = init?.method ?? "GET";
    const headers: Record<string, string> = {};
    if (init?.headers && !(init.headers instanceof Headers) && !Array.isArray(init.headers)) {
      Object.assign(headers, init.headers);
    }
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    calls.push({ method, url, headers, body });

    const route = routes.find(
      (r) =>
        (r.method ?? "GET") === method &&
        (typeof r.path === "string" ? url.pathname === r.path : r.path.test(url.pathname))
    );
    if (!route) {
      return new Response(JSON.stringify({ message: "404 Not Found" }), { status: 404 });
    }

    const payload = typeof route.body === "string" ? route.body : JSON.stringify(route.body ?? {});
    return new Response(payload, { status: route.status ?? 200 });
  });

  return { calls };
}

export interface FakeReply {
  output: unknown;
  toolCalls?: ToolCallRecord[];
}

export type FakeStep = (invocation: AgentInvocation) => FakeReply | Promise<FakeReply>;

/**
 * Agent provider that replays scripted steps in order and records every
 * invocation. Once the script runs out it answers with plain text.
 */
export class FakeAgentProvider implements AgentProvider {
  readonly name = "fake";
  readonly invocations: Array<{ mode: "analyze" | "chat"; invocation: AgentInvocation }> = [];
  private readonly script: FakeStep[];

  constructor(script: FakeStep[] = []) {
    this.script = [...script];
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  analyze(invocation: AgentInvocation): Promise<AgentRunResult> {
    return this.step("analyze", invocation);
  }

  chat(invocation: AgentInvocation): Promise<AgentRunResult> {
    return this.step("chat", invocation);
  }

  private async step(mode: "analyze" | "chat", invocation: AgentInvocation): Promise<AgentRunResult> {
    this.invocations.push({ mode, invocation });
    const next = this.script.shift();
    const reply: FakeReply = next ? await next(invocation) : { output: "Nothing more to add." };
    return { output: reply.output, toolCalls: reply.toolCalls ?? [], turns: 1, durationMs: 0 };
  }
}

/**
 * Step that runs one tool through the invocation's executor, the way a
 * provider would, and replies with `text`
 */
export function callTool(name: string, input: unknown, text: string): FakeStep {
  return async (invocation) => {
    const result = await invocation.tools.execute(name, input);
    return { output: text, toolCalls: [{ name, input, result }] };
  };
}
