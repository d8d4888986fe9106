import type { AgentProvider } from "./types.js";
import { AnthropicAgentProvider } from "./anthropic-provider.js";
import { MockAgentProvider } from "./mock-provider.js";
import type { Config } from "../../types/config.js";
import { logger } from "../../infra/logger.js";
import { ConfigurationError } from "../../infra/errors.js";

/**
 * Create the agent provider named by `llm.provider`. Built once at startup
 * and handed to everything that talks to the model.
 */
export async function createAgentProvider(config: Config): Promise<AgentProvider> {
  logger.debug("Creating agent provider", {
    provider: config.llm.provider,
    model: config.llm.model,
  });

  const provider: AgentProvider =
    config.llm.provider === "anthropic"
      ? new AnthropicAgentProvider(config.llm)
      : new MockAgentProvider();

  if (!(await provider.isAvailable())) {
    throw new ConfigurationError(
      `Agent provider "${provider.name}" is not available. ` +
        "The anthropic provider requires ANTHROPIC_API_KEY."
    );
  }

  return provider;
}
