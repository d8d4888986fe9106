import type { Config } from "../../types/config.js";
import type { AgentProvider } from "../ai/types.js";
import { createAgentProvider } from "../ai/provider-factory.js";
import { StateManager } from "../state/state-manager.js";
import { GitLabClient } from "../providers/gitlab/gitlab-client.js";
import { SonarQubeClient } from "../providers/sonarqube/sonarqube-client.js";
import { FailureAgent } from "../agent/failure-agent.js";
import { getDatabasePath } from "../../cli/config/loader.js";
import { AnalysisRunner } from "./analysis-runner.js";
import { SessionService } from "./session-service.js";
import { WebhookRouter } from "./webhook-router.js";
import { ExpirySweeper } from "./expiry-sweeper.js";
import { ApiServer } from "./api-server.js";

export interface AssistantOverrides {
  provider?: AgentProvider;
  stateManager?: StateManager;
  now?: () => Date;
  version?: string;
}

/**
 * Everything the server needs, wired once from configuration
 */
export interface Assistant {
  config: Config;
  provider: AgentProvider;
  stateManager: StateManager;
  gitlab: GitLabClient;
  sonar: SonarQubeClient;
  agent: FailureAgent;
  runner: AnalysisRunner;
  sessions: SessionService;
  router: WebhookRouter;
  sweeper: ExpirySweeper;
  server: ApiServer;
  close(): Promise<void>;
}

export async function createAssistant(
  config: Config,
  overrides: AssistantOverrides = {}
): Promise<Assistant> {
  const provider = overrides.provider ?? (await createAgentProvider(config));
  const stateManager =
    overrides.stateManager ??
    new StateManager(getDatabasePath(config), {
      maxFixAttempts: config.assistant.maxFixAttempts,
      sessionTimeoutMinutes: config.assistant.sessionTimeoutMinutes,
    });

  const gitlab = new GitLabClient({
    baseUrl: config.gitlab.url,
    token: config.gitlab.token,
    timeoutMs: config.http.timeoutMs,
  });
  const sonar = new SonarQubeClient({
    baseUrl: config.sonarqube.url,
    token: config.sonarqube.token,
    timeoutMs: config.http.timeoutMs,
  });

  const agent = new FailureAgent({
    provider,
    stateManager,
    gitlab,
    sonar,
    assistant: config.assistant,
    ...(overrides.now ? { now: overrides.now } : {}),
  });
  const runner = new AnalysisRunner({ agent, stateManager, sonar });
  const sessions = new SessionService(stateManager, agent);
  const router = new WebhookRouter({
    stateManager,
    gitlab,
    runner,
    sessions,
    gitlabUrl: config.gitlab.url,
    ...(overrides.now ? { now: overrides.now } : {}),
  });
  const sweeper = new ExpirySweeper(stateManager, config.assistant.cleanupIntervalMs);
  const server = new ApiServer({
    config: config.server,
    router,
    sessions,
    stateManager,
    sweeper,
    ...(overrides.version ? { version: overrides.version } : {}),
  });

  return {
    config,
    provider,
    stateManager,
    gitlab,
    sonar,
    agent,
    runner,
    sessions,
    router,
    sweeper,
    server,
    async close() {
      sweeper.stop();
      await server.stop();
      await runner.idle();
      stateManager.close();
    },
  };
}
