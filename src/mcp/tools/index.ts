import { ToolSet } from "../../core/agent/tools/index.js";
import { createGitLabTools } from "../../core/agent/tools/gitlab-tools.js";
import { createSonarQubeTools } from "../../core/agent/tools/sonarqube-tools.js";
import type { GitLabClient } from "../../core/providers/gitlab/gitlab-client.js";
import type { SonarQubeClient } from "../../core/providers/sonarqube/sonarqube-client.js";

export interface ToolRegistryOptions {
  gitlab: GitLabClient;
  sonar: SonarQubeClient;
  maxLogSize: number;
}

/**
 * The session-independent tools: every GitLab and SonarQube tool the agent
 * uses, without file tracking or session data
 */
export function createToolRegistry(options: ToolRegistryOptions): ToolSet {
  return new ToolSet([
    ...createGitLabTools({ gitlab: options.gitlab, maxLogSize: options.maxLogSize }),
    ...createSonarQubeTools(options.sonar),
  ]);
}
