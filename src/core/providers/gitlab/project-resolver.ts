import { logger } from "../../../infra/logger.js";
import { errorMessage } from "../../../infra/errors.js";
import type { GitLabClient } from "./gitlab-client.js";

/**
 * Map a SonarQube project key onto a GitLab project id.
 *
 * Strategies, first hit wins:
 * 1. key contains "/": look the path up directly
 * 2. project search: exact name, then path suffix, then a lone result
 * 3. key contains "_": treat it as `<group>_<project>` and search the group
 */
export async function resolveGitLabProjectId(
  gitlab: GitLabClient,
  sonarqubeKey: string
): Promise<string | null> {
  if (!sonarqubeKey) return null;

  logger.info(`Looking up GitLab project for SonarQube key: ${sonarqubeKey}`);

  if (sonarqubeKey.includes("/")) {
    try {
      const project = await gitlab.getProject(sonarqubeKey);
      logger.debug(`Found project by path: ${sonarqubeKey} -> ${project.id}`);
      return String(project.id);
    } catch (error) {
      logger.debug(`Path lookup for ${sonarqubeKey} failed: ${errorMessage(error)}`);
    }
  }

  try {
    const projects = await gitlab.searchProjects(sonarqubeKey);

    const exact = projects.find((p) => p.name === sonarqubeKey);
    if (exact) return String(exact.id);

    const bySuffix = projects.find((p) => p.path_with_namespace.endsWith(`/${sonarqubeKey}`));
    if (bySuffix) return String(bySuffix.id);

    const only = projects.length === 1 ? projects[0] : undefined;
    if (only) return String(only.id);
  } catch (error) {
    logger.warn(`Project search for ${sonarqubeKey} failed: ${errorMessage(error)}`);
  }

  const separator = sonarqubeKey.indexOf("_");
  if (separator > 0) {
    const groupName = sonarqubeKey.slice(0, separator);
    const projectName = sonarqubeKey.slice(separator + 1);

    try {
      const groups = await gitlab.searchGroups(groupName);
      for (const group of groups) {
        if (group.name.toLowerCase() !== groupName.toLowerCase()) continue;

        const projects = await gitlab.getGroupProjects(group.id, projectName);
        const match = projects.find((p) => p.name === projectName);
        if (match) return String(match.id);
      }
    } catch (error) {
      logger.warn(`Group lookup for ${sonarqubeKey} failed: ${errorMessage(error)}`);
    }
  }

  logger.error(`Could not find GitLab project for SonarQube key: ${sonarqubeKey}`);
  return null;
}
