import { z } from "zod";
import { logger } from "../../../infra/logger.js";
import { errorMessage } from "../../../infra/errors.js";
import type { SonarQubeClient } from "../../providers/sonarqube/sonarqube-client.js";
import { defineTool, type AgentTool } from "./index.js";

const projectKeyProperty = { type: "string", description: "SonarQube project key" };

export function createSonarQubeTools(sonar: SonarQubeClient): AgentTool[] {
  return [
    defineTool({
      name: "get_quality_gate_status",
      description: "Get the quality gate status of a project and the conditions that failed",
      inputSchema: {
        type: "object",
        properties: { project_key: projectKeyProperty },
        required: ["project_key"],
      },
      input: z.object({ project_key: z.string().min(1) }),
      handler: async ({ project_key }) => sonar.getQualityGateStatus(project_key),
    }),

    defineTool({
      name: "get_project_issues",
      description: "List unresolved issues of a project, optionally filtered by type and severity",
      inputSchema: {
        type: "object",
        properties: {
          project_key: projectKeyProperty,
          types: { type: "string", description: "Comma-separated: BUG,VULNERABILITY,CODE_SMELL" },
          severities: {
            type: "string",
            description: "Comma-separated: BLOCKER,CRITICAL,MAJOR,MINOR,INFO",
          },
          limit: { type: "number", description: "Maximum number of issues (default 100)" },
        },
        required: ["project_key"],
      },
      input: z.object({
        project_key: z.string().min(1),
        types: z.string().optional(),
        severities: z.string().optional(),
        limit: z.number().int().positive().max(500).default(100),
      }),
      handler: async ({ project_key, types, severities, limit }) => {
        try {
          return await sonar.getIssues(project_key, { types, severities, limit });
        } catch (error) {
          // An empty list reads as "nothing to fix"; say why instead
          logger.error(`Failed to get project issues: ${errorMessage(error)}`);
          return { error: errorMessage(error), issues: [] };
        }
      },
    }),

    defineTool({
      name: "get_project_metrics",
      description: "Get coverage, duplication, ratings and issue counts for a project",
      inputSchema: {
        type: "object",
        properties: { project_key: projectKeyProperty },
        required: ["project_key"],
      },
      input: z.object({ project_key: z.string().min(1) }),
      handler: async ({ project_key }) => sonar.getMetrics(project_key),
    }),

    defineTool({
      name: "get_issue_details",
      description: "Get the full record of a single issue",
      inputSchema: {
        type: "object",
        properties: { issue_key: { type: "string", description: "SonarQube issue key" } },
        required: ["issue_key"],
      },
      input: z.object({ issue_key: z.string().min(1) }),
      handler: async ({ issue_key }) => (await sonar.getIssue(issue_key)) ?? { error: "Issue not found" },
    }),

    defineTool({
      name: "get_rule_description",
      description: "Get a rule's description and remediation effort",
      inputSchema: {
        type: "object",
        properties: { rule_key: { type: "string", description: "SonarQube rule key" } },
        required: ["rule_key"],
      },
      input: z.object({ rule_key: z.string().min(1) }),
      handler: async ({ rule_key }) => sonar.getRule(rule_key),
    }),

    defineTool({
      name: "get_security_hotspots",
      description: "List security hotspots that still need review",
      inputSchema: {
        type: "object",
        properties: {
          project_key: projectKeyProperty,
          limit: { type: "number", description: "Maximum number of hotspots (default 100)" },
        },
        required: ["project_key"],
      },
      input: z.object({
        project_key: z.string().min(1),
        limit: z.number().int().positive().max(500).default(100),
      }),
      handler: async ({ project_key, limit }) => sonar.getSecurityHotspots(project_key, limit),
    }),
  ];
}
