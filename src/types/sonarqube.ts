import { z } from "zod";

export const SonarIssueSchema = z
  .object({
    key: z.string(),
    type: z.string().optional(),
    severity: z.string().optional(),
    message: z.string().optional(),
    component: z.string().default(""),
    line: z.number().optional(),
    effort: z.string().optional(),
    rule: z.string().optional(),
  })
  .passthrough();

export const SonarIssueSearchSchema = z
  .object({
    total: z.number().optional(),
    issues: z.array(SonarIssueSchema).default([]),
  })
  .passthrough();

export const SonarProjectStatusSchema = z
  .object({
    projectStatus: z
      .object({
        status: z.string().default("NONE"),
        conditions: z.array(z.record(z.unknown())).default([]),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const SonarMeasuresSchema = z
  .object({
    component: z
      .object({
        key: z.string().optional(),
        measures: z
          .array(
            z
              .object({
                metric: z.string(),
                value: z.string().optional(),
                periods: z.array(z.object({ value: z.string().optional() }).passthrough()).optional(),
              })
              .passthrough()
          )
          .default([]),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

export const SonarRuleSchema = z
  .object({
    rule: z
      .object({
        key: z.string().optional(),
        name: z.string().optional(),
        severity: z.string().optional(),
        type: z.string().optional(),
        htmlDesc: z.string().optional(),
        remFnBaseEffort: z.string().optional(),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

export const SonarHotspotSearchSchema = z
  .object({
    hotspots: z
      .array(
        z
          .object({
            key: z.string(),
            component: z.string().default(""),
            securityCategory: z.string().optional(),
            vulnerabilityProbability: z.string().optional(),
            status: z.string().optional(),
            line: z.number().optional(),
            message: z.string().optional(),
          })
          .passthrough()
      )
      .default([]),
  })
  .passthrough();

export type SonarIssue = z.infer<typeof SonarIssueSchema>;
export type SonarProjectStatus = z.infer<typeof SonarProjectStatusSchema>;
export type SonarHotspotSearch = z.infer<typeof SonarHotspotSearchSchema>;

export type IssueType = "BUG" | "VULNERABILITY" | "CODE_SMELL";

/**
 * Issue as handed to the model: component split into the file path
 */
export interface SimplifiedIssue {
  key: string;
  type: string | null;
  severity: string | null;
  message: string | null;
  component: string;
  line: number | null;
  effort: string | null;
  rule: string | null;
  file: string;
}

export interface RuleDescription {
  key: string | null;
  name: string | null;
  severity: string | null;
  type: string | null;
  description: string;
  remediation: string;
}

// === Webhook payload ===

export const SonarQubeWebhookSchema = z
  .object({
    qualityGate: z
      .object({
        status: z.string().default(""),
        conditions: z.array(z.record(z.unknown())).optional(),
      })
      .passthrough()
      .default({}),
    project: z
      .object({
        key: z.string().default(""),
        name: z.string().optional(),
      })
      .passthrough()
      .default({}),
    branch: z
      .object({ name: z.string().default("main") })
      .passthrough()
      .default({}),
  })
  .passthrough();

export type SonarQubeWebhook = z.infer<typeof SonarQubeWebhookSchema>;
