import { z } from "zod";

export const AnalysisSummarySchema = z
  .object({
    root_cause: z.string(),
    confidence: z.number().min(0).max(100),
    fixes: z.array(z.unknown()).default([]),
    reasoning: z.string().optional(),
    response_text: z.string().optional(),
  })
  .passthrough();

export type AnalysisSummary = z.infer<typeof AnalysisSummarySchema>;

const FENCED_JSON = /```json\s*([\s\S]*?)\s*```/g;
const FENCED_ANY = /```[a-zA-Z]*\s*([\s\S]*?)\s*```/g;
const ROOT_CAUSE_LINE = /\*{0,2}root cause\*{0,2}\s*:\*{0,2}\s*(.+)/i;
const CONFIDENCE_LINE = /\*{0,2}confidence\*{0,2}\s*:\*{0,2}\s*(\d{1,3})\s*%?/i;

/**
 * Bodies of the fenced code blocks in a reply, in order
 */
export function extractCodeBlocks(text: string): string[] {
  return Array.from(text.matchAll(FENCED_ANY), (m) => m[1] ?? "").filter((b) => b.length > 0);
}

function firstBalancedObject(text: string): string | null {
  const start = text.indexOf("{");
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

function tryParse(candidate: string): AnalysisSummary | null {
  try {
    const result = AnalysisSummarySchema.safeParse(JSON.parse(candidate));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

/**
 * Best-effort structured reading of an analysis reply.
 *
 * Tries fenced JSON, any fenced block, then the first balanced object; then
 * the "Root Cause:" / "Confidence:" lines the analysis prompt asks for.
 * Falls back to confidence 50 for free text and 0 for an empty reply.
 */
export function parseAnalysis(text: string): AnalysisSummary {
  if (text.trim() === "") {
    return {
      root_cause: "Empty response",
      confidence: 0,
      fixes: [],
      reasoning: "The agent returned no text",
      response_text: text,
    };
  }

  const candidates = [
    ...Array.from(text.matchAll(FENCED_JSON), (m) => m[1] ?? ""),
    ...extractCodeBlocks(text),
  ];
  const balanced = firstBalancedObject(text);
  if (balanced) candidates.push(balanced);

  for (const candidate of candidates) {
    const parsed = tryParse(candidate.trim());
    if (parsed) return parsed;
  }

  const rootCause = ROOT_CAUSE_LINE.exec(text)?.[1]?.trim();
  const confidence = Number(CONFIDENCE_LINE.exec(text)?.[1]);
  if (rootCause && Number.isFinite(confidence)) {
    return {
      root_cause: rootCause,
      confidence: Math.min(100, confidence),
      fixes: [],
      response_text: text,
    };
  }

  return {
    root_cause: "Unable to parse structured response",
    confidence: 50,
    fixes: [],
    reasoning: "Response was not in expected JSON format",
    response_text: text,
  };
}
