export type MessageIntent = "retry" | "create_mr" | "apply_fix" | "question";

interface IntentRule {
  intent: Exclude<MessageIntent, "question">;
  /** Every group must match; a group matches when any of its phrases occurs */
  all: string[][];
}

const INTENT_RULES: readonly IntentRule[] = [
  { intent: "retry", all: [["still failing", "same error", "try again"]] },
  { intent: "create_mr", all: [["create"], ["mr", "merge request"]] },
  { intent: "apply_fix", all: [["apply"], ["fix"]] },
];

/**
 * Every intent whose rule matches the lowercased message, in rule order.
 * A message matching none is a question.
 */
export function matchIntents(message: string): Set<MessageIntent> {
  const text = message.toLowerCase();
  const matched = new Set<MessageIntent>();
  for (const rule of INTENT_RULES) {
    if (rule.all.every((group) => group.some((phrase) => text.includes(phrase)))) {
      matched.add(rule.intent);
    }
  }
  if (matched.size === 0) {
    matched.add("question");
  }
  return matched;
}

/**
 * The first matching intent
 */
export function classifyIntent(message: string): MessageIntent {
  const [first] = matchIntents(message);
  return first ?? "question";
}

/**
 * Whether the message would start another fix attempt and is therefore
 * capped. An MR request only counts once a first attempt exists.
 */
export function isGuardedRequest(intents: ReadonlySet<MessageIntent>, attemptCount: number): boolean {
  if (intents.has("retry") || intents.has("apply_fix")) return true;
  return intents.has("create_mr") && attemptCount > 0;
}

/**
 * Whether the turn should commit changes: an explicit MR request, or a fix
 * request while a fix branch is already open
 */
export function wantsMergeRequest(
  intents: ReadonlySet<MessageIntent>,
  currentFixBranch: string | null
): boolean {
  return intents.has("create_mr") || (intents.has("apply_fix") && currentFixBranch !== null);
}
