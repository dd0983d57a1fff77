export type MessageRecommendation = "KEEP" | "JUNK-CANDIDATE";

export type ThreadRecommendation = "KEEP_THREAD" | "DELETE_THREAD" | "MIXED";

// Where a verdict came from: the model, a thread-level propagation, a
// count over per-message verdicts, the override rule, or a local default.
export type VerdictSource =
  | "classifier"
  | "thread"
  | "aggregate"
  | "override"
  | "fallback";

interface VerdictFields {
  category: string;
  confidence: number;
  reasoning: string;
  keyFactors: string[];
  redFlags: string[];
  source: VerdictSource;
  analyzedAt: string;
}

export interface MessageVerdict extends VerdictFields {
  scope: "message";
  recommendation: MessageRecommendation;
}

export interface ThreadVerdict extends VerdictFields {
  scope: "thread";
  recommendation: ThreadRecommendation;
}

export type Verdict = MessageVerdict | ThreadVerdict;

export type MessageDecision = "keep" | "delete" | "skip" | "undo" | "quit";

export type ThreadDecision =
  | "thread_keep"
  | "thread_delete"
  | "mixed"
  | "skip"
  | "quit";

export type ActionDecision = Extract<MessageDecision, "keep" | "delete">;

/**
 * Classifier output after schema validation, before the recommendation and
 * confidence are checked against the scope they were requested for.
 */
export interface RawVerdict {
  recommendation: string;
  category: string;
  confidence: number;
  reasoning: string;
  key_factors?: string[];
  red_flags?: string[];
}

const MESSAGE_RECOMMENDATIONS: readonly MessageRecommendation[] = [
  "KEEP",
  "JUNK-CANDIDATE",
];

const THREAD_RECOMMENDATIONS: readonly ThreadRecommendation[] = [
  "KEEP_THREAD",
  "DELETE_THREAD",
  "MIXED",
];

export const SAFE_MESSAGE_RECOMMENDATION: MessageRecommendation = "KEEP";
export const SAFE_THREAD_RECOMMENDATION: ThreadRecommendation = "MIXED";
export const DEFAULT_CONFIDENCE = 0.5;

function isMessageRecommendation(value: string): value is MessageRecommendation {
  return MESSAGE_RECOMMENDATIONS.some((r) => r === value);
}

function isThreadRecommendation(value: string): value is ThreadRecommendation {
  return THREAD_RECOMMENDATIONS.some((r) => r === value);
}

function normalizeConfidence(value: number, subject: string): number {
  if (Number.isFinite(value) && value >= 0 && value <= 1) {
    return value;
  }
  console.warn(
    `[verdict] Invalid confidence ${value} for ${subject}, defaulting to ${DEFAULT_CONFIDENCE}`
  );
  return DEFAULT_CONFIDENCE;
}

function commonFields(
  raw: RawVerdict,
  subject: string,
  source: VerdictSource
): VerdictFields {
  return {
    category: raw.category,
    confidence: normalizeConfidence(raw.confidence, subject),
    reasoning: raw.reasoning,
    keyFactors: raw.key_factors ?? [],
    redFlags: raw.red_flags ?? [],
    source,
    analyzedAt: new Date().toISOString(),
  };
}

export function toMessageVerdict(
  raw: RawVerdict,
  messageId: string,
  source: VerdictSource = "classifier"
): MessageVerdict {
  const value = raw.recommendation.trim().toUpperCase();
  let recommendation = SAFE_MESSAGE_RECOMMENDATION;
  if (isMessageRecommendation(value)) {
    recommendation = value;
  } else {
    console.warn(
      `[verdict] Invalid recommendation '${raw.recommendation}' for message ${messageId}, defaulting to ${SAFE_MESSAGE_RECOMMENDATION}`
    );
  }

  return {
    scope: "message",
    recommendation,
    ...commonFields(raw, `message ${messageId}`, source),
  };
}

export function toThreadVerdict(
  raw: RawVerdict,
  threadId: string
): ThreadVerdict {
  const value = raw.recommendation.trim().toUpperCase();
  let recommendation = SAFE_THREAD_RECOMMENDATION;
  if (isThreadRecommendation(value)) {
    recommendation = value;
  } else {
    console.warn(
      `[verdict] Invalid recommendation '${raw.recommendation}' for thread ${threadId}, defaulting to ${SAFE_THREAD_RECOMMENDATION}`
    );
  }

  return {
    scope: "thread",
    recommendation,
    ...commonFields(raw, `thread ${threadId}`, "classifier"),
  };
}

export function fallbackMessageVerdict(
  reasoning: string,
  category = "Analysis Failed"
): MessageVerdict {
  return {
    scope: "message",
    recommendation: SAFE_MESSAGE_RECOMMENDATION,
    category,
    confidence: DEFAULT_CONFIDENCE,
    reasoning,
    keyFactors: ["Analysis error"],
    redFlags: [],
    source: "fallback",
    analyzedAt: new Date().toISOString(),
  };
}

/**
 * The mailbox action a verdict points at, or null when it points at none.
 */
export function impliedDecision(verdict: Verdict): ActionDecision | null {
  switch (verdict.recommendation) {
    case "KEEP":
    case "KEEP_THREAD":
      return "keep";
    case "JUNK-CANDIDATE":
    case "DELETE_THREAD":
      return "delete";
    case "MIXED":
      return null;
  }
}

export function messageRecommendationFor(
  recommendation: Exclude<ThreadRecommendation, "MIXED">
): MessageRecommendation {
  switch (recommendation) {
    case "KEEP_THREAD":
      return "KEEP";
    case "DELETE_THREAD":
      return "JUNK-CANDIDATE";
  }
}
