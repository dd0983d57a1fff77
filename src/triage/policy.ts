import { impliedDecision, type ActionDecision, type Verdict } from "./verdict.js";

export type ConfidenceTier = "high" | "medium" | "low";

export type FeedbackRequirement = "required" | "optional" | "none";

export const HIGH_CONFIDENCE = 0.8;
export const MEDIUM_CONFIDENCE = 0.5;
export const AUTO_ACCEPT_CONFIDENCE = 0.85;

// Categories unambiguous enough to offer a one-step accept.
export const AUTO_ACCEPT_CATEGORIES: ReadonlySet<string> = new Set([
  "Commercial/Marketing",
  "Time-Sensitive Expired Content",
  "Social Media & Platform Notifications",
  "Obvious Spam & Suspicious Content",
]);

export interface PolicyOutcome {
  tier: ConfidenceTier;
  offerAutoAccept: boolean;
  lowConfidenceNotice: boolean;
  impliedDecision: ActionDecision | null;
}

export function confidenceTier(confidence: number): ConfidenceTier {
  if (confidence >= HIGH_CONFIDENCE) {
    return "high";
  }
  if (confidence >= MEDIUM_CONFIDENCE) {
    return "medium";
  }
  return "low";
}

export function isAutoAcceptCandidate(verdict: Verdict): boolean {
  return (
    verdict.confidence >= AUTO_ACCEPT_CONFIDENCE &&
    AUTO_ACCEPT_CATEGORIES.has(verdict.category) &&
    impliedDecision(verdict) !== null
  );
}

export function evaluateVerdict(verdict: Verdict): PolicyOutcome {
  const tier = confidenceTier(verdict.confidence);
  return {
    tier,
    offerAutoAccept: isAutoAcceptCandidate(verdict),
    lowConfidenceNotice: tier === "low",
    impliedDecision: impliedDecision(verdict),
  };
}

/**
 * True when the operator picked the opposite of what the verdict implies.
 * Verdicts that imply no action never disagree.
 */
export function isDisagreement(
  verdict: Verdict,
  decision: ActionDecision
): boolean {
  const implied = impliedDecision(verdict);
  return implied !== null && implied !== decision;
}

export function feedbackRequirement(
  verdict: Verdict,
  decision: ActionDecision
): FeedbackRequirement {
  if (impliedDecision(verdict) === null) {
    return "none";
  }
  if (isDisagreement(verdict, decision)) {
    return "required";
  }
  return confidenceTier(verdict.confidence) === "low" ? "optional" : "none";
}
