export {
  AnthropicClassifier,
  ClassifierError,
  parseVerdictResponse,
  buildSuggestionPrompt,
  type ClassifierAdapter,
  type ClassifierConfig,
} from "./classifier.js";
export {
  ThreadAnalyzer,
  buildThreadContext,
  buildMessageContent,
  buildThreadPrompt,
  buildMessageInThreadPrompt,
  overrideMessageVerdict,
  aggregateMessageVerdicts,
  type AnalysisPath,
  type InstructionSource,
  type MessageAssessment,
  type ThreadAnalysis,
} from "./analyzer.js";
export {
  confidenceTier,
  evaluateVerdict,
  feedbackRequirement,
  isAutoAcceptCandidate,
  isDisagreement,
  AUTO_ACCEPT_CATEGORIES,
  AUTO_ACCEPT_CONFIDENCE,
  HIGH_CONFIDENCE,
  MEDIUM_CONFIDENCE,
  type ConfidenceTier,
  type FeedbackRequirement,
  type PolicyOutcome,
} from "./policy.js";
export {
  ActionExecutor,
  DEFAULT_JUNK_LABEL,
  type ActionDetails,
  type ActionRecord,
  type ExecutorOptions,
  type UndoFailure,
  type UndoResult,
} from "./executor.js";
export { UndoStack, DEFAULT_UNDO_CAPACITY } from "./undo-stack.js";
export {
  ReviewSession,
  ReviewInterrupted,
  LOW_CONFIDENCE_NOTICE,
  defaultFeedback,
  fetchLimit,
  formatStats,
  formatSessionRecord,
  type FeedbackRequest,
  type Reviewer,
  type ReviewSessionDeps,
  type RunOptions,
  type SessionStats,
} from "./session.js";
export * from "./verdict.js";
