import type { FeedbackScope, ReviewMode, SessionRecord, Store } from "../db/index.js";
import type { InstructionStore } from "../instructions/index.js";
import type { Mailbox } from "../jmap/index.js";
import type { ProcessedLedger } from "../ledger/index.js";
import {
  ThreadAggregator,
  type EmailRecord,
  type RawMessage,
} from "../threads/index.js";
import type { MessageAssessment, ThreadAnalysis, ThreadAnalyzer } from "./analyzer.js";
import type { ClassifierAdapter } from "./classifier.js";
import type { ActionExecutor } from "./executor.js";
import {
  evaluateVerdict,
  feedbackRequirement,
  isDisagreement,
  type PolicyOutcome,
} from "./policy.js";
import {
  impliedDecision,
  type ActionDecision,
  type MessageDecision,
  type MessageVerdict,
  type ThreadDecision,
  type Verdict,
} from "./verdict.js";

/** Raised by a Reviewer when the operator closes the prompt. */
export class ReviewInterrupted extends Error {
  constructor(message = "Review interrupted") {
    super(message);
    this.name = "ReviewInterrupted";
  }
}

export interface FeedbackRequest {
  scope: FeedbackScope;
  subject: string;
  verdict: Verdict;
  decision: ActionDecision;
  // "required": the operator disagreed. "optional": agreed under low confidence.
  requirement: "required" | "optional";
}

/**
 * The human side of a review. Any method may throw ReviewInterrupted.
 */
export interface Reviewer {
  notify(message: string): void;
  confirmThreadRecommendation(analysis: ThreadAnalysis): Promise<boolean>;
  chooseThreadDecision(analysis: ThreadAnalysis): Promise<ThreadDecision>;
  confirmAutoAccept(email: EmailRecord, verdict: MessageVerdict): Promise<boolean>;
  chooseMessageDecision(
    email: EmailRecord,
    verdict: MessageVerdict,
    outcome: PolicyOutcome
  ): Promise<MessageDecision>;
  requestFeedback(request: FeedbackRequest): Promise<string | null>;
}

export interface SessionStats {
  processed: number;
  kept: number;
  deleted: number;
  aiAgreements: number;
  aiDisagreements: number;
  instructionUpdates: number;
  startTime: Date;
}

export interface ReviewSessionDeps {
  mailbox: Pick<Mailbox, "fetch">;
  ledger: Pick<ProcessedLedger, "filterUnprocessed" | "append">;
  analyzer: Pick<ThreadAnalyzer, "analyzeThread" | "analyzeMessage">;
  executor: Pick<ActionExecutor, "execute" | "undo">;
  instructions: Pick<InstructionStore, "current" | "update" | "version" | "diffSince">;
  classifier: Pick<ClassifierAdapter, "suggestUpdate">;
  reviewer: Reviewer;
  store?: Pick<Store, "saveFeedbackEvent" | "saveSession">;
  aggregator?: ThreadAggregator;
}

export interface RunOptions {
  batchSize: number;
  mode: ReviewMode;
}

export const LOW_CONFIDENCE_NOTICE =
  "AI has low confidence in this recommendation. Your input is especially valuable here!";

/**
 * How many raw messages to fetch for a batch: larger batches get a buffer
 * for messages the ledger filters out.
 */
export function fetchLimit(batchSize: number): number {
  if (batchSize >= 10) {
    return batchSize + Math.min(5, Math.floor(batchSize / 2));
  }
  return batchSize;
}

export function defaultFeedback(decision: ActionDecision, verdict: Verdict): string {
  return `User chose to ${decision} despite AI recommending ${verdict.recommendation}. Confidence was ${verdict.confidence.toFixed(2)}`;
}

export function formatStats(stats: SessionStats, now: Date = new Date()): string {
  const share = (n: number) =>
    `${((n / Math.max(1, stats.processed)) * 100).toFixed(1)}%`;
  const elapsed = Math.max(0, Math.round((now.getTime() - stats.startTime.getTime()) / 1000));

  return [
    `Emails Processed: ${stats.processed}`,
    `Kept: ${stats.kept} (${share(stats.kept)})`,
    `Deleted: ${stats.deleted} (${share(stats.deleted)})`,
    `AI Agreements: ${stats.aiAgreements} (${share(stats.aiAgreements)})`,
    `AI Disagreements: ${stats.aiDisagreements} (${share(stats.aiDisagreements)})`,
    `Instruction Updates: ${stats.instructionUpdates}`,
    `Session Time: ${elapsed}s`,
  ].join("\n");
}

/** One line per saved session, for the stats report. */
export function formatSessionRecord(session: SessionRecord): string {
  return `[${session.startedAt}] ${session.mode}: ${session.processed} processed (${session.kept} kept, ${session.deleted} deleted), ${session.instructionUpdates} instruction updates`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

type ThreadChoice = {
  decision: ThreadDecision;
  accepted: boolean;
  interrupted: boolean;
};

export class ReviewSession {
  private readonly aggregator: ThreadAggregator;
  private stats: SessionStats;

  constructor(private readonly deps: ReviewSessionDeps) {
    this.aggregator = deps.aggregator ?? new ThreadAggregator();
    this.stats = ReviewSession.freshStats();
  }

  private static freshStats(): SessionStats {
    return {
      processed: 0,
      kept: 0,
      deleted: 0,
      aiAgreements: 0,
      aiDisagreements: 0,
      instructionUpdates: 0,
      startTime: new Date(),
    };
  }

  get currentStats(): SessionStats {
    return { ...this.stats };
  }

  async fetchUnprocessed(batchSize: number): Promise<RawMessage[]> {
    const limit = fetchLimit(batchSize);
    console.log(`[session] Fetching ${limit} messages for a batch of ${batchSize}`);

    let raws: RawMessage[];
    try {
      raws = await this.deps.mailbox.fetch(limit);
    } catch (error) {
      console.error(`[session] Failed to fetch messages: ${errorMessage(error)}`);
      return [];
    }
    return this.deps.ledger.filterUnprocessed(raws, batchSize);
  }

  async run(options: RunOptions): Promise<SessionStats> {
    this.stats = ReviewSession.freshStats();

    const batch = await this.fetchUnprocessed(options.batchSize);
    if (batch.length === 0) {
      this.deps.reviewer.notify("No unprocessed emails found!");
      return this.currentStats;
    }

    if (options.mode === "thread") {
      this.deps.reviewer.notify(
        `Starting thread-aware processing with ${batch.length} emails`
      );
      await this.runThreads(batch);
    } else {
      this.deps.reviewer.notify(
        `Starting individual processing with ${batch.length} emails`
      );
      await this.runIndividual(batch);
    }

    await this.saveStats(options.mode);
    return this.currentStats;
  }

  // ============ Thread Mode ============

  private async runThreads(batch: RawMessage[]): Promise<void> {
    const threads = this.aggregator.aggregate(batch);

    for (const thread of threads.values()) {
      try {
        const analysis = await this.deps.analyzer.analyzeThread(thread);
        if (!(await this.reviewThread(analysis))) break;
      } catch (error) {
        console.error(
          `[session] Error processing thread ${thread.threadId}: ${errorMessage(error)}`
        );
      }
    }
  }

  /** Returns false when the run should stop. */
  async reviewThread(analysis: ThreadAnalysis): Promise<boolean> {
    const { reviewer } = this.deps;

    if (analysis.overridden) {
      reviewer.notify(
        `Thread "${analysis.subject}" contains starred messages - AUTO KEEP (${analysis.autoKeepReasons.join(", ")})`
      );
      for (const message of analysis.messages) {
        await this.act(message.email, "keep", message.verdict, "Auto-keep: starred thread");
      }
      return true;
    }

    const choice = await this.chooseThread(analysis);

    switch (choice.decision) {
      case "quit":
        return false;
      case "skip":
        console.log(`[session] Skipping thread ${analysis.threadId}`);
        return true;
      case "thread_keep":
      case "thread_delete": {
        const action: ActionDecision =
          choice.decision === "thread_keep" ? "keep" : "delete";
        if (!choice.accepted && !choice.interrupted) {
          await this.threadFeedback(analysis, action);
        }
        const note =
          action === "keep" ? "Thread keep decision" : "Thread delete decision";
        for (const message of analysis.messages) {
          await this.act(message.email, action, message.verdict, note);
        }
        return !choice.interrupted;
      }
      case "mixed":
        for (const message of analysis.messages) {
          const action = impliedDecision(message.verdict) ?? "keep";
          await this.act(message.email, action, message.verdict, "Mixed thread decision");
        }
        return true;
    }
  }

  private async chooseThread(analysis: ThreadAnalysis): Promise<ThreadChoice> {
    const { reviewer } = this.deps;
    const implied = impliedDecision(analysis.verdict);

    try {
      if (implied && (await reviewer.confirmThreadRecommendation(analysis))) {
        return {
          decision: implied === "keep" ? "thread_keep" : "thread_delete",
          accepted: true,
          interrupted: false,
        };
      }
      return {
        decision: await reviewer.chooseThreadDecision(analysis),
        accepted: false,
        interrupted: false,
      };
    } catch (error) {
      if (!(error instanceof ReviewInterrupted)) throw error;
      reviewer.notify("Session interrupted. Defaulting to keep thread for safety.");
      return { decision: "thread_keep", accepted: false, interrupted: true };
    }
  }

  private async threadFeedback(
    analysis: ThreadAnalysis,
    action: ActionDecision
  ): Promise<void> {
    const requirement = feedbackRequirement(analysis.verdict, action);
    if (requirement === "none") return;

    const given = await this.askFeedback({
      scope: "thread",
      subject: analysis.subject,
      verdict: analysis.verdict,
      decision: action,
      requirement,
    });
    const feedback =
      requirement === "required"
        ? given || defaultFeedback(action, analysis.verdict)
        : given;
    if (!feedback) return;

    const example = analysis.messages
      .map((m: MessageAssessment) => m.email.markdown)
      .join("\n\n");
    await this.applyFeedback({
      emailId: analysis.messages[0]?.email.id ?? analysis.threadId,
      threadId: analysis.threadId,
      scope: "thread",
      decision: action,
      verdict: analysis.verdict,
      feedback,
      example,
    });
  }

  // ============ Individual Mode ============

  private async runIndividual(batch: RawMessage[]): Promise<void> {
    const records = this.aggregator.toRecords(batch);

    for (const [index, email] of records.entries()) {
      this.deps.reviewer.notify(`Email ${index + 1}/${records.length}`);
      try {
        if (!(await this.reviewMessage(email))) break;
      } catch (error) {
        console.error(
          `[session] Error processing message ${email.id}: ${errorMessage(error)}`
        );
      }
    }
  }

  /** Returns false when the run should stop. */
  async reviewMessage(email: EmailRecord): Promise<boolean> {
    const { reviewer, executor } = this.deps;
    const verdict = await this.deps.analyzer.analyzeMessage(email);
    const outcome = evaluateVerdict(verdict);

    let decision: MessageDecision;
    let autoAccepted = false;
    try {
      if (outcome.lowConfidenceNotice) {
        reviewer.notify(LOW_CONFIDENCE_NOTICE);
      } else if (
        outcome.offerAutoAccept &&
        outcome.impliedDecision &&
        (await reviewer.confirmAutoAccept(email, verdict))
      ) {
        autoAccepted = true;
      }
      decision =
        autoAccepted && outcome.impliedDecision
          ? outcome.impliedDecision
          : await reviewer.chooseMessageDecision(email, verdict, outcome);
    } catch (error) {
      if (!(error instanceof ReviewInterrupted)) throw error;
      reviewer.notify("Session interrupted.");
      decision = "quit";
    }

    switch (decision) {
      case "quit":
        return false;
      case "skip":
        console.log(`[session] Skipping message ${email.id}`);
        return true;
      case "undo": {
        const result = await executor.undo();
        if (result.ok) {
          this.forget(result.record.decision);
          reviewer.notify("Last action undone successfully");
        } else {
          reviewer.notify(`Could not undo last action (${result.reason})`);
        }
        return true;
      }
      case "keep":
      case "delete": {
        const feedback = autoAccepted
          ? null
          : await this.messageFeedback(email, verdict, decision);
        await this.act(email, decision, verdict, feedback);
        return true;
      }
    }
  }

  private async messageFeedback(
    email: EmailRecord,
    verdict: MessageVerdict,
    decision: ActionDecision
  ): Promise<string | null> {
    // A local default after a failure has nothing to teach the classifier.
    if (verdict.source === "fallback") return null;

    const requirement = feedbackRequirement(verdict, decision);
    if (requirement === "none") return null;

    const given = await this.askFeedback({
      scope: "message",
      subject: email.subject,
      verdict,
      decision,
      requirement,
    });
    const feedback =
      requirement === "required" ? given || defaultFeedback(decision, verdict) : given;
    if (!feedback) return null;

    await this.applyFeedback({
      emailId: email.id,
      threadId: email.threadId,
      scope: "message",
      decision,
      verdict,
      feedback,
      example: email.markdown,
    });
    return feedback;
  }

  // ============ Shared Steps ============

  private async askFeedback(request: FeedbackRequest): Promise<string | null> {
    try {
      const text = await this.deps.reviewer.requestFeedback(request);
      const trimmed = text?.trim();
      return trimmed ? trimmed : null;
    } catch (error) {
      if (!(error instanceof ReviewInterrupted)) throw error;
      return null;
    }
  }

  private async applyFeedback(event: {
    emailId: string;
    threadId: string | null;
    scope: FeedbackScope;
    decision: ActionDecision;
    verdict: Verdict;
    feedback: string;
    example: string;
  }): Promise<boolean> {
    const { instructions, classifier, reviewer } = this.deps;
    const before = instructions.version;

    let updated = false;
    try {
      const suggestion = await classifier.suggestUpdate(
        instructions.current(),
        event.feedback,
        event.example
      );
      updated = await instructions.update(suggestion, event.feedback, event.example);
    } catch (error) {
      console.error(
        `[session] Instruction update failed for message ${event.emailId}: ${errorMessage(error)}`
      );
    }

    if (updated) {
      this.stats.instructionUpdates++;
      reviewer.notify(`Classifier instruction updated to version ${instructions.version}`);
      const added = instructions.diffSince(before);
      if (added) reviewer.notify(added);
    } else {
      reviewer.notify("Failed to update classifier instruction");
    }

    if (this.deps.store) {
      try {
        await this.deps.store.saveFeedbackEvent({
          emailId: event.emailId,
          threadId: event.threadId,
          scope: event.scope,
          decision: event.decision,
          recommendation: event.verdict.recommendation,
          category: event.verdict.category,
          confidence: event.verdict.confidence,
          feedback: event.feedback,
          instructionVersion: instructions.version,
          instructionUpdated: updated,
        });
      } catch (error) {
        console.error(
          `[session] Failed to save feedback for message ${event.emailId}: ${errorMessage(error)}`
        );
      }
    }

    return updated;
  }

  private async act(
    email: EmailRecord,
    decision: ActionDecision,
    verdict: MessageVerdict,
    userFeedback: string | null
  ): Promise<void> {
    await this.deps.executor.execute(email.id, decision, verdict);
    const recorded = await this.deps.ledger.append({
      email_id: email.id,
      decision,
      timestamp: new Date().toISOString(),
      user_feedback: userFeedback,
      ai_analysis: {
        recommendation: verdict.recommendation,
        category: verdict.category,
        confidence: verdict.confidence,
        reasoning: verdict.reasoning,
      },
    });
    if (!recorded) {
      this.deps.reviewer.notify(
        `WARNING: could not record message ${email.id} in the processed ledger. It will be offered again next run.`
      );
    }

    this.stats.processed++;
    if (decision === "keep") {
      this.stats.kept++;
    } else {
      this.stats.deleted++;
    }
    if (isDisagreement(verdict, decision)) {
      this.stats.aiDisagreements++;
    } else {
      this.stats.aiAgreements++;
    }
  }

  private forget(decision: ActionDecision): void {
    this.stats.processed = Math.max(0, this.stats.processed - 1);
    if (decision === "keep") {
      this.stats.kept = Math.max(0, this.stats.kept - 1);
    } else {
      this.stats.deleted = Math.max(0, this.stats.deleted - 1);
    }
  }

  private async saveStats(mode: ReviewMode): Promise<void> {
    if (!this.deps.store) return;
    try {
      await this.deps.store.saveSession({
        mode,
        startedAt: this.stats.startTime.toISOString(),
        endedAt: new Date().toISOString(),
        processed: this.stats.processed,
        kept: this.stats.kept,
        deleted: this.stats.deleted,
        aiAgreements: this.stats.aiAgreements,
        aiDisagreements: this.stats.aiDisagreements,
        instructionUpdates: this.stats.instructionUpdates,
      });
    } catch (error) {
      console.error(`[session] Failed to save session stats: ${errorMessage(error)}`);
    }
  }
}
