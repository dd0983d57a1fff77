import { createInterface, type Interface } from "node:readline/promises";
import type { EmailRecord } from "../threads/index.js";
import {
  ReviewInterrupted,
  type FeedbackRequest,
  type MessageDecision,
  type MessageVerdict,
  type PolicyOutcome,
  type Reviewer,
  type ThreadAnalysis,
  type ThreadDecision,
} from "../triage/index.js";

const RULE = "=".repeat(60);
const PREVIEW_LENGTH = 500;

const MESSAGE_CHOICES: Record<string, MessageDecision> = {
  k: "keep",
  keep: "keep",
  d: "delete",
  delete: "delete",
  s: "skip",
  skip: "skip",
  u: "undo",
  undo: "undo",
  q: "quit",
  quit: "quit",
};

const THREAD_CHOICES: Record<string, ThreadDecision> = {
  k: "thread_keep",
  d: "thread_delete",
  m: "mixed",
  s: "skip",
  q: "quit",
};

export function parseMessageChoice(input: string): MessageDecision | null {
  return MESSAGE_CHOICES[input.trim().toLowerCase()] ?? null;
}

export function parseThreadChoice(input: string): ThreadDecision | null {
  return THREAD_CHOICES[input.trim().toLowerCase()] ?? null;
}

export function isYes(input: string): boolean {
  const answer = input.trim().toLowerCase();
  return answer === "y" || answer === "yes";
}

export function formatVerdictLine(verdict: MessageVerdict): string {
  return `${verdict.recommendation} - ${verdict.category} (confidence ${verdict.confidence.toFixed(2)})`;
}

export function renderThread(analysis: ThreadAnalysis): string {
  const { verdict } = analysis;
  const lines = [
    RULE,
    `THREAD: ${analysis.subject}`,
    `Messages: ${analysis.messageCount} | Participants: ${analysis.participants.join(", ")}`,
    `Date range: ${analysis.dateRange.start.toISOString().slice(0, 10)} to ${analysis.dateRange.end.toISOString().slice(0, 10)}`,
    RULE,
    `AI Analysis: ${verdict.recommendation} - ${verdict.category} (confidence ${verdict.confidence.toFixed(2)})`,
    `Reasoning: ${verdict.reasoning}`,
    "",
  ];
  analysis.messages.forEach(({ email, verdict: messageVerdict }, index) => {
    lines.push(`  ${index + 1}. ${email.sender} - ${email.subject}`);
    lines.push(`     ${formatVerdictLine(messageVerdict)}`);
  });
  return lines.join("\n");
}

export function renderMessage(email: EmailRecord, verdict: MessageVerdict): string {
  const preview =
    email.markdown.length > PREVIEW_LENGTH
      ? `${email.markdown.slice(0, PREVIEW_LENGTH)}...`
      : email.markdown;
  const lines = [
    RULE,
    `From: ${email.sender}`,
    `Subject: ${email.subject}`,
    `Date: ${email.timestamp.toISOString()}`,
    RULE,
    preview,
    "",
    `AI Analysis: ${formatVerdictLine(verdict)}`,
    `Reasoning: ${verdict.reasoning}`,
  ];
  if (verdict.keyFactors.length > 0) {
    lines.push(`Key factors: ${verdict.keyFactors.join(", ")}`);
  }
  return lines.join("\n");
}

/**
 * Terminal reviewer. Closing the input (Ctrl-D, Ctrl-C) raises
 * ReviewInterrupted from whichever prompt is waiting.
 */
export class ConsoleReviewer implements Reviewer {
  private closed = false;
  private readonly closing: Promise<null>;
  private lastShown: string | null = null;

  constructor(
    private readonly rl: Interface,
    private readonly print: (text: string) => void = console.log
  ) {
    this.closing = new Promise((resolve) => {
      rl.once("close", () => {
        this.closed = true;
        resolve(null);
      });
    });
    rl.on("SIGINT", () => rl.close());
  }

  static fromStdio(): ConsoleReviewer {
    return new ConsoleReviewer(
      createInterface({ input: process.stdin, output: process.stdout })
    );
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }

  notify(message: string): void {
    this.print(message);
  }

  async confirmThreadRecommendation(analysis: ThreadAnalysis): Promise<boolean> {
    this.showThread(analysis);
    const action = analysis.verdict.recommendation === "DELETE_THREAD" ? "delete" : "keep";
    const answer = await this.ask(
      `Accept AI recommendation to ${action} all ${analysis.messageCount} messages? (y/n): `
    );
    return isYes(answer);
  }

  async chooseThreadDecision(analysis: ThreadAnalysis): Promise<ThreadDecision> {
    this.showThread(analysis);
    for (;;) {
      const choice = parseThreadChoice(
        await this.ask(
          "[k] keep thread  [d] delete thread  [m] follow per-message  [s] skip  [q] quit: "
        )
      );
      if (choice) return choice;
      this.print("Please choose k, d, m, s or q.");
    }
  }

  async confirmAutoAccept(email: EmailRecord, verdict: MessageVerdict): Promise<boolean> {
    this.showMessage(email, verdict);
    const answer = await this.ask(
      `High-confidence ${verdict.category}. Accept ${verdict.recommendation}? (y/n): `
    );
    return isYes(answer);
  }

  async chooseMessageDecision(
    email: EmailRecord,
    verdict: MessageVerdict,
    outcome: PolicyOutcome
  ): Promise<MessageDecision> {
    this.showMessage(email, verdict);
    if (outcome.tier !== "high") {
      this.print(`Confidence is ${outcome.tier}.`);
    }
    for (;;) {
      const choice = parseMessageChoice(
        await this.ask("[k] keep  [d] delete  [s] skip  [u] undo  [q] quit: ")
      );
      if (choice) return choice;
      this.print("Please choose k, d, s, u or q.");
    }
  }

  async requestFeedback(request: FeedbackRequest): Promise<string | null> {
    const question =
      request.requirement === "required"
        ? `You chose to ${request.decision} "${request.subject}" against ${request.verdict.recommendation}. Why? (Enter for a generated explanation): `
        : "Any feedback to improve the classifier? (Enter to skip): ";
    const answer = (await this.ask(question)).trim();
    return answer ? answer : null;
  }

  private showThread(analysis: ThreadAnalysis): void {
    const key = `thread:${analysis.threadId}`;
    if (this.lastShown === key) return;
    this.lastShown = key;
    this.print(renderThread(analysis));
  }

  private showMessage(email: EmailRecord, verdict: MessageVerdict): void {
    const key = `message:${email.id}`;
    if (this.lastShown === key) return;
    this.lastShown = key;
    this.print(renderMessage(email, verdict));
  }

  private async ask(question: string): Promise<string> {
    if (this.closed) {
      throw new ReviewInterrupted("Input closed");
    }
    let answer: string | null;
    try {
      answer = await Promise.race([this.rl.question(question), this.closing]);
    } catch (error) {
      if (this.closed) throw new ReviewInterrupted("Input closed");
      throw error;
    }
    if (answer === null) {
      throw new ReviewInterrupted("Input closed");
    }
    return answer;
  }
}
