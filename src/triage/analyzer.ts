import type { DateRange, EmailRecord, ThreadRecord } from "../threads/index.js";
import type { ClassifierAdapter } from "./classifier.js";
import {
  DEFAULT_CONFIDENCE,
  fallbackMessageVerdict,
  messageRecommendationFor,
  toMessageVerdict,
  toThreadVerdict,
  type MessageVerdict,
  type ThreadVerdict,
} from "./verdict.js";

/** Anything that can hand out the live classifier instruction. */
export interface InstructionSource {
  current(): string;
}

export type AnalysisPath = "override" | "decisive" | "per-message";

export interface MessageAssessment {
  email: EmailRecord;
  verdict: MessageVerdict;
}

export interface ThreadAnalysis {
  threadId: string;
  subject: string;
  messageCount: number;
  participants: string[];
  dateRange: DateRange;
  path: AnalysisPath;
  // The synthesized thread recommendation, after aggregation on the
  // per-message path.
  verdict: ThreadVerdict;
  // Chronological, one per message in the thread.
  messages: MessageAssessment[];
  overridden: boolean;
  autoKeepReasons: string[];
}

const OVERRIDE_CATEGORY = "Starred Message";
const OVERRIDE_KEY_FACTORS = ["Starred message", "Auto-keep rule"];

const THREAD_ANALYSIS_SECTION = `## THREAD ANALYSIS MODE

You are analyzing an EMAIL THREAD, not just a single email. Consider:

1. **Thread Context**: The relationship between messages, conversation flow
2. **Participants**: Who is involved and their roles
3. **Evolution**: How the conversation develops over time
4. **Overall Value**: The thread's collective importance vs individual messages

## Thread-Level Decisions:
- **KEEP_THREAD**: Entire thread has value, keep all messages
- **DELETE_THREAD**: Entire thread is junk, delete all messages
- **MIXED**: Some messages valuable, others not - analyze individually

## Response Format:
\`\`\`json
{
  "recommendation": "KEEP_THREAD" | "DELETE_THREAD" | "MIXED",
  "category": "Type of conversation (e.g., work discussion, marketing, support)",
  "confidence": 0.1-1.0,
  "reasoning": "Why this thread should be kept/deleted/mixed",
  "key_factors": ["Factor 1", "Factor 2"]
}
\`\`\`

Analyze the ENTIRE thread context, not individual messages.`;

function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function formatMinute(date: Date): string {
  return date.toISOString().slice(0, 16).replace("T", " ");
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Markdown description of a whole thread: overview first, then every message
 * in chronological order with its sender, date, starred marker and labels.
 */
export function buildThreadContext(thread: ThreadRecord): string {
  const total = thread.messages.length;
  const parts: string[] = [
    "# Email Thread Analysis",
    `**Thread Subject:** ${thread.subject}`,
    `**Message Count:** ${total}`,
    `**Participants:** ${thread.participants.join(", ")}`,
    `**Date Range:** ${formatDay(thread.dateRange.start)} to ${formatDay(thread.dateRange.end)}`,
    "",
    "## Messages in Thread (chronological order)",
    "",
  ];

  thread.messages.forEach((message, index) => {
    parts.push(`### Message ${index + 1} of ${total}`);
    parts.push(`**From:** ${message.sender}`);
    parts.push(`**Date:** ${formatMinute(message.timestamp)}`);
    parts.push(`**Starred:** ${message.overridden ? "Yes" : "No"}`);
    if (message.labels.length > 0) {
      parts.push(`**Labels:** ${message.labels.join(", ")}`);
    }
    parts.push("", message.markdown, "", "---", "");
  });

  return parts.join("\n");
}

export function buildMessageContent(email: EmailRecord): string {
  return [
    `**From:** ${email.sender}`,
    `**Subject:** ${email.subject}`,
    `**Date:** ${formatMinute(email.timestamp)}`,
    "",
    email.markdown,
  ].join("\n");
}

export function buildThreadPrompt(instruction: string): string {
  return `${instruction}\n\n${THREAD_ANALYSIS_SECTION}\n`;
}

export function buildMessageInThreadPrompt(
  instruction: string,
  thread: ThreadVerdict
): string {
  return `${instruction}

## MESSAGE IN THREAD CONTEXT

**Thread Analysis:** ${thread.reasoning}
**Thread Type:** ${thread.category}

You are analyzing ONE MESSAGE within a larger thread. Consider:
- The message's individual value
- Its role in the overall conversation
- Whether it adds unique information
- Whether removing it would break thread coherence

Respond with standard JSON format for this individual message.
`;
}

export function overrideMessageVerdict(): MessageVerdict {
  return {
    scope: "message",
    recommendation: "KEEP",
    category: OVERRIDE_CATEGORY,
    confidence: 1.0,
    reasoning: "Message or thread contains starred items",
    keyFactors: [...OVERRIDE_KEY_FACTORS],
    redFlags: [],
    source: "override",
    analyzedAt: new Date().toISOString(),
  };
}

/**
 * Thread recommendation after a MIXED thread-level verdict: unanimous
 * per-message verdicts resolve the thread, anything else stays MIXED.
 */
export function aggregateMessageVerdicts(
  verdicts: readonly MessageVerdict[],
  base: ThreadVerdict
): ThreadVerdict {
  const keepCount = verdicts.filter((v) => v.recommendation === "KEEP").length;
  const deleteCount = verdicts.length - keepCount;

  const common = {
    scope: "thread" as const,
    category: base.category,
    keyFactors: [...base.keyFactors],
    redFlags: [...base.redFlags],
    source: "aggregate" as const,
    analyzedAt: new Date().toISOString(),
  };

  if (deleteCount === 0) {
    return {
      ...common,
      recommendation: "KEEP_THREAD",
      confidence: 0.9,
      reasoning: "All individual messages should be kept",
    };
  }
  if (keepCount === 0) {
    return {
      ...common,
      recommendation: "DELETE_THREAD",
      confidence: 0.9,
      reasoning: "All individual messages should be deleted",
    };
  }
  return {
    ...common,
    recommendation: "MIXED",
    confidence: 0.7,
    reasoning: `Mixed decisions: ${keepCount} keep, ${deleteCount} delete`,
  };
}

export class ThreadAnalyzer {
  constructor(
    private readonly classifier: ClassifierAdapter,
    private readonly instructions: InstructionSource
  ) {}

  async analyzeThread(thread: ThreadRecord): Promise<ThreadAnalysis> {
    if (thread.overridden) {
      return this.autoKeep(thread);
    }

    console.log(
      `[analyzer] Analyzing thread ${thread.threadId} with ${thread.messages.length} messages`
    );

    const context = buildThreadContext(thread);
    const threadVerdict = await this.scoreThread(thread.threadId, context);

    switch (threadVerdict.recommendation) {
      case "KEEP_THREAD":
      case "DELETE_THREAD": {
        const recommendation = messageRecommendationFor(
          threadVerdict.recommendation
        );
        const messages = thread.messages.map((email) => ({
          email,
          verdict: {
            ...threadVerdict,
            scope: "message" as const,
            recommendation,
            reasoning: `Thread-level decision: ${threadVerdict.reasoning}`,
            keyFactors: [...threadVerdict.keyFactors],
            redFlags: [...threadVerdict.redFlags],
            source: "thread" as const,
          },
        }));
        return this.result(thread, "decisive", threadVerdict, messages);
      }
      case "MIXED": {
        const messages: MessageAssessment[] = [];
        for (const email of thread.messages) {
          const verdict = await this.scoreMessageInThread(
            email,
            threadVerdict
          );
          messages.push({ email, verdict });
        }
        const aggregated = aggregateMessageVerdicts(
          messages.map((m) => m.verdict),
          threadVerdict
        );
        return this.result(thread, "per-message", aggregated, messages);
      }
    }
  }

  /**
   * Classify one message on its own, for individual review mode.
   */
  async analyzeMessage(email: EmailRecord): Promise<MessageVerdict> {
    if (email.overridden) {
      return overrideMessageVerdict();
    }

    try {
      const raw = await this.classifier.analyze(
        buildMessageContent(email),
        this.instructions.current()
      );
      return toMessageVerdict(raw, email.id);
    } catch (error) {
      const message = errorMessage(error);
      console.error(
        `[analyzer] Message analysis failed for message ${email.id}: ${message}`
      );
      return fallbackMessageVerdict(`Analysis error: ${message}`, "Error Fallback");
    }
  }

  private autoKeep(thread: ThreadRecord): ThreadAnalysis {
    const starred = thread.messages.filter((m) => m.overridden).length;
    const reason = `Thread contains ${starred} starred message(s)`;
    console.log(`[analyzer] Auto-keeping thread ${thread.threadId}: ${reason}`);

    const verdict: ThreadVerdict = {
      scope: "thread",
      recommendation: "KEEP_THREAD",
      category: OVERRIDE_CATEGORY,
      confidence: 1.0,
      reasoning: reason,
      keyFactors: [...OVERRIDE_KEY_FACTORS],
      redFlags: [],
      source: "override",
      analyzedAt: new Date().toISOString(),
    };
    const messages = thread.messages.map((email) => ({
      email,
      verdict: overrideMessageVerdict(),
    }));

    return {
      ...this.result(thread, "override", verdict, messages),
      autoKeepReasons: [reason],
    };
  }

  private async scoreThread(
    threadId: string,
    context: string
  ): Promise<ThreadVerdict> {
    try {
      const raw = await this.classifier.analyze(
        context,
        buildThreadPrompt(this.instructions.current())
      );
      return toThreadVerdict(raw, threadId);
    } catch (error) {
      console.error(
        `[analyzer] Thread analysis failed for thread ${threadId}: ${errorMessage(error)}`
      );
      return {
        scope: "thread",
        recommendation: "MIXED",
        category: "Unknown",
        confidence: DEFAULT_CONFIDENCE,
        reasoning: "Thread analysis failed, defaulting to individual message review",
        keyFactors: ["Analysis error"],
        redFlags: [],
        source: "fallback",
        analyzedAt: new Date().toISOString(),
      };
    }
  }

  private async scoreMessageInThread(
    email: EmailRecord,
    thread: ThreadVerdict
  ): Promise<MessageVerdict> {
    try {
      const raw = await this.classifier.analyze(
        buildMessageContent(email),
        buildMessageInThreadPrompt(this.instructions.current(), thread)
      );
      return toMessageVerdict(raw, email.id);
    } catch (error) {
      const message = errorMessage(error);
      console.error(
        `[analyzer] Message analysis failed for message ${email.id} in thread ${email.threadId}: ${message}`
      );
      return fallbackMessageVerdict(`Analysis error: ${message}`, "Error Fallback");
    }
  }

  private result(
    thread: ThreadRecord,
    path: AnalysisPath,
    verdict: ThreadVerdict,
    messages: MessageAssessment[]
  ): ThreadAnalysis {
    return {
      threadId: thread.threadId,
      subject: thread.subject,
      messageCount: thread.messages.length,
      participants: [...thread.participants],
      dateRange: thread.dateRange,
      path,
      verdict,
      messages,
      overridden: thread.overridden,
      autoKeepReasons: [],
    };
  }
}
