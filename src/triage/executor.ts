import { INBOX_LABEL, type Mailbox } from "../jmap/index.js";
import type { ProcessedLedger } from "../ledger/index.js";
import { DEFAULT_UNDO_CAPACITY, UndoStack } from "./undo-stack.js";
import type { ActionDecision, Verdict } from "./verdict.js";

export const DEFAULT_JUNK_LABEL = "Junk-Candidate";

// Exactly what happened in the mailbox for one action.
export type ActionDetails =
  | {
      kind: "junk-labelled";
      labelAdded: string;
      inboxRemoved: boolean;
      // Set by undo once INBOX has been put back.
      inboxRestored: boolean;
    }
  | { kind: "kept" }
  | { kind: "failed"; label: string };

export interface ActionRecord {
  messageId: string;
  decision: ActionDecision;
  timestamp: string;
  verdict: Verdict;
  executed: boolean;
  reversible: boolean;
  details: ActionDetails;
}

export type UndoFailure =
  | "empty"
  | "not-reversible"
  | "mailbox-failed"
  | "ledger-failed";

export type UndoResult =
  | { ok: true; record: ActionRecord }
  | { ok: false; reason: UndoFailure };

export interface ExecutorOptions {
  junkLabel?: string;
  undoCapacity?: number;
}

export class ActionExecutor {
  private readonly stack: UndoStack<ActionRecord>;
  private readonly junkLabel: string;

  constructor(
    private readonly mailbox: Pick<Mailbox, "addLabel" | "removeLabel">,
    private readonly ledger: Pick<ProcessedLedger, "remove">,
    options: ExecutorOptions = {}
  ) {
    this.junkLabel = options.junkLabel ?? DEFAULT_JUNK_LABEL;
    this.stack = new UndoStack(options.undoCapacity ?? DEFAULT_UNDO_CAPACITY);
  }

  async execute(
    messageId: string,
    decision: ActionDecision,
    verdict: Verdict
  ): Promise<ActionRecord> {
    const record = await this.apply(messageId, decision, verdict);
    this.stack.push(record);
    return record;
  }

  /**
   * Reverse the most recent action only. Older entries stay in history for
   * inspection.
   */
  async undo(): Promise<UndoResult> {
    const record = this.stack.peek();
    if (!record) {
      console.warn("[executor] No recent actions to undo");
      return { ok: false, reason: "empty" };
    }

    if (!record.executed || !record.reversible) {
      console.warn(
        `[executor] Last action on message ${record.messageId} cannot be undone`
      );
      return { ok: false, reason: "not-reversible" };
    }

    const details = await this.revert(record.messageId, record.details);
    if (!details) {
      console.error(`[executor] Failed to undo action on message ${record.messageId}`);
      return { ok: false, reason: "mailbox-failed" };
    }

    if (!(await this.ledger.remove(record.messageId))) {
      console.error(
        `[executor] Ledger still lists message ${record.messageId}, re-applying its action`
      );
      await this.reapply(record.messageId, record.details);
      return { ok: false, reason: "ledger-failed" };
    }

    this.stack.pop();
    return { ok: true, record: { ...record, details } };
  }

  /** Most recent first. */
  recentActions(): readonly ActionRecord[] {
    return this.stack.history();
  }

  get undoCapacity(): number {
    return this.stack.capacity;
  }

  private async apply(
    messageId: string,
    decision: ActionDecision,
    verdict: Verdict
  ): Promise<ActionRecord> {
    const base = {
      messageId,
      decision,
      timestamp: new Date().toISOString(),
      verdict,
    };

    switch (decision) {
      case "keep":
        console.log(`[executor] Keeping message ${messageId} (no mailbox change)`);
        return {
          ...base,
          executed: true,
          reversible: true,
          details: { kind: "kept" },
        };
      case "delete": {
        const added = await this.call(
          () => this.mailbox.addLabel(messageId, this.junkLabel),
          `add '${this.junkLabel}' to message ${messageId}`
        );
        if (!added) {
          console.error(
            `[executor] Failed to apply '${this.junkLabel}' to message ${messageId}`
          );
          return {
            ...base,
            executed: false,
            reversible: false,
            details: { kind: "failed", label: this.junkLabel },
          };
        }

        const inboxRemoved = await this.call(
          () => this.mailbox.removeLabel(messageId, INBOX_LABEL),
          `remove ${INBOX_LABEL} from message ${messageId}`
        );
        if (inboxRemoved) {
          console.log(
            `[executor] Applied '${this.junkLabel}' and removed ${INBOX_LABEL} for message ${messageId}`
          );
        } else {
          console.warn(
            `[executor] Applied '${this.junkLabel}' to message ${messageId} (${INBOX_LABEL} removal failed)`
          );
        }
        return {
          ...base,
          executed: true,
          reversible: true,
          details: {
            kind: "junk-labelled",
            labelAdded: this.junkLabel,
            inboxRemoved,
            inboxRestored: false,
          },
        };
      }
    }
  }

  /**
   * Undo the mailbox side of an action. A JMAP message must stay in at least
   * one mailbox, so INBOX goes back before the junk label comes off. Returns
   * the details after the undo, or null if the mailbox was left as it was.
   */
  private async revert(
    messageId: string,
    details: ActionDetails
  ): Promise<ActionDetails | null> {
    switch (details.kind) {
      case "kept":
        console.log(`[executor] Undid keep of message ${messageId}`);
        return details;
      case "failed":
        return null;
      case "junk-labelled": {
        const label = details.labelAdded;
        if (details.inboxRemoved) {
          const restored = await this.call(
            () => this.mailbox.addLabel(messageId, INBOX_LABEL),
            `restore ${INBOX_LABEL} for message ${messageId}`
          );
          if (!restored) return null;
        }

        const removed = await this.call(
          () => this.mailbox.removeLabel(messageId, label),
          `remove '${label}' from message ${messageId}`
        );
        if (!removed) {
          if (details.inboxRemoved) {
            await this.call(
              () => this.mailbox.removeLabel(messageId, INBOX_LABEL),
              `remove restored ${INBOX_LABEL} from message ${messageId}`
            );
          }
          return null;
        }

        console.log(
          `[executor] Undid delete: removed '${label}' from message ${messageId}`
        );
        return { ...details, inboxRestored: details.inboxRemoved };
      }
    }
  }

  private async reapply(messageId: string, details: ActionDetails): Promise<void> {
    if (details.kind !== "junk-labelled") return;

    const label = details.labelAdded;
    await this.call(
      () => this.mailbox.addLabel(messageId, label),
      `re-add '${label}' to message ${messageId}`
    );
    if (details.inboxRemoved) {
      await this.call(
        () => this.mailbox.removeLabel(messageId, INBOX_LABEL),
        `remove ${INBOX_LABEL} from message ${messageId}`
      );
    }
  }

  private async call(
    operation: () => Promise<boolean>,
    description: string
  ): Promise<boolean> {
    try {
      return await operation();
    } catch (error) {
      console.error(
        `[executor] Mailbox call failed (${description}):`,
        error instanceof Error ? error.message : error
      );
      return false;
    }
  }
}
