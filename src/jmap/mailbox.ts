import type { RawMessage } from "../threads/index.js";
import type { JMAPClient } from "./client.js";
import type { Email, JMAPMailbox } from "./types.js";

/**
 * What the triage core needs from a mailbox. Label operations report
 * failure as false; fetch returns newest first.
 */
export interface Mailbox {
  addLabel(messageId: string, label: string): Promise<boolean>;
  removeLabel(messageId: string, label: string): Promise<boolean>;
  fetch(limit: number): Promise<RawMessage[]>;
}

export type MailboxClient = Pick<
  JMAPClient,
  | "getMailboxes"
  | "createMailbox"
  | "queryEmails"
  | "getEmails"
  | "addEmailToMailbox"
  | "removeEmailFromMailbox"
  | "addEmailKeyword"
  | "removeEmailKeyword"
>;

export const INBOX_LABEL = "INBOX";
export const STARRED_LABEL = "STARRED";
export const FLAGGED_KEYWORD = "$flagged";

export function formatSender(email: Email): string | null {
  const from = email.from?.[0];
  if (!from) return null;
  return from.name ? `${from.name} <${from.email}>` : from.email;
}

/**
 * Label names for an email: INBOX for the inbox-role mailbox, the mailbox
 * name otherwise, and STARRED when the message is flagged.
 */
export function labelsFor(
  email: Email,
  mailboxes: ReadonlyMap<string, JMAPMailbox>
): string[] {
  const labels: string[] = [];
  for (const [mailboxId, member] of Object.entries(email.mailboxIds)) {
    if (!member) continue;
    const mailbox = mailboxes.get(mailboxId);
    if (!mailbox) continue;
    labels.push(mailbox.role === "inbox" ? INBOX_LABEL : mailbox.name);
  }
  if (email.keywords[FLAGGED_KEYWORD]) {
    labels.push(STARRED_LABEL);
  }
  return labels;
}

export function toRawMessage(
  email: Email,
  mailboxes: ReadonlyMap<string, JMAPMailbox>
): RawMessage {
  const labels = labelsFor(email, mailboxes);
  return {
    id: email.id,
    threadId: email.threadId,
    subject: email.subject,
    from: formatSender(email),
    date: email.receivedAt,
    body: email.preview,
    markdown: email.preview,
    isStarred: email.keywords[FLAGGED_KEYWORD] === true,
    labels,
    raw: { threadId: email.threadId, labelIds: labels },
  };
}

/**
 * Mailbox over JMAP. Labels other than INBOX and STARRED are mailboxes,
 * created by name on first use.
 */
export class JmapMailbox implements Mailbox {
  private mailboxes: Map<string, JMAPMailbox> | null = null;

  constructor(private readonly client: MailboxClient) {}

  async addLabel(messageId: string, label: string): Promise<boolean> {
    try {
      if (label === STARRED_LABEL) {
        await this.client.addEmailKeyword(messageId, FLAGGED_KEYWORD);
        return true;
      }

      const mailbox = await this.resolve(label, true);
      if (!mailbox) return false;
      await this.client.addEmailToMailbox(messageId, mailbox.id);
      return true;
    } catch (error) {
      console.error(
        `[jmap] Failed to add label "${label}" to message ${messageId}:`,
        error instanceof Error ? error.message : error
      );
      return false;
    }
  }

  async removeLabel(messageId: string, label: string): Promise<boolean> {
    try {
      if (label === STARRED_LABEL) {
        await this.client.removeEmailKeyword(messageId, FLAGGED_KEYWORD);
        return true;
      }

      const mailbox = await this.resolve(label, false);
      if (!mailbox) {
        console.warn(`[jmap] No mailbox for label "${label}"`);
        return false;
      }
      await this.client.removeEmailFromMailbox(messageId, mailbox.id);
      return true;
    } catch (error) {
      console.error(
        `[jmap] Failed to remove label "${label}" from message ${messageId}:`,
        error instanceof Error ? error.message : error
      );
      return false;
    }
  }

  async fetch(limit: number): Promise<RawMessage[]> {
    const inbox = await this.resolve(INBOX_LABEL, false);
    if (!inbox) {
      throw new Error("Inbox mailbox not found");
    }

    const ids = await this.client.queryEmails(
      { inMailbox: inbox.id },
      { limit, sort: [{ property: "receivedAt", isAscending: false }] }
    );
    const emails = await this.client.getEmails(ids);
    const mailboxes = await this.load();

    console.log(`[jmap] Fetched ${emails.length} inbox messages`);
    return emails.map((email) => toRawMessage(email, mailboxes));
  }

  private async load(): Promise<Map<string, JMAPMailbox>> {
    if (!this.mailboxes) {
      const list = await this.client.getMailboxes();
      this.mailboxes = new Map(list.map((m) => [m.id, m]));
    }
    return this.mailboxes;
  }

  private async resolve(
    label: string,
    create: boolean
  ): Promise<JMAPMailbox | undefined> {
    const mailboxes = await this.load();
    const all = [...mailboxes.values()];

    const found =
      label === INBOX_LABEL
        ? all.find((m) => m.role === "inbox")
        : all.find((m) => m.name.toLowerCase() === label.toLowerCase());
    if (found || !create || label === INBOX_LABEL) {
      return found;
    }

    console.log(`[jmap] Creating "${label}" mailbox...`);
    const created = await this.client.createMailbox(label);
    mailboxes.set(created.id, created);
    return created;
  }
}
