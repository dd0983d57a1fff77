// JMAP Core Types (RFC 8620)

export interface JMAPSession {
  capabilities: Record<string, unknown>;
  primaryAccounts: Record<string, string>;
  username: string;
  apiUrl: string;
  state: string;
}

export interface JMAPRequest {
  using: string[];
  methodCalls: JMAPMethodCall[];
}

export type JMAPMethodCall = [string, Record<string, unknown>, string];

export interface JMAPResponse {
  methodResponses: JMAPMethodResponse[];
  sessionState: string;
}

export type JMAPMethodResponse = [string, Record<string, unknown>, string];

// JMAP Mail Types (RFC 8621), limited to the properties triage reads

export interface Email {
  id: string;
  threadId: string;
  mailboxIds: Record<string, boolean>;
  keywords: Record<string, boolean>;
  receivedAt: string;
  from: EmailAddress[] | null;
  subject: string | null;
  preview: string;
}

export interface EmailAddress {
  name: string | null;
  email: string;
}

export interface JMAPMailbox {
  id: string;
  name: string;
  parentId: string | null;
  role: MailboxRole | null;
  totalEmails: number;
  unreadEmails: number;
}

export type MailboxRole =
  | "all"
  | "archive"
  | "drafts"
  | "flagged"
  | "important"
  | "inbox"
  | "junk"
  | "sent"
  | "subscribed"
  | "trash"
  | null;

export interface EmailQueryFilter {
  inMailbox?: string;
  inMailboxOtherThan?: string[];
  before?: string;
  after?: string;
  hasKeyword?: string;
  notKeyword?: string;
  text?: string;
  from?: string;
  subject?: string;
}
