export { JMAPClient, MAIL_CAPABILITY } from "./client.js";
export {
  JmapMailbox,
  toRawMessage,
  labelsFor,
  formatSender,
  INBOX_LABEL,
  STARRED_LABEL,
  FLAGGED_KEYWORD,
} from "./mailbox.js";
export type { Mailbox, MailboxClient } from "./mailbox.js";
export type {
  Email,
  EmailAddress,
  EmailQueryFilter,
  JMAPMailbox,
  MailboxRole,
} from "./types.js";
