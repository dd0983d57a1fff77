// Raw records as the mailbox hands them over. Every field but the id is optional.
export interface RawMessage {
  id: string;
  threadId?: string | null;
  subject?: string | null;
  from?: string | null;
  date?: string | null;
  body?: string;
  markdown?: string;
  isStarred?: boolean;
  labels?: string[];
  raw?: RawMetadata;
}

export interface RawMetadata {
  threadId?: string;
  labelIds?: string[];
  [key: string]: unknown;
}

export interface EmailRecord {
  readonly id: string;
  readonly threadId: string;
  readonly subject: string;
  readonly sender: string;
  readonly timestamp: Date;
  readonly body: string;
  readonly markdown: string;
  readonly overridden: boolean;
  readonly labels: readonly string[];
}

export interface DateRange {
  start: Date;
  end: Date;
}

export interface ThreadRecord {
  threadId: string;
  subject: string;
  messages: EmailRecord[];
  participants: string[];
  dateRange: DateRange;
  overridden: boolean;
}
