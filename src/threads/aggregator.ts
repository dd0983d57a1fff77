import type {
  DateRange,
  EmailRecord,
  RawMessage,
  ThreadRecord,
} from "./types.js";

export const OVERRIDE_LABEL = "STARRED";
const SINGLE_THREAD_PREFIX = "single_";

export function resolveThreadId(raw: RawMessage): string {
  if (raw.threadId) {
    return raw.threadId;
  }

  // Transport metadata (e.g. a Gmail-style threadId)
  const transportThreadId = raw.raw?.threadId;
  if (typeof transportThreadId === "string" && transportThreadId.length > 0) {
    return transportThreadId;
  }

  return `${SINGLE_THREAD_PREFIX}${raw.id}`;
}

export function isOverridden(raw: RawMessage): boolean {
  if (raw.isStarred === true) {
    return true;
  }

  if (raw.labels?.includes(OVERRIDE_LABEL)) {
    return true;
  }

  const labelIds = raw.raw?.labelIds;
  return Array.isArray(labelIds) && labelIds.includes(OVERRIDE_LABEL);
}

function parseTimestamp(value: string | null | undefined, now: () => Date): Date {
  if (!value) {
    return now();
  }

  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? now() : parsed;
}

export function toEmailRecord(
  raw: RawMessage,
  now: () => Date = () => new Date()
): EmailRecord {
  const body = raw.body ?? "";

  return {
    id: raw.id,
    threadId: resolveThreadId(raw),
    subject: raw.subject || "No Subject",
    sender: raw.from || "Unknown Sender",
    timestamp: parseTimestamp(raw.date, now),
    body,
    markdown: raw.markdown || body,
    overridden: isOverridden(raw),
    labels: [...(raw.labels ?? [])],
  };
}

export function compareChronologically(a: EmailRecord, b: EmailRecord): number {
  const delta = a.timestamp.getTime() - b.timestamp.getTime();
  if (delta !== 0) {
    return delta;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? -1 : 1;
}

export function uniqueParticipants(messages: readonly EmailRecord[]): string[] {
  return [...new Set(messages.map((m) => m.sender))].sort();
}

export function dateRangeOf(messages: readonly EmailRecord[]): DateRange {
  const times = messages.map((m) => m.timestamp.getTime());
  return {
    start: new Date(Math.min(...times)),
    end: new Date(Math.max(...times)),
  };
}

function buildThread(threadId: string, members: EmailRecord[]): ThreadRecord {
  const messages = [...members].sort(compareChronologically);

  return {
    threadId,
    subject: messages[0].subject,
    messages,
    participants: uniqueParticipants(messages),
    dateRange: dateRangeOf(messages),
    overridden: messages.some((m) => m.overridden),
  };
}

/**
 * Group records into threads, keyed by thread id in first-seen order.
 */
export function groupByThread(
  records: readonly EmailRecord[]
): Map<string, ThreadRecord> {
  const members = new Map<string, EmailRecord[]>();

  for (const record of records) {
    const existing = members.get(record.threadId);
    if (existing) {
      existing.push(record);
    } else {
      members.set(record.threadId, [record]);
    }
  }

  const threads = new Map<string, ThreadRecord>();
  for (const [threadId, messages] of members) {
    threads.set(threadId, buildThread(threadId, messages));
  }
  return threads;
}

export class ThreadAggregator {
  constructor(private readonly now: () => Date = () => new Date()) {}

  toRecords(raws: readonly RawMessage[]): EmailRecord[] {
    return raws.map((raw) => toEmailRecord(raw, this.now));
  }

  aggregate(raws: readonly RawMessage[]): Map<string, ThreadRecord> {
    const threads = groupByThread(this.toRecords(raws));
    console.log(
      `[threads] Grouped ${raws.length} messages into ${threads.size} threads`
    );
    return threads;
  }
}
