export {
  ThreadAggregator,
  toEmailRecord,
  groupByThread,
  resolveThreadId,
  isOverridden,
  compareChronologically,
  uniqueParticipants,
  dateRangeOf,
  OVERRIDE_LABEL,
} from "./aggregator.js";
export type {
  RawMessage,
  RawMetadata,
  EmailRecord,
  ThreadRecord,
  DateRange,
} from "./types.js";
