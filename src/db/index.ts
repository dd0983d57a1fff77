export { createDbClient, initializeDatabase } from "./schema.js";
export type { DbSettings } from "./schema.js";
export { Store } from "./store.js";
export type {
  FeedbackEvent,
  FeedbackScope,
  ReviewMode,
  ReviewTotals,
  SessionRecord,
} from "./store.js";
