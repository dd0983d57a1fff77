export { ProcessedLedger } from "./ledger.js";
export type { LedgerEntry, LedgerAnalysis, LedgerOptions } from "./ledger.js";
