export {
  InstructionStore,
  DEFAULT_SEED_FILE,
  FALLBACK_INSTRUCTION,
  buildImprovementLog,
  fileStamp,
  logStamp,
  snapshotFileName,
} from "./store.js";
export type {
  InstructionVersion,
  InstructionStats,
  InstructionStoreOptions,
} from "./store.js";
