export interface Settings {
  anthropicApiKey: string;
  jmapToken: string;
  jmapSessionUrl: string;
  databaseUrl: string;
  databaseAuthToken?: string;
  classifierModel: string;
  classifierMaxTokens: number;
  classifierTimeoutSeconds: number;
  junkLabel: string;
  batchSize: number;
  undoCapacity: number;
  ledgerFile: string;
  instructionsFile: string;
  instructionHistoryDir: string;
}

export type Env = Record<string, string | undefined>;

export const REQUIRED_KEYS = ["ANTHROPIC_API_KEY", "JMAP_TOKEN"] as const;

export const DEFAULTS = {
  jmapSessionUrl: "https://api.fastmail.com/jmap/session",
  databaseUrl: "file:triage.db",
  classifierModel: "claude-haiku-4-5",
  classifierMaxTokens: 500,
  classifierTimeoutSeconds: 30,
  junkLabel: "Junk-Candidate",
  batchSize: 10,
  undoCapacity: 10,
  ledgerFile: "processed_log.jsonl",
  instructionsFile: "data/instructions.md",
  instructionHistoryDir: "data/instruction_history",
} as const;

export function validateSettings(
  env: Env,
  required: readonly string[] = REQUIRED_KEYS
): void {
  const missing = required.filter((key) => !env[key]);
  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missing.join(", ")}`
    );
  }
}

/** Positive integer from the environment, or the fallback. */
export function positiveInt(value: string | undefined, fallback: number): number {
  if (!value || !/^\s*\d+\s*$/.test(value)) return fallback;
  const parsed = parseInt(value, 10);
  return parsed >= 1 ? parsed : fallback;
}

export function loadSettings(env: Env = process.env): Settings {
  validateSettings(env);

  return {
    anthropicApiKey: env.ANTHROPIC_API_KEY ?? "",
    jmapToken: env.JMAP_TOKEN ?? "",
    jmapSessionUrl: env.JMAP_SESSION_URL || DEFAULTS.jmapSessionUrl,
    databaseUrl: env.TURSO_DATABASE_URL || DEFAULTS.databaseUrl,
    databaseAuthToken: env.TURSO_AUTH_TOKEN || undefined,
    classifierModel: env.CLASSIFIER_MODEL || DEFAULTS.classifierModel,
    classifierMaxTokens: positiveInt(
      env.CLASSIFIER_MAX_TOKENS,
      DEFAULTS.classifierMaxTokens
    ),
    classifierTimeoutSeconds: positiveInt(
      env.CLASSIFIER_TIMEOUT_SECONDS,
      DEFAULTS.classifierTimeoutSeconds
    ),
    junkLabel: env.JUNK_LABEL || DEFAULTS.junkLabel,
    batchSize: positiveInt(env.BATCH_SIZE, DEFAULTS.batchSize),
    undoCapacity: positiveInt(env.UNDO_CAPACITY, DEFAULTS.undoCapacity),
    ledgerFile: env.LEDGER_FILE || DEFAULTS.ledgerFile,
    instructionsFile: env.INSTRUCTIONS_FILE || DEFAULTS.instructionsFile,
    instructionHistoryDir:
      env.INSTRUCTION_HISTORY_DIR || DEFAULTS.instructionHistoryDir,
  };
}
