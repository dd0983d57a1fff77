import type { Client } from "@libsql/client";
import type { Settings } from "./config.js";
import { createDbClient, initializeDatabase, Store } from "./db/index.js";
import { InstructionStore } from "./instructions/index.js";
import { JMAPClient, JmapMailbox } from "./jmap/index.js";
import { ProcessedLedger, type LedgerOptions } from "./ledger/index.js";
import {
  ActionExecutor,
  AnthropicClassifier,
  ThreadAnalyzer,
} from "./triage/index.js";

export interface Services {
  settings: Settings;
  db: Client;
  store: Store;
  jmap: JMAPClient;
  mailbox: JmapMailbox;
  ledger: ProcessedLedger;
  instructions: InstructionStore;
  classifier: AnthropicClassifier;
  analyzer: ThreadAnalyzer;
  executor: ActionExecutor;
}

export interface ServiceOptions {
  // Skip the JMAP session request, for commands that only read local state.
  connectMailbox?: boolean;
  onQuarantine?: LedgerOptions["onQuarantine"];
}

export async function initServices(
  settings: Settings,
  options: ServiceOptions = {}
): Promise<Services> {
  // Initialize database
  const db = createDbClient({
    databaseUrl: settings.databaseUrl,
    databaseAuthToken: settings.databaseAuthToken,
  });
  await initializeDatabase(db);
  const store = new Store(db);

  // Initialize JMAP client
  const jmap = new JMAPClient(settings.jmapSessionUrl, settings.jmapToken);
  if (options.connectMailbox ?? true) {
    await jmap.connect();
  }
  const mailbox = new JmapMailbox(jmap);

  // Local state
  const ledger = await ProcessedLedger.open(settings.ledgerFile, {
    onQuarantine: options.onQuarantine,
  });
  const instructions = await InstructionStore.open({
    instructionsFile: settings.instructionsFile,
    historyDir: settings.instructionHistoryDir,
  });

  // Triage pipeline
  const classifier = new AnthropicClassifier({
    apiKey: settings.anthropicApiKey,
    model: settings.classifierModel,
    maxTokens: settings.classifierMaxTokens,
    timeoutSeconds: settings.classifierTimeoutSeconds,
  });
  const analyzer = new ThreadAnalyzer(classifier, instructions);
  const executor = new ActionExecutor(mailbox, ledger, {
    junkLabel: settings.junkLabel,
    undoCapacity: settings.undoCapacity,
  });

  return {
    settings,
    db,
    store,
    jmap,
    mailbox,
    ledger,
    instructions,
    classifier,
    analyzer,
    executor,
  };
}
