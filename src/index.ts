#!/usr/bin/env node
import { config } from "dotenv";
config();

import { parseCliArgs, USAGE, type CliOptions } from "./cli/args.js";
import { ConsoleReviewer } from "./cli/reviewer.js";
import { loadSettings, type Settings } from "./config.js";
import { initServices, type Services } from "./services.js";
import { formatSessionRecord, formatStats, ReviewSession } from "./triage/index.js";

async function runValidate(settings: Settings): Promise<void> {
  console.log(`Database: ${settings.databaseUrl}`);
  console.log(`Classifier model: ${settings.classifierModel}`);
  console.log(`Ledger: ${settings.ledgerFile}`);

  const services = await initServices(settings);
  try {
    console.log(`\nJMAP connection established (${services.jmap.username ?? "unknown user"})`);

    const inbox = await services.jmap.findMailboxByRole("inbox");
    if (!inbox) {
      throw new Error("Inbox mailbox not found");
    }
    console.log(`Inbox has ${inbox.totalEmails} emails (${inbox.unreadEmails} unread)`);

    const stats = await services.instructions.stats();
    console.log(
      `Instructions: version ${stats.currentVersion}, ${stats.instructionLength} characters, ${stats.snapshotCount} snapshots`
    );
    console.log(`Processed ledger: ${services.ledger.size} entries`);
    console.log("\nValidation passed");
  } finally {
    services.db.close();
  }
}

async function runStats(settings: Settings): Promise<void> {
  const services = await initServices(settings, { connectMailbox: false });
  try {
    const instructionStats = await services.instructions.stats();
    console.log("Instructions");
    console.log(`  Current version: ${instructionStats.currentVersion}`);
    console.log(`  Snapshots: ${instructionStats.snapshotCount}`);
    console.log(`  Length: ${instructionStats.instructionLength} characters`);
    console.log(`  File: ${instructionStats.instructionsFile}`);
    console.log(`  History: ${instructionStats.historyDir}`);
    if (instructionStats.lastModified) {
      console.log(`  Last modified: ${instructionStats.lastModified}`);
    }

    const totals = await services.store.getReviewTotals();
    console.log("\nReview history");
    console.log(`  Sessions: ${totals.sessions}`);
    console.log(`  Processed: ${totals.processed} (${totals.kept} kept, ${totals.deleted} deleted)`);
    console.log(`  AI agreements: ${totals.aiAgreements}, disagreements: ${totals.aiDisagreements}`);
    console.log(`  Instruction updates: ${totals.instructionUpdates}`);
    console.log(`  Processed ledger: ${services.ledger.size} entries`);

    const sessions = await services.store.getRecentSessions(5);
    if (sessions.length > 0) {
      console.log("\nRecent sessions");
      for (const session of sessions) {
        console.log(`  ${formatSessionRecord(session)}`);
      }
    }

    const recent = await services.store.getRecentFeedback(5);
    if (recent.length > 0) {
      console.log("\nRecent feedback");
      for (const event of recent) {
        console.log(
          `  [${event.createdAt ?? ""}] ${event.decision} vs ${event.recommendation}: ${event.feedback}`
        );
      }
    }
  } finally {
    services.db.close();
  }
}

async function runReview(settings: Settings, options: CliOptions): Promise<void> {
  let services: Services;
  try {
    services = await initServices(settings, {
      onQuarantine: (backupPath, reason) => {
        console.log(
          `\nWARNING: the processed ledger was unreadable (${reason}). It was moved to ${backupPath} and a new ledger was started.\n`
        );
      },
    });
    console.log("JMAP connection established");
  } catch (error) {
    console.error("JMAP connection failed:", error instanceof Error ? error.message : error);
    process.exit(1);
  }

  const reviewer = ConsoleReviewer.fromStdio();
  const session = new ReviewSession({
    mailbox: services.mailbox,
    ledger: services.ledger,
    analyzer: services.analyzer,
    executor: services.executor,
    instructions: services.instructions,
    classifier: services.classifier,
    store: services.store,
    reviewer,
  });

  try {
    const stats = await session.run({
      batchSize: options.maxEmails ?? settings.batchSize,
      mode: options.individual ? "individual" : "thread",
    });
    console.log("\nSession Summary");
    console.log(formatStats(stats));
  } finally {
    reviewer.close();
    services.db.close();
  }
}

async function main(): Promise<void> {
  console.log("Inbox Triage - interactive email review");
  console.log("=======================================\n");

  let options: CliOptions;
  let settings: Settings;
  try {
    options = parseCliArgs(process.argv.slice(2));
    if (options.help) {
      console.log(USAGE);
      return;
    }
    settings = loadSettings(process.env);
    console.log("Configuration validated");
  } catch (error) {
    console.error("Configuration error:", error instanceof Error ? error.message : error);
    console.log("\nPlease set the required environment variables.");
    process.exit(1);
  }

  if (options.validate) {
    await runValidate(settings);
  } else if (options.stats) {
    await runStats(settings);
  } else {
    await runReview(settings, options);
  }
}

main().catch((error) => {
  console.error("Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
