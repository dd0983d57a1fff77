import { parseArgs } from "node:util";

export interface CliOptions {
  maxEmails: number | null;
  individual: boolean;
  validate: boolean;
  stats: boolean;
  help: boolean;
}

export const USAGE = `Usage: inbox-triage [options]

  --max-emails N   review at most N unprocessed messages (default BATCH_SIZE)
  --individual     review message by message instead of by thread
  --validate       check configuration, mailbox access and instructions
  --stats          print instruction and review history statistics
  --help           show this message`;

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      "max-emails": { type: "string" },
      individual: { type: "boolean", default: false },
      validate: { type: "boolean", default: false },
      stats: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  let maxEmails: number | null = null;
  const raw = values["max-emails"];
  if (raw !== undefined) {
    const parsed = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
    if (!(parsed >= 1)) {
      throw new Error(`--max-emails must be a positive integer, got "${raw}"`);
    }
    maxEmails = parsed;
  }

  return {
    maxEmails,
    individual: values.individual ?? false,
    validate: values.validate ?? false,
    stats: values.stats ?? false,
    help: values.help ?? false,
  };
}
