import { appendFile, mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

export interface LedgerAnalysis {
  recommendation: string;
  category: string;
  confidence: number;
  reasoning: string;
}

/** One persisted line of the ledger. Field names are the on-disk format. */
export interface LedgerEntry {
  email_id: string;
  decision: string;
  timestamp: string;
  user_feedback?: string | null;
  ai_analysis?: LedgerAnalysis;
}

export interface LedgerOptions {
  // Fired after a corrupted ledger has been moved aside and replaced by an
  // empty one.
  onQuarantine?: (backupPath: string, reason: string) => void;
}

const LedgerLineSchema = z.object({
  email_id: z.string().min(1),
});

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseLine(line: string): string | null {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch {
    return null;
  }
  const result = LedgerLineSchema.safeParse(data);
  return result.success ? result.data.email_id : null;
}

/**
 * Newline-delimited JSON record of every message already decided. The file
 * only grows, except when undo removes the records of one message.
 */
export class ProcessedLedger {
  private ids = new Set<string>();

  private constructor(
    readonly path: string,
    private readonly options: LedgerOptions
  ) {}

  static async open(
    filePath: string,
    options: LedgerOptions = {}
  ): Promise<ProcessedLedger> {
    const ledger = new ProcessedLedger(filePath, options);
    await ledger.reload();
    return ledger;
  }

  get size(): number {
    return this.ids.size;
  }

  get backupPath(): string {
    return `${this.path}.corrupted`;
  }

  /**
   * Replay the file into the in-memory id set.
   */
  async reload(): Promise<Set<string>> {
    this.ids = new Set();

    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (error) {
      if (!isNotFound(error)) {
        await this.quarantine(`unreadable: ${errorMessage(error)}`);
      }
      return new Set(this.ids);
    }

    let nonEmpty = 0;
    const lines = text.split("\n");
    lines.forEach((raw, index) => {
      const line = raw.trim();
      if (!line) return;
      nonEmpty++;

      const id = parseLine(line);
      if (id === null) {
        console.warn(
          `[ledger] Skipping malformed record on line ${index + 1} of ${this.path}`
        );
        return;
      }
      this.ids.add(id);
    });

    if (nonEmpty > 0 && this.ids.size === 0) {
      await this.quarantine(`no valid records in ${nonEmpty} lines`);
      return new Set(this.ids);
    }

    console.log(`[ledger] Loaded ${this.ids.size} processed message ids`);
    return new Set(this.ids);
  }

  contains(id: string): boolean {
    return this.ids.has(id);
  }

  async append(entry: LedgerEntry): Promise<boolean> {
    try {
      await mkdir(path.dirname(this.path), { recursive: true });
      await appendFile(this.path, `${JSON.stringify(entry)}\n`, "utf8");
    } catch (error) {
      console.error(
        `[ledger] Failed to record message ${entry.email_id}: ${errorMessage(error)}`
      );
      return false;
    }
    this.ids.add(entry.email_id);
    return true;
  }

  /**
   * Drop every record for a message by rewriting the file through a
   * temporary copy. Lines that do not parse are carried over unchanged.
   */
  async remove(id: string): Promise<boolean> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        this.ids.delete(id);
        return true;
      }
      console.error(
        `[ledger] Failed to read ledger while removing message ${id}: ${errorMessage(error)}`
      );
      return false;
    }

    const kept = text
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .filter((line) => parseLine(line.trim()) !== id);

    const tempPath = `${this.path}.tmp`;
    try {
      await writeFile(
        tempPath,
        kept.map((line) => `${line}\n`).join(""),
        "utf8"
      );
      await rename(tempPath, this.path);
    } catch (error) {
      console.error(
        `[ledger] Failed to rewrite ledger while removing message ${id}: ${errorMessage(error)}`
      );
      return false;
    }

    this.ids.delete(id);
    console.log(`[ledger] Removed message ${id} from ledger`);
    return true;
  }

  /**
   * Messages not yet in the ledger, in input order, at most batchSize.
   */
  filterUnprocessed<T extends { id: string }>(
    messages: readonly T[],
    batchSize: number
  ): T[] {
    const fresh = messages
      .filter((m) => !this.ids.has(m.id))
      .slice(0, Math.max(0, batchSize));
    console.log(
      `[ledger] ${fresh.length} of ${messages.length} fetched messages are unprocessed`
    );
    return fresh;
  }

  private async quarantine(reason: string): Promise<void> {
    const backup = this.backupPath;
    try {
      await rm(backup, { recursive: true, force: true });
      await rename(this.path, backup);
    } catch (error) {
      console.error(
        `[ledger] Could not move corrupted ledger ${this.path} aside: ${errorMessage(error)}`
      );
      return;
    }

    this.ids = new Set();
    console.error(
      `[ledger] Ledger ${this.path} is corrupted (${reason}); moved to ${backup}, starting empty`
    );
    this.options.onQuarantine?.(backup, reason);
  }
}
