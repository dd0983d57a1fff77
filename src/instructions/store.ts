import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";

export interface InstructionVersion {
  readonly version: number;
  readonly timestamp: string;
  readonly reason: string;
  readonly text: string;
  readonly file: string;
}

export interface InstructionStats {
  currentVersion: number;
  snapshotCount: number;
  instructionLength: number;
  instructionsFile: string;
  historyDir: string;
  lastModified: string | null;
}

export interface InstructionStoreOptions {
  instructionsFile: string;
  historyDir: string;
  // Copied into place when the live document does not exist yet.
  seedFile?: string;
  now?: () => Date;
}

export const DEFAULT_SEED_FILE = path.resolve(
  __dirname,
  "../../prompts/triage-instructions.md"
);

const METADATA_OPEN = "<!-- Instruction Version Metadata";
const METADATA_CLOSE = "-->";
const SNAPSHOT_PATTERN = /^instruction_v(\d+)_(\d{8}_\d{6})\.md$/;
const EXAMPLE_EXCERPT_LENGTH = 200;
const REASON_FEEDBACK_LENGTH = 100;

export const FALLBACK_INSTRUCTION = `
# Basic Email Categorization Instructions

Analyze the provided email and classify it as either:
- **KEEP**: Email should be retained
- **JUNK-CANDIDATE**: Email should be deleted

Respond in JSON format:
\`\`\`json
{
  "recommendation": "KEEP" | "JUNK-CANDIDATE",
  "category": "Category name",
  "confidence": 0.1-1.0,
  "reasoning": "Brief explanation",
  "key_factors": ["Factor 1", "Factor 2"]
}
\`\`\`

Focus on identifying outdated, promotional, or irrelevant content for JUNK-CANDIDATE classification.
When uncertain, recommend KEEP.
`;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

// YYYYMMDD_HHMMSS, UTC
export function fileStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

// YYYY-MM-DD HH:MM:SS, UTC
export function logStamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

export function snapshotFileName(version: number, date: Date): string {
  return `instruction_v${version}_${fileStamp(date)}.md`;
}

export function buildImprovementLog(
  version: number,
  date: Date,
  feedback: string,
  suggested: string,
  example: string
): string {
  return `

---

## Instruction Improvement Log

### Version ${version} - ${logStamp(date)}

**User Feedback:** ${feedback}

**Suggested Improvement:**
${suggested}

**Example Email Pattern:**
\`\`\`
${example.slice(0, EXAMPLE_EXCERPT_LENGTH)}...
\`\`\`

---
`;
}

function renderSnapshot(
  version: number,
  timestamp: string,
  reason: string,
  text: string
): string {
  // A literal "-->" in the reason would end the comment early.
  const metadata = JSON.stringify({ version, timestamp, reason }, null, 2)
    .replace(/-->/g, "--\\u003e");
  return `${METADATA_OPEN}\n${metadata}\n${METADATA_CLOSE}\n\n${text}`;
}

function parseSnapshot(
  file: string,
  content: string
): InstructionVersion | null {
  const match = SNAPSHOT_PATTERN.exec(path.basename(file));
  if (!match) return null;

  const version = Number(match[1]);
  let timestamp = match[2];
  let reason = "No metadata available";
  let text = content;

  if (content.startsWith(METADATA_OPEN)) {
    const end = content.indexOf(METADATA_CLOSE);
    if (end !== -1) {
      try {
        const metadata: unknown = JSON.parse(
          content.slice(METADATA_OPEN.length, end).trim()
        );
        if (typeof metadata === "object" && metadata !== null) {
          if ("reason" in metadata && typeof metadata.reason === "string") {
            reason = metadata.reason;
          }
          if ("timestamp" in metadata && typeof metadata.timestamp === "string") {
            timestamp = metadata.timestamp;
          }
        }
      } catch (error) {
        console.warn(
          `[instructions] Unreadable metadata in ${file}:`,
          error instanceof Error ? error.message : error
        );
      }
      text = content.slice(end + METADATA_CLOSE.length).replace(/^\n\n/, "");
    }
  }

  return Object.freeze({ version, timestamp, reason, text, file });
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * The classifier instruction as an append-only document: a live head plus
 * one immutable snapshot per update, taken before the head changes.
 */
export class InstructionStore {
  private constructor(
    private readonly options: InstructionStoreOptions,
    private head: string,
    private headVersion: number,
    private readonly snapshots: InstructionVersion[],
    private readonly now: () => Date
  ) {}

  static async open(options: InstructionStoreOptions): Promise<InstructionStore> {
    await mkdir(options.historyDir, { recursive: true });

    const text = await InstructionStore.loadHead(options);
    const snapshots = await InstructionStore.loadSnapshots(options.historyDir);
    const highest = snapshots.reduce((max, s) => Math.max(max, s.version), 0);

    console.log(
      `[instructions] Loaded instruction version ${highest + 1} (${snapshots.length} snapshots)`
    );

    return new InstructionStore(
      options,
      text,
      highest + 1,
      snapshots,
      options.now ?? (() => new Date())
    );
  }

  private static async loadHead(options: InstructionStoreOptions): Promise<string> {
    try {
      return await readFile(options.instructionsFile, "utf8");
    } catch (error) {
      if (!isNotFound(error)) {
        console.error(
          `[instructions] Failed to read ${options.instructionsFile}, using fallback instruction:`,
          error instanceof Error ? error.message : error
        );
        return FALLBACK_INSTRUCTION;
      }
    }

    const seedFile = options.seedFile ?? DEFAULT_SEED_FILE;
    let seed = FALLBACK_INSTRUCTION;
    try {
      seed = await readFile(seedFile, "utf8");
    } catch (error) {
      console.warn(
        `[instructions] Seed file ${seedFile} unavailable, using fallback instruction:`,
        error instanceof Error ? error.message : error
      );
    }

    await mkdir(path.dirname(options.instructionsFile), { recursive: true });
    await writeFile(options.instructionsFile, seed, "utf8");
    console.log(`[instructions] Created ${options.instructionsFile}`);
    return seed;
  }

  private static async loadSnapshots(
    historyDir: string
  ): Promise<InstructionVersion[]> {
    const names = await readdir(historyDir);
    const snapshots: InstructionVersion[] = [];

    for (const name of names) {
      if (!SNAPSHOT_PATTERN.test(name)) continue;
      const file = path.join(historyDir, name);
      try {
        const parsed = parseSnapshot(file, await readFile(file, "utf8"));
        if (parsed) snapshots.push(parsed);
      } catch (error) {
        console.error(
          `[instructions] Failed to read snapshot ${file}:`,
          error instanceof Error ? error.message : error
        );
      }
    }

    return snapshots.sort((a, b) => a.version - b.version);
  }

  current(): string {
    return this.head;
  }

  get version(): number {
    return this.headVersion;
  }

  /** Oldest first. */
  history(): readonly InstructionVersion[] {
    return [...this.snapshots];
  }

  async stats(): Promise<InstructionStats> {
    let lastModified: string | null = null;
    try {
      lastModified = (await stat(this.options.instructionsFile)).mtime.toISOString();
    } catch (error) {
      if (!isNotFound(error)) {
        console.warn(
          `[instructions] Could not stat ${this.options.instructionsFile}:`,
          error instanceof Error ? error.message : error
        );
      }
    }

    return {
      currentVersion: this.headVersion,
      snapshotCount: this.snapshots.length,
      instructionLength: this.head.length,
      instructionsFile: this.options.instructionsFile,
      historyDir: this.options.historyDir,
      lastModified,
    };
  }

  /**
   * Text appended to the head since the given version, "" for the head
   * itself, null for a version this store does not know.
   */
  diffSince(version: number): string | null {
    if (version === this.headVersion) return "";

    const snapshot = this.snapshots.find((s) => s.version === version);
    if (!snapshot || !this.head.startsWith(snapshot.text)) {
      return null;
    }
    return this.head.slice(snapshot.text.length);
  }

  /**
   * Snapshot the head, then append an improvement log block to it. Returns
   * false and leaves head and history untouched if either write fails.
   */
  async update(
    suggested: string,
    feedback: string,
    example: string
  ): Promise<boolean> {
    const date = this.now();
    const version = this.headVersion;
    const timestamp = fileStamp(date);
    const reason = `Before update - User feedback: ${feedback.slice(0, REASON_FEEDBACK_LENGTH)}...`;
    const snapshotFile = path.join(
      this.options.historyDir,
      snapshotFileName(version, date)
    );
    const next =
      this.head +
      buildImprovementLog(version + 1, date, feedback, suggested, example);

    try {
      await mkdir(this.options.historyDir, { recursive: true });
      await writeFile(
        snapshotFile,
        renderSnapshot(version, timestamp, reason, this.head),
        { encoding: "utf8", flag: "wx" }
      );
    } catch (error) {
      console.error(
        `[instructions] Failed to snapshot version ${version}:`,
        error instanceof Error ? error.message : error
      );
      return false;
    }

    const tempFile = `${this.options.instructionsFile}.tmp`;
    try {
      await writeFile(tempFile, next, "utf8");
      await rename(tempFile, this.options.instructionsFile);
    } catch (error) {
      console.error(
        `[instructions] Failed to write version ${version + 1}:`,
        error instanceof Error ? error.message : error
      );
      await rm(snapshotFile, { force: true }).catch((cleanupError: unknown) =>
        console.error(
          `[instructions] Could not remove orphaned snapshot ${snapshotFile}:`,
          cleanupError instanceof Error ? cleanupError.message : cleanupError
        )
      );
      return false;
    }

    this.snapshots.push(
      Object.freeze({ version, timestamp, reason, text: this.head, file: snapshotFile })
    );
    this.head = next;
    this.headVersion = version + 1;

    console.log(`[instructions] Updated instruction to version ${this.headVersion}`);
    return true;
  }
}
