import { readdir, readFile } from "node:fs/promises";
import { extname, join } from "node:path";
import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { UNKNOWN } from "./types.js";
import type { LineParseResult, UsageRecord } from "./types.js";

const LOG_EXTENSION = ".jsonl";

const isoTimestamp = z.string().datetime({ offset: true });

const tokenCount = z.number().int().nonnegative().nullish();

const usageSchema = z.object({
  input_tokens: tokenCount,
  output_tokens: tokenCount,
  cache_creation_input_tokens: tokenCount,
  cache_read_input_tokens: tokenCount,
});

const logEntrySchema = z.object({
  timestamp: z.string(),
  sessionId: z.string().nullish(),
  message: z
    .object({
      model: z.string().nullish(),
      usage: z.record(z.unknown()).nullish(),
    })
    .nullish(),
});

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Decode one log line. Never throws: the caller decides whether a skip or
 * an invalid line matters.
 */
export function parseLogLine(line: string): LineParseResult {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return { kind: "skip", reason: "blank" };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch (err) {
    return { kind: "invalid", error: err instanceof Error ? err.message : String(err) };
  }

  const entry = logEntrySchema.safeParse(raw);
  if (!entry.success) {
    return { kind: "invalid", error: entry.error.issues[0]?.message ?? "invalid entry" };
  }

  const usageBlock = entry.data.message?.usage;
  if (!usageBlock || Object.keys(usageBlock).length === 0) {
    return { kind: "skip", reason: "no-usage" };
  }

  const usage = usageSchema.safeParse(usageBlock);
  if (!usage.success) {
    return { kind: "invalid", error: usage.error.issues[0]?.message ?? "invalid usage" };
  }

  const iso = isoTimestamp.safeParse(entry.data.timestamp);
  if (!iso.success) {
    return { kind: "invalid", error: `Invalid timestamp: ${entry.data.timestamp}` };
  }
  const timestamp = new Date(iso.data);

  return {
    kind: "record",
    record: {
      timestamp,
      sessionId: entry.data.sessionId ?? UNKNOWN,
      model: entry.data.message?.model ?? UNKNOWN,
      usage: {
        inputTokens: usage.data.input_tokens ?? 0,
        outputTokens: usage.data.output_tokens ?? 0,
        cacheCreationTokens: usage.data.cache_creation_input_tokens ?? 0,
        cacheReadTokens: usage.data.cache_read_input_tokens ?? 0,
      },
    },
  };
}

export function* parseLogLines(content: string, logger?: Logger): Generator<UsageRecord> {
  const lines = content.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const result = parseLogLine(lines[i] ?? "");
    if (result.kind === "record") {
      yield result.record;
    } else if (result.kind === "invalid") {
      logger?.debug({ line: i + 1, error: result.error }, "Skipping malformed line");
    }
  }
}

export class LogReader {
  private readonly logger: Logger;

  constructor(
    private readonly root: string,
    logger: Logger = silentLogger(),
  ) {
    this.logger = logger.child({ component: "log-reader" });
  }

  /**
   * All log files under the root. A missing root is an empty result; a root
   * that exists but cannot be listed is a configuration problem and throws.
   */
  async findLogFiles(): Promise<string[]> {
    let entries;
    try {
      entries = await readdir(this.root, { withFileTypes: true });
    } catch (err) {
      if (isMissing(err)) return [];
      throw new Error(`Cannot read data directory: ${this.root}`, { cause: err });
    }
    const collected: string[] = [];
    for (const entry of entries) {
      const full = join(this.root, entry.name);
      if (entry.isDirectory()) {
        await this.discover(full, collected);
      } else if (extname(entry.name) === LOG_EXTENSION) {
        collected.push(full);
      }
    }
    return collected.sort();
  }

  async readLogFile(file: string): Promise<UsageRecord[]> {
    let content: string;
    try {
      content = await readFile(file, "utf-8");
    } catch (err) {
      this.logger.debug({ file, err }, "Skipping unreadable log file");
      return [];
    }
    return Array.from(parseLogLines(content, this.logger.child({ file })));
  }

  /** Every record under the root, sorted by timestamp ascending. */
  async readAll(): Promise<UsageRecord[]> {
    const files = await this.findLogFiles();
    const records: UsageRecord[] = [];
    for (const file of files) {
      for (const record of await this.readLogFile(file)) records.push(record);
    }
    this.logger.debug({ files: files.length, records: records.length }, "Log files read");
    return records.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }

  private async discover(dir: string, collected: string[]): Promise<void> {
    let entries;
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      this.logger.debug({ dir, err }, "Skipping unreadable directory");
      return;
    }
    for (const entry of entries) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.discover(full, collected);
      } else if (extname(entry.name) === LOG_EXTENSION) {
        collected.push(full);
      }
    }
  }
}
