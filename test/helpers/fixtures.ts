import { Writable } from "node:stream";
import type { TokenUsage, UsageRecord } from "../../src/usage/types.js";

export function makeUsage(overrides: Partial<TokenUsage> = {}): TokenUsage {
  return {
    inputTokens: 0,
    outputTokens: 0,
    cacheCreationTokens: 0,
    cacheReadTokens: 0,
    ...overrides,
  };
}

export function makeRecord(
  overrides: Partial<Omit<UsageRecord, "usage">> & { usage?: Partial<TokenUsage> } = {},
): UsageRecord {
  return {
    timestamp: overrides.timestamp ?? new Date("2025-01-15T10:00:00Z"),
    sessionId: overrides.sessionId ?? "session-1",
    model: overrides.model ?? "claude-3-5-sonnet-20241022",
    usage: makeUsage(overrides.usage),
  };
}

export interface LogLineInput {
  readonly timestamp?: string;
  readonly sessionId?: string;
  readonly model?: string;
  readonly usage?: Record<string, unknown>;
}

export function logLine(input: LogLineInput = {}): string {
  return JSON.stringify({
    type: "assistant",
    timestamp: input.timestamp ?? "2025-01-15T10:00:00Z",
    sessionId: input.sessionId ?? "session-1",
    message: {
      model: input.model ?? "claude-3-5-sonnet-20241022",
      usage: input.usage ?? { input_tokens: 100, output_tokens: 50 },
    },
  });
}

export function captureStdout(): { stream: Writable; output: () => string } {
  let buf = "";
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, cb) {
      buf += chunk.toString();
      cb();
    },
  });
  return { stream, output: () => buf };
}
