export const UNKNOWN = "unknown";

export interface TokenUsage {
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly cacheCreationTokens: number;
  readonly cacheReadTokens: number;
}

/** One API call's token consumption, parsed from a single log line. */
export interface UsageRecord {
  readonly timestamp: Date;
  readonly sessionId: string;
  readonly model: string;
  readonly usage: TokenUsage;
}

export type SkipReason = "blank" | "no-usage";

export type LineParseResult =
  | { readonly kind: "record"; readonly record: UsageRecord }
  | { readonly kind: "skip"; readonly reason: SkipReason }
  | { readonly kind: "invalid"; readonly error: string };

export type PeriodWindow =
  | { readonly kind: "all" }
  | { readonly kind: "days"; readonly days: number }
  | { readonly kind: "range"; readonly start?: Date; readonly end?: Date }
  | { readonly kind: "today" }
  | { readonly kind: "week" }
  | { readonly kind: "month" };

export interface PeriodBounds {
  readonly start?: Date;
  readonly end?: Date;
}
