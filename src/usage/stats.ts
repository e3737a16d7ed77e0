import type { TokenUsage } from "./types.js";

export function usageTotal(usage: TokenUsage): number {
  return usage.inputTokens + usage.outputTokens + usage.cacheCreationTokens + usage.cacheReadTokens;
}

export class ModelStats {
  totalInput = 0;
  totalOutput = 0;
  totalCacheCreate = 0;
  totalCacheRead = 0;
  callCount = 0;

  constructor(readonly model: string) {}

  add(usage: TokenUsage): void {
    this.totalInput += usage.inputTokens;
    this.totalOutput += usage.outputTokens;
    this.totalCacheCreate += usage.cacheCreationTokens;
    this.totalCacheRead += usage.cacheReadTokens;
    this.callCount += 1;
  }

  get totalTokens(): number {
    return this.totalInput + this.totalOutput + this.totalCacheCreate + this.totalCacheRead;
  }
}

export class PeriodStats {
  constructor(
    readonly start: Date,
    readonly end: Date,
    readonly models: ReadonlyMap<string, ModelStats> = new Map(),
    readonly sessionCount = 0,
  ) {}

  get totalTokens(): number {
    let total = 0;
    for (const stats of this.models.values()) total += stats.totalTokens;
    return total;
  }

  get totalCalls(): number {
    let total = 0;
    for (const stats of this.models.values()) total += stats.callCount;
    return total;
  }

  get isEmpty(): boolean {
    return this.models.size === 0;
  }
}
