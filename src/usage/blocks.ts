import {
  percentOf,
  recordCost,
  recordLimitCost,
  recordLimitTokens,
  tierName,
} from "../pricing/calculator.js";
import type { PlanLimit } from "../pricing/plans.js";
import type { Tier } from "../pricing/table.js";
import { aggregate } from "./aggregator.js";
import type { PeriodStats } from "./stats.js";
import { usageTotal } from "./stats.js";
import type { UsageRecord } from "./types.js";

export const BLOCK_HOURS = 5;
const BLOCK_MS = BLOCK_HOURS * 3_600_000;

/** A rate-limit window of activity, opened by the first record after a gap. */
export interface SessionBlock {
  readonly startTime: Date;
  readonly endTime: Date;
  readonly isActive: boolean;
  readonly records: readonly UsageRecord[];
  readonly stats: PeriodStats;
}

export interface BurnRate {
  readonly tokensPerMinute: number;
  readonly costPerMinute: number;
  /** Minutes between the block's first and last record, at least 1. */
  readonly activeMinutes: number;
}

/** One tier's slice of the limit cost in a block. */
export interface TierShare {
  readonly tier: Tier;
  readonly calls: number;
  readonly tokens: number;
  readonly cost: number;
  readonly percent: number;
}

export type BlockWarningKind = "cost" | "tokens" | "calls" | "rate-limited";

export interface BlockWarning {
  readonly kind: BlockWarningKind;
  readonly message: string;
}

/**
 * The current block measured against a plan. `cost` and `tokens` are real
 * usage; the `limit*` figures are what counts against the plan (no cache
 * reads in the cost, output tokens only) and drive the percentages, burn
 * rate and predictions.
 */
export interface BlockInfo {
  readonly blockStart: Date;
  readonly resetTime: Date;
  readonly secondsUntilReset: number;
  readonly isActive: boolean;
  readonly cost: number;
  readonly tokens: number;
  readonly calls: number;
  readonly limitCost: number;
  readonly limitTokens: number;
  readonly costPercent: number;
  readonly tokensPercent: number;
  readonly callsPercent: number;
  readonly burnRate: BurnRate;
  /** Null for an expired block or when nothing is being consumed. */
  readonly tokensExhaustedAt: Date | null;
  readonly costExhaustedAt: Date | null;
  readonly distribution: readonly TierShare[];
  readonly warnings: readonly BlockWarning[];
}

const WARN_PERCENT = 90;
const LIMIT_PERCENT = 100;

function floorToHour(date: Date): Date {
  const floored = new Date(date.getTime());
  floored.setUTCMinutes(0, 0, 0);
  return floored;
}

export function createBlocks(records: readonly UsageRecord[], now: Date = new Date()): SessionBlock[] {
  const open: Array<{ startTime: Date; endTime: Date; records: UsageRecord[] }> = [];

  for (const record of records) {
    const current = open[open.length - 1];
    const previous = current?.records[current.records.length - 1];
    const ts = record.timestamp.getTime();

    if (
      current &&
      previous &&
      ts < current.endTime.getTime() &&
      ts - previous.timestamp.getTime() < BLOCK_MS
    ) {
      current.records.push(record);
      continue;
    }

    const startTime = floorToHour(record.timestamp);
    open.push({
      startTime,
      endTime: new Date(startTime.getTime() + BLOCK_MS),
      records: [record],
    });
  }

  const nowMs = now.getTime();
  return open.map((block) => ({
    startTime: block.startTime,
    endTime: block.endTime,
    isActive: block.startTime.getTime() <= nowMs && nowMs < block.endTime.getTime(),
    records: block.records,
    stats: aggregate(block.records, now),
  }));
}

/** The active block, else the most recent one. */
export function findCurrentBlock(blocks: readonly SessionBlock[]): SessionBlock | null {
  return blocks.find((block) => block.isActive) ?? blocks[blocks.length - 1] ?? null;
}

function activeMinutes(records: readonly UsageRecord[]): number {
  const first = records[0];
  const last = records[records.length - 1];
  if (!first || !last || records.length < 2) return 1;
  return Math.max(1, Math.floor((last.timestamp.getTime() - first.timestamp.getTime()) / 60_000));
}

/** When `used` reaches `limit` at `perMinute`, or null if it never will. */
function exhaustionTime(used: number, limit: number, perMinute: number, now: Date): Date | null {
  if (limit <= 0) return null;
  const remaining = Math.max(0, limit - used);
  if (remaining === 0) return now;
  if (perMinute <= 0) return null;
  return new Date(now.getTime() + Math.trunc((remaining * 60) / perMinute) * 1000);
}

function tierDistribution(records: readonly UsageRecord[], limitCost: number): TierShare[] {
  const byTier = new Map<Tier, { calls: number; tokens: number; cost: number }>();
  for (const record of records) {
    const tier = tierName(record.model);
    const entry = byTier.get(tier) ?? { calls: 0, tokens: 0, cost: 0 };
    entry.calls += 1;
    entry.tokens += recordLimitTokens(record);
    entry.cost += recordLimitCost(record);
    byTier.set(tier, entry);
  }

  return [...byTier.entries()]
    .map(([tier, entry]) => ({ tier, ...entry, percent: percentOf(entry.cost, limitCost) }))
    .sort((a, b) => b.cost - a.cost);
}

export function blockWarnings(
  percents: Pick<BlockInfo, "costPercent" | "tokensPercent" | "callsPercent">,
): BlockWarning[] {
  const warnings: BlockWarning[] = [];
  if (percents.costPercent >= WARN_PERCENT) {
    warnings.push({ kind: "cost", message: "Cost limit nearly exhausted (90%+)" });
  }
  if (percents.tokensPercent >= WARN_PERCENT) {
    warnings.push({ kind: "tokens", message: "Token limit nearly exhausted (90%+)" });
  }
  if (percents.callsPercent >= WARN_PERCENT) {
    warnings.push({ kind: "calls", message: "Call limit nearly exhausted (90%+)" });
  }
  if (percents.costPercent >= LIMIT_PERCENT || percents.tokensPercent >= LIMIT_PERCENT) {
    warnings.push({ kind: "rate-limited", message: "Rate limited until the block resets" });
  }
  return warnings;
}

export function currentBlockInfo(
  records: readonly UsageRecord[],
  plan: PlanLimit,
  now: Date = new Date(),
): BlockInfo | null {
  const block = findCurrentBlock(createBlocks(records, now));
  if (!block) return null;

  let cost = 0;
  let tokens = 0;
  let limitCost = 0;
  let limitTokens = 0;
  for (const record of block.records) {
    cost += recordCost(record);
    tokens += usageTotal(record.usage);
    limitCost += recordLimitCost(record);
    limitTokens += recordLimitTokens(record);
  }
  const calls = block.records.length;

  const minutes = activeMinutes(block.records);
  const burnRate: BurnRate = {
    tokensPerMinute: limitTokens / minutes,
    costPerMinute: limitCost / minutes,
    activeMinutes: minutes,
  };

  const percents = {
    costPercent: percentOf(limitCost, plan.costLimit),
    tokensPercent: percentOf(limitTokens, plan.tokenLimit),
    callsPercent: percentOf(calls, plan.callLimit),
  };

  return {
    blockStart: block.startTime,
    resetTime: block.endTime,
    secondsUntilReset: Math.max(0, Math.floor((block.endTime.getTime() - now.getTime()) / 1000)),
    isActive: block.isActive,
    cost,
    tokens,
    calls,
    limitCost,
    limitTokens,
    ...percents,
    burnRate,
    tokensExhaustedAt: block.isActive
      ? exhaustionTime(limitTokens, plan.tokenLimit, burnRate.tokensPerMinute, now)
      : null,
    costExhaustedAt: block.isActive
      ? exhaustionTime(limitCost, plan.costLimit, burnRate.costPerMinute, now)
      : null,
    distribution: tierDistribution(block.records, limitCost),
    warnings: blockWarnings(percents),
  };
}
