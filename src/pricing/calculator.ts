import type { ModelStats, PeriodStats } from "../usage/stats.js";
import type { UsageRecord } from "../usage/types.js";
import type { PlanLimit } from "./plans.js";
import { PLAN_LIMITS } from "./plans.js";
import type { ModelPricing, Tier } from "./table.js";
import { MODEL_PRICING, TIER_PRICING } from "./table.js";

const PER_MILLION = 1_000_000;

export interface PlanUsage {
  readonly plan: string;
  readonly costUsed: number;
  readonly costLimit: number;
  readonly costPercent: number;
  readonly callsUsed: number;
  readonly callsLimit: number;
  readonly callsPercent: number;
}

/** Unlisted names fall back by substring; anything unrecognised is Sonnet. */
export function tierName(model: string): Tier {
  const lower = model.toLowerCase();
  if (lower.includes("opus")) return "Opus";
  if (lower.includes("haiku")) return "Haiku";
  return "Sonnet";
}

export function pricing(model: string): ModelPricing {
  return MODEL_PRICING.get(model) ?? TIER_PRICING[tierName(model)];
}

function cost(
  rates: ModelPricing,
  input: number,
  output: number,
  cacheCreate: number,
  cacheRead: number,
): number {
  return (
    (input / PER_MILLION) * rates.input +
    (output / PER_MILLION) * rates.output +
    (cacheCreate / PER_MILLION) * rates.cacheCreate +
    (cacheRead / PER_MILLION) * rates.cacheRead
  );
}

export function modelCost(stats: ModelStats): number {
  return cost(
    pricing(stats.model),
    stats.totalInput,
    stats.totalOutput,
    stats.totalCacheCreate,
    stats.totalCacheRead,
  );
}

export function recordCost(record: UsageRecord): number {
  const { usage } = record;
  return cost(
    pricing(record.model),
    usage.inputTokens,
    usage.outputTokens,
    usage.cacheCreationTokens,
    usage.cacheReadTokens,
  );
}

/**
 * Cost that counts against a plan's rate limit. Cache reads are not
 * charged against the limit.
 */
export function recordLimitCost(record: UsageRecord): number {
  const { usage } = record;
  return cost(pricing(record.model), usage.inputTokens, usage.outputTokens, usage.cacheCreationTokens, 0);
}

/** Only output tokens count against a plan's token ceiling. */
export function recordLimitTokens(record: UsageRecord): number {
  return record.usage.outputTokens;
}

export function periodCost(stats: PeriodStats): Map<string, number> {
  const costs = new Map<string, number>();
  for (const [model, modelStats] of stats.models) {
    costs.set(model, modelCost(modelStats));
  }
  return costs;
}

export function totalCost(stats: PeriodStats): number {
  let total = 0;
  for (const value of periodCost(stats).values()) total += value;
  return total;
}

export function percentOf(used: number, limit: number): number {
  return limit > 0 ? (used / limit) * 100 : 0;
}

/**
 * Usage against a plan's ceilings, or null for a plan that isn't listed.
 * Percentages are not clamped.
 */
export function estimatePlanUsage(
  stats: PeriodStats,
  planName: string,
  plans: Readonly<Record<string, PlanLimit>> = PLAN_LIMITS,
): PlanUsage | null {
  if (!Object.hasOwn(plans, planName)) return null;
  const limits = plans[planName];
  if (!limits) return null;

  const costUsed = totalCost(stats);
  const callsUsed = stats.totalCalls;

  return {
    plan: planName,
    costUsed,
    costLimit: limits.costLimit,
    costPercent: percentOf(costUsed, limits.costLimit),
    callsUsed,
    callsLimit: limits.callLimit,
    callsPercent: percentOf(callsUsed, limits.callLimit),
  };
}
