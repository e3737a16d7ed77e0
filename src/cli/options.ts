import { z } from "zod";
import { loadConfig } from "../config/loader.js";
import { daysSchema, planNameSchema } from "../config/schema.js";
import type { TokenlensConfig } from "../config/types.js";
import type { PlanName } from "../pricing/plans.js";
import type { PeriodWindow } from "../usage/types.js";

const periodSchema = z.enum(["today", "week", "month"]);

export interface RawFlags {
  readonly days?: string;
  readonly plan?: string;
  readonly period?: string;
  readonly dataDir?: string;
  readonly compact?: boolean;
}

export interface RunOptions {
  readonly config: TokenlensConfig;
  readonly dataDir: string;
  readonly plan: PlanName;
  readonly window: PeriodWindow;
  readonly compact: boolean;
}

export type ResolveResult =
  | { readonly ok: true; readonly options: RunOptions }
  | { readonly ok: false; readonly message: string };

/** Merge command-line flags over the config file. */
export function resolveRunOptions(flags: RawFlags, configPath?: string): ResolveResult {
  let config: TokenlensConfig;
  try {
    config = loadConfig(configPath);
  } catch (err) {
    return {
      ok: false,
      message: `Failed to load config: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  const days = daysSchema.safeParse(flags.days ?? config.days);
  if (!days.success) {
    return { ok: false, message: `Invalid --days value: ${flags.days ?? String(config.days)}` };
  }

  const plan = planNameSchema.safeParse(flags.plan ?? config.plan);
  if (!plan.success) {
    return {
      ok: false,
      message: `Invalid --plan value: ${flags.plan ?? config.plan} (expected pro, max5 or max20)`,
    };
  }

  let window: PeriodWindow = { kind: "days", days: days.data };
  if (flags.period !== undefined) {
    const period = periodSchema.safeParse(flags.period);
    if (!period.success) {
      return {
        ok: false,
        message: `Invalid --period value: ${flags.period} (expected today, week or month)`,
      };
    }
    window = { kind: period.data };
  }

  return {
    ok: true,
    options: {
      config,
      dataDir: flags.dataDir ?? config.dataDir,
      plan: plan.data,
      window,
      compact: flags.compact ?? config.compact,
    },
  };
}
