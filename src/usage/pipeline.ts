import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { aggregate } from "./aggregator.js";
import { filterByPeriod } from "./filter.js";
import { LogReader } from "./reader.js";
import type { PeriodStats } from "./stats.js";
import type { PeriodWindow, UsageRecord } from "./types.js";

export interface LoadReportOptions {
  readonly dataDir: string;
  readonly window: PeriodWindow;
  readonly now?: Date;
  readonly logger?: Logger;
}

export type ReportResult =
  | { readonly kind: "no-data" }
  | { readonly kind: "no-data-in-period" }
  | {
      readonly kind: "ok";
      readonly records: readonly UsageRecord[];
      readonly stats: PeriodStats;
    };

/**
 * Read, filter and aggregate. Empty results are values; only a data root
 * that cannot be listed rejects.
 */
export async function loadReport(opts: LoadReportOptions): Promise<ReportResult> {
  const logger = opts.logger ?? silentLogger();
  const now = opts.now ?? new Date();

  const reader = new LogReader(opts.dataDir, logger);
  const records = await reader.readAll();
  if (records.length === 0) {
    logger.info({ dataDir: opts.dataDir }, "No usage records found");
    return { kind: "no-data" };
  }

  const filtered = filterByPeriod(records, opts.window, now);
  if (filtered.length === 0) {
    logger.info({ window: opts.window.kind }, "No usage records in period");
    return { kind: "no-data-in-period" };
  }

  return { kind: "ok", records: filtered, stats: aggregate(filtered, now) };
}
