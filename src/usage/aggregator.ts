import { ModelStats, PeriodStats } from "./stats.js";
import type { UsageRecord } from "./types.js";

/**
 * Fold time-sorted records into one PeriodStats. Empty input gives a
 * zero-valued period anchored at `now`.
 */
export function aggregate(records: readonly UsageRecord[], now: Date = new Date()): PeriodStats {
  const first = records[0];
  const last = records[records.length - 1];
  if (!first || !last) {
    return new PeriodStats(now, now);
  }

  const models = new Map<string, ModelStats>();
  const sessions = new Set<string>();

  for (const record of records) {
    sessions.add(record.sessionId);

    let stats = models.get(record.model);
    if (!stats) {
      stats = new ModelStats(record.model);
      models.set(record.model, stats);
    }
    stats.add(record.usage);
  }

  return new PeriodStats(first.timestamp, last.timestamp, models, sessions.size);
}
