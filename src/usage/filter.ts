import type { PeriodBounds, PeriodWindow, UsageRecord } from "./types.js";

const DAY_MS = 86_400_000;

function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

function endOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate(), 23, 59, 59, 999);
}

/** Concrete bounds for a window, all derived from the same `now`. */
export function resolveWindow(window: PeriodWindow, now: Date = new Date()): PeriodBounds {
  switch (window.kind) {
    case "all":
      return {};
    case "days":
      return { start: new Date(now.getTime() - window.days * DAY_MS), end: now };
    case "range":
      return { start: window.start, end: window.end };
    case "today":
      return { start: startOfDay(now), end: endOfDay(now) };
    case "week": {
      // Weeks start on Monday.
      const sinceMonday = (now.getDay() + 6) % 7;
      const monday = new Date(now.getFullYear(), now.getMonth(), now.getDate() - sinceMonday);
      return { start: monday, end: endOfDay(now) };
    }
    case "month":
      return { start: new Date(now.getFullYear(), now.getMonth(), 1), end: endOfDay(now) };
  }
}

export function filterByPeriod(
  records: readonly UsageRecord[],
  window: PeriodWindow,
  now: Date = new Date(),
): UsageRecord[] {
  const { start, end } = resolveWindow(window, now);
  if (!start && !end) return [...records];

  const from = start?.getTime();
  const to = end?.getTime();
  return records.filter((record) => {
    const ts = record.timestamp.getTime();
    if (from !== undefined && ts < from) return false;
    if (to !== undefined && ts > to) return false;
    return true;
  });
}

export function describeWindow(window: PeriodWindow): string {
  switch (window.kind) {
    case "all":
      return "all time";
    case "days":
      return window.days === 1 ? "last day" : `last ${window.days} days`;
    case "range":
      return "selected range";
    case "today":
      return "today";
    case "week":
      return "this week";
    case "month":
      return "this month";
  }
}
