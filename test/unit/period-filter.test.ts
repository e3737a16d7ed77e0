import { describe, it, expect } from "vitest";
import { describeWindow, filterByPeriod, resolveWindow } from "../../src/usage/filter.js";
import type { PeriodWindow } from "../../src/usage/types.js";
import { makeRecord } from "../helpers/fixtures.js";

const now = new Date("2025-01-20T12:00:00Z");

const records = [
  makeRecord({ timestamp: new Date("2025-01-01T00:00:00Z"), sessionId: "old" }),
  makeRecord({ timestamp: new Date("2025-01-13T12:00:00Z"), sessionId: "edge" }),
  makeRecord({ timestamp: new Date("2025-01-18T09:00:00Z"), sessionId: "recent" }),
  makeRecord({ timestamp: new Date("2025-01-20T12:00:00Z"), sessionId: "now" }),
];

function ids(list: readonly { sessionId: string }[]): string[] {
  return list.map((r) => r.sessionId);
}

describe("filterByPeriod", () => {
  it("returns everything without bounds", () => {
    expect(ids(filterByPeriod(records, { kind: "all" }, now))).toEqual([
      "old",
      "edge",
      "recent",
      "now",
    ]);
  });

  it("keeps records in the last N days, both ends inclusive", () => {
    expect(ids(filterByPeriod(records, { kind: "days", days: 7 }, now))).toEqual([
      "edge",
      "recent",
      "now",
    ]);
  });

  it("checks only the supplied side of a range", () => {
    const start = new Date("2025-01-15T00:00:00Z");
    const end = new Date("2025-01-13T12:00:00Z");
    expect(ids(filterByPeriod(records, { kind: "range", start }, now))).toEqual(["recent", "now"]);
    expect(ids(filterByPeriod(records, { kind: "range", end }, now))).toEqual(["old", "edge"]);
  });

  it("keeps records between explicit bounds", () => {
    const window: PeriodWindow = {
      kind: "range",
      start: new Date("2025-01-13T12:00:00Z"),
      end: new Date("2025-01-18T09:00:00Z"),
    };
    expect(ids(filterByPeriod(records, window, now))).toEqual(["edge", "recent"]);
  });

  it("is idempotent", () => {
    const window: PeriodWindow = { kind: "days", days: 3 };
    const once = filterByPeriod(records, window, now);
    expect(filterByPeriod(once, window, now)).toEqual(once);
  });

  it("does not mutate its input", () => {
    const input = [...records];
    filterByPeriod(input, { kind: "days", days: 1 }, now);
    expect(input).toEqual(records);
  });
});

describe("resolveWindow", () => {
  it("derives day-count bounds from one instant", () => {
    const bounds = resolveWindow({ kind: "days", days: 2 }, now);
    expect(bounds.end).toBe(now);
    expect(bounds.start?.toISOString()).toBe("2025-01-18T12:00:00.000Z");
  });

  it("starts today at local midnight", () => {
    const local = new Date(2025, 0, 22, 15, 30);
    const bounds = resolveWindow({ kind: "today" }, local);
    expect(bounds.start).toEqual(new Date(2025, 0, 22));
    expect(bounds.end).toEqual(new Date(2025, 0, 22, 23, 59, 59, 999));
  });

  it("starts the week on Monday", () => {
    // 2025-01-22 is a Wednesday.
    const bounds = resolveWindow({ kind: "week" }, new Date(2025, 0, 22, 9));
    expect(bounds.start).toEqual(new Date(2025, 0, 20));
  });

  it("treats Sunday as the end of the week", () => {
    const bounds = resolveWindow({ kind: "week" }, new Date(2025, 0, 26, 9));
    expect(bounds.start).toEqual(new Date(2025, 0, 20));
  });

  it("starts the month on the first", () => {
    const bounds = resolveWindow({ kind: "month" }, new Date(2025, 2, 17, 9));
    expect(bounds.start).toEqual(new Date(2025, 2, 1));
    expect(bounds.end).toEqual(new Date(2025, 2, 17, 23, 59, 59, 999));
  });
});

describe("describeWindow", () => {
  it("names each window", () => {
    expect(describeWindow({ kind: "days", days: 30 })).toBe("last 30 days");
    expect(describeWindow({ kind: "days", days: 1 })).toBe("last day");
    expect(describeWindow({ kind: "week" })).toBe("this week");
    expect(describeWindow({ kind: "all" })).toBe("all time");
  });
});
