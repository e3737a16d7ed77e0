import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { estimatePlanUsage, modelCost, periodCost, totalCost } from "../../src/pricing/calculator.js";
import { loadReport } from "../../src/usage/pipeline.js";
import { logLine } from "../helpers/fixtures.js";

const now = new Date("2025-03-01T12:00:00Z");

describe("loadReport", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "tokenlens-pipeline-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reports no data for an empty directory", async () => {
    expect(await loadReport({ dataDir: dir, window: { kind: "days", days: 30 }, now })).toEqual({
      kind: "no-data",
    });
  });

  it("reports no data when every line is unusable", async () => {
    writeFileSync(join(dir, "a.jsonl"), ["", "nope", logLine({ usage: {} })].join("\n"));
    const result = await loadReport({ dataDir: dir, window: { kind: "all" }, now });
    expect(result.kind).toBe("no-data");
  });

  it("separates an empty period from no data", async () => {
    writeFileSync(join(dir, "a.jsonl"), logLine({ timestamp: "2024-12-01T00:00:00Z" }));
    const result = await loadReport({ dataDir: dir, window: { kind: "days", days: 7 }, now });
    expect(result.kind).toBe("no-data-in-period");
  });

  it("rejects when the data root is unreadable", async () => {
    const file = join(dir, "file");
    writeFileSync(file, "");
    await expect(loadReport({ dataDir: file, window: { kind: "all" }, now })).rejects.toThrow(
      "Cannot read data directory",
    );
  });

  it("reads, filters, aggregates and prices a project tree", async () => {
    mkdirSync(join(dir, "project-a"));
    mkdirSync(join(dir, "project-b"));
    writeFileSync(
      join(dir, "project-a", "session-1.jsonl"),
      [
        logLine({
          timestamp: "2025-02-27T09:00:00Z",
          sessionId: "s1",
          model: "claude-3-5-haiku-20241022",
          usage: { input_tokens: 1_000_000, output_tokens: 1_000_000 },
        }),
        "{truncated",
        logLine({
          timestamp: "2025-01-01T09:00:00Z",
          sessionId: "s0",
          model: "claude-3-opus-20240229",
          usage: { input_tokens: 5_000_000 },
        }),
      ].join("\n"),
    );
    writeFileSync(
      join(dir, "project-b", "session-2.jsonl"),
      [
        logLine({
          timestamp: "2025-02-28T09:00:00Z",
          sessionId: "s2",
          model: "claude-3-5-haiku-20241022",
          usage: { input_tokens: 1_000_000, output_tokens: 1_000_000 },
        }),
        logLine({
          timestamp: "2025-02-26T09:00:00Z",
          sessionId: "s2",
          model: "claude-3-5-haiku-20241022",
          usage: { input_tokens: 1_000_000, output_tokens: 1_000_000 },
        }),
        logLine({
          timestamp: "2025-02-28T10:00:00Z",
          sessionId: "s2",
          model: "claude-sonnet-next",
          usage: { cache_creation_input_tokens: 200_000, cache_read_input_tokens: 1_000_000 },
        }),
      ].join("\n"),
    );

    const result = await loadReport({ dataDir: dir, window: { kind: "days", days: 30 }, now });
    if (result.kind !== "ok") throw new Error(`expected data, got ${result.kind}`);

    const { stats, records } = result;
    expect(records).toHaveLength(4);
    expect(stats.start.toISOString()).toBe("2025-02-26T09:00:00.000Z");
    expect(stats.end.toISOString()).toBe("2025-02-28T10:00:00.000Z");
    expect(stats.sessionCount).toBe(2);
    expect(stats.totalCalls).toBe(4);
    expect(stats.totalTokens).toBe(7_200_000);

    const haiku = stats.models.get("claude-3-5-haiku-20241022");
    expect(haiku?.callCount).toBe(3);
    expect(haiku && modelCost(haiku)).toBeCloseTo(4.5, 10);

    const costs = periodCost(stats);
    // Sonnet fallback: 0.2M × 3.75 + 1M × 0.30
    expect(costs.get("claude-sonnet-next")).toBeCloseTo(1.05, 10);
    expect(totalCost(stats)).toBeCloseTo(5.55, 10);

    const usage = estimatePlanUsage(stats, "max5");
    expect(usage?.costPercent).toBeCloseTo((5.55 / 35) * 100, 8);
    expect(usage?.callsPercent).toBeCloseTo(0.4, 10);
  });
});
