import type { Writable } from "node:stream";
import type { PlanUsage } from "../pricing/calculator.js";
import { estimatePlanUsage, modelCost, tierName, totalCost } from "../pricing/calculator.js";
import type { BlockInfo } from "../usage/blocks.js";
import type { PeriodStats } from "../usage/stats.js";
import type { Paint } from "./format.js";
import {
  createPaint,
  formatCost,
  formatCount,
  formatDay,
  formatDuration,
  formatTokens,
  levelColor,
  progressBar,
  shortModelName,
} from "./format.js";

export interface RenderOptions {
  readonly color?: boolean;
  readonly generatedAt?: Date;
}

function line(out: Writable, text = ""): void {
  out.write(`${text}\n`);
}

function renderPlan(out: Writable, usage: PlanUsage | null, paint: Paint): void {
  if (!usage) {
    line(out, paint("Plan Usage", "bold"));
    line(out, "  Unknown plan");
    return;
  }

  line(out, paint(`Plan: ${usage.plan.toUpperCase()}`, "bold"));
  const costPct = Math.min(usage.costPercent, 100);
  line(out, `  Cost:  ${paint(progressBar(costPct), levelColor(costPct))} ${costPct.toFixed(1)}%`);
  line(out, `         ${formatCost(usage.costUsed)} / ${formatCost(usage.costLimit)}`);
  const callsPct = Math.min(usage.callsPercent, 100);
  line(out, `  Calls: ${paint(progressBar(callsPct), levelColor(callsPct))} ${callsPct.toFixed(1)}%`);
  line(out, `         ${formatCount(usage.callsUsed)} / ${formatCount(usage.callsLimit)}`);
}

function pad(cells: readonly string[], widths: readonly number[]): string {
  return cells
    .map((cell, i) => (i === 0 ? cell.padEnd(widths[i] ?? 0) : cell.padStart(widths[i] ?? 0)))
    .join("  ");
}

function renderModels(out: Writable, stats: PeriodStats, paint: Paint): void {
  const header = ["Model", "Tier", "Calls", "Input", "Output", "Cache R", "Cost"];
  const rows = [...stats.models.values()]
    .map((modelStats) => ({ modelStats, cost: modelCost(modelStats) }))
    .sort((a, b) => b.cost - a.cost)
    .map(({ modelStats, cost }) => [
      shortModelName(modelStats.model),
      tierName(modelStats.model),
      formatCount(modelStats.callCount),
      formatTokens(modelStats.totalInput),
      formatTokens(modelStats.totalOutput),
      formatTokens(modelStats.totalCacheRead),
      formatCost(cost),
    ]);

  const widths = header.map((title, i) =>
    Math.max(title.length, ...rows.map((row) => (row[i] ?? "").length)),
  );

  line(out, paint("Usage by Model", "bold"));
  line(out, paint(pad(header, widths), "magenta"));
  for (const row of rows) {
    line(out, pad(row, widths));
  }
}

export function renderDashboard(
  stats: PeriodStats,
  plan: string,
  out: Writable,
  opts: RenderOptions = {},
): void {
  const paint = createPaint(opts.color ?? false);
  const generatedAt = opts.generatedAt ?? new Date();

  line(out, paint("TOKENLENS USAGE REPORT", "cyan"));
  line(out, paint(`Generated: ${generatedAt.toISOString().slice(0, 16).replace("T", " ")}`, "dim"));
  line(out);

  line(out, paint("Summary", "bold"));
  line(out, `  Total Tokens: ${formatTokens(stats.totalTokens)}`);
  line(out, `  Total Cost:   ${formatCost(totalCost(stats))}`);
  line(out, `  API Calls:    ${formatCount(stats.totalCalls)}`);
  line(out, `  Sessions:     ${formatCount(stats.sessionCount)}`);
  line(out, `  Period:       ${formatDay(stats.start)} - ${formatDay(stats.end)}`);
  line(out);

  renderPlan(out, estimatePlanUsage(stats, plan), paint);
  line(out);

  renderModels(out, stats, paint);
}

export function renderCompact(
  stats: PeriodStats,
  plan: string,
  out: Writable,
  opts: RenderOptions = {},
): void {
  const paint = createPaint(opts.color ?? false);
  const cost = totalCost(stats);
  const usage = estimatePlanUsage(stats, plan);

  const parts = [paint("Usage", "cyan")];
  parts.push(
    usage
      ? `${paint(formatCost(cost, 2), "yellow")} (${usage.costPercent.toFixed(0)}%)`
      : paint(formatCost(cost, 2), "yellow"),
  );
  parts.push(`${paint(formatTokens(stats.totalTokens), "green")} tokens`);
  if (usage) {
    parts.push(`${paint(String(stats.totalCalls), "blue")} calls`);
  }
  line(out, parts.join(" | "));
}

function meter(label: string, percent: number, paint: Paint): string {
  const pct = Math.min(percent, 100);
  return `  ${label.padEnd(8)} ${paint(progressBar(pct), levelColor(pct))} ${percent.toFixed(1)}%`;
}

function formatMoment(moment: Date | null): string {
  return moment ? moment.toISOString() : "not projected";
}

export function renderBlock(info: BlockInfo, out: Writable, opts: RenderOptions = {}): void {
  const paint = createPaint(opts.color ?? false);
  const status = info.isActive ? paint("active", "green") : paint("expired", "dim");

  line(out, paint("Session Block", "bold"));
  line(out, `  Status:  ${status}`);
  line(out, `  Started: ${info.blockStart.toISOString()}`);
  line(out, `  Resets:  ${info.resetTime.toISOString()} (in ${formatDuration(info.secondsUntilReset)})`);
  line(out);

  line(out, meter("Cost:", info.costPercent, paint));
  line(out, `           ${formatCost(info.limitCost)} limit / ${formatCost(info.cost)} total`);
  line(out, meter("Tokens:", info.tokensPercent, paint));
  line(out, `           ${formatTokens(info.limitTokens)} limit / ${formatTokens(info.tokens)} total`);
  line(out, meter("Calls:", info.callsPercent, paint));
  line(out, `           ${formatCount(info.calls)}`);
  line(out);

  const { burnRate } = info;
  line(out, paint("Burn Rate", "bold"));
  line(
    out,
    `  ${formatTokens(Math.round(burnRate.tokensPerMinute))} tokens/min, ` +
      `${formatCost(burnRate.costPerMinute)}/min over ${formatCount(burnRate.activeMinutes)} min`,
  );
  line(out, `  Tokens run out: ${formatMoment(info.tokensExhaustedAt)}`);
  line(out, `  Cost runs out:  ${formatMoment(info.costExhaustedAt)}`);

  if (info.distribution.length > 0) {
    line(out);
    line(out, paint("By Tier", "bold"));
    for (const share of info.distribution) {
      line(
        out,
        `  ${share.tier.padEnd(7)}${formatCount(share.calls).padStart(6)} calls  ` +
          `${formatTokens(share.tokens).padStart(7)}  ${formatCost(share.cost)}  ${share.percent.toFixed(1)}%`,
      );
    }
  }

  if (info.warnings.length > 0) {
    line(out);
    for (const warning of info.warnings) {
      line(out, paint(`  ! ${warning.message}`, warning.kind === "rate-limited" ? "red" : "yellow"));
    }
  }
}
