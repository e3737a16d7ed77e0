import { Command, Option } from "clipanion";
import { createLogger } from "../../logging/logger.js";
import { renderCompact, renderDashboard } from "../../render/dashboard.js";
import { describeWindow } from "../../usage/filter.js";
import { loadReport } from "../../usage/pipeline.js";
import { resolveRunOptions } from "../options.js";

export class ReportCommand extends Command {
  static override paths = [Command.Default, ["report"]];

  static override usage = Command.Usage({
    description: "Show token usage, cost and plan usage",
    examples: [
      ["Last 30 days", "tokenlens"],
      ["Last 7 days", "tokenlens -d 7"],
      ["Compare against the Max5 plan", "tokenlens --plan max5"],
      ["This week only", "tokenlens --period week"],
      ["Single line output", "tokenlens --compact"],
    ],
  });

  days = Option.String("-d,--days", {
    description: "Number of days to analyze (default: 30)",
  });

  plan = Option.String("-p,--plan", {
    description: "Plan to compare against: pro, max5 or max20 (default: pro)",
  });

  period = Option.String("--period", {
    description: "Calendar period instead of a day count: today, week or month",
  });

  compact = Option.Boolean("-c,--compact", {
    description: "Compact single-line output",
  });

  dataDir = Option.String("--data-dir", {
    description: "Log directory (default: ~/.claude/projects)",
  });

  async execute(): Promise<number> {
    const resolved = resolveRunOptions({
      days: this.days,
      plan: this.plan,
      period: this.period,
      dataDir: this.dataDir,
      compact: this.compact,
    });
    if (!resolved.ok) {
      this.context.stdout.write(`${resolved.message}\n`);
      return 1;
    }

    const { config, dataDir, plan, window, compact } = resolved.options;
    const logger = createLogger(config.logging);

    let result;
    try {
      result = await loadReport({ dataDir, window, logger });
    } catch (err) {
      logger.error({ err, dataDir }, "Failed to read usage data");
      this.context.stdout.write(
        `Error reading data: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }

    switch (result.kind) {
      case "no-data":
        this.context.stdout.write(`No usage data found in ${dataDir}\n`);
        return 0;
      case "no-data-in-period":
        this.context.stdout.write(`No data found for ${describeWindow(window)}\n`);
        return 0;
      case "ok": {
        const color = (this.context.colorDepth ?? 1) > 1;
        if (compact) {
          renderCompact(result.stats, plan, this.context.stdout, { color });
        } else {
          renderDashboard(result.stats, plan, this.context.stdout, { color });
        }
        return 0;
      }
    }
  }
}
