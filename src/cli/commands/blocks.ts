import { Command, Option } from "clipanion";
import { createLogger } from "../../logging/logger.js";
import { PLAN_LIMITS } from "../../pricing/plans.js";
import { renderBlock } from "../../render/dashboard.js";
import { currentBlockInfo } from "../../usage/blocks.js";
import { loadReport } from "../../usage/pipeline.js";
import { resolveRunOptions } from "../options.js";

export class BlocksCommand extends Command {
  static override paths = [["blocks"]];

  static override usage = Command.Usage({
    description: "Show the current 5-hour session block",
    examples: [
      ["Current block against the Pro plan", "tokenlens blocks"],
      ["Against the Max20 plan", "tokenlens blocks --plan max20"],
    ],
  });

  plan = Option.String("-p,--plan", {
    description: "Plan whose limits the block is measured against",
  });

  dataDir = Option.String("--data-dir", {
    description: "Log directory (default: ~/.claude/projects)",
  });

  async execute(): Promise<number> {
    const resolved = resolveRunOptions({ plan: this.plan, dataDir: this.dataDir });
    if (!resolved.ok) {
      this.context.stdout.write(`${resolved.message}\n`);
      return 1;
    }

    const { config, dataDir, plan } = resolved.options;
    const logger = createLogger(config.logging);
    const now = new Date();

    let result;
    try {
      result = await loadReport({ dataDir, window: { kind: "all" }, now, logger });
    } catch (err) {
      logger.error({ err, dataDir }, "Failed to read usage data");
      this.context.stdout.write(
        `Error reading data: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }

    if (result.kind !== "ok") {
      this.context.stdout.write(`No usage data found in ${dataDir}\n`);
      return 0;
    }

    const info = currentBlockInfo(result.records, PLAN_LIMITS[plan], now);
    if (!info) {
      this.context.stdout.write("No session blocks found.\n");
      return 0;
    }

    renderBlock(info, this.context.stdout, { color: (this.context.colorDepth ?? 1) > 1 });
    return 0;
  }
}
