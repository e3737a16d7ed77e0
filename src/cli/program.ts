import { Builtins, Cli } from "clipanion";
import { BlocksCommand } from "./commands/blocks.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { ReportCommand } from "./commands/report.js";

export const VERSION = "0.1.0";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Tokenlens",
    binaryName: "tokenlens",
    binaryVersion: VERSION,
  });

  // Reports
  cli.register(ReportCommand);
  cli.register(BlocksCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  return cli;
}
