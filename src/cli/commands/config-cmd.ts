import { Command, Option } from "clipanion";
import { loadConfig, readConfigFile } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration",
    examples: [["Show config", "tokenlens config show"]],
  });

  async execute(): Promise<number> {
    let config;
    try {
      config = loadConfig();
    } catch (err) {
      this.context.stdout.write(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }

    this.context.stdout.write(JSON.stringify(config, null, 2) + "\n");
    return 0;
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "tokenlens config validate"],
      ["Validate specific file", "tokenlens config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    const configPath = this.configFile ?? getConfigPath();

    let result;
    try {
      result = readConfigFile(configPath);
    } catch (err) {
      this.context.stdout.write(`${err instanceof Error ? err.message : String(err)}\n`);
      return 1;
    }

    switch (result.kind) {
      case "missing":
        this.context.stdout.write(`Config file not found: ${result.path}\n`);
        return 1;
      case "invalid":
        this.context.stdout.write(
          `Config is INVALID: ${result.path}\n` +
            result.issues.map((issue) => `  ${issue}\n`).join(""),
        );
        return 1;
      case "ok":
        this.context.stdout.write(`Config is valid: ${result.path}\n`);
        return 0;
    }
  }
}
