import type { PlanName } from "../pricing/plans.js";

/** What a config file holds once validated. */
export interface ConfigFile {
  readonly dataDir?: string;
  readonly plan: PlanName;
  readonly days: number;
  readonly compact: boolean;
  readonly logging: LoggingConfig;
}

/** The effective configuration, with the data directory resolved. */
export interface TokenlensConfig extends Omit<ConfigFile, "dataDir"> {
  readonly dataDir: string;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}
