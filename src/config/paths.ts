import { homedir } from "node:os";
import { join } from "node:path";

export function getDataDir(): string {
  return process.env["TOKENLENS_DATA_DIR"] ?? join(homedir(), ".claude", "projects");
}

export function getConfigPath(): string {
  return process.env["TOKENLENS_CONFIG_PATH"] ?? "tokenlens.config.json";
}
