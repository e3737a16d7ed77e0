import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { ZodIssue } from "zod";
import type { ConfigFile, TokenlensConfig } from "./types.js";
import { getConfigPath, getDataDir } from "./paths.js";
import { parseConfig, tokenlensConfigSchema } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export type ConfigReadResult =
  | { readonly kind: "ok"; readonly path: string; readonly config: ConfigFile }
  | { readonly kind: "missing"; readonly path: string }
  | { readonly kind: "invalid"; readonly path: string; readonly issues: readonly string[] };

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

function formatIssue(issue: ZodIssue): string {
  const field = issue.path.join(".");
  return `${field || "(root)"}: ${issue.message}`;
}

/**
 * Read, substitute and validate one config file. Only a file that exists
 * but cannot be read throws.
 */
export function readConfigFile(path: string): ConfigReadResult {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return { kind: "missing", path };
    }
    throw new Error(`Cannot read config file: ${path}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(substituteEnv(content));
  } catch (err) {
    return { kind: "invalid", path, issues: [err instanceof Error ? err.message : String(err)] };
  }

  const parsed = tokenlensConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return { kind: "invalid", path, issues: parsed.error.issues.map(formatIssue) };
  }
  return { kind: "ok", path, config: parsed.data };
}

/** The file's `dataDir` beats `TOKENLENS_DATA_DIR`, which beats the default. */
function withDataDir(file: ConfigFile): TokenlensConfig {
  return { ...file, dataDir: file.dataDir ?? getDataDir() };
}

export function loadConfig(path?: string): TokenlensConfig {
  const result = readConfigFile(resolve(path ?? getConfigPath()));
  switch (result.kind) {
    case "missing":
      return withDataDir(parseConfig({}));
    case "invalid":
      throw new Error(`Invalid config ${result.path}: ${result.issues.join("; ")}`);
    case "ok":
      return withDataDir(result.config);
  }
}
