import { z } from "zod";
import type { ConfigFile } from "./types.js";

export const planNameSchema = z.enum(["pro", "max5", "max20"]);

export const daysSchema = z.coerce.number().int().positive();

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("warn"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const tokenlensConfigSchema = z.object({
  dataDir: z.string().min(1).optional(),
  plan: planNameSchema.default("pro"),
  days: daysSchema.default(30),
  compact: z.boolean().default(false),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): ConfigFile {
  return tokenlensConfigSchema.parse(raw);
}
