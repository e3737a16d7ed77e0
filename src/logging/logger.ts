import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

const STDERR = 2;

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "warn";
  const isJson = config?.json ?? (process.env["NODE_ENV"] === "production" || !process.stderr.isTTY);

  const options: pino.LoggerOptions = { level, name: "tokenlens" };

  if (config?.file) {
    return pino(options, pino.destination({ dest: config.file, sync: true }));
  }

  if (isJson) {
    return pino(options, pino.destination({ dest: STDERR, sync: true }));
  }

  return pino({
    ...options,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", destination: STDERR },
    },
  });
}

/** Logger that discards everything; used where no logger is passed in. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
