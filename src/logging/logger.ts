import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

/**
 * Logs go to stderr (or a file) so that CLI commands keep stdout for their
 * JSON output.
 */
export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const base: pino.LoggerOptions = { name: "spanwise", level };

  if (config?.file) {
    return pino(base, pino.destination(config.file));
  }

  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";
  if (isJson) {
    return pino(base, pino.destination(2));
  }

  return pino({
    ...base,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", destination: 2 },
    },
  });
}

/** Drops everything; used by core calls that were not handed a logger. */
export const silentLogger: Logger = pino({ level: "silent" });
