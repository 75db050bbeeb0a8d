import pino, { type Logger, type LoggerOptions } from "pino";
import type { Config } from "../config";

export type AppLogger = Logger;

export interface CreateLoggerOptions extends LoggerOptions {
  /**
   * Override the default log level derived from configuration.
   */
  level?: LoggerOptions["level"];
}

/**
 * Logs are written to stderr: stdout belongs to the MCP stdio transport.
 */
export function createLogger(
  config: Pick<Config, "env" | "logLevel">,
  options: CreateLoggerOptions = {},
): AppLogger {
  const { level, ...rest } = options;

  return pino(
    {
      level: level ?? config.logLevel,
      base: {
        service: "omc",
        environment: config.env,
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      ...rest,
    },
    pino.destination(2),
  );
}

export function createSilentLogger(): AppLogger {
  return pino({ level: "silent" });
}
