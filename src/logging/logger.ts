import pino, { type Logger, type LoggerOptions } from "pino";

import type { LogLevel } from "../config/governor_config";

export type GovernorLogger = Logger;

const STDERR_FD = 2;

/**
 * Structured diagnostics always go to stderr; stdout carries accepted lines only.
 */
export function createLogger(opts: { level: LogLevel; pretty?: boolean }): GovernorLogger {
  const base: LoggerOptions = {
    level: opts.level,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (opts.pretty) {
    return pino({
      ...base,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          singleLine: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: STDERR_FD,
        },
      },
    });
  }

  return pino(base, pino.destination(STDERR_FD));
}
