/**
 * Structured logging with Pino
 *
 * Logs go to stderr so they never interleave with the chat transcript.
 */

import pino from "pino";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "warn"): LogLevel {
  return LOG_LEVELS.find((candidate) => candidate === raw?.toLowerCase()) ?? fallback;
}

const level = parseLogLevel(process.env["LOG_LEVEL"]);
const base = { service: "converse" };

export const logger =
  process.env["NODE_ENV"] === "development"
    ? pino({
        level,
        base,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
            destination: 2,
          },
        },
      })
    : pino({ level, base }, pino.destination(2));

/**
 * Create a child logger with additional context
 */
export function createLogger(name: string) {
  return logger.child({ module: name });
}
