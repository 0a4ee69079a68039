/**
 * Screener logging on Winston.
 *
 * Every level is written to stderr so the leaderboard table on stdout can
 * be piped or redirected on its own. `LOG_FORMAT=json` swaps the console
 * line for one JSON object per entry, which suits the HTTP server under a
 * log collector.
 */

import winston from "winston";
import type { Logform } from "winston";

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

const ALL_LEVELS = Object.keys(winston.config.npm.levels);

/** `time level [module] message {meta}`; untagged entries read `[screener]` */
export function formatLine(info: Logform.TransformableInfo): string {
  const { level, message, timestamp: time, module, ...meta } = info;
  const moduleTag = typeof module === "string" ? `[${module}]` : "[screener]";
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(time)} ${level} ${moduleTag} ${String(message)}${metaStr}`;
}

const consoleLine = printf(formatLine);

function consoleFormat(): Logform.Format {
  return process.env.LOG_FORMAT === "json" ? json() : combine(colorize(), consoleLine);
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format: combine(errors({ stack: true }), timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" })),
  transports: [
    new winston.transports.Console({
      stderrLevels: ALL_LEVELS,
      format: consoleFormat(),
    }),
  ],
});

/** Child logger whose lines carry `[module]` */
export function moduleLogger(module: string): winston.Logger {
  return logger.child({ module });
}
