/**
 * Shared CLI logger.
 *
 * Uses winston with a plain-text console format so progress lines read like
 * `info Creating cluster [dev]`. Structured calls (`logger.info({ msg, ...fields })`)
 * get their extra fields appended as key=value pairs.
 */

import winston from "winston";

const RESERVED = new Set(["level", "message", "msg", "timestamp"]);

function renderFields(info: Record<string, unknown>): string {
  const pairs: string[] = [];
  for (const [key, value] of Object.entries(info)) {
    if (RESERVED.has(key) || value === undefined) continue;
    pairs.push(`${key}=${typeof value === "string" ? value : JSON.stringify(value)}`);
  }
  return pairs.length > 0 ? ` ${pairs.join(" ")}` : "";
}

export const cliFormat = winston.format.printf((info) => {
  const text = info.message ?? info.msg ?? "";
  return `${info.level} ${String(text)}${renderFields(info)}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: cliFormat,
  transports: [
    new winston.transports.Console({
      silent: process.env.NODE_ENV === "test",
      // stdout is reserved for command output (paths, tables) so it can be captured
      stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
    }),
  ],
});
