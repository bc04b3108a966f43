/**
 * logger.ts — Shared pino logger for all modules
 *
 * A single pino instance is created at startup and exported here.
 * Every module should import `logger` and call `.child({ module: "<name>" })`
 * to create a scoped logger that includes the module name in every entry.
 *
 * Output goes to stderr: stdout belongs to the dashboard and event lines.
 *
 * Log level:
 *   • DECK_INPUT_LOG_LEVEL env var — overrides everything (e.g. "debug", "silent")
 *   • NODE_ENV === "production" → "info"   (NDJSON, no pretty-print)
 *   • otherwise               → "debug"   (pino-pretty, colorised)
 */

import pino from "pino";

const isProd = process.env.NODE_ENV === "production";
const level  = process.env.DECK_INPUT_LOG_LEVEL ?? (isProd ? "info" : "debug");

export const logger = isProd
  ? pino({ level }, pino.destination(2))
  : pino({
      level,
      transport: {
        target:  "pino-pretty",
        options: { colorize: true, destination: 2 },
      },
    });
