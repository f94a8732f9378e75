import pino from "pino";
import type { Logger } from "pino";
import type { BrowserConfig } from "./config.js";

export type { Logger };

/**
 * Creates the application logger.
 *
 * The terminal belongs to the UI, so log records never go to stdout: they are
 * appended to `logFile` when one is configured and dropped otherwise.
 */
export function createLogger(config: Pick<BrowserConfig, "logFile" | "logLevel">): Logger {
  if (!config.logFile) return createSilentLogger();

  return pino(
    {
      level: config.logLevel,
      base: { service: "regscope" },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: config.logFile, mkdir: true, sync: false }),
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
