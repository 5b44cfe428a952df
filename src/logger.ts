import path from "node:path";
import pino, { type Level, type Logger } from "pino";
import type { ServiceConfig } from "./config.js";

export type { Logger };

export interface RunLogger {
  logger: Logger;
  logFile: string | null;
}

function pad2(n: number) {
  return n.toString().padStart(2, "0");
}

// yyyyMMddHHmm in local time, one log file per run
export function logFileName(startedAt: Date): string {
  return (
    `${startedAt.getFullYear()}${pad2(startedAt.getMonth() + 1)}${pad2(startedAt.getDate())}` +
    `${pad2(startedAt.getHours())}${pad2(startedAt.getMinutes())}.log`
  );
}

export function createRunLogger(
  cfg: Pick<ServiceConfig, "logDir" | "logToFile" | "logLevel">,
  startedAt: Date = new Date()
): RunLogger {
  const options = {
    level: cfg.logLevel,
    base: null,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (!cfg.logToFile) {
    return { logger: pino(options, pino.destination({ dest: 1, sync: true })), logFile: null };
  }

  const logFile = path.join(cfg.logDir, logFileName(startedAt));
  // multistream entries default to "info"; "silent" is enforced by the logger itself
  const streamLevel: Level = cfg.logLevel === "silent" ? "fatal" : cfg.logLevel;
  const streams = pino.multistream([
    { level: streamLevel, stream: pino.destination({ dest: 1, sync: true }) },
    {
      level: streamLevel,
      // Truncate: a rerun within the same minute replaces the log
      stream: pino.destination({ dest: logFile, append: false, mkdir: true, sync: true }),
    },
  ]);
  return { logger: pino(options, streams), logFile };
}
