import type { Logger } from "pino";
import type { TerminalStatus } from "./types.js";

/**
 * Receives progress and log events from a batch run.
 * Rendering (console, log file) belongs to the implementation.
 */
export interface ReportSink {
  info(message: string): void;
  error(message: string): void;
  jobStart(index: number, total: number, filename: string): void;
  jobEnd(
    index: number,
    total: number,
    filename: string,
    status: TerminalStatus,
    elapsedSeconds: number
  ): void;
  batchComplete(succeeded: number, failed: number, skipped: number): void;
}

export function createReportSink(logger: Logger): ReportSink {
  return {
    info(message) {
      logger.info(message);
    },
    error(message) {
      logger.error(message);
    },
    jobStart(index, total, filename) {
      logger.info({ index, total, file: filename }, `[${index}/${total}] ${filename}`);
    },
    jobEnd(index, total, filename, status, elapsedSeconds) {
      const fields = { index, total, file: filename, status, elapsedSeconds };
      const message = `[${index}/${total}] ${filename}: ${status} (${elapsedSeconds.toFixed(1)}s)`;
      if (status === "succeeded") {
        logger.info(fields, message);
      } else if (status === "failed") {
        logger.error(fields, message);
      } else {
        logger.warn(fields, message);
      }
    },
    batchComplete(succeeded, failed, skipped) {
      logger.info(
        { succeeded, failed, skipped },
        `Batch complete: ${succeeded} succeeded, ${failed} failed, ${skipped} skipped`
      );
    },
  };
}
