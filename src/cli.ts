#!/usr/bin/env node
import "dotenv/config";
import { parseCliArgs, USAGE, UsageError, type CliArgs } from "./args.js";
import { createEngineLoader, runBatch } from "./batch.js";
import { loadConfig, type ServiceConfig } from "./config.js";
import { BatchError, ConfigError } from "./errors.js";
import { createRunLogger } from "./logger.js";
import { createReportSink } from "./report.js";

async function main(argv: string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`${err.message}\n\n${USAGE}`);
      return 2;
    }
    throw err;
  }
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  let cfg: ServiceConfig;
  try {
    cfg = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }

  const { logger, logFile } = createRunLogger(cfg);
  if (logFile) {
    logger.debug({ logFile }, "Writing run log");
  }

  try {
    const report = await runBatch(
      {
        inputDir: args.inputDir,
        outputDir: args.outputDir,
        model: args.model,
        language: args.language,
        stagingDir: cfg.stagingDir,
      },
      { loader: createEngineLoader(cfg), sink: createReportSink(logger) }
    );
    if (report) {
      logger.info("All files processed");
    }
    return 0;
  } catch (err) {
    if (err instanceof BatchError) {
      logger.error({ err }, err.message);
      return 1;
    }
    logger.fatal({ err }, "Unexpected failure");
    return 1;
  }
}

// Stop between files: the current file is abandoned
process.on("SIGINT", () => process.exit(130));
process.on("SIGTERM", () => process.exit(143));

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
