import type { ServiceConfig } from "./config.js";
import type { ModelSize } from "./constants.js";
import type { EngineLoader, TranscriptionEngine } from "./engine.js";
import { EngineLoadError } from "./errors.js";
import { serializeEngine } from "./limits/engineLock.js";
import { discover } from "./pipeline/catalog.js";
import { run } from "./pipeline/runner.js";
import { createWhisperCppLoader, whisperCppOptionsFrom } from "./pipeline/transcribe.js";
import { createLocalAsrLoader, localAsrOptionsFrom } from "./pipeline/transcribe_local.js";
import type { ReportSink } from "./report.js";
import { ensureOutputDir } from "./store/fsStore.js";
import type { BatchReport } from "./types.js";

export interface BatchOptions {
  inputDir: string;
  outputDir: string;
  model: ModelSize;
  language: string;
  stagingDir?: string;
}

export interface BatchDeps {
  loader: EngineLoader;
  sink: ReportSink;
  now?: () => number;
}

export function createEngineLoader(cfg: ServiceConfig): EngineLoader {
  switch (cfg.asrEngine) {
    case "local":
      return createLocalAsrLoader(localAsrOptionsFrom(cfg));
    case "whisper-cpp":
      return createWhisperCppLoader(whisperCppOptionsFrom(cfg));
  }
}

/**
 * Runs one batch end to end. Rejects only for the run-level failures
 * (input directory, output directory, engine load); per-file problems end
 * up in the returned report. Resolves to null when there is nothing to do.
 */
export async function runBatch(opts: BatchOptions, deps: BatchDeps): Promise<BatchReport | null> {
  const { sink } = deps;

  const catalog = await discover(opts.inputDir);
  if (catalog.length === 0) {
    sink.error(`No audio files found in ${opts.inputDir}`);
    return null;
  }

  sink.info("Found files:");
  for (const file of catalog) {
    sink.info(`  - ${file.name}`);
  }

  const outputDir = await ensureOutputDir(opts.outputDir);

  sink.info(`Loading model '${opts.model}'...`);
  let engine: TranscriptionEngine;
  try {
    engine = serializeEngine(await deps.loader.load(opts.model));
  } catch (err) {
    if (err instanceof EngineLoadError) throw err;
    throw new EngineLoadError(`Failed to load model '${opts.model}'`, { cause: err });
  }

  sink.info(`Processing ${catalog.length} file(s) into ${outputDir}...`);
  return run(catalog, engine, outputDir, opts.language, {
    sink,
    stagingDir: opts.stagingDir,
    now: deps.now,
  });
}
