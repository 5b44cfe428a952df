import fs from "node:fs/promises";
import type { TranscriptionEngine } from "../engine.js";
import {
  StagingError,
  TranscriptionError,
  WriteError,
  errorMessage,
  isMissingPathError,
} from "../errors.js";
import type { ReportSink } from "../report.js";
import { outputKey, outputTargetFor, writeTranscript } from "../store/fsStore.js";
import type { AudioFile, BatchReport, Job, JobFailure, TerminalStatus, TranscriptionResult } from "../types.js";
import { withStagedFile } from "./stage.js";

export interface RunOptions {
  sink: ReportSink;
  stagingDir?: string;
  now?: () => number;
}

function failureKind(err: unknown): JobFailure["kind"] {
  if (err instanceof StagingError) return "staging";
  if (err instanceof WriteError) return "write";
  return "transcription";
}

function reason(err: unknown): string {
  const message = errorMessage(err);
  if (err instanceof Error && err.cause !== undefined) {
    return `${message}: ${errorMessage(err.cause)}`;
  }
  return message;
}

async function currentSize(rawPath: Buffer): Promise<number | null> {
  try {
    const stat = await fs.stat(rawPath);
    return stat.isFile() ? stat.size : null;
  } catch (err) {
    if (isMissingPathError(err)) return null;
    throw err;
  }
}

// Output keys written so far in this batch, mapped to the file that wrote them
type WrittenOutputs = Map<string, string>;

async function runJob(
  job: Job,
  engine: TranscriptionEngine,
  outputDir: string,
  languageHint: string,
  options: RunOptions,
  written: WrittenOutputs
): Promise<TerminalStatus> {
  const { sink } = options;
  const { audioFile } = job;

  sink.info(`Processing: ${audioFile.sourcePath}`);

  let size: number | null;
  try {
    size = await currentSize(audioFile.rawPath);
  } catch (err) {
    job.failure = { kind: "staging", message: reason(err) };
    sink.error(`Cannot inspect ${audioFile.name}: ${job.failure.message}`);
    return "failed";
  }

  if (size === null) {
    sink.error(`File no longer exists: ${audioFile.sourcePath}`);
    return "skipped-missing";
  }
  sink.info(`File size: ${size} bytes`);
  if (size === 0) {
    sink.error(`File is empty: ${audioFile.name}`);
    return "skipped-empty";
  }

  try {
    job.status = "staging";
    const result = await withStagedFile(
      audioFile,
      async (staged): Promise<TranscriptionResult> => {
        job.status = "transcribing";
        sink.info(`Transcribing ${audioFile.name} (staged as ${staged.stagedPath})`);
        try {
          return await engine.transcribe(staged.stagedPath, languageHint);
        } catch (err) {
          throw new TranscriptionError(`Transcription failed for ${audioFile.name}`, { cause: err });
        }
      },
      {
        stagingDir: options.stagingDir,
        onReleaseError(err, scratchDir) {
          sink.error(`Could not remove staging directory ${scratchDir}: ${reason(err)}`);
        },
      }
    );

    job.status = "writing";
    const target = outputTargetFor(outputDir, audioFile);
    const key = outputKey(target);
    const earlier = written.get(key);
    if (earlier !== undefined) {
      sink.error(`${audioFile.name} overwrites ${target.path}, written earlier in this batch from ${earlier}`);
    }
    await writeTranscript(target, result.text);
    written.set(key, audioFile.name);
    job.outputPath = target.path;
    return "succeeded";
  } catch (err) {
    job.failure = { kind: failureKind(err), message: reason(err) };
    sink.error(`Error (${job.failure.kind}) on ${audioFile.name}: ${job.failure.message}`);
    return "failed";
  }
}

/**
 * Processes the catalog one file at a time. A failing file is recorded and
 * the loop moves on; nothing thrown by a single job escapes.
 */
export async function run(
  catalog: readonly AudioFile[],
  engine: TranscriptionEngine,
  outputDir: string,
  languageHint: string,
  options: RunOptions
): Promise<BatchReport> {
  const now = options.now ?? Date.now;
  const { sink } = options;
  const total = catalog.length;
  const batchStartedAt = now();

  const jobs: Job[] = catalog.map((audioFile, i) => ({
    index: i + 1,
    audioFile,
    status: "pending",
    startedAt: 0,
    elapsedMs: 0,
  }));

  const written: WrittenOutputs = new Map();
  for (const job of jobs) {
    job.startedAt = now();
    sink.jobStart(job.index, total, job.audioFile.name);

    const status = await runJob(job, engine, outputDir, languageHint, options, written);

    job.status = status;
    job.elapsedMs = now() - job.startedAt;
    const elapsedSeconds = job.elapsedMs / 1000;
    if (status === "succeeded") {
      sink.info(`Done (${(elapsedSeconds / 60).toFixed(1)} min): ${job.outputPath}`);
    }
    sink.jobEnd(job.index, total, job.audioFile.name, status, elapsedSeconds);
  }

  const succeeded = jobs.filter((job) => job.status === "succeeded").length;
  const failed = jobs.filter((job) => job.status === "failed").length;
  const skipped = jobs.filter(
    (job) => job.status === "skipped-empty" || job.status === "skipped-missing"
  ).length;

  sink.batchComplete(succeeded, failed, skipped);

  return { jobs, succeeded, failed, skipped, elapsedMs: now() - batchStartedAt };
}
