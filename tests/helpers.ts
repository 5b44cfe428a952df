import { randomUUID } from "crypto";
import fs from "fs/promises";
import os from "os";
import path from "path";

import type { ModelSize } from "../src/constants.js";
import type { TranscriptionEngine } from "../src/engine.js";
import type { ReportSink } from "../src/report.js";
import type { AudioFile, TerminalStatus, TranscriptionResult } from "../src/types.js";

export type SinkEvent =
  | { type: "info"; message: string }
  | { type: "error"; message: string }
  | { type: "jobStart"; index: number; total: number; filename: string }
  | {
      type: "jobEnd";
      index: number;
      total: number;
      filename: string;
      status: TerminalStatus;
      elapsedSeconds: number;
    }
  | { type: "batchComplete"; succeeded: number; failed: number; skipped: number };

export class CapturingSink implements ReportSink {
  readonly events: SinkEvent[] = [];

  info(message: string) {
    this.events.push({ type: "info", message });
  }
  error(message: string) {
    this.events.push({ type: "error", message });
  }
  jobStart(index: number, total: number, filename: string) {
    this.events.push({ type: "jobStart", index, total, filename });
  }
  jobEnd(index: number, total: number, filename: string, status: TerminalStatus, elapsedSeconds: number) {
    this.events.push({ type: "jobEnd", index, total, filename, status, elapsedSeconds });
  }
  batchComplete(succeeded: number, failed: number, skipped: number) {
    this.events.push({ type: "batchComplete", succeeded, failed, skipped });
  }

  errors(): string[] {
    return this.events.flatMap((e) => (e.type === "error" ? [e.message] : []));
  }
  infos(): string[] {
    return this.events.flatMap((e) => (e.type === "info" ? [e.message] : []));
  }
}

/**
 * Engine stand-in: answers with the staged file's byte count unless
 * `fail` says otherwise, and records every path it was handed.
 */
export class FakeEngine implements TranscriptionEngine {
  readonly calls: { filePath: string; languageHint: string }[] = [];

  constructor(
    readonly model: ModelSize = "tiny",
    private readonly fail: (callIndex: number) => boolean = () => false
  ) {}

  async transcribe(filePath: string, languageHint: string): Promise<TranscriptionResult> {
    this.calls.push({ filePath, languageHint });
    if (this.fail(this.calls.length)) {
      throw new Error("decoder blew up");
    }
    const bytes = await fs.readFile(filePath);
    return { text: `transcript of ${bytes.length} bytes` };
  }
}

export async function makeTempDir(label: string): Promise<string> {
  const dir = path.join(os.tmpdir(), `${label}-${randomUUID()}`);
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

export async function writeBytes(filePath: string, size: number): Promise<void> {
  await fs.writeFile(filePath, Buffer.alloc(size, 7));
}

export async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export function audioFileAt(sourcePath: string, sizeBytes: number): AudioFile {
  const name = path.basename(sourcePath);
  return {
    sourcePath,
    rawPath: Buffer.from(sourcePath),
    rawName: Buffer.from(name),
    name,
    sizeBytes,
    extension: path.extname(name).slice(1).toLowerCase(),
  };
}
