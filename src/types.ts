export interface AudioFile {
  sourcePath: string; // absolute, decoded for display
  // On-disk bytes of the path and name; names need not be valid UTF-8
  rawPath: Buffer;
  rawName: Buffer;
  name: string;
  sizeBytes: number; // size seen at discovery
  extension: string; // lower-case, no dot
}

export interface StagedFile {
  original: AudioFile;
  stagedPath: string;
  scratchDir: string;
}

export interface TranscriptSegment {
  idx: number;
  startMs: number;
  endMs: number;
  text: string;
}

export interface TranscriptionResult {
  text: string;
  language?: string;
  durationMs?: number;
  model?: string;
  segments?: TranscriptSegment[];
}

export type JobStatus =
  | "pending"
  | "staging"
  | "transcribing"
  | "writing"
  | "succeeded"
  | "failed"
  | "skipped-empty"
  | "skipped-missing";

export type TerminalStatus = Extract<
  JobStatus,
  "succeeded" | "failed" | "skipped-empty" | "skipped-missing"
>;

export interface JobFailure {
  kind: "staging" | "transcription" | "write";
  message: string;
}

export interface Job {
  index: number; // 1-based position in the batch
  audioFile: AudioFile;
  status: JobStatus;
  failure?: JobFailure;
  outputPath?: string;
  startedAt: number;
  elapsedMs: number;
}

export interface BatchReport {
  jobs: Job[];
  succeeded: number;
  failed: number;
  skipped: number;
  elapsedMs: number;
}
