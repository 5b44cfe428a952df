export class BatchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Fatal: abort the run before any job starts

export class ConfigError extends BatchError {}

export class DiscoveryError extends BatchError {}

export class EngineLoadError extends BatchError {}

export class OutputDirError extends BatchError {}

// Per file: caught at the job boundary, the batch continues

export class StagingError extends BatchError {}

export class TranscriptionError extends BatchError {}

export class WriteError extends BatchError {}

// ENOTDIR: a path component was swapped for a file
export function isMissingPathError(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
