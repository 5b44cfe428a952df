import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import crypto from "node:crypto";
import { StagingError } from "../errors.js";
import type { AudioFile, StagedFile } from "../types.js";

const STAGE_DIR_PREFIX = "transcribe-stage-";

export interface StageOptions {
  // Scratch root; a fresh directory is created under it per call
  stagingDir?: string;
}

export interface StagedFileHandle {
  file: StagedFile;
  release(): Promise<void>;
}

function stagedName(audioFile: AudioFile): string {
  const ext = path.extname(audioFile.name);
  return `audio_${crypto.randomBytes(8).toString("hex")}${ext}`;
}

/**
 * Copies the source to `<scratch>/transcribe-stage-XXXXXX/audio_<hex>.<ext>`,
 * so whatever reads the copy never sees the original file name.
 * The caller must release the handle; prefer `withStagedFile`.
 */
export async function stage(
  audioFile: AudioFile,
  options: StageOptions = {}
): Promise<StagedFileHandle> {
  const root = options.stagingDir ?? os.tmpdir();

  let scratchDir: string;
  try {
    scratchDir = await fs.mkdtemp(path.join(root, STAGE_DIR_PREFIX));
  } catch (err) {
    throw new StagingError(`Cannot create staging directory under ${root}`, { cause: err });
  }

  const stagedPath = path.join(scratchDir, stagedName(audioFile));
  try {
    // COPYFILE_EXCL: the name is fresh, anything already there is a bug
    await fs.copyFile(audioFile.rawPath, stagedPath, fs.constants.COPYFILE_EXCL);
  } catch (err) {
    await fs.rm(scratchDir, { recursive: true, force: true });
    throw new StagingError(`Failed to stage ${audioFile.name}`, { cause: err });
  }

  let released = false;
  return {
    file: { original: audioFile, stagedPath, scratchDir },
    async release() {
      if (released) return;
      released = true;
      try {
        await fs.rm(scratchDir, { recursive: true, force: true });
      } catch (err) {
        throw new StagingError(`Failed to remove staging directory ${scratchDir}`, { cause: err });
      }
    },
  };
}

export interface ScopedStageOptions extends StageOptions {
  // A directory that cannot be removed is reported here and never fails the work done in scope
  onReleaseError: (err: StagingError, scratchDir: string) => void;
}

export async function withStagedFile<T>(
  audioFile: AudioFile,
  use: (file: StagedFile) => Promise<T>,
  options: ScopedStageOptions
): Promise<T> {
  const handle = await stage(audioFile, options);
  try {
    return await use(handle.file);
  } finally {
    try {
      await handle.release();
    } catch (err) {
      const failure =
        err instanceof StagingError
          ? err
          : new StagingError(`Failed to remove staging directory ${handle.file.scratchDir}`, { cause: err });
      options.onReleaseError(failure, handle.file.scratchDir);
    }
  }
}
