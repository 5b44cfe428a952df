import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import { OutputDirError, WriteError } from "../errors.js";
import type { AudioFile } from "../types.js";

export interface OutputTarget {
  path: string; // decoded, for reports
  dir: string;
  rawName: Buffer; // on-disk name, carries undecodable bytes through
}

// Transcripts are named after the original file, never the staged copy
export function outputTargetFor(outputDir: string, audioFile: AudioFile): OutputTarget {
  const ext = path.extname(audioFile.name);
  const rawStem = audioFile.rawName.subarray(0, audioFile.rawName.length - Buffer.byteLength(ext));
  const rawName = Buffer.concat([rawStem, Buffer.from(".txt")]);
  return {
    path: path.join(outputDir, rawName.toString("utf8")),
    dir: outputDir,
    rawName,
  };
}

function rawPathIn(dir: string, ...parts: Buffer[]): Buffer {
  return Buffer.concat([Buffer.from(dir.endsWith(path.sep) ? dir : dir + path.sep), ...parts]);
}

// Key identifying a target byte for byte
export function outputKey(target: OutputTarget): string {
  return rawPathIn(target.dir, target.rawName).toString("latin1");
}

export async function ensureOutputDir(outputDir: string): Promise<string> {
  const dir = path.resolve(outputDir);
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (err) {
    throw new OutputDirError(`Cannot create output directory ${dir}`, { cause: err });
  }
  return dir;
}

/**
 * Writes the transcript next to its target and renames it into place,
 * replacing any earlier transcript for the same file.
 */
export async function writeTranscript(target: OutputTarget, text: string): Promise<void> {
  const finalPath = rawPathIn(target.dir, target.rawName);
  const tmpPath = rawPathIn(
    target.dir,
    Buffer.from("."),
    target.rawName,
    Buffer.from(`.${crypto.randomBytes(4).toString("hex")}.tmp`)
  );

  try {
    await fs.writeFile(tmpPath, text, { encoding: "utf-8", flag: "wx" });
    await fs.rename(tmpPath, finalPath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw new WriteError(`Failed to write ${target.path}`, { cause: err });
  }
}
