import fs from "node:fs/promises";
import path from "node:path";
import { AUDIO_EXTENSIONS } from "../constants.js";
import { DiscoveryError, isMissingPathError } from "../errors.js";
import type { AudioFile } from "../types.js";

function extensionOf(name: string): string {
  return path.extname(name).slice(1).toLowerCase();
}

function compareNames(a: AudioFile, b: AudioFile): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  // Undecodable bytes all read as U+FFFD, so ties fall back to the raw name
  return Buffer.compare(a.rawName, b.rawName);
}

/**
 * Lists the audio files sitting directly in `inputDir`, sorted by name.
 * An empty result is not an error; a missing directory is.
 *
 * Names are read as bytes: a name that is not valid UTF-8 (a Shift-JIS
 * recording, say) keeps its exact on-disk path in `rawPath`, and only
 * `name` and `sourcePath` are decoded, for display.
 */
export async function discover(
  inputDir: string,
  extensions: readonly string[] = AUDIO_EXTENSIONS
): Promise<AudioFile[]> {
  const dir = path.resolve(inputDir);
  const wanted = new Set(extensions.map((ext) => ext.replace(/^\./, "").toLowerCase()));

  let rawNames: Buffer[];
  try {
    const stat = await fs.stat(dir);
    if (!stat.isDirectory()) {
      throw new DiscoveryError(`Input path is not a directory: ${dir}`);
    }
    rawNames = await fs.readdir(dir, { encoding: "buffer" });
  } catch (err) {
    if (err instanceof DiscoveryError) throw err;
    throw new DiscoveryError(`Cannot read input directory ${dir}`, { cause: err });
  }

  const dirPrefix = Buffer.from(dir.endsWith(path.sep) ? dir : dir + path.sep);
  const files: AudioFile[] = [];
  for (const rawName of rawNames) {
    const name = rawName.toString("utf8");
    const extension = extensionOf(name);
    if (!wanted.has(extension)) continue;

    const rawPath = Buffer.concat([dirPrefix, rawName]);
    const sourcePath = path.join(dir, name);
    let sizeBytes: number;
    try {
      // stat follows symlinks, so a link to an audio file counts as one
      const stat = await fs.stat(rawPath);
      if (!stat.isFile()) continue;
      sizeBytes = stat.size;
    } catch (err) {
      // Removed while listing
      if (isMissingPathError(err)) continue;
      throw new DiscoveryError(`Cannot inspect ${sourcePath}`, { cause: err });
    }

    files.push({ sourcePath, rawPath, rawName, name, sizeBytes, extension });
  }

  return files.sort(compareNames);
}
