/**
 * Centralized model and input configuration
 * Single source of truth for model sizes, defaults and recognized audio types
 */

// Model sizes the engines know how to load
export const MODEL_SIZES = ["tiny", "base", "small", "medium", "large"] as const;

export type ModelSize = (typeof MODEL_SIZES)[number];

export const DEFAULT_MODEL: ModelSize = "medium";
export const DEFAULT_LANGUAGE = "ja";
export const DEFAULT_INPUT_DIR = "input";
export const DEFAULT_OUTPUT_DIR = "output";

// Extensions picked up from the input folder (compared case-insensitively)
export const AUDIO_EXTENSIONS = ["mp3", "m4a", "wav", "flac", "ogg", "mp4"] as const;

export const ASR_ENGINES = ["local", "whisper-cpp"] as const;

export type AsrEngineKind = (typeof ASR_ENGINES)[number];

export function isModelSize(model: string): model is ModelSize {
  return MODEL_SIZES.some((size) => size === model);
}

// ggml file name whisper.cpp expects for a model size
export function ggmlModelFileName(model: ModelSize): string {
  return `ggml-${model}.bin`;
}

export function audioMimeType(extension: string): string {
  const mimeTypes: Record<string, string> = {
    mp3: "audio/mpeg",
    wav: "audio/wav",
    m4a: "audio/mp4",
    mp4: "audio/mp4",
    ogg: "audio/ogg",
    flac: "audio/flac",
  };
  return mimeTypes[extension.toLowerCase()] ?? "application/octet-stream";
}
