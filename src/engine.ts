import type { ModelSize } from "./constants.js";
import type { TranscriptionResult } from "./types.js";

export interface TranscriptionEngine {
  readonly model: ModelSize;
  /** Resolves once the whole file is transcribed; may take as long as the audio. */
  transcribe(filePath: string, languageHint: string): Promise<TranscriptionResult>;
}

export interface EngineLoader {
  /** Rejects with EngineLoadError when the model cannot be made ready. */
  load(model: ModelSize): Promise<TranscriptionEngine>;
}
