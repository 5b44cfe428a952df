import type { TranscriptionEngine } from "../engine.js";
import type { TranscriptionResult } from "../types.js";

// The engine makes no promise about concurrent calls, so each transcription
// waits for the previous one to settle before it enters the engine.
export function serializeEngine(engine: TranscriptionEngine): TranscriptionEngine {
  let tail: Promise<unknown> = Promise.resolve();

  return {
    model: engine.model,
    transcribe(filePath: string, languageHint: string): Promise<TranscriptionResult> {
      const next = tail.then(() => engine.transcribe(filePath, languageHint));
      // A rejection belongs to its own caller, not to whoever queues next
      tail = next.catch(() => undefined);
      return next;
    },
  };
}
