import fs from "node:fs/promises";
import path from "node:path";
import { Blob } from "node:buffer";
import { fetch, FormData, type Dispatcher } from "undici";
import { z } from "zod";
import type { ServiceConfig } from "../config.js";
import { audioMimeType, type ModelSize } from "../constants.js";
import type { EngineLoader, TranscriptionEngine } from "../engine.js";
import { EngineLoadError, errorMessage } from "../errors.js";
import type { TranscriptionResult, TranscriptSegment } from "../types.js";

export interface LocalAsrOptions {
  baseUrl: string; // e.g., http://localhost:5689
  timeoutMs: number;
  dispatcher?: Dispatcher; // tests route requests through a MockAgent
}

// OpenAI-compatible verbose_json, as served by the local ASR service
const VerboseJsonSchema = z.object({
  text: z.string(),
  language: z.string().optional(),
  duration: z.number().optional(),
  segments: z
    .array(
      z.object({
        start: z.number().optional(),
        end: z.number().optional(),
        text: z.string().optional(),
      })
    )
    .optional(),
});

type VerboseJson = z.infer<typeof VerboseJsonSchema>;

function normalizeLocalAsrResponse(raw: VerboseJson, model: ModelSize): TranscriptionResult {
  const segments: TranscriptSegment[] = (raw.segments ?? []).map((s, idx) => ({
    idx,
    startMs: Math.round((s.start ?? 0) * 1000),
    endMs: Math.round((s.end ?? 0) * 1000),
    text: (s.text ?? "").trim(),
  }));

  return {
    text: raw.text.trim(),
    language: raw.language,
    durationMs: raw.duration !== undefined ? Math.round(raw.duration * 1000) : undefined,
    model,
    segments,
  };
}

class LocalAsrEngine implements TranscriptionEngine {
  constructor(
    readonly model: ModelSize,
    private readonly opts: LocalAsrOptions
  ) {}

  async transcribe(filePath: string, languageHint: string): Promise<TranscriptionResult> {
    const audioBuffer = await fs.readFile(filePath);
    const fileName = path.basename(filePath);
    const audio = new Blob([audioBuffer], {
      type: audioMimeType(path.extname(fileName).slice(1)),
    });

    const form = new FormData();
    form.append("file", audio, fileName);
    form.append("model", this.model);
    form.append("task", "transcribe");
    if (languageHint) {
      form.append("language", languageHint);
    }
    form.append("response_format", "verbose_json");

    const response = await fetch(`${this.opts.baseUrl}/openai/v1/audio/transcriptions`, {
      method: "POST",
      body: form,
      signal: AbortSignal.timeout(this.opts.timeoutMs),
      dispatcher: this.opts.dispatcher,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Local ASR transcription failed: ${response.status} ${errorText}`);
    }

    const parsed = VerboseJsonSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Local ASR returned an unexpected payload: ${parsed.error.message}`);
    }
    return normalizeLocalAsrResponse(parsed.data, this.model);
  }
}

export function createLocalAsrLoader(opts: LocalAsrOptions): EngineLoader {
  return {
    async load(model) {
      try {
        const healthCheck = await fetch(`${opts.baseUrl}/healthz`, {
          dispatcher: opts.dispatcher,
          signal: AbortSignal.timeout(10000),
        });
        await healthCheck.text();
        if (!healthCheck.ok) {
          throw new Error(`health check failed: ${healthCheck.status}`);
        }
      } catch (err) {
        throw new EngineLoadError(
          `Local ASR service is not available at ${opts.baseUrl} (${errorMessage(err)}). Please ensure the service is running.`,
          { cause: err }
        );
      }
      return new LocalAsrEngine(model, opts);
    },
  };
}

export function localAsrOptionsFrom(cfg: ServiceConfig): LocalAsrOptions {
  return { baseUrl: cfg.localAsrBaseUrl, timeoutMs: cfg.localTimeoutMs };
}
