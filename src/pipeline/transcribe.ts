import path from "node:path";
import fs from "node:fs/promises";
import type { ServiceConfig } from "../config.js";
import { ggmlModelFileName, type ModelSize } from "../constants.js";
import type { EngineLoader, TranscriptionEngine } from "../engine.js";
import { EngineLoadError } from "../errors.js";
import type { TranscriptionResult } from "../types.js";
import { runCommand, type CommandRunner } from "../utils/process.js";

export interface WhisperCppOptions {
  whisperCmd: string; // e.g., whisper-cli
  modelsDir: string;
  run?: CommandRunner;
}

class WhisperCppEngine implements TranscriptionEngine {
  constructor(
    readonly model: ModelSize,
    private readonly modelPath: string,
    private readonly opts: WhisperCppOptions
  ) {}

  async transcribe(filePath: string, languageHint: string): Promise<TranscriptionResult> {
    // Output lands beside the input so it goes away with the staging directory
    const outPrefix = path.join(
      path.dirname(filePath),
      `whisper_${path.basename(filePath, path.extname(filePath))}`
    );

    const args = ["-m", this.modelPath, "-f", filePath, "-of", outPrefix, "-otxt"];
    if (languageHint) {
      args.push("-l", languageHint);
    }

    await (this.opts.run ?? runCommand)(this.opts.whisperCmd, args);

    const txtPath = `${outPrefix}.txt`;
    let text: string;
    try {
      text = await fs.readFile(txtPath, "utf-8");
    } catch (err) {
      throw new Error(`Whisper output not found at ${txtPath}`, { cause: err });
    }

    return { text: text.trim(), language: languageHint || undefined, model: this.model };
  }
}

export function createWhisperCppLoader(opts: WhisperCppOptions): EngineLoader {
  return {
    async load(model) {
      const modelPath = path.join(opts.modelsDir, ggmlModelFileName(model));
      try {
        const stat = await fs.stat(modelPath);
        if (!stat.isFile()) {
          throw new Error(`${modelPath} is not a file`);
        }
      } catch (err) {
        throw new EngineLoadError(`Whisper model '${model}' not found at ${modelPath}`, {
          cause: err,
        });
      }
      return new WhisperCppEngine(model, modelPath, opts);
    },
  };
}

export function whisperCppOptionsFrom(cfg: ServiceConfig): WhisperCppOptions {
  return { whisperCmd: cfg.whisperCmd, modelsDir: cfg.modelsDir };
}
