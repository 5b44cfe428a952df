import fs from "fs/promises";
import path from "path";

import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { EngineLoadError } from "../src/errors.js";
import { createWhisperCppLoader } from "../src/pipeline/transcribe.js";
import type { CommandRunner } from "../src/utils/process.js";
import { makeTempDir, writeBytes } from "./helpers.js";

describe("whisper.cpp engine", () => {
  let workDir: string;
  let modelsDir: string;
  let audioPath: string;

  beforeEach(async () => {
    workDir = await makeTempDir("whisper-cpp-test");
    modelsDir = path.join(workDir, "models");
    await fs.mkdir(modelsDir);
    await writeBytes(path.join(modelsDir, "ggml-small.bin"), 16);
    audioPath = path.join(workDir, "audio_00ff00ff00ff00ff.flac");
    await writeBytes(audioPath, 16);
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  test("fails to load a model that is not on disk", async () => {
    const loader = createWhisperCppLoader({ whisperCmd: "whisper-cli", modelsDir });

    await expect(loader.load("large")).rejects.toBeInstanceOf(EngineLoadError);
  });

  test("runs the binary with an argument vector and reads the txt output", async () => {
    const invocations: { command: string; args: string[] }[] = [];
    const run: CommandRunner = async (command, args) => {
      invocations.push({ command, args });
      const prefix = args[args.indexOf("-of") + 1] ?? "";
      await fs.writeFile(`${prefix}.txt`, " 書き起こし結果\n", "utf-8");
      return { stdout: "", stderr: "", exitCode: 0 };
    };
    const loader = createWhisperCppLoader({ whisperCmd: "whisper-cli", modelsDir, run });

    const engine = await loader.load("small");
    const result = await engine.transcribe(audioPath, "ja");

    const prefix = path.join(workDir, "whisper_audio_00ff00ff00ff00ff");
    expect(invocations).toEqual([
      {
        command: "whisper-cli",
        args: [
          "-m",
          path.join(modelsDir, "ggml-small.bin"),
          "-f",
          audioPath,
          "-of",
          prefix,
          "-otxt",
          "-l",
          "ja",
        ],
      },
    ]);
    expect(result).toEqual({ text: "書き起こし結果", language: "ja", model: "small" });
  });

  test("fails when the binary produced no transcript", async () => {
    const run: CommandRunner = async () => ({ stdout: "", stderr: "", exitCode: 0 });
    const engine = await createWhisperCppLoader({ whisperCmd: "whisper-cli", modelsDir, run }).load("small");

    await expect(engine.transcribe(audioPath, "ja")).rejects.toThrow(/Whisper output not found/);
  });

  test("propagates a failing command", async () => {
    const run: CommandRunner = async () => {
      throw new Error("Command failed (whisper-cli): code=3");
    };
    const engine = await createWhisperCppLoader({ whisperCmd: "whisper-cli", modelsDir, run }).load("small");

    await expect(engine.transcribe(audioPath, "ja")).rejects.toThrow("code=3");
  });
});
