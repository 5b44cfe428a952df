import fs from "fs/promises";
import path from "path";

import { MockAgent } from "undici";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { EngineLoadError } from "../src/errors.js";
import { createLocalAsrLoader } from "../src/pipeline/transcribe_local.js";
import { makeTempDir, writeBytes } from "./helpers.js";

const BASE_URL = "http://asr.test";

describe("local ASR engine", () => {
  let agent: MockAgent;
  let workDir: string;
  let audioPath: string;

  beforeEach(async () => {
    agent = new MockAgent();
    agent.disableNetConnect();
    workDir = await makeTempDir("local-asr-test");
    audioPath = path.join(workDir, "audio_0123456789abcdef.wav");
    await writeBytes(audioPath, 32);
  });

  afterEach(async () => {
    await agent.close();
    await fs.rm(workDir, { recursive: true, force: true });
  });

  function loader() {
    return createLocalAsrLoader({ baseUrl: BASE_URL, timeoutMs: 60000, dispatcher: agent });
  }

  test("loads once the health check answers", async () => {
    agent.get(BASE_URL).intercept({ path: "/healthz", method: "GET" }).reply(200, { ok: true });

    const engine = await loader().load("medium");

    expect(engine.model).toBe("medium");
  });

  test("a failing health check is an EngineLoadError", async () => {
    agent.get(BASE_URL).intercept({ path: "/healthz", method: "GET" }).reply(503, "warming up");

    await expect(loader().load("small")).rejects.toBeInstanceOf(EngineLoadError);
  });

  test("an unreachable service is an EngineLoadError", async () => {
    const unreachable = createLocalAsrLoader({
      baseUrl: "http://nowhere.test",
      timeoutMs: 60000,
      dispatcher: agent,
    });

    await expect(unreachable.load("small")).rejects.toThrow(/Local ASR service is not available at http:\/\/nowhere.test/);
  });

  test("posts the staged file and normalizes the verbose_json answer", async () => {
    const pool = agent.get(BASE_URL);
    pool.intercept({ path: "/healthz", method: "GET" }).reply(200, { ok: true });
    pool.intercept({ path: "/openai/v1/audio/transcriptions", method: "POST" }).reply(200, {
      text: "  こんにちは。今日は晴れです。 ",
      language: "ja",
      duration: 3.25,
      segments: [
        { start: 0, end: 1.2, text: " こんにちは。" },
        { start: 1.2, end: 3.25, text: "今日は晴れです。 " },
      ],
    });

    const engine = await loader().load("large");
    const result = await engine.transcribe(audioPath, "ja");

    expect(result).toEqual({
      text: "こんにちは。今日は晴れです。",
      language: "ja",
      durationMs: 3250,
      model: "large",
      segments: [
        { idx: 0, startMs: 0, endMs: 1200, text: "こんにちは。" },
        { idx: 1, startMs: 1200, endMs: 3250, text: "今日は晴れです。" },
      ],
    });
  });

  test("surfaces a non-2xx answer with its status and body", async () => {
    const pool = agent.get(BASE_URL);
    pool.intercept({ path: "/healthz", method: "GET" }).reply(200, { ok: true });
    pool.intercept({ path: "/openai/v1/audio/transcriptions", method: "POST" }).reply(500, "model crashed");

    const engine = await loader().load("base");

    await expect(engine.transcribe(audioPath, "en")).rejects.toThrow(
      "Local ASR transcription failed: 500 model crashed"
    );
  });

  test("rejects an answer without text", async () => {
    const pool = agent.get(BASE_URL);
    pool.intercept({ path: "/healthz", method: "GET" }).reply(200, { ok: true });
    pool.intercept({ path: "/openai/v1/audio/transcriptions", method: "POST" }).reply(200, { segments: [] });

    const engine = await loader().load("base");

    await expect(engine.transcribe(audioPath, "en")).rejects.toThrow(/unexpected payload/);
  });
});
