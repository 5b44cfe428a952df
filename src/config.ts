import path from "node:path";
import os from "node:os";
import { z } from "zod";
import { ASR_ENGINES, type AsrEngineKind } from "./constants.js";
import { ConfigError } from "./errors.js";

export interface ServiceConfig {
  asrEngine: AsrEngineKind;
  // Local ASR service configuration
  localAsrBaseUrl: string; // e.g., http://localhost:5689
  localTimeoutMs: number; // timeout for one transcription request
  // whisper.cpp configuration
  whisperCmd: string;
  modelsDir: string;
  stagingDir: string; // scratch root for staged copies
  logDir: string;
  logToFile: boolean;
  logLevel: LogLevel;
}

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const rootDir = path.resolve(process.cwd());

const EnvSchema = z.object({
  ASR_ENGINE: z.enum(ASR_ENGINES).default("local"),
  LOCAL_ASR_BASE_URL: z.string().url().default("http://localhost:5689"),
  // Default 2 hours for full file processing, never below one minute
  LOCAL_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(7200000)
    .transform((ms) => Math.max(60000, ms)),
  WHISPER_CMD: z.string().default("whisper-cli"),
  WHISPER_MODELS_DIR: z.string().optional(),
  STAGING_DIR: z.string().optional(),
  LOG_DIR: z.string().optional(),
  LOG_TO_FILE: z
    .enum(["true", "false", "1", "0"])
    .default("true")
    .transform((flag) => flag === "true" || flag === "1"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  // Blank entries in a .env file count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const vars = parsed.data;

  return {
    asrEngine: vars.ASR_ENGINE,
    localAsrBaseUrl: vars.LOCAL_ASR_BASE_URL.replace(/\/+$/, ""),
    localTimeoutMs: vars.LOCAL_TIMEOUT_MS,
    whisperCmd: vars.WHISPER_CMD,
    modelsDir: path.resolve(rootDir, vars.WHISPER_MODELS_DIR ?? "models"),
    stagingDir: path.resolve(vars.STAGING_DIR ?? os.tmpdir()),
    logDir: path.resolve(rootDir, vars.LOG_DIR ?? "."),
    logToFile: vars.LOG_TO_FILE,
    logLevel: vars.LOG_LEVEL,
  };
}
