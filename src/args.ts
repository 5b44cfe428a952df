import { parseArgs } from "node:util";
import { z } from "zod";
import {
  DEFAULT_INPUT_DIR,
  DEFAULT_LANGUAGE,
  DEFAULT_MODEL,
  DEFAULT_OUTPUT_DIR,
  MODEL_SIZES,
  type ModelSize,
} from "./constants.js";

export const USAGE = `Usage: transcribe-batch [inputDir] [outputDir] [--model <size>] [--language <code>]

  inputDir           folder with audio files (default: ${DEFAULT_INPUT_DIR})
  outputDir          folder for the .txt transcripts (default: ${DEFAULT_OUTPUT_DIR})
  -m, --model        ${MODEL_SIZES.join("/")} (default: ${DEFAULT_MODEL})
  -l, --language     language code such as ja or en (default: ${DEFAULT_LANGUAGE})
  -h, --help         show this help`;

export interface CliArgs {
  inputDir: string;
  outputDir: string;
  model: ModelSize;
  language: string;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const ArgsSchema = z.object({
  inputDir: z.string().min(1).default(DEFAULT_INPUT_DIR),
  outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  model: z.enum(MODEL_SIZES).default(DEFAULT_MODEL),
  language: z
    .string()
    .regex(/^[A-Za-z]{2,3}([-_][A-Za-z0-9]+)?$/, "expected a language code such as ja or en")
    .default(DEFAULT_LANGUAGE),
  help: z.boolean().default(false),
});

export function parseCliArgs(argv: string[]): CliArgs {
  let values: { model?: string; language?: string; help?: boolean };
  let positionals: string[];
  try {
    ({ values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        model: { type: "string", short: "m" },
        language: { type: "string", short: "l" },
        help: { type: "boolean", short: "h" },
      },
    }));
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }

  if (positionals.length > 2) {
    throw new UsageError(`Unexpected argument: ${positionals[2]}`);
  }

  const parsed = ArgsSchema.safeParse({
    inputDir: positionals[0],
    outputDir: positionals[1],
    model: values.model,
    language: values.language,
    help: values.help,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new UsageError(`Invalid ${issue?.path.join(".") ?? "argument"}: ${issue?.message ?? "invalid value"}`);
  }
  return parsed.data;
}
