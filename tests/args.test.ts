import { describe, expect, test } from "vitest";

import { parseCliArgs, UsageError } from "../src/args.js";

describe("parseCliArgs", () => {
  test("uses the defaults when nothing is given", () => {
    expect(parseCliArgs([])).toEqual({
      inputDir: "input",
      outputDir: "output",
      model: "medium",
      language: "ja",
      help: false,
    });
  });

  test("reads positionals and options", () => {
    expect(parseCliArgs(["recordings", "transcripts", "--model", "large", "-l", "en"])).toEqual({
      inputDir: "recordings",
      outputDir: "transcripts",
      model: "large",
      language: "en",
      help: false,
    });
  });

  test("recognizes help", () => {
    expect(parseCliArgs(["-h"]).help).toBe(true);
  });

  test("rejects an unknown model size", () => {
    expect(() => parseCliArgs(["--model", "huge"])).toThrow(UsageError);
  });

  test("rejects unknown flags and extra positionals", () => {
    expect(() => parseCliArgs(["--verbose"])).toThrow(UsageError);
    expect(() => parseCliArgs(["a", "b", "c"])).toThrow("Unexpected argument: c");
  });
});
