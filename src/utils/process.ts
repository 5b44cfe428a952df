import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

// Arguments go straight to the binary as a vector, no shell quoting involved
export const runCommand: CommandRunner = async (command, args, options) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options?.cwd,
      env: { ...process.env, ...options?.env },
      timeout: options?.timeoutMs,
      encoding: "utf8",
      maxBuffer: 64 * 1024 * 1024,
    });

    return { stdout, stderr, exitCode: 0 };
  } catch (err: unknown) {
    const rawStdout = readField(err, "stdout");
    const rawStderr = readField(err, "stderr");
    const rawCode = readField(err, "code");
    const stdout = typeof rawStdout === "string" ? rawStdout : "";
    const stderr =
      typeof rawStderr === "string" && rawStderr !== ""
        ? rawStderr
        : err instanceof Error
          ? err.message
          : String(err);
    const exitCode = typeof rawCode === "number" ? rawCode : 1;
    throw new Error(
      `Command failed (${command} ${args.join(" ")}): code=${exitCode}\nSTDERR: ${stderr}\nSTDOUT: ${stdout}`,
      { cause: err }
    );
  }
};

function readField(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null || !(key in value)) {
    return undefined;
  }
  return Reflect.get(value, key);
}
