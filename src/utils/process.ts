import { execFile, spawn } from "node:child_process";
import { createInterface } from "node:readline";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export class CommandError extends Error {
  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stdout: string,
    public readonly stderr: string,
    options?: { cause?: unknown }
  ) {
    super(`Command failed (${command}): code=${exitCode}\nSTDERR: ${tail(stderr)}`, options);
    this.name = "CommandError";
  }
}

function tail(text: string, lines = 20): string {
  return text.trimEnd().split(/\r?\n/).slice(-lines).join("\n");
}

function execOutput(err: unknown): { stdout: string; stderr: string; exitCode: number } {
  if (typeof err !== "object" || err === null) {
    return { stdout: "", stderr: String(err), exitCode: 1 };
  }
  const stdout = "stdout" in err ? String(err.stdout ?? "") : "";
  const stderr = "stderr" in err && err.stderr ? String(err.stderr) : err instanceof Error ? err.message : "";
  const exitCode = "code" in err && typeof err.code === "number" ? err.code : 1;
  return { stdout, stderr, exitCode };
}

export async function runCommand(command: string, args: string[], options?: CommandOptions): Promise<CommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options?.cwd,
      env: { ...process.env, ...options?.env },
      timeout: options?.timeoutMs,
      signal: options?.signal,
      encoding: "utf8",
      maxBuffer: 64 * 1024 * 1024,
    });

    return { stdout, stderr, exitCode: 0 };
  } catch (err) {
    if (options?.signal?.aborted) {
      throw err;
    }
    const { stdout, stderr, exitCode } = execOutput(err);
    throw new CommandError(`${command} ${args.join(" ")}`, exitCode, stdout, stderr, { cause: err });
  }
}

/**
 * Spawns a command and yields its stdout line by line as it is produced.
 * Rejects with CommandError once the output is drained if the exit code is non-zero.
 */
export async function* streamCommandLines(
  command: string,
  args: string[],
  options?: CommandOptions
): AsyncGenerator<string, void, undefined> {
  const child = spawn(command, args, {
    cwd: options?.cwd,
    env: { ...process.env, ...options?.env },
    signal: options?.signal,
    stdio: ["ignore", "pipe", "pipe"],
  });

  let stderr = "";
  child.stderr.setEncoding("utf8");
  child.stderr.on("data", (chunk: string) => {
    stderr += chunk;
    // Keep only the tail; whisper.cpp is chatty on stderr
    if (stderr.length > 64 * 1024) stderr = stderr.slice(-32 * 1024);
  });

  const exited = new Promise<number>((resolve, reject) => {
    child.once("error", reject);
    child.once("close", (code) => resolve(code ?? 1));
  });
  // Observed below; avoid an unhandled rejection while lines are still being read
  exited.catch(() => undefined);

  const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      yield line;
    }
    const exitCode = await exited;
    if (exitCode !== 0) {
      throw new CommandError(`${command} ${args.join(" ")}`, exitCode, "", stderr);
    }
  } finally {
    lines.close();
    if (child.exitCode === null && !child.killed) {
      child.kill();
    }
  }
}
