import { spawn, type ChildProcess } from "child_process";

const FORCE_KILL_DELAY_MS = 5_000;
const DEFAULT_DRAIN_MS = 100;

export interface RunOptions {
  /** Inherit the parent's stdio so the user sees the tool's own progress output. */
  stream?: boolean;
  /** 0 or unset means no timeout. */
  timeoutMs?: number;
}

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Set when the process could not be started at all, e.g. ENOENT for a binary missing from PATH. */
  spawnError?: NodeJS.ErrnoException;
}

/**
 * Runs external programs. Never rejects for a non-zero exit; callers inspect the result.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

export function succeeded(result: CommandResult): boolean {
  return !result.spawnError && !result.timedOut && result.exitCode === 0;
}

export function isNotFound(result: CommandResult): boolean {
  return result.spawnError?.code === "ENOENT";
}

export function firstLine(text: string): string {
  return text.trim().split("\n")[0]?.trim() ?? "";
}

export function describeFailure(result: CommandResult): string {
  if (result.spawnError) return result.spawnError.message;
  if (result.timedOut) return "timed out";
  if (result.signal) return `terminated by signal ${result.signal}`;
  return `exit code ${result.exitCode}`;
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(" ");
}

export type VersionProbe =
  | { found: true; version: string }
  | { found: false; notFound: boolean; output: string };

/**
 * Runs `<command> --version`. A binary that starts but fails (e.g. the macOS
 * git stub without Command Line Tools) is not found either; its stderr is kept.
 */
export async function probeVersion(
  runner: CommandRunner,
  command: string,
  timeoutMs: number
): Promise<VersionProbe> {
  const result = await runner.run(command, ["--version"], { timeoutMs });
  if (succeeded(result)) {
    return { found: true, version: firstLine(result.stdout) || "unknown version" };
  }
  return {
    found: false,
    notFound: isNotFound(result),
    output: result.stderr.trim() || describeFailure(result),
  };
}

interface ProcessCompletion {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  spawnError?: NodeJS.ErrnoException;
}

function waitForProcessCompletion(
  proc: ChildProcess,
  timeoutMs: number,
  drainMs = DEFAULT_DRAIN_MS
): Promise<ProcessCompletion> {
  return new Promise((resolve) => {
    let settled = false;
    let timedOut = false;
    let exitCode: number | null = null;
    let signal: NodeJS.Signals | null = null;
    let timeoutHandle: NodeJS.Timeout | null = null;
    let finalizeTimer: NodeJS.Timeout | null = null;

    const finish = (spawnError?: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      if (timeoutHandle) clearTimeout(timeoutHandle);
      if (finalizeTimer) clearTimeout(finalizeTimer);
      resolve({ exitCode, signal, timedOut, spawnError });
    };

    if (timeoutMs > 0) {
      timeoutHandle = setTimeout(() => {
        timedOut = true;
        proc.kill("SIGTERM");
        setTimeout(() => {
          if (proc.exitCode === null) {
            proc.kill("SIGKILL");
          }
        }, FORCE_KILL_DELAY_MS).unref();
      }, timeoutMs);
    }

    proc.on("error", (err: NodeJS.ErrnoException) => finish(err));

    // "close" waits for stdio streams to close; descendants can keep them open.
    // Use "exit" as authoritative completion and keep a short drain window.
    proc.on("exit", (code, exitSignal) => {
      exitCode = code;
      signal = exitSignal;
      if (finalizeTimer) clearTimeout(finalizeTimer);
      finalizeTimer = setTimeout(() => finish(), Math.max(0, drainMs));
    });

    proc.on("close", (code, closeSignal) => {
      if (exitCode === null) exitCode = code;
      if (signal === null) signal = closeSignal;
      finish();
    });
  });
}

export class NodeCommandRunner implements CommandRunner {
  async run(
    command: string,
    args: string[],
    options: RunOptions = {}
  ): Promise<CommandResult> {
    const proc = spawn(command, args, {
      env: process.env,
      stdio: options.stream ? "inherit" : ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    proc.stdout?.on("data", (data: Buffer) => (stdout += data.toString()));
    proc.stderr?.on("data", (data: Buffer) => (stderr += data.toString()));

    const completion = await waitForProcessCompletion(proc, options.timeoutMs ?? 0);
    return { ...completion, stdout, stderr };
  }
}
