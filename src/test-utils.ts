/**
 * In-process stand-ins for the terminal and external programs.
 */

import type { Settings } from "./config.js";
import { createLogger, type LogSink, type Logger } from "./logger.js";
import type { CommandResult, CommandRunner, RunOptions } from "./process.js";
import type { StepContext } from "./steps/types.js";

export class MemorySink implements LogSink {
  readonly chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  lines(): string[] {
    return this.chunks.join("").split("\n").filter((line) => line.length > 0);
  }
}

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
  /** `command args...` joined with single spaces. */
  line: string;
}

type Responder =
  | Partial<CommandResult>
  | ((call: RecordedCall) => Partial<CommandResult> | Promise<Partial<CommandResult>>);

const SUCCESS: CommandResult = {
  exitCode: 0,
  signal: null,
  stdout: "",
  stderr: "",
  timedOut: false,
};

export function exitWith(code: number, stderr = ""): Partial<CommandResult> {
  return { exitCode: code, stderr };
}

function enoent(command: string): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(`spawn ${command} ENOENT`);
  err.code = "ENOENT";
  return err;
}

/**
 * Answers commands from a script. Unscripted commands succeed with empty output.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly responders = new Map<string, Responder>();
  private readonly missing = new Set<string>();

  /** Script the result for an exact command line such as `brew list fd`. */
  on(line: string, responder: Responder): this {
    this.responders.set(line, responder);
    return this;
  }

  /** Make every invocation of `binary` fail as if it were not on PATH. */
  withoutBinary(binary: string): this {
    this.missing.add(binary);
    return this;
  }

  async run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const call: RecordedCall = { command, args, options, line: [command, ...args].join(" ") };
    this.calls.push(call);

    if (this.missing.has(command)) {
      return { ...SUCCESS, exitCode: null, spawnError: enoent(command) };
    }

    const responder = this.responders.get(call.line);
    if (!responder) return { ...SUCCESS };
    const partial = typeof responder === "function" ? await responder(call) : responder;
    return { ...SUCCESS, ...partial };
  }

  lines(): string[] {
    return this.calls.map((c) => c.line);
  }
}

export function createTestSettings(overrides: Partial<Settings> = {}): Settings {
  return {
    packages: ["neovim", "ripgrep"],
    fontCask: "font-hack-nerd-font",
    repoUrl: "https://example.com/nvim-config.git",
    configDir: "/tmp/nvim-setup-test/.config/nvim",
    homeDir: "/tmp/nvim-setup-test",
    debug: false,
    ...overrides,
  };
}

export interface TestContext extends StepContext {
  runner: FakeRunner;
  out: MemorySink;
}

export function createTestContext(
  options: { platform?: NodeJS.Platform; settings?: Partial<Settings>; runner?: FakeRunner } = {}
): TestContext {
  const out = new MemorySink();
  const logger: Logger = createLogger({ out, err: out, color: false });
  return {
    platform: options.platform ?? "darwin",
    settings: createTestSettings(options.settings),
    runner: options.runner ?? new FakeRunner(),
    logger,
    out,
  };
}
