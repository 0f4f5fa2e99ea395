const RED = "\x1b[0;31m";
const GREEN = "\x1b[0;32m";
const YELLOW = "\x1b[1;33m";
const BLUE = "\x1b[0;34m";
const NC = "\x1b[0m";

const BANNER_WIDTH = 48;

export type BannerColor = "blue" | "green";

export interface LogSink {
  write(text: string): unknown;
  isTTY?: boolean;
}

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string, context?: string): void;
  debug(message: string): void;
  banner(title: string, color: BannerColor): void;
  plain(line?: string): void;
}

export interface LoggerOptions {
  out?: LogSink;
  err?: LogSink;
  /** Defaults to on when `out` is a TTY and NO_COLOR is unset. */
  color?: boolean;
  debug?: boolean;
}

export function indentBlock(text: string, spaces = 4): string {
  const prefix = " ".repeat(spaces);
  return text
    .split("\n")
    .map((line) => (line.length > 0 ? `${prefix}${line}` : ""))
    .join("\n");
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const out = options.out ?? process.stdout;
  const err = options.err ?? process.stderr;
  const color = options.color ?? (Boolean(out.isTTY) && !process.env.NO_COLOR);
  const debugEnabled = options.debug ?? false;

  const paint = (code: string, text: string): string =>
    color ? `${code}${text}${NC}` : text;

  const writeLine = (sink: LogSink, line: string) => {
    sink.write(`${line}\n`);
  };

  const withContext = (sink: LogSink, context?: string) => {
    if (!context) return;
    writeLine(sink, indentBlock(context.trimEnd()));
  };

  return {
    info(message) {
      writeLine(out, `${paint(BLUE, "[INFO]")} ${message}`);
    },
    success(message) {
      writeLine(out, `${paint(GREEN, "[SUCCESS]")} ${message}`);
    },
    warn(message) {
      writeLine(out, `${paint(YELLOW, "[WARNING]")} ${message}`);
    },
    error(message, context) {
      writeLine(err, `${paint(RED, "[ERROR]")} ${message}`);
      withContext(err, context);
    },
    debug(message) {
      if (!debugEnabled) return;
      writeLine(out, `[DEBUG] ${message}`);
    },
    banner(title, bannerColor) {
      const code = bannerColor === "green" ? GREEN : BLUE;
      const rule = "=".repeat(BANNER_WIDTH);
      const pad = Math.max(0, Math.floor((BANNER_WIDTH - title.length) / 2));
      writeLine(out, paint(code, rule));
      writeLine(out, paint(code, `${" ".repeat(pad)}${title}`));
      writeLine(out, paint(code, rule));
    },
    plain(line = "") {
      writeLine(out, line);
    },
  };
}
