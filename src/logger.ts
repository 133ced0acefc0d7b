export type LogLevel = "info" | "success" | "warn" | "error" | "debug";

export interface LogSink {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface LoggerOptions {
  verbose?: boolean;
  color?: boolean;
  sink?: LogSink;
}

const COLORS: Record<LogLevel, string> = {
  info: "\x1b[0;34m",
  success: "\x1b[0;32m",
  warn: "\x1b[1;33m",
  error: "\x1b[0;31m",
  debug: "\x1b[0;90m",
};
const RESET = "\x1b[0m";

const LABELS: Record<LogLevel, string> = {
  info: "INFO",
  success: "SUCCESS",
  warn: "WARNING",
  error: "ERROR",
  debug: "DEBUG",
};

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/** Colours are used only on a TTY, and never when NO_COLOR is set. */
export function shouldUseColor(requested: boolean, stream: { isTTY?: boolean } = process.stdout): boolean {
  return requested && stream.isTTY === true && !process.env.NO_COLOR;
}

export class Logger {
  readonly verbose: boolean;
  readonly color: boolean;
  private sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.color = options.color ?? false;
    this.sink = options.sink ?? consoleSink;
  }

  info(message: string): void {
    this.sink.out(this.format("info", message));
  }

  success(message: string): void {
    this.sink.out(this.format("success", message));
  }

  warn(message: string): void {
    this.sink.out(this.format("warn", message));
  }

  error(message: string): void {
    this.sink.err(this.format("error", message));
  }

  debug(message: string): void {
    if (!this.verbose) return;
    this.sink.out(this.format("debug", message));
  }

  divider(): void {
    this.info("=".repeat(50));
  }

  private format(level: LogLevel, message: string): string {
    const label = `[${LABELS[level]}]`;
    return this.color ? `${COLORS[level]}${label}${RESET} ${message}` : `${label} ${message}`;
  }
}
