/**
 * Level-prefixed diagnostics on stderr.
 *
 * stdout carries only the report, so every log line goes to stderr. Debug
 * lines are dropped unless verbose mode is on.
 */

import { Chalk, chalkStderr, type ChalkInstance } from "chalk";

export type LogLevel = "info" | "warn" | "error" | "debug";

export interface LoggerOptions {
  verbose?: boolean;
  /** Disable ANSI colours regardless of terminal support. */
  color?: boolean;
  /** Receives one formatted line, without trailing newline. */
  write?: (line: string) => void;
}

interface LevelStyle {
  label: string;
  paint: (c: ChalkInstance, s: string) => string;
}

const styles: Record<LogLevel, LevelStyle> = {
  info: { label: "INFO", paint: (c, s) => c.green(s) },
  warn: { label: "WARN", paint: (c, s) => c.yellow(s) },
  error: { label: "ERROR", paint: (c, s) => c.red(s) },
  debug: { label: "DEBUG", paint: (c, s) => c.blue(s) },
};

const writeStderr = (line: string): void => {
  process.stderr.write(`${line}\n`);
};

export class Logger {
  private verbose = false;
  private chalk: ChalkInstance = chalkStderr;
  private write: (line: string) => void = writeStderr;

  constructor(options: LoggerOptions = {}) {
    this.configure(options);
  }

  configure(options: LoggerOptions): void {
    if (options.verbose !== undefined) this.verbose = options.verbose;
    if (options.color !== undefined) {
      this.chalk = options.color ? chalkStderr : new Chalk({ level: 0 });
    }
    if (options.write) this.write = options.write;
  }

  get isVerbose(): boolean {
    return this.verbose;
  }

  debug(message: string): void {
    if (this.verbose) this.emit("debug", message);
  }

  info(message: string): void {
    this.emit("info", message);
  }

  warn(message: string): void {
    this.emit("warn", message);
  }

  error(message: string): void {
    this.emit("error", message);
  }

  private emit(level: LogLevel, message: string): void {
    const style = styles[level];
    this.write(`${style.paint(this.chalk, `[${style.label}]`)} ${message}`);
  }
}

/** Process-wide logger, configured once by the CLI. */
export const log = new Logger();
