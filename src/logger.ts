import { describeErrorTrace } from "./common/errors.js";
import type { LogLevel, LogSink } from "./types.js";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type PrintLevel = Exclude<LogLevel, "silent">;

export interface LogStream {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  stream?: LogStream;
  now?: () => Date;
}

export class Logger implements LogSink {
  private readonly threshold: number;
  private readonly stream: LogStream;
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.threshold = LEVEL_RANK[options.level ?? "warn"];
    this.stream = options.stream ?? process.stderr;
    this.now = options.now ?? (() => new Date());
  }

  debug(message: string): void {
    this.print("debug", message);
  }

  info(message: string): void {
    this.print("info", message);
  }

  warn(message: string): void {
    this.print("warn", message);
  }

  error(message: string, error?: unknown): void {
    if (error === undefined) {
      this.print("error", message);
      return;
    }
    this.print("error", `${message}\n${describeErrorTrace(error)}`);
  }

  private print(level: PrintLevel, message: string): void {
    if (LEVEL_RANK[level] < this.threshold) {
      return;
    }
    const ts = this.now().toISOString();
    // Unified, grep-friendly log format.
    this.stream.write(`[${ts}] [${level.toUpperCase()}] ${message}\n`);
  }
}

export const silentLogger: LogSink = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
