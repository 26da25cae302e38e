import { mkdirSync } from "node:fs";
import { join } from "node:path";
import log from "electron-log/node";
import { pad2 } from "../utils";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, string | number | boolean | undefined>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

/** Anything that accepts whole lines, in the manner of an output channel. */
export interface LogSink {
  appendLine(line: string): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

interface LoggerOptions {
  sinks: LogSink[];
  level?: LogLevel;
  scope?: string;
  now?: () => Date;
}

export function createLogger(options: LoggerOptions): Logger {
  return new LineLogger(
    options.sinks,
    LOG_LEVELS.indexOf(options.level ?? "info"),
    options.scope,
    options.now ?? (() => new Date())
  );
}

class LineLogger implements Logger {
  constructor(
    private readonly sinks: LogSink[],
    private readonly minLevel: number,
    private readonly scope: string | undefined,
    private readonly now: () => Date
  ) {}

  debug(message: string, fields?: LogFields): void {
    this.write("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write("info", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write("warn", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write("error", message, fields);
  }

  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new LineLogger(this.sinks, this.minLevel, nested, this.now);
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    if (LOG_LEVELS.indexOf(level) < this.minLevel || this.sinks.length === 0) {
      return;
    }
    const scope = this.scope ? ` [${this.scope}]` : "";
    const line = `${this.now().toISOString()} [${level}]${scope} ${message}${formatFields(fields)}`;
    for (const sink of this.sinks) {
      sink.appendLine(line);
    }
  }
}

export function formatFields(fields?: LogFields): string {
  if (!fields) {
    return "";
  }
  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    const text = String(value);
    parts.push(`${key}=${/\s/.test(text) ? JSON.stringify(text) : text}`);
  }
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

export class StreamLogSink implements LogSink {
  constructor(private readonly stream: NodeJS.WritableStream) {}

  appendLine(line: string): void {
    this.stream.write(`${line}\n`);
  }
}

export class MemoryLogSink implements LogSink {
  readonly lines: string[] = [];

  appendLine(line: string): void {
    this.lines.push(line);
  }
}

let fileLoggerCount = 0;

/**
 * Persists lines through an electron-log file transport under
 * `<logDir>/insight_capsule_YYYYMMDD.log`. The path is resolved per line, so a
 * session running past midnight continues in the next day's file. Write
 * failures are reported by electron-log and never raised to the caller.
 */
export class FileLogSink implements LogSink {
  private readonly fileLog = log.create({ logId: `insight-capsule-file-${++fileLoggerCount}` });

  constructor(
    private readonly logDir: string,
    private readonly clock: () => Date = () => new Date()
  ) {
    mkdirSync(logDir, { recursive: true });
    this.fileLog.transports.console.level = false;
    this.fileLog.transports.file.level = "silly";
    this.fileLog.transports.file.format = "{text}";
    this.fileLog.transports.file.resolvePathFn = () => this.path;
  }

  get path(): string {
    const date = this.clock();
    const stamp = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
    return join(this.logDir, `insight_capsule_${stamp}.log`);
  }

  appendLine(line: string): void {
    this.fileLog.info(line);
  }
}
