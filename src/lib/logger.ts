import fs from "node:fs";
import path from "node:path";
import chalk from "chalk";

export type LogLevel = "info" | "warn" | "error";

export interface LogEntry {
  time: string;
  level: LogLevel;
  event: string;
  [field: string]: unknown;
}

export interface LogSink {
  write(entry: LogEntry): Promise<void>;
}

/** Appends one JSON object per line. The parent directory is created on first write. */
export class FileLogSink implements LogSink {
  private dirReady = false;

  constructor(readonly filePath: string) {}

  async write(entry: LogEntry): Promise<void> {
    if (!this.dirReady) {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      this.dirReady = true;
    }
    await fs.promises.appendFile(this.filePath, `${JSON.stringify(entry)}\n`, "utf8");
  }
}

export interface LoggerOptions {
  audit: LogSink;
  errors: LogSink;
  now?: () => number;
}

/**
 * Two persistent channels: `audit` records every admission and lifecycle
 * decision, `errors` keeps full failure detail that callers never see.
 */
export class Logger {
  private readonly now: () => number;

  constructor(private readonly options: LoggerOptions) {
    this.now = options.now ?? Date.now;
  }

  async audit(event: string, fields: Record<string, unknown> = {}, level: LogLevel = "info"): Promise<void> {
    await this.emit(this.options.audit, level, event, fields);
  }

  async error(event: string, fields: Record<string, unknown> = {}): Promise<void> {
    await this.emit(this.options.errors, "error", event, fields);
  }

  private async emit(sink: LogSink, level: LogLevel, event: string, fields: Record<string, unknown>): Promise<void> {
    const entry: LogEntry = {
      ...fields,
      time: new Date(this.now()).toISOString(),
      level,
      event
    };
    try {
      await sink.write(entry);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.yellow(`Log write failed for ${event}: ${message}`));
    }
  }
}

export function createFileLogger(logsDir: string, now?: () => number): Logger {
  return new Logger({
    audit: new FileLogSink(path.join(logsDir, "audit.log")),
    errors: new FileLogSink(path.join(logsDir, "errors.log")),
    now
  });
}
