import * as fs from 'fs/promises';
import { dirname } from 'path';
import type { RecallEvent } from '../types/events';
import { redactForLogs } from '../redaction';
import { isLevelEnabled } from './levels';
import type { Logger, LogLevel } from './types';

export interface JsonlLoggerOptions {
  /** Threshold for console messages; events always reach the file. */
  level?: LogLevel;
  bindings?: Record<string, unknown>;
}

/**
 * Appends redacted events to a JSONL file and prints messages at or above
 * `level` to the console. The file's directory is created on first write.
 */
export class JsonlLogger implements Logger {
  private readonly level: LogLevel;
  private readonly bindings: Record<string, unknown>;
  private directoryReady?: Promise<unknown>;

  constructor(
    private readonly filePath: string,
    options: JsonlLoggerOptions = {},
  ) {
    this.level = options.level ?? 'debug';
    this.bindings = options.bindings ?? {};
  }

  async log(event: RecallEvent): Promise<void> {
    const line = `${JSON.stringify(redactForLogs(event))}\n`;
    try {
      this.directoryReady ??= fs.mkdir(dirname(this.filePath), { recursive: true });
      await this.directoryReady;
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // A broken log file must not stop indexing or search.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: RecallEvent, _message: string): Promise<void> {
    await this.log(event);
  }

  debug(message: string): void {
    if (isLevelEnabled('debug', this.level)) console.debug(this.withPrefix(message));
  }

  info(message: string): void {
    if (isLevelEnabled('info', this.level)) console.info(this.withPrefix(message));
  }

  warn(message: string): void {
    if (isLevelEnabled('warn', this.level)) console.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(this.withPrefix(message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, {
      level: this.level,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
