import type { RecallEvent } from '../types/events';
import { isLevelEnabled } from './levels';
import type { Logger, LogLevel } from './types';

/**
 * Writes to the console. Structured events count as debug output, so they
 * only appear when the level is `debug`.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel = 'debug') {}

  log(event: RecallEvent): void {
    if (!this.enabled('debug')) return;
    console.log(JSON.stringify(event));
  }

  trace(event: RecallEvent, message: string): void {
    if (!this.enabled('debug')) return;
    console.log(message, JSON.stringify(event));
  }

  debug(message: string): void {
    if (!this.enabled('debug')) return;
    console.debug(message);
  }

  info(message: string): void {
    if (!this.enabled('info')) return;
    console.info(message);
  }

  warn(message: string): void {
    if (!this.enabled('warn')) return;
    console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private enabled(level: LogLevel): boolean {
    return isLevelEnabled(level, this.level);
  }
}

/** Logger that drops everything; used by tests and `--quiet` runs. */
export class SilentLogger implements Logger {
  log(_event: RecallEvent): void {}
  trace(_event: RecallEvent, _message: string): void {}
  debug(_message: string): void {}
  info(_message: string): void {}
  warn(_message: string): void {}
  error(_error: Error, _message?: string): void {}
  child(_bindings: Record<string, unknown>): Logger {
    return this;
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: RecallEvent) {
    return this.base.log(event);
  }

  trace(event: RecallEvent, message: string) {
    return this.base.trace(event, this.withPrefix(message));
  }

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
