import type { ILogger, LogLevel } from '../interfaces/ILogger';

export interface LogEntry {
  level: LogLevel;
  component?: string;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * A logger that prints nothing. Entries are kept in memory so tests can
 * assert on them without capturing the console.
 */
export class NullLogger implements ILogger {
  readonly entries: LogEntry[];
  private readonly component?: string;

  constructor(component?: string, entries: LogEntry[] = []) {
    this.component = component;
    this.entries = entries;
  }

  private record(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level, component: this.component, message, context });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.record('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.record('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.record('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.record('error', message, context);
  }

  // Children share the parent's entry list.
  child(component: string): NullLogger {
    return new NullLogger(component, this.entries);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter(e => !level || e.level === level).map(e => e.message);
  }
}
