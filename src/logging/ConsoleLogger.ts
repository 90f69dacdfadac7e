import type { ILogger, LogLevel } from '../interfaces/ILogger';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Matches `password='...'` as it appears in connection strings. */
export const DEFAULT_REDACT_PATTERNS: readonly RegExp[] = [/(?<=password=')(.*?)(?=')/gi];

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  component?: string;
  redactPatterns?: readonly RegExp[];
  replacement?: string;
  // Overridable for tests; defaults to the console method matching the level.
  write?: (level: LogLevel, line: string) => void;
}

function writeToConsole(level: LogLevel, line: string): void {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

/**
 * Console logger producing `[Component] message {context}` lines.
 * Secrets matching the redaction patterns are replaced before anything is written.
 */
export class ConsoleLogger implements ILogger {
  private readonly level: LogLevel;
  private readonly component?: string;
  private readonly patterns: readonly RegExp[];
  private readonly replacement: string;
  private readonly write: (level: LogLevel, line: string) => void;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.component = options.component;
    this.patterns = options.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
    this.replacement = options.replacement ?? '***';
    this.write = options.write ?? writeToConsole;
  }

  public redact(text: string): string {
    return this.patterns.reduce((acc, pattern) => acc.replace(pattern, this.replacement), text);
  }

  public format(message: string, context?: Record<string, unknown>): string {
    let line = this.component ? `[${this.component}] ${message}` : message;
    if (context && Object.keys(context).length > 0) {
      let serialized: string;
      try {
        serialized = JSON.stringify(context);
      } catch {
        serialized = String(context);
      }
      line += ` ${serialized}`;
    }
    return this.redact(line);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.level]) {
      return;
    }
    this.write(level, this.format(message, context));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  child(component: string): ConsoleLogger {
    return new ConsoleLogger({
      level: this.level,
      component,
      redactPatterns: this.patterns,
      replacement: this.replacement,
      write: this.write,
    });
  }
}
