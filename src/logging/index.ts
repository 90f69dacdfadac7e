export { ConsoleLogger, DEFAULT_REDACT_PATTERNS } from './ConsoleLogger';
export type { ConsoleLoggerOptions } from './ConsoleLogger';
export { NullLogger } from './NullLogger';
export type { LogEntry } from './NullLogger';
