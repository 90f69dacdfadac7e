export type { ILogger, LogLevel } from './ILogger';
