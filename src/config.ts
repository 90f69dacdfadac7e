// src/config.ts

import os from 'os';
import { ConfigError } from './core/errors';
import type { LogLevel } from './interfaces/ILogger';

export interface StepLineConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  workDirBase: string;
  removeWorkDir: boolean;
  // When set, the API writes each run's feedback to `<feedbackDir>/<run id>.json`.
  feedbackDir?: string;
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function firstSet(env: Env, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = env[key];
    if (value !== undefined && value !== '') return value;
  }
  return undefined;
}

function parsePort(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Port must be an integer between 0 and 65535, got: ${raw}`, { value: raw });
  }
  return port;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  if (raw === undefined) return 'info';
  const level = LOG_LEVELS.find(l => l === raw.toLowerCase());
  if (!level) {
    throw new ConfigError(`STEPLINE_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got: ${raw}`, { value: raw });
  }
  return level;
}

function parseBool(key: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  const normalized = raw.toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  throw new ConfigError(`${key} must be a boolean (true/false/1/0/yes/no), got: ${raw}`, { key, value: raw });
}

export function loadConfig(env: Env = process.env): StepLineConfig {
  return {
    port: parsePort(firstSet(env, 'STEPLINE_PORT', 'PORT'), 3001),
    host: firstSet(env, 'STEPLINE_HOST', 'HOST') ?? '0.0.0.0',
    logLevel: parseLogLevel(firstSet(env, 'STEPLINE_LOG_LEVEL')),
    workDirBase: firstSet(env, 'STEPLINE_WORKDIR_BASE') ?? os.tmpdir(),
    removeWorkDir: parseBool('STEPLINE_REMOVE_WORKDIR', firstSet(env, 'STEPLINE_REMOVE_WORKDIR'), false),
    feedbackDir: firstSet(env, 'STEPLINE_FEEDBACK_DIR'),
  };
}
