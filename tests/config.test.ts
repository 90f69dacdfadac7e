import { describe, it, expect } from '@jest/globals';
import os from 'os';
import { loadConfig } from '../src/config';
import { ConfigError } from '../src/core/errors';

describe('loadConfig', () => {
  it('should use defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      host: '0.0.0.0',
      logLevel: 'info',
      workDirBase: os.tmpdir(),
      removeWorkDir: false,
      feedbackDir: undefined,
    });
  });

  it('should prefer STEPLINE_ variables over generic ones', () => {
    const config = loadConfig({
      STEPLINE_PORT: '8080',
      PORT: '9090',
      HOST: '127.0.0.1',
      STEPLINE_LOG_LEVEL: 'DEBUG',
      STEPLINE_WORKDIR_BASE: '/var/tmp/stepline',
      STEPLINE_REMOVE_WORKDIR: 'yes',
      STEPLINE_FEEDBACK_DIR: '/var/tmp/feedback',
    });

    expect(config).toEqual({
      port: 8080,
      host: '127.0.0.1',
      logLevel: 'debug',
      workDirBase: '/var/tmp/stepline',
      removeWorkDir: true,
      feedbackDir: '/var/tmp/feedback',
    });
  });

  it('should treat empty values as unset', () => {
    expect(loadConfig({ STEPLINE_PORT: '', PORT: '4000' }).port).toBe(4000);
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: '70000' })).toThrow('Port must be an integer between 0 and 65535, got: 70000');
    expect(() => loadConfig({ STEPLINE_LOG_LEVEL: 'verbose' })).toThrow(
      'STEPLINE_LOG_LEVEL must be one of debug, info, warn, error, got: verbose'
    );
    expect(() => loadConfig({ STEPLINE_REMOVE_WORKDIR: 'maybe' })).toThrow(
      'STEPLINE_REMOVE_WORKDIR must be a boolean (true/false/1/0/yes/no), got: maybe'
    );
  });
});
