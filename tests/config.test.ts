import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ConfigError } from '../src/types/errors.js';

describe('loadConfig', () => {
  it('未設定なら既定値', () => {
    expect(loadConfig({})).toEqual({ dbPath: 'threatreg.db', logLevel: 'info' });
  });

  it('THREATREG_DB_PATH / THREATREG_LOG_LEVEL を読む', () => {
    expect(
      loadConfig({ THREATREG_DB_PATH: ':memory:', THREATREG_LOG_LEVEL: 'debug' }),
    ).toEqual({ dbPath: ':memory:', logLevel: 'debug' });
  });

  it('不正なログレベルは ConfigError', () => {
    expect(() => loadConfig({ THREATREG_LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
    try {
      loadConfig({ THREATREG_LOG_LEVEL: 'verbose' });
    } catch (error) {
      expect(error instanceof ConfigError && error.variable).toBe('THREATREG_LOG_LEVEL');
    }
  });

  it('空の DB パスは ConfigError', () => {
    expect(() => loadConfig({ THREATREG_DB_PATH: '' })).toThrow(/^Invalid THREATREG_DB_PATH: /);
  });
});
