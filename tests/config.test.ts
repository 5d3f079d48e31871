import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { resolveConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('resolveConfig()', () => {
  const cwd = '/work/app';

  it('should apply defaults relative to the working directory', () => {
    expect(resolveConfig({}, { CALLTRACE_CWD: cwd })).toEqual({
      projectRoot: '/work/app',
      dbDirectory: path.join(cwd, 'calltrace_runs'),
      dbPath: null,
      dumpDirectory: path.join(cwd, 'calltrace_dumps'),
      fallback: false,
      spans: false,
      busyTimeoutMs: 2000,
    });
  });

  it('should read environment variables', () => {
    const config = resolveConfig(
      {},
      {
        CALLTRACE_CWD: cwd,
        CALLTRACE_PROJECT_ROOT: 'src',
        CALLTRACE_DB_PATH: 'out/trace.db',
        CALLTRACE_DUMP_DIR: '/tmp/dumps',
        CALLTRACE_FALLBACK: 'yes',
        CALLTRACE_SPANS: 'ON',
        CALLTRACE_BUSY_TIMEOUT_MS: '50',
      }
    );
    expect(config).toMatchObject({
      projectRoot: '/work/app/src',
      dbPath: '/work/app/out/trace.db',
      dumpDirectory: '/tmp/dumps',
      fallback: true,
      spans: true,
      busyTimeoutMs: 50,
    });
  });

  it('should prefer explicit options over the environment', () => {
    const config = resolveConfig(
      { fallback: false, dbPath: ':memory:', busyTimeoutMs: 10 },
      { CALLTRACE_CWD: cwd, CALLTRACE_FALLBACK: '1', CALLTRACE_DB_PATH: 'x.db', CALLTRACE_BUSY_TIMEOUT_MS: '99' }
    );
    expect(config.fallback).toBe(false);
    expect(config.dbPath).toBe(':memory:');
    expect(config.busyTimeoutMs).toBe(10);
  });

  it('should reject malformed values', () => {
    expect(() => resolveConfig({}, { CALLTRACE_SPANS: 'maybe' })).toThrow(ConfigError);
    expect(() => resolveConfig({}, { CALLTRACE_BUSY_TIMEOUT_MS: '-1' })).toThrow(
      "CALLTRACE_BUSY_TIMEOUT_MS must be a non-negative integer, got '-1'"
    );
    expect(() => resolveConfig({ busyTimeoutMs: 1.5 })).toThrow(ConfigError);
  });
});
