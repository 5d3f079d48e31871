/**
 * Option resolution for calltrace.
 *
 * Every setting can be given explicitly or through a `CALLTRACE_*`
 * environment variable; explicit options take precedence.
 */

import * as path from 'path';
import { ConfigError } from './errors.js';

export const MAX_VALUE_LENGTH = 1000;

const DEFAULT_DB_DIRECTORY = 'calltrace_runs';
const DEFAULT_DUMP_DIRECTORY = 'calltrace_dumps';
const DEFAULT_BUSY_TIMEOUT_MS = 2000;

export interface CalltraceOptions {
  /** Root of the traced project; only modules inside it are instrumented */
  projectRoot?: string;
  /** Directory for timestamped run databases */
  dbDirectory?: string;
  /** Explicit database file; overrides dbDirectory */
  dbPath?: string;
  /** Directory used by FileExporter */
  dumpDirectory?: string;
  /** Load modules unmodified when their source cannot be instrumented */
  fallback?: boolean;
  /** Mirror every call into an OpenTelemetry span */
  spans?: boolean;
  /** SQLite busy timeout in milliseconds */
  busyTimeoutMs?: number;
}

export interface ResolvedConfig {
  projectRoot: string;
  dbDirectory: string;
  dbPath: string | null;
  dumpDirectory: string;
  fallback: boolean;
  spans: boolean;
  busyTimeoutMs: number;
}

function parseFlag(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  throw new ConfigError(`${name} must be a boolean flag, got '${value}'`);
}

function parseTimeout(name: string, value: number | string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got '${value}'`);
  }
  return n;
}

/**
 * Merge explicit options with environment variables and defaults.
 */
export function resolveConfig(
  options: CalltraceOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const cwd = env.CALLTRACE_CWD ?? process.cwd();
  const projectRoot = path.resolve(cwd, options.projectRoot ?? env.CALLTRACE_PROJECT_ROOT ?? '.');
  const dbPath = options.dbPath ?? env.CALLTRACE_DB_PATH ?? null;

  return {
    projectRoot,
    dbDirectory: path.resolve(cwd, options.dbDirectory ?? env.CALLTRACE_DB_DIR ?? DEFAULT_DB_DIRECTORY),
    dbPath: dbPath === null || dbPath === ':memory:' ? dbPath : path.resolve(cwd, dbPath),
    dumpDirectory: path.resolve(
      cwd,
      options.dumpDirectory ?? env.CALLTRACE_DUMP_DIR ?? DEFAULT_DUMP_DIRECTORY
    ),
    fallback: options.fallback ?? parseFlag('CALLTRACE_FALLBACK', env.CALLTRACE_FALLBACK) ?? false,
    spans: options.spans ?? parseFlag('CALLTRACE_SPANS', env.CALLTRACE_SPANS) ?? false,
    busyTimeoutMs:
      parseTimeout('busyTimeoutMs', options.busyTimeoutMs) ??
      parseTimeout('CALLTRACE_BUSY_TIMEOUT_MS', env.CALLTRACE_BUSY_TIMEOUT_MS) ??
      DEFAULT_BUSY_TIMEOUT_MS,
  };
}
