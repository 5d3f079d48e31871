import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { startTracing, type TraceSession } from '../src/session.js';
import { trace } from '../src/trace.js';
import { getRecorder } from '../src/recorder.js';
import { openTraceStore } from '../src/store/trace-store.js';
import { CustomExporter } from '../src/exporters/custom.js';
import { REPORT_FILE, TRACE_JSON_FILE } from '../src/exporters/file.js';

describe('startTracing()', () => {
  let dir: string;
  let session: TraceSession | null;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'calltrace-session-'));
    session = null;
  });

  afterEach(() => {
    session?.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const square = trace(function square(n: number) {
    return n * n;
  });

  it('should install a recorder writing to the configured store', () => {
    session = startTracing({ instrument: false, dbPath: ':memory:', env: {} });

    expect(getRecorder()).toBe(session.recorder);
    expect(session.active).toBe(true);

    square(3);

    const calls = session.store.listCalls();
    expect(calls).toHaveLength(1);
    expect(calls[0].return_value).toBe('9');
    expect(session.render()).toContain('[DEPTH=0]     - n: 3');
  });

  it('should provision a run database in the database directory', () => {
    session = startTracing({ instrument: false, dbDirectory: dir, env: {} });

    expect(path.dirname(session.store.path)).toBe(dir);
    expect(path.basename(session.store.path)).toMatch(/^run_\d{8}_\d{6}(_\d+)?\.db$/);
    expect(fs.existsSync(session.store.path)).toBe(true);
  });

  it('should publish a provisioned run database for worker threads', () => {
    const env: NodeJS.ProcessEnv = {};
    session = startTracing({ instrument: false, dbDirectory: dir, env });

    expect(env.CALLTRACE_DB_PATH).toBe(session.store.path);

    // A worker inherits the environment and joins the same store
    const worker = startTracing({ instrument: false, env: { ...env } });
    try {
      expect(worker.store.path).toBe(session.store.path);
      square(7);
      expect(session.store.listCalls().map((c) => c.return_value)).toEqual(['49']);
      expect(fs.readdirSync(dir).filter((f) => f.endsWith('.db'))).toHaveLength(1);
    } finally {
      worker.close();
    }
  });

  it('should leave the environment alone for an explicit database path', () => {
    const env: NodeJS.ProcessEnv = {};
    session = startTracing({ instrument: false, dbPath: ':memory:', env });

    expect(env.CALLTRACE_DB_PATH).toBeUndefined();
  });

  it('should use a store passed in', () => {
    const store = openTraceStore({ path: ':memory:' });
    session = startTracing({ instrument: false, store, env: {} });

    expect(session.store).toBe(store);
  });

  it('should stop recording and keep the store readable', () => {
    session = startTracing({ instrument: false, dbPath: ':memory:', env: {} });
    square(1);
    session.stop();
    square(2);

    expect(getRecorder()).toBeNull();
    expect(session.active).toBe(false);
    expect(square(4)).toBe(16);
    expect(session.store.listCalls()).toHaveLength(1);
  });

  it('should flush to the dump directory by default', async () => {
    session = startTracing({
      instrument: false,
      dbPath: ':memory:',
      dumpDirectory: dir,
      env: {},
    });
    square(5);

    const result = await session.flush();

    const folder = path.join(dir, 'memory');
    expect(result.destination).toBe(folder);
    expect(fs.readdirSync(folder).sort()).toEqual([REPORT_FILE, TRACE_JSON_FILE].sort());
  });

  it('should flush through a given exporter', async () => {
    session = startTracing({ instrument: false, dbPath: ':memory:', env: {} });
    square(6);

    let seen = 0;
    const exporter = new CustomExporter({
      handler: (data) => {
        seen = data.calls.length;
      },
    });
    const result = await session.flush({ exporter });

    expect(result.success).toBe(true);
    expect(seen).toBe(1);
  });

  it('should close once', () => {
    session = startTracing({ instrument: false, dbPath: ':memory:', env: {} });
    session.close();
    session.close();

    expect(getRecorder()).toBeNull();
    expect(() => session?.store.listCalls()).toThrow();
  });
});
