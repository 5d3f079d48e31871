import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  TraceStore,
  TRACE_EXPORT_VERSION,
  createRunStore,
  openTraceStore,
  runFileName,
} from '../src/store/trace-store.js';
import { TraceStoreError } from '../src/errors.js';
import type { NewFunction } from '../src/models/trace.js';

function fnRow(overrides: Partial<NewFunction> = {}): NewFunction {
  return {
    module: 'src.math',
    qualname: 'add',
    filename: '/project/src/math.ts',
    lineno: 3,
    signature: '(a, b)',
    annotations: null,
    defaults: null,
    closure_vars: null,
    source_code: 'function add(a, b) {\n  return a + b;\n}',
    ...overrides,
  };
}

describe('TraceStore', () => {
  let store: TraceStore;

  beforeEach(() => {
    store = openTraceStore({ path: ':memory:' });
  });

  afterEach(() => {
    store.close();
  });

  describe('ensureFunction()', () => {
    it('should return the same id for the same identity', () => {
      const first = store.ensureFunction(fnRow());
      const second = store.ensureFunction(fnRow({ signature: 'changed' }));
      expect(second).toBe(first);
      expect(store.listFunctions()).toHaveLength(1);
      expect(store.listFunctions()[0].signature).toBe('(a, b)');
    });

    it('should create separate rows for different identities', () => {
      const a = store.ensureFunction(fnRow());
      const b = store.ensureFunction(fnRow({ lineno: 10 }));
      const c = store.ensureFunction(fnRow({ qualname: 'sub' }));
      expect(new Set([a, b, c]).size).toBe(3);
    });
  });

  describe('calls', () => {
    it('should insert and complete a call once', () => {
      const fid = store.ensureFunction(fnRow());
      const id = store.insertCall({
        function_id: fid,
        parent_call_id: null,
        timestamp: 100.5,
        thread_id: 0,
        is_coroutine: false,
        method_type: 'function',
        class_name: null,
      });

      expect(store.getCall(id)).toMatchObject({ duration_ms: null, return_value: null });

      store.completeCall(id, { kind: 'return', duration_ms: 1.5, return_value: '3' });
      expect(store.getCall(id)).toMatchObject({
        id,
        function_id: fid,
        timestamp: 100.5,
        duration_ms: 1.5,
        is_coroutine: false,
        method_type: 'function',
        return_value: '3',
        exception_type: null,
      });

      expect(() =>
        store.completeCall(id, { kind: 'return', duration_ms: 2, return_value: '4' })
      ).toThrow(TraceStoreError);
      expect(store.getCall(id)?.return_value).toBe('3');
    });

    it('should record failures', () => {
      const fid = store.ensureFunction(fnRow());
      const id = store.insertCall({
        function_id: fid,
        parent_call_id: null,
        timestamp: 1,
        thread_id: 0,
        is_coroutine: true,
        method_type: 'function',
        class_name: null,
      });
      store.completeCall(id, {
        kind: 'throw',
        duration_ms: 0.25,
        exception_type: 'RangeError',
        exception_message: 'too big',
        tb: 'RangeError: too big\n    at add',
      });

      const failed = store.listFailedCalls();
      expect(failed).toHaveLength(1);
      expect(failed[0]).toMatchObject({
        id,
        is_coroutine: true,
        return_value: null,
        exception_type: 'RangeError',
        exception_message: 'too big',
      });
    });

    it('should return children ordered by timestamp then id', () => {
      const fid = store.ensureFunction(fnRow());
      const base = { function_id: fid, thread_id: 0, is_coroutine: false, method_type: 'function' as const, class_name: null };
      const root = store.insertCall({ ...base, parent_call_id: null, timestamp: 1 });
      const late = store.insertCall({ ...base, parent_call_id: root, timestamp: 3 });
      const early = store.insertCall({ ...base, parent_call_id: root, timestamp: 2 });
      const tie = store.insertCall({ ...base, parent_call_id: root, timestamp: 2 });

      expect(store.getChildren(root).map((c) => c.id)).toEqual([early, tie, late]);
      expect(store.getChildren(late)).toEqual([]);
    });

    it('should reject calls for unknown functions', () => {
      expect(() =>
        store.insertCall({
          function_id: 999,
          parent_call_id: null,
          timestamp: 1,
          thread_id: 0,
          is_coroutine: false,
          method_type: 'function',
          class_name: null,
        })
      ).toThrow(TraceStoreError);
    });

    it('should return null for a missing call', () => {
      expect(store.getCall(42)).toBeNull();
    });
  });

  describe('arguments', () => {
    it('should insert arguments in order and join them with calls', () => {
      const fid = store.ensureFunction(fnRow());
      const id = store.insertCall({
        function_id: fid,
        parent_call_id: null,
        timestamp: 1,
        thread_id: 0,
        is_coroutine: false,
        method_type: 'function',
        class_name: null,
      });
      store.insertArguments(id, [
        { name: 'a', value: '1' },
        { name: 'b', value: '2' },
      ]);
      store.insertArguments(id, []);

      expect(store.listArguments(id).map((a) => [a.name, a.value])).toEqual([
        ['a', '1'],
        ['b', '2'],
      ]);
      expect(store.listArguments(id + 1)).toEqual([]);

      const joined = store.listArgumentsWithCalls();
      expect(joined).toHaveLength(2);
      expect(joined[0].call.id).toBe(id);

      const withFunctions = store.listCallsWithFunctions();
      expect(withFunctions).toHaveLength(1);
      expect(withFunctions[0].function.qualname).toBe('add');
    });
  });

  describe('snapshots', () => {
    it('should round-trip every row into a fresh store', () => {
      const fid = store.ensureFunction(fnRow({ defaults: '{"b":"2"}' }));
      const root = store.insertCall({
        function_id: fid,
        parent_call_id: null,
        timestamp: 10,
        thread_id: 1,
        is_coroutine: false,
        method_type: 'instancemethod',
        class_name: 'Calc',
      });
      const child = store.insertCall({
        function_id: fid,
        parent_call_id: root,
        timestamp: 11,
        thread_id: 1,
        is_coroutine: true,
        method_type: 'function',
        class_name: null,
      });
      store.insertArguments(child, [{ name: 'a', value: '"x"' }]);
      store.completeCall(child, { kind: 'return', duration_ms: 1, return_value: 'ok' });

      const data = store.snapshot();
      expect(data.version).toBe(TRACE_EXPORT_VERSION);
      expect(data.source).toBe(':memory:');

      const copy = openTraceStore({ path: ':memory:' });
      try {
        copy.loadSnapshot(data);
        expect(copy.listFunctions()).toEqual(store.listFunctions());
        expect(copy.listCalls()).toEqual(store.listCalls());
        expect(copy.listArguments()).toEqual(store.listArguments());
      } finally {
        copy.close();
      }
    });

    it('should reject unknown snapshot versions', () => {
      const data = { ...store.snapshot(), version: 99 };
      expect(() => store.loadSnapshot(data)).toThrow('Unsupported snapshot version 99');
    });
  });
});

describe('run stores', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'calltrace-store-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should name run files after the local time', () => {
    expect(runFileName(new Date(2025, 0, 2, 3, 4, 5))).toBe('run_20250102_030405.db');
  });

  it('should create a new database file per run', () => {
    const now = new Date(2025, 5, 30, 23, 59, 1);
    const first = createRunStore({ directory: path.join(dir, 'runs'), now });
    const second = createRunStore({ directory: path.join(dir, 'runs'), now });
    try {
      expect(path.basename(first.path)).toBe('run_20250630_235901.db');
      expect(path.basename(second.path)).toBe('run_20250630_235901_2.db');
      expect(fs.existsSync(first.path)).toBe(true);
    } finally {
      first.close();
      second.close();
    }
  });

  it('should create missing parent directories for an explicit path', () => {
    const file = path.join(dir, 'nested', 'trace.db');
    const store = openTraceStore({ path: file });
    store.close();
    expect(fs.existsSync(file)).toBe(true);
  });
});
