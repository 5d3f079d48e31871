import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openTraceStore, type TraceStore } from '../src/store/trace-store.js';
import { renderSnapshot, renderTrace } from '../src/report/render.js';

describe('renderTrace()', () => {
  let store: TraceStore;

  beforeEach(() => {
    store = openTraceStore({ path: ':memory:' });
  });

  afterEach(() => {
    store.close();
  });

  function seed(): void {
    const add = store.ensureFunction({
      module: 'src.math',
      qualname: 'add',
      filename: '/project/src/math.js',
      lineno: 1,
      signature: '(a, b)',
      annotations: null,
      defaults: null,
      closure_vars: null,
      source_code: 'function add(a, b) {\n  return a + b;\n}',
    });
    const check = store.ensureFunction({
      module: 'src.math',
      qualname: 'Checker.check',
      filename: '/project/src/math.js',
      lineno: 5,
      signature: '(value: number = 0): void',
      annotations: '{"value":"number","return":"void"}',
      defaults: '{"value":"0"}',
      closure_vars: '{"limit":10}',
      source_code: null,
    });

    const base = { thread_id: 0, is_coroutine: false, method_type: 'function' as const, class_name: null };
    const root = store.insertCall({ ...base, function_id: add, parent_call_id: null, timestamp: 10.5 });
    const second = store.insertCall({ ...base, function_id: add, parent_call_id: root, timestamp: 12 });
    const first = store.insertCall({
      function_id: check,
      parent_call_id: root,
      timestamp: 11,
      thread_id: 0,
      is_coroutine: true,
      method_type: 'instancemethod',
      class_name: 'Checker',
    });
    const earlier = store.insertCall({ ...base, function_id: add, parent_call_id: null, timestamp: 1 });

    store.insertArguments(root, [
      { name: 'a', value: '1' },
      { name: 'b', value: '2' },
    ]);
    store.completeCall(first, {
      kind: 'throw',
      duration_ms: 0.5,
      exception_type: 'RangeError',
      exception_message: 'too big',
      tb: 'RangeError: too big\n    at check (/project/src/math.js:6:11)',
    });
    store.completeCall(second, { kind: 'return', duration_ms: 1, return_value: '0' });
    store.completeCall(root, { kind: 'return', duration_ms: 3.25, return_value: '3' });
    store.completeCall(earlier, { kind: 'return', duration_ms: 2, return_value: null });
  }

  it('should render both sections in order', () => {
    seed();

    expect(renderTrace(store).split('\n')).toEqual([
      '=== Functions Metadata ===',
      'Function ID: 1',
      'Module: src.math',
      'Qualified Name: add',
      'Defined at: /project/src/math.js:1',
      'Signature: (a, b)',
      'Source Code:',
      '    function add(a, b) {',
      '      return a + b;',
      '    }',
      '',
      'Function ID: 2',
      'Module: src.math',
      'Qualified Name: Checker.check',
      'Defined at: /project/src/math.js:5',
      'Signature: (value: number = 0): void',
      'Annotations: {"value":"number","return":"void"}',
      'Defaults: {"value":"0"}',
      'Closure Vars: {"limit":10}',
      'Source Code:',
      '',
      '=== Call Execution Flow ===',
      '[DEPTH=0] CALL 4:',
      '[DEPTH=0]   Function ID: 1',
      '[DEPTH=0]   Timestamp: 1',
      '[DEPTH=0]   Duration (ms): 2',
      '[DEPTH=0]   Thread ID: 0  Coroutine: false',
      '[DEPTH=0]   Method Type: function  Class: null',
      '',
      '[DEPTH=0] CALL 1:',
      '[DEPTH=0]   Function ID: 1',
      '[DEPTH=0]   Timestamp: 10.5',
      '[DEPTH=0]   Duration (ms): 3.25',
      '[DEPTH=0]   Thread ID: 0  Coroutine: false',
      '[DEPTH=0]   Method Type: function  Class: null',
      '[DEPTH=0]   Arguments:',
      '[DEPTH=0]     - a: 1',
      '[DEPTH=0]     - b: 2',
      '[DEPTH=0]   Return Value: 3',
      '[DEPTH=1] CALL 3:',
      '[DEPTH=1]   Function ID: 2',
      '[DEPTH=1]   Timestamp: 11',
      '[DEPTH=1]   Duration (ms): 0.5',
      '[DEPTH=1]   Thread ID: 0  Coroutine: true',
      '[DEPTH=1]   Method Type: instancemethod  Class: Checker',
      '[DEPTH=1]   Exception: RangeError - too big',
      '[DEPTH=1]   Traceback:',
      '[DEPTH=1]     RangeError: too big',
      '[DEPTH=1]         at check (/project/src/math.js:6:11)',
      '[DEPTH=1] CALL 2:',
      '[DEPTH=1]   Function ID: 1',
      '[DEPTH=1]   Timestamp: 12',
      '[DEPTH=1]   Duration (ms): 1',
      '[DEPTH=1]   Thread ID: 0  Coroutine: false',
      '[DEPTH=1]   Method Type: function  Class: null',
      '[DEPTH=1]   Return Value: 0',
      '',
    ]);
  });

  it('should print null for calls still in flight', () => {
    const fid = store.ensureFunction({
      module: 'm',
      qualname: 'wait',
      filename: '/m.js',
      lineno: 1,
      signature: '()',
      annotations: null,
      defaults: null,
      closure_vars: null,
      source_code: 'async function wait() {}',
    });
    store.insertCall({
      function_id: fid,
      parent_call_id: null,
      timestamp: 5,
      thread_id: 3,
      is_coroutine: true,
      method_type: 'function',
      class_name: null,
    });

    const lines = renderTrace(store).split('\n');
    expect(lines).toContain('[DEPTH=0]   Duration (ms): null');
    expect(lines).toContain('[DEPTH=0]   Thread ID: 3  Coroutine: true');
    expect(lines.some((l) => l.includes('Return Value'))).toBe(false);
  });

  it('should render an empty store as two headers', () => {
    expect(renderTrace(store)).toBe('=== Functions Metadata ===\n=== Call Execution Flow ===');
  });

  it('should render a snapshot the same way as the store', () => {
    seed();
    expect(renderSnapshot(store.snapshot())).toBe(renderTrace(store));
  });

  it('should not modify the store', () => {
    seed();
    const before = store.snapshot();
    renderTrace(store);
    const after = store.snapshot();
    expect(after.calls).toEqual(before.calls);
    expect(after.arguments).toEqual(before.arguments);
  });
});
