/**
 * trace() wrapper for recording every invocation of a function.
 *
 * Usage:
 *   // Wrap a function
 *   const add = trace(function add(a: number, b: number) { return a + b; });
 *
 *   // With options
 *   const fetchUser = trace(async function fetchUser(id: string) { ... }, { name: 'users.fetch' });
 *
 *   // Wrap every method of a class
 *   traceClass(Cart);
 *
 *   // Or use the factory pattern
 *   const traced = withTrace({ captureResult: false });
 *   const load = traced(async (path: string) => { ... });
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import { getRecorder, type TracedTarget } from './recorder.js';
import { describeFunctionSource, type ParamSpec } from './instrument/signature.js';
import { moduleName } from './instrument/selector.js';
import type { CallKind, FunctionMeta } from './models/trace.js';

const ORIGINAL = Symbol.for('calltrace.original');

const OWN_SOURCE_DIR = path.dirname(fileURLToPath(import.meta.url));

export type AnyFunction = (...args: never[]) => unknown;
export type AnyClass = abstract new (...args: never[]) => unknown;

export interface TraceOptions {
  /** Qualified name to record (default: the function's own name) */
  name?: string;
  /** Module name to record (default: derived from the defining file) */
  module?: string;
  /** Whether to record argument values (default: true) */
  captureArgs?: boolean;
  /** Whether to record the return value (default: true) */
  captureResult?: boolean;
  /** Closure values worth keeping with the function metadata */
  closure?: Record<string, unknown>;
}

export interface Callsite {
  file: string;
  line: number;
}

/**
 * Get the first stack frame outside calltrace itself.
 */
function getCallsite(): Callsite | null {
  const stack = new Error().stack?.split('\n') ?? [];
  for (const line of stack.slice(1)) {
    const match = line.match(/at\s+(?:.+?\s+\()?(.+?):(\d+):\d+\)?$/);
    if (!match) {
      continue;
    }
    const [, location, lineNum] = match;
    const file = location.startsWith('file://') ? fileURLToPath(location) : location;
    if (file.startsWith(OWN_SOURCE_DIR) || file.startsWith('node:')) {
      continue;
    }
    return { file, line: parseInt(lineNum, 10) };
  }
  return null;
}

function isCallable(value: unknown): value is AnyFunction {
  return typeof value === 'function';
}

export function isTraced(fn: unknown): boolean {
  return typeof fn === 'function' && Object.prototype.hasOwnProperty.call(fn, ORIGINAL);
}

/**
 * The callable a traced wrapper delegates to, or null for unwrapped values.
 */
export function originalOf(fn: unknown): AnyFunction | null {
  if (!isCallable(fn) || !isTraced(fn)) {
    return null;
  }
  const original: unknown = Reflect.get(fn, ORIGINAL);
  return isCallable(original) ? original : null;
}

function isAsyncFunction(fn: AnyFunction): boolean {
  const name = Object.getPrototypeOf(fn)?.constructor?.name;
  return name === 'AsyncFunction' || name === 'AsyncGeneratorFunction';
}

/**
 * Make `wrapper` look like `fn` to introspection: same prototype chain,
 * own properties, `prototype`, `length` and source text.
 */
function preserveMetadata(wrapper: AnyFunction, fn: AnyFunction, name: string): void {
  Object.setPrototypeOf(wrapper, Object.getPrototypeOf(fn));
  for (const key of Reflect.ownKeys(fn)) {
    if (key === 'arguments' || key === 'caller') {
      continue;
    }
    const descriptor = Object.getOwnPropertyDescriptor(fn, key);
    if (descriptor) {
      Object.defineProperty(wrapper, key, descriptor);
    }
  }
  Object.defineProperty(wrapper, 'name', { value: name, configurable: true });
  Object.defineProperty(wrapper, 'toString', {
    value: () => Function.prototype.toString.call(fn),
    configurable: true,
    writable: true,
  });
  Object.defineProperty(wrapper, ORIGINAL, { value: fn });
}

/**
 * Build the recording wrapper for `fn`. Already traced callables are
 * returned as they are.
 */
export function wrapWithTarget<T extends AnyFunction>(fn: T, target: TracedTarget): T {
  if (isTraced(fn)) {
    return fn;
  }

  const wrapper = function (this: unknown, ...args: unknown[]): unknown {
    const newTarget: unknown = new.target;
    const invoke = (): unknown =>
      typeof newTarget === 'function'
        ? Reflect.construct(fn, args, newTarget)
        : Reflect.apply(fn, this, args);

    const recorder = getRecorder();
    if (!recorder) {
      return invoke();
    }
    return recorder.intercept(target, newTarget ? undefined : this, args, invoke);
  };

  preserveMetadata(wrapper, fn, fn.name || target.meta.qualname.split('.').pop() || 'anonymous');
  return wrapper as unknown as T;
}

function describe(
  fn: AnyFunction,
  qualname: string,
  options: TraceOptions,
  callsite: Callsite | null,
  kind: CallKind,
  className: string | null
): TracedTarget {
  const source = Function.prototype.toString.call(fn);
  const info = describeFunctionSource(source);
  const filename = callsite?.file ?? '<unknown>';
  const meta: FunctionMeta = {
    module: options.module ?? moduleName(process.cwd(), filename),
    qualname,
    filename,
    lineno: callsite?.line ?? 0,
    signature: info?.signature ?? `(${fn.length} arguments)`,
    annotations: info?.annotations ?? null,
    defaults: info?.defaults ?? null,
    closure: options.closure ?? null,
    source,
    kind,
    className,
  };
  const params: ParamSpec[] = info?.params ?? [];
  return {
    meta,
    params,
    isAsync: isAsyncFunction(fn) || (info?.isAsync ?? false),
    captureArgs: options.captureArgs,
    captureResult: options.captureResult,
  };
}

/**
 * Wrap a function so every call is recorded by the active recorder.
 */
export function trace<T extends AnyFunction>(fn: T, options: TraceOptions = {}): T {
  if (isTraced(fn)) {
    return fn;
  }
  const qualname = options.name ?? (fn.name || 'anonymous');
  return wrapWithTarget(fn, describe(fn, qualname, options, getCallsite(), 'function', null));
}

/**
 * Factory function to create a tracing wrapper with options.
 */
export function withTrace(options: TraceOptions = {}) {
  return <T extends AnyFunction>(fn: T): T => trace(fn, options);
}

const SKIPPED_STATICS = new Set(['length', 'name', 'prototype']);

/**
 * Replace every own method of `cls` and of its prototype with a traced
 * wrapper built by `targetFor`. Accessors, the constructor and members for
 * which `targetFor` returns null are left alone.
 */
export function traceClassWith<C extends AnyClass>(
  cls: C,
  targetFor: (name: string, isStatic: boolean, fn: AnyFunction) => TracedTarget | null
): C {
  const proto: unknown = cls.prototype;
  const holders: Array<[object, boolean]> = [[cls, true]];
  if (typeof proto === 'object' && proto !== null) {
    holders.push([proto, false]);
  }

  for (const [holder, isStatic] of holders) {
    for (const key of Object.getOwnPropertyNames(holder)) {
      if (key === 'constructor' || (isStatic && SKIPPED_STATICS.has(key))) {
        continue;
      }
      const descriptor = Object.getOwnPropertyDescriptor(holder, key);
      const value: unknown = descriptor?.value;
      if (!descriptor || !isCallable(value) || isTraced(value)) {
        continue;
      }
      const target = targetFor(key, isStatic, value);
      if (target) {
        Object.defineProperty(holder, key, { ...descriptor, value: wrapWithTarget(value, target) });
      }
    }
  }
  return cls;
}

/**
 * Wrap every method of a class so calls are recorded by the active recorder.
 */
export function traceClass<C extends AnyClass>(cls: C, options: Omit<TraceOptions, 'name'> = {}): C {
  const callsite = getCallsite();
  return traceClassWith(cls, (name, isStatic, fn) =>
    describe(
      fn,
      `${cls.name}.${name}`,
      options,
      callsite,
      isStatic ? 'staticmethod' : 'instancemethod',
      cls.name || null
    )
  );
}
