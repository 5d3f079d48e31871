/**
 * Runtime entry points imported by instrumented modules.
 *
 * The source instrumenter emits calls to `wrap` and `wrapClass` with
 * metadata computed at load time, so nothing here needs to re-parse the
 * wrapped code.
 */

import { traceClassWith, wrapWithTarget, type AnyClass, type AnyFunction } from './trace.js';
import { memberKey, type ParamSpec } from './instrument/signature.js';
import type { TracedTarget } from './recorder.js';
import type { FunctionMeta } from './models/trace.js';

export interface InstrumentedMeta extends FunctionMeta {
  params: ParamSpec[];
  isAsync: boolean;
}

function toTarget(meta: InstrumentedMeta): TracedTarget {
  const { params, isAsync, ...rest } = meta;
  return { meta: rest, params, isAsync };
}

export function wrap<T extends AnyFunction>(fn: T, meta: InstrumentedMeta): T {
  return wrapWithTarget(fn, toTarget(meta));
}

export function wrapClass<C extends AnyClass>(cls: C, members: Record<string, InstrumentedMeta>): C {
  return traceClassWith(cls, (name, isStatic) => {
    const key = memberKey(name, isStatic);
    return Object.hasOwn(members, key) ? toTarget(members[key]) : null;
  });
}
