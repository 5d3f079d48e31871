/**
 * Recorder for turning traced invocations into Call and Argument rows.
 */

import { performance } from 'perf_hooks';
import { threadId } from 'worker_threads';
import { SpanStatusCode, context, trace, type Span } from '@opentelemetry/api';
import type { TraceStore } from './store/trace-store.js';
import type { CallKind, FunctionMeta, NewFunction } from './models/trace.js';
import type { ParamSpec } from './instrument/signature.js';
import { serializeValue, toTextForm } from './serialize.js';
import { getTracer, initTracer, withCallFrame, currentFrame } from './tracer.js';
import { toError } from './errors.js';
import { logger } from './logger.js';

export interface RecorderOptions {
  /** Mirror every call into an OpenTelemetry span (default: false) */
  spans?: boolean;
}

/**
 * Everything the recorder needs to know about a wrapped callable.
 */
export interface TracedTarget {
  meta: FunctionMeta;
  params: ParamSpec[];
  isAsync: boolean;
  /** Whether to record argument values (default: true) */
  captureArgs?: boolean;
  /** Whether to record the return value (default: true) */
  captureResult?: boolean;
}

export interface BoundArgument {
  name: string;
  value: string;
}

/**
 * Pair call arguments with parameter names.
 *
 * Parameters left out by the caller are recorded with their default when
 * it is a literal; other omitted parameters are skipped. Rest parameters collect
 * the remaining arguments and surplus arguments are named by position.
 */
export function bindArguments(params: readonly ParamSpec[], args: readonly unknown[]): BoundArgument[] {
  const bound: BoundArgument[] = [];
  let consumed = 0;

  for (const [i, param] of params.entries()) {
    if (param.rest) {
      bound.push({ name: param.name, value: serializeValue(args.slice(i)) });
      consumed = args.length;
      break;
    }
    consumed = i + 1;
    if (i < args.length && args[i] !== undefined) {
      bound.push({ name: param.name, value: serializeValue(args[i]) });
    } else if (param.defaultValue !== undefined) {
      bound.push({ name: param.name, value: serializeValue(param.defaultValue) });
    } else if (i < args.length) {
      bound.push({ name: param.name, value: serializeValue(args[i]) });
    }
  }

  for (let i = consumed; i < args.length; i++) {
    bound.push({ name: `arguments[${i}]`, value: serializeValue(args[i]) });
  }
  return bound;
}

function constructorName(value: object): string | null {
  const ctor: unknown = value.constructor;
  return typeof ctor === 'function' && ctor.name ? ctor.name : null;
}

/**
 * Decide the call kind from the definition and the receiver.
 *
 * Class members know their kind from where they were declared. For plain
 * functions this is a best-effort guess from `this`: a class receiver
 * means a class-level call, an instance of anything but a plain object
 * means a method call.
 */
export function classifyCall(
  meta: Pick<FunctionMeta, 'kind' | 'className'>,
  receiver: unknown
): { kind: CallKind; className: string | null } {
  if (meta.kind === 'instancemethod') {
    const className =
      typeof receiver === 'object' && receiver !== null ? constructorName(receiver) : null;
    return { kind: 'instancemethod', className: className ?? meta.className ?? null };
  }
  if (meta.kind === 'staticmethod' || meta.kind === 'classmethod') {
    const className = typeof receiver === 'function' && receiver.name ? receiver.name : null;
    return { kind: meta.kind, className: className ?? meta.className ?? null };
  }

  if (typeof receiver === 'function' && receiver.prototype !== undefined) {
    return { kind: 'classmethod', className: receiver.name || null };
  }
  if (typeof receiver === 'object' && receiver !== null) {
    const proto: unknown = Object.getPrototypeOf(receiver);
    if (proto !== null && proto !== Object.prototype) {
      return { kind: 'instancemethod', className: constructorName(receiver) };
    }
  }
  return { kind: 'function', className: null };
}

/**
 * Kind, message and formatted stack of a thrown value.
 */
export function describeError(value: unknown): { type: string; message: string; tb: string } {
  if (value instanceof Error) {
    const ctorName = constructorName(value);
    const type = ctorName && ctorName !== 'Error' ? ctorName : value.name || 'Error';
    return {
      type,
      message: value.message,
      tb: value.stack ?? `${type}: ${value.message}`,
    };
  }
  const type = value === null ? 'null' : typeof value;
  const message = toTextForm(value);
  return { type, message, tb: `Uncaught ${type}: ${message}` };
}

function functionKey(meta: FunctionMeta): string {
  return [meta.module, meta.qualname, meta.filename, meta.lineno].join('\u0000');
}

function toNewFunction(meta: FunctionMeta): NewFunction {
  return {
    module: meta.module,
    qualname: meta.qualname,
    filename: meta.filename,
    lineno: meta.lineno,
    signature: meta.signature,
    annotations: meta.annotations ? JSON.stringify(meta.annotations) : null,
    defaults: meta.defaults ? JSON.stringify(meta.defaults) : null,
    closure_vars: meta.closure ? toTextForm(meta.closure) : null,
    source_code: meta.source ?? null,
  };
}

function nowSeconds(): number {
  return (performance.timeOrigin + performance.now()) / 1000;
}

export class Recorder {
  readonly store: TraceStore;
  private readonly spans: boolean;
  private readonly functionIds = new Map<string, number>();

  constructor(store: TraceStore, options: RecorderOptions = {}) {
    this.store = store;
    this.spans = options.spans ?? false;
    initTracer();
  }

  /**
   * Id of the function row for `meta`, registering it on first use.
   * Returns null when the store refuses the write.
   */
  functionId(meta: FunctionMeta): number | null {
    const key = functionKey(meta);
    const cached = this.functionIds.get(key);
    if (cached !== undefined) {
      return cached;
    }
    try {
      const id = this.store.ensureFunction(toNewFunction(meta));
      this.functionIds.set(key, id);
      return id;
    } catch (e) {
      logger.warn(`Could not register ${meta.qualname}; calling it untraced`, toError(e).message);
      return null;
    }
  }

  /**
   * Run one invocation of a traced callable and record it.
   *
   * `invoke` performs the real call. Its result or error reaches the caller
   * unchanged; store failures are logged and never replace it.
   */
  intercept(
    target: TracedTarget,
    receiver: unknown,
    args: readonly unknown[],
    invoke: () => unknown
  ): unknown {
    const functionId = this.functionId(target.meta);
    if (functionId === null) {
      return invoke();
    }

    const { kind, className } = classifyCall(target.meta, receiver);
    const parent = currentFrame();
    const timestamp = nowSeconds();
    const started = performance.now();

    let callId: number;
    try {
      callId = this.store.insertCall({
        function_id: functionId,
        parent_call_id: parent ? parent.callId : null,
        timestamp,
        thread_id: threadId,
        is_coroutine: target.isAsync,
        method_type: kind,
        class_name: className,
      });
    } catch (e) {
      logger.warn(`Could not record call to ${target.meta.qualname}`, toError(e).message);
      return invoke();
    }

    if (target.captureArgs !== false) {
      try {
        this.store.insertArguments(callId, bindArguments(target.params, args));
      } catch (e) {
        logger.warn(`Could not record arguments of call ${callId}`, toError(e).message);
      }
    }

    const span = this.startSpan(target.meta, callId);
    const base = span ? trace.setSpan(context.active(), span) : context.active();

    let result: unknown;
    try {
      result = withCallFrame(callId, invoke, base);
    } catch (e) {
      this.finishWithError(callId, started, e, span);
      throw e;
    }

    if (target.isAsync && result instanceof Promise) {
      // Settlement is recorded on a chained promise that settles the same
      // way, so an unobserved rejection still reaches the caller unhandled.
      return result.then(
        (value: unknown) => {
          this.finishWithResult(callId, started, value, target, span);
          return value;
        },
        (error: unknown) => {
          this.finishWithError(callId, started, error, span);
          throw error;
        }
      );
    }

    this.finishWithResult(callId, started, result, target, span);
    return result;
  }

  private startSpan(meta: FunctionMeta, callId: number): Span | null {
    if (!this.spans) {
      return null;
    }
    return getTracer().startSpan(meta.qualname, {
      attributes: {
        'call.id': callId,
        'code.function': meta.qualname,
        'code.namespace': meta.module,
        'code.filepath': meta.filename,
        'code.lineno': meta.lineno,
      },
    });
  }

  private finishWithResult(
    callId: number,
    started: number,
    value: unknown,
    target: TracedTarget,
    span: Span | null
  ): void {
    const duration = performance.now() - started;
    try {
      this.store.completeCall(callId, {
        kind: 'return',
        duration_ms: duration,
        return_value: target.captureResult === false ? null : serializeValue(value),
      });
    } catch (e) {
      logger.warn(`Could not record result of call ${callId}`, toError(e).message);
    }
    span?.end();
  }

  private finishWithError(callId: number, started: number, error: unknown, span: Span | null): void {
    const duration = performance.now() - started;
    const { type, message, tb } = describeError(error);
    try {
      this.store.completeCall(callId, {
        kind: 'throw',
        duration_ms: duration,
        exception_type: type,
        exception_message: message,
        tb,
      });
    } catch (e) {
      logger.warn(`Could not record error of call ${callId}`, toError(e).message);
    }
    if (span) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({ code: SpanStatusCode.ERROR, message: `${type}: ${message}` });
      span.end();
    }
  }
}

// Reference to the global recorder (set via setRecorder)
let globalRecorder: Recorder | null = null;

/**
 * Set the recorder used by traced callables. Pass null to stop recording;
 * wrapped callables then call straight through.
 */
export function setRecorder(recorder: Recorder | null): void {
  globalRecorder = recorder;
}

export function getRecorder(): Recorder | null {
  return globalRecorder;
}
