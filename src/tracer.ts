/**
 * OpenTelemetry context and tracer configuration for calltrace.
 *
 * The async-hooks context manager carries the chain of in-flight calls
 * across synchronous frames and async continuations, so each execution
 * context sees its own call stack. Spans mirrored from calls go to an
 * in-memory exporter.
 */

import { trace, Tracer, context, createContextKey, Context } from '@opentelemetry/api';
import {
  BasicTracerProvider,
  InMemorySpanExporter,
  SimpleSpanProcessor,
  ReadableSpan,
} from '@opentelemetry/sdk-trace-base';
import { AsyncHooksContextManager } from '@opentelemetry/context-async-hooks';

/**
 * One entry of a context's call stack. Frames are immutable; entering a
 * call creates a new frame pointing at the previous top.
 */
export interface CallFrame {
  callId: number;
  parent: CallFrame | null;
  depth: number;
}

const CALL_FRAME_KEY = createContextKey('calltrace.call_frame');

// Global singleton provider and exporter - survives resets for context propagation
let provider: BasicTracerProvider | null = null;
let exporter: InMemorySpanExporter | null = null;
let contextManager: AsyncHooksContextManager | null = null;
let initialized = false;

/**
 * Install the async context manager and the span pipeline.
 *
 * Subsequent calls are no-ops.
 */
export function initTracer(): void {
  if (initialized) {
    return;
  }

  if (!contextManager) {
    contextManager = new AsyncHooksContextManager();
    contextManager.enable();
    context.setGlobalContextManager(contextManager);
  }

  if (!provider) {
    exporter = new InMemorySpanExporter();
    provider = new BasicTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    provider.register();
  } else if (!exporter) {
    exporter = new InMemorySpanExporter();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
  }

  initialized = true;
}

export function getTracer(): Tracer {
  return trace.getTracer('calltrace', '0.1.0');
}

function isCallFrame(value: unknown): value is CallFrame {
  return typeof value === 'object' && value !== null && 'callId' in value && 'depth' in value;
}

/**
 * Innermost in-flight call of the active execution context.
 */
export function currentFrame(): CallFrame | null {
  const value = context.active().getValue(CALL_FRAME_KEY);
  return isCallFrame(value) ? value : null;
}

/**
 * Run `fn` with `callId` pushed onto the call stack of `base`. The push is
 * undone when `fn` returns or throws; async work started inside `fn` keeps
 * seeing the pushed frame.
 */
export function withCallFrame<T>(callId: number, fn: () => T, base: Context = context.active()): T {
  const value = base.getValue(CALL_FRAME_KEY);
  const parent = isCallFrame(value) ? value : null;
  const frame: CallFrame = { callId, parent, depth: parent ? parent.depth + 1 : 0 };
  return context.with(base.setValue(CALL_FRAME_KEY, frame), fn);
}

/**
 * Call ids of the active context, outermost first.
 */
export function currentCallStack(): number[] {
  const ids: number[] = [];
  for (let frame = currentFrame(); frame; frame = frame.parent) {
    ids.unshift(frame.callId);
  }
  return ids;
}

export function getFinishedSpans(): ReadableSpan[] {
  if (exporter === null) {
    return [];
  }
  return [...exporter.getFinishedSpans()];
}

export function clearSpans(): void {
  if (exporter !== null) {
    exporter.reset();
  }
}

/**
 * Reset tracer state for testing.
 *
 * This clears spans and resets the initialization flag, but keeps
 * the provider alive for context propagation to work correctly.
 */
export function resetTracer(): void {
  if (exporter !== null) {
    exporter.reset();
  }
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export type { ReadableSpan } from '@opentelemetry/sdk-trace-base';
