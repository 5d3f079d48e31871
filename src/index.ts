/**
 * calltrace - call recording for Node.js programs
 *
 * Every call to a traced function is stored in SQLite with its arguments,
 * result or error, timing and caller, and can be rendered as a call tree.
 * OpenTelemetry context propagation keeps nested and concurrent async
 * calls attributed to the right parent.
 *
 * Usage (whole program):
 *
 *   node --import calltrace/register app.js
 *
 * Usage (explicit):
 *
 *   import { startTracing, trace } from 'calltrace';
 *
 *   const session = startTracing({ instrument: false, dbPath: 'trace.db' });
 *   const add = trace(function add(a: number, b: number) { return a + b; });
 *   add(1, 2);
 *   console.log(session.render());
 *   await session.flush();
 *
 * Export elsewhere:
 *
 *   import { CustomExporter } from 'calltrace/exporters';
 *
 *   await session.flush({ exporter: new CustomExporter({ handler: (data) => upload(data) }) });
 */

export type {
  CallKind,
  FunctionMeta,
  FunctionRecord,
  CallRecord,
  ArgumentRecord,
  CallWithFunction,
  ArgumentWithCall,
  TraceExport,
} from './models/trace.js';

export type { CalltraceOptions, ResolvedConfig } from './config.js';
export { resolveConfig, MAX_VALUE_LENGTH } from './config.js';

export { InstrumentationError, TraceStoreError, ConfigError } from './errors.js';

export type { TraceOptions } from './trace.js';
export { trace, traceClass, withTrace, isTraced, originalOf } from './trace.js';

export type { RecorderOptions, TracedTarget } from './recorder.js';
export { Recorder, setRecorder, getRecorder, bindArguments, classifyCall } from './recorder.js';

export {
  TraceStore,
  openTraceStore,
  createRunStore,
  TRACE_EXPORT_VERSION,
  type OpenStoreOptions,
  type RunStoreOptions,
} from './store/trace-store.js';

export type { StartOptions, FlushOptions } from './session.js';
export { TraceSession, startTracing } from './session.js';

export { renderTrace, renderSnapshot } from './report/render.js';

export type { InclusionDecision, ExclusionReason } from './instrument/selector.js';
export { shouldInstrument } from './instrument/selector.js';
export { instrumentSource } from './instrument/transform.js';

// Exporter types and classes
export type { ExportResult } from './exporters/base.js';
export { BaseExporter, ExportError } from './exporters/base.js';
export { FileExporter } from './exporters/file.js';
export { CustomExporter } from './exporters/custom.js';

// Tracer utilities (for advanced usage)
export {
  initTracer,
  getTracer,
  getFinishedSpans,
  clearSpans,
  resetTracer,
  isInitialized,
  currentCallStack,
} from './tracer.js';
