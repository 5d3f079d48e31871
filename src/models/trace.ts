/**
 * Core trace data models for calltrace.
 *
 * Field names follow the column names of the SQLite schema so that rows,
 * snapshots and exported JSON share one shape.
 */

export type CallKind = 'function' | 'instancemethod' | 'classmethod' | 'staticmethod';

/**
 * Static description of a traced callable, produced either by the source
 * instrumenter or by an explicit `trace()` call.
 */
export interface FunctionMeta {
  module: string;
  qualname: string;
  filename: string;
  lineno: number;
  signature: string;
  annotations?: Record<string, string> | null;
  defaults?: Record<string, string> | null;
  closure?: Record<string, unknown> | null;
  source?: string | null;
  /** Known kind of the definition; `function` means "inspect the receiver". */
  kind?: CallKind;
  /** Declaring class for class members. */
  className?: string | null;
}

export interface FunctionRecord {
  id: number;
  module: string;
  qualname: string;
  filename: string;
  lineno: number;
  signature: string;
  annotations: string | null;
  defaults: string | null;
  closure_vars: string | null;
  source_code: string | null;
}

export interface CallRecord {
  id: number;
  function_id: number;
  parent_call_id: number | null;
  timestamp: number;
  duration_ms: number | null;
  thread_id: number;
  is_coroutine: boolean;
  method_type: CallKind;
  class_name: string | null;
  return_value: string | null;
  exception_type: string | null;
  exception_message: string | null;
  tb: string | null;
}

export interface ArgumentRecord {
  id: number;
  call_id: number;
  name: string;
  value: string;
}

export type NewFunction = Omit<FunctionRecord, 'id'>;

export type NewCall = Pick<
  CallRecord,
  'function_id' | 'parent_call_id' | 'timestamp' | 'thread_id' | 'is_coroutine' | 'method_type' | 'class_name'
>;

export type CallOutcome =
  | { kind: 'return'; duration_ms: number; return_value: string | null }
  | {
      kind: 'throw';
      duration_ms: number;
      exception_type: string;
      exception_message: string;
      tb: string;
    };

export interface CallWithFunction extends CallRecord {
  function: FunctionRecord;
}

export interface ArgumentWithCall extends ArgumentRecord {
  call: CallRecord;
}

/**
 * Full dump of one trace store.
 */
export interface TraceExport {
  functions: FunctionRecord[];
  calls: CallRecord[];
  arguments: ArgumentRecord[];
  source: string | null;
  generated_at: number;
  version: number;
}
