/**
 * Text report of a trace: function metadata followed by the call tree.
 *
 * The layout is consumed by prompt tooling and must stay stable. Output is
 * a pure function of the stored rows.
 */

import type { TraceStore } from '../store/trace-store.js';
import type { ArgumentRecord, CallRecord, FunctionRecord, TraceExport } from '../models/trace.js';

interface CallNode {
  call: CallRecord;
  children: CallNode[];
}

function byStart(a: CallNode, b: CallNode): number {
  return a.call.timestamp - b.call.timestamp || a.call.id - b.call.id;
}

function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function renderFunction(fn: FunctionRecord, lines: string[]): void {
  lines.push(`Function ID: ${fn.id}`);
  lines.push(`Module: ${fn.module}`);
  lines.push(`Qualified Name: ${fn.qualname}`);
  lines.push(`Defined at: ${fn.filename}:${fn.lineno}`);
  lines.push(`Signature: ${fn.signature}`);
  if (fn.annotations) {
    lines.push(`Annotations: ${fn.annotations}`);
  }
  if (fn.defaults) {
    lines.push(`Defaults: ${fn.defaults}`);
  }
  if (fn.closure_vars) {
    lines.push(`Closure Vars: ${fn.closure_vars}`);
  }
  lines.push('Source Code:');
  for (const line of splitLines(fn.source_code ?? '')) {
    lines.push(`    ${line}`);
  }
  lines.push('');
}

function renderCall(
  node: CallNode,
  depth: number,
  argsByCall: Map<number, ArgumentRecord[]>,
  lines: string[]
): void {
  const prefix = `[DEPTH=${depth}] `;
  const c = node.call;
  lines.push(`${prefix}CALL ${c.id}:`);
  lines.push(`${prefix}  Function ID: ${c.function_id}`);
  lines.push(`${prefix}  Timestamp: ${c.timestamp}`);
  lines.push(`${prefix}  Duration (ms): ${c.duration_ms ?? 'null'}`);
  lines.push(`${prefix}  Thread ID: ${c.thread_id}  Coroutine: ${c.is_coroutine}`);
  lines.push(`${prefix}  Method Type: ${c.method_type}  Class: ${c.class_name ?? 'null'}`);

  const callArgs = argsByCall.get(c.id) ?? [];
  if (callArgs.length > 0) {
    lines.push(`${prefix}  Arguments:`);
    for (const arg of callArgs) {
      lines.push(`${prefix}    - ${arg.name}: ${arg.value}`);
    }
  }
  if (c.return_value !== null) {
    lines.push(`${prefix}  Return Value: ${c.return_value}`);
  }
  if (c.exception_type) {
    lines.push(`${prefix}  Exception: ${c.exception_type} - ${c.exception_message ?? ''}`);
  }
  if (c.tb) {
    lines.push(`${prefix}  Traceback:`);
    for (const line of splitLines(c.tb)) {
      lines.push(`${prefix}    ${line}`);
    }
  }

  for (const child of [...node.children].sort(byStart)) {
    renderCall(child, depth + 1, argsByCall, lines);
  }
}

/**
 * Render rows already loaded from a store or a snapshot.
 */
export function renderRows(
  functions: readonly FunctionRecord[],
  calls: readonly CallRecord[],
  args: readonly ArgumentRecord[]
): string {
  const nodes = new Map<number, CallNode>();
  for (const call of calls) {
    nodes.set(call.id, { call, children: [] });
  }
  const roots: CallNode[] = [];
  for (const node of nodes.values()) {
    const parentId = node.call.parent_call_id;
    const parent = parentId === null ? undefined : nodes.get(parentId);
    if (parent) {
      parent.children.push(node);
    } else if (parentId === null) {
      roots.push(node);
    }
  }

  const argsByCall = new Map<number, ArgumentRecord[]>();
  for (const arg of [...args].sort((a, b) => a.id - b.id)) {
    const list = argsByCall.get(arg.call_id);
    if (list) {
      list.push(arg);
    } else {
      argsByCall.set(arg.call_id, [arg]);
    }
  }

  const lines: string[] = ['=== Functions Metadata ==='];
  for (const fn of [...functions].sort((a, b) => a.id - b.id)) {
    renderFunction(fn, lines);
  }

  lines.push('=== Call Execution Flow ===');
  for (const root of roots.sort(byStart)) {
    renderCall(root, 0, argsByCall, lines);
    lines.push('');
  }
  return lines.join('\n');
}

export function renderSnapshot(data: TraceExport): string {
  return renderRows(data.functions, data.calls, data.arguments);
}

/**
 * Render the whole content of `store` as the two-section text report.
 */
export function renderTrace(store: TraceStore): string {
  return renderRows(store.listFunctions(), store.listCalls(), store.listArguments());
}
