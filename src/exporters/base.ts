/**
 * Base exporter interface for calltrace data.
 *
 * Exporters take a snapshot of a trace store and write it somewhere
 * (files, another database, a remote service, etc.).
 */

import type { TraceExport } from '../models/trace.js';

/**
 * Result of an export operation.
 */
export interface ExportResult {
  /** Whether the export succeeded */
  success: boolean;
  /** The destination where data was exported (URL, path, etc.) */
  destination?: string | null;
  /** Number of bytes written (if applicable) */
  bytes_written?: number | null;
  /** Additional metadata about the export */
  metadata: Record<string, unknown>;
  /** Error message if export failed */
  error?: string | null;
}

/**
 * Exception class for export operation failures.
 */
export class ExportError extends Error {
  cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ExportError';
    this.cause = cause;
  }
}

/**
 * Abstract base class for trace exporters.
 *
 * @example
 * ```typescript
 * class CountingExporter extends BaseExporter {
 *   name = 'counting';
 *
 *   async export(data: TraceExport): Promise<ExportResult> {
 *     return createExportResult(true, { metadata: { calls: data.calls.length } });
 *   }
 * }
 * ```
 */
export abstract class BaseExporter {
  /** Name identifier for this exporter */
  name = 'base';

  /**
   * Export a trace snapshot to the destination.
   *
   * @throws ExportError if the export fails.
   */
  abstract export(data: TraceExport, options?: Record<string, unknown>): Promise<ExportResult>;

  /**
   * Check that every call and argument points at a row present in the
   * snapshot. Throws ExportError otherwise.
   */
  validate(data: TraceExport): boolean {
    const functionIds = new Set(data.functions.map((f) => f.id));
    const callIds = new Set(data.calls.map((c) => c.id));
    for (const call of data.calls) {
      if (!functionIds.has(call.function_id)) {
        throw new ExportError(`Call ${call.id} references unknown function ${call.function_id}`);
      }
      if (call.parent_call_id !== null && !callIds.has(call.parent_call_id)) {
        throw new ExportError(`Call ${call.id} references unknown parent ${call.parent_call_id}`);
      }
    }
    for (const arg of data.arguments) {
      if (!callIds.has(arg.call_id)) {
        throw new ExportError(`Argument ${arg.id} references unknown call ${arg.call_id}`);
      }
    }
    return true;
  }
}

/**
 * Create an ExportResult object.
 */
export function createExportResult(success: boolean, options?: Partial<ExportResult>): ExportResult {
  return {
    success,
    destination: options?.destination ?? null,
    bytes_written: options?.bytes_written ?? null,
    metadata: options?.metadata ?? {},
    error: options?.error ?? null,
  };
}
