/**
 * Custom exporter for user-defined export logic.
 *
 * Allows users to define their own export behavior via callbacks.
 */

import { BaseExporter, ExportError, createExportResult, type ExportResult } from './base.js';
import type { TraceExport } from '../models/trace.js';
import { toError } from '../errors.js';

/**
 * Type alias for the export handler function.
 */
export type ExportHandler = (
  data: TraceExport,
  options: Record<string, unknown>
) =>
  | Promise<Partial<ExportResult> | Record<string, unknown> | void>
  | Partial<ExportResult>
  | Record<string, unknown>
  | void;

export interface CustomExporterOptions {
  /** The handler function that performs the export */
  handler: ExportHandler;
  /** Optional name for this exporter instance */
  name?: string;
  /** Default options to pass to the handler */
  default_options?: Record<string, unknown>;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Export trace data using a user-defined handler function.
 *
 * @example
 * ```typescript
 * import { CustomExporter } from 'calltrace/exporters';
 *
 * const exporter = new CustomExporter({
 *   handler: async (data) => {
 *     await archive.put('latest-trace', JSON.stringify(data));
 *     return { destination: 'archive://latest-trace' };
 *   },
 * });
 * await session.flush({ exporter });
 * ```
 */
export class CustomExporter extends BaseExporter {
  name = 'custom';

  private handler: ExportHandler;
  private defaultOptions: Record<string, unknown>;

  constructor(options: CustomExporterOptions) {
    super();
    if (typeof options.handler !== 'function') {
      throw new Error('handler must be a function');
    }
    this.handler = options.handler;
    if (options.name) {
      this.name = options.name;
    }
    this.defaultOptions = options.default_options ?? {};
  }

  /**
   * Export using the custom handler.
   *
   * A handler that returns nothing counts as a success; a returned object
   * is read as a (partial) ExportResult.
   *
   * @throws ExportError if the handler fails.
   */
  async export(data: TraceExport, options?: Record<string, unknown>): Promise<ExportResult> {
    this.validate(data);

    const mergedOptions = { ...this.defaultOptions, ...options };

    let result: unknown;
    try {
      result = await this.handler(data, mergedOptions);
    } catch (e) {
      throw new ExportError(`Custom export handler failed: ${toError(e).message}`, toError(e));
    }

    if (!isRecord(result)) {
      return createExportResult(true, { metadata: { handler: this.name } });
    }
    return createExportResult(result.success !== false, {
      destination: optionalString(result.destination),
      bytes_written: optionalNumber(result.bytes_written),
      metadata: isRecord(result.metadata) ? result.metadata : { handler: this.name },
      error: optionalString(result.error),
    });
  }
}
