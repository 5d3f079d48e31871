/**
 * File exporter for calltrace data.
 *
 * Writes a run's snapshot and its text report into a dump folder named
 * after the run.
 */

import * as fs from 'fs';
import * as path from 'path';
import { BaseExporter, ExportError, createExportResult, type ExportResult } from './base.js';
import { renderSnapshot } from '../report/render.js';
import type { TraceExport } from '../models/trace.js';
import { toError } from '../errors.js';

export const TRACE_JSON_FILE = 'trace.json';
export const REPORT_FILE = 'dump_llm.txt';

export interface FileExporterOptions {
  /** Parent directory of the per-run dump folders (required) */
  directory: string;
  /** Folder name for this run. Defaults to the store's file name without extension */
  run_name?: string;
  /** Also write the text report (default: true) */
  include_report?: boolean;
}

/**
 * Run name for a snapshot: the database file name without extension, or
 * `memory` for in-memory stores.
 */
export function runNameOf(data: TraceExport): string {
  if (!data.source || data.source === ':memory:') {
    return 'memory';
  }
  return path.basename(data.source, path.extname(data.source));
}

/**
 * Export trace data to the local filesystem.
 *
 * @example
 * ```typescript
 * import { FileExporter } from 'calltrace/exporters';
 *
 * const exporter = new FileExporter({ directory: 'calltrace_dumps' });
 * await session.flush({ exporter });
 * // calltrace_dumps/run_20250101_120000/trace.json
 * // calltrace_dumps/run_20250101_120000/dump_llm.txt
 * ```
 */
export class FileExporter extends BaseExporter {
  name = 'file';

  private directory: string;
  private runName?: string;
  private includeReport: boolean;

  constructor(options: FileExporterOptions) {
    super();
    if (!options.directory) {
      throw new Error('directory is required');
    }
    this.directory = options.directory;
    this.runName = options.run_name;
    this.includeReport = options.include_report ?? true;
  }

  /**
   * Write `trace.json` (and `dump_llm.txt` unless disabled).
   *
   * Options:
   *   - run_name: Override the folder name for this export
   * @throws ExportError if a file cannot be written.
   */
  async export(data: TraceExport, options?: Record<string, unknown>): Promise<ExportResult> {
    this.validate(data);

    const override = options?.run_name;
    const runName = typeof override === 'string' && override ? override : this.runName ?? runNameOf(data);
    const folder = path.join(this.directory, runName);

    try {
      await fs.promises.mkdir(folder, { recursive: true });

      const json = JSON.stringify(data, null, 2);
      await fs.promises.writeFile(path.join(folder, TRACE_JSON_FILE), json, 'utf-8');
      let bytesWritten = Buffer.byteLength(json, 'utf-8');
      const files = [TRACE_JSON_FILE];

      if (this.includeReport) {
        const report = renderSnapshot(data);
        await fs.promises.writeFile(path.join(folder, REPORT_FILE), report, 'utf-8');
        bytesWritten += Buffer.byteLength(report, 'utf-8');
        files.push(REPORT_FILE);
      }

      return createExportResult(true, {
        destination: folder,
        bytes_written: bytesWritten,
        metadata: {
          files,
          functions_count: data.functions.length,
          calls_count: data.calls.length,
          arguments_count: data.arguments.length,
        },
      });
    } catch (e) {
      throw new ExportError(`Failed to export to ${folder}: ${toError(e).message}`, toError(e));
    }
  }

  /**
   * Create a FileExporter from environment variables.
   *
   * @param envName - Variable holding the dump directory (default: CALLTRACE_DUMP_DIR)
   * @throws ExportError if the variable is missing.
   */
  static fromEnv(envName = 'CALLTRACE_DUMP_DIR'): FileExporter {
    const directory = process.env[envName];
    if (!directory) {
      throw new ExportError(`Environment variable ${envName} is required`);
    }
    return new FileExporter({ directory });
  }
}
