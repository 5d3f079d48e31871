/**
 * Exporters for calltrace data.
 *
 * Supported exporters:
 * - FileExporter: Write trace.json and dump_llm.txt into a per-run folder
 * - CustomExporter: User-defined export logic via callback
 *
 * @example
 * ```typescript
 * import { startTracing } from 'calltrace';
 * import { FileExporter } from 'calltrace/exporters';
 *
 * const session = startTracing();
 * // ... your program ...
 * await session.flush({ exporter: new FileExporter({ directory: 'dumps' }) });
 * ```
 */

export {
  BaseExporter,
  type ExportResult,
  ExportError,
  createExportResult,
} from './base.js';

export {
  FileExporter,
  runNameOf,
  TRACE_JSON_FILE,
  REPORT_FILE,
  type FileExporterOptions,
} from './file.js';

export {
  CustomExporter,
  type CustomExporterOptions,
  type ExportHandler,
} from './custom.js';
