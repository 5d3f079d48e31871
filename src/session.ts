/**
 * Tracing session: provisions a store, installs the recorder and the
 * loader hooks, and exports the collected trace.
 */

import { isMainThread } from 'worker_threads';
import { resolveConfig, type CalltraceOptions, type ResolvedConfig } from './config.js';
import { Recorder, getRecorder, setRecorder } from './recorder.js';
import { createRunStore, openTraceStore, type TraceStore } from './store/trace-store.js';
import { installHooks } from './instrument/register.js';
import { FileExporter } from './exporters/file.js';
import type { BaseExporter, ExportResult } from './exporters/base.js';
import { renderTrace } from './report/render.js';
import { logger } from './logger.js';

export interface StartOptions extends CalltraceOptions {
  /** Register the module loader hooks (default: true) */
  instrument?: boolean;
  /** Use this store instead of provisioning one */
  store?: TraceStore;
  /** Environment to read settings from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface FlushOptions {
  /** Exporter to use (default: FileExporter into the dump directory) */
  exporter?: BaseExporter;
  /** Additional options passed to the exporter */
  exporterOptions?: Record<string, unknown>;
}

let hooksInstalled = false;

export class TraceSession {
  readonly config: ResolvedConfig;
  readonly store: TraceStore;
  readonly recorder: Recorder;
  private closed = false;
  private readonly onExit = (): void => this.close();

  constructor(config: ResolvedConfig, store: TraceStore) {
    this.config = config;
    this.store = store;
    this.recorder = new Recorder(store, { spans: config.spans });
    setRecorder(this.recorder);
    process.once('exit', this.onExit);
  }

  get active(): boolean {
    return getRecorder() === this.recorder;
  }

  /**
   * Stop recording. Wrapped callables keep working and call straight
   * through; the store stays open for reading and export.
   */
  stop(): void {
    if (this.active) {
      setRecorder(null);
    }
  }

  /**
   * Stop recording and close the store.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.stop();
    this.closed = true;
    process.removeListener('exit', this.onExit);
    this.store.close();
    logger.debug(`Closed trace store at ${this.store.path}`);
  }

  /**
   * The text report of everything recorded so far.
   */
  render(): string {
    return renderTrace(this.store);
  }

  /**
   * Export a snapshot of the store.
   */
  async flush(options: FlushOptions = {}): Promise<ExportResult> {
    const exporter = options.exporter ?? new FileExporter({ directory: this.config.dumpDirectory });
    const result = await exporter.export(this.store.snapshot(), options.exporterOptions);
    logger.debug(`Exported trace with ${exporter.name}`, result.destination ?? '');
    return result;
  }
}

function provisionStore(config: ResolvedConfig, env: NodeJS.ProcessEnv): TraceStore {
  if (config.dbPath) {
    return openTraceStore({ path: config.dbPath, busyTimeoutMs: config.busyTimeoutMs });
  }
  const store = createRunStore({ directory: config.dbDirectory, busyTimeoutMs: config.busyTimeoutMs });
  if (isMainThread) {
    env.CALLTRACE_DB_PATH = store.path;
  }
  return store;
}

/**
 * Start recording calls.
 *
 * Opens `dbPath` when given, otherwise a fresh `run_<timestamp>.db` in the
 * database directory, makes it the store of the global recorder and, unless
 * `instrument` is false, registers the loader hooks so project modules
 * imported from now on are traced.
 *
 * A run database provisioned on the main thread is published as
 * `CALLTRACE_DB_PATH`, so worker threads started with `--import
 * calltrace/register` (inherited through `execArgv`) join the same store.
 */
export function startTracing(options: StartOptions = {}): TraceSession {
  const env = options.env ?? process.env;
  const config = resolveConfig(options, env);
  const store = options.store ?? provisionStore(config, env);

  const session = new TraceSession(config, store);

  if (options.instrument !== false && !hooksInstalled) {
    installHooks({
      projectRoot: config.projectRoot,
      fallback: config.fallback,
    });
    hooksInstalled = true;
    logger.debug(`Instrumenting modules under ${config.projectRoot}`);
  }
  return session;
}
