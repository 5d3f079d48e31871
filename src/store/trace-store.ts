/**
 * SQLite-backed storage for functions, calls and arguments.
 *
 * Uses better-sqlite3 via drizzle-orm. Every operation is synchronous so the
 * call recorder can persist a Call row before the traced body starts.
 */

import * as fs from 'fs';
import * as path from 'path';
import BetterSqlite3 from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { and, asc, eq, isNotNull, isNull, sql } from 'drizzle-orm';
import * as schema from './schema.js';
import { functions, calls, args } from './schema.js';
import { TraceStoreError, toError } from '../errors.js';
import { logger } from '../logger.js';
import type {
  ArgumentRecord,
  ArgumentWithCall,
  CallKind,
  CallOutcome,
  CallRecord,
  CallWithFunction,
  FunctionRecord,
  NewCall,
  NewFunction,
  TraceExport,
} from '../models/trace.js';

export type TraceDatabase = BetterSQLite3Database<typeof schema>;

export const TRACE_EXPORT_VERSION = 1;

const CALL_KINDS: readonly CallKind[] = ['function', 'instancemethod', 'classmethod', 'staticmethod'];

export interface OpenStoreOptions {
  /** Database file, or ':memory:' */
  path: string;
  /** How long a writer waits on a locked database before failing */
  busyTimeoutMs?: number;
}

export interface RunStoreOptions {
  /** Directory that receives run_<timestamp>.db files */
  directory: string;
  busyTimeoutMs?: number;
  /** Clock used for the file name (tests) */
  now?: Date;
}

function toCallKind(value: string): CallKind {
  const kind = CALL_KINDS.find((k) => k === value);
  if (!kind) {
    throw new TraceStoreError('read', new Error(`Unknown method_type '${value}'`));
  }
  return kind;
}

function toFunctionRecord(row: typeof functions.$inferSelect): FunctionRecord {
  return {
    id: row.id,
    module: row.module,
    qualname: row.qualname,
    filename: row.filename,
    lineno: row.lineno,
    signature: row.signature,
    annotations: row.annotations,
    defaults: row.defaults,
    closure_vars: row.closureVars,
    source_code: row.sourceCode,
  };
}

function toCallRecord(row: typeof calls.$inferSelect): CallRecord {
  return {
    id: row.id,
    function_id: row.functionId,
    parent_call_id: row.parentCallId,
    timestamp: row.timestamp,
    duration_ms: row.durationMs,
    thread_id: row.threadId,
    is_coroutine: row.isCoroutine,
    method_type: toCallKind(row.methodType),
    class_name: row.className,
    return_value: row.returnValue,
    exception_type: row.exceptionType,
    exception_message: row.exceptionMessage,
    tb: row.tb,
  };
}

function toArgumentRecord(row: typeof args.$inferSelect): ArgumentRecord {
  return {
    id: row.id,
    call_id: row.callId,
    name: row.name,
    value: row.value,
  };
}

/**
 * Create all tables if they don't exist.
 */
function initializeTables(db: TraceDatabase): void {
  db.run(sql`
    CREATE TABLE IF NOT EXISTS function (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      module TEXT NOT NULL,
      qualname TEXT NOT NULL,
      filename TEXT NOT NULL,
      lineno INTEGER NOT NULL,
      signature TEXT NOT NULL,
      annotations TEXT,
      defaults TEXT,
      closure_vars TEXT,
      source_code TEXT
    )
  `);
  db.run(sql`
    CREATE UNIQUE INDEX IF NOT EXISTS function_identity
      ON function (module, qualname, filename, lineno)
  `);

  db.run(sql`
    CREATE TABLE IF NOT EXISTS call (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      function_id INTEGER NOT NULL REFERENCES function(id),
      parent_call_id INTEGER REFERENCES call(id),
      timestamp REAL NOT NULL,
      duration_ms REAL,
      thread_id INTEGER NOT NULL,
      is_coroutine INTEGER NOT NULL,
      method_type TEXT NOT NULL,
      class_name TEXT,
      return_value TEXT,
      exception_type TEXT,
      exception_message TEXT,
      tb TEXT
    )
  `);
  db.run(sql`CREATE INDEX IF NOT EXISTS call_parent ON call (parent_call_id)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS call_function ON call (function_id)`);

  db.run(sql`
    CREATE TABLE IF NOT EXISTS argument (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      call_id INTEGER NOT NULL REFERENCES call(id),
      name TEXT NOT NULL,
      value TEXT NOT NULL
    )
  `);
  db.run(sql`CREATE INDEX IF NOT EXISTS argument_call ON argument (call_id)`);
}

function openConnection(options: OpenStoreOptions): BetterSqlite3.Database {
  try {
    const sqlite = new BetterSqlite3(options.path);
    sqlite.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 2000}`);
    if (options.path !== ':memory:') {
      // WAL lets a reporting process read while the traced run writes
      sqlite.pragma('journal_mode = WAL');
    }
    sqlite.pragma('foreign_keys = ON');
    return sqlite;
  } catch (e) {
    throw new TraceStoreError('open', toError(e));
  }
}

export class TraceStore {
  readonly path: string;
  private readonly sqlite: BetterSqlite3.Database;
  private readonly db: TraceDatabase;

  constructor(options: OpenStoreOptions) {
    this.path = options.path;
    this.sqlite = openConnection(options);
    this.db = drizzle(this.sqlite, { schema });
    this.guard('open', () => initializeTables(this.db));
    logger.debug(`Opened trace store at ${options.path}`);
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      if (e instanceof TraceStoreError) {
        throw e;
      }
      throw new TraceStoreError(operation, toError(e));
    }
  }

  // ─── Writes ─────────────────────────────────────────────────────────

  /**
   * Return the id of the function row with this identity, inserting it
   * first if it does not exist. Safe against concurrent first calls from
   * several threads: the insert and the lookup share one write transaction.
   */
  ensureFunction(fn: NewFunction): number {
    return this.guard('ensureFunction', () =>
      this.db.transaction(
        (tx) => {
          tx.insert(functions)
            .values({
              module: fn.module,
              qualname: fn.qualname,
              filename: fn.filename,
              lineno: fn.lineno,
              signature: fn.signature,
              annotations: fn.annotations,
              defaults: fn.defaults,
              closureVars: fn.closure_vars,
              sourceCode: fn.source_code,
            })
            .onConflictDoNothing()
            .run();

          const row = tx
            .select({ id: functions.id })
            .from(functions)
            .where(
              and(
                eq(functions.module, fn.module),
                eq(functions.qualname, fn.qualname),
                eq(functions.filename, fn.filename),
                eq(functions.lineno, fn.lineno)
              )
            )
            .get();
          if (!row) {
            throw new Error(`Function ${fn.module}.${fn.qualname} vanished after insert`);
          }
          return row.id;
        },
        { behavior: 'immediate' }
      )
    );
  }

  insertCall(call: NewCall): number {
    return this.guard('insertCall', () => {
      const row = this.db
        .insert(calls)
        .values({
          functionId: call.function_id,
          parentCallId: call.parent_call_id,
          timestamp: call.timestamp,
          threadId: call.thread_id,
          isCoroutine: call.is_coroutine,
          methodType: call.method_type,
          className: call.class_name,
        })
        .returning({ id: calls.id })
        .get();
      if (!row) {
        throw new Error('Insert returned no row');
      }
      return row.id;
    });
  }

  insertArguments(callId: number, entries: ReadonlyArray<{ name: string; value: string }>): void {
    if (entries.length === 0) {
      return;
    }
    this.guard('insertArguments', () => {
      this.db
        .insert(args)
        .values(entries.map((entry) => ({ callId, name: entry.name, value: entry.value })))
        .run();
    });
  }

  /**
   * Write the outcome of a call. A call is completed at most once; a second
   * completion is rejected.
   */
  completeCall(callId: number, outcome: CallOutcome): void {
    this.guard('completeCall', () => {
      const values =
        outcome.kind === 'return'
          ? { durationMs: outcome.duration_ms, returnValue: outcome.return_value }
          : {
              durationMs: outcome.duration_ms,
              exceptionType: outcome.exception_type,
              exceptionMessage: outcome.exception_message,
              tb: outcome.tb,
            };
      const result = this.db
        .update(calls)
        .set(values)
        .where(and(eq(calls.id, callId), isNull(calls.durationMs)))
        .run();
      if (result.changes === 0) {
        throw new Error(`Call ${callId} does not exist or is already complete`);
      }
    });
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  listFunctions(): FunctionRecord[] {
    return this.guard('listFunctions', () =>
      this.db.select().from(functions).orderBy(asc(functions.id)).all().map(toFunctionRecord)
    );
  }

  listCalls(): CallRecord[] {
    return this.guard('listCalls', () =>
      this.db.select().from(calls).orderBy(asc(calls.id)).all().map(toCallRecord)
    );
  }

  getCall(callId: number): CallRecord | null {
    return this.guard('getCall', () => {
      const row = this.db.select().from(calls).where(eq(calls.id, callId)).get();
      return row ? toCallRecord(row) : null;
    });
  }

  /**
   * Direct children of a call, oldest first.
   */
  getChildren(callId: number): CallRecord[] {
    return this.guard('getChildren', () =>
      this.db
        .select()
        .from(calls)
        .where(eq(calls.parentCallId, callId))
        .orderBy(asc(calls.timestamp), asc(calls.id))
        .all()
        .map(toCallRecord)
    );
  }

  listCallsWithFunctions(): CallWithFunction[] {
    return this.guard('listCallsWithFunctions', () =>
      this.db
        .select({ call: calls, fn: functions })
        .from(calls)
        .innerJoin(functions, eq(calls.functionId, functions.id))
        .orderBy(asc(calls.id))
        .all()
        .map((row) => ({ ...toCallRecord(row.call), function: toFunctionRecord(row.fn) }))
    );
  }

  listFailedCalls(): CallRecord[] {
    return this.guard('listFailedCalls', () =>
      this.db
        .select()
        .from(calls)
        .where(isNotNull(calls.exceptionType))
        .orderBy(asc(calls.id))
        .all()
        .map(toCallRecord)
    );
  }

  listArguments(callId?: number): ArgumentRecord[] {
    return this.guard('listArguments', () => {
      const query = this.db.select().from(args);
      const rows =
        callId === undefined
          ? query.orderBy(asc(args.id)).all()
          : query.where(eq(args.callId, callId)).orderBy(asc(args.id)).all();
      return rows.map(toArgumentRecord);
    });
  }

  listArgumentsWithCalls(): ArgumentWithCall[] {
    return this.guard('listArgumentsWithCalls', () =>
      this.db
        .select({ arg: args, call: calls })
        .from(args)
        .innerJoin(calls, eq(args.callId, calls.id))
        .orderBy(asc(args.id))
        .all()
        .map((row) => ({ ...toArgumentRecord(row.arg), call: toCallRecord(row.call) }))
    );
  }

  // ─── Snapshots ──────────────────────────────────────────────────────

  snapshot(): TraceExport {
    return {
      functions: this.listFunctions(),
      calls: this.listCalls(),
      arguments: this.listArguments(),
      source: this.path,
      generated_at: Date.now() / 1000,
      version: TRACE_EXPORT_VERSION,
    };
  }

  /**
   * Replay a snapshot into this store, keeping every row id.
   */
  loadSnapshot(data: TraceExport): void {
    if (data.version !== TRACE_EXPORT_VERSION) {
      throw new TraceStoreError(
        'loadSnapshot',
        new Error(`Unsupported snapshot version ${data.version}`)
      );
    }
    this.guard('loadSnapshot', () =>
      this.db.transaction((tx) => {
        for (const fn of data.functions) {
          tx.insert(functions)
            .values({
              id: fn.id,
              module: fn.module,
              qualname: fn.qualname,
              filename: fn.filename,
              lineno: fn.lineno,
              signature: fn.signature,
              annotations: fn.annotations,
              defaults: fn.defaults,
              closureVars: fn.closure_vars,
              sourceCode: fn.source_code,
            })
            .run();
        }
        // Parents always have smaller ids than their children
        for (const call of [...data.calls].sort((a, b) => a.id - b.id)) {
          tx.insert(calls)
            .values({
              id: call.id,
              functionId: call.function_id,
              parentCallId: call.parent_call_id,
              timestamp: call.timestamp,
              durationMs: call.duration_ms,
              threadId: call.thread_id,
              isCoroutine: call.is_coroutine,
              methodType: call.method_type,
              className: call.class_name,
              returnValue: call.return_value,
              exceptionType: call.exception_type,
              exceptionMessage: call.exception_message,
              tb: call.tb,
            })
            .run();
        }
        if (data.arguments.length > 0) {
          tx.insert(args)
            .values(
              data.arguments.map((a) => ({ id: a.id, callId: a.call_id, name: a.name, value: a.value }))
            )
            .run();
        }
      })
    );
  }

  close(): void {
    if (this.sqlite.open) {
      this.sqlite.close();
    }
  }
}

export function openTraceStore(options: OpenStoreOptions): TraceStore {
  if (options.path !== ':memory:') {
    const dir = path.dirname(options.path);
    if (dir && !fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }
  return new TraceStore(options);
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function runFileName(now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `run_${date}_${time}.db`;
}

/**
 * Provision a fresh store for one traced run inside `directory`.
 */
export function createRunStore(options: RunStoreOptions): TraceStore {
  fs.mkdirSync(options.directory, { recursive: true });
  const base = runFileName(options.now ?? new Date());
  let candidate = path.join(options.directory, base);
  for (let n = 2; fs.existsSync(candidate); n++) {
    candidate = path.join(options.directory, base.replace(/\.db$/, `_${n}.db`));
  }
  return openTraceStore({ path: candidate, busyTimeoutMs: options.busyTimeoutMs });
}
