/**
 * Drizzle ORM SQLite schema for trace runs.
 *
 * Table and column names are part of the on-disk interchange format: runs
 * recorded by different versions must stay comparable, so columns are only
 * ever added, never renamed.
 */

import {
  sqliteTable,
  text,
  integer,
  real,
  uniqueIndex,
  index,
  type AnySQLiteColumn,
} from 'drizzle-orm/sqlite-core';

// ─── Functions ──────────────────────────────────────────────────────

export const functions = sqliteTable(
  'function',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    module: text('module').notNull(),
    qualname: text('qualname').notNull(),
    filename: text('filename').notNull(),
    lineno: integer('lineno').notNull(),
    signature: text('signature').notNull(),
    annotations: text('annotations'),
    defaults: text('defaults'),
    closureVars: text('closure_vars'),
    sourceCode: text('source_code'),
  },
  (table) => [
    uniqueIndex('function_identity').on(table.module, table.qualname, table.filename, table.lineno),
  ]
);

// ─── Calls ──────────────────────────────────────────────────────────

export const calls = sqliteTable(
  'call',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    functionId: integer('function_id')
      .notNull()
      .references(() => functions.id),
    parentCallId: integer('parent_call_id').references((): AnySQLiteColumn => calls.id),
    timestamp: real('timestamp').notNull(),
    durationMs: real('duration_ms'),
    threadId: integer('thread_id').notNull(),
    isCoroutine: integer('is_coroutine', { mode: 'boolean' }).notNull(),
    methodType: text('method_type').notNull(),
    className: text('class_name'),
    returnValue: text('return_value'),
    exceptionType: text('exception_type'),
    exceptionMessage: text('exception_message'),
    tb: text('tb'),
  },
  (table) => [
    index('call_parent').on(table.parentCallId),
    index('call_function').on(table.functionId),
  ]
);

// ─── Arguments ──────────────────────────────────────────────────────

export const args = sqliteTable(
  'argument',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    callId: integer('call_id')
      .notNull()
      .references(() => calls.id),
    name: text('name').notNull(),
    value: text('value').notNull(),
  },
  (table) => [index('argument_call').on(table.callId)]
);
