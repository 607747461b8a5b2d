import type Database from 'better-sqlite3';
import type { QueryResult } from '@roster/core/db';

export interface SQLiteQueryExecutionHooks {
  getQueryType(text: string): string;
  rewritePlaceholders(text: string, params?: unknown[]): { sql: string; values: unknown[] };
  recordQuery(
    text: string,
    params: unknown[] | undefined,
    queryType: string,
    durationMs: number,
    isError: boolean,
  ): void;
}

/**
 * Prepare and run one statement.
 *
 * Statements that return data (SELECT, PRAGMA, RETURNING) go through all();
 * the rest through run(), whose change count becomes rowCount.
 */
export async function executeSqliteQuery<T = Record<string, unknown>>(
  db: Database.Database,
  text: string,
  params: unknown[] | undefined,
  hooks: SQLiteQueryExecutionHooks,
): Promise<QueryResult<T>> {
  const queryType = hooks.getQueryType(text);
  const start = Date.now();

  try {
    const { sql, values } = hooks.rewritePlaceholders(text, params);
    const stmt = db.prepare(sql);

    let result: QueryResult<T>;
    if (stmt.reader) {
      const rows = stmt.all(...values) as T[];
      result = { rows, rowCount: rows.length };
    } else {
      result = { rows: [], rowCount: stmt.run(...values).changes };
    }

    hooks.recordQuery(text, params, queryType, Date.now() - start, false);
    return result;
  } catch (error) {
    hooks.recordQuery(text, params, queryType, Date.now() - start, true);
    throw error;
  }
}

/**
 * Run fn between BEGIN IMMEDIATE and COMMIT, rolling back if it throws.
 * SQLite may already have ended the transaction itself (RAISE(ROLLBACK),
 * SQLITE_FULL, I/O errors); the original error propagates either way.
 */
export async function executeWithTransaction<T>(
  db: Database.Database,
  fn: () => Promise<T>,
): Promise<T> {
  db.exec('BEGIN IMMEDIATE');
  try {
    const result = await fn();
    db.exec('COMMIT');
    return result;
  } catch (error) {
    if (db.inTransaction) {
      db.exec('ROLLBACK');
    }
    throw error;
  }
}
