/**
 * SQLite adapter implementation
 *
 * Uses better-sqlite3 for synchronous SQLite access, wrapped in the async
 * DatabaseAdapter interface.
 *
 * - Opens lazily on first query, stays open until close()
 * - WAL journal only when walMode is true
 * - Postgres-style $1 params are rewritten to ?
 */

import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type {
  DatabaseAdapter,
  DatabaseConfig,
  QueryLogConfig,
  QueryResult,
  QueryStats,
  TransactionClient,
} from '@roster/core/db';
import { consoleLogger, type Logger } from '@roster/core/services';
import { createSqlitePlaceholderCompiler } from './sql/placeholder-rewrite.js';
import { executeSqliteQuery, executeWithTransaction } from './transactions/executor.js';

export const MEMORY_URL = ':memory:';

/**
 * Query observer for classification, logging, and stats.
 */
class SQLiteQueryObserver {
  private logConfig: QueryLogConfig = {
    logAll: false,
    slowQueryThresholdMs: 50,
    logParams: false,
  };

  private stats: QueryStats = emptyStats();

  constructor(private logger: Logger) {}

  getQueryType(text: string): string {
    const keyword = text.trim().split(/\s+/, 1)[0]?.toUpperCase() ?? '';
    switch (keyword) {
      case 'SELECT':
      case 'INSERT':
      case 'UPDATE':
      case 'DELETE':
        return keyword;
      case 'BEGIN':
      case 'COMMIT':
      case 'ROLLBACK':
      case 'SAVEPOINT':
      case 'RELEASE':
        return 'TRANSACTION';
      case 'CREATE':
      case 'ALTER':
      case 'DROP':
        return 'DDL';
      default:
        return 'OTHER';
    }
  }

  recordQuery(
    text: string,
    params: unknown[] | undefined,
    queryType: string,
    durationMs: number,
    isError: boolean,
  ): void {
    this.stats.totalQueries++;
    this.stats.totalDurationMs += durationMs;
    if (isError) {
      this.stats.totalErrors++;
    }

    const typeStats = (this.stats.byType[queryType] ??= { count: 0, errors: 0, durationMs: 0 });
    typeStats.count++;
    typeStats.durationMs += durationMs;
    if (isError) {
      typeStats.errors++;
      this.logger.debug(`[sqlite] failed ${queryType}: ${text.trim().slice(0, 100)}`);
      return;
    }

    const slow = durationMs >= this.logConfig.slowQueryThresholdMs;
    if (!slow && !this.logConfig.logAll) return;

    const data = this.logConfig.logParams && params?.length ? { params } : undefined;
    const line = `[sqlite]${slow ? ' [SLOW]' : ''} ${durationMs}ms: ${text.trim().slice(0, 100)}`;
    if (slow) {
      this.logger.warn(line, data);
    } else {
      this.logger.debug(line, data);
    }
  }

  configureLogging(config: Partial<QueryLogConfig>): void {
    this.logConfig = { ...this.logConfig, ...config };
  }

  getStatsSnapshot(): QueryStats {
    return {
      ...this.stats,
      byType: Object.fromEntries(
        Object.entries(this.stats.byType).map(([type, typeStats]) => [type, { ...typeStats }]),
      ),
    };
  }

  resetStats(): void {
    this.stats = emptyStats();
  }
}

function emptyStats(): QueryStats {
  return {
    totalQueries: 0,
    totalErrors: 0,
    totalDurationMs: 0,
    byType: {},
  };
}

/**
 * Parse database path from sqlite://, file: or plain path URLs
 */
export function parseDatabasePath(url: string): string {
  if (url.startsWith('sqlite://')) {
    return url.slice('sqlite://'.length);
  }
  if (url.startsWith('file:')) {
    return url.slice('file:'.length);
  }
  return url;
}

export class SQLiteAdapter implements DatabaseAdapter {
  readonly name = 'sqlite';
  readonly dbPath: string;
  private db: Database.Database | null = null;
  private observer: SQLiteQueryObserver;
  private placeholderCompiler = createSqlitePlaceholderCompiler();

  constructor(private config: DatabaseConfig) {
    this.dbPath = parseDatabasePath(config.url);
    this.observer = new SQLiteQueryObserver(config.logger ?? consoleLogger);
  }

  get connected(): boolean {
    return this.db !== null && this.db.open;
  }

  get inMemory(): boolean {
    return this.dbPath === MEMORY_URL;
  }

  private ensureDirectory(): void {
    if (this.inMemory) return;
    const dir = path.dirname(this.dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  private getDb(): Database.Database {
    if (!this.db) {
      this.ensureDirectory();

      this.db = new Database(this.dbPath);

      if (this.config.walMode === true && !this.inMemory) {
        this.db.pragma('journal_mode = WAL');
      }
      this.db.pragma('synchronous = NORMAL');
    }
    return this.db;
  }

  private executeQuery<T = Record<string, unknown>>(
    db: Database.Database,
    text: string,
    params?: unknown[],
  ): Promise<QueryResult<T>> {
    return executeSqliteQuery<T>(db, text, params, {
      getQueryType: (queryText) => this.observer.getQueryType(queryText),
      rewritePlaceholders: (queryText, queryParams) => this.placeholderCompiler.rewrite(queryText, queryParams),
      recordQuery: (queryText, queryParams, queryType, durationMs, isError) => {
        this.observer.recordQuery(queryText, queryParams, queryType, durationMs, isError);
      },
    });
  }

  async query<T = Record<string, unknown>>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<T>> {
    return this.executeQuery<T>(this.getDb(), text, params);
  }

  async withTransaction<T>(fn: (client: TransactionClient) => Promise<T>): Promise<T> {
    const db = this.getDb();

    const txClient: TransactionClient = {
      query: async <R = Record<string, unknown>>(
        text: string,
        params?: unknown[]
      ): Promise<QueryResult<R>> => {
        return this.executeQuery<R>(db, text, params);
      },
    };

    return executeWithTransaction(db, () => fn(txClient));
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  configureLogging(config: Partial<QueryLogConfig>): void {
    this.observer.configureLogging(config);
  }

  getStats(): Readonly<QueryStats> {
    return this.observer.getStatsSnapshot();
  }

  resetStats(): void {
    this.observer.resetStats();
  }
}

export function createSQLiteAdapter(config: DatabaseConfig): SQLiteAdapter {
  return new SQLiteAdapter(config);
}

/**
 * Open an adapter for the duration of fn. The connection is closed
 * afterwards whether fn resolves or throws.
 */
export async function withSQLiteAdapter<T>(
  config: DatabaseConfig,
  fn: (adapter: SQLiteAdapter) => Promise<T>,
): Promise<T> {
  const adapter = createSQLiteAdapter(config);
  try {
    return await fn(adapter);
  } finally {
    await adapter.close();
  }
}
