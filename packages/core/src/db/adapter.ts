/**
 * Database adapter contract
 *
 * The record store talks to storage only through this interface.
 * Placeholders are written Postgres style ($1, $2, ...); adapters
 * rewrite them for their engine.
 */

import * as path from 'node:path';
import type { Logger } from '../services/logger.js';

export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  /** Rows returned for reads, rows changed for writes */
  rowCount: number | null;
}

export interface TransactionClient {
  query<T = Record<string, unknown>>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

export interface DatabaseConfig {
  /** File path, sqlite://path, file:path or :memory: */
  url: string;
  /** Use a WAL journal (adds -wal/-shm files). Defaults to false. */
  walMode?: boolean;
  /** Receives slow-query and logAll output. Defaults to consoleLogger. */
  logger?: Logger;
}

export interface QueryLogConfig {
  logAll: boolean;
  slowQueryThresholdMs: number;
  logParams: boolean;
}

export interface QueryTypeStats {
  count: number;
  errors: number;
  durationMs: number;
}

export interface QueryStats {
  totalQueries: number;
  totalErrors: number;
  totalDurationMs: number;
  byType: Record<string, QueryTypeStats>;
}

export interface DatabaseAdapter {
  readonly name: string;
  readonly connected: boolean;

  query<T = Record<string, unknown>>(text: string, params?: unknown[]): Promise<QueryResult<T>>;

  /** Run fn inside a transaction; rolls back and rethrows if fn throws */
  withTransaction<T>(fn: (client: TransactionClient) => Promise<T>): Promise<T>;

  close(): Promise<void>;

  configureLogging(config: Partial<QueryLogConfig>): void;
  getStats(): Readonly<QueryStats>;
  resetStats(): void;
}

/**
 * Default database location: database.db in the working directory.
 */
export function getDefaultDatabaseUrl(cwd: string = process.cwd()): string {
  return path.join(cwd, 'database.db');
}
