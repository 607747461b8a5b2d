/**
 * @roster/sqlite
 *
 * SQLite adapter for Roster, on better-sqlite3.
 * The database location always comes from `DatabaseConfig.url`;
 * defaults are chosen by callers.
 */

export {
  SQLiteAdapter,
  MEMORY_URL,
  createSQLiteAdapter,
  parseDatabasePath,
  withSQLiteAdapter,
} from './adapter.js';
