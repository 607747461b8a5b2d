export {
  getDefaultDatabaseUrl,
  type DatabaseAdapter,
  type DatabaseConfig,
  type QueryLogConfig,
  type QueryResult,
  type QueryStats,
  type QueryTypeStats,
  type TransactionClient,
} from './adapter.js';
