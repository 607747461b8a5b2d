/**
 * @roster/core
 *
 * Shared types and data access for Roster:
 *
 * - Database adapter interface
 * - Repository layer for the person table
 * - Logger contract
 */

// Database adapter
export * from './db/index.js';

// Repositories (namespaced)
export * as repos from './repos/index.js';
export type { Person, FullName, PersonTuple, ExactMatch } from './repos/index.js';

// Services
export * from './services/index.js';
