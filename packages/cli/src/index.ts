/**
 * @roster/cli
 *
 * Roster command-line interface:
 *
 *   roster demo
 *   roster --db people.db list
 *
 * The entry point is src/bin/roster.ts; createProgram is exported for
 * embedding and tests.
 */

export { createProgram, VERSION, type ProgramOptions } from './program.js';
export { runDemo, DEMO_PERSON, DEMO_PEOPLE, DEMO_SEARCHES } from './lib/demo.js';
export {
  CommandRuntimeError,
  isCommandRuntimeError,
  renderCommandRuntimeError,
  type CommandIO,
} from './lib/command-runtime.js';
