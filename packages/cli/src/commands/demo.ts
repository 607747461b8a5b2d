/**
 * demo - replay the demonstration scenario against the configured database
 */

import { runDemo } from '../lib/demo.js';
import {
  exitCommandError,
  withCommandAdapter,
  type CommandContext,
} from '../lib/command-runtime.js';

export function registerDemoCommand(ctx: CommandContext): void {
  ctx.program
    .command('demo')
    .description('Drop and rebuild the person table with sample people, then run example searches')
    .action(async () => {
      const ok = await withCommandAdapter(ctx, (db) => runDemo(db, (line) => ctx.io.out(line)));
      if (!ok) {
        exitCommandError({ message: 'Could not create table person' });
      }
    });
}
