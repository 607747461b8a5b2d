/**
 * Person table commands: create-table, drop-table, add, import, list,
 * find, search-bio, search-lastname
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import chalk from 'chalk';
import { z } from 'zod';
import {
  PersonSchema,
  people,
  personFromTuple,
  type Person,
} from '@roster/core/repos';
import {
  ensureTableOrExit,
  exitCommandError,
  withCommandAdapter,
  type CommandContext,
} from '../lib/command-runtime.js';
import {
  formatExactMatch,
  formatFullName,
  formatOptionalPerson,
  formatPersonRow,
} from '../lib/format.js';

const text = z.string().nullable();

/** A file of people: objects, or 6-element arrays in column order. */
export const ImportFileSchema = z.array(
  z.union([PersonSchema, z.tuple([text, text, text, text, text, text])])
);

export function readImportFile(file: string): Person[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    exitCommandError({ message: `Cannot read ${file}: ${reason}` });
  }

  const parsed = ImportFileSchema.safeParse(raw);
  if (!parsed.success) {
    exitCommandError({
      message: `Invalid people file ${file}`,
      humanDetails: parsed.error.issues.map(
        (issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`
      ),
    });
  }
  return parsed.data.map((entry) => (Array.isArray(entry) ? personFromTuple(entry) : entry));
}

export function registerPeopleCommands(ctx: CommandContext): void {
  const { program, io } = ctx;

  program
    .command('create-table')
    .description('Create the person table')
    .action(async () => {
      const created = await withCommandAdapter(ctx, (db) => people.createTable(db));
      if (!created) {
        exitCommandError({ message: 'Could not create table person (it may already exist)' });
      }
      io.out(chalk.green('✓ Created table person'));
    });

  program
    .command('drop-table')
    .description('Drop the person table if it exists')
    .action(async () => {
      await withCommandAdapter(ctx, (db) => people.dropTable(db));
      io.out(chalk.green('✓ Dropped table person'));
    });

  program
    .command('add')
    .description('Insert one person')
    .argument('<username>')
    .argument('<email>')
    .argument('<firstname>')
    .argument('<lastname>')
    .argument('<biography>')
    .argument('<occupation>')
    .action(async (
      username: string,
      email: string,
      firstname: string,
      lastname: string,
      biography: string,
      occupation: string,
    ) => {
      await withCommandAdapter(ctx, async (db) => {
        await ensureTableOrExit(db);
        await people.insertOne(db, { username, email, firstname, lastname, biography, occupation });
      });
      io.out(chalk.green(`✓ Added ${username}`));
    });

  program
    .command('import')
    .description('Insert every person from a JSON file in one transaction')
    .argument('<file>', 'JSON array of person objects or 6-element arrays')
    .action(async (file: string) => {
      const rows = readImportFile(path.resolve(ctx.cwd, file));
      const count = await withCommandAdapter(ctx, async (db) => {
        await ensureTableOrExit(db);
        return people.insertMany(db, rows);
      });
      io.out(chalk.green(`✓ Imported ${count} ${count === 1 ? 'person' : 'people'}`));
    });

  program
    .command('list')
    .description('Print every person ordered by last name')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      const rows = await withCommandAdapter(ctx, async (db) => {
        await ensureTableOrExit(db, options.json);
        return people.fetchAll(db);
      });
      if (options.json) {
        io.out(JSON.stringify(rows));
        return;
      }
      for (const row of rows) {
        io.out(formatPersonRow(row));
      }
    });

  program
    .command('find')
    .description('First person with exactly this last name (case-sensitive)')
    .argument('<lastname>')
    .option('--json', 'Output as JSON')
    .action(async (lastname: string, options: { json?: boolean }) => {
      const match = await withCommandAdapter(ctx, async (db) => {
        await ensureTableOrExit(db, options.json);
        return people.findByLastNameExact(db, lastname);
      });
      io.out(options.json ? JSON.stringify(match) : `lastname match: ${formatExactMatch(match)}`);
    });

  program
    .command('search-bio')
    .description('First person whose biography contains keyword (case-insensitive)')
    .argument('<keyword>')
    .option('--json', 'Output as JSON')
    .action(async (keyword: string, options: { json?: boolean }) => {
      const match = await withCommandAdapter(ctx, async (db) => {
        await ensureTableOrExit(db, options.json);
        return people.findByBiographyContains(db, keyword);
      });
      io.out(options.json ? JSON.stringify(match) : `biography match: ${formatOptionalPerson(match)}`);
    });

  program
    .command('search-lastname')
    .description('Names of everyone whose last name contains keyword, by first name')
    .argument('<keyword>')
    .option('--json', 'Output as JSON')
    .action(async (keyword: string, options: { json?: boolean }) => {
      const names = await withCommandAdapter(ctx, async (db) => {
        await ensureTableOrExit(db, options.json);
        return people.findByLastNameContains(db, keyword);
      });
      if (options.json) {
        io.out(JSON.stringify(names));
        return;
      }
      io.out(`matches for: ${keyword}`);
      for (const name of names) {
        io.out(`    name: ${formatFullName(name)}`);
      }
    });
}
