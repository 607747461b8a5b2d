/**
 * roster.config.json loading and database location resolution
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { getDefaultDatabaseUrl } from '@roster/core/db';
import { exitCommandError } from './command-runtime.js';

export const CONFIG_FILE = 'roster.config.json';

export const RosterConfigSchema = z.object({
  database: z
    .object({
      path: z.string().min(1).optional(),
      walMode: z.boolean().optional(),
    })
    .default({}),
  logging: z
    .object({
      logAll: z.boolean().optional(),
      slowQueryThresholdMs: z.number().nonnegative().optional(),
      logParams: z.boolean().optional(),
    })
    .default({}),
});

export type RosterConfig = z.infer<typeof RosterConfigSchema>;

export function getConfigPath(cwd: string): string {
  return path.join(cwd, CONFIG_FILE);
}

/**
 * Load roster.config.json from cwd. A missing file yields the defaults;
 * unreadable JSON or a schema violation is a command error.
 */
export function loadConfig(cwd: string): RosterConfig {
  const configPath = getConfigPath(cwd);
  if (!fs.existsSync(configPath)) {
    return RosterConfigSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    exitCommandError({ message: `Invalid JSON in ${configPath}: ${reason}` });
  }

  const parsed = RosterConfigSchema.safeParse(raw);
  if (!parsed.success) {
    exitCommandError({
      message: `Invalid config in ${configPath}`,
      humanDetails: parsed.error.issues.map(
        (issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`
      ),
    });
  }
  return parsed.data;
}

const URL_PREFIXES = ['sqlite://', 'file:'] as const;

/**
 * Database location: --db flag, then database.path from config, then the
 * default. Relative paths resolve against cwd, including the path inside a
 * sqlite:// or file: URL; :memory: passes through.
 */
export function resolveDatabaseUrl(cwd: string, flag: string | undefined, config: RosterConfig): string {
  const raw = flag ?? config.database.path;
  if (!raw) {
    return getDefaultDatabaseUrl(cwd);
  }
  if (raw === ':memory:') {
    return raw;
  }
  for (const prefix of URL_PREFIXES) {
    if (raw.startsWith(prefix)) {
      return `${prefix}${path.resolve(cwd, raw.slice(prefix.length))}`;
    }
  }
  return path.resolve(cwd, raw);
}
