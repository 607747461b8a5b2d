import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { CONFIG_FILE, loadConfig, resolveDatabaseUrl } from '../lib/config.js';
import { CommandRuntimeError } from '../lib/command-runtime.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'roster-config-test-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeConfig(contents: string): void {
  fs.writeFileSync(path.join(tmpDir, CONFIG_FILE), contents);
}

describe('loadConfig', () => {
  it('returns empty sections when no config file exists', () => {
    expect(loadConfig(tmpDir)).toEqual({ database: {}, logging: {} });
  });

  it('reads database and logging settings', () => {
    writeConfig(JSON.stringify({
      database: { path: 'data/people.db', walMode: false },
      logging: { logAll: true, slowQueryThresholdMs: 10 },
    }));

    expect(loadConfig(tmpDir)).toEqual({
      database: { path: 'data/people.db', walMode: false },
      logging: { logAll: true, slowQueryThresholdMs: 10 },
    });
  });

  it('rejects malformed JSON', () => {
    writeConfig('{ database: ');
    expect(() => loadConfig(tmpDir)).toThrow(CommandRuntimeError);
  });

  it('rejects values of the wrong type and names the field', () => {
    writeConfig(JSON.stringify({ logging: { slowQueryThresholdMs: -1 } }));

    let caught: unknown;
    try {
      loadConfig(tmpDir);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CommandRuntimeError);
    expect(caught instanceof CommandRuntimeError && caught.message).toBe(
      `Invalid config in ${path.join(tmpDir, CONFIG_FILE)}`,
    );
    expect(caught instanceof CommandRuntimeError && caught.humanDetails?.[0]).toMatch(
      /^ {2}logging\.slowQueryThresholdMs: /,
    );
  });
});

describe('resolveDatabaseUrl', () => {
  it('prefers the --db flag', () => {
    const config = { database: { path: 'from-config.db' }, logging: {} };
    expect(resolveDatabaseUrl('/work', 'flag.db', config)).toBe(path.resolve('/work', 'flag.db'));
  });

  it('falls back to the config path, resolved against cwd', () => {
    const config = { database: { path: 'data/people.db' }, logging: {} };
    expect(resolveDatabaseUrl('/work', undefined, config)).toBe(path.resolve('/work', 'data/people.db'));
  });

  it('defaults to database.db in cwd', () => {
    expect(resolveDatabaseUrl('/work', undefined, { database: {}, logging: {} })).toBe(
      path.join('/work', 'database.db'),
    );
  });

  it('passes :memory: through', () => {
    const config = { database: {}, logging: {} };
    expect(resolveDatabaseUrl('/work', ':memory:', config)).toBe(':memory:');
  });

  it('resolves the path inside sqlite:// and file: URLs against cwd', () => {
    const config = { database: {}, logging: {} };
    expect(resolveDatabaseUrl('/work', 'sqlite://rel.db', config)).toBe(`sqlite://${path.resolve('/work', 'rel.db')}`);
    expect(resolveDatabaseUrl('/work', 'file:rel.db', config)).toBe(`file:${path.resolve('/work', 'rel.db')}`);
    expect(resolveDatabaseUrl('/work', undefined, { database: { path: 'file:/abs/people.db' }, logging: {} }))
      .toBe('file:/abs/people.db');
  });
});
