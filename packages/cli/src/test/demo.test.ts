import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createSQLiteAdapter } from '@roster/sqlite';
import { silentLogger, type DatabaseAdapter } from '@roster/core';
import { people } from '@roster/core/repos';
import { DEMO_PEOPLE, DEMO_PERSON, runDemo } from '../lib/demo.js';

let db: DatabaseAdapter;

beforeEach(() => {
  db = createSQLiteAdapter({ url: ':memory:', logger: silentLogger });
});

afterEach(async () => {
  await db.close();
});

describe('runDemo', () => {
  it('leaves four people ordered Anderson, Doe, Shmo, Smith', async () => {
    const lines: string[] = [];
    expect(await runDemo(db, (line) => lines.push(line))).toBe(true);

    const rows = await people.fetchAll(db);
    expect(rows.map((p) => p.lastname)).toEqual(['Anderson', 'Doe', 'Shmo', 'Smith']);
    expect(rows).toEqual([DEMO_PERSON, ...DEMO_PEOPLE]);
  });

  it('replaces whatever was in the table before', async () => {
    await people.createTable(db);
    await people.insertOne(db, { ...DEMO_PERSON, username: 'Stale', lastname: 'Zed' });

    await runDemo(db, () => {});
    expect(await people.fetchAll(db)).toHaveLength(4);
  });

  it('uses the given search terms', async () => {
    const lines: string[] = [];
    await runDemo(db, (line) => lines.push(line), {
      exactLastName: 'Nobody',
      biographyKeyword: 'astronaut',
      lastNameKeyword: 'doe',
    });

    expect(lines.slice(-4)).toEqual([
      'lastname match: [null]',
      'biography match: null',
      'matches for: doe',
      '    name: Jane Doe',
    ]);
  });
});
