/**
 * People repository — the `person` table.
 *
 * Every function issues a single statement against the adapter it is
 * given. Rows have no identity; duplicates are allowed and rows are never
 * updated or deleted one at a time.
 */

import { z } from 'zod';
import type { DatabaseAdapter } from '../db/index.js';

export const PERSON_TABLE = 'person';

/** Column order of the person table. Positional forms follow it. */
export const PERSON_COLUMNS = [
  'username',
  'email',
  'firstname',
  'lastname',
  'biography',
  'occupation',
] as const;

export type PersonColumn = (typeof PERSON_COLUMNS)[number];

const text = z.string().nullable();

export const PersonSchema = z.object({
  username: text,
  email: text,
  firstname: text,
  lastname: text,
  biography: text,
  occupation: text,
});

export type Person = z.infer<typeof PersonSchema>;

export const FullNameSchema = PersonSchema.pick({ firstname: true, lastname: true });

export type FullName = z.infer<typeof FullNameSchema>;

export type PersonTuple = readonly [
  username: string | null,
  email: string | null,
  firstname: string | null,
  lastname: string | null,
  biography: string | null,
  occupation: string | null,
];

/**
 * Result of an exact last-name search: the first match, or a lone null.
 */
export type ExactMatch = [Person] | [null];

export function personFromTuple(tuple: PersonTuple): Person {
  const [username, email, firstname, lastname, biography, occupation] = tuple;
  return { username, email, firstname, lastname, biography, occupation };
}

export function personToTuple(person: Person): PersonTuple {
  return [
    person.username,
    person.email,
    person.firstname,
    person.lastname,
    person.biography,
    person.occupation,
  ];
}

const INSERT_SQL =
  `INSERT INTO person (${PERSON_COLUMNS.join(', ')}) VALUES ($1, $2, $3, $4, $5, $6)`;

function likePattern(keyword: string): string {
  return `%${keyword}%`;
}

/**
 * Create the person table.
 *
 * Resolves false when the table already exists or the engine fails.
 */
export async function createTable(db: DatabaseAdapter): Promise<boolean> {
  try {
    await db.query(
      `CREATE TABLE person (
         username TEXT,
         email TEXT,
         firstname TEXT,
         lastname TEXT,
         biography TEXT,
         occupation TEXT
       )`
    );
  } catch {
    return false;
  }
  return true;
}

export async function dropTable(db: DatabaseAdapter): Promise<void> {
  await db.query('DROP TABLE IF EXISTS person');
}

export async function tableExists(db: DatabaseAdapter): Promise<boolean> {
  const result = await db.query(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name = $1",
    [PERSON_TABLE]
  );
  return result.rows.length > 0;
}

/**
 * Insert one person. Throws a ZodError when a field is missing.
 */
export async function insertOne(db: DatabaseAdapter, person: Person): Promise<void> {
  const row = PersonSchema.parse(person);
  await db.query(INSERT_SQL, [...personToTuple(row)]);
}

/**
 * Insert many people in one transaction. Nothing is kept if any row fails.
 */
export async function insertMany(
  db: DatabaseAdapter,
  people: ReadonlyArray<Person>
): Promise<number> {
  const rows = people.map((person) => PersonSchema.parse(person));
  if (rows.length === 0) return 0;

  return db.withTransaction(async (tx) => {
    for (const row of rows) {
      await tx.query(INSERT_SQL, [...personToTuple(row)]);
    }
    return rows.length;
  });
}

/**
 * All rows, ordered by lastname (binary collation, case-sensitive).
 */
export async function fetchAll(db: DatabaseAdapter): Promise<Person[]> {
  const result = await db.query('SELECT * FROM person ORDER BY lastname');
  return result.rows.map((r) => PersonSchema.parse(r));
}

/**
 * Case-sensitive lastname match. Only the first row in storage order is
 * returned; no match yields [null] rather than an empty list.
 */
export async function findByLastNameExact(
  db: DatabaseAdapter,
  lastname: string
): Promise<ExactMatch> {
  const result = await db.query('SELECT * FROM person WHERE lastname = $1 LIMIT 1', [lastname]);
  const first = result.rows[0];
  return first === undefined ? [null] : [PersonSchema.parse(first)];
}

/**
 * First person whose biography contains keyword, ignoring ASCII case.
 */
export async function findByBiographyContains(
  db: DatabaseAdapter,
  keyword: string
): Promise<Person | null> {
  const result = await db.query('SELECT * FROM person WHERE biography LIKE $1 LIMIT 1', [
    likePattern(keyword),
  ]);
  const first = result.rows[0];
  return first === undefined ? null : PersonSchema.parse(first);
}

/**
 * Names of everyone whose lastname contains keyword (ASCII case ignored),
 * ordered by firstname.
 */
export async function findByLastNameContains(
  db: DatabaseAdapter,
  keyword: string
): Promise<FullName[]> {
  const result = await db.query(
    `SELECT firstname, lastname
     FROM person
     WHERE lastname LIKE $1
     ORDER BY firstname`,
    [likePattern(keyword)]
  );
  return result.rows.map((r) => FullNameSchema.parse(r));
}
