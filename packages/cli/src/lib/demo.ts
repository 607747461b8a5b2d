/**
 * Demonstration run: rebuild the person table, load four people, then
 * print the table and three example searches.
 */

import type { DatabaseAdapter } from '@roster/core/db';
import { people, type Person } from '@roster/core/repos';
import {
  formatExactMatch,
  formatFullName,
  formatOptionalPerson,
  formatPersonRow,
} from './format.js';

export const DEMO_PERSON: Person = {
  username: 'Neo',
  email: 'ThomasAnderson@gmail.com',
  firstname: 'Thomas',
  lastname: 'Anderson',
  biography: 'Thomas Anderson is a Computer Programmer.',
  occupation: 'Computer Programmer',
};

export const DEMO_PEOPLE: ReadonlyArray<Person> = [
  {
    username: 'Janey',
    email: 'JaneDoe@gmail.com',
    firstname: 'Jane',
    lastname: 'Doe',
    biography: 'Jane Doe is a Software Engineer.',
    occupation: 'Software Engineer',
  },
  {
    username: 'Joey',
    email: 'JoeShmo@gmail.com',
    firstname: 'Joseph',
    lastname: 'Shmo',
    biography: 'Joseph Shmo is a Data Scientist.',
    occupation: 'Data Scientist',
  },
  {
    username: 'Jonny',
    email: 'JohnSmith@gmail.com',
    firstname: 'John',
    lastname: 'Smith',
    biography: 'John Doe is a Database Administrator.',
    occupation: 'Database Administrator',
  },
];

export interface DemoSearches {
  exactLastName: string;
  biographyKeyword: string;
  lastNameKeyword: string;
}

export const DEMO_SEARCHES: DemoSearches = {
  exactLastName: 'Shmo',
  biographyKeyword: 'eng',
  lastNameKeyword: 's',
};

/**
 * Resolves false, having written nothing else, if the table could not be
 * created.
 */
export async function runDemo(
  db: DatabaseAdapter,
  write: (line: string) => void,
  searches: DemoSearches = DEMO_SEARCHES,
): Promise<boolean> {
  await people.dropTable(db);
  if (!(await people.createTable(db))) {
    return false;
  }

  write('table functions:');
  await people.insertOne(db, DEMO_PERSON);
  await people.insertMany(db, DEMO_PEOPLE);
  for (const person of await people.fetchAll(db)) {
    write(formatPersonRow(person));
  }

  write('');
  write('search functions:');
  const exact = await people.findByLastNameExact(db, searches.exactLastName);
  write(`lastname match: ${formatExactMatch(exact)}`);

  const bio = await people.findByBiographyContains(db, searches.biographyKeyword);
  write(`biography match: ${formatOptionalPerson(bio)}`);

  write(`matches for: ${searches.lastNameKeyword}`);
  for (const name of await people.findByLastNameContains(db, searches.lastNameKeyword)) {
    write(`    name: ${formatFullName(name)}`);
  }
  return true;
}
