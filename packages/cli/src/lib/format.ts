import { personToTuple, type ExactMatch, type FullName, type Person } from '@roster/core/repos';

/** One row in column order, as a JSON array. */
export function formatPersonRow(person: Person): string {
  return JSON.stringify(personToTuple(person));
}

export function formatFullName(name: FullName): string {
  return `${name.firstname ?? ''} ${name.lastname ?? ''}`.trim();
}

export function formatExactMatch(match: ExactMatch): string {
  const [person] = match;
  return person ? `[${formatPersonRow(person)}]` : '[null]';
}

export function formatOptionalPerson(person: Person | null): string {
  return person ? formatPersonRow(person) : 'null';
}
