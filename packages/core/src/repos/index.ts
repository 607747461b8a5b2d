export * as people from './people.js';
export {
  PERSON_COLUMNS,
  PersonSchema,
  FullNameSchema,
  personFromTuple,
  personToTuple,
  type Person,
  type FullName,
  type PersonColumn,
  type PersonTuple,
  type ExactMatch,
} from './people.js';
