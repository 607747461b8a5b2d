import type { Person } from '../repos/people.js';

export const neo: Person = {
  username: 'Neo',
  email: 'ThomasAnderson@example.com',
  firstname: 'Thomas',
  lastname: 'Anderson',
  biography: 'Thomas Anderson is a Computer Programmer.',
  occupation: 'Computer Programmer',
};

export const janey: Person = {
  username: 'Janey',
  email: 'JaneDoe@example.com',
  firstname: 'Jane',
  lastname: 'Doe',
  biography: 'Jane Doe is a Software Engineer.',
  occupation: 'Software Engineer',
};

export const joey: Person = {
  username: 'Joey',
  email: 'JoeShmo@example.com',
  firstname: 'Joseph',
  lastname: 'Shmo',
  biography: 'Joseph Shmo is a Data Scientist.',
  occupation: 'Data Scientist',
};

export const jonny: Person = {
  username: 'Jonny',
  email: 'JohnSmith@example.com',
  firstname: 'John',
  lastname: 'Smith',
  biography: 'John Doe is a Database Administrator.',
  occupation: 'Database Administrator',
};
