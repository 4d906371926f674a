import { QueryFailedError } from 'typeorm';
import { isUniqueViolation } from './query-errors';

const failure = (code: string) =>
  new QueryFailedError(
    'INSERT INTO "carts" ("user_id") VALUES ($1)',
    [1],
    Object.assign(new Error('constraint failed'), { code }),
  );

describe('isUniqueViolation', () => {
  it('recognises PostgreSQL unique violations', () => {
    expect(isUniqueViolation(failure('23505'))).toBe(true);
  });

  it('recognises SQLite unique violations', () => {
    expect(isUniqueViolation(failure('SQLITE_CONSTRAINT_UNIQUE'))).toBe(true);
  });

  it('ignores other constraint failures and plain errors', () => {
    expect(isUniqueViolation(failure('23503'))).toBe(false);
    expect(isUniqueViolation(new Error('boom'))).toBe(false);
  });
});
