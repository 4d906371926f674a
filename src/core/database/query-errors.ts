import { QueryFailedError } from 'typeorm';

const PG_UNIQUE_VIOLATION = '23505';
const SQLITE_UNIQUE_VIOLATIONS = [
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
];

const driverCode = (error: QueryFailedError): string | undefined => {
  const driverError: unknown = error.driverError;
  if (
    driverError !== null &&
    typeof driverError === 'object' &&
    'code' in driverError &&
    typeof driverError.code === 'string'
  ) {
    return driverError.code;
  }
  return undefined;
};

/** True when a write failed on a unique index (PostgreSQL or SQLite). */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const code = driverCode(error);
  return (
    code === PG_UNIQUE_VIOLATION ||
    (code !== undefined && SQLITE_UNIQUE_VIOLATIONS.includes(code))
  );
}
