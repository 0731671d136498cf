import { QueryFailedError } from 'typeorm';

/** Unique-constraint violation on Postgres (23505) or SQLite. */
export function isUniqueViolation(err: unknown): boolean {
  if (!(err instanceof QueryFailedError)) return false;

  const driverError: unknown = err.driverError;
  const code =
    driverError && typeof driverError === 'object' && 'code' in driverError
      ? String(driverError.code)
      : '';

  if (code === '23505') return true;
  return /UNIQUE constraint failed/i.test(err.message);
}
