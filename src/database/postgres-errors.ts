import { QueryFailedError } from 'typeorm';

export const PG_UNIQUE_VIOLATION = '23505';

/**
 * True when the error is a Postgres unique violation, optionally restricted
 * to one named constraint or index.
 */
export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) return false;
  if (!('code' in driverError) || driverError.code !== PG_UNIQUE_VIOLATION) return false;
  if (constraint === undefined) return true;
  return 'constraint' in driverError && driverError.constraint === constraint;
}

/** Largest value of a Postgres `integer` column; serial ids never exceed it. */
export const PG_MAX_INTEGER = 2147483647;

/** True when `id` can name a row keyed by a serial `integer` column. */
export function isStorableId(id: number): boolean {
  return Number.isSafeInteger(id) && id >= 1 && id <= PG_MAX_INTEGER;
}
