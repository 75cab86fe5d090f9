import { logger } from '@/config/logger.js';
import { storeError } from '@/shared/errors.js';
import { fail, ok, type Result } from '@/shared/result.js';
import { serializeError } from '@/utils/errorHandling.js';

/**
 * Run one store round trip and fold any thrown error into a STORE_ERROR result.
 */
export async function storeCall<T>(
  operation: string,
  table: string,
  call: () => Promise<T>,
): Promise<Result<T>> {
  try {
    return ok(await call());
  } catch (error) {
    logger.error('Store operation failed', {
      operation,
      table,
      error: serializeError(error),
    });
    return fail(storeError(operation, table, error));
  }
}

export function firstRow<T>(rows: T[], operation: string, table: string): T {
  const [row] = rows;
  if (!row) {
    throw new Error(`${operation} on ${table} returned no row`);
  }
  return row;
}

export function firstRowOrNull<T>(rows: T[]): T | null {
  return rows[0] ?? null;
}
