import { z } from 'zod';

/** Every table keys its rows by UUID. */
export const EntityIdSchema = z.string().uuid();

export function isEntityId(value: string): boolean {
  return EntityIdSchema.safeParse(value).success;
}
