import { z } from 'zod';

/** ISO-8601 timestamp with offset, decoded to a `Date`. */
export const timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));
