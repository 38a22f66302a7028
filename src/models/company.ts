import { z } from 'zod';

/** The company the token belongs to. Fields beyond these are kept as-is. */
export const companySchema = z
  .object({
    id: z.string(),
    name: z.string(),
  })
  .passthrough();

/** The company the token belongs to. */
export type Company = z.infer<typeof companySchema>;
