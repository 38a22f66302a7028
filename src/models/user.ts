import { z } from 'zod';
import { timestamp } from './shared.js';

/** Role of a user within the company. */
export const userModeSchema = z.enum(['normal', 'observer', 'receiver', 'benefactor', 'bot']);

/** Role of a user within the company. */
export type UserMode = z.infer<typeof userModeSchema>;

/** A member of the company, as returned by `/users`. */
export const userSchema = z.object({
  id: z.string(),
  short_name: z.string(),
  full_name: z.string(),
  display_name: z.string(),
  username: z.string(),
  email: z.string(),
  path: z.string(),
  full_pic_url: z.string().url(),
  profile_pic_url: z.string().url(),
  first_name: z.string(),
  last_name: z.string().nullish(),
  last_active_at: timestamp.nullish(),
  created_at: timestamp,
  budget_boost: z.number().int().nonnegative(),
  user_mode: userModeSchema,
  country: z.string().nullish(),
  time_zone: z.string(),
  can_receive: z.boolean(),
  can_give: z.boolean(),
  give_amounts: z.array(z.number().int().nonnegative()),
  custom_properties: z.record(z.unknown()),
  status: z.string(),
  earning_balance: z.number().int().nonnegative().nullish(),
  earning_balance_with_currency: z.string().nullish(),
  lifetime_earnings: z.number().int().nonnegative().nullish(),
  lifetime_earnings_with_currency: z.string().nullish(),
  admin: z.boolean().nullish(),
});

/** A member of the company. */
export type User = z.infer<typeof userSchema>;
