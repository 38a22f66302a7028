import { z } from 'zod';
import { timestamp } from './shared.js';
import { userSchema } from './user.js';

/** A bonus given by one user to one or more receivers. */
export const bonusSchema = z.object({
  id: z.string(),
  created_at: timestamp,
  parent_bonus_id: z.string().nullish(),
  reason: z.string(),
  reason_decoded: z.string(),
  reason_html: z.string(),
  amount: z.number().int().nonnegative(),
  amount_with_currency: z.string(),
  family_amount: z.number().int().nonnegative(),
  value: z.string().nullish(),
  hashtag: z.string().nullish(),
  giver: userSchema,
  receivers: z.array(userSchema),
});

/** A bonus given by one user to one or more receivers. */
export type Bonus = z.infer<typeof bonusSchema>;

/**
 * Body of `POST /bonuses`: either the free-form `reason` alone
 * ("+10 @alice for the #teamwork"), or the same split into fields.
 */
export type CreateBonus =
  | {
      reason: string;
      giver_email?: string;
      parent_bonus_id?: string;
    }
  | {
      reason: string;
      receiver_email: string;
      amount: number;
      hashtag: string;
      giver_email?: string;
      parent_bonus_id?: string;
    };
