/** Wire shape of a user, before decoding. */
export interface UserRecord {
  id: string;
  short_name: string;
  full_name: string;
  display_name: string;
  username: string;
  email: string;
  path: string;
  full_pic_url: string;
  profile_pic_url: string;
  first_name: string;
  last_name: string | null;
  last_active_at: string | null;
  created_at: string;
  budget_boost: number;
  user_mode: string;
  country: string | null;
  time_zone: string;
  can_receive: boolean;
  can_give: boolean;
  give_amounts: number[];
  custom_properties: Record<string, unknown>;
  status: string;
  earning_balance: number | null;
  earning_balance_with_currency: string | null;
  lifetime_earnings: number | null;
  lifetime_earnings_with_currency: string | null;
  admin: boolean | null;
}

/** Wire shape of a bonus, before decoding. */
export interface BonusRecord {
  id: string;
  created_at: string;
  parent_bonus_id: string | null;
  reason: string;
  reason_decoded: string;
  reason_html: string;
  amount: number;
  amount_with_currency: string;
  family_amount: number;
  value: string | null;
  hashtag: string | null;
  giver: UserRecord;
  receivers: UserRecord[];
}

export function makeUser(index: number): UserRecord {
  const username = `user${index}`;
  return {
    id: `u${index}`,
    short_name: `User ${index}`,
    full_name: `User Number${index}`,
    display_name: `User ${index}`,
    username,
    email: `${username}@example.test`,
    path: `/company/users/u${index}`,
    full_pic_url: `https://pics.example.test/${username}.png`,
    profile_pic_url: `https://pics.example.test/${username}-small.png`,
    first_name: 'User',
    last_name: index % 2 === 0 ? `Number${index}` : null,
    last_active_at: index % 3 === 0 ? null : '2024-03-01T09:30:00+01:00',
    created_at: '2023-01-15T12:00:00Z',
    budget_boost: 0,
    user_mode: index === 0 ? 'benefactor' : 'normal',
    country: 'NO',
    time_zone: 'Europe/Oslo',
    can_receive: true,
    can_give: index !== 0,
    give_amounts: [1, 5, 10],
    custom_properties: { team: index % 2 === 0 ? 'platform' : 'product' },
    status: 'active',
    earning_balance: 100 + index,
    earning_balance_with_currency: `${100 + index} points`,
    lifetime_earnings: 1000,
    lifetime_earnings_with_currency: '1000 points',
    admin: index === 0,
  };
}

export function makeBonus(index: number, giver: UserRecord, receiver: UserRecord, amount = 5): BonusRecord {
  const reason = `+${amount} @${receiver.username} for the #teamwork`;
  return {
    id: `b${index}`,
    created_at: `2024-02-${String((index % 28) + 1).padStart(2, '0')}T10:00:00Z`,
    parent_bonus_id: null,
    reason,
    reason_decoded: reason,
    reason_html: `<p>${reason}</p>`,
    amount,
    amount_with_currency: `${amount} points`,
    family_amount: amount,
    value: 'teamwork',
    hashtag: '#teamwork',
    giver,
    receivers: [receiver],
  };
}
