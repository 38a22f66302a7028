import { DEFAULT_PAGE_SIZE } from '../config/config.js';
import type { RequestClient } from '../core/client.js';
import type { Paginator } from '../core/paginator.js';
import type { CallOptions, ListQuery } from '../core/types.js';
import { type Bonus, bonusSchema, type CreateBonus } from '../models/bonus.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/**
 * Bonuses given within the company.
 */
export class BonusesResource {
  readonly #client: RequestClient;

  constructor(client: RequestClient) {
    this.#client = client;
  }

  /**
   * All bonuses, newest first, as an automatically paged sequence.
   *
   * @param query - Filters such as `{ hashtag: '#teamwork' }`; `skip` and `limit` are managed internally.
   */
  list(pageSize: number = DEFAULT_PAGE_SIZE, query?: ListQuery, opts?: CallOptions): Paginator<Bonus> {
    return this.#client.paginate('/bonuses', bonusSchema, { ...opts, pageSize, query });
  }

  /**
   * Bonuses given or received by a user, as an automatically paged sequence.
   */
  forUser(
    userId: string,
    pageSize: number = DEFAULT_PAGE_SIZE,
    query?: ListQuery,
    opts?: CallOptions,
  ): Paginator<Bonus> {
    return this.#client.paginate(`/users/${encodeURIComponent(userId)}/bonuses`, bonusSchema, {
      ...opts,
      pageSize,
      query,
    });
  }

  /**
   * A single bonus by id.
   */
  get(id: string, opts?: CallOptions): SafeWrapAsync<Error, Bonus> {
    return this.#client.get(`/bonuses/${encodeURIComponent(id)}`, bonusSchema, undefined, opts);
  }

  /**
   * Gives a bonus, from the token's owner unless `giver_email` says otherwise.
   *
   * @example
   * ```typescript
   * const [err, bonus] = await client.bonuses.create({ reason: '+10 @alice for the #teamwork' });
   * ```
   */
  create(params: CreateBonus, opts?: CallOptions): SafeWrapAsync<Error, Bonus> {
    return this.#client.post('/bonuses', params, bonusSchema, opts);
  }
}
