import { DEFAULT_PAGE_SIZE } from '../config/config.js';
import type { RequestClient } from '../core/client.js';
import type { Paginator } from '../core/paginator.js';
import type { CallOptions, ListQuery } from '../core/types.js';
import { type User, userSchema } from '../models/user.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/**
 * Users of the company.
 */
export class UsersResource {
  readonly #client: RequestClient;

  constructor(client: RequestClient) {
    this.#client = client;
  }

  /**
   * All users as an automatically paged sequence.
   *
   * @param pageSize - Users fetched per request.
   * @param query - Filters such as `{ include_archived: true }`; `skip` and `limit` are managed internally.
   *
   * @example
   * ```typescript
   * const [err, firstTen] = await client.users.list(10).take(10);
   * ```
   */
  list(pageSize: number = DEFAULT_PAGE_SIZE, query?: ListQuery, opts?: CallOptions): Paginator<User> {
    return this.#client.paginate('/users', userSchema, { ...opts, pageSize, query });
  }

  /**
   * A single user by id.
   */
  get(id: string, opts?: CallOptions): SafeWrapAsync<Error, User> {
    return this.#client.get(`/users/${encodeURIComponent(id)}`, userSchema, undefined, opts);
  }
}
