import { ConfigurationError } from '../error/configurationError.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';

/** Window requested from the server for one page. */
export interface PageRequest {
  skip: number;
  limit: number;
}

/** Fetches one page of a collection. */
export type PageFetcher<T> = (page: PageRequest) => SafeWrapAsync<Error, T[]>;

/** Outcome of a single pull. */
export type PullResult<T> = IteratorResult<T, undefined>;

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Lazy, pull-based view of a skip/limit paginated collection.
 *
 * Pages are fetched only when the buffered items of the previous one are used up,
 * so a consumer that stops early never causes a fetch it didn't need. The
 * collection ends at the first empty page, or right after a page shorter than
 * the page size has been drained.
 *
 * A failed fetch is terminal: every later pull reports the same error and nothing
 * is fetched again. An instance is meant for a single consumer; concurrent pulls
 * are queued so that at most one fetch is ever in flight.
 *
 * @example
 * const [err, users] = await client.users.list(50).take(10);
 *
 * for await (const user of client.users.list(50)) {
 *   console.log(user.display_name);
 * }
 */
export class Paginator<T> implements AsyncIterable<T> {
  /** Fetches the page at a given window. */
  readonly #fetchPage: PageFetcher<T>;
  /** Requested page size. */
  readonly #pageSize: number;
  /** Items of the last page not yet handed out. */
  #buffer: T[] = [];
  /** Position of the next item in {@link #buffer}. */
  #cursor = 0;
  /** Items received so far, the `skip` of the next fetch. */
  #skip = 0;
  /** Set once the server has no more items. */
  #exhausted = false;
  /** Terminal error. */
  #failure: Error | null = null;
  /** Pages requested so far. */
  #fetches = 0;
  /** Tail of the pull queue. */
  #queue: Promise<unknown> = Promise.resolve();

  constructor(fetchPage: PageFetcher<T>, pageSize: number) {
    this.#fetchPage = fetchPage;
    this.#pageSize = pageSize;
  }

  /** Number of page requests issued so far. */
  get fetches(): number {
    return this.#fetches;
  }

  /** Whether the sequence has ended, by exhaustion or failure. */
  get done(): boolean {
    return this.#failure !== null || (this.#exhausted && this.#cursor >= this.#buffer.length);
  }

  /**
   * Pulls the next item, fetching the next page when the buffer is empty.
   */
  next(): SafeWrapAsync<Error, PullResult<T>> {
    const pull = this.#queue.then(() => this.#pull());
    this.#queue = pull;
    return pull;
  }

  /**
   * Collects at most `count` items, then stops pulling.
   */
  async take(count: number): SafeWrapAsync<Error, T[]> {
    const items: T[] = [];
    while (items.length < count) {
      const [err, result] = await this.next();
      if (err) {
        return [err, null];
      }

      if (result.done) {
        break;
      }

      items.push(result.value);
    }

    return [null, items];
  }

  /**
   * Drains the whole collection into an array.
   */
  collect(): SafeWrapAsync<Error, T[]> {
    return this.take(Number.POSITIVE_INFINITY);
  }

  /**
   * Iterates the collection, throwing the terminal error if a fetch fails.
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const [err, result] = await this.next();
      if (err) {
        throw err;
      }

      if (result.done) {
        return;
      }

      yield result.value;
    }
  }

  async #pull(): SafeWrapAsync<Error, PullResult<T>> {
    if (this.#failure) {
      return [this.#failure, null];
    }

    const buffered = this.#shift();
    if (buffered) {
      return buffered;
    }

    if (this.#exhausted) {
      return [null, DONE];
    }

    if (!Number.isInteger(this.#pageSize) || this.#pageSize < 1) {
      this.#failure = new ConfigurationError(`error page size must be a positive integer, got ${this.#pageSize}`);
      return [this.#failure, null];
    }

    const page: PageRequest = { skip: this.#skip, limit: this.#pageSize };
    this.#fetches += 1;
    const [err, items] = await this.#fetchPage(page);
    if (err) {
      this.#failure = new Error(`error fetching page at skip ${page.skip} with limit ${page.limit}`, { cause: err });
      return [this.#failure, null];
    }

    this.#skip += items.length;
    this.#buffer = items;
    this.#cursor = 0;
    if (items.length < this.#pageSize) {
      this.#exhausted = true;
    }

    return this.#shift() ?? [null, DONE];
  }

  #shift(): SafeWrap<Error, PullResult<T>> | null {
    if (this.#cursor >= this.#buffer.length) {
      return null;
    }

    const value = this.#buffer[this.#cursor];
    this.#cursor += 1;
    if (this.#cursor >= this.#buffer.length) {
      this.#buffer = [];
      this.#cursor = 0;
    }

    return [null, { done: false, value }];
  }
}
