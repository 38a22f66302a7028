import type { QueryParams } from '../core/types.js';

/**
 * Builds a relative request URL from a path and a flat query map.
 *
 * `undefined` and `null` values are left out, everything else is stringified.
 * Keys keep their insertion order.
 */
export function constructUrl(path: string, query?: QueryParams): string {
  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value === undefined || value === null) {
      continue;
    }

    searchParams.set(key, String(value));
  }

  const search = searchParams.toString();
  return search ? `${path}?${search}` : path;
}
