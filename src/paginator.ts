import { classifyResponse, err, getHeader, ok, type Result } from './errors.js';
import type { QueryParams, ResponseHeaders, Transport } from './transport.js';

/** GitHub's maximum page size for REST list endpoints */
export const DEFAULT_PER_PAGE = 100;

export interface PaginateOptions {
  perPage?: number;
  /** Extra query parameters sent with every page (state, sort, ...) */
  query?: QueryParams;
  /** Clock used when computing rate-limit reset times */
  now?: () => number;
}

/**
 * True when the Link header advertises another page.
 */
export function hasNextPage(headers: ResponseHeaders): boolean {
  const link = getHeader(headers, 'link');
  if (!link) return false;
  return link.split(',').some((part) => /;\s*rel="?next"?/.test(part));
}

/**
 * Walk every page of a GitHub list endpoint, lazily.
 *
 * Yields one result per page, in page order. A failed page is yielded as an
 * error and ends the sequence; nothing is retried here. A response whose body
 * is a single object (as for a PR itself) is treated as a one-item page.
 *
 * Paging stops when a page holds fewer than `perPage` items or the response
 * carries no `rel="next"` link.
 */
export async function* paginate(
  transport: Transport,
  path: string,
  options: PaginateOptions = {},
): AsyncGenerator<Result<unknown[]>, void, undefined> {
  const perPage = options.perPage ?? DEFAULT_PER_PAGE;
  const now = options.now ?? Date.now;

  for (let page = 1; ; page++) {
    const response = await transport.request(path, { ...options.query, page, per_page: perPage });

    const failure = classifyResponse(response, now());
    if (failure) {
      yield err(failure);
      return;
    }

    if (!Array.isArray(response.body)) {
      yield ok([response.body]);
      return;
    }

    const items: unknown[] = response.body;
    yield ok(items);

    if (items.length < perPage || !hasNextPage(response.headers)) {
      return;
    }
  }
}

/**
 * Drain a page sequence into one ordered array, stopping at the first error.
 */
export async function collectAll(pages: AsyncIterable<Result<unknown[]>>): Promise<Result<unknown[]>> {
  const items: unknown[] = [];
  for await (const page of pages) {
    if (!page.ok) return page;
    items.push(...page.value);
  }
  return ok(items);
}
