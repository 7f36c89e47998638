/** One response of a paged listing, as `octokit.paginate.iterator` yields it. */
export interface PageResponse<T> {
  data: T[];
  headers: { link?: string };
}

export type PageSource<T> = () => AsyncIterable<PageResponse<T>>;

export interface PaginateOptions {
  /** Upper bound on pages read; unbounded when absent. */
  maxPages?: number;
}

export interface CollectedPages<T> {
  items: T[];
  reachedPageLimit: boolean;
}

/**
 * Lazy page sequence over a listing. Every iteration opens the source afresh,
 * so it starts from the first page each time. It ends when the source has no
 * next page, at the first empty page, or after `maxPages` pages.
 */
export function paginate<T>(
  openPages: PageSource<T>,
  options: PaginateOptions = {},
): AsyncIterable<T[]> {
  const maxPages = normalizeMaxPages(options.maxPages);

  return {
    async *[Symbol.asyncIterator]() {
      let pages = 0;
      for await (const response of openPages()) {
        if (response.data.length === 0) {
          return;
        }
        yield response.data;
        pages += 1;
        if (pages >= maxPages) {
          return;
        }
      }
    },
  };
}

export async function collectPages<T>(
  openPages: PageSource<T>,
  options: PaginateOptions = {},
): Promise<CollectedPages<T>> {
  const maxPages = normalizeMaxPages(options.maxPages);
  const items: T[] = [];
  let pages = 0;

  for await (const response of openPages()) {
    if (response.data.length === 0) {
      break;
    }
    items.push(...response.data);
    pages += 1;
    if (pages >= maxPages) {
      return { items, reachedPageLimit: hasNextPage(response.headers.link) };
    }
  }

  return { items, reachedPageLimit: false };
}

export function hasNextPage(link: string | undefined): boolean {
  return /<[^>]*>;\s*rel="next"/.test(link ?? "");
}

function normalizeMaxPages(maxPages: number | undefined): number {
  return maxPages === undefined ? Number.POSITIVE_INFINITY : Math.max(1, Math.floor(maxPages));
}
