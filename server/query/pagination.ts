import { ValidationError } from "../utils/errorHandler";
import type { Row } from "../store/types";
import type { CachedQueryExecutor, ReadOptions } from "./cachedQueryExecutor";
import { withoutPagination, type QueryKey } from "./queryKey";

export interface PageState {
  pageIndex: number;
  totalPages: number;
  offset: number;
  limit: number;
  total: number;
  hasPrevious: boolean;
  hasNext: boolean;
}

export interface Page {
  rows: Row[];
  page: PageState;
  /** True only when both the count and the rows came from the cache. */
  fromCache: boolean;
}

/**
 * Navigation state for a requested offset. A page past the end (the result
 * set shrank after a filter change) clamps to the last valid page.
 */
export function page(offset: number, limit: number, total: number): PageState {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`Page size must be a positive integer, got ${limit}`);
  }
  const safeTotal = Math.max(0, Math.floor(total));
  const totalPages = Math.ceil(safeTotal / limit);
  const requested = Math.max(0, Math.floor(offset / limit));
  const pageIndex = Math.min(requested, Math.max(0, totalPages - 1));

  return {
    pageIndex,
    totalPages,
    offset: pageIndex * limit,
    limit,
    total: safeTotal,
    hasPrevious: pageIndex > 0,
    hasNext: pageIndex < totalPages - 1,
  };
}

export function pageAt(pageIndex: number, limit: number, total: number): PageState {
  return page(Math.max(0, pageIndex) * limit, limit, total);
}

export async function countFor(
  executor: CachedQueryExecutor,
  key: QueryKey,
  options?: ReadOptions,
): Promise<number> {
  const result = await executor.count(withoutPagination(key), options);
  return result.data;
}

/**
 * Counts the filtered rows, clamps the requested page, then fetches it. The
 * count and the page are cached under separate keys.
 */
export async function paginate(
  executor: CachedQueryExecutor,
  key: QueryKey,
  pageIndex: number,
  pageSize: number,
  options: ReadOptions = {},
): Promise<Page> {
  const counted = await executor.count(withoutPagination(key), options);
  const state = pageAt(pageIndex, pageSize, counted.data);
  if (state.total === 0) {
    return { rows: [], page: state, fromCache: counted.fromCache };
  }

  const rows = await executor.execute({ ...key, limit: state.limit, offset: state.offset }, options);
  return { rows: rows.data, page: state, fromCache: counted.fromCache && rows.fromCache };
}
