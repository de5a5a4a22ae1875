import { createHash } from "crypto";
import type { TtlClass } from "../config/constants";
import type { OrderSpec } from "../store/types";
import type { FilterSpec } from "./filterCompiler";

/**
 * Everything that determines the result of a table read.
 */
export interface QueryKey {
  table: string;
  /** Empty selects every column. */
  columns: readonly string[];
  filters: readonly FilterSpec[];
  order?: readonly OrderSpec[];
  limit?: number;
  offset?: number;
  ttlClass: TtlClass;
}

export type CacheKeyKind = TtlClass | `count-${TtlClass}` | "call";

export function hashParts(parts: unknown): string {
  return createHash("sha256").update(JSON.stringify(parts)).digest("hex").slice(0, 32);
}

/**
 * Cache keys start with the table (or tag) name so writes can invalidate
 * every cached read of a table by prefix.
 */
export function formatCacheKey(tag: string, kind: CacheKeyKind, digest: string): string {
  return `${tag}:${kind}:${digest}`;
}

export function rowsCacheKey(key: QueryKey, filterDigest: string): string {
  const columns = [...new Set(key.columns)].sort();
  const order = (key.order ?? []).map((o) => `${o.column} ${o.direction}`);
  return formatCacheKey(
    key.table,
    key.ttlClass,
    hashParts([columns, filterDigest, order, key.limit ?? null, key.offset ?? 0]),
  );
}

// Counts ignore columns, order and pagination, so every page of a listing
// shares one count entry per TTL class.
export function countCacheKey(key: QueryKey, filterDigest: string): string {
  return formatCacheKey(key.table, `count-${key.ttlClass}`, filterDigest);
}

export function withoutPagination(key: QueryKey): QueryKey {
  const { limit: _limit, offset: _offset, ...rest } = key;
  return rest;
}
