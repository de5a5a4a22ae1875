import { z } from "zod";
import { CACHE_CONSTANTS, QUERY_CONSTANTS, type TtlClass } from "../config/constants";
import { STORE_ERROR_CODES, StoreError, type RelationalStore, type Row } from "../store/types";
import { systemClock, type Clock } from "../utils/clock";
import {
  CacheError,
  FilterError,
  QueryError,
  getErrorMessage,
} from "../utils/errorHandler";
import { createLogger } from "../utils/logger";
import { compileFilters, type CompiledFilters, type FilterSpec } from "./filterCompiler";
import {
  countCacheKey,
  formatCacheKey,
  hashParts,
  rowsCacheKey,
  type QueryKey,
} from "./queryKey";
import { TtlCache, keyMatchesPrefix } from "./ttlCache";

const log = createLogger("QueryCache");

const rowsSchema = z.array(z.record(z.unknown()));
const countSchema = z.number().int().nonnegative();

export interface CachedResult<T> {
  data: T;
  /** True when served from the cache without a store round trip. */
  fromCache: boolean;
  fetchedAt: Date;
}

export interface ReadOptions {
  /** Stops this caller waiting. A shared in-flight fetch still completes and is cached. */
  signal?: AbortSignal;
}

export interface CallOptions extends ReadOptions {
  ttlClass: TtlClass;
  /** Prefix used for invalidation; defaults to the procedure name. */
  tag?: string;
}

export interface ExecutorStats {
  hits: number;
  misses: number;
  coalesced: number;
  backendCalls: number;
  cacheErrors: number;
  entries: number;
}

export interface CachedQueryExecutorOptions {
  clock?: Clock;
  cache?: TtlCache;
  timeoutMs?: number;
}

interface Flight {
  promise: Promise<unknown>;
  state: { stale: boolean };
}

/**
 * Runs reads against the relational store through a TTL cache.
 *
 * Concurrent misses on one key share a single store round trip. Failures are
 * never cached and always surface as QueryError. Any fault inside the cache
 * itself is logged and answered with a live fetch.
 */
export class CachedQueryExecutor {
  private cache: TtlCache;
  private clock: Clock;
  private timeoutMs: number;
  private inflight = new Map<string, Flight>();
  private counters = { hits: 0, misses: 0, coalesced: 0, backendCalls: 0, cacheErrors: 0 };

  constructor(private store: RelationalStore, options: CachedQueryExecutorOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.cache = options.cache ?? new TtlCache(this.clock);
    this.timeoutMs = options.timeoutMs ?? QUERY_CONSTANTS.STORE_TIMEOUT_MS;
  }

  async execute(key: QueryKey, options: ReadOptions = {}): Promise<CachedResult<Row[]>> {
    const compiled = compile(key.filters);
    return this.cached(rowsCacheKey(key, compiled.cacheKey), key.ttlClass, rowsSchema, () =>
      this.store.select({
        table: key.table,
        columns: key.columns,
        predicates: compiled.predicates,
        order: key.order,
        limit: key.limit,
        offset: key.offset,
      }), options);
  }

  /** Exact row count for the key's filters; pagination fields are ignored. */
  async count(key: QueryKey, options: ReadOptions = {}): Promise<CachedResult<number>> {
    const compiled = compile(key.filters);
    return this.cached(countCacheKey(key, compiled.cacheKey), key.ttlClass, countSchema, () =>
      this.store.count({ table: key.table, predicates: compiled.predicates }), options);
  }

  async call(
    procedure: string,
    params: Record<string, unknown>,
    options: CallOptions,
  ): Promise<CachedResult<Row[]>> {
    const cacheKey = formatCacheKey(options.tag ?? procedure, "call", hashParts([procedure, params]));
    return this.cached(cacheKey, options.ttlClass, rowsSchema, () =>
      this.store.callProcedure(procedure, params), options);
  }

  /**
   * Caches an arbitrary read under `cacheKey`. The schema re-validates
   * cached values, so it must accept its own output unchanged.
   */
  async remember<T>(
    cacheKey: string,
    ttlClass: TtlClass,
    schema: z.ZodType<T>,
    loader: () => Promise<T>,
    options: ReadOptions = {},
  ): Promise<CachedResult<T>> {
    return this.cached(cacheKey, ttlClass, schema, loader, options);
  }

  /**
   * Drops every cached entry under `prefix` (a table name or tag). Reads already in flight for those keys will not be cached.
   */
  invalidate(prefix: string): number {
    for (const [key, flight] of [...this.inflight.entries()]) {
      if (keyMatchesPrefix(key, prefix)) {
        flight.state.stale = true;
        this.inflight.delete(key);
      }
    }
    let removed = 0;
    try {
      removed = this.cache.invalidate(prefix);
    } catch (error) {
      this.recordCacheFault(prefix, error);
    }
    log.info(`Invalidated ${removed} entries`, { cacheKey: prefix });
    return removed;
  }

  stats(): ExecutorStats {
    return { ...this.counters, entries: this.cache.size };
  }

  private async cached<T>(
    cacheKey: string,
    ttlClass: TtlClass,
    schema: z.ZodType<T>,
    loader: () => Promise<T>,
    options: ReadOptions,
  ): Promise<CachedResult<T>> {
    const hit = this.readCache(cacheKey, schema);
    if (hit) {
      this.counters.hits++;
      return hit;
    }

    let flight = this.inflight.get(cacheKey);
    if (flight) {
      this.counters.coalesced++;
    } else {
      this.counters.misses++;
      flight = this.startFlight(cacheKey, ttlClass, loader);
    }

    const value = await abortable(flight.promise, options.signal);
    return { data: schema.parse(value), fromCache: false, fetchedAt: new Date(this.clock.now()) };
  }

  private startFlight<T>(cacheKey: string, ttlClass: TtlClass, loader: () => Promise<T>): Flight {
    const state = { stale: false };
    const promise = this.fetchLive(cacheKey, loader)
      .then((value) => {
        if (!state.stale) {
          this.writeCache(cacheKey, value, CACHE_CONSTANTS.TTL_SECONDS[ttlClass]);
        }
        return value;
      })
      .finally(() => {
        if (this.inflight.get(cacheKey) === flight) {
          this.inflight.delete(cacheKey);
        }
      });
    const flight: Flight = { promise, state };
    // Every waiter may have aborted; the failure is already logged in fetchLive
    promise.catch((error: unknown) => log.debug("In-flight read settled with error", {
      cacheKey,
      error: getErrorMessage(error),
    }));
    this.inflight.set(cacheKey, flight);
    return flight;
  }

  private async fetchLive<T>(cacheKey: string, loader: () => Promise<T>): Promise<T> {
    this.counters.backendCalls++;
    const started = Date.now();
    try {
      const value = await withTimeout(loader(), this.timeoutMs);
      log.debug("Cache miss served from store", { cacheKey, duration: Date.now() - started });
      return value;
    } catch (error) {
      const queryError = toQueryError(error);
      log.warn(`Store read failed: ${queryError.code}`, {
        cacheKey,
        duration: Date.now() - started,
        error: getErrorMessage(error),
      });
      throw queryError;
    }
  }

  private readCache<T>(cacheKey: string, schema: z.ZodType<T>): CachedResult<T> | undefined {
    try {
      const entry = this.cache.get(cacheKey);
      if (!entry) return undefined;
      const parsed = schema.safeParse(entry.value);
      if (!parsed.success) {
        throw new CacheError(cacheKey, "Cached value failed validation", { cause: parsed.error });
      }
      return { data: parsed.data, fromCache: true, fetchedAt: new Date(entry.insertedAt) };
    } catch (error) {
      this.recordCacheFault(cacheKey, error);
      try {
        this.cache.delete(cacheKey);
      } catch (deleteError) {
        this.recordCacheFault(cacheKey, deleteError);
      }
      return undefined;
    }
  }

  private writeCache(cacheKey: string, value: unknown, ttlSeconds: number): void {
    try {
      this.cache.set(cacheKey, value, ttlSeconds);
    } catch (error) {
      this.recordCacheFault(cacheKey, error);
    }
  }

  private recordCacheFault(cacheKey: string, error: unknown): void {
    this.counters.cacheErrors++;
    log.warn("Cache fault, serving live data", { cacheKey, error: getErrorMessage(error) });
  }
}

function compile(filters: readonly FilterSpec[]): CompiledFilters {
  try {
    return compileFilters(filters);
  } catch (error) {
    throw toQueryError(error);
  }
}

export function toQueryError(error: unknown): QueryError {
  if (error instanceof QueryError) return error;
  if (error instanceof FilterError) {
    return new QueryError("BadFilter", error.message, { cause: error });
  }
  if (error instanceof StoreError && error.code === STORE_ERROR_CODES.BAD_IDENTIFIER) {
    return new QueryError("BadFilter", error.message, { cause: error });
  }
  return new QueryError("BackendUnavailable", undefined, { cause: error });
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => reject(new QueryError("Timeout")), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(abortError(signal));
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(abortError(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

function abortError(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) return signal.reason;
  const error = new Error("Request aborted");
  error.name = "AbortError";
  return error;
}

/**
 * Retries once (by default) when the store was unavailable or timed out.
 * Other errors propagate immediately.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  retries: number = QUERY_CONSTANTS.RETRY_ATTEMPTS,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= retries || !(error instanceof QueryError) || !error.retryable) {
        throw error;
      }
      log.warn(`Retrying after ${error.code} (attempt ${attempt + 2} of ${retries + 1})`);
    }
  }
}
