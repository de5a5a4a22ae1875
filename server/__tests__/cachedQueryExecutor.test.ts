import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { z } from "zod";
import { CachedQueryExecutor, withRetry } from "../query/cachedQueryExecutor";
import type { QueryKey } from "../query/queryKey";
import { TtlCache } from "../query/ttlCache";
import { MemStore } from "../store/memStore";
import type { Row } from "../store/types";
import { ManualClock } from "../utils/clock";
import { CacheError, QueryError } from "../utils/errorHandler";

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

const highQuality: QueryKey = {
  table: "analysis_results",
  columns: ["source_transcript_id", "quality_score"],
  filters: [{ kind: "range", field: "quality_score", low: 80 }],
  order: [{ column: "quality_score", direction: "desc" }],
  ttlClass: "rows",
};

describe("CachedQueryExecutor", () => {
  let store: MemStore;
  let clock: ManualClock;
  let executor: CachedQueryExecutor;

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    store = new MemStore();
    store.seed("analysis_results", [
      { source_transcript_id: "t1", quality_score: 92, transcript_original: "my back hurts after the crash" },
      { source_transcript_id: "t2", quality_score: 85, transcript_original: "they never called me back" },
      { source_transcript_id: "t3", quality_score: 40, transcript_original: "wrong number" },
    ]);
    clock = new ManualClock(new Date("2024-06-01T12:00:00Z"));
    executor = new CachedQueryExecutor(store, { clock });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("serves a repeat read within the TTL from the cache", async () => {
    const select = vi.spyOn(store, "select");

    const first = await executor.execute(highQuality);
    clock.advance(299_000);
    const second = await executor.execute(highQuality);

    expect(select).toHaveBeenCalledTimes(1);
    expect(first.fromCache).toBe(false);
    expect(second.fromCache).toBe(true);
    expect(second.data).toEqual([
      { source_transcript_id: "t1", quality_score: 92 },
      { source_transcript_id: "t2", quality_score: 85 },
    ]);
    expect(second.fetchedAt.toISOString()).toBe("2024-06-01T12:00:00.000Z");
  });

  it("refetches once the TTL has elapsed", async () => {
    const select = vi.spyOn(store, "select");

    await executor.execute(highQuality);
    clock.advance(300_000);
    const again = await executor.execute(highQuality);

    expect(select).toHaveBeenCalledTimes(2);
    expect(again.fromCache).toBe(false);
  });

  it("refetches after the table is invalidated", async () => {
    const select = vi.spyOn(store, "select");

    await executor.execute(highQuality);
    expect(executor.invalidate("analysis_results")).toBe(1);
    await executor.execute(highQuality);

    expect(select).toHaveBeenCalledTimes(2);
  });

  it("leaves other tables cached on invalidation", async () => {
    const count = vi.spyOn(store, "count");
    const drift: QueryKey = { table: "drift_alerts", columns: [], filters: [], ttlClass: "aggregate" };

    await executor.count(drift);
    executor.invalidate("analysis_results");
    const again = await executor.count(drift);

    expect(count).toHaveBeenCalledTimes(1);
    expect(again.fromCache).toBe(true);
  });

  it("keeps listing counts on their own TTL next to statistic counts", async () => {
    const count = vi.spyOn(store, "count");

    await executor.count({ ...highQuality, ttlClass: "aggregate" });
    store.seed("analysis_results", [{ source_transcript_id: "t4", quality_score: 88 }]);
    clock.advance(400_000);
    const listing = await executor.count(highQuality);
    const statistic = await executor.count({ ...highQuality, ttlClass: "aggregate" });

    expect(count).toHaveBeenCalledTimes(2);
    expect(listing).toMatchObject({ data: 3, fromCache: false });
    expect(statistic).toMatchObject({ data: 2, fromCache: true });
  });

  it("shares one store round trip between concurrent misses", async () => {
    const pending = deferred<Row[]>();
    const select = vi.spyOn(store, "select").mockImplementation(() => pending.promise);

    const reads = Promise.all([
      executor.execute(highQuality),
      executor.execute(highQuality),
      executor.execute(highQuality),
    ]);
    pending.resolve([{ source_transcript_id: "t1", quality_score: 92 }]);
    const results = await reads;

    expect(select).toHaveBeenCalledTimes(1);
    expect(results.map((r) => r.data)).toEqual([
      [{ source_transcript_id: "t1", quality_score: 92 }],
      [{ source_transcript_id: "t1", quality_score: 92 }],
      [{ source_transcript_id: "t1", quality_score: 92 }],
    ]);
    expect(executor.stats()).toMatchObject({ misses: 1, coalesced: 2, backendCalls: 1, entries: 1 });
  });

  it("does not cache a read that was in flight during invalidation", async () => {
    const pending = deferred<Row[]>();
    const select = vi.spyOn(store, "select").mockImplementationOnce(() => pending.promise);

    const stale = executor.execute(highQuality);
    executor.invalidate("analysis_results");
    pending.resolve([{ source_transcript_id: "old", quality_score: 99 }]);
    await stale;

    const fresh = await executor.execute(highQuality);

    expect(select).toHaveBeenCalledTimes(2);
    expect(fresh.data).toEqual([
      { source_transcript_id: "t1", quality_score: 92 },
      { source_transcript_id: "t2", quality_score: 85 },
    ]);
  });

  it("surfaces store failures as BackendUnavailable and does not cache them", async () => {
    const select = vi.spyOn(store, "select").mockRejectedValueOnce(new Error("connection reset"));

    const failure = await executor.execute(highQuality).catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(QueryError);
    expect(failure).toMatchObject({ code: "BackendUnavailable" });

    const retry = await executor.execute(highQuality);
    expect(select).toHaveBeenCalledTimes(2);
    expect(retry.fromCache).toBe(false);
  });

  it("maps an unknown column to BadFilter", async () => {
    await expect(executor.execute({ ...highQuality, columns: ["no_such_column"] }))
      .rejects.toMatchObject({ name: "QueryError", code: "BadFilter" });
  });

  it("rejects an inverted range before reaching the store", async () => {
    const select = vi.spyOn(store, "select");

    await expect(executor.execute({
      ...highQuality,
      filters: [{ kind: "range", field: "quality_score", low: 90, high: 10 }],
    })).rejects.toMatchObject({ code: "BadFilter" });
    expect(select).not.toHaveBeenCalled();
  });

  it("times out a slow store read", async () => {
    const slow = new CachedQueryExecutor(store, { clock, timeoutMs: 20 });
    vi.spyOn(store, "select").mockImplementation(() => new Promise<Row[]>(() => {}));

    await expect(slow.execute(highQuality)).rejects.toMatchObject({ code: "Timeout" });
  });

  it("falls back to a live fetch when the cache faults", async () => {
    class BrokenCache extends TtlCache {
      override get(key: string): never {
        throw new CacheError(key, "cache unreachable");
      }
    }
    const degraded = new CachedQueryExecutor(store, { clock, cache: new BrokenCache(clock) });

    const result = await degraded.execute(highQuality);

    expect(result.fromCache).toBe(false);
    expect(result.data).toHaveLength(2);
    expect(degraded.stats().cacheErrors).toBe(1);
  });

  it("discards a cached value that fails validation", async () => {
    const cache = new TtlCache(clock);
    cache.set("system_status:aggregate:total", "not a number", 600);
    const guarded = new CachedQueryExecutor(store, { clock, cache });
    const loader = vi.fn(async () => 42);

    const result = await guarded.remember("system_status:aggregate:total", "aggregate", z.number(), loader);

    expect(result).toMatchObject({ data: 42, fromCache: false });
    expect(loader).toHaveBeenCalledTimes(1);
    expect(guarded.stats().cacheErrors).toBe(1);
  });

  it("caches procedure calls under their tag", async () => {
    const callProcedure = vi.spyOn(store, "callProcedure");
    const params = { query: "back", min_quality: 0, max_results: 20 };

    const first = await executor.call("search_transcripts", params, { ttlClass: "rows", tag: "analysis_results" });
    await executor.call("search_transcripts", params, { ttlClass: "rows", tag: "analysis_results" });
    executor.invalidate("analysis_results");
    await executor.call("search_transcripts", params, { ttlClass: "rows", tag: "analysis_results" });

    expect(callProcedure).toHaveBeenCalledTimes(2);
    expect(first.data.map((row) => row.source_transcript_id)).toEqual(["t1", "t2"]);
  });

  it("stops waiting when the caller aborts but still caches the shared read", async () => {
    const pending = deferred<Row[]>();
    const select = vi.spyOn(store, "select").mockImplementationOnce(() => pending.promise);
    const controller = new AbortController();

    const abandoned = executor.execute(highQuality, { signal: controller.signal });
    controller.abort();
    await expect(abandoned).rejects.toMatchObject({ name: "AbortError" });

    pending.resolve([{ source_transcript_id: "t1", quality_score: 92 }]);
    await vi.waitFor(() => expect(executor.stats().entries).toBe(1));
    const cached = await executor.execute(highQuality);

    expect(select).toHaveBeenCalledTimes(1);
    expect(cached.fromCache).toBe(true);
  });
});

describe("withRetry", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("retries once after the store was unavailable", async () => {
    const operation = vi.fn()
      .mockRejectedValueOnce(new QueryError("BackendUnavailable"))
      .mockResolvedValueOnce("ok");

    await expect(withRetry(operation)).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("gives up after the configured attempts", async () => {
    const operation = vi.fn().mockRejectedValue(new QueryError("Timeout"));

    await expect(withRetry(operation)).rejects.toMatchObject({ code: "Timeout" });
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("does not retry a bad filter", async () => {
    const operation = vi.fn().mockRejectedValue(new QueryError("BadFilter", "unknown column"));

    await expect(withRetry(operation)).rejects.toMatchObject({ code: "BadFilter" });
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
