import { describe, it, expect, beforeEach } from "vitest";
import { TtlCache } from "../query/ttlCache";
import { ManualClock } from "../utils/clock";

describe("TtlCache", () => {
  let clock: ManualClock;
  let cache: TtlCache;

  beforeEach(() => {
    clock = new ManualClock(new Date("2024-06-01T12:00:00Z"));
    cache = new TtlCache(clock, 3);
  });

  it("returns an entry within its TTL", () => {
    cache.set("analysis_results:rows:a", [1, 2], 300);
    clock.advance(299_000);

    expect(cache.get("analysis_results:rows:a")?.value).toEqual([1, 2]);
  });

  it("expires an entry once its TTL has elapsed", () => {
    cache.set("analysis_results:rows:a", [1], 300);
    clock.advance(300_000);

    expect(cache.get("analysis_results:rows:a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("records the insertion time from the clock", () => {
    const entry = cache.set("k", "v", 60);

    expect(entry.insertedAt).toBe(new Date("2024-06-01T12:00:00Z").getTime());
  });

  it("invalidates by prefix", () => {
    cache.set("analysis_results:rows:a", 1, 300);
    cache.set("analysis_results:count-rows:b", 2, 300);
    cache.set("testimonial_pipeline:rows:c", 3, 300);

    expect(cache.invalidate("analysis_results")).toBe(2);
    expect(cache.get("testimonial_pipeline:rows:c")?.value).toBe(3);
    expect(cache.size).toBe(1);
  });

  it("leaves tables that only share a name prefix alone", () => {
    cache.set("testimonial_pipeline:rows:a", 1, 300);
    cache.set("testimonial_pipeline_archive:rows:b", 2, 300);

    expect(cache.invalidate("testimonial_pipeline")).toBe(1);
    expect(cache.get("testimonial_pipeline_archive:rows:b")?.value).toBe(2);
  });

  it("matches a prefix that already names a key segment as given", () => {
    cache.set("analysis_results:lookup:filter-options", 1, 3600);
    cache.set("analysis_results:rows:a", 2, 300);

    expect(cache.invalidate("analysis_results:lookup")).toBe(1);
    expect(cache.get("analysis_results:rows:a")?.value).toBe(2);
  });

  it("evicts the oldest insertion when full", () => {
    cache.set("a", 1, 300);
    cache.set("b", 2, 300);
    cache.set("c", 3, 300);
    cache.set("d", 4, 300);

    expect(cache.get("a")).toBeUndefined();
    expect(cache.get("d")?.value).toBe(4);
    expect(cache.size).toBe(3);
  });

  it("prefers dropping expired entries over live ones", () => {
    cache.set("short", 1, 10);
    cache.set("b", 2, 300);
    cache.set("c", 3, 300);
    clock.advance(20_000);
    cache.set("d", 4, 300);

    expect(cache.get("b")?.value).toBe(2);
    expect(cache.get("short")).toBeUndefined();
  });

  it("sweeps expired entries", () => {
    cache.set("a", 1, 10);
    cache.set("b", 2, 300);
    clock.advance(60_000);

    expect(cache.sweep()).toBe(1);
    expect(cache.size).toBe(1);
  });
});
