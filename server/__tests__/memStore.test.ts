import { describe, it, expect, beforeEach } from "vitest";
import { MemStore, likePatternToRegExp } from "../store/memStore";
import { StoreError } from "../store/types";

describe("MemStore", () => {
  let store: MemStore;

  beforeEach(() => {
    store = new MemStore();
    store.seed("analysis_results", [
      { source_transcript_id: "c1", quality_score: 80, case_type: "Auto" },
      { source_transcript_id: "c2", quality_score: null, case_type: "Auto" },
      { source_transcript_id: "c3", quality_score: 95, case_type: "Slip and Fall" },
    ]);
  });

  it("sorts nulls last in both directions", async () => {
    const desc = await store.select({
      table: "analysis_results",
      columns: ["source_transcript_id"],
      predicates: [],
      order: [{ column: "quality_score", direction: "desc" }],
    });
    const asc = await store.select({
      table: "analysis_results",
      columns: ["source_transcript_id"],
      predicates: [],
      order: [{ column: "quality_score", direction: "asc" }],
    });

    expect(desc.map((r) => r.source_transcript_id)).toEqual(["c3", "c1", "c2"]);
    expect(asc.map((r) => r.source_transcript_id)).toEqual(["c1", "c3", "c2"]);
  });

  it("never matches null in a comparison", async () => {
    const count = await store.count({
      table: "analysis_results",
      predicates: [{ op: "neq", column: "quality_score", value: 80 }],
    });

    expect(count).toBe(1);
  });

  it("matches nothing for the none predicate", async () => {
    expect(await store.count({ table: "analysis_results", predicates: [{ op: "none" }] })).toBe(0);
  });

  it("applies offset and limit after ordering", async () => {
    const rows = await store.select({
      table: "analysis_results",
      columns: ["source_transcript_id"],
      predicates: [],
      order: [{ column: "source_transcript_id", direction: "asc" }],
      limit: 1,
      offset: 1,
    });

    expect(rows).toEqual([{ source_transcript_id: "c2" }]);
  });

  it("rejects unknown tables and columns", async () => {
    await expect(store.count({ table: "payroll", predicates: [] }))
      .rejects.toMatchObject({ code: "BAD_IDENTIFIER" });
    await expect(store.select({ table: "analysis_results", columns: ["password"], predicates: [] }))
      .rejects.toBeInstanceOf(StoreError);
  });

  it("refuses an update without a match", async () => {
    await expect(store.update("analysis_results", { case_type: "Auto" }, []))
      .rejects.toThrow("Refusing unfiltered update on analysis_results");
  });

  it("rejects unknown procedures", async () => {
    await expect(store.callProcedure("drop_everything", {}))
      .rejects.toMatchObject({ code: "BAD_IDENTIFIER" });
  });

  it("purges sessions expiring at or before the cutoff", async () => {
    store.seed("sessions", [
      { token: "t1", user_id: "u1", user_name: "A", created_at: "2024-05-01T00:00:00.000Z", expires_at: "2024-05-08T00:00:00.000Z" },
      { token: "t2", user_id: "u1", user_name: "A", created_at: "2024-05-05T00:00:00.000Z", expires_at: "2024-05-12T00:00:00.000Z" },
    ]);

    const result = await store.callProcedure("purge_expired_sessions", { p_now: "2024-05-08T00:00:00.000Z" });

    expect(result).toEqual([{ deleted: 1 }]);
    expect(store.rows("sessions").map((r) => r.token)).toEqual(["t2"]);
  });
});

describe("likePatternToRegExp", () => {
  it("translates wildcards", () => {
    expect(likePatternToRegExp("a%c").test("abbbc")).toBe(true);
    expect(likePatternToRegExp("a_c").test("abc")).toBe(true);
    expect(likePatternToRegExp("a_c").test("abbc")).toBe(false);
  });

  it("is case-insensitive and anchored", () => {
    expect(likePatternToRegExp("auto").test("AUTO")).toBe(true);
    expect(likePatternToRegExp("auto").test("autos")).toBe(false);
  });
});
