import { describe, it, expect, vi, beforeEach } from "vitest";
import { angleCriteriaSchema } from "@shared/criteria";
import { CachedQueryExecutor } from "../query/cachedQueryExecutor";
import { AngleBank, angleFilters } from "../services/angleBank";
import { MemStore } from "../store/memStore";
import { ManualClock } from "../utils/clock";
import { NotFoundError } from "../utils/errorHandler";

const ALICE = "alice@walkeradvertising.com";
const BOB = "bob@walkeradvertising.com";

describe("angleFilters", () => {
  it("defaults to every status and covers the whole end day", () => {
    expect(angleFilters(angleCriteriaSchema.parse({ endDate: "2024-06-30" }))).toEqual([
      { kind: "in", field: "status", values: ["pending_review", "approved"] },
      { kind: "range", field: "quality_score", low: 70, high: 100 },
      { kind: "range", field: "created_at", high: "2024-06-30T23:59:59.999Z" },
    ]);
  });
});

describe("AngleBank", () => {
  let store: MemStore;
  let bank: AngleBank;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    store = new MemStore();
    store.seed("content_generation_queue", [
      {
        id: "a1",
        source_transcript_id: "c1",
        content_type: "social_hook",
        quality_score: 85,
        status: "pending_review",
        content_text: { content_intent: "Educate", hook: "What to do in the first hour after a crash" },
        created_at: "2024-06-10T00:00:00.000Z",
      },
      {
        id: "a2",
        source_transcript_id: "c2",
        content_type: "case_study_brief",
        quality_score: 90,
        status: "approved",
        content_text: '{"content_intent":"Empathize"}',
        created_at: "2024-06-11T00:00:00.000Z",
      },
      {
        id: "a3",
        source_transcript_id: "c3",
        content_type: "social_hook",
        quality_score: 50,
        status: "pending_review",
        content_text: {},
        created_at: "2024-06-12T00:00:00.000Z",
      },
    ]);
    bank = new AngleBank(new CachedQueryExecutor(store, { clock: new ManualClock(0) }), store);
  });

  it("lists angles above the default quality floor, newest first", async () => {
    const listing = await bank.list(angleCriteriaSchema.parse({}), ALICE);

    expect(listing.items.map((a) => a.id)).toEqual(["a2", "a1"]);
    expect(listing.items[0].contentIntent).toBe("Empathize");
    expect(listing.summary).toEqual({
      total: 2,
      pendingReview: 1,
      approved: 1,
      byContentType: { case_study_brief: 1, social_hook: 1 },
    });
    expect(listing.page).toMatchObject({ pageIndex: 0, totalPages: 1, limit: 20 });
  });

  it("filters on the intent inside the brief", async () => {
    const listing = await bank.list(angleCriteriaSchema.parse({ intents: ["Educate"] }), ALICE);

    expect(listing.items.map((a) => a.id)).toEqual(["a1"]);
    expect(listing.summary.total).toBe(1);
  });

  it("tallies feedback and the viewer's own rating", async () => {
    await bank.list(angleCriteriaSchema.parse({}), ALICE);

    await bank.recordFeedback("a1", ALICE, { rating: "up" });
    await bank.recordFeedback("a1", BOB, { rating: "down", comment: "Too long" });
    const listing = await bank.list(angleCriteriaSchema.parse({}), ALICE);

    expect(listing.items.find((a) => a.id === "a1")?.feedback).toEqual({ up: 1, down: 1, mine: "up" });
    expect(listing.items.find((a) => a.id === "a2")?.feedback).toEqual({ up: 0, down: 0, mine: null });
  });

  it("replaces a user's earlier rating", async () => {
    await bank.recordFeedback("a1", ALICE, { rating: "up" });
    await bank.recordFeedback("a1", ALICE, { rating: "down" });

    const listing = await bank.list(angleCriteriaSchema.parse({}), ALICE);

    expect(store.rows("angle_feedback")).toHaveLength(1);
    expect(listing.items.find((a) => a.id === "a1")?.feedback).toEqual({ up: 0, down: 1, mine: "down" });
  });

  it("reports an unknown angle", async () => {
    await expect(bank.recordFeedback("a9", ALICE, { rating: "up" })).rejects.toThrow(new NotFoundError("Angle a9"));
    expect(store.rows("angle_feedback")).toHaveLength(0);
  });
});
