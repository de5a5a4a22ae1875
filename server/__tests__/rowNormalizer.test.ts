import { describe, it, expect } from "vitest";
import {
  angleSchema,
  cleanLanguage,
  jsonListSchema,
  normalizeRow,
  parseJsonValue,
  quoteSchema,
  tagListSchema,
} from "../services/rowNormalizer";

describe("parseJsonValue", () => {
  it("parses JSON text", () => {
    expect(parseJsonValue('["a","b"]')).toEqual(["a", "b"]);
    expect(parseJsonValue(' {"k": 1} ')).toEqual({ k: 1 });
  });

  it("leaves plain text and broken JSON alone", () => {
    expect(parseJsonValue("hello")).toBe("hello");
    expect(parseJsonValue("[not json")).toBe("[not json");
    expect(parseJsonValue(42)).toBe(42);
  });
});

describe("cleanLanguage", () => {
  it("strips stray quotes", () => {
    expect(cleanLanguage("'Spanish'")).toBe("Spanish");
    expect(cleanLanguage(" English ")).toBe("English");
    expect(cleanLanguage(null)).toBe("");
  });
});

describe("list schemas", () => {
  it("wraps a scalar and empties null", () => {
    expect(jsonListSchema.parse("single")).toEqual(["single"]);
    expect(jsonListSchema.parse(null)).toEqual([]);
  });

  it("drops sentinel tags", () => {
    expect(tagListSchema.parse('["rental", "None", "", "n/a", " whiplash "]')).toEqual(["rental", "whiplash"]);
  });
});

describe("quoteSchema", () => {
  it("maps a row to a quote", () => {
    const quote = quoteSchema.parse({
      source_transcript_id: "call-1",
      key_quote: "They called me back within the hour",
      case_type: "Auto",
      emotional_tone: "Grateful",
      quality_score: "88",
      original_language: "'Spanish'",
      suggested_tags: '["callback"]',
      analyzed_at: new Date("2024-06-10T15:00:00Z"),
      testimonial_candidate: true,
      testimonial_type: null,
      verbatim_customer_language: null,
    });

    expect(quote).toEqual({
      sourceTranscriptId: "call-1",
      keyQuote: "They called me back within the hour",
      caseType: "Auto",
      emotionalTone: "Grateful",
      qualityScore: 88,
      language: "Spanish",
      tags: ["callback"],
      analyzedAt: "2024-06-10T15:00:00.000Z",
      testimonialCandidate: true,
      testimonialType: null,
      verbatimCustomerLanguage: [],
    });
  });
});

describe("angleSchema", () => {
  it("reads the content intent from a JSON brief", () => {
    const angle = angleSchema.parse({
      id: "a1",
      source_transcript_id: "call-1",
      content_type: "social_hook",
      injury_type: null,
      quality_score: 81,
      status: "pending_review",
      content_text: '{"content_intent":"Educate","hook":"What happens after a crash"}',
      generation_model: null,
      created_at: "2024-06-10T00:00:00.000Z",
    });

    expect(angle.contentIntent).toBe("Educate");
    expect(angle.content).toEqual({ content_intent: "Educate", hook: "What happens after a crash" });
  });

  it("has no intent when the brief is not an object", () => {
    const angle = angleSchema.parse({
      id: "a2",
      source_transcript_id: null,
      content_type: "social_hook",
      injury_type: null,
      quality_score: null,
      status: "approved",
      content_text: "[1, 2]",
      generation_model: null,
      created_at: null,
    });

    expect(angle.content).toEqual({});
    expect(angle.contentIntent).toBeNull();
  });
});

describe("normalizeRow", () => {
  it("parses JSON columns and keeps column names", () => {
    expect(normalizeRow("analysis_results", {
      source_transcript_id: "call-1",
      objection_categories: '["price","trust"]',
      original_language: "'English'",
      summary: "[not a json column]",
      analyzed_at: new Date("2024-01-02T03:04:05Z"),
    })).toEqual({
      source_transcript_id: "call-1",
      objection_categories: ["price", "trust"],
      original_language: "English",
      summary: "[not a json column]",
      analyzed_at: "2024-01-02T03:04:05.000Z",
    });
  });
});
