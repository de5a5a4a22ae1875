/**
 * Row Normalizer
 *
 * Purpose:
 * Turns loosely typed store rows into typed records at the service boundary.
 * JSON columns may arrive as already-parsed values or as JSON text, language
 * values sometimes carry stray quotes, and numeric columns come back from
 * Postgres as strings.
 *
 * Layer: Service
 */

import { z } from "zod";
import { jsonColumnNames, type TableName } from "@shared/schema";
import type { Row } from "../store/types";

/** Parses JSON text; anything else (or unparsable text) comes back as-is. */
export function parseJsonValue(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  if (!trimmed.startsWith("[") && !trimmed.startsWith("{") && !trimmed.startsWith("\"")) {
    return value;
  }
  try {
    return JSON.parse(trimmed);
  } catch {
    return value;
  }
}

function toList(value: unknown): unknown[] {
  const parsed = parseJsonValue(value);
  if (parsed === null || parsed === undefined || parsed === "") return [];
  return Array.isArray(parsed) ? parsed : [parsed];
}

// Sentinels that mean "no value" in model output
const EMPTY_SENTINELS = new Set(["", "none", "null", "n/a", "false"]);

export function cleanLanguage(value: unknown): string {
  if (typeof value !== "string") return "";
  return value.trim().replace(/^'+|'+$/g, "").trim();
}

export const jsonListSchema = z.unknown().transform(toList);

export const tagListSchema = z.unknown().transform((value) =>
  toList(value)
    .filter((item): item is string | number => typeof item === "string" || typeof item === "number")
    .map((item) => String(item).trim())
    .filter((item) => !EMPTY_SENTINELS.has(item.toLowerCase())));

export const jsonObjectSchema = z.unknown().transform((value): Record<string, unknown> => {
  const parsed = parseJsonValue(value);
  return isRecord(parsed) ? parsed : {};
});

const text = z.unknown().transform((value) =>
  typeof value === "string" ? value : value === null || value === undefined ? null : String(value));

const num = z.unknown().transform((value) => {
  if (value === null || value === undefined || value === "") return null;
  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
});

const bool = z.unknown().transform((value) => value === true || value === "true");

const timestampText = z.unknown().transform((value) =>
  value instanceof Date ? value.toISOString() : typeof value === "string" ? value : null);

const language = z.unknown().transform((value) => cleanLanguage(value) || null);

export const quoteSchema = z
  .object({
    source_transcript_id: z.string(),
    key_quote: text,
    case_type: text,
    emotional_tone: text,
    quality_score: num,
    original_language: language,
    suggested_tags: tagListSchema,
    analyzed_at: timestampText,
    testimonial_candidate: bool,
    testimonial_type: text,
    verbatim_customer_language: jsonListSchema,
  })
  .transform((row) => ({
    sourceTranscriptId: row.source_transcript_id,
    keyQuote: row.key_quote,
    caseType: row.case_type,
    emotionalTone: row.emotional_tone,
    qualityScore: row.quality_score,
    language: row.original_language,
    tags: row.suggested_tags,
    analyzedAt: row.analyzed_at,
    testimonialCandidate: row.testimonial_candidate,
    testimonialType: row.testimonial_type,
    verbatimCustomerLanguage: row.verbatim_customer_language,
  }));

export const callSummarySchema = z
  .object({
    source_transcript_id: z.string(),
    case_type: text,
    quality_score: num,
    emotional_tone: text,
    outcome: text,
    analyzed_at: timestampText,
    original_language: language,
    key_quote: text,
    summary: text,
    primary_topic: text,
    suggested_tags: tagListSchema,
    content_generation_flag: bool,
    testimonial_candidate: bool,
    testimonial_type: text,
    confidence_score: num,
    estimated_case_value_category: text,
  })
  .transform((row) => ({
    sourceTranscriptId: row.source_transcript_id,
    caseType: row.case_type,
    qualityScore: row.quality_score,
    emotionalTone: row.emotional_tone,
    outcome: row.outcome,
    analyzedAt: row.analyzed_at,
    language: row.original_language,
    keyQuote: row.key_quote,
    summary: row.summary,
    primaryTopic: row.primary_topic,
    tags: row.suggested_tags,
    contentWorthy: row.content_generation_flag,
    testimonialCandidate: row.testimonial_candidate,
    testimonialType: row.testimonial_type,
    confidenceScore: row.confidence_score,
    caseValueCategory: row.estimated_case_value_category,
  }));

export const testimonialSchema = z
  .object({
    source_transcript_id: z.string(),
    testimonial_type: text,
    quality_score: num,
    key_quote: text,
    case_type: text,
    status: z.string(),
    status_updated_at: timestampText,
    status_updated_by: text,
    notes: text,
    created_at: timestampText,
  })
  .transform((row) => ({
    sourceTranscriptId: row.source_transcript_id,
    testimonialType: row.testimonial_type,
    qualityScore: row.quality_score,
    keyQuote: row.key_quote,
    caseType: row.case_type,
    status: row.status,
    statusUpdatedAt: row.status_updated_at,
    statusUpdatedBy: row.status_updated_by,
    notes: row.notes,
    createdAt: row.created_at,
  }));

export const angleSchema = z
  .object({
    id: z.string(),
    source_transcript_id: text,
    content_type: z.string(),
    injury_type: text,
    quality_score: num,
    status: z.string(),
    content_text: jsonObjectSchema,
    generation_model: text,
    created_at: timestampText,
  })
  .transform((row) => ({
    id: row.id,
    sourceTranscriptId: row.source_transcript_id,
    contentType: row.content_type,
    injuryType: row.injury_type,
    qualityScore: row.quality_score,
    status: row.status,
    content: row.content_text,
    contentIntent: typeof row.content_text.content_intent === "string" ? row.content_text.content_intent : null,
    generationModel: row.generation_model,
    createdAt: row.created_at,
  }));

export const transcriptHitSchema = z
  .object({
    source_transcript_id: z.string(),
    quality_score: num,
    case_type: text,
    call_start_date: timestampText,
    headline: text,
    snippet: text,
  })
  .transform((row) => ({
    sourceTranscriptId: row.source_transcript_id,
    qualityScore: row.quality_score,
    caseType: row.case_type,
    callStartDate: row.call_start_date,
    headline: row.headline,
    snippet: row.snippet,
  }));

export const costDaySchema = z
  .object({
    date: z.unknown().transform((value) =>
      value instanceof Date ? value.toISOString().slice(0, 10) : String(value).slice(0, 10)),
    total_cost: num,
    calls_processed: num,
  })
  .transform((row) => ({
    date: row.date,
    totalCost: row.total_cost ?? 0,
    callsProcessed: row.calls_processed ?? 0,
  }));

export const promptSchema = z
  .object({
    id: z.string(),
    prompt_name: z.string(),
    prompt_version: z.string(),
    description: text,
    is_active: bool,
    created_at: timestampText,
  })
  .transform((row) => ({
    id: row.id,
    name: row.prompt_name,
    version: row.prompt_version,
    description: row.description,
    isActive: row.is_active,
    createdAt: row.created_at,
  }));

export type Quote = z.infer<typeof quoteSchema>;
export type CallSummary = z.infer<typeof callSummarySchema>;
export type TestimonialEntry = z.infer<typeof testimonialSchema>;
export type Angle = z.infer<typeof angleSchema>;
export type TranscriptHit = z.infer<typeof transcriptHitSchema>;
export type CostDay = z.infer<typeof costDaySchema>;
export type Prompt = z.infer<typeof promptSchema>;

/**
 * Column-driven normalization for views that pick their own columns (the
 * explorer and call detail): JSON columns are parsed, language cleaned,
 * timestamps rendered as ISO text. Keys stay as column names.
 */
export function normalizeRow(table: TableName, row: Row): Row {
  const jsonColumns = new Set(jsonColumnNames(table));
  const normalized: Row = {};
  for (const [column, value] of Object.entries(row)) {
    if (jsonColumns.has(column)) {
      normalized[column] = value === null || value === undefined ? null : parseJsonValue(value);
    } else if (column === "original_language") {
      normalized[column] = cleanLanguage(value) || null;
    } else if (value instanceof Date) {
      normalized[column] = value.toISOString();
    } else {
      normalized[column] = value;
    }
  }
  return normalized;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
