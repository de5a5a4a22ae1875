import { z } from "zod";
import {
  ANGLE_CONTENT_TYPES,
  ANGLE_INTENTS,
  ANGLE_STATUSES,
  TESTIMONIAL_STATUSES,
  TESTIMONIAL_TYPES,
} from "./schema";

// Filter state sent by the dashboard pages. Empty lists mean "all".

// YYYY-MM-DD, or a full timestamp with an offset
const isoDate = z.union(
  [z.string().trim().date(), z.string().trim().datetime({ offset: true })],
  { errorMap: () => ({ message: "Expected an ISO date (YYYY-MM-DD)" }) },
);

const qualityBound = z.number().int().min(0).max(100);

const pagingFields = {
  page: z.number().int().min(0).default(0),
  pageSize: z.number().int().min(1).max(200).default(50),
};

const baseCallFields = {
  minQuality: qualityBound.default(0),
  maxQuality: qualityBound.default(100),
  caseTypes: z.array(z.string()).default([]),
  languages: z.array(z.string()).default([]),
  startDate: isoDate.optional(),
  endDate: isoDate.optional(),
};

export const quoteCriteriaSchema = z.object({
  ...baseCallFields,
  tones: z.array(z.string()).default([]),
  testimonialOnly: z.boolean().default(false),
  ...pagingFields,
});

export const callSearchCriteriaSchema = z.object({
  ...baseCallFields,
  text: z.string().max(500).default(""),
  tones: z.array(z.string()).default([]),
  hasQuote: z.boolean().default(false),
  contentWorthy: z.boolean().default(false),
  ...pagingFields,
});

export const explorerCriteriaSchema = z.object({
  ...baseCallFields,
  groups: z.array(z.string()).min(1, "Select at least one column group").default(["Core"]),
  ...pagingFields,
});

export const transcriptSearchSchema = z.object({
  query: z.string().trim().min(1, "Enter a keyword to search"),
  minQuality: z.coerce.number().int().min(0).max(100).default(0),
  maxResults: z.coerce
    .number()
    .int()
    .refine((value) => value === 10 || value === 20 || value === 50, "maxResults must be 10, 20 or 50")
    .default(20),
});

export const weeklyMetricsQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(90).default(7),
});

export const topQuotesQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(90).default(7),
  limit: z.coerce.number().int().min(1).max(50).default(5),
});

export const dailyVolumeQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(90).default(7),
});

export const northStarQuerySchema = z.object({
  weeks: z.coerce.number().int().min(2).max(26).default(6),
});

export const costQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(30),
});

// Query strings carry booleans as text
export const promptQuerySchema = z.object({
  active: z.enum(["true", "false"]).default("false").transform((value) => value === "true"),
});

export const testimonialQuerySchema = z.object({
  status: z.enum(TESTIMONIAL_STATUSES).optional(),
  testimonialType: z.enum(TESTIMONIAL_TYPES).optional(),
});

export const angleCriteriaSchema = z.object({
  statuses: z.array(z.enum(ANGLE_STATUSES)).default([]),
  contentTypes: z.array(z.enum(ANGLE_CONTENT_TYPES)).default([]),
  intents: z.array(z.enum(ANGLE_INTENTS)).default([]),
  minQuality: qualityBound.default(70),
  maxQuality: qualityBound.default(100),
  startDate: isoDate.optional(),
  endDate: isoDate.optional(),
  page: z.number().int().min(0).default(0),
});

export type QuoteCriteria = z.infer<typeof quoteCriteriaSchema>;
export type CallSearchCriteria = z.infer<typeof callSearchCriteriaSchema>;
export type ExplorerCriteria = z.infer<typeof explorerCriteriaSchema>;
export type TranscriptSearchQuery = z.infer<typeof transcriptSearchSchema>;
export type TestimonialQuery = z.infer<typeof testimonialQuerySchema>;
export type AngleCriteria = z.infer<typeof angleCriteriaSchema>;
