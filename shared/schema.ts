import { sql } from "drizzle-orm";
import { getTableColumns } from "drizzle-orm";
import {
  pgTable,
  text,
  varchar,
  timestamp,
  jsonb,
  integer,
  date,
  real,
  numeric,
  boolean,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const TESTIMONIAL_STATUSES = [
  "flagged",
  "contacted",
  "scheduled",
  "recorded",
  "published",
  "declined",
] as const;
export type TestimonialStatus = typeof TESTIMONIAL_STATUSES[number];

export const TESTIMONIAL_TYPES = [
  "not_suitable",
  "high_value_long_form",
  "quantity_short_form",
  "video_candidate",
] as const;

export const ANGLE_STATUSES = ["pending_review", "approved"] as const;
export const ANGLE_CONTENT_TYPES = [
  "educational_explainer",
  "social_hook",
  "case_study_brief",
  "testimonial_angle",
] as const;
export const ANGLE_INTENTS = ["Educate", "Empathize", "Empower", "Activate"] as const;
export const FEEDBACK_RATINGS = ["up", "down"] as const;

// Accounts. Passwords are hashed inside the database (pgcrypto), never in app code.
export const users = pgTable("users", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  email: varchar("email").notNull().unique(),
  passwordHash: text("password_hash").notNull(),
  displayName: text("display_name").notNull(),
  isAdmin: boolean("is_admin").default(false).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

export const sessions = pgTable(
  "sessions",
  {
    token: varchar("token", { length: 64 }).primaryKey(),
    userId: varchar("user_id").notNull(),
    userName: text("user_name").notNull(), // display-name snapshot, refreshed only on re-login
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
  },
  (table) => [index("IDX_sessions_expires_at").on(table.expiresAt)],
);

export const analysisResults = pgTable(
  "analysis_results",
  {
    sourceTranscriptId: varchar("source_transcript_id").primaryKey(),
    caseType: text("case_type"),
    qualityScore: integer("quality_score"),
    emotionalTone: text("emotional_tone"),
    outcome: text("outcome"),
    analyzedAt: timestamp("analyzed_at", { withTimezone: true }),
    originalLanguage: text("original_language"),
    keyQuote: text("key_quote"),
    summary: text("summary"),
    primaryTopic: text("primary_topic"),
    suggestedTags: jsonb("suggested_tags"),
    contentGenerationFlag: boolean("content_generation_flag"),
    testimonialCandidate: boolean("testimonial_candidate"),
    testimonialType: text("testimonial_type"),
    confidenceScore: real("confidence_score"),
    estimatedCaseValueCategory: text("estimated_case_value_category"),
    transcriptOriginal: text("transcript_original"),

    // Quality + agent scoring
    qualitySubScores: jsonb("quality_sub_scores"),
    agentEmpathyScore: integer("agent_empathy_score"),
    agentEducationQuality: integer("agent_education_quality"),
    agentObjectionHandling: integer("agent_objection_handling"),
    agentClosingEffectiveness: integer("agent_closing_effectiveness"),

    // Case assessment
    liabilityClarity: text("liability_clarity"),
    injurySeverity: text("injury_severity"),
    documentationQuality: text("documentation_quality"),
    estimatedCaseValueLow: numeric("estimated_case_value_low"),
    estimatedCaseValueHigh: numeric("estimated_case_value_high"),

    // Objections
    objectionCategories: jsonb("objection_categories"),
    midCallDropoutMoment: text("mid_call_dropout_moment"),
    conversionDriver: text("conversion_driver"),
    dropOffReason: text("drop_off_reason"),
    agentInterventionThatWorked: text("agent_intervention_that_worked"),
    momentThatClosed: text("moment_that_closed"),

    // Language & culture
    readingLevelEstimate: text("reading_level_estimate"),
    communicationStyle: text("communication_style"),
    spanglishDetected: boolean("spanglish_detected"),
    colloquialisms: jsonb("colloquialisms"),
    culturalMarkers: jsonb("cultural_markers"),
    familyReferences: jsonb("family_references"),
    verbatimCustomerLanguage: jsonb("verbatim_customer_language"),

    // CX intelligence
    questionsRepeatedByAttorney: jsonb("questions_repeated_by_attorney"),
    attorneyUsedPriorInfo: boolean("attorney_used_prior_info"),
    handoffWaitTimeMentioned: boolean("handoff_wait_time_mentioned"),
    attorneySentiment: text("attorney_sentiment"),
    attorneyRejectionReason: text("attorney_rejection_reason"),
    reviewRequestEligible: boolean("review_request_eligible"),

    // Content mining
    commonQuestionsAsked: jsonb("common_questions_asked"),
    misunderstandings: jsonb("misunderstandings"),
    educationCalmingMoment: text("education_calming_moment"),
    processConfusionPoints: jsonb("process_confusion_points"),
    otherBrandsMentioned: jsonb("other_brands_mentioned"),
    competitiveComparison: text("competitive_comparison"),
    categoryConfusion: text("category_confusion"),
    adOrCreativeReferenced: text("ad_or_creative_referenced"),
    adPromiseVsRealityMismatch: text("ad_promise_vs_reality_mismatch"),
    repeatedQuestionsFromCaller: jsonb("repeated_questions_from_caller"),

    // Emotional arc
    openingEmotionalState: text("opening_emotional_state"),
    midCallEmotionalShift: text("mid_call_emotional_shift"),
    endStateEmotion: text("end_state_emotion"),

    // Pipeline metadata
    promptVersionUsed: text("prompt_version_used"),
    validationPassed: boolean("validation_passed"),
    apiCost: numeric("api_cost"),
    inputTokens: integer("input_tokens"),
    outputTokens: integer("output_tokens"),
    hasAttorneyLeg: boolean("has_attorney_leg"),
    analysisType: text("analysis_type"),
  },
  (table) => [
    index("IDX_analysis_results_analyzed_at").on(table.analyzedAt),
    index("IDX_analysis_results_quality").on(table.qualityScore),
  ],
);

export const testimonialPipeline = pgTable("testimonial_pipeline", {
  sourceTranscriptId: varchar("source_transcript_id").primaryKey(),
  testimonialType: text("testimonial_type"),
  qualityScore: integer("quality_score"),
  keyQuote: text("key_quote"),
  caseType: text("case_type"),
  status: text("status").default("flagged").notNull(),
  statusUpdatedAt: timestamp("status_updated_at", { withTimezone: true }),
  statusUpdatedBy: text("status_updated_by"),
  notes: text("notes"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

// Creative angle briefs generated from high-quality calls
export const contentGenerationQueue = pgTable("content_generation_queue", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  sourceTranscriptId: varchar("source_transcript_id"),
  contentType: text("content_type").notNull(),
  injuryType: text("injury_type"),
  qualityScore: integer("quality_score"),
  status: text("status").default("pending_review").notNull(),
  contentText: jsonb("content_text"),
  generationModel: text("generation_model"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

export const angleFeedback = pgTable(
  "angle_feedback",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    angleId: varchar("angle_id").notNull(),
    userEmail: varchar("user_email").notNull(),
    rating: text("rating").notNull(),
    comment: text("comment"),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [uniqueIndex("UQ_angle_feedback_angle_user").on(table.angleId, table.userEmail)],
);

export const systemStatus = pgTable("system_status", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  systemActive: boolean("system_active").default(false).notNull(),
  lastRunAt: timestamp("last_run_at", { withTimezone: true }),
  dailyBudgetLimit: numeric("daily_budget_limit"),
  currentDailySpend: numeric("current_daily_spend"),
  notes: text("notes"),
});

// One row per day of model spend
export const costTracking = pgTable("cost_tracking", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  date: date("date").notNull().unique(),
  totalCost: numeric("total_cost").default("0").notNull(),
  callsProcessed: integer("calls_processed").default(0).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

export const promptLibrary = pgTable("prompt_library", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  promptName: text("prompt_name").notNull(),
  promptVersion: text("prompt_version").notNull(),
  description: text("description"),
  promptText: text("prompt_text"),
  isActive: boolean("is_active").default(false).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

export const driftAlerts = pgTable("drift_alerts", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  metric: text("metric").notNull(),
  message: text("message").notNull(),
  severity: text("severity").default("warning").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

/**
 * Tables the query layer may name. Dynamic SQL only ever takes identifiers
 * from this registry.
 */
export const TABLES = {
  users,
  sessions,
  analysis_results: analysisResults,
  testimonial_pipeline: testimonialPipeline,
  content_generation_queue: contentGenerationQueue,
  angle_feedback: angleFeedback,
  system_status: systemStatus,
  drift_alerts: driftAlerts,
  cost_tracking: costTracking,
  prompt_library: promptLibrary,
} as const;

export type TableName = keyof typeof TABLES;

export function isTableName(name: string): name is TableName {
  return Object.hasOwn(TABLES, name);
}

export function columnNames(table: TableName): string[] {
  return Object.values(getTableColumns(TABLES[table])).map((column) => column.name);
}

export function jsonColumnNames(table: TableName): string[] {
  return Object.values(getTableColumns(TABLES[table]))
    .filter((column) => column.dataType === "json")
    .map((column) => column.name);
}

// Stored procedures, see server/migrations/0001_auth_and_search.sql
export const PROCEDURES = [
  "authenticate_user",
  "register_user",
  "create_session",
  "validate_session",
  "delete_session",
  "purge_expired_sessions",
  "search_transcripts",
] as const;
export type ProcedureName = typeof PROCEDURES[number];

export function isProcedureName(name: string): name is ProcedureName {
  return PROCEDURES.some((procedure) => procedure === name);
}

export const registerSchema = z.object({
  email: z.string().trim().toLowerCase().email("Enter a valid email address"),
  password: z.string().min(6, "Password must be at least 6 characters"),
  displayName: z.string().trim().min(1, "Display name is required"),
});

export const loginSchema = z.object({
  email: z.string().trim().min(1, "Enter both email and password."),
  password: z.string().min(1, "Enter both email and password."),
});

export const insertAngleFeedbackSchema = createInsertSchema(angleFeedback)
  .omit({
    id: true,
    angleId: true,
    userEmail: true,
    createdAt: true,
  })
  .extend({
    rating: z.enum(FEEDBACK_RATINGS),
    comment: z.string().trim().max(2000).nullish(),
  });

export const updateTestimonialStatusSchema = z.object({
  status: z.enum(TESTIMONIAL_STATUSES),
  notes: z.string().trim().max(2000).optional(),
});

export type RegisterInput = z.infer<typeof registerSchema>;
export type LoginInput = z.infer<typeof loginSchema>;
export type InsertAngleFeedback = z.infer<typeof insertAngleFeedbackSchema>;
export type UpdateTestimonialStatus = z.infer<typeof updateTestimonialStatusSchema>;

export type User = typeof users.$inferSelect;
export type Session = typeof sessions.$inferSelect;
export type AnalysisResult = typeof analysisResults.$inferSelect;
export type TestimonialPipelineEntry = typeof testimonialPipeline.$inferSelect;
export type ContentGenerationQueueEntry = typeof contentGenerationQueue.$inferSelect;
export type AngleFeedback = typeof angleFeedback.$inferSelect;
