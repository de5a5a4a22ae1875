/**
 * Call Queries
 *
 * Purpose:
 * Read side of the dashboard: dropdown dictionaries, the quote bank, call
 * search, the data explorer, call detail, transcript search, weekly metric
 * cards, top quotes, the daily volume trend, the north-star angle count and
 * the pipeline billboard. Every read goes through the cached
 * query executor with the TTL class that fits it.
 *
 * Layer: Service
 */

import { z } from "zod";
import type {
  CallSearchCriteria,
  ExplorerCriteria,
  QuoteCriteria,
  TranscriptSearchQuery,
} from "@shared/criteria";
import columnGroups from "../config/columnGroups.json";
import { METRIC_CONSTANTS } from "../config/constants";
import type { CachedQueryExecutor, ReadOptions } from "../query/cachedQueryExecutor";
import { dateRangeFilter, type FilterSpec } from "../query/filterCompiler";
import { countFor, paginate, type PageState } from "../query/pagination";
import type { QueryKey } from "../query/queryKey";
import type { RelationalStore, Row } from "../store/types";
import type { Clock } from "../utils/clock";
import { NotFoundError, ValidationError } from "../utils/errorHandler";
import {
  callSummarySchema,
  cleanLanguage,
  normalizeRow,
  quoteSchema,
  transcriptHitSchema,
  type CallSummary,
  type Quote,
  type TranscriptHit,
} from "./rowNormalizer";

const TABLE = "analysis_results";
const ANGLE_TABLE = "content_generation_queue";

export const QUOTE_COLUMNS = [
  "source_transcript_id", "key_quote", "case_type", "emotional_tone",
  "quality_score", "original_language", "suggested_tags", "analyzed_at",
  "testimonial_candidate", "testimonial_type", "verbatim_customer_language",
] as const;

export const SEARCH_COLUMNS = [
  "source_transcript_id", "case_type", "quality_score", "emotional_tone",
  "outcome", "analyzed_at", "original_language", "key_quote", "summary",
  "primary_topic", "suggested_tags", "content_generation_flag",
  "testimonial_candidate", "testimonial_type", "confidence_score",
  "estimated_case_value_category",
] as const;

const TEXT_SEARCH_COLUMNS = ["summary", "key_quote", "primary_topic"];

const COLUMN_GROUPS: Readonly<Record<string, readonly string[]>> = columnGroups;

export interface Listing<T> {
  items: T[];
  page: PageState;
  fromCache: boolean;
}

export interface FilterOptions {
  caseTypes: string[];
  emotionalTones: string[];
  outcomes: string[];
  languages: string[];
}

export interface PeriodMetrics {
  quotes: number;
  testimonials: number;
  contentWorthy: number;
  medianQuality: number;
}

export interface WeeklyMetrics {
  windowDays: number;
  current: PeriodMetrics;
  prior: PeriodMetrics;
}

export interface PipelineStats {
  total: number;
  /** Date (YYYY-MM-DD) of the earliest analyzed call. */
  since: string | null;
  lastUpdated: string | null;
  active: boolean;
}

export interface DailyVolume {
  /** YYYY-MM-DD (UTC) */
  date: string;
  count: number;
  /** Mean quality of the day's scored calls, one decimal. */
  avgQuality: number | null;
}

/** Angle briefs generated this week against last week. */
export interface NorthStar {
  thisWeek: number;
  lastWeek: number;
  delta: number;
}

export interface NorthStarWeek {
  weekStart: string;
  count: number;
}

const filterOptionsSchema = z.object({
  caseTypes: z.array(z.string()),
  emotionalTones: z.array(z.string()),
  outcomes: z.array(z.string()),
  languages: z.array(z.string()),
});

interface BaseCriteria {
  minQuality: number;
  maxQuality: number;
  caseTypes: readonly string[];
  languages: readonly string[];
  startDate?: string;
  endDate?: string;
}

function baseFilters(criteria: BaseCriteria): FilterSpec[] {
  const filters: FilterSpec[] = [
    { kind: "range", field: "quality_score", low: criteria.minQuality, high: criteria.maxQuality },
    ...dateRangeFilter("analyzed_at", criteria.startDate, criteria.endDate),
  ];
  // An empty selection in a multiselect means "all"
  if (criteria.caseTypes.length > 0) {
    filters.push({ kind: "in", field: "case_type", values: criteria.caseTypes });
  }
  if (criteria.languages.length > 0) {
    // Dropdown values are cleaned; some stored values still carry quotes
    const values = criteria.languages.flatMap((language) => [language, `'${language}'`]);
    filters.push({ kind: "in", field: "original_language", values });
  }
  return filters;
}

const HAS_QUOTE: FilterSpec = { kind: "null", field: "key_quote", present: true, blankIsNull: true };

export function quoteFilters(criteria: QuoteCriteria): FilterSpec[] {
  const filters = [...baseFilters(criteria), HAS_QUOTE];
  if (criteria.tones.length > 0) {
    filters.push({ kind: "in", field: "emotional_tone", values: criteria.tones });
  }
  if (criteria.testimonialOnly) {
    filters.push({ kind: "eq", field: "testimonial_candidate", value: true });
  }
  return filters;
}

export function callSearchFilters(criteria: CallSearchCriteria): FilterSpec[] {
  const filters = baseFilters(criteria);
  if (criteria.text.trim()) {
    filters.push({ kind: "text", field: TEXT_SEARCH_COLUMNS, substring: criteria.text });
  }
  if (criteria.tones.length > 0) {
    filters.push({ kind: "in", field: "emotional_tone", values: criteria.tones });
  }
  if (criteria.hasQuote) filters.push(HAS_QUOTE);
  if (criteria.contentWorthy) {
    filters.push({ kind: "eq", field: "content_generation_flag", value: true });
  }
  return filters;
}

/** Columns for the chosen explorer groups, id first, without duplicates. */
export function explorerColumns(groups: readonly string[]): string[] {
  const columns = new Set<string>(["source_transcript_id"]);
  for (const group of groups) {
    const groupColumns = Object.hasOwn(COLUMN_GROUPS, group) ? COLUMN_GROUPS[group] : undefined;
    if (!groupColumns) {
      throw new ValidationError(`Unknown column group "${group}"`);
    }
    groupColumns.forEach((column) => columns.add(column));
  }
  return [...columns];
}

/** Upper median, as the metric cards have always shown it. */
export function medianOf(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)];
}

export class CallQueries {
  constructor(
    private executor: CachedQueryExecutor,
    private store: RelationalStore,
    private clock: Clock,
  ) {}

  getColumnGroups(): Record<string, readonly string[]> {
    return { ...COLUMN_GROUPS };
  }

  async getFilterOptions(options: ReadOptions = {}): Promise<FilterOptions> {
    const result = await this.executor.remember(
      `${TABLE}:lookup:filter-options`,
      "lookup",
      filterOptionsSchema,
      async () => ({
        caseTypes: await this.distinct("case_type"),
        emotionalTones: await this.distinct("emotional_tone"),
        outcomes: await this.distinct("outcome"),
        languages: dedupe((await this.distinct("original_language")).map(cleanLanguage)),
      }),
      options,
    );
    return result.data;
  }

  async listQuotes(criteria: QuoteCriteria, options: ReadOptions = {}): Promise<Listing<Quote>> {
    const key: QueryKey = {
      table: TABLE,
      columns: QUOTE_COLUMNS,
      filters: quoteFilters(criteria),
      order: [
        { column: "quality_score", direction: "desc" },
        { column: "analyzed_at", direction: "desc" },
      ],
      ttlClass: "rows",
    };
    const page = await paginate(this.executor, key, criteria.page, criteria.pageSize, options);
    return { items: page.rows.map((row) => quoteSchema.parse(row)), page: page.page, fromCache: page.fromCache };
  }

  async searchCalls(criteria: CallSearchCriteria, options: ReadOptions = {}): Promise<Listing<CallSummary>> {
    const key: QueryKey = {
      table: TABLE,
      columns: SEARCH_COLUMNS,
      filters: callSearchFilters(criteria),
      order: [{ column: "analyzed_at", direction: "desc" }],
      ttlClass: "rows",
    };
    const page = await paginate(this.executor, key, criteria.page, criteria.pageSize, options);
    return { items: page.rows.map((row) => callSummarySchema.parse(row)), page: page.page, fromCache: page.fromCache };
  }

  async explore(criteria: ExplorerCriteria, options: ReadOptions = {}): Promise<Listing<Row> & { columns: string[] }> {
    const columns = explorerColumns(criteria.groups);
    const key: QueryKey = {
      table: TABLE,
      columns,
      filters: baseFilters(criteria),
      order: [{ column: "analyzed_at", direction: "desc" }],
      ttlClass: "rows",
    };
    const page = await paginate(this.executor, key, criteria.page, criteria.pageSize, options);
    return {
      columns,
      items: page.rows.map((row) => normalizeRow(TABLE, row)),
      page: page.page,
      fromCache: page.fromCache,
    };
  }

  /** Full analysis for one call. The transcript itself is fetched separately. */
  async getCallDetail(sourceTranscriptId: string, options: ReadOptions = {}): Promise<Row> {
    const detailColumns = Object.values(COLUMN_GROUPS).flat();
    const result = await this.executor.execute({
      table: TABLE,
      columns: dedupe([...SEARCH_COLUMNS, ...detailColumns]),
      filters: [{ kind: "eq", field: "source_transcript_id", value: sourceTranscriptId }],
      limit: 1,
      ttlClass: "rows",
    }, options);
    const row = result.data[0];
    if (!row) {
      throw new NotFoundError(`Call ${sourceTranscriptId}`);
    }
    return normalizeRow(TABLE, row);
  }

  async getTranscript(sourceTranscriptId: string, options: ReadOptions = {}): Promise<string | null> {
    const result = await this.executor.execute({
      table: TABLE,
      columns: ["transcript_original"],
      filters: [{ kind: "eq", field: "source_transcript_id", value: sourceTranscriptId }],
      limit: 1,
      ttlClass: "rows",
    }, options);
    const row = result.data[0];
    if (!row) {
      throw new NotFoundError(`Call ${sourceTranscriptId}`);
    }
    const transcript = row.transcript_original;
    return typeof transcript === "string" && transcript.length > 0 ? transcript : null;
  }

  async searchTranscripts(query: TranscriptSearchQuery, options: ReadOptions = {}): Promise<TranscriptHit[]> {
    const result = await this.executor.call(
      "search_transcripts",
      { query: query.query.trim(), min_quality: query.minQuality, max_results: query.maxResults },
      { ttlClass: "rows", tag: TABLE, signal: options.signal },
    );
    return result.data.map((row) => transcriptHitSchema.parse(row));
  }

  /**
   * Metric card counts for the last `days` days and the window before it.
   */
  async getWeeklyMetrics(days: number = METRIC_CONSTANTS.DEFAULT_WINDOW_DAYS, options: ReadOptions = {}): Promise<WeeklyMetrics> {
    const { DAY_MS } = METRIC_CONSTANTS;
    const end = this.windowEnd();
    const currentStart = new Date(end - days * DAY_MS);
    const priorStart = new Date(end - 2 * days * DAY_MS);

    const current = await this.periodMetrics(dateRangeFilter("analyzed_at", currentStart.toISOString()), options);
    const prior = await this.periodMetrics(
      dateRangeFilter("analyzed_at", priorStart.toISOString(), new Date(currentStart.getTime() - 1).toISOString()),
      options,
    );
    return { windowDays: days, current, prior };
  }

  /** Best quotes of the last `days` days. */
  async getTopQuotes(
    days: number = METRIC_CONSTANTS.DEFAULT_WINDOW_DAYS,
    limit: number = METRIC_CONSTANTS.TOP_QUOTES_LIMIT,
    options: ReadOptions = {},
  ): Promise<Quote[]> {
    const start = new Date(this.windowEnd() - days * METRIC_CONSTANTS.DAY_MS);
    const result = await this.executor.execute({
      table: TABLE,
      columns: QUOTE_COLUMNS,
      filters: [...dateRangeFilter("analyzed_at", start.toISOString()), HAS_QUOTE],
      order: [
        { column: "quality_score", direction: "desc" },
        { column: "analyzed_at", direction: "desc" },
      ],
      limit,
      ttlClass: "rows",
    }, options);
    return result.data.map((row) => quoteSchema.parse(row));
  }

  /** Calls per UTC day over the last `days` days, oldest first. */
  async getDailyVolume(days: number = METRIC_CONSTANTS.DEFAULT_WINDOW_DAYS, options: ReadOptions = {}): Promise<DailyVolume[]> {
    const start = new Date(this.windowEnd() - days * METRIC_CONSTANTS.DAY_MS);
    const result = await this.executor.execute({
      table: TABLE,
      columns: ["analyzed_at", "quality_score"],
      filters: dateRangeFilter("analyzed_at", start.toISOString()),
      order: [{ column: "analyzed_at", direction: "asc" }],
      ttlClass: "aggregate",
    }, options);

    const byDay = new Map<string, { count: number; scoreTotal: number; scored: number }>();
    for (const row of result.data) {
      const analyzedAt = timestampOf(row);
      if (!analyzedAt) continue;
      const date = analyzedAt.slice(0, 10);
      const day = byDay.get(date) ?? { count: 0, scoreTotal: 0, scored: 0 };
      day.count++;
      const score = row.quality_score === null || row.quality_score === undefined ? Number.NaN : Number(row.quality_score);
      if (Number.isFinite(score)) {
        day.scoreTotal += score;
        day.scored++;
      }
      byDay.set(date, day);
    }

    return [...byDay.entries()].map(([date, day]) => ({
      date,
      count: day.count,
      avgQuality: day.scored > 0 ? Math.round((day.scoreTotal / day.scored) * 10) / 10 : null,
    }));
  }

  async getNorthStar(options: ReadOptions = {}): Promise<NorthStar> {
    const [lastWeek, thisWeek] = await this.getNorthStarHistory(2, options);
    return {
      thisWeek: thisWeek.count,
      lastWeek: lastWeek.count,
      delta: thisWeek.count - lastWeek.count,
    };
  }

  /** Angle briefs per seven-day window, oldest first; the last window ends now. */
  async getNorthStarHistory(weeks: number = METRIC_CONSTANTS.NORTH_STAR_WEEKS, options: ReadOptions = {}): Promise<NorthStarWeek[]> {
    const weekMs = 7 * METRIC_CONSTANTS.DAY_MS;
    const end = this.windowEnd();
    const history: NorthStarWeek[] = [];
    for (let back = weeks - 1; back >= 0; back--) {
      const start = new Date(end - (back + 1) * weekMs);
      const stop = new Date(end - back * weekMs - 1);
      const count = await countFor(this.executor, {
        table: ANGLE_TABLE,
        columns: [],
        filters: dateRangeFilter("created_at", start.toISOString(), stop.toISOString()),
        ttlClass: "aggregate",
      }, options);
      history.push({ weekStart: start.toISOString().slice(0, 10), count });
    }
    return history;
  }

  async getPipelineStats(options: ReadOptions = {}): Promise<PipelineStats> {
    const total = await this.executor.count({ table: TABLE, columns: [], filters: [], ttlClass: "aggregate" }, options);
    const earliest = await this.executor.execute({
      table: TABLE,
      columns: ["analyzed_at"],
      filters: [{ kind: "null", field: "analyzed_at", present: true }],
      order: [{ column: "analyzed_at", direction: "asc" }],
      limit: 1,
      ttlClass: "aggregate",
    }, options);
    const latest = await this.executor.execute({
      table: TABLE,
      columns: ["analyzed_at"],
      filters: [{ kind: "null", field: "analyzed_at", present: true }],
      order: [{ column: "analyzed_at", direction: "desc" }],
      limit: 1,
      ttlClass: "rows",
    }, options);
    const status = await this.executor.execute({
      table: "system_status",
      columns: ["system_active"],
      filters: [],
      limit: 1,
      ttlClass: "aggregate",
    }, options);

    const since = timestampOf(earliest.data[0]);
    return {
      total: total.data,
      since: since ? since.slice(0, 10) : null,
      lastUpdated: timestampOf(latest.data[0]),
      active: status.data[0]?.system_active === true,
    };
  }

  private async periodMetrics(window: FilterSpec[], options: ReadOptions): Promise<PeriodMetrics> {
    const countWhere = (filters: FilterSpec[]) => countFor(
      this.executor,
      { table: TABLE, columns: [], filters: [...window, ...filters], ttlClass: "aggregate" },
      options,
    );

    const quotes = await countWhere([HAS_QUOTE]);
    const testimonials = await countWhere([{ kind: "eq", field: "testimonial_candidate", value: true }]);
    const contentWorthy = await countWhere([{ kind: "eq", field: "content_generation_flag", value: true }]);
    const scores = await this.executor.execute({
      table: TABLE,
      columns: ["quality_score"],
      filters: [...window, { kind: "null", field: "quality_score", present: true }],
      ttlClass: "aggregate",
    }, options);

    return {
      quotes,
      testimonials,
      contentWorthy,
      medianQuality: medianOf(scores.data.map((row) => Number(row.quality_score)).filter(Number.isFinite)),
    };
  }

  // Window edges are truncated to the hour so repeat reads hit the cache
  private windowEnd(): number {
    const { HOUR_MS } = METRIC_CONSTANTS;
    return Math.floor(this.clock.now() / HOUR_MS) * HOUR_MS;
  }

  private async distinct(column: string): Promise<string[]> {
    const rows = await this.store.select({
      table: TABLE,
      columns: [column],
      predicates: [{ op: "notNull", column }],
    });
    const values = rows
      .map((row) => row[column])
      .filter((value): value is string => typeof value === "string" && value.length > 0);
    return dedupe(values).sort();
  }
}

function dedupe(values: readonly string[]): string[] {
  return [...new Set(values.filter((value) => value.length > 0))];
}

function timestampOf(row: Row | undefined): string | null {
  const value = row?.analyzed_at;
  if (value instanceof Date) return value.toISOString();
  return typeof value === "string" ? value : null;
}
