/**
 * Angle Bank
 *
 * Creative angle briefs from the content generation queue, plus per-user
 * thumbs up/down feedback on each brief. Content intent lives inside the
 * JSON brief, so that filter runs after a bounded fetch and the listing is
 * paged in memory.
 */

import type { AngleCriteria } from "@shared/criteria";
import { ANGLE_STATUSES, type InsertAngleFeedback } from "@shared/schema";
import { PAGINATION_CONSTANTS } from "../config/constants";
import { toQueryError, type CachedQueryExecutor, type ReadOptions } from "../query/cachedQueryExecutor";
import { dateRangeFilter, type FilterSpec } from "../query/filterCompiler";
import { pageAt, type PageState } from "../query/pagination";
import type { RelationalStore } from "../store/types";
import { NotFoundError } from "../utils/errorHandler";
import { createLogger } from "../utils/logger";
import { angleSchema, type Angle } from "./rowNormalizer";

const log = createLogger("AngleBank");

const QUEUE_TABLE = "content_generation_queue";
const FEEDBACK_TABLE = "angle_feedback";

export interface FeedbackTally {
  up: number;
  down: number;
  /** The signed-in user's own rating, if any. */
  mine: string | null;
}

export interface AngleListing {
  items: Array<Angle & { feedback: FeedbackTally }>;
  page: PageState;
  summary: {
    total: number;
    pendingReview: number;
    approved: number;
    byContentType: Record<string, number>;
  };
}

export function angleFilters(criteria: AngleCriteria): FilterSpec[] {
  const statuses = criteria.statuses.length > 0 ? criteria.statuses : ANGLE_STATUSES;
  const filters: FilterSpec[] = [
    { kind: "in", field: "status", values: statuses },
    { kind: "range", field: "quality_score", low: criteria.minQuality, high: criteria.maxQuality },
  ];
  if (criteria.contentTypes.length > 0) {
    filters.push({ kind: "in", field: "content_type", values: criteria.contentTypes });
  }
  filters.push(...dateRangeFilter("created_at", criteria.startDate, criteria.endDate));
  return filters;
}

export class AngleBank {
  constructor(
    private executor: CachedQueryExecutor,
    private store: RelationalStore,
  ) {}

  async list(criteria: AngleCriteria, userEmail: string, options: ReadOptions = {}): Promise<AngleListing> {
    const result = await this.executor.execute({
      table: QUEUE_TABLE,
      columns: [],
      filters: angleFilters(criteria),
      order: [{ column: "created_at", direction: "desc" }],
      limit: PAGINATION_CONSTANTS.ANGLE_FETCH_LIMIT,
      ttlClass: "rows",
    }, options);

    const angles = result.data
      .map((row) => angleSchema.parse(row))
      .filter((angle) => criteria.intents.length === 0
        || (angle.contentIntent !== null && criteria.intents.some((intent) => intent === angle.contentIntent)));

    const page = pageAt(criteria.page, PAGINATION_CONSTANTS.ANGLE_PAGE_SIZE, angles.length);
    const visible = angles.slice(page.offset, page.offset + page.limit);
    const tallies = await this.feedbackFor(visible.map((angle) => angle.id), userEmail, options);

    const byContentType: Record<string, number> = {};
    for (const angle of angles) {
      byContentType[angle.contentType] = (byContentType[angle.contentType] ?? 0) + 1;
    }

    return {
      items: visible.map((angle) => ({ ...angle, feedback: tallies.get(angle.id) ?? { up: 0, down: 0, mine: null } })),
      page,
      summary: {
        total: angles.length,
        pendingReview: angles.filter((angle) => angle.status === "pending_review").length,
        approved: angles.filter((angle) => angle.status === "approved").length,
        byContentType,
      },
    };
  }

  /** One rating per user per angle; a second rating replaces the first. */
  async recordFeedback(angleId: string, userEmail: string, feedback: InsertAngleFeedback): Promise<void> {
    try {
      const exists = await this.store.count({
        table: QUEUE_TABLE,
        predicates: [{ op: "eq", column: "id", value: angleId }],
      });
      if (exists === 0) {
        throw new NotFoundError(`Angle ${angleId}`);
      }
      await this.store.upsert(
        FEEDBACK_TABLE,
        {
          angle_id: angleId,
          user_email: userEmail,
          rating: feedback.rating,
          comment: feedback.comment ?? null,
        },
        ["angle_id", "user_email"],
      );
    } catch (error) {
      if (error instanceof NotFoundError) throw error;
      throw toQueryError(error);
    }

    this.executor.invalidate(FEEDBACK_TABLE);
    this.executor.invalidate(QUEUE_TABLE);
    log.info(`Feedback recorded: ${feedback.rating}`, { angleId });
  }

  private async feedbackFor(angleIds: string[], userEmail: string, options: ReadOptions): Promise<Map<string, FeedbackTally>> {
    const tallies = new Map<string, FeedbackTally>();
    if (angleIds.length === 0) return tallies;

    const result = await this.executor.execute({
      table: FEEDBACK_TABLE,
      columns: ["angle_id", "user_email", "rating"],
      filters: [{ kind: "in", field: "angle_id", values: angleIds }],
      ttlClass: "rows",
    }, options);

    for (const row of result.data) {
      const angleId = String(row.angle_id);
      const tally = tallies.get(angleId) ?? { up: 0, down: 0, mine: null };
      if (row.rating === "up") tally.up++;
      if (row.rating === "down") tally.down++;
      if (row.user_email === userEmail && typeof row.rating === "string") tally.mine = row.rating;
      tallies.set(angleId, tally);
    }
    return tallies;
  }
}
