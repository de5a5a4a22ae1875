import type { TestimonialQuery } from "@shared/criteria";
import type { UpdateTestimonialStatus } from "@shared/schema";
import { toQueryError, type CachedQueryExecutor, type ReadOptions } from "../query/cachedQueryExecutor";
import type { FilterSpec } from "../query/filterCompiler";
import type { RelationalStore, Row } from "../store/types";
import type { Clock } from "../utils/clock";
import { NotFoundError } from "../utils/errorHandler";
import { createLogger } from "../utils/logger";
import { testimonialSchema, type TestimonialEntry } from "./rowNormalizer";

const log = createLogger("Testimonials");

const TABLE = "testimonial_pipeline";

export class TestimonialPipeline {
  constructor(
    private executor: CachedQueryExecutor,
    private store: RelationalStore,
    private clock: Clock,
  ) {}

  async list(query: TestimonialQuery, options: ReadOptions = {}): Promise<TestimonialEntry[]> {
    const filters: FilterSpec[] = [];
    if (query.status) filters.push({ kind: "eq", field: "status", value: query.status });
    if (query.testimonialType) filters.push({ kind: "eq", field: "testimonial_type", value: query.testimonialType });

    const result = await this.executor.execute({
      table: TABLE,
      columns: [],
      filters,
      order: [{ column: "quality_score", direction: "desc" }],
      ttlClass: "rows",
    }, options);
    return result.data.map((row) => testimonialSchema.parse(row));
  }

  /**
   * Moves one testimonial to a new status and drops every cached read of the
   * pipeline, so the next listing shows the change.
   */
  async updateStatus(sourceTranscriptId: string, update: UpdateTestimonialStatus, updatedBy: string): Promise<void> {
    const data: Row = {
      status: update.status,
      status_updated_at: new Date(this.clock.now()).toISOString(),
      status_updated_by: updatedBy,
    };
    if (update.notes !== undefined) {
      data.notes = update.notes;
    }

    let updated: number;
    try {
      updated = await this.store.update(TABLE, data, [
        { op: "eq", column: "source_transcript_id", value: sourceTranscriptId },
      ]);
    } catch (error) {
      throw toQueryError(error);
    }
    if (updated === 0) {
      throw new NotFoundError(`Testimonial ${sourceTranscriptId}`);
    }

    this.executor.invalidate(TABLE);
    log.info(`Status set to ${update.status}`, { sourceTranscriptId, userId: updatedBy });
  }
}
