import { CLAMPED_RANGES } from "../config/constants";
import { FilterError } from "../utils/errorHandler";
import type { Predicate, Scalar } from "../store/types";
import { hashParts } from "./queryKey";

/**
 * One filtering condition, rebuilt per request from the UI state.
 *
 * - eq: field equals value
 * - in: field is any of values (OR within the field)
 * - range: low <= field <= high, either bound optional
 * - text: case-insensitive literal substring; several fields match with OR
 * - null: field is (present=false) or is not (present=true) null
 */
export type FilterSpec =
  | { kind: "eq"; field: string; value: Scalar }
  | { kind: "in"; field: string; values: readonly Scalar[] }
  | { kind: "range"; field: string; low?: Scalar; high?: Scalar }
  | { kind: "text"; field: string | readonly string[]; substring: string }
  | { kind: "null"; field: string; present: boolean; blankIsNull?: boolean };

export interface CompileOptions {
  /** Raise instead of compiling an empty membership set to match-nothing. */
  rejectEmptyMembership?: boolean;
}

export interface CompiledFilters {
  predicates: Predicate[];
  /** Filters in canonical order with normalized values. */
  canonical: FilterSpec[];
  /** Stable digest of the canonical filters. */
  cacheKey: string;
}

// Characters with meaning to LIKE patterns or to filter-string parsers
const LIKE_SPECIAL_CHARS = /[\\%_().,]/g;

/**
 * Escapes a user-supplied substring so every character matches literally
 * inside an `ILIKE ... ESCAPE '\'` pattern.
 */
export function escapeLikePattern(text: string): string {
  return text.replace(LIKE_SPECIAL_CHARS, (ch) => `\\${ch}`);
}

export function containsPattern(text: string): string {
  return `%${escapeLikePattern(text)}%`;
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/** A date-only bound on a timestamp column covers the whole of that day. */
export function endOfDay(date: string): string {
  return DATE_ONLY.test(date) ? `${date}T23:59:59.999Z` : date;
}

/** Inclusive range on a timestamp column; nothing when neither bound is set. */
export function dateRangeFilter(field: string, start?: string, end?: string): FilterSpec[] {
  if (!start && !end) return [];
  const range: { kind: "range"; field: string; low?: string; high?: string } = { kind: "range", field };
  if (start) range.low = start;
  if (end) range.high = endOfDay(end);
  return [range];
}

export function compileFilters(filters: readonly FilterSpec[], options: CompileOptions = {}): CompiledFilters {
  const canonical = canonicalize(filters.map(normalize));
  const predicates = canonical.flatMap((filter) => toPredicates(filter, options));
  return {
    predicates,
    canonical,
    cacheKey: hashParts(canonical),
  };
}

/**
 * Orders filters by field, then operator, then value, so logically equal
 * filter sets built in any order produce the same canonical list.
 */
export function canonicalize(filters: readonly FilterSpec[]): FilterSpec[] {
  return [...filters].sort((a, b) =>
    compareStrings(fieldKey(a), fieldKey(b))
    || compareStrings(a.kind, b.kind)
    || compareStrings(JSON.stringify(a), JSON.stringify(b)));
}

function normalize(filter: FilterSpec): FilterSpec {
  switch (filter.kind) {
    case "eq":
      return { kind: "eq", field: filter.field, value: filter.value };
    case "in":
      return { kind: "in", field: filter.field, values: uniqueSorted(filter.values) };
    case "range":
      return normalizeRange(filter.field, filter.low, filter.high);
    case "text": {
      const fields = typeof filter.field === "string" ? [filter.field] : uniqueSorted(filter.field);
      return {
        kind: "text",
        field: fields.length === 1 ? fields[0] : fields,
        substring: filter.substring.trim(),
      };
    }
    case "null":
      return filter.blankIsNull
        ? { kind: "null", field: filter.field, present: filter.present, blankIsNull: true }
        : { kind: "null", field: filter.field, present: filter.present };
  }
}

function normalizeRange(field: string, low: Scalar | undefined, high: Scalar | undefined): FilterSpec {
  const bounds = CLAMPED_RANGES.get(field);
  let lower = low;
  let upper = high;
  if (bounds) {
    const [min, max] = bounds;
    if (typeof lower === "number") lower = Math.min(Math.max(lower, min), max);
    if (typeof upper === "number") upper = Math.min(Math.max(upper, min), max);
  }
  if (lower !== undefined && upper !== undefined && compareScalars(lower, upper) > 0) {
    throw new FilterError(
      "OutOfRange",
      field,
      `Range filter on ${field} has low (${String(lower)}) greater than high (${String(upper)})`,
    );
  }

  const range: { kind: "range"; field: string; low?: Scalar; high?: Scalar } = { kind: "range", field };
  if (lower !== undefined) range.low = lower;
  if (upper !== undefined) range.high = upper;
  return range;
}

function toPredicates(filter: FilterSpec, options: CompileOptions): Predicate[] {
  switch (filter.kind) {
    case "eq":
      return [{ op: "eq", column: filter.field, value: filter.value }];
    case "in":
      if (filter.values.length === 0) {
        if (options.rejectEmptyMembership) {
          throw new FilterError("EmptyMembership", filter.field, `Membership filter on ${filter.field} has no values`);
        }
        return [{ op: "none" }];
      }
      return [{ op: "in", column: filter.field, values: filter.values }];
    case "range": {
      const predicates: Predicate[] = [];
      if (filter.low !== undefined) predicates.push({ op: "gte", column: filter.field, value: filter.low });
      if (filter.high !== undefined) predicates.push({ op: "lte", column: filter.field, value: filter.high });
      return predicates;
    }
    case "text":
      if (filter.substring.length === 0) return [];
      return [{
        op: "ilike",
        columns: typeof filter.field === "string" ? [filter.field] : filter.field,
        pattern: containsPattern(filter.substring),
      }];
    case "null":
      if (!filter.present) return [{ op: "isNull", column: filter.field }];
      return filter.blankIsNull
        ? [{ op: "notNull", column: filter.field }, { op: "neq", column: filter.field, value: "" }]
        : [{ op: "notNull", column: filter.field }];
  }
}

function fieldKey(filter: FilterSpec): string {
  return typeof filter.field === "string" ? filter.field : filter.field.join(",");
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareScalars(a: Scalar, b: Scalar): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  return compareStrings(String(a), String(b));
}

function uniqueSorted<T extends Scalar>(values: readonly T[]): T[] {
  const seen = new Map<string, T>();
  for (const value of values) {
    seen.set(`${typeof value}:${String(value)}`, value);
  }
  return [...seen.entries()]
    .sort(([a], [b]) => compareStrings(a, b))
    .map(([, value]) => value);
}
