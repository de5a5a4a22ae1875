/**
 * Relational store collaborator.
 *
 * The query layer talks to the database only through this interface, so
 * the Neon-backed DbStore and the in-process MemStore are interchangeable.
 */

export type Scalar = string | number | boolean;

export type Row = Record<string, unknown>;

export type ComparisonOp = "eq" | "neq" | "gt" | "gte" | "lt" | "lte";

export type Predicate =
  | { op: ComparisonOp; column: string; value: Scalar }
  | { op: "in"; column: string; values: readonly Scalar[] }
  // Case-insensitive LIKE with backslash escapes; any listed column may match
  | { op: "ilike"; columns: readonly string[]; pattern: string }
  | { op: "isNull" | "notNull"; column: string }
  | { op: "none" };

export interface OrderSpec {
  column: string;
  direction: "asc" | "desc";
}

export interface SelectRequest {
  table: string;
  /** Empty selects every column. */
  columns: readonly string[];
  predicates: readonly Predicate[];
  order?: readonly OrderSpec[];
  limit?: number;
  offset?: number;
}

export type CountRequest = Pick<SelectRequest, "table" | "predicates">;

export interface RelationalStore {
  select(request: SelectRequest): Promise<Row[]>;
  count(request: CountRequest): Promise<number>;
  update(table: string, data: Row, match: readonly Predicate[]): Promise<number>;
  upsert(table: string, data: Row, conflictColumns: readonly string[]): Promise<number>;
  callProcedure(name: string, params: Record<string, unknown>): Promise<Row[]>;
}

export const STORE_ERROR_CODES = {
  BAD_IDENTIFIER: "BAD_IDENTIFIER",
  UNIQUE_VIOLATION: "23505",
} as const;

export class StoreError extends Error {
  readonly code: string | undefined;
  constructor(message: string, code?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StoreError";
    this.code = code;
  }
}
