import { randomBytes, randomUUID, scryptSync, timingSafeEqual } from "crypto";
import { z } from "zod";
import { columnNames, isProcedureName, isTableName, type TableName } from "@shared/schema";
import {
  STORE_ERROR_CODES,
  StoreError,
  type CountRequest,
  type OrderSpec,
  type Predicate,
  type RelationalStore,
  type Row,
  type SelectRequest,
} from "./types";

/**
 * In-process store with the same predicate semantics and procedures as the
 * Postgres database. Backs the test suites and local runs without
 * DATABASE_URL. Timestamps are kept as ISO strings, as the HTTP driver
 * returns them.
 */
export class MemStore implements RelationalStore {
  private tables = new Map<TableName, Row[]>();

  seed(table: TableName, rows: Row[]): void {
    this.tableRows(table).push(...rows.map((row) => ({ ...row })));
  }

  rows(table: TableName): Row[] {
    return this.tableRows(table).map((row) => ({ ...row }));
  }

  async select(request: SelectRequest): Promise<Row[]> {
    const table = this.resolveTable(request.table);
    this.assertColumns(table, [...request.columns, ...(request.order ?? []).map((o) => o.column)]);

    const matched = this.matching(table, request.predicates);
    const sorted = request.order && request.order.length > 0
      ? [...matched].sort((a, b) => compareRows(a, b, request.order ?? []))
      : matched;
    const start = request.offset ?? 0;
    const end = request.limit !== undefined ? start + request.limit : undefined;

    return sorted.slice(start, end).map((row) => project(row, request.columns));
  }

  async count(request: CountRequest): Promise<number> {
    const table = this.resolveTable(request.table);
    return this.matching(table, request.predicates).length;
  }

  async update(tableName: string, data: Row, match: readonly Predicate[]): Promise<number> {
    const table = this.resolveTable(tableName);
    this.assertColumns(table, Object.keys(data));
    if (match.length === 0) {
      throw new StoreError(`Refusing unfiltered update on ${table}`, STORE_ERROR_CODES.BAD_IDENTIFIER);
    }
    const targets = this.tableRows(table).filter((row) => matchesAll(row, match));
    for (const row of targets) {
      Object.assign(row, data);
    }
    return targets.length;
  }

  async upsert(tableName: string, data: Row, conflictColumns: readonly string[]): Promise<number> {
    const table = this.resolveTable(tableName);
    this.assertColumns(table, [...Object.keys(data), ...conflictColumns]);
    const rows = this.tableRows(table);
    const existing = conflictColumns.length > 0
      ? rows.find((row) => conflictColumns.every((column) => row[column] === data[column]))
      : undefined;
    if (existing) {
      Object.assign(existing, data);
    } else {
      const known = columnNames(table);
      const defaults: Row = {};
      if (known.includes("id")) defaults.id = randomUUID();
      if (known.includes("created_at")) defaults.created_at = new Date().toISOString();
      rows.push({ ...defaults, ...data });
    }
    return 1;
  }

  async callProcedure(name: string, params: Record<string, unknown>): Promise<Row[]> {
    if (!isProcedureName(name)) {
      throw new StoreError(`Unknown procedure "${name}"`, STORE_ERROR_CODES.BAD_IDENTIFIER);
    }
    switch (name) {
      case "authenticate_user":
        return this.authenticateUser(credentialParams.parse(params));
      case "register_user":
        return this.registerUser(registerParams.parse(params));
      case "create_session":
        return this.createSession(createSessionParams.parse(params));
      case "validate_session":
        return this.validateSession(tokenParams.parse(params).p_token);
      case "delete_session": {
        const { p_token } = tokenParams.parse(params);
        return this.deleteWhere("sessions", (row) => row.token === p_token);
      }
      case "purge_expired_sessions": {
        const { p_now } = purgeParams.parse(params);
        return this.deleteWhere("sessions", (row) => String(row.expires_at) <= p_now);
      }
      case "search_transcripts":
        return this.searchTranscripts(searchParams.parse(params));
    }
  }

  private authenticateUser({ p_email, p_password }: z.infer<typeof credentialParams>): Row[] {
    const user = this.findUserByEmail(p_email);
    if (!user || typeof user.password_hash !== "string" || !verifyPassword(p_password, user.password_hash)) {
      return [];
    }
    return [userView(user)];
  }

  private registerUser({ p_email, p_password, p_display_name }: z.infer<typeof registerParams>): Row[] {
    if (this.findUserByEmail(p_email)) {
      throw new StoreError(
        'duplicate key value violates unique constraint "users_email_unique"',
        STORE_ERROR_CODES.UNIQUE_VIOLATION,
      );
    }
    const user: Row = {
      id: randomUUID(),
      email: p_email.toLowerCase(),
      password_hash: hashPassword(p_password),
      display_name: p_display_name,
      is_admin: false,
      created_at: new Date().toISOString(),
    };
    this.tableRows("users").push(user);
    return [userView(user)];
  }

  private createSession(params: z.infer<typeof createSessionParams>): Row[] {
    const sessions = this.tableRows("sessions");
    if (sessions.some((row) => row.token === params.p_token)) {
      throw new StoreError(
        'duplicate key value violates unique constraint "sessions_pkey"',
        STORE_ERROR_CODES.UNIQUE_VIOLATION,
      );
    }
    sessions.push({
      token: params.p_token,
      user_id: params.p_user_id,
      user_name: params.p_user_name,
      created_at: params.p_created_at,
      expires_at: params.p_expires_at,
    });
    return [{ token: params.p_token }];
  }

  private validateSession(token: string): Row[] {
    const session = this.tableRows("sessions").find((row) => row.token === token);
    if (!session) return [];
    const user = this.tableRows("users").find((row) => row.id === session.user_id);
    if (!user) return [];
    return [{
      token: session.token,
      user_id: user.id,
      user_email: user.email,
      user_display_name: session.user_name,
      user_is_admin: user.is_admin,
      created_at: session.created_at,
      expires_at: session.expires_at,
    }];
  }

  private searchTranscripts({ query, min_quality, max_results }: z.infer<typeof searchParams>): Row[] {
    const needle = query.toLowerCase();
    return this.tableRows("analysis_results")
      .filter((row) => typeof row.transcript_original === "string"
        && row.transcript_original.toLowerCase().includes(needle)
        && Number(row.quality_score ?? 0) >= min_quality)
      .sort((a, b) => Number(b.quality_score ?? 0) - Number(a.quality_score ?? 0))
      .slice(0, max_results)
      .map((row) => ({
        source_transcript_id: row.source_transcript_id,
        quality_score: row.quality_score,
        case_type: row.case_type,
        call_start_date: row.analyzed_at,
        headline: row.summary,
        snippet: snippet(String(row.transcript_original), needle),
      }));
  }

  private deleteWhere(table: TableName, predicate: (row: Row) => boolean): Row[] {
    const rows = this.tableRows(table);
    const kept = rows.filter((row) => !predicate(row));
    const deleted = rows.length - kept.length;
    this.tables.set(table, kept);
    return [{ deleted }];
  }

  private findUserByEmail(email: string): Row | undefined {
    const needle = email.trim().toLowerCase();
    return this.tableRows("users").find((row) => String(row.email).toLowerCase() === needle);
  }

  private matching(table: TableName, predicates: readonly Predicate[]): Row[] {
    this.assertColumns(table, predicates.flatMap(predicateColumns));
    return this.tableRows(table).filter((row) => matchesAll(row, predicates));
  }

  private tableRows(table: TableName): Row[] {
    let rows = this.tables.get(table);
    if (!rows) {
      rows = [];
      this.tables.set(table, rows);
    }
    return rows;
  }

  private resolveTable(name: string): TableName {
    if (!isTableName(name)) {
      throw new StoreError(`Unknown table "${name}"`, STORE_ERROR_CODES.BAD_IDENTIFIER);
    }
    return name;
  }

  private assertColumns(table: TableName, columns: readonly string[]): void {
    const known = columnNames(table);
    const unknown = columns.find((column) => !known.includes(column));
    if (unknown !== undefined) {
      throw new StoreError(`Unknown column "${unknown}" on ${table}`, STORE_ERROR_CODES.BAD_IDENTIFIER);
    }
  }
}

const credentialParams = z.object({ p_email: z.string(), p_password: z.string() });
const registerParams = credentialParams.extend({ p_display_name: z.string() });
const tokenParams = z.object({ p_token: z.string() });
const createSessionParams = z.object({
  p_token: z.string(),
  p_user_id: z.string(),
  p_user_name: z.string(),
  p_created_at: z.string(),
  p_expires_at: z.string(),
});
const purgeParams = z.object({ p_now: z.string() });
const searchParams = z.object({
  query: z.string(),
  min_quality: z.number(),
  max_results: z.number().int().positive(),
});

function userView(user: Row): Row {
  return {
    user_id: user.id,
    user_email: user.email,
    user_display_name: user.display_name,
    user_is_admin: user.is_admin === true,
  };
}

export function hashPassword(password: string): string {
  const salt = randomBytes(16).toString("hex");
  const hash = scryptSync(password, salt, 32).toString("hex");
  return `${salt}:${hash}`;
}

function verifyPassword(password: string, stored: string): boolean {
  const [salt, hash] = stored.split(":");
  if (!salt || !hash) return false;
  const expected = Buffer.from(hash, "hex");
  const actual = scryptSync(password, salt, expected.length);
  return timingSafeEqual(expected, actual);
}

function snippet(text: string, needle: string): string {
  const at = text.toLowerCase().indexOf(needle);
  const start = Math.max(0, at - 60);
  const end = Math.min(text.length, at + needle.length + 60);
  return `${text.slice(start, at)}<b>${text.slice(at, at + needle.length)}</b>${text.slice(at + needle.length, end)}`;
}

function predicateColumns(p: Predicate): string[] {
  switch (p.op) {
    case "none":
      return [];
    case "ilike":
      return [...p.columns];
    default:
      return [p.column];
  }
}

function project(row: Row, columns: readonly string[]): Row {
  if (columns.length === 0) return { ...row };
  const projected: Row = {};
  for (const column of columns) {
    projected[column] = row[column] ?? null;
  }
  return projected;
}

function compareValues(a: unknown, b: unknown): number | null {
  if (a === null || a === undefined || b === null || b === undefined) return null;
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function compareRows(a: Row, b: Row, order: readonly OrderSpec[]): number {
  for (const { column, direction } of order) {
    const left = a[column];
    const right = b[column];
    const leftMissing = left === null || left === undefined;
    const rightMissing = right === null || right === undefined;
    // Nulls sort last in both directions
    if (leftMissing || rightMissing) {
      if (leftMissing && rightMissing) continue;
      return leftMissing ? 1 : -1;
    }
    const result = compareValues(left, right) ?? 0;
    if (result !== 0) return direction === "desc" ? -result : result;
  }
  return 0;
}

/**
 * Converts a LIKE pattern (`%`, `_`, backslash escapes) into an anchored,
 * case-insensitive regular expression.
 */
export function likePatternToRegExp(pattern: string): RegExp {
  let source = "";
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i);
    if (ch === "\\" && i + 1 < pattern.length) {
      i++;
      source += escapeRegExp(pattern.charAt(i));
    } else if (ch === "%") {
      source += "[\\s\\S]*";
    } else if (ch === "_") {
      source += "[\\s\\S]";
    } else {
      source += escapeRegExp(ch);
    }
  }
  return new RegExp(`^${source}$`, "i");
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function matches(row: Row, p: Predicate): boolean {
  switch (p.op) {
    case "none":
      return false;
    case "isNull":
      return row[p.column] === null || row[p.column] === undefined;
    case "notNull":
      return row[p.column] !== null && row[p.column] !== undefined;
    case "in":
      return p.values.some((value) => compareValues(row[p.column], value) === 0);
    case "ilike": {
      const regex = likePatternToRegExp(p.pattern);
      return p.columns.some((column) => {
        const value = row[column];
        return value !== null && value !== undefined && regex.test(String(value));
      });
    }
    default: {
      const result = compareValues(row[p.column], p.value);
      if (result === null) return false;
      switch (p.op) {
        case "eq":
          return result === 0;
        case "neq":
          return result !== 0;
        case "gt":
          return result > 0;
        case "gte":
          return result >= 0;
        case "lt":
          return result < 0;
        case "lte":
          return result <= 0;
      }
    }
  }
}

function matchesAll(row: Row, predicates: readonly Predicate[]): boolean {
  return predicates.every((p) => matches(row, p));
}
