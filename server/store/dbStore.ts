import { sql, type SQL } from "drizzle-orm";
import { z } from "zod";
import {
  columnNames,
  isProcedureName,
  isTableName,
  type TableName,
} from "@shared/schema";
import { createDb, type Database } from "../db";
import { createLogger } from "../utils/logger";
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

const log = createLogger("DbStore");

const countRowSchema = z.object({ count: z.coerce.number().int().nonnegative() });

/**
 * Postgres-backed store. Statements are assembled with drizzle's `sql`
 * template: identifiers come only from the schema registry and are quoted,
 * every value is a bound parameter.
 */
export class DbStore implements RelationalStore {
  private db: Database;
  private knownColumns = new Map<TableName, Set<string>>();

  constructor(databaseUrl: string) {
    this.db = createDb(databaseUrl);
  }

  async select(request: SelectRequest): Promise<Row[]> {
    const table = this.resolveTable(request.table);
    this.assertColumns(table, [
      ...request.columns,
      ...predicateColumns(request.predicates),
      ...(request.order ?? []).map((o) => o.column),
    ]);

    const columns = request.columns.length > 0
      ? sql.join(request.columns.map((c) => sql.identifier(c)), sql`, `)
      : sql`*`;

    const query = sql`select ${columns} from ${sql.identifier(table)}`;
    query.append(whereClause(request.predicates));
    query.append(orderClause(request.order));
    if (request.limit !== undefined) {
      query.append(sql` limit ${request.limit}`);
    }
    if (request.offset !== undefined && request.offset > 0) {
      query.append(sql` offset ${request.offset}`);
    }

    return this.run(query, `select ${table}`);
  }

  async count(request: CountRequest): Promise<number> {
    const table = this.resolveTable(request.table);
    this.assertColumns(table, predicateColumns(request.predicates));

    const query = sql`select count(*)::int as count from ${sql.identifier(table)}`;
    query.append(whereClause(request.predicates));

    const rows = await this.run(query, `count ${table}`);
    return countRowSchema.parse(rows[0] ?? { count: 0 }).count;
  }

  async update(tableName: string, data: Row, match: readonly Predicate[]): Promise<number> {
    const table = this.resolveTable(tableName);
    const entries = Object.entries(data);
    if (entries.length === 0) return 0;
    if (match.length === 0) {
      throw new StoreError(`Refusing unfiltered update on ${table}`, STORE_ERROR_CODES.BAD_IDENTIFIER);
    }
    this.assertColumns(table, [...entries.map(([column]) => column), ...predicateColumns(match)]);

    const assignments = sql.join(
      entries.map(([column, value]) => sql`${sql.identifier(column)} = ${value}`),
      sql`, `,
    );
    const query = sql`update ${sql.identifier(table)} set ${assignments}`;
    query.append(whereClause(match));

    return this.runForCount(query, `update ${table}`);
  }

  async upsert(tableName: string, data: Row, conflictColumns: readonly string[]): Promise<number> {
    const table = this.resolveTable(tableName);
    const entries = Object.entries(data);
    if (entries.length === 0) return 0;
    this.assertColumns(table, [...entries.map(([column]) => column), ...conflictColumns]);

    const columns = sql.join(entries.map(([column]) => sql.identifier(column)), sql`, `);
    const values = sql.join(entries.map(([, value]) => sql`${value}`), sql`, `);
    const query = sql`insert into ${sql.identifier(table)} (${columns}) values (${values})`;

    if (conflictColumns.length > 0) {
      const target = sql.join(conflictColumns.map((c) => sql.identifier(c)), sql`, `);
      const updates = entries
        .filter(([column]) => !conflictColumns.includes(column))
        .map(([column]) => sql`${sql.identifier(column)} = excluded.${sql.identifier(column)}`);
      query.append(
        updates.length > 0
          ? sql` on conflict (${target}) do update set ${sql.join(updates, sql`, `)}`
          : sql` on conflict (${target}) do nothing`,
      );
    }

    return this.runForCount(query, `upsert ${table}`);
  }

  async callProcedure(name: string, params: Record<string, unknown>): Promise<Row[]> {
    if (!isProcedureName(name)) {
      throw new StoreError(`Unknown procedure "${name}"`, STORE_ERROR_CODES.BAD_IDENTIFIER);
    }
    // Named notation, so parameter order in the caller does not matter
    const args = sql.join(
      Object.entries(params).map(([param, value]) => sql`${sql.identifier(param)} => ${value}`),
      sql`, `,
    );
    return this.run(sql`select * from ${sql.identifier(name)}(${args})`, `procedure ${name}`);
  }

  private async run(query: SQL, label: string): Promise<Row[]> {
    const started = Date.now();
    try {
      const result = await this.db.execute<Row>(query);
      log.debug(`${label} returned ${result.rows.length} rows`, { duration: Date.now() - started });
      return result.rows;
    } catch (error) {
      throw toStoreError(error, label);
    }
  }

  private async runForCount(query: SQL, label: string): Promise<number> {
    try {
      const result = await this.db.execute<Row>(query);
      return result.rowCount ?? result.rows.length;
    } catch (error) {
      throw toStoreError(error, label);
    }
  }

  private resolveTable(name: string): TableName {
    if (!isTableName(name)) {
      throw new StoreError(`Unknown table "${name}"`, STORE_ERROR_CODES.BAD_IDENTIFIER);
    }
    return name;
  }

  private assertColumns(table: TableName, columns: Iterable<string>): void {
    let known = this.knownColumns.get(table);
    if (!known) {
      known = new Set(columnNames(table));
      this.knownColumns.set(table, known);
    }
    for (const column of columns) {
      if (!known.has(column)) {
        throw new StoreError(`Unknown column "${column}" on ${table}`, STORE_ERROR_CODES.BAD_IDENTIFIER);
      }
    }
  }
}

function predicateColumns(predicates: readonly Predicate[]): string[] {
  return predicates.flatMap((p) => {
    switch (p.op) {
      case "none":
        return [];
      case "ilike":
        return [...p.columns];
      default:
        return [p.column];
    }
  });
}

function predicateSql(p: Predicate): SQL {
  switch (p.op) {
    case "eq":
      return sql`${sql.identifier(p.column)} = ${p.value}`;
    case "neq":
      return sql`${sql.identifier(p.column)} <> ${p.value}`;
    case "gt":
      return sql`${sql.identifier(p.column)} > ${p.value}`;
    case "gte":
      return sql`${sql.identifier(p.column)} >= ${p.value}`;
    case "lt":
      return sql`${sql.identifier(p.column)} < ${p.value}`;
    case "lte":
      return sql`${sql.identifier(p.column)} <= ${p.value}`;
    case "in":
      if (p.values.length === 0) return sql`false`;
      return sql`${sql.identifier(p.column)} in (${sql.join(p.values.map((v) => sql`${v}`), sql`, `)})`;
    case "ilike":
      return sql`(${sql.join(
        p.columns.map((c) => sql`${sql.identifier(c)} ilike ${p.pattern} escape '\\'`),
        sql` or `,
      )})`;
    case "isNull":
      return sql`${sql.identifier(p.column)} is null`;
    case "notNull":
      return sql`${sql.identifier(p.column)} is not null`;
    case "none":
      return sql`false`;
  }
}

function whereClause(predicates: readonly Predicate[]): SQL {
  if (predicates.length === 0) return sql``;
  return sql` where ${sql.join(predicates.map(predicateSql), sql` and `)}`;
}

function orderClause(order: readonly OrderSpec[] | undefined): SQL {
  if (!order || order.length === 0) return sql``;
  const parts = order.map((o) =>
    o.direction === "desc"
      ? sql`${sql.identifier(o.column)} desc nulls last`
      : sql`${sql.identifier(o.column)} asc`,
  );
  return sql` order by ${sql.join(parts, sql`, `)}`;
}

function toStoreError(error: unknown, label: string): StoreError {
  if (error instanceof StoreError) return error;
  const code = error instanceof Error && "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;
  const message = error instanceof Error ? error.message : String(error);
  log.warn(`${label} failed: ${message}`, { code });
  return new StoreError(`${label} failed: ${message}`, code, { cause: error });
}
