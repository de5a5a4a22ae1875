import { z } from "zod";
import { METRIC_CONSTANTS, PAGINATION_CONSTANTS } from "../config/constants";
import type { CachedQueryExecutor, ExecutorStats, ReadOptions } from "../query/cachedQueryExecutor";
import type { FilterSpec } from "../query/filterCompiler";
import type { Row } from "../store/types";
import type { Clock } from "../utils/clock";
import { costDaySchema, normalizeRow, promptSchema, type CostDay, type Prompt } from "./rowNormalizer";

export interface BudgetSummary {
  dailyLimit: number;
  todaySpend: number;
  /** Never below zero. */
  remaining: number;
}

export interface SystemHealth {
  status: Row | null;
  budget: BudgetSummary | null;
  driftAlerts: Row[];
  cache: ExecutorStats;
}

export interface CostReport {
  days: CostDay[];
  totalCost: number;
  averageDailyCost: number;
  callsProcessed: number;
}

const PROMPT_COLUMNS = ["id", "prompt_name", "prompt_version", "description", "is_active", "created_at"];

// Numeric columns arrive as strings from Postgres; missing values count as zero
const budgetSchema = z.object({
  daily_budget_limit: z.coerce.number().catch(0),
  current_daily_spend: z.coerce.number().catch(0),
});

// Admin-only view of pipeline status, spend, prompts and recent drift alerts
export class SystemHealthService {
  constructor(
    private executor: CachedQueryExecutor,
    private clock: Clock,
  ) {}

  async getHealth(options: ReadOptions = {}): Promise<SystemHealth> {
    const status = await this.executor.execute({
      table: "system_status",
      columns: [],
      filters: [],
      limit: 1,
      ttlClass: "aggregate",
    }, options);
    const alerts = await this.executor.execute({
      table: "drift_alerts",
      columns: [],
      filters: [],
      order: [{ column: "created_at", direction: "desc" }],
      limit: PAGINATION_CONSTANTS.DRIFT_ALERT_LIMIT,
      ttlClass: "rows",
    }, options);

    const first = status.data[0];
    return {
      status: first ? normalizeRow("system_status", first) : null,
      budget: first ? budgetOf(first) : null,
      driftAlerts: alerts.data.map((row) => normalizeRow("drift_alerts", row)),
      cache: this.executor.stats(),
    };
  }

  /** Daily spend since `days` days ago (UTC dates), newest first. */
  async getCostTracking(days: number = METRIC_CONSTANTS.COST_WINDOW_DAYS, options: ReadOptions = {}): Promise<CostReport> {
    const since = new Date(this.clock.now() - days * METRIC_CONSTANTS.DAY_MS).toISOString().slice(0, 10);
    const result = await this.executor.execute({
      table: "cost_tracking",
      columns: ["date", "total_cost", "calls_processed"],
      filters: [{ kind: "range", field: "date", low: since }],
      order: [{ column: "date", direction: "desc" }],
      ttlClass: "aggregate",
    }, options);

    const rows = result.data.map((row) => costDaySchema.parse(row));
    const totalCost = rows.reduce((sum, day) => sum + day.totalCost, 0);
    return {
      days: rows,
      totalCost,
      averageDailyCost: rows.length > 0 ? totalCost / rows.length : 0,
      callsProcessed: rows.reduce((sum, day) => sum + day.callsProcessed, 0),
    };
  }

  async getPromptLibrary(activeOnly = false, options: ReadOptions = {}): Promise<Prompt[]> {
    const filters: FilterSpec[] = activeOnly ? [{ kind: "eq", field: "is_active", value: true }] : [];
    const result = await this.executor.execute({
      table: "prompt_library",
      columns: PROMPT_COLUMNS,
      filters,
      order: [{ column: "created_at", direction: "desc" }],
      ttlClass: "aggregate",
    }, options);
    return result.data.map((row) => promptSchema.parse(row));
  }
}

function budgetOf(row: Row): BudgetSummary {
  const budget = budgetSchema.parse(row);
  return {
    dailyLimit: budget.daily_budget_limit,
    todaySpend: budget.current_daily_spend,
    remaining: Math.max(0, budget.daily_budget_limit - budget.current_daily_spend),
  };
}
