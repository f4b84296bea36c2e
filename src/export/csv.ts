/**
 * Cloud Ledger — CSV Export
 *
 * Spreadsheet-compatible tables for aggregation rows, budget statuses,
 * allocations and violations. Column order is fixed per table. Amounts are
 * major-unit decimals derived exactly from minor units and always sit next
 * to a currency column.
 */

import type { AllocationResult } from "../allocation/engine.js";
import type { BudgetStatus, Projection } from "../budgets/types.js";
import type { Violation } from "../governance/types.js";
import { formatMinorUnits } from "../money.js";
import type { AggregationResult } from "../types.js";

type Cell = string | number | boolean | null | undefined;

/** Escape a CSV field value. */
export function csvEscape(value: string): string {
  if (value.includes(",") || value.includes('"') || value.includes("\n") || value.includes("\r")) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function cell(value: Cell): string {
  if (value === null || value === undefined) return "";
  return csvEscape(String(value));
}

export function toCsv(headers: readonly string[], rows: readonly Cell[][]): string {
  const lines = [headers.map(csvEscape).join(",")];
  for (const row of rows) {
    lines.push(row.map(cell).join(","));
  }
  return `${lines.join("\n")}\n`;
}

function projected(p: Projection, currency: string): string {
  return p.kind === "projected" ? formatMinorUnits(p.amountMinorUnits, currency) : "";
}

// =============================================================================
// Tables
// =============================================================================

export const AGGREGATION_COLUMNS = [
  "key",
  "amount",
  "currency",
  "pct_of_total",
  "record_count",
  "previous_amount",
  "delta_amount",
  "delta_pct",
] as const;

export function aggregationToCsv(result: AggregationResult): string {
  const { currency } = result;
  return toCsv(
    AGGREGATION_COLUMNS,
    result.rows.map((row) => {
      const trend = row.trend.kind === "comparison" ? row.trend : null;
      return [
        row.key,
        formatMinorUnits(row.amountMinorUnits, currency),
        currency,
        row.pctOfTotal,
        row.recordCount,
        trend ? formatMinorUnits(trend.previousMinorUnits, currency) : "",
        trend ? formatMinorUnits(trend.deltaMinorUnits, currency) : "",
        trend?.deltaPct,
      ];
    }),
  );
}

export const BUDGET_COLUMNS = [
  "budget_id",
  "budget_name",
  "amount",
  "currency",
  "consumed",
  "consumed_pct",
  "expected_pct",
  "status",
  "forecast",
  "variance",
  "days_elapsed",
  "days_in_period",
  "period_start",
  "period_end",
  "as_of",
  "alert_triggered",
  "insufficient_data",
] as const;

export function budgetStatusesToCsv(statuses: readonly BudgetStatus[]): string {
  return toCsv(
    BUDGET_COLUMNS,
    statuses.map((s) => [
      s.budgetId,
      s.budgetName,
      formatMinorUnits(s.amountMinorUnits, s.currency),
      s.currency,
      formatMinorUnits(s.consumedMinorUnits, s.currency),
      s.consumedPct,
      s.expectedPct,
      s.status,
      projected(s.forecast, s.currency),
      projected(s.variance, s.currency),
      s.daysElapsed,
      s.daysInPeriod,
      s.periodStart,
      s.periodEnd,
      s.asOf,
      s.alertTriggered,
      s.insufficientData,
    ]),
  );
}

export const ALLOCATION_COLUMNS = ["rule_id", "dimension", "method", "key", "amount", "currency", "pct_of_total"] as const;

export function allocationToCsv(result: AllocationResult): string {
  return toCsv(
    ALLOCATION_COLUMNS,
    result.allocations.map((a) => [
      result.ruleId,
      result.dimension,
      result.method,
      a.key,
      formatMinorUnits(a.amountMinorUnits, result.currency),
      result.currency,
      a.pctOfTotal,
    ]),
  );
}

export const VIOLATION_COLUMNS = [
  "id",
  "policy_id",
  "policy_name",
  "severity",
  "status",
  "cloud",
  "account_id",
  "resource_id",
  "subject_id",
  "window_start",
  "window_end",
  "detected_at",
  "message",
  "status_note",
] as const;

export function violationsToCsv(violations: readonly Violation[]): string {
  return toCsv(
    VIOLATION_COLUMNS,
    violations.map((v) => [
      v.id,
      v.policyId,
      v.policyName,
      v.severity,
      v.status,
      v.cloud,
      v.accountId,
      v.resourceId,
      v.subjectId,
      v.windowStart,
      v.windowEnd,
      v.detectedAt,
      v.message,
      v.statusNote,
    ]),
  );
}
