/**
 * Cloud Ledger — Aggregation Engine
 *
 * Grouped totals over a filtered, ranged slice of the effective records.
 * Every call reads a fresh snapshot and keeps no cache, so the same
 * snapshot and configuration always give the same result.
 */

import type { EngineConfig } from "../config/schema.js";
import { InvalidQueryError } from "../errors.js";
import { matchesScope } from "../scope.js";
import { DAY_MS, addUtcMonths, dayKey, inWindow, isValidWindow, monthKey, precedingWindow, toMs } from "../time.js";
import type {
  AggregationQuery,
  AggregationResult,
  CostRecord,
  CostSnapshot,
  CostStore,
  GroupBy,
  GroupedTotal,
  Scope,
  TimeWindow,
  Trend,
} from "../types.js";

export const UNALLOCATED = "Unallocated";
export const NO_PROJECT = "(none)";

// =============================================================================
// Helpers
// =============================================================================

/** Percentage of `whole`, to two decimals; 0 when `whole` is 0. */
export function percentage(part: number, whole: number): number {
  if (whole === 0) return 0;
  return Math.round((part / whole) * 10_000) / 100;
}

/** Records matching the scope whose periodStart lies in the window. */
export function selectRecords(records: readonly CostRecord[], filter: Scope | undefined, range: TimeWindow): CostRecord[] {
  return records.filter((r) => inWindow(r.periodStart, range) && matchesScope(r, filter));
}

export function sumMinorUnits(records: readonly CostRecord[]): number {
  return records.reduce((sum, r) => sum + r.amountMinorUnits, 0);
}

export function groupKey(record: CostRecord, groupBy: GroupBy): string {
  switch (groupBy) {
    case "account":
      return record.accountId;
    case "project":
      return record.projectId ?? NO_PROJECT;
    case "team":
      return record.tags.team || UNALLOCATED;
    case "product":
      return record.tags.product || UNALLOCATED;
    case "service":
      return record.service;
    case "cloud":
      return record.cloud;
    case "day":
      return dayKey(record.periodStart);
    case "month":
      return monthKey(record.periodStart);
  }
}

/** Key of the bucket before a day ("2024-03-01" → "2024-02-29") or month bucket. */
function previousBucket(key: string, groupBy: "day" | "month"): string {
  if (groupBy === "day") {
    return new Date(toMs(`${key}T00:00:00.000Z`) - DAY_MS).toISOString().slice(0, 10);
  }
  return new Date(addUtcMonths(toMs(`${key}-01T00:00:00.000Z`), -1)).toISOString().slice(0, 7);
}

function totalsByKey(records: readonly CostRecord[], groupBy: GroupBy): Map<string, { amount: number; count: number }> {
  const totals = new Map<string, { amount: number; count: number }>();
  for (const record of records) {
    const key = groupKey(record, groupBy);
    const entry = totals.get(key) ?? { amount: 0, count: 0 };
    entry.amount += record.amountMinorUnits;
    entry.count += 1;
    totals.set(key, entry);
  }
  return totals;
}

function trendFor(current: number, previous: { amount: number; count: number } | undefined): Trend {
  if (!previous || previous.count === 0) return { kind: "none" };
  const delta = current - previous.amount;
  return {
    kind: "comparison",
    previousMinorUnits: previous.amount,
    deltaMinorUnits: delta,
    deltaPct: previous.amount === 0 ? null : Math.round((delta / Math.abs(previous.amount)) * 10_000) / 100,
  };
}

export function compareGroupedTotals(a: { key: string; amountMinorUnits: number }, b: { key: string; amountMinorUnits: number }): number {
  if (a.amountMinorUnits !== b.amountMinorUnits) return b.amountMinorUnits - a.amountMinorUnits;
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

// =============================================================================
// Pure aggregation
// =============================================================================

export function aggregateRecords(
  records: readonly CostRecord[],
  query: AggregationQuery,
  config: Pick<EngineConfig, "defaultCurrency" | "version">,
): AggregationResult {
  const { filter, groupBy, range } = query;
  if (!isValidWindow(range)) {
    throw new InvalidQueryError(`Range ${range.start} .. ${range.end} is empty or malformed`);
  }

  const selected = selectRecords(records, filter, range);
  const current = totalsByKey(selected, groupBy);
  const total = sumMinorUnits(selected);

  // Time buckets compare with the bucket before; other groupings compare
  // with the same group over the preceding window of equal length.
  let previousOf: (key: string) => { amount: number; count: number } | undefined;
  if (groupBy === "day" || groupBy === "month") {
    const everyBucket = totalsByKey(
      records.filter((r) => matchesScope(r, filter)),
      groupBy,
    );
    previousOf = (key) => everyBucket.get(previousBucket(key, groupBy));
  } else {
    const previous = totalsByKey(selectRecords(records, filter, precedingWindow(range)), groupBy);
    previousOf = (key) => previous.get(key);
  }

  const rows: GroupedTotal[] = [...current.entries()].map(([key, { amount, count }]) => ({
    key,
    amountMinorUnits: amount,
    pctOfTotal: percentage(amount, total),
    recordCount: count,
    trend: trendFor(amount, previousOf(key)),
  }));
  rows.sort(compareGroupedTotals);

  return {
    groupBy,
    range: { ...range },
    rows,
    totalMinorUnits: total,
    currency: config.defaultCurrency,
    recordCount: selected.length,
    insufficientData: selected.length === 0,
    configVersion: config.version,
  };
}

// =============================================================================
// Engine
// =============================================================================

export class AggregationEngine {
  constructor(
    private readonly store: CostStore,
    private readonly config: EngineConfig,
  ) {}

  /** Aggregate over `snapshot`, or over a fresh one. */
  aggregate(query: AggregationQuery, snapshot?: CostSnapshot): AggregationResult {
    const view = snapshot ?? this.store.snapshot();
    return aggregateRecords(view.records, query, this.config);
  }

  /** Filtered total over a range; 0 for no data. */
  total(filter: Scope | undefined, range: TimeWindow, snapshot?: CostSnapshot): { amountMinorUnits: number; recordCount: number } {
    const view = snapshot ?? this.store.snapshot();
    const selected = selectRecords(view.records, filter, range);
    return { amountMinorUnits: sumMinorUnits(selected), recordCount: selected.length };
  }
}
