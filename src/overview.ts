/**
 * Cloud Ledger — Overview
 *
 * One read for the landing view: month-to-date spend against the previous
 * full month, the top services, open violations by severity, budget
 * health and the savings the optimization feed has identified. Every
 * figure comes from the same store snapshot.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { compareGroupedTotals, percentage } from "./aggregation/engine.js";
import type { AggregationEngine } from "./aggregation/engine.js";
import type { BudgetManager } from "./budgets/manager.js";
import type { BudgetStatus } from "./budgets/types.js";
import type { EngineConfig } from "./config/schema.js";
import { ConfigurationError, InvalidQueryError, errorMessage } from "./errors.js";
import type { GovernanceEngine } from "./governance/engine.js";
import type { PolicySeverity } from "./governance/types.js";
import { getLedgerLogger, type LedgerLogger } from "./logging/index.js";
import { addUtcMonths, monthWindow, startOfUtcMonth, toIsoInstant, toMs } from "./time.js";
import type { CostStore, GroupedTotal, Recommendation, TimeWindow } from "./types.js";

export const TOP_SERVICES = 5;

export type SpendSummary = {
  range: TimeWindow;
  amountMinorUnits: number;
  recordCount: number;
};

export type Overview = {
  asOf: string;
  currency: string;
  monthToDate: SpendSummary;
  previousMonth: SpendSummary;
  /** Month-to-date minus the previous full month. */
  deltaMinorUnits: number;
  /** Null when the previous month has no spend. */
  deltaPct: number | null;
  topServices: GroupedTotal[];
  openViolations: Record<PolicySeverity, number> & { total: number };
  budgets: BudgetStatus[];
  savings: {
    totalEstimatedMinorUnits: number;
    recommendationCount: number;
    byCategory: Array<{ category: string; amountMinorUnits: number }>;
  };
  insufficientData: boolean;
};

export type OverviewOptions = {
  asOf: Date | string;
  recommendations?: readonly Recommendation[];
};

export class OverviewService {
  private readonly logger: LedgerLogger;

  constructor(
    private readonly store: CostStore,
    private readonly aggregation: AggregationEngine,
    private readonly budgets: BudgetManager,
    private readonly governance: GovernanceEngine,
    private readonly config: EngineConfig,
    logger?: LedgerLogger,
  ) {
    this.logger = logger ?? getLedgerLogger("overview");
  }

  async buildOverview(options: OverviewOptions): Promise<Overview> {
    const asOf = toIsoInstant(options.asOf);
    if (asOf === null) throw new InvalidQueryError(`Invalid asOf: ${String(options.asOf)}`);

    const snapshot = this.store.snapshot();
    const asOfMs = toMs(asOf);
    const monthStart = startOfUtcMonth(asOfMs);
    const mtdRange: TimeWindow = { start: new Date(monthStart).toISOString(), end: asOf };
    const previousRange = monthWindow(addUtcMonths(monthStart, -1));

    const mtd = this.aggregation.total(undefined, mtdRange, snapshot);
    const previous = this.aggregation.total(undefined, previousRange, snapshot);
    const delta = mtd.amountMinorUnits - previous.amountMinorUnits;

    // At the first instant of a month the month-to-date range is empty.
    const topServices =
      mtdRange.start < mtdRange.end
        ? this.aggregation.aggregate({ groupBy: "service", range: mtdRange }, snapshot).rows.slice(0, TOP_SERVICES)
        : [];

    const openViolations = { critical: 0, high: 0, medium: 0, low: 0, total: 0 };
    for (const v of await this.governance.listViolations({ status: "open" })) {
      openViolations[v.severity]++;
      openViolations.total++;
    }

    const overview: Overview = {
      asOf,
      currency: this.config.defaultCurrency,
      monthToDate: { range: mtdRange, ...mtd },
      previousMonth: { range: previousRange, ...previous },
      deltaMinorUnits: delta,
      deltaPct: previous.amountMinorUnits === 0 ? null : percentage(delta, Math.abs(previous.amountMinorUnits)),
      topServices,
      openViolations,
      budgets: this.budgets.evaluateAll(asOf, snapshot),
      savings: summarizeSavings(options.recommendations ?? []),
      insufficientData: mtd.recordCount === 0 && previous.recordCount === 0,
    };

    this.logger.debug("Overview built", {
      asOf,
      openViolations: openViolations.total,
      budgets: overview.budgets.length,
    });
    return overview;
  }
}

export const recommendationSchema = z.object({
  resourceId: z.string().min(1),
  estimatedSavingsMinorUnits: z.number().int(),
  category: z.string().min(1),
});

/** Read a recommendation feed exported by the optimization engine. */
export function loadRecommendations(path: string): Recommendation[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read recommendations from ${path}: ${errorMessage(err)}`);
  }
  const parsed = z.array(recommendationSchema).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Recommendation feed ${path} is malformed`, "InvalidConfig", [parsed.error.message]);
  }
  return parsed.data;
}

export function summarizeSavings(recommendations: readonly Recommendation[]): Overview["savings"] {
  const byCategory = new Map<string, number>();
  let total = 0;
  for (const r of recommendations) {
    total += r.estimatedSavingsMinorUnits;
    byCategory.set(r.category, (byCategory.get(r.category) ?? 0) + r.estimatedSavingsMinorUnits);
  }
  return {
    totalEstimatedMinorUnits: total,
    recommendationCount: recommendations.length,
    byCategory: [...byCategory.entries()]
      .map(([category, amountMinorUnits]) => ({ key: category, category, amountMinorUnits }))
      .sort(compareGroupedTotals)
      .map(({ category, amountMinorUnits }) => ({ category, amountMinorUnits })),
  };
}
