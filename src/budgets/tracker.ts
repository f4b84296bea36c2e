/**
 * Cloud Ledger — Budget Tracker & Forecaster
 *
 * Consumption is derived from the store at read time over the anchored
 * period containing `asOf`. The forecast is a straight-line run rate over
 * whole elapsed days.
 */

import { percentage, type AggregationEngine } from "../aggregation/engine.js";
import type { EngineConfig } from "../config/schema.js";
import { InvalidBudgetError, InvalidQueryError } from "../errors.js";
import { roundHalfAwayFromZero } from "../money.js";
import { DAY_MS, anchoredPeriod, toIsoInstant, toMs } from "../time.js";
import type { CostSnapshot } from "../types.js";
import type { Budget, BudgetHealth, BudgetStatus, Projection } from "./types.js";

const PERIOD_MONTHS = { monthly: 1, quarterly: 3 } as const;

export class BudgetTracker {
  constructor(
    private readonly aggregation: AggregationEngine,
    private readonly config: EngineConfig,
  ) {}

  get tolerancePct(): number {
    return this.config.budgetTolerancePct;
  }

  /** Throw if the budget cannot be evaluated against this ledger. */
  assertCompatible(budget: Pick<Budget, "id" | "currency">): void {
    if (budget.currency !== this.config.defaultCurrency) {
      throw new InvalidBudgetError(
        `Budget "${budget.id}" is in ${budget.currency}; the ledger reports in ${this.config.defaultCurrency}`,
      );
    }
  }

  evaluate(budget: Budget, asOf: Date | string, snapshot?: CostSnapshot): BudgetStatus {
    this.assertCompatible(budget);

    const asOfIso = toIsoInstant(asOf);
    if (!asOfIso) throw new InvalidQueryError(`Invalid asOf: ${String(asOf)}`);
    const asOfMs = toMs(asOfIso);

    const period = anchoredPeriod(budget.period.anchor, PERIOD_MONTHS[budget.period.kind], asOfMs);
    const startMs = toMs(period.start);
    const endMs = toMs(period.end);
    const cutoffMs = Math.min(asOfMs, endMs);

    let consumed = 0;
    let recordCount = 0;
    if (cutoffMs > startMs) {
      const total = this.aggregation.total(
        budget.scope,
        { start: period.start, end: new Date(cutoffMs).toISOString() },
        snapshot,
      );
      consumed = total.amountMinorUnits;
      recordCount = total.recordCount;
    }

    const daysInPeriod = Math.round((endMs - startMs) / DAY_MS);
    const daysElapsed = Math.floor((cutoffMs - startMs) / DAY_MS);
    const consumedPct = percentage(consumed, budget.amountMinorUnits);
    const expectedPct = percentage(cutoffMs - startMs, endMs - startMs);

    let status: BudgetHealth;
    if (consumed >= budget.amountMinorUnits) {
      status = "over";
    } else if (consumedPct <= expectedPct + this.config.budgetTolerancePct) {
      status = "on_track";
    } else {
      status = "at_risk";
    }

    let forecast: Projection = { kind: "insufficient_data" };
    let variance: Projection = { kind: "insufficient_data" };
    if (daysElapsed > 0) {
      const projected = roundHalfAwayFromZero((consumed * daysInPeriod) / daysElapsed);
      forecast = { kind: "projected", amountMinorUnits: projected };
      variance = { kind: "projected", amountMinorUnits: projected - budget.amountMinorUnits };
    }

    return {
      budgetId: budget.id,
      budgetName: budget.name,
      currency: budget.currency,
      amountMinorUnits: budget.amountMinorUnits,
      consumedMinorUnits: consumed,
      consumedPct,
      expectedPct,
      status,
      forecast,
      variance,
      daysElapsed,
      daysInPeriod,
      periodStart: period.start,
      periodEnd: period.end,
      asOf: asOfIso,
      alertTriggered: consumedPct >= budget.alertThresholdPct,
      insufficientData: recordCount === 0,
    };
  }
}
