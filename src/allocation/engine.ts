/**
 * Cloud Ledger — Allocation Engine
 *
 * Chargeback/showback: distributes spend in a range over teams or products
 * by tag, by account mapping, or by fixed shares. The allocations always
 * add back up to the aggregate total; anything that does not is a defect.
 */

import { UNALLOCATED, compareGroupedTotals, percentage, selectRecords, sumMinorUnits } from "../aggregation/engine.js";
import type { EngineConfig } from "../config/schema.js";
import { ConfigurationError, ConsistencyViolationError, InvalidQueryError } from "../errors.js";
import { getLedgerLogger, type LedgerLogger } from "../logging/index.js";
import { intersectScopes, ownValue, tagValue } from "../scope.js";
import { isValidWindow } from "../time.js";
import type { CostRecord, CostSnapshot, CostStore, Scope, TimeWindow } from "../types.js";
import { validateAllocationRule, type AllocationRule } from "./rules.js";

export type Allocation = {
  key: string;
  amountMinorUnits: number;
  pctOfTotal: number;
};

export type AllocationResult = {
  ruleId: string;
  dimension: AllocationRule["dimension"];
  method: AllocationRule["method"]["kind"];
  range: TimeWindow;
  allocations: Allocation[];
  totalMinorUnits: number;
  unallocatedMinorUnits: number;
  currency: string;
  recordCount: number;
};

export type AllocationQuery = {
  filter?: Scope;
  range: TimeWindow;
};

/**
 * Split `amount` by shares. Each share is truncated toward zero and the
 * remainder goes to the largest share (ties to the smallest key).
 */
export function splitByShares(amount: number, shares: Record<string, number>): Array<[string, number]> {
  const keys = Object.keys(shares).sort();
  const parts: Array<[string, number]> = keys.map((key) => [
    key,
    // toFixed trims float noise such as 6999.999999999999 before truncating.
    Math.trunc(Number((amount * shares[key]).toFixed(6))),
  ]);

  let largest = 0;
  for (let i = 1; i < keys.length; i++) {
    if (shares[keys[i]] > shares[keys[largest]]) largest = i;
  }

  const remainder = amount - parts.reduce((sum, [, part]) => sum + part, 0);
  parts[largest][1] += remainder;
  return parts;
}

function allocationKeys(rule: AllocationRule, record: CostRecord): Array<[string, number]> {
  const { method } = rule;
  switch (method.kind) {
    case "tag":
      return [[tagValue(record.tags, method.tagKey) || UNALLOCATED, record.amountMinorUnits]];
    case "account":
      return [[ownValue(method.accountMap, record.accountId) ?? UNALLOCATED, record.amountMinorUnits]];
    case "fixed_percentage":
      return splitByShares(record.amountMinorUnits, method.shares);
  }
}

export class AllocationEngine {
  private readonly logger: LedgerLogger;

  constructor(
    private readonly store: CostStore,
    private readonly config: EngineConfig,
    logger?: LedgerLogger,
  ) {
    this.logger = logger ?? getLedgerLogger("allocation");
  }

  /** Allocate with a configured rule. */
  allocateById(ruleId: string, query: AllocationQuery, snapshot?: CostSnapshot): AllocationResult {
    const rule = this.config.allocationRules.find((r) => r.id === ruleId);
    if (!rule) {
      throw new ConfigurationError(`Unknown allocation rule "${ruleId}"`, "UnknownAllocationRule");
    }
    return this.allocate(rule, query, snapshot);
  }

  allocate(rule: AllocationRule, query: AllocationQuery, snapshot?: CostSnapshot): AllocationResult {
    validateAllocationRule(rule);
    if (!isValidWindow(query.range)) {
      throw new InvalidQueryError(`Range ${query.range.start} .. ${query.range.end} is empty or malformed`);
    }

    const view = snapshot ?? this.store.snapshot();
    const records = selectRecords(view.records, intersectScopes(rule.scope, query.filter), query.range);
    const total = sumMinorUnits(records);

    const amounts = new Map<string, number>([[UNALLOCATED, 0]]);
    for (const record of records) {
      for (const [key, amount] of allocationKeys(rule, record)) {
        amounts.set(key, (amounts.get(key) ?? 0) + amount);
      }
    }

    const allocated = [...amounts.values()].reduce((sum, a) => sum + a, 0);
    if (allocated !== total) {
      const details = { ruleId: rule.id, totalMinorUnits: total, allocatedMinorUnits: allocated };
      this.logger.fatal("Allocation does not add up to the aggregate total", details);
      throw new ConsistencyViolationError(
        `Allocation "${rule.id}" distributed ${allocated} of ${total} minor units`,
        details,
      );
    }

    const allocations: Allocation[] = [...amounts.entries()]
      .map(([key, amountMinorUnits]) => ({ key, amountMinorUnits, pctOfTotal: percentage(amountMinorUnits, total) }))
      .sort(compareGroupedTotals);

    return {
      ruleId: rule.id,
      dimension: rule.dimension,
      method: rule.method.kind,
      range: { ...query.range },
      allocations,
      totalMinorUnits: total,
      unallocatedMinorUnits: amounts.get(UNALLOCATED) ?? 0,
      currency: this.config.defaultCurrency,
      recordCount: records.length,
    };
  }
}
