/**
 * Cloud Ledger — Normalizer
 *
 * Turns provider-native billing facts into canonical CostRecords:
 * field reading, interval and sign validation, service catalog mapping,
 * tag resolution, currency conversion and in-batch deduplication.
 *
 * Bad facts are rejected one at a time with a DataQualityIssue; facts
 * without a currency rate are held as pending. Neither blocks the batch.
 */

import type { EngineConfig } from "../config/schema.js";
import { getLedgerLogger, type LedgerLogger } from "../logging/index.js";
import { convertMinorUnits, isCurrencyCode, parseMajorToMinor } from "../money.js";
import { dedupeWithinBatch } from "../store/record-key.js";
import { toIsoInstant, toMs } from "../time.js";
import type {
  ChargeType,
  CostRecord,
  DataQualityIssue,
  DataQualityIssueCode,
  PendingFact,
  RawCostFact,
} from "../types.js";
import { mapService } from "./catalog.js";
import { findRate } from "./currency.js";
import { readProviderLines, type ProviderLine } from "./providers.js";
import { resolveTags } from "./tags.js";

export type NormalizeOptions = {
  batchId: string;
  /** Defaults to now. Pass a fixed value to make the output reproducible. */
  ingestedAt?: string;
};

export type RejectedFact = {
  fact: RawCostFact;
  issue: DataQualityIssue;
};

export type NormalizationResult = {
  records: CostRecord[];
  pending: PendingFact[];
  rejected: RejectedFact[];
  issues: DataQualityIssue[];
};

const NON_NEGATIVE: ReadonlySet<ChargeType> = new Set(["usage", "tax"]);

// =============================================================================
// Normalizer
// =============================================================================

export class Normalizer {
  private readonly logger: LedgerLogger;

  constructor(
    private readonly config: EngineConfig,
    logger?: LedgerLogger,
  ) {
    this.logger = logger ?? getLedgerLogger("normalizer");
  }

  normalize(facts: RawCostFact[], options: NormalizeOptions): NormalizationResult {
    const ingestedAt = options.ingestedAt ?? new Date().toISOString();
    const records: CostRecord[] = [];
    const pending: PendingFact[] = [];
    const rejected: RejectedFact[] = [];
    const issues: DataQualityIssue[] = [];
    const held = new Set<RawCostFact>();
    const unmapped = new Set<string>();

    for (const fact of facts) {
      for (const line of readProviderLines(fact)) {
        const outcome = this.normalizeLine(line, options.batchId, ingestedAt);

        switch (outcome.kind) {
          case "record": {
            const { record } = outcome;
            records.push(record);
            // One issue per unknown service, not per line.
            const key = `${record.cloud}\u0000${record.providerService}`;
            if (record.unmappedService && !unmapped.has(key)) {
              unmapped.add(key);
              issues.push(
                issue("UnmappableService", line, `No catalog entry for ${record.cloud} service "${record.providerService}"`),
              );
            }
            break;
          }

          case "pending":
            if (held.has(fact)) break;
            held.add(fact);
            pending.push({ fact, batchId: options.batchId, reason: outcome.issue.message, heldAt: ingestedAt });
            issues.push(outcome.issue);
            break;

          case "rejected":
            rejected.push({ fact, issue: outcome.issue });
            issues.push(outcome.issue);
            break;
        }
      }
    }

    const deduped = dedupeWithinBatch(records);

    if (rejected.length > 0 || pending.length > 0) {
      this.logger.warn("Normalized batch with data quality issues", {
        batchId: options.batchId,
        records: deduped.length,
        pending: pending.length,
        rejected: rejected.length,
      });
    } else {
      this.logger.debug("Normalized batch", { batchId: options.batchId, records: deduped.length });
    }

    return { records: deduped, pending, rejected, issues };
  }

  private normalizeLine(
    line: ProviderLine,
    batchId: string,
    ingestedAt: string,
  ):
    | { kind: "record"; record: CostRecord }
    | { kind: "pending"; issue: DataQualityIssue }
    | { kind: "rejected"; issue: DataQualityIssue } {
    const reject = (code: DataQualityIssueCode, message: string) =>
      ({ kind: "rejected", issue: issue(code, line, message) }) as const;

    if (!line.accountId) return reject("MissingField", `${line.cloud} fact has no account id`);

    const periodStart = toIsoInstant(line.start);
    const periodEnd = toIsoInstant(line.end);
    if (!periodStart || !periodEnd) {
      return reject("MissingField", `${line.cloud} fact has no usable usage interval`);
    }
    if (toMs(periodStart) >= toMs(periodEnd)) {
      return reject("InvalidInterval", `Usage interval ${periodStart} .. ${periodEnd} is empty or reversed`);
    }

    const originalCurrency = (line.currency ?? "").toUpperCase();
    if (!isCurrencyCode(originalCurrency)) {
      return reject("MissingField", `${line.cloud} fact has no valid currency code`);
    }

    const originalAmount = parseMajorToMinor(line.amount, originalCurrency);
    if (originalAmount === null) {
      return reject("MissingField", `${line.cloud} fact has no parseable amount`);
    }

    if (NON_NEGATIVE.has(line.chargeType) ? originalAmount < 0 : originalAmount > 0) {
      return reject(
        "InvalidAmountSign",
        `A ${line.chargeType} amount of ${originalAmount} has the wrong sign`,
      );
    }

    const defaultCurrency = this.config.defaultCurrency;
    let amount = originalAmount;
    if (originalCurrency !== defaultCurrency) {
      const rate = findRate(this.config.currencyRates, originalCurrency, periodStart);
      if (!rate) {
        return {
          kind: "pending",
          issue: issue(
            "CurrencyConversionUnavailable",
            line,
            `No ${originalCurrency}→${defaultCurrency} rate in effect at ${periodStart}`,
          ),
        };
      }
      amount = convertMinorUnits(originalAmount, originalCurrency, defaultCurrency, rate.rate);
    }

    const providerService = line.providerService ?? "";
    const { service, mapped } = mapService(this.config.serviceCatalog, line.cloud, providerService);

    const record: CostRecord = {
      cloud: line.cloud,
      accountId: line.accountId,
      service,
      providerService,
      unmappedService: !mapped,
      tags: resolveTags(line.tags, this.config.tagPolicy),
      chargeType: line.chargeType,
      periodStart,
      periodEnd,
      amountMinorUnits: amount,
      currency: defaultCurrency,
      originalAmountMinorUnits: originalAmount,
      originalCurrency,
      ingestedAt,
      sourceBatchId: batchId,
    };
    if (line.projectId) record.projectId = line.projectId;
    if (line.resourceId) record.resourceId = line.resourceId;

    return { kind: "record", record };
  }
}

function issue(code: DataQualityIssueCode, line: ProviderLine, message: string): DataQualityIssue {
  const result: DataQualityIssue = { code, message, cloud: line.cloud };
  if (line.accountId) result.accountId = line.accountId;
  if (line.resourceId) result.resourceId = line.resourceId;
  return result;
}
