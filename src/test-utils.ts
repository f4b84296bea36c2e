/**
 * Shared fixtures for unit tests.
 */

import type { CostRecord, RawCostFact } from "./types.js";

export function makeRecord(overrides: Partial<CostRecord> = {}): CostRecord {
  const amount = overrides.amountMinorUnits ?? 1000;
  const currency = overrides.currency ?? "USD";
  return {
    cloud: "AWS",
    accountId: "A1",
    service: "EC2",
    providerService: "AmazonEC2",
    unmappedService: false,
    tags: {},
    chargeType: "usage",
    periodStart: "2024-03-01T00:00:00.000Z",
    periodEnd: "2024-03-02T00:00:00.000Z",
    amountMinorUnits: amount,
    currency,
    originalAmountMinorUnits: amount,
    originalCurrency: currency,
    ingestedAt: "2024-03-02T01:00:00.000Z",
    sourceBatchId: "test-batch",
    ...overrides,
  };
}

/** A canonical-field fact as the JSON file adapter would read it. */
export function makeOtherFact(fields: Record<string, unknown> = {}): RawCostFact {
  return {
    cloud: "Other",
    fields: {
      accountId: "acct-1",
      service: "Hosting",
      periodStart: "2024-03-01T00:00:00Z",
      periodEnd: "2024-03-02T00:00:00Z",
      amount: "10.00",
      currency: "USD",
      ...fields,
    },
  };
}

export function makeAwsFact(fields: Record<string, unknown> = {}): RawCostFact {
  return {
    cloud: "AWS",
    fields: {
      "lineItem/UsageAccountId": "A1",
      "lineItem/ProductCode": "AmazonEC2",
      "lineItem/ResourceId": "i-0abc",
      "lineItem/UsageStartDate": "2024-03-01T00:00:00Z",
      "lineItem/UsageEndDate": "2024-03-02T00:00:00Z",
      "lineItem/UnblendedCost": "120.00",
      "lineItem/CurrencyCode": "USD",
      "lineItem/LineItemType": "Usage",
      ...fields,
    },
  };
}
