/**
 * Normalizer — Tests
 *
 * Covers: provider field readers, validation, catalog mapping, tag
 * resolution, currency conversion, pending facts and in-batch dedup.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Normalizer } from "./normalizer.js";
import { resolveTags } from "./tags.js";
import { mapService } from "./catalog.js";
import { findRate } from "./currency.js";
import { resolveConfig } from "../config/loader.js";
import { createLedgerLogger, MemoryTransport } from "../logging/index.js";
import { makeAwsFact, makeOtherFact } from "../test-utils.js";
import type { EngineConfig } from "../config/schema.js";
import type { RawCostFact } from "../types.js";

const INGESTED_AT = "2024-03-10T00:00:00.000Z";

function makeNormalizer(config: EngineConfig): { normalizer: Normalizer; transport: MemoryTransport } {
  const transport = new MemoryTransport();
  const logger = createLedgerLogger("test", { level: "debug", transports: [transport] });
  return { normalizer: new Normalizer(config, logger), transport };
}

// ── Tag resolution ───────────────────────────────────────────────

describe("resolveTags", () => {
  const policy = { team: ["team", "owner-team", "squad"], product: ["product", "app"] };

  it("lower-cases keys and trims values", () => {
    expect(resolveTags([["Env", "  prod "]], policy)).toEqual({ env: "prod" });
  });

  it("fills team from the first alias that has a value", () => {
    const tags = resolveTags(
      [
        ["squad", "platform"],
        ["owner-team", "payments"],
      ],
      policy,
    );
    expect(tags.team).toBe("payments");
  });

  it("skips aliases with empty values", () => {
    const tags = resolveTags(
      [
        ["team", ""],
        ["squad", "platform"],
      ],
      policy,
    );
    expect(tags.team).toBe("platform");
  });

  it("resolves key collisions by original spelling", () => {
    const tags = resolveTags(
      [
        ["team", "lower"],
        ["Team", "upper"],
      ],
      policy,
    );
    expect(tags).toEqual({ team: "upper" });
  });

  it("fills product from its aliases", () => {
    expect(resolveTags([["app", "checkout"]], policy)).toEqual({ app: "checkout", product: "checkout" });
  });
});

// ── Catalog and rates ────────────────────────────────────────────

describe("mapService", () => {
  const catalog = { AWS: { AmazonEC2: "EC2" }, GCP: {}, Azure: {}, Other: {} };

  it("maps exact names", () => {
    expect(mapService(catalog, "AWS", "AmazonEC2")).toEqual({ service: "EC2", mapped: true });
  });

  it("falls back to a case-insensitive match", () => {
    expect(mapService(catalog, "AWS", "amazonec2")).toEqual({ service: "EC2", mapped: true });
  });

  it("maps unknown names to Other", () => {
    expect(mapService(catalog, "AWS", "AmazonNeptune")).toEqual({ service: "Other", mapped: false });
    expect(mapService(catalog, "GCP", "AmazonEC2")).toEqual({ service: "Other", mapped: false });
  });

  it("does not match Object.prototype members", () => {
    expect(mapService(catalog, "AWS", "constructor")).toEqual({ service: "Other", mapped: false });
    expect(mapService(catalog, "AWS", "toString")).toEqual({ service: "Other", mapped: false });
    expect(mapService(catalog, "AWS", "__proto__")).toEqual({ service: "Other", mapped: false });
  });
});

describe("findRate", () => {
  const rates = [
    { currency: "EUR", effectiveFrom: "2023-01-01T00:00:00Z", rate: 1.05 },
    { currency: "EUR", effectiveFrom: "2024-01-01T00:00:00Z", rate: 1.1 },
    { currency: "EUR", effectiveFrom: "2024-06-01T00:00:00Z", rate: 1.2 },
    { currency: "GBP", effectiveFrom: "2024-01-01T00:00:00Z", rate: 1.27 },
  ];

  it("picks the latest rate in effect", () => {
    expect(findRate(rates, "EUR", "2024-03-05T00:00:00.000Z")?.rate).toBe(1.1);
  });

  it("treats effectiveFrom as inclusive", () => {
    expect(findRate(rates, "EUR", "2024-06-01T00:00:00.000Z")?.rate).toBe(1.2);
  });

  it("returns null before the first rate", () => {
    expect(findRate(rates, "EUR", "2022-12-31T00:00:00.000Z")).toBeNull();
    expect(findRate(rates, "JPY", "2024-03-05T00:00:00.000Z")).toBeNull();
  });
});

// ── Normalizer ───────────────────────────────────────────────────

describe("Normalizer", () => {
  let config: EngineConfig;

  beforeEach(() => {
    config = resolveConfig({
      serviceCatalog: { Other: { Hosting: "Hosting" } },
      currencyRates: [
        { currency: "EUR", effectiveFrom: "2024-01-01T00:00:00Z", rate: 1.1 },
        { currency: "JPY", effectiveFrom: "2024-01-01T00:00:00Z", rate: 0.0067 },
      ],
    });
  });

  it("normalizes an AWS CUR line", () => {
    const { normalizer } = makeNormalizer(config);
    const result = normalizer.normalize([makeAwsFact()], { batchId: "b1", ingestedAt: INGESTED_AT });

    expect(result.rejected).toEqual([]);
    expect(result.pending).toEqual([]);
    expect(result.issues).toEqual([]);
    expect(result.records).toEqual([
      {
        cloud: "AWS",
        accountId: "A1",
        service: "EC2",
        providerService: "AmazonEC2",
        unmappedService: false,
        resourceId: "i-0abc",
        tags: {},
        chargeType: "usage",
        periodStart: "2024-03-01T00:00:00.000Z",
        periodEnd: "2024-03-02T00:00:00.000Z",
        amountMinorUnits: 12000,
        currency: "USD",
        originalAmountMinorUnits: 12000,
        originalCurrency: "USD",
        ingestedAt: INGESTED_AT,
        sourceBatchId: "b1",
      },
    ]);
  });

  it("reads AWS user tags and resolves the team", () => {
    const { normalizer } = makeNormalizer(config);
    const fact = makeAwsFact({ "resourceTags/user:Owner-Team": " payments ", "resourceTags/user:env": "prod" });
    const [record] = normalizer.normalize([fact], { batchId: "b1", ingestedAt: INGESTED_AT }).records;
    expect(record.tags).toEqual({ env: "prod", "owner-team": "payments", team: "payments" });
  });

  it("maps AWS line item types to charge types", () => {
    const { normalizer } = makeNormalizer(config);
    const result = normalizer.normalize(
      [
        makeAwsFact({ "lineItem/LineItemType": "Tax", "lineItem/UnblendedCost": "9.60" }),
        makeAwsFact({ "lineItem/LineItemType": "Credit", "lineItem/UnblendedCost": "-20.00" }),
      ],
      { batchId: "b1", ingestedAt: INGESTED_AT },
    );
    expect(result.records.map((r) => [r.chargeType, r.amountMinorUnits])).toEqual([
      ["tax", 960],
      ["credit", -2000],
    ]);
  });

  it("splits GCP credits into their own negative record", () => {
    const { normalizer } = makeNormalizer(config);
    const fact: RawCostFact = {
      cloud: "GCP",
      fields: {
        billing_account_id: "billing-1",
        project: { id: "proj-a" },
        service: { description: "Kubernetes Engine" },
        "resource.name": "cluster-1",
        usage_start_time: "2024-03-01T00:00:00Z",
        usage_end_time: "2024-03-02T00:00:00Z",
        cost: 50.5,
        currency: "USD",
        cost_type: "regular",
        labels: [
          { key: "team", value: "data" },
          { key: "env", value: "prod" },
        ],
        credits: [{ name: "Sustained use", amount: -5.25 }],
      },
    };

    const result = normalizer.normalize([fact], { batchId: "b1", ingestedAt: INGESTED_AT });
    expect(result.records).toHaveLength(2);

    const [usage, credit] = result.records;
    expect(usage.service).toBe("GKE");
    expect(usage.projectId).toBe("proj-a");
    expect(usage.resourceId).toBe("cluster-1");
    expect(usage.tags).toEqual({ env: "prod", team: "data" });
    expect(usage.amountMinorUnits).toBe(5050);
    expect(credit.chargeType).toBe("credit");
    expect(credit.amountMinorUnits).toBe(-525);
  });

  it("reads Azure daily exports and converts EUR", () => {
    const { normalizer } = makeNormalizer(config);
    const fact: RawCostFact = {
      cloud: "Azure",
      fields: {
        SubscriptionId: "sub-1",
        ResourceGroup: "rg-ml",
        MeterCategory: "virtual machines",
        ResourceId: "/subscriptions/sub-1/vm-1",
        Date: "2024-03-05",
        CostInBillingCurrency: "12.345",
        BillingCurrency: "EUR",
        ChargeType: "Usage",
        Tags: '"team": "ml", "env": "prod"',
      },
    };

    const [record] = normalizer.normalize([fact], { batchId: "b1", ingestedAt: INGESTED_AT }).records;
    expect(record.service).toBe("Virtual Machines");
    expect(record.unmappedService).toBe(false);
    expect(record.projectId).toBe("rg-ml");
    expect(record.periodStart).toBe("2024-03-05T00:00:00.000Z");
    expect(record.periodEnd).toBe("2024-03-06T00:00:00.000Z");
    expect(record.originalAmountMinorUnits).toBe(1235);
    expect(record.originalCurrency).toBe("EUR");
    expect(record.amountMinorUnits).toBe(1359);
    expect(record.currency).toBe("USD");
    expect(record.tags.team).toBe("ml");
  });

  it("honours zero-decimal currencies", () => {
    const { normalizer } = makeNormalizer(config);
    const [record] = normalizer.normalize([makeOtherFact({ amount: "1500", currency: "JPY" })], {
      batchId: "b1",
      ingestedAt: INGESTED_AT,
    }).records;
    expect(record.originalAmountMinorUnits).toBe(1500);
    expect(record.amountMinorUnits).toBe(1005);
  });

  it("holds facts without a rate as pending", () => {
    const { normalizer } = makeNormalizer(config);
    const fact = makeOtherFact({ currency: "GBP" });
    const result = normalizer.normalize([fact, makeOtherFact({ accountId: "acct-2" })], {
      batchId: "b1",
      ingestedAt: INGESTED_AT,
    });

    expect(result.records).toHaveLength(1);
    expect(result.records[0].accountId).toBe("acct-2");
    expect(result.pending).toEqual([
      {
        fact,
        batchId: "b1",
        reason: "No GBP→USD rate in effect at 2024-03-01T00:00:00.000Z",
        heldAt: INGESTED_AT,
      },
    ]);
    expect(result.issues.map((i) => i.code)).toEqual(["CurrencyConversionUnavailable"]);
  });

  it("keeps unmapped services as Other and reports each once", () => {
    const { normalizer } = makeNormalizer(config);
    const result = normalizer.normalize(
      [makeOtherFact({ service: "Mystery" }), makeOtherFact({ service: "Mystery", accountId: "acct-2" })],
      { batchId: "b1", ingestedAt: INGESTED_AT },
    );

    expect(result.records).toHaveLength(2);
    expect(result.records[0].service).toBe("Other");
    expect(result.records[0].providerService).toBe("Mystery");
    expect(result.records[0].unmappedService).toBe(true);
    expect(result.issues).toEqual([
      { code: "UnmappableService", message: 'No catalog entry for Other service "Mystery"', cloud: "Other", accountId: "acct-1" },
    ]);
  });

  it("rejects an empty interval without blocking the batch", () => {
    const { normalizer, transport } = makeNormalizer(config);
    const bad = makeOtherFact({ periodEnd: "2024-03-01T00:00:00Z" });
    const result = normalizer.normalize([bad, makeOtherFact({ accountId: "acct-2" })], {
      batchId: "b1",
      ingestedAt: INGESTED_AT,
    });

    expect(result.records).toHaveLength(1);
    expect(result.rejected).toHaveLength(1);
    expect(result.rejected[0].fact).toBe(bad);
    expect(result.rejected[0].issue.code).toBe("InvalidInterval");
    expect(transport.entries.some((e) => e.level === "warn")).toBe(true);
  });

  it("rejects amounts with the wrong sign for their charge type", () => {
    const { normalizer } = makeNormalizer(config);
    const result = normalizer.normalize(
      [
        makeOtherFact({ amount: "-1.00" }),
        makeOtherFact({ chargeType: "credit", amount: "5.00" }),
        makeOtherFact({ chargeType: "refund", amount: "-5.00" }),
      ],
      { batchId: "b1", ingestedAt: INGESTED_AT },
    );

    expect(result.rejected.map((r) => r.issue.code)).toEqual(["InvalidAmountSign", "InvalidAmountSign"]);
    expect(result.records.map((r) => [r.chargeType, r.amountMinorUnits])).toEqual([["refund", -500]]);
  });

  it("rejects facts with missing fields", () => {
    const { normalizer } = makeNormalizer(config);
    const result = normalizer.normalize(
      [makeOtherFact({ accountId: "" }), makeOtherFact({ amount: "abc" }), makeOtherFact({ periodStart: undefined })],
      { batchId: "b1", ingestedAt: INGESTED_AT },
    );
    expect(result.records).toEqual([]);
    expect(result.rejected.map((r) => r.issue.code)).toEqual(["MissingField", "MissingField", "MissingField"]);
  });

  it("keeps GCP projects under one billing account apart", () => {
    const { normalizer } = makeNormalizer(config);
    const gcpFact = (project: string, cost: number): RawCostFact => ({
      cloud: "GCP",
      fields: {
        billing_account_id: "billing-1",
        project: { id: project },
        service: { description: "BigQuery" },
        usage_start_time: "2024-03-01T00:00:00Z",
        usage_end_time: "2024-03-01T01:00:00Z",
        cost,
        currency: "USD",
      },
    });

    const result = normalizer.normalize([gcpFact("proj-a", 10), gcpFact("proj-b", 25)], {
      batchId: "b1",
      ingestedAt: INGESTED_AT,
    });
    expect(result.records.map((r) => [r.projectId, r.amountMinorUnits])).toEqual([
      ["proj-a", 1000],
      ["proj-b", 2500],
    ]);
  });

  it("treats provider values that name Object.prototype members as plain strings", () => {
    const { normalizer } = makeNormalizer(config);
    const result = normalizer.normalize(
      [
        makeAwsFact({ "lineItem/ProductCode": "toString", "lineItem/LineItemType": "constructor" }),
        makeOtherFact({ service: "Hosting" }),
      ],
      { batchId: "b1", ingestedAt: INGESTED_AT },
    );
    expect(result.rejected).toEqual([]);
    expect(result.records.map((r) => [r.service, r.providerService, r.chargeType, r.unmappedService])).toEqual([
      ["Other", "toString", "usage", true],
      ["Hosting", "Hosting", "usage", false],
    ]);
  });

  it("keeps the last duplicate line in a batch", () => {
    const { normalizer } = makeNormalizer(config);
    const result = normalizer.normalize(
      [makeAwsFact({ "lineItem/UnblendedCost": "10.00" }), makeAwsFact({ "lineItem/UnblendedCost": "12.50" })],
      { batchId: "b1", ingestedAt: INGESTED_AT },
    );
    expect(result.records).toHaveLength(1);
    expect(result.records[0].amountMinorUnits).toBe(1250);
  });

  it("produces identical output for identical input", () => {
    const { normalizer } = makeNormalizer(config);
    const facts = [makeAwsFact(), makeOtherFact({ service: "Mystery" }), makeOtherFact({ currency: "EUR" })];
    const first = normalizer.normalize(facts, { batchId: "b1", ingestedAt: INGESTED_AT });
    const second = normalizer.normalize(facts, { batchId: "b1", ingestedAt: INGESTED_AT });
    expect(second).toEqual(first);
  });
});
