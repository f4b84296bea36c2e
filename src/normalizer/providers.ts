/**
 * Provider field readers.
 *
 * Each cloud reports billing lines under its own field names. A reader
 * lifts a raw fact into one or more ProviderLines with uniform names but
 * still-raw values; validation and conversion happen in the normalizer.
 */

import type { ChargeType, Cloud, RawCostFact } from "../types.js";
import { ownValue } from "../scope.js";
import { DAY_MS, toIsoInstant, toMs } from "../time.js";

export type ProviderLine = {
  cloud: Cloud;
  accountId?: string;
  projectId?: string;
  providerService?: string;
  resourceId?: string;
  start: unknown;
  end: unknown;
  amount: unknown;
  currency?: string;
  chargeType: ChargeType;
  tags: Array<[string, string]>;
};

// =============================================================================
// Field Access
// =============================================================================

/** Read `path` as a flat key first ("project.id"), then as a nested path. */
function field(fields: Record<string, unknown>, path: string): unknown {
  if (path in fields) return fields[path];
  let current: unknown = fields;
  for (const part of path.split(".")) {
    if (current == null || typeof current !== "object") return undefined;
    current = (current as Record<string, unknown>)[part];
  }
  return current;
}

function text(fields: Record<string, unknown>, ...paths: string[]): string | undefined {
  for (const path of paths) {
    const value = field(fields, path);
    if (typeof value === "string" && value.trim() !== "") return value.trim();
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
  }
  return undefined;
}

function tagPairs(value: unknown): Array<[string, string]> {
  if (value == null) return [];

  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "") return [];
    // Azure exports sometimes drop the outer braces.
    const json = trimmed.startsWith("{") ? trimmed : `{${trimmed}}`;
    try {
      return tagPairs(JSON.parse(json));
    } catch {
      return [];
    }
  }

  if (Array.isArray(value)) {
    const pairs: Array<[string, string]> = [];
    for (const item of value) {
      if (item && typeof item === "object") {
        const { key, value: v } = item as { key?: unknown; value?: unknown };
        if (typeof key === "string" && (typeof v === "string" || typeof v === "number")) {
          pairs.push([key, String(v)]);
        }
      }
    }
    return pairs;
  }

  if (typeof value === "object") {
    return Object.entries(value as Record<string, unknown>)
      .filter(([, v]) => typeof v === "string" || typeof v === "number")
      .map(([k, v]) => [k, String(v)]);
  }

  return [];
}

// =============================================================================
// Readers
// =============================================================================

const AWS_CHARGE_TYPES: Record<string, ChargeType> = {
  tax: "tax",
  credit: "credit",
  refund: "refund",
  edpdiscount: "credit",
  bundleddiscount: "credit",
  savingsplannegation: "credit",
};

function readAws(fields: Record<string, unknown>): ProviderLine[] {
  const tags: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(fields)) {
    if (!key.startsWith("resourceTags/")) continue;
    if (typeof value !== "string" || value === "") continue;
    tags.push([key.slice("resourceTags/".length).replace(/^user:/, ""), value]);
  }

  const lineItemType = (text(fields, "lineItem/LineItemType") ?? "Usage").toLowerCase();

  return [
    {
      cloud: "AWS",
      accountId: text(fields, "lineItem/UsageAccountId"),
      providerService: text(fields, "lineItem/ProductCode", "product/ProductName"),
      resourceId: text(fields, "lineItem/ResourceId"),
      start: field(fields, "lineItem/UsageStartDate"),
      end: field(fields, "lineItem/UsageEndDate"),
      amount: field(fields, "lineItem/UnblendedCost"),
      currency: text(fields, "lineItem/CurrencyCode") ?? "USD",
      chargeType: ownValue(AWS_CHARGE_TYPES, lineItemType) ?? "usage",
      tags,
    },
  ];
}

const GCP_CHARGE_TYPES: Record<string, ChargeType> = {
  tax: "tax",
  adjustment: "credit",
};

function readGcp(fields: Record<string, unknown>): ProviderLine[] {
  const base = {
    cloud: "GCP" as const,
    accountId: text(fields, "billing_account_id"),
    projectId: text(fields, "project.id"),
    providerService: text(fields, "service.description"),
    resourceId: text(fields, "resource.global_name", "resource.name"),
    start: field(fields, "usage_start_time"),
    end: field(fields, "usage_end_time"),
    currency: text(fields, "currency") ?? "USD",
    tags: tagPairs(field(fields, "labels")),
  };
  const costType = (text(fields, "cost_type") ?? "regular").toLowerCase();
  const lines: ProviderLine[] = [
    { ...base, amount: field(fields, "cost"), chargeType: ownValue(GCP_CHARGE_TYPES, costType) ?? "usage" },
  ];

  // Credits ride along on the usage row; they become their own negative line.
  const credits = field(fields, "credits");
  if (Array.isArray(credits) && credits.length > 0) {
    const amounts = credits
      .map((c) => (c && typeof c === "object" ? (c as { amount?: unknown }).amount : undefined))
      .map((a) => (typeof a === "number" ? a : typeof a === "string" ? Number(a) : Number.NaN));
    if (amounts.every((a) => Number.isFinite(a))) {
      const total = amounts.reduce((sum, a) => sum + a, 0);
      if (total !== 0) lines.push({ ...base, amount: total, chargeType: "credit" });
    }
  }

  return lines;
}

const AZURE_CHARGE_TYPES: Record<string, ChargeType> = {
  tax: "tax",
  refund: "refund",
  credit: "credit",
  adjustment: "credit",
};

function readAzure(fields: Record<string, unknown>): ProviderLine[] {
  let start = field(fields, "UsageStart");
  let end = field(fields, "UsageEnd");
  if (start === undefined && end === undefined) {
    // Daily exports carry a single Date column.
    const day = toIsoInstant(field(fields, "Date"));
    if (day) {
      start = day;
      end = new Date(toMs(day) + DAY_MS).toISOString();
    }
  }

  const chargeType = (text(fields, "ChargeType") ?? "Usage").toLowerCase();

  return [
    {
      cloud: "Azure",
      accountId: text(fields, "SubscriptionId"),
      projectId: text(fields, "ResourceGroup"),
      providerService: text(fields, "MeterCategory", "ServiceName"),
      resourceId: text(fields, "ResourceId"),
      start,
      end,
      amount: field(fields, "CostInBillingCurrency") ?? field(fields, "Cost"),
      currency: text(fields, "BillingCurrency", "BillingCurrencyCode") ?? "USD",
      chargeType: ownValue(AZURE_CHARGE_TYPES, chargeType) ?? "usage",
      tags: tagPairs(field(fields, "Tags")),
    },
  ];
}

const CHARGE_TYPES: readonly ChargeType[] = ["usage", "tax", "credit", "refund"];

function readOther(fields: Record<string, unknown>): ProviderLine[] {
  const rawChargeType = text(fields, "chargeType")?.toLowerCase();
  const chargeType = CHARGE_TYPES.find((c) => c === rawChargeType) ?? "usage";
  return [
    {
      cloud: "Other",
      accountId: text(fields, "accountId"),
      projectId: text(fields, "projectId"),
      providerService: text(fields, "service"),
      resourceId: text(fields, "resourceId"),
      start: field(fields, "periodStart"),
      end: field(fields, "periodEnd"),
      amount: field(fields, "amount"),
      currency: text(fields, "currency") ?? "USD",
      chargeType,
      tags: tagPairs(field(fields, "tags")),
    },
  ];
}

/** Usage start of a fact as an ISO instant, or null when it has none. */
export function factPeriodStart(fact: RawCostFact): string | null {
  const [line] = readProviderLines(fact);
  return line ? toIsoInstant(line.start) : null;
}

export function readProviderLines(fact: RawCostFact): ProviderLine[] {
  switch (fact.cloud) {
    case "AWS":
      return readAws(fact.fields);
    case "GCP":
      return readGcp(fact.fields);
    case "Azure":
      return readAzure(fact.fields);
    case "Other":
      return readOther(fact.fields);
  }
}
