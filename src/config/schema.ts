/**
 * Ledger Configuration Schema
 *
 * The engine reads every piece of shared configuration (tag policy,
 * service catalog, currency rates, allocation rules) from one versioned
 * object so that a (store snapshot, config) pair reproduces any result.
 */

import { z } from "zod";
import type { RuleCondition } from "../governance/types.js";

// =============================================================================
// Zod Schemas
// =============================================================================

export const cloudSchema = z.enum(["AWS", "GCP", "Azure", "Other"]);

const currencyCodeSchema = z.string().regex(/^[A-Z]{3}$/, "expected an ISO 4217 currency code");

const isoDateSchema = z
  .string()
  .refine((v) => !Number.isNaN(Date.parse(v)), { message: "expected an ISO-8601 date" });

export const scopeSchema = z
  .object({
    clouds: z.array(cloudSchema).optional(),
    accountIds: z.array(z.string().min(1)).optional(),
    projectIds: z.array(z.string().min(1)).optional(),
    services: z.array(z.string().min(1)).optional(),
    resourceIds: z.array(z.string().min(1)).optional(),
    tags: z.record(z.string().min(1), z.union([z.string(), z.array(z.string())])).optional(),
  })
  .strict();

/**
 * Canonical tag → provider tag keys that carry it, in priority order.
 */
export const tagPolicySchema = z.object({
  team: z.array(z.string().min(1)).default(["team", "owner-team", "squad"]),
  product: z.array(z.string().min(1)).default(["product", "application", "app"]),
});

export const serviceCatalogSchema = z.object({
  AWS: z.record(z.string(), z.string()).default({}),
  GCP: z.record(z.string(), z.string()).default({}),
  Azure: z.record(z.string(), z.string()).default({}),
  Other: z.record(z.string(), z.string()).default({}),
});

export const currencyRateSchema = z.object({
  currency: currencyCodeSchema,
  effectiveFrom: isoDateSchema,
  /** Units of the default currency per one unit of `currency`. */
  rate: z.number().positive(),
});

export const allocationMethodSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("tag"), tagKey: z.string().min(1) }),
  z.object({ kind: z.literal("account"), accountMap: z.record(z.string(), z.string().min(1)) }),
  z.object({ kind: z.literal("fixed_percentage"), shares: z.record(z.string(), z.number()) }),
]);

export const allocationRuleSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  dimension: z.enum(["team", "product"]),
  method: allocationMethodSchema,
  scope: scopeSchema.optional(),
});

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

const conditionValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const ruleConditionSchema: z.ZodType<RuleCondition> = z.lazy(() =>
  z.discriminatedUnion("type", [
    z.object({ type: z.literal("field_equals"), field: z.string().min(1), value: conditionValueSchema }),
    z.object({ type: z.literal("field_not_equals"), field: z.string().min(1), value: conditionValueSchema }),
    z.object({ type: z.literal("field_contains"), field: z.string().min(1), value: z.string() }),
    z.object({
      type: z.literal("field_matches"),
      field: z.string().min(1),
      pattern: z.string().refine(isValidPattern, { message: "invalid regular expression" }),
    }),
    z.object({ type: z.literal("field_gt"), field: z.string().min(1), value: z.number() }),
    z.object({ type: z.literal("field_gte"), field: z.string().min(1), value: z.number() }),
    z.object({ type: z.literal("field_lt"), field: z.string().min(1), value: z.number() }),
    z.object({ type: z.literal("field_exists"), field: z.string().min(1) }),
    z.object({ type: z.literal("field_not_exists"), field: z.string().min(1) }),
    z.object({ type: z.literal("field_in"), field: z.string().min(1), values: z.array(conditionValueSchema).min(1) }),
    z.object({ type: z.literal("field_not_in"), field: z.string().min(1), values: z.array(conditionValueSchema).min(1) }),
    z.object({ type: z.literal("tag_missing"), tag: z.string().min(1) }),
    z.object({ type: z.literal("tag_equals"), tag: z.string().min(1), value: z.string() }),
    z.object({ type: z.literal("cloud"), cloud: cloudSchema }),
    z.object({ type: z.literal("service"), service: z.string().min(1) }),
    z.object({ type: z.literal("account"), accountId: z.string().min(1) }),
    z.object({ type: z.literal("and"), conditions: z.array(ruleConditionSchema).min(1) }),
    z.object({ type: z.literal("or"), conditions: z.array(ruleConditionSchema).min(1) }),
    z.object({ type: z.literal("not"), condition: ruleConditionSchema }),
  ]),
);

export const policyRuleSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("tag_presence"), requiredTags: z.array(z.string().min(1)).min(1) }),
  z.object({
    kind: z.literal("spend_threshold"),
    thresholdMinorUnits: z.number().int().nonnegative(),
    per: z.enum(["resource", "account"]),
  }),
  z.object({
    kind: z.literal("resource_attribute"),
    condition: ruleConditionSchema,
    message: z.string().min(1).optional(),
  }),
]);

export const policySeveritySchema = z.enum(["low", "medium", "high", "critical"]);

export const policyInputSchema = z
  .object({
    id: z.string().min(1).optional(),
    name: z.string().min(1),
    description: z.string().optional(),
    severity: policySeveritySchema.optional(),
    status: z.enum(["active", "disabled"]).optional(),
    scope: scopeSchema.optional(),
    rule: policyRuleSchema,
  })
  .strict();

export const governanceConfigSchema = z.object({
  /** Install the default policy library alongside configured policies. */
  includeLibrary: z.boolean().default(true),
  policies: z.array(policyInputSchema).default([]),
});

export const loggingConfigSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  redactPatterns: z.array(z.string()).default([]),
});

export const engineConfigSchema = z.object({
  version: z.string().min(1).default("1"),
  defaultCurrency: currencyCodeSchema.default("USD"),
  /** Percentage points a budget may run ahead of elapsed time and stay on track. */
  budgetTolerancePct: z.number().min(0).max(100).default(5),
  tagPolicy: tagPolicySchema.default({}),
  serviceCatalog: serviceCatalogSchema.default({}),
  currencyRates: z.array(currencyRateSchema).default([]),
  allocationRules: z.array(allocationRuleSchema).default([]),
  storage: z
    .object({
      dbPath: z.string().min(1).optional(),
      budgetsPath: z.string().min(1).optional(),
    })
    .default({}),
  governance: governanceConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

// =============================================================================
// Types
// =============================================================================

export type TagPolicy = z.infer<typeof tagPolicySchema>;
export type ServiceCatalog = z.infer<typeof serviceCatalogSchema>;
export type CurrencyRate = z.infer<typeof currencyRateSchema>;
export type AllocationMethod = z.infer<typeof allocationMethodSchema>;
export type AllocationRule = z.infer<typeof allocationRuleSchema>;
export type GovernanceConfig = z.infer<typeof governanceConfigSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;
