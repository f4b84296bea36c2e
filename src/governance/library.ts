/**
 * Governance — Built-in Policy Library
 *
 * Default cost-governance policies installed unless configuration opts out.
 */

import type { PolicyInput } from "./types.js";

export interface LibraryPolicy {
  id: string;
  name: string;
  description: string;
  category: string;
  template: PolicyInput;
}

export const APPROVED_PRODUCTION_REGIONS = ["us-east-1", "us-east-2", "us-west-2"];

export const POLICY_LIBRARY: LibraryPolicy[] = [
  // ── Cost ──────────────────────────────────────────────────────
  {
    id: "no-gpu-instances",
    name: "No GPU Instances",
    description: "Flag GPU instance families (p2, p3, p4, g4, g5)",
    category: "cost",
    template: {
      id: "no-gpu-instances",
      name: "No GPU Instances",
      description: "GPU instance families need an approved exception",
      severity: "high",
      scope: { clouds: ["AWS"] },
      rule: {
        kind: "resource_attribute",
        condition: { type: "field_matches", field: "metadata.instanceType", pattern: "^(p2|p3|p4|g4|g5)[a-z]*\\." },
        message: "Resource runs a GPU instance type",
      },
    },
  },
  {
    id: "account-monthly-spend",
    name: "Account Monthly Spend Threshold",
    description: "Flag accounts spending more than 10,000.00 in a month",
    category: "cost",
    template: {
      id: "account-monthly-spend",
      name: "Account Monthly Spend Threshold",
      description: "Account spend over the window exceeds the threshold",
      severity: "medium",
      rule: { kind: "spend_threshold", thresholdMinorUnits: 1_000_000, per: "account" },
    },
  },

  // ── Tagging ───────────────────────────────────────────────────
  {
    id: "required-cost-tags",
    name: "Required Cost-Allocation Tags",
    description: "Every resource carries team, environment and cost-center tags",
    category: "tagging",
    template: {
      id: "required-cost-tags",
      name: "Required Cost-Allocation Tags",
      description: "Untagged spend cannot be charged back",
      severity: "medium",
      rule: { kind: "tag_presence", requiredTags: ["team", "environment", "cost-center"] },
    },
  },

  // ── Compliance ────────────────────────────────────────────────
  {
    id: "production-approved-regions",
    name: "Production in Approved Regions",
    description: `Production resources run only in ${APPROVED_PRODUCTION_REGIONS.join(", ")}`,
    category: "compliance",
    template: {
      id: "production-approved-regions",
      name: "Production in Approved Regions",
      description: "Production workloads outside approved regions",
      severity: "high",
      rule: {
        kind: "resource_attribute",
        condition: {
          type: "and",
          conditions: [
            { type: "tag_equals", tag: "environment", value: "production" },
            { type: "field_exists", field: "metadata.region" },
            { type: "field_not_in", field: "metadata.region", values: APPROVED_PRODUCTION_REGIONS },
          ],
        },
        message: "Production resource is outside the approved regions",
      },
    },
  },
];

export function getLibraryPolicies(): LibraryPolicy[] {
  return POLICY_LIBRARY;
}

export function getLibraryPolicy(id: string): LibraryPolicy | undefined {
  return POLICY_LIBRARY.find((p) => p.id === id);
}
