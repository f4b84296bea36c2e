/**
 * Allocation rule validation.
 *
 * Rules are checked when configuration is loaded, before any allocation
 * runs, so a bad rule never produces a partial chargeback.
 */

import { InvalidAllocationConfigError } from "../errors.js";
import type { AllocationRule } from "../config/schema.js";

export type { AllocationRule } from "../config/schema.js";

/** Fixed-percentage shares must sum to 1 within this tolerance. */
export const SHARE_EPSILON = 1e-6;

export function allocationRuleIssues(rule: AllocationRule): string[] {
  const issues: string[] = [];
  const { method } = rule;

  switch (method.kind) {
    case "tag":
      if (method.tagKey.trim() === "") issues.push(`${rule.id}: tagKey is empty`);
      break;

    case "account":
      if (Object.keys(method.accountMap).length === 0) {
        issues.push(`${rule.id}: accountMap is empty`);
      }
      break;

    case "fixed_percentage": {
      const entries = Object.entries(method.shares);
      if (entries.length === 0) {
        issues.push(`${rule.id}: shares are empty`);
        break;
      }
      for (const [key, share] of entries) {
        if (!Number.isFinite(share) || share <= 0 || share > 1) {
          issues.push(`${rule.id}: share for "${key}" must be in (0, 1], got ${share}`);
        }
      }
      const sum = entries.reduce((total, [, share]) => total + share, 0);
      if (Math.abs(sum - 1) > SHARE_EPSILON) {
        issues.push(`${rule.id}: shares sum to ${sum}, expected 1`);
      }
      break;
    }
  }

  return issues;
}

export function validateAllocationRule(rule: AllocationRule): void {
  const issues = allocationRuleIssues(rule);
  if (issues.length > 0) {
    throw new InvalidAllocationConfigError(`Allocation rule "${rule.id}" is invalid`, issues);
  }
}

export function validateAllocationRules(rules: AllocationRule[]): void {
  const issues: string[] = [];
  const seen = new Set<string>();
  for (const rule of rules) {
    if (seen.has(rule.id)) issues.push(`${rule.id}: duplicate rule id`);
    seen.add(rule.id);
    issues.push(...allocationRuleIssues(rule));
  }
  if (issues.length > 0) {
    throw new InvalidAllocationConfigError(`${issues.length} allocation rule issue(s)`, issues);
  }
}
