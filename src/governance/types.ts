/**
 * Governance — Core Types
 *
 * Policies are declarative: a scope, a severity and one rule. The engine
 * evaluates them against per-subject facts built from cost records and
 * resource metadata, and records violations for human review.
 */

import type { Cloud, Scope } from "../types.js";

// ─── Policy Definition ─────────────────────────────────────────────────────────

export type PolicySeverity = "low" | "medium" | "high" | "critical";

export const POLICY_SEVERITIES: readonly PolicySeverity[] = ["critical", "high", "medium", "low"];

export type PolicyStatus = "active" | "disabled";

export type ConditionValue = string | number | boolean | null;

export type RuleCondition =
  | { type: "field_equals"; field: string; value: ConditionValue }
  | { type: "field_not_equals"; field: string; value: ConditionValue }
  | { type: "field_contains"; field: string; value: string }
  | { type: "field_matches"; field: string; pattern: string }
  | { type: "field_gt"; field: string; value: number }
  | { type: "field_gte"; field: string; value: number }
  | { type: "field_lt"; field: string; value: number }
  | { type: "field_exists"; field: string }
  | { type: "field_not_exists"; field: string }
  | { type: "field_in"; field: string; values: ConditionValue[] }
  | { type: "field_not_in"; field: string; values: ConditionValue[] }
  | { type: "tag_missing"; tag: string }
  | { type: "tag_equals"; tag: string; value: string }
  | { type: "cloud"; cloud: Cloud }
  | { type: "service"; service: string }
  | { type: "account"; accountId: string }
  | { type: "and"; conditions: RuleCondition[] }
  | { type: "or"; conditions: RuleCondition[] }
  | { type: "not"; condition: RuleCondition };

export type PolicyRule =
  | { kind: "tag_presence"; requiredTags: string[] }
  | { kind: "spend_threshold"; thresholdMinorUnits: number; per: "resource" | "account" }
  /** Violated when `condition` holds for a subject. */
  | { kind: "resource_attribute"; condition: RuleCondition; message?: string };

export type Policy = {
  id: string;
  name: string;
  description: string;
  severity: PolicySeverity;
  status: PolicyStatus;
  scope?: Scope;
  rule: PolicyRule;
  createdAt: string;
  updatedAt: string;
};

export type PolicyInput = {
  id?: string;
  name: string;
  description?: string;
  severity?: PolicySeverity;
  status?: PolicyStatus;
  scope?: Scope;
  rule: PolicyRule;
};

// ─── Subjects ──────────────────────────────────────────────────────────────────

/** What a policy sees about one resource or account over the window. */
export type SubjectFacts = {
  subjectId: string;
  kind: "resource" | "account";
  cloud: Cloud;
  accountId: string;
  projectId?: string;
  service?: string;
  services: string[];
  resourceId?: string;
  tags: Record<string, string>;
  metadata: Record<string, unknown>;
  spendMinorUnits: number;
};

export interface ResourceMetadataProvider {
  /** Metadata for a resource, or null when the provider does not know it. */
  lookup(resourceId: string): Promise<Record<string, unknown> | null>;
}

// ─── Violations ────────────────────────────────────────────────────────────────

export type ViolationStatus = "open" | "approved" | "rejected";

export type Violation = {
  id: string;
  policyId: string;
  policyName: string;
  severity: PolicySeverity;
  subjectId: string;
  resourceId?: string;
  accountId: string;
  cloud: Cloud;
  windowStart: string;
  windowEnd: string;
  detectedAt: string;
  message: string;
  status: ViolationStatus;
  statusChangedAt?: string;
  statusNote?: string;
};

export type ViolationFilter = {
  status?: ViolationStatus;
  policyId?: string;
  severity?: PolicySeverity;
  cloud?: Cloud;
  accountId?: string;
  resourceId?: string;
  /** Violations whose window overlaps [windowStart, windowEnd). */
  windowStart?: string;
  windowEnd?: string;
};

// ─── Storage Interfaces ────────────────────────────────────────────────────────

export interface PolicyStorage {
  initialize(): Promise<void>;
  save(policy: Policy): Promise<void>;
  getById(id: string): Promise<Policy | null>;
  list(filter?: { status?: PolicyStatus; severity?: PolicySeverity }): Promise<Policy[]>;
  delete(id: string): Promise<boolean>;
  close(): Promise<void>;
}

export interface ViolationStore {
  initialize(): Promise<void>;
  /** Insert unless a violation with the same id exists. Returns true when inserted. */
  insertIfAbsent(violation: Violation): Promise<boolean>;
  getById(id: string): Promise<Violation | null>;
  list(filter?: ViolationFilter): Promise<Violation[]>;
  /** Moves an open violation only; null when it is missing or already reviewed. */
  updateStatus(id: string, status: ViolationStatus, changedAt: string, note?: string): Promise<Violation | null>;
  close(): Promise<void>;
}
