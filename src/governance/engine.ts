/**
 * Governance — Evaluation Engine
 *
 * Runs a governance cycle: builds per-subject facts from the records in a
 * window, evaluates each active policy and records violations for review.
 * Violation ids derive from (policy, subject, window), so re-running a
 * cycle never duplicates and a reviewed violation is never reopened.
 */

import { createHash } from "node:crypto";
import { selectRecords } from "../aggregation/engine.js";
import type { EngineConfig } from "../config/schema.js";
import { InvalidQueryError, InvalidTransitionError, NotFoundError, errorMessage } from "../errors.js";
import { getLedgerLogger, type LedgerLogger } from "../logging/index.js";
import { formatMoney } from "../money.js";
import { tagValue } from "../scope.js";
import { isValidWindow, toIsoInstant } from "../time.js";
import type { Cloud, CostRecord, CostSnapshot, CostStore, TimeWindow } from "../types.js";
import { evaluateCondition } from "./conditions.js";
import { POLICY_LIBRARY } from "./library.js";
import { createPolicyFromInput } from "./storage.js";
import type {
  Policy,
  PolicyStorage,
  ResourceMetadataProvider,
  SubjectFacts,
  Violation,
  ViolationFilter,
  ViolationStatus,
  ViolationStore,
} from "./types.js";

export type CycleOptions = {
  window: TimeWindow;
  /** Policies to evaluate; defaults to every stored policy. */
  policies?: Policy[];
  now?: Date;
  snapshot?: CostSnapshot;
};

export type CycleResult = {
  window: TimeWindow;
  evaluatedPolicies: string[];
  skippedPolicies: string[];
  subjectsEvaluated: number;
  created: Violation[];
  /** Violations found again that were already recorded, in any status. */
  alreadyRecorded: number;
  metadataErrors: number;
};

export type GovernanceEngineOptions = {
  metadata?: ResourceMetadataProvider;
  logger?: LedgerLogger;
  clock?: () => Date;
};

type SubjectGroup = {
  subjectId: string;
  kind: SubjectFacts["kind"];
  cloud: Cloud;
  accountId: string;
  resourceId?: string;
  records: CostRecord[];
};

export function violationId(policyId: string, subjectId: string, window: TimeWindow): string {
  const digest = createHash("sha256")
    .update([policyId, subjectId, window.start, window.end].join("\n"))
    .digest("hex");
  return `vio-${digest.slice(0, 16)}`;
}

// =============================================================================
// Subjects
// =============================================================================

/**
 * One subject per resource, plus one per account for the spend that carries
 * no resource id.
 */
export function partitionSubjects(records: readonly CostRecord[]): SubjectGroup[] {
  const groups = new Map<string, SubjectGroup>();
  for (const record of records) {
    const subjectId = record.resourceId
      ? `resource:${record.cloud}:${record.accountId}:${record.resourceId}`
      : `account:${record.cloud}:${record.accountId}`;
    let group = groups.get(subjectId);
    if (!group) {
      group = {
        subjectId,
        kind: record.resourceId ? "resource" : "account",
        cloud: record.cloud,
        accountId: record.accountId,
        resourceId: record.resourceId,
        records: [],
      };
      groups.set(subjectId, group);
    }
    group.records.push(record);
  }
  return sortGroups(groups);
}

/** One subject per account over all of its records. */
export function accountSubjects(records: readonly CostRecord[]): SubjectGroup[] {
  const groups = new Map<string, SubjectGroup>();
  for (const record of records) {
    const subjectId = `account:${record.cloud}:${record.accountId}`;
    let group = groups.get(subjectId);
    if (!group) {
      group = { subjectId, kind: "account", cloud: record.cloud, accountId: record.accountId, records: [] };
      groups.set(subjectId, group);
    }
    group.records.push(record);
  }
  return sortGroups(groups);
}

function sortGroups(groups: Map<string, SubjectGroup>): SubjectGroup[] {
  return [...groups.values()].sort((a, b) => (a.subjectId < b.subjectId ? -1 : a.subjectId > b.subjectId ? 1 : 0));
}

/** Facts for a subject. Later records win tag conflicts. */
export function subjectFacts(group: SubjectGroup, metadata: Record<string, unknown> = {}): SubjectFacts {
  const ordered = [...group.records].sort((a, b) =>
    a.periodStart < b.periodStart ? -1 : a.periodStart > b.periodStart ? 1 : 0,
  );
  const tags: Record<string, string> = {};
  let projectId: string | undefined;
  let service: string | undefined;
  for (const record of ordered) {
    Object.assign(tags, record.tags);
    projectId = record.projectId ?? projectId;
    service = record.service;
  }

  const facts: SubjectFacts = {
    subjectId: group.subjectId,
    kind: group.kind,
    cloud: group.cloud,
    accountId: group.accountId,
    services: [...new Set(ordered.map((r) => r.service))].sort(),
    tags,
    metadata,
    spendMinorUnits: ordered.reduce((sum, r) => sum + r.amountMinorUnits, 0),
  };
  if (projectId !== undefined) facts.projectId = projectId;
  if (service !== undefined) facts.service = service;
  if (group.resourceId !== undefined) facts.resourceId = group.resourceId;
  return facts;
}

// =============================================================================
// Rule Evaluation
// =============================================================================

/** The violation message, or null when the subject complies. */
export function evaluatePolicy(policy: Policy, facts: SubjectFacts, currency: string): string | null {
  const { rule } = policy;
  switch (rule.kind) {
    case "tag_presence": {
      const missing = rule.requiredTags.filter((t) => !tagValue(facts.tags, t));
      return missing.length > 0 ? `Missing required tags: ${missing.join(", ")}` : null;
    }
    case "spend_threshold":
      return facts.spendMinorUnits > rule.thresholdMinorUnits
        ? `Spend ${formatMoney(facts.spendMinorUnits, currency)} exceeds threshold ${formatMoney(rule.thresholdMinorUnits, currency)}`
        : null;
    case "resource_attribute":
      if (!evaluateCondition(rule.condition, facts)) return null;
      return rule.message ?? (policy.description || `Matched policy "${policy.name}"`);
  }
}

// =============================================================================
// Engine
// =============================================================================

export class GovernanceEngine {
  private readonly logger: LedgerLogger;
  private readonly clock: () => Date;
  private readonly metadata?: ResourceMetadataProvider;

  constructor(
    private readonly store: CostStore,
    private readonly policies: PolicyStorage,
    private readonly violations: ViolationStore,
    private readonly config: EngineConfig,
    options: GovernanceEngineOptions = {},
  ) {
    this.logger = options.logger ?? getLedgerLogger("governance");
    this.clock = options.clock ?? (() => new Date());
    this.metadata = options.metadata;
  }

  /** Validate and store policies. Replacing a policy keeps its createdAt. */
  async savePolicies(inputs: readonly unknown[]): Promise<Policy[]> {
    const now = this.clock().toISOString();
    const saved: Policy[] = [];
    for (const input of inputs) {
      const policy = createPolicyFromInput(input, now);
      const existing = await this.policies.getById(policy.id);
      if (existing) policy.createdAt = existing.createdAt;
      await this.policies.save(policy);
      saved.push(policy);
    }
    return saved;
  }

  /** Store the library (unless disabled) and the configured policies; configured ones win. */
  async installConfiguredPolicies(): Promise<Policy[]> {
    const { includeLibrary, policies } = this.config.governance;
    const configuredIds = new Set(policies.map((p) => p.id));
    const library = includeLibrary
      ? POLICY_LIBRARY.map((p) => p.template).filter((t) => !configuredIds.has(t.id))
      : [];
    return this.savePolicies([...library, ...policies]);
  }

  async listPolicies(): Promise<Policy[]> {
    return this.policies.list();
  }

  async evaluateCycle(options: CycleOptions): Promise<CycleResult> {
    const window = canonicalWindow(options.window);
    const now = (options.now ?? this.clock()).toISOString();
    const policies = [...(options.policies ?? (await this.policies.list()))].sort((a, b) =>
      a.id < b.id ? -1 : a.id > b.id ? 1 : 0,
    );
    const records = (options.snapshot ?? this.store.snapshot()).records;
    const currency = this.config.defaultCurrency;

    const result: CycleResult = {
      window,
      evaluatedPolicies: [],
      skippedPolicies: [],
      subjectsEvaluated: 0,
      created: [],
      alreadyRecorded: 0,
      metadataErrors: 0,
    };

    const metadataCache = new Map<string, Record<string, unknown>>();
    const metadataFor = async (group: SubjectGroup): Promise<Record<string, unknown>> => {
      if (!group.resourceId || !this.metadata) return {};
      const cached = metadataCache.get(group.resourceId);
      if (cached) return cached;
      let found: Record<string, unknown> = {};
      try {
        found = (await this.metadata.lookup(group.resourceId)) ?? {};
      } catch (err) {
        result.metadataErrors++;
        this.logger.warn("Resource metadata lookup failed", { resourceId: group.resourceId, error: errorMessage(err) });
      }
      metadataCache.set(group.resourceId, found);
      return found;
    };

    for (const policy of policies) {
      if (policy.status !== "active") {
        result.skippedPolicies.push(policy.id);
        continue;
      }
      result.evaluatedPolicies.push(policy.id);
      const log = this.logger.withContext({ policyId: policy.id });

      const inScope = selectRecords(records, policy.scope, window);
      const groups =
        policy.rule.kind === "spend_threshold" && policy.rule.per === "account"
          ? accountSubjects(inScope)
          : partitionSubjects(inScope);

      let found = 0;
      for (const group of groups) {
        result.subjectsEvaluated++;
        const metadata = policy.rule.kind === "resource_attribute" ? await metadataFor(group) : {};
        const message = evaluatePolicy(policy, subjectFacts(group, metadata), currency);
        if (message === null) continue;
        found++;

        const violation: Violation = {
          id: violationId(policy.id, group.subjectId, window),
          policyId: policy.id,
          policyName: policy.name,
          severity: policy.severity,
          subjectId: group.subjectId,
          accountId: group.accountId,
          cloud: group.cloud,
          windowStart: window.start,
          windowEnd: window.end,
          detectedAt: now,
          message,
          status: "open",
        };
        if (group.resourceId !== undefined) violation.resourceId = group.resourceId;

        if (await this.violations.insertIfAbsent(violation)) {
          result.created.push(violation);
        } else {
          result.alreadyRecorded++;
        }
      }
      log.debug("Policy evaluated", { subjects: groups.length, violations: found });
    }

    this.logger.info("Governance cycle finished", {
      windowStart: window.start,
      windowEnd: window.end,
      policies: result.evaluatedPolicies.length,
      created: result.created.length,
      alreadyRecorded: result.alreadyRecorded,
    });
    return result;
  }

  async listViolations(filter: ViolationFilter = {}): Promise<Violation[]> {
    return this.violations.list(filter);
  }

  /** Review an open violation. Reviewed violations are final. */
  async setViolationStatus(id: string, status: Exclude<ViolationStatus, "open">, note?: string): Promise<Violation> {
    const existing = await this.violations.getById(id);
    if (!existing) throw new NotFoundError("Violation", id);
    if (existing.status !== "open") {
      throw new InvalidTransitionError(`Violation ${id} is already ${existing.status}`);
    }
    if (status !== "approved" && status !== "rejected") {
      throw new InvalidTransitionError(`Violation ${id} cannot move to ${String(status)}`);
    }

    const updated = await this.violations.updateStatus(id, status, this.clock().toISOString(), note);
    if (!updated) {
      // Reviewed by someone else between the read and the update.
      const current = await this.violations.getById(id);
      if (!current) throw new NotFoundError("Violation", id);
      throw new InvalidTransitionError(`Violation ${id} is already ${current.status}`);
    }
    this.logger.info("Violation reviewed", { violationId: id, status });
    return updated;
  }
}

function canonicalWindow(window: TimeWindow): TimeWindow {
  const start = toIsoInstant(window.start);
  const end = toIsoInstant(window.end);
  if (start === null || end === null || !isValidWindow({ start, end })) {
    throw new InvalidQueryError(`Window ${window.start} .. ${window.end} is empty or malformed`);
  }
  return { start, end };
}
