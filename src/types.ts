/**
 * Cloud Ledger — Core Types
 *
 * Canonical cost model, raw ingestion facts, scopes, query contracts
 * and the cost store interface shared by every engine.
 */

// ─── Canonical Cost Model ──────────────────────────────────────────────────────

export type Cloud = "AWS" | "GCP" | "Azure" | "Other";

export const CLOUDS: readonly Cloud[] = ["AWS", "GCP", "Azure", "Other"];

export type ChargeType = "usage" | "tax" | "credit" | "refund";

export type CostRecord = {
  cloud: Cloud;
  accountId: string;
  projectId?: string;
  /** Canonical service name from the service catalog, or "Other". */
  service: string;
  /** Service identifier as the provider reported it. */
  providerService: string;
  unmappedService: boolean;
  resourceId?: string;
  tags: Record<string, string>;
  chargeType: ChargeType;
  /** Inclusive start, ISO-8601 UTC. */
  periodStart: string;
  /** Exclusive end, ISO-8601 UTC. */
  periodEnd: string;
  amountMinorUnits: number;
  currency: string;
  originalAmountMinorUnits: number;
  originalCurrency: string;
  ingestedAt: string;
  sourceBatchId: string;
};

// ─── Ingestion ─────────────────────────────────────────────────────────────────

export type TimeWindow = {
  /** Inclusive, ISO-8601 UTC. */
  start: string;
  /** Exclusive, ISO-8601 UTC. */
  end: string;
};

/** A provider-native billing line, field names exactly as the provider emits them. */
export type RawCostFact = {
  cloud: Cloud;
  fields: Record<string, unknown>;
};

export type DataQualityIssueCode =
  | "UnmappableService"
  | "CurrencyConversionUnavailable"
  | "InvalidInterval"
  | "InvalidAmountSign"
  | "MissingField";

export type DataQualityIssue = {
  code: DataQualityIssueCode;
  message: string;
  cloud: Cloud;
  accountId?: string;
  resourceId?: string;
};

/** A fact waiting for a currency rate before it can become a CostRecord. */
export type PendingFact = {
  fact: RawCostFact;
  batchId: string;
  reason: string;
  heldAt: string;
};

export type SyncRunStatus = "success" | "partial" | "failed";

export type SyncRun = {
  cloud: Cloud;
  windowStart: string;
  windowEnd: string;
  status: SyncRunStatus;
  batchId?: string;
  recordCount: number;
  pendingCount: number;
  rejectedCount: number;
  error?: string;
  startedAt: string;
  finishedAt: string;
};

// ─── Scopes ────────────────────────────────────────────────────────────────────

/** Filter expression over cloud, account, project, service, resource and tags. */
export type Scope = {
  clouds?: Cloud[];
  accountIds?: string[];
  projectIds?: string[];
  services?: string[];
  resourceIds?: string[];
  /** Tag key → accepted value(s). Keys are matched case-insensitively. */
  tags?: Record<string, string | string[]>;
};

// ─── Aggregation ───────────────────────────────────────────────────────────────

export type GroupBy =
  | "account"
  | "project"
  | "team"
  | "product"
  | "service"
  | "cloud"
  | "day"
  | "month";

export type Trend =
  | { kind: "none" }
  | {
      kind: "comparison";
      previousMinorUnits: number;
      deltaMinorUnits: number;
      /** Null when the previous amount is zero. */
      deltaPct: number | null;
    };

export type GroupedTotal = {
  key: string;
  amountMinorUnits: number;
  pctOfTotal: number;
  recordCount: number;
  trend: Trend;
};

export type AggregationQuery = {
  filter?: Scope;
  groupBy: GroupBy;
  range: TimeWindow;
};

export type AggregationResult = {
  groupBy: GroupBy;
  range: TimeWindow;
  rows: GroupedTotal[];
  totalMinorUnits: number;
  currency: string;
  recordCount: number;
  /** True when no record matched; distinguishes "no data" from a real zero. */
  insufficientData: boolean;
  configVersion: string;
};

// ─── Recommendations (optimization feed) ───────────────────────────────────────

export type Recommendation = {
  resourceId: string;
  estimatedSavingsMinorUnits: number;
  category: string;
};

// ─── Cost Store ────────────────────────────────────────────────────────────────

/** An immutable view of the effective records at the time it was taken. */
export type CostSnapshot = {
  readonly records: readonly CostRecord[];
  readonly takenAt: string;
};

export interface CostStore {
  initialize(): void;
  /**
   * Atomically commit a batch. Committing an existing batch id replaces it.
   * Pending facts for the batch are replaced along with its records.
   */
  commitBatch(batchId: string, records: CostRecord[], pending?: PendingFact[]): void;
  /** Effective records: per record key, the one from the latest committed batch. */
  snapshot(): CostSnapshot;
  listBatches(): Array<{ batchId: string; committedAt: string; recordCount: number }>;
  listPending(): PendingFact[];
  /** Drop pending facts that have since been normalized into a batch. */
  clearPending(batchId: string): void;
  recordSyncRun(run: SyncRun): void;
  listSyncRuns(cloud?: Cloud): SyncRun[];
  close(): void;
}
