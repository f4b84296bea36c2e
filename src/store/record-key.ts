/**
 * Record identity.
 *
 * A record is identified by (cloud, account, project, service, resource,
 * period, charge type). Within one batch the last write for a key wins; across
 * batches the most recently committed batch wins.
 */

import type { CostRecord } from "../types.js";

export function recordKey(record: CostRecord): string {
  return [
    record.cloud,
    record.accountId,
    record.projectId ?? "",
    record.service,
    record.resourceId ?? "",
    record.periodStart,
    record.periodEnd,
    record.chargeType,
  ].join("\u0000");
}

export function batchRecordKey(record: CostRecord): string {
  return `${recordKey(record)}\u0000${record.sourceBatchId}`;
}

/** Keep the last record per batch key, preserving first-seen order. */
export function dedupeWithinBatch(records: CostRecord[]): CostRecord[] {
  const byKey = new Map<string, CostRecord>();
  for (const record of records) {
    byKey.set(batchRecordKey(record), record);
  }
  return [...byKey.values()];
}

/**
 * Resolve the effective records from batches listed oldest commit first.
 */
export function effectiveRecords(batchesOldestFirst: Iterable<readonly CostRecord[]>): CostRecord[] {
  const byKey = new Map<string, CostRecord>();
  for (const records of batchesOldestFirst) {
    for (const record of records) {
      const key = recordKey(record);
      // Re-insert so that iteration order follows the winning batch.
      byKey.delete(key);
      byKey.set(key, record);
    }
  }
  return [...byKey.values()];
}
