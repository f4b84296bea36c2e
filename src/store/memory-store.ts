/**
 * Cloud Ledger — In-Memory Cost Store
 *
 * Map-backed store for tests and short-lived runs. A commit builds the new
 * effective view off to the side and swaps it in with one assignment, so a
 * reader holding a snapshot never sees half a batch.
 */

import type { Cloud, CostRecord, CostSnapshot, CostStore, PendingFact, SyncRun } from "../types.js";
import { dedupeWithinBatch, effectiveRecords } from "./record-key.js";

type StoredBatch = {
  batchId: string;
  committedAt: string;
  records: readonly CostRecord[];
};

function freezeRecord(record: CostRecord): CostRecord {
  const copy = structuredClone(record);
  Object.freeze(copy.tags);
  return Object.freeze(copy);
}

export class InMemoryCostStore implements CostStore {
  /** Insertion order is commit order; re-committed batches move to the end. */
  private batches = new Map<string, StoredBatch>();
  private pending = new Map<string, PendingFact[]>();
  private syncRuns: SyncRun[] = [];
  private current: CostSnapshot = { records: Object.freeze([]), takenAt: new Date(0).toISOString() };

  initialize(): void {}

  commitBatch(batchId: string, records: CostRecord[], pending: PendingFact[] = []): void {
    const committedAt = new Date().toISOString();
    const frozen = Object.freeze(
      dedupeWithinBatch(records.map((r) => ({ ...r, sourceBatchId: batchId }))).map(freezeRecord),
    );

    const next = new Map(this.batches);
    next.delete(batchId);
    next.set(batchId, { batchId, committedAt, records: frozen });

    const view = Object.freeze(effectiveRecords([...next.values()].map((b) => b.records)));

    this.batches = next;
    this.current = { records: view, takenAt: committedAt };
    if (pending.length > 0) {
      this.pending.set(batchId, pending.map((p) => structuredClone(p)));
    } else {
      this.pending.delete(batchId);
    }
  }

  snapshot(): CostSnapshot {
    return { records: this.current.records, takenAt: new Date().toISOString() };
  }

  listBatches(): Array<{ batchId: string; committedAt: string; recordCount: number }> {
    return [...this.batches.values()].map((b) => ({
      batchId: b.batchId,
      committedAt: b.committedAt,
      recordCount: b.records.length,
    }));
  }

  listPending(): PendingFact[] {
    return [...this.pending.values()].flat().map((p) => structuredClone(p));
  }

  clearPending(batchId: string): void {
    this.pending.delete(batchId);
  }

  recordSyncRun(run: SyncRun): void {
    this.syncRuns.push({ ...run });
  }

  listSyncRuns(cloud?: Cloud): SyncRun[] {
    const runs = cloud ? this.syncRuns.filter((r) => r.cloud === cloud) : this.syncRuns;
    return runs.map((r) => ({ ...r })).reverse();
  }

  close(): void {
    this.batches.clear();
    this.pending.clear();
    this.syncRuns = [];
    this.current = { records: Object.freeze([]), takenAt: new Date(0).toISOString() };
  }
}
