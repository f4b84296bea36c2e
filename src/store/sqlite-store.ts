/**
 * Cloud Ledger — SQLite Cost Store
 *
 * Persistent store on better-sqlite3. Each batch commit runs in one
 * transaction keyed on the record tuple, which serializes writes per key and
 * keeps half-written batches invisible to readers.
 *
 * Schema:
 *   batches          one row per committed batch, with commit order
 *   cost_records     normalized records, keyed by record tuple + batch id
 *   pending_facts    raw facts waiting for a currency rate
 *   sync_runs        history of adapter syncs
 */

import Database from "better-sqlite3";
import type {
  ChargeType,
  Cloud,
  CostRecord,
  CostSnapshot,
  CostStore,
  PendingFact,
  SyncRun,
  SyncRunStatus,
} from "../types.js";
import { dedupeWithinBatch, effectiveRecords } from "./record-key.js";

// =============================================================================
// Schema DDL
// =============================================================================

const SCHEMA_VERSION = 1;

const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS batches (
  batch_id      TEXT PRIMARY KEY,
  commit_seq    INTEGER NOT NULL,
  committed_at  TEXT NOT NULL,
  record_count  INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS cost_records (
  cloud                       TEXT NOT NULL,
  account_id                  TEXT NOT NULL,
  project_id                  TEXT NOT NULL DEFAULT '',
  service                     TEXT NOT NULL,
  provider_service            TEXT NOT NULL,
  unmapped_service            INTEGER NOT NULL DEFAULT 0,
  resource_id                 TEXT NOT NULL DEFAULT '',
  tags                        TEXT NOT NULL DEFAULT '{}',
  charge_type                 TEXT NOT NULL,
  period_start                TEXT NOT NULL,
  period_end                  TEXT NOT NULL,
  amount_minor_units          INTEGER NOT NULL,
  currency                    TEXT NOT NULL,
  original_amount_minor_units INTEGER NOT NULL,
  original_currency           TEXT NOT NULL,
  ingested_at                 TEXT NOT NULL,
  source_batch_id             TEXT NOT NULL,
  PRIMARY KEY (cloud, account_id, project_id, service, resource_id, period_start, period_end, charge_type, source_batch_id)
);

CREATE INDEX IF NOT EXISTS idx_cost_records_batch ON cost_records(source_batch_id);
CREATE INDEX IF NOT EXISTS idx_cost_records_period ON cost_records(period_start);

CREATE TABLE IF NOT EXISTS pending_facts (
  id        INTEGER PRIMARY KEY AUTOINCREMENT,
  batch_id  TEXT NOT NULL,
  cloud     TEXT NOT NULL,
  fields    TEXT NOT NULL,
  reason    TEXT NOT NULL,
  held_at   TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_pending_batch ON pending_facts(batch_id);

CREATE TABLE IF NOT EXISTS sync_runs (
  id              INTEGER PRIMARY KEY AUTOINCREMENT,
  cloud           TEXT NOT NULL,
  window_start    TEXT NOT NULL,
  window_end      TEXT NOT NULL,
  status          TEXT NOT NULL,
  batch_id        TEXT,
  record_count    INTEGER NOT NULL DEFAULT 0,
  pending_count   INTEGER NOT NULL DEFAULT 0,
  rejected_count  INTEGER NOT NULL DEFAULT 0,
  error           TEXT,
  started_at      TEXT NOT NULL,
  finished_at     TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sync_runs_cloud ON sync_runs(cloud);
`;

// =============================================================================
// Row Types
// =============================================================================

type RecordRow = {
  cloud: string;
  account_id: string;
  project_id: string;
  service: string;
  provider_service: string;
  unmapped_service: number;
  resource_id: string;
  tags: string;
  charge_type: string;
  period_start: string;
  period_end: string;
  amount_minor_units: number;
  currency: string;
  original_amount_minor_units: number;
  original_currency: string;
  ingested_at: string;
  source_batch_id: string;
};

type PendingRow = {
  batch_id: string;
  cloud: string;
  fields: string;
  reason: string;
  held_at: string;
};

type SyncRunRow = {
  cloud: string;
  window_start: string;
  window_end: string;
  status: string;
  batch_id: string | null;
  record_count: number;
  pending_count: number;
  rejected_count: number;
  error: string | null;
  started_at: string;
  finished_at: string;
};

// =============================================================================
// Store
// =============================================================================

export class SQLiteCostStore implements CostStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
  }

  initialize(): void {
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.db.exec(SCHEMA_DDL);

    const versionRow = this.db.prepare("SELECT version FROM schema_version LIMIT 1").get() as
      | { version: number }
      | undefined;
    if (!versionRow) {
      this.db.prepare("INSERT INTO schema_version (version) VALUES (?)").run(SCHEMA_VERSION);
    }
  }

  commitBatch(batchId: string, records: CostRecord[], pending: PendingFact[] = []): void {
    const rows = dedupeWithinBatch(records.map((r) => ({ ...r, sourceBatchId: batchId })));
    const committedAt = new Date().toISOString();

    const insertRecord = this.db.prepare(
      `INSERT INTO cost_records (cloud, account_id, project_id, service, provider_service, unmapped_service, resource_id, tags, charge_type, period_start, period_end, amount_minor_units, currency, original_amount_minor_units, original_currency, ingested_at, source_batch_id)
       VALUES (@cloud, @accountId, @projectId, @service, @providerService, @unmappedService, @resourceId, @tags, @chargeType, @periodStart, @periodEnd, @amountMinorUnits, @currency, @originalAmountMinorUnits, @originalCurrency, @ingestedAt, @sourceBatchId)
       ON CONFLICT(cloud, account_id, project_id, service, resource_id, period_start, period_end, charge_type, source_batch_id) DO UPDATE SET
         provider_service = @providerService,
         unmapped_service = @unmappedService,
         tags = @tags,
         amount_minor_units = @amountMinorUnits,
         currency = @currency,
         original_amount_minor_units = @originalAmountMinorUnits,
         original_currency = @originalCurrency,
         ingested_at = @ingestedAt`,
    );
    const insertPending = this.db.prepare(
      "INSERT INTO pending_facts (batch_id, cloud, fields, reason, held_at) VALUES (?, ?, ?, ?, ?)",
    );

    const commit = this.db.transaction(() => {
      this.db.prepare("DELETE FROM cost_records WHERE source_batch_id = ?").run(batchId);
      this.db.prepare("DELETE FROM pending_facts WHERE batch_id = ?").run(batchId);

      for (const r of rows) {
        insertRecord.run({
          cloud: r.cloud,
          accountId: r.accountId,
          projectId: r.projectId ?? "",
          service: r.service,
          providerService: r.providerService,
          unmappedService: r.unmappedService ? 1 : 0,
          resourceId: r.resourceId ?? "",
          tags: JSON.stringify(r.tags),
          chargeType: r.chargeType,
          periodStart: r.periodStart,
          periodEnd: r.periodEnd,
          amountMinorUnits: r.amountMinorUnits,
          currency: r.currency,
          originalAmountMinorUnits: r.originalAmountMinorUnits,
          originalCurrency: r.originalCurrency,
          ingestedAt: r.ingestedAt,
          sourceBatchId: batchId,
        });
      }

      for (const p of pending) {
        insertPending.run(batchId, p.fact.cloud, JSON.stringify(p.fact.fields), p.reason, p.heldAt);
      }

      const { next } = this.db
        .prepare("SELECT COALESCE(MAX(commit_seq), 0) + 1 AS next FROM batches")
        .get() as { next: number };
      this.db
        .prepare(
          `INSERT INTO batches (batch_id, commit_seq, committed_at, record_count) VALUES (?, ?, ?, ?)
           ON CONFLICT(batch_id) DO UPDATE SET commit_seq = excluded.commit_seq, committed_at = excluded.committed_at, record_count = excluded.record_count`,
        )
        .run(batchId, next, committedAt, rows.length);
    });
    commit();
  }

  snapshot(): CostSnapshot {
    // One statement, one consistent read.
    const rows = this.db
      .prepare(
        `SELECT r.* FROM cost_records r
         JOIN batches b ON b.batch_id = r.source_batch_id
         ORDER BY b.commit_seq, r.rowid`,
      )
      .all() as RecordRow[];

    const byBatch: CostRecord[][] = [];
    let lastBatch: string | null = null;
    for (const row of rows) {
      if (row.source_batch_id !== lastBatch) {
        byBatch.push([]);
        lastBatch = row.source_batch_id;
      }
      byBatch[byBatch.length - 1]?.push(rowToRecord(row));
    }

    return {
      records: Object.freeze(effectiveRecords(byBatch)),
      takenAt: new Date().toISOString(),
    };
  }

  listBatches(): Array<{ batchId: string; committedAt: string; recordCount: number }> {
    const rows = this.db
      .prepare("SELECT batch_id, committed_at, record_count FROM batches ORDER BY commit_seq")
      .all() as Array<{ batch_id: string; committed_at: string; record_count: number }>;
    return rows.map((r) => ({ batchId: r.batch_id, committedAt: r.committed_at, recordCount: r.record_count }));
  }

  listPending(): PendingFact[] {
    const rows = this.db.prepare("SELECT * FROM pending_facts ORDER BY id").all() as PendingRow[];
    return rows.map((r) => ({
      fact: { cloud: r.cloud as Cloud, fields: JSON.parse(r.fields) as Record<string, unknown> },
      batchId: r.batch_id,
      reason: r.reason,
      heldAt: r.held_at,
    }));
  }

  clearPending(batchId: string): void {
    this.db.prepare("DELETE FROM pending_facts WHERE batch_id = ?").run(batchId);
  }

  recordSyncRun(run: SyncRun): void {
    this.db
      .prepare(
        `INSERT INTO sync_runs (cloud, window_start, window_end, status, batch_id, record_count, pending_count, rejected_count, error, started_at, finished_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        run.cloud,
        run.windowStart,
        run.windowEnd,
        run.status,
        run.batchId ?? null,
        run.recordCount,
        run.pendingCount,
        run.rejectedCount,
        run.error ?? null,
        run.startedAt,
        run.finishedAt,
      );
  }

  listSyncRuns(cloud?: Cloud): SyncRun[] {
    const rows = (
      cloud
        ? this.db.prepare("SELECT * FROM sync_runs WHERE cloud = ? ORDER BY id DESC").all(cloud)
        : this.db.prepare("SELECT * FROM sync_runs ORDER BY id DESC").all()
    ) as SyncRunRow[];
    return rows.map(rowToSyncRun);
  }

  close(): void {
    this.db.close();
  }
}

// =============================================================================
// Row Mapping
// =============================================================================

function rowToRecord(row: RecordRow): CostRecord {
  const record: CostRecord = {
    cloud: row.cloud as Cloud,
    accountId: row.account_id,
    service: row.service,
    providerService: row.provider_service,
    unmappedService: row.unmapped_service === 1,
    tags: Object.freeze(JSON.parse(row.tags) as Record<string, string>),
    chargeType: row.charge_type as ChargeType,
    periodStart: row.period_start,
    periodEnd: row.period_end,
    amountMinorUnits: row.amount_minor_units,
    currency: row.currency,
    originalAmountMinorUnits: row.original_amount_minor_units,
    originalCurrency: row.original_currency,
    ingestedAt: row.ingested_at,
    sourceBatchId: row.source_batch_id,
  };
  if (row.project_id !== "") record.projectId = row.project_id;
  if (row.resource_id !== "") record.resourceId = row.resource_id;
  return Object.freeze(record);
}

function rowToSyncRun(row: SyncRunRow): SyncRun {
  const run: SyncRun = {
    cloud: row.cloud as Cloud,
    windowStart: row.window_start,
    windowEnd: row.window_end,
    status: row.status as SyncRunStatus,
    recordCount: row.record_count,
    pendingCount: row.pending_count,
    rejectedCount: row.rejected_count,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
  if (row.batch_id !== null) run.batchId = row.batch_id;
  if (row.error !== null) run.error = row.error;
  return run;
}
