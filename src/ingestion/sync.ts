/**
 * Cloud Ledger — Sync Coordinator
 *
 * Runs the registered adapters for a window in parallel, normalizes each
 * cloud's facts and commits them as one batch per cloud. Every attempt is
 * recorded as a SyncRun; a failed cloud leaves its earlier batches in place.
 *
 * Accepted partial data is committed under its own batch id, so it only
 * overrides the records it actually carries.
 */

import { createHash } from "node:crypto";
import type { EngineConfig } from "../config/schema.js";
import { ConfigurationError, PartialDataError, SourceError, errorMessage } from "../errors.js";
import { getLedgerLogger, type LedgerLogger } from "../logging/index.js";
import { Normalizer, type NormalizationResult } from "../normalizer/normalizer.js";
import { isValidWindow, toIsoInstant } from "../time.js";
import type { Cloud, CostStore, DataQualityIssue, RawCostFact, SyncRun, TimeWindow } from "../types.js";
import { AdapterRegistry, type IngestionAdapter } from "./adapter.js";

export type SyncOptions = {
  window: TimeWindow;
  /** Only these clouds (all registered adapters if omitted). */
  clouds?: Cloud[];
  /** Commit the facts a truncated source did return. The run stays "partial". */
  acceptPartial?: boolean;
};

export type CloudSyncResult = {
  run: SyncRun;
  issues: DataQualityIssue[];
};

export type LastSyncStatus = {
  cloud: Cloud;
  lastRun: SyncRun;
  lastSuccessfulRun?: SyncRun;
  failed: boolean;
  /** e.g. "last sync failed at 2024-03-02T00:00:01.000Z: throttled" */
  message: string;
};

export type RetryPendingResult = {
  /** Late batches committed from held facts. */
  batchIds: string[];
  recovered: number;
  stillPending: number;
};

/** Deterministic so that re-syncing a window replaces the earlier batch. */
export function syncBatchId(cloud: Cloud, window: TimeWindow): string {
  return `${cloud}:${window.start}:${window.end}`;
}

export function partialBatchId(cloud: Cloud, window: TimeWindow): string {
  return `${syncBatchId(cloud, window)}:partial`;
}

export class SyncCoordinator {
  readonly adapters = new AdapterRegistry();
  private readonly normalizer: Normalizer;
  private readonly logger: LedgerLogger;
  private readonly clock: () => Date;

  constructor(
    private readonly store: CostStore,
    config: EngineConfig,
    options?: { logger?: LedgerLogger; clock?: () => Date },
  ) {
    this.logger = options?.logger ?? getLedgerLogger("sync");
    this.clock = options?.clock ?? (() => new Date());
    this.normalizer = new Normalizer(config, this.logger.child("normalizer"));
  }

  register(adapter: IngestionAdapter): this {
    this.adapters.register(adapter);
    return this;
  }

  async sync(options: SyncOptions): Promise<CloudSyncResult[]> {
    const window = canonicalWindow(options.window);
    const targets = options.clouds
      ? options.clouds
          .map((c) => this.adapters.get(c))
          .filter((a): a is IngestionAdapter => a != null)
      : this.adapters.getAll();

    this.logger.info("Starting sync", {
      clouds: targets.map((a) => a.cloud),
      windowStart: window.start,
      windowEnd: window.end,
    });

    return Promise.all(targets.map((adapter) => this.syncCloud(adapter, window, options.acceptPartial ?? false)));
  }

  private async syncCloud(adapter: IngestionAdapter, window: TimeWindow, acceptPartial: boolean): Promise<CloudSyncResult> {
    const cloud = adapter.cloud;
    const completeBatchId = syncBatchId(cloud, window);
    const partialId = partialBatchId(cloud, window);
    let batchId = completeBatchId;
    let log = this.logger.withContext({ cloud, batchId });
    const startedAt = this.clock().toISOString();

    const run: SyncRun = {
      cloud,
      windowStart: window.start,
      windowEnd: window.end,
      status: "success",
      recordCount: 0,
      pendingCount: 0,
      rejectedCount: 0,
      startedAt,
      finishedAt: startedAt,
    };

    const finish = (issues: DataQualityIssue[] = []): CloudSyncResult => {
      run.finishedAt = this.clock().toISOString();
      this.store.recordSyncRun(run);
      return { run, issues };
    };

    let facts: RawCostFact[];
    try {
      facts = await adapter.fetch(window);
    } catch (err) {
      if (err instanceof PartialDataError) {
        run.status = "partial";
        run.error = err.message;
        if (!acceptPartial) {
          log.warn("Source returned partial data; nothing committed", { facts: err.facts.length });
          return finish();
        }
        batchId = partialId;
        log = this.logger.withContext({ cloud, batchId });
        log.warn("Committing partial data", { facts: err.facts.length });
        facts = err.facts;
      } else {
        run.status = "failed";
        run.error = errorMessage(err);
        if (err instanceof SourceError) {
          log.warn("Sync failed; previous data kept", { code: err.code, error: err });
        } else {
          log.error("Adapter threw an unexpected error", { error: err });
        }
        return finish();
      }
    }

    let result: NormalizationResult;
    try {
      result = this.normalizer.normalize(facts, { batchId, ingestedAt: startedAt });
      this.store.commitBatch(batchId, result.records, result.pending);
    } catch (err) {
      run.status = "failed";
      run.error = errorMessage(err);
      log.error("Batch commit failed; nothing from this batch is visible", { error: err });
      return finish();
    }

    run.batchId = batchId;
    run.recordCount = result.records.length;
    run.pendingCount = result.pending.length;
    run.rejectedCount = result.rejected.length;
    log.info("Committed batch", {
      records: run.recordCount,
      pending: run.pendingCount,
      rejected: run.rejectedCount,
    });
    if (batchId === completeBatchId) this.clearPartialBatch(partialId, log);
    return finish(result.issues);
  }

  /** A complete batch for the window supersedes any partial one. */
  private clearPartialBatch(partialId: string, log: LedgerLogger): void {
    const partial = this.store.listBatches().find((b) => b.batchId === partialId);
    if (!partial || partial.recordCount === 0) return;
    this.store.commitBatch(partialId, []);
    log.debug("Cleared superseded partial batch", { partialBatchId: partialId, records: partial.recordCount });
  }

  /** The most recent run for a cloud, or null if it never synced. */
  lastSync(cloud: Cloud): LastSyncStatus | null {
    const runs = this.store.listSyncRuns(cloud);
    if (runs.length === 0) return null;

    const lastRun = runs[0];
    const lastSuccessfulRun = runs.find((r) => r.status === "success");
    const failed = lastRun.status === "failed";
    const message = failed
      ? `last sync failed at ${lastRun.finishedAt}: ${lastRun.error ?? "unknown error"}`
      : `last sync ${lastRun.status} at ${lastRun.finishedAt}`;

    return { cloud, lastRun, lastSuccessfulRun, failed, message };
  }

  /**
   * Normalize held facts again, now that rates may exist. Facts that convert
   * are committed as a late batch derived from the original batch id; the
   * original's pending list is cleared once that commit succeeds.
   */
  retryPending(): RetryPendingResult {
    const byBatch = new Map<string, RawCostFact[]>();
    for (const p of this.store.listPending()) {
      const facts = byBatch.get(p.batchId) ?? [];
      facts.push(p.fact);
      byBatch.set(p.batchId, facts);
    }

    const result: RetryPendingResult = { batchIds: [], recovered: 0, stillPending: 0 };
    const ingestedAt = this.clock().toISOString();

    for (const [batchId, facts] of byBatch) {
      const lateBatchId = `${batchId}:late:${factsDigest(facts)}`;
      const normalized = this.normalizer.normalize(facts, { batchId: lateBatchId, ingestedAt });

      if (normalized.records.length === 0) {
        result.stillPending += facts.length;
        continue;
      }

      this.store.commitBatch(lateBatchId, normalized.records, normalized.pending);
      this.store.clearPending(batchId);

      result.batchIds.push(lateBatchId);
      result.recovered += normalized.records.length;
      result.stillPending += normalized.pending.length;
      this.logger.info("Recovered pending facts", {
        batchId: lateBatchId,
        records: normalized.records.length,
        pending: normalized.pending.length,
      });
    }

    return result;
  }
}

function canonicalWindow(window: TimeWindow): TimeWindow {
  const start = toIsoInstant(window.start);
  const end = toIsoInstant(window.end);
  if (!start || !end || !isValidWindow({ start, end })) {
    throw new ConfigurationError(`Invalid sync window ${window.start} .. ${window.end}`, "InvalidWindow");
  }
  return { start, end };
}

function factsDigest(facts: RawCostFact[]): string {
  return createHash("sha256").update(JSON.stringify(facts)).digest("hex").slice(0, 12);
}
