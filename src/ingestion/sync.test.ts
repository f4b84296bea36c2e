/**
 * Ingestion — Tests
 *
 * Covers: adapters, sync coordinator, partial data, failures, lastSync,
 * pending fact retry.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { JsonFileAdapter, StaticAdapter, factsInWindow } from "./adapter.js";
import { SyncCoordinator, partialBatchId, syncBatchId } from "./sync.js";
import { resolveConfig } from "../config/loader.js";
import { AuthError, ConfigurationError, PartialDataError, SourceUnavailableError } from "../errors.js";
import { createLedgerLogger, MemoryTransport } from "../logging/index.js";
import { InMemoryCostStore } from "../store/memory-store.js";
import { SQLiteCostStore } from "../store/sqlite-store.js";
import { makeAwsFact, makeOtherFact } from "../test-utils.js";
import type { EngineConfig } from "../config/schema.js";
import type { CostStore, TimeWindow } from "../types.js";

const WINDOW: TimeWindow = { start: "2024-03-01T00:00:00.000Z", end: "2024-04-01T00:00:00.000Z" };
const CLOCK = () => new Date("2024-04-02T00:00:00.000Z");

function makeCoordinator(store: CostStore, config: EngineConfig = resolveConfig({})) {
  const transport = new MemoryTransport();
  const logger = createLedgerLogger("test", { level: "debug", transports: [transport] });
  return { coordinator: new SyncCoordinator(store, config, { logger, clock: CLOCK }), transport };
}

// ── Adapters ─────────────────────────────────────────────────────

describe("factsInWindow", () => {
  it("keeps facts whose usage starts in [start, end)", () => {
    const inside = makeAwsFact({ "lineItem/UsageStartDate": "2024-03-31T23:00:00Z" });
    const atEnd = makeAwsFact({ "lineItem/UsageStartDate": "2024-04-01T00:00:00Z" });
    const atStart = makeAwsFact({ "lineItem/UsageStartDate": "2024-03-01T00:00:00Z" });
    const undated = makeAwsFact({ "lineItem/UsageStartDate": undefined });
    expect(factsInWindow([inside, atEnd, atStart, undated], WINDOW)).toEqual([inside, atStart]);
  });
});

describe("JsonFileAdapter", () => {
  const dir = join(tmpdir(), "cloudledger-json-adapter");

  beforeEach(() => {
    mkdirSync(dir, { recursive: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads an array of rows and filters to the window", async () => {
    const path = join(dir, "gcp.json");
    writeFileSync(
      path,
      JSON.stringify([
        { billing_account_id: "b1", usage_start_time: "2024-03-05T00:00:00Z", cost: 1 },
        { billing_account_id: "b1", usage_start_time: "2024-02-05T00:00:00Z", cost: 2 },
      ]),
    );
    const facts = await new JsonFileAdapter("GCP", path).fetch(WINDOW);
    expect(facts).toEqual([
      { cloud: "GCP", fields: { billing_account_id: "b1", usage_start_time: "2024-03-05T00:00:00Z", cost: 1 } },
    ]);
  });

  it("reports a truncated export as partial data", async () => {
    const path = join(dir, "aws.json");
    writeFileSync(path, JSON.stringify({ truncated: true, facts: [makeAwsFact().fields] }));
    const error = await new JsonFileAdapter("AWS", path).fetch(WINDOW).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(PartialDataError);
    expect(error instanceof PartialDataError ? error.facts : []).toHaveLength(1);
  });

  it("reports a missing file as an unavailable source", async () => {
    await expect(new JsonFileAdapter("Azure", join(dir, "missing.json")).fetch(WINDOW)).rejects.toBeInstanceOf(
      SourceUnavailableError,
    );
  });
});

// ── Sync Coordinator ─────────────────────────────────────────────

describe("SyncCoordinator", () => {
  let store: InMemoryCostStore;

  beforeEach(() => {
    store = new InMemoryCostStore();
    store.initialize();
  });

  it("commits one batch per cloud with a deterministic id", async () => {
    const { coordinator } = makeCoordinator(store);
    coordinator
      .register(new StaticAdapter("AWS", [makeAwsFact()]))
      .register(new StaticAdapter("Other", [makeOtherFact()]));

    const results = await coordinator.sync({ window: WINDOW });

    expect(results.map((r) => r.run.status)).toEqual(["success", "success"]);
    expect(store.listBatches().map((b) => b.batchId).sort()).toEqual([
      "AWS:2024-03-01T00:00:00.000Z:2024-04-01T00:00:00.000Z",
      "Other:2024-03-01T00:00:00.000Z:2024-04-01T00:00:00.000Z",
    ]);
    expect(store.snapshot().records).toHaveLength(2);
  });

  it("canonicalizes the window before building the batch id", () => {
    expect(syncBatchId("GCP", WINDOW)).toBe("GCP:2024-03-01T00:00:00.000Z:2024-04-01T00:00:00.000Z");
  });

  it("is idempotent when the same window is synced twice", async () => {
    const { coordinator } = makeCoordinator(store);
    coordinator.register(new StaticAdapter("AWS", [makeAwsFact()]));

    await coordinator.sync({ window: { start: "2024-03-01", end: "2024-04-01" } });
    const first = store.snapshot().records.map((r) => ({ ...r }));
    await coordinator.sync({ window: WINDOW });

    expect(store.snapshot().records).toEqual(first);
    expect(store.listBatches()).toHaveLength(1);
  });

  it("records a failed run and keeps the previous data", async () => {
    const { coordinator } = makeCoordinator(store);
    const adapter = new StaticAdapter("AWS", [makeAwsFact()]);
    coordinator.register(adapter);
    await coordinator.sync({ window: WINDOW });

    adapter.failNext(new AuthError("AWS", "expired token"));
    const [result] = await coordinator.sync({ window: WINDOW });

    expect(result.run.status).toBe("failed");
    expect(result.run.error).toBe("expired token");
    expect(result.run.batchId).toBeUndefined();
    expect(store.snapshot().records).toHaveLength(1);

    const status = coordinator.lastSync("AWS");
    expect(status?.failed).toBe(true);
    expect(status?.message).toBe("last sync failed at 2024-04-02T00:00:00.000Z: expired token");
    expect(status?.lastSuccessfulRun?.status).toBe("success");
  });

  it("does not let one failing cloud stop the others", async () => {
    const { coordinator } = makeCoordinator(store);
    const gcp = new StaticAdapter("GCP");
    gcp.failNext(new SourceUnavailableError("GCP"));
    coordinator.register(gcp).register(new StaticAdapter("AWS", [makeAwsFact()]));

    const results = await coordinator.sync({ window: WINDOW });

    expect(results.map((r) => [r.run.cloud, r.run.status])).toEqual([
      ["GCP", "failed"],
      ["AWS", "success"],
    ]);
    expect(store.snapshot().records).toHaveLength(1);
  });

  it("does not commit partial data unless asked", async () => {
    const { coordinator } = makeCoordinator(store);
    const adapter = new StaticAdapter("AWS");
    coordinator.register(adapter);

    adapter.failNext(new PartialDataError("AWS", [makeAwsFact()]));
    const [rejected] = await coordinator.sync({ window: WINDOW });
    expect(rejected.run.status).toBe("partial");
    expect(store.snapshot().records).toEqual([]);

    adapter.failNext(new PartialDataError("AWS", [makeAwsFact()]));
    const [accepted] = await coordinator.sync({ window: WINDOW, acceptPartial: true });
    expect(accepted.run.status).toBe("partial");
    expect(accepted.run.recordCount).toBe(1);
    expect(store.snapshot().records).toHaveLength(1);
  });

  it("keeps complete data that a later partial sync left out", async () => {
    const { coordinator } = makeCoordinator(store);
    const adapter = new StaticAdapter("AWS", [
      makeAwsFact({ "lineItem/ResourceId": "i-1" }),
      makeAwsFact({ "lineItem/ResourceId": "i-2" }),
      makeAwsFact({ "lineItem/ResourceId": "i-3" }),
    ]);
    coordinator.register(adapter);
    await coordinator.sync({ window: WINDOW });

    adapter.failNext(
      new PartialDataError("AWS", [makeAwsFact({ "lineItem/ResourceId": "i-1", "lineItem/UnblendedCost": "150.00" })]),
    );
    const [partial] = await coordinator.sync({ window: WINDOW, acceptPartial: true });

    expect(partial.run.status).toBe("partial");
    expect(partial.run.batchId).toBe(partialBatchId("AWS", WINDOW));
    const amounts = () =>
      store
        .snapshot()
        .records.map((r): [string, number] => [r.resourceId ?? "", r.amountMinorUnits])
        .sort(([a], [b]) => a.localeCompare(b));
    expect(amounts()).toEqual([
      ["i-1", 15000],
      ["i-2", 12000],
      ["i-3", 12000],
    ]);

    // A complete re-sync supersedes the partial batch.
    adapter.setFacts([makeAwsFact({ "lineItem/ResourceId": "i-1" }), makeAwsFact({ "lineItem/ResourceId": "i-2" })]);
    const [complete] = await coordinator.sync({ window: WINDOW });

    expect(complete.run.batchId).toBe(syncBatchId("AWS", WINDOW));
    expect(amounts()).toEqual([
      ["i-1", 12000],
      ["i-2", 12000],
    ]);
    expect(store.listBatches().find((b) => b.batchId === partialBatchId("AWS", WINDOW))?.recordCount).toBe(0);
  });

  it("commits facts whose service names Object.prototype members on SQLite", async () => {
    const sqlite = new SQLiteCostStore(":memory:");
    sqlite.initialize();
    try {
      const { coordinator } = makeCoordinator(sqlite);
      coordinator.register(
        new StaticAdapter("Other", [makeOtherFact(), makeOtherFact({ accountId: "acct-2", service: "toString" })]),
      );

      const [result] = await coordinator.sync({ window: WINDOW });

      expect(result.run.status).toBe("success");
      expect(result.run.recordCount).toBe(2);
      expect(sqlite.snapshot().records.map((r) => [r.accountId, r.service, r.providerService])).toEqual([
        ["acct-1", "Other", "Hosting"],
        ["acct-2", "Other", "toString"],
      ]);
    } finally {
      sqlite.close();
    }
  });

  it("syncs only the requested clouds", async () => {
    const { coordinator } = makeCoordinator(store);
    const aws = new StaticAdapter("AWS", [makeAwsFact()]);
    const other = new StaticAdapter("Other", [makeOtherFact()]);
    coordinator.register(aws).register(other);

    await coordinator.sync({ window: WINDOW, clouds: ["Other"] });
    expect(aws.fetchCount).toBe(0);
    expect(other.fetchCount).toBe(1);
  });

  it("rejects an empty window", async () => {
    const { coordinator } = makeCoordinator(store);
    await expect(
      coordinator.sync({ window: { start: WINDOW.end, end: WINDOW.start } }),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("returns null from lastSync for a cloud that never synced", () => {
    const { coordinator } = makeCoordinator(store);
    expect(coordinator.lastSync("Azure")).toBeNull();
  });

  it("reports run counts and data quality issues", async () => {
    const { coordinator } = makeCoordinator(store);
    coordinator.register(
      new StaticAdapter("Other", [
        makeOtherFact(),
        makeOtherFact({ accountId: "acct-2", currency: "EUR" }),
        makeOtherFact({ accountId: "acct-3", amount: "-4.00" }),
      ]),
    );

    const [result] = await coordinator.sync({ window: WINDOW });
    expect(result.run.recordCount).toBe(1);
    expect(result.run.pendingCount).toBe(1);
    expect(result.run.rejectedCount).toBe(1);
    expect(result.issues.map((i) => i.code).sort()).toEqual([
      "CurrencyConversionUnavailable",
      "InvalidAmountSign",
      "UnmappableService",
    ]);
  });

  it("recovers pending facts once a rate exists", async () => {
    const { coordinator: first } = makeCoordinator(store);
    first.register(new StaticAdapter("Other", [makeOtherFact({ currency: "EUR", amount: "10.00" })]));
    await first.sync({ window: WINDOW });
    expect(store.listPending()).toHaveLength(1);

    const withoutRate = makeCoordinator(store).coordinator.retryPending();
    expect(withoutRate).toEqual({ batchIds: [], recovered: 0, stillPending: 1 });

    const config = resolveConfig({
      currencyRates: [{ currency: "EUR", effectiveFrom: "2024-01-01T00:00:00Z", rate: 1.1 }],
    });
    const { coordinator: second } = makeCoordinator(store, config);
    const result = second.retryPending();

    expect(result.recovered).toBe(1);
    expect(result.stillPending).toBe(0);
    expect(result.batchIds).toHaveLength(1);
    expect(result.batchIds[0].startsWith("Other:2024-03-01T00:00:00.000Z:2024-04-01T00:00:00.000Z:late:")).toBe(true);
    expect(store.listPending()).toEqual([]);

    const [record] = store.snapshot().records;
    expect(record.amountMinorUnits).toBe(1100);
    expect(record.originalCurrency).toBe("EUR");
  });
});
