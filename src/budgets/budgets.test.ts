/**
 * Budgets — Tests
 *
 * Covers: status thresholds, the 100% boundary, forecasting, periods,
 * scope, currency checks and BudgetManager persistence.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, writeFileSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { BudgetTracker } from "./tracker.js";
import { BudgetManager } from "./manager.js";
import { AggregationEngine } from "../aggregation/engine.js";
import { resolveConfig } from "../config/loader.js";
import { InvalidBudgetError } from "../errors.js";
import { InMemoryCostStore } from "../store/memory-store.js";
import { makeRecord } from "../test-utils.js";
import type { Budget } from "./types.js";

// ── Helpers ──────────────────────────────────────────────────────

function makeBudget(overrides: Partial<Budget> = {}): Budget {
  return {
    id: "budget-1",
    name: "Platform",
    amountMinorUnits: 10000,
    currency: "USD",
    period: { kind: "monthly", anchor: "2024-03-01T00:00:00Z" },
    alertThresholdPct: 80,
    createdAt: "2024-03-01T00:00:00.000Z",
    updatedAt: "2024-03-01T00:00:00.000Z",
    ...overrides,
  };
}

let store: InMemoryCostStore;
let tracker: BudgetTracker;

function spend(amountMinorUnits: number, overrides: Parameters<typeof makeRecord>[0] = {}): void {
  store.commitBatch(`b-${store.listBatches().length}`, [
    makeRecord({ periodStart: "2024-03-05T00:00:00.000Z", periodEnd: "2024-03-06T00:00:00.000Z", amountMinorUnits, ...overrides }),
  ]);
}

beforeEach(() => {
  store = new InMemoryCostStore();
  store.initialize();
  const config = resolveConfig({});
  tracker = new BudgetTracker(new AggregationEngine(store, config), config);
});

// ── Tracker ──────────────────────────────────────────────────────

describe("BudgetTracker.evaluate", () => {
  const MID_MARCH = "2024-03-16T00:00:00.000Z";

  it("reports an on-track budget with a run-rate forecast", () => {
    spend(4000);
    const status = tracker.evaluate(makeBudget(), MID_MARCH);

    expect(status).toEqual({
      budgetId: "budget-1",
      budgetName: "Platform",
      currency: "USD",
      amountMinorUnits: 10000,
      consumedMinorUnits: 4000,
      consumedPct: 40,
      expectedPct: 48.39,
      status: "on_track",
      forecast: { kind: "projected", amountMinorUnits: 8267 },
      variance: { kind: "projected", amountMinorUnits: -1733 },
      daysElapsed: 15,
      daysInPeriod: 31,
      periodStart: "2024-03-01T00:00:00.000Z",
      periodEnd: "2024-04-01T00:00:00.000Z",
      asOf: MID_MARCH,
      alertTriggered: false,
      insufficientData: false,
    });
  });

  it("flags spend running ahead of time as at risk", () => {
    spend(6000);
    const status = tracker.evaluate(makeBudget(), MID_MARCH);
    expect(status.status).toBe("at_risk");
    expect(status.forecast).toEqual({ kind: "projected", amountMinorUnits: 12400 });
    expect(status.variance).toEqual({ kind: "projected", amountMinorUnits: 2400 });
  });

  it("is over at exactly 100%", () => {
    spend(10000);
    const status = tracker.evaluate(makeBudget(), MID_MARCH);
    expect(status.status).toBe("over");
    expect(status.consumedPct).toBe(100);
    expect(status.alertTriggered).toBe(true);
  });

  it("is not over at 99.99%", () => {
    spend(9999);
    const status = tracker.evaluate(makeBudget(), "2024-03-31T12:00:00.000Z");
    expect(status.consumedPct).toBe(99.99);
    expect(status.status).toBe("on_track");
    expect(status.alertTriggered).toBe(true);
  });

  it("has no forecast before a whole day has elapsed", () => {
    spend(500, { periodStart: "2024-03-01T00:00:00.000Z", periodEnd: "2024-03-01T01:00:00.000Z" });
    const status = tracker.evaluate(makeBudget(), "2024-03-01T06:00:00.000Z");
    expect(status.consumedMinorUnits).toBe(500);
    expect(status.daysElapsed).toBe(0);
    expect(status.forecast).toEqual({ kind: "insufficient_data" });
    expect(status.variance).toEqual({ kind: "insufficient_data" });
  });

  it("reports insufficient data at the start of the period", () => {
    const status = tracker.evaluate(makeBudget(), "2024-03-01T00:00:00.000Z");
    expect(status.consumedMinorUnits).toBe(0);
    expect(status.insufficientData).toBe(true);
    expect(status.expectedPct).toBe(0);
    expect(status.status).toBe("on_track");
  });

  it("anchors quarterly periods on the anchor day", () => {
    const status = tracker.evaluate(
      makeBudget({ period: { kind: "quarterly", anchor: "2024-01-15T00:00:00Z" } }),
      "2024-05-01T00:00:00.000Z",
    );
    expect(status.periodStart).toBe("2024-04-15T00:00:00.000Z");
    expect(status.periodEnd).toBe("2024-07-15T00:00:00.000Z");
    expect(status.daysInPeriod).toBe(91);
    expect(status.daysElapsed).toBe(16);
  });

  it("only counts spend inside the budget scope", () => {
    spend(4000, { accountId: "A1" });
    spend(2500, { accountId: "A2" });
    const status = tracker.evaluate(makeBudget({ scope: { accountIds: ["A2"] } }), MID_MARCH);
    expect(status.consumedMinorUnits).toBe(2500);
  });

  it("does not count spend after asOf", () => {
    spend(4000, { periodStart: "2024-03-20T00:00:00.000Z", periodEnd: "2024-03-21T00:00:00.000Z" });
    expect(tracker.evaluate(makeBudget(), MID_MARCH).consumedMinorUnits).toBe(0);
  });

  it("rejects a budget in another currency", () => {
    expect(() => tracker.evaluate(makeBudget({ currency: "EUR" }), MID_MARCH)).toThrow(InvalidBudgetError);
  });
});

// ── Manager ──────────────────────────────────────────────────────

describe("BudgetManager", () => {
  const dir = join(tmpdir(), "cloudledger-budgets-test");
  const filePath = join(dir, "budgets.json");

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const input = {
    name: "Data team",
    amountMinorUnits: 50000,
    currency: "USD",
    period: { kind: "monthly" as const, anchor: "2024-03-01T00:00:00Z" },
  };

  it("creates budgets with defaults and an id", () => {
    const manager = new BudgetManager(tracker);
    const budget = manager.setBudget(input);
    expect(budget.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(budget.alertThresholdPct).toBe(80);
    expect(manager.getBudget(budget.id)).toEqual(budget);
  });

  it("replaces a budget with the same id and keeps createdAt", () => {
    const manager = new BudgetManager(tracker);
    const first = manager.setBudget({ ...input, id: "data" });
    const second = manager.setBudget({ ...input, id: "data", amountMinorUnits: 60000 });
    expect(manager.listBudgets()).toHaveLength(1);
    expect(second.amountMinorUnits).toBe(60000);
    expect(second.createdAt).toBe(first.createdAt);
  });

  it("validates input", () => {
    const manager = new BudgetManager(tracker);
    expect(() => manager.setBudget({ ...input, amountMinorUnits: -5 })).toThrow(InvalidBudgetError);
    expect(() => manager.setBudget({ ...input, currency: "EUR" })).toThrow(InvalidBudgetError);
  });

  it("deletes budgets", () => {
    const manager = new BudgetManager(tracker);
    manager.setBudget({ ...input, id: "data" });
    expect(manager.deleteBudget("data")).toBe(true);
    expect(manager.deleteBudget("data")).toBe(false);
  });

  it("persists budgets to a JSON file", () => {
    const manager = new BudgetManager(tracker, filePath);
    manager.setBudget({ ...input, id: "data" });

    const saved = JSON.parse(readFileSync(filePath, "utf-8")) as Budget[];
    expect(saved.map((b) => b.id)).toEqual(["data"]);

    const reloaded = new BudgetManager(tracker, filePath);
    expect(reloaded.getBudget("data")?.name).toBe("Data team");
  });

  it("refuses to start from a malformed file", () => {
    mkdirSync(dir, { recursive: true });
    writeFileSync(filePath, JSON.stringify([{ id: "x" }]));
    expect(() => new BudgetManager(tracker, filePath)).toThrow(InvalidBudgetError);

    writeFileSync(filePath, "{not json");
    expect(() => new BudgetManager(tracker, filePath)).toThrow(InvalidBudgetError);
  });

  it("evaluates every budget", () => {
    spend(4000);
    const manager = new BudgetManager(tracker);
    manager.setBudget({ ...input, id: "small", amountMinorUnits: 3000 });
    manager.setBudget({ ...input, id: "large", amountMinorUnits: 100000 });

    const statuses = manager.evaluateAll("2024-03-16T00:00:00.000Z");
    expect(statuses.map((s) => [s.budgetId, s.status])).toEqual([
      ["small", "over"],
      ["large", "on_track"],
    ]);
  });
});
