import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { CostStore } from "../types.js";
import { InMemoryCostStore } from "./memory-store.js";
import { SQLiteCostStore } from "./sqlite-store.js";

export { InMemoryCostStore } from "./memory-store.js";
export { SQLiteCostStore } from "./sqlite-store.js";
export { recordKey, dedupeWithinBatch, effectiveRecords } from "./record-key.js";

/** Open (and initialize) the store at `dbPath`; ":memory:" gives a throwaway in-process store. */
export function openCostStore(dbPath: string): CostStore {
  if (dbPath === ":memory:") {
    const store = new InMemoryCostStore();
    store.initialize();
    return store;
  }
  mkdirSync(dirname(dbPath), { recursive: true });
  const store = new SQLiteCostStore(dbPath);
  store.initialize();
  return store;
}
