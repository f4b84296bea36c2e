/**
 * Cloud Ledger — Service Wiring
 *
 * Opens the stores for one configuration and builds the engines over them.
 * A dbPath of ":memory:" keeps every store in process.
 */

import { AggregationEngine } from "./aggregation/engine.js";
import { AllocationEngine } from "./allocation/engine.js";
import { BudgetManager } from "./budgets/manager.js";
import { BudgetTracker } from "./budgets/tracker.js";
import { defaultBudgetsPath, defaultDbPath } from "./config/loader.js";
import type { EngineConfig } from "./config/schema.js";
import { GovernanceEngine } from "./governance/engine.js";
import {
  InMemoryPolicyStorage,
  InMemoryViolationStore,
  SQLitePolicyStorage,
  SQLiteViolationStore,
} from "./governance/storage.js";
import type { PolicyStorage, ResourceMetadataProvider, ViolationStore } from "./governance/types.js";
import { SyncCoordinator } from "./ingestion/sync.js";
import { getLedgerLogger, type LedgerLogger } from "./logging/index.js";
import { OverviewService } from "./overview.js";
import { openCostStore } from "./store/index.js";
import type { CostStore } from "./types.js";

export type Ledger = {
  config: EngineConfig;
  store: CostStore;
  sync: SyncCoordinator;
  aggregation: AggregationEngine;
  budgets: BudgetManager;
  allocation: AllocationEngine;
  governance: GovernanceEngine;
  overview: OverviewService;
  close(): Promise<void>;
};

export type LedgerOptions = {
  /** Overrides `storage.dbPath`. */
  dbPath?: string;
  /** Overrides `storage.budgetsPath`; null keeps budgets in memory. */
  budgetsPath?: string | null;
  metadata?: ResourceMetadataProvider;
  logger?: LedgerLogger;
  clock?: () => Date;
};

export async function createLedger(config: EngineConfig, options: LedgerOptions = {}): Promise<Ledger> {
  const logger = options.logger ?? getLedgerLogger();
  const dbPath = options.dbPath ?? defaultDbPath(config);
  const inMemory = dbPath === ":memory:";

  const store = openCostStore(dbPath);
  const policies: PolicyStorage = inMemory ? new InMemoryPolicyStorage() : new SQLitePolicyStorage(dbPath);
  const violations: ViolationStore = inMemory ? new InMemoryViolationStore() : new SQLiteViolationStore(dbPath);
  await policies.initialize();
  await violations.initialize();

  const budgetsPath = options.budgetsPath !== undefined ? options.budgetsPath : inMemory ? null : defaultBudgetsPath(config);
  const aggregation = new AggregationEngine(store, config);
  const budgets = new BudgetManager(new BudgetTracker(aggregation, config), budgetsPath);
  const governance = new GovernanceEngine(store, policies, violations, config, {
    metadata: options.metadata,
    logger: logger.child("governance"),
    clock: options.clock,
  });
  await governance.installConfiguredPolicies();

  logger.debug("Ledger opened", { dbPath, budgetsPath });

  return {
    config,
    store,
    sync: new SyncCoordinator(store, config, { logger: logger.child("sync"), clock: options.clock }),
    aggregation,
    budgets,
    allocation: new AllocationEngine(store, config, logger.child("allocation")),
    governance,
    overview: new OverviewService(store, aggregation, budgets, governance, config, logger.child("overview")),
    async close() {
      await policies.close();
      await violations.close();
      store.close();
    },
  };
}
