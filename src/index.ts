/**
 * Cloud Ledger — Public API
 */

export * from "./types.js";
export * from "./errors.js";
export * from "./logging/index.js";
export * from "./ingestion/index.js";
export * from "./normalizer/index.js";
export * from "./store/index.js";
export * from "./allocation/index.js";
export * from "./budgets/index.js";
export * from "./governance/index.js";

export {
  AggregationEngine,
  aggregateRecords,
  percentage,
  selectRecords,
  UNALLOCATED,
  NO_PROJECT,
} from "./aggregation/engine.js";
export {
  engineConfigSchema,
  type EngineConfig,
  type EngineConfigInput,
  type CurrencyRate,
  type TagPolicy,
  type ServiceCatalog,
} from "./config/schema.js";
export { loadConfig, resolveConfig, loadBundledServiceCatalog } from "./config/loader.js";
export { formatMinorUnits, formatMoney, parseMajorToMinor, convertMinorUnits } from "./money.js";
export { matchesScope, intersectScopes, describeScope } from "./scope.js";
export { OverviewService, loadRecommendations, summarizeSavings, type Overview, type OverviewOptions } from "./overview.js";
export { createLedger, type Ledger, type LedgerOptions } from "./ledger.js";
export { createLedgerTools, type LedgerTool, type LedgerToolDeps, type ToolResult } from "./tools.js";
export { aggregationToCsv, budgetStatusesToCsv, allocationToCsv, violationsToCsv, csvEscape, toCsv } from "./export/csv.js";
export { buildProgram } from "./cli/program.js";
export { VERSION } from "./version.js";
