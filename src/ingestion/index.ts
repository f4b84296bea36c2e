export {
  type IngestionAdapter,
  AdapterRegistry,
  StaticAdapter,
  JsonFileAdapter,
  factsInWindow,
} from "./adapter.js";
export {
  SyncCoordinator,
  syncBatchId,
  type SyncOptions,
  type CloudSyncResult,
  type LastSyncStatus,
  type RetryPendingResult,
} from "./sync.js";
