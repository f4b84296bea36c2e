/**
 * Governance Module Index
 */

export * from "./types.js";
export { getField, conditionData, evaluateCondition } from "./conditions.js";
export { parsePolicyInput, validatePolicyInputs } from "./validation.js";
export {
  InMemoryPolicyStorage,
  InMemoryViolationStore,
  SQLitePolicyStorage,
  SQLiteViolationStore,
  createPolicyFromInput,
} from "./storage.js";
export { POLICY_LIBRARY, APPROVED_PRODUCTION_REGIONS, getLibraryPolicies, getLibraryPolicy, type LibraryPolicy } from "./library.js";
export { StaticMetadataProvider, loadMetadataFile } from "./metadata.js";
export {
  GovernanceEngine,
  violationId,
  partitionSubjects,
  accountSubjects,
  subjectFacts,
  evaluatePolicy,
  type CycleOptions,
  type CycleResult,
  type GovernanceEngineOptions,
} from "./engine.js";
