export {
  AllocationEngine,
  splitByShares,
  type Allocation,
  type AllocationQuery,
  type AllocationResult,
} from "./engine.js";
export {
  validateAllocationRule,
  validateAllocationRules,
  allocationRuleIssues,
  SHARE_EPSILON,
  type AllocationRule,
} from "./rules.js";
