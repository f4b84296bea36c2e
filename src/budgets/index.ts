export { BudgetTracker } from "./tracker.js";
export { BudgetManager } from "./manager.js";
export {
  budgetSchema,
  budgetInputSchema,
  budgetPeriodSchema,
  type Budget,
  type BudgetInput,
  type BudgetPeriod,
  type BudgetHealth,
  type BudgetStatus,
  type Projection,
} from "./types.js";
