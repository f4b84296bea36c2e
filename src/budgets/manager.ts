/**
 * Budget manager — CRUD for budget definitions plus evaluation of all of them.
 * Supports in-memory (tests) and JSON file persistence (~/.cloudledger/budgets.json).
 */

import { randomUUID } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { InvalidBudgetError, NotFoundError, errorMessage } from "../errors.js";
import type { CostSnapshot } from "../types.js";
import type { BudgetTracker } from "./tracker.js";
import { budgetInputSchema, budgetSchema, type Budget, type BudgetInput, type BudgetStatus } from "./types.js";

export class BudgetManager {
  private budgets: Map<string, Budget> = new Map();

  /**
   * @param filePath JSON file path for persistence; `null` keeps budgets in memory only.
   */
  constructor(
    private readonly tracker: BudgetTracker,
    private readonly filePath: string | null = null,
  ) {
    this.load();
  }

  /** Load budgets from disk (no-op for in-memory mode). */
  private load(): void {
    if (!this.filePath || !existsSync(this.filePath)) return;

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, "utf-8"));
    } catch (err) {
      throw new InvalidBudgetError(`Budget file ${this.filePath} is not valid JSON: ${errorMessage(err)}`);
    }

    const parsed = z.array(budgetSchema).safeParse(raw);
    if (!parsed.success) {
      throw new InvalidBudgetError(
        `Budget file ${this.filePath} is malformed`,
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      );
    }
    for (const b of parsed.data) this.budgets.set(b.id, b);
  }

  /** Flush budgets to disk (no-op for in-memory mode). */
  private save(): void {
    if (!this.filePath) return;
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify([...this.budgets.values()], null, 2));
  }

  /** Create or replace a budget. */
  setBudget(input: BudgetInput): Budget {
    const parsed = budgetInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidBudgetError(
        `Invalid budget "${input.name}"`,
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      );
    }

    const data = parsed.data;
    const id = data.id ?? randomUUID();
    this.tracker.assertCompatible({ id, currency: data.currency });

    const existing = this.budgets.get(id);
    const now = new Date().toISOString();
    const budget: Budget = {
      ...data,
      id,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };

    this.budgets.set(id, budget);
    this.save();
    return budget;
  }

  getBudget(id: string): Budget | null {
    return this.budgets.get(id) ?? null;
  }

  listBudgets(): Budget[] {
    return [...this.budgets.values()];
  }

  deleteBudget(id: string): boolean {
    const ok = this.budgets.delete(id);
    if (ok) this.save();
    return ok;
  }

  evaluate(id: string, asOf: Date | string, snapshot?: CostSnapshot): BudgetStatus {
    const budget = this.budgets.get(id);
    if (!budget) throw new NotFoundError("Budget", id);
    return this.tracker.evaluate(budget, asOf, snapshot);
  }

  /** Status of every budget against one snapshot, in definition order. */
  evaluateAll(asOf: Date | string, snapshot?: CostSnapshot): BudgetStatus[] {
    return this.listBudgets().map((b) => this.tracker.evaluate(b, asOf, snapshot));
  }
}
