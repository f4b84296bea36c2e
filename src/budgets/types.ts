/**
 * Budget definitions and evaluated status.
 */

import { z } from "zod";
import { scopeSchema } from "../config/schema.js";

export const budgetPeriodSchema = z.object({
  kind: z.enum(["monthly", "quarterly"]),
  /** Any instant; periods start on this day-of-month and time. */
  anchor: z.string().refine((v) => !Number.isNaN(Date.parse(v)), { message: "expected an ISO-8601 date" }),
});

export const budgetSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  scope: scopeSchema.optional(),
  amountMinorUnits: z.number().int().positive(),
  currency: z.string().regex(/^[A-Z]{3}$/, "expected an ISO 4217 currency code"),
  period: budgetPeriodSchema,
  alertThresholdPct: z.number().positive().max(1000).default(80),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const budgetInputSchema = budgetSchema
  .omit({ createdAt: true, updatedAt: true })
  .extend({ id: z.string().min(1).optional() });

export type BudgetPeriod = z.infer<typeof budgetPeriodSchema>;
export type Budget = z.infer<typeof budgetSchema>;
export type BudgetInput = z.input<typeof budgetInputSchema>;

export type BudgetHealth = "on_track" | "at_risk" | "over";

/** A projection, or the reason there is none. */
export type Projection = { kind: "projected"; amountMinorUnits: number } | { kind: "insufficient_data" };

export type BudgetStatus = {
  budgetId: string;
  budgetName: string;
  currency: string;
  amountMinorUnits: number;
  consumedMinorUnits: number;
  consumedPct: number;
  /** Share of the period that has elapsed, as a percentage. */
  expectedPct: number;
  status: BudgetHealth;
  forecast: Projection;
  /** forecast − amount; positive means projected overspend. */
  variance: Projection;
  daysElapsed: number;
  daysInPeriod: number;
  periodStart: string;
  periodEnd: string;
  asOf: string;
  alertTriggered: boolean;
  /** No records in the consumed range. */
  insufficientData: boolean;
};
