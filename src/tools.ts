/**
 * Cloud Ledger — Agent Tools
 *
 * 4 tools: cost_aggregate, cost_budget_status, cost_allocate, governance_violations
 *
 * Input is checked against the TypeBox schema before anything runs. Invalid
 * input and ledger errors come back as error results; anything else throws.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { AggregationEngine } from "./aggregation/engine.js";
import type { AllocationEngine } from "./allocation/engine.js";
import type { BudgetManager } from "./budgets/manager.js";
import { LedgerError } from "./errors.js";
import type { GovernanceEngine } from "./governance/engine.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export type LedgerTool = {
  name: string;
  description: string;
  inputSchema: TSchema;
  execute: (input: unknown) => Promise<ToolResult>;
};

export type LedgerToolDeps = {
  aggregation: AggregationEngine;
  budgets: BudgetManager;
  allocation: AllocationEngine;
  governance: GovernanceEngine;
  clock?: () => Date;
};

function textResult(value: unknown, isError = false): ToolResult {
  const result: ToolResult = { content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }] };
  if (isError) result.isError = true;
  return result;
}

function defineTool<T extends TSchema>(
  name: string,
  description: string,
  inputSchema: T,
  run: (input: Static<T>) => unknown,
): LedgerTool {
  return {
    name,
    description,
    inputSchema,
    execute: async (input: unknown) => {
      if (!Value.Check(inputSchema, input)) {
        const issues = [...Value.Errors(inputSchema, input)].map((e) => `${e.path || "/"}: ${e.message}`);
        return textResult({ error: "InvalidInput", issues }, true);
      }
      try {
        return textResult(await run(input));
      } catch (err) {
        if (err instanceof LedgerError) {
          return textResult({ error: err.code, message: err.message }, true);
        }
        throw err;
      }
    },
  };
}

// ── Shared schemas ────────────────────────────────────────────────

const CloudSchema = Type.Union([Type.Literal("AWS"), Type.Literal("GCP"), Type.Literal("Azure"), Type.Literal("Other")]);

const ScopeSchema = Type.Object(
  {
    clouds: Type.Optional(Type.Array(CloudSchema)),
    accountIds: Type.Optional(Type.Array(Type.String())),
    projectIds: Type.Optional(Type.Array(Type.String())),
    services: Type.Optional(Type.Array(Type.String())),
    resourceIds: Type.Optional(Type.Array(Type.String())),
    tags: Type.Optional(Type.Record(Type.String(), Type.Union([Type.String(), Type.Array(Type.String())]))),
  },
  { description: "Filter by cloud, account, project, service, resource or tag values", additionalProperties: false },
);

const RangeStart = Type.String({ description: "Inclusive range start (ISO-8601 UTC)" });
const RangeEnd = Type.String({ description: "Exclusive range end (ISO-8601 UTC)" });

// ── Tools ─────────────────────────────────────────────────────────

export function createLedgerTools(deps: LedgerToolDeps): LedgerTool[] {
  const clock = deps.clock ?? (() => new Date());

  return [
    defineTool(
      "cost_aggregate",
      "Total spend over a range grouped by account, project, team, product, service, cloud, day or month, with trend against the previous period.",
      Type.Object({
        groupBy: Type.Union([
          Type.Literal("account"),
          Type.Literal("project"),
          Type.Literal("team"),
          Type.Literal("product"),
          Type.Literal("service"),
          Type.Literal("cloud"),
          Type.Literal("day"),
          Type.Literal("month"),
        ]),
        start: RangeStart,
        end: RangeEnd,
        filter: Type.Optional(ScopeSchema),
      }),
      (input) =>
        deps.aggregation.aggregate({
          groupBy: input.groupBy,
          range: { start: input.start, end: input.end },
          filter: input.filter,
        }),
    ),
    defineTool(
      "cost_budget_status",
      "Budget consumption, health and forecast as of an instant. Evaluates every budget when no id is given.",
      Type.Object({
        budgetId: Type.Optional(Type.String({ description: "Budget id" })),
        asOf: Type.Optional(Type.String({ description: "Evaluation instant (ISO-8601 UTC); defaults to now" })),
      }),
      (input) => {
        const asOf = input.asOf ?? clock().toISOString();
        return input.budgetId === undefined
          ? deps.budgets.evaluateAll(asOf)
          : deps.budgets.evaluate(input.budgetId, asOf);
      },
    ),
    defineTool(
      "cost_allocate",
      "Distribute spend over teams or products with a configured allocation rule (chargeback/showback).",
      Type.Object({
        ruleId: Type.String({ description: "Allocation rule id from configuration" }),
        start: RangeStart,
        end: RangeEnd,
        filter: Type.Optional(ScopeSchema),
      }),
      (input) =>
        deps.allocation.allocateById(input.ruleId, {
          range: { start: input.start, end: input.end },
          filter: input.filter,
        }),
    ),
    defineTool(
      "governance_violations",
      "List governance violations, optionally filtered by status, severity, policy, cloud, account or window.",
      Type.Object({
        status: Type.Optional(Type.Union([Type.Literal("open"), Type.Literal("approved"), Type.Literal("rejected")])),
        severity: Type.Optional(
          Type.Union([Type.Literal("low"), Type.Literal("medium"), Type.Literal("high"), Type.Literal("critical")]),
        ),
        policyId: Type.Optional(Type.String()),
        cloud: Type.Optional(CloudSchema),
        accountId: Type.Optional(Type.String()),
        start: Type.Optional(Type.String({ description: "Only violations whose window ends after this instant" })),
        end: Type.Optional(Type.String({ description: "Only violations whose window starts before this instant" })),
      }),
      (input) =>
        deps.governance.listViolations({
          status: input.status,
          severity: input.severity,
          policyId: input.policyId,
          cloud: input.cloud,
          accountId: input.accountId,
          windowStart: input.start,
          windowEnd: input.end,
        }),
    ),
  ];
}
