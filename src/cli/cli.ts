/**
 * Cloud Ledger — CLI Commands
 *
 * Commands: sync, sync-status, retry-pending, spend, budget list|status|set|delete,
 * allocate, governance scan|violations|approve|reject|policies|add, overview
 *
 * Every command opens the ledger, does its work and closes it again.
 * Row-returning commands print a table, or JSON with --json, or CSV with --csv.
 */

import { readFileSync } from "node:fs";
import type { Command } from "commander";
import { budgetInputSchema } from "../budgets/types.js";
import { ConfigurationError, InvalidBudgetError, InvalidQueryError, errorMessage } from "../errors.js";
import { aggregationToCsv, allocationToCsv, budgetStatusesToCsv, violationsToCsv } from "../export/csv.js";
import { POLICY_SEVERITIES, type PolicySeverity, type ViolationStatus } from "../governance/types.js";
import { loadMetadataFile } from "../governance/metadata.js";
import { JsonFileAdapter } from "../ingestion/adapter.js";
import type { LastSyncStatus } from "../ingestion/sync.js";
import type { Ledger, LedgerOptions } from "../ledger.js";
import { formatMoney } from "../money.js";
import { loadRecommendations } from "../overview.js";
import { CLOUDS, type Cloud, type GroupBy } from "../types.js";
import {
  addRangeOptions,
  addScopeOptions,
  describeRange,
  formatTrend,
  parseCloud,
  printCsv,
  printJson,
  resolveInstant,
  resolveRange,
  resolveScope,
  table,
  type OutputOptions,
  type RangeOptions,
  type ScopeOptions,
} from "./format.js";

// =============================================================================
// Types
// =============================================================================

export type CliContext = {
  program: Command;
  openLedger: (options?: LedgerOptions) => Promise<Ledger>;
  clock?: () => Date;
};

const GROUP_BY: readonly GroupBy[] = ["account", "project", "team", "product", "service", "cloud", "day", "month"];

const VIOLATION_STATUSES: readonly ViolationStatus[] = ["open", "approved", "rejected"];

function parseGroupBy(value: string): GroupBy {
  const match = GROUP_BY.find((g) => g === value);
  if (!match) throw new InvalidQueryError(`Unknown dimension "${value}"; expected one of ${GROUP_BY.join(", ")}`);
  return match;
}

function parseSeverity(value: string): PolicySeverity {
  const match = POLICY_SEVERITIES.find((s) => s === value);
  if (!match) throw new InvalidQueryError(`Unknown severity "${value}"; expected one of ${POLICY_SEVERITIES.join(", ")}`);
  return match;
}

function parseViolationStatus(value: string): ViolationStatus {
  const match = VIOLATION_STATUSES.find((s) => s === value);
  if (!match) throw new InvalidQueryError(`Unknown status "${value}"; expected one of ${VIOLATION_STATUSES.join(", ")}`);
  return match;
}

function readJsonFile(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${path}: ${errorMessage(err)}`);
  }
}

// =============================================================================
// CLI Registration
// =============================================================================

export function registerLedgerCli(ctx: CliContext): void {
  const { program } = ctx;
  const now = () => (ctx.clock ?? (() => new Date()))();

  async function withLedger<T>(fn: (ledger: Ledger) => Promise<T> | T, options?: LedgerOptions): Promise<T> {
    const ledger = await ctx.openLedger(options);
    try {
      return await fn(ledger);
    } finally {
      await ledger.close();
    }
  }

  // ── sync ──────────────────────────────────────────────────────
  addRangeOptions(program.command("sync").description("Ingest exported billing files for a window"))
    .option("--aws <file>", "AWS cost and usage export (JSON)")
    .option("--gcp <file>", "GCP billing export (JSON)")
    .option("--azure <file>", "Azure cost export (JSON)")
    .option("--other <file>", "Canonical-field export for any other provider (JSON)")
    .option("--accept-partial", "Commit the rows of a truncated export")
    .option("--json", "Output as JSON")
    .action(
      async (
        opts: RangeOptions & { aws?: string; gcp?: string; azure?: string; other?: string; acceptPartial?: boolean; json?: boolean },
      ) => {
        const files: Array<[Cloud, string | undefined]> = [
          ["AWS", opts.aws],
          ["GCP", opts.gcp],
          ["Azure", opts.azure],
          ["Other", opts.other],
        ];
        const selected = files.filter((entry): entry is [Cloud, string] => entry[1] !== undefined);
        if (selected.length === 0) {
          throw new InvalidQueryError("Pass at least one billing export: --aws, --gcp, --azure or --other");
        }
        const window = resolveRange(opts, now());

        const results = await withLedger(async (ledger) => {
          for (const [cloud, file] of selected) ledger.sync.register(new JsonFileAdapter(cloud, file));
          return ledger.sync.sync({ window, acceptPartial: opts.acceptPartial });
        });

        if (opts.json) {
          printJson(results);
          return;
        }
        console.log(`\nSync ${describeRange(window)}\n`);
        for (const { run, issues } of results) {
          console.log(
            `  ${run.cloud}: ${run.status}, ${run.recordCount} records, ${run.pendingCount} pending, ${run.rejectedCount} rejected`,
          );
          if (run.error) console.log(`    error: ${run.error}`);
          for (const issue of issues) console.log(`    ${issue.code}: ${issue.message}`);
        }
      },
    );

  program
    .command("sync-status")
    .description("Last sync per cloud and facts waiting for a currency rate")
    .option("--json", "Output as JSON")
    .action(async (opts: OutputOptions) => {
      const report = await withLedger((ledger) => ({
        lastSync: CLOUDS.map((cloud) => ledger.sync.lastSync(cloud)).filter((s): s is LastSyncStatus => s !== null),
        pending: ledger.store.listPending().length,
      }));

      if (opts.json) return printJson(report);
      if (report.lastSync.length === 0) console.log("No syncs recorded.");
      for (const s of report.lastSync) console.log(`${s.cloud}: ${s.message}`);
      console.log(`Pending facts: ${report.pending}`);
    });

  program
    .command("retry-pending")
    .description("Normalize held facts again after adding currency rates")
    .option("--json", "Output as JSON")
    .action(async (opts: OutputOptions) => {
      const result = await withLedger((ledger) => ledger.sync.retryPending());
      if (opts.json) {
        printJson(result);
        return;
      }
      console.log(`Recovered ${result.recovered} facts into ${result.batchIds.length} batches; ${result.stillPending} still pending.`);
    });

  // ── spend ─────────────────────────────────────────────────────
  addScopeOptions(addRangeOptions(program.command("spend").description("Spend grouped by a dimension")))
    .option("-g, --group-by <dimension>", `One of ${GROUP_BY.join(", ")}`, "service")
    .option("--json", "Output as JSON")
    .option("--csv", "Output as CSV")
    .action(async (opts: RangeOptions & ScopeOptions & OutputOptions & { groupBy: string }) => {
      const query = { groupBy: parseGroupBy(opts.groupBy), range: resolveRange(opts, now()), filter: resolveScope(opts) };
      const result = await withLedger((ledger) => ledger.aggregation.aggregate(query));

      if (opts.json) return printJson(result);
      if (opts.csv) return printCsv(aggregationToCsv(result));

      console.log(`\nSpend by ${result.groupBy}, ${describeRange(result.range)}\n`);
      if (result.insufficientData) {
        console.log("No spend recorded in this range.");
        return;
      }
      console.log(
        table(
          ["Key", "Amount", "%", "Records", "Change"],
          result.rows.map((r) => [
            r.key,
            formatMoney(r.amountMinorUnits, result.currency),
            `${r.pctOfTotal}`,
            `${r.recordCount}`,
            formatTrend(r.trend, result.currency),
          ]),
        ),
      );
      console.log(`\nTotal: ${formatMoney(result.totalMinorUnits, result.currency)} (${result.recordCount} records)`);
    });

  // ── budget ────────────────────────────────────────────────────
  const budget = program.command("budget").description("Budgets and their health");

  budget
    .command("list")
    .description("List budget definitions")
    .option("--json", "Output as JSON")
    .action(async (opts: OutputOptions) => {
      const budgets = await withLedger((ledger) => ledger.budgets.listBudgets());
      if (opts.json) return printJson(budgets);
      if (budgets.length === 0) {
        console.log("No budgets configured. Use 'budget set <file>' to add one.");
        return;
      }
      console.log(
        table(
          ["ID", "Name", "Amount", "Period", "Alert at"],
          budgets.map((b) => [
            b.id,
            b.name,
            formatMoney(b.amountMinorUnits, b.currency),
            `${b.period.kind} from ${b.period.anchor}`,
            `${b.alertThresholdPct}%`,
          ]),
        ),
      );
    });

  budget
    .command("status")
    .description("Consumption, health and forecast of one budget or all of them")
    .argument("[id]", "Budget ID")
    .option("--as-of <instant>", "Evaluation instant (default: now)")
    .option("--json", "Output as JSON")
    .option("--csv", "Output as CSV")
    .action(async (id: string | undefined, opts: OutputOptions & { asOf?: string }) => {
      const asOf = resolveInstant(opts.asOf, now());
      const statuses = await withLedger((ledger) =>
        id === undefined ? ledger.budgets.evaluateAll(asOf) : [ledger.budgets.evaluate(id, asOf)],
      );

      if (opts.json) return printJson(id === undefined ? statuses : statuses[0]);
      if (opts.csv) return printCsv(budgetStatusesToCsv(statuses));

      if (statuses.length === 0) {
        console.log("No budgets configured.");
        return;
      }
      for (const s of statuses) {
        const forecast =
          s.forecast.kind === "projected" ? formatMoney(s.forecast.amountMinorUnits, s.currency) : "insufficient data";
        console.log(`[${s.status.toUpperCase()}] ${s.budgetName} (${s.budgetId})`);
        console.log(
          `  Spend:    ${formatMoney(s.consumedMinorUnits, s.currency)} / ${formatMoney(s.amountMinorUnits, s.currency)} (${s.consumedPct}%)`,
        );
        console.log(`  Elapsed:  ${s.daysElapsed}/${s.daysInPeriod} days (${s.expectedPct}%)`);
        console.log(`  Forecast: ${forecast}`);
        if (s.alertTriggered) console.log("  Alert threshold reached");
      }
    });

  budget
    .command("set")
    .description("Create or replace a budget from a JSON file")
    .argument("<file>", "Path to budget JSON file")
    .action(async (file: string) => {
      const parsed = budgetInputSchema.safeParse(readJsonFile(file));
      if (!parsed.success) {
        throw new InvalidBudgetError(
          `Invalid budget in ${file}`,
          parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
        );
      }
      const saved = await withLedger((ledger) => ledger.budgets.setBudget(parsed.data));
      console.log(`Budget "${saved.name}" saved with ID: ${saved.id}`);
    });

  budget
    .command("delete")
    .description("Remove a budget by ID")
    .argument("<id>", "Budget ID")
    .action(async (id: string) => {
      const deleted = await withLedger((ledger) => ledger.budgets.deleteBudget(id));
      console.log(deleted ? `Budget ${id} removed.` : `Budget ${id} not found.`);
    });

  // ── allocate ──────────────────────────────────────────────────
  addScopeOptions(addRangeOptions(program.command("allocate").description("Distribute spend with an allocation rule")))
    .argument("<ruleId>", "Allocation rule ID from configuration")
    .option("--json", "Output as JSON")
    .option("--csv", "Output as CSV")
    .action(async (ruleId: string, opts: RangeOptions & ScopeOptions & OutputOptions) => {
      const query = { range: resolveRange(opts, now()), filter: resolveScope(opts) };
      const result = await withLedger((ledger) => ledger.allocation.allocateById(ruleId, query));

      if (opts.json) return printJson(result);
      if (opts.csv) return printCsv(allocationToCsv(result));

      console.log(`\n${result.ruleId} (${result.method} by ${result.dimension}), ${describeRange(result.range)}\n`);
      console.log(
        table(
          ["Key", "Amount", "%"],
          result.allocations.map((a) => [a.key, formatMoney(a.amountMinorUnits, result.currency), `${a.pctOfTotal}`]),
        ),
      );
      console.log(`\nTotal: ${formatMoney(result.totalMinorUnits, result.currency)}`);
    });

  // ── governance ────────────────────────────────────────────────
  const governance = program.command("governance").description("Cost policies and their violations");

  addRangeOptions(governance.command("scan").description("Evaluate active policies over a window"))
    .option("--metadata <file>", "Resource metadata JSON keyed by resource ID")
    .option("--json", "Output as JSON")
    .action(async (opts: RangeOptions & OutputOptions & { metadata?: string }) => {
      const window = resolveRange(opts, now());
      const metadata = opts.metadata ? loadMetadataFile(opts.metadata) : undefined;
      const result = await withLedger((ledger) => ledger.governance.evaluateCycle({ window }), { metadata });

      if (opts.json) return printJson(result);

      console.log(
        `\nEvaluated ${result.evaluatedPolicies.length} policies over ${result.subjectsEvaluated} subjects, ${describeRange(window)}`,
      );
      console.log(`New violations: ${result.created.length}, already recorded: ${result.alreadyRecorded}`);
      if (result.metadataErrors > 0) console.log(`Metadata lookups failed: ${result.metadataErrors}`);
      for (const v of result.created) {
        console.log(`  [${v.severity}] ${v.policyName}: ${v.subjectId}: ${v.message}`);
      }
    });

  governance
    .command("violations")
    .description("List violations")
    .option("--status <status>", "open, approved or rejected")
    .option("--severity <severity>", "critical, high, medium or low")
    .option("--policy <id>", "Policy ID")
    .option("--cloud <cloud>", "Cloud")
    .option("--account <id>", "Account ID")
    .option("--json", "Output as JSON")
    .option("--csv", "Output as CSV")
    .action(
      async (
        opts: OutputOptions & { status?: string; severity?: string; policy?: string; cloud?: string; account?: string },
      ) => {
        const filter = {
          status: opts.status === undefined ? undefined : parseViolationStatus(opts.status),
          severity: opts.severity === undefined ? undefined : parseSeverity(opts.severity),
          policyId: opts.policy,
          cloud: opts.cloud === undefined ? undefined : parseCloud(opts.cloud),
          accountId: opts.account,
        };
        const violations = await withLedger((ledger) => ledger.governance.listViolations(filter));

        if (opts.json) return printJson(violations);
        if (opts.csv) return printCsv(violationsToCsv(violations));

        if (violations.length === 0) {
          console.log("No violations found.");
          return;
        }
        console.log(
          table(
            ["ID", "Severity", "Status", "Policy", "Subject", "Message"],
            violations.map((v) => [v.id, v.severity, v.status, v.policyId, v.subjectId, v.message]),
          ),
        );
      },
    );

  for (const status of ["approved", "rejected"] as const) {
    governance
      .command(status === "approved" ? "approve" : "reject")
      .description(status === "approved" ? "Accept an open violation" : "Dismiss an open violation")
      .argument("<id>", "Violation ID")
      .option("--note <text>", "Reviewer note")
      .action(async (id: string, opts: { note?: string }) => {
        const violation = await withLedger((ledger) => ledger.governance.setViolationStatus(id, status, opts.note));
        console.log(`Violation ${violation.id} ${violation.status}.`);
      });
  }

  governance
    .command("policies")
    .description("List installed policies")
    .option("--json", "Output as JSON")
    .action(async (opts: OutputOptions) => {
      const policies = await withLedger((ledger) => ledger.governance.listPolicies());
      if (opts.json) return printJson(policies);
      for (const p of policies) {
        console.log(`  ${p.status === "active" ? "✓" : "✗"} ${p.name} [${p.id}] ${p.severity} | ${p.rule.kind}`);
      }
    });

  governance
    .command("add")
    .description("Add or replace a policy from a JSON file")
    .argument("<file>", "Path to policy JSON file")
    .action(async (file: string) => {
      const [saved] = await withLedger((ledger) => ledger.governance.savePolicies([readJsonFile(file)]));
      console.log(`Policy "${saved.name}" saved with ID: ${saved.id}`);
    });

  // ── overview ──────────────────────────────────────────────────
  program
    .command("overview")
    .description("Month-to-date spend, top services, open violations, budgets and savings")
    .option("--as-of <instant>", "Instant to report at (default: now)")
    .option("--recommendations <file>", "Recommendation feed JSON")
    .option("--json", "Output as JSON")
    .action(async (opts: OutputOptions & { asOf?: string; recommendations?: string }) => {
      const asOf = resolveInstant(opts.asOf, now());
      const recommendations = opts.recommendations ? loadRecommendations(opts.recommendations) : undefined;
      const overview = await withLedger((ledger) => ledger.overview.buildOverview({ asOf, recommendations }));

      if (opts.json) return printJson(overview);

      const money = (amount: number) => formatMoney(amount, overview.currency);
      console.log(`\nOverview as of ${overview.asOf}\n`);
      console.log(`Month to date:  ${money(overview.monthToDate.amountMinorUnits)}`);
      console.log(`Previous month: ${money(overview.previousMonth.amountMinorUnits)}`);
      console.log(
        `Change:         ${money(overview.deltaMinorUnits)}${overview.deltaPct === null ? "" : ` (${overview.deltaPct}%)`}`,
      );
      if (overview.topServices.length > 0) {
        console.log("\nTop services:");
        console.log(
          table(
            ["Service", "Amount", "%"],
            overview.topServices.map((r) => [r.key, money(r.amountMinorUnits), `${r.pctOfTotal}`]),
          ),
        );
      }
      const open = overview.openViolations;
      console.log(
        `\nOpen violations: ${open.total} (critical ${open.critical}, high ${open.high}, medium ${open.medium}, low ${open.low})`,
      );
      for (const b of overview.budgets) {
        console.log(`Budget [${b.status.toUpperCase()}] ${b.budgetName}: ${b.consumedPct}% consumed`);
      }
      console.log(
        `Estimated savings: ${money(overview.savings.totalEstimatedMinorUnits)} from ${overview.savings.recommendationCount} recommendations`,
      );
      if (overview.insufficientData) console.log("\nNo spend recorded this month or last.");
    });
}
