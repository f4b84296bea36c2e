/**
 * Terminal output helpers for the ledger CLI.
 */

import type { Command } from "commander";
import { InvalidQueryError } from "../errors.js";
import { formatMoney } from "../money.js";
import { DAY_MS, isValidWindow, monthWindow, toIsoInstant, toMs } from "../time.js";
import { CLOUDS, type Cloud, type Scope, type TimeWindow, type Trend } from "../types.js";

export type OutputOptions = { json?: boolean; csv?: boolean };

export type RangeOptions = { start?: string; end?: string; month?: string };

export type ScopeOptions = {
  cloud?: string[];
  account?: string[];
  project?: string[];
  service?: string[];
  tag?: string[];
};

/** Simple table formatter for terminal output. */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));

  const sep = widths.map((w) => "─".repeat(w + 2)).join("┼");
  const formatRow = (cells: string[]) => cells.map((c, i) => ` ${(c ?? "").padEnd(widths[i] ?? 0)} `).join("│");

  return [formatRow(headers), sep, ...rows.map(formatRow)].join("\n");
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/** CSV already ends in a newline. */
export function printCsv(csv: string): void {
  process.stdout.write(csv);
}

export function formatTrend(trend: Trend, currency: string): string {
  if (trend.kind === "none") return "";
  const sign = trend.deltaMinorUnits > 0 ? "+" : "";
  const pct = trend.deltaPct === null ? "" : ` (${sign}${trend.deltaPct}%)`;
  return `${sign}${formatMoney(trend.deltaMinorUnits, currency)}${pct}`;
}

// =============================================================================
// Option parsing
// =============================================================================

export function addRangeOptions(command: Command): Command {
  return command
    .option("--start <instant>", "Inclusive range start (ISO-8601)")
    .option("--end <instant>", "Exclusive range end (ISO-8601)")
    .option("--month <yyyy-mm>", "Calendar month (default: the current month)");
}

export function addScopeOptions(command: Command): Command {
  return command
    .option("--cloud <clouds...>", "Only these clouds (AWS, GCP, Azure, Other)")
    .option("--account <ids...>", "Only these accounts")
    .option("--project <ids...>", "Only these projects")
    .option("--service <names...>", "Only these canonical services")
    .option("--tag <pairs...>", "Only records tagged key=value");
}

/** --month, else --start/--end, else the month containing `now`. */
export function resolveRange(opts: RangeOptions, now: Date): TimeWindow {
  if (opts.month !== undefined) {
    const match = /^(\d{4})-(\d{2})$/.exec(opts.month);
    const month = match ? Number(match[2]) : 0;
    if (!match || month < 1 || month > 12) {
      throw new InvalidQueryError(`Invalid month "${opts.month}"; expected YYYY-MM`);
    }
    return monthWindow(Date.UTC(Number(match[1]), month - 1, 1));
  }

  if (opts.start === undefined && opts.end === undefined) {
    return monthWindow(now.getTime());
  }

  const start = toIsoInstant(opts.start);
  const end = toIsoInstant(opts.end);
  if (start === null || end === null) {
    throw new InvalidQueryError("Both --start and --end must be valid ISO-8601 instants");
  }
  const range = { start, end };
  if (!isValidWindow(range)) {
    throw new InvalidQueryError(`Range ${start} .. ${end} is empty`);
  }
  return range;
}

export function resolveInstant(value: string | undefined, now: Date): string {
  if (value === undefined) return now.toISOString();
  const iso = toIsoInstant(value);
  if (iso === null) throw new InvalidQueryError(`Invalid instant "${value}"`);
  return iso;
}

function isCloud(value: string): value is Cloud {
  return (CLOUDS as readonly string[]).includes(value);
}

export function parseCloud(value: string): Cloud {
  if (!isCloud(value)) {
    throw new InvalidQueryError(`Unknown cloud "${value}"; expected one of ${CLOUDS.join(", ")}`);
  }
  return value;
}

export function resolveScope(opts: ScopeOptions): Scope | undefined {
  const scope: Scope = {};
  if (opts.cloud) scope.clouds = opts.cloud.map(parseCloud);
  if (opts.account) scope.accountIds = opts.account;
  if (opts.project) scope.projectIds = opts.project;
  if (opts.service) scope.services = opts.service;
  if (opts.tag) {
    const tags = new Map<string, string[]>();
    for (const pair of opts.tag) {
      const eq = pair.indexOf("=");
      if (eq <= 0) throw new InvalidQueryError(`Invalid tag filter "${pair}"; expected key=value`);
      const key = pair.slice(0, eq);
      tags.set(key, [...(tags.get(key) ?? []), pair.slice(eq + 1)]);
    }
    scope.tags = Object.fromEntries(tags);
  }
  return Object.keys(scope).length > 0 ? scope : undefined;
}

export function describeRange(range: TimeWindow): string {
  const days = Math.round((toMs(range.end) - toMs(range.start)) / DAY_MS);
  return `${range.start} .. ${range.end} (${days} day${days === 1 ? "" : "s"})`;
}
