/**
 * Cloud Ledger — Ingestion Adapter Interface
 *
 * Each billing source implements this interface and returns raw facts
 * with provider-native field names. Adapters hold no ledger state; the
 * SyncCoordinator normalizes and commits what they return.
 */

import { readFile } from "node:fs/promises";
import { PartialDataError, SourceUnavailableError, errorMessage, type SourceError } from "../errors.js";
import { factPeriodStart } from "../normalizer/providers.js";
import { inWindow } from "../time.js";
import type { Cloud, RawCostFact, TimeWindow } from "../types.js";

// =============================================================================
// Adapter Interface
// =============================================================================

export interface IngestionAdapter {
  readonly cloud: Cloud;

  /**
   * Fetch every billing fact whose usage starts inside `window`.
   * Fetching the same window twice must return the same facts.
   *
   * Throws SourceUnavailableError, AuthError or PartialDataError.
   */
  fetch(window: TimeWindow): Promise<RawCostFact[]>;
}

/** Keep facts whose usage start falls in [start, end). */
export function factsInWindow(facts: RawCostFact[], window: TimeWindow): RawCostFact[] {
  return facts.filter((fact) => {
    const start = factPeriodStart(fact);
    return start !== null && inWindow(start, window);
  });
}

// =============================================================================
// Adapter Registry
// =============================================================================

export class AdapterRegistry {
  private adapters = new Map<Cloud, IngestionAdapter>();

  register(adapter: IngestionAdapter): void {
    this.adapters.set(adapter.cloud, adapter);
  }

  get(cloud: Cloud): IngestionAdapter | undefined {
    return this.adapters.get(cloud);
  }

  getAll(): IngestionAdapter[] {
    return Array.from(this.adapters.values());
  }

  clouds(): Cloud[] {
    return Array.from(this.adapters.keys());
  }
}

// =============================================================================
// Static Adapter
// =============================================================================

/**
 * Serves a fixed list of facts. A queued failure is thrown by the next fetch.
 */
export class StaticAdapter implements IngestionAdapter {
  private failures: SourceError[] = [];
  fetchCount = 0;

  constructor(
    readonly cloud: Cloud,
    private facts: RawCostFact[] = [],
  ) {}

  setFacts(facts: RawCostFact[]): void {
    this.facts = facts;
  }

  failNext(error: SourceError): void {
    this.failures.push(error);
  }

  async fetch(window: TimeWindow): Promise<RawCostFact[]> {
    this.fetchCount++;
    const failure = this.failures.shift();
    if (failure) throw failure;
    return factsInWindow(this.facts, window);
  }
}

// =============================================================================
// JSON File Adapter
// =============================================================================

/**
 * Reads an exported billing file for one cloud. The file is either an array
 * of field objects or `{ "facts": [...], "truncated": true }` for an export
 * that was cut short.
 */
export class JsonFileAdapter implements IngestionAdapter {
  constructor(
    readonly cloud: Cloud,
    private readonly path: string,
  ) {}

  async fetch(window: TimeWindow): Promise<RawCostFact[]> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(this.path, "utf-8"));
    } catch (err) {
      throw new SourceUnavailableError(this.cloud, `Cannot read ${this.path}: ${errorMessage(err)}`);
    }

    let rows: unknown;
    let truncated = false;
    if (Array.isArray(raw)) {
      rows = raw;
    } else if (raw && typeof raw === "object" && "facts" in raw) {
      rows = raw.facts;
      truncated = "truncated" in raw && raw.truncated === true;
    }
    if (!Array.isArray(rows)) {
      throw new SourceUnavailableError(this.cloud, `${this.path} does not contain a list of billing rows`);
    }

    const facts = factsInWindow(
      rows
        .filter((row): row is Record<string, unknown> => row !== null && typeof row === "object" && !Array.isArray(row))
        .map((fields) => ({ cloud: this.cloud, fields })),
      window,
    );

    if (truncated) throw new PartialDataError(this.cloud, facts);
    return facts;
  }
}
