/**
 * Cloud Ledger — Error Types
 *
 * Source errors are retryable and reported through sync runs.
 * Configuration errors are raised before anything is evaluated.
 * Consistency violations are defects and always propagate.
 */

import type { Cloud, RawCostFact } from "./types.js";

export class LedgerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "LedgerError";
  }
}

// =============================================================================
// Source Errors
// =============================================================================

export class SourceError extends LedgerError {
  constructor(
    message: string,
    code: string,
    public readonly cloud: Cloud,
  ) {
    super(message, code);
    this.name = "SourceError";
  }
}

export class SourceUnavailableError extends SourceError {
  constructor(cloud: Cloud, message = `${cloud} billing source is unavailable`) {
    super(message, "SourceUnavailable", cloud);
    this.name = "SourceUnavailableError";
  }
}

export class AuthError extends SourceError {
  constructor(cloud: Cloud, message = `${cloud} rejected the billing credentials`) {
    super(message, "AuthError", cloud);
    this.name = "AuthError";
  }
}

/** Truncated but usable result; the facts that did arrive travel with the error. */
export class PartialDataError extends SourceError {
  constructor(
    cloud: Cloud,
    public readonly facts: RawCostFact[],
    message = `${cloud} returned a truncated result (${facts.length} facts)`,
  ) {
    super(message, "PartialData", cloud);
    this.name = "PartialDataError";
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigurationError extends LedgerError {
  constructor(
    message: string,
    code = "ConfigurationError",
    public readonly issues: string[] = [],
  ) {
    super(message, code);
    this.name = "ConfigurationError";
  }
}

export class InvalidAllocationConfigError extends ConfigurationError {
  constructor(message: string, issues: string[] = []) {
    super(message, "InvalidAllocationConfig", issues);
    this.name = "InvalidAllocationConfigError";
  }
}

export class InvalidPolicyError extends ConfigurationError {
  constructor(message: string, issues: string[] = []) {
    super(message, "InvalidPolicy", issues);
    this.name = "InvalidPolicyError";
  }
}

export class InvalidBudgetError extends ConfigurationError {
  constructor(message: string, issues: string[] = []) {
    super(message, "InvalidBudget", issues);
    this.name = "InvalidBudgetError";
  }
}

/** A read was asked for something malformed, such as a reversed range. */
export class InvalidQueryError extends LedgerError {
  constructor(message: string) {
    super(message, "InvalidQuery");
    this.name = "InvalidQueryError";
  }
}

export class NotFoundError extends LedgerError {
  constructor(
    public readonly kind: string,
    public readonly id: string,
  ) {
    super(`${kind} "${id}" not found`, "NotFound");
    this.name = "NotFoundError";
  }
}

/** A status change the workflow does not allow, such as reopening an approved violation. */
export class InvalidTransitionError extends LedgerError {
  constructor(message: string) {
    super(message, "InvalidTransition");
    this.name = "InvalidTransitionError";
  }
}

// =============================================================================
// Consistency Violations
// =============================================================================

export class ConsistencyViolationError extends LedgerError {
  constructor(
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message, "ConsistencyViolation");
    this.name = "ConsistencyViolationError";
  }
}

/** Render an unknown thrown value for logs and sync runs. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
