/**
 * Governance — Storage Implementations
 *
 * SQLite and InMemory stores for policy definitions and violations.
 */

import { randomUUID } from "node:crypto";
import type {
  Policy,
  PolicyInput,
  PolicySeverity,
  PolicyStatus,
  PolicyStorage,
  Violation,
  ViolationFilter,
  ViolationStatus,
  ViolationStore,
} from "./types.js";
import { parsePolicyInput } from "./validation.js";

function compareViolations(a: Violation, b: Violation): number {
  const keyA = [a.windowStart, a.policyId, a.subjectId];
  const keyB = [b.windowStart, b.policyId, b.subjectId];
  for (let i = 0; i < keyA.length; i++) {
    if (keyA[i] < keyB[i]) return -1;
    if (keyA[i] > keyB[i]) return 1;
  }
  return 0;
}

function matchesViolationFilter(v: Violation, filter: ViolationFilter): boolean {
  if (filter.status && v.status !== filter.status) return false;
  if (filter.policyId && v.policyId !== filter.policyId) return false;
  if (filter.severity && v.severity !== filter.severity) return false;
  if (filter.cloud && v.cloud !== filter.cloud) return false;
  if (filter.accountId && v.accountId !== filter.accountId) return false;
  if (filter.resourceId && v.resourceId !== filter.resourceId) return false;
  if (filter.windowEnd && v.windowStart >= filter.windowEnd) return false;
  if (filter.windowStart && v.windowEnd <= filter.windowStart) return false;
  return true;
}

// ── InMemory (for tests) ──────────────────────────────────────────

export class InMemoryPolicyStorage implements PolicyStorage {
  private policies = new Map<string, Policy>();

  async initialize(): Promise<void> {}

  async save(policy: Policy): Promise<void> {
    this.policies.set(policy.id, structuredClone(policy));
  }

  async getById(id: string): Promise<Policy | null> {
    const p = this.policies.get(id);
    return p ? structuredClone(p) : null;
  }

  async list(filter?: { status?: PolicyStatus; severity?: PolicySeverity }): Promise<Policy[]> {
    let results = [...this.policies.values()];
    if (filter?.status) results = results.filter((p) => p.status === filter.status);
    if (filter?.severity) results = results.filter((p) => p.severity === filter.severity);
    return results.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)).map((p) => structuredClone(p));
  }

  async delete(id: string): Promise<boolean> {
    return this.policies.delete(id);
  }

  async close(): Promise<void> {
    this.policies.clear();
  }
}

export class InMemoryViolationStore implements ViolationStore {
  private violations = new Map<string, Violation>();

  async initialize(): Promise<void> {}

  async insertIfAbsent(violation: Violation): Promise<boolean> {
    if (this.violations.has(violation.id)) return false;
    this.violations.set(violation.id, structuredClone(violation));
    return true;
  }

  async getById(id: string): Promise<Violation | null> {
    const v = this.violations.get(id);
    return v ? structuredClone(v) : null;
  }

  async list(filter: ViolationFilter = {}): Promise<Violation[]> {
    return [...this.violations.values()]
      .filter((v) => matchesViolationFilter(v, filter))
      .sort(compareViolations)
      .map((v) => structuredClone(v));
  }

  async updateStatus(id: string, status: ViolationStatus, changedAt: string, note?: string): Promise<Violation | null> {
    const existing = this.violations.get(id);
    if (!existing || existing.status !== "open") return null;
    const updated: Violation = { ...existing, status, statusChangedAt: changedAt, statusNote: note };
    if (note === undefined) delete updated.statusNote;
    this.violations.set(id, updated);
    return structuredClone(updated);
  }

  async close(): Promise<void> {
    this.violations.clear();
  }
}

// ── SQLite ─────────────────────────────────────────────────────────

async function openDatabase(dbPath: string): Promise<import("better-sqlite3").Database> {
  const Database = (await import("better-sqlite3")).default;
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  return db;
}

export class SQLitePolicyStorage implements PolicyStorage {
  private db: import("better-sqlite3").Database | null = null;

  constructor(private readonly dbPath: string) {}

  async initialize(): Promise<void> {
    this.db = await openDatabase(this.dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS policies (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        severity TEXT NOT NULL DEFAULT 'medium',
        status TEXT NOT NULL DEFAULT 'active',
        scope TEXT,
        rule TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_policies_status ON policies(status)`);
  }

  private requireDb(): import("better-sqlite3").Database {
    if (!this.db) throw new Error("Storage not initialized");
    return this.db;
  }

  async save(policy: Policy): Promise<void> {
    this.requireDb()
      .prepare(
        `INSERT OR REPLACE INTO policies (id, name, description, severity, status, scope, rule, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        policy.id,
        policy.name,
        policy.description,
        policy.severity,
        policy.status,
        policy.scope ? JSON.stringify(policy.scope) : null,
        JSON.stringify(policy.rule),
        policy.createdAt,
        policy.updatedAt,
      );
  }

  async getById(id: string): Promise<Policy | null> {
    const row = this.requireDb().prepare("SELECT * FROM policies WHERE id = ?").get(id) as PolicyRow | undefined;
    return row ? rowToPolicy(row) : null;
  }

  async list(filter?: { status?: PolicyStatus; severity?: PolicySeverity }): Promise<Policy[]> {
    const clauses: string[] = [];
    const params: string[] = [];
    if (filter?.status) {
      clauses.push("status = ?");
      params.push(filter.status);
    }
    if (filter?.severity) {
      clauses.push("severity = ?");
      params.push(filter.severity);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const rows = this.requireDb()
      .prepare(`SELECT * FROM policies ${where} ORDER BY id`)
      .all(...params) as PolicyRow[];
    return rows.map(rowToPolicy);
  }

  async delete(id: string): Promise<boolean> {
    return this.requireDb().prepare("DELETE FROM policies WHERE id = ?").run(id).changes > 0;
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }
}

export class SQLiteViolationStore implements ViolationStore {
  private db: import("better-sqlite3").Database | null = null;

  constructor(private readonly dbPath: string) {}

  async initialize(): Promise<void> {
    this.db = await openDatabase(this.dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS violations (
        id TEXT PRIMARY KEY,
        policy_id TEXT NOT NULL,
        policy_name TEXT NOT NULL,
        severity TEXT NOT NULL,
        subject_id TEXT NOT NULL,
        resource_id TEXT,
        account_id TEXT NOT NULL,
        cloud TEXT NOT NULL,
        window_start TEXT NOT NULL,
        window_end TEXT NOT NULL,
        detected_at TEXT NOT NULL,
        message TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'open',
        status_changed_at TEXT,
        status_note TEXT
      )
    `);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_violations_status ON violations(status)`);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_violations_policy ON violations(policy_id)`);
  }

  private requireDb(): import("better-sqlite3").Database {
    if (!this.db) throw new Error("Storage not initialized");
    return this.db;
  }

  async insertIfAbsent(v: Violation): Promise<boolean> {
    const result = this.requireDb()
      .prepare(
        `INSERT OR IGNORE INTO violations (id, policy_id, policy_name, severity, subject_id, resource_id, account_id, cloud, window_start, window_end, detected_at, message, status, status_changed_at, status_note)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        v.id,
        v.policyId,
        v.policyName,
        v.severity,
        v.subjectId,
        v.resourceId ?? null,
        v.accountId,
        v.cloud,
        v.windowStart,
        v.windowEnd,
        v.detectedAt,
        v.message,
        v.status,
        v.statusChangedAt ?? null,
        v.statusNote ?? null,
      );
    return result.changes > 0;
  }

  async getById(id: string): Promise<Violation | null> {
    const row = this.requireDb().prepare("SELECT * FROM violations WHERE id = ?").get(id) as ViolationRow | undefined;
    return row ? rowToViolation(row) : null;
  }

  async list(filter: ViolationFilter = {}): Promise<Violation[]> {
    const clauses: string[] = [];
    const params: string[] = [];
    const columns: Array<[keyof ViolationFilter, string]> = [
      ["status", "status = ?"],
      ["policyId", "policy_id = ?"],
      ["severity", "severity = ?"],
      ["cloud", "cloud = ?"],
      ["accountId", "account_id = ?"],
      ["resourceId", "resource_id = ?"],
      ["windowEnd", "window_start < ?"],
      ["windowStart", "window_end > ?"],
    ];
    for (const [key, clause] of columns) {
      const value = filter[key];
      if (value) {
        clauses.push(clause);
        params.push(value);
      }
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const rows = this.requireDb()
      .prepare(`SELECT * FROM violations ${where} ORDER BY window_start, policy_id, subject_id`)
      .all(...params) as ViolationRow[];
    return rows.map(rowToViolation);
  }

  async updateStatus(id: string, status: ViolationStatus, changedAt: string, note?: string): Promise<Violation | null> {
    const result = this.requireDb()
      .prepare("UPDATE violations SET status = ?, status_changed_at = ?, status_note = ? WHERE id = ? AND status = 'open'")
      .run(status, changedAt, note ?? null, id);
    if (result.changes === 0) return null;
    return this.getById(id);
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }
}

// ── Row mapping ────────────────────────────────────────────────────

interface PolicyRow {
  id: string;
  name: string;
  description: string;
  severity: string;
  status: string;
  scope: string | null;
  rule: string;
  created_at: string;
  updated_at: string;
}

function rowToPolicy(row: PolicyRow): Policy {
  const policy: Policy = {
    id: row.id,
    name: row.name,
    description: row.description,
    severity: row.severity as PolicySeverity,
    status: row.status as PolicyStatus,
    rule: JSON.parse(row.rule) as Policy["rule"],
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
  if (row.scope !== null) policy.scope = JSON.parse(row.scope) as Policy["scope"];
  return policy;
}

interface ViolationRow {
  id: string;
  policy_id: string;
  policy_name: string;
  severity: string;
  subject_id: string;
  resource_id: string | null;
  account_id: string;
  cloud: string;
  window_start: string;
  window_end: string;
  detected_at: string;
  message: string;
  status: string;
  status_changed_at: string | null;
  status_note: string | null;
}

function rowToViolation(row: ViolationRow): Violation {
  const violation: Violation = {
    id: row.id,
    policyId: row.policy_id,
    policyName: row.policy_name,
    severity: row.severity as PolicySeverity,
    subjectId: row.subject_id,
    accountId: row.account_id,
    cloud: row.cloud as Violation["cloud"],
    windowStart: row.window_start,
    windowEnd: row.window_end,
    detectedAt: row.detected_at,
    message: row.message,
    status: row.status as ViolationStatus,
  };
  if (row.resource_id !== null) violation.resourceId = row.resource_id;
  if (row.status_changed_at !== null) violation.statusChangedAt = row.status_changed_at;
  if (row.status_note !== null) violation.statusNote = row.status_note;
  return violation;
}

// ── Factory ────────────────────────────────────────────────────────

/** Validate input and fill defaults. */
export function createPolicyFromInput(input: unknown, now = new Date().toISOString()): Policy {
  const parsed: PolicyInput = parsePolicyInput(input);
  const policy: Policy = {
    id: parsed.id ?? `policy-${randomUUID().slice(0, 8)}`,
    name: parsed.name,
    description: parsed.description ?? "",
    severity: parsed.severity ?? "medium",
    status: parsed.status ?? "active",
    rule: parsed.rule,
    createdAt: now,
    updatedAt: now,
  };
  if (parsed.scope) policy.scope = parsed.scope;
  return policy;
}
