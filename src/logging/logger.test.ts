/**
 * Ledger Logging — Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MemoryTransport, createDefaultFormatter, createLedgerLogger, isLogLevel, shouldLog } from "./logger.js";
import type { LedgerLogger } from "./logger.js";

describe("log levels", () => {
  it("orders levels from trace to fatal", () => {
    expect(shouldLog("warn", "info")).toBe(true);
    expect(shouldLog("debug", "info")).toBe(false);
    expect(shouldLog("fatal", "fatal")).toBe(true);
  });

  it("recognizes level names", () => {
    expect(isLogLevel("trace")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});

describe("LedgerLogger", () => {
  let transport: MemoryTransport;
  let logger: LedgerLogger;

  beforeEach(() => {
    transport = new MemoryTransport();
    logger = createLedgerLogger("test", {
      level: "info",
      transports: [transport],
      redactPatterns: ["secret-[a-z0-9]+"],
    });
  });

  it("drops entries below the configured level", () => {
    logger.debug("hidden");
    logger.info("shown");
    expect(transport.entries.map((e) => e.message)).toEqual(["shown"]);
  });

  it("shares its level with children", () => {
    const verbose = createLedgerLogger("test", { level: "trace", transports: [transport] });
    verbose.child("sync").trace("visible");
    expect(transport.entries.map((e) => [e.level, e.subsystem])).toEqual([["trace", "ledger/test/sync"]]);
  });

  it("names children after their parent", () => {
    logger.child("sync").child("normalizer").warn("slow");
    expect(transport.entries[0].subsystem).toBe("ledger/test/sync/normalizer");
  });

  it("carries context fields onto entries", () => {
    logger.withContext({ cloud: "AWS" }).withContext({ batchId: "b1" }).info("committed");
    const [entry] = transport.entries;
    expect([entry.cloud, entry.batchId, entry.policyId]).toEqual(["AWS", "b1", undefined]);
  });

  it("redacts messages and nested metadata", () => {
    logger.info("token secret-abc123 used", { key: "secret-xyz", nested: { value: "secret-q1" }, count: 3 });
    expect(transport.entries[0].message).toBe("token [REDACTED] used");
    expect(transport.entries[0].metadata).toEqual({
      key: "[REDACTED]",
      nested: { value: "[REDACTED]" },
      count: 3,
    });
  });

  it("lifts a thrown error out of the metadata", () => {
    logger.error("Batch commit failed", { error: new Error("secret-zz rejected"), attempt: 2 });
    const entry = transport.entries[0];
    expect(entry.error).toMatchObject({ name: "Error", message: "[REDACTED] rejected" });
    expect(entry.metadata).toEqual({ attempt: 2 });
  });
});

describe("createDefaultFormatter", () => {
  it("renders level, subsystem, context and metadata on one line", () => {
    const format = createDefaultFormatter({ timestamps: false });
    const line = format({
      timestamp: new Date(0),
      level: "warn",
      subsystem: "ledger/sync",
      message: "Sync failed",
      cloud: "AWS",
      batchId: "b1",
      metadata: { code: "SourceUnavailable" },
    });
    expect(line).toBe('WARN  [ledger/sync] Sync failed (cloud=AWS batch=b1) {"code":"SourceUnavailable"}');
  });

  it("puts the error on its own line", () => {
    const format = createDefaultFormatter({ timestamps: false });
    const line = format({
      timestamp: new Date(0),
      level: "error",
      subsystem: "ledger/allocation",
      message: "Allocation failed",
      error: { name: "Error", message: "boom" },
    });
    expect(line).toBe("ERROR [ledger/allocation] Allocation failed\n  Error: Error: boom");
  });
});
