import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";

import { ConfigurationError } from "../errors.js";
import { LEDGER_HOME, defaultBudgetsPath, defaultDbPath, loadConfig, resolveConfig } from "./loader.js";

async function withTempDir(run: (dir: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "cloudledger-config-"));
  try {
    await run(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

async function writeConfig(dir: string, body: string, filename = "ledger.json"): Promise<string> {
  const configPath = path.join(dir, filename);
  await fs.writeFile(configPath, body);
  return configPath;
}

describe("resolveConfig", () => {
  it("fills defaults and loads the bundled catalog", () => {
    const config = resolveConfig({});
    expect(config.version).toBe("1");
    expect(config.defaultCurrency).toBe("USD");
    expect(config.budgetTolerancePct).toBe(5);
    expect(config.governance).toEqual({ includeLibrary: true, policies: [] });
    expect(config.logging.level).toBe("info");
    expect(config.serviceCatalog.AWS.AmazonEC2).toBe("EC2");
  });

  it("layers user catalog entries over the bundled ones", () => {
    const config = resolveConfig({ serviceCatalog: { AWS: { AmazonEC2: "Compute", InternalTool: "Tooling" } } });
    expect(config.serviceCatalog.AWS.AmazonEC2).toBe("Compute");
    expect(config.serviceCatalog.AWS.InternalTool).toBe("Tooling");
    expect(config.serviceCatalog.AWS["Amazon Elastic Compute Cloud"]).toBe("EC2");
  });

  it("reports every invalid field", () => {
    try {
      resolveConfig({ defaultCurrency: "usd", budgetTolerancePct: 150 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (!(err instanceof ConfigurationError)) return;
      expect(err.code).toBe("InvalidConfig");
      expect(err.issues).toHaveLength(2);
      expect(err.issues[0]).toMatch(/^defaultCurrency: /);
      expect(err.issues[1]).toMatch(/^budgetTolerancePct: /);
    }
  });
});

describe("loadConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("reads an explicit path", async () => {
    await withTempDir(async (dir) => {
      const configPath = await writeConfig(dir, JSON.stringify({ defaultCurrency: "EUR", version: "7" }));
      const config = loadConfig(configPath);
      expect(config.defaultCurrency).toBe("EUR");
      expect(config.version).toBe("7");
    });
  });

  it("falls back to CLOUDLEDGER_CONFIG", async () => {
    await withTempDir(async (dir) => {
      const configPath = await writeConfig(dir, JSON.stringify({ budgetTolerancePct: 10 }));
      vi.stubEnv("CLOUDLEDGER_CONFIG", configPath);
      expect(loadConfig().budgetTolerancePct).toBe(10);
    });
  });

  it("uses defaults when no file is named", () => {
    vi.stubEnv("CLOUDLEDGER_CONFIG", "");
    expect(loadConfig().defaultCurrency).toBe("USD");
  });

  it("rejects a missing or unparseable file", async () => {
    await withTempDir(async (dir) => {
      expect(() => loadConfig(path.join(dir, "absent.json"))).toThrow(/Config file not found/);
      const broken = await writeConfig(dir, "{ not json", "broken.json");
      expect(() => loadConfig(broken)).toThrow(ConfigurationError);
    });
  });
});

describe("storage paths", () => {
  it("defaults under the ledger home directory", () => {
    const config = resolveConfig({});
    expect(defaultDbPath(config)).toBe(path.join(LEDGER_HOME, "ledger.db"));
    expect(defaultBudgetsPath(config)).toBe(path.join(LEDGER_HOME, "budgets.json"));
  });

  it("honors configured paths", () => {
    const config = resolveConfig({ storage: { dbPath: "/var/lib/ledger/costs.db" } });
    expect(defaultDbPath(config)).toBe("/var/lib/ledger/costs.db");
  });
});
