/**
 * Ledger Configuration Loading
 *
 * Reads a JSON config file (explicit path or CLOUDLEDGER_CONFIG), validates
 * it with the zod schema and layers it over the bundled service catalog.
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { validateAllocationRules } from "../allocation/rules.js";
import { ConfigurationError, InvalidPolicyError, errorMessage } from "../errors.js";
import { validatePolicyInputs } from "../governance/validation.js";
import { engineConfigSchema, serviceCatalogSchema, type EngineConfig, type ServiceCatalog } from "./schema.js";

const BUNDLED_CATALOG_URL = new URL("../../config/service-catalog.json", import.meta.url);

export const LEDGER_HOME = join(homedir(), ".cloudledger");

/** Service catalog shipped with the package. */
export function loadBundledServiceCatalog(): ServiceCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(BUNDLED_CATALOG_URL, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read bundled service catalog: ${errorMessage(err)}`);
  }
  const parsed = serviceCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError("Bundled service catalog is malformed", "InvalidConfig", formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

/**
 * Validate a config object and fill defaults. User catalog entries are
 * added on top of the bundled catalog; user entries win on conflict.
 */
export function resolveConfig(input: unknown = {}): EngineConfig {
  const parsed = engineConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.issues);
    if (parsed.error.issues.every((i) => i.path[0] === "governance" && i.path[1] === "policies")) {
      throw new InvalidPolicyError("Invalid governance policy", issues);
    }
    throw new ConfigurationError("Invalid ledger configuration", "InvalidConfig", issues);
  }

  const config = parsed.data;
  const bundled = loadBundledServiceCatalog();
  config.serviceCatalog = {
    AWS: { ...bundled.AWS, ...config.serviceCatalog.AWS },
    GCP: { ...bundled.GCP, ...config.serviceCatalog.GCP },
    Azure: { ...bundled.Azure, ...config.serviceCatalog.Azure },
    Other: { ...bundled.Other, ...config.serviceCatalog.Other },
  };

  validateAllocationRules(config.allocationRules);
  validatePolicyInputs(config.governance.policies);
  return config;
}

/** Load configuration from `path`, then CLOUDLEDGER_CONFIG, then defaults. */
export function loadConfig(path?: string): EngineConfig {
  const file = path ?? process.env.CLOUDLEDGER_CONFIG;
  if (!file) return resolveConfig({});

  if (!existsSync(file)) {
    throw new ConfigurationError(`Config file not found: ${file}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Config file ${file} is not valid JSON: ${errorMessage(err)}`);
  }
  return resolveConfig(raw);
}

export function defaultDbPath(config: EngineConfig): string {
  return config.storage.dbPath ?? join(LEDGER_HOME, "ledger.db");
}

export function defaultBudgetsPath(config: EngineConfig): string {
  return config.storage.budgetsPath ?? join(LEDGER_HOME, "budgets.json");
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string[] {
  return issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`);
}
