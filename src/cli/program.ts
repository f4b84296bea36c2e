/**
 * Cloud Ledger — CLI Program
 *
 * Root command with the global options every subcommand shares. The ledger
 * is opened per command from --config (or CLOUDLEDGER_CONFIG).
 */

import { Command } from "commander";
import { loadConfig } from "../config/loader.js";
import { ConfigurationError } from "../errors.js";
import { createLedger } from "../ledger.js";
import {
  LOG_LEVELS,
  createLedgerLogger,
  isLogLevel,
  logLevelFromEnv,
  setGlobalLedgerLogger,
  type LogLevel,
} from "../logging/index.js";
import { VERSION } from "../version.js";
import { registerLedgerCli } from "./cli.js";

type GlobalOptions = {
  config?: string;
  db?: string;
  logLevel?: string;
};

/** --log-level, then CLOUDLEDGER_LOG_LEVEL, then the config file. */
export function resolveLogLevel(flag: string | undefined, configured: LogLevel): LogLevel {
  if (flag === undefined) return logLevelFromEnv() ?? configured;
  const level = flag.toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigurationError(`Unknown log level "${flag}"; expected one of ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

export function buildProgram(options: { clock?: () => Date } = {}): Command {
  const program = new Command();

  program
    .name("cloudledger")
    .description("Multi-cloud cost aggregation, budgets, chargeback and cost governance")
    .version(VERSION)
    .option("-c, --config <file>", "Ledger config file (default: $CLOUDLEDGER_CONFIG)")
    .option("--db <path>", "SQLite database (overrides storage.dbPath; ':memory:' for a throwaway ledger)")
    .option("--log-level <level>", `One of ${LOG_LEVELS.join(", ")}`);

  registerLedgerCli({
    program,
    clock: options.clock,
    openLedger: async (ledgerOptions) => {
      const opts = program.opts<GlobalOptions>();
      const config = loadConfig(opts.config);
      const logger = createLedgerLogger("cli", {
        level: resolveLogLevel(opts.logLevel, config.logging.level),
        redactPatterns: config.logging.redactPatterns,
      });
      setGlobalLedgerLogger(logger);
      return createLedger(config, { dbPath: opts.db, logger, clock: options.clock, ...ledgerOptions });
    },
  });

  return program;
}
