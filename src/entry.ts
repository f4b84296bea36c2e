#!/usr/bin/env node
import { buildProgram } from "./cli/program.js";
import { ConfigurationError, LedgerError, errorMessage } from "./errors.js";

async function main(argv: string[]): Promise<void> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (err) {
    if (err instanceof LedgerError) {
      console.error(`Error [${err.code}]: ${err.message}`);
      if (err instanceof ConfigurationError) {
        for (const issue of err.issues) console.error(`  - ${issue}`);
      }
    } else {
      console.error(err instanceof Error && err.stack ? err.stack : errorMessage(err));
    }
    process.exitCode = 1;
  }
}

await main(process.argv);
