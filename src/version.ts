import { createRequire } from "node:module";

function readVersionFromPackageJson(): string | null {
  try {
    const require = createRequire(import.meta.url);
    const pkg = require("../package.json") as { version?: string };
    return pkg.version ?? null;
  } catch {
    return null;
  }
}

// package.json sits one level above both src/ and dist/.
export const VERSION = process.env.CLOUDLEDGER_BUNDLED_VERSION || readVersionFromPackageJson() || "0.0.0";
