/**
 * Governance — Resource Metadata Providers
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "../errors.js";
import type { ResourceMetadataProvider } from "./types.js";

/** Fixed resourceId → metadata map. Unknown resources resolve to null. */
export class StaticMetadataProvider implements ResourceMetadataProvider {
  private readonly entries: Map<string, Record<string, unknown>>;
  lookups = 0;

  constructor(entries: Record<string, Record<string, unknown>> = {}) {
    this.entries = new Map(Object.entries(entries));
  }

  set(resourceId: string, metadata: Record<string, unknown>): void {
    this.entries.set(resourceId, metadata);
  }

  async lookup(resourceId: string): Promise<Record<string, unknown> | null> {
    this.lookups++;
    const found = this.entries.get(resourceId);
    return found ? structuredClone(found) : null;
  }
}

const metadataFileSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

/** Read a `{ "<resourceId>": { ...metadata } }` JSON file, e.g. an inventory export. */
export function loadMetadataFile(path: string): StaticMetadataProvider {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read resource metadata from ${path}: ${errorMessage(err)}`);
  }
  const parsed = metadataFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Resource metadata file ${path} must map resource ids to objects`);
  }
  return new StaticMetadataProvider(parsed.data);
}
