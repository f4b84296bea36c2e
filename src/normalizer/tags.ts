import type { TagPolicy } from "../config/schema.js";

export const CANONICAL_TAGS = ["team", "product"] as const;

export type CanonicalTag = (typeof CANONICAL_TAGS)[number];

/**
 * Lower-case keys and trim values, then fill the canonical `team` and
 * `product` tags from the first configured alias that carries a value.
 *
 * When two keys collide after lower-casing, the one that sorts first in
 * its original spelling wins, so the outcome does not depend on the
 * provider's field order.
 */
export function resolveTags(pairs: Array<[string, string]>, policy: TagPolicy): Record<string, string> {
  const sorted = [...pairs].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const tags = new Map<string, string>();

  for (const [rawKey, rawValue] of sorted) {
    const key = rawKey.trim().toLowerCase();
    if (key === "" || tags.has(key)) continue;
    tags.set(key, rawValue.trim());
  }

  for (const canonical of CANONICAL_TAGS) {
    for (const alias of policy[canonical]) {
      const value = tags.get(alias.toLowerCase());
      if (value) {
        tags.set(canonical, value);
        break;
      }
    }
  }

  return Object.fromEntries([...tags.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}
