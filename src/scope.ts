/**
 * Scope matching — the filter expression shared by aggregation, budgets,
 * allocation rules and policies.
 */

import type { CostRecord, Scope } from "./types.js";

/** Own-property lookup; inherited Object.prototype members never match. */
export function ownValue<T>(map: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

export function tagValue(tags: Readonly<Record<string, string>>, key: string): string | undefined {
  return ownValue(tags, key.trim().toLowerCase());
}

export function matchesScope(record: CostRecord, scope?: Scope): boolean {
  if (!scope) return true;
  if (scope.clouds && !scope.clouds.includes(record.cloud)) return false;
  if (scope.accountIds && !scope.accountIds.includes(record.accountId)) return false;
  if (scope.projectIds && !(record.projectId !== undefined && scope.projectIds.includes(record.projectId))) {
    return false;
  }
  if (scope.services && !scope.services.includes(record.service)) return false;
  if (
    scope.resourceIds &&
    !(record.resourceId !== undefined && scope.resourceIds.includes(record.resourceId))
  ) {
    return false;
  }
  if (scope.tags) {
    for (const [key, accepted] of Object.entries(scope.tags)) {
      const value = tagValue(record.tags, key);
      if (value === undefined) return false;
      const values = Array.isArray(accepted) ? accepted : [accepted];
      if (!values.includes(value)) return false;
    }
  }
  return true;
}

/** Combine two scopes; every constraint of both must hold. */
export function intersectScopes(a?: Scope, b?: Scope): Scope | undefined {
  if (!a) return b;
  if (!b) return a;
  return {
    clouds: intersectLists(a.clouds, b.clouds),
    accountIds: intersectLists(a.accountIds, b.accountIds),
    projectIds: intersectLists(a.projectIds, b.projectIds),
    services: intersectLists(a.services, b.services),
    resourceIds: intersectLists(a.resourceIds, b.resourceIds),
    tags: intersectTags(a.tags, b.tags),
  };
}

function intersectLists<T>(a?: T[], b?: T[]): T[] | undefined {
  if (!a) return b;
  if (!b) return a;
  return a.filter((v) => b.includes(v));
}

function intersectTags(
  a?: Record<string, string | string[]>,
  b?: Record<string, string | string[]>,
): Record<string, string | string[]> | undefined {
  if (!a) return b;
  if (!b) return a;
  const merged: Record<string, string | string[]> = {};
  const toList = (v: string | string[]) => (Array.isArray(v) ? v : [v]);
  for (const [key, value] of Object.entries(a)) merged[key.toLowerCase()] = toList(value);
  for (const [key, value] of Object.entries(b)) {
    const k = key.toLowerCase();
    const existing = ownValue(merged, k);
    merged[k] = existing === undefined ? toList(value) : toList(existing).filter((v) => toList(value).includes(v));
  }
  return merged;
}

/** Short human label, e.g. "cloud=AWS account=A1 tag:team=backend". */
export function describeScope(scope?: Scope): string {
  if (!scope) return "all spend";
  const parts: string[] = [];
  if (scope.clouds) parts.push(`cloud=${scope.clouds.join("|")}`);
  if (scope.accountIds) parts.push(`account=${scope.accountIds.join("|")}`);
  if (scope.projectIds) parts.push(`project=${scope.projectIds.join("|")}`);
  if (scope.services) parts.push(`service=${scope.services.join("|")}`);
  if (scope.resourceIds) parts.push(`resource=${scope.resourceIds.join("|")}`);
  for (const [key, value] of Object.entries(scope.tags ?? {})) {
    parts.push(`tag:${key}=${Array.isArray(value) ? value.join("|") : value}`);
  }
  return parts.length > 0 ? parts.join(" ") : "all spend";
}
