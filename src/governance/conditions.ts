/**
 * Governance — Condition Evaluator
 *
 * Evaluates declarative rule conditions against subject facts. Supports
 * nested field access, tag checks, logical combinators (and/or/not) and
 * cloud/service/account matching.
 */

import { tagValue } from "../scope.js";
import type { RuleCondition, SubjectFacts } from "./types.js";

/**
 * Look up a field by dot-separated path. A flattened key ("tags.team")
 * wins over walking the path, so metadata keys containing dots resolve.
 */
export function getField(obj: Record<string, unknown>, path: string): unknown {
  if (Object.hasOwn(obj, path)) return obj[path];
  let current: unknown = obj;
  for (const part of path.split(".")) {
    if (current == null || typeof current !== "object") return undefined;
    current = Reflect.get(current, part);
  }
  return current;
}

/** Build the field map conditions read from. */
export function conditionData(facts: SubjectFacts): Record<string, unknown> {
  const flat: Record<string, unknown> = {
    kind: facts.kind,
    cloud: facts.cloud,
    accountId: facts.accountId,
    projectId: facts.projectId,
    service: facts.service,
    services: facts.services,
    resourceId: facts.resourceId,
    spendMinorUnits: facts.spendMinorUnits,
    tags: facts.tags,
    metadata: facts.metadata,
  };
  for (const [k, v] of Object.entries(facts.tags)) {
    flat[`tags.${k}`] = v;
  }
  for (const [k, v] of Object.entries(facts.metadata)) {
    flat[`metadata.${k}`] = v;
  }
  return flat;
}

export function evaluateCondition(condition: RuleCondition, facts: SubjectFacts, data = conditionData(facts)): boolean {
  switch (condition.type) {
    case "field_equals":
      return getField(data, condition.field) === condition.value;
    case "field_not_equals":
      return getField(data, condition.field) !== condition.value;
    case "field_contains": {
      const val = getField(data, condition.field);
      if (typeof val === "string") return val.includes(condition.value);
      if (Array.isArray(val)) return val.includes(condition.value);
      return false;
    }
    case "field_matches": {
      const val = getField(data, condition.field);
      if (typeof val !== "string") return false;
      return new RegExp(condition.pattern).test(val);
    }
    case "field_gt": {
      const val = getField(data, condition.field);
      return typeof val === "number" && val > condition.value;
    }
    case "field_gte": {
      const val = getField(data, condition.field);
      return typeof val === "number" && val >= condition.value;
    }
    case "field_lt": {
      const val = getField(data, condition.field);
      return typeof val === "number" && val < condition.value;
    }
    case "field_exists":
      return getField(data, condition.field) !== undefined;
    case "field_not_exists":
      return getField(data, condition.field) === undefined;
    case "field_in": {
      const val = getField(data, condition.field);
      return condition.values.some((v) => v === val);
    }
    case "field_not_in": {
      const val = getField(data, condition.field);
      return !condition.values.some((v) => v === val);
    }
    case "tag_missing":
      return !tagValue(facts.tags, condition.tag);
    case "tag_equals":
      return tagValue(facts.tags, condition.tag) === condition.value;
    case "cloud":
      return facts.cloud === condition.cloud;
    case "service":
      return facts.service === condition.service || facts.services.includes(condition.service);
    case "account":
      return facts.accountId === condition.accountId;
    case "and":
      return condition.conditions.every((c) => evaluateCondition(c, facts, data));
    case "or":
      return condition.conditions.some((c) => evaluateCondition(c, facts, data));
    case "not":
      return !evaluateCondition(condition.condition, facts, data);
  }
}
