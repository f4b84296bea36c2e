/**
 * Governance — Policy Validation
 *
 * Structural checks come from the zod schemas in the config layer; this
 * module turns their failures into InvalidPolicyError and adds the checks
 * that span several policies.
 */

import { policyInputSchema } from "../config/schema.js";
import { InvalidPolicyError } from "../errors.js";
import type { PolicyInput } from "./types.js";

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string[] {
  return issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`);
}

/** Validate one policy definition. */
export function parsePolicyInput(input: unknown): PolicyInput {
  const parsed = policyInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.issues);
    throw new InvalidPolicyError(`Invalid policy: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

/** Ids must be unique across a set of policies. */
export function validatePolicyInputs(inputs: readonly PolicyInput[]): void {
  const seen = new Set<string>();
  const issues: string[] = [];
  for (const input of inputs) {
    if (input.id === undefined) continue;
    if (seen.has(input.id)) issues.push(`${input.id}: duplicate policy id`);
    seen.add(input.id);
  }
  if (issues.length > 0) {
    throw new InvalidPolicyError(`Invalid policies: ${issues.join("; ")}`, issues);
  }
}
