/**
 * OutputContract - the declared shape of a stage's output.
 */

import { z } from "zod";

export interface OutputContract<TOutput> {
  /** Human-readable description, also given to the model */
  description: string;

  /** Runtime schema the output must satisfy */
  schema: z.ZodType<TOutput, z.ZodTypeDef, unknown>;
}

export type ContractCheck<TOutput> =
  | { valid: true; value: TOutput }
  | { valid: false; issues: string[] };

export function checkContract<TOutput>(
  contract: OutputContract<TOutput>,
  value: unknown
): ContractCheck<TOutput> {
  const parsed = contract.schema.safeParse(value);
  if (parsed.success) {
    return { valid: true, value: parsed.data };
  }
  return {
    valid: false,
    issues: parsed.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`
    ),
  };
}
