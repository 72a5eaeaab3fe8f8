import type { z } from 'zod';
import { fail, ok } from '../contracts/outcome';
import type { FieldIssue, Outcome, ValidationError } from '../contracts/outcome';

/** A schema that accepts anything on input and yields `F` once it passes. */
export type FieldSchema<F> = z.ZodType<F, z.ZodTypeDef, unknown>;

export function toIssues(error: z.ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

export function validationError(error: z.ZodError): ValidationError {
  const issues = toIssues(error);
  const [first] = issues;
  const message = first ? `${first.path}: ${first.message}` : 'invalid input';
  return { code: 'validation_failed', message, issues };
}

/** Checks every declared constraint and reports all failing fields at once. */
export function validate<F>(schema: FieldSchema<F>, input: unknown): Outcome<F, ValidationError> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) return fail(validationError(parsed.error));
  return ok(parsed.data);
}
