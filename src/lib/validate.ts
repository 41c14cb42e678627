import { z } from 'zod';
import { ValidationError } from './errors.js';

export function formatIssues(issues: readonly z.ZodIssue[]): string[] {
  return issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`);
}

/**
 * Validates a request body against a Zod schema, throwing `ValidationError`
 * (mapped to 400 by the app's error handler) on failure.
 */
export function parseWith<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ValidationError('Invalid request body', formatIssues(result.error.issues));
  }
  return result.data;
}
