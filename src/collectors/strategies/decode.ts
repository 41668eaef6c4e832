import type { z } from 'zod';
import { StatusDecodeError } from '../../lib/errors';

function summarizeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseJsonText(text: string, subject: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch (err) {
    throw new StatusDecodeError(subject, err instanceof Error ? err.message : String(err));
  }
}

/**
 * Parse rbd stdout and check it against `schema`. Any failure is a StatusDecodeError.
 */
export function decodeStatus<S extends z.ZodTypeAny>(raw: Buffer | string, schema: S, subject: string): z.output<S> {
  const text = typeof raw === 'string' ? raw : raw.toString('utf8');
  return validateStatus(parseJsonText(text, subject), schema, subject);
}

export function validateStatus<S extends z.ZodTypeAny>(value: unknown, schema: S, subject: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new StatusDecodeError(subject, summarizeIssues(result.error));
  }
  return result.data;
}
