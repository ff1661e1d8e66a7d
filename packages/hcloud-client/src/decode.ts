import type { z } from 'zod';
import { ResponseDecodeError } from './errors';

export function decodeBody<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  context: { method: string; path: string }
): z.infer<S> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  const issues = result.error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `${location}: ${issue.message}`;
  });
  throw new ResponseDecodeError(`Unexpected response body for ${context.method} ${context.path}`, {
    method: context.method,
    path: context.path,
    issues,
    cause: result.error
  });
}
