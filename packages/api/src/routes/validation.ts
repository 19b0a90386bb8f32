import type { z } from 'zod';
import { ValidationError } from '@ignis/core';

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join('.') : 'body';
    throw new ValidationError(`${field}: ${issue.message}`, field);
  }
  return parsed.data;
}
