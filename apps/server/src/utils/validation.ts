import type { z } from 'zod';
import { BadRequestError } from './errors.js';

/**
 * Parse request input with a Zod schema, throwing a 400 that lists every issue.
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new BadRequestError(parsed.error.errors.map((e) => e.message).join(', '));
  }
  return parsed.data;
}
