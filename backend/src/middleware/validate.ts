import { z } from 'zod';
import { ValidationError } from '../errors.js';

/** Parses request input against a schema; the first issue becomes a ValidationError */
export function parseInput<Output>(schema: z.ZodType<Output, z.ZodTypeDef, unknown>, input: unknown): Output {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const [issue] = result.error.issues;
  const path = issue.path.join('.');
  throw new ValidationError(path ? `${path}: ${issue.message}` : issue.message);
}

/** Path parameters of `/:id` routes */
export const idParamsSchema = z.object({
  id: z.string().trim().min(1),
});
