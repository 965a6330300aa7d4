// API layer: Request body helpers

import { z } from 'zod';
import { ValidationError } from '@/utils/errors.js';

export const RequiredString = z.string().min(1);

/**
 * Check that every field of `schema` is present. Field content is validated
 * later by the services; here only presence and type matter.
 */
export function parseBody<T extends z.AnyZodObject>(schema: T, body: unknown): z.infer<T> {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationError('Request body is required');
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const required = Object.entries<z.ZodTypeAny>(schema.shape)
      .filter(([, field]) => !field.isOptional())
      .map(([key]) => key);
    throw new ValidationError(`Missing required fields: ${required.join(', ')}`);
  }
  return parsed.data;
}
