// Application: Account input validation
// Format rules for signup fields; the first failing rule is reported

import { z } from 'zod';
import { ValidationError } from '@/utils/errors.js';

export const UsernameSchema = z
  .string()
  .regex(/^[a-zA-Z0-9_]{3,20}$/, 'Username must be 3-20 alphanumeric characters or underscores');

export const EmailSchema = z
  .string()
  .trim()
  .toLowerCase()
  .email('Invalid email format');

export const PasswordSchema = z
  .string()
  .min(8, 'Password must be at least 8 characters')
  .regex(/[A-Z]/, 'Password must contain at least one uppercase letter')
  .regex(/[a-z]/, 'Password must contain at least one lowercase letter')
  .regex(/[0-9]/, 'Password must contain at least one number');

/**
 * Parse a value or throw a ValidationError carrying the first issue message
 */
export function validate<T>(schema: z.ZodType<T>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue ? issue.message : 'Invalid input');
  }
  return result.data;
}

/**
 * Normalization used for lookups; syntax is only enforced at signup
 */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
