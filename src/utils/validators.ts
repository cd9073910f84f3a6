/**
 * Input validators used by the HTTP layer.
 * Services accept whatever they are given; routes call these first.
 */

import { z } from 'zod';

export const NameSchema = z
  .string()
  .trim()
  .min(1)
  .max(80)
  .regex(/^[a-zA-Z\s\-']+$/, 'may only contain letters, spaces, hyphens and apostrophes');

export const EmailSchema = z
  .string()
  .regex(/^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/, 'is not a valid email address');

export function validateName(name: unknown): boolean {
  if (typeof name !== 'string' || name.length > 80) {
    return false;
  }
  return NameSchema.safeParse(name).success;
}

export function validateEmail(email: unknown): boolean {
  return EmailSchema.safeParse(email).success;
}

/**
 * Trim a string, truncate it to `maxLength`, and turn blank input into null.
 */
export function sanitizeString(
  value: string | null | undefined,
  maxLength?: number
): string | null {
  if (!value) {
    return null;
  }
  let sanitized = value.trim();
  if (!sanitized) {
    return null;
  }
  if (maxLength && sanitized.length > maxLength) {
    sanitized = sanitized.slice(0, maxLength);
  }
  return sanitized;
}
