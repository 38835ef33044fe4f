import { z } from 'zod';
import { ValidationError } from '@/utils/errors';

const HEX_64 = /^[0-9a-fA-F]{64}$/;

export const blockHashSchema = z.string().regex(HEX_64, 'must be a 64 character hex string');

export const txidSchema = z.string().regex(HEX_64, 'must be a 64 character hex string');

export const heightSchema = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform(Number)
  .pipe(z.number().int().max(Number.MAX_SAFE_INTEGER, 'is too large'));

// Base58 addresses and vault owner keys
export const addressSchema = z
  .string()
  .min(1, 'must not be empty')
  .max(128, 'is too long')
  .regex(/^[A-Za-z0-9]+$/, 'must be alphanumeric');

export const rawTransactionSchema = z
  .string({ required_error: 'is required' })
  .min(1, 'must not be empty')
  .regex(/^(?:[0-9a-fA-F]{2})+$/, 'must be an even-length hex string');

/** `"true"` in any case is true; anything else, including absence, is false. */
export const flagSchema = z
  .union([z.string(), z.boolean()])
  .optional()
  .transform((value) => (typeof value === 'boolean' ? value : value?.toLowerCase() === 'true'));

export function parseParam<S extends z.ZodTypeAny>(schema: S, field: string, value: unknown): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const reason = parsed.error.issues[0]?.message ?? 'is invalid';
    throw new ValidationError(field, `Invalid ${field}: ${reason}`);
  }
  return parsed.data;
}
