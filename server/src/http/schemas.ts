import { z } from 'zod';

import { addDays, toCents, todayIso } from '../domain/computations.js';
import { BUDGET_PERIODS, DEFAULT_PAGE_SIZE, TRANSACTION_TYPES } from '../domain/types.js';
import { ValidationError } from './errors.js';

const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;
const MONTH_REGEX = /^\d{4}-(0[1-9]|1[0-2])$/;
const COLOR_REGEX = /^#[0-9A-Fa-f]{6}$/;

/** YYYY-MM-DD that names a real calendar day */
export const isoDate = z
  .string()
  .regex(DATE_REGEX, 'Date must be in YYYY-MM-DD format')
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
  }, 'Date is not a valid calendar day');

/** Positive currency amount with at most two decimals */
export const money = z
  .number()
  .positive('Amount must be greater than zero')
  .refine((value) => Math.abs(value * 100 - Math.round(value * 100)) < 1e-6, 'Amount must have at most 2 decimal places')
  .refine((value) => toCents(value) > 0, 'Amount must be at least 0.01');

const optionalId = z.string().min(1).nullable().optional().transform((v) => v ?? null);

export const transactionBody = z.object({
  description: z.string().trim().min(1, 'Description is required').max(500),
  amount: money,
  type: z.enum(TRANSACTION_TYPES),
  // Allow one day ahead for timezone skew
  date: isoDate.refine((value) => value <= addDays(todayIso(), 1), 'Date cannot be more than one day in the future'),
  categoryId: optionalId,
});

export const categoryBody = z.object({
  name: z.string().trim().min(1, 'Name is required').max(100),
  icon: z.string().trim().max(50).nullable().optional().transform((v) => v ?? null),
  color: z.string().regex(COLOR_REGEX, 'Color must be #RRGGBB').nullable().optional().transform((v) => v ?? null),
});

export const budgetBody = z
  .object({
    name: z.string().trim().min(1, 'Name is required').max(100),
    amount: money,
    period: z.enum(BUDGET_PERIODS),
    startDate: isoDate,
    endDate: isoDate.nullable().optional().transform((v) => v ?? null),
    categoryId: z.string().min(1, 'Category is required'),
  })
  .refine((b) => b.endDate === null || b.endDate > b.startDate, {
    message: 'End date must be after start date',
    path: ['endDate'],
  });

export const transactionQuery = z.object({
  startDate: isoDate.optional(),
  endDate: isoDate.optional(),
  categoryId: z.string().min(1).optional(),
  type: z.enum(TRANSACTION_TYPES).optional(),
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).default(DEFAULT_PAGE_SIZE),
});

export const monthQuery = z.object({
  month: z.string().regex(MONTH_REGEX, 'month must be YYYY-MM'),
});

/**
 * Parses input against a schema, throwing a ValidationError with the
 * flattened field errors on failure.
 */
export function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid request', result.error.flatten());
  }
  return result.data;
}
