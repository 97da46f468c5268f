/**
 * Tool Argument Normalization
 *
 * The agent calls tools with loosely-typed JSON. Everything is parsed here
 * into strict commands before it reaches the store: amounts become numbers,
 * timestamps become UTC instants, references lose their marker wrapping.
 */

import { z } from 'zod';
import { fail, ok, type Result } from '../errors.js';
import { normalizeReference } from '../context/reference.js';
import type { PurchasedItem } from '../store/types.js';

/** Search bound meaning "no limit on this side" */
export const UNBOUNDED = -1;

export const DEFAULT_SIMILARITY_LIMIT = 5;

// ============================================
// Field parsers
// ============================================

// "15,000" and " 42.50 " are amounts; anything else is left for zod to reject
function numericInput(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const cleaned = value.trim().replace(/,/g, '');
  return /^-?\d+(\.\d+)?$/.test(cleaned) ? Number(cleaned) : value;
}

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?)(Z|[+-]\d{2}:?\d{2})?$/i;

function isCalendarDate(year: string, month: string, day: string): boolean {
  const y = Number(year);
  const m = Number(month);
  const d = Number(day);
  const date = new Date(Date.UTC(y, m - 1, d));
  return date.getUTCFullYear() === y && date.getUTCMonth() === m - 1 && date.getUTCDate() === d;
}

/**
 * Parse a timestamp into a UTC instant.
 *
 * - `2024-03-01T10:00:00+07:00` / `...Z`: taken as written
 * - `2024-03-01T10:00:00`: no zone given, read as UTC
 * - `2024-03-01`: start of that UTC day, or its last millisecond for `end`
 */
export function parseTimestamp(raw: string, boundary: 'start' | 'end' = 'start'): Date | null {
  const value = raw.trim();

  const dateOnly = DATE_ONLY.exec(value);
  if (dateOnly) {
    const [, year, month, day] = dateOnly;
    if (!isCalendarDate(year, month, day)) return null;
    const time = boundary === 'end' ? '23:59:59.999' : '00:00:00.000';
    return new Date(`${year}-${month}-${day}T${time}Z`);
  }

  const dateTime = DATE_TIME.exec(value);
  if (!dateTime) return null;

  const [, year, month, day, time, zone] = dateTime;
  if (!isCalendarDate(year, month, day)) return null;

  let offset = 'Z';
  if (zone && zone.toUpperCase() !== 'Z') {
    offset = zone.includes(':') ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
  }
  const parsed = new Date(`${year}-${month}-${day}T${time}${offset}`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

function timestamp(boundary: 'start' | 'end') {
  return z.string().transform((value, ctx) => {
    const parsed = parseTimestamp(value, boundary);
    if (!parsed) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `"${value}" is not a valid date or ISO-8601 timestamp`,
      });
      return z.NEVER;
    }
    return parsed.toISOString();
  });
}

const AmountSchema = z.preprocess(
  numericInput,
  z.number({ invalid_type_error: 'must be a number' }).finite().nonnegative('must not be negative')
);

const BoundSchema = z
  .preprocess(
    numericInput,
    z
      .number({ invalid_type_error: 'must be a number' })
      .finite()
      .refine((value) => value === UNBOUNDED || value >= 0, {
        message: `must not be negative (use ${UNBOUNDED} for no limit)`,
      })
  )
  .default(UNBOUNDED);

const ReferenceSchema = z.string().transform((value, ctx) => {
  const reference = normalizeReference(value);
  if (!reference) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'must be the 64-character IMAGE-ID shown next to the image',
    });
    return z.NEVER;
  }
  return reference;
});

// ============================================
// Commands
// ============================================

export interface StoreReceiptCommand {
  reference: string;
  storeName: string;
  transactionTime: string;
  totalAmount: number;
  currency: string;
  purchasedItems: PurchasedItem[];
}

export interface RangeSearchCommand {
  start: string;
  end: string;
  minAmount: number | null;
  maxAmount: number | null;
}

export interface TextSearchCommand {
  queryText: string;
  limit: number;
}

export interface GetReceiptCommand {
  reference: string;
}

export const StoreReceiptArgsSchema = z
  .object({
    image_reference: ReferenceSchema,
    store_name: z.string().trim().min(1, 'must not be empty'),
    transaction_time: timestamp('start'),
    total_amount: AmountSchema,
    purchased_items: z
      .array(
        z.object({
          name: z.string().trim().min(1, 'must not be empty'),
          price: AmountSchema,
        })
      )
      .default([]),
    currency: z
      .string()
      .trim()
      .toUpperCase()
      .regex(/^[A-Z]{3}$/, 'must be a three-letter currency code'),
  })
  .transform(
    (args): StoreReceiptCommand => ({
      reference: args.image_reference,
      storeName: args.store_name,
      transactionTime: args.transaction_time,
      totalAmount: args.total_amount,
      currency: args.currency,
      purchasedItems: args.purchased_items,
    })
  );

export const RangeSearchArgsSchema = z
  .object({
    start_time: timestamp('start'),
    end_time: timestamp('end'),
    min_amount: BoundSchema,
    max_amount: BoundSchema,
  })
  .transform(
    (args): RangeSearchCommand => ({
      start: args.start_time,
      end: args.end_time,
      minAmount: args.min_amount === UNBOUNDED ? null : args.min_amount,
      maxAmount: args.max_amount === UNBOUNDED ? null : args.max_amount,
    })
  );

export const TextSearchArgsSchema = z
  .object({
    query_text: z.string().trim().min(1, 'must not be empty'),
    limit: z
      .preprocess(numericInput, z.number().int('must be a whole number').positive('must be at least 1'))
      .default(DEFAULT_SIMILARITY_LIMIT),
  })
  .transform((args): TextSearchCommand => ({ queryText: args.query_text, limit: args.limit }));

export const GetReceiptArgsSchema = z
  .object({ image_reference: ReferenceSchema })
  .transform((args): GetReceiptCommand => ({ reference: args.image_reference }));

/**
 * Validate raw tool input. All issues are reported together as one
 * InvalidArgument so the agent can fix every field in one retry.
 */
export function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): Result<T> {
  const parsed = schema.safeParse(raw);
  if (parsed.success) {
    return ok(parsed.data);
  }
  const issues = parsed.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
  return fail('InvalidArgument', issues.join('; '), { issues });
}
