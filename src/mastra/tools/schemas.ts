/**
 * Tool Schemas
 *
 * Input schemas are what the agent sees: permissive types with descriptions.
 * Strict validation happens afterwards in arguments.ts.
 * Output schemas share one envelope: `success`, `message`, a payload that is
 * null on failure, and a structured `error` that is null on success.
 */

import { z } from 'zod';
import { FAILURE_CODES } from '../errors.js';

const amountInput = z.union([z.number(), z.string()]);

// ============================================
// Inputs
// ============================================

export const StoreReceiptInputSchema = z.object({
  image_reference: z.string().describe('IMAGE-ID of the receipt image, exactly as shown in the conversation'),
  store_name: z.string().describe('Merchant name as printed on the receipt'),
  transaction_time: z.string().describe('Purchase date/time, ISO-8601 (e.g. 2024-03-01T10:00:00+07:00 or 2024-03-01)'),
  total_amount: amountInput.describe('Grand total paid, non-negative'),
  purchased_items: z
    .array(z.object({ name: z.string(), price: amountInput }))
    .optional()
    .describe('Line items in printed order; empty if none are legible'),
  currency: z.string().describe('Three-letter currency code, e.g. IDR, USD, THB'),
});

export const RangeSearchInputSchema = z.object({
  start_time: z.string().describe('Earliest purchase date/time, inclusive (ISO-8601)'),
  end_time: z.string().describe('Latest purchase date/time, inclusive (ISO-8601; a bare date covers the whole day)'),
  min_amount: amountInput.optional().describe('Minimum total, inclusive; -1 or omitted for no minimum'),
  max_amount: amountInput.optional().describe('Maximum total, inclusive; -1 or omitted for no maximum'),
});

export const TextSearchInputSchema = z.object({
  query_text: z.string().describe('What to look for, e.g. "coffee shop breakfast" or "hardware store"'),
  limit: z.union([z.number(), z.string()]).optional().describe('How many receipts to return (default 5)'),
});

export const GetReceiptInputSchema = z.object({
  image_reference: z.string().describe('IMAGE-ID of the receipt image'),
});

// ============================================
// Outputs
// ============================================

export const ToolErrorSchema = z.object({
  code: z.enum(FAILURE_CODES),
  message: z.string(),
  retryable: z.boolean(),
});

export const ReceiptViewSchema = z.object({
  receiptId: z.string(),
  storeName: z.string(),
  transactionTime: z.string(),
  totalAmount: z.number(),
  currency: z.string(),
  purchasedItems: z.array(z.object({ name: z.string(), price: z.number() })),
  imageUri: z.string(),
});

export const SimilarReceiptViewSchema = ReceiptViewSchema.extend({
  distance: z.number(),
});

export const ReceiptOutputSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  receipt: ReceiptViewSchema.nullable(),
  error: ToolErrorSchema.nullable(),
});

export const ReceiptListOutputSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  receipts: z.array(ReceiptViewSchema).nullable(),
  error: ToolErrorSchema.nullable(),
});

export const SimilarReceiptListOutputSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  receipts: z.array(SimilarReceiptViewSchema).nullable(),
  error: ToolErrorSchema.nullable(),
});

export type ToolError = z.infer<typeof ToolErrorSchema>;
export type ReceiptView = z.infer<typeof ReceiptViewSchema>;
export type SimilarReceiptView = z.infer<typeof SimilarReceiptViewSchema>;
export type ReceiptOutput = z.infer<typeof ReceiptOutputSchema>;
export type ReceiptListOutput = z.infer<typeof ReceiptListOutputSchema>;
export type SimilarReceiptListOutput = z.infer<typeof SimilarReceiptListOutputSchema>;
