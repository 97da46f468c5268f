/**
 * Response Templates (English only)
 * The agent restates these in the user's language; store and item names
 * are kept as printed.
 */

import type { Failure } from '../errors.js';
import type { ReceiptRecord, SimilarReceipt } from '../store/types.js';
import type { ReceiptView, SimilarReceiptView, ToolError } from './schemas.js';

/**
 * Format currency amount for display
 */
export function formatAmount(amount: number, currency: string): string {
  const symbols: Record<string, string> = {
    IDR: 'Rp',
    THB: '฿',
    USD: '$',
    EUR: '€',
    JPY: '¥',
    AUD: 'A$',
  };
  return `${symbols[currency] || `${currency} `}${amount.toLocaleString('en-US')}`;
}

function formatDate(iso: string): string {
  return iso.slice(0, 10);
}

export const TEMPLATES = {
  receiptStored: (data: { storeName: string; amount: string; date: string; itemCount: number; id: string }) =>
    `Saved ${data.storeName} | ${data.amount} | ${data.date} (${data.itemCount} item${data.itemCount === 1 ? '' : 's'})\nIMAGE-ID ${data.id}`,

  receiptLine: (data: { storeName: string; amount: string; date: string; id: string }) =>
    `- ${data.storeName} | ${data.amount} | ${data.date} | ${data.id.substring(0, 12)}`,

  receiptList: (data: { count: number; lines: string }) =>
    `Found ${data.count} receipt${data.count === 1 ? '' : 's'}\n${data.lines}`,

  noReceipts: () => 'No receipts match.',

  duplicate: () => 'This receipt was already saved earlier. Nothing was changed.',

  error: (data: { reason: string }) => `Error: ${data.reason}`,
} as const;

export function toReceiptView(record: ReceiptRecord): ReceiptView {
  return {
    receiptId: record.receiptId,
    storeName: record.storeName,
    transactionTime: record.transactionTime,
    totalAmount: record.totalAmount,
    currency: record.currency,
    purchasedItems: record.purchasedItems,
    imageUri: record.imageUri,
  };
}

export function toSimilarReceiptView(match: SimilarReceipt): SimilarReceiptView {
  return { ...toReceiptView(match.record), distance: match.distance };
}

export function toToolError(failure: Failure): ToolError {
  return { code: failure.code, message: failure.message, retryable: failure.retryable };
}

export function receiptStoredMessage(record: ReceiptRecord): string {
  return TEMPLATES.receiptStored({
    storeName: record.storeName,
    amount: formatAmount(record.totalAmount, record.currency),
    date: formatDate(record.transactionTime),
    itemCount: record.purchasedItems.length,
    id: record.receiptId,
  });
}

export function receiptListMessage(records: readonly ReceiptRecord[]): string {
  if (records.length === 0) {
    return TEMPLATES.noReceipts();
  }
  const lines = records
    .map((record) =>
      TEMPLATES.receiptLine({
        storeName: record.storeName,
        amount: formatAmount(record.totalAmount, record.currency),
        date: formatDate(record.transactionTime),
        id: record.receiptId,
      })
    )
    .join('\n');
  return TEMPLATES.receiptList({ count: records.length, lines });
}

export function failureMessage(failure: Failure): string {
  return failure.code === 'DuplicateReceipt' ? TEMPLATES.duplicate() : TEMPLATES.error({ reason: failure.message });
}
