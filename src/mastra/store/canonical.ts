import type { NewReceipt } from './types.js';

/**
 * Deterministic text form of a receipt, used only as embedding input.
 * Never includes the image or the id, so equal content embeds equally.
 */
export function canonicalReceiptText(
  receipt: Pick<NewReceipt, 'storeName' | 'purchasedItems' | 'totalAmount' | 'currency'>
): string {
  const items = receipt.purchasedItems.length > 0
    ? receipt.purchasedItems.map((item) => `${item.name} ${item.price}`).join('; ')
    : 'none';

  return [
    `Store: ${receipt.storeName}`,
    `Items: ${items}`,
    `Total: ${receipt.totalAmount} ${receipt.currency}`,
  ].join('\n');
}
