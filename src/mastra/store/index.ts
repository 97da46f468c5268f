/**
 * Receipt Store Module
 */

export { ReceiptStore, type ReceiptStoreOptions } from './receipt-store.js';
export { canonicalReceiptText } from './canonical.js';
export type {
  EmbeddingGateway,
  MetadataQuery,
  NewReceipt,
  PurchasedItem,
  ReceiptRecord,
  SimilarReceipt,
  StoredReceipt,
} from './types.js';
