/**
 * Receipt Store types
 */

export interface PurchasedItem {
  name: string;
  price: number;
}

export interface ReceiptRecord {
  /** Content hash of the receipt image; the dedup key */
  receiptId: string;
  storeName: string;
  /** ISO-8601 UTC instant */
  transactionTime: string;
  totalAmount: number;
  currency: string;
  purchasedItems: PurchasedItem[];
  imageUri: string;
  /** ISO-8601 UTC instant the row was written */
  createdAt: string;
}

/**
 * What a caller hands to `store()`: the record before it is written.
 */
export type NewReceipt = Omit<ReceiptRecord, 'createdAt'>;

/**
 * What `store()` returns. The embedding itself lives in the vector index,
 * keyed by receiptId; reads from the table do not carry it.
 */
export interface StoredReceipt extends ReceiptRecord {
  /** Unit-length embedding of the canonical receipt text */
  embedding: number[];
}

export interface MetadataQuery {
  /** Inclusive lower bound, ISO-8601 */
  start: string;
  /** Inclusive upper bound, ISO-8601 */
  end: string;
  /** null = unbounded */
  minAmount: number | null;
  /** null = unbounded */
  maxAmount: number | null;
}

export interface SimilarReceipt {
  record: ReceiptRecord;
  /** Euclidean distance between the query and record embeddings */
  distance: number;
}

/**
 * Turns text into a fixed-length vector. Implementations should honour the
 * abort signal so a deadline can cancel the request.
 */
export interface EmbeddingGateway {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}
