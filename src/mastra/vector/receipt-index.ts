/**
 * Receipt Vector Index
 *
 * Secondary index over receipt embeddings, kept in LibSQLVector and keyed by
 * receiptId. The receipts table stays the source of truth; the index only
 * answers "which ids are nearest".
 *
 * LibSQLVector ranks by cosine similarity. Every vector is scaled to unit
 * length before it is indexed or queried, so cosine order is Euclidean
 * order and the Euclidean distance is sqrt(2 - 2 * score).
 */

import { LibSQLVector } from '@mastra/libsql';

export const RECEIPT_VECTOR_INDEX = 'receipt_embeddings';

/**
 * The part of LibSQLVector the Receipt Store calls
 */
export type ReceiptVectorIndex = Pick<LibSQLVector, 'createIndex' | 'upsert' | 'query'>;

export function createReceiptVectorIndex(url: string): LibSQLVector {
  return new LibSQLVector({
    id: 'receipt-keeper-vector',
    url,
  });
}

/**
 * Scale to length 1, or null for the zero vector (it has no direction to rank by)
 */
export function unitVector(vector: readonly number[]): number[] | null {
  const norm = Math.hypot(...vector);
  if (!Number.isFinite(norm) || norm === 0) return null;
  return vector.map((value) => value / norm);
}

/**
 * Euclidean distance between two unit vectors with the given cosine similarity
 */
export function distanceFromScore(score: number): number {
  // float32 storage can push the score a hair past 1
  return Math.sqrt(Math.max(0, 2 - 2 * score));
}
