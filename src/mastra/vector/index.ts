/**
 * Vector Module
 *
 * Embedding gateway and the LibSQLVector index used by the Receipt Store.
 */

export { GoogleEmbeddingGateway, type GoogleEmbeddingOptions } from './embedding-gateway.js';
export {
  createReceiptVectorIndex,
  distanceFromScore,
  RECEIPT_VECTOR_INDEX,
  unitVector,
  type ReceiptVectorIndex,
} from './receipt-index.js';
