/**
 * Receipt Store
 *
 * Persists extracted receipts in libsql, with one embedding per record in a
 * LibSQLVector index keyed by receiptId.
 *
 * - Writes are at-most-once per receiptId: the insert is a conditional write,
 *   so concurrent writers with one id get exactly one winner. Only the winner
 *   indexes its embedding.
 * - Metadata search is a plain SQL range scan.
 * - Similarity search asks the vector index for the nearest ids, then loads
 *   those rows from the table.
 */

import type { Client, Row } from '@libsql/client';
import { z } from 'zod';
import { withDeadline } from '../deadline.js';
import { errorMessage, fail, GatewayTimeoutError, ok, type Result } from '../errors.js';
import { distanceFromScore, RECEIPT_VECTOR_INDEX, unitVector, type ReceiptVectorIndex } from '../vector/receipt-index.js';
import { canonicalReceiptText } from './canonical.js';
import { CREATE_RECEIPTS_TABLE, CREATE_RECEIPTS_RANGE_INDEX } from './schema.js';
import type {
  EmbeddingGateway,
  MetadataQuery,
  NewReceipt,
  ReceiptRecord,
  SimilarReceipt,
  StoredReceipt,
} from './types.js';

// ============================================
// Row decoding
// ============================================

const ReceiptRowSchema = z.object({
  seq: z.number(),
  receipt_id: z.string(),
  store_name: z.string(),
  transaction_time: z.number(),
  total_amount: z.number(),
  currency: z.string(),
  purchased_items: z.string(),
  image_uri: z.string(),
  created_at: z.number(),
});

const PurchasedItemsSchema = z.array(z.object({ name: z.string(), price: z.number() }));

const CountRowSchema = z.object({ total: z.number() });

interface DecodedRow {
  seq: number;
  record: ReceiptRecord;
}

function decodeRow(row: Row): DecodedRow {
  const r = ReceiptRowSchema.parse(row);
  return {
    seq: r.seq,
    record: {
      receiptId: r.receipt_id,
      storeName: r.store_name,
      transactionTime: new Date(r.transaction_time).toISOString(),
      totalAmount: r.total_amount,
      currency: r.currency,
      purchasedItems: PurchasedItemsSchema.parse(JSON.parse(r.purchased_items)),
      imageUri: r.image_uri,
      createdAt: new Date(r.created_at).toISOString(),
    },
  };
}

/**
 * Decode search hits, dropping rows that no longer parse
 */
function decodeRows(rows: readonly Row[]): DecodedRow[] {
  const decoded: DecodedRow[] = [];
  for (const row of rows) {
    try {
      decoded.push(decodeRow(row));
    } catch (error) {
      console.warn(`[Store] Skipping unreadable receipt row ${String(row.receipt_id)}: ${errorMessage(error)}`);
    }
  }
  return decoded;
}

function parseInstant(value: string): number | null {
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

// ============================================
// Store
// ============================================

export interface ReceiptStoreOptions {
  /** Expected embedding length; vectors of any other length are rejected */
  dimension: number;
  /** Deadline for each embedding call */
  timeoutMs: number;
}

export class ReceiptStore {
  constructor(
    private readonly client: Client,
    private readonly embeddings: EmbeddingGateway,
    private readonly vectors: ReceiptVectorIndex,
    private readonly options: ReceiptStoreOptions
  ) {}

  async initialize(): Promise<void> {
    await this.client.batch([CREATE_RECEIPTS_TABLE, CREATE_RECEIPTS_RANGE_INDEX], 'write');
    await this.vectors.createIndex({
      indexName: RECEIPT_VECTOR_INDEX,
      dimension: this.options.dimension,
      metric: 'cosine',
    });
    console.log('[Store] Receipt table and vector index ready');
  }

  /**
   * Embed and insert a receipt. A second write for the same receiptId is
   * rejected with DuplicateReceipt; the stored row is never touched.
   */
  async store(receipt: NewReceipt): Promise<Result<StoredReceipt>> {
    const transactionMs = parseInstant(receipt.transactionTime);
    if (transactionMs === null) {
      return fail('InvalidArgument', `transactionTime is not a valid instant: ${receipt.transactionTime}`);
    }
    if (!Number.isFinite(receipt.totalAmount) || receipt.totalAmount < 0) {
      return fail('InvalidArgument', `totalAmount must be a non-negative number, got ${receipt.totalAmount}`);
    }

    // Skip the billed embedding call when the id is already taken.
    // The conditional insert below still decides races.
    if (await this.exists(receipt.receiptId)) {
      return this.duplicate(receipt.receiptId);
    }

    const embedded = await this.embedText(canonicalReceiptText(receipt));
    if (!embedded.ok) {
      return embedded;
    }

    const createdAt = Date.now();
    const result = await this.client.execute({
      sql: `INSERT INTO receipts (
              receipt_id, store_name, transaction_time, total_amount, currency,
              purchased_items, image_uri, created_at
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
            ON CONFLICT(receipt_id) DO NOTHING`,
      args: [
        receipt.receiptId,
        receipt.storeName,
        transactionMs,
        receipt.totalAmount,
        receipt.currency,
        JSON.stringify(receipt.purchasedItems),
        receipt.imageUri,
        createdAt,
      ],
    });

    if (result.rowsAffected === 0) {
      return this.duplicate(receipt.receiptId);
    }

    try {
      await this.vectors.upsert({
        indexName: RECEIPT_VECTOR_INDEX,
        vectors: [embedded.value],
        ids: [receipt.receiptId],
      });
    } catch (error) {
      // A row the index cannot find would never show up in similarity search
      await this.client.execute({ sql: 'DELETE FROM receipts WHERE receipt_id = ?', args: [receipt.receiptId] });
      console.error('[Store] ❌ Vector index write failed:', error);
      return fail('StorageUnavailable', `Vector index write failed: ${errorMessage(error)}`);
    }

    console.log(`[Store] ✅ Stored ${receipt.receiptId.substring(0, 12)}: ${receipt.storeName} ${receipt.totalAmount} ${receipt.currency}`);

    return ok({
      ...receipt,
      transactionTime: new Date(transactionMs).toISOString(),
      embedding: embedded.value,
      createdAt: new Date(createdAt).toISOString(),
    });
  }

  /**
   * Every record inside both ranges, ordered by transaction time then
   * insertion order. Bounds are inclusive; a null amount bound is open.
   */
  async searchByMetadata(query: MetadataQuery): Promise<Result<ReceiptRecord[]>> {
    const start = parseInstant(query.start);
    const end = parseInstant(query.end);
    if (start === null || end === null) {
      return fail('InvalidArgument', `Time bounds must be valid instants: ${query.start} .. ${query.end}`);
    }
    if (start > end) {
      return fail('InvalidRange', `start (${query.start}) is after end (${query.end})`);
    }

    const { minAmount, maxAmount } = query;
    for (const bound of [minAmount, maxAmount]) {
      if (bound !== null && (!Number.isFinite(bound) || bound < 0)) {
        return fail('InvalidArgument', `Amount bounds must be non-negative, got ${bound}`);
      }
    }
    if (minAmount !== null && maxAmount !== null && minAmount > maxAmount) {
      return fail('InvalidRange', `minAmount (${minAmount}) is greater than maxAmount (${maxAmount})`);
    }

    const clauses = ['transaction_time >= ?', 'transaction_time <= ?'];
    const args: number[] = [start, end];
    if (minAmount !== null) {
      clauses.push('total_amount >= ?');
      args.push(minAmount);
    }
    if (maxAmount !== null) {
      clauses.push('total_amount <= ?');
      args.push(maxAmount);
    }

    const result = await this.client.execute({
      sql: `SELECT * FROM receipts WHERE ${clauses.join(' AND ')} ORDER BY transaction_time, seq`,
      args,
    });

    return ok(result.rows.map((row) => decodeRow(row).record));
  }

  /**
   * The `limit` records nearest to the query text, nearest first.
   * No metadata filtering and no retry on gateway failure.
   */
  async searchBySimilarity(queryText: string, limit = 5): Promise<Result<SimilarReceipt[]>> {
    if (!Number.isInteger(limit) || limit <= 0) {
      return fail('InvalidArgument', `limit must be a positive integer, got ${limit}`);
    }
    if (queryText.trim().length === 0) {
      return fail('InvalidArgument', 'queryText must not be empty');
    }

    const embedded = await this.embedText(queryText);
    if (!embedded.ok) {
      return embedded;
    }

    const hits = await this.nearest(embedded.value, limit);
    if (hits.length === 0) {
      return ok([]);
    }

    const result = await this.client.execute({
      sql: `SELECT * FROM receipts WHERE receipt_id IN (${hits.map(() => '?').join(', ')})`,
      args: hits.map((hit) => hit.id),
    });
    const rows = new Map(decodeRows(result.rows).map((row) => [row.record.receiptId, row]));

    const matches: Array<SimilarReceipt & { seq: number }> = [];
    for (const hit of hits) {
      const row = rows.get(hit.id);
      if (!row) {
        console.warn(`[Store] Skipping ${hit.id.substring(0, 12)}: indexed but not readable`);
        continue;
      }
      matches.push({ record: row.record, distance: distanceFromScore(hit.score), seq: row.seq });
    }

    // Equal distances keep insertion order
    matches.sort((a, b) => a.distance - b.distance || a.seq - b.seq);
    const nearest = matches.slice(0, limit).map(({ record, distance }) => ({ record, distance }));
    console.log(`[Store] 🔍 "${queryText.substring(0, 40)}" → ${nearest.length} receipts`);

    return ok(nearest);
  }

  async getById(receiptId: string): Promise<Result<ReceiptRecord>> {
    const result = await this.client.execute({
      sql: 'SELECT * FROM receipts WHERE receipt_id = ?',
      args: [receiptId],
    });
    const row = result.rows[0];
    if (!row) {
      return fail('NotFound', `No receipt stored for ${receiptId}`);
    }
    return ok(decodeRow(row).record);
  }

  async count(): Promise<number> {
    const result = await this.client.execute('SELECT COUNT(*) AS total FROM receipts');
    return CountRowSchema.parse(result.rows[0]).total;
  }

  // ============================================
  // Internals
  // ============================================

  private async exists(receiptId: string): Promise<boolean> {
    const result = await this.client.execute({
      sql: 'SELECT 1 FROM receipts WHERE receipt_id = ?',
      args: [receiptId],
    });
    return result.rows.length > 0;
  }

  private duplicate(receiptId: string): Result<never> {
    console.log(`[Store] Duplicate receipt rejected: ${receiptId.substring(0, 12)}`);
    return fail('DuplicateReceipt', `Receipt ${receiptId} is already stored`, { receiptId });
  }

  /**
   * Index hits for the `limit` nearest ids. When the hit at the cut ties with
   * the next one, the window widens until the whole tie is inside it, so the
   * caller can break the tie by insertion order instead of the index.
   */
  private async nearest(queryVector: number[], limit: number) {
    let topK = limit + 1;
    for (;;) {
      const hits = await this.vectors.query({ indexName: RECEIPT_VECTOR_INDEX, queryVector, topK });
      const atCut = hits[limit - 1];
      const last = hits[hits.length - 1];
      if (hits.length < topK || !atCut || !last || atCut.score !== last.score) {
        return hits;
      }
      topK *= 2;
    }
  }

  /**
   * Embed text as a unit vector of the configured dimension
   */
  private async embedText(text: string): Promise<Result<number[]>> {
    const { dimension, timeoutMs } = this.options;
    try {
      const vector = await withDeadline('embedding gateway', timeoutMs, (signal) =>
        this.embeddings.embed(text, signal)
      );
      if (vector.length !== dimension) {
        return fail('EmbeddingUnavailable', `Embedding has ${vector.length} dimensions, expected ${dimension}`);
      }
      const unit = unitVector(vector);
      if (unit === null) {
        return fail('EmbeddingUnavailable', 'Embedding is the zero vector');
      }
      return ok(unit);
    } catch (error) {
      if (error instanceof GatewayTimeoutError) {
        console.error(`[Store] ⏱️ ${error.message}`);
        return fail('GatewayTimeout', error.message, { gateway: error.gateway, timeoutMs: error.timeoutMs });
      }
      console.error('[Store] ❌ Embedding failed:', error);
      return fail('EmbeddingUnavailable', `Embedding gateway failed: ${errorMessage(error)}`);
    }
  }
}
