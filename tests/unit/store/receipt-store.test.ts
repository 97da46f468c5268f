/**
 * Unit tests for ReceiptStore
 *
 * Runs against an in-memory libsql table, a LibSQLVector index in a temp
 * file and a keyword embedding fake, so orderings are known up front.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Client } from '@libsql/client';
import type { LibSQLVector } from '@mastra/libsql';
import type { ReceiptStore } from '../../../src/mastra/store/receipt-store.js';
import type { NewReceipt } from '../../../src/mastra/store/types.js';
import { RECEIPT_VECTOR_INDEX } from '../../../src/mastra/vector/receipt-index.js';
import { createTestStore, type KeywordEmbeddingGateway } from '../../helpers/fakes.js';

function receiptId(char: string): string {
  return char.repeat(64);
}

function receipt(overrides: Partial<NewReceipt> = {}): NewReceipt {
  return {
    receiptId: receiptId('a'),
    storeName: 'Cafe X',
    transactionTime: '2024-03-01T10:00:00Z',
    totalAmount: 15000,
    currency: 'IDR',
    purchasedItems: [{ name: 'Latte', price: 15000 }],
    imageUri: 'http://test.local/uploads/a.jpg',
    ...overrides,
  };
}

describe('ReceiptStore', () => {
  let client: Client;
  let vectors: LibSQLVector;
  let store: ReceiptStore;
  let embeddings: KeywordEmbeddingGateway;

  beforeEach(async () => {
    ({ client, vectors, store, embeddings } = await createTestStore(50));
  });

  describe('store', () => {
    it('should store a receipt and return it with a normalized time and embedding', async () => {
      const result = await store.store(receipt({ transactionTime: '2024-03-01T17:00:00+07:00' }));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.receiptId).toBe(receiptId('a'));
      expect(result.value.transactionTime).toBe('2024-03-01T10:00:00.000Z');
      expect(result.value.embedding).toEqual([0, 0, 0, 1]);
      expect(embeddings.calls).toEqual(['Store: Cafe X\nItems: Latte 15000\nTotal: 15000 IDR']);
      expect(await store.count()).toBe(1);
    });

    it('should reject a second write for the same id without embedding again', async () => {
      await store.store(receipt());
      const second = await store.store(receipt({ storeName: 'Somewhere Else', totalAmount: 1 }));

      expect(second.ok).toBe(false);
      if (second.ok) return;
      expect(second.error.code).toBe('DuplicateReceipt');
      expect(second.error.retryable).toBe(false);
      expect(embeddings.calls).toHaveLength(1);

      const stored = await store.getById(receiptId('a'));
      expect(stored.ok && stored.value.storeName).toBe('Cafe X');
      expect(await store.count()).toBe(1);
    });

    it('should let exactly one of several concurrent writers win', async () => {
      const results = await Promise.all(
        Array.from({ length: 5 }, (_, i) => store.store(receipt({ storeName: `Writer ${i}` })))
      );

      const succeeded = results.filter((r) => r.ok);
      const duplicates = results.filter((r) => !r.ok && r.error.code === 'DuplicateReceipt');
      expect(succeeded).toHaveLength(1);
      expect(duplicates).toHaveLength(4);
      expect(await store.count()).toBe(1);
    });

    it('should return EmbeddingUnavailable and write nothing when embedding fails', async () => {
      embeddings.failure = new Error('quota exceeded');

      const result = await store.store(receipt());

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('EmbeddingUnavailable');
      expect(result.error.retryable).toBe(true);
      expect(result.error.message).toBe('Embedding gateway failed: quota exceeded');
      expect(await store.count()).toBe(0);
    });

    it('should undo the insert when the vector index write fails', async () => {
      vi.spyOn(vectors, 'upsert').mockRejectedValueOnce(new Error('disk full'));

      const failed = await store.store(receipt());

      expect(failed.ok).toBe(false);
      if (failed.ok) return;
      expect(failed.error.code).toBe('StorageUnavailable');
      expect(failed.error.message).toBe('Vector index write failed: disk full');
      expect(await store.count()).toBe(0);

      const retried = await store.store(receipt());
      expect(retried.ok).toBe(true);
      expect(await store.count()).toBe(1);
    });

    it('should return GatewayTimeout when embedding outlives the deadline', async () => {
      embeddings.delayMs = 500;

      const result = await store.store(receipt());

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('GatewayTimeout');
      expect(result.error.message).toBe('embedding gateway did not respond within 50ms');
      expect(await store.count()).toBe(0);
    });

    it('should reject an invalid transaction time', async () => {
      const result = await store.store(receipt({ transactionTime: 'yesterday' }));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('InvalidArgument');
      expect(embeddings.calls).toHaveLength(0);
    });

    it('should reject a negative total', async () => {
      const result = await store.store(receipt({ totalAmount: -5 }));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('InvalidArgument');
    });
  });

  describe('searchByMetadata', () => {
    beforeEach(async () => {
      await store.store(receipt());
      await store.store(
        receipt({ receiptId: receiptId('b'), storeName: 'Budi Hardware', totalAmount: 250000, transactionTime: '2024-02-10T08:00:00Z' })
      );
      await store.store(
        receipt({ receiptId: receiptId('c'), storeName: 'Old Shop', totalAmount: 5000, transactionTime: '2023-12-31T23:59:59Z' })
      );
    });

    it('should find Cafe X within the year and a 10000..20000 total', async () => {
      const result = await store.searchByMetadata({
        start: '2024-01-01T00:00:00.000Z',
        end: '2024-12-31T23:59:59.999Z',
        minAmount: 10000,
        maxAmount: 20000,
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.map((r) => r.storeName)).toEqual(['Cafe X']);
    });

    it('should exclude Cafe X when the minimum is 50000 and the maximum is open', async () => {
      const result = await store.searchByMetadata({
        start: '2024-01-01T00:00:00.000Z',
        end: '2024-12-31T23:59:59.999Z',
        minAmount: 50000,
        maxAmount: null,
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.map((r) => r.storeName)).toEqual(['Budi Hardware']);
    });

    it('should treat null amount bounds as unbounded and order by transaction time', async () => {
      const result = await store.searchByMetadata({
        start: '2023-01-01T00:00:00.000Z',
        end: '2024-12-31T23:59:59.999Z',
        minAmount: null,
        maxAmount: null,
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.map((r) => r.storeName)).toEqual(['Old Shop', 'Budi Hardware', 'Cafe X']);
    });

    it('should include records exactly on the bounds', async () => {
      const result = await store.searchByMetadata({
        start: '2024-03-01T10:00:00.000Z',
        end: '2024-03-01T10:00:00.000Z',
        minAmount: 15000,
        maxAmount: 15000,
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toHaveLength(1);
    });

    it('should return an empty list when nothing matches', async () => {
      const result = await store.searchByMetadata({
        start: '2030-01-01T00:00:00.000Z',
        end: '2030-12-31T00:00:00.000Z',
        minAmount: null,
        maxAmount: null,
      });

      expect(result).toEqual({ ok: true, value: [] });
    });

    it('should return InvalidRange when start is after end', async () => {
      const result = await store.searchByMetadata({
        start: '2024-12-31T00:00:00.000Z',
        end: '2024-01-01T00:00:00.000Z',
        minAmount: null,
        maxAmount: null,
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('InvalidRange');
    });

    it('should return InvalidRange when the minimum exceeds the maximum', async () => {
      const result = await store.searchByMetadata({
        start: '2024-01-01T00:00:00.000Z',
        end: '2024-12-31T00:00:00.000Z',
        minAmount: 20000,
        maxAmount: 10000,
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('InvalidRange');
    });

    it('should return InvalidArgument for a negative bound', async () => {
      const result = await store.searchByMetadata({
        start: '2024-01-01T00:00:00.000Z',
        end: '2024-12-31T00:00:00.000Z',
        minAmount: -1,
        maxAmount: null,
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('InvalidArgument');
    });
  });

  describe('searchBySimilarity', () => {
    beforeEach(async () => {
      await store.store(receipt({ receiptId: receiptId('1'), storeName: 'Kopi Coffee House' }));
      await store.store(receipt({ receiptId: receiptId('2'), storeName: 'Budi Hardware', purchasedItems: [] }));
      await store.store(
        receipt({
          receiptId: receiptId('3'),
          storeName: 'Fresh Grocery Mart',
          purchasedItems: [{ name: 'Coffee beans', price: 15000 }],
        })
      );
    });

    it('should rank receipts nearest first', async () => {
      const result = await store.searchBySimilarity('coffee');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.map((m) => m.record.storeName)).toEqual([
        'Kopi Coffee House',
        'Fresh Grocery Mart',
        'Budi Hardware',
      ]);
      // Unit vectors: [1,0,0,1]/√2 against itself, [1,0,1,1]/√3 and [0,1,0,1]/√2
      const [same, partial, other] = result.value.map((m) => m.distance);
      expect(same).toBeCloseTo(0, 2);
      expect(partial).toBeCloseTo(Math.sqrt(2 - 4 / Math.sqrt(6)), 2);
      expect(other).toBeCloseTo(1, 2);
    });

    it('should break equal distances by insertion order', async () => {
      await store.store(receipt({ receiptId: receiptId('4'), storeName: 'Jaya Hardware', purchasedItems: [] }));

      const first = await store.searchBySimilarity('hardware', 1);
      const both = await store.searchBySimilarity('hardware', 2);

      expect(first.ok && first.value.map((m) => m.record.receiptId)).toEqual([receiptId('2')]);
      expect(both.ok && both.value.map((m) => m.record.receiptId)).toEqual([receiptId('2'), receiptId('4')]);
    });

    it('should return at most limit results', async () => {
      const result = await store.searchBySimilarity('coffee', 2);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.map((m) => m.record.receiptId)).toEqual([receiptId('1'), receiptId('3')]);
    });

    it('should skip index hits whose row is missing or unreadable', async () => {
      await client.execute({
        sql: `INSERT INTO receipts (
                receipt_id, store_name, transaction_time, total_amount, currency,
                purchased_items, image_uri, created_at
              ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        args: [receiptId('8'), 'Broken Coffee', 0, 1, 'IDR', 'not json', 'http://test.local/uploads/8.jpg', 0],
      });
      const coffee = [Math.SQRT1_2, 0, 0, Math.SQRT1_2];
      await vectors.upsert({
        indexName: RECEIPT_VECTOR_INDEX,
        vectors: [coffee, coffee],
        ids: [receiptId('8'), receiptId('9')],
      });

      const result = await store.searchBySimilarity('coffee', 10);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.map((m) => m.record.receiptId)).toEqual([receiptId('1'), receiptId('3'), receiptId('2')]);
    });

    it('should reject a non-positive limit', async () => {
      const result = await store.searchBySimilarity('coffee', 0);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('InvalidArgument');
    });

    it('should surface embedding failures without retrying', async () => {
      embeddings.failure = new Error('service unavailable');
      const callsBefore = embeddings.calls.length;

      const result = await store.searchBySimilarity('coffee');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('EmbeddingUnavailable');
      expect(embeddings.calls.length - callsBefore).toBe(1);
    });
  });

  describe('getById', () => {
    it('should return the stored record', async () => {
      await store.store(receipt());

      const result = await store.getById(receiptId('a'));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toMatchObject({
        storeName: 'Cafe X',
        totalAmount: 15000,
        currency: 'IDR',
        transactionTime: '2024-03-01T10:00:00.000Z',
        purchasedItems: [{ name: 'Latte', price: 15000 }],
        imageUri: 'http://test.local/uploads/a.jpg',
      });
    });

    it('should return NotFound for an unknown id', async () => {
      const result = await store.getById(receiptId('f'));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('NotFound');
    });
  });
});
