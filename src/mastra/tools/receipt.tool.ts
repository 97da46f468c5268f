/**
 * Receipt Tools
 *
 * The four operations the agent can call: store a receipt it has read from
 * an image, search by date/amount range, search by meaning, and look one up
 * by image reference.
 *
 * Handlers are plain functions over injected dependencies; the Mastra tools
 * below only pull the session id from the request context and delegate.
 * Nothing here retries: failures go back to the agent as typed results.
 */

import { createTool } from '@mastra/core/tools';
import type { BlobGateway } from '../blob/blob-gateway.js';
import { resolveImage } from '../context/resolver.js';
import type { SessionRegistry } from '../context/registry.js';
import { withDeadline } from '../deadline.js';
import { errorMessage, fail, failure, GatewayTimeoutError, ok, type Failure, type Result } from '../errors.js';
import type { ReceiptStore } from '../store/receipt-store.js';
import {
  GetReceiptArgsSchema,
  parseArgs,
  RangeSearchArgsSchema,
  StoreReceiptArgsSchema,
  TextSearchArgsSchema,
} from './arguments.js';
import {
  failureMessage,
  receiptListMessage,
  receiptStoredMessage,
  toReceiptView,
  toSimilarReceiptView,
  toToolError,
} from './responses.js';
import {
  GetReceiptInputSchema,
  RangeSearchInputSchema,
  ReceiptListOutputSchema,
  ReceiptOutputSchema,
  SimilarReceiptListOutputSchema,
  StoreReceiptInputSchema,
  TextSearchInputSchema,
  type ReceiptListOutput,
  type ReceiptOutput,
  type SimilarReceiptListOutput,
} from './schemas.js';

export interface ReceiptToolDeps {
  store: ReceiptStore;
  sessions: SessionRegistry;
  blobs: BlobGateway;
  /** Deadline for Blob Gateway calls */
  timeoutMs: number;
}

// ============================================
// Output envelopes
// ============================================

function receiptFailure(error: Failure): ReceiptOutput {
  return { success: false, message: failureMessage(error), receipt: null, error: toToolError(error) };
}

function listFailure(error: Failure): ReceiptListOutput {
  return { success: false, message: failureMessage(error), receipts: null, error: toToolError(error) };
}

function similarFailure(error: Failure): SimilarReceiptListOutput {
  return { success: false, message: failureMessage(error), receipts: null, error: toToolError(error) };
}

async function uploadImage(
  deps: ReceiptToolDeps,
  bytes: Uint8Array,
  mimeType: string
): Promise<Result<string>> {
  try {
    return ok(await withDeadline('blob gateway', deps.timeoutMs, (signal) => deps.blobs.put(bytes, mimeType, signal)));
  } catch (error) {
    if (error instanceof GatewayTimeoutError) {
      return fail('GatewayTimeout', error.message, { gateway: error.gateway, timeoutMs: error.timeoutMs });
    }
    console.error('[Tool] ❌ Blob upload failed:', error);
    return fail('StorageUnavailable', `Could not save the receipt image: ${errorMessage(error)}`);
  }
}

// ============================================
// Handlers
// ============================================

export interface ReceiptToolHandlers {
  storeReceipt(sessionId: string | undefined, input: unknown): Promise<ReceiptOutput>;
  searchByRange(input: unknown): Promise<ReceiptListOutput>;
  searchByText(input: unknown): Promise<SimilarReceiptListOutput>;
  getReceipt(input: unknown): Promise<ReceiptOutput>;
}

export function createReceiptToolHandlers(deps: ReceiptToolDeps): ReceiptToolHandlers {
  return {
    async storeReceipt(sessionId, input) {
      const args = parseArgs(StoreReceiptArgsSchema, input);
      if (!args.ok) return receiptFailure(args.error);
      if (!sessionId) {
        return receiptFailure(failure('InvalidArgument', 'No chat session in request context'));
      }

      const command = args.value;
      console.log(`[Tool] 🧾 store-receipt ${command.reference.substring(0, 12)} (${sessionId})`);

      const image = await resolveImage(deps.sessions.get(sessionId), command.reference, deps);
      if (!image.ok) return receiptFailure(image.error);

      // Images resolved from the store already have a URI (and a record)
      let imageUri = image.value.imageUri;
      if (imageUri === null) {
        const uploaded = await uploadImage(deps, image.value.bytes, image.value.mimeType);
        if (!uploaded.ok) return receiptFailure(uploaded.error);
        imageUri = uploaded.value;
      }

      const stored = await deps.store.store({
        receiptId: command.reference,
        storeName: command.storeName,
        transactionTime: command.transactionTime,
        totalAmount: command.totalAmount,
        currency: command.currency,
        purchasedItems: command.purchasedItems,
        imageUri,
      });
      if (!stored.ok) return receiptFailure(stored.error);

      return {
        success: true,
        message: receiptStoredMessage(stored.value),
        receipt: toReceiptView(stored.value),
        error: null,
      };
    },

    async searchByRange(input) {
      const args = parseArgs(RangeSearchArgsSchema, input);
      if (!args.ok) return listFailure(args.error);

      const found = await deps.store.searchByMetadata(args.value);
      if (!found.ok) return listFailure(found.error);

      return {
        success: true,
        message: receiptListMessage(found.value),
        receipts: found.value.map(toReceiptView),
        error: null,
      };
    },

    async searchByText(input) {
      const args = parseArgs(TextSearchArgsSchema, input);
      if (!args.ok) return similarFailure(args.error);

      const found = await deps.store.searchBySimilarity(args.value.queryText, args.value.limit);
      if (!found.ok) return similarFailure(found.error);

      return {
        success: true,
        message: receiptListMessage(found.value.map((match) => match.record)),
        receipts: found.value.map(toSimilarReceiptView),
        error: null,
      };
    },

    async getReceipt(input) {
      const args = parseArgs(GetReceiptArgsSchema, input);
      if (!args.ok) return receiptFailure(args.error);

      const found = await deps.store.getById(args.value.reference);
      if (!found.ok) {
        return {
          success: false,
          message: found.error.code === 'NotFound' ? 'No saved receipt for that image.' : failureMessage(found.error),
          receipt: null,
          error: toToolError(found.error),
        };
      }

      return {
        success: true,
        message: receiptListMessage([found.value]),
        receipt: toReceiptView(found.value),
        error: null,
      };
    },
  };
}

// ============================================
// Mastra tools
// ============================================

/**
 * Read the chat session id the gateway put on the request context
 */
export function sessionIdFrom(requestContext?: { get: (key: string) => unknown }): string | undefined {
  const sessionId = requestContext?.get('sessionId');
  return typeof sessionId === 'string' && sessionId.length > 0 ? sessionId : undefined;
}

/**
 * Turn an unexpected exception (database down, disk full) into a typed
 * result so the agent can still tell the user what happened.
 */
async function guarded<T>(tool: string, run: () => Promise<T>, onError: (error: Failure) => T): Promise<T> {
  try {
    return await run();
  } catch (error) {
    console.error(`[Tool] ❌ ${tool} failed:`, error);
    return onError(failure('StorageUnavailable', `${tool} failed: ${errorMessage(error)}`));
  }
}

export function createReceiptTools(deps: ReceiptToolDeps) {
  const handlers = createReceiptToolHandlers(deps);

  const storeReceiptTool = createTool({
    id: 'store-receipt',
    description: `Save a receipt you have read from an image the user sent.
Pass the IMAGE-ID shown next to the image and the fields printed on the receipt.
Saving the same image twice returns DuplicateReceipt - treat that as already saved.`,
    inputSchema: StoreReceiptInputSchema,
    outputSchema: ReceiptOutputSchema,
    execute: async (input, ctx) =>
      guarded('store-receipt', () => handlers.storeReceipt(sessionIdFrom(ctx?.requestContext), input), receiptFailure),
  });

  const searchReceiptsByRangeTool = createTool({
    id: 'search-receipts-by-range',
    description: `Find saved receipts by purchase date range and, optionally, total amount range.
Use for "receipts from March", "anything over 50000 last year".
Use -1 (or omit) an amount bound for no limit on that side.`,
    inputSchema: RangeSearchInputSchema,
    outputSchema: ReceiptListOutputSchema,
    execute: async (input) => guarded('search-receipts-by-range', () => handlers.searchByRange(input), listFailure),
  });

  const searchReceiptsByTextTool = createTool({
    id: 'search-receipts-by-text',
    description: `Find saved receipts whose store and items are closest in meaning to a description.
Use for "where did I buy coffee beans", "that hardware store receipt". Nearest first.`,
    inputSchema: TextSearchInputSchema,
    outputSchema: SimilarReceiptListOutputSchema,
    execute: async (input) => guarded('search-receipts-by-text', () => handlers.searchByText(input), similarFailure),
  });

  const getReceiptTool = createTool({
    id: 'get-receipt',
    description: `Look up the saved receipt for an image by its IMAGE-ID.
Use when the user points at an earlier image ("what was the total on that one?").`,
    inputSchema: GetReceiptInputSchema,
    outputSchema: ReceiptOutputSchema,
    execute: async (input) => guarded('get-receipt', () => handlers.getReceipt(input), receiptFailure),
  });

  return {
    storeReceipt: storeReceiptTool,
    searchReceiptsByRange: searchReceiptsByRangeTool,
    searchReceiptsByText: searchReceiptsByTextTool,
    getReceipt: getReceiptTool,
  };
}

export type ReceiptTools = ReturnType<typeof createReceiptTools>;
