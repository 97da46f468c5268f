/**
 * Image Reference Resolution
 *
 * A reference resolves from live history first. Once pruned, it resolves
 * only if the image was stored as a receipt: the record's imageUri is read
 * back through the Blob Gateway. Anything else is ImageUnavailable.
 */

import type { BlobGateway } from '../blob/blob-gateway.js';
import { withDeadline } from '../deadline.js';
import { errorMessage, fail, GatewayTimeoutError, ok, type Result } from '../errors.js';
import type { ReceiptStore } from '../store/receipt-store.js';
import { normalizeReference } from './reference.js';
import type { ConversationSession } from './session.js';

export interface ResolvedImage {
  reference: string;
  bytes: Uint8Array;
  mimeType: string;
  source: 'history' | 'store';
  /** Blob URI when resolved from the store */
  imageUri: string | null;
}

export interface ImageResolverDeps {
  store: Pick<ReceiptStore, 'getById'>;
  blobs: Pick<BlobGateway, 'get'>;
  /** Deadline for the Blob Gateway read */
  timeoutMs: number;
}

function unavailable(
  reference: string,
  session: ConversationSession | undefined,
  reason: string
): Result<never> {
  const originTurn = session?.originOf(reference);
  // Data-loss signal: the agent holds a reference nothing can serve
  console.error(`[Context] 🚨 Image ${reference.substring(0, 12)} unavailable: ${reason}`, {
    sessionId: session?.id,
    originTurn,
  });
  return fail('ImageUnavailable', `Image ${reference} is no longer available: ${reason}`, {
    reference,
    ...(originTurn !== undefined && { originTurn }),
  });
}

export async function resolveImage(
  session: ConversationSession | undefined,
  rawReference: string,
  deps: ImageResolverDeps
): Promise<Result<ResolvedImage>> {
  const reference = normalizeReference(rawReference);
  if (!reference) {
    return fail('InvalidArgument', `Not an image reference: ${rawReference}`);
  }

  const live = session?.liveImage(reference);
  if (live) {
    return ok({ reference, bytes: live.bytes, mimeType: live.mimeType, source: 'history', imageUri: null });
  }

  const stored = await deps.store.getById(reference);
  if (!stored.ok) {
    if (stored.error.code !== 'NotFound') {
      return stored;
    }
    return unavailable(reference, session, 'pruned from history and never stored as a receipt');
  }

  const { imageUri } = stored.value;
  try {
    const blob = await withDeadline('blob gateway', deps.timeoutMs, (signal) => deps.blobs.get(imageUri, signal));
    return ok({ reference, bytes: blob.bytes, mimeType: blob.mimeType, source: 'store', imageUri });
  } catch (error) {
    if (error instanceof GatewayTimeoutError) {
      return fail('GatewayTimeout', error.message, { gateway: error.gateway, timeoutMs: error.timeoutMs });
    }
    return unavailable(reference, session, `stored image unreadable (${errorMessage(error)})`);
  }
}
