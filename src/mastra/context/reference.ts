/**
 * Content references
 *
 * A reference is the SHA-256 of an image's raw bytes, lower-case hex. The same
 * value marks the image in conversation history and keys the stored receipt,
 * so an image can be looked up in the store by the marker the agent sees.
 */

import crypto from 'crypto';

export const REFERENCE_PATTERN = /^[0-9a-f]{64}$/;

const MARKER_PATTERN = /^\[?\s*IMAGE-ID\s+([^\]\s]+)\s*\]?$/i;

export function contentReference(bytes: Uint8Array): string {
  return crypto.createHash('sha256').update(bytes).digest('hex');
}

export function imageMarker(reference: string): string {
  return `[IMAGE-ID ${reference}]`;
}

/**
 * Accept a bare reference or one still wrapped in its marker,
 * e.g. `[IMAGE-ID 3f2a...]`. Returns null when it is not a reference.
 */
export function normalizeReference(raw: string): string | null {
  const trimmed = raw.trim();
  const marker = MARKER_PATTERN.exec(trimmed);
  const candidate = (marker?.[1] ?? trimmed).toLowerCase();
  return REFERENCE_PATTERN.test(candidate) ? candidate : null;
}
