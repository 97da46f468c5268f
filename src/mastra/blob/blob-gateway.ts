/**
 * Blob Gateway
 *
 * Receipt images live in a local uploads directory and are served by the
 * HTTP server under /uploads/*. File names are the content hash, so putting
 * the same bytes twice yields the same URI and a single file.
 */

import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';

export interface BlobObject {
  bytes: Uint8Array;
  mimeType: string;
}

export interface BlobGateway {
  put(bytes: Uint8Array, mimeType: string, signal?: AbortSignal): Promise<string>;
  get(uri: string, signal?: AbortSignal): Promise<BlobObject>;
}

export class BlobNotFoundError extends Error {
  constructor(readonly uri: string) {
    super(`Blob not found: ${uri}`);
    this.name = 'BlobNotFoundError';
  }
}

const MIME_TO_EXT: Record<string, string> = {
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/webp': '.webp',
  'image/heic': '.heic',
};

const EXT_TO_MIME: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.webp': 'image/webp',
  '.heic': 'image/heic',
  '.gif': 'image/gif',
  '.pdf': 'application/pdf',
};

const BLOB_NAME_PATTERN = /^[0-9a-f]{64}\.[a-z0-9]+$/;

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export function mimeTypeForFile(filename: string): string {
  return EXT_TO_MIME[path.extname(filename).toLowerCase()] || 'application/octet-stream';
}

export interface LocalBlobGatewayOptions {
  uploadsDir: string;
  /** Public origin the server is reachable at, e.g. http://localhost:3000 */
  baseUrl: string;
}

export class LocalBlobGateway implements BlobGateway {
  private readonly uploadsDir: string;
  private readonly uriPrefix: string;

  constructor(options: LocalBlobGatewayOptions) {
    this.uploadsDir = options.uploadsDir;
    this.uriPrefix = `${options.baseUrl.replace(/\/+$/, '')}/uploads/`;
  }

  async initialize(): Promise<void> {
    await fs.mkdir(this.uploadsDir, { recursive: true });
  }

  async put(bytes: Uint8Array, mimeType: string, signal?: AbortSignal): Promise<string> {
    const hash = crypto.createHash('sha256').update(bytes).digest('hex');
    const filename = `${hash}${MIME_TO_EXT[mimeType] || '.bin'}`;
    const filepath = path.join(this.uploadsDir, filename);

    await fs.mkdir(this.uploadsDir, { recursive: true });
    try {
      await fs.writeFile(filepath, bytes, { flag: 'wx', signal });
      console.log(`[Blob] Saved ${filename} (${bytes.byteLength} bytes)`);
    } catch (error) {
      // Same hash, same bytes: the existing file is already the blob
      if (!hasErrorCode(error, 'EEXIST')) {
        throw error;
      }
    }

    return `${this.uriPrefix}${filename}`;
  }

  async get(uri: string, signal?: AbortSignal): Promise<BlobObject> {
    if (!uri.startsWith(this.uriPrefix)) {
      throw new BlobNotFoundError(uri);
    }
    const blob = await this.read(uri.slice(this.uriPrefix.length), signal);
    if (!blob) {
      throw new BlobNotFoundError(uri);
    }
    return blob;
  }

  /**
   * Read a blob by file name. Null for unknown or malformed names.
   */
  async read(filename: string, signal?: AbortSignal): Promise<BlobObject | null> {
    if (!BLOB_NAME_PATTERN.test(filename)) {
      return null;
    }
    try {
      const data = await fs.readFile(path.join(this.uploadsDir, filename), { signal });
      return { bytes: new Uint8Array(data), mimeType: mimeTypeForFile(filename) };
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }
  }
}
