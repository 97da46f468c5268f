/**
 * HTTP Server for the Receipt Keeper
 *
 * Routes:
 * - POST /chat/:sessionId  one chat turn (text + base64 images)
 * - GET  /uploads/*        receipt images saved by the Blob Gateway
 * - GET  /health           liveness
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import type { LocalBlobGateway } from './mastra/blob/index.js';
import type { SessionRegistry } from './mastra/context/index.js';
import { failure } from './mastra/errors.js';
import { errorReply, type ChatGateway, type ChatReply } from './mastra/gateway/index.js';

export interface ServerDeps {
  gateway: Pick<ChatGateway, 'handleTurn'>;
  blobs: Pick<LocalBlobGateway, 'read'>;
  sessions: Pick<SessionRegistry, 'size'>;
  /** Runs before the first chat turn is handled */
  ensureInitialized?: () => Promise<void>;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

const ChatBodySchema = z.object({
  text: z.string().max(10_000).optional(),
  images: z
    .array(
      z.object({
        data: z
          .string()
          .min(1, 'must not be empty')
          .regex(BASE64_PATTERN, 'must be base64'),
        mimeType: z.string().min(1),
      })
    )
    .max(10)
    .optional(),
});

// Non-OK replies that are the caller's fault
function statusFor(reply: ChatReply): 200 | 400 | 502 {
  if (!reply.error) return 200;
  return reply.error.code === 'InvalidArgument' ? 400 : 502;
}

export function createServerApp(deps: ServerDeps) {
  const app = new Hono();

  // ===========================================
  // Chat Endpoint
  // POST /chat/:sessionId
  // ===========================================

  app.post('/chat/:sessionId', async (c: Context) => {
    const sessionId = c.req.param('sessionId') ?? '';

    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch {
      return c.json(errorReply(failure('InvalidArgument', 'Body must be JSON')), 400);
    }

    const parsed = ChatBodySchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      return c.json(errorReply(failure('InvalidArgument', issues)), 400);
    }

    try {
      await deps.ensureInitialized?.();
      const reply = await deps.gateway.handleTurn(sessionId, {
        text: parsed.data.text,
        images: (parsed.data.images ?? []).map((image) => ({
          bytes: new Uint8Array(Buffer.from(image.data, 'base64')),
          mimeType: image.mimeType,
        })),
      });
      return c.json(reply, statusFor(reply));
    } catch (error) {
      console.error(`[Server] ❌ Chat turn failed for ${sessionId}:`, error);
      return c.json(errorReply(failure('StorageUnavailable', 'The chat turn could not be processed')), 502);
    }
  });

  // ===========================================
  // Static File Serving for Uploads
  // GET /uploads/*
  // ===========================================

  app.get('/uploads/*', async (c: Context) => {
    const filename = c.req.path.replace('/uploads/', '');

    if (!filename || filename.includes('..') || filename.includes('/')) {
      return c.json({ error: 'Invalid path' }, 400);
    }

    const blob = await deps.blobs.read(filename);
    if (!blob) {
      return c.json({ error: 'File not found' }, 404);
    }

    return new Response(blob.bytes, {
      headers: {
        'Content-Type': blob.mimeType,
        // Content-addressed: a name never changes meaning
        'Cache-Control': 'public, max-age=31536000, immutable',
      },
    });
  });

  // ===========================================
  // Health Check Endpoint
  // GET /health
  // ===========================================

  app.get('/health', (c: Context) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      sessions: deps.sessions.size,
    });
  });

  return app;
}
