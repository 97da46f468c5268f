/**
 * Runtime configuration
 *
 * Everything comes from environment variables. Values are parsed once at
 * startup; a bad value fails fast with the variable name in the message.
 */

import path from 'path';
import { z } from 'zod';

export const ALLOWED_IMAGE_TYPES = ['image/jpeg', 'image/png', 'image/webp', 'image/heic'] as const;

export type ImageMimeType = (typeof ALLOWED_IMAGE_TYPES)[number];

const EnvSchema = z.object({
  RECEIPT_DATABASE_URL: z.string().min(1).optional(),
  VECTOR_DATABASE_URL: z.string().min(1).optional(),
  MASTRA_DATABASE_URL: z.string().min(1).optional(),
  NODE_ENV: z.string().optional(),
  UPLOADS_DIR: z.string().min(1).default('./uploads'),
  BASE_URL: z.string().url().default('http://localhost:3000'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  GOOGLE_API_KEY: z.string().optional(),
  RECEIPT_AGENT_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-004'),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(768),
  GATEWAY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  IMAGE_RETENTION_TURNS: z.coerce.number().int().positive().default(3),
  MAX_IMAGE_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024), // 10MB
});

export interface ReceiptKeeperConfig {
  databaseUrl: string;
  vectorDatabaseUrl: string;
  mastraDatabaseUrl: string;
  uploadsDir: string;
  baseUrl: string;
  port: number;
  googleApiKey?: string;
  agentModel: string;
  embedding: {
    model: string;
    dimension: number;
  };
  gatewayTimeoutMs: number;
  retentionTurns: number;
  upload: {
    maxImageBytes: number;
    allowedMimeTypes: readonly ImageMimeType[];
  };
}

// Same layout the deployment image mounts: /app/data in production, ./data locally
function defaultDbUrl(file: string, nodeEnv: string | undefined): string {
  if (nodeEnv === 'production') {
    return `file:/app/data/${file}`;
  }
  return `file:${path.join(process.cwd(), 'data', file)}`;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ReceiptKeeperConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    databaseUrl: vars.RECEIPT_DATABASE_URL ?? defaultDbUrl('receipts.db', vars.NODE_ENV),
    vectorDatabaseUrl: vars.VECTOR_DATABASE_URL ?? defaultDbUrl('receipt-vectors.db', vars.NODE_ENV),
    mastraDatabaseUrl: vars.MASTRA_DATABASE_URL ?? defaultDbUrl('mastra.db', vars.NODE_ENV),
    uploadsDir: vars.UPLOADS_DIR,
    baseUrl: vars.BASE_URL.replace(/\/+$/, ''),
    port: vars.PORT,
    googleApiKey: vars.GOOGLE_API_KEY || undefined,
    agentModel: vars.RECEIPT_AGENT_MODEL,
    embedding: {
      model: vars.EMBEDDING_MODEL,
      dimension: vars.EMBEDDING_DIMENSION,
    },
    gatewayTimeoutMs: vars.GATEWAY_TIMEOUT_MS,
    retentionTurns: vars.IMAGE_RETENTION_TURNS,
    upload: {
      maxImageBytes: vars.MAX_IMAGE_BYTES,
      allowedMimeTypes: ALLOWED_IMAGE_TYPES,
    },
  };
}
