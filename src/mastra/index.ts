import { Mastra } from '@mastra/core';
import { LibSQLStore } from '@mastra/libsql';
import { createClient } from '@libsql/client';
import { createReceiptAgent } from './agents/index.js';
import { LocalBlobGateway } from './blob/index.js';
import type { ReceiptKeeperConfig } from './config.js';
import { SessionRegistry } from './context/index.js';
import { ChatGateway, createAgentReply, type ReplyAgent } from './gateway/index.js';
import { ReceiptStore, type EmbeddingGateway } from './store/index.js';
import { createReceiptTools } from './tools/index.js';
import { createReceiptVectorIndex, GoogleEmbeddingGateway } from './vector/index.js';

/**
 * Stand-ins for the parts that call Google, used by tests
 */
export interface ReceiptKeeperOverrides {
  embeddings?: EmbeddingGateway;
  replyAgent?: ReplyAgent;
}

/**
 * Wire every component from one config. Nothing touches the database
 * or the disk until `ensureInitialized` runs.
 */
export function createReceiptKeeper(config: ReceiptKeeperConfig, overrides: ReceiptKeeperOverrides = {}) {
  // ===========================================
  // Storage
  // ===========================================

  console.log(`[Store] Database URL: ${config.databaseUrl}`);
  const client = createClient({ url: config.databaseUrl });

  const embeddings =
    overrides.embeddings ??
    new GoogleEmbeddingGateway({
      apiKey: config.googleApiKey,
      model: config.embedding.model,
    });

  console.log(`[Store] Vector index URL: ${config.vectorDatabaseUrl}`);
  const vectors = createReceiptVectorIndex(config.vectorDatabaseUrl);

  const store = new ReceiptStore(client, embeddings, vectors, {
    dimension: config.embedding.dimension,
    timeoutMs: config.gatewayTimeoutMs,
  });

  const blobs = new LocalBlobGateway({
    uploadsDir: config.uploadsDir,
    baseUrl: config.baseUrl,
  });

  // ===========================================
  // Conversation + Tools + Agent
  // ===========================================

  const sessions = new SessionRegistry({ retentionTurns: config.retentionTurns });

  const tools = createReceiptTools({
    store,
    sessions,
    blobs,
    timeoutMs: config.gatewayTimeoutMs,
  });

  const receiptAgent = createReceiptAgent({
    tools,
    model: config.agentModel,
    apiKey: config.googleApiKey,
  });

  /**
   * Storage for Mastra core domains (workflows, traces).
   * Conversation history lives in SessionRegistry, not in Mastra memory.
   */
  console.log(`[Mastra] Database URL: ${config.mastraDatabaseUrl}`);
  const mastra = new Mastra({
    agents: {
      receipts: receiptAgent,
    },
    storage: new LibSQLStore({
      id: 'receipt-keeper-mastra',
      url: config.mastraDatabaseUrl,
    }),
  });

  // ===========================================
  // Gateway
  // ===========================================

  const replyAgent: ReplyAgent = overrides.replyAgent ?? mastra.getAgent('receipts');

  const gateway = new ChatGateway(sessions, createAgentReply(replyAgent), {
    maxImageBytes: config.upload.maxImageBytes,
    allowedMimeTypes: config.upload.allowedMimeTypes,
  });

  let initialized: Promise<void> | null = null;

  /**
   * Create tables and the uploads directory once
   */
  function ensureInitialized(): Promise<void> {
    if (!initialized) {
      initialized = Promise.all([store.initialize(), blobs.initialize()]).then(
        () => undefined,
        (error: unknown) => {
          // Let a later call try again after a failed start
          initialized = null;
          throw error;
        }
      );
    }
    return initialized;
  }

  return {
    config,
    client,
    vectors,
    store,
    blobs,
    sessions,
    tools,
    receiptAgent,
    mastra,
    gateway,
    ensureInitialized,
  };
}

export type ReceiptKeeper = ReturnType<typeof createReceiptKeeper>;

// ===========================================
// Exports
// ===========================================

export { loadConfig, type ReceiptKeeperConfig } from './config.js';
export * from './tools/index.js';
export { ChatGateway } from './gateway/index.js';
export type {
  ChatReply,
  InboundTurn,
  GenerateReply,
  ReceiptRequestContext,
  ReplyAgent,
} from './gateway/index.js';
export { ReceiptStore } from './store/index.js';
export { SessionRegistry } from './context/index.js';
