/**
 * Receipt Agent Tools
 * Export all tools and their building blocks
 */

// Receipt tools (store / range search / text search / lookup)
export {
  createReceiptTools,
  createReceiptToolHandlers,
  sessionIdFrom,
  type ReceiptToolDeps,
  type ReceiptToolHandlers,
  type ReceiptTools,
} from './receipt.tool.js';

// Argument normalization
export {
  parseArgs,
  parseTimestamp,
  StoreReceiptArgsSchema,
  RangeSearchArgsSchema,
  TextSearchArgsSchema,
  GetReceiptArgsSchema,
  UNBOUNDED,
  DEFAULT_SIMILARITY_LIMIT,
  type StoreReceiptCommand,
  type RangeSearchCommand,
  type TextSearchCommand,
  type GetReceiptCommand,
} from './arguments.js';

// Schemas
export * from './schemas.js';

// Re-export response builder
export { TEMPLATES, formatAmount, receiptListMessage, receiptStoredMessage } from './responses.js';
