/**
 * Conversation Context Module
 *
 * Session history, image-payload compaction and reference resolution.
 */

export {
  appendMarkers,
  compactTurns,
  DEFAULT_RETENTION_TURNS,
  hasLivePayload,
  liveReferences,
  renderTurns,
} from './compactor.js';
export { contentReference, imageMarker, normalizeReference, REFERENCE_PATTERN } from './reference.js';
export { ConversationSession, type LiveImage } from './session.js';
export { SessionRegistry, type SessionRegistryOptions } from './registry.js';
export { resolveImage, type ImageResolverDeps, type ResolvedImage } from './resolver.js';
export type {
  AgentMessage,
  AgentMessagePart,
  AppendedTurn,
  ConversationTurn,
  InboundImage,
  TurnImage,
  TurnRole,
} from './types.js';
