/**
 * Chat Gateway
 */

export { ChatGateway } from './router.js';
export {
  createAgentReply,
  MAX_AGENT_STEPS,
  type ReceiptRequestContext,
  type ReplyAgent,
  type ReplyOptions,
} from './agent-reply.js';
export {
  errorReply,
  isValidSessionId,
  type ChatGatewayOptions,
  type ChatReply,
  type GenerateReply,
  type InboundTurn,
  type InboundTurnImage,
} from './types.js';
