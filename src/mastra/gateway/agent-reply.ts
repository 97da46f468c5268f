/**
 * Agent Reply
 *
 * Bridges the Chat Gateway to a Mastra agent: the session id rides on the
 * RequestContext so tools can find the conversation, and an empty answer
 * becomes "no reply".
 */

import { RequestContext } from '@mastra/core/request-context';
import type { AgentMessage } from '../context/types.js';
import type { GenerateReply } from './types.js';

/**
 * Values the gateway puts on the RequestContext for tools
 */
export type ReceiptRequestContext = {
  sessionId: string;
};

export interface ReplyOptions {
  requestContext: RequestContext<ReceiptRequestContext>;
  toolChoice: 'auto';
  maxSteps: number;
}

/**
 * The slice of a Mastra Agent the gateway calls
 */
export interface ReplyAgent {
  generate(messages: AgentMessage[], options: ReplyOptions): Promise<{ text: string }>;
}

// Tool loops end long before this; it only stops a runaway agent
export const MAX_AGENT_STEPS = 5;

export function createAgentReply(agent: ReplyAgent): GenerateReply {
  return async (messages, { sessionId }) => {
    const requestContext = new RequestContext<ReceiptRequestContext>();
    requestContext.set('sessionId', sessionId);

    const result = await agent.generate(messages, {
      requestContext,
      toolChoice: 'auto',
      maxSteps: MAX_AGENT_STEPS,
    });

    return result.text || null;
  };
}
