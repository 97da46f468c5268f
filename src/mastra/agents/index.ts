export { createReceiptAgent, RECEIPT_AGENT_INSTRUCTIONS, type ReceiptAgentOptions } from './receipt.agent.js';
