export { NullLLMClient, AnthropicLLMClient } from './client.js';
export type { LLMClient, LLMRequest, LLMResponse } from './client.js';
export { RunAccounting } from './accounting.js';
export type { TokenRates } from './accounting.js';
export { LLMCorrectionAdapter } from './adapter.js';
export type { EscalationResult } from './adapter.js';
export { buildCorrectionInstruction, parseReply } from './instruction.js';
