import type { ToolDefinition } from '../tools/tool-system.js';

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: 'tool_result';
  toolUseId: string;
  content: string;
  isError?: boolean;
}

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock;

/** Blocks a model can produce in one assistant turn */
export type ResponseBlock = TextBlock | ToolUseBlock;

/** Unified chat message across providers */
export interface Message {
  role: 'user' | 'assistant';
  content: ContentBlock[];
}

/** Unified request to a language model */
export interface ChatRequest {
  model: string;
  systemPrompt?: string;
  messages: readonly Message[];
  tools?: ToolDefinition[];
  maxTokens?: number;
  signal?: AbortSignal;
}

/** Unified response: one assistant turn */
export interface ChatResponse {
  content: ResponseBlock[];
  stopReason: 'end_turn' | 'tool_use' | 'max_tokens' | 'other';
  usage?: { inputTokens: number; outputTokens: number };
}

/** The provider interface that model backends implement */
export interface LLMProvider {
  name: string;
  chat(request: ChatRequest): Promise<ChatResponse>;
}

export type ProviderErrorCode = 'auth' | 'rate_limit' | 'network' | 'api' | 'malformed_response';

/**
 * Failure of a model call, distinguishable from tool failures
 */
export class ProviderError extends Error {
  readonly code: ProviderErrorCode;
  readonly status?: number;

  constructor(code: ProviderErrorCode, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ProviderError';
    this.code = code;
    this.status = options.status;
  }
}

export function isToolUse(block: ContentBlock): block is ToolUseBlock {
  return block.type === 'tool_use';
}
