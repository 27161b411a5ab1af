/**
 * Model providers
 */

export {
  ProviderError,
  isToolUse,
  type ProviderErrorCode,
  type TextBlock,
  type ToolUseBlock,
  type ToolResultBlock,
  type ContentBlock,
  type ResponseBlock,
  type Message,
  type ChatRequest,
  type ChatResponse,
  type LLMProvider,
} from './types.js';

export {
  AnthropicProvider,
  DEFAULT_MAX_TOKENS,
  toChatResponse,
  toProviderError,
  type AnthropicProviderOptions,
  type MessagesApi,
  type MessagesCreateBody,
  type RawMessage,
} from './anthropic.js';
