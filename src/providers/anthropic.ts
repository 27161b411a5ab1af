import Anthropic from '@anthropic-ai/sdk';
import type { ToolDefinition } from '../tools/tool-system.js';
import {
  ProviderError,
  type ChatRequest,
  type ChatResponse,
  type LLMProvider,
  type Message,
  type ResponseBlock,
} from './types.js';

export const DEFAULT_MAX_TOKENS = 4096;

/**
 * Request body sent to the Messages API
 */
export interface MessagesCreateBody {
  model: string;
  max_tokens: number;
  system?: string;
  messages: Anthropic.MessageParam[];
  tools?: Anthropic.Tool[];
}

/**
 * The subset of a Messages API response read by the provider
 */
export interface RawMessage {
  content: ReadonlyArray<{ type: string; text?: string; id?: string; name?: string; input?: unknown }>;
  stop_reason: string | null;
  usage: { input_tokens: number; output_tokens: number };
}

/**
 * The part of the SDK client the provider calls; tests substitute it
 */
export interface MessagesApi {
  create(body: MessagesCreateBody, options?: { signal?: AbortSignal }): Promise<RawMessage>;
}

export interface AnthropicProviderOptions {
  apiKey?: string;
  messages?: MessagesApi;
}

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  private messages: MessagesApi;

  constructor(private model: string, options: AnthropicProviderOptions = {}) {
    this.messages = options.messages ?? new Anthropic({ apiKey: options.apiKey }).messages;
  }

  async chat(params: ChatRequest): Promise<ChatResponse> {
    const { systemPrompt, messages, tools, maxTokens = DEFAULT_MAX_TOKENS, signal } = params;

    let response: RawMessage;
    try {
      response = await this.messages.create(
        {
          model: params.model || this.model,
          max_tokens: maxTokens,
          system: systemPrompt,
          messages: messages.map(convertMessage),
          tools: tools ? tools.map(convertTool) : undefined,
        },
        { signal }
      );
    } catch (error) {
      throw toProviderError(error);
    }

    return toChatResponse(response);
  }
}

export function toChatResponse(response: RawMessage): ChatResponse {
  if (!Array.isArray(response.content)) {
    throw new ProviderError('malformed_response', 'Model response has no content');
  }

  const content: ResponseBlock[] = [];
  for (const block of response.content) {
    if (block.type === 'text') {
      content.push({ type: 'text', text: block.text ?? '' });
    } else if (block.type === 'tool_use') {
      const { id, name, input } = block;
      if (typeof id !== 'string' || typeof name !== 'string' || !isRecord(input)) {
        throw new ProviderError('malformed_response', `Malformed tool_use block in model response: ${JSON.stringify(block)}`);
      }
      content.push({ type: 'tool_use', id, name, input });
    }
  }

  let stopReason: ChatResponse['stopReason'] = 'other';
  if (response.stop_reason === 'end_turn') stopReason = 'end_turn';
  else if (response.stop_reason === 'tool_use') stopReason = 'tool_use';
  else if (response.stop_reason === 'max_tokens') stopReason = 'max_tokens';

  return {
    content,
    stopReason,
    usage: {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    },
  };
}

export function toProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  if (error instanceof Anthropic.AuthenticationError) {
    return new ProviderError('auth', error.message, { status: error.status, cause: error });
  }
  if (error instanceof Anthropic.RateLimitError) {
    return new ProviderError('rate_limit', error.message, { status: error.status, cause: error });
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return new ProviderError('network', error.message, { cause: error });
  }
  if (error instanceof Anthropic.APIError) {
    return new ProviderError('api', error.message, { status: error.status, cause: error });
  }
  return new ProviderError('api', error instanceof Error ? error.message : String(error), { cause: error });
}

function convertMessage(msg: Message): Anthropic.MessageParam {
  const content: Anthropic.ContentBlockParam[] = msg.content.map((block): Anthropic.ContentBlockParam => {
    switch (block.type) {
      case 'text':
        return { type: 'text', text: block.text };
      case 'tool_use':
        return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
      case 'tool_result':
        return {
          type: 'tool_result',
          tool_use_id: block.toolUseId,
          content: block.content,
          is_error: block.isError,
        };
    }
  });

  return { role: msg.role, content };
}

function convertTool(tool: ToolDefinition): Anthropic.Tool {
  return {
    name: tool.name,
    description: tool.description,
    input_schema: {
      type: 'object',
      properties: tool.parameters.properties ?? {},
      required: tool.parameters.required ?? [],
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
