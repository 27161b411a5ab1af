import { randomUUID } from 'node:crypto';
import { Logger } from '../logging/logger.js';
import { ToolSystem, formatToolOutcome, type ToolCall, type ToolResult } from '../tools/tool-system.js';
import { Transcript } from '../session/transcript.js';
import {
  isToolUse,
  type ChatResponse,
  type LLMProvider,
  type Message,
  type ResponseBlock,
  type ToolResultBlock,
  type ToolUseBlock,
} from '../providers/types.js';

export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful coding assistant running in a terminal. ' +
  'Output plain text only and do not use markdown formatting, because your replies are shown directly in the terminal. ' +
  'Be concise but thorough, and give clear, practical advice in a friendly tone. ' +
  'Do not use any asterisk characters in your replies.';

/** Characters of each tool result written to the log */
export const TOOL_RESULT_PREVIEW_LENGTH = 500;

/**
 * Agent runtime configuration
 */
export interface AgentConfig {
  model: string;
  maxTokens: number;
  /** Tool round trips allowed per user turn */
  maxToolRounds: number;
  systemPrompt: string;
}

export const DEFAULT_AGENT_CONFIG: AgentConfig = {
  model: 'claude-sonnet-4-5-20250929',
  maxTokens: 4096,
  maxToolRounds: 25,
  systemPrompt: DEFAULT_SYSTEM_PROMPT,
};

export interface AgentModelResponseEvent {
  type: 'model_response';
  response: ChatResponse;
}

export interface AgentToolCallEvent {
  type: 'tool_call';
  toolCall: ToolCall;
}

export interface AgentToolResultEvent {
  type: 'tool_result';
  toolResult: ToolResult;
}

export interface AgentDoneEvent {
  type: 'done';
  text: string;
}

export interface AgentErrorEvent {
  type: 'error';
  error: AgentError;
}

export type AgentEvent =
  | AgentModelResponseEvent
  | AgentToolCallEvent
  | AgentToolResultEvent
  | AgentDoneEvent
  | AgentErrorEvent;

/**
 * Structured turn failure; `message` is what the user sees
 */
export interface AgentError {
  code: 'model_error' | 'turn_limit';
  message: string;
  sessionId: string;
  details?: unknown;
}

function firstText(content: ResponseBlock[]): string {
  for (const block of content) {
    if (block.type === 'text') return block.text;
  }
  return '';
}

function preview(text: string): string {
  return text.length > TOOL_RESULT_PREVIEW_LENGTH ? `${text.slice(0, TOOL_RESULT_PREVIEW_LENGTH)}...` : text;
}

/**
 * AgentRuntime - Owns the conversation transcript and drives the
 * model → tools → model cycle until a response has no tool uses.
 *
 * Tool uses within one response run sequentially in the order returned;
 * a later call sees the filesystem effects of an earlier one.
 */
export class AgentRuntime {
  readonly sessionId: string;
  private config: AgentConfig;
  private provider: LLMProvider;
  private toolSystem: ToolSystem;
  private logger: Logger;
  private transcript = new Transcript();

  constructor(
    provider: LLMProvider,
    toolSystem: ToolSystem,
    logger: Logger,
    config: Partial<AgentConfig> = {}
  ) {
    this.sessionId = randomUUID();
    this.config = { ...DEFAULT_AGENT_CONFIG, ...config };
    this.provider = provider;
    this.toolSystem = toolSystem;
    this.logger = logger.child({ sessionId: this.sessionId });
  }

  getConfig(): AgentConfig {
    return { ...this.config };
  }

  getTranscript(): readonly Message[] {
    return this.transcript.entries;
  }

  /**
   * Discards the conversation so far
   */
  reset(): void {
    this.transcript.clear();
  }

  /**
   * Runs one user turn, yielding progress events and ending with
   * exactly one `done` or `error` event
   */
  async *run(userInput: string): AsyncGenerator<AgentEvent> {
    await this.logger.info('User input', { input: userInput });
    this.transcript.appendUserText(userInput);

    const tools = this.toolSystem.list();

    for (let round = 0; ; round++) {
      let response: ChatResponse;
      try {
        response = await this.provider.chat({
          model: this.config.model,
          systemPrompt: this.config.systemPrompt,
          messages: [...this.transcript.entries],
          tools,
          maxTokens: this.config.maxTokens,
        });
      } catch (error) {
        await this.logger.error('Model call failed', error, { round });
        yield {
          type: 'error',
          error: {
            code: 'model_error',
            message: `Error: ${error instanceof Error ? error.message : String(error)}`,
            sessionId: this.sessionId,
            details: error,
          },
        };
        return;
      }

      this.transcript.appendAssistant(response.content);
      yield { type: 'model_response', response };

      const toolUses = response.content.filter(isToolUse);
      if (toolUses.length === 0) {
        const text = firstText(response.content);
        await this.logger.info('Turn completed', { toolRounds: round, responseLength: text.length });
        yield { type: 'done', text };
        return;
      }

      if (round >= this.config.maxToolRounds) {
        const limitEvent = this.stopAtTurnLimit(toolUses);
        await this.logger.warn('Turn limit exceeded', { maxToolRounds: this.config.maxToolRounds });
        yield limitEvent;
        return;
      }

      const results: ToolResultBlock[] = [];
      for (const toolUse of toolUses) {
        const toolCall: ToolCall = { id: toolUse.id, name: toolUse.name, arguments: toolUse.input };
        await this.logger.info('Executing tool', { tool: toolCall.name, input: toolCall.arguments });
        yield { type: 'tool_call', toolCall };

        const toolResult = await this.toolSystem.execute(toolCall);
        const content = formatToolOutcome(toolResult.outcome);
        await this.logger.info('Tool result', {
          tool: toolCall.name,
          ok: toolResult.outcome.ok,
          preview: preview(content),
        });
        yield { type: 'tool_result', toolResult };

        results.push({
          type: 'tool_result',
          toolUseId: toolUse.id,
          content,
          ...(toolResult.outcome.ok ? {} : { isError: true }),
        });
      }

      this.transcript.appendToolResults(results);
    }
  }

  /**
   * Runs one user turn and returns the reply text. Model failures and the
   * turn limit come back as descriptive text rather than rejections.
   */
  async chat(userInput: string): Promise<string> {
    let reply = '';
    for await (const event of this.run(userInput)) {
      if (event.type === 'done') {
        reply = event.text;
      } else if (event.type === 'error') {
        reply = event.error.message;
      }
    }
    return reply;
  }

  // Every requested tool use still gets a paired (skipped) result
  private stopAtTurnLimit(toolUses: ToolUseBlock[]): AgentErrorEvent {
    const limit = this.config.maxToolRounds;
    this.transcript.appendToolResults(
      toolUses.map((toolUse): ToolResultBlock => ({
        type: 'tool_result',
        toolUseId: toolUse.id,
        content: `Tool call skipped: turn limit of ${limit} tool round trips exceeded`,
        isError: true,
      }))
    );

    return {
      type: 'error',
      error: {
        code: 'turn_limit',
        message: `Turn limit exceeded: stopped after ${limit} tool round trips`,
        sessionId: this.sessionId,
      },
    };
  }
}
