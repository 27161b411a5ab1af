import { isToolUse, type ContentBlock, type Message, type ResponseBlock, type ToolResultBlock, type ToolUseBlock } from '../providers/types.js';

/**
 * Transcript - Append-only conversation history for one session
 *
 * Every tool_result must answer a tool_use from the assistant message
 * immediately before it, and a result message must answer all of them.
 */
export class Transcript {
  private messages: Message[] = [];

  get length(): number {
    return this.messages.length;
  }

  /**
   * Read-only view passed to the model on every call
   */
  get entries(): readonly Message[] {
    return this.messages;
  }

  last(): Message | undefined {
    return this.messages[this.messages.length - 1];
  }

  appendUserText(text: string): void {
    this.messages.push({ role: 'user', content: [{ type: 'text', text }] });
  }

  appendAssistant(content: ResponseBlock[]): void {
    this.messages.push({ role: 'assistant', content: [...content] });
  }

  /**
   * Appends tool results as a single user message
   * @throws Error if the results do not pair with the preceding assistant tool uses
   */
  appendToolResults(results: ToolResultBlock[]): void {
    const previous = this.last();
    if (previous?.role !== 'assistant') {
      throw new Error('Tool results must follow an assistant message');
    }

    const pending = new Set(pendingToolUses(previous).map(block => block.id));
    if (pending.size === 0) {
      throw new Error('Tool results must follow an assistant message with tool uses');
    }

    for (const result of results) {
      if (!pending.delete(result.toolUseId)) {
        throw new Error(`Tool result references unknown or already answered tool use: ${result.toolUseId}`);
      }
    }
    if (pending.size > 0) {
      throw new Error(`Missing tool results for: ${Array.from(pending).join(', ')}`);
    }

    const content: ContentBlock[] = results.map(result => ({ ...result }));
    this.messages.push({ role: 'user', content });
  }

  clear(): void {
    this.messages = [];
  }
}

export function pendingToolUses(message: Message): ToolUseBlock[] {
  return message.content.filter(isToolUse);
}
