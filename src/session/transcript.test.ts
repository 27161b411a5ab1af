import { describe, it, expect, beforeEach } from 'vitest';
import { Transcript, pendingToolUses } from './transcript.js';

describe('Transcript', () => {
  let transcript: Transcript;

  beforeEach(() => {
    transcript = new Transcript();
  });

  it('should start empty', () => {
    expect(transcript.length).toBe(0);
    expect(transcript.last()).toBeUndefined();
  });

  it('should append user text as a single text block', () => {
    transcript.appendUserText('hello');

    expect(transcript.entries).toEqual([{ role: 'user', content: [{ type: 'text', text: 'hello' }] }]);
  });

  it('should pair tool results with the preceding tool uses', () => {
    transcript.appendUserText('look around');
    transcript.appendAssistant([
      { type: 'text', text: 'Checking.' },
      { type: 'tool_use', id: 'a', name: 'list_files', input: {} },
      { type: 'tool_use', id: 'b', name: 'read_file', input: { path: 'x' } },
    ]);

    transcript.appendToolResults([
      { type: 'tool_result', toolUseId: 'a', content: 'Empty directory: .' },
      { type: 'tool_result', toolUseId: 'b', content: 'File not found: x', isError: true },
    ]);

    expect(transcript.length).toBe(3);
    expect(transcript.last()).toEqual({
      role: 'user',
      content: [
        { type: 'tool_result', toolUseId: 'a', content: 'Empty directory: .' },
        { type: 'tool_result', toolUseId: 'b', content: 'File not found: x', isError: true },
      ],
    });
  });

  it('should reject results that do not follow an assistant message', () => {
    transcript.appendUserText('hi');

    expect(() => transcript.appendToolResults([{ type: 'tool_result', toolUseId: 'a', content: '' }])).toThrow(
      'Tool results must follow an assistant message'
    );
  });

  it('should reject results after an assistant message without tool uses', () => {
    transcript.appendUserText('hi');
    transcript.appendAssistant([{ type: 'text', text: 'hello' }]);

    expect(() => transcript.appendToolResults([])).toThrow(
      'Tool results must follow an assistant message with tool uses'
    );
  });

  it('should reject results for unknown tool use ids', () => {
    transcript.appendUserText('hi');
    transcript.appendAssistant([{ type: 'tool_use', id: 'a', name: 'list_files', input: {} }]);

    expect(() => transcript.appendToolResults([{ type: 'tool_result', toolUseId: 'zzz', content: '' }])).toThrow(
      'Tool result references unknown or already answered tool use: zzz'
    );
    expect(transcript.length).toBe(2);
  });

  it('should reject an incomplete result set', () => {
    transcript.appendUserText('hi');
    transcript.appendAssistant([
      { type: 'tool_use', id: 'a', name: 'list_files', input: {} },
      { type: 'tool_use', id: 'b', name: 'list_files', input: {} },
    ]);

    expect(() => transcript.appendToolResults([{ type: 'tool_result', toolUseId: 'a', content: '' }])).toThrow(
      'Missing tool results for: b'
    );
  });

  it('should clear all messages', () => {
    transcript.appendUserText('hi');
    transcript.clear();

    expect(transcript.length).toBe(0);
  });

  it('should extract tool uses from a message', () => {
    const uses = pendingToolUses({
      role: 'assistant',
      content: [
        { type: 'text', text: 't' },
        { type: 'tool_use', id: 'a', name: 'read_file', input: { path: 'p' } },
      ],
    });

    expect(uses.map(u => u.id)).toEqual(['a']);
  });
});
