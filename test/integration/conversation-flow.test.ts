/**
 * Integration tests for end-to-end conversation flow
 *
 * Tests the complete flow: config → agent → provider adapter → file tools → log,
 * with the Messages API replaced by an in-process script.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { Workspace } from '../../src/storage/workspace.js';
import { ConfigManager } from '../../src/config/config-manager.js';
import { Logger } from '../../src/logging/logger.js';
import { ToolSystem, createFileTools } from '../../src/tools/index.js';
import { AgentRuntime } from '../../src/agent/agent-runtime.js';
import {
  AnthropicProvider,
  type MessagesApi,
  type MessagesCreateBody,
  type RawMessage,
} from '../../src/providers/anthropic.js';

type RawBlock = RawMessage['content'][number];

function rawMessage(stopReason: string, ...content: RawBlock[]): RawMessage {
  return { content, stop_reason: stopReason, usage: { input_tokens: 10, output_tokens: 5 } };
}

/**
 * Messages API stand-in that replays scripted responses and keeps each request body
 */
class ScriptedMessages implements MessagesApi {
  readonly bodies: MessagesCreateBody[] = [];

  constructor(private script: RawMessage[]) {}

  async create(body: MessagesCreateBody): Promise<RawMessage> {
    this.bodies.push(structuredClone(body));
    const next = this.script.shift();
    if (!next) {
      throw new Error('Script exhausted');
    }
    return next;
  }
}

describe('End-to-End Conversation Flow', () => {
  let tempDir: string;
  let projectDir: string;
  let workspace: Workspace;
  let logger: Logger;

  const buildAgent = async (script: RawMessage[]): Promise<{ agent: AgentRuntime; api: ScriptedMessages }> => {
    const configManager = new ConfigManager(workspace.configPath, {
      TERMCODER_TOOLS_ROOT_DIR: projectDir,
      TERMCODER_AGENT_MODEL: 'test-model',
    });
    const result = await configManager.load();
    expect(result.success).toBe(true);
    const config = configManager.config;

    logger = new Logger({ level: config.logging.level, path: workspace.logPath(config.logging.file) });

    const toolSystem = new ToolSystem();
    createFileTools(toolSystem, { rootDir: config.tools.rootDir });

    const api = new ScriptedMessages(script);
    const provider = new AnthropicProvider(config.agent.model, { messages: api });
    const agent = new AgentRuntime(provider, toolSystem, logger, {
      model: config.agent.model,
      maxTokens: config.agent.maxTokens,
      maxToolRounds: config.agent.maxToolRounds,
    });
    return { agent, api };
  };

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'termcoder-integration-test-'));
    projectDir = join(tempDir, 'project');
    await mkdir(projectDir);
    workspace = new Workspace(join(tempDir, 'home'));
    await workspace.initialize();
  });

  afterEach(async () => {
    await logger.close();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should report an empty directory back to the model', async () => {
    const { agent, api } = await buildAgent([
      rawMessage('tool_use', { type: 'tool_use', id: 'toolu_1', name: 'list_files', input: { path: '.' } }),
      rawMessage('end_turn', { type: 'text', text: 'The directory is empty.' }),
    ]);

    const reply = await agent.chat('list the files in .');

    expect(reply).toBe('The directory is empty.');
    expect(api.bodies).toHaveLength(2);
    expect(api.bodies[1]?.messages[2]).toEqual({
      role: 'user',
      content: [{ type: 'tool_result', tool_use_id: 'toolu_1', content: 'Empty directory: .', is_error: undefined }],
    });
  });

  it('should create notes.txt with exactly the requested content', async () => {
    const { agent, api } = await buildAgent([
      rawMessage(
        'tool_use',
        { type: 'text', text: 'Creating the file.' },
        { type: 'tool_use', id: 'toolu_1', name: 'edit_file', input: { path: 'notes.txt', new_text: 'hello' } }
      ),
      rawMessage('end_turn', { type: 'text', text: 'Created notes.txt.' }),
    ]);

    const reply = await agent.chat('create notes.txt containing hello');

    expect(reply).toBe('Created notes.txt.');
    expect(await readFile(join(projectDir, 'notes.txt'), 'utf-8')).toBe('hello');
    expect(api.bodies[1]?.messages[2]?.content).toEqual([
      { type: 'tool_result', tool_use_id: 'toolu_1', content: 'Successfully created notes.txt', is_error: undefined },
    ]);
  });

  it('should send the configured model, system prompt and tool schemas', async () => {
    const { agent, api } = await buildAgent([rawMessage('end_turn', { type: 'text', text: 'Hi.' })]);

    await agent.chat('hello');

    const body = api.bodies[0];
    expect(body?.model).toBe('test-model');
    expect(body?.max_tokens).toBe(4096);
    expect(body?.system).toBe(agent.getConfig().systemPrompt);
    expect(body?.tools?.map(tool => [tool.name, tool.input_schema.required])).toEqual([
      ['read_file', ['path']],
      ['list_files', []],
      ['edit_file', ['path', 'new_text']],
    ]);
  });

  it('should flag failed tool calls as errors for the model', async () => {
    const { agent, api } = await buildAgent([
      rawMessage('tool_use', { type: 'tool_use', id: 'toolu_1', name: 'read_file', input: { path: 'absent.md' } }),
      rawMessage('end_turn', { type: 'text', text: 'That file does not exist.' }),
    ]);

    await agent.chat('read absent.md');

    expect(api.bodies[1]?.messages[2]?.content).toEqual([
      { type: 'tool_result', tool_use_id: 'toolu_1', content: 'File not found: absent.md', is_error: true },
    ]);
  });

  it('should write the turn to the workspace log', async () => {
    const { agent } = await buildAgent([
      rawMessage('tool_use', { type: 'tool_use', id: 'toolu_1', name: 'list_files', input: {} }),
      rawMessage('end_turn', { type: 'text', text: 'Done.' }),
    ]);

    await agent.chat('look around');
    await logger.flush();

    const lines = (await readFile(workspace.logPath('agent.log'), 'utf-8')).trim().split('\n');
    const messages = lines.map(line => {
      const entry: unknown = JSON.parse(line);
      return typeof entry === 'object' && entry !== null && 'message' in entry ? entry.message : undefined;
    });
    expect(messages).toEqual(['User input', 'Executing tool', 'Tool result', 'Turn completed']);
  });
});
