/**
 * Chat command - Interactive coding assistant session in the terminal
 */

import { Command } from 'commander';
import { createInterface } from 'node:readline';
import { resolve } from 'node:path';
import { Workspace } from '../../storage/workspace.js';
import { ConfigManager } from '../../config/config-manager.js';
import { Logger } from '../../logging/logger.js';
import { ToolSystem, createFileTools } from '../../tools/index.js';
import { AnthropicProvider } from '../../providers/anthropic.js';
import { AgentRuntime, type AgentConfig } from '../../agent/agent-runtime.js';

export interface ChatOptions {
  apiKey?: string;
  model?: string;
  root?: string;
}

/**
 * Streams the chat loop reads from and writes to
 */
export interface ChatIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  /** Enables line editing (TTY only) */
  terminal?: boolean;
  /** Source of SIGINT when input is not a terminal (default: process) */
  signals?: NodeJS.EventEmitter;
}

export type ChatAgent = Pick<AgentRuntime, 'chat' | 'reset'>;

const EXIT_COMMANDS = new Set(['exit', 'quit']);
const CLEAR_COMMAND = '/clear';
const API_KEY_ENV = 'ANTHROPIC_API_KEY';

/**
 * Picks the API key from the flag, then the environment; empty values count as missing
 */
export function resolveApiKey(flag: string | undefined, env: NodeJS.ProcessEnv = process.env): string | undefined {
  if (flag) return flag;
  const fromEnv = env[API_KEY_ENV];
  return fromEnv ? fromEnv : undefined;
}

/**
 * Creates the default (chat) command options on the root program
 */
export function chatCommand(program: Command): Command {
  return program
    .option('-k, --api-key <key>', `Anthropic API key (defaults to ${API_KEY_ENV})`)
    .option('-m, --model <model>', 'Model to use for this session')
    .option('-r, --root <dir>', 'Directory the file tools operate in')
    .action(async (options: ChatOptions) => {
      await runChat(options);
    });
}

/**
 * Runs an interactive session until the user leaves
 */
async function runChat(options: ChatOptions): Promise<void> {
  const apiKey = resolveApiKey(options.apiKey);
  if (!apiKey) {
    console.error(`Error: no API key provided. Pass --api-key or set ${API_KEY_ENV}.`);
    process.exit(1);
  }

  const workspace = new Workspace();
  if (!(await workspace.exists())) {
    await workspace.initialize();
  }

  const configManager = new ConfigManager(workspace.configPath);
  const configResult = await configManager.load();
  if (!configResult.success) {
    console.error('Configuration error:', configResult.errors?.join('\n'));
    process.exit(1);
  }

  const config = configManager.config;
  const logger = new Logger({
    level: config.logging.level,
    path: workspace.logPath(config.logging.file),
    maxSize: config.logging.maxSize,
    maxFiles: config.logging.maxFiles,
  });

  const model = options.model ?? config.agent.model;
  const rootDir = resolve(options.root ?? config.tools.rootDir);

  const toolSystem = new ToolSystem();
  createFileTools(toolSystem, { rootDir });

  const agentConfig: Partial<AgentConfig> = {
    model,
    maxTokens: config.agent.maxTokens,
    maxToolRounds: config.agent.maxToolRounds,
  };
  if (config.agent.systemPrompt !== undefined) {
    agentConfig.systemPrompt = config.agent.systemPrompt;
  }
  const runtime = new AgentRuntime(new AnthropicProvider(model, { apiKey }), toolSystem, logger, agentConfig);

  console.log(`termcoder (${model}) working in ${rootDir}`);
  console.log(`Type "exit" or "quit" to leave, "${CLEAR_COMMAND}" to start over.\n`);

  await logger.info('Session started', { sessionId: runtime.sessionId, model, rootDir });
  try {
    await runChatLoop(runtime, { input: process.stdin, output: process.stdout, terminal: process.stdout.isTTY }, logger);
  } finally {
    await logger.info('Session ended', { sessionId: runtime.sessionId });
    await logger.close();
  }
}

/**
 * Reads user turns line by line and prints the agent's replies.
 * Resolves after an exit command, Ctrl-C or end of input.
 */
export async function runChatLoop(agent: ChatAgent, io: ChatIO, logger: Logger): Promise<void> {
  const rl = createInterface({ input: io.input, output: io.output, terminal: io.terminal ?? false });
  const print = (text: string): void => {
    io.output.write(text);
  };

  const interrupt = (): void => {
    rl.close();
  };
  // A terminal reports Ctrl-C through readline; otherwise it reaches the process
  const signals: NodeJS.EventEmitter = io.signals ?? process;
  rl.on('SIGINT', interrupt);
  signals.once('SIGINT', interrupt);
  rl.setPrompt('You: ');
  rl.prompt();

  try {
    for await (const raw of rl) {
      const line = raw.trim();

      if (line === '') {
        rl.prompt();
        continue;
      }

      if (EXIT_COMMANDS.has(line.toLowerCase())) {
        print('Goodbye!\n');
        return;
      }

      if (line === CLEAR_COMMAND) {
        agent.reset();
        print('Conversation cleared.\n\n');
        rl.prompt();
        continue;
      }

      try {
        const reply = await agent.chat(line);
        print(`Assistant: ${reply}\n\n`);
      } catch (error) {
        await logger.error('Turn failed', error);
        print(`Error: ${error instanceof Error ? error.message : String(error)}\n\n`);
      }
      rl.prompt();
    }

    print('\nGoodbye!\n');
  } finally {
    signals.removeListener('SIGINT', interrupt);
    rl.close();
  }
}
