/**
 * Logs command - View recent log entries
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFile } from 'node:fs/promises';
import { Workspace } from '../../storage/workspace.js';
import { ConfigManager } from '../../config/config-manager.js';
import { type LogLevel, LOG_LEVELS, type LogEntry } from '../../logging/logger.js';

interface LogsOptions {
  level?: string;
  lines?: number;
}

const DEFAULT_LINE_COUNT = 50;

function parseLineCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return count;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Creates the logs command
 */
export function logsCommand(): Command {
  const cmd = new Command('logs');

  cmd
    .description('View recent log entries')
    .option('-l, --level <level>', 'Filter by minimum log level (debug, info, warn, error)')
    .option('-n, --lines <count>', 'Number of lines to show', parseLineCount)
    .action(async (options: LogsOptions) => {
      await runLogs(options);
    });

  return cmd;
}

async function runLogs(options: LogsOptions): Promise<void> {
  let minLevel: LogLevel | undefined;
  if (options.level !== undefined) {
    if (!isLogLevel(options.level)) {
      console.error(`Invalid log level: ${options.level}`);
      console.error('Valid levels: debug, info, warn, error');
      process.exit(1);
    }
    minLevel = options.level;
  }

  const workspace = new Workspace();
  const configManager = new ConfigManager(workspace.configPath);
  await configManager.load();
  const logPath = workspace.logPath(configManager.config.logging.file);

  let content: string;
  try {
    content = await readFile(logPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      console.log('No log file found.');
      return;
    }
    throw error;
  }

  for (const line of recentEntries(content, options.lines ?? DEFAULT_LINE_COUNT, minLevel)) {
    console.log(line);
  }
}

/**
 * Formats the last `lineCount` lines of a log file, skipping lines that are
 * not log entries and entries below `minLevel`
 */
export function recentEntries(content: string, lineCount: number, minLevel?: LogLevel): string[] {
  const output: string[] = [];

  for (const line of content.trim().split('\n').slice(-lineCount)) {
    const entry = parseLine(line);
    if (entry && shouldShow(entry, minLevel)) {
      output.push(...formatEntry(entry));
    }
  }

  return output;
}

/**
 * Parses a log line into a LogEntry
 */
export function parseLine(line: string): LogEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }

  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('timestamp' in parsed) ||
    !('level' in parsed) ||
    !('message' in parsed) ||
    typeof parsed.timestamp !== 'string' ||
    typeof parsed.level !== 'string' ||
    typeof parsed.message !== 'string' ||
    !isLogLevel(parsed.level)
  ) {
    return null;
  }

  const entry: LogEntry = { timestamp: parsed.timestamp, level: parsed.level, message: parsed.message };
  if ('context' in parsed && typeof parsed.context === 'object' && parsed.context !== null) {
    entry.context = { ...parsed.context };
  }
  if ('stack' in parsed && typeof parsed.stack === 'string') {
    entry.stack = parsed.stack;
  }
  return entry;
}

function shouldShow(entry: LogEntry, minLevel?: LogLevel): boolean {
  if (!minLevel) return true;
  return LOG_LEVELS[entry.level] >= LOG_LEVELS[minLevel];
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // gray
  info: '\x1b[36m',  // cyan
  warn: '\x1b[33m',  // yellow
  error: '\x1b[31m', // red
};
const GRAY = '\x1b[90m';
const RESET = '\x1b[0m';

/**
 * Formats a log entry as colored terminal lines
 */
export function formatEntry(entry: LogEntry): string[] {
  const color = LEVEL_COLORS[entry.level];
  const time = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
  const level = entry.level.toUpperCase().padEnd(5);

  let output = `${color}[${time}] ${level}${RESET} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    const contextStr = Object.entries(entry.context)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(' ');
    output += ` ${GRAY}${contextStr}${RESET}`;
  }

  return entry.stack ? [output, `${GRAY}${entry.stack}${RESET}`] : [output];
}
