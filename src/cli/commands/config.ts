/**
 * Config command - View and edit configuration
 */

import { Command } from 'commander';
import { Workspace } from '../../storage/workspace.js';
import { ConfigManager, DEFAULT_CONFIG } from '../../config/config-manager.js';

/**
 * Creates the config command with subcommands
 */
export function configCommand(): Command {
  const cmd = new Command('config');

  cmd.description('View and edit configuration');

  cmd
    .command('show')
    .description('Show current configuration')
    .action(async () => {
      await showConfig();
    });

  cmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., agent.maxToolRounds 10)')
    .action(async (key: string, value: string) => {
      await setConfig(key, value);
    });

  cmd
    .command('get <key>')
    .description('Get a specific configuration value')
    .action(async (key: string) => {
      await getConfig(key);
    });

  // Default action (show)
  cmd.action(async () => {
    await showConfig();
  });

  return cmd;
}

/**
 * Converts a command-line value to a number or boolean where it reads as one
 */
export function parseConfigValue(value: string): unknown {
  const numValue = Number(value);
  if (value.trim() !== '' && !Number.isNaN(numValue)) {
    return numValue;
  }
  if (value.toLowerCase() === 'true') {
    return true;
  }
  if (value.toLowerCase() === 'false') {
    return false;
  }
  return value;
}

/**
 * Renders a configuration value for the terminal
 */
export function formatConfigValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value, null, 2) : String(value);
}

async function showConfig(): Promise<void> {
  const workspace = new Workspace();
  const configManager = new ConfigManager(workspace.configPath);

  const result = await configManager.load();
  const config = result.config ?? DEFAULT_CONFIG;

  console.log(`Current Configuration (${configManager.path}):\n`);
  console.log(JSON.stringify(config, null, 2));

  if (!result.success && result.errors) {
    console.log('\nWarnings:');
    for (const error of result.errors) {
      console.log(`  - ${error}`);
    }
  }
}

async function setConfig(key: string, value: string): Promise<void> {
  const workspace = new Workspace();

  if (!(await workspace.exists())) {
    await workspace.initialize();
  }

  const configManager = new ConfigManager(workspace.configPath);
  const loaded = await configManager.load();
  if (!loaded.success) {
    console.error(`Cannot update ${configManager.path}:`);
    for (const error of loaded.errors ?? []) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }

  const parsedValue = parseConfigValue(value);
  const result = configManager.set(key, parsedValue);

  if (!result.success) {
    console.error('Invalid configuration:');
    for (const error of result.errors ?? []) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }

  try {
    await configManager.save();
    console.log(`Set ${key} = ${JSON.stringify(parsedValue)}`);
  } catch (error) {
    console.error('Failed to save configuration:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

async function getConfig(key: string): Promise<void> {
  const workspace = new Workspace();
  const configManager = new ConfigManager(workspace.configPath);

  await configManager.load();

  const value = configManager.get(key);

  if (value === undefined) {
    console.error(`Configuration key not found: ${key}`);
    process.exit(1);
  }

  console.log(formatConfigValue(value));
}
