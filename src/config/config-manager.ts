import { z } from 'zod';
import { readFile, writeFile, rename, unlink } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { randomUUID } from 'node:crypto';

/**
 * Configuration schema using Zod for validation
 */
export const TermcoderConfigSchema = z.object({
  agent: z.object({
    model: z.string().min(1).default('claude-sonnet-4-5-20250929'),
    maxTokens: z.number().int().min(1).max(200000).default(4096),
    maxToolRounds: z.number().int().min(1).max(1000).default(25),
    systemPrompt: z.string().min(1).optional(),
  }).default({}),

  tools: z.object({
    rootDir: z.string().min(1).default('.'),
  }).default({}),

  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    file: z.string().min(1).regex(/^[^/\\]+$/, 'must be a file name, not a path').default('agent.log'),
    maxSize: z.number().int().min(1024).default(10 * 1024 * 1024), // 10MB
    maxFiles: z.number().int().min(1).max(100).default(5),
  }).default({}),
});

export type TermcoderConfig = z.infer<typeof TermcoderConfigSchema>;

/**
 * Partial configuration as written by users
 */
export type PartialTermcoderConfig = z.input<typeof TermcoderConfigSchema>;

export const DEFAULT_CONFIG: TermcoderConfig = TermcoderConfigSchema.parse({});

const ENV_PREFIX = 'TERMCODER_';

/**
 * Mapping of environment variables to config paths
 */
const ENV_MAPPINGS: Record<string, string[]> = {
  [`${ENV_PREFIX}AGENT_MODEL`]: ['agent', 'model'],
  [`${ENV_PREFIX}AGENT_MAX_TOKENS`]: ['agent', 'maxTokens'],
  [`${ENV_PREFIX}AGENT_MAX_TOOL_ROUNDS`]: ['agent', 'maxToolRounds'],
  [`${ENV_PREFIX}TOOLS_ROOT_DIR`]: ['tools', 'rootDir'],
  [`${ENV_PREFIX}LOGGING_LEVEL`]: ['logging', 'level'],
  [`${ENV_PREFIX}LOGGING_FILE`]: ['logging', 'file'],
  [`${ENV_PREFIX}LOGGING_MAX_SIZE`]: ['logging', 'maxSize'],
  [`${ENV_PREFIX}LOGGING_MAX_FILES`]: ['logging', 'maxFiles'],
};

const NUMERIC_KEYS = new Set(['maxTokens', 'maxToolRounds', 'maxSize', 'maxFiles']);

export interface ConfigValidationResult {
  success: boolean;
  config?: TermcoderConfig;
  errors?: string[];
}

type ConfigTree = Record<string, unknown>;

function isTree(value: unknown): value is ConfigTree {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * ConfigManager - Loads, validates and persists configuration
 *
 * Precedence: defaults → config file → TERMCODER_* environment variables.
 */
export class ConfigManager {
  private configPath: string;
  private currentConfig: TermcoderConfig;
  private env: NodeJS.ProcessEnv;
  /** Settings as read from the file, without environment overrides */
  private fileConfig: ConfigTree = {};
  private envOverrides: ConfigTree = {};
  private loadErrors: string[] = [];

  /**
   * @param configPath - Path to the configuration file
   * @param env - Environment to read overrides from
   */
  constructor(configPath: string, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.currentConfig = DEFAULT_CONFIG;
    this.env = env;
  }

  get config(): TermcoderConfig {
    return this.currentConfig;
  }

  get path(): string {
    return this.configPath;
  }

  async load(): Promise<ConfigValidationResult> {
    const result = await this.readSources();
    this.loadErrors = result.success ? [] : result.errors ?? [];
    return result;
  }

  private async readSources(): Promise<ConfigValidationResult> {
    let fileConfig: ConfigTree = {};

    try {
      const content = await readFile(this.configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      if (!isTree(parsed)) {
        return { success: false, errors: ['Config file must contain a JSON object'] };
      }
      fileConfig = parsed;
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        return {
          success: false,
          errors: [`Failed to read config file: ${error instanceof Error ? error.message : String(error)}`],
        };
      }
    }

    const { overrides, errors } = this.getEnvironmentOverrides();
    if (errors.length > 0) {
      return { success: false, errors };
    }

    this.fileConfig = fileConfig;
    this.envOverrides = overrides;
    return this.validate(this.deepMerge(fileConfig, overrides));
  }

  /**
   * Validates a partial configuration and, on success, makes it current
   */
  validate(partialConfig: unknown): ConfigValidationResult {
    const result = TermcoderConfigSchema.safeParse(partialConfig);

    if (result.success) {
      this.currentConfig = result.data;
      return { success: true, config: result.data };
    }

    const errors = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `Configuration error at '${path}': ${issue.message}`;
    });

    return { success: false, errors };
  }

  /**
   * Saves configuration to file atomically. Without an argument it writes the
   * file settings as loaded plus any `set` changes; environment overrides are
   * never written.
   */
  async save(config?: PartialTermcoderConfig): Promise<void> {
    if (config === undefined && this.loadErrors.length > 0) {
      throw new Error(`Refusing to overwrite a config file that failed to load: ${this.loadErrors.join(', ')}`);
    }

    const fileConfig: unknown = config ?? this.fileConfig;
    if (!isTree(fileConfig)) {
      throw new Error('Invalid configuration: expected an object');
    }

    const validation = this.validate(this.deepMerge(fileConfig, this.envOverrides));
    if (!validation.success) {
      throw new Error(`Invalid configuration: ${validation.errors?.join(', ')}`);
    }

    this.fileConfig = fileConfig;
    await this.atomicWrite(this.configPath, JSON.stringify(fileConfig, null, 2));
  }

  /**
   * Writes content to a file using temp file + rename
   */
  async atomicWrite(filePath: string, content: string): Promise<void> {
    const tempPath = join(dirname(filePath), `.config-${randomUUID()}.tmp`);

    try {
      await writeFile(tempPath, content, { mode: 0o600 });
      await rename(tempPath, filePath);
    } catch (error) {
      await unlink(tempPath).catch((cleanupError: unknown) => {
        if (!(cleanupError instanceof Error && 'code' in cleanupError && cleanupError.code === 'ENOENT')) {
          throw cleanupError;
        }
      });
      throw error;
    }
  }

  private getEnvironmentOverrides(): { overrides: ConfigTree; errors: string[] } {
    const overrides: ConfigTree = {};
    const errors: string[] = [];

    for (const [envVar, path] of Object.entries(ENV_MAPPINGS)) {
      const value = this.env[envVar];
      if (value === undefined) continue;

      const key = path[path.length - 1] ?? '';
      if (NUMERIC_KEYS.has(key)) {
        const num = Number(value);
        if (value.trim() === '' || !Number.isFinite(num)) {
          errors.push(`Invalid numeric value for ${path.join('.')} in ${envVar}: ${value}`);
          continue;
        }
        this.setNestedValue(overrides, path, num);
      } else {
        this.setNestedValue(overrides, path, value);
      }
    }

    return { overrides, errors };
  }

  private setNestedValue(obj: ConfigTree, path: string[], value: unknown): void {
    let current = obj;
    for (const key of path.slice(0, -1)) {
      const next = current[key];
      if (isTree(next)) {
        current = next;
      } else {
        const created: ConfigTree = {};
        current[key] = created;
        current = created;
      }
    }
    const lastKey = path[path.length - 1];
    if (lastKey !== undefined) {
      current[lastKey] = value;
    }
  }

  /**
   * Deep merges two configuration trees; later values win
   */
  private deepMerge(base: ConfigTree, overrides: ConfigTree): ConfigTree {
    const result: ConfigTree = { ...base };

    for (const [key, value] of Object.entries(overrides)) {
      const existing = result[key];
      result[key] = isTree(value) && isTree(existing) ? this.deepMerge(existing, value) : value;
    }

    return result;
  }

  /**
   * Gets a configuration value by dotted path
   */
  get(path: string): unknown {
    let current: unknown = this.currentConfig;

    for (const part of path.split('.')) {
      if (!isTree(current)) {
        return undefined;
      }
      current = current[part];
    }

    return current;
  }

  /**
   * Sets a file setting by dotted path, validating the result with
   * environment overrides applied
   */
  set(path: string, value: unknown): ConfigValidationResult {
    if (this.loadErrors.length > 0) {
      return { success: false, errors: this.loadErrors };
    }

    const copy: unknown = JSON.parse(JSON.stringify(this.fileConfig));
    const newFileConfig: ConfigTree = isTree(copy) ? copy : {};
    this.setNestedValue(newFileConfig, path.split('.'), value);

    const result = this.validate(this.deepMerge(newFileConfig, this.envOverrides));
    if (result.success) {
      this.fileConfig = newFileConfig;
    }
    return result;
  }
}
