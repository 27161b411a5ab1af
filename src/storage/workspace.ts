import { mkdir, access, constants } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve, isAbsolute } from 'node:path';

/**
 * Default workspace root directory, under the user's home
 */
const DEFAULT_WORKSPACE_ROOT = '.termcoder';

/**
 * Standard directory structure within the workspace
 */
const WORKSPACE_DIRS = ['logs'] as const;

/**
 * Workspace - Manages the ~/.termcoder/ directory holding config.json and logs/
 */
export class Workspace {
  private readonly rootPath: string;

  /**
   * @param rootPath - Custom root path (defaults to ~/.termcoder/)
   */
  constructor(rootPath?: string) {
    if (rootPath) {
      this.rootPath = isAbsolute(rootPath) ? rootPath : resolve(rootPath);
    } else {
      this.rootPath = join(homedir(), DEFAULT_WORKSPACE_ROOT);
    }
  }

  get root(): string {
    return this.rootPath;
  }

  /**
   * Creates the workspace directories with owner-only permissions (700)
   */
  async initialize(): Promise<void> {
    await mkdir(this.rootPath, { recursive: true, mode: 0o700 });

    for (const dir of WORKSPACE_DIRS) {
      await mkdir(join(this.rootPath, dir), { recursive: true, mode: 0o700 });
    }
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.rootPath, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  get configPath(): string {
    return join(this.rootPath, 'config.json');
  }

  get logsDir(): string {
    return join(this.rootPath, 'logs');
  }

  /**
   * Gets the path to a log file
   * @param filename - Log filename
   */
  logPath(filename: string): string {
    if (filename.includes('/') || filename.includes('\\') || filename.includes('..')) {
      throw new Error(`Invalid log filename: ${filename}`);
    }
    return join(this.logsDir, filename);
  }
}
