import { readFile, writeFile, readdir, stat, mkdir } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { TextDecoder } from 'node:util';
import { z } from 'zod';
import { ToolSystem, success, failure, type ToolDefinition, type ToolOutcome } from './tool-system.js';

/**
 * read_file tool definition
 */
export const READ_FILE_TOOL: ToolDefinition = {
  name: 'read_file',
  description: 'Read the contents of the file at the specified path',
  parameters: {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: 'The path of the file to read',
      },
    },
    required: ['path'],
  },
};

/**
 * list_files tool definition
 */
export const LIST_FILES_TOOL: ToolDefinition = {
  name: 'list_files',
  description: 'List all files and directories at the specified path',
  parameters: {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: 'The directory path to list (defaults to the current directory)',
      },
    },
    required: [],
  },
};

/**
 * edit_file tool definition
 */
export const EDIT_FILE_TOOL: ToolDefinition = {
  name: 'edit_file',
  description: 'Edit a file by replacing old_text with new_text. Creates the file if it does not exist.',
  parameters: {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: 'The path of the file to edit',
      },
      old_text: {
        type: 'string',
        description: 'The text to search for and replace (leave empty to create a new file)',
      },
      new_text: {
        type: 'string',
        description: 'The text to replace old_text with',
      },
    },
    required: ['path', 'new_text'],
  },
};

const ReadFileArgs = z.object({ path: z.string() });
const ListFilesArgs = z.object({ path: z.string().default('.') });
const EditFileArgs = z.object({
  path: z.string(),
  old_text: z.string().default(''),
  new_text: z.string(),
});

export type ReadFileArgs = z.infer<typeof ReadFileArgs>;
export type ListFilesArgs = z.infer<typeof ListFilesArgs>;
export type EditFileArgs = z.infer<typeof EditFileArgs>;

export interface FileToolsOptions {
  /** Directory that relative tool paths resolve against (default: process.cwd()) */
  rootDir?: string;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Invalid byte sequences throw instead of decoding to U+FFFD; a BOM is kept
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

async function readText(path: string): Promise<string> {
  return utf8.decode(await readFile(path));
}

/**
 * Orders names by Unicode code point
 */
export function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a, ch => ch.codePointAt(0) ?? 0);
  const right = Array.from(b, ch => ch.codePointAt(0) ?? 0);
  for (let i = 0; i < Math.min(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return left.length - right.length;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * File tool handlers bound to a root directory
 */
export class FileTools {
  readonly rootDir: string;

  constructor(options: FileToolsOptions = {}) {
    this.rootDir = resolve(options.rootDir ?? process.cwd());
  }

  private resolvePath(path: string): string {
    return resolve(this.rootDir, path);
  }

  async readFile({ path }: ReadFileArgs): Promise<ToolOutcome> {
    try {
      const content = await readText(this.resolvePath(path));
      return success(`Contents of ${path}:\n${content}`);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return failure(READ_FILE_TOOL.name, 'not_found', `File not found: ${path}`);
      }
      return failure(READ_FILE_TOOL.name, 'execution', `Error reading file: ${errorMessage(error)}`);
    }
  }

  async listFiles({ path }: ListFilesArgs): Promise<ToolOutcome> {
    const dirPath = this.resolvePath(path);
    try {
      if (!(await pathExists(dirPath))) {
        return failure(LIST_FILES_TOOL.name, 'not_found', `Path not found: ${path}`);
      }

      const names = (await readdir(dirPath)).sort(compareCodePoints);
      if (names.length === 0) {
        return success(`Empty directory: ${path}`);
      }

      const lines: string[] = [];
      for (const name of names) {
        lines.push((await this.isDirectory(join(dirPath, name))) ? `[dir]  ${name}/` : `[file] ${name}`);
      }
      return success(`Contents of ${path}:\n${lines.join('\n')}`);
    } catch (error) {
      return failure(LIST_FILES_TOOL.name, 'execution', `Error listing files: ${errorMessage(error)}`);
    }
  }

  /**
   * Replaces every occurrence of old_text when the file exists and old_text is
   * non-empty; otherwise writes new_text as the whole file.
   */
  async editFile({ path, old_text: oldText, new_text: newText }: EditFileArgs): Promise<ToolOutcome> {
    const filePath = this.resolvePath(path);
    try {
      if (oldText !== '' && (await pathExists(filePath))) {
        const content = await readText(filePath);
        if (!content.includes(oldText)) {
          return failure(EDIT_FILE_TOOL.name, 'text_not_found', `Text not found in file: ${oldText}`);
        }
        await writeFile(filePath, content.split(oldText).join(newText), { encoding: 'utf-8' });
        return success(`Successfully edited ${path}`);
      }

      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, newText, { encoding: 'utf-8' });
      return success(`Successfully created ${path}`);
    } catch (error) {
      return failure(EDIT_FILE_TOOL.name, 'execution', `Error editing file: ${errorMessage(error)}`);
    }
  }

  // Follows symlinks; a dangling link is listed as a file
  private async isDirectory(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isDirectory();
    } catch (error) {
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ELOOP')) {
        return false;
      }
      throw error;
    }
  }
}

/**
 * Creates the file tools and registers them on a ToolSystem instance
 */
export function createFileTools(toolSystem: ToolSystem, options: FileToolsOptions = {}): FileTools {
  const tools = new FileTools(options);
  toolSystem.register(READ_FILE_TOOL, ReadFileArgs, args => tools.readFile(args));
  toolSystem.register(LIST_FILES_TOOL, ListFilesArgs, args => tools.listFiles(args));
  toolSystem.register(EDIT_FILE_TOOL, EditFileArgs, args => tools.editFile(args));
  return tools;
}
