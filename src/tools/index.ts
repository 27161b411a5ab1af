/**
 * Tool System - Tool registration, validation, and execution
 */

export {
  ToolSystem,
  success,
  failure,
  formatToolOutcome,
  type ToolDefinition,
  type ToolCall,
  type ToolResult,
  type ToolOutcome,
  type ToolError,
  type ToolErrorType,
  type ToolHandler,
  type ToolArgsSchema,
  type JSONSchema,
  type JSONSchemaProperty,
} from './tool-system.js';

export {
  FileTools,
  createFileTools,
  READ_FILE_TOOL,
  LIST_FILES_TOOL,
  EDIT_FILE_TOOL,
  type FileToolsOptions,
  type ReadFileArgs,
  type ListFilesArgs,
  type EditFileArgs,
} from './file-tools.js';
