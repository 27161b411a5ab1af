/**
 * termcoder - Terminal coding assistant with file tools
 */

export { Workspace } from './storage/workspace.js';
export {
  ConfigManager,
  TermcoderConfigSchema,
  DEFAULT_CONFIG,
  type TermcoderConfig,
  type PartialTermcoderConfig,
  type ConfigValidationResult,
} from './config/config-manager.js';

export {
  ToolSystem,
  FileTools,
  createFileTools,
  formatToolOutcome,
  READ_FILE_TOOL,
  LIST_FILES_TOOL,
  EDIT_FILE_TOOL,
  type ToolDefinition,
  type ToolCall,
  type ToolResult,
  type ToolOutcome,
  type ToolError,
  type ToolHandler,
  type JSONSchema,
  type JSONSchemaProperty,
} from './tools/index.js';

export {
  AgentRuntime,
  DEFAULT_AGENT_CONFIG,
  DEFAULT_SYSTEM_PROMPT,
  type AgentConfig,
  type AgentEvent,
  type AgentModelResponseEvent,
  type AgentToolCallEvent,
  type AgentToolResultEvent,
  type AgentDoneEvent,
  type AgentErrorEvent,
  type AgentError,
} from './agent/index.js';

export {
  AnthropicProvider,
  ProviderError,
  type LLMProvider,
  type ChatRequest,
  type ChatResponse,
  type Message,
  type ContentBlock,
} from './providers/index.js';

export { Transcript } from './session/index.js';

export {
  Logger,
  LOG_LEVELS,
  type LogLevel,
  type LoggerConfig,
  type LogEntry,
} from './logging/index.js';
