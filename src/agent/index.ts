/**
 * Agent Runtime module
 * Drives the model and tool-calling loop for one conversation
 */

export {
  AgentRuntime,
  DEFAULT_AGENT_CONFIG,
  DEFAULT_SYSTEM_PROMPT,
  TOOL_RESULT_PREVIEW_LENGTH,
  type AgentConfig,
  type AgentEvent,
  type AgentModelResponseEvent,
  type AgentToolCallEvent,
  type AgentToolResultEvent,
  type AgentDoneEvent,
  type AgentErrorEvent,
  type AgentError,
} from './agent-runtime.js';
