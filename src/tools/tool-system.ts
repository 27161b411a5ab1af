import { z } from 'zod';

/**
 * JSON Schema subset used to describe tool parameters to the model
 */
export interface JSONSchema {
  type: 'object';
  properties?: Record<string, JSONSchemaProperty>;
  required?: string[];
}

export interface JSONSchemaProperty {
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description?: string;
}

/**
 * Tool definition as presented to the model
 */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: JSONSchema;
}

/**
 * Tool call request
 */
export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type ToolErrorType =
  | 'unknown_tool'
  | 'validation'
  | 'not_found'
  | 'text_not_found'
  | 'execution';

/**
 * Structured tool error. `message` is the text handed to the model.
 */
export interface ToolError {
  toolName: string;
  errorType: ToolErrorType;
  message: string;
}

export type ToolOutcome =
  | { ok: true; output: string }
  | { ok: false; error: ToolError };

/**
 * Tool execution result
 */
export interface ToolResult {
  callId: string;
  toolName: string;
  outcome: ToolOutcome;
}

/**
 * Tool handler, called with arguments already parsed by the tool's schema
 */
export type ToolHandler<A> = (args: A) => Promise<ToolOutcome>;

/**
 * Schema that parses loosely-typed model input into handler arguments
 */
export type ToolArgsSchema<A> = z.ZodType<A, z.ZodTypeDef, unknown>;

interface RegisteredTool {
  definition: ToolDefinition;
  invoke: (args: Record<string, unknown>) => Promise<ToolOutcome>;
}

export function success(output: string): ToolOutcome {
  return { ok: true, output };
}

export function failure(toolName: string, errorType: ToolErrorType, message: string): ToolOutcome {
  return { ok: false, error: { toolName, errorType, message } };
}

/**
 * Serializes an outcome to the plain string the model sees
 */
export function formatToolOutcome(outcome: ToolOutcome): string {
  return outcome.ok ? outcome.output : outcome.error.message;
}

/**
 * ToolSystem - Ordered tool catalog with validation and execution
 *
 * Arguments are checked by each tool's zod schema before its handler runs.
 * `execute` never rejects: unknown tools, bad arguments and handler
 * failures all come back as failed outcomes.
 */
export class ToolSystem {
  private tools: Map<string, RegisteredTool> = new Map();

  /**
   * Registers a tool with its argument schema and handler
   */
  register<A>(definition: ToolDefinition, argsSchema: ToolArgsSchema<A>, handler: ToolHandler<A>): void {
    if (this.tools.has(definition.name)) {
      throw new Error(`Tool '${definition.name}' is already registered`);
    }

    const invoke = async (args: Record<string, unknown>): Promise<ToolOutcome> => {
      const parsed = argsSchema.safeParse(args);
      if (!parsed.success) {
        return invalidArguments(definition.name, parsed.error.issues.map(describeIssue));
      }
      return handler(parsed.data);
    };

    this.tools.set(definition.name, { definition, invoke });
  }

  /**
   * Lists all registered tool definitions in registration order
   */
  list(): ToolDefinition[] {
    return Array.from(this.tools.values()).map(t => t.definition);
  }

  /**
   * Executes a tool call
   */
  async execute(call: ToolCall): Promise<ToolResult> {
    const tool = this.tools.get(call.name);

    if (!tool) {
      return {
        callId: call.id,
        toolName: call.name,
        outcome: failure(call.name, 'unknown_tool', `Unknown tool: ${call.name}`),
      };
    }

    try {
      const outcome = await tool.invoke(call.arguments);
      return { callId: call.id, toolName: call.name, outcome };
    } catch (error) {
      const cause = error instanceof Error ? error.message : String(error);
      return {
        callId: call.id,
        toolName: call.name,
        outcome: failure(call.name, 'execution', `Error executing ${call.name}: ${cause}`),
      };
    }
  }
}

function describeIssue(issue: z.ZodIssue): string {
  const key = issue.path.join('.');
  if (key === '') {
    return issue.message;
  }
  if (issue.code === 'invalid_type') {
    return issue.received === 'undefined'
      ? `Missing required parameter: '${key}'`
      : `Parameter '${key}' must be of type '${issue.expected}', got '${issue.received}'`;
  }
  return `'${key}': ${issue.message}`;
}

function invalidArguments(toolName: string, errors: string[]): ToolOutcome {
  return failure(toolName, 'validation', `Invalid arguments for ${toolName}: ${errors.join('; ')}`);
}
