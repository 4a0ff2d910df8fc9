import type Anthropic from '@anthropic-ai/sdk';
import type { ChatCompletionTool } from 'openai/resources/chat/completions';
import { z } from 'zod';
import { IAuditSink } from '../interfaces/audit_sink.interface.js';
import {
  InvalidArgumentsError,
  InvalidCallbackError,
  InvalidToolError,
  ToolError,
  ToolExecutionError,
} from '../errors/index.js';
import { JsonSchema, Result, ToolCallback, ToolDefinition, ToolPayload, ToolSpec } from '../types/index.js';
import { err, ok } from '../utils/result.js';
import { ToolFormat, toAnthropicTools, toOpenAITools } from './tool-format.js';

export interface ToolRegistration {
  readonly description?: string;
  readonly parameterSchema?: JsonSchema;
  readonly callback: ToolCallback | null;
  readonly destructive?: boolean;
}

const ParametersSchema = z.object({
  properties: z.record(z.unknown()).optional(),
  required: z.array(z.string()).optional(),
});

const PropertySchema = z.object({
  type: z.union([z.string(), z.array(z.string())]).optional(),
});

function matchesType(value: unknown, type: string): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return Number.isInteger(value);
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    case 'null':
      return value === null;
    default:
      return true;
  }
}

/**
 * Checks `required` and the declared primitive `type` of each top-level
 * property. Returns the first problem, or null. A schema this cannot read is
 * not enforced.
 */
export function checkArguments(schema: JsonSchema, args: Record<string, unknown>): string | null {
  const parsed = ParametersSchema.safeParse(schema);
  if (!parsed.success) {
    return null;
  }

  const { properties = {}, required = [] } = parsed.data;
  for (const name of required) {
    if (args[name] === undefined || args[name] === null) {
      return `Missing required parameter: ${name}`;
    }
  }

  for (const [name, definition] of Object.entries(properties)) {
    const value = args[name];
    const property = PropertySchema.safeParse(definition);
    if (value === undefined || !property.success || property.data.type === undefined) {
      continue;
    }
    const types = Array.isArray(property.data.type) ? property.data.type : [property.data.type];
    if (!types.some(type => matchesType(value, type))) {
      return `Invalid type for parameter ${name}. Expected ${types.join(' or ')}.`;
    }
  }
  return null;
}

/**
 * Named operations the model may invoke. Registration order is preserved;
 * registering an existing name replaces the earlier definition in place.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  constructor(private readonly audit: IAuditSink) {}

  register(name: string, registration: ToolRegistration): void {
    this.tools.set(name, {
      name,
      description: registration.description ?? '',
      parameterSchema: registration.parameterSchema ?? {},
      callback: registration.callback,
      destructive: registration.destructive ?? false,
    });
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): string[] {
    return [...this.tools.keys()];
  }

  isDestructive(name: string): boolean {
    return this.tools.get(name)?.destructive ?? false;
  }

  catalog(): ToolSpec[] {
    return [...this.tools.values()].map(({ name, description, parameterSchema }) => ({
      name,
      description,
      parameterSchema,
    }));
  }

  projectFor(format: 'openai'): ChatCompletionTool[];
  projectFor(format: 'anthropic'): Anthropic.Tool[];
  projectFor(format: ToolFormat): ChatCompletionTool[] | Anthropic.Tool[] {
    return format === 'openai' ? toOpenAITools(this.catalog()) : toAnthropicTools(this.catalog());
  }

  /**
   * Runs a tool after checking `args` against its parameter schema. The
   * callback's payload is returned as is; a callback that returns nothing
   * yields `null`.
   */
  async execute(name: string, args: Record<string, unknown>): Promise<Result<ToolPayload | null, ToolError>> {
    this.audit.record('tool.started', { tool: name, arguments: args });

    const tool = this.tools.get(name);
    if (!tool) {
      return this.fail(new InvalidToolError(name));
    }
    const { callback } = tool;
    if (typeof callback !== 'function') {
      return this.fail(new InvalidCallbackError(name));
    }
    const problem = checkArguments(tool.parameterSchema, args);
    if (problem) {
      return this.fail(new InvalidArgumentsError(name, problem));
    }

    const startedAt = Date.now();
    try {
      const payload = (await callback(args)) ?? null;
      this.audit.record('tool.succeeded', {
        tool: name,
        success: payload?.success ?? true,
        durationMs: Date.now() - startedAt,
      });
      return ok(payload);
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      return this.fail(new ToolExecutionError(name, cause?.message ?? String(error), cause), Date.now() - startedAt);
    }
  }

  private fail(error: ToolError, durationMs?: number): Result<never, ToolError> {
    this.audit.record('tool.failed', {
      tool: error.toolName,
      code: error.code,
      error: error.message,
      ...(durationMs === undefined ? {} : { durationMs }),
    });
    return err(error);
  }
}
