import type Anthropic from '@anthropic-ai/sdk';
import type { ChatCompletionTool } from 'openai/resources/chat/completions';
import { JsonSchema, ToolSpec } from '../types/index.js';

export type ToolFormat = 'openai' | 'anthropic';

export interface GeminiFunctionDeclaration {
  readonly name: string;
  readonly description: string;
  readonly parameters: JsonSchema;
}

/**
 * Object schemas always carry an explicit `properties` object, so a tool without
 * parameters serializes as `{"type":"object","properties":{}}`.
 */
export function normalizeSchema(schema: JsonSchema): JsonSchema {
  if (Object.keys(schema).length === 0) {
    return { type: 'object', properties: {} };
  }
  if (schema.type === 'object' && schema.properties === undefined) {
    return { ...schema, properties: {} };
  }
  return schema;
}

export function toOpenAITools(tools: readonly ToolSpec[]): ChatCompletionTool[] {
  return tools.map(tool => ({
    type: 'function' as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: normalizeSchema(tool.parameterSchema),
    },
  }));
}

export function toAnthropicTools(tools: readonly ToolSpec[]): Anthropic.Tool[] {
  return tools.map(tool => ({
    name: tool.name,
    description: tool.description,
    input_schema: {
      ...normalizeSchema(tool.parameterSchema),
      type: 'object' as const,
    },
  }));
}

export function toGeminiFunctionDeclarations(tools: readonly ToolSpec[]): GeminiFunctionDeclaration[] {
  return tools.map(tool => ({
    name: tool.name,
    description: tool.description,
    parameters: normalizeSchema(tool.parameterSchema),
  }));
}
