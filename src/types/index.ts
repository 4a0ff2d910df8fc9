export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ChatMessage {
  readonly role: MessageRole;
  readonly content: string;
  readonly toolCalls?: readonly ToolCall[];
  readonly toolCallId?: string;
  /** Function name of the call a `tool` message answers; needed by name-correlated vendors. */
  readonly toolName?: string;
}

export interface ToolCall {
  readonly id: string;
  readonly name: string;
  /** JSON-encoded argument object. */
  readonly arguments: string;
}

export type JsonSchema = Record<string, unknown>;

export interface ToolSpec {
  readonly name: string;
  readonly description: string;
  readonly parameterSchema: JsonSchema;
}

export interface ToolPayload {
  readonly success?: boolean;
  readonly message?: string;
  readonly [key: string]: unknown;
}

/** A callback may answer with nothing; the registry reports that as `null`. */
export type ToolCallback = (
  args: Record<string, unknown>
) => ToolPayload | null | undefined | Promise<ToolPayload | null | undefined>;

export interface ToolDefinition extends ToolSpec {
  readonly callback: ToolCallback | null;
  readonly destructive: boolean;
}

export interface ToolResult {
  readonly toolCallId: string;
  readonly name: string;
  readonly content: string;
  readonly isError: boolean;
}

export interface TokenUsage {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
}

export interface ChatOptions {
  readonly model?: string | null;
  readonly temperature?: number;
  readonly maxTokens?: number;
  readonly systemPrompt?: string | null;
  readonly timeoutSeconds?: number;
}

export interface ResolvedChatOptions {
  readonly model: string | null;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly systemPrompt: string | null;
  readonly timeoutSeconds: number;
}

export type ChatResult =
  | {
      readonly kind: 'content';
      readonly content: string;
      readonly usage: TokenUsage;
      readonly model: string;
    }
  | {
      readonly kind: 'toolCalls';
      /** Any text the model sent alongside its tool calls; often empty. */
      readonly content: string;
      readonly toolCalls: readonly ToolCall[];
      readonly usage: TokenUsage;
      readonly model: string;
    };

export type WireFormat = 'openai' | 'anthropic' | 'google';

export interface ModelInfo {
  readonly displayName: string;
  readonly contextLength: number;
  readonly description: string;
}

export type ModelCatalog = Readonly<Record<string, ModelInfo>>;

export interface ProviderDescriptor {
  readonly id: string;
  readonly displayName: string;
  readonly wireFormat: WireFormat;
  readonly baseUrl: string;
  readonly defaultModel: string;
  readonly defaultContextLength: number;
  readonly modelCatalog: ModelCatalog;
}

export interface ProviderConfig extends ProviderDescriptor {
  readonly credential: string;
}

export interface UsageEntry {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
  readonly requestCount: number;
}

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };
