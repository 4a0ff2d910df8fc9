import { ProviderError } from '../errors/index.js';
import {
  ChatMessage,
  ChatOptions,
  ChatResult,
  ModelCatalog,
  Result,
  ToolSpec,
  WireFormat,
} from '../types/index.js';

export type ProviderResult<T> = Result<T, ProviderError>;

export interface ILLMProvider {
  readonly id: string;
  readonly name: string;
  readonly wireFormat: WireFormat;

  isConfigured(): boolean;

  getModel(): string;

  availableModels(): ModelCatalog;

  chat(messages: readonly ChatMessage[], options?: ChatOptions): Promise<ProviderResult<ChatResult>>;

  chatWithTools(
    messages: readonly ChatMessage[],
    tools: readonly ToolSpec[],
    options?: ChatOptions
  ): Promise<ProviderResult<ChatResult>>;

  validateCredential(): Promise<ProviderResult<true>>;

  maxContextLength(modelId?: string): number;

  countTokens(text: string): number;
}
