import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { ILLMProvider, ProviderResult } from '../interfaces/llm_provider.interface.js';
import { ILogger } from '../interfaces/logger.interface.js';
import {
  ApiError,
  InvalidResponseError,
  NetworkError,
  NotConfiguredError,
  ProviderError,
} from '../errors/index.js';
import {
  ChatMessage,
  ChatOptions,
  ChatResult,
  ModelCatalog,
  ProviderConfig,
  TokenUsage,
  ToolCall,
  ToolSpec,
} from '../types/index.js';
import { toOpenAITools } from '../tools/tool-format.js';
import { err, ok } from '../utils/result.js';
import {
  ProviderDeps,
  ZERO_USAGE,
  collectSystemPrompt,
  estimateTokens,
  lookupContextLength,
  normalizeArguments,
  resolveOptions,
  statusMessage,
  trimTrailingSlash,
  vendorErrorMessage,
} from './provider.shared.js';

/** Flat message list with a leading system message; tool calls correlated by id. */
export function toOpenAIMessages(
  messages: readonly ChatMessage[],
  systemPrompt: string | null
): ChatCompletionMessageParam[] {
  const system = collectSystemPrompt(messages, systemPrompt);
  const mapped: ChatCompletionMessageParam[] = system ? [{ role: 'system', content: system }] : [];

  for (const message of messages) {
    switch (message.role) {
      case 'system':
        break;
      case 'user':
        mapped.push({ role: 'user', content: message.content });
        break;
      case 'assistant':
        if (message.toolCalls && message.toolCalls.length > 0) {
          mapped.push({
            role: 'assistant',
            content: message.content || null,
            tool_calls: message.toolCalls.map(call => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.name, arguments: call.arguments },
            })),
          });
        } else {
          mapped.push({ role: 'assistant', content: message.content });
        }
        break;
      case 'tool':
        if (message.toolCallId) {
          mapped.push({ role: 'tool', tool_call_id: message.toolCallId, content: message.content });
        } else {
          mapped.push({ role: 'user', content: `[tool] ${message.content}` });
        }
        break;
    }
  }

  return mapped;
}

function toUsage(usage: ChatCompletion['usage']): TokenUsage {
  if (!usage) {
    return ZERO_USAGE;
  }
  return {
    promptTokens: usage.prompt_tokens ?? 0,
    completionTokens: usage.completion_tokens ?? 0,
    totalTokens: usage.total_tokens ?? 0,
  };
}

/**
 * Adapter for vendors speaking the OpenAI chat-completions dialect (OpenAI,
 * xAI, DeepSeek). Bearer-token authentication.
 */
export class OpenAICompatibleProvider implements ILLMProvider {
  readonly wireFormat = 'openai' as const;
  private client?: OpenAI;
  private readonly logger: ILogger;

  constructor(
    private readonly config: ProviderConfig,
    private readonly deps: ProviderDeps
  ) {
    this.logger = deps.logger.child(config.id);
  }

  get id(): string {
    return this.config.id;
  }

  get name(): string {
    return this.config.displayName;
  }

  isConfigured(): boolean {
    return this.config.credential !== '';
  }

  getModel(): string {
    return this.config.defaultModel;
  }

  availableModels(): ModelCatalog {
    return this.config.modelCatalog;
  }

  maxContextLength(modelId?: string): number {
    return lookupContextLength(this.config, modelId || this.getModel());
  }

  countTokens(text: string): number {
    return estimateTokens(text);
  }

  async validateCredential(): Promise<ProviderResult<true>> {
    if (!this.isConfigured()) {
      return err(new NotConfiguredError(this.name, 'No API key provided.'));
    }
    const result = await this.chat([{ role: 'user', content: 'Hello' }], { maxTokens: 10 });
    return result.ok ? ok(true) : result;
  }

  async chat(messages: readonly ChatMessage[], options?: ChatOptions): Promise<ProviderResult<ChatResult>> {
    const response = await this.send(messages, [], options);
    if (!response.ok) {
      return response;
    }

    const { completion, model } = response.value;
    const content = completion.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      return err(new InvalidResponseError(this.name, completion));
    }

    const usage = await this.recordUsage(completion);
    return ok({ kind: 'content', content, usage, model: completion.model || model });
  }

  async chatWithTools(
    messages: readonly ChatMessage[],
    tools: readonly ToolSpec[],
    options?: ChatOptions
  ): Promise<ProviderResult<ChatResult>> {
    const response = await this.send(messages, tools, options);
    if (!response.ok) {
      return response;
    }

    const { completion, model } = response.value;
    const message = completion.choices?.[0]?.message;
    if (!message) {
      return err(new InvalidResponseError(this.name, completion));
    }

    const usage = await this.recordUsage(completion);
    const resolvedModel = completion.model || model;
    const toolCalls: ToolCall[] = (message.tool_calls ?? [])
      .filter(call => call.type === 'function')
      .map(call => ({
        id: call.id,
        name: call.function.name,
        arguments: normalizeArguments(call.function.arguments),
      }));

    if (toolCalls.length > 0) {
      return ok({ kind: 'toolCalls', content: message.content ?? '', toolCalls, usage, model: resolvedModel });
    }
    return ok({ kind: 'content', content: message.content ?? '', usage, model: resolvedModel });
  }

  private async send(
    messages: readonly ChatMessage[],
    tools: readonly ToolSpec[],
    options?: ChatOptions
  ): Promise<ProviderResult<{ completion: ChatCompletion; model: string }>> {
    if (!this.isConfigured()) {
      return err(new NotConfiguredError(this.name));
    }

    const resolved = resolveOptions(options);
    const model = resolved.model ?? this.getModel();
    const request: ChatCompletionCreateParamsNonStreaming = {
      model,
      messages: toOpenAIMessages(messages, resolved.systemPrompt),
      temperature: resolved.temperature,
      max_tokens: resolved.maxTokens,
      ...(tools.length > 0 ? { tools: toOpenAITools(tools), tool_choice: 'auto' as const } : {}),
    };

    this.logger.debug(`${this.name} chat completion request`, {
      model,
      messageCount: request.messages.length,
      toolCount: tools.length,
    });

    try {
      const completion = await this.getClient().chat.completions.create(request, {
        timeout: resolved.timeoutSeconds * 1000,
      });
      return ok({ completion, model });
    } catch (error) {
      const failure = this.toProviderError(error);
      this.logger.error(`${this.name} chat completion failed`, failure);
      return err(failure);
    }
  }

  private async recordUsage(completion: ChatCompletion): Promise<TokenUsage> {
    const usage = toUsage(completion.usage);
    await this.deps.ledger.record(this.id, usage);
    return usage;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.config.credential,
        baseURL: trimTrailingSlash(this.config.baseUrl),
        maxRetries: 0,
      });
    }
    return this.client;
  }

  private toProviderError(error: unknown): ProviderError {
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new NetworkError(`Request to ${this.name} timed out.`, this.id, error);
    }
    if (error instanceof OpenAI.APIError && typeof error.status === 'number') {
      const body: unknown = error.error ?? null;
      return new ApiError(vendorErrorMessage(body) ?? statusMessage(error.status), this.id, error.status, body);
    }
    const cause = error instanceof Error ? error : undefined;
    return new NetworkError(`Request to ${this.name} failed: ${cause?.message ?? String(error)}`, this.id, cause);
  }
}
