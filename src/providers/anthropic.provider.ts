import Anthropic from '@anthropic-ai/sdk';
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
import { toAnthropicTools } from '../tools/tool-format.js';
import { err, ok } from '../utils/result.js';
import {
  ProviderDeps,
  collectSystemPrompt,
  decodeArguments,
  estimateTokens,
  lookupContextLength,
  resolveOptions,
  statusMessage,
  trimTrailingSlash,
  vendorErrorMessage,
  ZERO_USAGE,
} from './provider.shared.js';

export interface AnthropicRequestParts {
  readonly system: string | undefined;
  readonly messages: Anthropic.MessageParam[];
}

/**
 * System content moves to the top-level `system` field. Consecutive tool
 * results collapse into a single user turn of `tool_result` blocks.
 */
export function toAnthropicMessages(
  messages: readonly ChatMessage[],
  systemPrompt: string | null
): AnthropicRequestParts {
  const system = collectSystemPrompt(messages, systemPrompt);
  const mapped: Anthropic.MessageParam[] = [];
  let pendingResults: Anthropic.ToolResultBlockParam[] = [];

  const flushResults = (): void => {
    if (pendingResults.length > 0) {
      mapped.push({ role: 'user', content: pendingResults });
      pendingResults = [];
    }
  };

  for (const message of messages) {
    if (message.role === 'tool' && message.toolCallId) {
      pendingResults.push({ type: 'tool_result', tool_use_id: message.toolCallId, content: message.content });
      continue;
    }
    flushResults();

    switch (message.role) {
      case 'system':
        break;
      case 'user':
        mapped.push({ role: 'user', content: message.content });
        break;
      case 'tool':
        mapped.push({ role: 'user', content: `[tool] ${message.content}` });
        break;
      case 'assistant': {
        if (!message.toolCalls || message.toolCalls.length === 0) {
          mapped.push({ role: 'assistant', content: message.content });
          break;
        }
        const blocks: Array<Anthropic.TextBlockParam | Anthropic.ToolUseBlockParam> = [];
        if (message.content) {
          blocks.push({ type: 'text', text: message.content });
        }
        for (const call of message.toolCalls) {
          blocks.push({
            type: 'tool_use',
            id: call.id,
            name: call.name,
            input: decodeArguments(call.arguments) ?? {},
          });
        }
        mapped.push({ role: 'assistant', content: blocks });
        break;
      }
    }
  }
  flushResults();

  return { system: system || undefined, messages: mapped };
}

function toUsage(usage: Anthropic.Usage | undefined): TokenUsage {
  if (!usage) {
    return ZERO_USAGE;
  }
  const promptTokens = usage.input_tokens ?? 0;
  const completionTokens = usage.output_tokens ?? 0;
  return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
}

/** Anthropic Messages API; authenticates with the `x-api-key` header. */
export class AnthropicProvider implements ILLMProvider {
  readonly wireFormat = 'anthropic' as const;
  private client?: Anthropic;
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

    const message = response.value;
    const first = message.content?.[0];
    if (!first || first.type !== 'text') {
      return err(new InvalidResponseError(this.name, message));
    }

    const usage = await this.recordUsage(message);
    return ok({ kind: 'content', content: first.text, usage, model: message.model });
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

    const message = response.value;
    if (!Array.isArray(message.content)) {
      return err(new InvalidResponseError(this.name, message));
    }

    const usage = await this.recordUsage(message);
    const text: string[] = [];
    const toolCalls: ToolCall[] = [];
    for (const block of message.content) {
      if (block.type === 'text') {
        text.push(block.text);
      } else if (block.type === 'tool_use') {
        toolCalls.push({ id: block.id, name: block.name, arguments: JSON.stringify(block.input ?? {}) });
      }
    }

    const content = text.join('\n');
    if (toolCalls.length > 0) {
      return ok({ kind: 'toolCalls', content, toolCalls, usage, model: message.model });
    }
    return ok({ kind: 'content', content, usage, model: message.model });
  }

  private async send(
    messages: readonly ChatMessage[],
    tools: readonly ToolSpec[],
    options?: ChatOptions
  ): Promise<ProviderResult<Anthropic.Message>> {
    if (!this.isConfigured()) {
      return err(new NotConfiguredError(this.name));
    }

    const resolved = resolveOptions(options);
    const model = resolved.model ?? this.getModel();
    const { system, messages: mapped } = toAnthropicMessages(messages, resolved.systemPrompt);
    const request: Anthropic.MessageCreateParamsNonStreaming = {
      model,
      max_tokens: resolved.maxTokens,
      temperature: resolved.temperature,
      messages: mapped,
      ...(system ? { system } : {}),
      ...(tools.length > 0 ? { tools: toAnthropicTools(tools) } : {}),
    };

    this.logger.debug(`${this.name} messages request`, {
      model,
      messageCount: mapped.length,
      toolCount: tools.length,
    });

    try {
      const message = await this.getClient().messages.create(request, {
        timeout: resolved.timeoutSeconds * 1000,
      });
      return ok({ ...message, model: message.model || model });
    } catch (error) {
      const failure = this.toProviderError(error);
      this.logger.error(`${this.name} messages request failed`, failure);
      return err(failure);
    }
  }

  private async recordUsage(message: Anthropic.Message): Promise<TokenUsage> {
    const usage = toUsage(message.usage);
    await this.deps.ledger.record(this.id, usage);
    return usage;
  }

  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({
        apiKey: this.config.credential,
        baseURL: trimTrailingSlash(this.config.baseUrl),
        maxRetries: 0,
      });
    }
    return this.client;
  }

  private toProviderError(error: unknown): ProviderError {
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return new NetworkError(`Request to ${this.name} timed out.`, this.id, error);
    }
    if (error instanceof Anthropic.APIError && typeof error.status === 'number') {
      const body: unknown = error.error ?? null;
      return new ApiError(vendorErrorMessage(body) ?? statusMessage(error.status), this.id, error.status, body);
    }
    const cause = error instanceof Error ? error : undefined;
    return new NetworkError(`Request to ${this.name} failed: ${cause?.message ?? String(error)}`, this.id, cause);
  }
}
