import {
  ApiError,
  AssistantError,
  ErrorCode,
  NetworkError,
  ToolLoopExceededError,
} from '../errors/index.js';
import { ILLMProvider } from '../interfaces/llm_provider.interface.js';
import { ILogger } from '../interfaces/logger.interface.js';
import { ISettingsStore } from '../interfaces/settings_store.interface.js';
import { LLMProviderFactory } from '../factories/llm-provider.factory.js';
import { ChatMessage, ChatOptions, TokenUsage, ToolCall, ToolResult } from '../types/index.js';
import { ConfirmationStore } from './confirmation-store.js';
import { SETTING_KEYS } from './settings-keys.js';
import {
  ToolInvocationLoop,
  ToolLoopConfirmationRequired,
  ToolLoopOptions,
  ToolLoopResult,
} from './tool-invocation-loop.js';

export interface AssistantChatOptions {
  readonly authorizeDestructive?: boolean;
  readonly systemPrompt?: string;
}

export type AssistantReply =
  | {
      readonly status: 'completed';
      readonly content: string;
      readonly toolResults: readonly ToolResult[];
      readonly model: string;
      readonly usage: TokenUsage;
    }
  | {
      readonly status: 'confirmation_required';
      readonly token: string;
      readonly pendingCalls: readonly ToolCall[];
      readonly summary: string;
      readonly expiresIn: number;
    }
  | {
      readonly status: 'failed';
      readonly message: string;
      readonly code: ErrorCode;
    };

export interface PendingTurn {
  readonly provider: ILLMProvider;
  readonly paused: ToolLoopConfirmationRequired;
  readonly options: ToolLoopOptions;
}

export interface CommerceAssistantDeps {
  readonly factory: LLMProviderFactory;
  readonly loop: ToolInvocationLoop;
  readonly settings: ISettingsStore;
  readonly confirmations: ConfirmationStore<PendingTurn>;
  readonly logger: ILogger;
}

function describeCall(call: ToolCall): string {
  return `${call.name}(${call.arguments})`;
}

/** Message shown to the user in place of an unrecoverable error. */
export function failureMessage(error: AssistantError): string {
  if (error instanceof ApiError) {
    return `The AI provider returned an error: ${error.message}`;
  }
  if (error instanceof NetworkError) {
    return 'Could not reach the AI provider. Please try again.';
  }
  if (error instanceof ToolLoopExceededError) {
    return 'The assistant could not finish this request. Please try rephrasing it.';
  }
  return error.message;
}

/** Entry point for one chat turn against the configured provider and tool set. */
export class CommerceAssistant {
  private readonly logger: ILogger;

  constructor(private readonly deps: CommerceAssistantDeps) {
    this.logger = deps.logger.child('assistant');
  }

  async chat(messages: readonly ChatMessage[], options: AssistantChatOptions = {}): Promise<AssistantReply> {
    const created = await this.deps.factory.getConfiguredProvider();
    if (!created.ok) {
      return this.fail(created.error);
    }

    const provider = created.value;
    const loopOptions: ToolLoopOptions = {
      authorizeDestructive: options.authorizeDestructive ?? false,
      chatOptions: await this.chatOptions(options.systemPrompt),
    };

    this.logger.debug('Chat turn', { provider: provider.id, messages: messages.length });
    const result = await this.deps.loop.run(provider, messages, loopOptions);
    return this.toReply(provider, result, loopOptions);
  }

  async confirm(token: string): Promise<AssistantReply> {
    const taken = this.deps.confirmations.take(token);
    if (!taken.ok) {
      return this.fail(taken.error);
    }

    const { provider, paused, options } = taken.value;
    const result = await this.deps.loop.resume(provider, paused, options);
    return this.toReply(provider, result, options);
  }

  cancel(token: string): boolean {
    const discarded = this.deps.confirmations.discard(token);
    if (discarded) {
      this.logger.info('Pending action cancelled');
    }
    return discarded;
  }

  private toReply(provider: ILLMProvider, result: ToolLoopResult, options: ToolLoopOptions): AssistantReply {
    if (!result.ok) {
      return this.fail(result.error);
    }

    const outcome = result.value;
    if (outcome.kind === 'done') {
      return {
        status: 'completed',
        content: outcome.content,
        toolResults: outcome.toolResults,
        model: outcome.model,
        usage: outcome.usage,
      };
    }

    const token = this.deps.confirmations.create({ provider, paused: outcome, options });
    return {
      status: 'confirmation_required',
      token,
      pendingCalls: outcome.pendingCalls,
      summary: `Confirm before running: ${outcome.pendingCalls.map(describeCall).join(', ')}`,
      expiresIn: this.deps.confirmations.ttlSeconds,
    };
  }

  private async chatOptions(systemPrompt: string | undefined): Promise<ChatOptions> {
    const { settings } = this.deps;
    const model = await settings.get(SETTING_KEYS.model, '');
    const temperature = Number.parseFloat(await settings.get(SETTING_KEYS.temperature, ''));
    const maxTokens = Number.parseInt(await settings.get(SETTING_KEYS.maxTokens, ''), 10);

    return {
      model: model || null,
      systemPrompt: systemPrompt ?? null,
      ...(Number.isFinite(temperature) ? { temperature } : {}),
      ...(Number.isInteger(maxTokens) && maxTokens > 0 ? { maxTokens } : {}),
    };
  }

  private fail(error: AssistantError): AssistantReply {
    this.logger.error('Chat turn failed', error, { code: error.code });
    return { status: 'failed', message: failureMessage(error), code: error.code };
  }
}
