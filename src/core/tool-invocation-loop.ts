import { ILLMProvider } from '../interfaces/llm_provider.interface.js';
import { ILogger } from '../interfaces/logger.interface.js';
import { ProviderError, ToolLoopExceededError } from '../errors/index.js';
import {
  ChatMessage,
  ChatOptions,
  Result,
  TokenUsage,
  ToolCall,
  ToolResult,
} from '../types/index.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { decodeArguments, ZERO_USAGE } from '../providers/provider.shared.js';
import { err, ok } from '../utils/result.js';

export const DEFAULT_MAX_ITERATIONS = 5;

export interface ToolLoopOptions {
  /** Upper bound on model calls for one run. */
  readonly maxIterations?: number;
  readonly authorizeDestructive?: boolean;
  /** Run a batch concurrently when every call is non-destructive and names a distinct tool. */
  readonly parallel?: boolean;
  readonly chatOptions?: ChatOptions;
}

interface LoopProgress {
  readonly conversation: readonly ChatMessage[];
  readonly toolResults: readonly ToolResult[];
  readonly usage: TokenUsage;
  readonly iterations: number;
  readonly model: string;
}

export interface ToolLoopCompleted extends LoopProgress {
  readonly kind: 'done';
  readonly content: string;
}

/** Destructive calls are waiting for authorization; none of the batch has run. */
export interface ToolLoopConfirmationRequired extends LoopProgress {
  readonly kind: 'confirmation_required';
  readonly pendingCalls: readonly ToolCall[];
}

export type ToolLoopOutcome = ToolLoopCompleted | ToolLoopConfirmationRequired;

export type ToolLoopError = ProviderError | ToolLoopExceededError;

export type ToolLoopResult = Result<ToolLoopOutcome, ToolLoopError>;

function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    promptTokens: a.promptTokens + b.promptTokens,
    completionTokens: a.completionTokens + b.completionTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  };
}

/**
 * Drives a conversation through repeated model calls until the model answers
 * in text. Tool calls run in the order the model returned them.
 */
export class ToolInvocationLoop {
  private readonly logger: ILogger;

  constructor(
    private readonly registry: ToolRegistry,
    logger: ILogger,
    private readonly defaultMaxIterations = DEFAULT_MAX_ITERATIONS
  ) {
    this.logger = logger.child('loop');
  }

  run(
    provider: ILLMProvider,
    messages: readonly ChatMessage[],
    options: ToolLoopOptions = {}
  ): Promise<ToolLoopResult> {
    return this.iterate(provider, {
      conversation: [...messages],
      toolResults: [],
      usage: ZERO_USAGE,
      iterations: 0,
      model: provider.getModel(),
    }, options);
  }

  /**
   * Executes the pending calls of a paused run as authorized, then continues
   * with a fresh iteration budget.
   */
  async resume(
    provider: ILLMProvider,
    paused: ToolLoopConfirmationRequired,
    options: ToolLoopOptions = {}
  ): Promise<ToolLoopResult> {
    this.logger.info('Resuming after confirmation', {
      provider: provider.id,
      calls: paused.pendingCalls.map(call => call.name),
    });

    const conversation = [...paused.conversation];
    const toolResults = [...paused.toolResults];
    await this.executeBatch(paused.pendingCalls, conversation, toolResults, options.parallel ?? false);

    return this.iterate(provider, {
      conversation,
      toolResults,
      usage: paused.usage,
      iterations: paused.iterations,
      model: paused.model,
    }, options);
  }

  private async iterate(
    provider: ILLMProvider,
    start: LoopProgress,
    options: ToolLoopOptions
  ): Promise<ToolLoopResult> {
    const maxIterations = options.maxIterations ?? this.defaultMaxIterations;
    const tools = this.registry.catalog();
    const conversation = [...start.conversation];
    const toolResults = [...start.toolResults];
    let usage = start.usage;
    let iterations = start.iterations;
    let model = start.model;

    for (let call = 1; call <= maxIterations; call++) {
      const response = await provider.chatWithTools(conversation, tools, options.chatOptions);
      iterations++;
      if (!response.ok) {
        return response;
      }

      const reply = response.value;
      usage = addUsage(usage, reply.usage);
      model = reply.model;

      if (reply.kind === 'content') {
        conversation.push({ role: 'assistant', content: reply.content });
        this.logger.debug('Loop finished', { iterations, toolResults: toolResults.length });
        return ok({ kind: 'done', content: reply.content, conversation, toolResults, usage, iterations, model });
      }

      if (call === maxIterations) {
        break;
      }

      conversation.push({ role: 'assistant', content: reply.content, toolCalls: reply.toolCalls });

      const gated = reply.toolCalls.filter(toolCall => this.registry.isDestructive(toolCall.name));
      if (gated.length > 0 && !options.authorizeDestructive) {
        this.logger.info('Destructive tool calls need confirmation', {
          calls: gated.map(toolCall => toolCall.name),
        });
        return ok({
          kind: 'confirmation_required',
          pendingCalls: reply.toolCalls,
          conversation,
          toolResults,
          usage,
          iterations,
          model,
        });
      }

      await this.executeBatch(reply.toolCalls, conversation, toolResults, options.parallel ?? false);
    }

    this.logger.warn('Tool loop exceeded its bound', { maxIterations });
    return err(new ToolLoopExceededError(maxIterations));
  }

  private async executeBatch(
    calls: readonly ToolCall[],
    conversation: ChatMessage[],
    toolResults: ToolResult[],
    parallel: boolean
  ): Promise<void> {
    const results = parallel && this.canRunConcurrently(calls)
      ? await Promise.all(calls.map(call => this.executeCall(call)))
      : await this.executeSequentially(calls);

    for (const result of results) {
      toolResults.push(result);
      conversation.push({
        role: 'tool',
        content: result.content,
        toolCallId: result.toolCallId,
        toolName: result.name,
      });
    }
  }

  private async executeSequentially(calls: readonly ToolCall[]): Promise<ToolResult[]> {
    const results: ToolResult[] = [];
    for (const call of calls) {
      results.push(await this.executeCall(call));
    }
    return results;
  }

  private canRunConcurrently(calls: readonly ToolCall[]): boolean {
    const names = new Set(calls.map(call => call.name));
    return names.size === calls.length && calls.every(call => !this.registry.isDestructive(call.name));
  }

  private async executeCall(call: ToolCall): Promise<ToolResult> {
    const args = decodeArguments(call.arguments);
    if (!args) {
      return {
        toolCallId: call.id,
        name: call.name,
        content: JSON.stringify({ success: false, message: `Invalid arguments for tool "${call.name}": expected a JSON object.` }),
        isError: true,
      };
    }

    const result = await this.registry.execute(call.name, args);
    if (!result.ok) {
      return {
        toolCallId: call.id,
        name: call.name,
        content: JSON.stringify({ success: false, message: result.error.message }),
        isError: true,
      };
    }

    return {
      toolCallId: call.id,
      name: call.name,
      content: JSON.stringify(result.value),
      isError: result.value?.success === false,
    };
  }
}
