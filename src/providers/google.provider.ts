import crypto from 'crypto';
import type { Content, Part } from '@google/generative-ai';
import { z } from 'zod';
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
import { GeminiFunctionDeclaration, toGeminiFunctionDeclarations } from '../tools/tool-format.js';
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
} from './provider.shared.js';

export interface GeminiRequest {
  readonly contents: Content[];
  readonly systemInstruction?: { readonly parts: Part[] };
  readonly generationConfig: { readonly temperature: number; readonly maxOutputTokens: number };
  readonly tools?: Array<{ readonly function_declarations: GeminiFunctionDeclaration[] }>;
}

const GeminiPartSchema = z
  .object({
    text: z.string().optional(),
    functionCall: z
      .object({
        name: z.string(),
        args: z.record(z.unknown()).optional(),
      })
      .optional(),
  })
  .passthrough();

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(GeminiPartSchema).default([]) }).optional(),
      })
    )
    .min(1),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
  modelVersion: z.string().optional(),
});

type GeminiResponse = z.infer<typeof GeminiResponseSchema>;

export const FALLBACK_FUNCTION_NAME = 'function_result';

/** Gemini assigns no ids to function calls; ours follow the `call_` convention. */
export function generateCallId(): string {
  return `call_${crypto.randomBytes(12).toString('hex')}`;
}

/**
 * `assistant` becomes `model`, content becomes typed parts, and system text
 * goes to `systemInstruction`. Function results are matched by name, so a
 * result's name comes from the message itself or from the call it answers.
 */
export function toGeminiRequestParts(
  messages: readonly ChatMessage[],
  systemPrompt: string | null
): Pick<GeminiRequest, 'contents' | 'systemInstruction'> {
  const system = collectSystemPrompt(messages, systemPrompt);
  const callNames = new Map<string, string>();
  const contents: Content[] = [];
  let pendingResults: Part[] = [];

  const flushResults = (): void => {
    if (pendingResults.length > 0) {
      contents.push({ role: 'function', parts: pendingResults });
      pendingResults = [];
    }
  };

  for (const message of messages) {
    if (message.role === 'tool') {
      const name =
        message.toolName ??
        (message.toolCallId ? callNames.get(message.toolCallId) : undefined) ??
        FALLBACK_FUNCTION_NAME;
      pendingResults.push({ functionResponse: { name, response: { result: message.content } } });
      continue;
    }
    flushResults();

    switch (message.role) {
      case 'system':
        break;
      case 'user':
        contents.push({ role: 'user', parts: [{ text: message.content }] });
        break;
      case 'assistant': {
        const parts: Part[] = [];
        if (message.content) {
          parts.push({ text: message.content });
        }
        for (const call of message.toolCalls ?? []) {
          callNames.set(call.id, call.name);
          parts.push({ functionCall: { name: call.name, args: decodeArguments(call.arguments) ?? {} } });
        }
        if (parts.length === 0) {
          parts.push({ text: '' });
        }
        contents.push({ role: 'model', parts });
        break;
      }
    }
  }
  flushResults();

  return system ? { contents, systemInstruction: { parts: [{ text: system }] } } : { contents };
}

function toUsage(response: GeminiResponse): TokenUsage {
  const metadata = response.usageMetadata;
  return {
    promptTokens: metadata?.promptTokenCount ?? 0,
    completionTokens: metadata?.candidatesTokenCount ?? 0,
    totalTokens: metadata?.totalTokenCount ?? 0,
  };
}

/** Gemini generateContent over plain HTTPS; the key travels as the `key` query parameter. */
export class GoogleProvider implements ILLMProvider {
  readonly wireFormat = 'google' as const;
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

    const { body, model } = response.value;
    const text = body.candidates[0]?.content?.parts[0]?.text;
    if (typeof text !== 'string') {
      return err(new InvalidResponseError(this.name, body));
    }

    const usage = await this.recordUsage(body);
    return ok({ kind: 'content', content: text, usage, model: body.modelVersion ?? model });
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

    const { body, model } = response.value;
    const usage = await this.recordUsage(body);
    const resolvedModel = body.modelVersion ?? model;

    let content = '';
    const toolCalls: ToolCall[] = [];
    for (const part of body.candidates[0]?.content?.parts ?? []) {
      if (part.functionCall) {
        toolCalls.push({
          id: generateCallId(),
          name: part.functionCall.name,
          arguments: JSON.stringify(part.functionCall.args ?? {}),
        });
      } else if (typeof part.text === 'string') {
        content += part.text;
      }
    }

    if (toolCalls.length > 0) {
      return ok({ kind: 'toolCalls', content, toolCalls, usage, model: resolvedModel });
    }
    return ok({ kind: 'content', content, usage, model: resolvedModel });
  }

  private async send(
    messages: readonly ChatMessage[],
    tools: readonly ToolSpec[],
    options?: ChatOptions
  ): Promise<ProviderResult<{ body: GeminiResponse; model: string }>> {
    if (!this.isConfigured()) {
      return err(new NotConfiguredError(this.name));
    }

    const resolved = resolveOptions(options);
    const model = resolved.model ?? this.getModel();
    const request: GeminiRequest = {
      ...toGeminiRequestParts(messages, resolved.systemPrompt),
      generationConfig: { temperature: resolved.temperature, maxOutputTokens: resolved.maxTokens },
      ...(tools.length > 0 ? { tools: [{ function_declarations: toGeminiFunctionDeclarations(tools) }] } : {}),
    };

    this.logger.debug(`${this.name} generateContent request`, {
      model,
      messageCount: request.contents.length,
      toolCount: tools.length,
    });

    const url =
      `${trimTrailingSlash(this.config.baseUrl)}/models/${encodeURIComponent(model)}:generateContent` +
      `?key=${encodeURIComponent(this.config.credential)}`;

    let res: Response;
    let raw: string;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(resolved.timeoutSeconds * 1000),
      });
      raw = await res.text();
    } catch (error) {
      const failure = this.toNetworkError(error);
      this.logger.error(`${this.name} generateContent failed`, failure);
      return err(failure);
    }

    const body = parseJson(raw);
    if (!res.ok) {
      const failure = new ApiError(vendorErrorMessage(body) ?? statusMessage(res.status), this.id, res.status, body);
      this.logger.error(`${this.name} generateContent failed`, failure);
      return err(failure);
    }

    const parsed = GeminiResponseSchema.safeParse(body);
    if (!parsed.success) {
      return err(new InvalidResponseError(this.name, body));
    }
    return ok({ body: parsed.data, model });
  }

  private async recordUsage(body: GeminiResponse): Promise<TokenUsage> {
    const usage = toUsage(body);
    await this.deps.ledger.record(this.id, usage);
    return usage;
  }

  private toNetworkError(error: unknown): ProviderError {
    const cause = error instanceof Error ? error : undefined;
    if (cause?.name === 'TimeoutError') {
      return new NetworkError(`Request to ${this.name} timed out.`, this.id, cause);
    }
    return new NetworkError(`Request to ${this.name} failed: ${cause?.message ?? String(error)}`, this.id, cause);
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}
