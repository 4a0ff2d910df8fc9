import { z } from 'zod';
import {
  ChatMessage,
  ChatOptions,
  ProviderDescriptor,
  ResolvedChatOptions,
  TokenUsage,
} from '../types/index.js';
import { ToolArgumentsSchema } from '../utils/validation.js';
import { ILogger } from '../interfaces/logger.interface.js';
import { UsageLedger } from '../core/usage-ledger.js';

export interface ProviderDeps {
  readonly ledger: UsageLedger;
  readonly logger: ILogger;
}

export const DEFAULT_CHAT_OPTIONS: ResolvedChatOptions = {
  model: null,
  temperature: 0.7,
  maxTokens: 2048,
  systemPrompt: null,
  timeoutSeconds: 60,
};

export const ZERO_USAGE: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

export function resolveOptions(options: ChatOptions = {}): ResolvedChatOptions {
  return {
    model: options.model || DEFAULT_CHAT_OPTIONS.model,
    temperature: options.temperature ?? DEFAULT_CHAT_OPTIONS.temperature,
    maxTokens: options.maxTokens ?? DEFAULT_CHAT_OPTIONS.maxTokens,
    systemPrompt: options.systemPrompt || DEFAULT_CHAT_OPTIONS.systemPrompt,
    timeoutSeconds: options.timeoutSeconds ?? DEFAULT_CHAT_OPTIONS.timeoutSeconds,
  };
}

/**
 * All system-role contents in conversation order, then the `systemPrompt`
 * option, joined by a blank line. Empty string when there is none.
 */
export function collectSystemPrompt(messages: readonly ChatMessage[], systemPrompt: string | null): string {
  const parts = messages
    .filter(m => m.role === 'system' && m.content.trim() !== '')
    .map(m => m.content);
  if (systemPrompt) {
    parts.push(systemPrompt);
  }
  return parts.join('\n\n');
}

export function lookupContextLength(descriptor: ProviderDescriptor, model: string): number {
  return descriptor.modelCatalog[model]?.contextLength ?? descriptor.defaultContextLength;
}

/** Rough estimate: about four characters per token for English text. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/** Decodes a JSON argument blob into an object; blank input is an empty object. */
export function decodeArguments(raw: string): Record<string, unknown> | null {
  if (raw.trim() === '') {
    return {};
  }
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = ToolArgumentsSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/** Canonical argument encoding; undecodable input is passed through for the loop to reject. */
export function normalizeArguments(raw: string): string {
  const decoded = decodeArguments(raw);
  return decoded ? JSON.stringify(decoded) : raw;
}

const NestedErrorSchema = z.object({ error: z.object({ message: z.string().min(1) }) });
const FlatErrorSchema = z.object({ message: z.string().min(1) });

/** Pulls the vendor's own error message out of an error body, if it carries one. */
export function vendorErrorMessage(body: unknown): string | undefined {
  const nested = NestedErrorSchema.safeParse(body);
  if (nested.success) {
    return nested.data.error.message;
  }
  const flat = FlatErrorSchema.safeParse(body);
  return flat.success ? flat.data.message : undefined;
}

export function statusMessage(statusCode: number): string {
  return `API request failed with status code ${statusCode}.`;
}

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
