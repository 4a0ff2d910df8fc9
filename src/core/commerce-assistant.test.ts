import { describe, it, expect, beforeEach } from 'vitest';
import { CommerceAssistant, PendingTurn, failureMessage } from './commerce-assistant.js';
import { ConfirmationStore } from './confirmation-store.js';
import { ToolInvocationLoop } from './tool-invocation-loop.js';
import { UsageLedger } from './usage-ledger.js';
import { InMemorySettingsStore } from '../api/config-manager.js';
import { MemoryAuditSink } from '../audit/logger-audit-sink.js';
import { ApiError, InvalidProviderError, NetworkError, ToolLoopExceededError } from '../errors/index.js';
import { LLMProviderFactory } from '../factories/llm-provider.factory.js';
import { ProviderResult } from '../interfaces/llm_provider.interface.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { ChatResult } from '../types/index.js';
import { CredentialCipher } from '../utils/credential-cipher.js';
import { err } from '../utils/result.js';
import { RecordingLogger } from '../testing/recording-logger.js';
import { StubProvider, textReply, toolReply } from '../testing/stub-provider.js';

const DELETE_CALL = { id: 'call_1', name: 'delete_coupon', arguments: '{"code":"SPRING10"}' };

describe('CommerceAssistant', () => {
  let settings: InMemorySettingsStore;
  let logger: RecordingLogger;
  let deletions: Array<Record<string, unknown>>;
  let confirmations: ConfirmationStore<PendingTurn>;

  function makeAssistant(script: ProviderResult<ChatResult>[]) {
    const provider = new StubProvider(script);
    const factory = new LLMProviderFactory({
      store: settings,
      cipher: new CredentialCipher('test-secret'),
      ledger: new UsageLedger(),
      logger,
    });
    factory.registerProvider('stub', () => provider);

    const registry = new ToolRegistry(new MemoryAuditSink());
    registry.register('delete_coupon', {
      description: 'Delete a coupon.',
      callback: args => {
        deletions.push(args);
        return { success: true, message: 'Coupon deleted.' };
      },
      destructive: true,
    });

    const assistant = new CommerceAssistant({
      factory,
      loop: new ToolInvocationLoop(registry, logger),
      settings,
      confirmations,
      logger,
    });
    return { assistant, provider };
  }

  beforeEach(() => {
    settings = new InMemorySettingsStore({ ai_provider: 'stub' });
    logger = new RecordingLogger();
    deletions = [];
    confirmations = new ConfirmationStore<PendingTurn>();
  });

  it('returns the final answer of a completed turn', async () => {
    const { assistant } = makeAssistant([textReply('You have 3 open orders.')]);

    const reply = await assistant.chat([{ role: 'user', content: 'how many open orders?' }]);

    expect(reply).toEqual({
      status: 'completed',
      content: 'You have 3 open orders.',
      toolResults: [],
      model: 'stub-model',
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    });
  });

  it('passes stored model settings and the system prompt to the provider', async () => {
    await settings.set('ai_model', 'stub-large');
    await settings.set('ai_temperature', '0.2');
    await settings.set('ai_max_tokens', '512');
    const { assistant, provider } = makeAssistant([textReply('Hi')]);

    await assistant.chat([{ role: 'user', content: 'Hi' }], { systemPrompt: 'Be brief.' });

    expect(provider.calls[0]?.options).toEqual({
      model: 'stub-large',
      systemPrompt: 'Be brief.',
      temperature: 0.2,
      maxTokens: 512,
    });
  });

  it('ignores unparsable numeric settings', async () => {
    await settings.set('ai_temperature', 'warm');
    await settings.set('ai_max_tokens', '-4');
    const { assistant, provider } = makeAssistant([textReply('Hi')]);

    await assistant.chat([{ role: 'user', content: 'Hi' }]);

    expect(provider.calls[0]?.options).toEqual({ model: null, systemPrompt: null });
  });

  it('asks for confirmation and runs the paused batch once confirmed', async () => {
    const { assistant } = makeAssistant([toolReply(DELETE_CALL), textReply('SPRING10 is gone.')]);

    const paused = await assistant.chat([{ role: 'user', content: 'delete coupon SPRING10' }]);

    if (paused.status !== 'confirmation_required') {
      throw new Error('expected a confirmation request');
    }
    expect(paused.token).toMatch(/^[0-9a-f]{64}$/);
    expect(paused.pendingCalls).toEqual([DELETE_CALL]);
    expect(paused.summary).toBe('Confirm before running: delete_coupon({"code":"SPRING10"})');
    expect(paused.expiresIn).toBe(300);
    expect(deletions).toEqual([]);

    const confirmed = await assistant.confirm(paused.token);

    expect(confirmed.status).toBe('completed');
    expect(confirmed.status === 'completed' && confirmed.content).toBe('SPRING10 is gone.');
    expect(deletions).toEqual([{ code: 'SPRING10' }]);

    const replayed = await assistant.confirm(paused.token);
    expect(replayed).toEqual({
      status: 'failed',
      message: 'This confirmation has expired. Please try again.',
      code: 'confirmation_expired',
    });
  });

  it('drops a cancelled confirmation without running it', async () => {
    const { assistant } = makeAssistant([toolReply(DELETE_CALL), textReply('Done.')]);
    const paused = await assistant.chat([{ role: 'user', content: 'delete coupon SPRING10' }]);
    if (paused.status !== 'confirmation_required') {
      throw new Error('expected a confirmation request');
    }

    expect(assistant.cancel(paused.token)).toBe(true);
    expect(assistant.cancel(paused.token)).toBe(false);
    expect((await assistant.confirm(paused.token)).status).toBe('failed');
    expect(deletions).toEqual([]);
  });

  it('runs destructive tools directly when the turn is authorized', async () => {
    const { assistant } = makeAssistant([toolReply(DELETE_CALL), textReply('Deleted.')]);

    const reply = await assistant.chat([{ role: 'user', content: 'delete coupon SPRING10' }], {
      authorizeDestructive: true,
    });

    expect(reply.status).toBe('completed');
    expect(deletions).toEqual([{ code: 'SPRING10' }]);
    expect(confirmations.size).toBe(0);
  });

  it('turns a provider error into a failed reply and logs it', async () => {
    const { assistant } = makeAssistant([err(new ApiError('Rate limit reached.', 'stub', 429, null))]);

    const reply = await assistant.chat([{ role: 'user', content: 'Hi' }]);

    expect(reply).toEqual({
      status: 'failed',
      message: 'The AI provider returned an error: Rate limit reached.',
      code: 'api_error',
    });
    expect(logger.messages('error')).toEqual(['Chat turn failed']);
  });

  it('fails when the selected provider is unknown', async () => {
    await settings.set('ai_provider', 'acme');
    const { assistant } = makeAssistant([textReply('unused')]);

    const reply = await assistant.chat([{ role: 'user', content: 'Hi' }]);

    expect(reply).toEqual({ status: 'failed', message: 'Invalid AI provider: acme', code: 'invalid_provider' });
  });
});

describe('failureMessage', () => {
  it('hides transport details behind user-facing text', () => {
    expect(failureMessage(new NetworkError('Request to OpenAI timed out.', 'openai'))).toBe(
      'Could not reach the AI provider. Please try again.'
    );
    expect(failureMessage(new ToolLoopExceededError(5))).toBe(
      'The assistant could not finish this request. Please try rephrasing it.'
    );
    expect(failureMessage(new InvalidProviderError('acme'))).toBe('Invalid AI provider: acme');
  });
});
