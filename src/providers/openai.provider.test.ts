import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { OpenAICompatibleProvider, toOpenAIMessages } from './openai.provider.js';
import { DEEPSEEK_PROVIDER, OPENAI_PROVIDER, XAI_PROVIDER } from './catalogs/index.js';
import { UsageLedger } from '../core/usage-ledger.js';
import { ApiError, InvalidResponseError, NetworkError, NotConfiguredError } from '../errors/index.js';
import { ProviderDescriptor } from '../types/index.js';
import { Logger } from '../utils/logger.js';
import { MockVendorServer } from '../testing/mock-vendor-server.js';

const server = new MockVendorServer();
let baseUrl: string;

beforeAll(async () => {
  baseUrl = await server.start();
});

afterAll(() => server.stop());

beforeEach(() => {
  server.reset();
});

function makeProvider(credential = 'test-key', descriptor: ProviderDescriptor = OPENAI_PROVIDER) {
  const ledger = new UsageLedger();
  const provider = new OpenAICompatibleProvider(
    { ...descriptor, baseUrl: `${baseUrl}/v1`, credential },
    { ledger, logger: new Logger('silent') }
  );
  return { provider, ledger };
}

function completion(message: Record<string, unknown>, usage = { prompt_tokens: 12, completion_tokens: 5, total_tokens: 17 }) {
  return {
    id: 'chatcmpl-1',
    object: 'chat.completion',
    created: 1700000000,
    model: 'gpt-4o-2024-08-06',
    choices: [{ index: 0, message, finish_reason: 'stop' }],
    usage,
  };
}

describe('toOpenAIMessages', () => {
  it('puts every system message plus the systemPrompt option into one leading message', () => {
    const mapped = toOpenAIMessages(
      [
        { role: 'system', content: 'You are a store assistant.' },
        { role: 'user', content: 'Hi' },
        { role: 'system', content: 'Prices are in EUR.' },
      ],
      'Answer briefly.'
    );

    expect(mapped).toEqual([
      { role: 'system', content: 'You are a store assistant.\n\nPrices are in EUR.\n\nAnswer briefly.' },
      { role: 'user', content: 'Hi' },
    ]);
  });

  it('omits the system message when there is no system content', () => {
    expect(toOpenAIMessages([{ role: 'user', content: 'Hi' }], null)).toEqual([{ role: 'user', content: 'Hi' }]);
  });

  it('turns a tool message without a call id into a user message', () => {
    expect(toOpenAIMessages([{ role: 'tool', content: '{"success":true}' }], null)).toEqual([
      { role: 'user', content: '[tool] {"success":true}' },
    ]);
  });
});

describe('OpenAICompatibleProvider', () => {
  it('sends a bearer-authenticated completion and records usage', async () => {
    server.reply({ body: completion({ role: 'assistant', content: 'Hello!' }) });
    const { provider, ledger } = makeProvider();

    const result = await provider.chat(
      [
        { role: 'system', content: 'You are a store assistant.' },
        { role: 'user', content: 'Hi' },
      ],
      { systemPrompt: 'Answer briefly.' }
    );

    expect(result).toEqual({
      ok: true,
      value: {
        kind: 'content',
        content: 'Hello!',
        usage: { promptTokens: 12, completionTokens: 5, totalTokens: 17 },
        model: 'gpt-4o-2024-08-06',
      },
    });

    const request = server.lastRequest();
    expect(request.method).toBe('POST');
    expect(request.url).toBe('/v1/chat/completions');
    expect(request.headers.authorization).toBe('Bearer test-key');
    expect(request.body).toEqual({
      model: 'gpt-4o',
      messages: [
        { role: 'system', content: 'You are a store assistant.\n\nAnswer briefly.' },
        { role: 'user', content: 'Hi' },
      ],
      temperature: 0.7,
      max_tokens: 2048,
    });

    expect(ledger.get('openai')).toEqual({ promptTokens: 12, completionTokens: 5, totalTokens: 17, requestCount: 1 });
  });

  it('encodes tools, replays earlier tool calls and decodes new ones', async () => {
    server.reply({
      body: completion({
        role: 'assistant',
        content: null,
        tool_calls: [
          {
            id: 'call_1',
            type: 'function',
            function: { name: 'update_setting', arguments: '{"settingId": "guest_checkout", "value": "no"}' },
          },
        ],
      }),
    });
    const { provider } = makeProvider();

    const result = await provider.chatWithTools(
      [
        { role: 'user', content: 'disable guest checkout' },
        {
          role: 'assistant',
          content: '',
          toolCalls: [{ id: 'call_0', name: 'get_setting', arguments: '{"settingId":"guest_checkout"}' }],
        },
        { role: 'tool', content: '{"success":true,"value":"yes"}', toolCallId: 'call_0', toolName: 'get_setting' },
      ],
      [{ name: 'get_setting', description: 'Read a setting.', parameterSchema: {} }],
      { model: 'gpt-4o-mini', temperature: 0.2 }
    );

    expect(result).toEqual({
      ok: true,
      value: {
        kind: 'toolCalls',
        content: '',
        toolCalls: [{ id: 'call_1', name: 'update_setting', arguments: '{"settingId":"guest_checkout","value":"no"}' }],
        usage: { promptTokens: 12, completionTokens: 5, totalTokens: 17 },
        model: 'gpt-4o-2024-08-06',
      },
    });

    expect(server.lastRequest().body).toEqual({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'user', content: 'disable guest checkout' },
        {
          role: 'assistant',
          content: null,
          tool_calls: [
            { id: 'call_0', type: 'function', function: { name: 'get_setting', arguments: '{"settingId":"guest_checkout"}' } },
          ],
        },
        { role: 'tool', tool_call_id: 'call_0', content: '{"success":true,"value":"yes"}' },
      ],
      temperature: 0.2,
      max_tokens: 2048,
      tools: [
        {
          type: 'function',
          function: { name: 'get_setting', description: 'Read a setting.', parameters: { type: 'object', properties: {} } },
        },
      ],
      tool_choice: 'auto',
    });
  });

  it('returns plain content from chatWithTools when the model calls nothing', async () => {
    server.reply({ body: completion({ role: 'assistant', content: 'Nothing to do.' }) });
    const { provider } = makeProvider();

    const result = await provider.chatWithTools([{ role: 'user', content: 'Hi' }], []);

    expect(result.ok && result.value.kind).toBe('content');
    expect(server.lastRequest().body).not.toHaveProperty('tools');
  });

  it('reports the vendor message and status of a failed request', async () => {
    server.reply({ status: 401, body: { error: { message: 'Incorrect API key provided.', type: 'invalid_request_error' } } });
    const { provider, ledger } = makeProvider('bad-key');

    const result = await provider.chat([{ role: 'user', content: 'Hi' }]);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ApiError);
      expect(result.error.message).toBe('Incorrect API key provided.');
      expect(result.error instanceof ApiError && result.error.statusCode).toBe(401);
    }
    expect(ledger.get('openai').requestCount).toBe(0);
  });

  it('falls back to a generic message when the error body has none', async () => {
    server.reply({ status: 500, body: {} });
    const { provider } = makeProvider();

    const result = await provider.chat([{ role: 'user', content: 'Hi' }]);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('API request failed with status code 500.');
    }
    expect(server.requests).toHaveLength(1);
  });

  it('rejects a response without a text reply', async () => {
    server.reply({ body: { id: 'chatcmpl-1', object: 'chat.completion', model: 'gpt-4o', choices: [] } });
    const { provider } = makeProvider();

    const result = await provider.chat([{ role: 'user', content: 'Hi' }]);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidResponseError);
      expect(result.error.message).toBe('Invalid response from OpenAI API.');
    }
  });

  it('does not call the vendor without a credential', async () => {
    const { provider } = makeProvider('');

    const result = await provider.chat([{ role: 'user', content: 'Hi' }]);

    expect(provider.isConfigured()).toBe(false);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(NotConfiguredError);
      expect(result.error.message).toBe('OpenAI provider is not configured. Please add your API key.');
    }
    expect(server.requests).toHaveLength(0);
  });

  it('maps an unreachable endpoint to a network error', async () => {
    const provider = new OpenAICompatibleProvider(
      { ...OPENAI_PROVIDER, baseUrl: 'http://127.0.0.1:1/v1', credential: 'test-key' },
      { ledger: new UsageLedger(), logger: new Logger('silent') }
    );

    const result = await provider.chat([{ role: 'user', content: 'Hi' }]);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(NetworkError);
    }
  });

  it('validates a credential with a ten-token completion', async () => {
    server.reply({ body: completion({ role: 'assistant', content: 'Hi' }) });
    const { provider } = makeProvider();

    await expect(provider.validateCredential()).resolves.toEqual({ ok: true, value: true });
    expect(server.lastRequest().body).toMatchObject({
      messages: [{ role: 'user', content: 'Hello' }],
      max_tokens: 10,
    });
  });

  it('serves xAI and DeepSeek through the same dialect', async () => {
    server.reply({ body: completion({ role: 'assistant', content: 'Grok here.' }) });
    const { provider, ledger } = makeProvider('test-key', XAI_PROVIDER);

    const result = await provider.chat([{ role: 'user', content: 'Hi' }]);

    expect(result.ok).toBe(true);
    expect(server.lastRequest().body).toMatchObject({ model: 'grok-4-fast-non-reasoning' });
    expect(ledger.get('xai').requestCount).toBe(1);
    expect(makeProvider('test-key', DEEPSEEK_PROVIDER).provider.getModel()).toBe('deepseek-chat');
  });

  it('looks up context lengths with a per-vendor fallback', () => {
    const { provider } = makeProvider();

    expect(provider.maxContextLength()).toBe(128000);
    expect(provider.maxContextLength('gpt-4.1')).toBe(1048576);
    expect(provider.maxContextLength('unknown-model')).toBe(8192);
    expect(makeProvider('test-key', XAI_PROVIDER).provider.maxContextLength('unknown-model')).toBe(131072);
    expect(makeProvider('test-key', DEEPSEEK_PROVIDER).provider.maxContextLength('unknown-model')).toBe(64000);
  });

  it('estimates four characters per token', () => {
    expect(makeProvider().provider.countTokens('abcdefghi')).toBe(3);
  });
});
