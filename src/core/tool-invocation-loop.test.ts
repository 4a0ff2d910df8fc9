import { describe, it, expect, beforeEach } from 'vitest';
import { ToolInvocationLoop } from './tool-invocation-loop.js';
import { MemoryAuditSink } from '../audit/logger-audit-sink.js';
import { ApiError, ToolLoopExceededError } from '../errors/index.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { StubProvider, textReply, toolReply } from '../testing/stub-provider.js';
import { Logger } from '../utils/logger.js';
import { err } from '../utils/result.js';

const UPDATE_CALL = { id: 'call_1', name: 'update_setting', arguments: '{"settingId":"guest_checkout","value":"no"}' };
const DELETE_CALL = { id: 'call_2', name: 'delete_product', arguments: '{"productId":42}' };

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('ToolInvocationLoop', () => {
  let audit: MemoryAuditSink;
  let registry: ToolRegistry;
  let loop: ToolInvocationLoop;
  let updates: Array<Record<string, unknown>>;
  let deletions: Array<Record<string, unknown>>;

  beforeEach(() => {
    audit = new MemoryAuditSink();
    registry = new ToolRegistry(audit);
    loop = new ToolInvocationLoop(registry, new Logger('silent'));
    updates = [];
    deletions = [];

    registry.register('update_setting', {
      description: 'Update a store setting.',
      callback: args => {
        updates.push(args);
        return { success: true, message: 'Updated guest_checkout.' };
      },
    });
    registry.register('delete_product', {
      description: 'Delete a product.',
      callback: args => {
        deletions.push(args);
        return { success: true, message: 'Deleted.' };
      },
      destructive: true,
    });
  });

  it('runs a tool, resubmits the result and returns the final text', async () => {
    const provider = new StubProvider([toolReply(UPDATE_CALL), textReply('Guest checkout is now disabled.')]);

    const result = await loop.run(provider, [{ role: 'user', content: 'disable guest checkout' }]);

    expect(result.ok).toBe(true);
    if (!result.ok || result.value.kind !== 'done') {
      throw new Error('expected a finished loop');
    }
    expect(result.value.content).toBe('Guest checkout is now disabled.');
    expect(result.value.toolResults).toEqual([
      {
        toolCallId: 'call_1',
        name: 'update_setting',
        content: '{"success":true,"message":"Updated guest_checkout."}',
        isError: false,
      },
    ]);
    expect(result.value.iterations).toBe(2);
    expect(result.value.usage).toEqual({ promptTokens: 20, completionTokens: 10, totalTokens: 30 });
    expect(updates).toEqual([{ settingId: 'guest_checkout', value: 'no' }]);

    expect(provider.calls).toHaveLength(2);
    expect(provider.calls[0]?.tools.map(tool => tool.name)).toEqual(['update_setting', 'delete_product']);
    expect(provider.calls[1]?.messages).toEqual([
      { role: 'user', content: 'disable guest checkout' },
      { role: 'assistant', content: '', toolCalls: [UPDATE_CALL] },
      {
        role: 'tool',
        content: '{"success":true,"message":"Updated guest_checkout."}',
        toolCallId: 'call_1',
        toolName: 'update_setting',
      },
    ]);
  });

  it('pauses the whole batch when it contains an unauthorized destructive call', async () => {
    const provider = new StubProvider([toolReply(UPDATE_CALL, DELETE_CALL), textReply('Done.')]);

    const result = await loop.run(provider, [{ role: 'user', content: 'turn off guest checkout and delete product 42' }]);

    expect(result.ok).toBe(true);
    if (!result.ok || result.value.kind !== 'confirmation_required') {
      throw new Error('expected a confirmation request');
    }
    expect(result.value.pendingCalls).toEqual([UPDATE_CALL, DELETE_CALL]);
    expect(result.value.toolResults).toEqual([]);
    expect(updates).toEqual([]);
    expect(deletions).toEqual([]);
    expect(audit.events).toEqual([]);
    expect(provider.calls).toHaveLength(1);

    const resumed = await loop.resume(provider, result.value);

    expect(resumed.ok).toBe(true);
    if (!resumed.ok || resumed.value.kind !== 'done') {
      throw new Error('expected a finished loop');
    }
    expect(resumed.value.content).toBe('Done.');
    expect(resumed.value.toolResults.map(toolResult => toolResult.name)).toEqual(['update_setting', 'delete_product']);
    expect(resumed.value.iterations).toBe(2);
    expect(deletions).toEqual([{ productId: 42 }]);
    expect(provider.calls[1]?.messages.map(message => message.role)).toEqual(['user', 'assistant', 'tool', 'tool']);
  });

  it('executes destructive calls when the turn is pre-authorized', async () => {
    const provider = new StubProvider([toolReply(DELETE_CALL), textReply('Deleted product 42.')]);

    const result = await loop.run(provider, [{ role: 'user', content: 'delete product 42' }], {
      authorizeDestructive: true,
    });

    expect(result.ok && result.value.kind).toBe('done');
    expect(deletions).toEqual([{ productId: 42 }]);
  });

  it('stops with ToolLoopExceeded after exactly the configured number of model calls', async () => {
    const provider = new StubProvider([toolReply(UPDATE_CALL)]);

    const result = await loop.run(provider, [{ role: 'user', content: 'loop forever' }]);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ToolLoopExceededError);
      expect(result.error.message).toBe('Tool loop did not finish after 5 model calls.');
    }
    expect(provider.calls).toHaveLength(5);
    expect(updates).toHaveLength(4);
  });

  it('honours a custom iteration bound', async () => {
    const provider = new StubProvider([toolReply(UPDATE_CALL)]);

    const result = await loop.run(provider, [{ role: 'user', content: 'loop forever' }], { maxIterations: 3 });

    expect(result.ok).toBe(false);
    expect(provider.calls).toHaveLength(3);
  });

  it('returns the provider error unchanged', async () => {
    const failure = new ApiError('Rate limit reached.', 'stub', 429, null);
    const provider = new StubProvider([err(failure)]);

    const result = await loop.run(provider, [{ role: 'user', content: 'Hi' }]);

    expect(result).toEqual({ ok: false, error: failure });
  });

  it('feeds undecodable arguments back to the model as an error result', async () => {
    const provider = new StubProvider([
      toolReply({ id: 'call_9', name: 'update_setting', arguments: 'not json' }),
      textReply('Sorry, let me try again.'),
    ]);

    const result = await loop.run(provider, [{ role: 'user', content: 'disable guest checkout' }]);

    if (!result.ok || result.value.kind !== 'done') {
      throw new Error('expected a finished loop');
    }
    expect(result.value.toolResults).toEqual([
      {
        toolCallId: 'call_9',
        name: 'update_setting',
        content: JSON.stringify({
          success: false,
          message: 'Invalid arguments for tool "update_setting": expected a JSON object.',
        }),
        isError: true,
      },
    ]);
    expect(updates).toEqual([]);
  });

  it('reports an unknown tool to the model instead of aborting', async () => {
    const provider = new StubProvider([
      toolReply({ id: 'call_3', name: 'ghost', arguments: '{}' }),
      textReply('That tool does not exist.'),
    ]);

    const result = await loop.run(provider, [{ role: 'user', content: 'do something' }]);

    if (!result.ok || result.value.kind !== 'done') {
      throw new Error('expected a finished loop');
    }
    expect(result.value.toolResults[0]).toEqual({
      toolCallId: 'call_3',
      name: 'ghost',
      content: JSON.stringify({ success: false, message: 'Tool "ghost" not found.' }),
      isError: true,
    });
  });

  it('returns schema violations to the model without running the tool', async () => {
    const refunds: Array<Record<string, unknown>> = [];
    registry.register('refund_order', {
      parameterSchema: { type: 'object', properties: { orderId: { type: 'integer' } }, required: ['orderId'] },
      callback: args => {
        refunds.push(args);
        return { success: true };
      },
    });
    const provider = new StubProvider([
      toolReply({ id: 'call_r', name: 'refund_order', arguments: '{}' }),
      textReply('Which order should I refund?'),
    ]);

    const result = await loop.run(provider, [{ role: 'user', content: 'refund my order' }]);

    if (!result.ok || result.value.kind !== 'done') {
      throw new Error('expected a finished loop');
    }
    expect(result.value.toolResults).toEqual([
      {
        toolCallId: 'call_r',
        name: 'refund_order',
        content: JSON.stringify({ success: false, message: 'Missing required parameter: orderId' }),
        isError: true,
      },
    ]);
    expect(refunds).toEqual([]);
  });

  it('passes an empty tool payload back as null', async () => {
    registry.register('clear_cache', { callback: () => null });
    const provider = new StubProvider([
      toolReply({ id: 'call_c', name: 'clear_cache', arguments: '{}' }),
      textReply('Cache cleared.'),
    ]);

    const result = await loop.run(provider, [{ role: 'user', content: 'clear the cache' }]);

    if (!result.ok || result.value.kind !== 'done') {
      throw new Error('expected a finished loop');
    }
    expect(result.value.toolResults).toEqual([
      { toolCallId: 'call_c', name: 'clear_cache', content: 'null', isError: false },
    ]);
  });

  describe('parallel mode', () => {
    let events: string[];

    beforeEach(() => {
      events = [];
      for (const [name, delay] of [['slow_report', 20], ['fast_report', 5]] as const) {
        registry.register(name, {
          callback: async () => {
            events.push(`${name}:start`);
            await sleep(delay);
            events.push(`${name}:end`);
            return { success: true, message: name };
          },
        });
      }
    });

    const SLOW = { id: 'call_a', name: 'slow_report', arguments: '{}' };
    const FAST = { id: 'call_b', name: 'fast_report', arguments: '{}' };

    it('runs independent calls concurrently and keeps model order in the results', async () => {
      const provider = new StubProvider([toolReply(SLOW, FAST), textReply('Reports ready.')]);

      const result = await loop.run(provider, [{ role: 'user', content: 'reports' }], { parallel: true });

      expect(events).toEqual(['slow_report:start', 'fast_report:start', 'fast_report:end', 'slow_report:end']);
      if (!result.ok || result.value.kind !== 'done') {
        throw new Error('expected a finished loop');
      }
      expect(result.value.toolResults.map(toolResult => toolResult.toolCallId)).toEqual(['call_a', 'call_b']);
    });

    it('runs sequentially by default', async () => {
      const provider = new StubProvider([toolReply(SLOW, FAST), textReply('Reports ready.')]);

      await loop.run(provider, [{ role: 'user', content: 'reports' }]);

      expect(events).toEqual(['slow_report:start', 'slow_report:end', 'fast_report:start', 'fast_report:end']);
    });

    it('falls back to sequential execution when a tool name repeats', async () => {
      const provider = new StubProvider([
        toolReply(SLOW, { ...SLOW, id: 'call_c' }),
        textReply('Reports ready.'),
      ]);

      await loop.run(provider, [{ role: 'user', content: 'reports' }], { parallel: true });

      expect(events).toEqual(['slow_report:start', 'slow_report:end', 'slow_report:start', 'slow_report:end']);
    });
  });
});
