import test from 'node:test';
import assert from 'node:assert/strict';
import { AIService, extractCompletionText, type CompletionModel } from './ai.service.js';
import type { WarehouseBind, WarehouseClient, WarehouseResult } from '../../core/warehouse-client.js';

class RecordingClient implements WarehouseClient {
  readonly calls: Array<{ sql: string; binds?: WarehouseBind[] }> = [];

  constructor(private readonly response: unknown) {}

  async query(sql: string, binds?: WarehouseBind[]): Promise<WarehouseResult> {
    this.calls.push({ sql, binds });
    return { columns: ['response'], rows: [{ response: this.response }] };
  }
}

function failingModel(message: string): CompletionModel {
  return {
    complete: async () => {
      throw new Error(message);
    }
  };
}

test('extractCompletionText handles every response shape', () => {
  assert.equal(extractCompletionText('Use a clustering key.'), 'Use a clustering key.');
  assert.equal(extractCompletionText({ choices: [{ message: { content: 'from message' } }] }), 'from message');
  assert.equal(extractCompletionText({ choices: [{ text: 'from text' }] }), 'from text');
  assert.equal(extractCompletionText({ content: 'top content' }), 'top content');
  assert.equal(extractCompletionText({ text: 'top text' }), 'top text');
  assert.equal(extractCompletionText({ usage: { tokens: 3 } }), '{\n  "usage": {\n    "tokens": 3\n  }\n}');
  assert.equal(extractCompletionText(null), null);
  assert.equal(extractCompletionText(undefined), null);
  assert.equal(extractCompletionText('   '), null);
});

test('generateSuggestions calls COMPLETE with bound model and prompt, then caches', async () => {
  const client = new RecordingClient('Reduce the warehouse size.');
  const service = new AIService();

  const first = await service.generateSuggestions('user-1', client, 'prompt text', 'claude-3-5-sonnet');
  const second = await service.generateSuggestions('user-1', client, 'prompt text', 'claude-3-5-sonnet');

  assert.deepEqual(first, { status: 'ok', suggestions: 'Reduce the warehouse size.', cached: false });
  assert.deepEqual(second, { status: 'ok', suggestions: 'Reduce the warehouse size.', cached: true });
  assert.equal(client.calls.length, 1);
  assert.equal(client.calls[0].sql, 'SELECT SNOWFLAKE.CORTEX.COMPLETE(?, ?) AS response');
  assert.deepEqual(client.calls[0].binds, ['claude-3-5-sonnet', 'prompt text']);

  await service.generateSuggestions('user-1', client, 'prompt text', 'mistral-large');
  assert.equal(client.calls.length, 2);

  const stats = service.getCacheStats();
  assert.equal(stats.requests, 3);
  assert.equal(stats.hits, 1);
  assert.equal(stats.misses, 2);
  assert.equal(stats.cachedItems, 2);
});

test('generateSuggestions degrades without a session', async () => {
  const service = new AIService();
  const result = await service.generateSuggestions('user-1', null, 'prompt text', 'claude-3-5-sonnet');
  assert.deepEqual(result, { status: 'unavailable', suggestions: null, reason: 'No active connection' });
});

test('generateSuggestions reports a disabled Cortex feature', async () => {
  const service = new AIService({ model: failingModel("SQL compilation error: Unknown function SNOWFLAKE.CORTEX.COMPLETE") });
  const result = await service.generateSuggestions('user-1', new RecordingClient(null), 'prompt', 'claude-3-5-sonnet');
  assert.deepEqual(result, {
    status: 'unavailable',
    suggestions: null,
    reason: 'Cortex AI is disabled or not authorized for the current role'
  });
});

test('generateSuggestions degrades on empty responses and other failures without caching', async () => {
  const emptyClient = new RecordingClient('');
  const service = new AIService();

  const empty = await service.generateSuggestions('user-1', emptyClient, 'prompt', 'claude-3-5-sonnet');
  assert.deepEqual(empty, { status: 'unavailable', suggestions: null, reason: 'No response from Cortex AI' });
  assert.equal(service.getCacheStats().cachedItems, 0);

  const broken = new AIService({ model: failingModel('Network timeout') });
  const failed = await broken.generateSuggestions('user-1', emptyClient, 'prompt', 'claude-3-5-sonnet');
  assert.deepEqual(failed, { status: 'unavailable', suggestions: null, reason: 'Cortex AI call failed: Network timeout' });
});
