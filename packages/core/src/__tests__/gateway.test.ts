import { describe, it, expect, vi } from 'vitest';
import { ConfigSchema } from '../config/schema.js';
import { GatewayError } from '../errors.js';
import { createGateway } from '../gateway.js';
import { CompletionOrchestrator } from '../orchestrator.js';
import { ProviderRegistry } from '../providers/registry.js';
import type { FetchLike } from '../transport/http.js';
import type { ChatEvent, ChatRequest } from '../types/chat.js';
import type { ModelConfig, Provider } from '../types/provider.js';

function chat(model: string): ChatRequest {
  return { model, messages: [{ role: 'user', content: 'hi' }], stream: false };
}

function fakeProvider(id: string, models: string[], events: ChatEvent[]): Provider {
  return {
    identity: { id, name: id, baseUrl: `http://${id}.test`, transport: 'http-sse' },
    models: models.map((model): ModelConfig => ({ id: model, capabilities: ['chat'], enabled: true })),
    supportsModel: (modelId) => models.includes(modelId),
    async *submit(_request, options) {
      for (const event of events) {
        if (options?.signal?.aborted) return;
        yield event;
      }
    },
  };
}

describe('gateway routing', () => {
  function gateway() {
    const fetch = vi.fn<FetchLike>();
    const config = ConfigSchema.parse({
      providers: {
        deepseek: { token: 'test-secret', models: [{ id: 'deepseek-chat', alias: 'ds' }, { id: 'deepseek-r1', enabled: false }] },
        zhipu: { token: 'test-secret' },
        kimi: { token: '   ' },
        qwen: { token: 'test-secret', enabled: false },
      },
    });
    return { fetch, ...createGateway(config, { fetch }) };
  }

  it('only routes to enabled providers that have a token', () => {
    const { registry } = gateway();
    expect(registry.list().map((identity) => identity.id)).toEqual(['deepseek', 'zhipu']);
  });

  it('resolves exact ids and aliases first', () => {
    const { registry } = gateway();
    expect(registry.resolve('deepseek-chat').identity.id).toBe('deepseek');
    expect(registry.resolve('ds').identity.id).toBe('deepseek');
    expect(registry.resolve('glm-4-plus').identity.id).toBe('zhipu');
  });

  it('falls back to family keywords and assistant ids', () => {
    const { registry } = gateway();
    expect(registry.resolve('DeepSeek-V4').identity.id).toBe('deepseek');
    expect(registry.resolve('ds-lite').identity.id).toBe('deepseek');
    expect(registry.resolve('GLM-9').identity.id).toBe('zhipu');
    expect(registry.resolve('65940acff94777010aa6b796').identity.id).toBe('zhipu');
  });

  it('rejects models of disabled providers and unknown names without any I/O', () => {
    const { orchestrator, fetch } = gateway();
    for (const model of ['kimi', 'qwen3-max', 'gpt-4o']) {
      let caught: unknown;
      try {
        orchestrator.stream(chat(model));
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(GatewayError);
      expect(caught).toMatchObject({ kind: 'UnknownModel', message: `Model not found: ${model}` });
    }
    expect(fetch).not.toHaveBeenCalled();
  });

  it('lists enabled models with their provider', () => {
    const { registry } = gateway();
    const ids = registry.listModels().map(({ model, provider }) => `${provider.id}:${model.alias ?? model.id}`);
    expect(ids.slice(0, 2)).toEqual(['deepseek:ds', 'zhipu:zhipu']);
    expect(ids).not.toContain('deepseek:deepseek-r1');
    expect(ids).toHaveLength(11);
  });
});

describe('ProviderRegistry', () => {
  it('builds providers lazily and only once', () => {
    const create = vi.fn(() => fakeProvider('alpha', ['alpha-1'], []));
    const registry = new ProviderRegistry();
    registry.register({ id: 'alpha', enabled: true, keywords: ['alpha'], create });

    expect(create).not.toHaveBeenCalled();
    registry.resolve('alpha-1');
    registry.resolve('ALPHA-2');
    expect(registry.get('alpha')?.identity.id).toBe('alpha');
    expect(create).toHaveBeenCalledTimes(1);
    expect(registry.get('missing')).toBeUndefined();
  });

  it('builds only the provider a model resolves to when entries list their models', () => {
    const models = (ids: string[]) => ids.map((id): ModelConfig => ({ id, capabilities: ['chat'], enabled: true }));
    const alpha = vi.fn(() => fakeProvider('alpha', ['alpha-1'], []));
    const beta = vi.fn(() => fakeProvider('beta', ['beta-1'], []));
    const registry = new ProviderRegistry();
    registry.register({ id: 'alpha', enabled: true, keywords: [], models: models(['alpha-1']), create: alpha });
    registry.register({ id: 'beta', enabled: true, keywords: [], models: models(['beta-1']), create: beta });

    expect(registry.resolve('beta-1').identity.id).toBe('beta');
    expect(alpha).not.toHaveBeenCalled();
    expect(beta).toHaveBeenCalledTimes(1);
  });

  it('prefers an exact match over an earlier keyword match', () => {
    const registry = new ProviderRegistry();
    registry.register({ id: 'first', enabled: true, keywords: ['shared'], create: () => fakeProvider('first', [], []) });
    registry.register({ id: 'second', enabled: true, keywords: [], create: () => fakeProvider('second', ['shared-model'], []) });

    expect(registry.resolve('shared-model').identity.id).toBe('second');
    expect(registry.resolve('shared-other').identity.id).toBe('first');
  });
});

describe('CompletionOrchestrator', () => {
  function orchestratorWith(events: ChatEvent[]) {
    const registry = new ProviderRegistry();
    registry.register({ id: 'fake', enabled: true, keywords: [], create: () => fakeProvider('fake', ['fake-1'], events) });
    return new CompletionOrchestrator(registry, { now: () => 1_700_000_123_456 });
  }

  it('folds events into one completion', async () => {
    const orchestrator = orchestratorWith([
      { type: 'reasoning', text: 'think ' },
      { type: 'answer', text: 'Hel' },
      { type: 'reasoning', text: 'more' },
      { type: 'answer', text: 'lo' },
      { type: 'finish', reason: 'length' },
    ]);

    const completion = await orchestrator.complete(chat('fake-1'));

    expect(completion).toEqual({
      id: expect.stringMatching(/^chatcmpl-[0-9a-f]{8}$/),
      model: 'fake-1',
      created: 1_700_000_123,
      text: 'Hello',
      reasoning: 'think more',
      finishReason: 'length',
    });
  });

  it('leaves reasoning out when there was none', async () => {
    const completion = await orchestratorWith([
      { type: 'answer', text: 'ok' },
      { type: 'finish', reason: 'completed' },
    ]).complete(chat('fake-1'));

    expect(completion).not.toHaveProperty('reasoning');
    expect(completion.text).toBe('ok');
  });

  it('raises the error event as a GatewayError', async () => {
    const orchestrator = orchestratorWith([
      { type: 'answer', text: 'partial' },
      { type: 'error', kind: 'UpstreamTimeout', message: 'No data from upstream for 10ms' },
    ]);

    await expect(orchestrator.complete(chat('fake-1'))).rejects.toMatchObject({
      kind: 'UpstreamTimeout',
      message: 'No data from upstream for 10ms',
    });
  });

  it('reports a cancelled request', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(orchestratorWith([{ type: 'answer', text: 'x' }]).complete(chat('fake-1'), { signal: controller.signal })).rejects.toMatchObject({
      kind: 'UpstreamTransportError',
      message: 'Request cancelled by caller',
    });
  });

  it('relays events unchanged when streaming', async () => {
    const events: ChatEvent[] = [
      { type: 'answer', text: 'a' },
      { type: 'finish', reason: 'completed' },
    ];
    const seen: ChatEvent[] = [];
    for await (const event of orchestratorWith(events).stream(chat('fake-1'))) seen.push(event);
    expect(seen).toEqual(events);
  });
});
