import { describe, it, expect } from 'vitest';
import {
  CompletionOrchestrator,
  ConfigSchema,
  ProviderRegistry,
  SessionStore,
  silentLogger,
  type ChatEvent,
  type ChatRequest,
  type Gateway,
  type ModelConfig,
  type Provider,
} from '@chatbridge/core';
import { createApp } from '../index.js';

const NOW = 1_700_000_000_000;

interface Harness {
  app: ReturnType<typeof createApp>;
  requests: ChatRequest[];
}

function harness(events: ChatEvent[], reasoningFormat: 'inline' | 'field' = 'inline'): Harness {
  const requests: ChatRequest[] = [];
  const models = ['fake-1', 'fake-2'];
  const provider: Provider = {
    identity: { id: 'fake', name: 'Fake', baseUrl: 'http://fake.test', transport: 'http-sse' },
    models: models.map((id): ModelConfig => ({ id, capabilities: ['chat'], enabled: true })),
    supportsModel: (modelId) => models.includes(modelId),
    async *submit(request) {
      requests.push(request);
      yield* events;
    },
  };

  const registry = new ProviderRegistry();
  registry.register({ id: 'fake', enabled: true, keywords: ['fake'], create: () => provider });
  const config = ConfigSchema.parse({ gateway: { reasoningFormat } });
  const gateway: Gateway = {
    config,
    sessions: new SessionStore({ rawCredential: () => undefined }),
    registry,
    orchestrator: new CompletionOrchestrator(registry, { now: () => NOW }),
  };

  const app = createApp({ config, gateway, gatewayOptions: { now: () => NOW }, logger: silentLogger });
  return { app, requests };
}

function post(app: Harness['app'], body: unknown): Promise<Response> | Response {
  return app.request('/v1/chat/completions', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

function sseData(text: string): unknown[] {
  return text
    .split('\n\n')
    .filter((block) => block.startsWith('data: '))
    .map((block) => block.slice('data: '.length))
    .map((data) => (data === '[DONE]' ? data : JSON.parse(data)));
}

const reply: ChatEvent[] = [
  { type: 'reasoning', text: 'a>b' },
  { type: 'answer', text: 'Hello' },
  { type: 'finish', reason: 'completed' },
];

describe('server', () => {
  it('answers health checks', async () => {
    const res = await harness([]).app.request('/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  describe('GET /v1/models', () => {
    it('lists the models of enabled providers', async () => {
      const res = await harness([]).app.request('/v1/models');
      expect(await res.json()).toEqual({
        object: 'list',
        data: [
          { id: 'fake-1', object: 'model', created: 1_700_000_000, owned_by: 'fake' },
          { id: 'fake-2', object: 'model', created: 1_700_000_000, owned_by: 'fake' },
        ],
      });
    });

    it('looks up a single model', async () => {
      const { app } = harness([]);
      expect(await (await app.request('/v1/models/fake-2')).json()).toMatchObject({ id: 'fake-2', owned_by: 'fake' });

      const missing = await app.request('/v1/models/nope');
      expect(missing.status).toBe(404);
      expect(await missing.json()).toEqual({
        error: { message: 'Model not found: nope', type: 'invalid_request_error', code: 'UnknownModel' },
      });
    });
  });

  describe('POST /v1/chat/completions', () => {
    it('rejects bodies that do not match the schema', async () => {
      const { app, requests } = harness(reply);

      const missingModel = await post(app, { messages: [{ role: 'user', content: 'hi' }] });
      expect(missingModel.status).toBe(400);
      expect(await missingModel.json()).toEqual({
        error: { message: 'Invalid request body at model: Required', type: 'invalid_request_error', code: 'invalid_body' },
      });

      const notJson = await post(app, '{oops');
      expect(notJson.status).toBe(400);
      expect(await notJson.json()).toMatchObject({
        error: { message: 'Invalid request body: Expected object, received null', code: 'invalid_body' },
      });
      expect(requests).toEqual([]);
    });

    it('returns 404 for an unknown model in both modes', async () => {
      const { app } = harness(reply);
      const expected = {
        error: { message: 'Model not found: gpt-4o', type: 'invalid_request_error', code: 'UnknownModel' },
      };

      for (const stream of [false, true]) {
        const res = await post(app, { model: 'gpt-4o', stream, messages: [{ role: 'user', content: 'hi' }] });
        expect(res.status).toBe(404);
        expect(await res.json()).toEqual(expected);
      }
    });

    it('returns a completion with inline reasoning', async () => {
      const { app, requests } = harness(reply);

      const res = await post(app, {
        model: 'fake-1',
        temperature: 0.2,
        stop: 'END',
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: 'hi ' },
              { type: 'image_url' },
              { type: 'text', text: 'there' },
            ],
          },
        ],
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        id: expect.stringMatching(/^chatcmpl-[0-9a-f]{8}$/),
        object: 'chat.completion',
        created: 1_700_000_000,
        model: 'fake-1',
        choices: [{ index: 0, message: { role: 'assistant', content: '<think:a\\>b>Hello' }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 2, completion_tokens: 2, total_tokens: 4 },
      });
      expect(requests).toEqual([
        {
          model: 'fake-1',
          stream: false,
          messages: [{ role: 'user', content: 'hi there' }],
          params: { temperature: 0.2, topP: undefined, maxTokens: undefined, stop: ['END'] },
        },
      ]);
    });

    it('puts reasoning in its own field when configured', async () => {
      const res = await post(harness(reply, 'field').app, { model: 'fake-1', messages: [{ role: 'user', content: 'hi' }] });
      expect(await res.json()).toMatchObject({
        choices: [{ message: { role: 'assistant', content: 'Hello', reasoning_content: 'a>b' }, finish_reason: 'stop' }],
      });
    });

    it('maps upstream failures to HTTP statuses', async () => {
      const cases: Array<[ChatEvent, number, string]> = [
        [{ type: 'error', kind: 'UpstreamTimeout', message: 'slow' }, 504, 'upstream_error'],
        [{ type: 'error', kind: 'AuthExpired', message: 'token expired' }, 401, 'authentication_error'],
        [{ type: 'error', kind: 'ChallengeUnsolvable', message: 'too hard' }, 503, 'upstream_error'],
        [{ type: 'error', kind: 'MalformedUpstream', message: 'garbage' }, 502, 'upstream_error'],
      ];

      for (const [event, status, type] of cases) {
        const res = await post(harness([{ type: 'answer', text: 'partial' }, event]).app, {
          model: 'fake-1',
          messages: [{ role: 'user', content: 'hi' }],
        });
        expect(res.status).toBe(status);
        if (event.type === 'error') {
          expect(await res.json()).toEqual({ error: { message: event.message, type, code: event.kind } });
        }
      }
    });

    it('streams chunks followed by [DONE]', async () => {
      const { app } = harness([
        { type: 'reasoning', text: 'x\\y' },
        { type: 'answer', text: 'Hi' },
        { type: 'finish', reason: 'length' },
      ]);

      const res = await post(app, { model: 'fake-1', stream: true, messages: [{ role: 'user', content: 'hi' }] });

      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toMatch(/^text\/event-stream/);
      const base = { object: 'chat.completion.chunk', created: 1_700_000_000, model: 'fake-1' };
      const data = sseData(await res.text());
      expect(data).toEqual([
        { ...base, id: expect.any(String), choices: [{ index: 0, delta: { role: 'assistant', content: '<think:x\\\\y>' }, finish_reason: null }] },
        { ...base, id: expect.any(String), choices: [{ index: 0, delta: { content: 'Hi' }, finish_reason: null }] },
        { ...base, id: expect.any(String), choices: [{ index: 0, delta: {}, finish_reason: 'length' }] },
        '[DONE]',
      ]);
      const ids = new Set(data.flatMap((item) => (typeof item === 'object' && item !== null && 'id' in item ? [item.id] : [])));
      expect(ids.size).toBe(1);
    });

    it('streams reasoning_content deltas in field mode', async () => {
      const res = await post(harness(reply, 'field').app, { model: 'fake-1', stream: true, messages: [{ role: 'user', content: 'hi' }] });
      expect(sseData(await res.text())).toEqual([
        expect.objectContaining({ choices: [{ index: 0, delta: { role: 'assistant', reasoning_content: 'a>b' }, finish_reason: null }] }),
        expect.objectContaining({ choices: [{ index: 0, delta: { content: 'Hello' }, finish_reason: null }] }),
        expect.objectContaining({ choices: [{ index: 0, delta: {}, finish_reason: 'stop' }] }),
        '[DONE]',
      ]);
    });

    it('writes an error payload into the stream when the upstream fails mid-way', async () => {
      const { app } = harness([
        { type: 'answer', text: 'a' },
        { type: 'error', kind: 'UpstreamRejected', message: 'boom' },
      ]);

      const res = await post(app, { model: 'fake-1', stream: true, messages: [{ role: 'user', content: 'hi' }] });

      expect(res.status).toBe(200);
      expect(sseData(await res.text())).toEqual([
        expect.objectContaining({ choices: [{ index: 0, delta: { role: 'assistant', content: 'a' }, finish_reason: null }] }),
        { error: { message: 'boom', type: 'upstream_error', code: 'UpstreamRejected' } },
        '[DONE]',
      ]);
    });
  });
});
