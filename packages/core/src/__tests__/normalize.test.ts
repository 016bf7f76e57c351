import { describe, it, expect, vi } from 'vitest';
import {
  DeepSeekRule,
  DoubaoRule,
  EventSequencer,
  InlineMarkerSplitter,
  KimiRule,
  MetasoRule,
  MinimaxRule,
  QwenRule,
  SnapshotDiff,
  ZhipuRule,
  normalizeStream,
  sequenced,
  stripCitations,
  type ExtractionRule,
} from '../normalize/index.js';
import { encodeFrame, encodeJsonFrame, FrameFlag, type Frame } from '../transport/frames.js';
import type { SseEvent } from '../transport/sse.js';
import { answer, finish, isTerminal, reasoning, type ChatEvent } from '../types/chat.js';

const sse = (data: unknown, event?: string): SseEvent => ({
  data: typeof data === 'string' ? data : JSON.stringify(data),
  ...(event ? { event } : {}),
});

const frame = (value: unknown, flags: Frame['flags'] = FrameFlag.Data): Frame => ({
  flags,
  payload: encodeJsonFrame(value).slice(5),
});

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to throw');
}

async function* from<T>(items: T[]): AsyncGenerator<T, void, undefined> {
  yield* items;
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) out.push(item);
  return out;
}

describe('SnapshotDiff', () => {
  it('emits only the growth of cumulative snapshots', () => {
    const diff = new SnapshotDiff();
    expect(diff.next('a')).toBe('a');
    expect(diff.next('abc')).toBe('bc');
    expect(diff.next('ab')).toBe('');
    expect(diff.next('abc')).toBe('');
    expect(diff.next('xyz')).toBe('xyz');
    expect(diff.current).toBe('xyz');
  });

  it('tracks appended text so a later snapshot diffs against it', () => {
    const diff = new SnapshotDiff();
    diff.append('Hel');
    diff.append('lo');
    expect(diff.next('Hello!')).toBe('!');
  });
});

describe('InlineMarkerSplitter', () => {
  it('splits think markers even when they are cut across chunks', () => {
    const splitter = new InlineMarkerSplitter();
    expect(splitter.push('<thi')).toEqual([]);
    expect(splitter.push('nk>reason</th')).toEqual([reasoning('reason')]);
    expect(splitter.push('ink>answer')).toEqual([answer('answer')]);
    expect(splitter.flush()).toEqual([]);
  });

  it('releases a held partial marker on flush', () => {
    const splitter = new InlineMarkerSplitter();
    expect(splitter.push('a <')).toEqual([answer('a ')]);
    expect(splitter.flush()).toEqual([answer('<')]);
  });
});

describe('DeepSeekRule', () => {
  it('follows fragment patches, inheriting the last path', () => {
    const rule = new DeepSeekRule();
    const chunks = [
      { v: { response: { message_id: 2, fragments: [] } } },
      { p: 'response/fragments', o: 'APPEND', v: [{ type: 'THINK', content: 'Let me' }] },
      { p: 'response/fragments/-1/content', o: 'APPEND', v: ' think' },
      { v: ' more' },
      { p: 'response/fragments', o: 'APPEND', v: [{ type: 'RESPONSE', content: 'Hello' }] },
      { p: 'response/fragments/-1/content', v: ' world' },
      { p: 'response', o: 'BATCH', v: [{ p: 'accumulated_token_usage', v: 12 }, { p: 'status', v: 'FINISHED' }] },
    ];
    expect(chunks.flatMap((chunk) => rule.extract(sse(chunk)))).toEqual([
      reasoning('Let me'),
      reasoning(' think'),
      reasoning(' more'),
      answer('Hello'),
      answer(' world'),
      finish(),
    ]);
  });

  it('handles the thinking_content/content layout', () => {
    const rule = new DeepSeekRule();
    const chunks = [
      { p: 'response/thinking_content', v: 'hmm' },
      { v: '...' },
      { p: 'response/content', v: 'ok' },
      { v: '!' },
      { p: 'response/status', v: 'FINISHED' },
    ];
    expect(chunks.flatMap((chunk) => rule.extract(sse(chunk)))).toEqual([
      reasoning('hmm'),
      reasoning('...'),
      answer('ok'),
      answer('!'),
      finish(),
    ]);
  });

  it('treats [DONE] as the end of the reply', () => {
    expect(new DeepSeekRule().extract(sse('[DONE]'))).toEqual([finish()]);
  });

  it('maps token business codes to AuthExpired', () => {
    expect(thrown(() => new DeepSeekRule().extract(sse({ code: 40003, msg: 'invalid token' })))).toMatchObject({
      kind: 'AuthExpired',
      message: 'DeepSeek error 40003: invalid token',
    });
    expect(thrown(() => new DeepSeekRule().extract(sse({ code: 500, msg: 'busy' })))).toMatchObject({
      kind: 'UpstreamRejected',
    });
  });

  it('reports non-JSON data as malformed', () => {
    expect(thrown(() => new DeepSeekRule().extract(sse('{not json')))).toMatchObject({ kind: 'MalformedUpstream' });
  });
});

describe('KimiRule', () => {
  it('appends or replaces block text', () => {
    const rule = new KimiRule();
    const frames = [
      frame({ op: 'set', block: { text: { content: 'Hel' } } }),
      frame({ op: 'append', block: { text: { content: 'lo' } } }),
      frame({ op: 'set', block: { text: { content: 'Hello!' } } }),
      frame({ block: { think: { content: 'aside' } } }),
      frame({ done: {} }),
    ];
    expect(frames.flatMap((f) => rule.extract(f))).toEqual([
      answer('Hel'),
      answer('lo'),
      answer('!'),
      reasoning('aside'),
      finish(),
    ]);
  });

  it('ends on the end-of-stream envelope', () => {
    expect(new KimiRule().extract({ flags: FrameFlag.EndStream, payload: encodeFrame('').slice(5) })).toEqual([finish()]);
  });

  it('maps unauthenticated errors to AuthExpired', () => {
    const err = thrown(() =>
      new KimiRule().extract(frame({ error: { code: 'unauthenticated', message: 'token expired' } }, FrameFlag.EndStream)),
    );
    expect(err).toMatchObject({ kind: 'AuthExpired', message: 'Kimi error unauthenticated: token expired' });
  });
});

describe('MetasoRule', () => {
  it('strips citation markers from appended text', () => {
    expect(stripCitations('a[[1]]b[[23]]')).toBe('ab');
    expect(new MetasoRule().extract(sse({ type: 'append-text', text: 'Answer[[1]] here' }))).toEqual([answer('Answer here')]);
  });

  it('strips a citation marker split across chunks', () => {
    const rule = new MetasoRule();
    expect(rule.extract(sse({ type: 'append-text', text: 'Answer[' }))).toEqual([answer('Answer')]);
    expect(rule.extract(sse({ type: 'append-text', text: '[12' }))).toEqual([]);
    expect(rule.extract(sse({ type: 'append-text', text: ']] here' }))).toEqual([answer(' here')]);
  });

  it('releases a held bracket that never became a citation', () => {
    const rule = new MetasoRule();
    expect(rule.extract(sse({ type: 'append-text', text: 'list [' }))).toEqual([answer('list ')]);
    expect(rule.extract(sse({ type: 'append-text', text: 'a]' }))).toEqual([answer('[a]')]);
    expect(rule.extract(sse({ type: 'append-text', text: 'end [[' }))).toEqual([answer('end ')]);
    expect(rule.extract(sse('[DONE]'))).toEqual([answer('[['), finish()]);
  });

  it('ignores bookkeeping events and ends on [DONE]', () => {
    const rule = new MetasoRule();
    expect(rule.extract(sse({ type: 'heartbeat' }))).toEqual([]);
    expect(rule.extract(sse('[DONE]'))).toEqual([finish()]);
  });

  it('surfaces vendor errors', () => {
    expect(thrown(() => new MetasoRule().extract(sse({ type: 'error', code: 'E1', msg: 'boom' })))).toMatchObject({
      kind: 'UpstreamRejected',
      message: 'Metaso error [E1]: boom',
    });
  });
});

describe('DoubaoRule', () => {
  it('reads text blocks, chunk deltas and the reply end', () => {
    const rule = new DoubaoRule();
    const events = [
      sse(
        {
          content: {
            content_block: [
              { block_type: 10000, content: { text_block: { text: 'Hi' } } },
              { block_type: 2074, content: {} },
            ],
          },
        },
        'STREAM_MSG_NOTIFY',
      ),
      sse({ text: ' there' }, 'CHUNK_DELTA'),
      sse({}, 'SSE_ACK'),
      sse({}, 'SSE_REPLY_END'),
    ];
    expect(events.flatMap((event) => rule.extract(event))).toEqual([answer('Hi'), answer(' there'), finish()]);
  });

  it('surfaces stream errors', () => {
    expect(
      thrown(() => new DoubaoRule().extract(sse({ error_code: 710022004, error_msg: 'rate limited' }, 'STREAM_ERROR'))),
    ).toMatchObject({ kind: 'UpstreamRejected', message: 'Doubao error 710022004: rate limited' });
  });
});

describe('QwenRule', () => {
  it('diffs cumulative think and text contents', () => {
    const rule = new QwenRule();
    expect(
      rule.extract(
        sse({
          msgStatus: 'generating',
          contents: [
            { contentType: 'think', content: 'pondering' },
            { contentType: 'text', content: 'Hi' },
          ],
        }),
      ),
    ).toEqual([reasoning('pondering'), answer('Hi')]);
    expect(
      rule.extract(
        sse({
          msgStatus: 'finish',
          contents: [
            { contentType: 'think', content: 'pondering more' },
            { contentType: 'text', content: 'Hi there' },
          ],
        }),
      ),
    ).toEqual([reasoning(' more'), answer(' there'), finish()]);
  });

  it('maps NotLogin to AuthExpired', () => {
    expect(thrown(() => new QwenRule().extract(sse({ errorCode: 'NotLogin', errorMsg: 'login first' })))).toMatchObject({
      kind: 'AuthExpired',
    });
  });
});

describe('ZhipuRule', () => {
  it('diffs each part and reports the conversation once', () => {
    const onConversation = vi.fn();
    const rule = new ZhipuRule({ onConversation });

    expect(
      rule.extract(
        sse({
          conversation_id: 'c1',
          status: 'init',
          parts: [
            { logic_id: 'L0', role: 'user', content: [{ type: 'text', text: 'question' }] },
            { logic_id: 'L1', role: 'assistant', content: [{ type: 'think', think: 'plan' }] },
          ],
        }),
      ),
    ).toEqual([reasoning('plan')]);
    expect(
      rule.extract(
        sse({
          conversation_id: 'c1',
          status: 'finish',
          parts: [
            {
              logic_id: 'L1',
              content: [
                { type: 'think', think: 'plan it' },
                { type: 'text', text: 'Answer' },
              ],
            },
          ],
        }),
      ),
    ).toEqual([reasoning(' it'), answer('Answer'), finish()]);
    expect(onConversation).toHaveBeenCalledTimes(1);
    expect(onConversation).toHaveBeenCalledWith('c1');
  });

  it('ends a moderated reply as filtered', () => {
    expect(new ZhipuRule().extract(sse({ status: 'intervene' }))).toEqual([finish('filtered')]);
  });
});

describe('MinimaxRule', () => {
  it('diffs polled snapshots and splits inline think markers', () => {
    const rule = new MinimaxRule();
    expect(
      rule.extract({
        messages: [
          { msg_type: 2, msg_content: '<think>why</th' },
          { msg_type: 1, msg_content: 'question' },
        ],
        chat: { chat_status: 1 },
      }),
    ).toEqual([reasoning('why')]);
    expect(
      rule.extract({
        messages: [{ msg_type: 2, msg_content: '<think>why</think>Because' }],
        chat: { chat_status: 2 },
      }),
    ).toEqual([answer('Because'), finish()]);
  });

  it('rejects a non-zero status code', () => {
    expect(thrown(() => new MinimaxRule().extract({ base_resp: { status_code: 1004, status_msg: 'bad sign' } }))).toMatchObject({
      kind: 'UpstreamRejected',
      message: 'MiniMax error 1004: bad sign',
    });
  });
});

describe('normalizeStream', () => {
  const passthrough: ExtractionRule<ChatEvent> = { extract: (event) => [event] };

  it('stops reading at the first terminal event', async () => {
    const returned = vi.fn();
    async function* source(): AsyncGenerator<ChatEvent, void, undefined> {
      try {
        yield answer('a');
        yield finish();
        yield answer('late');
      } finally {
        returned();
      }
    }
    expect(await collect(normalizeStream(source(), passthrough))).toEqual([answer('a'), finish()]);
    expect(returned).toHaveBeenCalledTimes(1);
  });

  it('completes a source that ends without a terminal event', async () => {
    expect(await collect(normalizeStream(from([answer('a')]), passthrough))).toEqual([answer('a'), finish('completed')]);
  });

  it('uses the rule end hook when it has one', async () => {
    const rule: ExtractionRule<ChatEvent> = { extract: (event) => [event], end: () => [finish('length')] };
    expect(await collect(normalizeStream(from([answer('a')]), rule))).toEqual([answer('a'), finish('length')]);
  });
});

describe('event sequencing', () => {
  it('drops empty deltas and anything after a terminal event', () => {
    const sequencer = new EventSequencer();
    expect(sequencer.accept(answer(''))).toBeUndefined();
    expect(sequencer.accept(answer('x'))).toEqual(answer('x'));
    expect(sequencer.accept(finish())).toEqual(finish());
    expect(sequencer.done).toBe(true);
    expect(sequencer.accept(finish('length'))).toBeUndefined();
    expect(sequencer.accept({ type: 'error', kind: 'UpstreamRejected', message: 'late' })).toBeUndefined();
  });

  function lcg(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
      state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
      return state / 0x100000000;
    };
  }

  const pieces = ['', 'a', 'bc', 'def', ' ', '\n'];

  function randomEvents(random: () => number): ChatEvent[] {
    const count = 1 + Math.floor(random() * 30);
    const events: ChatEvent[] = [];
    for (let i = 0; i < count; i++) {
      const roll = random();
      const text = pieces[Math.floor(random() * pieces.length)] ?? '';
      if (roll < 0.4) events.push(answer(text));
      else if (roll < 0.75) events.push(reasoning(text));
      else if (roll < 0.9) events.push(finish(random() < 0.5 ? 'completed' : 'length'));
      else events.push({ type: 'error', kind: 'UpstreamTransportError', message: 'dup' });
    }
    return events;
  }

  it('keeps every randomized sequence well formed and append-only', async () => {
    const random = lcg(20240601);
    for (let run = 0; run < 200; run++) {
      const input = randomEvents(random);
      const output = await collect(sequenced(from(input)));

      const terminalAt = input.findIndex(isTerminal);
      const before = terminalAt === -1 ? input : input.slice(0, terminalAt);
      const expectedDeltas = before.filter((event) => event.type !== 'finish' && event.type !== 'error' && event.text !== '');

      expect(output.filter(isTerminal).length).toBe(terminalAt === -1 ? 0 : 1);
      if (terminalAt !== -1) expect(output[output.length - 1]).toEqual(input[terminalAt]);
      expect(output.filter((event) => !isTerminal(event))).toEqual(expectedDeltas);
    }
  });
});
