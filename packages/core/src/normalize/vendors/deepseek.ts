import { z } from 'zod';
import { GatewayError } from '../../errors.js';
import { answer, finish, reasoning, type ChatEvent } from '../../types/chat.js';
import type { SseEvent } from '../../transport/sse.js';
import { parseJson, parsePayload } from '../normalize.js';
import type { ExtractionRule } from '../rules.js';

const ChunkSchema = z.object({
  p: z.string().optional(),
  o: z.string().optional(),
  v: z.unknown().optional(),
  code: z.number().optional(),
  msg: z.string().optional(),
});

const FragmentSchema = z.object({
  type: z.string(),
  content: z.string().optional(),
});

const BatchEntrySchema = z.object({
  p: z.string(),
  v: z.unknown(),
});

const SnapshotSchema = z.object({
  response: z
    .object({
      fragments: z.array(FragmentSchema).optional(),
      thinking_content: z.string().nullish(),
      content: z.string().nullish(),
      status: z.string().nullish(),
    })
    .optional(),
});

/** Business codes DeepSeek returns for a dead or revoked bearer token. */
export const DEEPSEEK_AUTH_CODES: ReadonlySet<number> = new Set([40001, 40002, 40003]);

const FRAGMENT_CONTENT = /^response\/fragments\/-?\d+\/content$/;

type Channel = 'answer' | 'reasoning';

function emit(channel: Channel, text: string): ChatEvent {
  return channel === 'reasoning' ? reasoning(text) : answer(text);
}

/**
 * DeepSeek streams JSON-patch-like updates: `p` names the field being
 * patched and is omitted when it repeats, `v` carries the value. Reasoning
 * arrives under `thinking_content` or in `THINK` fragments.
 */
export class DeepSeekRule implements ExtractionRule<SseEvent> {
  private path = '';
  private channel: Channel = 'answer';

  extract(raw: SseEvent): ChatEvent[] {
    const data = raw.data.trim();
    if (!data) return [];
    if (data === '[DONE]') return [finish()];

    const chunk = parsePayload(ChunkSchema, parseJson(data, 'DeepSeek'), 'DeepSeek');
    if (chunk.code !== undefined && chunk.code !== 0) {
      const message = `DeepSeek error ${chunk.code}: ${chunk.msg ?? 'unknown'}`;
      throw new GatewayError(DEEPSEEK_AUTH_CODES.has(chunk.code) ? 'AuthExpired' : 'UpstreamRejected', message);
    }
    if (chunk.v === undefined) return [];
    if (chunk.p !== undefined) this.path = chunk.p;
    return this.apply(this.path, chunk.o, chunk.v);
  }

  private apply(path: string, op: string | undefined, value: unknown): ChatEvent[] {
    if (path === 'response' && op === 'BATCH') {
      const entries = parsePayload(z.array(BatchEntrySchema), value, 'DeepSeek');
      return entries.flatMap((entry) => this.apply(`response/${entry.p}`, undefined, entry.v));
    }

    if (path === 'response/status' || (path === '' && value === 'FINISHED')) {
      return value === 'FINISHED' ? [finish()] : [];
    }

    if (path === 'response/fragments') {
      const fragments = parsePayload(z.array(FragmentSchema), value, 'DeepSeek');
      return this.fragments(fragments);
    }

    if (path === '' && typeof value === 'object' && value !== null) {
      return this.snapshot(value);
    }

    if (typeof value !== 'string') return [];

    if (path === 'response/thinking_content') {
      this.channel = 'reasoning';
    } else if (path === 'response/content') {
      this.channel = 'answer';
    } else if (path !== '' && !FRAGMENT_CONTENT.test(path)) {
      return [];
    }
    return [emit(this.channel, value)];
  }

  private snapshot(value: unknown): ChatEvent[] {
    const response = parsePayload(SnapshotSchema, value, 'DeepSeek').response;
    if (!response) return [];
    const events: ChatEvent[] = [];
    if (response.thinking_content) {
      this.channel = 'reasoning';
      events.push(reasoning(response.thinking_content));
    }
    if (response.content) {
      this.channel = 'answer';
      events.push(answer(response.content));
    }
    events.push(...this.fragments(response.fragments ?? []));
    if (response.status === 'FINISHED') events.push(finish());
    return events;
  }

  private fragments(fragments: z.infer<typeof FragmentSchema>[]): ChatEvent[] {
    const events: ChatEvent[] = [];
    for (const fragment of fragments) {
      this.channel = fragment.type === 'THINK' ? 'reasoning' : 'answer';
      if (fragment.content) events.push(emit(this.channel, fragment.content));
    }
    return events;
  }
}
