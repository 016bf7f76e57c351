import { z } from 'zod';
import { GatewayError } from '../../errors.js';
import { answer, finish, reasoning, type ChatEvent } from '../../types/chat.js';
import type { SseEvent } from '../../transport/sse.js';
import { parseJson, parsePayload } from '../normalize.js';
import { SnapshotDiff, type ExtractionRule } from '../rules.js';

const MessageSchema = z.object({
  errorCode: z.string().nullish(),
  errorMsg: z.string().nullish(),
  msgStatus: z.string().optional(),
  contents: z
    .array(
      z.object({
        contentType: z.string(),
        content: z.string().nullish(),
      }),
    )
    .nullish(),
});

/** Qwen resends the whole reply on every event; only the growth is emitted. */
export class QwenRule implements ExtractionRule<SseEvent> {
  private readonly text = new SnapshotDiff();
  private readonly think = new SnapshotDiff();

  extract(raw: SseEvent): ChatEvent[] {
    const data = raw.data.trim();
    if (!data || data === '[DONE]') return [];

    const message = parsePayload(MessageSchema, parseJson(data, 'Qwen'), 'Qwen');
    if (message.errorCode) {
      const kind = message.errorCode === 'NotLogin' ? 'AuthExpired' : 'UpstreamRejected';
      throw new GatewayError(kind, `Qwen error ${message.errorCode}: ${message.errorMsg ?? 'unknown'}`);
    }

    let text = '';
    let think = '';
    for (const content of message.contents ?? []) {
      if (content.contentType === 'text' || content.contentType === 'text2image') text += content.content ?? '';
      else if (content.contentType === 'think') think += content.content ?? '';
    }

    const events: ChatEvent[] = [];
    if (think) events.push(reasoning(this.think.next(think)));
    if (text) events.push(answer(this.text.next(text)));
    if (message.msgStatus === 'finish') events.push(finish());
    return events;
  }
}
