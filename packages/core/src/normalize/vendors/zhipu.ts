import { z } from 'zod';
import { answer, finish, reasoning, type ChatEvent } from '../../types/chat.js';
import type { SseEvent } from '../../transport/sse.js';
import { parseJson, parsePayload } from '../normalize.js';
import { SnapshotDiffs, type ExtractionRule } from '../rules.js';

const ItemSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
  think: z.string().optional(),
});

const EventSchema = z.object({
  conversation_id: z.string().optional(),
  status: z.string().optional(),
  parts: z
    .array(
      z.object({
        logic_id: z.string().optional(),
        role: z.string().optional(),
        content: z.array(ItemSchema).optional(),
      }),
    )
    .optional(),
});

export interface ZhipuRuleHooks {
  /** Reports the conversation the vendor created, so it can be cleaned up afterwards. */
  onConversation?: (conversationId: string) => void;
}

/**
 * ChatGLM parts are cumulative per `logic_id`; each part's text and think
 * channels are diffed separately.
 */
export class ZhipuRule implements ExtractionRule<SseEvent> {
  private readonly diffs = new SnapshotDiffs();
  private conversationId = '';

  constructor(private readonly hooks: ZhipuRuleHooks = {}) {}

  extract(raw: SseEvent): ChatEvent[] {
    const data = raw.data.trim();
    if (!data || data === '[DONE]') return [];

    const event = parsePayload(EventSchema, parseJson(data, 'Zhipu'), 'Zhipu');
    if (event.conversation_id && event.conversation_id !== this.conversationId) {
      this.conversationId = event.conversation_id;
      this.hooks.onConversation?.(event.conversation_id);
    }

    const events: ChatEvent[] = [];
    for (const part of event.parts ?? []) {
      if (part.role !== undefined && part.role !== 'assistant') continue;
      const logic = part.logic_id ?? '';
      for (const item of part.content ?? []) {
        if (item.type === 'text') {
          events.push(answer(this.diffs.next(`${logic}:text`, item.text ?? '')));
        } else if (item.type === 'think') {
          events.push(reasoning(this.diffs.next(`${logic}:think`, item.think ?? item.text ?? '')));
        }
      }
    }

    if (event.status === 'finish') events.push(finish());
    else if (event.status === 'intervene') events.push(finish('filtered'));
    return events;
  }
}
