import { z } from 'zod';
import { GatewayError } from '../../errors.js';
import { answer, finish, type ChatEvent } from '../../types/chat.js';
import type { SseEvent } from '../../transport/sse.js';
import { parseJson, parsePayload } from '../normalize.js';
import type { ExtractionRule } from '../rules.js';

const EventSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
  code: z.union([z.string(), z.number()]).optional(),
  msg: z.string().optional(),
});

const CITATION = /\[\[\d+\]\]/g;
/** A citation marker that may still be completed by the next chunk. */
const PARTIAL_CITATION = /\[(?:\[\d*\]?)?$/;

export function stripCitations(text: string): string {
  return text.replace(CITATION, '');
}

export class MetasoRule implements ExtractionRule<SseEvent> {
  private carry = '';

  extract(raw: SseEvent): ChatEvent[] {
    const data = raw.data.trim();
    if (!data) return [];
    if (data === '[DONE]') return [...this.flush(), finish()];

    const event = parsePayload(EventSchema, parseJson(data, 'Metaso'), 'Metaso');
    switch (event.type) {
      case 'append-text': {
        const text = stripCitations(this.carry + (event.text ?? ''));
        this.carry = PARTIAL_CITATION.exec(text)?.[0] ?? '';
        const ready = text.slice(0, text.length - this.carry.length);
        return ready ? [answer(ready)] : [];
      }
      case 'error':
        throw new GatewayError('UpstreamRejected', `Metaso error [${event.code ?? 'ERROR'}]: ${event.msg ?? 'unknown'}`);
      default:
        return [];
    }
  }

  end(): ChatEvent[] {
    return [...this.flush(), finish('completed')];
  }

  private flush(): ChatEvent[] {
    const rest = this.carry;
    this.carry = '';
    return rest ? [answer(rest)] : [];
  }
}
