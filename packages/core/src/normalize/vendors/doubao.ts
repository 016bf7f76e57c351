import { z } from 'zod';
import { GatewayError } from '../../errors.js';
import { answer, finish, type ChatEvent } from '../../types/chat.js';
import type { SseEvent } from '../../transport/sse.js';
import { parseJson, parsePayload } from '../normalize.js';
import type { ExtractionRule } from '../rules.js';

export const TEXT_BLOCK = 10000;

const NotifySchema = z.object({
  content: z
    .object({
      content_block: z
        .array(
          z.object({
            block_type: z.number(),
            content: z.object({ text_block: z.object({ text: z.string().optional() }).optional() }).optional(),
          }),
        )
        .optional(),
    })
    .optional(),
});

const DeltaSchema = z.object({ text: z.string().optional() });

const ErrorSchema = z.object({
  error_code: z.union([z.number(), z.string()]).optional(),
  error_msg: z.string().optional(),
});

export class DoubaoRule implements ExtractionRule<SseEvent> {
  extract(raw: SseEvent): ChatEvent[] {
    switch (raw.event) {
      case 'STREAM_MSG_NOTIFY': {
        const notify = parsePayload(NotifySchema, parseJson(raw.data, 'Doubao'), 'Doubao');
        return (notify.content?.content_block ?? [])
          .filter((block) => block.block_type === TEXT_BLOCK)
          .map((block) => answer(block.content?.text_block?.text ?? ''));
      }
      case 'CHUNK_DELTA': {
        const delta = parsePayload(DeltaSchema, parseJson(raw.data, 'Doubao'), 'Doubao');
        return [answer(delta.text ?? '')];
      }
      case 'SSE_REPLY_END':
        return [finish()];
      case 'STREAM_ERROR': {
        const error = parsePayload(ErrorSchema, parseJson(raw.data, 'Doubao'), 'Doubao');
        throw new GatewayError('UpstreamRejected', `Doubao error ${error.error_code ?? 'unknown'}: ${error.error_msg ?? 'no message'}`);
      }
      default:
        return [];
    }
  }
}
