import { z } from 'zod';
import { GatewayError } from '../../errors.js';
import { finish, type ChatEvent } from '../../types/chat.js';
import { parsePayload } from '../normalize.js';
import { InlineMarkerSplitter, SnapshotDiff, type ExtractionRule } from '../rules.js';

export const ASSISTANT_MSG_TYPE = 2;
export const CHAT_DONE_STATUS = 2;

export const ChatDetailSchema = z.object({
  base_resp: z
    .object({
      status_code: z.number(),
      status_msg: z.string().optional(),
    })
    .optional(),
  messages: z
    .array(
      z.object({
        msg_type: z.number(),
        msg_content: z.string().nullish(),
      }),
    )
    .nullish(),
  chat: z.object({ chat_status: z.number().optional() }).nullish(),
});

export type ChatDetail = z.infer<typeof ChatDetailSchema>;

/**
 * Consumes polled chat-detail snapshots. Messages come newest first; the first
 * assistant message is the one being written.
 */
export class MinimaxRule implements ExtractionRule<unknown> {
  private readonly diff = new SnapshotDiff();
  private readonly splitter = new InlineMarkerSplitter();

  extract(raw: unknown): ChatEvent[] {
    const detail = parsePayload(ChatDetailSchema, raw, 'MiniMax');
    const status = detail.base_resp?.status_code ?? 0;
    if (status !== 0) {
      throw new GatewayError('UpstreamRejected', `MiniMax error ${status}: ${detail.base_resp?.status_msg ?? 'unknown'}`);
    }

    const events: ChatEvent[] = [];
    const reply = (detail.messages ?? []).find((message) => message.msg_type === ASSISTANT_MSG_TYPE);
    if (reply?.msg_content) {
      events.push(...this.splitter.push(this.diff.next(reply.msg_content)));
    }
    if (detail.chat?.chat_status === CHAT_DONE_STATUS) {
      events.push(...this.splitter.flush(), finish());
    }
    return events;
  }

  end(): ChatEvent[] {
    return [...this.splitter.flush(), finish()];
  }
}
