import { z } from 'zod';
import { GatewayError } from '../../errors.js';
import { answer, finish, reasoning, type ChatEvent } from '../../types/chat.js';
import { decodeFramePayload, FrameFlag, type Frame } from '../../transport/frames.js';
import { parsePayload } from '../normalize.js';
import { SnapshotDiff, type ExtractionRule } from '../rules.js';

const ContentSchema = z.object({ content: z.string().optional() });

const ErrorSchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
});

const MessageSchema = z.object({
  op: z.string().optional(),
  block: z
    .object({
      text: ContentSchema.optional(),
      think: ContentSchema.optional(),
    })
    .optional(),
  done: z.unknown().optional(),
  error: ErrorSchema.nullish(),
});

function toError(error: z.infer<typeof ErrorSchema>): GatewayError {
  const code = error.code ?? 'unknown';
  const message = `Kimi error ${code}: ${error.message ?? 'no message'}`;
  return new GatewayError(code === 'unauthenticated' ? 'AuthExpired' : 'UpstreamRejected', message);
}

/**
 * Kimi speaks Connect-style envelopes. Each data frame carries one message;
 * `op: "set"` replaces a block's text, anything else appends to it.
 */
export class KimiRule implements ExtractionRule<Frame> {
  private readonly text = new SnapshotDiff();
  private readonly think = new SnapshotDiff();

  extract(frame: Frame): ChatEvent[] {
    const message = parsePayload(MessageSchema, decodeFramePayload(frame), 'Kimi');
    if (message.error) throw toError(message.error);
    if (frame.flags === FrameFlag.EndStream) return [finish()];

    const events: ChatEvent[] = [];
    const replace = message.op === 'set';
    const think = message.block?.think?.content;
    if (think) {
      events.push(reasoning(replace ? this.think.next(think) : this.think.append(think)));
    }
    const text = message.block?.text?.content;
    if (text) {
      events.push(answer(replace ? this.text.next(text) : this.text.append(text)));
    }
    if (message.done !== undefined) events.push(finish());
    return events;
  }
}
