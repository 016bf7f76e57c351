import type { z } from 'zod';
import { GatewayError } from '../errors.js';
import { finish, isTerminal, type ChatEvent } from '../types/chat.js';
import type { ExtractionRule } from './rules.js';

/**
 * Lazily maps a raw vendor stream through `rule`. Reading stops at the first
 * terminal event, which returns the source iterator and so closes the
 * transport underneath it.
 */
export async function* normalizeStream<Raw>(
  source: AsyncIterable<Raw>,
  rule: ExtractionRule<Raw>,
): AsyncGenerator<ChatEvent, void, undefined> {
  for await (const raw of source) {
    for (const event of rule.extract(raw)) {
      yield event;
      if (isTerminal(event)) return;
    }
  }
  const tail = rule.end ? rule.end() : [finish('completed')];
  for (const event of tail) {
    yield event;
    if (isTerminal(event)) return;
  }
}

export function parseJson(text: string, vendor: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new GatewayError('MalformedUpstream', `${vendor} sent a non-JSON payload: ${text.slice(0, 120)}`, { cause: err });
  }
}

export function parsePayload<S extends z.ZodTypeAny>(schema: S, value: unknown, vendor: string): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join('.')}` : '';
    throw new GatewayError('MalformedUpstream', `${vendor} payload has an unexpected shape${where}: ${issue?.message ?? 'invalid'}`);
  }
  return parsed.data;
}
