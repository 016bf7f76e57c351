import type { GatewayErrorKind } from '../errors.js';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface GenerationParams {
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  stop?: string[];
}

export interface ChatRequest {
  readonly model: string;
  readonly messages: readonly Readonly<ChatMessage>[];
  readonly stream: boolean;
  readonly params?: Readonly<GenerationParams>;
}

export type FinishReason = 'completed' | 'length' | 'filtered' | 'upstream_error';

export type ChatEvent =
  | { type: 'answer'; text: string }
  | { type: 'reasoning'; text: string }
  | { type: 'finish'; reason: FinishReason }
  | { type: 'error'; kind: GatewayErrorKind; message: string };

export type TerminalEvent = Extract<ChatEvent, { type: 'finish' | 'error' }>;

export interface AggregatedCompletion {
  id: string;
  model: string;
  created: number;
  text: string;
  reasoning?: string;
  finishReason: FinishReason;
}

export interface SubmitOptions {
  /** Aborted when the caller goes away; tears down the upstream call. */
  signal?: AbortSignal;
}

export const answer = (text: string): ChatEvent => ({ type: 'answer', text });
export const reasoning = (text: string): ChatEvent => ({ type: 'reasoning', text });
export const finish = (reason: FinishReason = 'completed'): ChatEvent => ({ type: 'finish', reason });

export function isTerminal(event: ChatEvent): event is TerminalEvent {
  return event.type === 'finish' || event.type === 'error';
}

/**
 * Picks the text the vendor should see as the new turn: the last user
 * message, or the last message of any role when there is no user turn.
 */
export function lastUserMessage(messages: readonly Readonly<ChatMessage>[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message?.role === 'user') return message.content;
  }
  return messages[messages.length - 1]?.content ?? '';
}
