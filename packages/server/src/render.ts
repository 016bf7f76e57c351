import type {
  AggregatedCompletion,
  ChatEvent,
  FinishReason,
  GatewayErrorKind,
  OpenAIError,
  OpenAIFinishReason,
  OpenAIMessage,
  OpenAIResponse,
  OpenAIStreamChunk,
} from '@chatbridge/core';

export type ReasoningFormat = 'inline' | 'field';

export type ErrorStatus = 401 | 404 | 502 | 503 | 504;

const FINISH_REASONS: Record<FinishReason, OpenAIFinishReason> = {
  completed: 'stop',
  length: 'length',
  filtered: 'content_filter',
  upstream_error: 'stop',
};

/** Wraps reasoning text so it can travel inside `content`; `\` and `>` are backslash-escaped. */
export function renderInlineReasoning(text: string): string {
  return `<think:${text.replace(/\\/g, '\\\\').replace(/>/g, '\\>')}>`;
}

export function errorStatus(kind: GatewayErrorKind): ErrorStatus {
  switch (kind) {
    case 'UnknownModel':
      return 404;
    case 'AuthExpired':
      return 401;
    case 'ChallengeUnsolvable':
      return 503;
    case 'UpstreamTimeout':
      return 504;
    default:
      return 502;
  }
}

function errorType(kind: GatewayErrorKind): string {
  switch (kind) {
    case 'UnknownModel':
      return 'invalid_request_error';
    case 'AuthExpired':
      return 'authentication_error';
    default:
      return 'upstream_error';
  }
}

export function errorBody(kind: GatewayErrorKind, message: string): OpenAIError {
  return { error: { message, type: errorType(kind), code: kind } };
}

/** Rough token count for the `usage` block; vendors do not report one. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export interface ChunkContext {
  id: string;
  model: string;
  created: number;
  format: ReasoningFormat;
}

/**
 * Renders one canonical event as an OpenAI stream chunk. Errors are not
 * chunks; the route writes those with `errorBody`.
 */
export function renderChunk(event: ChatEvent, ctx: ChunkContext, first: boolean): OpenAIStreamChunk | undefined {
  let delta: Partial<OpenAIMessage>;
  let finishReason: OpenAIFinishReason | null = null;

  switch (event.type) {
    case 'answer':
      delta = { content: event.text };
      break;
    case 'reasoning':
      delta = ctx.format === 'inline' ? { content: renderInlineReasoning(event.text) } : { reasoning_content: event.text };
      break;
    case 'finish':
      delta = {};
      finishReason = FINISH_REASONS[event.reason];
      break;
    case 'error':
      return undefined;
  }

  return {
    id: ctx.id,
    object: 'chat.completion.chunk',
    created: ctx.created,
    model: ctx.model,
    choices: [{ index: 0, delta: first ? { role: 'assistant', ...delta } : delta, finish_reason: finishReason }],
  };
}

export function renderCompletion(
  completion: AggregatedCompletion,
  format: ReasoningFormat,
  promptText: string,
): OpenAIResponse {
  const message: OpenAIMessage = { role: 'assistant', content: completion.text };
  if (completion.reasoning) {
    if (format === 'inline') message.content = renderInlineReasoning(completion.reasoning) + completion.text;
    else message.reasoning_content = completion.reasoning;
  }

  const promptTokens = estimateTokens(promptText);
  const completionTokens = estimateTokens(completion.text + (completion.reasoning ?? ''));
  return {
    id: completion.id,
    object: 'chat.completion',
    created: completion.created,
    model: completion.model,
    choices: [{ index: 0, message, finish_reason: FINISH_REASONS[completion.finishReason] }],
    usage: {
      prompt_tokens: promptTokens,
      completion_tokens: completionTokens,
      total_tokens: promptTokens + completionTokens,
    },
  };
}
