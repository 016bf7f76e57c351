import { Hono } from 'hono';
import { stream } from 'hono/streaming';
import { z } from 'zod';
import {
  completionId,
  isGatewayError,
  unixSeconds,
  type ChatEvent,
  type ChatRequest,
  type CompletionOrchestrator,
  type Logger,
  type OpenAIError,
} from '@chatbridge/core';
import { errorBody, errorStatus, renderChunk, renderCompletion, type ReasoningFormat } from '../render.js';

interface ChatContext {
  orchestrator: Pick<CompletionOrchestrator, 'stream' | 'complete'>;
  reasoningFormat: ReasoningFormat;
  logger: Logger;
  now?: () => number;
}

const ContentSchema = z.union([
  z.string(),
  z
    .array(z.object({ type: z.string(), text: z.string().optional() }))
    .transform((parts) => parts.map((part) => (part.type === 'text' ? part.text ?? '' : '')).join('')),
]);

export const ChatRequestSchema = z.object({
  model: z.string().min(1),
  messages: z
    .array(
      z.object({
        role: z.enum(['system', 'user', 'assistant']),
        content: z.union([ContentSchema, z.null()]).transform((content) => content ?? ''),
      }),
    )
    .min(1),
  stream: z.boolean().default(false),
  temperature: z.number().min(0).max(2).optional(),
  top_p: z.number().min(0).max(1).optional(),
  max_tokens: z.number().int().positive().optional(),
  stop: z.union([z.string(), z.array(z.string())]).optional(),
});

export type ChatRequestBody = z.infer<typeof ChatRequestSchema>;

export function toChatRequest(body: ChatRequestBody): ChatRequest {
  return {
    model: body.model,
    messages: body.messages,
    stream: body.stream,
    params: {
      temperature: body.temperature,
      topP: body.top_p,
      maxTokens: body.max_tokens,
      stop: typeof body.stop === 'string' ? [body.stop] : body.stop,
    },
  };
}

export function createChatRoutes(ctx: ChatContext) {
  const app = new Hono();
  const now = ctx.now ?? Date.now;

  app.post('/v1/chat/completions', async (c) => {
    const rawBody: unknown = await c.req.json().catch(() => null);
    const parsed = ChatRequestSchema.safeParse(rawBody);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      return c.json<OpenAIError>({
        error: {
          message: `Invalid request body${where}: ${issue?.message ?? 'expected { model, messages }'}`,
          type: 'invalid_request_error',
          code: 'invalid_body',
        },
      }, 400);
    }
    const request = toChatRequest(parsed.data);

    if (!request.stream) {
      try {
        const completion = await ctx.orchestrator.complete(request, { signal: c.req.raw.signal });
        const prompt = request.messages.map((message) => message.content).join('\n');
        return c.json(renderCompletion(completion, ctx.reasoningFormat, prompt));
      } catch (err) {
        if (!isGatewayError(err)) throw err;
        ctx.logger.warn(`chat ${request.model}: ${err.kind}: ${err.message}`);
        return c.json(errorBody(err.kind, err.message), errorStatus(err.kind));
      }
    }

    const controller = new AbortController();
    let events: AsyncGenerator<ChatEvent, void, undefined>;
    try {
      events = ctx.orchestrator.stream(request, { signal: controller.signal });
    } catch (err) {
      if (!isGatewayError(err)) throw err;
      return c.json(errorBody(err.kind, err.message), errorStatus(err.kind));
    }

    c.header('Content-Type', 'text/event-stream; charset=utf-8');
    c.header('Cache-Control', 'no-cache');
    c.header('Connection', 'keep-alive');
    c.header('X-Accel-Buffering', 'no');

    return stream(c, async (streamWriter) => {
      streamWriter.onAbort(() => controller.abort());
      const chunkContext = {
        id: completionId(),
        model: request.model,
        created: unixSeconds(now()),
        format: ctx.reasoningFormat,
      };
      let first = true;

      try {
        for await (const event of events) {
          if (event.type === 'error') {
            await streamWriter.write(`data: ${JSON.stringify(errorBody(event.kind, event.message))}\n\n`);
            break;
          }
          const chunk = renderChunk(event, chunkContext, first);
          if (!chunk) continue;
          first = false;
          await streamWriter.write(`data: ${JSON.stringify(chunk)}\n\n`);
        }
        if (!controller.signal.aborted) {
          await streamWriter.write('data: [DONE]\n\n');
        }
      } finally {
        await events.return(undefined);
      }
    });
  });

  return app;
}
