import { z } from 'zod';
import { encodePowResponse, parsePowChallenge, solvePowCooperatively } from '../challenge/pow.js';
import type { DeepSeekSettings } from '../config/schema.js';
import { GatewayError } from '../errors.js';
import { normalizeStream, parsePayload } from '../normalize/normalize.js';
import { DEEPSEEK_AUTH_CODES, DeepSeekRule } from '../normalize/vendors/deepseek.js';
import { requireArtifact, type Credential, type RefreshedCredential } from '../session/store.js';
import type { ChatEvent, ChatMessage, ChatRequest } from '../types/chat.js';
import type { ModelConfig } from '../types/provider.js';
import { BaseProvider, type ProviderContext } from './base.js';

export const DEEPSEEK_MODELS: ModelConfig[] = [
  { id: 'deepseek-chat', capabilities: ['chat'], enabled: true },
  { id: 'deepseek-reasoner', capabilities: ['chat', 'reasoning'], enabled: true },
  { id: 'deepseek', capabilities: ['chat'], enabled: true },
  { id: 'deepseek-r1', capabilities: ['chat', 'reasoning'], enabled: true },
];

const COMPLETION_PATH = '/api/v0/chat/completion';

const BROWSER_HEADERS: Record<string, string> = {
  Accept: '*/*',
  'x-client-locale': 'zh_CN',
  'x-client-platform': 'web',
  'x-client-version': '1.7.0',
  'x-app-version': '20241129.1',
  'x-client-timezone-offset': '28800',
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/144.0.0.0 Safari/537.36',
  Origin: 'https://chat.deepseek.com',
  Referer: 'https://chat.deepseek.com/',
};

const EnvelopeSchema = z.object({
  code: z.number(),
  msg: z.string().optional(),
  data: z
    .object({
      biz_code: z.number().optional(),
      biz_msg: z.string().optional(),
      biz_data: z.unknown(),
    })
    .nullish(),
});

const SessionSchema = z.object({ id: z.string() });
const ChallengeEnvelopeSchema = z.object({ challenge: z.unknown() });

/** Unwraps `{code, data: {biz_code, biz_data}}`, classifying vendor failures. */
function bizData(value: unknown): unknown {
  const envelope = parsePayload(EnvelopeSchema, value, 'DeepSeek');
  if (envelope.code !== 0) {
    const kind = DEEPSEEK_AUTH_CODES.has(envelope.code) ? 'AuthExpired' : 'UpstreamRejected';
    throw new GatewayError(kind, `DeepSeek error ${envelope.code}: ${envelope.msg ?? 'unknown'}`);
  }
  const data = envelope.data;
  if (!data) throw new GatewayError('MalformedUpstream', 'DeepSeek response has no data');
  if (data.biz_code !== undefined && data.biz_code !== 0) {
    throw new GatewayError('UpstreamRejected', `DeepSeek error ${data.biz_code}: ${data.biz_msg ?? 'unknown'}`);
  }
  return data.biz_data;
}

export function buildDeepSeekPrompt(messages: readonly Readonly<ChatMessage>[]): string {
  return messages
    .map((message) => {
      switch (message.role) {
        case 'system':
          return `[System]: ${message.content}`;
        case 'assistant':
          return `[Assistant]: ${message.content}`;
        default:
          return message.content;
      }
    })
    .join('\n');
}

export function isReasonerModel(model: string): boolean {
  const lower = model.toLowerCase();
  return lower.includes('reasoner') || lower.includes('r1') || lower.includes('think');
}

/**
 * chat.deepseek.com: bearer token, a fresh chat session per request and a
 * proof-of-work answer attached to every completion call.
 */
export class DeepSeekProvider extends BaseProvider<DeepSeekSettings> {
  constructor(settings: DeepSeekSettings, context: ProviderContext) {
    super(
      {
        id: 'deepseek',
        name: 'DeepSeek',
        defaultBaseUrl: 'https://chat.deepseek.com',
        transport: 'http-sse',
        models: DEEPSEEK_MODELS,
      },
      settings,
      context,
    );
  }

  protected async refreshCredential(raw: string): Promise<RefreshedCredential> {
    return { artifacts: { authorization: `Bearer ${raw}` }, expiresAt: null };
  }

  protected async *run(
    request: ChatRequest,
    credential: Credential,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<ChatEvent, void, undefined> {
    const headers = { ...BROWSER_HEADERS, Authorization: requireArtifact(credential, 'authorization') };
    const { http } = this.context;

    const session = parsePayload(
      SessionSchema,
      bizData(await http.json({ url: this.url('/api/v0/chat_session/create'), headers, body: {}, signal })),
      'DeepSeek',
    );

    const challengeData = parsePayload(
      ChallengeEnvelopeSchema,
      bizData(
        await http.json({
          url: this.url('/api/v0/chat/create_pow_challenge'),
          headers,
          body: { target_path: COMPLETION_PATH },
          signal,
        }),
      ),
      'DeepSeek',
    );
    const challenge = parsePowChallenge(challengeData.challenge);
    const answer = await solvePowCooperatively(challenge, this.settings.pow, {
      batchSize: this.settings.pow.batchSize,
      signal,
    });
    this.logger.debug(`deepseek: PoW solved at nonce ${answer} (difficulty ${challenge.difficulty})`);

    const events = http.sse(
      {
        url: this.url(COMPLETION_PATH),
        headers: { ...headers, 'x-ds-pow-response': encodePowResponse(challenge, answer) },
        body: {
          chat_session_id: session.id,
          parent_message_id: null,
          prompt: buildDeepSeekPrompt(request.messages),
          ref_file_ids: [],
          thinking_enabled: isReasonerModel(request.model),
          search_enabled: false,
          preempt: false,
        },
        signal,
      },
      'lines',
    );
    yield* normalizeStream(events, new DeepSeekRule());
  }
}
