import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import { decodeJwtPayload, jwtExpiry, jwtString } from '../challenge/jwt.js';
import { minimaxSignRequest } from '../challenge/signers.js';
import type { MinimaxSettings } from '../config/schema.js';
import { GatewayError } from '../errors.js';
import { normalizeStream, parsePayload } from '../normalize/normalize.js';
import { MinimaxRule } from '../normalize/vendors/minimax.js';
import { requireArtifact, type Credential, type RefreshedCredential } from '../session/store.js';
import type { ChatEvent, ChatRequest } from '../types/chat.js';
import type { ModelConfig } from '../types/provider.js';
import { uuid } from '../utils/ids.js';
import { BaseProvider, type ProviderContext } from './base.js';

export const MINIMAX_MODELS: ModelConfig[] = [
  { id: 'minimax', capabilities: ['chat', 'reasoning'], enabled: true },
  { id: 'minimax-auto', capabilities: ['chat', 'reasoning'], enabled: true },
  { id: 'MiniMax-M2.5', capabilities: ['chat', 'reasoning'], enabled: true },
];

const SEND_PATH = '/matrix/api/v1/chat/send_msg';
const DETAIL_PATH = '/matrix/api/v1/chat/get_chat_detail';

const BROWSER_HEADERS: Record<string, string> = {
  Accept: 'application/json, text/plain, */*',
  'Accept-Language': 'zh-CN,zh;q=0.9',
  Origin: 'https://agent.minimaxi.com',
  Referer: 'https://agent.minimaxi.com/',
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/144.0.0.0 Safari/537.36',
};

const SendResponseSchema = z.object({
  base_resp: z
    .object({
      status_code: z.number(),
      status_msg: z.string().optional(),
    })
    .optional(),
  chat_id: z.union([z.string(), z.number()]).optional(),
  msg_id: z.union([z.string(), z.number()]).optional(),
});

export interface MinimaxModelOption {
  display_name: string;
  model_type: number;
}

export function minimaxModelOption(model: string): MinimaxModelOption {
  const lower = model.toLowerCase();
  if (lower.includes('auto') || lower === 'minimax') {
    return { display_name: 'Auto', model_type: 0 };
  }
  return { display_name: 'MiniMax-M2.5', model_type: 501 };
}

export interface MinimaxQueryInput {
  unixSeconds: number;
  uuid: string;
  deviceId: string;
  userId: string;
  token: string;
}

/** Browser fingerprint parameters, in the order the signature covers them. */
export function minimaxQuery(input: MinimaxQueryInput): string {
  return new URLSearchParams([
    ['device_platform', 'web'],
    ['biz_id', '3'],
    ['app_id', '3001'],
    ['version_code', '22201'],
    ['unix', String(input.unixSeconds * 1000)],
    ['timezone_offset', '28800'],
    ['lang', 'zh'],
    ['uuid', input.uuid],
    ['device_id', input.deviceId],
    ['os_name', 'Windows'],
    ['browser_name', 'chrome'],
    ['device_memory', '8'],
    ['cpu_core_num', '32'],
    ['browser_language', 'zh-CN'],
    ['browser_platform', 'Win32'],
    ['user_id', input.userId],
    ['screen_width', '1600'],
    ['screen_height', '1000'],
    ['token', input.token],
    ['client', 'web'],
  ]).toString();
}

/**
 * agent.minimaxi.com: signed JSON calls. A message is sent, then the chat is
 * polled until the reply is marked complete.
 */
export class MinimaxProvider extends BaseProvider<MinimaxSettings> {
  constructor(settings: MinimaxSettings, context: ProviderContext) {
    super(
      {
        id: 'minimax',
        name: 'MiniMax',
        defaultBaseUrl: 'https://agent.minimaxi.com',
        transport: 'http-json',
        models: MINIMAX_MODELS,
      },
      settings,
      context,
    );
  }

  protected async refreshCredential(raw: string): Promise<RefreshedCredential> {
    const payload = decodeJwtPayload(raw);
    const expiresAt = jwtExpiry(payload);
    if (expiresAt !== null && expiresAt <= this.context.now()) {
      throw new GatewayError('AuthExpired', 'MiniMax token has expired; sign in again and update the token');
    }
    return {
      artifacts: {
        token: raw,
        userId: jwtString(payload, 'user', 'id') ?? '',
        deviceId: jwtString(payload, 'user', 'deviceID') ?? '',
        uuid: uuid(),
      },
      expiresAt,
    };
  }

  protected async *run(
    request: ChatRequest,
    credential: Credential,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<ChatEvent, void, undefined> {
    const sent = parsePayload(
      SendResponseSchema,
      await this.signedPost(
        SEND_PATH,
        {
          msg_type: 1,
          text: request.messages.map((message) => message.content).join('\n'),
          chat_type: 2,
          attachments: [],
          selected_mcp_tools: [],
          sub_agent_ids: [],
          model_option: minimaxModelOption(request.model),
        },
        credential,
        signal,
      ),
      'MiniMax',
    );
    const status = sent.base_resp?.status_code ?? 0;
    if (status !== 0) {
      throw new GatewayError('UpstreamRejected', `MiniMax error ${status}: ${sent.base_resp?.status_msg ?? 'unknown'}`);
    }
    if (sent.chat_id === undefined) {
      throw new GatewayError('MalformedUpstream', 'MiniMax send_msg response has no chat_id');
    }

    yield* normalizeStream(this.poll(sent.chat_id, credential, signal), new MinimaxRule());
  }

  private async *poll(
    chatId: string | number,
    credential: Credential,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<unknown, void, undefined> {
    const deadline = this.context.now() + this.settings.maxWaitMs;
    while (this.context.now() < deadline) {
      await sleep(this.settings.pollIntervalMs, undefined, { signal });
      yield await this.signedPost(DETAIL_PATH, { chat_id: chatId, size: 500, desc: true }, credential, signal);
    }
    throw new GatewayError('UpstreamTimeout', `MiniMax reply not complete after ${this.settings.maxWaitMs}ms`);
  }

  private signedPost(
    path: string,
    body: Record<string, unknown>,
    credential: Credential,
    signal: AbortSignal | undefined,
  ): Promise<unknown> {
    const token = requireArtifact(credential, 'token');
    const unixSeconds = Math.floor(this.context.now() / 1000);
    const pathWithQuery = `${path}?${minimaxQuery({
      unixSeconds,
      uuid: requireArtifact(credential, 'uuid'),
      deviceId: credential.artifacts.deviceId ?? '',
      userId: credential.artifacts.userId ?? '',
      token,
    })}`;
    const bodyJson = JSON.stringify(body);
    const signed = minimaxSignRequest({
      unixSeconds,
      pathWithQuery,
      bodyJson,
      secret: this.settings.signatureSecret,
      yySuffix: this.settings.yySuffix,
    });
    return this.context.http.json({
      url: this.url(pathWithQuery),
      headers: { ...BROWSER_HEADERS, 'Content-Type': 'application/json', token, ...signed },
      body: bodyJson,
      signal,
    });
  }
}
