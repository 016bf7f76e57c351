import { z } from 'zod';
import { decodeJwtPayload, jwtExpiry, jwtString } from '../challenge/jwt.js';
import { zhipuSign, zhipuSignHeaders } from '../challenge/signers.js';
import type { ZhipuSettings } from '../config/schema.js';
import { GatewayError } from '../errors.js';
import { normalizeStream, parsePayload } from '../normalize/normalize.js';
import { ZhipuRule } from '../normalize/vendors/zhipu.js';
import { requireArtifact, type Credential, type RefreshedCredential } from '../session/store.js';
import type { ChatEvent, ChatMessage, ChatRequest } from '../types/chat.js';
import type { ModelConfig } from '../types/provider.js';
import { hexId } from '../utils/ids.js';
import { BaseProvider, type ProviderContext } from './base.js';

export const ZHIPU_MODELS: ModelConfig[] = [
  'zhipu',
  'chatglm',
  'glm-4',
  'glm-4-plus',
  'glm-4-air',
  'glm-4-airx',
  'glm-4-flash',
  'glm-4-long',
  'glm-4v',
  'glm-4v-plus',
].map((id): ModelConfig => ({ id, capabilities: ['chat'], enabled: true }));

const ASSISTANT_ID = /^[0-9a-f]{24}$/;

const BROWSER_HEADERS: Record<string, string> = {
  Accept: '*/*',
  'Accept-Language': 'zh-CN,zh;q=0.9',
  'App-Name': 'chatglm',
  Origin: 'https://chatglm.cn',
  Referer: 'https://chatglm.cn/main/alltoolsdetail',
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
  'X-App-Platform': 'pc',
  'X-App-Version': '0.0.1',
  'X-App-fr': 'default',
  'X-Lang': 'zh',
};

const RefreshResponseSchema = z.object({
  status: z.number(),
  message: z.string().optional(),
  result: z
    .object({
      access_token: z.string(),
      refresh_token: z.string().optional(),
    })
    .nullish(),
});

export function isAssistantId(model: string): boolean {
  return ASSISTANT_ID.test(model);
}

/**
 * Flattens the conversation into the single user turn ChatGLM expects, using
 * its own role markers when there is history to carry.
 */
export function buildZhipuMessages(messages: readonly Readonly<ChatMessage>[]): Array<Record<string, unknown>> {
  let text: string;
  if (messages.length < 2) {
    text = messages.map((message) => message.content).join('\n');
  } else {
    text = messages
      .map((message) => {
        switch (message.role) {
          case 'system':
            return `<|system|>\n${message.content}\n`;
          case 'assistant':
            return `</s>\n${message.content}\n`;
          default:
            return `<|user|>\n${message.content}\n`;
        }
      })
      .join('');
    text = `${text}</s>\n`.replace(/!\[.+\]\(.+\)/g, '').replace(/\/mnt\/data\/.+/g, '');
  }
  return [{ role: 'user', content: [{ type: 'text', text: text.trim() }] }];
}

/** chatglm.cn: JWT access tokens minted from a refresh token with a signed request. */
export class ZhipuProvider extends BaseProvider<ZhipuSettings> {
  constructor(settings: ZhipuSettings, context: ProviderContext) {
    super(
      {
        id: 'zhipu',
        name: 'Zhipu ChatGLM',
        defaultBaseUrl: 'https://chatglm.cn',
        transport: 'http-sse',
        models: ZHIPU_MODELS,
      },
      settings,
      context,
    );
  }

  supportsModel(modelId: string): boolean {
    return super.supportsModel(modelId) || isAssistantId(modelId);
  }

  protected async refreshCredential(raw: string, previous: Credential | undefined): Promise<RefreshedCredential> {
    const payload = decodeJwtPayload(raw);
    const deviceId = jwtString(payload, 'device_id') ?? hexId();
    if (jwtString(payload, 'type') !== 'refresh') {
      return { artifacts: { accessToken: raw, deviceId }, expiresAt: jwtExpiry(payload) };
    }

    const refreshToken = previous?.artifacts.refreshToken || raw;
    const response = parsePayload(
      RefreshResponseSchema,
      await this.context.http.json({
        url: this.url('/chatglm/user-api/user/refresh'),
        headers: {
          ...BROWSER_HEADERS,
          ...this.signedHeaders(deviceId),
          Authorization: `Bearer ${refreshToken}`,
        },
        body: {},
      }),
      'Zhipu',
    );
    if (response.status !== 0 || !response.result) {
      throw new GatewayError('AuthExpired', `Zhipu token refresh failed: ${response.message ?? `status ${response.status}`}`);
    }

    return {
      artifacts: {
        accessToken: response.result.access_token,
        refreshToken: response.result.refresh_token ?? refreshToken,
        deviceId,
      },
      expiresAt: this.context.now() + this.settings.accessTokenTtlSeconds * 1000,
    };
  }

  protected async *run(
    request: ChatRequest,
    credential: Credential,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<ChatEvent, void, undefined> {
    const accessToken = requireArtifact(credential, 'accessToken');
    const assistantId = isAssistantId(request.model) ? request.model : this.settings.assistantId;
    let conversationId = '';

    const events = this.context.http.sse(
      {
        url: this.url('/chatglm/backend-api/assistant/stream'),
        headers: {
          ...BROWSER_HEADERS,
          ...this.signedHeaders(requireArtifact(credential, 'deviceId')),
          Accept: 'text/event-stream',
          Authorization: `Bearer ${accessToken}`,
        },
        body: {
          assistant_id: assistantId,
          conversation_id: '',
          project_id: '',
          chat_type: 'user_chat',
          messages: buildZhipuMessages(request.messages),
          meta_data: {
            cogview: { rm_label_watermark: false },
            is_test: false,
            input_question_type: 'xxxx',
            channel: '',
            draft_id: '',
            chat_mode: 'zero',
            is_networking: false,
            quote_log_id: '',
            platform: 'pc',
          },
        },
        signal,
      },
      'lines',
    );

    try {
      yield* normalizeStream(
        events,
        new ZhipuRule({
          onConversation: (id) => {
            conversationId = id;
          },
        }),
      );
    } finally {
      if (conversationId && this.settings.deleteConversations) {
        void this.deleteConversation(conversationId, assistantId, accessToken);
      }
    }
  }

  private signedHeaders(deviceId: string): Record<string, string> {
    return {
      ...zhipuSignHeaders(zhipuSign(this.context.now(), hexId(), this.settings.signSecret)),
      'X-Device-Id': deviceId,
      'X-Request-Id': hexId(),
    };
  }

  /** Failures are logged, never raised. */
  private async deleteConversation(conversationId: string, assistantId: string, accessToken: string): Promise<void> {
    try {
      await this.context.http.json({
        url: this.url('/chatglm/backend-api/assistant/conversation/delete'),
        headers: { ...BROWSER_HEADERS, ...this.signedHeaders(hexId()), Authorization: `Bearer ${accessToken}` },
        body: { assistant_id: assistantId, conversation_id: conversationId },
      });
      this.logger.debug(`zhipu: deleted conversation ${conversationId}`);
    } catch (err) {
      this.logger.warn(`zhipu: could not delete conversation ${conversationId}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
