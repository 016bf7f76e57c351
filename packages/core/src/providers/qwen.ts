import { assembleCookie, parseCookieString, type CookieFragment } from '../challenge/cookies.js';
import type { QwenSettings } from '../config/schema.js';
import { normalizeStream } from '../normalize/normalize.js';
import { QwenRule } from '../normalize/vendors/qwen.js';
import { requireArtifact, type Credential, type RefreshedCredential } from '../session/store.js';
import { lastUserMessage, type ChatEvent, type ChatRequest } from '../types/chat.js';
import type { ModelConfig } from '../types/provider.js';
import { hexId } from '../utils/ids.js';
import { BaseProvider, type ProviderContext } from './base.js';

const MODEL_CODES: Record<string, string> = {
  qwen: 'Qwen',
  qwen3: 'Qwen',
  'qwen3.5-plus': 'Qwen3.5-Plus',
  'qwen3-max': 'Qwen3-Max',
  'qwen3-max-thinking': 'Qwen3-Max-Thinking-Preview',
  'qwen3-flash': 'Qwen3-Flash',
  'qwen3-coder': 'Qwen3-Coder',
  'qwen-vl-plus': 'Qwen-VL-Max',
  'qwen-vl-max': 'Qwen-VL-Max',
  'qwen-long': 'Qwen-Long',
};

export const QWEN_MODELS: ModelConfig[] = Object.keys(MODEL_CODES).map(
  (id): ModelConfig => ({
    id,
    capabilities: id.includes('thinking') ? ['chat', 'reasoning'] : ['chat'],
    enabled: true,
  }),
);

const BROWSER_HEADERS: Record<string, string> = {
  Accept: 'text/event-stream',
  'Accept-Language': 'zh-CN,zh;q=0.9',
  Origin: 'https://www.qianwen.com',
  Referer: 'https://www.qianwen.com/',
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/144.0.0.0 Safari/537.36',
  'X-Platform': 'pc_tongyi',
};

export function qwenModelCode(model: string): string {
  return MODEL_CODES[model.toLowerCase()] ?? 'Qwen';
}

/**
 * Accepts either a full cookie string copied from the browser or a bare
 * `tongyi_sso_ticket` value.
 */
export function parseQwenToken(raw: string): { cookie: string; xsrfToken: string } {
  const fragments: CookieFragment[] = raw.includes('=') ? parseCookieString(raw) : [['tongyi_sso_ticket', raw]];
  const xsrf = fragments.find(([name]) => name === 'XSRF-TOKEN')?.[1];
  return { cookie: assembleCookie(fragments), xsrfToken: xsrf ? safeDecode(xsrf) : '' };
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/** Tongyi Qianwen web dialog API. */
export class QwenProvider extends BaseProvider<QwenSettings> {
  constructor(settings: QwenSettings, context: ProviderContext) {
    super(
      {
        id: 'qwen',
        name: 'Qwen',
        defaultBaseUrl: 'https://qianwen.biz.aliyun.com/dialog',
        transport: 'http-sse',
        models: QWEN_MODELS,
      },
      settings,
      context,
    );
  }

  protected async refreshCredential(raw: string): Promise<RefreshedCredential> {
    const { cookie, xsrfToken } = parseQwenToken(raw);
    return { artifacts: { cookie, xsrfToken }, expiresAt: null };
  }

  protected async *run(
    request: ChatRequest,
    credential: Credential,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<ChatEvent, void, undefined> {
    const headers: Record<string, string> = { ...BROWSER_HEADERS, Cookie: requireArtifact(credential, 'cookie') };
    const xsrf = credential.artifacts.xsrfToken;
    if (xsrf) headers['X-Xsrf-Token'] = xsrf;

    const events = this.context.http.sse(
      {
        url: this.url('/conversation'),
        headers,
        body: {
          action: 'next',
          contents: [{ contentType: 'text', content: lastUserMessage(request.messages), role: 'user' }],
          mode: 'chat',
          model: qwenModelCode(request.model),
          requestId: hexId(),
          parentMsgId: '0',
          sessionId: '',
          sessionType: 'text_chat',
          userAction: 'chat',
        },
        signal,
      },
      'lines',
    );
    yield* normalizeStream(events, new QwenRule());
  }
}
