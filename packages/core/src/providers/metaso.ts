import { z } from 'zod';
import { assembleCookie, splitTokenPair } from '../challenge/cookies.js';
import type { MetasoSettings } from '../config/schema.js';
import { GatewayError } from '../errors.js';
import { normalizeStream, parsePayload } from '../normalize/normalize.js';
import { MetasoRule } from '../normalize/vendors/metaso.js';
import { requireArtifact, type Credential, type RefreshedCredential } from '../session/store.js';
import { lastUserMessage, type ChatEvent, type ChatRequest } from '../types/chat.js';
import type { ModelConfig } from '../types/provider.js';
import { BaseProvider, type ProviderContext } from './base.js';

export const METASO_MODELS: ModelConfig[] = [
  'metaso',
  'metaso-concise',
  'metaso-detail',
  'metaso-research',
  'metaso-scholar',
  'metaso-concise-scholar',
  'metaso-detail-scholar',
  'metaso-research-scholar',
].map((id): ModelConfig => ({ id, capabilities: ['chat', 'search'], enabled: true }));

const BROWSER_HEADERS: Record<string, string> = {
  Accept: '*/*',
  'Accept-Language': 'zh-CN,zh;q=0.9',
  Origin: 'https://metaso.cn',
  'Sec-Fetch-Dest': 'empty',
  'Sec-Fetch-Mode': 'cors',
  'Sec-Fetch-Site': 'same-origin',
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36',
};

const META_TOKEN = /<meta id="meta-token" content="([^"]*)"/;

const SessionResponseSchema = z.object({
  errCode: z.number().optional(),
  errMsg: z.string().optional(),
  id: z.string().optional(),
  data: z.object({ id: z.string().optional() }).nullish(),
});

export type MetasoMode = 'concise' | 'detail' | 'research';

export interface MetasoSearchMode {
  mode: MetasoMode;
  scholar: boolean;
}

const MODEL_MODES: ReadonlyArray<readonly [string, MetasoSearchMode]> = [
  ['concise-scholar', { mode: 'concise', scholar: true }],
  ['detail-scholar', { mode: 'detail', scholar: true }],
  ['research-scholar', { mode: 'research', scholar: true }],
  ['scholar', { mode: 'detail', scholar: true }],
  ['concise', { mode: 'concise', scholar: false }],
  ['detail', { mode: 'detail', scholar: false }],
  ['research', { mode: 'research', scholar: false }],
];

// Prompt keywords users type in the vendor's own UI.
const PROMPT_MODES: ReadonlyArray<readonly [readonly string[], MetasoSearchMode]> = [
  [['学术简洁搜索', '学术-简洁'], { mode: 'concise', scholar: true }],
  [['学术深入搜索', '学术-深入'], { mode: 'detail', scholar: true }],
  [['学术研究搜索', '学术-研究'], { mode: 'research', scholar: true }],
  [['学术'], { mode: 'detail', scholar: true }],
  [['简洁'], { mode: 'concise', scholar: false }],
  [['深入'], { mode: 'detail', scholar: false }],
  [['研究'], { mode: 'research', scholar: false }],
];

const PROMPT_PREFIXES = [/学术简洁搜索[:|：]?/g, /学术深入搜索[:|：]?/g, /学术研究搜索[:|：]?/g, /简洁搜索[:|：]?/g, /深入搜索[:|：]?/g, /研究搜索[:|：]?/g, /^学术/];

/** Search depth from the model name, then prompt keywords, then temperature. */
export function metasoSearchMode(model: string, question: string, temperature = 0.6): MetasoSearchMode {
  const lower = model.toLowerCase();
  const byModel = MODEL_MODES.find(([key]) => lower.includes(key));
  if (byModel) return byModel[1];

  const byPrompt = PROMPT_MODES.find(([keywords]) => keywords.some((keyword) => question.includes(keyword)));
  if (byPrompt) return byPrompt[1];

  if (temperature < 0.4) return { mode: 'concise', scholar: false };
  if (temperature >= 0.7) return { mode: 'research', scholar: false };
  return { mode: 'detail', scholar: false };
}

export function cleanMetasoQuestion(question: string): string {
  let cleaned = question.includes('天气') ? `${question}，直接回答` : question;
  for (const prefix of PROMPT_PREFIXES) cleaned = cleaned.replace(prefix, '');
  return cleaned.trim();
}

/** metaso.cn: cookie login, a page-embedded token, then a streamed search answer. */
export class MetasoProvider extends BaseProvider<MetasoSettings> {
  constructor(settings: MetasoSettings, context: ProviderContext) {
    super(
      {
        id: 'metaso',
        name: 'Metaso',
        defaultBaseUrl: 'https://metaso.cn',
        transport: 'http-sse',
        models: METASO_MODELS,
      },
      settings,
      context,
    );
  }

  protected async refreshCredential(raw: string): Promise<RefreshedCredential> {
    const [uid, sid] = splitTokenPair(raw);
    const cookie = assembleCookie([
      ['uid', uid],
      ['sid', sid],
    ]);
    const html = await this.context.http.text({
      url: this.url('/'),
      headers: {
        ...BROWSER_HEADERS,
        Accept: 'text/html',
        'Sec-Fetch-Dest': 'document',
        'Sec-Fetch-Mode': 'navigate',
        Cookie: cookie,
      },
    });
    const metaToken = META_TOKEN.exec(html)?.[1];
    if (!metaToken) {
      throw new GatewayError('AuthExpired', 'Metaso page did not contain a meta-token');
    }
    return { artifacts: { cookie, metaToken }, expiresAt: null };
  }

  protected async *run(
    request: ChatRequest,
    credential: Credential,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<ChatEvent, void, undefined> {
    const cookie = requireArtifact(credential, 'cookie');
    const metaToken = requireArtifact(credential, 'metaToken');
    const rawQuestion = lastUserMessage(request.messages);
    const { mode, scholar } = metasoSearchMode(request.model, rawQuestion, request.params?.temperature);
    const question = cleanMetasoQuestion(rawQuestion);

    const created = parsePayload(
      SessionResponseSchema,
      await this.context.http.json({
        url: this.url('/api/session'),
        headers: { ...BROWSER_HEADERS, Cookie: cookie, Token: metaToken, 'Is-Mini-Webview': '0' },
        body: { question, mode, engineType: scholar ? 'scholar' : '', scholarSearchDomain: 'all' },
        signal,
      }),
      'Metaso',
    );
    if (created.errCode !== undefined && created.errCode !== 0) {
      throw new GatewayError('UpstreamRejected', `Metaso session error ${created.errCode}: ${created.errMsg ?? 'unknown'}`);
    }
    const sessionId = created.data?.id ?? created.id;
    if (!sessionId) throw new GatewayError('MalformedUpstream', 'Metaso session response has no id');

    const events = this.context.http.sse(
      {
        url: this.url('/api/searchV2'),
        method: 'GET',
        headers: { ...BROWSER_HEADERS, Accept: 'text/event-stream', Cookie: cookie },
        query: {
          sessionId,
          question,
          lang: 'zh',
          mode,
          url: `${this.identity.baseUrl}/search/${sessionId}?newSearch=true&q=${encodeURIComponent(question)}`,
          enableMix: 'true',
          scholarSearchDomain: 'all',
          expectedCurrentSessionSearchCount: '1',
          'is-mini-webview': '0',
          token: metaToken,
        },
        signal,
      },
      'lines',
    );
    yield* normalizeStream(events, new MetasoRule());
  }
}
