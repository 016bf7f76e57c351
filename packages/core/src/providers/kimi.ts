import { z } from 'zod';
import { decodeJwtPayload, jwtExpiry } from '../challenge/jwt.js';
import type { KimiSettings } from '../config/schema.js';
import { normalizeStream, parsePayload } from '../normalize/normalize.js';
import { KimiRule } from '../normalize/vendors/kimi.js';
import { requireArtifact, type Credential, type RefreshedCredential } from '../session/store.js';
import { encodeJsonFrame } from '../transport/frames.js';
import { lastUserMessage, type ChatEvent, type ChatRequest } from '../types/chat.js';
import type { ModelConfig } from '../types/provider.js';
import { digits } from '../utils/ids.js';
import { BaseProvider, type ProviderContext } from './base.js';

export const KIMI_MODELS: ModelConfig[] = [
  { id: 'kimi', capabilities: ['chat', 'search'], enabled: true },
  { id: 'kimi-k2.5', capabilities: ['chat', 'search'], enabled: true },
  { id: 'kimi-k2', capabilities: ['chat', 'search'], enabled: true },
  { id: 'kimi-k1.5', capabilities: ['chat', 'search'], enabled: true },
  { id: 'moonshot-v1-8k', capabilities: ['chat', 'search'], enabled: true },
  { id: 'moonshot-v1-32k', capabilities: ['chat', 'search'], enabled: true },
  { id: 'moonshot-v1-128k', capabilities: ['chat', 'search'], enabled: true },
];

const CHAT_PATH = '/apiv2/kimi.gateway.chat.v1.ChatService/Chat';

const SCENARIOS: ReadonlyArray<readonly [string, string]> = [
  ['k2.5', 'SCENARIO_K2D5'],
  ['k2', 'SCENARIO_K2'],
  ['k1.5', 'SCENARIO_K1D5'],
];
const DEFAULT_SCENARIO = 'SCENARIO_K2D5';

const BROWSER_HEADERS: Record<string, string> = {
  Accept: '*/*',
  'x-msh-platform': 'web',
  'x-msh-version': '1.0.0',
  'x-language': 'zh-CN',
  'r-timezone': 'Asia/Shanghai',
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/144.0.0.0 Safari/537.36',
  Origin: 'https://www.kimi.com',
  Referer: 'https://www.kimi.com/',
};

const UserSchema = z.object({ id: z.string() });

export function kimiScenario(model: string): string {
  const lower = model.toLowerCase();
  return SCENARIOS.find(([key]) => lower.includes(key))?.[1] ?? DEFAULT_SCENARIO;
}

export function buildKimiChat(request: ChatRequest): Record<string, unknown> {
  const scenario = kimiScenario(request.model);
  return {
    scenario,
    tools: [{ type: 'TOOL_TYPE_SEARCH', search: {} }],
    message: {
      role: 'user',
      blocks: [{ message_id: '', text: { content: lastUserMessage(request.messages) } }],
      scenario,
    },
    options: { thinking: request.model.toLowerCase().includes('think') },
  };
}

/**
 * www.kimi.com: Connect-protocol chat over HTTP, or the same envelopes over a
 * WebSocket when `transport: websocket` is configured.
 */
export class KimiProvider extends BaseProvider<KimiSettings> {
  constructor(settings: KimiSettings, context: ProviderContext) {
    super(
      {
        id: 'kimi',
        name: 'Kimi',
        defaultBaseUrl: 'https://www.kimi.com',
        transport: settings.transport === 'websocket' ? 'websocket' : 'http-json',
        models: KIMI_MODELS,
      },
      settings,
      context,
    );
  }

  protected async refreshCredential(raw: string): Promise<RefreshedCredential> {
    const authorization = `Bearer ${raw}`;
    const deviceId = digits(19);
    const sessionId = `${this.context.now()}${digits(10)}`;
    const headers = {
      ...BROWSER_HEADERS,
      Accept: 'application/json, text/plain, */*',
      Authorization: authorization,
      'x-msh-device-id': deviceId,
      'x-msh-session-id': sessionId,
    };

    const user = parsePayload(
      UserSchema,
      await this.context.http.json({ url: this.url('/api/user'), headers, query: { t: this.context.now() } }),
      'Kimi',
    );
    await this.context.http.json({ url: this.url('/api/device/register'), headers, body: {} });

    return {
      artifacts: { authorization, deviceId, sessionId, trafficId: user.id },
      expiresAt: jwtExpiry(decodeJwtPayload(raw)),
    };
  }

  protected async *run(
    request: ChatRequest,
    credential: Credential,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<ChatEvent, void, undefined> {
    const headers = {
      ...BROWSER_HEADERS,
      'Content-Type': 'application/connect+json',
      'connect-protocol-version': '1',
      Authorization: requireArtifact(credential, 'authorization'),
      'x-msh-device-id': requireArtifact(credential, 'deviceId'),
      'x-msh-session-id': requireArtifact(credential, 'sessionId'),
      'x-traffic-id': requireArtifact(credential, 'trafficId'),
    };
    const frame = encodeJsonFrame(buildKimiChat(request));

    const frames =
      this.settings.transport === 'websocket'
        ? this.context.websocket.frames({ url: this.websocketUrl(), headers, outbound: [frame], signal })
        : this.context.http.frames({ url: this.url(CHAT_PATH), headers, body: frame, signal });

    yield* normalizeStream(frames, new KimiRule());
  }

  private websocketUrl(): string {
    if (this.settings.websocketUrl) return this.settings.websocketUrl;
    return `${this.identity.baseUrl.replace(/^http/, 'ws')}${CHAT_PATH}`;
  }
}
