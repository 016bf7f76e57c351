import { assembleCookie } from '../challenge/cookies.js';
import type { DoubaoSettings } from '../config/schema.js';
import { normalizeStream } from '../normalize/normalize.js';
import { DoubaoRule, TEXT_BLOCK } from '../normalize/vendors/doubao.js';
import { requireArtifact, type Credential, type RefreshedCredential } from '../session/store.js';
import { lastUserMessage, type ChatEvent, type ChatRequest } from '../types/chat.js';
import type { ModelConfig } from '../types/provider.js';
import { digits, uuid } from '../utils/ids.js';
import { BaseProvider, type ProviderContext } from './base.js';

export const DOUBAO_MODELS: ModelConfig[] = ['doubao', 'doubao-pro', 'doubao-lite', 'doubao-1.5-pro', 'doubao-1.5-lite'].map(
  (id): ModelConfig => ({ id, capabilities: ['chat'], enabled: true }),
);

const APP_ID = '497858';

const BROWSER_HEADERS: Record<string, string> = {
  Accept: '*/*',
  'Accept-Language': 'zh-CN,zh;q=0.9',
  Origin: 'https://www.doubao.com',
  Referer: 'https://www.doubao.com/chat/',
  'Sec-Fetch-Dest': 'empty',
  'Sec-Fetch-Mode': 'cors',
  'Sec-Fetch-Site': 'same-origin',
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/144.0.0.0 Safari/537.36',
};

export interface DoubaoBodyOptions {
  text: string;
  botId: string;
  fp: string;
  nowMs: number;
}

export function buildDoubaoBody(options: DoubaoBodyOptions): Record<string, unknown> {
  return {
    client_meta: {
      local_conversation_id: `local_${options.nowMs}${digits(6)}`,
      conversation_id: '',
      bot_id: options.botId,
      last_section_id: '',
      last_message_index: null,
    },
    messages: [
      {
        local_message_id: uuid(),
        content_block: [
          {
            block_type: TEXT_BLOCK,
            content: {
              text_block: { text: options.text, icon_url: '', icon_url_dark: '', summary: '' },
              pc_event_block: '',
            },
            block_id: uuid(),
            parent_id: '',
            meta_info: [],
            append_fields: [],
          },
        ],
        message_status: 0,
      },
    ],
    option: {
      send_message_scene: '',
      create_time_ms: options.nowMs,
      collect_id: '',
      is_audio: false,
      answer_with_suggest: false,
      tts_switch: false,
      need_deep_think: 0,
      click_clear_context: false,
      from_suggest: false,
      is_regen: false,
      is_replace: false,
      disable_sse_cache: false,
      select_text_action: '',
      resend_for_regen: false,
      scene_type: 0,
      unique_key: uuid(),
      start_seq: 0,
      need_create_conversation: true,
      conversation_init_option: { need_ack_conversation: true },
      regen_query_id: [],
      edit_query_id: [],
      regen_instruction: '',
      no_replace_for_regen: false,
      message_from: 0,
      shared_app_name: '',
      sse_recv_event_options: { support_chunk_delta: true },
      is_ai_playground: false,
    },
    ext: {
      use_deep_think: '0',
      fp: options.fp,
      conversation_init_option: '{"need_ack_conversation":true}',
      commerce_credit_config_enable: '0',
      sub_conv_firstmet_type: '1',
    },
  };
}

/** www.doubao.com: session cookie plus browser fingerprint query parameters. */
export class DoubaoProvider extends BaseProvider<DoubaoSettings> {
  constructor(settings: DoubaoSettings, context: ProviderContext) {
    super(
      {
        id: 'doubao',
        name: 'Doubao',
        defaultBaseUrl: 'https://www.doubao.com',
        transport: 'http-sse',
        models: DOUBAO_MODELS,
      },
      settings,
      context,
    );
  }

  protected async refreshCredential(raw: string): Promise<RefreshedCredential> {
    return {
      artifacts: {
        cookie: assembleCookie([
          ['sessionid', raw],
          ['sessionid_ss', raw],
        ]),
        deviceId: digits(19),
        webId: digits(19),
        teaUuid: digits(19),
        fp: `verify_${uuid().replace(/-/g, '_').slice(0, 20)}`,
      },
      expiresAt: null,
    };
  }

  protected async *run(
    request: ChatRequest,
    credential: Credential,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<ChatEvent, void, undefined> {
    const fp = requireArtifact(credential, 'fp');
    const events = this.context.http.sse(
      {
        url: this.url('/chat/completion'),
        headers: { ...BROWSER_HEADERS, Cookie: requireArtifact(credential, 'cookie') },
        query: {
          aid: APP_ID,
          device_id: requireArtifact(credential, 'deviceId'),
          device_platform: 'web',
          fp,
          language: 'zh',
          pc_version: '3.5.10',
          pkg_type: 'release_version',
          real_aid: APP_ID,
          region: '',
          samantha_web: '1',
          sys_region: '',
          tea_uuid: requireArtifact(credential, 'teaUuid'),
          'use-olympus-account': '1',
          version_code: '20800',
          web_id: requireArtifact(credential, 'webId'),
          web_tab_id: uuid(),
        },
        body: buildDoubaoBody({
          text: lastUserMessage(request.messages),
          botId: this.settings.botId,
          fp,
          nowMs: this.context.now(),
        }),
        signal,
      },
      'events',
    );
    yield* normalizeStream(events, new DoubaoRule());
  }
}
