import type { ChatEvent, ChatRequest, SubmitOptions } from './chat.js';

export type ModelCapability = 'chat' | 'reasoning' | 'search';

export interface ModelConfig {
  id: string;
  alias?: string;
  capabilities: ModelCapability[];
  enabled: boolean;
}

export type TransportKind = 'http-sse' | 'http-json' | 'websocket';

/**
 * Static description of one vendor backend. Built once from configuration and
 * frozen; secret material lives in the provider's own read-only settings.
 */
export interface ProviderIdentity {
  readonly id: string;
  readonly name: string;
  readonly baseUrl: string;
  readonly transport: TransportKind;
}

export interface Provider {
  readonly identity: ProviderIdentity;
  readonly models: readonly ModelConfig[];

  supportsModel(modelId: string): boolean;
  /**
   * Lazily runs one chat request against the vendor. The sequence is finite,
   * ends with exactly one `finish` or `error` event unless the caller
   * cancels, and cannot be restarted.
   */
  submit(request: ChatRequest, options?: SubmitOptions): AsyncGenerator<ChatEvent, void, undefined>;
}

export interface ProviderModelEntry {
  model: ModelConfig;
  provider: ProviderIdentity;
}

export interface ProviderRegistry {
  resolve(modelId: string): Provider;
  list(): ProviderIdentity[];
  listModels(): ProviderModelEntry[];
}
