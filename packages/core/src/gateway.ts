import { PROVIDER_IDS, type Config, type ProviderId, type ProvidersConfig } from './config/schema.js';
import { CompletionOrchestrator } from './orchestrator.js';
import { resolveModels, type ProviderContext } from './providers/base.js';
import { DEEPSEEK_MODELS, DeepSeekProvider } from './providers/deepseek.js';
import { DOUBAO_MODELS, DoubaoProvider } from './providers/doubao.js';
import { KIMI_MODELS, KimiProvider } from './providers/kimi.js';
import { METASO_MODELS, MetasoProvider } from './providers/metaso.js';
import { MINIMAX_MODELS, MinimaxProvider } from './providers/minimax.js';
import { QWEN_MODELS, QwenProvider } from './providers/qwen.js';
import { ProviderRegistry, type ProviderEntry } from './providers/registry.js';
import { isAssistantId, ZHIPU_MODELS, ZhipuProvider } from './providers/zhipu.js';
import { SessionStore } from './session/store.js';
import { HttpTransport, type FetchLike } from './transport/http.js';
import { WebSocketTransport } from './transport/websocket.js';
import type { ModelConfig, Provider } from './types/provider.js';
import { silentLogger, type Logger } from './utils/logger.js';

type ProviderFactories = {
  [K in ProviderId]: (settings: ProvidersConfig[K], context: ProviderContext) => Provider;
};

const FACTORIES: ProviderFactories = {
  deepseek: (settings, context) => new DeepSeekProvider(settings, context),
  kimi: (settings, context) => new KimiProvider(settings, context),
  metaso: (settings, context) => new MetasoProvider(settings, context),
  doubao: (settings, context) => new DoubaoProvider(settings, context),
  qwen: (settings, context) => new QwenProvider(settings, context),
  zhipu: (settings, context) => new ZhipuProvider(settings, context),
  minimax: (settings, context) => new MinimaxProvider(settings, context),
};

const DEFAULT_MODELS: Readonly<Record<ProviderId, readonly ModelConfig[]>> = {
  deepseek: DEEPSEEK_MODELS,
  kimi: KIMI_MODELS,
  metaso: METASO_MODELS,
  doubao: DOUBAO_MODELS,
  qwen: QWEN_MODELS,
  zhipu: ZHIPU_MODELS,
  minimax: MINIMAX_MODELS,
};

/** Family fragments used when a model name is not listed verbatim; checked in `PROVIDER_IDS` order. */
export const FAMILY_KEYWORDS: Readonly<Record<ProviderId, readonly string[]>> = {
  deepseek: ['deepseek', 'ds-'],
  kimi: ['kimi', 'moonshot'],
  metaso: ['metaso'],
  doubao: ['doubao'],
  qwen: ['qwen', 'tongyi'],
  zhipu: ['zhipu', 'chatglm', 'glm'],
  minimax: ['minimax'],
};

export interface GatewayOptions {
  /** Replaces global fetch for every vendor call. */
  fetch?: FetchLike;
  logger?: Logger;
  now?: () => number;
  /** Overrides for the WebSocket transport; timeouts default from the gateway config. */
  websocket?: {
    handshakeTimeoutMs?: number;
    keepaliveMs?: number;
  };
}

export interface Gateway {
  config: Config;
  sessions: SessionStore;
  registry: ProviderRegistry;
  orchestrator: CompletionOrchestrator;
}

/**
 * Wires the session store, transports, providers and orchestrator from a
 * loaded configuration. Providers without a token are left out of routing.
 */
export function createGateway(config: Config, options: GatewayOptions = {}): Gateway {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? Date.now;
  const { gateway, providers } = config;

  const sessions = new SessionStore({
    rawCredential: (providerId) => tokenFor(providers, providerId),
    refreshMarginMs: gateway.refreshMarginMs,
    now,
    logger,
  });
  const context: ProviderContext = {
    sessions,
    http: new HttpTransport({
      fetch: options.fetch,
      requestTimeoutMs: gateway.requestTimeoutMs,
      idleTimeoutMs: gateway.idleTimeoutMs,
      logger,
    }),
    websocket: new WebSocketTransport({
      handshakeTimeoutMs: options.websocket?.handshakeTimeoutMs ?? gateway.requestTimeoutMs,
      idleTimeoutMs: gateway.idleTimeoutMs,
      keepaliveMs: options.websocket?.keepaliveMs,
      logger,
    }),
    logger,
    now,
  };

  const registry = new ProviderRegistry();
  for (const id of PROVIDER_IDS) {
    registry.register(providerEntry(id, providers, context));
  }

  return {
    config,
    sessions,
    registry,
    orchestrator: new CompletionOrchestrator(registry, { now }),
  };
}

function providerEntry<K extends ProviderId>(id: K, providers: ProvidersConfig, context: ProviderContext): ProviderEntry {
  const settings = providers[id];
  const factory = FACTORIES[id];
  return {
    id,
    enabled: settings.enabled && Boolean(settings.token?.trim()),
    keywords: FAMILY_KEYWORDS[id],
    accepts: id === 'zhipu' ? isAssistantId : undefined,
    models: resolveModels(DEFAULT_MODELS[id], settings),
    create: () => factory(settings, context),
  };
}

function tokenFor(providers: ProvidersConfig, providerId: string): string | undefined {
  const id = PROVIDER_IDS.find((known) => known === providerId);
  return id ? providers[id].token : undefined;
}
