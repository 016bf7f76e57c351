// Types
export type {
  OpenAIMessage,
  OpenAIResponse,
  OpenAIChoice,
  OpenAIFinishReason,
  OpenAIUsage,
  OpenAIStreamChunk,
  OpenAIError,
  OpenAIModelInfo,
} from './types/openai.js';

export type {
  ModelCapability,
  ModelConfig,
  TransportKind,
  ProviderIdentity,
  Provider,
  ProviderModelEntry,
  ProviderRegistry as IProviderRegistry,
} from './types/provider.js';

export {
  answer,
  reasoning,
  finish,
  isTerminal,
  lastUserMessage,
  type ChatRole,
  type ChatMessage,
  type GenerationParams,
  type ChatRequest,
  type FinishReason,
  type ChatEvent,
  type TerminalEvent,
  type AggregatedCompletion,
  type SubmitOptions,
} from './types/chat.js';

// Errors
export {
  GatewayError,
  isGatewayError,
  isRetryable,
  toGatewayError,
  type GatewayErrorKind,
  type GatewayErrorOptions,
} from './errors.js';

// Challenge engine
export * from './challenge/index.js';

// Sessions & transports
export {
  SessionStore,
  requireArtifact,
  type Credential,
  type RefreshedCredential,
  type CredentialRefresher,
  type SessionStoreOptions,
} from './session/store.js';
export { HttpTransport, vendorMessage, type FetchLike, type HttpCall, type HttpTransportOptions } from './transport/http.js';
export { WebSocketTransport, type WebSocketCall, type WebSocketTransportOptions } from './transport/websocket.js';
export { SseParser, type SseEvent, type SseMode } from './transport/sse.js';
export {
  FrameFlag,
  FrameDecoder,
  MAX_FRAME_BYTES,
  encodeFrame,
  encodeJsonFrame,
  decodeFramePayload,
  type Frame,
} from './transport/frames.js';

// Normalizer
export * from './normalize/index.js';

// Providers
export { BaseProvider, resolveModels, type ProviderContext, type ProviderDescriptor } from './providers/base.js';
export { ProviderRegistry, type ProviderEntry } from './providers/registry.js';
export { DeepSeekProvider } from './providers/deepseek.js';
export { KimiProvider } from './providers/kimi.js';
export { MetasoProvider } from './providers/metaso.js';
export { DoubaoProvider } from './providers/doubao.js';
export { QwenProvider } from './providers/qwen.js';
export { ZhipuProvider } from './providers/zhipu.js';
export { MinimaxProvider } from './providers/minimax.js';
export { CompletionOrchestrator, type CompletionOrchestratorOptions } from './orchestrator.js';
export { createGateway, FAMILY_KEYWORDS, type Gateway, type GatewayOptions } from './gateway.js';

// Config
export {
  ConfigSchema,
  PROVIDER_IDS,
  type Config,
  type ServerConfig,
  type GatewayConfig,
  type ProvidersConfig,
  type ProviderId,
  type ProviderSettings,
} from './config/schema.js';
export { loadConfig, parseConfig, applyEnvironment, tokenVariable, DEFAULT_CONFIG_PATHS } from './config/loader.js';

// Utilities
export { completionId, unixSeconds, uuid, hexId } from './utils/ids.js';
export { AsyncQueue } from './utils/async-queue.js';

// Logging
export { createConsoleLogger, silentLogger, type Logger } from './utils/logger.js';
