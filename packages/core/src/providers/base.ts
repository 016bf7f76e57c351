import type { ProviderSettings } from '../config/schema.js';
import { isRetryable, toGatewayError } from '../errors.js';
import { EventSequencer } from '../normalize/sequencer.js';
import type { Credential, RefreshedCredential, SessionStore } from '../session/store.js';
import type { HttpTransport } from '../transport/http.js';
import type { WebSocketTransport } from '../transport/websocket.js';
import { finish, type ChatEvent, type ChatRequest, type SubmitOptions } from '../types/chat.js';
import type { ModelConfig, Provider, ProviderIdentity, TransportKind } from '../types/provider.js';
import type { Logger } from '../utils/logger.js';

/** Shared plumbing handed to every provider by the gateway. */
export interface ProviderContext {
  sessions: SessionStore;
  http: HttpTransport;
  websocket: WebSocketTransport;
  logger: Logger;
  now: () => number;
}

export interface ProviderDescriptor {
  id: string;
  name: string;
  defaultBaseUrl: string;
  transport: TransportKind;
  models: readonly ModelConfig[];
}

/** Builds the effective model list: configured entries replace the defaults, keeping known capabilities. */
export function resolveModels(defaults: readonly ModelConfig[], settings: ProviderSettings): ModelConfig[] {
  if (!settings.models) return defaults.map((model) => ({ ...model }));
  return settings.models.map((model) => ({
    id: model.id,
    alias: model.alias,
    enabled: model.enabled,
    capabilities: defaults.find((known) => known.id === model.id)?.capabilities ?? ['chat'],
  }));
}

export abstract class BaseProvider<S extends ProviderSettings = ProviderSettings> implements Provider {
  readonly identity: ProviderIdentity;
  readonly models: readonly ModelConfig[];

  protected readonly settings: S;
  protected readonly context: ProviderContext;
  protected readonly logger: Logger;

  constructor(descriptor: ProviderDescriptor, settings: S, context: ProviderContext) {
    this.identity = Object.freeze({
      id: descriptor.id,
      name: descriptor.name,
      baseUrl: (settings.baseUrl ?? descriptor.defaultBaseUrl).replace(/\/+$/, ''),
      transport: descriptor.transport,
    });
    this.models = Object.freeze(resolveModels(descriptor.models, settings));
    this.settings = settings;
    this.context = context;
    this.logger = context.logger;
    context.sessions.register(this.identity, (raw, previous) => this.refreshCredential(raw, previous));
  }

  /** Derives short-lived artifacts (tokens, cookies, ids) from the operator's raw secret. */
  protected abstract refreshCredential(raw: string, previous: Credential | undefined): Promise<RefreshedCredential>;

  /** One attempt at the vendor call, already normalized. */
  protected abstract run(
    request: ChatRequest,
    credential: Credential,
    signal: AbortSignal | undefined,
  ): AsyncIterable<ChatEvent>;

  supportsModel(modelId: string): boolean {
    return this.models.some(
      m => m.enabled && (m.id === modelId || m.alias === modelId)
    );
  }

  protected url(path: string): string {
    return `${this.identity.baseUrl}${path}`;
  }

  /**
   * Runs the request with one transparent retry: after `AuthExpired` (with
   * the cached credential invalidated) or a transport failure, and only while
   * nothing has been emitted. Every other failure becomes a single `error`
   * event; a caller abort ends the sequence without one.
   */
  async *submit(request: ChatRequest, options: SubmitOptions = {}): AsyncGenerator<ChatEvent, void, undefined> {
    const { signal } = options;
    const sequencer = new EventSequencer();
    let emitted = false;

    for (let attempt = 1; ; attempt++) {
      try {
        const credential = await this.context.sessions.acquire(this.identity);
        for await (const event of this.run(request, credential, signal)) {
          if (signal?.aborted) return;
          const accepted = sequencer.accept(event);
          if (accepted) {
            emitted = true;
            yield accepted;
          }
          if (sequencer.done) return;
        }
        if (signal?.aborted) return;
        yield finish();
        return;
      } catch (err) {
        if (signal?.aborted) return;
        const error = toGatewayError(err);
        const retry = attempt === 1 && !emitted && (error.kind === 'AuthExpired' || isRetryable(error.kind));
        if (retry) {
          if (error.kind === 'AuthExpired') this.context.sessions.invalidate(this.identity);
          this.logger.warn(`${this.identity.id}: ${error.kind} (${error.message}), retrying once`);
          continue;
        }
        this.logger.error(`${this.identity.id}: ${error.kind}: ${error.message}`);
        yield { type: 'error', kind: error.kind, message: error.message };
        return;
      }
    }
  }
}
