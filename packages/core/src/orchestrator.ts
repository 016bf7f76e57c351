import { GatewayError } from './errors.js';
import type { AggregatedCompletion, ChatEvent, ChatRequest, FinishReason, SubmitOptions } from './types/chat.js';
import type { ProviderRegistry } from './types/provider.js';
import { completionId, unixSeconds } from './utils/ids.js';

export interface CompletionOrchestratorOptions {
  now?: () => number;
}

/**
 * Entry point for one chat request: picks the provider, then either relays
 * its events or folds them into a single completion.
 */
export class CompletionOrchestrator {
  private readonly registry: ProviderRegistry;
  private readonly now: () => number;

  constructor(registry: ProviderRegistry, options: CompletionOrchestratorOptions = {}) {
    this.registry = registry;
    this.now = options.now ?? Date.now;
  }

  /**
   * Resolves the model before returning, so an unknown model throws here
   * rather than surfacing as an event.
   */
  stream(request: ChatRequest, options: SubmitOptions = {}): AsyncGenerator<ChatEvent, void, undefined> {
    const provider = this.registry.resolve(request.model);
    return provider.submit(request, options);
  }

  async complete(request: ChatRequest, options: SubmitOptions = {}): Promise<AggregatedCompletion> {
    const events = this.stream(request, options);
    let text = '';
    let reasoning = '';
    let finishReason: FinishReason = 'completed';

    for await (const event of events) {
      switch (event.type) {
        case 'answer':
          text += event.text;
          break;
        case 'reasoning':
          reasoning += event.text;
          break;
        case 'finish':
          finishReason = event.reason;
          break;
        case 'error':
          throw new GatewayError(event.kind, event.message);
      }
    }

    if (options.signal?.aborted) {
      throw new GatewayError('UpstreamTransportError', 'Request cancelled by caller');
    }

    return {
      id: completionId(),
      model: request.model,
      created: unixSeconds(this.now()),
      text,
      ...(reasoning ? { reasoning } : {}),
      finishReason,
    };
  }
}
