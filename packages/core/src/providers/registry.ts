import { GatewayError } from '../errors.js';
import type {
  ModelConfig,
  Provider,
  ProviderIdentity,
  ProviderModelEntry,
  ProviderRegistry as IProviderRegistry,
} from '../types/provider.js';

/**
 * A provider the registry knows about but has not built yet. `create` must
 * not touch the network; the first vendor call happens on `submit`.
 */
export interface ProviderEntry {
  id: string;
  enabled: boolean;
  /** Lower-case fragments that route an unlisted model name to this provider. */
  keywords: readonly string[];
  /** Catches model ids no keyword covers, such as Zhipu assistant ids. */
  accepts?: (modelId: string) => boolean;
  /**
   * The models the provider will expose, known without building it. When
   * absent, exact-id matching has to build the provider to read its list.
   */
  models?: readonly ModelConfig[];
  create(): Provider;
}

export class ProviderRegistry implements IProviderRegistry {
  private entries = new Map<string, ProviderEntry>();
  private instances = new Map<string, Provider>();

  register(entry: ProviderEntry): void {
    this.entries.set(entry.id, entry);
    this.instances.delete(entry.id);
  }

  /** Returns the provider, building it on first use. */
  get(providerId: string): Provider | undefined {
    const entry = this.entries.get(providerId);
    return entry ? this.instantiate(entry) : undefined;
  }

  /**
   * Picks the provider for a model: an exact id or alias first, then the
   * family keywords in registration order. Only the chosen provider is built.
   * Never performs I/O.
   */
  resolve(modelId: string): Provider {
    const enabled = this.enabledEntries();

    for (const entry of enabled) {
      const models = entry.models ?? this.instantiate(entry).models;
      if (models.some((m) => m.enabled && (m.id === modelId || m.alias === modelId))) {
        return this.instantiate(entry);
      }
    }

    const lower = modelId.toLowerCase();
    for (const entry of enabled) {
      if (entry.keywords.some((keyword) => lower.includes(keyword))) {
        return this.instantiate(entry);
      }
    }

    for (const entry of enabled) {
      if (entry.accepts?.(modelId)) return this.instantiate(entry);
    }

    throw new GatewayError('UnknownModel', `Model not found: ${modelId}`);
  }

  list(): ProviderIdentity[] {
    return this.enabledEntries().map((entry) => this.instantiate(entry).identity);
  }

  listModels(): ProviderModelEntry[] {
    const result: ProviderModelEntry[] = [];
    for (const entry of this.enabledEntries()) {
      const provider = this.instantiate(entry);
      for (const model of provider.models) {
        if (model.enabled) {
          result.push({ model, provider: provider.identity });
        }
      }
    }
    return result;
  }

  private enabledEntries(): ProviderEntry[] {
    return Array.from(this.entries.values()).filter((entry) => entry.enabled);
  }

  private instantiate(entry: ProviderEntry): Provider {
    let provider = this.instances.get(entry.id);
    if (!provider) {
      provider = entry.create();
      this.instances.set(entry.id, provider);
    }
    return provider;
  }
}
