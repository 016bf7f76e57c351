import { GatewayError } from '../errors.js';
import type { ProviderIdentity } from '../types/provider.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface Credential {
  /** Long-lived secret as supplied by the operator. */
  readonly raw: string;
  /** Short-lived material derived from `raw` (tokens, cookie headers, ids). */
  readonly artifacts: Readonly<Record<string, string>>;
  /** Epoch ms, or `null` when the vendor does not say; such credentials are validated by use. */
  readonly expiresAt: number | null;
  readonly refreshedAt: number;
}

export interface RefreshedCredential {
  artifacts: Record<string, string>;
  expiresAt: number | null;
}

export type CredentialRefresher = (
  raw: string,
  previous: Credential | undefined,
) => Promise<RefreshedCredential>;

export interface SessionStoreOptions {
  rawCredential: (providerId: string) => string | undefined;
  /** Credentials this close to expiry are refreshed ahead of use. */
  refreshMarginMs?: number;
  now?: () => number;
  logger?: Logger;
}

interface Slot {
  refresher: CredentialRefresher;
  raw?: string;
  rawLoaded: boolean;
  credential?: Credential;
  stale: boolean;
  /** Bumped by `invalidate`; a refresh that started under an older value lands stale. */
  generation: number;
  inflight?: Promise<Credential>;
}

/**
 * Per-provider credential cache. Refreshes are single-flight: callers that
 * arrive while a refresh is running share its outcome.
 */
export class SessionStore {
  private readonly slots = new Map<string, Slot>();
  private readonly rawCredential: (providerId: string) => string | undefined;
  private readonly refreshMarginMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: SessionStoreOptions) {
    this.rawCredential = options.rawCredential;
    this.refreshMarginMs = options.refreshMarginMs ?? 60_000;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  register(identity: ProviderIdentity, refresher: CredentialRefresher): void {
    const existing = this.slots.get(identity.id);
    if (existing) {
      existing.refresher = refresher;
      return;
    }
    this.slots.set(identity.id, { refresher, rawLoaded: false, stale: false, generation: 0 });
  }

  acquire(identity: ProviderIdentity): Promise<Credential> {
    const slot = this.slotFor(identity);
    const cached = slot.credential;
    if (cached && !slot.stale && this.isUsable(cached)) {
      return Promise.resolve(cached);
    }
    if (!slot.inflight) {
      slot.inflight = this.refresh(identity, slot).finally(() => {
        slot.inflight = undefined;
      });
    }
    return slot.inflight;
  }

  invalidate(identity: ProviderIdentity): void {
    const slot = this.slots.get(identity.id);
    if (!slot || (!slot.credential && !slot.inflight)) return;
    slot.stale = true;
    slot.generation += 1;
    this.logger.debug(`Credential for ${identity.id} invalidated`);
  }

  peek(identity: ProviderIdentity): Credential | undefined {
    return this.slots.get(identity.id)?.credential;
  }

  private slotFor(identity: ProviderIdentity): Slot {
    const slot = this.slots.get(identity.id);
    if (!slot) {
      throw new Error(`No credential refresher registered for provider: ${identity.id}`);
    }
    return slot;
  }

  private isUsable(credential: Credential): boolean {
    return credential.expiresAt === null || credential.expiresAt - this.refreshMarginMs > this.now();
  }

  private async refresh(identity: ProviderIdentity, slot: Slot): Promise<Credential> {
    if (!slot.rawLoaded) {
      slot.raw = this.rawCredential(identity.id)?.trim() || undefined;
      slot.rawLoaded = true;
    }
    const raw = slot.raw;
    if (!raw) {
      throw new GatewayError('AuthExpired', `No credential configured for provider: ${identity.id}`);
    }

    const generation = slot.generation;
    try {
      const refreshed = await slot.refresher(raw, slot.credential);
      const credential: Credential = {
        raw,
        artifacts: Object.freeze({ ...refreshed.artifacts }),
        expiresAt: refreshed.expiresAt,
        refreshedAt: this.now(),
      };
      slot.credential = credential;
      slot.stale = slot.generation !== generation;
      this.logger.debug(`Credential for ${identity.id} refreshed`);
      return credential;
    } catch (err) {
      this.logger.warn(`Credential refresh failed for ${identity.id}: ${err instanceof Error ? err.message : String(err)}`);
      throw err;
    }
  }
}

export function requireArtifact(credential: Credential, name: string): string {
  const value = credential.artifacts[name];
  if (value === undefined || value === '') {
    throw new GatewayError('AuthExpired', `Credential is missing ${name}`);
  }
  return value;
}
