import { describe, it, expect, vi } from 'vitest';
import { SessionStore, requireArtifact, type CredentialRefresher } from '../session/store.js';
import type { ProviderIdentity } from '../types/provider.js';

const identity: ProviderIdentity = {
  id: 'deepseek',
  name: 'DeepSeek',
  baseUrl: 'http://vendor.test',
  transport: 'http-sse',
};

function setup(options: { raw?: string; expiresIn?: number | null } = {}) {
  let clock = 1_000_000;
  let issued = 0;
  const expiresIn = options.expiresIn === undefined ? 600_000 : options.expiresIn;
  const refresher = vi.fn<CredentialRefresher>(async (raw) => {
    issued += 1;
    return {
      artifacts: { token: `${raw}#${issued}` },
      expiresAt: expiresIn === null ? null : clock + expiresIn,
    };
  });
  const store = new SessionStore({
    rawCredential: (id) => (id === 'deepseek' ? (options.raw ?? 'test-secret') : undefined),
    refreshMarginMs: 60_000,
    now: () => clock,
  });
  store.register(identity, refresher);
  return {
    store,
    refresher,
    now: () => clock,
    advance: (ms: number) => {
      clock += ms;
    },
  };
}

describe('SessionStore', () => {
  it('shares one refresh between concurrent callers', async () => {
    const { store, refresher } = setup();

    const results = await Promise.all([store.acquire(identity), store.acquire(identity), store.acquire(identity)]);

    expect(refresher).toHaveBeenCalledTimes(1);
    expect(new Set(results).size).toBe(1);
    expect(results[0]?.artifacts.token).toBe('test-secret#1');
  });

  it('serves the cached credential while it is fresh', async () => {
    const { store, refresher, advance } = setup();

    await store.acquire(identity);
    advance(500_000);
    const again = await store.acquire(identity);

    expect(refresher).toHaveBeenCalledTimes(1);
    expect(again.artifacts.token).toBe('test-secret#1');
  });

  it('refreshes ahead of expiry once inside the margin', async () => {
    const { store, refresher, advance } = setup();

    await store.acquire(identity);
    advance(540_001);
    const renewed = await store.acquire(identity);

    expect(refresher).toHaveBeenCalledTimes(2);
    expect(renewed.artifacts.token).toBe('test-secret#2');
    expect(refresher.mock.calls[1]?.[1]?.artifacts.token).toBe('test-secret#1');
  });

  it('refreshes exactly once after the credential has expired', async () => {
    const { store, refresher, advance, now } = setup();

    const first = await store.acquire(identity);
    advance(600_001);
    expect(first.expiresAt).toBeLessThan(now());

    const renewed = await Promise.all([store.acquire(identity), store.acquire(identity)]);

    expect(refresher).toHaveBeenCalledTimes(2);
    expect(renewed[0]).toBe(renewed[1]);
    expect(renewed[0]?.artifacts.token).toBe('test-secret#2');
    expect(renewed[0]?.expiresAt).toBeGreaterThan(now());
  });

  it('keeps credentials without an expiry until invalidated', async () => {
    const { store, refresher, advance } = setup({ expiresIn: null });

    await store.acquire(identity);
    advance(10 * 86_400_000);
    await store.acquire(identity);
    expect(refresher).toHaveBeenCalledTimes(1);

    store.invalidate(identity);
    expect(store.peek(identity)?.artifacts.token).toBe('test-secret#1');
    const renewed = await store.acquire(identity);
    expect(refresher).toHaveBeenCalledTimes(2);
    expect(renewed.artifacts.token).toBe('test-secret#2');
  });

  it('remembers an invalidation that arrives while a refresh is running', async () => {
    const { store, refresher } = setup({ expiresIn: null });
    let release = (): void => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    refresher.mockImplementationOnce(async (raw) => {
      await gate;
      return { artifacts: { token: `${raw}#slow` }, expiresAt: null };
    });

    const pending = store.acquire(identity);
    store.invalidate(identity);
    release();
    expect((await pending).artifacts.token).toBe('test-secret#slow');

    const renewed = await store.acquire(identity);
    expect(refresher).toHaveBeenCalledTimes(2);
    expect(renewed.artifacts.token).toBe('test-secret#1');
    expect(await store.acquire(identity)).toBe(renewed);
  });

  it('fails with AuthExpired when no credential is configured', async () => {
    const { store, refresher } = setup({ raw: '   ' });

    await expect(store.acquire(identity)).rejects.toMatchObject({
      kind: 'AuthExpired',
      message: 'No credential configured for provider: deepseek',
    });
    expect(refresher).not.toHaveBeenCalled();
  });

  it('propagates refresh failures to every waiter and retries on the next call', async () => {
    const { store, refresher } = setup();
    refresher.mockRejectedValueOnce(new Error('login failed'));

    const waiters = [store.acquire(identity), store.acquire(identity)];
    for (const waiter of waiters) await expect(waiter).rejects.toThrow('login failed');
    expect(refresher).toHaveBeenCalledTimes(1);

    await expect(store.acquire(identity)).resolves.toMatchObject({ artifacts: { token: 'test-secret#1' } });
  });

  it('rejects providers that never registered a refresher', () => {
    const { store } = setup();
    expect(() => store.acquire({ ...identity, id: 'other' })).toThrow('No credential refresher registered for provider: other');
  });
});

describe('requireArtifact', () => {
  const credential = { raw: 'r', artifacts: { token: 't', empty: '' }, expiresAt: null, refreshedAt: 0 };

  it('returns present artifacts', () => {
    expect(requireArtifact(credential, 'token')).toBe('t');
  });

  it('treats missing or empty artifacts as an expired credential', () => {
    expect(() => requireArtifact(credential, 'empty')).toThrow('Credential is missing empty');
    expect(() => requireArtifact(credential, 'cookie')).toThrow('Credential is missing cookie');
  });
});
