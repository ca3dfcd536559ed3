import { describe, expect, it } from 'vitest';
import { CredentialCache } from '../session/credential-cache';
import { MemorySessionStore, type SessionData } from '../session/session-store';
import { SessionPersister, toSessionData } from './session-persister';
import type { TokenSet } from './token-exchanger';

const tokens: TokenSet = {
  accessToken: 'abc',
  tokenType: 'bearer',
  expires: 1704070800,
  refreshToken: 'r1',
};

function recordingDeps(calls: string[], store = new MemorySessionStore({ accessToken: 'old-token' })) {
  return {
    store,
    deps: {
      connector: {
        logOut: () => {
          calls.push('logOut');
          store.clear();
        },
      },
      cache: { flushAll: () => calls.push('flushAll') },
      store: {
        load: (): SessionData => store.load(),
        save: (data: SessionData) => {
          calls.push('save');
          store.save(data);
        },
        clear: () => store.clear(),
      },
      clients: { reset: () => calls.push('reset') },
    },
  };
}

describe('SessionPersister', () => {
  it('should log out, flush, save, then reset the client, in that order', async () => {
    const calls: string[] = [];
    const { deps } = recordingDeps(calls);

    await new SessionPersister(deps).replace(tokens);

    expect(calls).toEqual(['logOut', 'flushAll', 'save', 'reset']);
  });

  it('should replace the previous session with the new tokens', async () => {
    const { deps, store } = recordingDeps([]);

    await new SessionPersister(deps).replace(tokens);

    expect(store.load()).toEqual({
      accessToken: 'abc',
      tokenType: 'bearer',
      expires: 1704070800,
      refreshToken: 'r1',
    });
  });

  it('should drop cached identities of the previous session', async () => {
    const cache = new CredentialCache<string>();
    cache.set('account:default', 'old-user');
    const store = new MemorySessionStore();

    await new SessionPersister({
      connector: { logOut: () => store.clear() },
      cache,
      store,
      clients: { reset: () => undefined },
    }).replace(tokens);

    expect(cache.get('account:default')).toBeUndefined();
  });

  it('should run concurrent replacements one after another', async () => {
    const calls: string[] = [];
    const { deps, store } = recordingDeps(calls);
    const persister = new SessionPersister(deps);

    await Promise.all([
      persister.replace(tokens),
      persister.replace({ ...tokens, accessToken: 'second' }),
    ]);

    expect(calls).toEqual(['logOut', 'flushAll', 'save', 'reset', 'logOut', 'flushAll', 'save', 'reset']);
    expect(store.load().accessToken).toBe('second');
  });

  it('should keep working after a failed replacement', async () => {
    const store = new MemorySessionStore();
    let failNext = true;
    const persister = new SessionPersister({
      connector: { logOut: () => store.clear() },
      cache: { flushAll: () => undefined },
      store: {
        load: () => store.load(),
        save: (data) => {
          if (failNext) {
            failNext = false;
            throw new Error('disk full');
          }
          store.save(data);
        },
        clear: () => store.clear(),
      },
      clients: { reset: () => undefined },
    });

    await expect(persister.replace(tokens)).rejects.toThrow('disk full');
    await persister.replace(tokens);

    expect(store.load().accessToken).toBe('abc');
  });
});

describe('toSessionData', () => {
  it('should omit an unknown expiry and a missing refresh token', () => {
    expect(toSessionData({ accessToken: 'abc', tokenType: 'bearer', expires: null, refreshToken: null })).toEqual({
      accessToken: 'abc',
      tokenType: 'bearer',
    });
  });
});
