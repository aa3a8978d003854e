/**
 * Identity Service Tests
 *
 * Tests for session and login resolution caching.
 */

import { createHash } from 'crypto';
import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { IdentityService, type CredentialVerifier } from '../identity.service.js';
import { CacheService } from '../cache/cache.service.js';
import { StoreUnavailableError, UnauthenticatedError } from '../errors.js';
import { InMemoryFeedStore } from './__mocks__/feed-store.mock.js';
import type { UserIdentity } from '../../types/feed.types.js';

vi.mock('../logger.service.js', () => ({
  createServiceLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

const NOW = Date.parse('2024-06-01T12:00:00.000Z');
const TOKEN = 'session-token-1';

function sha256(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

describe('IdentityService', () => {
  let store: InMemoryFeedStore;
  let cache: CacheService;
  let verify: Mock<CredentialVerifier['verify']>;
  let service: IdentityService;
  let alice: UserIdentity;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);

    store = new InMemoryFeedStore();
    const user = store.addUser('alice');
    alice = { id: user.id, accountName: 'alice', authority: 0 };
    store.addSession(TOKEN, user.id, new Date(NOW + 3_600_000).toISOString());

    cache = new CacheService();
    verify = vi.fn<CredentialVerifier['verify']>();
    service = new IdentityService(cache, store, { verify }, { identity: 60, login: 300 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // ==========================================================================
  // Session Resolution
  // ==========================================================================

  describe('resolve', () => {
    it('looks up the session and user once, then serves from cache', async () => {
      expect(await service.resolve(TOKEN)).toEqual(alice);
      expect(store.roundTrips).toBe(2);

      expect(await service.resolve(TOKEN)).toEqual(alice);
      expect(store.roundTrips).toBe(2);
    });

    it('keys the cache by token digest', async () => {
      await service.resolve(TOKEN);

      expect(cache.memory.get(`identity:session:${sha256(TOKEN)}`)).not.toBeNull();
      expect(cache.memory.get(`identity:session:${TOKEN}`)).toBeNull();
    });

    it('goes back to the store once the identity TTL has passed', async () => {
      await service.resolve(TOKEN);
      vi.setSystemTime(NOW + 60_000);

      await service.resolve(TOKEN);

      expect(store.roundTrips).toBe(4);
    });

    it('never caches past the session expiry', async () => {
      store.addSession('short-lived', alice.id, new Date(NOW + 10_000).toISOString());

      await service.resolve('short-lived');
      vi.setSystemTime(NOW + 9_999);
      expect(await service.resolve('short-lived')).toEqual(alice);
      expect(store.roundTrips).toBe(2);

      vi.setSystemTime(NOW + 10_000);
      expect(await service.resolve('short-lived')).toBeNull();
    });

    it('does not cache an unknown token', async () => {
      expect(await service.resolve('nobody')).toBeNull();
      expect(await service.resolve('nobody')).toBeNull();

      expect(store.calls.findSession).toBe(2);
      expect(cache.memory.getStats().size).toBe(0);
    });

    it('does not resolve or cache an inactive user', async () => {
      const banned = store.addUser('mallory', { active: false });
      store.addSession('banned-token', banned.id, new Date(NOW + 3_600_000).toISOString());

      expect(await service.resolve('banned-token')).toBeNull();
      expect(await service.resolve('banned-token')).toBeNull();

      expect(store.roundTrips).toBe(4);
    });

    it('returns null for an empty token without touching the store', async () => {
      expect(await service.resolve('')).toBeNull();
      expect(store.roundTrips).toBe(0);
    });

    it('propagates a store outage on a miss', async () => {
      store.offline = true;

      await expect(service.resolve(TOKEN)).rejects.toBeInstanceOf(StoreUnavailableError);
    });

    it('serves a cached identity while the store is down', async () => {
      await service.resolve(TOKEN);
      store.offline = true;

      expect(await service.resolve(TOKEN)).toEqual(alice);
    });
  });

  describe('requireIdentity', () => {
    it('throws for an unresolvable token', async () => {
      await expect(service.requireIdentity('nobody')).rejects.toBeInstanceOf(UnauthenticatedError);
    });

    it('returns the identity for a valid token', async () => {
      expect(await service.requireIdentity(TOKEN)).toEqual(alice);
    });
  });

  describe('forgetSession', () => {
    it('drops the cached identity', async () => {
      await service.resolve(TOKEN);

      await service.forgetSession(TOKEN);
      await service.resolve(TOKEN);

      expect(store.roundTrips).toBe(4);
    });
  });

  // ==========================================================================
  // Login
  // ==========================================================================

  describe('login', () => {
    it('caches an accepted login for the login TTL', async () => {
      verify.mockResolvedValue(alice);

      await service.login('alice', 'test-password');
      await service.login('alice', 'test-password');
      expect(verify).toHaveBeenCalledTimes(1);

      vi.setSystemTime(NOW + 300_000);
      await service.login('alice', 'test-password');
      expect(verify).toHaveBeenCalledTimes(2);
    });

    it('keys the login cache by credential digest', async () => {
      verify.mockResolvedValue(alice);

      await service.login('alice', 'test-password');

      expect(cache.memory.get(`identity:login:${sha256('alice:test-password')}`)).not.toBeNull();
    });

    it('does not cache a rejected login', async () => {
      verify.mockResolvedValue(null);

      await expect(service.login('alice', 'wrong')).rejects.toBeInstanceOf(UnauthenticatedError);
      await expect(service.login('alice', 'wrong')).rejects.toBeInstanceOf(UnauthenticatedError);

      expect(verify).toHaveBeenCalledTimes(2);
      expect(cache.memory.getStats().size).toBe(0);
    });

    it('does not let a different password reuse a cached login', async () => {
      verify.mockResolvedValueOnce(alice).mockResolvedValueOnce(null);

      await service.login('alice', 'test-password');

      await expect(service.login('alice', 'other-password')).rejects.toBeInstanceOf(UnauthenticatedError);
    });
  });
});
