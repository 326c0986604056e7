/**
 * Reverse-lookup cache: background scheduling, draining, negative caching
 * and eviction.
 */
import { describe, it, expect, vi } from 'vitest';
import { DnsCache, isResolvable, type DnsResolver } from '../src/core/dns-cache';
import { shortHostname } from '../src/utils/dns';

const settle = () => new Promise<void>(resolve => setTimeout(resolve, 0));

function fakeResolver(names: Record<string, string | null>): DnsResolver & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    resolve: vi.fn(async (ip: string) => {
      calls.push(ip);
      const name = names[ip];
      if (name === undefined) throw new Error(`no PTR for ${ip}`);
      return name;
    }),
  };
}

describe('isResolvable', () => {
  it('accepts IP addresses only', () => {
    expect(isResolvable('10.0.0.5')).toBe(true);
    expect(isResolvable('fe80::1')).toBe(true);
    expect(isResolvable('db1.internal')).toBe(false);
    expect(isResolvable('')).toBe(false);
  });

  it('skips loopback addresses', () => {
    expect(isResolvable('127.0.0.1')).toBe(false);
    expect(isResolvable('::1')).toBe(false);
    expect(isResolvable('localhost')).toBe(false);
  });
});

describe('DnsCache', () => {
  it('returns undefined until a drain stores the hostname', async () => {
    const resolver = fakeResolver({ '10.0.0.5': 'db1' });
    const cache = new DnsCache(resolver);

    expect(cache.lookup('10.0.0.5')).toBeUndefined();
    expect(cache.inFlight).toBe(1);
    await settle();
    expect(cache.lookup('10.0.0.5')).toBeUndefined();

    expect(cache.drain()).toBe(1);
    expect(cache.lookup('10.0.0.5')).toBe('db1');
    expect(cache.inFlight).toBe(0);
  });

  it('schedules each address once while pending', async () => {
    const resolver = fakeResolver({ '10.0.0.5': 'db1' });
    const cache = new DnsCache(resolver);
    cache.lookup('10.0.0.5');
    cache.lookup('10.0.0.5');
    await settle();
    expect(resolver.calls).toEqual(['10.0.0.5']);
  });

  it('never retries an address that failed', async () => {
    const resolver = fakeResolver({});
    const cache = new DnsCache(resolver);
    cache.lookup('10.0.0.9');
    await settle();
    expect(cache.drain()).toBe(0);
    expect(cache.lookup('10.0.0.9')).toBeUndefined();
    await settle();
    expect(resolver.calls).toEqual(['10.0.0.9']);
    expect(cache.size).toBe(1);
  });

  it('remembers addresses without a name', async () => {
    const resolver = fakeResolver({ '10.0.0.7': null });
    const cache = new DnsCache(resolver);
    cache.lookup('10.0.0.7');
    await settle();
    expect(cache.drain()).toBe(0);
    cache.lookup('10.0.0.7');
    expect(resolver.calls).toHaveLength(1);
  });

  it('does not schedule loopback addresses', () => {
    const resolver = fakeResolver({});
    const cache = new DnsCache(resolver);
    expect(cache.lookup('127.0.0.1')).toBeUndefined();
    expect(cache.inFlight).toBe(0);
  });

  it('evicts the oldest entry at capacity', async () => {
    const resolver = fakeResolver({ '10.0.0.1': 'a', '10.0.0.2': 'b', '10.0.0.3': 'c' });
    const cache = new DnsCache(resolver, 2);
    cache.lookup('10.0.0.1');
    cache.lookup('10.0.0.2');
    cache.lookup('10.0.0.3');
    await settle();
    expect(cache.drain()).toBe(3);
    expect(cache.size).toBe(2);
    expect(cache.lookup('10.0.0.3')).toBe('c');
    expect(cache.lookup('10.0.0.1')).toBeUndefined();
    expect(cache.inFlight).toBe(1);
  });

  it('drains nothing when nothing finished', () => {
    expect(new DnsCache(fakeResolver({})).drain()).toBe(0);
  });
});

describe('shortHostname', () => {
  it('keeps the first label', () => {
    expect(shortHostname('db1.example.internal.')).toBe('db1');
    expect(shortHostname('app')).toBe('app');
  });
});
