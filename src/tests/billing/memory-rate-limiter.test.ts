// src/tests/billing/memory-rate-limiter.test.ts
import { InMemoryRateLimiter } from '../../lib/billing/rate-limit/memory-rate-limiter';

describe('InMemoryRateLimiter', () => {
  let now: number;
  let limiter: InMemoryRateLimiter;

  beforeEach(() => {
    now = 1_700_000_000_000;
    limiter = new InMemoryRateLimiter({ limit: 2, windowMs: 1000 }, () => now);
  });

  it('allows requests up to the limit within a window', async () => {
    expect(await limiter.isAllowed('client-a')).toBe(true);
    expect(await limiter.isAllowed('client-a')).toBe(true);
    expect(await limiter.isAllowed('client-a')).toBe(false);

    expect(await limiter.currentUsage('client-a')).toEqual({
      count: 2,
      limit: 2,
      remaining: 0,
      resetAt: new Date(now + 1000)
    });
  });

  it('does not count refused requests', async () => {
    await limiter.isAllowed('client-a');
    await limiter.isAllowed('client-a');
    await limiter.isAllowed('client-a');
    await limiter.isAllowed('client-a');

    expect((await limiter.currentUsage('client-a')).count).toBe(2);
  });

  it('tracks identities separately', async () => {
    await limiter.isAllowed('client-a');
    await limiter.isAllowed('client-a');

    expect(await limiter.isAllowed('client-b')).toBe(true);
    expect((await limiter.currentUsage('client-b')).remaining).toBe(1);
  });

  it('opens a fresh window once the old one has passed', async () => {
    await limiter.isAllowed('client-a');
    await limiter.isAllowed('client-a');

    now += 1000;

    expect(await limiter.isAllowed('client-a')).toBe(true);
    expect((await limiter.currentUsage('client-a')).count).toBe(1);
  });

  it('drops expired windows of idle identities on a later request', async () => {
    await limiter.isAllowed('client-a');
    await limiter.isAllowed('client-b');
    expect(limiter.size()).toBe(2);

    now += 1000;
    await limiter.isAllowed('client-c');

    expect(limiter.size()).toBe(1);
  });

  it('reports an untouched identity as unused', async () => {
    expect(await limiter.currentUsage('client-z')).toEqual({
      count: 0,
      limit: 2,
      remaining: 2,
      resetAt: new Date(now + 1000)
    });
  });

  it('resets and prunes windows', async () => {
    await limiter.isAllowed('client-a');
    await limiter.isAllowed('client-b');

    expect(await limiter.reset('client-a')).toBe(true);
    expect(await limiter.reset('client-a')).toBe(false);

    now += 5000;
    expect(limiter.prune()).toBe(1);
  });

  it('falls back to the default limit', async () => {
    const defaults = new InMemoryRateLimiter({}, () => now);

    expect((await defaults.currentUsage('client-a')).limit).toBe(100);
  });
});
