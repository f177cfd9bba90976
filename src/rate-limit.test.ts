import assert from 'node:assert/strict';
import test from 'node:test';
import { InvariantViolationError } from './invariant.ts';
import { RateLimiter } from './rate-limit.ts';

const config = { rateLimitCapacity: 5, rateLimitWindowSeconds: 10 };

test('rate limiter admits capacity requests per window and rejects the next', async () => {
  const limiter = new RateLimiter(config);
  const results: boolean[] = [];
  for (const now of [0, 1_000, 2_000, 3_000, 4_000, 5_000]) {
    results.push(await limiter.admit('client', now, 5, 10_000));
  }
  assert.deepEqual(results, [true, true, true, true, true, false]);
});

test('rate limiter admits again once the earliest entry leaves the window', async () => {
  const limiter = new RateLimiter(config);
  for (const now of [0, 1_000, 2_000, 3_000, 4_000]) {
    await limiter.admit('client', now, 5, 10_000);
  }
  assert.equal(await limiter.admit('client', 9_999, 5, 10_000), false);
  assert.equal(await limiter.admit('client', 10_000, 5, 10_000), true);
  assert.equal(await limiter.admit('client', 10_500, 5, 10_000), false);
});

test('window membership is half-open at the trailing edge', async () => {
  const limiter = new RateLimiter(config);
  assert.equal(await limiter.admit('client', 0, 1, 1_000), true);
  assert.equal(await limiter.admit('client', 999, 1, 1_000), false);
  assert.equal(await limiter.admit('client', 1_000, 1, 1_000), true);
});

test('keys are limited independently', async () => {
  const limiter = new RateLimiter(config);
  assert.equal(await limiter.admit('a', 0, 1, 10_000), true);
  assert.equal(await limiter.admit('a', 1, 1, 10_000), false);
  assert.equal(await limiter.admit('b', 1, 1, 10_000), true);
  assert.equal(limiter.size, 2);
});

test('concurrent admissions for one key never exceed capacity', async () => {
  const limiter = new RateLimiter(config);
  const results = await Promise.all(
    Array.from({ length: 20 }, () => limiter.admit('burst', 100, 5, 10_000)),
  );
  assert.equal(results.filter(Boolean).length, 5);
});

test('evaluate reports remaining budget and a retry hint', async () => {
  let now = 0;
  const limiter = new RateLimiter({ rateLimitCapacity: 2, rateLimitWindowSeconds: 10 }, () => now);

  assert.deepEqual(await limiter.evaluate('client'), {
    allowed: true,
    remaining: 1,
    limit: 2,
    window_seconds: 10,
    retry_after_seconds: 0,
  });
  now = 1_000;
  assert.equal((await limiter.evaluate('client')).remaining, 0);
  now = 2_500;
  assert.deepEqual(await limiter.evaluate('client'), {
    allowed: false,
    remaining: 0,
    limit: 2,
    window_seconds: 10,
    retry_after_seconds: 8,
  });
});

test('sweep evicts keys whose entries have all expired', async () => {
  const limiter = new RateLimiter(config);
  await limiter.admit('stale', 0, 5, 10_000);
  await limiter.admit('fresh', 8_000, 5, 10_000);

  const evicted = await limiter.sweep(12_000, 10_000);

  assert.equal(evicted, 1);
  assert.equal(limiter.size, 1);
  assert.equal(await limiter.admit('fresh', 12_000, 1, 10_000), false);
});

test('rate limiter refuses non-positive limits', async () => {
  assert.throws(
    () => new RateLimiter({ rateLimitCapacity: 0, rateLimitWindowSeconds: 10 }),
    InvariantViolationError,
  );
  const limiter = new RateLimiter(config);
  await assert.rejects(limiter.admit('client', 0, 5, -1), InvariantViolationError);
  await assert.rejects(limiter.admit('client', 0, 1.5, 1_000), InvariantViolationError);
});
