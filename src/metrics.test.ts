import assert from 'node:assert/strict';
import test from 'node:test';
import { CheckinStore } from './checkin-store.ts';
import { ConsentStore } from './consent-store.ts';
import { Metrics } from './metrics.ts';
import { RateLimiter } from './rate-limit.ts';

test('metrics combine counters with store sizes', async () => {
  const checkins = new CheckinStore();
  const consents = new ConsentStore();
  const rateLimiter = new RateLimiter({ rateLimitCapacity: 5, rateLimitWindowSeconds: 10 }, () => 0);
  const metrics = new Metrics({ checkins, consents, rateLimiter }, '0.1.0');

  await checkins.append('a', { adherence: 90, mood_trend: 0, cravings: 5, sleep_hours: 7, isolation: 10, recorded_at: 1 });
  await consents.put('a', { accepted: true, terms_version: '2025-09', recorded_at: 1 });
  await rateLimiter.evaluate('client');
  metrics.recordCheckin('insufficient_data');
  metrics.recordCheckin('high');
  metrics.recordConsent();
  metrics.recordRateLimited();

  assert.deepEqual(metrics.snapshot(), {
    checkin_completion_count: 2,
    consent_toggled_count: 1,
    rate_limited_count: 1,
    risk_band_distribution: { low: 0, elevated: 0, moderate: 0, high: 1, insufficient_data: 1 },
    checkins_stored: 1,
    subjects_tracked: 1,
    consents_stored: 1,
    rate_limit_keys: 1,
    app_version: '0.1.0',
  });
});
