import assert from 'node:assert/strict';
import test from 'node:test';
import { ConsentStore } from './consent-store.ts';
import type { ConsentRecord } from './types.ts';

test('get returns undefined for an unknown subject', () => {
  const store = new ConsentStore();
  assert.equal(store.get('nobody'), undefined);
});

test('a second put fully replaces the first', async () => {
  const store = new ConsentStore();
  await store.put('subject', { accepted: true, terms_version: '2025-09', recorded_at: 1 });
  await store.put('subject', { accepted: false, terms_version: '2026-01', recorded_at: 2 });

  assert.deepEqual(store.get('subject'), { accepted: false, terms_version: '2026-01', recorded_at: 2 });
  assert.equal(store.count(), 1);
});

test('concurrent puts resolve to the last write whole', async () => {
  const store = new ConsentStore();
  const writes: ConsentRecord[] = Array.from({ length: 10 }, (_, i) => ({
    accepted: i % 2 === 0,
    terms_version: `v${i}`,
    recorded_at: i,
  }));

  await Promise.all(writes.map((write) => store.put('subject', write)));

  assert.deepEqual(store.get('subject'), { accepted: false, terms_version: 'v9', recorded_at: 9 });
});

test('stored consent is frozen and detached from the caller object', async () => {
  const store = new ConsentStore();
  const input = { accepted: true, terms_version: '2025-09', recorded_at: 1 };
  await store.put('subject', input);
  input.accepted = false;

  const stored = store.get('subject');
  assert.equal(stored?.accepted, true);
  assert.equal(Object.isFrozen(stored), true);
});
