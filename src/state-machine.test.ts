import assert from 'node:assert/strict';
import test from 'node:test';
import { transition } from './state-machine.ts';

test('state machine transitions through the scored path', () => {
  let state = transition('RECEIVED', { type: 'BODY_PARSED' });
  assert.equal(state, 'VALIDATING');
  state = transition(state, { type: 'ADMITTED' });
  assert.equal(state, 'RECORDING');
  state = transition(state, { type: 'RECORDED' });
  assert.equal(state, 'SCORING');
  state = transition(state, { type: 'SCORED', insufficient: false });
  assert.equal(state, 'COMPLETED');
});

test('short histories end in insufficient data', () => {
  const state = transition('SCORING', { type: 'SCORED', insufficient: true });
  assert.equal(state, 'INSUFFICIENT_DATA');
});

test('rate limiting keeps state sticky', () => {
  const state = transition('VALIDATING', { type: 'RATE_LIMITED' });
  assert.equal(state, 'RATE_LIMITED');
  assert.equal(transition(state, { type: 'ADMITTED' }), 'RATE_LIMITED');
});

test('bad input is rejected before or after parsing', () => {
  assert.equal(transition('RECEIVED', { type: 'VALIDATION_FAILED' }), 'REJECTED');
  assert.equal(transition('VALIDATING', { type: 'VALIDATION_FAILED' }), 'REJECTED');
});

test('internal errors while recording fail the request', () => {
  const state = transition('RECORDING', { type: 'INTERNAL_ERROR' });
  assert.equal(state, 'FAILED');
  assert.equal(transition(state, { type: 'RECORDED' }), 'FAILED');
});

test('events out of order leave the state unchanged', () => {
  assert.equal(transition('RECEIVED', { type: 'RECORDED' }), 'RECEIVED');
});
