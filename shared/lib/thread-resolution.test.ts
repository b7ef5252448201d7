/**
 * Tests for thread-resolution.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  computeThreadResolution,
  resolveThreadStatus,
  toThreadStatus,
} from './thread-resolution.ts';

describe('resolveThreadStatus', () => {
  it('treats a thread without any status as resolved', () => {
    assert.equal(resolveThreadStatus([]), 'resolved');
    assert.equal(resolveThreadStatus(['none', 'none']), 'resolved');
  });

  it('lets the last explicit status win', () => {
    assert.equal(resolveThreadStatus(['unresolved', 'resolved']), 'resolved');
    assert.equal(resolveThreadStatus(['resolved', 'unresolved']), 'unresolved');
    assert.equal(resolveThreadStatus(['unresolved', 'resolved', 'unresolved']), 'unresolved');
  });

  it('ignores trailing comments without a status', () => {
    assert.equal(resolveThreadStatus(['unresolved', 'none', 'none']), 'unresolved');
  });
});

describe('toThreadStatus', () => {
  it('maps the raw unresolved flag', () => {
    assert.equal(toThreadStatus(true), 'unresolved');
    assert.equal(toThreadStatus(false), 'resolved');
    assert.equal(toThreadStatus(undefined), 'none');
  });
});

describe('computeThreadResolution', () => {
  it('resolves standalone comments from their own flag', () => {
    const result = computeThreadResolution([
      { unresolved: true },
      { unresolved: false },
      {},
    ]);
    assert.deepEqual(result, [false, true, true]);
  });

  it('applies a later reply status to the whole thread', () => {
    const result = computeThreadResolution([
      { id: 'a', unresolved: true },
      { id: 'b', inReplyTo: 'a', unresolved: false },
    ]);
    assert.deepEqual(result, [true, true]);
  });

  it('follows nested replies to the root', () => {
    const result = computeThreadResolution([
      { id: 'a', unresolved: false },
      { id: 'b', inReplyTo: 'a' },
      { id: 'c', inReplyTo: 'b', unresolved: true },
    ]);
    assert.deepEqual(result, [false, false, false]);
  });

  it('keeps separate threads independent', () => {
    const result = computeThreadResolution([
      { id: 'a', unresolved: true },
      { id: 'x', unresolved: true },
      { id: 'b', inReplyTo: 'a', unresolved: false },
    ]);
    assert.deepEqual(result, [true, false, true]);
  });

  it('joins a thread through a member without a status', () => {
    const result = computeThreadResolution([
      { id: 'a', unresolved: true },
      { id: 'b', inReplyTo: 'a' },
      { id: 'c', inReplyTo: 'b', unresolved: false },
    ]);
    assert.deepEqual(result, [true, true, true]);
  });

  it('treats a reply to an unknown comment as its own thread', () => {
    const result = computeThreadResolution([
      { id: 'a', unresolved: false },
      { id: 'b', inReplyTo: 'missing', unresolved: true },
    ]);
    assert.deepEqual(result, [true, false]);
  });

  it('terminates on reply cycles', () => {
    const result = computeThreadResolution([
      { id: 'a', inReplyTo: 'b', unresolved: true },
      { id: 'b', inReplyTo: 'a', unresolved: false },
    ]);
    assert.equal(result.length, 2);
  });
});
