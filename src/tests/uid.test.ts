import * as test from 'node:test';
import * as assert from 'node:assert';
import { createUidGenerator, decodeUid, encodeUid } from '../uid.js';

const { describe, it } = test;

const EPOCH_MS = Date.UTC(2024, 0, 1);

describe('encodeUid / decodeUid', () => {

  it('should encode with the 64-symbol alphabet', () => {
    assert.strictEqual(encodeUid(0n), '_');
    assert.strictEqual(encodeUid(1n), 'A');
    assert.strictEqual(encodeUid(63n), '$');
    assert.strictEqual(encodeUid(64n), 'A_');
  });

  it('should decode what it encodes', () => {
    for (const value of [0n, 64n, 20480n, 123456789n]) {
      assert.strictEqual(decodeUid(encodeUid(value)), value);
    }
  });

  it('should reject bad input', () => {
    assert.throws(() => encodeUid(-1n), /Cannot encode negative UID value -1/);
    assert.throws(() => decodeUid('A!'), /Illegal character "!" in UID A!/);
  });
});

describe('createUidGenerator', () => {

  it('should count up within the same millisecond', () => {
    const next = createUidGenerator(() => EPOCH_MS + 5);

    const first = next();
    const second = next();

    assert.strictEqual(first, 'E__');
    assert.strictEqual(decodeUid(first), 5n * 4096n);
    assert.strictEqual(decodeUid(second), 5n * 4096n + 1n);
  });

  it('should reset the counter when the clock moves', () => {
    let now = EPOCH_MS + 5;
    const next = createUidGenerator(() => now);
    next();
    next();
    now += 1;

    assert.strictEqual(decodeUid(next()), 6n * 4096n);
  });

  it('should keep separate counters per generator', () => {
    const a = createUidGenerator(() => EPOCH_MS);
    const b = createUidGenerator(() => EPOCH_MS);
    a();

    assert.strictEqual(b(), '_');
  });

  it('should refuse to overflow the counter', () => {
    const next = createUidGenerator(() => EPOCH_MS + 1);
    for (let i = 0; i < 4096; i++) {
      next();
    }

    assert.throws(() => next(), /UID counter overflow/);
  });
});
