const ALPHABET = '_ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789$';
const SYMBOL_BITS = 6n;
const SYMBOL_MASK = 0x3fn;
const COUNTER_SLOTS = 4096n;
const EPOCH_MS = Date.UTC(2024, 0, 1);

/**
 * Encode a non-negative integer with the 64-symbol alphabet, most significant symbol first.
 */
export function encodeUid(value: bigint): string {
  if (value < 0n) {
    throw new Error(`Cannot encode negative UID value ${value}`);
  }
  let remaining = value;
  let out = '';
  do {
    out = ALPHABET[Number(remaining & SYMBOL_MASK)] + out;
    remaining >>= SYMBOL_BITS;
  } while (remaining > 0n);
  return out;
}

export function decodeUid(uid: string): bigint {
  let result = 0n;
  for (const ch of uid) {
    const index = ALPHABET.indexOf(ch);
    if (index === -1) {
      throw new Error(`Illegal character "${ch}" in UID ${uid}`);
    }
    result = (result << SYMBOL_BITS) | BigInt(index);
  }
  return result;
}

/**
 * Time-ordered ids: milliseconds since 2024 times 4096, plus a counter for ids issued in
 * the same millisecond. Each generator keeps its own counter.
 */
export function createUidGenerator(now: () => number = Date.now): () => string {
  let lastMs = -1;
  let counter = 0n;

  return () => {
    const ms = Math.max(0, now() - EPOCH_MS);
    if (ms === lastMs) {
      counter += 1n;
      if (counter >= COUNTER_SLOTS) {
        throw new Error('UID counter overflow in the same millisecond.');
      }
    } else {
      lastMs = ms;
      counter = 0n;
    }
    return encodeUid(BigInt(ms) * COUNTER_SLOTS + counter);
  };
}
