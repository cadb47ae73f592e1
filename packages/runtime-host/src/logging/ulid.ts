/**
 * Keyline Runtime Host — ULID Generator
 *
 * 26-character Crockford Base32 identifiers: 10 characters of millisecond
 * timestamp followed by 16 characters of randomness. Used as `event_id` in
 * diagnostic log entries so duplicated lines can be dropped on read.
 *
 * IDs from one generator are strictly increasing: within the same
 * millisecond, or when the clock steps back, the last timestamp is kept and
 * the random part is incremented instead of redrawn.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_BYTES = 10;
const RANDOM_MAX = (1n << 80n) - 1n;

function encode(value: bigint, length: number): string {
  let out = '';
  let rest = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(rest & 31n)) + out;
    rest >>= 5n;
  }
  return out;
}

function toBigInt(bytes: Uint8Array): bigint {
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

export interface UlidSources {
  /** Milliseconds since the epoch. Default: Date.now */
  readonly now?: (() => number) | undefined;
  /** Returns `size` random bytes. Default: crypto.randomBytes */
  readonly random?: ((size: number) => Uint8Array) | undefined;
}

/**
 * Create a monotonic ULID generator.
 *
 * @example
 * const next = createUlidGenerator();
 * next(); // e.g. '01JDKPF8X7M4VQN3BGHST6RWYZ'
 */
export function createUlidGenerator(sources?: UlidSources): () => string {
  const now = sources?.now ?? Date.now;
  const random = sources?.random ?? randomBytes;
  let lastTime = -1;
  let lastRandom = 0n;

  return () => {
    const time = now();
    if (time > lastTime) {
      lastTime = time;
      lastRandom = toBigInt(random(RANDOM_BYTES));
    } else if (lastRandom < RANDOM_MAX) {
      lastRandom += 1n;
    } else {
      // Random part exhausted: borrow the next millisecond.
      lastTime += 1;
      lastRandom = toBigInt(random(RANDOM_BYTES));
    }
    return encode(BigInt(lastTime), TIME_CHARS) + encode(lastRandom, RANDOM_CHARS);
  };
}

/** Process-wide generator. */
export const ulid: () => string = createUlidGenerator();
