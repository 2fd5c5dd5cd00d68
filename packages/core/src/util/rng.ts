// Deterministic PRNG shared by generators and the mutator. Never Math.random.

/**
 * 32-bit FNV-1a hash of a string over UTF-16 code units.
 * offset-basis: 2166136261, prime: 16777619, modulo 2^32
 */
export function fnv1a32(s: string): number {
  let x = 2166136261 >>> 0;
  for (let i = 0; i < s.length; i++) {
    x ^= s.charCodeAt(i);
    x = Math.imul(x, 16777619) >>> 0;
  }
  return x >>> 0;
}

// xorshift32 has a fixed point at zero
const ZERO_STATE_REPLACEMENT = 0x9e3779b9;

/**
 * xorshift32 RNG with uint32 state.
 * Initialization: x = (seed >>> 0) ^ fnv1a32(stream)
 * Step: x ^= x << 13; x ^= x >>> 17; x ^= x << 5; (all masked to uint32)
 *
 * The stream label lets independent workers share a campaign seed without
 * sharing a sequence.
 */
export class XorShift32 {
  private x: number;

  constructor(seed: number, stream = '') {
    const state = ((seed >>> 0) ^ fnv1a32(stream)) >>> 0;
    this.x = state === 0 ? ZERO_STATE_REPLACEMENT : state;
  }

  /** Returns the next uint32 value. */
  next(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  /** Returns a deterministic float in [0, 1). */
  nextFloat01(): number {
    return (this.next() >>> 0) / 0x100000000;
  }

  /** Uniform integer in [min, max], both inclusive. */
  intBetween(min: number, max: number): number {
    if (max <= min) return min;
    return min + Math.floor(this.nextFloat01() * (max - min + 1));
  }

  /** True with the given probability. */
  chance(probability: number): boolean {
    return this.nextFloat01() < probability;
  }

  /** Uniform bigint in [0, 2^bits). */
  bigUintBits(bits: number): bigint {
    let out = 0n;
    let filled = 0;
    while (filled < bits) {
      out = (out << 32n) | BigInt(this.next());
      filled += 32;
    }
    return out & ((1n << BigInt(bits)) - 1n);
  }

  bytes(length: number): Uint8Array {
    const out = new Uint8Array(length);
    for (let i = 0; i < length; i++) {
      out[i] = this.next() & 0xff;
    }
    return out;
  }

  /** Uniform element of a non-empty list, undefined for an empty one. */
  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[this.intBetween(0, items.length - 1)];
  }

  /**
   * Weighted choice over `[item, weight]` pairs; zero weights never win.
   * Returns undefined when no weight is positive.
   */
  weighted<T>(entries: ReadonlyArray<readonly [T, number]>): T | undefined {
    let total = 0;
    for (const [, weight] of entries) total += Math.max(0, weight);
    if (total <= 0) return undefined;
    let roll = this.nextFloat01() * total;
    let last: T | undefined;
    for (const [item, weight] of entries) {
      if (weight <= 0) continue;
      last = item;
      if (roll < weight) return item;
      roll -= weight;
    }
    return last;
  }
}

/** Minimal RNG surface the engine depends on. */
export type Rng = Pick<
  XorShift32,
  | 'next'
  | 'nextFloat01'
  | 'intBetween'
  | 'chance'
  | 'bigUintBits'
  | 'bytes'
  | 'pick'
  | 'weighted'
>;

export function createRng(seed: number, stream = 'abiseed'): XorShift32 {
  return new XorShift32(seed, stream);
}
