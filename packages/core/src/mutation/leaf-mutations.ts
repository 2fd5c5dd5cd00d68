/**
 * Leaf perturbations: small edits to an existing scalar rather than a
 * fresh draw. Every result stays inside the width or length bounds given.
 */

import type { ValueGenerator } from '../generator/value-generator.js';
import type { LengthBounds } from '../types/options.js';
import type { Rng } from '../util/rng.js';

const MAX_INTEGER_DELTA = 16;
const MAX_SPLICE_LENGTH = 8;

const INTEGER_MUTATIONS = ['delta', 'bitFlip', 'signFlip'] as const;
type IntegerMutation = (typeof INTEGER_MUTATIONS)[number];

type SequenceMutation = 'substitute' | 'splice' | 'truncate';

/** Two's-complement wrap into the width. */
export function wrapInteger(value: bigint, signed: boolean, bits: number): bigint {
  return signed ? BigInt.asIntN(bits, value) : BigInt.asUintN(bits, value);
}

export function perturbInteger(
  rng: Rng,
  value: bigint,
  signed: boolean,
  bits: number
): bigint {
  const op: IntegerMutation = rng.pick(INTEGER_MUTATIONS) ?? 'delta';
  switch (op) {
    case 'delta': {
      const delta = BigInt(rng.intBetween(1, MAX_INTEGER_DELTA));
      return wrapInteger(rng.chance(0.5) ? value + delta : value - delta, signed, bits);
    }
    case 'bitFlip':
      return wrapInteger(value ^ (1n << BigInt(rng.intBetween(0, bits - 1))), signed, bits);
    case 'signFlip':
      return wrapInteger(-value, signed, bits);
  }
}

function sequenceMutations(
  length: number,
  bounds: LengthBounds | undefined
): SequenceMutation[] {
  const ops: SequenceMutation[] = [];
  if (length > 0) ops.push('substitute');
  if (bounds !== undefined) {
    const [min, max] = bounds;
    if (length < max) ops.push('splice');
    if (length > min) ops.push('truncate');
  }
  return ops;
}

function spliceLength(rng: Rng, length: number, max: number): number {
  return rng.intBetween(1, Math.min(MAX_SPLICE_LENGTH, max - length));
}

/**
 * Byte-level edit. Fixed-size values (addresses, `bytesN`) pass no bounds
 * and only ever get a substitution.
 */
export function perturbBytes(
  generator: ValueGenerator,
  bytes: Uint8Array,
  bounds?: LengthBounds
): Uint8Array {
  const { rng } = generator;
  const op = rng.pick(sequenceMutations(bytes.length, bounds));
  switch (op) {
    case 'substitute': {
      const out = bytes.slice();
      const index = rng.intBetween(0, out.length - 1);
      out[index] = ((out[index] ?? 0) + rng.intBetween(1, 255)) & 0xff;
      return out;
    }
    case 'splice': {
      const max = bounds?.[1] ?? bytes.length;
      const insert = generator.bytesOfLength(spliceLength(rng, bytes.length, max));
      const at = rng.intBetween(0, bytes.length);
      const out = new Uint8Array(bytes.length + insert.length);
      out.set(bytes.subarray(0, at), 0);
      out.set(insert, at);
      out.set(bytes.subarray(at), at + insert.length);
      return out;
    }
    case 'truncate': {
      const min = bounds?.[0] ?? 0;
      return bytes.slice(0, rng.intBetween(min, bytes.length - 1));
    }
    case undefined:
      return bytes.slice();
  }
}

/** Character-level edit on code points. */
export function perturbString(
  generator: ValueGenerator,
  text: string,
  bounds: LengthBounds
): string {
  const { rng } = generator;
  const chars = Array.from(text);
  const op = rng.pick(sequenceMutations(chars.length, bounds));
  switch (op) {
    case 'substitute': {
      const index = rng.intBetween(0, chars.length - 1);
      chars[index] = generator.stringOfLength(1);
      return chars.join('');
    }
    case 'splice': {
      const insert = generator.stringOfLength(
        spliceLength(rng, chars.length, bounds[1])
      );
      chars.splice(rng.intBetween(0, chars.length), 0, insert);
      return chars.join('');
    }
    case 'truncate':
      return chars.slice(0, rng.intBetween(bounds[0], chars.length - 1)).join('');
    case undefined:
      return text;
  }
}

/**
 * Grow or shrink `items` to exactly `target` entries by inserting fresh
 * items or deleting existing ones at random positions.
 */
export function resizeSequence<T>(
  rng: Rng,
  items: readonly T[],
  target: number,
  makeItem: () => T
): T[] {
  const out = items.slice();
  while (out.length < target) {
    out.splice(rng.intBetween(0, out.length), 0, makeItem());
  }
  while (out.length > target) {
    out.splice(rng.intBetween(0, out.length - 1), 1);
  }
  return out;
}
