/**
 * Value Generator capability
 * One operation per leaf kind, plus the length draw for dynamic arrays.
 * The generation and mutation algorithms only ever talk to this surface.
 */

import type { TypeDescriptor } from '../types/descriptor.js';
import type { MutationPolicy, ResolvedGeneratorConfig } from '../types/options.js';
import type { AbiValue } from '../types/value.js';
import type { Rng } from '../util/rng.js';

export interface ValueGenerator {
  /** PRNG consumed by every draw, including the mutator's choices */
  readonly rng: Rng;

  /** Active length bounds */
  readonly config: ResolvedGeneratorConfig;

  /** Round bounds and choice weights used by mutateAbiValue */
  readonly mutation: MutationPolicy;

  bool(): boolean;

  /** 20 bytes */
  address(): Uint8Array;

  /** Length drawn from `config.stringLength` */
  string(): string;

  /** Exactly `length` code points */
  stringOfLength(length: number): string;

  /** Length drawn from `config.bytesLength` */
  bytes(): Uint8Array;

  bytesOfLength(length: number): Uint8Array;

  fixedBytes(size: number): Uint8Array;

  /** Uniform over the two's-complement (signed) or unsigned range of `bits` */
  integer(signed: boolean, bits: number): bigint;

  /** Element count for a dynamic array, drawn from `config.arrayLength` */
  arrayLength(): number;

  /**
   * Feedback hook: a finalized leaf value produced during mutation.
   * Corpus-backed generators record it for later reuse.
   */
  observe(type: TypeDescriptor, value: AbiValue): void;
}

/** Length of a string in code points, the unit of `stringLength`. */
export function codePointLength(text: string): number {
  let count = 0;
  for (const _ of text) count++;
  return count;
}

export function withinBounds(
  length: number,
  [min, max]: readonly [number, number]
): boolean {
  return length >= min && length <= max;
}
