import { ADDRESS_LENGTH, type TypeDescriptor } from '../types/descriptor.js';
import {
  DEFAULT_MUTATION_POLICY,
  resolveGeneratorConfig,
  type GeneratorConfig,
  type MutationPolicy,
  type ResolvedGeneratorConfig,
} from '../types/options.js';
import type { AbiValue } from '../types/value.js';
import type { Rng } from '../util/rng.js';
import type { ValueGenerator } from './value-generator.js';

// Printable ASCII, so code points, UTF-16 units and UTF-8 bytes coincide
const STRING_ALPHABET = Array.from({ length: 0x7f - 0x20 }, (_, i) =>
  String.fromCharCode(0x20 + i)
);

/**
 * Pure PRNG-bounded synthesis. Holds no state besides the PRNG handle and
 * its configuration.
 */
export class RandomValueGenerator implements ValueGenerator {
  readonly config: ResolvedGeneratorConfig;
  readonly mutation: MutationPolicy;

  /**
   * @throws ConfigError when a length bound is invalid
   */
  constructor(
    config: GeneratorConfig,
    readonly rng: Rng,
    mutation: MutationPolicy = DEFAULT_MUTATION_POLICY
  ) {
    this.config = resolveGeneratorConfig(config);
    this.mutation = mutation;
  }

  bool(): boolean {
    return this.rng.chance(0.5);
  }

  address(): Uint8Array {
    return this.rng.bytes(ADDRESS_LENGTH);
  }

  string(): string {
    const [min, max] = this.config.stringLength;
    return this.stringOfLength(this.rng.intBetween(min, max));
  }

  stringOfLength(length: number): string {
    let out = '';
    for (let i = 0; i < length; i++) {
      out += this.rng.pick(STRING_ALPHABET) ?? ' ';
    }
    return out;
  }

  bytes(): Uint8Array {
    const [min, max] = this.config.bytesLength;
    return this.bytesOfLength(this.rng.intBetween(min, max));
  }

  bytesOfLength(length: number): Uint8Array {
    return this.rng.bytes(length);
  }

  fixedBytes(size: number): Uint8Array {
    return this.rng.bytes(size);
  }

  integer(signed: boolean, bits: number): bigint {
    const raw = this.rng.bigUintBits(bits);
    return signed ? BigInt.asIntN(bits, raw) : raw;
  }

  arrayLength(): number {
    const [min, max] = this.config.arrayLength;
    return this.rng.intBetween(min, max);
  }

  observe(_type: TypeDescriptor, _value: AbiValue): void {
    // no corpus to feed
  }
}
