import type { ValueSet } from '../corpus/value-set.js';
import { abiTypes, isLeafType, type TypeDescriptor } from '../types/descriptor.js';
import {
  resolveMutationConfig,
  type MutationConfig,
  type MutationPolicy,
  type ResolvedGeneratorConfig,
  type ResolvedMutationConfig,
} from '../types/options.js';
import type { AbiValue } from '../types/value.js';
import type { Rng } from '../util/rng.js';
import { RandomValueGenerator } from './random-generator.js';
import {
  codePointLength,
  withinBounds,
  type ValueGenerator,
} from './value-generator.js';

const ADDRESS = abiTypes.address();
const STRING = abiTypes.string();
const BYTES = abiTypes.bytes();

/**
 * Corpus-seeded generation. Each leaf call flips a coin weighted by the
 * kind's reuse bias: heads samples the corpus under the exact type key,
 * tails (or an empty key) delegates to the random generator.
 */
export class MutatingValueGenerator implements ValueGenerator {
  readonly settings: ResolvedMutationConfig;
  readonly mutation: MutationPolicy;
  private readonly random: RandomValueGenerator;

  /**
   * @throws ConfigError when the configuration is invalid
   */
  constructor(
    config: MutationConfig,
    readonly corpus: ValueSet,
    readonly rng: Rng
  ) {
    this.settings = resolveMutationConfig(config);
    this.mutation = {
      rounds: this.settings.rounds,
      weights: this.settings.weights,
    };
    this.random = new RandomValueGenerator(this.settings, rng, this.mutation);
  }

  get config(): ResolvedGeneratorConfig {
    return this.random.config;
  }

  private reuse(type: TypeDescriptor, bias: number): AbiValue | undefined {
    if (!this.rng.chance(bias)) return undefined;
    return this.corpus.sample(type, this.rng);
  }

  bool(): boolean {
    return this.random.bool();
  }

  address(): Uint8Array {
    const reused = this.reuse(ADDRESS, this.settings.bias.address);
    return reused?.kind === 'address' ? reused.value : this.random.address();
  }

  string(): string {
    const reused = this.reuse(STRING, this.settings.bias.string);
    if (
      reused?.kind === 'string' &&
      withinBounds(codePointLength(reused.value), this.config.stringLength)
    ) {
      return reused.value;
    }
    return this.random.string();
  }

  stringOfLength(length: number): string {
    return this.random.stringOfLength(length);
  }

  bytes(): Uint8Array {
    const reused = this.reuse(BYTES, this.settings.bias.bytes);
    if (
      reused?.kind === 'bytes' &&
      withinBounds(reused.value.length, this.config.bytesLength)
    ) {
      return reused.value;
    }
    return this.random.bytes();
  }

  bytesOfLength(length: number): Uint8Array {
    return this.random.bytesOfLength(length);
  }

  fixedBytes(size: number): Uint8Array {
    const reused = this.reuse(abiTypes.fixedBytes(size), this.settings.bias.bytes);
    return reused?.kind === 'fixedBytes' ? reused.value : this.random.fixedBytes(size);
  }

  integer(signed: boolean, bits: number): bigint {
    const type = signed ? abiTypes.int(bits) : abiTypes.uint(bits);
    const reused = this.reuse(type, this.settings.bias.integer);
    return reused?.kind === 'int' || reused?.kind === 'uint'
      ? reused.value
      : this.random.integer(signed, bits);
  }

  arrayLength(): number {
    return this.random.arrayLength();
  }

  observe(type: TypeDescriptor, value: AbiValue): void {
    if (isLeafType(type)) {
      this.corpus.add(type, value);
    }
  }
}
