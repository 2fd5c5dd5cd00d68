import { describe, it, expect } from 'vitest';
import {
  abiTypes,
  createRng,
  decodeAbiValue,
  encodeAbiValue,
  generateAbiValue,
  MutatingValueGenerator,
  mutateAbiValue,
  parseTypeDescriptor,
  RandomValueGenerator,
  ValueSet,
  valuesEqual,
  type MutationConfig,
} from '../index.js';

describe('public API surface', () => {
  it('exports usable entry points end to end', () => {
    const type = parseTypeDescriptor({
      kind: 'tuple',
      fields: [
        { name: 'to', type: { kind: 'address' } },
        { name: 'ids', type: { kind: 'slice', elem: { kind: 'uint', bits: 32 } } },
      ],
    }).unwrap();

    const random = new RandomValueGenerator({ arrayLength: [1, 2] }, createRng(13));
    const value = generateAbiValue(random, type);

    const corpus = new ValueSet();
    expect(corpus.addDeep(type, value)).toBeGreaterThanOrEqual(2);

    const mutating = new MutatingValueGenerator({ bias: { address: 1 } }, corpus, createRng(13));
    const mutated = mutateAbiValue(mutating, type, value).unwrap();

    const decoded = decodeAbiValue(type, encodeAbiValue(type, mutated)).unwrap();
    expect(valuesEqual(decoded, mutated)).toBe(true);
  });

  it('exposes configuration types', () => {
    const config: MutationConfig = {
      rounds: [1, 2],
      weights: { resize: 0 },
      bytesLength: [0, 8],
    };
    expect(() => new MutatingValueGenerator(config, new ValueSet(), createRng(1))).not.toThrow();
    expect(abiTypes.uint(8)).toEqual({ kind: 'uint', bits: 8 });
  });
});
