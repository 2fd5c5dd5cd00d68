import { describe, expect, it } from 'vitest';
import fc from 'fast-check';

import { decodeAbiValue } from '../../src/codec/decode.js';
import { encodeAbiValue } from '../../src/codec/encode.js';
import { generateAbiValue } from '../../src/generator/generate.js';
import { mutateAbiValue } from '../../src/mutation/mutate.js';
import { abiTypes } from '../../src/types/descriptor.js';
import { abiValues } from '../../src/types/value.js';
import { valuesEqual } from '../../src/value/equal.js';
import { checkShape } from '../../src/value/shape.js';
import { representativeTypes, transferBatch } from '../fixtures/descriptors.js';
import { mutatingGenerator, randomGenerator } from './test-helpers.js';

const seedArbitrary = fc.integer({ min: 0, max: 0xffffffff });
const typeArbitrary = fc.constantFrom(...representativeTypes, transferBatch);

describe('property-based codec and mutation checks', () => {
  it('decodes the JSON text of every encoded value back to the same value', () => {
    const property = fc.property(seedArbitrary, typeArbitrary, (seed, type) => {
      const value = generateAbiValue(randomGenerator(seed), type);
      const text = JSON.stringify(encodeAbiValue(type, value));
      const decoded = decodeAbiValue(type, JSON.parse(text)).unwrap();
      expect(valuesEqual(decoded, value)).toBe(true);
      expect(JSON.stringify(encodeAbiValue(type, decoded))).toBe(text);
    });

    fc.assert(property, { seed: 202_610, numRuns: 200 });
  });

  it('keeps mutated values inside the type', () => {
    const property = fc.property(seedArbitrary, typeArbitrary, (seed, type) => {
      const generator = mutatingGenerator(seed, { rounds: [1, 3] });
      let value = generateAbiValue(generator, type);
      for (let i = 0; i < 3; i++) {
        value = mutateAbiValue(generator, type, value).unwrap();
      }
      expect(checkShape(type, value).isOk()).toBe(true);
    });

    fc.assert(property, { seed: 202_611, numRuns: 100 });
  });

  it('round-trips the full range of 256-bit integers', () => {
    const property = fc.property(
      fc.bigUintN(256),
      fc.bigIntN(256),
      (unsigned, signed) => {
        const u = abiTypes.uint(256);
        const s = abiTypes.int(256);
        const uValue = abiValues.uint(unsigned);
        const sValue = abiValues.int(signed);
        expect(valuesEqual(decodeAbiValue(u, encodeAbiValue(u, uValue)).unwrap(), uValue)).toBe(true);
        expect(valuesEqual(decodeAbiValue(s, encodeAbiValue(s, sValue)).unwrap(), sValue)).toBe(true);
      }
    );

    fc.assert(property, { seed: 202_612, numRuns: 200 });
  });

  it('rejects integers one past either end of the range', () => {
    const property = fc.property(fc.integer({ min: 1, max: 32 }), (bytes) => {
      const bits = bytes * 8;
      const max = (1n << BigInt(bits)) - 1n;
      const min = -(1n << BigInt(bits - 1));
      expect(decodeAbiValue(abiTypes.uint(bits), (max + 1n).toString()).isOk()).toBe(false);
      expect(decodeAbiValue(abiTypes.uint(bits), max.toString()).isOk()).toBe(true);
      expect(decodeAbiValue(abiTypes.int(bits), (min - 1n).toString()).isOk()).toBe(false);
      expect(decodeAbiValue(abiTypes.int(bits), min.toString()).isOk()).toBe(true);
    });

    fc.assert(property, { seed: 202_613, numRuns: 32 });
  });
});
