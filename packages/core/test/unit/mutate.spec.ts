import { describe, expect, it } from 'vitest';

import { ValueSet } from '../../src/corpus/value-set.js';
import { generateAbiValue } from '../../src/generator/generate.js';
import { codePointLength } from '../../src/generator/value-generator.js';
import { mutateAbiValue } from '../../src/mutation/mutate.js';
import { MutationStats } from '../../src/mutation/stats.js';
import { abiTypes, typeKey } from '../../src/types/descriptor.js';
import { ShapeMismatchError } from '../../src/types/errors.js';
import { isErr } from '../../src/types/result.js';
import { abiValues } from '../../src/types/value.js';
import { cloneValue, valuesEqual } from '../../src/value/equal.js';
import { checkShape } from '../../src/value/shape.js';
import { representativeTypes, transferBatch } from '../fixtures/descriptors.js';
import { mutatingGenerator, onlyChoice, randomGenerator } from './test-helpers.js';

describe('mutateAbiValue', () => {
  it('preserves the shape of every representative type', () => {
    const generator = mutatingGenerator();
    for (const type of [...representativeTypes, transferBatch]) {
      let value = generateAbiValue(generator, type);
      for (let i = 0; i < 5; i++) {
        value = mutateAbiValue(generator, type, value).unwrap();
        expect(checkShape(type, value).isOk(), typeKey(type)).toBe(true);
      }
    }
  });

  it('never modifies its input', () => {
    const generator = mutatingGenerator(9);
    const input = generateAbiValue(generator, transferBatch);
    const snapshot = cloneValue(input);
    for (let i = 0; i < 20; i++) {
      mutateAbiValue(generator, transferBatch, input).unwrap();
    }
    expect(valuesEqual(input, snapshot)).toBe(true);
  });

  it('returns an identical copy after zero rounds and observes nothing', () => {
    const corpus = new ValueSet();
    const generator = mutatingGenerator(9, { rounds: [0, 0] }, corpus);
    const input = abiValues.uint(2n ** 200n);
    const result = mutateAbiValue(generator, abiTypes.uint(256), input).unwrap();
    expect(result).not.toBe(input);
    expect(valuesEqual(result, input)).toBe(true);
    expect(corpus.size()).toBe(0);
  });

  it('rejects a value of the wrong shape', () => {
    const result = mutateAbiValue(randomGenerator(), abiTypes.uint(8), abiValues.bool(true));
    expect(isErr(result)).toBe(true);
    if (isErr(result)) {
      expect(result.error).toBeInstanceOf(ShapeMismatchError);
      expect(result.error.message).toBe('Shape mismatch at $: expected uint, got bool');
    }
  });

  it('feeds finalized leaves back into the corpus', () => {
    const corpus = new ValueSet();
    const generator = mutatingGenerator(9, { rounds: [1, 1] }, corpus);
    const type = abiTypes.tuple([
      abiTypes.field('a', abiTypes.uint(8)),
      abiTypes.field('b', abiTypes.address()),
    ]);
    const output = mutateAbiValue(
      generator,
      type,
      abiValues.tuple([
        { name: 'a', value: abiValues.uint(1n) },
        { name: 'b', value: abiValues.address(new Uint8Array(20)) },
      ])
    ).unwrap();

    expect(corpus.keys()).toEqual(['uint8', 'address']);
    const first = output.kind === 'tuple' ? output.fields[0]?.value : undefined;
    const stored = corpus.values(abiTypes.uint(8))[0];
    expect(first !== undefined && stored !== undefined && valuesEqual(first, stored)).toBe(true);
  });

  it('counts choices, rounds and observed leaves', () => {
    const stats = new MutationStats();
    const generator = mutatingGenerator(9, { rounds: [2, 2] });
    mutateAbiValue(generator, abiTypes.bool(), abiValues.bool(true), { stats }).unwrap();
    mutateAbiValue(generator, abiTypes.bool(), abiValues.bool(true), { stats }).unwrap();

    const snapshot = stats.snapshotMetrics();
    expect(snapshot.calls).toBe(2);
    expect(snapshot.rounds).toBe(4);
    expect(snapshot.keep + snapshot.mutate + snapshot.regenerate).toBe(4);
    expect(snapshot.resize).toBe(0);
    expect(snapshot.leavesPerturbed).toBe(snapshot.mutate);
    expect(snapshot.leavesObserved).toBe(2);

    stats.reset();
    expect(stats.snapshotMetrics().calls).toBe(0);
  });

  describe('single choices', () => {
    it('keep returns the input unchanged', () => {
      const generator = randomGenerator(1, {}, onlyChoice('keep'));
      const input = generateAbiValue(generator, transferBatch);
      const output = mutateAbiValue(generator, transferBatch, input).unwrap();
      expect(valuesEqual(output, input)).toBe(true);
    });

    it('mutate flips a boolean', () => {
      const generator = randomGenerator(1, {}, onlyChoice('mutate'));
      const output = mutateAbiValue(generator, abiTypes.bool(), abiValues.bool(true)).unwrap();
      expect(output).toEqual(abiValues.bool(false));
    });

    it('mutate always changes a small unsigned integer', () => {
      const generator = randomGenerator(1, {}, onlyChoice('mutate'));
      for (let i = 0; i < 50; i++) {
        const output = mutateAbiValue(generator, abiTypes.uint(8), abiValues.uint(5n)).unwrap();
        expect(output.kind === 'uint' && output.value !== 5n).toBe(true);
        expect(checkShape(abiTypes.uint(8), output).isOk()).toBe(true);
      }
    });

    it('mutate edits exactly one byte of an address', () => {
      const generator = randomGenerator(1, {}, onlyChoice('mutate'));
      const input = new Uint8Array(20).fill(0x42);
      const output = mutateAbiValue(generator, abiTypes.address(), abiValues.address(input)).unwrap();
      const bytes = output.kind === 'address' ? Array.from(output.value) : [];
      expect(bytes).toHaveLength(20);
      expect(bytes.filter((byte) => byte !== 0x42)).toHaveLength(1);
    });

    it('mutate descends into every field of a tuple', () => {
      const stats = new MutationStats();
      const generator = randomGenerator(1, {}, onlyChoice('mutate'));
      const type = abiTypes.tuple([
        abiTypes.field('on', abiTypes.bool()),
        abiTypes.field('off', abiTypes.bool()),
      ]);
      const output = mutateAbiValue(
        generator,
        type,
        abiValues.tuple([
          { name: 'on', value: abiValues.bool(true) },
          { name: 'off', value: abiValues.bool(false) },
        ]),
        { stats }
      ).unwrap();
      expect(output).toEqual(
        abiValues.tuple([
          { name: 'on', value: abiValues.bool(false) },
          { name: 'off', value: abiValues.bool(true) },
        ])
      );
      expect(stats.snapshotMetrics().leavesPerturbed).toBe(2);
      expect(stats.snapshotMetrics().mutate).toBe(3);
    });

    it('resize reaches a length inside the configured bounds', () => {
      const generator = randomGenerator(
        1,
        { arrayLength: [3, 3], bytesLength: [2, 2], stringLength: [4, 4] },
        onlyChoice('resize')
      );
      const slice = mutateAbiValue(
        generator,
        abiTypes.slice(abiTypes.bool()),
        abiValues.slice([abiValues.bool(true)])
      ).unwrap();
      const bytes = mutateAbiValue(
        generator,
        abiTypes.bytes(),
        abiValues.bytes(new Uint8Array([1, 2, 3, 4, 5]))
      ).unwrap();
      const text = mutateAbiValue(generator, abiTypes.string(), abiValues.string('x')).unwrap();

      expect(slice.kind === 'slice' && slice.elements.length).toBe(3);
      expect(bytes.kind === 'bytes' && bytes.value.length).toBe(2);
      expect(text.kind === 'string' && codePointLength(text.value)).toBe(4);
    });

    it('resize falls back to keep on fixed-size values', () => {
      const generator = randomGenerator(1, {}, onlyChoice('resize'));
      const input = abiValues.array([abiValues.bool(true), abiValues.bool(false)]);
      const output = mutateAbiValue(generator, abiTypes.array(abiTypes.bool(), 2), input).unwrap();
      expect(valuesEqual(output, input)).toBe(true);
    });

    it('regenerate produces a fresh value of the same shape', () => {
      const generator = randomGenerator(1, {}, onlyChoice('regenerate'));
      const output = mutateAbiValue(
        generator,
        transferBatch,
        generateAbiValue(generator, transferBatch)
      ).unwrap();
      expect(checkShape(transferBatch, output).isOk()).toBe(true);
    });
  });
});
