import { describe, expect, it } from 'vitest';

import { ValueSet, forEachLeaf } from '../../src/corpus/value-set.js';
import { abiTypes, typeKey } from '../../src/types/descriptor.js';
import { abiValues } from '../../src/types/value.js';
import { createRng } from '../../src/util/rng.js';

const uint8 = abiTypes.uint(8);
const pair = abiTypes.tuple([
  abiTypes.field('id', uint8),
  abiTypes.field('tags', abiTypes.slice(abiTypes.string())),
]);
const pairValue = abiValues.tuple([
  { name: 'id', value: abiValues.uint(3n) },
  { name: 'tags', value: abiValues.slice([abiValues.string('a'), abiValues.string('a')]) },
]);

describe('ValueSet', () => {
  it('stores structurally equal values once per type key', () => {
    const set = new ValueSet();
    expect(set.add(uint8, abiValues.uint(1n))).toBe(true);
    expect(set.add(uint8, abiValues.uint(1n))).toBe(false);
    expect(set.add(abiTypes.uint(16), abiValues.uint(1n))).toBe(true);
    expect(set.size(uint8)).toBe(1);
    expect(set.size()).toBe(2);
    expect(set.keys()).toEqual(['uint8', 'uint16']);
  });

  it('refuses values that do not match the type', () => {
    const set = new ValueSet();
    expect(set.add(uint8, abiValues.uint(300n))).toBe(false);
    expect(set.add(uint8, abiValues.bool(true))).toBe(false);
    expect(set.addDeep(pair, abiValues.uint(1n))).toBe(0);
    expect(set.size()).toBe(0);
  });

  it('samples only stored values and nothing for unknown keys', () => {
    const set = new ValueSet();
    const rng = createRng(1);
    expect(set.sample(uint8, rng)).toBeUndefined();
    set.add(uint8, abiValues.uint(4n));
    set.add(uint8, abiValues.uint(5n));
    for (let i = 0; i < 20; i++) {
      const sampled = set.sample(uint8, rng);
      expect(sampled?.kind === 'uint' && [4n, 5n].includes(sampled.value)).toBe(true);
    }
  });

  it('adds every leaf of a composite under its own key', () => {
    const set = new ValueSet();
    expect(set.addDeep(pair, pairValue)).toBe(2);
    expect(set.keys()).toEqual(['uint8', 'string']);
    expect(set.values(abiTypes.string())).toEqual([abiValues.string('a')]);
    expect(set.size(pair)).toBe(0);
  });

  it('stores a copy of inserted values', () => {
    const set = new ValueSet();
    const bytes = new Uint8Array([1, 2]);
    set.add(abiTypes.bytes(), abiValues.bytes(bytes));
    bytes[0] = 9;
    const [stored] = set.values(abiTypes.bytes());
    expect(stored?.kind === 'bytes' && Array.from(stored.value)).toEqual([1, 2]);
  });

  it('lists entries with their descriptors', () => {
    const set = new ValueSet();
    set.addDeep(pair, pairValue);
    const entries = set.entries();
    expect(entries.map((entry) => typeKey(entry.type))).toEqual(['uint8', 'string']);
    expect(entries[0]?.values).toEqual([abiValues.uint(3n)]);
  });

  it('clones into an independent set', () => {
    const set = new ValueSet();
    set.add(uint8, abiValues.uint(1n));
    const copy = set.clone();
    copy.add(uint8, abiValues.uint(2n));
    expect(set.size()).toBe(1);
    expect(copy.size()).toBe(2);
    expect(copy.add(uint8, abiValues.uint(1n))).toBe(false);
  });
});

describe('forEachLeaf', () => {
  it('visits leaves depth first in field order', () => {
    const seen: string[] = [];
    forEachLeaf(pair, pairValue, (type, value) => {
      seen.push(`${typeKey(type)}=${value.kind === 'uint' || value.kind === 'string' ? String(value.value) : '?'}`);
    });
    expect(seen).toEqual(['uint8=3', 'string=a', 'string=a']);
  });

  it('treats a leaf type as a single visit', () => {
    let visits = 0;
    forEachLeaf(abiTypes.bool(), abiValues.bool(true), () => visits++);
    expect(visits).toBe(1);
  });
});
