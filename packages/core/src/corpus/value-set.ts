/**
 * Value Set (corpus)
 *
 * Deduplicated, append-only store of observed values keyed by canonical
 * type. Structurally equal values under one key are stored once; entries
 * are never removed. Not safe for unsynchronized concurrent use: give each
 * worker its own set (see clone) or serialize access.
 */

import { encodeAbiValue } from '../codec/encode.js';
import {
  assertNever,
  isLeafType,
  typeKey,
  type TypeDescriptor,
} from '../types/descriptor.js';
import type { AbiValue } from '../types/value.js';
import type { Rng } from '../util/rng.js';
import { structuralHash } from '../util/struct-hash.js';
import { cloneValue } from '../value/equal.js';
import { matchesShape } from '../value/shape.js';

interface Bucket {
  /** First descriptor seen for the key; equal keys mean equal types */
  readonly type: TypeDescriptor;
  readonly digests: Set<string>;
  readonly items: AbiValue[];
}

export class ValueSet {
  private readonly buckets = new Map<string, Bucket>();

  /**
   * Insert `value` under the key of `type` unless a structurally equal
   * value is already stored. Values that do not match `type` are refused.
   *
   * @returns true when the value was inserted
   */
  add(type: TypeDescriptor, value: AbiValue): boolean {
    if (!matchesShape(type, value)) {
      return false;
    }
    const key = typeKey(type);
    const { digest } = structuralHash(encodeAbiValue(type, value));
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = { type, digests: new Set(), items: [] };
      this.buckets.set(key, bucket);
    }
    if (bucket.digests.has(digest)) {
      return false;
    }
    bucket.digests.add(digest);
    bucket.items.push(cloneValue(value));
    return true;
  }

  /**
   * Add every leaf of a (possibly composite) value under its own leaf
   * type key. Used to seed the set from decoded corpus entries.
   *
   * @returns number of newly inserted leaves
   */
  addDeep(type: TypeDescriptor, value: AbiValue): number {
    if (!matchesShape(type, value)) {
      return 0;
    }
    let inserted = 0;
    forEachLeaf(type, value, (leafType, leaf) => {
      if (this.add(leafType, leaf)) inserted++;
    });
    return inserted;
  }

  /**
   * Uniformly random stored value for the key of `type`, or undefined when
   * none exists.
   */
  sample(type: TypeDescriptor, rng: Rng): AbiValue | undefined {
    const bucket = this.buckets.get(typeKey(type));
    if (!bucket) return undefined;
    const picked = rng.pick(bucket.items);
    return picked === undefined ? undefined : cloneValue(picked);
  }

  /** Entry count for one type, or across all types. */
  size(type?: TypeDescriptor): number {
    if (type !== undefined) {
      return this.buckets.get(typeKey(type))?.items.length ?? 0;
    }
    let total = 0;
    for (const bucket of this.buckets.values()) total += bucket.items.length;
    return total;
  }

  keys(): string[] {
    return Array.from(this.buckets.keys());
  }

  /** Stored values for `type`, in insertion order. */
  values(type: TypeDescriptor): AbiValue[] {
    return (this.buckets.get(typeKey(type))?.items ?? []).map(cloneValue);
  }

  /** Every key with its descriptor and stored values, for persistence. */
  entries(): Array<{ type: TypeDescriptor; values: AbiValue[] }> {
    return Array.from(this.buckets.values(), (bucket) => ({
      type: bucket.type,
      values: bucket.items.map(cloneValue),
    }));
  }

  /** Independent copy, e.g. for a second worker. */
  clone(): ValueSet {
    const copy = new ValueSet();
    for (const [key, bucket] of this.buckets) {
      copy.buckets.set(key, {
        type: bucket.type,
        digests: new Set(bucket.digests),
        items: bucket.items.map(cloneValue),
      });
    }
    return copy;
  }
}

/**
 * Visit every leaf of a value whose shape matches `type`.
 */
export function forEachLeaf(
  type: TypeDescriptor,
  value: AbiValue,
  visit: (type: TypeDescriptor, value: AbiValue) => void
): void {
  if (isLeafType(type)) {
    visit(type, value);
    return;
  }
  switch (type.kind) {
    case 'array':
    case 'slice':
      if (value.kind === 'array' || value.kind === 'slice') {
        for (const element of value.elements) forEachLeaf(type.elem, element, visit);
      }
      return;
    case 'tuple':
      if (value.kind === 'tuple') {
        const { fields } = value;
        type.fields.forEach((field, index) => {
          const actual = fields[index];
          if (actual !== undefined) forEachLeaf(field.type, actual.value, visit);
        });
      }
      return;
    default:
      assertNever(type, 'type kind');
  }
}
