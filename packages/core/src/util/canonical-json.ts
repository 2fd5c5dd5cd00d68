import { Buffer } from 'node:buffer';
import type { AbiIr } from '../codec/ir.js';

export interface CanonicalJSONResult {
  text: string;
  buffer: Buffer;
  byteLength: number;
}

function canonicalizeIr(value: AbiIr): string {
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (Array.isArray(value)) {
    return `[${value.map(canonicalizeIr).join(',')}]`;
  }

  const entries = Object.keys(value)
    .sort()
    .map((key) => {
      const v = value[key];
      return `${JSON.stringify(key)}:${v === undefined ? 'null' : canonicalizeIr(v)}`;
    });
  return `{${entries.join(',')}}`;
}

/**
 * Key-sorted, whitespace-free JSON of an IR tree. Two IR trees are
 * structurally equal exactly when their canonical texts are equal.
 */
export function canonicalizeForHash(value: AbiIr): CanonicalJSONResult {
  const text = canonicalizeIr(value);
  const buffer = Buffer.from(text, 'utf8');
  return {
    text,
    buffer,
    byteLength: buffer.byteLength,
  };
}
