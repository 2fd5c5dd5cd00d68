/**
 * Hints shown under CLI errors.
 * Pure helper functions, no state.
 */

import { ErrorCode } from './codes.js';

export const TYPE_KINDS = [
  'bool',
  'address',
  'string',
  'bytes',
  'fixedBytes',
  'int',
  'uint',
  'array',
  'slice',
  'tuple',
] as const;

/**
 * Simple edit-distance-like function. Not full Levenshtein: positional char
 * differences plus the absolute length delta. Good enough for small typos.
 */
export function calculateDistance(a: string, b: string): number {
  const longer = a.length > b.length ? a : b;
  const shorter = a.length > b.length ? b : a;
  if (longer.length === 0) return shorter.length;
  if (shorter.length === 0) return longer.length;

  let distance = Math.abs(a.length - b.length);
  for (let i = 0; i < shorter.length; i++) {
    if (shorter[i] !== longer[i]) distance++;
  }
  return distance;
}

/**
 * Up to 3 close matches for a misspelt string, closest first.
 */
export function didYouMean(
  input: string,
  validOptions: readonly string[],
  maxDistance = 3
): string[] {
  return validOptions
    .map((option) => ({ option, distance: calculateDistance(input, option) }))
    .filter(({ distance }) => distance <= maxDistance)
    .sort((a, b) => a.distance - b.distance)
    .slice(0, 3)
    .map(({ option }) => option);
}

const HINTS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.DESCRIPTOR_TOO_DEEP]:
    'Flatten the type or split the value into several arguments',
  [ErrorCode.SHAPE_MISMATCH]:
    'The stored value was produced for a different type; drop the entry',
  [ErrorCode.CONFIGURATION_ERROR]:
    'Check that every [min, max] pair has min <= max and biases lie in [0, 1]',
  [ErrorCode.MALFORMED_HEX]:
    'Byte values are written as 0x followed by an even number of hex digits',
  [ErrorCode.INTEGER_OUT_OF_RANGE]:
    'Integers are base-10 strings within the range of their bit width',
  [ErrorCode.IR_TYPE_MISMATCH]:
    'Integers are strings, booleans are JSON booleans, containers are arrays',
};

/**
 * Hint for an error code. For an unknown descriptor kind, proposes the
 * closest known kinds instead.
 */
export function hintFor(code: ErrorCode, actual?: string): string | undefined {
  if (
    actual !== undefined &&
    (code === ErrorCode.INVALID_TYPE_DESCRIPTOR || code === ErrorCode.UNKNOWN_TYPE_KIND)
  ) {
    const matches = didYouMean(actual, TYPE_KINDS);
    if (matches.length > 0) {
      return `Did you mean ${matches.map((m) => `"${m}"`).join(' or ')}?`;
    }
  }
  return HINTS[code];
}
