/**
 * Shape checks: does a runtime value fit its type descriptor?
 *
 * Values handed to the mutator may come from a persisted corpus, so the
 * check also guards the JavaScript types inside each leaf.
 */

import {
  ADDRESS_LENGTH,
  assertNever,
  typeKey,
  type TypeDescriptor,
} from '../types/descriptor.js';
import { ShapeMismatchError, excerpt } from '../types/errors.js';
import { type Result, ok, err, isErr } from '../types/result.js';
import type { AbiValue } from '../types/value.js';

export interface IntegerRange {
  min: bigint;
  max: bigint;
}

/** Representable range of an integer of the given width. */
export function integerRange(signed: boolean, bits: number): IntegerRange {
  const width = BigInt(bits);
  if (signed) {
    return {
      min: -(1n << (width - 1n)),
      max: (1n << (width - 1n)) - 1n,
    };
  }
  return { min: 0n, max: (1n << width) - 1n };
}

export function inIntegerRange(
  value: bigint,
  signed: boolean,
  bits: number
): boolean {
  const { min, max } = integerRange(signed, bits);
  return value >= min && value <= max;
}

/** Path of an array element or tuple field below `parent`. */
export function childPath(parent: string, index: number, name = ''): string {
  return name ? `${parent}.${name}` : `${parent}[${index}]`;
}

function mismatch(
  path: string,
  type: TypeDescriptor,
  message: string,
  actual?: unknown,
  fieldIndex?: number
): Result<void, ShapeMismatchError> {
  return err(
    new ShapeMismatchError({
      message: `Shape mismatch at ${path}: ${message}`,
      context: {
        path,
        typeKey: typeKey(type),
        fieldIndex,
        valueExcerpt: actual === undefined ? undefined : excerpt(actual),
      },
    })
  );
}

const OK: Result<void, ShapeMismatchError> = ok(undefined);

/**
 * Verify `value` against `type` at every level of nesting. Reports the
 * first offending node.
 */
export function checkShape(
  type: TypeDescriptor,
  value: AbiValue,
  path = '$'
): Result<void, ShapeMismatchError> {
  if (value.kind !== type.kind) {
    return mismatch(path, type, `expected ${type.kind}, got ${value.kind}`);
  }

  switch (type.kind) {
    case 'bool':
      return value.kind === 'bool' && typeof value.value === 'boolean'
        ? OK
        : mismatch(path, type, 'expected a boolean');
    case 'string':
      return value.kind === 'string' && typeof value.value === 'string'
        ? OK
        : mismatch(path, type, 'expected a string');
    case 'bytes':
      return value.kind === 'bytes' && value.value instanceof Uint8Array
        ? OK
        : mismatch(path, type, 'expected a byte sequence');
    case 'address':
      if (value.kind !== 'address' || !(value.value instanceof Uint8Array)) {
        return mismatch(path, type, 'expected a byte sequence');
      }
      return value.value.length === ADDRESS_LENGTH
        ? OK
        : mismatch(
            path,
            type,
            `address must be ${ADDRESS_LENGTH} bytes, got ${value.value.length}`
          );
    case 'fixedBytes':
      if (value.kind !== 'fixedBytes' || !(value.value instanceof Uint8Array)) {
        return mismatch(path, type, 'expected a byte sequence');
      }
      return value.value.length === type.size
        ? OK
        : mismatch(
            path,
            type,
            `expected ${type.size} bytes, got ${value.value.length}`
          );
    case 'int':
    case 'uint': {
      if (
        (value.kind !== 'int' && value.kind !== 'uint') ||
        typeof value.value !== 'bigint'
      ) {
        return mismatch(path, type, 'expected a bigint');
      }
      return inIntegerRange(value.value, type.kind === 'int', type.bits)
        ? OK
        : mismatch(
            path,
            type,
            `${value.value} is out of range for ${typeKey(type)}`,
            value.value
          );
    }
    case 'array': {
      if (value.kind !== 'array') return mismatch(path, type, 'expected an array');
      if (value.elements.length !== type.length) {
        return mismatch(
          path,
          type,
          `expected ${type.length} elements, got ${value.elements.length}`
        );
      }
      return checkElements(type.elem, value.elements, path);
    }
    case 'slice':
      if (value.kind !== 'slice') return mismatch(path, type, 'expected a slice');
      return checkElements(type.elem, value.elements, path);
    case 'tuple': {
      if (value.kind !== 'tuple') return mismatch(path, type, 'expected a tuple');
      if (value.fields.length !== type.fields.length) {
        return mismatch(
          path,
          type,
          `expected ${type.fields.length} fields, got ${value.fields.length}`
        );
      }
      for (const [index, field] of type.fields.entries()) {
        const actual = value.fields[index];
        if (actual === undefined) {
          return mismatch(path, type, `missing field ${index}`, undefined, index);
        }
        const result = checkShape(
          field.type,
          actual.value,
          childPath(path, index, field.name)
        );
        if (isErr(result)) return result;
      }
      return OK;
    }
    default:
      return assertNever(type, 'type kind');
  }
}

function checkElements(
  elem: TypeDescriptor,
  elements: readonly AbiValue[],
  path: string
): Result<void, ShapeMismatchError> {
  for (const [index, element] of elements.entries()) {
    const result = checkShape(elem, element, childPath(path, index));
    if (isErr(result)) return result;
  }
  return OK;
}

export function matchesShape(type: TypeDescriptor, value: AbiValue): boolean {
  return checkShape(type, value).isOk();
}
