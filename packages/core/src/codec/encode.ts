import {
  assertNever,
  typeKey,
  type TupleType,
  type TypeDescriptor,
} from '../types/descriptor.js';
import { ShapeMismatchError } from '../types/errors.js';
import type { AbiValue, TupleFieldValue } from '../types/value.js';
import { bytesToHex } from '../util/hex.js';
import { childPath } from '../value/shape.js';
import type { AbiIr, AbiIrObject } from './ir.js';

/**
 * Map a value to its IR. Output is canonical: lowercase hex, base-10
 * integers without leading zeros, tuple keys in descriptor order. Equal
 * values always encode to identical IR.
 *
 * @throws ShapeMismatchError when `value` does not have the kind `type`
 *   describes; values from the generator, the mutator and the decoder
 *   always match.
 */
export function encodeAbiValue(type: TypeDescriptor, value: AbiValue): AbiIr {
  return encodeAt(type, value, '$');
}

function wrongKind(type: TypeDescriptor, value: AbiValue, path: string): never {
  throw new ShapeMismatchError({
    message: `Cannot encode ${value.kind} value as ${typeKey(type)} at ${path}`,
    context: { path, typeKey: typeKey(type), actual: value.kind },
  });
}

function encodeAt(type: TypeDescriptor, value: AbiValue, path: string): AbiIr {
  switch (type.kind) {
    case 'bool':
      return value.kind === 'bool' ? value.value : wrongKind(type, value, path);
    case 'string':
      return value.kind === 'string' ? value.value : wrongKind(type, value, path);
    case 'int':
      return value.kind === 'int' ? value.value.toString(10) : wrongKind(type, value, path);
    case 'uint':
      return value.kind === 'uint' ? value.value.toString(10) : wrongKind(type, value, path);
    case 'address':
      return value.kind === 'address' ? bytesToHex(value.value) : wrongKind(type, value, path);
    case 'bytes':
      return value.kind === 'bytes' ? bytesToHex(value.value) : wrongKind(type, value, path);
    case 'fixedBytes':
      return value.kind === 'fixedBytes'
        ? bytesToHex(value.value)
        : wrongKind(type, value, path);
    case 'array':
    case 'slice': {
      if (
        (value.kind !== 'array' && value.kind !== 'slice') ||
        value.kind !== type.kind
      ) {
        return wrongKind(type, value, path);
      }
      const { elem } = type;
      return value.elements.map((element, index) =>
        encodeAt(elem, element, childPath(path, index))
      );
    }
    case 'tuple':
      return value.kind === 'tuple'
        ? encodeTuple(type, value.fields, path)
        : wrongKind(type, value, path);
    default:
      return assertNever(type, 'type kind');
  }
}

/**
 * Field names used for a tuple's object form, or null when the tuple must
 * be encoded positionally (some name empty or repeated).
 */
export function tupleFieldNames(
  type: TupleType,
  fallback: readonly (string | undefined)[] = []
): string[] | null {
  const names = type.fields.map((field, index) => field.name || fallback[index] || '');
  if (names.some((name) => name === '')) return null;
  return new Set(names).size === names.length ? names : null;
}

function encodeTuple(
  type: TupleType,
  fields: readonly TupleFieldValue[],
  path: string
): AbiIr {
  const encoded = type.fields.map((field, index) => {
    const actual = fields[index];
    if (actual === undefined) {
      throw new ShapeMismatchError({
        message: `Cannot encode tuple at ${path}: missing field ${index}`,
        context: { path, typeKey: typeKey(type), fieldIndex: index },
      });
    }
    return encodeAt(field.type, actual.value, childPath(path, index, field.name));
  });

  const names = tupleFieldNames(
    type,
    fields.map((field) => field.name)
  );
  if (names === null) {
    return encoded;
  }
  const entries: Array<[string, AbiIr]> = [];
  names.forEach((name, index) => {
    const ir = encoded[index];
    if (ir !== undefined) entries.push([name, ir]);
  });
  // fromEntries defines own properties, so a field named `__proto__` survives
  const out: AbiIrObject = Object.fromEntries(entries);
  return out;
}
