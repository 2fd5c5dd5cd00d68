import { bytesEqual } from '../util/hex.js';
import { assertNever } from '../types/descriptor.js';
import type { AbiValue } from '../types/value.js';

/** Structural equality; tuple field names take part in the comparison. */
export function valuesEqual(a: AbiValue, b: AbiValue): boolean {
  switch (a.kind) {
    case 'bool':
      return b.kind === 'bool' && b.value === a.value;
    case 'string':
      return b.kind === 'string' && b.value === a.value;
    case 'int':
      return b.kind === 'int' && b.value === a.value;
    case 'uint':
      return b.kind === 'uint' && b.value === a.value;
    case 'address':
      return b.kind === 'address' && bytesEqual(a.value, b.value);
    case 'bytes':
      return b.kind === 'bytes' && bytesEqual(a.value, b.value);
    case 'fixedBytes':
      return b.kind === 'fixedBytes' && bytesEqual(a.value, b.value);
    case 'array':
      return b.kind === 'array' && elementsEqual(a.elements, b.elements);
    case 'slice':
      return b.kind === 'slice' && elementsEqual(a.elements, b.elements);
    case 'tuple':
      return (
        b.kind === 'tuple' &&
        a.fields.length === b.fields.length &&
        a.fields.every((field, i) => {
          const other = b.fields[i];
          return (
            other !== undefined &&
            other.name === field.name &&
            valuesEqual(field.value, other.value)
          );
        })
      );
    default:
      return assertNever(a, 'value kind');
  }
}

function elementsEqual(
  a: readonly AbiValue[],
  b: readonly AbiValue[]
): boolean {
  return (
    a.length === b.length &&
    a.every((element, i) => {
      const other = b[i];
      return other !== undefined && valuesEqual(element, other);
    })
  );
}

/** Deep copy; byte buffers are duplicated so callers may write to them. */
export function cloneValue(value: AbiValue): AbiValue {
  switch (value.kind) {
    case 'bool':
    case 'string':
    case 'int':
    case 'uint':
      return { ...value };
    case 'address':
    case 'bytes':
    case 'fixedBytes':
      return { kind: value.kind, value: value.value.slice() };
    case 'array':
    case 'slice':
      return { kind: value.kind, elements: value.elements.map(cloneValue) };
    case 'tuple':
      return {
        kind: 'tuple',
        fields: value.fields.map((field) => ({
          name: field.name,
          value: cloneValue(field.value),
        })),
      };
    default:
      return assertNever(value, 'value kind');
  }
}
