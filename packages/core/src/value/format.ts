import { assertNever } from '../types/descriptor.js';
import type { AbiValue } from '../types/value.js';
import { bytesToHex } from '../util/hex.js';

/**
 * Human-readable, Solidity-literal style rendering of a value for logs and
 * call-sequence listings. Not a serialization format; use the codec for
 * anything that is read back.
 */
export function formatAbiValue(value: AbiValue): string {
  switch (value.kind) {
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'int':
    case 'uint':
      return value.value.toString(10);
    case 'address':
    case 'bytes':
    case 'fixedBytes':
      return bytesToHex(value.value);
    case 'string':
      return JSON.stringify(value.value);
    case 'array':
    case 'slice':
      return `[${value.elements.map(formatAbiValue).join(', ')}]`;
    case 'tuple':
      return `(${value.fields
        .map((field) =>
          field.name
            ? `${field.name}: ${formatAbiValue(field.value)}`
            : formatAbiValue(field.value)
        )
        .join(', ')})`;
    default:
      return assertNever(value, 'value kind');
  }
}
