import { assertNever, type TypeDescriptor } from '../types/descriptor.js';
import type { AbiValue } from '../types/value.js';
import type { ValueGenerator } from './value-generator.js';

/**
 * Build a value of `type` from the generator's leaf operations.
 *
 * Reproducible for a fixed PRNG stream and corpus state; consults nothing
 * beyond the generator passed in. Cannot fail for a valid descriptor.
 */
export function generateAbiValue(
  generator: ValueGenerator,
  type: TypeDescriptor
): AbiValue {
  switch (type.kind) {
    case 'bool':
      return { kind: 'bool', value: generator.bool() };
    case 'address':
      return { kind: 'address', value: generator.address() };
    case 'string':
      return { kind: 'string', value: generator.string() };
    case 'bytes':
      return { kind: 'bytes', value: generator.bytes() };
    case 'fixedBytes':
      return { kind: 'fixedBytes', value: generator.fixedBytes(type.size) };
    case 'int':
      return { kind: 'int', value: generator.integer(true, type.bits) };
    case 'uint':
      return { kind: 'uint', value: generator.integer(false, type.bits) };
    case 'array':
      return {
        kind: 'array',
        elements: generateElements(generator, type.elem, type.length),
      };
    case 'slice':
      return {
        kind: 'slice',
        elements: generateElements(generator, type.elem, generator.arrayLength()),
      };
    case 'tuple':
      return {
        kind: 'tuple',
        fields: type.fields.map((field) => ({
          name: field.name,
          value: generateAbiValue(generator, field.type),
        })),
      };
    default:
      return assertNever(type, 'type kind');
  }
}

function generateElements(
  generator: ValueGenerator,
  elem: TypeDescriptor,
  count: number
): AbiValue[] {
  const out: AbiValue[] = [];
  for (let i = 0; i < count; i++) {
    out.push(generateAbiValue(generator, elem));
  }
  return out;
}
