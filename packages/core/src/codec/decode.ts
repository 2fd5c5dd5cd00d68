import {
  ADDRESS_LENGTH,
  typeKey,
  type IntType,
  type UintType,
  type TupleType,
  type TypeDescriptor,
} from '../types/descriptor.js';
import {
  DecodeError,
  excerpt,
  type DecodeErrorReason,
} from '../types/errors.js';
import {
  type Err,
  type Result,
  ok,
  err,
  isErr,
  collectResults,
  mapResult,
} from '../types/result.js';
import type { AbiValue, TupleFieldValue } from '../types/value.js';
import { hexToBytes } from '../util/hex.js';
import { childPath, inIntegerRange } from '../value/shape.js';
import { tupleFieldNames } from './encode.js';
import { type AbiIr, isIrObject, irTypeName } from './ir.js';

export interface DecodeOptions {
  /**
   * A prior value of the same type. Where a tuple field is unnamed in the
   * descriptor, the field name at the same position in the context names
   * it, both for reading object-shaped IR and on the decoded value.
   */
  context?: AbiValue;
}

const CANONICAL_INTEGER = /^-?(0|[1-9][0-9]*)$/;

/**
 * Strict inverse of encodeAbiValue. Never truncates, pads or coerces: any
 * IR that encodeAbiValue could not have produced for `type` is rejected.
 */
export function decodeAbiValue(
  type: TypeDescriptor,
  ir: unknown,
  options: DecodeOptions = {}
): Result<AbiValue, DecodeError> {
  return decodeAt(type, ir, '$', options.context);
}

function fail(
  reason: DecodeErrorReason,
  path: string,
  type: TypeDescriptor | undefined,
  message: string,
  ir?: unknown,
  fieldIndex?: number
): Err<DecodeError> {
  return err(
    new DecodeError({
      reason,
      message: `Cannot decode ${path}: ${message}`,
      context: {
        path,
        typeKey: type === undefined ? undefined : typeKey(type),
        fieldIndex,
        valueExcerpt: ir === undefined ? undefined : excerpt(ir),
      },
    })
  );
}

function expectString(
  type: TypeDescriptor,
  ir: unknown,
  path: string
): Result<string, DecodeError> {
  return typeof ir === 'string'
    ? ok(ir)
    : fail('type-mismatch', path, type, `expected a string, got ${irTypeName(ir)}`, ir);
}

function decodeHex(
  type: TypeDescriptor,
  ir: unknown,
  path: string,
  expectedLength?: number
): Result<Uint8Array, DecodeError> {
  const text = expectString(type, ir, path);
  if (isErr(text)) return text;
  const bytes = hexToBytes(text.value);
  if (isErr(bytes)) {
    return fail('malformed-hex', path, type, bytes.error, ir);
  }
  if (expectedLength !== undefined && bytes.value.length !== expectedLength) {
    return fail(
      'length-mismatch',
      path,
      type,
      `expected ${expectedLength} bytes, got ${bytes.value.length}`,
      ir
    );
  }
  return bytes;
}

function decodeInteger(
  type: IntType | UintType,
  ir: unknown,
  path: string
): Result<bigint, DecodeError> {
  const text = expectString(type, ir, path);
  if (isErr(text)) return text;
  if (!CANONICAL_INTEGER.test(text.value) || text.value === '-0') {
    return fail('type-mismatch', path, type, 'not a canonical base-10 integer', ir);
  }
  const parsed = BigInt(text.value);
  if (!inIntegerRange(parsed, type.kind === 'int', type.bits)) {
    return fail(
      'integer-out-of-range',
      path,
      type,
      `${text.value} does not fit ${typeKey(type)}`,
      ir
    );
  }
  return ok(parsed);
}

function kindOf(type: unknown): string {
  if (typeof type === 'object' && type !== null && 'kind' in type) {
    return String(type.kind);
  }
  return irTypeName(type);
}

function decodeAt(
  type: TypeDescriptor,
  ir: unknown,
  path: string,
  context: AbiValue | undefined
): Result<AbiValue, DecodeError> {
  switch (type.kind) {
    case 'bool':
      return typeof ir === 'boolean'
        ? ok<AbiValue>({ kind: 'bool', value: ir })
        : fail('type-mismatch', path, type, `expected a boolean, got ${irTypeName(ir)}`, ir);
    case 'string':
      return mapResult(expectString(type, ir, path), (value) => ({
        kind: 'string' as const,
        value,
      }));
    case 'int':
      return mapResult(decodeInteger(type, ir, path), (value) => ({
        kind: 'int' as const,
        value,
      }));
    case 'uint':
      return mapResult(decodeInteger(type, ir, path), (value) => ({
        kind: 'uint' as const,
        value,
      }));
    case 'address':
      return mapResult(decodeHex(type, ir, path, ADDRESS_LENGTH), (value) => ({
        kind: 'address' as const,
        value,
      }));
    case 'bytes':
      return mapResult(decodeHex(type, ir, path), (value) => ({
        kind: 'bytes' as const,
        value,
      }));
    case 'fixedBytes':
      return mapResult(decodeHex(type, ir, path, type.size), (value) => ({
        kind: 'fixedBytes' as const,
        value,
      }));
    case 'array':
    case 'slice': {
      if (!Array.isArray(ir)) {
        return fail('type-mismatch', path, type, `expected an array, got ${irTypeName(ir)}`, ir);
      }
      if (type.kind === 'array' && ir.length !== type.length) {
        return fail(
          'length-mismatch',
          path,
          type,
          `expected ${type.length} elements, got ${ir.length}`
        );
      }
      const priorElements =
        context?.kind === 'array' || context?.kind === 'slice'
          ? context.elements
          : [];
      const { elem } = type;
      const elements = collectResults<unknown, AbiValue, DecodeError>(
        ir,
        (item, index) =>
          decodeAt(elem, item, childPath(path, index), priorElements[index])
      );
      if (isErr(elements)) return elements;
      return ok(
        type.kind === 'array'
          ? { kind: 'array', elements: elements.value }
          : { kind: 'slice', elements: elements.value }
      );
    }
    case 'tuple':
      return decodeTuple(type, ir, path, context);
    default:
      return fail('unknown-kind', path, undefined, `unknown type kind ${kindOf(type)}`);
  }
}

function decodeTuple(
  type: TupleType,
  ir: unknown,
  path: string,
  context: AbiValue | undefined
): Result<AbiValue, DecodeError> {
  const prior = context?.kind === 'tuple' ? context.fields : [];
  const fallbackNames = prior.map((field) => field.name);
  const labels = type.fields.map(
    (field, index) => field.name || fallbackNames[index] || ''
  );

  let members: unknown[];
  if (Array.isArray(ir)) {
    if (ir.length !== type.fields.length) {
      return fail(
        'arity-mismatch',
        path,
        type,
        `expected ${type.fields.length} fields, got ${ir.length}`
      );
    }
    members = ir;
  } else if (isIrObject(ir)) {
    const names = tupleFieldNames(type, fallbackNames);
    if (names === null) {
      return fail(
        'type-mismatch',
        path,
        type,
        'tuple has unnamed or repeated fields and must be encoded as an array',
        ir
      );
    }
    const keys = Object.keys(ir);
    if (keys.length !== names.length) {
      return fail(
        'arity-mismatch',
        path,
        type,
        `expected ${names.length} fields, got ${keys.length}`
      );
    }
    members = [];
    for (const [index, name] of names.entries()) {
      if (!Object.prototype.hasOwnProperty.call(ir, name)) {
        return fail('arity-mismatch', path, type, `missing field "${name}"`, undefined, index);
      }
      members.push(ir[name]);
    }
  } else {
    return fail('type-mismatch', path, type, `expected a tuple, got ${irTypeName(ir)}`, ir);
  }

  const fields = collectResults<unknown, TupleFieldValue, DecodeError>(
    members,
    (member, index) => {
      const field = type.fields[index];
      if (field === undefined) {
        return fail('arity-mismatch', path, type, `unexpected field ${index}`);
      }
      const name = labels[index] ?? '';
      return mapResult(
        decodeAt(field.type, member, childPath(path, index, name), prior[index]?.value),
        (value) => ({ name, value })
      );
    }
  );
  return mapResult(fields, (decoded) => ({
    kind: 'tuple' as const,
    fields: decoded,
  }));
}

/** Decode, throwing the DecodeError on failure. */
export function decodeAbiValueOrThrow(
  type: TypeDescriptor,
  ir: AbiIr,
  options?: DecodeOptions
): AbiValue {
  return decodeAbiValue(type, ir, options).unwrap();
}
