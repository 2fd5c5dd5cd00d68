import type { AbiArgument } from '../types/descriptor.js';
import { DecodeError, ShapeMismatchError } from '../types/errors.js';
import { type Result, err, collectResults } from '../types/result.js';
import type { AbiValue } from '../types/value.js';
import { decodeAbiValue } from './decode.js';
import { encodeAbiValue } from './encode.js';
import { type AbiIr, isIrObject, irTypeName } from './ir.js';

/** Key of a parameter in the named-arguments form; unnamed ones are positional. */
export function argumentKey(arg: AbiArgument, index: number): string {
  return arg.name || `arg${index}`;
}

function checkCount(args: readonly AbiArgument[], values: readonly AbiValue[]): void {
  if (args.length !== values.length) {
    throw new ShapeMismatchError({
      message: `expected ${args.length} argument values, got ${values.length}`,
      context: { path: '$' },
    });
  }
}

/**
 * Encode a call's argument values keyed by parameter name.
 *
 * @throws ShapeMismatchError when the value count differs from the parameter count
 */
export function encodeArguments(
  args: readonly AbiArgument[],
  values: readonly AbiValue[]
): Record<string, AbiIr> {
  checkCount(args, values);
  const entries: Array<[string, AbiIr]> = [];
  args.forEach((arg, index) => {
    const value = values[index];
    if (value !== undefined) {
      entries.push([argumentKey(arg, index), encodeAbiValue(arg.type, value)]);
    }
  });
  return Object.fromEntries(entries);
}

/** Positional form of encodeArguments. */
export function encodeArgumentList(
  args: readonly AbiArgument[],
  values: readonly AbiValue[]
): AbiIr[] {
  checkCount(args, values);
  return args.map((arg, index) => {
    const value = values[index];
    if (value === undefined) {
      throw new ShapeMismatchError({
        message: `missing argument ${index}`,
        context: { path: '$', fieldIndex: index },
      });
    }
    return encodeAbiValue(arg.type, value);
  });
}

function arityError(message: string, fieldIndex?: number): DecodeError {
  return new DecodeError({
    reason: 'arity-mismatch',
    message: `Cannot decode arguments: ${message}`,
    context: { path: '$', fieldIndex },
  });
}

/**
 * Decode named or positional argument IR. Every parameter must be present
 * and no extra keys are accepted.
 */
export function decodeArguments(
  args: readonly AbiArgument[],
  ir: unknown
): Result<AbiValue[], DecodeError> {
  if (Array.isArray(ir)) {
    if (ir.length !== args.length) {
      return err(arityError(`expected ${args.length} values, got ${ir.length}`));
    }
    return collectResults<AbiArgument, AbiValue, DecodeError>(args, (arg, index) =>
      decodeAbiValue(arg.type, ir[index])
    );
  }
  if (!isIrObject(ir)) {
    return err(
      new DecodeError({
        reason: 'type-mismatch',
        message: `Cannot decode arguments: expected an object or array, got ${irTypeName(ir)}`,
        context: { path: '$' },
      })
    );
  }
  const keys = Object.keys(ir);
  if (keys.length !== args.length) {
    return err(arityError(`expected ${args.length} values, got ${keys.length}`));
  }
  return collectResults<AbiArgument, AbiValue, DecodeError>(args, (arg, index) => {
    const key = argumentKey(arg, index);
    if (!Object.prototype.hasOwnProperty.call(ir, key)) {
      return err(arityError(`missing argument "${key}"`, index));
    }
    return decodeAbiValue(arg.type, ir[key]);
  });
}
