/**
 * Descriptor loading from untrusted JSON (CLI input, persisted corpora).
 * In-process callers build descriptors directly with `abiTypes`.
 */

import ajvModule, { type ErrorObject, type ValidateFunction } from 'ajv';

import {
  abiTypes,
  assertNever,
  type AbiArgument,
  type TypeDescriptor,
} from '../types/descriptor.js';
import { ErrorCode } from '../errors/codes.js';
import { DescriptorError } from '../types/errors.js';
import { collectResults, err, ok, type Result } from '../types/result.js';
import descriptorSchema from './type-descriptor.schema.json' with { type: 'json' };

// ajv ships CommonJS; its constructor is the `default` of module.exports
const Ajv = ajvModule.default;

export const MAX_DESCRIPTOR_DEPTH = 32;

/** Wire shape accepted by the schema */
export type DescriptorJson =
  | { kind: 'bool' | 'address' | 'string' | 'bytes' }
  | { kind: 'fixedBytes'; size: number }
  | { kind: 'int' | 'uint'; bits: number }
  | { kind: 'array'; elem: DescriptorJson; length: number }
  | { kind: 'slice'; elem: DescriptorJson }
  | { kind: 'tuple'; fields: Array<{ name?: string; type: DescriptorJson }> };

let validator: ValidateFunction<DescriptorJson> | undefined;

function getValidator(): ValidateFunction<DescriptorJson> {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true, discriminator: true });
    validator = ajv.compile<DescriptorJson>(descriptorSchema);
  }
  return validator;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Runs before schema validation so that a pathological nesting never
// reaches the recursive validator.
function exceedsDepth(json: unknown, depth: number): boolean {
  if (depth > MAX_DESCRIPTOR_DEPTH) return true;
  if (!isRecord(json)) return false;
  if (json.elem !== undefined && exceedsDepth(json.elem, depth + 1)) return true;
  if (Array.isArray(json.fields)) {
    for (const field of json.fields) {
      if (isRecord(field) && exceedsDepth(field.type, depth + 1)) return true;
    }
  }
  return false;
}

// Ajv's discriminator error names the offending `kind` value
function unknownKind(errors: readonly ErrorObject[]): string | undefined {
  for (const error of errors) {
    const tagValue: unknown = error.params.tagValue;
    if (error.keyword === 'discriminator' && typeof tagValue === 'string') {
      return tagValue;
    }
  }
  return undefined;
}

function formatIssue(error: ErrorObject): string {
  return `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`;
}

function toDescriptor(json: DescriptorJson): TypeDescriptor {
  switch (json.kind) {
    case 'bool':
      return abiTypes.bool();
    case 'address':
      return abiTypes.address();
    case 'string':
      return abiTypes.string();
    case 'bytes':
      return abiTypes.bytes();
    case 'fixedBytes':
      return abiTypes.fixedBytes(json.size);
    case 'int':
      return abiTypes.int(json.bits);
    case 'uint':
      return abiTypes.uint(json.bits);
    case 'array':
      return abiTypes.array(toDescriptor(json.elem), json.length);
    case 'slice':
      return abiTypes.slice(toDescriptor(json.elem));
    case 'tuple':
      return abiTypes.tuple(
        json.fields.map((field) =>
          abiTypes.field(field.name ?? '', toDescriptor(field.type))
        )
      );
    default:
      return assertNever(json, 'descriptor kind');
  }
}

/**
 * Validate and convert a JSON type descriptor.
 *
 * @example
 * parseTypeDescriptor({ kind: 'slice', elem: { kind: 'uint', bits: 256 } })
 */
export function parseTypeDescriptor(
  json: unknown,
  path = '$'
): Result<TypeDescriptor, DescriptorError> {
  if (exceedsDepth(json, 1)) {
    return err(
      new DescriptorError({
        message: `Type descriptor at ${path} nests deeper than ${MAX_DESCRIPTOR_DEPTH} levels`,
        errorCode: ErrorCode.DESCRIPTOR_TOO_DEEP,
        context: { path },
      })
    );
  }

  const validate = getValidator();
  if (!validate(json)) {
    const errors = validate.errors ?? [];
    const issues = errors.map(formatIssue);
    return err(
      new DescriptorError({
        message: `Invalid type descriptor at ${path}: ${issues[0] ?? 'rejected by schema'}`,
        context: { path, actual: unknownKind(errors) },
        issues,
      })
    );
  }
  return ok(toDescriptor(json));
}

/**
 * Parse a function parameter list: `[{ "name": "to", "type": {...} }, ...]`.
 */
export function parseAbiArguments(
  json: unknown
): Result<AbiArgument[], DescriptorError> {
  if (!Array.isArray(json)) {
    return err(
      new DescriptorError({
        message: 'Argument list must be a JSON array',
        context: { path: '$' },
      })
    );
  }
  const items: unknown[] = json;
  return collectResults<unknown, AbiArgument, DescriptorError>(items, (item, index) => {
    const path = `$[${index}]`;
    if (!isRecord(item) || (item.name !== undefined && typeof item.name !== 'string')) {
      return err(
        new DescriptorError({
          message: `Argument at ${path} must be an object with an optional string name`,
          context: { path, fieldIndex: index },
        })
      );
    }
    const name = typeof item.name === 'string' ? item.name : '';
    const type = parseTypeDescriptor(item.type, `${path}.type`);
    return type.isOk() ? ok({ name, type: type.value }) : type;
  });
}
