/**
 * ABI type descriptors
 *
 * Descriptors are produced by an external ABI metadata component and are
 * treated as immutable, acyclic trees. Element descriptors may be shared
 * between siblings; nothing in this package mutates them.
 */

export type TypeKind = TypeDescriptor['kind'];

export interface BoolType {
  readonly kind: 'bool';
}

export interface AddressType {
  readonly kind: 'address';
}

export interface StringType {
  readonly kind: 'string';
}

/** Dynamic-length byte sequence (`bytes`) */
export interface BytesType {
  readonly kind: 'bytes';
}

/** `bytes1` … `bytes32` */
export interface FixedBytesType {
  readonly kind: 'fixedBytes';
  readonly size: number;
}

export interface IntType {
  readonly kind: 'int';
  readonly bits: number;
}

export interface UintType {
  readonly kind: 'uint';
  readonly bits: number;
}

/** `T[N]` */
export interface ArrayType {
  readonly kind: 'array';
  readonly elem: TypeDescriptor;
  readonly length: number;
}

/** `T[]` */
export interface SliceType {
  readonly kind: 'slice';
  readonly elem: TypeDescriptor;
}

export interface TupleField {
  /** May be empty for unnamed components */
  readonly name: string;
  readonly type: TypeDescriptor;
}

export interface TupleType {
  readonly kind: 'tuple';
  readonly fields: readonly TupleField[];
}

export type LeafTypeDescriptor =
  | BoolType
  | AddressType
  | StringType
  | BytesType
  | FixedBytesType
  | IntType
  | UintType;

export type ContainerTypeDescriptor = ArrayType | SliceType | TupleType;

export type TypeDescriptor = LeafTypeDescriptor | ContainerTypeDescriptor;

/** A named function parameter */
export interface AbiArgument {
  readonly name: string;
  readonly type: TypeDescriptor;
}

export const ADDRESS_LENGTH = 20;
export const MAX_FIXED_BYTES = 32;
export const MAX_INTEGER_BITS = 256;

/**
 * Exhaustiveness guard for switches over closed unions
 */
export function assertNever(value: never, what = 'value'): never {
  throw new Error(`Unhandled ${what}: ${JSON.stringify(value)}`);
}

export function isLeafType(type: TypeDescriptor): type is LeafTypeDescriptor {
  switch (type.kind) {
    case 'bool':
    case 'address':
    case 'string':
    case 'bytes':
    case 'fixedBytes':
    case 'int':
    case 'uint':
      return true;
    case 'array':
    case 'slice':
    case 'tuple':
      return false;
    default:
      return assertNever(type, 'type kind');
  }
}

/**
 * Canonical ABI type string. Structurally distinct descriptors never share
 * a key; field names are not part of the type identity.
 */
export function typeKey(type: TypeDescriptor): string {
  switch (type.kind) {
    case 'bool':
    case 'address':
    case 'string':
    case 'bytes':
      return type.kind;
    case 'fixedBytes':
      return `bytes${type.size}`;
    case 'int':
      return `int${type.bits}`;
    case 'uint':
      return `uint${type.bits}`;
    case 'array':
      return `${typeKey(type.elem)}[${type.length}]`;
    case 'slice':
      return `${typeKey(type.elem)}[]`;
    case 'tuple':
      return `(${type.fields.map((field) => typeKey(field.type)).join(',')})`;
    default:
      return assertNever(type, 'type kind');
  }
}

function freeze<T extends object>(value: T): Readonly<T> {
  return Object.freeze(value);
}

/**
 * Frozen descriptor constructors, mostly for tests and embedding callers.
 */
export const abiTypes = {
  bool: (): BoolType => freeze({ kind: 'bool' as const }),
  address: (): AddressType => freeze({ kind: 'address' as const }),
  string: (): StringType => freeze({ kind: 'string' as const }),
  bytes: (): BytesType => freeze({ kind: 'bytes' as const }),
  fixedBytes: (size: number): FixedBytesType =>
    freeze({ kind: 'fixedBytes' as const, size }),
  int: (bits: number): IntType => freeze({ kind: 'int' as const, bits }),
  uint: (bits: number): UintType => freeze({ kind: 'uint' as const, bits }),
  array: (elem: TypeDescriptor, length: number): ArrayType =>
    freeze({ kind: 'array' as const, elem, length }),
  slice: (elem: TypeDescriptor): SliceType =>
    freeze({ kind: 'slice' as const, elem }),
  tuple: (fields: readonly TupleField[]): TupleType =>
    freeze({ kind: 'tuple' as const, fields: Object.freeze([...fields]) }),
  field: (name: string, type: TypeDescriptor): TupleField =>
    freeze({ name, type }),
};
