/**
 * Runtime ABI values
 *
 * A closed tagged union mirroring the descriptor kinds. Integers are
 * bigints held in the signed (int) or unsigned (uint) range of their
 * width; byte-like values are Uint8Arrays.
 */

export interface BoolValue {
  readonly kind: 'bool';
  readonly value: boolean;
}

export interface AddressValue {
  readonly kind: 'address';
  readonly value: Uint8Array;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

export interface BytesValue {
  readonly kind: 'bytes';
  readonly value: Uint8Array;
}

export interface FixedBytesValue {
  readonly kind: 'fixedBytes';
  readonly value: Uint8Array;
}

export interface IntValue {
  readonly kind: 'int';
  readonly value: bigint;
}

export interface UintValue {
  readonly kind: 'uint';
  readonly value: bigint;
}

export interface ArrayValue {
  readonly kind: 'array';
  readonly elements: readonly AbiValue[];
}

export interface SliceValue {
  readonly kind: 'slice';
  readonly elements: readonly AbiValue[];
}

export interface TupleFieldValue {
  readonly name: string;
  readonly value: AbiValue;
}

export interface TupleValue {
  readonly kind: 'tuple';
  readonly fields: readonly TupleFieldValue[];
}

export type LeafValue =
  | BoolValue
  | AddressValue
  | StringValue
  | BytesValue
  | FixedBytesValue
  | IntValue
  | UintValue;

export type AbiValue = LeafValue | ArrayValue | SliceValue | TupleValue;

export const abiValues = {
  bool: (value: boolean): BoolValue => ({ kind: 'bool', value }),
  address: (value: Uint8Array): AddressValue => ({ kind: 'address', value }),
  string: (value: string): StringValue => ({ kind: 'string', value }),
  bytes: (value: Uint8Array): BytesValue => ({ kind: 'bytes', value }),
  fixedBytes: (value: Uint8Array): FixedBytesValue => ({
    kind: 'fixedBytes',
    value,
  }),
  int: (value: bigint): IntValue => ({ kind: 'int', value }),
  uint: (value: bigint): UintValue => ({ kind: 'uint', value }),
  array: (elements: readonly AbiValue[]): ArrayValue => ({
    kind: 'array',
    elements,
  }),
  slice: (elements: readonly AbiValue[]): SliceValue => ({
    kind: 'slice',
    elements,
  }),
  tuple: (fields: readonly TupleFieldValue[]): TupleValue => ({
    kind: 'tuple',
    fields,
  }),
};
