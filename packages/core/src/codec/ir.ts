/**
 * Serialization-safe intermediate representation of an ABI value.
 *
 * Integers travel as base-10 strings, byte-like values as `0x`-prefixed
 * lowercase hex, booleans and strings natively, containers as arrays and
 * named tuples as objects.
 */
export type AbiIr = string | boolean | AbiIr[] | { [name: string]: AbiIr };

export type AbiIrObject = { [name: string]: AbiIr };

export function isIrObject(ir: unknown): ir is AbiIrObject {
  return typeof ir === 'object' && ir !== null && !Array.isArray(ir);
}

/** Name of an IR node's JSON type, for error messages */
export function irTypeName(ir: unknown): string {
  if (ir === null) return 'null';
  if (Array.isArray(ir)) return 'array';
  return typeof ir;
}
