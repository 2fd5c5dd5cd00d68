import { type Result, ok, err } from '../types/result.js';

const HEX_PREFIX = '0x';
const HEX_DIGITS = /^[0-9a-fA-F]*$/;

/** `0x`-prefixed lowercase hex, two digits per byte. */
export function bytesToHex(bytes: Uint8Array): string {
  let out = HEX_PREFIX;
  for (const byte of bytes) {
    out += byte.toString(16).padStart(2, '0');
  }
  return out;
}

/**
 * Strict inverse of bytesToHex. Digits of either case are accepted; the
 * prefix is mandatory and the digit count must be even.
 */
export function hexToBytes(text: string): Result<Uint8Array, string> {
  if (!text.startsWith(HEX_PREFIX) && !text.startsWith('0X')) {
    return err('missing 0x prefix');
  }
  const digits = text.slice(HEX_PREFIX.length);
  if (digits.length % 2 !== 0) {
    return err(`odd number of hex digits (${digits.length})`);
  }
  if (!HEX_DIGITS.test(digits)) {
    return err('non-hex character');
  }
  const out = new Uint8Array(digits.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(digits.slice(i * 2, i * 2 + 2), 16);
  }
  return ok(out);
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
