/**
 * Error Code Infrastructure
 * Stable error codes and exit codes for the value engine and its CLI.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Descriptor Errors (E001–E099)
  INVALID_TYPE_DESCRIPTOR = 'E010',
  DESCRIPTOR_TOO_DEEP = 'E011',

  // Shape Errors (E100–E199)
  SHAPE_MISMATCH = 'E100',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Decode Errors (E400–E499)
  MALFORMED_HEX = 'E400',
  LENGTH_MISMATCH = 'E401',
  INTEGER_OUT_OF_RANGE = 'E402',
  ARITY_MISMATCH = 'E403',
  IR_TYPE_MISMATCH = 'E404',
  UNKNOWN_TYPE_KIND = 'E405',
  MALFORMED_JSON = 'E406',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_TYPE_DESCRIPTOR]: 20,
  [ErrorCode.DESCRIPTOR_TOO_DEEP]: 21,
  [ErrorCode.SHAPE_MISMATCH]: 30,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.MALFORMED_HEX]: 60,
  [ErrorCode.LENGTH_MISMATCH]: 61,
  [ErrorCode.INTEGER_OUT_OF_RANGE]: 62,
  [ErrorCode.ARITY_MISMATCH]: 63,
  [ErrorCode.IR_TYPE_MISMATCH]: 64,
  [ErrorCode.UNKNOWN_TYPE_KIND]: 65,
  [ErrorCode.MALFORMED_JSON]: 66,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
