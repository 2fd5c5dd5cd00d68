// @abiseed/core entry point
//
// Public API:
// - Type descriptors and values (closed tagged unions) with shape checks.
// - Value generators (random, corpus-seeded) and generateAbiValue().
// - mutateAbiValue() and its stats collector.
// - ValueSet corpus.
// - Lossless codec between values and a JSON-safe IR.
//
// Everything here is synchronous and in-memory. File handling lives in
// @abiseed/cli.

// Descriptors
export {
  abiTypes,
  assertNever,
  isLeafType,
  typeKey,
  ADDRESS_LENGTH,
  MAX_FIXED_BYTES,
  MAX_INTEGER_BITS,
  type AbiArgument,
  type AddressType,
  type ArrayType,
  type BoolType,
  type BytesType,
  type ContainerTypeDescriptor,
  type FixedBytesType,
  type IntType,
  type LeafTypeDescriptor,
  type SliceType,
  type StringType,
  type TupleField,
  type TupleType,
  type TypeDescriptor,
  type TypeKind,
  type UintType,
} from './types/descriptor.js';
export {
  parseTypeDescriptor,
  parseAbiArguments,
  MAX_DESCRIPTOR_DEPTH,
  type DescriptorJson,
} from './descriptor/parse.js';

// Values
export {
  abiValues,
  type AbiValue,
  type AddressValue,
  type ArrayValue,
  type BoolValue,
  type BytesValue,
  type FixedBytesValue,
  type IntValue,
  type LeafValue,
  type SliceValue,
  type StringValue,
  type TupleFieldValue,
  type TupleValue,
  type UintValue,
} from './types/value.js';
export {
  checkShape,
  matchesShape,
  integerRange,
  inIntegerRange,
  type IntegerRange,
} from './value/shape.js';
export { valuesEqual, cloneValue } from './value/equal.js';
export { formatAbiValue } from './value/format.js';

// Configuration
export {
  DEFAULT_GENERATOR_CONFIG,
  DEFAULT_MUTATION_CONFIG,
  DEFAULT_MUTATION_POLICY,
  resolveGeneratorConfig,
  resolveMutationConfig,
  type GeneratorConfig,
  type LengthBounds,
  type MutationConfig,
  type MutationPolicy,
  type MutationWeights,
  type ResolvedGeneratorConfig,
  type ResolvedMutationConfig,
  type ReuseBias,
} from './types/options.js';

// Generation
export type { ValueGenerator } from './generator/value-generator.js';
export { RandomValueGenerator } from './generator/random-generator.js';
export { MutatingValueGenerator } from './generator/mutating-generator.js';
export { generateAbiValue } from './generator/generate.js';

// Corpus
export { ValueSet, forEachLeaf } from './corpus/value-set.js';

// Mutation
export { mutateAbiValue, type MutateOptions } from './mutation/mutate.js';
export {
  MutationStats,
  type MutationChoice,
  type MutationStatsSnapshot,
} from './mutation/stats.js';

// Codec
export type { AbiIr, AbiIrObject } from './codec/ir.js';
export { encodeAbiValue } from './codec/encode.js';
export {
  decodeAbiValue,
  decodeAbiValueOrThrow,
  type DecodeOptions,
} from './codec/decode.js';
export {
  argumentKey,
  encodeArguments,
  encodeArgumentList,
  decodeArguments,
} from './codec/arguments.js';

// Randomness & hashing
export { createRng, fnv1a32, XorShift32, type Rng } from './util/rng.js';
export { bytesToHex, hexToBytes, bytesEqual } from './util/hex.js';
export { structuralHash } from './util/struct-hash.js';

// Results
export {
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
  collectResults,
  mapResult,
  type Result,
} from './types/result.js';

// Errors
export { ErrorCode, EXIT_CODES, getExitCode, type Severity } from './errors/codes.js';
export {
  AbiSeedError,
  ConfigError,
  DecodeError,
  DescriptorError,
  ShapeMismatchError,
  isAbiSeedError,
  type DecodeErrorReason,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export { didYouMean, hintFor } from './errors/suggestions.js';
