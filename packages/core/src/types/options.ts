/**
 * Configuration for value generation and mutation
 *
 * All options are optional; `resolve*` fills the gaps from the defaults
 * and rejects inconsistent settings with a ConfigError before any
 * generator is built.
 */

import { ConfigError } from './errors.js';

/** Inclusive `[min, max]` length bounds */
export type LengthBounds = readonly [min: number, max: number];

export interface GeneratorConfig {
  /** Element count of dynamic arrays (default: [0, 10]) */
  arrayLength?: LengthBounds;
  /** Length of dynamic `bytes` values (default: [0, 64]) */
  bytesLength?: LengthBounds;
  /** Length of strings, in code points (default: [0, 64]) */
  stringLength?: LengthBounds;
}

/**
 * Probability, per leaf kind, of reusing a corpus value instead of
 * drawing a fresh random one.
 */
export interface ReuseBias {
  address?: number;
  integer?: number;
  string?: number;
  bytes?: number;
}

/**
 * Relative weights of the per-node mutation choices. Choices that do not
 * apply to a node (resize on a fixed-size value) are dropped before the
 * draw.
 */
export interface MutationWeights {
  keep?: number;
  mutate?: number;
  regenerate?: number;
  resize?: number;
}

export interface MutationConfig extends GeneratorConfig {
  bias?: ReuseBias;
  /** Mutation rounds per call, inclusive (default: [1, 4]) */
  rounds?: LengthBounds;
  weights?: MutationWeights;
}

export interface ResolvedGeneratorConfig {
  arrayLength: LengthBounds;
  bytesLength: LengthBounds;
  stringLength: LengthBounds;
}

export interface MutationPolicy {
  rounds: LengthBounds;
  weights: Required<MutationWeights>;
}

export interface ResolvedMutationConfig
  extends ResolvedGeneratorConfig,
    MutationPolicy {
  bias: Required<ReuseBias>;
}

export const DEFAULT_GENERATOR_CONFIG: ResolvedGeneratorConfig = {
  arrayLength: [0, 10],
  bytesLength: [0, 64],
  stringLength: [0, 64],
};

export const DEFAULT_MUTATION_POLICY: MutationPolicy = {
  rounds: [1, 1],
  weights: {
    keep: 4,
    mutate: 4,
    regenerate: 1,
    resize: 2,
  },
};

export const DEFAULT_MUTATION_CONFIG: ResolvedMutationConfig = {
  ...DEFAULT_GENERATOR_CONFIG,
  bias: {
    address: 0.5,
    integer: 0.5,
    string: 0.5,
    bytes: 0.5,
  },
  rounds: [1, 4],
  weights: DEFAULT_MUTATION_POLICY.weights,
};

/**
 * Resolves partial generator options into complete configuration
 *
 * @throws ConfigError when a bound is not a non-negative integer range
 */
export function resolveGeneratorConfig(
  config: GeneratorConfig = {}
): ResolvedGeneratorConfig {
  const resolved: ResolvedGeneratorConfig = {
    arrayLength: config.arrayLength ?? DEFAULT_GENERATOR_CONFIG.arrayLength,
    bytesLength: config.bytesLength ?? DEFAULT_GENERATOR_CONFIG.bytesLength,
    stringLength: config.stringLength ?? DEFAULT_GENERATOR_CONFIG.stringLength,
  };

  validateBounds('arrayLength', resolved.arrayLength);
  validateBounds('bytesLength', resolved.bytesLength);
  validateBounds('stringLength', resolved.stringLength);
  return resolved;
}

/**
 * Resolves partial mutation options into complete configuration
 *
 * @throws ConfigError on invalid bounds, biases, rounds or weights
 */
export function resolveMutationConfig(
  config: MutationConfig = {}
): ResolvedMutationConfig {
  const base = resolveGeneratorConfig(config);
  const resolved: ResolvedMutationConfig = {
    ...base,
    bias: { ...DEFAULT_MUTATION_CONFIG.bias, ...config.bias },
    rounds: config.rounds ?? DEFAULT_MUTATION_CONFIG.rounds,
    weights: { ...DEFAULT_MUTATION_CONFIG.weights, ...config.weights },
  };

  for (const [kind, bias] of Object.entries(resolved.bias)) {
    if (!Number.isFinite(bias) || bias < 0 || bias > 1) {
      throw new ConfigError({
        message: `bias.${kind} must be within [0, 1], got ${bias}`,
        context: { setting: `bias.${kind}`, actual: String(bias) },
      });
    }
  }

  validateBounds('rounds', resolved.rounds);
  validateWeights(resolved.weights);
  return resolved;
}

function validateBounds(setting: string, bounds: LengthBounds): void {
  const [min, max] = bounds;
  if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
    throw new ConfigError({
      message: `${setting} bounds must be integers, got [${min}, ${max}]`,
      context: { setting, actual: `[${min}, ${max}]` },
    });
  }
  if (min < 0) {
    throw new ConfigError({
      message: `${setting} minimum must be non-negative, got ${min}`,
      context: { setting, actual: String(min) },
    });
  }
  if (min > max) {
    throw new ConfigError({
      message: `${setting} minimum (${min}) exceeds maximum (${max})`,
      context: { setting, expected: 'min <= max', actual: `[${min}, ${max}]` },
    });
  }
}

function validateWeights(weights: Required<MutationWeights>): void {
  let total = 0;
  for (const [choice, weight] of Object.entries(weights)) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ConfigError({
        message: `weights.${choice} must be a non-negative number, got ${weight}`,
        context: { setting: `weights.${choice}`, actual: String(weight) },
      });
    }
    total += weight;
  }
  if (total <= 0) {
    throw new ConfigError({
      message: 'at least one mutation weight must be positive',
      context: { setting: 'weights' },
    });
  }
}
