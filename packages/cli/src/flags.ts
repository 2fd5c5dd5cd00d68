import {
  ConfigError,
  DEFAULT_MUTATION_CONFIG,
  type LengthBounds,
  type MutationConfig,
  type ReuseBias,
} from '@abiseed/core';

export type OutputFormat = 'json' | 'ndjson';

export const DEFAULT_SEED = 424242;

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  type?: string;
  input?: string;
  corpus?: string;
  updateCorpus?: boolean;
  count?: string;
  seed?: string;
  out?: string;
  arrayMin?: string;
  arrayMax?: string;
  bytesMin?: string;
  bytesMax?: string;
  stringMin?: string;
  stringMax?: string;
  bias?: string;
  roundsMin?: string;
  roundsMax?: string;
  check?: boolean;
  debug?: boolean;
  printStats?: boolean;
}

const BIAS_KINDS = ['address', 'integer', 'string', 'bytes'] as const;
type BiasKind = (typeof BIAS_KINDS)[number];

function isBiasKind(value: string): value is BiasKind {
  return BIAS_KINDS.some((kind) => kind === value);
}

/**
 * Parse a non-negative integer flag; undefined when the flag is absent.
 */
export function parseCountFlag(
  value: string | undefined,
  setting: string
): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new ConfigError({
      message: `--${setting} expects a non-negative integer, got "${value}"`,
      context: { setting },
    });
  }
  return Number.parseInt(value, 10);
}

function parseBounds(
  min: string | undefined,
  max: string | undefined,
  flag: string,
  fallback: LengthBounds
): LengthBounds | undefined {
  const lo = parseCountFlag(min, `${flag}-min`);
  const hi = parseCountFlag(max, `${flag}-max`);
  if (lo === undefined && hi === undefined) return undefined;
  return [lo ?? fallback[0], hi ?? fallback[1]];
}

function parseProbability(text: string, setting: string): number {
  const value = Number(text);
  if (text.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigError({
      message: `${setting} expects a number in [0, 1], got "${text}"`,
      context: { setting },
    });
  }
  return value;
}

/**
 * `--bias 0.3` sets every kind; `--bias address=0.9,integer=0.1` sets the
 * named kinds and leaves the rest at their defaults.
 */
export function parseBias(text: string): ReuseBias {
  if (!text.includes('=')) {
    const value = parseProbability(text, 'bias');
    return { address: value, integer: value, string: value, bytes: value };
  }
  const bias: ReuseBias = {};
  for (const part of text.split(',')) {
    const [kind = '', raw = ''] = part.split('=').map((s) => s.trim());
    if (!isBiasKind(kind)) {
      throw new ConfigError({
        message: `Unknown bias kind "${kind}" (expected ${BIAS_KINDS.join(', ')})`,
        context: { setting: 'bias', actual: kind },
      });
    }
    bias[kind] = parseProbability(raw, `bias.${kind}`);
  }
  return bias;
}

/**
 * Map CLI flags onto a partial mutation config. Validation of the merged
 * result happens when a generator is constructed.
 */
export function parseMutationConfig(options: CliOptions): MutationConfig {
  const config: MutationConfig = {};
  const defaults = DEFAULT_MUTATION_CONFIG;

  const arrayLength = parseBounds(
    options.arrayMin,
    options.arrayMax,
    'array',
    defaults.arrayLength
  );
  if (arrayLength) config.arrayLength = arrayLength;

  const bytesLength = parseBounds(
    options.bytesMin,
    options.bytesMax,
    'bytes',
    defaults.bytesLength
  );
  if (bytesLength) config.bytesLength = bytesLength;

  const stringLength = parseBounds(
    options.stringMin,
    options.stringMax,
    'string',
    defaults.stringLength
  );
  if (stringLength) config.stringLength = stringLength;

  const rounds = parseBounds(
    options.roundsMin,
    options.roundsMax,
    'rounds',
    defaults.rounds
  );
  if (rounds) config.rounds = rounds;

  if (options.bias !== undefined) {
    config.bias = parseBias(options.bias);
  }
  return config;
}

export function resolveOutputFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === 'json') return 'json';
  if (value === 'ndjson') return 'ndjson';
  throw new ConfigError({
    message: `--out expects json or ndjson, got "${value}"`,
    context: { setting: 'out' },
  });
}

export const MAX_SEED = 0xffffffff;

/** Seeds are 32-bit; larger ones would silently alias smaller seeds. */
export function resolveSeed(value: string | undefined): number {
  const seed = parseCountFlag(value, 'seed') ?? DEFAULT_SEED;
  if (seed > MAX_SEED) {
    throw new ConfigError({
      message: `--seed must be at most ${MAX_SEED}, got "${value ?? ''}"`,
      context: { setting: 'seed' },
    });
  }
  return seed;
}
