// CLI entry point
// - Command name: `abiseed` with subcommands generate, mutate, roundtrip and
//   corpus (add, stats).
// - Values travel as codec IR: JSON on stdout (or NDJSON with --out ndjson),
//   diagnostics as `[abiseed] ...` lines on stderr.

import { Command } from 'commander';

import {
  AbiSeedError,
  ConfigError,
  createRng,
  decodeAbiValue,
  encodeAbiValue,
  ErrorCode,
  ErrorPresenter,
  generateAbiValue,
  isAbiSeedError,
  MutatingValueGenerator,
  mutateAbiValue,
  MutationStats,
  RandomValueGenerator,
  ValueSet,
  type AbiIr,
  type ValueGenerator,
} from '@abiseed/core';
import { loadCorpus, saveCorpus, type LoadedCorpus } from './corpus-store.js';
import {
  corpusSummary,
  printCorpusLoad,
  printCorpusSaved,
  printEffectiveConfig,
  printMutationStats,
  printRoundTrip,
} from './debug.js';
import {
  parseCountFlag,
  parseMutationConfig,
  resolveOutputFormat,
  resolveSeed,
  type CliOptions,
  type OutputFormat,
} from './flags.js';
import { loadTypeFile, loadValueFile, readJsonFile, requireFlag } from './io.js';
import { renderCLIView } from './render.js';

function addGeneratorOptions(command: Command): Command {
  return command
    .option('--seed <number>', 'Deterministic seed', '424242')
    .option('--array-min <number>', 'Minimum dynamic array length')
    .option('--array-max <number>', 'Maximum dynamic array length')
    .option('--bytes-min <number>', 'Minimum dynamic bytes length')
    .option('--bytes-max <number>', 'Maximum dynamic bytes length')
    .option('--string-min <number>', 'Minimum string length (code points)')
    .option('--string-max <number>', 'Maximum string length (code points)')
    .option(
      '--bias <value>',
      'Corpus reuse probability: 0.5 or address=0.9,integer=0.2,...'
    )
    .option('--debug', 'Print effective configuration to stderr', false);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('abiseed')
    .description('Generate, mutate and round-trip ABI values for fuzzing')
    .version('0.1.0');

  addGeneratorOptions(
    program
      .command('generate')
      .description('Generate values of a type')
      .option('-t, --type <file>', 'Type descriptor or argument list (JSON)')
      .option('-c, --count <number>', 'Number of values to generate', '1')
      .option('--corpus <file>', 'Seed generation from a corpus file')
      .option('--out <format>', 'Output format: json|ndjson', 'json')
  ).action((options: CliOptions) => run(() => generateCommand(options)));

  addGeneratorOptions(
    program
      .command('mutate')
      .description('Mutate an encoded value')
      .option('-t, --type <file>', 'Type descriptor or argument list (JSON)')
      .option('-i, --input <file>', 'Encoded value to mutate (JSON)')
      .option('-c, --count <number>', 'Number of mutations to print', '1')
      .option('--corpus <file>', 'Corpus file used for reuse')
      .option('--update-corpus', 'Write observed values back to --corpus', false)
      .option('--rounds-min <number>', 'Minimum mutation rounds')
      .option('--rounds-max <number>', 'Maximum mutation rounds')
      .option('--print-stats', 'Print mutation stats as JSON to stderr', false)
      .option('--out <format>', 'Output format: json|ndjson', 'json')
  ).action((options: CliOptions) => run(() => mutateCommand(options)));

  program
    .command('roundtrip')
    .description('Decode and re-encode a value, printing its canonical form')
    .option('-t, --type <file>', 'Type descriptor or argument list (JSON)')
    .option('-i, --input <file>', 'Encoded value (JSON)')
    .option('--check', 'Fail when the input is not in canonical form', false)
    .action((options: CliOptions) => run(() => roundtripCommand(options)));

  const corpus = program.command('corpus').description('Inspect or extend a corpus file');

  corpus
    .command('add')
    .description('Add the leaves of an encoded value to a corpus file')
    .option('-t, --type <file>', 'Type descriptor or argument list (JSON)')
    .option('-i, --input <file>', 'Encoded value (JSON)')
    .option('--corpus <file>', 'Corpus file (created when missing)')
    .action((options: CliOptions) => run(() => corpusAddCommand(options)));

  corpus
    .command('stats')
    .description('Print entry counts per type')
    .option('--corpus <file>', 'Corpus file')
    .action((options: CliOptions) => run(() => corpusStatsCommand(options)));

  return program;
}

async function run(command: () => Promise<void>): Promise<void> {
  try {
    await command();
  } catch (err: unknown) {
    handleCliError(err);
  }
}

async function openCorpus(file: string, debug: boolean): Promise<LoadedCorpus> {
  const loaded = await loadCorpus(file);
  printCorpusLoad(file, loaded, debug);
  return loaded;
}

async function generateCommand(options: CliOptions): Promise<void> {
  const type = await loadTypeFile(requireFlag(options.type, 'type'));
  const count = parseCountFlag(options.count, 'count') ?? 1;
  const outFormat = resolveOutputFormat(options.out);
  const config = parseMutationConfig(options);
  const rng = createRng(resolveSeed(options.seed), 'generate');
  const debug = options.debug === true;

  let generator: ValueGenerator;
  if (options.corpus) {
    const { corpus } = await openCorpus(options.corpus, debug);
    generator = new MutatingValueGenerator(config, corpus, rng);
  } else {
    generator = new RandomValueGenerator(config, rng);
  }
  if (debug) {
    printEffectiveConfig(type, generator.config);
  }

  const values: AbiIr[] = [];
  for (let i = 0; i < count; i++) {
    values.push(encodeAbiValue(type, generateAbiValue(generator, type)));
  }
  writeValues(values, outFormat);
}

async function mutateCommand(options: CliOptions): Promise<void> {
  const type = await loadTypeFile(requireFlag(options.type, 'type'));
  const input = await loadValueFile(requireFlag(options.input, 'input'), type);
  const count = parseCountFlag(options.count, 'count') ?? 1;
  const outFormat = resolveOutputFormat(options.out);
  const config = parseMutationConfig(options);
  const debug = options.debug === true;

  if (options.updateCorpus && !options.corpus) {
    throw new ConfigError({
      message: '--update-corpus requires --corpus <file>',
      context: { setting: 'update-corpus' },
    });
  }

  const corpus = options.corpus
    ? (await openCorpus(options.corpus, debug)).corpus
    : new ValueSet();
  const generator = new MutatingValueGenerator(
    config,
    corpus,
    createRng(resolveSeed(options.seed), 'mutate')
  );
  if (debug) {
    printEffectiveConfig(type, generator.config);
  }

  const stats = new MutationStats();
  const values: AbiIr[] = [];
  for (let i = 0; i < count; i++) {
    const mutated = mutateAbiValue(generator, type, input, { stats }).unwrap();
    values.push(encodeAbiValue(type, mutated));
  }
  writeValues(values, outFormat);

  if (options.printStats) {
    printMutationStats(stats.snapshotMetrics());
  }
  if (options.updateCorpus && options.corpus) {
    const written = await saveCorpus(options.corpus, corpus);
    printCorpusSaved(options.corpus, written);
  }
}

async function roundtripCommand(options: CliOptions): Promise<void> {
  const type = await loadTypeFile(requireFlag(options.type, 'type'));
  const raw = await readJsonFile(requireFlag(options.input, 'input'), 'input');
  const value = decodeAbiValue(type, raw).unwrap();
  const encoded = encodeAbiValue(type, value);

  const changed = JSON.stringify(raw) !== JSON.stringify(encoded);
  writeValues([encoded], 'ndjson');
  printRoundTrip(changed);
  if (options.check && changed) {
    process.exitCode = 1;
  }
}

async function corpusAddCommand(options: CliOptions): Promise<void> {
  const file = requireFlag(options.corpus, 'corpus');
  const type = await loadTypeFile(requireFlag(options.type, 'type'));
  const value = await loadValueFile(requireFlag(options.input, 'input'), type);
  const { corpus } = await openCorpus(file, false);

  const inserted = corpus.addDeep(type, value);
  const written = await saveCorpus(file, corpus);
  process.stdout.write(`${JSON.stringify({ inserted, entries: written })}\n`);
}

async function corpusStatsCommand(options: CliOptions): Promise<void> {
  const file = requireFlag(options.corpus, 'corpus');
  const { corpus } = await openCorpus(file, false);
  process.stdout.write(`${JSON.stringify(corpusSummary(corpus), null, 2)}\n`);
}

function writeValues(values: AbiIr[], outFormat: OutputFormat): void {
  if (outFormat === 'ndjson') {
    if (values.length > 0) {
      process.stdout.write(values.map((v) => JSON.stringify(v)).join('\n') + '\n');
    }
  } else {
    process.stdout.write(JSON.stringify(values, null, 2) + '\n');
  }
}

function handleCliError(err: unknown): void {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: AbiSeedError;
  if (isAbiSeedError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new (class extends AbiSeedError {})({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause: err instanceof Error ? err : undefined,
    });
  }

  const view = presenter.formatForCLI(error);
  process.stderr.write(`${renderCLIView(view)}\n`);
  process.exitCode = error.getExitCode();
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv).catch(handleCliError);
}
