import {
  typeKey,
  type MutationStatsSnapshot,
  type ResolvedGeneratorConfig,
  type TypeDescriptor,
  type ValueSet,
} from '@abiseed/core';
import type { LoadedCorpus } from './corpus-store.js';

function log(line: string): void {
  process.stderr.write(`[abiseed] ${line}\n`);
}

/**
 * Print the resolved configuration and target type to stderr.
 * Intended to be used behind the --debug flag.
 */
export function printEffectiveConfig(
  type: TypeDescriptor,
  config: ResolvedGeneratorConfig
): void {
  log(`type: ${typeKey(type)}`);
  log(`effective config: ${JSON.stringify(config)}`);
}

/** Entry counts per type key, sorted by key. */
export function corpusSummary(corpus: ValueSet): Record<string, number> {
  const summary: Record<string, number> = {};
  for (const { type, values } of corpus.entries()) {
    summary[typeKey(type)] = values.length;
  }
  return Object.fromEntries(
    Object.entries(summary).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  );
}

/**
 * Skipped entries are always reported; the summary line only with --debug.
 */
export function printCorpusLoad(
  file: string,
  loaded: LoadedCorpus,
  verbose: boolean
): void {
  if (verbose) {
    log(
      `corpus ${file}: ${loaded.entries} entries, ${loaded.inserted} values, ${loaded.skipped.length} skipped`
    );
  }
  for (const { index, error } of loaded.skipped) {
    log(`corpus entry ${index} skipped: ${error.errorCode} ${error.message}`);
  }
}

export function printCorpusSaved(file: string, entries: number): void {
  log(`corpus ${file}: saved ${entries} entries`);
}

export function printMutationStats(stats: MutationStatsSnapshot): void {
  log(`mutation stats: ${JSON.stringify(stats)}`);
}

export function printRoundTrip(changed: boolean): void {
  log(`roundtrip: ${changed ? 'input was not canonical' : 'input is canonical'}`);
}
