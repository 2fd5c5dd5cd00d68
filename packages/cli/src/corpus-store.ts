/**
 * Corpus file persistence
 *
 * `{ "version": 1, "entries": [{ "type": <descriptor>, "value": <IR> }] }`
 *
 * Entries are decoded one by one; an entry that fails to decode is
 * reported and skipped, the rest of the file still loads.
 */

import { readFile, writeFile } from 'node:fs/promises';

import {
  decodeAbiValue,
  DecodeError,
  encodeAbiValue,
  isErr,
  parseTypeDescriptor,
  ValueSet,
  type AbiIr,
  type AbiSeedError,
  type TypeDescriptor,
} from '@abiseed/core';
import { isMissingFile, parseJsonText } from './io.js';

export const CORPUS_FILE_VERSION = 1;

export interface CorpusFileEntry {
  type: TypeDescriptor;
  value: AbiIr;
}

export interface CorpusFile {
  version: typeof CORPUS_FILE_VERSION;
  entries: CorpusFileEntry[];
}

export interface SkippedEntry {
  index: number;
  error: AbiSeedError;
}

export interface LoadedCorpus {
  corpus: ValueSet;
  /** Entries present in the file */
  entries: number;
  /** Leaves newly inserted into the set */
  inserted: number;
  skipped: SkippedEntry[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalidFile(source: string, message: string): DecodeError {
  return new DecodeError({
    reason: 'type-mismatch',
    message: `Invalid corpus file ${source}: ${message}`,
    context: { path: source },
  });
}

/**
 * Build a ValueSet from parsed corpus JSON.
 */
export function corpusFromJson(json: unknown, source = 'corpus'): LoadedCorpus {
  if (!isRecord(json)) {
    throw invalidFile(source, 'expected a JSON object');
  }
  if (json.version !== CORPUS_FILE_VERSION) {
    throw invalidFile(
      source,
      `unsupported version ${JSON.stringify(json.version)} (expected ${CORPUS_FILE_VERSION})`
    );
  }
  if (!Array.isArray(json.entries)) {
    throw invalidFile(source, '"entries" must be an array');
  }

  const entries: unknown[] = json.entries;
  const corpus = new ValueSet();
  const skipped: SkippedEntry[] = [];
  let inserted = 0;

  for (const [index, entry] of entries.entries()) {
    const path = `$.entries[${index}]`;
    if (!isRecord(entry)) {
      skipped.push({ index, error: invalidFile(source, `${path} is not an object`) });
      continue;
    }
    const type = parseTypeDescriptor(entry.type, `${path}.type`);
    if (isErr(type)) {
      skipped.push({ index, error: type.error });
      continue;
    }
    const value = decodeAbiValue(type.value, entry.value);
    if (isErr(value)) {
      skipped.push({ index, error: value.error });
      continue;
    }
    inserted += corpus.addDeep(type.value, value.value);
  }

  return { corpus, entries: entries.length, inserted, skipped };
}

/**
 * Load a corpus file. A missing file is an empty corpus.
 */
export async function loadCorpus(file: string): Promise<LoadedCorpus> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error: unknown) {
    if (isMissingFile(error)) {
      return { corpus: new ValueSet(), entries: 0, inserted: 0, skipped: [] };
    }
    throw error;
  }
  return corpusFromJson(parseJsonText(text, file), file);
}

export function corpusToJson(corpus: ValueSet): CorpusFile {
  const entries: CorpusFileEntry[] = [];
  for (const { type, values } of corpus.entries()) {
    for (const value of values) {
      entries.push({ type, value: encodeAbiValue(type, value) });
    }
  }
  return { version: CORPUS_FILE_VERSION, entries };
}

/**
 * Write the corpus to `file`.
 *
 * @returns number of entries written
 */
export async function saveCorpus(file: string, corpus: ValueSet): Promise<number> {
  const json = corpusToJson(corpus);
  await writeFile(file, `${JSON.stringify(json, null, 2)}\n`, 'utf8');
  return json.entries.length;
}
