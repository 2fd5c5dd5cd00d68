import { readFile } from 'node:fs/promises';

import {
  abiTypes,
  ConfigError,
  decodeAbiValue,
  DecodeError,
  parseAbiArguments,
  parseTypeDescriptor,
  type AbiValue,
  type TypeDescriptor,
} from '@abiseed/core';

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function parseJsonText(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DecodeError({
      reason: 'malformed-json',
      message: `Cannot parse ${source}: ${reason}`,
      context: { path: source },
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Read and parse a JSON file named by a CLI flag.
 */
export async function readJsonFile(file: string, flag: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error: unknown) {
    if (isMissingFile(error)) {
      throw new ConfigError({
        message: `File not found: ${file}`,
        context: { setting: flag },
      });
    }
    throw error;
  }
  return parseJsonText(text, file);
}

export function requireFlag(value: string | undefined, flag: string): string {
  if (value === undefined || value === '') {
    throw new ConfigError({
      message: `Missing --${flag} <file>`,
      context: { setting: flag },
    });
  }
  return value;
}

/**
 * A type file holds a descriptor, or an argument list that is read as a
 * tuple of the arguments.
 */
export async function loadTypeFile(file: string): Promise<TypeDescriptor> {
  const json = await readJsonFile(file, 'type');
  if (Array.isArray(json)) {
    const args = parseAbiArguments(json).unwrap();
    return abiTypes.tuple(args.map((arg) => abiTypes.field(arg.name, arg.type)));
  }
  return parseTypeDescriptor(json).unwrap();
}

export async function loadValueFile(
  file: string,
  type: TypeDescriptor
): Promise<AbiValue> {
  return decodeAbiValue(type, await readJsonFile(file, 'input')).unwrap();
}
