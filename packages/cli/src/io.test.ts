import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigError, DescriptorError, typeKey } from '@abiseed/core';
import { loadTypeFile, parseJsonText, requireFlag } from './io.js';

describe('requireFlag', () => {
  it('names the missing flag', () => {
    expect(requireFlag('a.json', 'type')).toBe('a.json');
    expect(() => requireFlag(undefined, 'type')).toThrow(ConfigError);
    expect(() => requireFlag('', 'input')).toThrow('Missing --input <file>');
  });
});

describe('parseJsonText', () => {
  it('wraps parse failures with the source name', () => {
    expect(parseJsonText('[1]', 'x')).toEqual([1]);
    expect(() => parseJsonText('[1', 'values.json')).toThrow(/^Cannot parse values\.json: /);
  });
});

describe('loadTypeFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'abiseed-io-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function typeFile(json: unknown): Promise<string> {
    const file = path.join(dir, 'type.json');
    await writeFile(file, JSON.stringify(json), 'utf8');
    return file;
  }

  it('reads a single descriptor', async () => {
    const type = await loadTypeFile(
      await typeFile({ kind: 'slice', elem: { kind: 'fixedBytes', size: 32 } })
    );
    expect(typeKey(type)).toBe('bytes32[]');
  });

  it('reads an argument list as a tuple', async () => {
    const type = await loadTypeFile(
      await typeFile([
        { name: 'to', type: { kind: 'address' } },
        { type: { kind: 'bool' } },
      ])
    );
    expect(typeKey(type)).toBe('(address,bool)');
    expect(type.kind === 'tuple' ? type.fields.map((field) => field.name) : []).toEqual([
      'to',
      '',
    ]);
  });

  it('throws the descriptor error for invalid types', async () => {
    await expect(loadTypeFile(await typeFile({ kind: 'uint', bits: 3 }))).rejects.toBeInstanceOf(
      DescriptorError
    );
  });
});
