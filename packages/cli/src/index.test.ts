import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ErrorCode, getExitCode } from '@abiseed/core';
import { createProgram } from './index.js';
import { stripAnsi } from './render.js';

interface Captured {
  stdout: string;
  stderr: string;
  exitCode: number | undefined;
}

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'abiseed-cli-'));
  process.exitCode = undefined;
});

afterEach(async () => {
  process.exitCode = undefined;
  await rm(dir, { recursive: true, force: true });
});

async function fixture(name: string, content: unknown): Promise<string> {
  const file = path.join(dir, name);
  await writeFile(
    file,
    typeof content === 'string' ? content : JSON.stringify(content),
    'utf8'
  );
  return file;
}

async function runCli(args: string[]): Promise<Captured> {
  const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  try {
    await createProgram().parseAsync(args, { from: 'user' });
    const code = process.exitCode;
    return {
      stdout: stdout.mock.calls.map((call) => String(call[0])).join(''),
      stderr: stripAnsi(stderr.mock.calls.map((call) => String(call[0])).join('')),
      exitCode: typeof code === 'number' ? code : undefined,
    };
  } finally {
    stdout.mockRestore();
    stderr.mockRestore();
  }
}

function entryCount(json: unknown): number {
  if (typeof json !== 'object' || json === null || !('entries' in json)) return -1;
  const { entries } = json;
  return Array.isArray(entries) ? entries.length : -1;
}

describe('abiseed generate', () => {
  it('prints reproducible values as NDJSON', async () => {
    const type = await fixture('type.json', { kind: 'uint', bits: 8 });
    const args = ['generate', '--type', type, '--count', '3', '--out', 'ndjson', '--seed', '1'];

    const first = await runCli(args);
    const second = await runCli(args);

    const lines = first.stdout.trimEnd().split('\n');
    expect(lines).toHaveLength(3);
    for (const line of lines) {
      expect(line).toMatch(/^"(0|[1-9][0-9]*)"$/);
      expect(Number(JSON.parse(line))).toBeLessThanOrEqual(255);
    }
    expect(second.stdout).toBe(first.stdout);
    expect(first.exitCode).toBeUndefined();
  });

  it('reads an argument list as a tuple', async () => {
    const type = await fixture('args.json', [
      { name: 'to', type: { kind: 'address' } },
      { name: 'amount', type: { kind: 'uint', bits: 256 } },
    ]);
    const { stdout } = await runCli(['generate', '--type', type]);
    expect(JSON.parse(stdout)).toEqual([
      {
        to: expect.stringMatching(/^0x[0-9a-f]{40}$/),
        amount: expect.stringMatching(/^(0|[1-9][0-9]*)$/),
      },
    ]);
  });

  it('prints the effective configuration with --debug', async () => {
    const type = await fixture('type.json', { kind: 'bool' });
    const { stderr } = await runCli([
      'generate',
      '--type',
      type,
      '--array-max',
      '3',
      '--debug',
    ]);
    expect(stderr).toContain('[abiseed] type: bool\n');
    expect(stderr).toContain(
      '[abiseed] effective config: {"arrayLength":[0,3],"bytesLength":[0,64],"stringLength":[0,64]}\n'
    );
  });
});

describe('abiseed mutate', () => {
  it('mutates, reports stats and writes the corpus back', async () => {
    const type = await fixture('type.json', { kind: 'uint', bits: 8 });
    const input = await fixture('input.json', '"5"');
    const corpus = path.join(dir, 'corpus.json');

    const { stdout, stderr, exitCode } = await runCli([
      'mutate',
      '--type',
      type,
      '--input',
      input,
      '--count',
      '3',
      '--rounds-min',
      '1',
      '--rounds-max',
      '1',
      '--corpus',
      corpus,
      '--update-corpus',
      '--print-stats',
    ]);

    expect(exitCode).toBeUndefined();
    expect(JSON.parse(stdout)).toHaveLength(3);
    expect(stderr).toContain('[abiseed] mutation stats: {"calls":3,"rounds":3,');

    const saved: unknown = JSON.parse(await readFile(corpus, 'utf8'));
    expect(saved).toMatchObject({ version: 1 });
    const count = entryCount(saved);
    expect(count).toBeGreaterThanOrEqual(1);
    expect(count).toBeLessThanOrEqual(3);
    expect(stderr).toContain(`[abiseed] corpus ${corpus}: saved ${count} entries\n`);
  });

  it('requires --corpus for --update-corpus', async () => {
    const type = await fixture('type.json', { kind: 'bool' });
    const input = await fixture('input.json', 'true');
    const { stderr, exitCode } = await runCli([
      'mutate',
      '--type',
      type,
      '--input',
      input,
      '--update-corpus',
    ]);
    expect(exitCode).toBe(getExitCode(ErrorCode.CONFIGURATION_ERROR));
    expect(stderr).toContain('Error E300: --update-corpus requires --corpus <file>');
  });
});

describe('abiseed roundtrip', () => {
  it('prints the canonical form and fails --check on non-canonical input', async () => {
    const type = await fixture('type.json', { kind: 'bytes' });
    const input = await fixture('input.json', '"0xABCD"');

    const { stdout, stderr, exitCode } = await runCli([
      'roundtrip',
      '--type',
      type,
      '--input',
      input,
      '--check',
    ]);

    expect(stdout).toBe('"0xabcd"\n');
    expect(stderr).toBe('[abiseed] roundtrip: input was not canonical\n');
    expect(exitCode).toBe(1);
  });

  it('passes --check on canonical input', async () => {
    const type = await fixture('type.json', { kind: 'int', bits: 16 });
    const input = await fixture('input.json', '"-300"');
    const { stdout, exitCode } = await runCli(['roundtrip', '-t', type, '-i', input, '--check']);
    expect(stdout).toBe('"-300"\n');
    expect(exitCode).toBeUndefined();
  });
});

describe('abiseed corpus', () => {
  it('adds leaves and summarizes the file', async () => {
    const type = await fixture('args.json', [
      { name: 'to', type: { kind: 'address' } },
      { name: 'amount', type: { kind: 'uint', bits: 256 } },
    ]);
    const input = await fixture('input.json', {
      to: `0x${'12'.repeat(20)}`,
      amount: '1000',
    });
    const corpus = path.join(dir, 'corpus.json');

    const added = await runCli(['corpus', 'add', '--type', type, '--input', input, '--corpus', corpus]);
    expect(added.stdout).toBe('{"inserted":2,"entries":2}\n');

    const again = await runCli(['corpus', 'add', '--type', type, '--input', input, '--corpus', corpus]);
    expect(again.stdout).toBe('{"inserted":0,"entries":2}\n');

    const stats = await runCli(['corpus', 'stats', '--corpus', corpus]);
    expect(JSON.parse(stats.stdout)).toEqual({ address: 1, uint256: 1 });
  });
});

describe('error reporting', () => {
  it('maps a missing file to the configuration exit code', async () => {
    const missing = path.join(dir, 'nope.json');
    const { stderr, exitCode } = await runCli(['generate', '--type', missing]);
    expect(exitCode).toBe(50);
    expect(stderr).toContain(`Error E300: File not found: ${missing}`);
  });

  it('suggests a kind for a misspelt descriptor', async () => {
    const type = await fixture('type.json', { kind: 'unit', bits: 8 });
    const { stderr, exitCode } = await runCli(['generate', '--type', type]);
    expect(exitCode).toBe(getExitCode(ErrorCode.INVALID_TYPE_DESCRIPTOR));
    expect(stderr).toContain('Hint: Did you mean "uint" or "int"?');
  });

  it('reports unreadable JSON', async () => {
    const type = await fixture('type.json', '{"kind": ');
    const { stderr, exitCode } = await runCli(['generate', '--type', type]);
    expect(exitCode).toBe(66);
    expect(stderr).toContain(`Error E406: Cannot parse ${type}:`);
  });

  it('reports values that do not decode', async () => {
    const type = await fixture('type.json', { kind: 'uint', bits: 8 });
    const input = await fixture('input.json', '"256"');
    const { stderr, exitCode } = await runCli(['mutate', '--type', type, '--input', input]);
    expect(exitCode).toBe(getExitCode(ErrorCode.INTEGER_OUT_OF_RANGE));
    expect(stderr).toContain('Error E402: Cannot decode $: 256 does not fit uint8');
  });
});
