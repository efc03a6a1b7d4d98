import { describe, expect, test } from 'vitest';
import { parseArguments, selectCommand } from '@/bin/parse';
import type { Flag } from '@/types';
import { LEVEL, makeCommand, summarize } from '../helpers';

const VERBOSE: Flag = { longName: 'verbose', shortName: 'v', description: 'Verbose output' };
const TARGET: Flag = { longName: 'target', shortName: 't', argument: '<env>', description: 'Target' };

const command = makeCommand({ flags: [LEVEL, VERBOSE, TARGET] });

describe('parseArguments', () => {
  test('parses long flags with separate and inline values', () => {
    const result = parseArguments(command, ['--level', 'debug', '--target=prod']);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(summarize(result.value)).toEqual([
      ['level', 'debug', 'user-provided'],
      ['target', 'prod', 'user-provided'],
    ]);
  });

  test('parses short flags and switches', () => {
    const result = parseArguments(command, ['-v', '-t', 'staging']);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(summarize(result.value)).toEqual([
      ['verbose', 'true', 'user-provided'],
      ['target', 'staging', 'user-provided'],
    ]);
  });

  test('collects positionals and everything after --', () => {
    const result = parseArguments(command, ['a', '--verbose', 'b', '--', '--level', 'c']);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.positionals).toEqual(['a', 'b', '--level', 'c']);
    expect(summarize(result.value)).toEqual([['verbose', 'true', 'user-provided']]);
  });

  test('keeps the last value of a repeated flag', () => {
    const result = parseArguments(command, ['--level', 'info', '--level', 'warn']);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(summarize(result.value)).toEqual([['level', 'warn', 'user-provided']]);
  });

  test('records help requests', () => {
    const result = parseArguments(command, ['-h']);
    expect(result).toEqual({
      ok: true,
      value: { flags: [], positionals: [], helpRequested: true, versionRequested: false },
    });
  });

  test('records version requests only on versioned commands', () => {
    const versioned = parseArguments(makeCommand({ version: '1.0.0' }), ['--version']);
    expect(versioned.ok && versioned.value.versionRequested).toBe(true);

    expect(parseArguments(makeCommand(), ['--version'])).toEqual({
      ok: false,
      error: 'Unknown option: --version',
    });
  });

  test('rejects unknown options', () => {
    expect(parseArguments(command, ['--bogus'])).toEqual({ ok: false, error: 'Unknown option: --bogus' });
  });

  test('quotes unknown options containing spaces', () => {
    expect(parseArguments(command, ['--bad flag'])).toEqual({
      ok: false,
      error: "Unknown option: '--bad flag'",
    });
  });

  test('rejects a missing value', () => {
    expect(parseArguments(command, ['--level'])).toEqual({
      ok: false,
      error: 'Option --level requires <level>',
    });
    expect(parseArguments(command, ['--level', '--verbose'])).toEqual({
      ok: false,
      error: 'Option --level requires <level>',
    });
  });

  test('accepts a negative number as a separate value', () => {
    const result = parseArguments(command, ['--level', '-5', '-t', '-0.5']);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(summarize(result.value)).toEqual([
      ['level', '-5', 'user-provided'],
      ['target', '-0.5', 'user-provided'],
    ]);
  });

  test('takes dash-prefixed values in inline form', () => {
    const result = parseArguments(command, ['--level=-verbose']);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(summarize(result.value)).toEqual([['level', '-verbose', 'user-provided']]);
  });

  test('lets a declared -h flag take precedence over help', () => {
    const HOST: Flag = { longName: 'host', shortName: 'h', argument: '<host>', description: 'Host' };
    const result = parseArguments(makeCommand({ flags: [HOST] }), ['-h', 'example.test', '--help']);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.helpRequested).toBe(true);
    expect(summarize(result.value)).toEqual([['host', 'example.test', 'user-provided']]);
  });

  test('lets a declared -V flag take precedence over version', () => {
    const VERBOSE_UPPER: Flag = { longName: 'very-verbose', shortName: 'V', description: 'More output' };
    const result = parseArguments(makeCommand({ flags: [VERBOSE_UPPER], version: '1.0.0' }), ['-V']);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.versionRequested).toBe(false);
    expect(summarize(result.value)).toEqual([['very-verbose', 'true', 'user-provided']]);
  });

  test('rejects a value on a switch', () => {
    expect(parseArguments(command, ['--verbose=yes'])).toEqual({
      ok: false,
      error: 'Option --verbose does not take a value',
    });
  });
});

describe('selectCommand', () => {
  const leaf = makeCommand({ name: 'up' });
  const group = makeCommand({ name: 'db', subCommands: [leaf] });
  const root = makeCommand({ name: 'tool', subCommands: [group] });

  test('follows leading subcommand names', () => {
    const selected = selectCommand(root, ['db', 'up', '--level', 'info']);
    expect(selected.command).toBe(leaf);
    expect(selected.path).toEqual(['tool', 'db', 'up']);
    expect(selected.rest).toEqual(['--level', 'info']);
  });

  test('stops at the first argument that is not a subcommand', () => {
    const selected = selectCommand(root, ['db', 'down', 'up']);
    expect(selected.command).toBe(group);
    expect(selected.rest).toEqual(['down', 'up']);
  });

  test('selects the root when there are no arguments', () => {
    expect(selectCommand(root, []).path).toEqual(['tool']);
  });
});
