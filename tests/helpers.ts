import type { Command, Flag, ParsedArguments, ParsedFlag } from '@/types';

/**
 * Capture console.log output during a function call.
 */
export function captureOutput(fn: () => void): string {
  const originalLog = console.log;
  let output = '';
  console.log = (...args: unknown[]) => {
    output += `${args.map(String).join(' ')}\n`;
  };
  try {
    fn();
  } finally {
    console.log = originalLog;
  }
  return output;
}

export function makeCommand(overrides: Partial<Command> = {}): Command {
  return {
    name: 'tool',
    description: 'Does things',
    flags: [],
    subCommands: [],
    run: () => 0,
    ...overrides,
  };
}

export function makeArgs(overrides: Partial<ParsedArguments> = {}): ParsedArguments {
  return {
    flags: [],
    positionals: [],
    helpRequested: false,
    versionRequested: false,
    ...overrides,
  };
}

export function userFlag(flag: Flag, value: string): ParsedFlag {
  return { flag, value, source: 'user-provided' };
}

/** Long name, value and source of each parsed flag, in order */
export function summarize(args: ParsedArguments): Array<[string, string, string]> {
  return args.flags.map((parsed) => [parsed.flag.longName, parsed.value, parsed.source]);
}

export const LEVEL: Flag = { longName: 'level', argument: '<level>', description: 'Log level' };
export const TOKEN: Flag = { longName: 'token', argument: '<token>', description: 'API token' };
export const API_KEY: Flag = {
  longName: 'api-key',
  argument: '<key>',
  description: 'API key',
  envVar: 'API_KEY',
};
