/**
 * Minimal argv parsing against a command's declared flags.
 */

import { quote } from 'shell-quote';
import type { Command, Flag, ParsedArguments, ParsedFlag, Result } from '@/types';

/**
 * Parse `args` (argv after the command path) against `command`.
 *
 * Supports `--name`, `--name value`, `--name=value`, `-n` and `-n value`.
 * A separate value may not start with `-` unless it is a negative number;
 * other such values need `--name=value`.
 * `--help` always, and `--version` on versioned commands, set the matching
 * request instead of producing a flag. So do `-h` and `-V`, unless the command
 * declares a flag with that short name. Everything after `--` is positional.
 * A repeated flag keeps its last value.
 */
export function parseArguments(command: Command, args: readonly string[]): Result<ParsedArguments, string> {
  const flags = new Map<string, ParsedFlag>();
  const positionals: string[] = [];
  let helpRequested = false;
  let versionRequested = false;

  let i = 0;
  while (i < args.length) {
    const arg = args[i] ?? '';
    i++;

    if (arg === '--') {
      positionals.push(...args.slice(i));
      break;
    }

    if (arg === '--help' || (arg === '-h' && !declaresShortName(command, 'h'))) {
      helpRequested = true;
      continue;
    }

    if (
      command.version !== undefined &&
      (arg === '--version' || (arg === '-V' && !declaresShortName(command, 'V')))
    ) {
      versionRequested = true;
      continue;
    }

    if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const flag = lookupFlag(command, name);
    if (!flag) {
      return { ok: false, error: `Unknown option: ${quote([arg])}` };
    }

    let value: string;
    if (!flag.argument) {
      if (eq !== -1) {
        return { ok: false, error: `Option ${name} does not take a value` };
      }
      value = 'true';
    } else if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      const next = args[i];
      if (next === undefined || (next.startsWith('-') && !NEGATIVE_NUMBER.test(next))) {
        return { ok: false, error: `Option ${name} requires ${flag.argument}` };
      }
      value = next;
      i++;
    }

    flags.set(flag.longName, { flag, value, source: 'user-provided' });
  }

  return {
    ok: true,
    value: { flags: [...flags.values()], positionals, helpRequested, versionRequested },
  };
}

const NEGATIVE_NUMBER = /^-\d+(\.\d+)?$/;

export function declaresShortName(command: Command, shortName: string): boolean {
  return command.flags.some((flag) => flag.shortName === shortName);
}

function lookupFlag(command: Command, name: string): Flag | undefined {
  if (name.startsWith('--')) {
    const longName = name.slice(2);
    return command.flags.find((flag) => flag.longName === longName);
  }
  const shortName = name.slice(1);
  return command.flags.find((flag) => flag.shortName === shortName);
}

/**
 * Follow leading arguments that name subcommands.
 * Returns the selected command, its path, and the remaining arguments.
 */
export function selectCommand(
  root: Command,
  args: readonly string[],
): { command: Command; path: string[]; rest: string[] } {
  let command = root;
  const path = [root.name];
  let i = 0;
  while (i < args.length) {
    const sub = command.subCommands.find((candidate) => candidate.name === args[i]);
    if (!sub) break;
    command = sub;
    path.push(sub.name);
    i++;
  }
  return { command, path, rest: args.slice(i) };
}
