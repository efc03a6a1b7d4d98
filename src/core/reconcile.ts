/**
 * Keyed merge and diff over flag collections.
 * Left side always wins; surviving elements keep their input order.
 */

import type { Command, Flag, ParsedFlag } from '@/types';

/**
 * Every element of `primary`, then each element of `secondary` whose key is
 * not present in `primary`.
 */
export function unionLeftBy<T, K>(
  key: (item: T) => K,
  primary: readonly T[],
  secondary: readonly T[],
): T[] {
  const taken = new Set(primary.map(key));
  return [...primary, ...secondary.filter((item) => !taken.has(key(item)))];
}

/**
 * Elements of `candidates` whose key does not occur in `excludeKeys`.
 */
export function diffBy<T, K>(
  key: (item: T) => K,
  candidates: readonly T[],
  excludeKeys: Iterable<K>,
): T[] {
  const excluded = new Set(excludeKeys);
  return candidates.filter((item) => !excluded.has(key(item)));
}

/** First name that occurs more than once, if any. */
export function findDuplicate(names: readonly string[]): string | undefined {
  const seen = new Set<string>();
  return names.find((name) => {
    if (seen.has(name)) return true;
    seen.add(name);
    return false;
  });
}

export const parsedFlagKey = (parsed: ParsedFlag): string => parsed.flag.longName;

export function findFlag(command: Command, longName: string): Flag | undefined {
  return command.flags.find((flag) => flag.longName === longName);
}

/**
 * Copy of `command` with the named flag replaced by `update(flag)`.
 * Unknown names leave the command as it is.
 */
export function mapFlag(command: Command, longName: string, update: (flag: Flag) => Flag): Command {
  return {
    ...command,
    flags: command.flags.map((flag) => (flag.longName === longName ? update(flag) : flag)),
  };
}
