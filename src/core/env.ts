import type { EnvLookup } from '@/types';

/** Lookup over the live process environment, read at call time. */
export const processEnv: EnvLookup = (name) => process.env[name];

export function envFrom(values: Readonly<Record<string, string | undefined>>): EnvLookup {
  return (name) => values[name];
}
