import { defineExtension } from '@/core/pipeline';
import { diffBy, findDuplicate, findFlag, mapFlag, parsedFlagKey } from '@/core/reconcile';
import type { Extension } from '@/types';

/**
 * Marks flags as required. Each named flag must exist on the command.
 * Runs after the extensions that supply values, so defaults and environment
 * values count as supplied. Help and version requests skip the check.
 */
export function requireFlags(longNames: readonly string[]): Extension {
  return defineExtension({
    name: 'requireFlags',
    check: (command) => {
      const duplicate = findDuplicate(longNames);
      if (duplicate !== undefined) {
        return { message: `--${duplicate} is listed more than once` };
      }
      const missing = longNames.find((longName) => !findFlag(command, longName));
      return missing !== undefined ? { message: `no flag named --${missing} on "${command.name}"` } : null;
    },
    extend: (command) =>
      longNames.reduce(
        (current, longName) =>
          mapFlag(current, longName, (flag) => ({
            ...flag,
            description: `[Required] ${flag.description}`,
          })),
        command,
      ),
    postprocess: (_command, args) => {
      if (args.helpRequested || args.versionRequested) {
        return { ok: true, value: args };
      }
      const [first] = diffBy((name: string) => name, longNames, args.flags.map(parsedFlagKey));
      if (first !== undefined) {
        return { ok: false, error: `Missing required flag: --${first}` };
      }
      return { ok: true, value: args };
    },
  });
}
