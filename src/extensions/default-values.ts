import { defineExtension } from '@/core/pipeline';
import { findDuplicate, findFlag, mapFlag, parsedFlagKey, unionLeftBy } from '@/core/reconcile';
import type { Extension, ParsedFlag } from '@/types';

/**
 * Gives flags a default value. Each named flag must exist on the command and
 * appear only once.
 * Values the user supplied take precedence over the defaults.
 */
export function defaultValues(pairs: readonly (readonly [string, string])[]): Extension {
  return defineExtension({
    name: 'defaultValues',
    check: (command) => {
      const names = pairs.map(([longName]) => longName);
      const duplicate = findDuplicate(names);
      if (duplicate !== undefined) {
        return { message: `--${duplicate} is given more than one default` };
      }
      const missing = names.find((longName) => !findFlag(command, longName));
      return missing !== undefined ? { message: `no flag named --${missing} on "${command.name}"` } : null;
    },
    extend: (command) =>
      pairs.reduce(
        (current, [longName, value]) =>
          mapFlag(current, longName, (flag) => ({
            ...flag,
            description: `${flag.description} [Default: \`${value}\`]`,
          })),
        command,
      ),
    postprocess: (command, args) => {
      const defaults: ParsedFlag[] = [];
      for (const [longName, value] of pairs) {
        const flag = findFlag(command, longName);
        if (flag) {
          defaults.push({ flag, value, source: 'default' });
        }
      }
      return { ok: true, value: { ...args, flags: unionLeftBy(parsedFlagKey, args.flags, defaults) } };
    },
  });
}
