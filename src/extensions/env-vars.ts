import { defineExtension } from '@/core/pipeline';
import { parsedFlagKey, unionLeftBy } from '@/core/reconcile';
import type { Extension, ParsedFlag } from '@/types';

/**
 * Lets flags that declare an `envVar` take their value from the environment.
 * Values the user supplied on the command line win.
 */
export function envVars(): Extension {
  return defineExtension({
    name: 'envVars',
    extend: (command) => ({
      ...command,
      flags: command.flags.map((flag) =>
        flag.envVar ? { ...flag, description: `${flag.description} [env: ${flag.envVar}]` } : flag,
      ),
    }),
    postprocess: (command, args, context) => {
      const fromEnv: ParsedFlag[] = [];
      for (const flag of command.flags) {
        if (!flag.envVar) continue;
        const value = context.env(flag.envVar);
        if (value !== undefined) {
          fromEnv.push({ flag, value, source: 'env-var' });
        }
      }
      return { ok: true, value: { ...args, flags: unionLeftBy(parsedFlagKey, args.flags, fromEnv) } };
    },
  });
}
