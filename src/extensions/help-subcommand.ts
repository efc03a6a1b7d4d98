import { printHelp } from '@/bin/help';
import { defineExtension } from '@/core/pipeline';
import { appendSelfReferentialChild } from '@/core/self-reference';
import type { Command, Extension } from '@/types';

export const HELP_PRIORITY = 0;

/**
 * Injects a `help` subcommand that prints the parent's help.
 *
 * The printed help is the parent as it stood once `help` was added, so it
 * lists `help` itself and every extension applied earlier, but nothing an
 * extension with a higher priority adds afterwards.
 */
export function helpSubCommand(): Extension {
  return defineExtension({
    name: 'helpSubCommand',
    priority: HELP_PRIORITY,
    extend: (command) => {
      const child: Command = {
        name: 'help',
        description: 'Show help',
        flags: [],
        subCommands: [],
        run: () => 0,
      };
      return appendSelfReferentialChild(command, child, (parent) => (_args, context) => {
        printHelp(parent, context.path.slice(0, -1));
        return 0;
      });
    },
  });
}
