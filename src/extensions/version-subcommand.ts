import { printVersion } from '@/bin/help';
import { defineExtension } from '@/core/pipeline';
import { appendSelfReferentialChild } from '@/core/self-reference';
import type { Command, Extension } from '@/types';

/**
 * Injects a `version` subcommand that prints the parent's version banner.
 * A command without a version is a configuration error.
 */
export function versionSubCommand(): Extension {
  return defineExtension({
    name: 'versionSubCommand',
    check: (command) =>
      command.version === undefined
        ? { message: `command "${command.name}" has no version` }
        : null,
    extend: (command) => {
      const child: Command = {
        name: 'version',
        description: 'Show version',
        flags: [],
        subCommands: [],
        run: () => 0,
      };
      return appendSelfReferentialChild(command, child, (parent) => () => {
        printVersion(parent);
        return 0;
      });
    },
  });
}
