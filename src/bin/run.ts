/**
 * Attach extensions to a command and dispatch argv through a command tree.
 */

import { printHelp, printVersion } from '@/bin/help';
import { parseArguments, selectCommand } from '@/bin/parse';
import { colors } from '@/bin/utils/colors';
import { processEnv } from '@/core/env';
import { applyPostprocess, applyStructural } from '@/core/pipeline';
import type { Command, EnvLookup, Extension } from '@/types';

export interface ExtendOptions {
  /** Environment lookup for postprocess steps (defaults to process.env) */
  env?: EnvLookup;
}

function reportError(message: string): void {
  console.error(colors.red(`Error: ${message}`));
}

/**
 * Apply `extensions` to `command`. The returned command's handler runs the
 * postprocess chain before the original handler, and exits with 1 on the
 * first user error.
 */
export function extendCommand(
  command: Command,
  extensions: readonly Extension[],
  options: ExtendOptions = {},
): Command {
  const extended = applyStructural(extensions, command);
  const env = options.env ?? processEnv;
  return {
    ...extended,
    run: (args, context) => {
      const result = applyPostprocess(extensions, extended, args, { env });
      if (!result.ok) {
        reportError(result.error);
        return 1;
      }
      return extended.run(result.value, context);
    },
  };
}

/**
 * Select the subcommand named by leading arguments, parse the rest, answer
 * help and version requests, then call the selected handler.
 * Returns the exit code.
 */
export function runCli(root: Command, argv: readonly string[]): number {
  const { command, path, rest } = selectCommand(root, argv);

  const parsed = parseArguments(command, rest);
  if (!parsed.ok) {
    reportError(parsed.error);
    console.error(`Run '${path.join(' ')} --help' for usage.`);
    return 1;
  }

  if (parsed.value.helpRequested) {
    printHelp(command, path);
    return 0;
  }

  if (parsed.value.versionRequested) {
    printVersion(command);
    return 0;
  }

  return command.run(parsed.value, { path });
}
