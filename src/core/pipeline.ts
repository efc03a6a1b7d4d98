/**
 * Composes extensions into one structural transform over a command and one
 * postprocess chain over its parsed arguments.
 */

import { abortOnConfigurationError, ConfigurationError } from '@/core/errors';
import type {
  Command,
  Extension,
  ParsedArguments,
  PostprocessContext,
  Result,
} from '@/types';

/**
 * Priority given to extensions that do not set one. Lower than the help
 * subcommand's 0, so help is rendered from a tree that already carries every
 * unprioritized extension's annotations.
 */
export const DEFAULT_PRIORITY = -1;

export type ExtensionDefinition = Pick<Extension, 'name'> & Partial<Omit<Extension, 'name'>>;

/**
 * Fill in a pass-through extension around the given parts.
 */
export function defineExtension(definition: ExtensionDefinition): Extension {
  return {
    name: definition.name,
    priority: definition.priority ?? DEFAULT_PRIORITY,
    check: definition.check,
    extend: definition.extend ?? ((command) => command),
    postprocess: definition.postprocess ?? ((_command, args) => ({ ok: true, value: args })),
  };
}

/**
 * Stable sort by ascending priority.
 */
export function orderExtensions(extensions: readonly Extension[]): Extension[] {
  return extensions
    .map((extension, index) => ({ extension, index }))
    .sort((a, b) => a.extension.priority - b.extension.priority || a.index - b.index)
    .map(({ extension }) => extension);
}

/**
 * Fold every extension's `extend` over `command`, running each `check`
 * against the command that extension receives. Stops at the first problem.
 */
export function tryApplyStructural(
  extensions: readonly Extension[],
  command: Command,
): Result<Command, ConfigurationError> {
  let current = command;
  for (const extension of orderExtensions(extensions)) {
    const problem = extension.check?.(current) ?? null;
    if (problem) {
      return { ok: false, error: new ConfigurationError(extension.name, problem.message) };
    }
    current = extension.extend(current);
  }
  return { ok: true, value: current };
}

/**
 * Structural phase with the top-level policy: exit on configuration errors.
 */
export function applyStructural(extensions: readonly Extension[], command: Command): Command {
  return abortOnConfigurationError(tryApplyStructural(extensions, command));
}

/**
 * Thread `args` through every extension's `postprocess` in pipeline order.
 * The first failure is returned and no later step runs.
 */
export function applyPostprocess(
  extensions: readonly Extension[],
  finalCommand: Command,
  args: ParsedArguments,
  context: PostprocessContext,
): Result<ParsedArguments, string> {
  let current = args;
  for (const extension of orderExtensions(extensions)) {
    const result = extension.postprocess(finalCommand, current, context);
    if (!result.ok) {
      return result;
    }
    current = result.value;
  }
  return { ok: true, value: current };
}
