/**
 * Shared types for cli-extensions.
 */

/** A named input a command accepts */
export interface Flag {
  /** Unique key within a command's flag list, without leading dashes */
  longName: string;
  /** Single-letter alias, without the leading dash */
  shortName?: string;
  /** Value placeholder (e.g. "<level>"). Flags without one are switches. */
  argument?: string;
  description: string;
  /** Environment variable that may supply the value */
  envVar?: string;
}

/** Arguments passed to a command's run handler */
export interface RunContext {
  /** Names from the root command down to the selected one */
  path: readonly string[];
}

export type RunHandler = (args: ParsedArguments, context: RunContext) => number;

/** One node of the command tree */
export interface Command {
  name: string;
  description: string;
  /** Long-form text rendered after the generated help sections */
  furtherInformation?: string;
  flags: readonly Flag[];
  subCommands: readonly Command[];
  version?: string;
  run: RunHandler;
}

/** Where a parsed flag value came from */
export type FlagSource = 'user-provided' | 'default' | 'env-var';

export interface ParsedFlag {
  flag: Flag;
  value: string;
  source: FlagSource;
}

/** Result of parsing argv against a command */
export interface ParsedArguments {
  flags: readonly ParsedFlag[];
  positionals: readonly string[];
  helpRequested: boolean;
  versionRequested: boolean;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/** Environment variable lookup handed to postprocess steps */
export type EnvLookup = (name: string) => string | undefined;

export interface PostprocessContext {
  env: EnvLookup;
}

/**
 * A structural transform over a command plus a transform/validation step over
 * its parsed arguments.
 */
export interface Extension {
  /** Used in configuration error messages */
  name: string;
  /** Extensions apply in ascending priority, ties in declaration order */
  priority: number;
  /** Configuration check run against the command this extension receives */
  check?(command: Command): ConfigurationProblem | null;
  extend(command: Command): Command;
  postprocess(
    command: Command,
    args: ParsedArguments,
    context: PostprocessContext,
  ): Result<ParsedArguments, string>;
}

/** A misconfiguration reported by an extension's check */
export interface ConfigurationProblem {
  message: string;
}

/** Declarative extension configuration loaded from .cli-extensions.json */
export interface ExtensionConfig {
  /** Schema version (must be 1) */
  version: 1;
  author?: string;
  longDescription?: string;
  /** Inject a `help` subcommand */
  help?: boolean;
  /** Inject a `version` subcommand */
  versionCommand?: boolean;
  /** Flag long name to default value */
  defaults?: Record<string, string>;
  /** Flag long names that must be supplied */
  required?: string[];
  /** Read values from each flag's declared environment variable */
  envVars?: boolean;
}
