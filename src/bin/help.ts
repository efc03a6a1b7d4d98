import { declaresShortName } from '@/bin/parse';
import { colors } from '@/bin/utils/colors';
import type { Command, Flag } from '@/types';

const INDENT = '  ';

interface OptionRow {
  flags: string;
  description: string;
}

const HELP_ROW: OptionRow = { flags: '-h, --help', description: 'Show help' };
const VERSION_ROW: OptionRow = { flags: '-V, --version', description: 'Show version' };

/**
 * Format flag names with optional argument.
 * e.g., "-l, --level <level>" or "    --json"
 */
export function formatFlag(flag: Flag): string {
  const names = flag.shortName ? `-${flag.shortName}, --${flag.longName}` : `    --${flag.longName}`;
  return flag.argument ? `${names} ${flag.argument}` : names;
}

/** Drop the short alias of a builtin option when a declared flag takes it. */
function builtinRow(command: Command, row: OptionRow, shortName: string): OptionRow {
  return declaresShortName(command, shortName)
    ? { ...row, flags: `    ${row.flags.slice(4)}` }
    : row;
}

function formatRows(rows: readonly OptionRow[]): string[] {
  const width = Math.max(...rows.map((row) => row.flags.length));
  return rows.map((row) => `${INDENT}${row.flags.padEnd(width + 2)}${row.description}`);
}

function summary(description: string): string {
  return description.split('\n').join(' ');
}

/**
 * Render help for a command. `path` is the invocation path from the root.
 */
export function renderHelp(command: Command, path: readonly string[] = [command.name]): string {
  const invocation = path.join(' ');
  const lines: string[] = [];

  // Header
  lines.push(command.version ? `${invocation} v${command.version}` : invocation);
  lines.push('');
  for (const line of command.description.split('\n')) {
    lines.push(`${INDENT}${line}`);
  }
  lines.push('');

  // Usage
  lines.push(colors.bold('USAGE:'));
  const usage = command.subCommands.length > 0 ? `${invocation} [options] [command]` : `${invocation} [options]`;
  lines.push(`${INDENT}${usage}`);
  lines.push('');

  // Options
  const rows: OptionRow[] = command.flags.map((flag) => ({
    flags: formatFlag(flag),
    description: flag.description,
  }));
  rows.push(builtinRow(command, HELP_ROW, 'h'));
  if (command.version) {
    rows.push(builtinRow(command, VERSION_ROW, 'V'));
  }
  lines.push(colors.bold('OPTIONS:'));
  lines.push(...formatRows(rows));

  // Subcommands
  if (command.subCommands.length > 0) {
    lines.push('');
    lines.push(colors.bold('COMMANDS:'));
    lines.push(
      ...formatRows(
        command.subCommands.map((sub) => ({ flags: sub.name, description: summary(sub.description) })),
      ),
    );
  }

  if (command.furtherInformation) {
    lines.push('');
    lines.push(command.furtherInformation);
  }

  return lines.join('\n');
}

export function printHelp(command: Command, path?: readonly string[]): void {
  console.log(renderHelp(command, path));
}

export function printVersion(command: Command): void {
  console.log(`${command.name} ${command.version ?? 'dev'}`);
}
