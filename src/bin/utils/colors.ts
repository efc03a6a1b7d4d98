/**
 * Shared ANSI color utilities with TTY detection.
 * Automatically disables colors when not writing to a TTY or when NO_COLOR is set.
 */

/**
 * Determines if color output should be used.
 * Evaluated lazily to allow tests to control via environment variables.
 * @internal Exported for testing
 */
export function shouldUseColor(): boolean {
  return Boolean(process.stdout.isTTY && !process.env.NO_COLOR);
}

const paint = (code: number) => (s: string) =>
  shouldUseColor() ? `\x1b[${code}m${s}\x1b[0m` : s;

/**
 * Color object for convenient grouped access.
 */
export const colors = {
  red: paint(31),
  bold: paint(1),
};
